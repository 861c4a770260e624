import {TransitRouter} from '../../src/routing/distanceMatrixRouter.js';
import {LatLng} from '../../src/types/domain.js';

type Handler = (origin: LatLng, destination: LatLng, departure: Date) => number;

/**
 * In-process router: the handler returns seconds or throws.
 */
export class FakeRouter implements TransitRouter {
	readonly calls: Array<{origin: LatLng; destination: LatLng; departure: Date}> = [];

	constructor(private readonly handler: Handler) {}

	async travelSeconds(origin: LatLng, destination: LatLng, departure: Date): Promise<number> {
		this.calls.push({origin, destination, departure});
		return this.handler(origin, destination, departure);
	}
}

/**
 * Answers calls in order from a script; an Error entry is thrown instead of returned.
 */
export function scriptedRouter(script: Array<number | Error>): FakeRouter {
	let index = 0;
	return new FakeRouter(() => {
		const next = script[index];
		index += 1;
		if (next === undefined) throw new Error(`Unexpected call ${index}`);
		if (next instanceof Error) throw next;
		return next;
	});
}
