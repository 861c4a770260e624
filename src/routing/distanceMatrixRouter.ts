import {z} from 'zod';
import {ConfigError, RoutingError} from '../types/errors.js';
import {LatLng} from '../types/domain.js';
import {formatLatLng} from '../loaders/coordinates.js';

/**
 * Local departure date and time plus the UTC offset they are in.
 */
export type Departure = {
	/** YYYY-MM-DD */
	date: string;
	/** HH:MM:SS */
	time: string;
	/** ±HH:MM */
	utcOffset: string;
};

export interface TransitRouter {
	/**
	 * One-way transit duration in seconds. Rejects with RoutingError on any failure.
	 */
	travelSeconds(origin: LatLng, destination: LatLng, departure: Date): Promise<number>;
}

export function departureInstant(departure: Departure): Date {
	if (!/^\d{4}-\d{2}-\d{2}$/.test(departure.date) || !/^\d{2}:\d{2}:\d{2}$/.test(departure.time) || !/^[+-]\d{2}:\d{2}$/.test(departure.utcOffset)) {
		throw new ConfigError(`Invalid departure ${departure.date} ${departure.time} ${departure.utcOffset}`);
	}
	const instant = new Date(`${departure.date}T${departure.time}${departure.utcOffset}`);
	if (Number.isNaN(instant.getTime())) {
		throw new ConfigError(`Invalid departure ${departure.date} ${departure.time} ${departure.utcOffset}`);
	}
	return instant;
}

const elementSchema = z.object({
	status: z.string(),
	duration: z.object({value: z.number().nonnegative()}).optional(),
});

const responseSchema = z.object({
	status: z.string(),
	error_message: z.string().optional(),
	rows: z.array(z.object({elements: z.array(elementSchema)})),
});

export type DistanceMatrixOptions = {
	apiKey: string;
	baseUrl: string;
	fetchImpl?: typeof fetch;
};

/**
 * Transit durations from a distance-matrix style endpoint, one origin and one destination
 * per request.
 */
export class DistanceMatrixRouter implements TransitRouter {
	private readonly fetchImpl: typeof fetch;

	constructor(private readonly options: DistanceMatrixOptions) {
		if (!options.apiKey) {
			throw new ConfigError('ROUTING_API_KEY is required to query transit travel times');
		}
		this.fetchImpl = options.fetchImpl ?? fetch;
	}

	buildUrl(origin: LatLng, destination: LatLng, departure: Date): string {
		const params = new URLSearchParams({
			origins: formatLatLng(origin),
			destinations: formatLatLng(destination),
			mode: 'transit',
			departure_time: String(Math.floor(departure.getTime() / 1000)),
			key: this.options.apiKey,
		});
		return `${this.options.baseUrl}?${params.toString()}`;
	}

	async travelSeconds(origin: LatLng, destination: LatLng, departure: Date): Promise<number> {
		let response: Response;
		try {
			response = await this.fetchImpl(this.buildUrl(origin, destination, departure));
		} catch (error) {
			throw new RoutingError(`Routing request failed: ${error instanceof Error ? error.message : String(error)}`, 'network', {cause: error});
		}

		if (!response.ok) {
			throw new RoutingError(`Routing service returned HTTP ${response.status}`, 'http');
		}

		let json: unknown;
		try {
			json = await response.json();
		} catch (error) {
			throw new RoutingError('Routing service returned a non-JSON body', 'malformed', {cause: error});
		}

		const parsed = responseSchema.safeParse(json);
		if (!parsed.success) {
			throw new RoutingError('Routing service returned an unexpected body', 'malformed');
		}

		if (parsed.data.status !== 'OK') {
			const detail = parsed.data.error_message ? `: ${parsed.data.error_message}` : '';
			throw new RoutingError(`Routing request ${parsed.data.status}${detail}`, 'rejected');
		}

		const element = parsed.data.rows[0]?.elements[0];
		if (!element) {
			throw new RoutingError('Routing response has no elements', 'malformed');
		}
		if (element.status !== 'OK') {
			throw new RoutingError(`No transit route (${element.status})`, 'no-route');
		}
		if (!element.duration) {
			throw new RoutingError('Routing element has no duration', 'malformed');
		}
		return element.duration.value;
	}
}
