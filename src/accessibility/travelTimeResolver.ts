import {logger} from '../config/logger.js';
import {RoutingError} from '../types/errors.js';
import {CandidateDistance, CandidateOutcome, Centroid, CentroidOutcomes} from '../types/domain.js';
import {TransitRouter} from '../routing/distanceMatrixRouter.js';

/**
 * Smallest successful value; failures are ignored. Null when nothing succeeded.
 */
export function minimumTravelTime(outcomes: CandidateOutcome[]): number | null {
	let minimum: number | null = null;
	for (const outcome of outcomes) {
		if (outcome.status !== 'ok') continue;
		if (minimum === null || outcome.minutes < minimum) {
			minimum = outcome.minutes;
		}
	}
	return minimum;
}

/**
 * Query every candidate for one centroid in order. A failed candidate is recorded and the
 * loop moves on to the next one.
 */
export async function resolveCentroid(centroid: Centroid, candidates: CandidateDistance[], departure: Date, router: TransitRouter): Promise<CandidateOutcome[]> {
	const outcomes: CandidateOutcome[] = [];

	for (const [index, candidate] of candidates.entries()) {
		try {
			const seconds = await router.travelSeconds(centroid, candidate.clinic, departure);
			outcomes.push({status: 'ok', minutes: seconds / 60});
		} catch (error) {
			const reason = error instanceof RoutingError ? error.reason : 'unexpected';
			const context = {err: error, geoid: centroid.geoid, candidate: index, clinicRow: candidate.clinic.row, reason};
			if (reason === 'rejected') {
				logger.warn(context, 'Routing service rejected the request; check the API key and quota');
			} else {
				logger.warn(context, 'Transit query failed');
			}
			outcomes.push({status: 'failed', reason: error instanceof Error ? error.message : String(error), retryable: reason !== 'no-route'});
		}
	}

	return outcomes;
}

export type ResolveAllOptions = {
	/** GEOIDs already resolved by an earlier run */
	skip?: ReadonlySet<string>;
	progressEvery?: number;
};

/**
 * Resolve centroids one after another, one request in flight at a time. The returned
 * array follows centroid order.
 */
export async function resolveAll(
	centroids: Centroid[],
	candidates: Map<string, CandidateDistance[]>,
	departure: Date,
	router: TransitRouter,
	options: ResolveAllOptions = {},
): Promise<CentroidOutcomes[]> {
	const skip = options.skip ?? new Set<string>();
	const progressEvery = options.progressEvery ?? 50;
	const pending = centroids.filter((centroid) => !skip.has(centroid.geoid));
	const results: CentroidOutcomes[] = [];

	logger.info({pending: pending.length, skipped: centroids.length - pending.length}, 'Resolving transit travel times');

	for (const [index, centroid] of pending.entries()) {
		const outcomes = await resolveCentroid(centroid, candidates.get(centroid.geoid) ?? [], departure, router);
		results.push({geoid: centroid.geoid, outcomes});

		if (minimumTravelTime(outcomes) === null) {
			logger.info({geoid: centroid.geoid, candidates: outcomes.length}, 'No candidate reachable by transit');
		}
		if ((index + 1) % progressEvery === 0) {
			logger.info({done: index + 1, total: pending.length}, 'Transit resolution progress');
		}
	}

	return results;
}
