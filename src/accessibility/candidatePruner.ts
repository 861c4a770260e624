import {logger} from '../config/logger.js';
import {ConfigError} from '../types/errors.js';
import {CandidateDistance, Centroid, Clinic} from '../types/domain.js';
import {geodesicDistance} from './distance.js';

export const DEFAULT_CANDIDATE_COUNT = 10;

/**
 * Keep the k clinics closest to each centroid by geodesic distance.
 *
 * Brute force over every centroid/clinic pair. Each list holds exactly
 * min(k, clinics.length) entries in ascending distance; equal distances keep the clinic
 * input order (Array.prototype.sort is stable).
 *
 * Geodesic order is only a proxy for transit order, so a clinic outside the k nearest can
 * still be the fastest to reach. Raise k when the transit network is patchy.
 */
export function pruneCandidates(centroids: Centroid[], clinics: Clinic[], k: number = DEFAULT_CANDIDATE_COUNT): Map<string, CandidateDistance[]> {
	if (!Number.isInteger(k) || k < 1) {
		throw new ConfigError(`Candidate count must be a positive integer, got ${k}`);
	}

	const candidates = new Map<string, CandidateDistance[]>();
	for (const centroid of centroids) {
		const distances = clinics.map((clinic) => ({
			geoid: centroid.geoid,
			clinic,
			distanceMeters: geodesicDistance([clinic.longitude, clinic.latitude], [centroid.longitude, centroid.latitude]),
		}));
		distances.sort((a, b) => a.distanceMeters - b.distanceMeters);
		candidates.set(centroid.geoid, distances.slice(0, k));
	}

	logger.info({centroidCount: centroids.length, clinicCount: clinics.length, k: Math.min(k, clinics.length)}, 'Candidate clinics pruned');
	return candidates;
}
