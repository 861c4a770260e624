import {logger} from '../config/logger.js';
import {Centroid, GeoUnit, MappedRegion, RegionFeature, TravelTimeResult} from '../types/domain.js';

export function normalizeTravelTime(value: number | null | undefined): number | null {
	return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export type JoinInput = {
	geometry: RegionFeature[];
	geoUnits: GeoUnit[];
	centroids: Centroid[];
	travelTimes: TravelTimeResult[];
};

/**
 * Left outer join from polygons onto the attribute tables, all keyed by GEOID. Every output
 * row keeps its polygon; rows of the other tables without a polygon are dropped.
 */
export function joinRegions({geometry, geoUnits, centroids, travelTimes}: JoinInput): MappedRegion[] {
	const unitsById = new Map<string, GeoUnit>(geoUnits.map((unit) => [unit.geoid, unit]));
	const centroidsById = new Map<string, Centroid>(centroids.map((centroid) => [centroid.geoid, centroid]));
	const minutesById = new Map<string, number | null>(travelTimes.map((result) => [result.geoid, normalizeTravelTime(result.minutes)]));

	const regions = geometry.map((feature): MappedRegion => {
		const unit = unitsById.get(feature.geoid);
		const centroid = centroidsById.get(feature.geoid);
		return {
			geoid: feature.geoid,
			name: unit?.name ?? null,
			totalPopulation: unit?.totalPopulation ?? null,
			subgroupPopulation: unit?.subgroupPopulation ?? null,
			subgroupPercentage: unit?.subgroupPercentage ?? null,
			centroid: centroid ? {latitude: centroid.latitude, longitude: centroid.longitude} : null,
			travelMinutes: minutesById.get(feature.geoid) ?? null,
			geometry: feature.geometry,
		};
	});

	const polygonIds = new Set(geometry.map((feature) => feature.geoid));
	const unmatchedTravelTimes = travelTimes.filter((result) => !polygonIds.has(result.geoid)).length;
	if (unmatchedTravelTimes > 0) {
		logger.debug({unmatchedTravelTimes}, 'Travel times without a matching polygon dropped');
	}

	return regions;
}
