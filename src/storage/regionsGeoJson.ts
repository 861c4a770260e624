import fs from 'fs/promises';
import {z} from 'zod';
import type {Feature, FeatureCollection} from 'geojson';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {MappedRegion, RegionGeometry} from '../types/domain.js';
import {classifyTravelTime} from '../map/themes.js';
import {parseRegionGeometry} from '../loaders/geometryLoader.js';

export type RegionProperties = {
	GEOID: string;
	NAME: string | null;
	population: number | null;
	subgroup_pop: number | null;
	subgroup_pct: number | null;
	min_travel_minutes: number | null;
	travel_bin: string;
};

export type RegionFeatureCollection = FeatureCollection<RegionGeometry, RegionProperties>;

const propertiesSchema = z.object({
	GEOID: z.string(),
	NAME: z.string().nullable(),
	population: z.number().nullable(),
	subgroup_pop: z.number().nullable(),
	subgroup_pct: z.number().nullable(),
	min_travel_minutes: z.number().nullable(),
	travel_bin: z.string(),
});

export function toRegionFeature(region: MappedRegion): Feature<RegionGeometry, RegionProperties> {
	return {
		type: 'Feature',
		properties: {
			GEOID: region.geoid,
			NAME: region.name,
			population: region.totalPopulation,
			subgroup_pop: region.subgroupPopulation,
			subgroup_pct: region.subgroupPercentage,
			min_travel_minutes: region.travelMinutes,
			travel_bin: classifyTravelTime(region.travelMinutes),
		},
		geometry: region.geometry,
	};
}

export function toFeatureCollection(regions: MappedRegion[]): RegionFeatureCollection {
	return {type: 'FeatureCollection', features: regions.map(toRegionFeature)};
}

/**
 * Rebuild regions from a written collection. Centroids are not stored, so they come back null.
 */
export function fromFeatureCollection(json: unknown, source: string): MappedRegion[] {
	const geometry = parseRegionGeometry(json, source);
	const features = z.object({features: z.array(z.object({properties: propertiesSchema}))}).safeParse(json);
	if (!features.success) {
		throw new DataParseError('region properties have an unexpected shape', source);
	}

	return geometry.map((feature, index): MappedRegion => {
		const properties = features.data.features[index]?.properties;
		return {
			geoid: feature.geoid,
			name: properties?.NAME ?? null,
			totalPopulation: properties?.population ?? null,
			subgroupPopulation: properties?.subgroup_pop ?? null,
			subgroupPercentage: properties?.subgroup_pct ?? null,
			centroid: null,
			travelMinutes: properties?.min_travel_minutes ?? null,
			geometry: feature.geometry,
		};
	});
}

export async function writeRegions(filePath: string, regions: MappedRegion[]): Promise<void> {
	await fs.writeFile(filePath, JSON.stringify(toFeatureCollection(regions)), 'utf8');
	logger.info({filePath, regionCount: regions.length}, 'Joined regions written');
}

export async function readRegions(filePath: string): Promise<MappedRegion[]> {
	const text = await fs.readFile(filePath, 'utf8');
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		throw new DataParseError('not valid JSON', filePath);
	}
	return fromFeatureCollection(json, filePath);
}
