import fs from 'fs/promises';
import {z} from 'zod';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {HighwayGeometry, RegionFeature} from '../types/domain.js';

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema).min(4);

const polygonSchema = z.object({
	type: z.literal('Polygon'),
	coordinates: z.array(ringSchema).min(1),
});

const multiPolygonSchema = z.object({
	type: z.literal('MultiPolygon'),
	coordinates: z.array(z.array(ringSchema).min(1)).min(1),
});

const regionCollectionSchema = z.object({
	type: z.literal('FeatureCollection'),
	features: z.array(
		z.object({
			type: z.literal('Feature'),
			properties: z.object({GEOID: z.union([z.string(), z.number()])}).passthrough(),
			geometry: z.discriminatedUnion('type', [polygonSchema, multiPolygonSchema]),
		}),
	),
});

const lineStringSchema = z.object({
	type: z.literal('LineString'),
	coordinates: z.array(positionSchema).min(2),
});

const multiLineStringSchema = z.object({
	type: z.literal('MultiLineString'),
	coordinates: z.array(z.array(positionSchema).min(2)),
});

const highwayCollectionSchema = z.object({
	type: z.literal('FeatureCollection'),
	features: z.array(
		z.object({
			type: z.literal('Feature'),
			geometry: z.discriminatedUnion('type', [lineStringSchema, multiLineStringSchema]),
		}),
	),
});

async function readJson(filePath: string): Promise<unknown> {
	const text = await fs.readFile(filePath, 'utf8');
	try {
		return JSON.parse(text);
	} catch {
		throw new DataParseError('not valid JSON', filePath);
	}
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.slice(0, 3)
		.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
		.join('; ');
}

/**
 * Parse block group polygons keyed by their GEOID property.
 */
export function parseRegionGeometry(json: unknown, source: string): RegionFeature[] {
	const parsed = regionCollectionSchema.safeParse(json);
	if (!parsed.success) {
		throw new DataParseError(`invalid region GeoJSON (${describeIssues(parsed.error)})`, source);
	}

	const seen = new Set<string>();
	return parsed.data.features.map((feature, index) => {
		const geoid = String(feature.properties.GEOID);
		if (seen.has(geoid)) {
			throw new DataParseError(`duplicate GEOID ${geoid} in feature ${index}`, source);
		}
		seen.add(geoid);
		return {geoid, geometry: feature.geometry};
	});
}

export function parseHighways(json: unknown, source: string): HighwayGeometry[] {
	const parsed = highwayCollectionSchema.safeParse(json);
	if (!parsed.success) {
		throw new DataParseError(`invalid highway GeoJSON (${describeIssues(parsed.error)})`, source);
	}
	return parsed.data.features.map((feature) => feature.geometry);
}

export async function loadRegionGeometry(filePath: string): Promise<RegionFeature[]> {
	const regions = parseRegionGeometry(await readJson(filePath), filePath);
	logger.info({filePath, regionCount: regions.length}, 'Region geometry loaded');
	return regions;
}

export async function loadHighways(filePath: string): Promise<HighwayGeometry[]> {
	const highways = parseHighways(await readJson(filePath), filePath);
	logger.info({filePath, lineCount: highways.length}, 'Highway overlay loaded');
	return highways;
}
