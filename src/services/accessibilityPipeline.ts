import fs from 'fs/promises';
import {v4 as uuidv4} from 'uuid';
import {logger} from '../config/logger.js';
import type {Env} from '../config/env.js';
import {loadGeoUnits} from '../census/demographicLoader.js';
import {loadCentroids} from '../loaders/centroidLoader.js';
import {loadClinics} from '../loaders/clinicLoader.js';
import {loadHighways, loadRegionGeometry} from '../loaders/geometryLoader.js';
import {pruneCandidates} from '../accessibility/candidatePruner.js';
import {resolveAll} from '../accessibility/travelTimeResolver.js';
import {joinRegions} from '../accessibility/geometryJoiner.js';
import {BinSummary, summarizeByBin} from '../accessibility/summary.js';
import {Departure, DistanceMatrixRouter, TransitRouter, departureInstant} from '../routing/distanceMatrixRouter.js';
import {CHECKPOINT_VERSION, CheckpointEntry, entryMinimum, isSettled, matchesCandidates, readCheckpoint, toCheckpointEntry, writeCheckpoint} from '../storage/checkpoint.js';
import {readTravelTimeCsv, writeTravelTimeCsv} from '../storage/travelTimeCsv.js';
import {writeRegions} from '../storage/regionsGeoJson.js';
import {outputPaths} from '../storage/outputPaths.js';
import {MAP_THEMES} from '../map/themes.js';
import {CentroidOutcomes} from '../types/domain.js';
import {renderMapFiles} from '../map/mapRenderer.js';

export type PipelineConfig = {
	census: {
		baseUrl: string;
		apiKey: string;
		year: number;
		stateFips: string;
		countyFips: string[];
		totalVariable: string;
		subgroupVariable: string;
	};
	routing: {
		baseUrl: string;
		apiKey: string;
	};
	centroidsPath: string;
	clinicsPath: string;
	clinicColumn: string;
	geometryPath: string;
	highwaysPath: string | null;
	departure: Departure;
	candidateCount: number;
	outputDir: string;
	map: {
		width: number;
		height: number;
	};
	/** Ignore an existing checkpoint and query every centroid again */
	refresh: boolean;
};

export type PipelineDeps = {
	fetchImpl?: typeof fetch;
	router?: TransitRouter;
};

/**
 * Result of a pipeline run.
 */
export type PipelineResult = {
	runId: string;
	centroidCount: number;
	clinicCount: number;
	regionCount: number;
	/** Centroids queried in this run */
	resolvedCount: number;
	/** Centroids taken from the checkpoint */
	reusedCount: number;
	/** Centroids with no candidate reachable by transit */
	unavailableCount: number;
	summary: BinSummary[];
	durations: {
		load_ms: number;
		resolve_ms: number;
		render_ms: number;
		total_ms: number;
	};
};

export function pipelineConfigFromEnv(env: Env, refresh = false): PipelineConfig {
	return {
		census: {
			baseUrl: env.censusBaseUrl,
			apiKey: env.censusApiKey,
			year: env.acsYear,
			stateFips: env.stateFips,
			countyFips: env.countyFips,
			totalVariable: env.acsTotalVariable,
			subgroupVariable: env.acsSubgroupVariable,
		},
		routing: {baseUrl: env.routingBaseUrl, apiKey: env.routingApiKey},
		centroidsPath: env.centroidsPath,
		clinicsPath: env.clinicsPath,
		clinicColumn: env.clinicCoordinateColumn,
		geometryPath: env.geometryPath,
		highwaysPath: env.highwaysPath,
		departure: env.departure,
		candidateCount: env.candidateCount,
		outputDir: env.outputDir,
		map: {width: env.mapWidth, height: env.mapHeight},
		refresh,
	};
}

/**
 * Checkpoint entries computed for this departure, keyed by GEOID. Entries computed for another
 * departure are dropped.
 */
async function previousEntries(checkpointPath: string, departureIso: string, refresh: boolean): Promise<Map<string, CheckpointEntry>> {
	if (refresh) return new Map();
	const checkpoint = await readCheckpoint(checkpointPath);
	if (!checkpoint) return new Map();
	if (checkpoint.departure !== departureIso) {
		logger.warn({checkpointPath, checkpointDeparture: checkpoint.departure, departure: departureIso}, 'Checkpoint was computed for another departure; ignoring it');
		return new Map();
	}
	logger.info({checkpointPath, entryCount: checkpoint.entries.length}, 'Reusing checkpoint');
	return new Map<string, CheckpointEntry>(checkpoint.entries.map((entry) => [entry.geoid, entry]));
}

/**
 * Main pipeline entrypoint.
 *
 * 1. Load ACS estimates, centroids and clinics
 * 2. Prune each centroid to its nearest candidate clinics
 * 3. Resolve transit times for centroids missing from the checkpoint, write the checkpoint
 * 4. Write the intermediate travel time CSV and read it back for the join
 * 5. Join onto block group polygons, write GeoJSON
 * 6. Render the travel time and subgroup share maps
 */
export async function runAccessibilityPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineResult> {
	const runId = uuidv4();
	const totalStartTime = Date.now();
	const paths = outputPaths(config.outputDir);
	const departure = departureInstant(config.departure);

	logger.info({runId, outputDir: config.outputDir, departure: departure.toISOString(), refresh: config.refresh}, 'Accessibility pipeline started');
	await fs.mkdir(config.outputDir, {recursive: true});

	const {census} = config;
	const geoUnits = await loadGeoUnits(
		{baseUrl: census.baseUrl, apiKey: census.apiKey, year: census.year, stateFips: census.stateFips, countyFips: census.countyFips},
		{total: census.totalVariable, subgroup: census.subgroupVariable},
		deps.fetchImpl,
	);
	const centroids = await loadCentroids(config.centroidsPath, {counties: census.countyFips});
	const clinics = await loadClinics(config.clinicsPath, {column: config.clinicColumn});
	if (clinics.length === 0) {
		logger.warn({clinicsPath: config.clinicsPath}, 'No clinics loaded; every centroid will be unavailable');
	}
	const loadMs = Date.now() - totalStartTime;

	const resolveStartTime = Date.now();
	const candidates = pruneCandidates(centroids, clinics, config.candidateCount);
	const previous = await previousEntries(paths.checkpoint, departure.toISOString(), config.refresh);
	const candidatesOf = (geoid: string) => candidates.get(geoid) ?? [];

	const reusable = new Map<string, CheckpointEntry>();
	let staleCount = 0;
	for (const centroid of centroids) {
		const entry = previous.get(centroid.geoid);
		if (!entry) continue;
		if (matchesCandidates(entry, candidatesOf(centroid.geoid))) {
			reusable.set(centroid.geoid, entry);
		} else {
			staleCount += 1;
		}
	}
	if (staleCount > 0) {
		logger.warn({staleCount}, 'Checkpoint entries were computed for other candidate clinics; querying them again');
	}
	const pending = centroids.filter((centroid) => !reusable.has(centroid.geoid));

	let resolved: CentroidOutcomes[] = [];
	if (pending.length > 0) {
		const router = deps.router ?? new DistanceMatrixRouter({...config.routing, fetchImpl: deps.fetchImpl});
		resolved = await resolveAll(centroids, candidates, departure, router, {skip: new Set(reusable.keys())});
	}
	const resolvedEntries = new Map<string, CheckpointEntry>(resolved.map((result) => [result.geoid, toCheckpointEntry(result, candidatesOf(result.geoid))]));
	const settled = new Set(resolved.filter(isSettled).map((result) => result.geoid));

	if (resolved.length > 0) {
		const currentIds = new Set(centroids.map((centroid) => centroid.geoid));
		const entries = [
			...centroids.flatMap((centroid) => {
				const entry = settled.has(centroid.geoid) ? resolvedEntries.get(centroid.geoid) : reusable.get(centroid.geoid);
				return entry ? [entry] : [];
			}),
			// Centroids outside the current county filter keep their answers
			...[...previous.values()].filter((entry) => !currentIds.has(entry.geoid)),
		];
		await writeCheckpoint(paths.checkpoint, {version: CHECKPOINT_VERSION, departure: departure.toISOString(), entries});
	}
	if (settled.size < resolved.length) {
		logger.warn({unsettledCount: resolved.length - settled.size}, 'Centroids with retryable failures left out of the checkpoint');
	}

	const entryFor = (geoid: string): CheckpointEntry | undefined => resolvedEntries.get(geoid) ?? reusable.get(geoid);

	await writeTravelTimeCsv(
		paths.travelTimes,
		centroids.map((centroid) => {
			const entry = entryFor(centroid.geoid);
			return {geoid: centroid.geoid, coordinate: centroid.coordinate, minutes: entry ? entryMinimum(entry) : null};
		}),
	);
	const resolveMs = Date.now() - resolveStartTime;

	const renderStartTime = Date.now();
	const travelTimes = await readTravelTimeCsv(paths.travelTimes);
	const geometry = await loadRegionGeometry(config.geometryPath);
	const highways = config.highwaysPath ? await loadHighways(config.highwaysPath) : [];
	const regions = joinRegions({geometry, geoUnits, centroids, travelTimes});
	await writeRegions(paths.regions, regions);

	const subtitle = `ACS ${census.year} 5-year estimates; departing ${config.departure.date} ${config.departure.time}`;
	for (const theme of Object.values(MAP_THEMES)) {
		await renderMapFiles(regions, {theme, width: config.map.width, height: config.map.height, clinics, highways, subtitle}, paths.maps[theme.id]);
	}
	const renderMs = Date.now() - renderStartTime;

	const summary = summarizeByBin(regions);
	const result: PipelineResult = {
		runId,
		centroidCount: centroids.length,
		clinicCount: clinics.length,
		regionCount: regions.length,
		resolvedCount: resolved.length,
		reusedCount: centroids.length - pending.length,
		unavailableCount: travelTimes.filter((record) => record.minutes === null).length,
		summary,
		durations: {
			load_ms: loadMs,
			resolve_ms: resolveMs,
			render_ms: renderMs,
			total_ms: Date.now() - totalStartTime,
		},
	};

	logger.info({...result, summary: undefined}, 'Accessibility pipeline completed');
	for (const bin of summary) {
		logger.info(bin, 'Travel time bin');
	}
	return result;
}
