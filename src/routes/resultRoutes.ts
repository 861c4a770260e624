import fs from 'fs/promises';
import express from 'express';
import {z} from 'zod';
import {logger} from '../config/logger.js';
import {summarizeByBin} from '../accessibility/summary.js';
import {TRAVEL_TIME_THEME, classifyTravelTime, MapThemeId} from '../map/themes.js';
import {readRegions, toFeatureCollection, toRegionFeature} from '../storage/regionsGeoJson.js';
import {OutputPaths} from '../storage/outputPaths.js';
import {MappedRegion} from '../types/domain.js';

const binLabels = [...TRAVEL_TIME_THEME.bins.map((bin) => bin.label), TRAVEL_TIME_THEME.missingLabel];

const regionsQuerySchema = z.object({
	bin: z
		.string()
		.refine((label) => binLabels.includes(label), {message: `Expected one of: ${binLabels.join(', ')}`})
		.optional(),
});

const mapParamsSchema = z.object({
	theme: z.enum(['travel-time', 'subgroup-share']),
});

async function fileExists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch {
		return false;
	}
}

export function createResultRoutes(paths: OutputPaths): express.Router {
	const router = express.Router();

	const loadRegions = async (res: express.Response): Promise<MappedRegion[] | null> => {
		if (!(await fileExists(paths.regions))) {
			res.status(404).json({error: 'No results yet; run the pipeline first'});
			return null;
		}
		return readRegions(paths.regions);
	};

	router.get('/health', (_req, res) => {
		res.json({status: 'ok'});
	});

	router.get('/regions', async (req, res) => {
		const parsed = regionsQuerySchema.safeParse(req.query);
		if (!parsed.success) {
			return res.status(400).json({error: parsed.error.flatten()});
		}

		try {
			const regions = await loadRegions(res);
			if (!regions) return;
			const {bin} = parsed.data;
			const selected = bin ? regions.filter((region) => classifyTravelTime(region.travelMinutes) === bin) : regions;
			return res.json(toFeatureCollection(selected));
		} catch (error) {
			logger.error({err: error}, 'Failed to read regions');
			return res.status(500).json({error: 'Failed to read regions'});
		}
	});

	router.get('/regions/:geoid', async (req, res) => {
		try {
			const regions = await loadRegions(res);
			if (!regions) return;
			const region = regions.find((candidate) => candidate.geoid === req.params.geoid);
			if (!region) {
				return res.status(404).json({error: `Region not found: ${req.params.geoid}`});
			}
			return res.json(toRegionFeature(region));
		} catch (error) {
			logger.error({err: error, geoid: req.params.geoid}, 'Failed to read region');
			return res.status(500).json({error: 'Failed to read regions'});
		}
	});

	router.get('/summary', async (_req, res) => {
		try {
			const regions = await loadRegions(res);
			if (!regions) return;
			return res.json({bins: summarizeByBin(regions)});
		} catch (error) {
			logger.error({err: error}, 'Failed to summarize regions');
			return res.status(500).json({error: 'Failed to read regions'});
		}
	});

	router.get('/maps/:theme.png', async (req, res) => {
		const parsed = mapParamsSchema.safeParse(req.params);
		if (!parsed.success) {
			return res.status(404).json({error: 'Unknown map theme'});
		}
		const theme: MapThemeId = parsed.data.theme;
		const pngPath = `${paths.maps[theme]}.png`;

		try {
			if (!(await fileExists(pngPath))) {
				return res.status(404).json({error: 'Map not rendered yet'});
			}
			return res.type('png').send(await fs.readFile(pngPath));
		} catch (error) {
			logger.error({err: error, theme, pngPath}, 'Failed to read map');
			return res.status(500).json({error: 'Failed to read map'});
		}
	});

	return router;
}
