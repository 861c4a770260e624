import fs from 'fs/promises';
import request from 'supertest';
import {createServer} from '../../src/server.js';
import {outputPaths} from '../../src/storage/outputPaths.js';
import {writeRegions} from '../../src/storage/regionsGeoJson.js';
import {makeRegion, makeTempDir, removeTempDir, squarePolygon} from '../helpers/factories.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('resultRoutes', () => {
	let dir: string;
	let app: import('express').Express;

	beforeAll(async () => {
		dir = await makeTempDir();
		const paths = outputPaths(dir);
		await writeRegions(paths.regions, [
			makeRegion({geoid: '131210001011', travelMinutes: 8, totalPopulation: 100, subgroupPopulation: 20, geometry: squarePolygon(-84.4, 33.7)}),
			makeRegion({geoid: '131210001012', travelMinutes: null, totalPopulation: 50, subgroupPopulation: 40, subgroupPercentage: 80, geometry: squarePolygon(-84.39, 33.7)}),
		]);
		await fs.writeFile(`${paths.maps['travel-time']}.png`, PNG_SIGNATURE);
		app = createServer(dir);
	});

	afterAll(async () => {
		await removeTempDir(dir);
	});

	it('reports health', async () => {
		const response = await request(app).get('/health');

		expect(response.status).toBe(200);
		expect(response.body).toEqual({status: 'ok'});
	});

	it('returns every region as GeoJSON', async () => {
		const response = await request(app).get('/regions');

		expect(response.status).toBe(200);
		expect(response.body.type).toBe('FeatureCollection');
		expect(response.body.features.map((feature: {properties: {GEOID: string}}) => feature.properties.GEOID)).toEqual(['131210001011', '131210001012']);
	});

	it('filters regions by travel time bin', async () => {
		const response = await request(app).get('/regions').query({bin: 'No Public Transit Available'});

		expect(response.status).toBe(200);
		expect(response.body.features).toHaveLength(1);
		expect(response.body.features[0].properties).toEqual({
			GEOID: '131210001012',
			NAME: 'Block Group 131210001012',
			population: 50,
			subgroup_pop: 40,
			subgroup_pct: 80,
			min_travel_minutes: null,
			travel_bin: 'No Public Transit Available',
		});
	});

	it('rejects an unknown bin', async () => {
		const response = await request(app).get('/regions').query({bin: '5-10'});

		expect(response.status).toBe(400);
	});

	it('returns one region by GEOID', async () => {
		const response = await request(app).get('/regions/131210001011');

		expect(response.status).toBe(200);
		expect(response.body.properties.min_travel_minutes).toBe(8);
		expect(response.body.properties.travel_bin).toBe('0-15');
	});

	it('returns 404 for an unknown GEOID', async () => {
		const response = await request(app).get('/regions/999999999999');

		expect(response.status).toBe(404);
		expect(response.body).toEqual({error: 'Region not found: 999999999999'});
	});

	it('summarizes regions by bin', async () => {
		const response = await request(app).get('/summary');

		expect(response.status).toBe(200);
		expect(response.body.bins).toHaveLength(7);
		expect(response.body.bins[0]).toEqual({label: '0-15', regionCount: 1, population: 100, subgroupPopulation: 20, subgroupShare: 20});
		expect(response.body.bins[6]).toEqual({label: 'No Public Transit Available', regionCount: 1, population: 50, subgroupPopulation: 40, subgroupShare: 80});
	});

	it('serves a rendered map', async () => {
		const response = await request(app).get('/maps/travel-time.png');

		expect(response.status).toBe(200);
		expect(response.headers['content-type']).toBe('image/png');
	});

	it('returns 404 for a map that was not rendered', async () => {
		const response = await request(app).get('/maps/subgroup-share.png');

		expect(response.status).toBe(404);
	});

	it('answers 500 when a map cannot be read', async () => {
		const broken = await makeTempDir();
		try {
			await fs.mkdir(`${outputPaths(broken).maps['travel-time']}.png`);

			const response = await request(createServer(broken)).get('/maps/travel-time.png');

			expect(response.status).toBe(500);
			expect(response.body).toEqual({error: 'Failed to read map'});
		} finally {
			await removeTempDir(broken);
		}
	});

	it('returns 404 before the pipeline has run', async () => {
		const empty = await makeTempDir();
		try {
			const response = await request(createServer(empty)).get('/regions');

			expect(response.status).toBe(404);
		} finally {
			await removeTempDir(empty);
		}
	});
});
