import {joinRegions, normalizeTravelTime} from '../../src/accessibility/geometryJoiner.js';
import {summarizeByBin} from '../../src/accessibility/summary.js';
import {NO_TRANSIT_LABEL} from '../../src/map/themes.js';
import {makeCentroid, makeRegion, squarePolygon} from '../helpers/factories.js';

describe('normalizeTravelTime', () => {
	it('turns non-finite and absent values into the missing marker', () => {
		expect(normalizeTravelTime(Number.POSITIVE_INFINITY)).toBeNull();
		expect(normalizeTravelTime(Number.NEGATIVE_INFINITY)).toBeNull();
		expect(normalizeTravelTime(Number.NaN)).toBeNull();
		expect(normalizeTravelTime(undefined)).toBeNull();
		expect(normalizeTravelTime(null)).toBeNull();
	});

	it('keeps finite values, zero included', () => {
		expect(normalizeTravelTime(0)).toBe(0);
		expect(normalizeTravelTime(42.5)).toBe(42.5);
	});
});

describe('joinRegions', () => {
	const geometry = [
		{geoid: 'A', geometry: squarePolygon(-84.4, 33.7)},
		{geoid: 'B', geometry: squarePolygon(-84.39, 33.7)},
		{geoid: 'C', geometry: squarePolygon(-84.38, 33.7)},
	];

	const regions = joinRegions({
		geometry,
		geoUnits: [
			{geoid: 'A', name: 'Block Group A', totalPopulation: 1000, subgroupPopulation: 250, subgroupPercentage: 25},
			{geoid: 'B', name: 'Block Group B', totalPopulation: 0, subgroupPopulation: 0, subgroupPercentage: null},
		],
		centroids: [makeCentroid('A', 33.705, -84.395), makeCentroid('B', 33.705, -84.385), makeCentroid('C', 33.705, -84.375)],
		travelTimes: [
			{geoid: 'A', minutes: 8},
			{geoid: 'B', minutes: Number.POSITIVE_INFINITY},
			{geoid: 'D', minutes: 5},
		],
	});

	it('keeps one row per polygon, each with its geometry', () => {
		expect(regions.map((region) => region.geoid)).toEqual(['A', 'B', 'C']);
		regions.forEach((region, index) => {
			expect(region.geometry).toBe(geometry[index]?.geometry);
		});
	});

	it('joins demographic, centroid and travel time attributes', () => {
		expect(regions[0]).toEqual({
			geoid: 'A',
			name: 'Block Group A',
			totalPopulation: 1000,
			subgroupPopulation: 250,
			subgroupPercentage: 25,
			centroid: {latitude: 33.705, longitude: -84.395},
			travelMinutes: 8,
			geometry: geometry[0]?.geometry,
		});
	});

	it('marks infinite and unmatched travel times as missing', () => {
		expect(regions[1]?.travelMinutes).toBeNull();
		expect(regions[2]?.travelMinutes).toBeNull();
		expect(regions[2]?.name).toBeNull();
		expect(regions[2]?.totalPopulation).toBeNull();
	});
});

describe('summarizeByBin', () => {
	it('counts regions, residents and subgroup share per travel time bin', () => {
		const summary = summarizeByBin([
			makeRegion({geoid: 'A', travelMinutes: 8, totalPopulation: 100, subgroupPopulation: 20}),
			makeRegion({geoid: 'B', travelMinutes: 95, totalPopulation: 50, subgroupPopulation: 25}),
			makeRegion({geoid: 'C', travelMinutes: null, totalPopulation: 0, subgroupPopulation: 0}),
		]);

		expect(summary.map((bin) => bin.label)).toEqual(['0-15', '16-30', '31-60', '61-90', '91-120', '>120', NO_TRANSIT_LABEL]);
		expect(summary[0]).toEqual({label: '0-15', regionCount: 1, population: 100, subgroupPopulation: 20, subgroupShare: 20});
		expect(summary[1]).toEqual({label: '16-30', regionCount: 0, population: 0, subgroupPopulation: 0, subgroupShare: null});
		expect(summary[4]).toEqual({label: '91-120', regionCount: 1, population: 50, subgroupPopulation: 25, subgroupShare: 50});
		expect(summary[6]).toEqual({label: NO_TRANSIT_LABEL, regionCount: 1, population: 0, subgroupPopulation: 0, subgroupShare: null});
	});
});
