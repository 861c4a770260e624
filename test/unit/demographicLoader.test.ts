import {jest} from '@jest/globals';
import {buildAcsUrl, fetchAcsTable, loadGeoUnits, reshapeWide, subgroupPercentage, toGeoUnits} from '../../src/census/demographicLoader.js';
import {DataParseError, UpstreamServiceError} from '../../src/types/errors.js';
import {jsonResponse} from '../helpers/factories.js';

const HEADER = ['NAME', 'B03002_001E', 'B03002_001M', 'B03002_012E', 'B03002_012M', 'state', 'county', 'tract', 'block group'];

const TABLE = [
	HEADER,
	['Block Group 1, Census Tract 1.01, Fulton County, Georgia', '1200', '150', '300', '80', '13', '121', '000101', '1'],
	['Block Group 2, Census Tract 1.01, Fulton County, Georgia', '0', '12', '0', '12', '13', '121', '000101', '2'],
];

const REQUEST = {
	baseUrl: 'https://census.example.test/data',
	apiKey: 'test-key',
	year: 2021,
	stateFips: '13',
	countyFips: ['121', '089'],
};

const VARIABLES = {total: 'B03002_001', subgroup: 'B03002_012'};

describe('buildAcsUrl', () => {
	it('asks for estimates and margins of every block group in the counties', () => {
		const url = new URL(buildAcsUrl({...REQUEST, variables: ['B03002_001']}));

		expect(url.pathname).toBe('/data/2021/acs/acs5');
		expect(url.searchParams.get('get')).toBe('NAME,B03002_001E,B03002_001M');
		expect(url.searchParams.get('for')).toBe('block group:*');
		expect(url.searchParams.getAll('in')).toEqual(['state:13', 'county:121,089']);
		expect(url.searchParams.get('key')).toBe('test-key');
	});

	it('uses a county wildcard when no county is given', () => {
		const url = new URL(buildAcsUrl({...REQUEST, apiKey: '', countyFips: [], variables: ['B03002_001']}));

		expect(url.searchParams.getAll('in')).toEqual(['state:13', 'county:*']);
		expect(url.searchParams.has('key')).toBe(false);
	});
});

describe('fetchAcsTable', () => {
	it('returns one long row per unit per variable', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse(TABLE));

		const rows = await fetchAcsTable({...REQUEST, variables: ['B03002_001', 'B03002_012']}, fetchImpl);

		expect(rows).toHaveLength(4);
		expect(rows[0]).toEqual({
			geoid: '131210001011',
			name: 'Block Group 1, Census Tract 1.01, Fulton County, Georgia',
			variable: 'B03002_001',
			estimate: 1200,
			moe: 150,
		});
		expect(rows[3]).toMatchObject({geoid: '131210001012', variable: 'B03002_012', estimate: 0});
	});

	it('fails with the service message for an unknown variable', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(new Response("error: unknown variable 'B03002_999E'", {status: 400}));

		const promise = fetchAcsTable({...REQUEST, variables: ['B03002_999']}, fetchImpl);

		await expect(promise).rejects.toBeInstanceOf(UpstreamServiceError);
		await expect(promise).rejects.toThrow("Census API returned 400: error: unknown variable 'B03002_999E'");
	});

	it('fails when the host is unreachable', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockRejectedValue(new Error('getaddrinfo ENOTFOUND census.example.test'));

		await expect(fetchAcsTable({...REQUEST, variables: ['B03002_001']}, fetchImpl)).rejects.toThrow('Census API unreachable: getaddrinfo ENOTFOUND census.example.test');
	});

	it('fails when a requested column is absent from the response', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse(TABLE));

		await expect(fetchAcsTable({...REQUEST, variables: ['B01001_001']}, fetchImpl)).rejects.toThrow('Census API response is missing column B01001_001E');
	});

	it('fails on a body that is not a table', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse({error: 'nope'}));

		await expect(fetchAcsTable({...REQUEST, variables: ['B03002_001']}, fetchImpl)).rejects.toBeInstanceOf(UpstreamServiceError);
	});
});

describe('reshapeWide', () => {
	it('pivots variables into named columns and drops margins', () => {
		const wide = reshapeWide(
			[
				{geoid: '1', name: 'One', variable: 'B03002_001', estimate: 50, moe: 9},
				{geoid: '1', name: 'One', variable: 'B03002_012', estimate: 10, moe: 4},
			],
			['B03002_001', 'B03002_012'],
		);

		expect(wide).toEqual([{geoid: '1', name: 'One', values: {B03002_001: 50, B03002_012: 10}}]);
	});

	it('fails when a unit has no estimate for a variable', () => {
		expect(() => reshapeWide([{geoid: '1', name: 'One', variable: 'B03002_001', estimate: null, moe: null}], ['B03002_001'])).toThrow('No estimate for B03002_001 in unit 1');
	});
});

describe('subgroup percentage', () => {
	it('is undefined for an empty unit instead of dividing by zero', () => {
		expect(subgroupPercentage(0, 0)).toBeNull();
	});

	it('stays within 0 to 100 when the unit has people', () => {
		for (const [total, subgroup] of [
			[1, 0],
			[1, 1],
			[7, 3],
			[4521, 4520],
		] as const) {
			const value = subgroupPercentage(total, subgroup);
			expect(value).not.toBeNull();
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThanOrEqual(100);
		}
	});

	it('rejects a subgroup larger than the total', () => {
		expect(() => toGeoUnits([{geoid: '1', name: 'One', values: {B03002_001: 5, B03002_012: 6}}], VARIABLES)).toThrow(DataParseError);
	});
});

describe('loadGeoUnits', () => {
	it('fetches, reshapes and derives the subgroup share', async () => {
		const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(jsonResponse(TABLE));

		const units = await loadGeoUnits(REQUEST, VARIABLES, fetchImpl);

		expect(units).toEqual([
			{geoid: '131210001011', name: 'Block Group 1, Census Tract 1.01, Fulton County, Georgia', totalPopulation: 1200, subgroupPopulation: 300, subgroupPercentage: 25},
			{geoid: '131210001012', name: 'Block Group 2, Census Tract 1.01, Fulton County, Georgia', totalPopulation: 0, subgroupPopulation: 0, subgroupPercentage: null},
		]);
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});
});
