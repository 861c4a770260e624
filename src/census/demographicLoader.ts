import {z} from 'zod';
import {logger} from '../config/logger.js';
import {DataParseError, UpstreamServiceError} from '../types/errors.js';
import {GeoUnit} from '../types/domain.js';

const SERVICE = 'census';

/**
 * ACS 5-year request for block groups in one state.
 */
export type AcsRequest = {
	baseUrl: string;
	apiKey: string;
	year: number;
	stateFips: string;
	/** County FIPS codes, empty for every county in the state */
	countyFips: string[];
	/** Variable codes without the E/M suffix, e.g. B03002_001 */
	variables: string[];
};

/**
 * One estimate for one unit, as returned by the service.
 */
export type AcsLongRow = {
	geoid: string;
	name: string;
	variable: string;
	estimate: number | null;
	moe: number | null;
};

export type AcsWideRow = {
	geoid: string;
	name: string;
	values: Record<string, number>;
};

export type SubgroupVariables = {
	total: string;
	subgroup: string;
};

type FetchFn = typeof fetch;

const tableSchema = z.array(z.array(z.string().nullable())).min(1);

const GEOGRAPHY_COLUMNS = ['state', 'county', 'tract', 'block group'] as const;

export function buildAcsUrl(request: AcsRequest): string {
	const columns = ['NAME', ...request.variables.flatMap((code) => [`${code}E`, `${code}M`])];
	const params = new URLSearchParams({get: columns.join(','), for: 'block group:*'});
	params.append('in', `state:${request.stateFips}`);
	params.append('in', `county:${request.countyFips.length > 0 ? request.countyFips.join(',') : '*'}`);
	if (request.apiKey) params.set('key', request.apiKey);
	return `${request.baseUrl.replace(/\/$/, '')}/${request.year}/acs/acs5?${params.toString()}`;
}

// Annotated estimates come back as large negative sentinels
function parseEstimate(value: string | null | undefined): number | null {
	if (value === null || value === undefined || value.trim() === '') return null;
	const parsed = Number(value);
	if (!Number.isFinite(parsed) || parsed < 0) return null;
	return parsed;
}

/**
 * Fetch the requested variables and return them in long format, one row per unit per
 * variable. Any failure rejects; nothing partial is returned.
 */
export async function fetchAcsTable(request: AcsRequest, fetchImpl: FetchFn = fetch): Promise<AcsLongRow[]> {
	const url = buildAcsUrl(request);
	logger.info({year: request.year, state: request.stateFips, counties: request.countyFips, variables: request.variables}, 'Requesting ACS estimates');

	let response: Response;
	try {
		response = await fetchImpl(url);
	} catch (error) {
		throw new UpstreamServiceError(`Census API unreachable: ${error instanceof Error ? error.message : String(error)}`, SERVICE, null, {cause: error});
	}

	const body = await response.text();
	if (!response.ok) {
		throw new UpstreamServiceError(`Census API returned ${response.status}: ${body.trim().slice(0, 300)}`, SERVICE, response.status);
	}

	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch (error) {
		throw new UpstreamServiceError('Census API returned a non-JSON body', SERVICE, response.status, {cause: error});
	}

	const parsed = tableSchema.safeParse(json);
	if (!parsed.success) {
		throw new UpstreamServiceError('Census API returned an unexpected table shape', SERVICE, response.status);
	}

	const [header, ...rows] = parsed.data;
	const indexOf = (column: string): number => {
		const index = header.indexOf(column);
		if (index === -1) {
			throw new UpstreamServiceError(`Census API response is missing column ${column}`, SERVICE, response.status);
		}
		return index;
	};

	const nameIndex = indexOf('NAME');
	const geoIndexes = GEOGRAPHY_COLUMNS.map(indexOf);
	const variableIndexes = request.variables.map((code) => ({code, estimate: indexOf(`${code}E`), moe: indexOf(`${code}M`)}));

	const longRows: AcsLongRow[] = [];
	for (const row of rows) {
		const geoid = geoIndexes.map((index) => row[index] ?? '').join('');
		const name = row[nameIndex] ?? '';
		for (const variable of variableIndexes) {
			longRows.push({
				geoid,
				name,
				variable: variable.code,
				estimate: parseEstimate(row[variable.estimate]),
				moe: parseEstimate(row[variable.moe]),
			});
		}
	}

	logger.info({unitCount: rows.length, rowCount: longRows.length}, 'ACS estimates received');
	return longRows;
}

/**
 * Pivot long rows into one row per unit with a column per variable. Margins of error are
 * dropped. A unit lacking an estimate for any requested variable is an error.
 */
export function reshapeWide(rows: AcsLongRow[], variables: string[]): AcsWideRow[] {
	const byUnit = new Map<string, AcsWideRow>();
	for (const row of rows) {
		let unit = byUnit.get(row.geoid);
		if (!unit) {
			unit = {geoid: row.geoid, name: row.name, values: {}};
			byUnit.set(row.geoid, unit);
		}
		if (row.estimate !== null) {
			unit.values[row.variable] = row.estimate;
		}
	}

	for (const unit of byUnit.values()) {
		const missing = variables.filter((code) => unit.values[code] === undefined);
		if (missing.length > 0) {
			throw new UpstreamServiceError(`No estimate for ${missing.join(', ')} in unit ${unit.geoid}`, SERVICE);
		}
	}

	return [...byUnit.values()];
}

export function subgroupPercentage(total: number, subgroup: number): number | null {
	if (total === 0) return null;
	return (subgroup / total) * 100;
}

export function toGeoUnits(rows: AcsWideRow[], variables: SubgroupVariables): GeoUnit[] {
	return rows.map((row) => {
		const totalPopulation = row.values[variables.total] ?? 0;
		const subgroupPopulation = row.values[variables.subgroup] ?? 0;
		if (subgroupPopulation > totalPopulation) {
			throw new DataParseError(`subgroup estimate ${subgroupPopulation} exceeds total ${totalPopulation}`, `ACS unit ${row.geoid}`);
		}
		return {
			geoid: row.geoid,
			name: row.name,
			totalPopulation,
			subgroupPopulation,
			subgroupPercentage: subgroupPercentage(totalPopulation, subgroupPopulation),
		};
	});
}

export async function loadGeoUnits(request: Omit<AcsRequest, 'variables'>, variables: SubgroupVariables, fetchImpl: FetchFn = fetch): Promise<GeoUnit[]> {
	const codes = [variables.total, variables.subgroup];
	const longRows = await fetchAcsTable({...request, variables: codes}, fetchImpl);
	return toGeoUnits(reshapeWide(longRows, codes), variables);
}
