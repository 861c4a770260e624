import fs from 'fs/promises';
import {csvFormat, csvParse} from 'd3-dsv';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {TravelTimeResult} from '../types/domain.js';

export const MISSING_VALUE = 'NA';

const COLUMNS = ['GEOID', 'coordinate', 'min_travel_minutes'] as const;

export type TravelTimeRecord = TravelTimeResult & {
	coordinate: string;
};

export function formatTravelTimeCsv(records: TravelTimeRecord[]): string {
	const rows = records.map((record) => ({
		GEOID: record.geoid,
		coordinate: record.coordinate,
		min_travel_minutes: record.minutes === null ? MISSING_VALUE : String(record.minutes),
	}));
	return csvFormat(rows, [...COLUMNS]);
}

export function parseTravelTimeCsv(text: string, source = 'travel time CSV'): TravelTimeRecord[] {
	const rows = csvParse(text);
	const missing = COLUMNS.filter((column) => !rows.columns.includes(column));
	if (missing.length > 0) {
		throw new DataParseError(`missing required columns ${missing.join(', ')}`, source);
	}

	return rows.map((row, index) => {
		const value = (row.min_travel_minutes ?? '').trim();
		let minutes: number | null = null;
		if (value !== MISSING_VALUE) {
			minutes = value === '' ? Number.NaN : Number(value);
			if (!Number.isFinite(minutes)) {
				throw new DataParseError(`invalid travel time "${value}"`, source, index + 2);
			}
		}
		return {geoid: row.GEOID ?? '', coordinate: row.coordinate ?? '', minutes};
	});
}

export async function writeTravelTimeCsv(filePath: string, records: TravelTimeRecord[]): Promise<void> {
	await fs.writeFile(filePath, `${formatTravelTimeCsv(records)}\n`, 'utf8');
	logger.info({filePath, rowCount: records.length}, 'Travel time CSV written');
}

export async function readTravelTimeCsv(filePath: string): Promise<TravelTimeRecord[]> {
	return parseTravelTimeCsv(await fs.readFile(filePath, 'utf8'), filePath);
}
