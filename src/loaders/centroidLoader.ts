import fs from 'fs/promises';
import {dsvFormat} from 'd3-dsv';
import {logger} from '../config/logger.js';
import {DataParseError} from '../types/errors.js';
import {Centroid} from '../types/domain.js';
import {isValidLatLng, parseCoordinateValue} from './coordinates.js';

export const CENTROID_COLUMNS = ['LATITUDE', 'LONGITUDE', 'COUNTYFP', 'GEOID'] as const;

export type CentroidLoadOptions = {
	/** Keep only these county FIPS codes; empty keeps every row */
	counties?: string[];
	delimiter?: string;
	source?: string;
};

/**
 * Parse the block group centers-of-population table. The combined coordinate string is
 * built from the raw cell text so it matches what was read, digit for digit.
 */
export function parseCentroids(text: string, options: CentroidLoadOptions = {}): Centroid[] {
	const source = options.source ?? 'centroid file';
	const rows = dsvFormat(options.delimiter ?? ',').parse(text.replace(/^\uFEFF/, ''));

	const missing = CENTROID_COLUMNS.filter((column) => !rows.columns.includes(column));
	if (missing.length > 0) {
		throw new DataParseError(`missing required columns ${missing.join(', ')}`, source);
	}

	const counties = new Set((options.counties ?? []).map((code) => code.padStart(3, '0')));
	const seen = new Set<string>();
	const centroids: Centroid[] = [];

	rows.forEach((row, index) => {
		const rowNumber = index + 2;
		const geoid = (row.GEOID ?? '').trim();
		if (!geoid) {
			throw new DataParseError('empty GEOID', source, rowNumber);
		}

		const latitudeText = (row.LATITUDE ?? '').trim();
		const longitudeText = (row.LONGITUDE ?? '').trim();
		const latitude = parseCoordinateValue(latitudeText);
		const longitude = parseCoordinateValue(longitudeText);
		if (latitude === null || longitude === null || !isValidLatLng({latitude, longitude})) {
			throw new DataParseError(`invalid coordinate "${latitudeText}", "${longitudeText}"`, source, rowNumber);
		}

		const countyFips = (row.COUNTYFP ?? '').trim().padStart(3, '0');
		if (counties.size > 0 && !counties.has(countyFips)) return;

		if (seen.has(geoid)) {
			throw new DataParseError(`duplicate GEOID ${geoid}`, source, rowNumber);
		}
		seen.add(geoid);

		centroids.push({
			geoid,
			countyFips,
			latitude,
			longitude,
			coordinate: `${latitudeText}, ${longitudeText}`,
		});
	});

	return centroids;
}

export async function loadCentroids(filePath: string, options: CentroidLoadOptions = {}): Promise<Centroid[]> {
	const text = await fs.readFile(filePath, 'utf8');
	const centroids = parseCentroids(text, {...options, source: options.source ?? filePath});
	logger.info({filePath, centroidCount: centroids.length}, 'Centroids loaded');
	return centroids;
}
