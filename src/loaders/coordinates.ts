import {LatLng} from '../types/domain.js';

// Decimal notation only; Number() alone would also take 0x, 0b and 0o literals
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseStrictNumber(text: string): number | null {
	const trimmed = text.trim();
	if (!DECIMAL.test(trimmed)) return null;
	const value = Number(trimmed);
	return Number.isFinite(value) ? value : null;
}

export function isValidLatLng(point: LatLng): boolean {
	return point.latitude >= -90 && point.latitude <= 90 && point.longitude >= -180 && point.longitude <= 180;
}

/**
 * Parse "lat, lon". Returns null unless the text is exactly two finite numbers separated
 * by one comma and both are in range.
 */
export function parseCoordinatePair(text: string): LatLng | null {
	const parts = text.split(',');
	if (parts.length !== 2) return null;
	const latitude = parseStrictNumber(parts[0] ?? '');
	const longitude = parseStrictNumber(parts[1] ?? '');
	if (latitude === null || longitude === null) return null;
	const point = {latitude, longitude};
	return isValidLatLng(point) ? point : null;
}

export function parseCoordinateValue(text: string | undefined): number | null {
	return text === undefined ? null : parseStrictNumber(text);
}

/** Origin/destination form the routing service takes. */
export function formatLatLng(point: LatLng): string {
	return `${point.latitude},${point.longitude}`;
}
