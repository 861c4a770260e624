import {MappedRegion} from '../types/domain.js';

export type ThemeBin = {
	label: string;
	/** Inclusive upper bound */
	upper: number;
	color: string;
};

export type MapThemeId = 'travel-time' | 'subgroup-share';

export type MapTheme = {
	id: MapThemeId;
	title: string;
	legendTitle: string;
	/** Lower bound of the first bin, inclusive */
	lower: number;
	bins: ThemeBin[];
	missingLabel: string;
	missingColor: string;
	value: (region: MappedRegion) => number | null;
};

export const NO_TRANSIT_LABEL = 'No Public Transit Available';

// Breakpoints 0, 15, 30, 60, 90, 120, Infinity
export const TRAVEL_TIME_BINS: ThemeBin[] = [
	{label: '0-15', upper: 15, color: '#1a9641'},
	{label: '16-30', upper: 30, color: '#a6d96a'},
	{label: '31-60', upper: 60, color: '#ffffbf'},
	{label: '61-90', upper: 90, color: '#fdae61'},
	{label: '91-120', upper: 120, color: '#d7191c'},
	{label: '>120', upper: Number.POSITIVE_INFINITY, color: '#7f0000'},
];

export const SUBGROUP_SHARE_BINS: ThemeBin[] = [
	{label: '0-10', upper: 10, color: '#f2f0f7'},
	{label: '>10-25', upper: 25, color: '#cbc9e2'},
	{label: '>25-50', upper: 50, color: '#9e9ac8'},
	{label: '>50-75', upper: 75, color: '#756bb1'},
	{label: '>75', upper: 100, color: '#54278f'},
];

export const TRAVEL_TIME_THEME: MapTheme = {
	id: 'travel-time',
	title: 'Transit travel time to the nearest PrEP clinic',
	legendTitle: 'Minutes by transit',
	lower: 0,
	bins: TRAVEL_TIME_BINS,
	missingLabel: NO_TRANSIT_LABEL,
	missingColor: '#bdbdbd',
	value: (region) => region.travelMinutes,
};

export const SUBGROUP_SHARE_THEME: MapTheme = {
	id: 'subgroup-share',
	title: 'Hispanic or Latino share of population',
	legendTitle: 'Percent of residents',
	lower: 0,
	bins: SUBGROUP_SHARE_BINS,
	missingLabel: 'No Population',
	missingColor: '#d9d9d9',
	value: (region) => region.subgroupPercentage,
};

export const MAP_THEMES: Record<MapThemeId, MapTheme> = {
	'travel-time': TRAVEL_TIME_THEME,
	'subgroup-share': SUBGROUP_SHARE_THEME,
};

export type Classification = {
	label: string;
	color: string;
	missing: boolean;
};

/**
 * Right-closed bins with the lowest bound included. Null, non-finite and out-of-range
 * values fall into the missing class.
 */
export function classify(theme: MapTheme, value: number | null): Classification {
	if (value === null || !Number.isFinite(value) || value < theme.lower) {
		return {label: theme.missingLabel, color: theme.missingColor, missing: true};
	}
	const bin = theme.bins.find((candidate) => value <= candidate.upper);
	if (!bin) {
		return {label: theme.missingLabel, color: theme.missingColor, missing: true};
	}
	return {label: bin.label, color: bin.color, missing: false};
}

export function classifyTravelTime(minutes: number | null): string {
	return classify(TRAVEL_TIME_THEME, minutes).label;
}
