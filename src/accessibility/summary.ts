import {MappedRegion} from '../types/domain.js';
import {TRAVEL_TIME_THEME, classify} from '../map/themes.js';

export type BinSummary = {
	label: string;
	regionCount: number;
	population: number;
	subgroupPopulation: number;
	/** Subgroup share of the bin's population, null when the bin has no residents */
	subgroupShare: number | null;
};

/**
 * Regions, residents and subgroup share per travel-time bin, missing bin last.
 */
export function summarizeByBin(regions: MappedRegion[]): BinSummary[] {
	const labels = [...TRAVEL_TIME_THEME.bins.map((bin) => bin.label), TRAVEL_TIME_THEME.missingLabel];
	const summaries = new Map<string, BinSummary>(labels.map((label) => [label, {label, regionCount: 0, population: 0, subgroupPopulation: 0, subgroupShare: null}]));

	for (const region of regions) {
		const {label} = classify(TRAVEL_TIME_THEME, region.travelMinutes);
		const summary = summaries.get(label);
		if (!summary) continue;
		summary.regionCount += 1;
		summary.population += region.totalPopulation ?? 0;
		summary.subgroupPopulation += region.subgroupPopulation ?? 0;
	}

	return labels.flatMap((label) => {
		const summary = summaries.get(label);
		if (!summary) return [];
		return [{...summary, subgroupShare: summary.population > 0 ? (summary.subgroupPopulation / summary.population) * 100 : null}];
	});
}
