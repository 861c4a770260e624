import path from 'path';
import {MapThemeId} from '../map/themes.js';

export type OutputPaths = {
	checkpoint: string;
	travelTimes: string;
	regions: string;
	maps: Record<MapThemeId, string>;
};

/**
 * File layout of a run's output directory. Map entries are base paths without extension.
 */
export function outputPaths(outputDir: string): OutputPaths {
	return {
		checkpoint: path.join(outputDir, 'travel_time_checkpoint.json'),
		travelTimes: path.join(outputDir, 'travel_times.csv'),
		regions: path.join(outputDir, 'regions.geojson'),
		maps: {
			'travel-time': path.join(outputDir, 'travel_time_map'),
			'subgroup-share': path.join(outputDir, 'subgroup_share_map'),
		},
	};
}
