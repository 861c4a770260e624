import {distance} from '@turf/distance';
import {point} from '@turf/helpers';

export type LonLat = [number, number];

/**
 * Great-circle distance in meters. Arguments are [lon, lat], the usual geodesy order.
 */
export function geodesicDistance(from: LonLat, to: LonLat): number {
	return distance(point(from), point(to), {units: 'meters'});
}
