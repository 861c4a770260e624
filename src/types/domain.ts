import type {LineString, MultiLineString, MultiPolygon, Polygon} from 'geojson';

export type LatLng = {
	latitude: number;
	longitude: number;
};

/**
 * Census geographic unit (block group) with the estimates the map needs.
 */
export type GeoUnit = {
	/** 12-digit block group GEOID */
	geoid: string;
	name: string;
	totalPopulation: number;
	subgroupPopulation: number;
	/** subgroup / total * 100, null when the unit has no population */
	subgroupPercentage: number | null;
};

/**
 * Population-weighted centre of a block group, the origin of every transit query.
 */
export type Centroid = LatLng & {
	geoid: string;
	countyFips: string;
	/** "lat, lon" exactly as written in the source file */
	coordinate: string;
};

export type Clinic = LatLng & {
	/** Row in the source sheet, header is row 1 */
	row: number;
};

export type CandidateDistance = {
	geoid: string;
	clinic: Clinic;
	distanceMeters: number;
};

/**
 * A failure is retryable unless the router answered that no transit route exists.
 */
export type CandidateOutcome = {status: 'ok'; minutes: number} | {status: 'failed'; reason: string; retryable: boolean};

export type CentroidOutcomes = {
	geoid: string;
	outcomes: CandidateOutcome[];
};

export type TravelTimeResult = {
	geoid: string;
	/** Minimum transit minutes over the candidates, null when no candidate had a route */
	minutes: number | null;
};

export type RegionGeometry = Polygon | MultiPolygon;

export type RegionFeature = {
	geoid: string;
	geometry: RegionGeometry;
};

export type HighwayGeometry = LineString | MultiLineString;

/**
 * Block group polygon with every attribute joined onto it. Fields are null when the
 * matching table had no row for the GEOID.
 */
export type MappedRegion = {
	geoid: string;
	name: string | null;
	totalPopulation: number | null;
	subgroupPopulation: number | null;
	subgroupPercentage: number | null;
	centroid: LatLng | null;
	travelMinutes: number | null;
	geometry: RegionGeometry;
};
