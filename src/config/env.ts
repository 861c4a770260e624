import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const fipsList = z.string().regex(/^(\d{3})(,\s*\d{3})*$|^$/, "Expected comma-separated 3-digit county FIPS codes");

const envSchema = z.object({
  PORT: z.string().default("3000"),
  LOG_LEVEL: z.string().default("info"),
  CENSUS_BASE_URL: z.string().url().default("https://api.census.gov/data"),
  CENSUS_API_KEY: z.string().default(""),
  ACS_YEAR: z.string().regex(/^\d{4}$/).default("2021"),
  ACS_TOTAL_VARIABLE: z.string().min(1).default("B03002_001"),
  ACS_SUBGROUP_VARIABLE: z.string().min(1).default("B03002_012"),
  STATE_FIPS: z.string().regex(/^\d{2}$/).default("13"),
  COUNTY_FIPS: fipsList.default("063,067,089,121,135"),
  ROUTING_BASE_URL: z.string().url().default("https://maps.googleapis.com/maps/api/distancematrix/json"),
  ROUTING_API_KEY: z.string().default(""),
  DEPARTURE_DATE: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).default("2023-06-14"),
  DEPARTURE_TIME: z.string().regex(/^\d{2}:\d{2}:\d{2}$/).default("08:00:00"),
  DEPARTURE_UTC_OFFSET: z.string().regex(/^[+-]\d{2}:\d{2}$/).default("-04:00"),
  CANDIDATE_COUNT: z.string().regex(/^[1-9]\d*$/).default("10"),
  CENTROIDS_PATH: z.string().min(1).default("data/block_group_centroids.csv"),
  CLINICS_PATH: z.string().min(1).default("data/prep_clinics.xlsx"),
  CLINIC_COORDINATE_COLUMN: z.string().min(1).default("Coordinates"),
  GEOMETRY_PATH: z.string().min(1).default("data/block_groups.geojson"),
  HIGHWAYS_PATH: z.string().default(""),
  OUTPUT_DIR: z.string().min(1).default("output"),
  MAP_WIDTH: z.string().regex(/^\d+$/).default("1600"),
  MAP_HEIGHT: z.string().regex(/^\d+$/).default("1600"),
});

const parsed = envSchema.safeParse(process.env);
if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error("Invalid environment variables", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = {
  port: Number(parsed.data.PORT),
  logLevel: parsed.data.LOG_LEVEL,
  censusBaseUrl: parsed.data.CENSUS_BASE_URL,
  censusApiKey: parsed.data.CENSUS_API_KEY,
  acsYear: Number(parsed.data.ACS_YEAR),
  acsTotalVariable: parsed.data.ACS_TOTAL_VARIABLE,
  acsSubgroupVariable: parsed.data.ACS_SUBGROUP_VARIABLE,
  stateFips: parsed.data.STATE_FIPS,
  countyFips: parsed.data.COUNTY_FIPS.split(",").map((code) => code.trim()).filter(Boolean),
  routingBaseUrl: parsed.data.ROUTING_BASE_URL,
  routingApiKey: parsed.data.ROUTING_API_KEY,
  departure: {
    date: parsed.data.DEPARTURE_DATE,
    time: parsed.data.DEPARTURE_TIME,
    utcOffset: parsed.data.DEPARTURE_UTC_OFFSET,
  },
  candidateCount: Number(parsed.data.CANDIDATE_COUNT),
  centroidsPath: parsed.data.CENTROIDS_PATH,
  clinicsPath: parsed.data.CLINICS_PATH,
  clinicCoordinateColumn: parsed.data.CLINIC_COORDINATE_COLUMN,
  geometryPath: parsed.data.GEOMETRY_PATH,
  highwaysPath: parsed.data.HIGHWAYS_PATH || null,
  outputDir: parsed.data.OUTPUT_DIR,
  mapWidth: Number(parsed.data.MAP_WIDTH),
  mapHeight: Number(parsed.data.MAP_HEIGHT),
};

export type Env = typeof env;
