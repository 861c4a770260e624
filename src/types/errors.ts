/**
 * A remote data service could not answer: unreachable host, bad variable or geography.
 * Fatal for the run.
 */
export class UpstreamServiceError extends Error {
	constructor(
		message: string,
		readonly service: string,
		readonly status: number | null = null,
		options?: {cause?: unknown},
	) {
		super(message, options);
		this.name = 'UpstreamServiceError';
	}
}

/**
 * An input file is malformed. Raised at load time, before anything downstream runs.
 */
export class DataParseError extends Error {
	constructor(
		message: string,
		readonly source: string,
		readonly row: number | null = null,
	) {
		super(row === null ? `${source}: ${message}` : `${source} row ${row}: ${message}`);
		this.name = 'DataParseError';
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export type RoutingFailureReason = 'network' | 'http' | 'malformed' | 'no-route' | 'rejected';

/**
 * A single origin/destination transit query failed. Recovered per candidate.
 */
export class RoutingError extends Error {
	constructor(
		message: string,
		readonly reason: RoutingFailureReason,
		options?: {cause?: unknown},
	) {
		super(message, options);
		this.name = 'RoutingError';
	}
}

export function isFatalError(error: unknown): error is UpstreamServiceError | DataParseError | ConfigError {
	return error instanceof UpstreamServiceError || error instanceof DataParseError || error instanceof ConfigError;
}
