/**
 * Error taxonomy for stoplink.
 *
 * Every error thrown on purpose by a stoplink package extends `StoplinkError`
 * and carries a stable `code`, so callers can branch on the kind of failure
 * without `instanceof` checks across package boundaries.
 *
 * @module
 */

export type StoplinkErrorCode =
	| "FEED_PARSE"
	| "MAP_DATA_PARSE"
	| "CORRUPT_STORE_FILE"
	| "INVALID_COORDINATE"
	| "DUPLICATE_KEY"
	| "IO_FAILURE"
	| "INVALID_CONFIG"

export class StoplinkError extends Error {
	readonly code: StoplinkErrorCode

	constructor(code: StoplinkErrorCode, message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = new.target.name
		this.code = code
	}
}

/** The GTFS archive could not be read into transit stops. */
export class FeedParseError extends StoplinkError {
	constructor(message: string, options?: ErrorOptions) {
		super("FEED_PARSE", message, options)
	}
}

/** The Overpass export could not be read into map stops. */
export class MapDataParseError extends StoplinkError {
	constructor(message: string, options?: ErrorOptions) {
		super("MAP_DATA_PARSE", message, options)
	}
}

/** The correlation file exists but lacks the required columns or ids. */
export class CorruptStoreFile extends StoplinkError {
	constructor(
		readonly path: string,
		message: string,
		options?: ErrorOptions,
	) {
		super("CORRUPT_STORE_FILE", `${path}: ${message}`, options)
	}
}

export class InvalidCoordinate extends StoplinkError {
	constructor(message: string) {
		super("INVALID_COORDINATE", message)
	}
}

/** A correlation for this GTFS stop id is already recorded. */
export class DuplicateKey extends StoplinkError {
	constructor(readonly key: string) {
		super("DUPLICATE_KEY", `GTFS stop ${key} is already correlated`)
	}
}

/** Writing the correlation file failed. Nothing was persisted. */
export class IOFailure extends StoplinkError {
	constructor(message: string, options?: ErrorOptions) {
		super("IO_FAILURE", message, options)
	}
}

export class ConfigurationError extends StoplinkError {
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super("INVALID_CONFIG", message)
	}
}

/**
 * Type guard for stoplink errors, optionally of a single kind.
 */
export function isStoplinkError(
	value: unknown,
	code?: StoplinkErrorCode,
): value is StoplinkError {
	return (
		value instanceof StoplinkError && (code === undefined || value.code === code)
	)
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
