/**
 * GTFS (General Transit Feed Specification) record types.
 *
 * Values are kept as the strings found in the CSV files.
 *
 * @module
 */

/**
 * GTFS stop from stops.txt.
 * Represents a transit stop or station.
 */
export interface GtfsStop {
	stop_id: string
	stop_code?: string
	stop_name: string
	stop_desc?: string
	stop_lat: string
	stop_lon: string
	zone_id?: string
	stop_url?: string
	/** 0 = stop, 1 = station, 2 = entrance/exit, 3 = generic node, 4 = boarding area */
	location_type?: string
	parent_station?: string
	platform_code?: string
}

/**
 * GTFS agency from agency.txt.
 */
export interface GtfsAgency {
	agency_id?: string
	agency_name: string
	agency_url: string
	agency_timezone: string
}

/**
 * Map of GTFS filenames to their record types.
 */
export interface GtfsFileTypeMap {
	"agency.txt": GtfsAgency
	"stops.txt": GtfsStop
}

/** GTFS filenames that can be parsed into typed records. */
export type GtfsFileName = keyof GtfsFileTypeMap

/** Files a feed must have for its stops to be correlated. */
export const REQUIRED_GTFS_FILES = ["agency.txt", "stops.txt"] as const

/** Columns a stops.txt must carry for stops to be correlated. */
export const REQUIRED_STOP_COLUMNS = [
	"stop_id",
	"stop_name",
	"stop_lat",
	"stop_lon",
] as const satisfies readonly (keyof GtfsStop)[]

export const REQUIRED_AGENCY_COLUMNS = [
	"agency_name",
	"agency_url",
	"agency_timezone",
] as const satisfies readonly (keyof GtfsAgency)[]

/**
 * Options for reading transit stops from a feed.
 */
export interface TransitStopOptions {
	/**
	 * Only keep stops whose location_type is listed. An empty
	 * location_type counts as 0. Default: every type.
	 */
	stopTypes?: number[]
}
