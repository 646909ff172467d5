/**
 * @stoplink/gtfs - Read transit stops from zipped GTFS feeds.
 *
 * Files are parsed lazily and streamed line by line. Only stops.txt (and
 * agency.txt, for logging) are ever read.
 *
 * @example
 * ```ts
 * import { readTransitStops } from "@stoplink/gtfs"
 *
 * const stops = await readTransitStops("feed.zip", { stopTypes: [0] })
 * console.log(`Loaded ${stops.length} stops`)
 * ```
 *
 * @module @stoplink/gtfs
 */

export { GtfsArchive } from "./gtfs-archive"
export { loadTransitStops, readTransitStops, toTransitStop } from "./load-stops"
export {
	type GtfsAgency,
	type GtfsFileName,
	type GtfsFileTypeMap,
	type GtfsStop,
	REQUIRED_GTFS_FILES,
	REQUIRED_STOP_COLUMNS,
	type TransitStopOptions,
} from "./types"
