/**
 * Read transit stops out of a zipped GTFS feed.
 *
 * @module
 */

import { readFile } from "node:fs/promises"
import { errorMessage, FeedParseError } from "@stoplink/shared/errors"
import { createLogger } from "@stoplink/shared/logger"
import {
	logProgress,
	type ProgressHandler,
	progress,
} from "@stoplink/shared/progress"
import type { TransitStop } from "@stoplink/shared/types"
import { GtfsArchive } from "./gtfs-archive"
import type { GtfsStop, TransitStopOptions } from "./types"

const log = createLogger({ component: "gtfs" })

/**
 * Convert a stops.txt record to a TransitStop.
 * Returns null when the coordinates do not parse as numbers.
 */
export function toTransitStop(stop: GtfsStop): TransitStop | null {
	const lat = Number.parseFloat(stop.stop_lat)
	const lon = Number.parseFloat(stop.stop_lon)
	if (Number.isNaN(lat) || Number.isNaN(lon)) return null

	const transitStop: TransitStop = {
		id: stop.stop_id,
		name: stop.stop_name,
		lat,
		lon,
	}
	if (stop.stop_desc) transitStop.description = stop.stop_desc
	if (stop.location_type) transitStop.locationType = stop.location_type
	return transitStop
}

/**
 * Load every stop of a zipped GTFS feed.
 *
 * Rows with an empty stop_id or coordinates that do not parse are skipped,
 * as are rows repeating a stop_id already seen.
 *
 * @param zipData - The GTFS zip file
 * @param options - Stop filtering options
 * @param onProgress - Progress callback
 * @throws FeedParseError when the archive, or its stops.txt, is unreadable.
 */
export async function loadTransitStops(
	zipData: ArrayBuffer | Uint8Array,
	options: TransitStopOptions = {},
	onProgress: ProgressHandler = logProgress,
): Promise<TransitStop[]> {
	onProgress(progress("Opening GTFS archive..."))
	const archive = GtfsArchive.fromZip(zipData)

	if (!archive.hasFile("stops.txt")) {
		throw new FeedParseError("GTFS archive has no stops.txt")
	}
	const missing = archive.missingRequiredFiles()
	if (missing.length > 0) {
		log.warn({ missing }, "GTFS archive lacks required files")
	}

	for await (const agency of archive.iter("agency.txt")) {
		log.debug({ agency: agency.agency_name }, "feed agency")
	}

	const stopTypes = options.stopTypes ? new Set(options.stopTypes) : null
	const stops: TransitStop[] = []
	const seen = new Set<string>()
	let invalid = 0
	let unidentified = 0
	let duplicates = 0
	let filtered = 0

	onProgress(progress("Processing stops..."))
	for await (const record of archive.iter("stops.txt")) {
		if (stopTypes && !stopTypes.has(Number(record.location_type ?? "0"))) {
			filtered++
			continue
		}

		if (record.stop_id.trim() === "") {
			unidentified++
			log.warn({ stopName: record.stop_name }, "skipping stop without stop_id")
			continue
		}

		const stop = toTransitStop(record)
		if (!stop) {
			invalid++
			log.debug({ stopId: record.stop_id }, "skipping stop without coordinates")
			continue
		}

		if (seen.has(stop.id)) {
			duplicates++
			log.warn({ stopId: stop.id }, "duplicate stop_id, keeping the first")
			continue
		}

		seen.add(stop.id)
		stops.push(stop)

		if (stops.length % 1000 === 0) {
			onProgress(progress(`Processed ${stops.length} stops...`))
		}
	}

	onProgress(
		progress(
			`Loaded ${stops.length} stops (${invalid} without coordinates, ${unidentified} without stop_id, ${duplicates} duplicates, ${filtered} filtered by type)`,
		),
	)
	return stops
}

/**
 * Read a zipped GTFS feed from disk and load its stops.
 * @throws FeedParseError when the file cannot be read or parsed.
 */
export async function readTransitStops(
	path: string,
	options: TransitStopOptions = {},
	onProgress: ProgressHandler = logProgress,
): Promise<TransitStop[]> {
	let zipData: Uint8Array
	try {
		zipData = await readFile(path)
	} catch (error) {
		throw new FeedParseError(
			`Could not read GTFS file ${path}: ${errorMessage(error)}`,
			{ cause: error },
		)
	}
	return loadTransitStops(zipData, options, onProgress)
}
