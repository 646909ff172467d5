/**
 * Read transit platforms from an Overpass JSON export.
 *
 * @module
 */

import { readFile } from "node:fs/promises"
import { errorMessage, MapDataParseError } from "@stoplink/shared/errors"
import { createLogger } from "@stoplink/shared/logger"
import {
	logProgress,
	type ProgressHandler,
	progress,
} from "@stoplink/shared/progress"
import type { MapStop } from "@stoplink/shared/types"
import { OverpassDocumentSchema, OverpassStopElementSchema } from "./types"

const log = createLogger({ component: "overpass" })

/**
 * Convert a parsed Overpass export to map stops.
 *
 * Elements failing validation (no numeric id, no coordinates, unknown type)
 * are skipped. When two elements share an id, the first is kept.
 *
 * @param json - The parsed JSON document.
 * @throws MapDataParseError when the document has no `elements` array.
 */
export function mapStopsFromOverpass(
	json: unknown,
	onProgress: ProgressHandler = logProgress,
): MapStop[] {
	const document = OverpassDocumentSchema.safeParse(json)
	if (!document.success) {
		throw new MapDataParseError(
			"Overpass export must be an object with an elements array",
			{ cause: document.error },
		)
	}

	const stops: MapStop[] = []
	const seen = new Set<string>()
	let skipped = 0

	for (const raw of document.data.elements) {
		const element = OverpassStopElementSchema.safeParse(raw)
		if (!element.success) {
			skipped++
			log.debug(
				{ issues: element.error.issues.map((i) => i.message) },
				"skipping element failing data validation",
			)
			continue
		}

		const { id, type, lat, lon, tags } = element.data
		const stop: MapStop = { id: String(id), type, lat, lon }
		if (tags) {
			stop.tags = tags
			if (tags["name"]) stop.name = tags["name"]
		}

		// Node, way and relation ids are separate namespaces.
		const key = `${type}/${stop.id}`
		if (seen.has(key)) {
			log.warn({ osmId: stop.id, type }, "duplicate element, keeping the first")
			continue
		}
		seen.add(key)
		stops.push(stop)
	}

	onProgress(
		progress(`Loaded ${stops.length} map stops (${skipped} elements skipped)`),
	)
	return stops
}

/**
 * Read an Overpass JSON export from disk.
 * @throws MapDataParseError on a read failure, invalid JSON or an unexpected document shape.
 */
export async function readMapStops(
	path: string,
	onProgress: ProgressHandler = logProgress,
): Promise<MapStop[]> {
	onProgress(progress(`Reading map data from ${path}...`))
	let json: unknown
	try {
		json = JSON.parse(await readFile(path, "utf8"))
	} catch (error) {
		throw new MapDataParseError(
			`Could not read map data ${path}: ${errorMessage(error)}`,
			{ cause: error },
		)
	}
	return mapStopsFromOverpass(json, onProgress)
}
