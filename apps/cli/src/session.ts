/**
 * One review session: load both inputs and the correlation file, then review.
 *
 * @module
 */

import { writeFile } from "node:fs/promises"
import {
	CorrelationStore,
	type Reviewer,
	type ReviewRenderer,
	type ReviewSummary,
	reviewViewToGeoJson,
	runReview,
} from "@stoplink/correlate"
import { readTransitStops } from "@stoplink/gtfs"
import { readMapStops } from "@stoplink/overpass"
import { errorMessage } from "@stoplink/shared/errors"
import { createLogger } from "@stoplink/shared/logger"
import { logProgress, type ProgressHandler } from "@stoplink/shared/progress"
import type { Config } from "./config"

const log = createLogger({ component: "session" })

/**
 * Renderer that rewrites `path` with a GeoJSON view of each stop under
 * review, for a map viewer that reloads the file. A failed write is logged
 * and the review goes on without the view.
 */
export function geojsonFileRenderer(path: string): ReviewRenderer {
	return async (view) => {
		try {
			await writeFile(path, JSON.stringify(reviewViewToGeoJson(view), null, 2))
		} catch (error) {
			log.warn(
				{ path, stopId: view.stop.id, error: errorMessage(error) },
				"could not write review view",
			)
			return
		}
		log.debug({ path, stopId: view.stop.id }, "wrote review view")
	}
}

/**
 * Run a review session with the given configuration.
 *
 * @throws FeedParseError, MapDataParseError or CorruptStoreFile when an
 * input cannot be read.
 */
export async function runSession(
	config: Config,
	reviewer: Reviewer,
	onProgress: ProgressHandler = logProgress,
): Promise<ReviewSummary> {
	const [transitStops, mapStops] = await Promise.all([
		readTransitStops(
			config.gtfsFile,
			config.stopTypes ? { stopTypes: config.stopTypes } : {},
			onProgress,
		),
		readMapStops(config.osmFile, onProgress),
	])
	const store = await CorrelationStore.load(config.outputFile)

	return runReview(transitStops, mapStops, store, reviewer, {
		radiusMeters: config.radiusMeters,
		maxResults: config.maxResults,
		filterAlreadyCorrelated: config.filterAlreadyCorrelated,
		renderer: config.geojsonFile
			? geojsonFileRenderer(config.geojsonFile)
			: undefined,
		onProgress,
	})
}

/**
 * One-line account of a finished session.
 */
export function formatSummary(summary: ReviewSummary): string {
	const { confirmed, skipped, deferred } = summary.counts
	const ending =
		summary.endedBy === "completed"
			? "Review complete"
			: summary.endedBy === "quit"
				? "Review stopped"
				: "Review aborted after a failed write"
	return `${ending}: ${confirmed} confirmed, ${skipped} skipped, ${deferred} deferred, ${summary.filtered} already correlated\n`
}
