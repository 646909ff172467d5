/**
 * Proximity candidate search.
 *
 * Distances are great-circle (haversine) meters. Candidates are ordered by
 * distance with ties broken by map stop id, so the same inputs always give
 * the same CandidateSet.
 *
 * @module
 */

import {
	assertValidCoordinate,
	isValidCoordinate,
} from "@stoplink/shared/coordinates"
import { stopDistance } from "@stoplink/shared/haversine-distance"
import { createLogger } from "@stoplink/shared/logger"
import type { MapStop, TransitStop } from "@stoplink/shared/types"
import { around as geoAround } from "geokdbush"
import KDBush from "kdbush"
import type { Candidate, CandidateSearchOptions, CandidateSet } from "./types"

const log = createLogger({ component: "candidates" })

// geokdbush measures on a 6371 km sphere, slightly smaller than the one
// haversineDistance uses. Widening its query by a meter keeps every stop the
// exact filter would accept.
const INDEX_QUERY_PAD_KM = 0.001

/**
 * Order candidates by distance, then by map stop id and element type.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
	if (a.distance !== b.distance) return a.distance - b.distance
	if (a.stop.id < b.stop.id) return -1
	if (a.stop.id > b.stop.id) return 1
	if (a.stop.type < b.stop.type) return -1
	if (a.stop.type > b.stop.type) return 1
	return 0
}

/**
 * @throws RangeError unless radiusMeters is a finite number >= 0 and
 * maxResults a positive integer.
 */
export function validateSearchOptions(options: CandidateSearchOptions) {
	if (!Number.isFinite(options.radiusMeters) || options.radiusMeters < 0) {
		throw new RangeError(
			`radiusMeters must be a finite number >= 0, got ${options.radiusMeters}`,
		)
	}
	if (!Number.isInteger(options.maxResults) || options.maxResults < 1) {
		throw new RangeError(
			`maxResults must be a positive integer, got ${options.maxResults}`,
		)
	}
}

function rank(candidates: Candidate[], maxResults: number): CandidateSet {
	return candidates.sort(compareCandidates).slice(0, maxResults)
}

/**
 * Find the map stops within `radiusMeters` of a transit stop.
 *
 * Scans every map stop. Map stops with invalid coordinates are logged and
 * skipped.
 *
 * @throws InvalidCoordinate when the transit stop's coordinates are invalid.
 *
 * @example
 * ```ts
 * const candidates = findCandidates(stop, mapStops, {
 *   radiusMeters: 100,
 *   maxResults: 5,
 * })
 * ```
 */
export function findCandidates(
	stop: TransitStop,
	mapStops: readonly MapStop[],
	options: CandidateSearchOptions,
): CandidateSet {
	validateSearchOptions(options)
	assertValidCoordinate(stop, `transit stop ${stop.id}`)

	const candidates: Candidate[] = []
	for (const mapStop of mapStops) {
		if (!isValidCoordinate(mapStop)) {
			log.warn(
				{ osmId: mapStop.id, lat: mapStop.lat, lon: mapStop.lon },
				"skipping map stop with invalid coordinates",
			)
			continue
		}
		const distance = stopDistance(stop, mapStop)
		if (distance <= options.radiusMeters) {
			candidates.push({ stop: mapStop, distance })
		}
	}
	return rank(candidates, options.maxResults)
}

/**
 * Candidate search over a spatial index of the map stops.
 *
 * Builds a KDBush index once; each query narrows the map stops with
 * geokdbush, then applies the exact haversine filter, so results equal
 * those of `findCandidates` for the same inputs.
 */
export class CandidateFinder {
	readonly options: CandidateSearchOptions
	private readonly stops: MapStop[]
	private readonly index: KDBush | null

	constructor(mapStops: readonly MapStop[], options: CandidateSearchOptions) {
		validateSearchOptions(options)
		this.options = options
		this.stops = mapStops.filter((mapStop) => {
			if (isValidCoordinate(mapStop)) return true
			log.warn(
				{ osmId: mapStop.id, lat: mapStop.lat, lon: mapStop.lon },
				"skipping map stop with invalid coordinates",
			)
			return false
		})

		if (this.stops.length === 0) {
			this.index = null
			return
		}
		const index = new KDBush(this.stops.length)
		for (const mapStop of this.stops) {
			index.add(mapStop.lon, mapStop.lat)
		}
		index.finish()
		this.index = index
	}

	get size() {
		return this.stops.length
	}

	/**
	 * Candidates for one transit stop.
	 *
	 * @param exclude - Map stops for which this returns true are left out.
	 * @throws InvalidCoordinate when the transit stop's coordinates are invalid.
	 */
	find(
		stop: TransitStop,
		exclude?: (mapStop: MapStop) => boolean,
	): CandidateSet {
		assertValidCoordinate(stop, `transit stop ${stop.id}`)
		if (!this.index) return []

		const nearby = geoAround(
			this.index,
			stop.lon,
			stop.lat,
			Number.POSITIVE_INFINITY,
			this.options.radiusMeters / 1000 + INDEX_QUERY_PAD_KM,
		)

		const candidates: Candidate[] = []
		for (const i of nearby) {
			const mapStop = this.stops[i]
			if (!mapStop || exclude?.(mapStop)) continue
			const distance = stopDistance(stop, mapStop)
			if (distance <= this.options.radiusMeters) {
				candidates.push({ stop: mapStop, distance })
			}
		}
		return rank(candidates, this.options.maxResults)
	}
}
