/**
 * GeoJSON view of a review step, for display in any map viewer.
 *
 * @module
 */

import type { Feature, FeatureCollection, Point } from "geojson"
import type { ReviewView } from "./types"

export type ReviewFeatureProperties =
	| {
			role: "transit"
			gtfsStopId: string
			name: string
	  }
	| {
			role: "candidate"
			osmId: string
			osmType: string
			name: string | null
			rank: number
			/** Meters, rounded to 0.1 */
			distance: number
	  }

export type ReviewFeature = Feature<Point, ReviewFeatureProperties>

/**
 * One Point for the transit stop, then one per candidate in rank order.
 */
export function reviewViewToGeoJson(
	view: Pick<ReviewView, "stop" | "candidates">,
): FeatureCollection<Point, ReviewFeatureProperties> {
	const { stop, candidates } = view
	const features: ReviewFeature[] = [
		{
			type: "Feature",
			id: `gtfs/${stop.id}`,
			geometry: { type: "Point", coordinates: [stop.lon, stop.lat] },
			properties: { role: "transit", gtfsStopId: stop.id, name: stop.name },
		},
	]

	candidates.forEach((candidate, i) => {
		const mapStop = candidate.stop
		features.push({
			type: "Feature",
			id: `${mapStop.type}/${mapStop.id}`,
			geometry: { type: "Point", coordinates: [mapStop.lon, mapStop.lat] },
			properties: {
				role: "candidate",
				osmId: mapStop.id,
				osmType: mapStop.type,
				name: mapStop.name ?? null,
				rank: i + 1,
				distance: Math.round(candidate.distance * 10) / 10,
			},
		})
	})

	return { type: "FeatureCollection", features }
}
