/**
 * @stoplink/correlate - Match GTFS stops to OSM platforms under human review.
 *
 * - **Candidates**: map stops within a radius of a transit stop, nearest
 *   first, ties broken by id.
 * - **Store**: confirmed pairs in an append-only CSV file, one per GTFS stop,
 *   written atomically.
 * - **Review**: walks the transit stops, asks a `Reviewer` to confirm, skip or
 *   defer, and persists each confirmation before the next stop.
 *
 * @module @stoplink/correlate
 */

export {
	CandidateFinder,
	compareCandidates,
	findCandidates,
	validateSearchOptions,
} from "./candidates"
export {
	CORRELATION_COLUMNS,
	CorrelationStore,
	type CorrelationStoreOptions,
	createCorrelation,
	formatCorrelationRows,
	UNNAMED_MAP_STOP,
} from "./correlation-store"
export {
	type ReviewFeature,
	type ReviewFeatureProperties,
	reviewViewToGeoJson,
} from "./geojson"
export { type ReviewOptions, ReviewSession, runReview } from "./review"
export { nodeFileSystem, type StoreFileSystem } from "./store-file-system"
export type * from "./types"
