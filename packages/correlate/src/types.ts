/**
 * Candidate, correlation and review types.
 *
 * @module
 */

import type {
	MapStop,
	OsmEntityType,
	TransitStop,
} from "@stoplink/shared/types"

/** A map stop near a transit stop, with its distance in meters. */
export interface Candidate {
	stop: MapStop
	distance: number
}

/**
 * Candidates for one transit stop: ascending by distance, ties by map stop
 * id, none farther than the search radius, at most `maxResults` long.
 */
export type CandidateSet = readonly Candidate[]

export interface CandidateSearchOptions {
	/** Largest distance in meters a candidate may be from the transit stop. */
	radiusMeters: number
	/** Longest CandidateSet returned. */
	maxResults: number
}

/**
 * A confirmed pairing of a GTFS stop with an OSM element. Keyed by
 * `gtfsStopId`: a transit stop has at most one correlation.
 */
export interface CorrelationRecord {
	gtfsStopId: string
	gtfsStopName: string
	osmId: string
	osmName: string
}

export type ReviewState = "pending" | "skipped" | "confirmed" | "deferred"

/** What the reviewer sees for one pending transit stop. */
export interface ReviewView {
	stop: TransitStop
	candidates: CandidateSet
	/** 1-based position of this stop among the enumerated stops. */
	position: number
	total: number
}

export type ReviewDecision =
	/**
	 * Pick the candidate with this id. `osmType` tells apart a node, way and
	 * relation that share an id; without it the nearest such candidate wins.
	 */
	| { kind: "confirm"; osmId: string; osmType?: OsmEntityType }
	| { kind: "skip" }
	| { kind: "defer" }
	/** End the session before this stop is decided. */
	| { kind: "quit" }

export type WriteFailureDecision = "retry" | "abort"

/**
 * The human in the loop. Each call may wait indefinitely; the correlation
 * file is not held open meanwhile.
 */
export interface Reviewer {
	review(view: ReviewView): Promise<ReviewDecision>
	/** Decide what to do after a correlation could not be written. */
	onWriteFailure(view: ReviewView, error: Error): Promise<WriteFailureDecision>
}

/** Presents a review view, e.g. on a map, before the reviewer decides. */
export type ReviewRenderer = (view: ReviewView) => Promise<void> | void

export type ReviewOutcome =
	| { state: "confirmed"; stop: TransitStop; record: CorrelationRecord }
	| {
			state: "skipped"
			stop: TransitStop
			reason: "reviewer" | "already-correlated"
	  }
	| {
			state: "deferred"
			stop: TransitStop
			reason: "reviewer" | "no-candidates" | "invalid-coordinate"
	  }

export type ReviewEnd = "completed" | "quit" | "write-failure"

export interface ReviewSummary {
	/** Decided stops, in review order. */
	outcomes: ReviewOutcome[]
	counts: Record<Exclude<ReviewState, "pending">, number>
	/** Stops enumerated for review (after filtering). */
	total: number
	/** Stops left out because they were already correlated. */
	filtered: number
	endedBy: ReviewEnd
}
