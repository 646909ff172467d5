/**
 * The review loop: walks the transit stops one at a time, asks the reviewer
 * to pick among the nearby map stops, and persists each confirmation before
 * moving on.
 *
 * @module
 */

import {
	errorMessage,
	IOFailure,
	isStoplinkError,
} from "@stoplink/shared/errors"
import { createLogger } from "@stoplink/shared/logger"
import {
	logProgress,
	type ProgressHandler,
	progress,
} from "@stoplink/shared/progress"
import type { MapStop, TransitStop } from "@stoplink/shared/types"
import { CandidateFinder } from "./candidates"
import { type CorrelationStore, createCorrelation } from "./correlation-store"
import type {
	Candidate,
	CandidateSearchOptions,
	CandidateSet,
	CorrelationRecord,
	ReviewDecision,
	ReviewEnd,
	Reviewer,
	ReviewOutcome,
	ReviewRenderer,
	ReviewSummary,
	ReviewView,
} from "./types"

const log = createLogger({ component: "review" })

export interface ReviewOptions extends CandidateSearchOptions {
	/**
	 * Leave out transit stops that already have a correlation, and map stops
	 * already used by one.
	 */
	filterAlreadyCorrelated: boolean
	renderer?: ReviewRenderer
	onProgress?: ProgressHandler
}

/** A reviewer decision, with a confirmation resolved to its candidate. */
type Decided =
	| Exclude<ReviewDecision, { kind: "confirm" }>
	| { kind: "confirm"; chosen: Candidate }

/** Result of persisting one confirmation. */
type WriteResult = "written" | "already-correlated" | "aborted"

/**
 * Drives one review session over a fixed list of transit stops.
 */
export class ReviewSession {
	private readonly finder: CandidateFinder
	private readonly onProgress: ProgressHandler
	private readonly stops: TransitStop[]
	private readonly filtered: number
	private readonly outcomes: ReviewOutcome[] = []

	constructor(
		transitStops: readonly TransitStop[],
		mapStops: readonly MapStop[],
		private readonly store: CorrelationStore,
		private readonly reviewer: Reviewer,
		private readonly options: ReviewOptions,
	) {
		this.finder = new CandidateFinder(mapStops, options)
		this.onProgress = options.onProgress ?? logProgress
		this.stops = options.filterAlreadyCorrelated
			? transitStops.filter((stop) => !store.contains(stop.id))
			: [...transitStops]
		this.filtered = transitStops.length - this.stops.length
	}

	/** Transit stops this session will present, in order. */
	get pendingStops(): readonly TransitStop[] {
		return this.stops
	}

	/**
	 * Review every pending stop. Resolves when the stops are exhausted, the
	 * reviewer quits, or the reviewer aborts after a failed write.
	 */
	async run(): Promise<ReviewSummary> {
		this.onProgress(
			progress(
				`Reviewing ${this.stops.length} stops (${this.filtered} already correlated)`,
			),
		)

		let endedBy: ReviewEnd = "completed"
		for (const [i, stop] of this.stops.entries()) {
			const end = await this.reviewStop(stop, i + 1)
			if (end) {
				endedBy = end
				break
			}
		}

		const summary = this.summarize(endedBy)
		this.onProgress(
			progress(
				`Review ${endedBy}: ${summary.counts.confirmed} confirmed, ${summary.counts.skipped} skipped, ${summary.counts.deferred} deferred`,
			),
		)
		return summary
	}

	private candidatesFor(stop: TransitStop): CandidateSet {
		const exclude = this.options.filterAlreadyCorrelated
			? (mapStop: MapStop) => this.store.containsMapStop(mapStop.id)
			: undefined
		return this.finder.find(stop, exclude)
	}

	/**
	 * Take one stop from pending to a final state.
	 * @returns How the session ends, or undefined to continue.
	 */
	private async reviewStop(
		stop: TransitStop,
		position: number,
	): Promise<ReviewEnd | undefined> {
		let candidates: CandidateSet
		try {
			candidates = this.candidatesFor(stop)
		} catch (error) {
			if (!isStoplinkError(error, "INVALID_COORDINATE")) throw error
			log.warn({ stopId: stop.id, error: error.message }, "deferring stop")
			this.outcomes.push({ state: "deferred", stop, reason: "invalid-coordinate" })
			return undefined
		}

		if (candidates.length === 0) {
			log.debug({ stopId: stop.id }, "no candidates within radius")
			this.outcomes.push({ state: "deferred", stop, reason: "no-candidates" })
			return undefined
		}

		const view: ReviewView = {
			stop,
			candidates,
			position,
			total: this.stops.length,
		}
		await this.options.renderer?.(view)

		const decision = await this.decide(view)
		switch (decision.kind) {
			case "quit":
				return "quit"
			case "skip":
				this.outcomes.push({ state: "skipped", stop, reason: "reviewer" })
				return undefined
			case "defer":
				this.outcomes.push({ state: "deferred", stop, reason: "reviewer" })
				return undefined
			case "confirm": {
				const record = createCorrelation(stop, decision.chosen.stop)
				const result = await this.persist(view, record)
				if (result === "aborted") return "write-failure"
				if (result === "already-correlated") {
					this.outcomes.push({
						state: "skipped",
						stop,
						reason: "already-correlated",
					})
				} else {
					this.outcomes.push({ state: "confirmed", stop, record })
				}
				return undefined
			}
		}
	}

	/**
	 * Ask the reviewer until the decision is usable: a confirmation must
	 * name one of the candidates shown.
	 */
	private async decide(view: ReviewView): Promise<Decided> {
		while (true) {
			const decision = await this.reviewer.review(view)
			if (decision.kind !== "confirm") return decision
			const chosen = view.candidates.find(
				(c) =>
					c.stop.id === decision.osmId &&
					(decision.osmType === undefined || c.stop.type === decision.osmType),
			)
			if (chosen) return { kind: "confirm", chosen }
			log.warn(
				{ stopId: view.stop.id, osmId: decision.osmId, type: decision.osmType },
				"confirmed map stop is not a candidate, asking again",
			)
		}
	}

	private async persist(
		view: ReviewView,
		record: CorrelationRecord,
	): Promise<WriteResult> {
		while (true) {
			try {
				await this.store.append(record)
				return "written"
			} catch (error) {
				if (isStoplinkError(error, "DUPLICATE_KEY")) {
					log.debug({ stopId: record.gtfsStopId }, "already correlated")
					return "already-correlated"
				}
				if (!(error instanceof IOFailure)) throw error
				log.error(
					{ stopId: record.gtfsStopId, error: errorMessage(error.cause) },
					"could not persist correlation",
				)
				const next = await this.reviewer.onWriteFailure(view, error)
				if (next === "abort") return "aborted"
			}
		}
	}

	private summarize(endedBy: ReviewEnd): ReviewSummary {
		const counts = { skipped: 0, confirmed: 0, deferred: 0 }
		for (const outcome of this.outcomes) counts[outcome.state]++
		return {
			outcomes: [...this.outcomes],
			counts,
			total: this.stops.length,
			filtered: this.filtered,
			endedBy,
		}
	}
}

/**
 * Run a review session over the given stops.
 *
 * @example
 * ```ts
 * const store = await CorrelationStore.load("correlation.csv")
 * const summary = await runReview(transitStops, mapStops, store, reviewer, {
 *   radiusMeters: 100,
 *   maxResults: 5,
 *   filterAlreadyCorrelated: true,
 * })
 * ```
 */
export function runReview(
	transitStops: readonly TransitStop[],
	mapStops: readonly MapStop[],
	store: CorrelationStore,
	reviewer: Reviewer,
	options: ReviewOptions,
): Promise<ReviewSummary> {
	return new ReviewSession(
		transitStops,
		mapStops,
		store,
		reviewer,
		options,
	).run()
}
