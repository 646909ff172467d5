/**
 * Reviewer that asks a person at a terminal.
 *
 * @module
 */

import { createInterface } from "node:readline"
import type {
	ReviewDecision,
	Reviewer,
	ReviewView,
	WriteFailureDecision,
} from "@stoplink/correlate"

/**
 * Line-based terminal I/O. `ask` resolves to null once input has ended.
 */
export interface Prompt {
	ask(question: string): Promise<string | null>
	write(text: string): void
	close(): void
}

/**
 * A Prompt over readline. Lines that arrive before a question is asked wait
 * in order for the next `ask`; once `input` has ended and they are used up,
 * `ask` answers null.
 */
export function createReadlinePrompt(
	input: NodeJS.ReadableStream,
	output: NodeJS.WritableStream,
): Prompt {
	const rl = createInterface({ input, output })
	const lines: string[] = []
	const waiting: ((line: string | null) => void)[] = []
	let closed = false

	rl.on("line", (line) => {
		const next = waiting.shift()
		if (next) next(line)
		else lines.push(line)
	})
	rl.once("close", () => {
		closed = true
		for (const next of waiting.splice(0)) next(null)
	})

	return {
		async ask(question) {
			if (!closed) output.write(question)
			const line = lines.shift()
			if (line !== undefined) return line
			if (closed) return null
			return new Promise<string | null>((resolve) => {
				waiting.push(resolve)
			})
		},
		write(text) {
			output.write(text)
		},
		close() {
			rl.close()
		},
	}
}

/**
 * The stop being reviewed and a numbered table of its candidates.
 */
export function formatReviewView(view: ReviewView): string {
	const { stop, candidates } = view
	const rows = candidates.map((c, i) => [
		`${i + 1}`,
		`${c.distance.toFixed(1)} m`,
		`${c.stop.type}/${c.stop.id}`,
		c.stop.name ?? "(unnamed)",
	])
	const header = ["#", "distance", "osm id", "name"]
	const widths = header.map((h, col) =>
		Math.max(h.length, ...rows.map((row) => (row[col] ?? "").length)),
	)
	const line = (cells: string[]) =>
		`  ${cells
			.map((cell, col) =>
				col === 1
					? cell.padStart(widths[col] ?? 0)
					: cell.padEnd(widths[col] ?? 0),
			)
			.join("  ")
			.trimEnd()}`

	return [
		"",
		`[${view.position}/${view.total}] ${stop.name} (GTFS ${stop.id}) at ${stop.lat}, ${stop.lon}`,
		line(header),
		...rows.map(line),
		"",
	].join("\n")
}

/**
 * Read an answer to the candidate prompt.
 * @returns The decision, or null when the answer is not one.
 */
export function parseReviewAnswer(
	answer: string,
	view: ReviewView,
): ReviewDecision | null {
	const normalized = answer.trim().toLowerCase()
	switch (normalized) {
		case "s":
			return { kind: "skip" }
		case "d":
			return { kind: "defer" }
		case "q":
			return { kind: "quit" }
	}
	if (!/^\d+$/.test(normalized)) return null
	const chosen = view.candidates[Number(normalized) - 1]
	return chosen
		? { kind: "confirm", osmId: chosen.stop.id, osmType: chosen.stop.type }
		: null
}

export class TerminalReviewer implements Reviewer {
	constructor(private readonly prompt: Prompt) {}

	async review(view: ReviewView): Promise<ReviewDecision> {
		this.prompt.write(formatReviewView(view))
		const question = `Choose 1-${view.candidates.length}, s to skip, d to defer, q to quit: `
		while (true) {
			const answer = await this.prompt.ask(question)
			if (answer === null) return { kind: "quit" }
			const decision = parseReviewAnswer(answer, view)
			if (decision) return decision
			this.prompt.write(`Not a choice: ${answer.trim()}\n`)
		}
	}

	async onWriteFailure(
		_view: ReviewView,
		error: Error,
	): Promise<WriteFailureDecision> {
		this.prompt.write(`Could not save the correlation: ${error.message}\n`)
		while (true) {
			const answer = await this.prompt.ask("r to retry, a to abort: ")
			if (answer === null) return "abort"
			const normalized = answer.trim().toLowerCase()
			if (normalized === "r") return "retry"
			if (normalized === "a") return "abort"
		}
	}
}
