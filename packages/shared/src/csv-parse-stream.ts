/**
 * Streaming CSV parser built on Web Streams.
 *
 * Follows RFC 4180 quoting: fields may be wrapped in double quotes, and a
 * doubled quote inside a quoted field is a literal quote. Quoted fields may
 * span lines and chunk boundaries. The first row is the header; every later
 * row is emitted as a record keyed by header name.
 *
 * @module
 */

export interface CsvParseStreamOptions {
	separator?: string
	quote?: string
	skipComments?: boolean | string
	/** Throw when a row's length differs from the header's. */
	strict?: boolean
	/** Throw when the header row lacks any of these columns. */
	requiredHeaders?: readonly string[]
	mapHeaders?: (args: { header: string; index: number }) => string | null
	mapValues?: (args: { header: string; index: number; value: string }) => string
}

/**
 * Raised from the stream when the header lacks required columns.
 */
export class MissingColumnsError extends RangeError {
	constructor(readonly missing: string[]) {
		super(`Missing required columns: ${missing.join(", ")}`)
		this.name = "MissingColumnsError"
	}
}

/**
 * TransformStream-like wrapper for CSV parsing.
 *
 * Exposes `writable` + `readable` so it can be used directly in `pipeThrough`.
 */
export class CsvParseStream {
	readonly readable: ReadableStream<Record<string, string>>
	readonly writable: WritableStream<string>

	constructor(opts: CsvParseStreamOptions = {}) {
		const separator = opts.separator ?? ","
		const quote = opts.quote ?? '"'
		const commentPrefix =
			opts.skipComments === true ? "#" : opts.skipComments || null
		const mapHeaders = opts.mapHeaders ?? (({ header }) => header)
		const mapValues = opts.mapValues ?? (({ value }) => value)

		let headers: Array<string | null> | null = null
		let row: string[] = []
		let field = ""
		let inQuotes = false
		// A quote was seen inside a quoted field; the next char decides
		// whether it was an escape or the closing quote.
		let quotePending = false
		let afterCarriageReturn = false

		const emitRow = (
			cells: string[],
			controller: TransformStreamDefaultController<Record<string, string>>,
		) => {
			// Blank line
			if (cells.length === 1 && cells[0] === "") return
			if (commentPrefix && (cells[0] ?? "").startsWith(commentPrefix)) return

			if (headers === null) {
				headers = cells.map((header, index) =>
					mapHeaders({ header: header.trim(), index }),
				)
				if (opts.requiredHeaders) {
					const present = new Set(headers)
					const missing = opts.requiredHeaders.filter((h) => !present.has(h))
					if (missing.length > 0) throw new MissingColumnsError(missing)
				}
				return
			}

			if (opts.strict && cells.length !== headers.length) {
				throw new RangeError(
					`Row length ${cells.length} does not match header length ${headers.length}`,
				)
			}

			const out: Record<string, string> = {}
			for (let index = 0; index < cells.length; index++) {
				const header = headers[index] ?? `_${index}`
				if (header === null) continue
				out[header] = mapValues({ header, index, value: cells[index] ?? "" })
			}
			controller.enqueue(out)
		}

		const endRow = (
			controller: TransformStreamDefaultController<Record<string, string>>,
		) => {
			row.push(field)
			field = ""
			const cells = row
			row = []
			emitRow(cells, controller)
		}

		const stream = new TransformStream<string, Record<string, string>>({
			transform(chunk, controller) {
				for (const ch of chunk) {
					if (afterCarriageReturn) {
						afterCarriageReturn = false
						if (ch === "\n") continue
					}

					if (quotePending) {
						quotePending = false
						if (ch === quote) {
							field += quote
							continue
						}
						inQuotes = false
					}

					if (inQuotes) {
						if (ch === quote) {
							quotePending = true
						} else {
							field += ch
						}
						continue
					}

					if (ch === quote) {
						inQuotes = true
					} else if (ch === separator) {
						row.push(field)
						field = ""
					} else if (ch === "\n" || ch === "\r") {
						afterCarriageReturn = ch === "\r"
						endRow(controller)
					} else {
						field += ch
					}
				}
			},
			flush(controller) {
				if (quotePending) {
					quotePending = false
					inQuotes = false
				}
				if (field.length > 0 || row.length > 0) endRow(controller)
			},
		})

		this.readable = stream.readable
		this.writable = stream.writable
	}
}

/**
 * Read every record from a stream of CSV text.
 */
export async function readCsvRecords(
	text: ReadableStream<string>,
	opts: CsvParseStreamOptions = {},
): Promise<Record<string, string>[]> {
	const reader = text.pipeThrough(new CsvParseStream(opts)).getReader()
	const records: Record<string, string>[] = []
	try {
		while (true) {
			const { value, done } = await reader.read()
			if (done) break
			records.push(value)
		}
	} finally {
		reader.releaseLock()
	}
	return records
}
