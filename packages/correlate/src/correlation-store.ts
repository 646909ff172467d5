/**
 * Append-only, idempotent store of confirmed correlations backed by a CSV
 * file.
 *
 * The file has the header `gtfs_stop_id,gtfs_stop_name,osm:id,osm:name` and
 * one row per correlation, keyed by `gtfs_stop_id`. Every append rewrites the
 * file through a synced temporary file and a rename, so after a crash the
 * file holds either the previous rows or the previous rows plus the new one.
 *
 * @module
 */

import { Buffer } from "node:buffer"
import { basename, dirname, join } from "node:path"
import { bytesToTextStream } from "@stoplink/shared/bytes-to-stream"
import {
	MissingColumnsError,
	readCsvRecords,
} from "@stoplink/shared/csv-parse-stream"
import {
	CorruptStoreFile,
	DuplicateKey,
	errorMessage,
	IOFailure,
} from "@stoplink/shared/errors"
import { createLogger } from "@stoplink/shared/logger"
import type { MapStop, TransitStop } from "@stoplink/shared/types"
import { stringify } from "csv-stringify/sync"
import { nodeFileSystem, type StoreFileSystem } from "./store-file-system"
import type { CorrelationRecord } from "./types"

const log = createLogger({ component: "correlation-store" })

export const CORRELATION_COLUMNS = [
	"gtfs_stop_id",
	"gtfs_stop_name",
	"osm:id",
	"osm:name",
] as const

/** Written as osm:name for map stops without a name tag. */
export const UNNAMED_MAP_STOP = "n/a"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Build the record confirming that `mapStop` is `stop`.
 */
export function createCorrelation(
	stop: TransitStop,
	mapStop: MapStop,
): CorrelationRecord {
	return {
		gtfsStopId: stop.id,
		gtfsStopName: stop.name,
		osmId: mapStop.id,
		osmName: mapStop.name ?? UNNAMED_MAP_STOP,
	}
}

/**
 * Format records as CSV lines, without a header unless asked for.
 */
export function formatCorrelationRows(
	records: readonly CorrelationRecord[],
	header = false,
): string {
	const rows: string[][] = header ? [[...CORRELATION_COLUMNS]] : []
	for (const r of records) {
		rows.push([r.gtfsStopId, r.gtfsStopName, r.osmId, r.osmName])
	}
	// The reader ends a row at a bare CR as well as at LF.
	return stringify(rows, { record_delimiter: "unix", quoted_match: /\r/ })
}

/**
 * File contents with one more row: the existing bytes untouched, a newline
 * if the last row lacks one, then the new row. A blank file gets the header.
 */
function withAppendedRow(
	current: Uint8Array | null,
	record: CorrelationRecord,
): Uint8Array {
	if (!current || decoder.decode(current).trim() === "") {
		return encoder.encode(formatCorrelationRows([record], true))
	}
	const separator = current[current.length - 1] === 0x0a ? "" : "\n"
	return Buffer.concat([
		current,
		encoder.encode(separator + formatCorrelationRows([record])),
	])
}

export interface CorrelationStoreOptions {
	fs?: StoreFileSystem
}

export class CorrelationStore {
	readonly path: string
	private readonly fs: StoreFileSystem
	private readonly records = new Map<string, CorrelationRecord>()
	private readonly osmIds = new Set<string>()
	private writes = 0

	private constructor(path: string, fs: StoreFileSystem) {
		this.path = path
		this.fs = fs
	}

	/**
	 * Open the store at `path`, loading any correlations already written.
	 * A missing file is an empty store; it is created by the first append.
	 *
	 * @throws CorruptStoreFile when the header lacks a required column or a
	 * row has no gtfs_stop_id.
	 * @throws IOFailure when the file exists but cannot be read.
	 */
	static async load(
		path: string,
		options: CorrelationStoreOptions = {},
	): Promise<CorrelationStore> {
		const store = new CorrelationStore(path, options.fs ?? nodeFileSystem)

		let bytes: Uint8Array | null
		try {
			bytes = await store.fs.read(path)
		} catch (error) {
			throw new IOFailure(`Could not read ${path}: ${errorMessage(error)}`, {
				cause: error,
			})
		}
		if (!bytes) {
			log.info({ path }, "no correlation file yet, starting empty")
			return store
		}

		let rows: Record<string, string>[]
		try {
			rows = await readCsvRecords(bytesToTextStream(bytes), {
				requiredHeaders: CORRELATION_COLUMNS,
			})
		} catch (error) {
			if (error instanceof MissingColumnsError) {
				throw new CorruptStoreFile(
					path,
					`header is missing ${error.missing.join(", ")}`,
					{ cause: error },
				)
			}
			throw new CorruptStoreFile(path, errorMessage(error), { cause: error })
		}

		rows.forEach((row, i) => {
			const gtfsStopId = row["gtfs_stop_id"] ?? ""
			if (gtfsStopId === "") {
				throw new CorruptStoreFile(path, `record ${i + 1} has no gtfs_stop_id`)
			}
			if (store.records.has(gtfsStopId)) {
				log.warn({ gtfsStopId }, "duplicate correlation on disk, keeping the first")
				return
			}
			store.add({
				gtfsStopId,
				gtfsStopName: row["gtfs_stop_name"] ?? "",
				osmId: row["osm:id"] ?? "",
				osmName: row["osm:name"] ?? "",
			})
		})

		log.info({ path, correlations: store.size }, "loaded correlations")
		return store
	}

	get size() {
		return this.records.size
	}

	/** True when the GTFS stop already has a correlation. */
	contains(stopId: string): boolean {
		return this.records.has(stopId)
	}

	/** True when some correlation already uses this OSM element. */
	containsMapStop(osmId: string): boolean {
		return this.osmIds.has(osmId)
	}

	get(stopId: string): CorrelationRecord | undefined {
		return this.records.get(stopId)
	}

	/** Every correlation, in the order it was written. */
	all(): CorrelationRecord[] {
		return Array.from(this.records.values())
	}

	/**
	 * Persist a new correlation, then add it to the in-memory set.
	 *
	 * @throws RangeError when the record has an empty gtfsStopId.
	 * @throws DuplicateKey when the GTFS stop is already correlated. Nothing
	 * is written.
	 * @throws IOFailure when the file could not be replaced. The file and the
	 * in-memory set are both left as they were.
	 */
	async append(record: CorrelationRecord): Promise<void> {
		if (record.gtfsStopId.trim() === "") {
			throw new RangeError("Cannot store a correlation without a gtfsStopId")
		}
		if (this.records.has(record.gtfsStopId)) {
			throw new DuplicateKey(record.gtfsStopId)
		}

		const directory = dirname(this.path)
		const tempPath = join(
			directory,
			`.${basename(this.path)}.${process.pid}.${++this.writes}.tmp`,
		)

		try {
			const current = await this.fs.read(this.path)
			await this.fs.writeSynced(tempPath, withAppendedRow(current, record))
			await this.fs.rename(tempPath, this.path)
		} catch (error) {
			await this.fs.remove(tempPath).catch((removeError: unknown) => {
				log.warn(
					{ tempPath, error: errorMessage(removeError) },
					"could not remove temporary file",
				)
			})
			throw new IOFailure(
				`Could not write correlation for ${record.gtfsStopId} to ${this.path}: ${errorMessage(error)}`,
				{ cause: error },
			)
		}

		// The rename has committed the row; a failed directory sync only
		// weakens durability against power loss.
		await this.fs.syncDirectory(directory).catch((error: unknown) => {
			log.warn({ directory, error: errorMessage(error) }, "could not sync directory")
		})

		this.add(record)
		log.info(record, "correlation written")
	}

	private add(record: CorrelationRecord) {
		this.records.set(record.gtfsStopId, record)
		this.osmIds.add(record.osmId)
	}
}
