/**
 * Lazy GTFS archive reader with streaming CSV support.
 *
 * Only parses CSV files when they are accessed, not upfront.
 *
 * @module
 */

import { bytesToTextStream } from "@stoplink/shared/bytes-to-stream"
import { CsvParseStream } from "@stoplink/shared/csv-parse-stream"
import { errorMessage, FeedParseError } from "@stoplink/shared/errors"
import { unzip, type ZipItem } from "but-unzip"
import {
	type GtfsAgency,
	type GtfsFileName,
	type GtfsFileTypeMap,
	type GtfsStop,
	REQUIRED_AGENCY_COLUMNS,
	REQUIRED_GTFS_FILES,
	REQUIRED_STOP_COLUMNS,
} from "./types"

type CsvRow = Record<string, string>

function optional(row: CsvRow, key: string): string | undefined {
	const value = row[key]
	return value === undefined || value === "" ? undefined : value
}

const REQUIRED_COLUMNS: { [F in GtfsFileName]: readonly string[] } = {
	"agency.txt": REQUIRED_AGENCY_COLUMNS,
	"stops.txt": REQUIRED_STOP_COLUMNS,
}

const ROW_READERS: {
	[F in GtfsFileName]: (row: CsvRow) => GtfsFileTypeMap[F]
} = {
	"agency.txt": (row): GtfsAgency => ({
		agency_id: optional(row, "agency_id"),
		agency_name: row["agency_name"] ?? "",
		agency_url: row["agency_url"] ?? "",
		agency_timezone: row["agency_timezone"] ?? "",
	}),
	"stops.txt": (row): GtfsStop => ({
		stop_id: row["stop_id"] ?? "",
		stop_code: optional(row, "stop_code"),
		stop_name: row["stop_name"] ?? "",
		stop_desc: optional(row, "stop_desc"),
		stop_lat: row["stop_lat"] ?? "",
		stop_lon: row["stop_lon"] ?? "",
		zone_id: optional(row, "zone_id"),
		stop_url: optional(row, "stop_url"),
		location_type: optional(row, "location_type"),
		parent_station: optional(row, "parent_station"),
		platform_code: optional(row, "platform_code"),
	}),
}

/**
 * Lazy GTFS archive that only parses files on demand.
 *
 * Files are read from the zip and parsed only when iterated.
 * Streaming iterators parse CSV line-by-line.
 */
export class GtfsArchive {
	private entries: Map<string, ZipItem>

	private constructor(entries: Map<string, ZipItem>) {
		this.entries = entries
	}

	/**
	 * Create a GtfsArchive from zip data.
	 * @throws FeedParseError when the bytes are not a readable zip archive.
	 */
	static fromZip(zipData: ArrayBuffer | Uint8Array): GtfsArchive {
		const bytes =
			zipData instanceof Uint8Array ? zipData : new Uint8Array(zipData)

		const entries = new Map<string, ZipItem>()
		try {
			for (const item of unzip(bytes)) {
				// Remove directory prefix and store by filename
				const name = item.filename.replace(/^.*\//, "")
				if (name.endsWith(".txt")) {
					entries.set(name, item)
				}
			}
		} catch (error) {
			throw new FeedParseError(
				`Not a readable GTFS zip archive: ${errorMessage(error)}`,
				{ cause: error },
			)
		}

		return new GtfsArchive(entries)
	}

	/**
	 * Check if a file exists in the archive.
	 */
	hasFile(filename: string): boolean {
		return this.entries.has(filename)
	}

	/**
	 * List all files in the archive.
	 */
	listFiles(): string[] {
		return Array.from(this.entries.keys())
	}

	/**
	 * Required GTFS files absent from this archive.
	 */
	missingRequiredFiles(): string[] {
		return REQUIRED_GTFS_FILES.filter((f) => !this.entries.has(f))
	}

	private async getFileBytes(filename: string): Promise<Uint8Array | null> {
		const entry = this.entries.get(filename)
		if (!entry) return null

		const data = entry.read()
		return data instanceof Promise ? await data : data
	}

	/**
	 * Stream parse a CSV file, yielding typed records one at a time.
	 *
	 * The record type follows the filename: `"stops.txt"` yields `GtfsStop`,
	 * `"agency.txt"` yields `GtfsAgency`. A file missing from the archive
	 * yields nothing.
	 *
	 * @throws FeedParseError when the header lacks a required column or the
	 * file cannot be decompressed.
	 *
	 * @example
	 * ```ts
	 * for await (const stop of archive.iter("stops.txt")) {
	 *   console.log(stop.stop_name)
	 * }
	 * ```
	 */
	async *iter<F extends GtfsFileName>(
		filename: F,
	): AsyncGenerator<GtfsFileTypeMap[F], void, unknown> {
		let bytes: Uint8Array | null
		try {
			bytes = await this.getFileBytes(filename)
		} catch (error) {
			throw new FeedParseError(
				`Could not decompress ${filename}: ${errorMessage(error)}`,
				{ cause: error },
			)
		}
		if (!bytes) return

		const readRow = ROW_READERS[filename]
		const reader = bytesToTextStream(bytes)
			.pipeThrough(
				new CsvParseStream({ requiredHeaders: REQUIRED_COLUMNS[filename] }),
			)
			.getReader()
		try {
			while (true) {
				const result = await reader.read().catch((error: unknown) => {
					throw new FeedParseError(`${filename}: ${errorMessage(error)}`, {
						cause: error,
					})
				})
				if (result.done) break
				yield readRow(result.value)
			}
		} finally {
			reader.releaseLock()
		}
	}
}
