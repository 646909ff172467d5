import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { FeedParseError } from "@stoplink/shared/errors"
import type { Progress } from "@stoplink/shared/progress"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
	GtfsArchive,
	loadTransitStops,
	readTransitStops,
	toTransitStop,
} from "../src"
import {
	AGENCY_TXT,
	createGtfsZip,
	createTestGtfsZip,
	STOPS_TXT,
} from "./helpers"

const noProgress = (_progress: Progress) => {}

describe("GtfsArchive", () => {
	it("lists the text files of the archive without directory prefixes", () => {
		const archive = GtfsArchive.fromZip(
			createGtfsZip({
				"feed/stops.txt": STOPS_TXT,
				"feed/agency.txt": AGENCY_TXT,
				"README.md": "not a gtfs file",
			}),
		)
		expect(archive.listFiles().sort()).toEqual(["agency.txt", "stops.txt"])
		expect(archive.hasFile("stops.txt")).toBe(true)
		expect(archive.hasFile("README.md")).toBe(false)
	})

	it("reports missing required files", () => {
		const archive = GtfsArchive.fromZip(
			createGtfsZip({ "stops.txt": STOPS_TXT }),
		)
		expect(archive.missingRequiredFiles()).toEqual(["agency.txt"])
	})

	it("needs nothing beyond agency.txt and stops.txt", () => {
		const archive = GtfsArchive.fromZip(
			createGtfsZip({ "agency.txt": AGENCY_TXT, "stops.txt": STOPS_TXT }),
		)
		expect(archive.missingRequiredFiles()).toEqual([])
	})

	it("iterates typed stop records", async () => {
		const archive = GtfsArchive.fromZip(createTestGtfsZip())
		const stops = []
		for await (const stop of archive.iter("stops.txt")) {
			stops.push(stop)
		}

		expect(stops.length).toBe(3)
		expect(stops[1]).toEqual({
			stop_id: "S2",
			stop_code: undefined,
			stop_name: "Piata Unirii, North",
			stop_desc: "Near the fountain",
			stop_lat: "44.4269",
			stop_lon: "26.1025",
			zone_id: undefined,
			stop_url: undefined,
			location_type: "0",
			parent_station: undefined,
			platform_code: undefined,
		})
	})

	it("yields nothing for a file that is not in the archive", async () => {
		const archive = GtfsArchive.fromZip(
			createGtfsZip({ "stops.txt": STOPS_TXT }),
		)
		const agencies = []
		for await (const agency of archive.iter("agency.txt")) {
			agencies.push(agency)
		}
		expect(agencies).toEqual([])
	})
})

describe("toTransitStop", () => {
	it("parses coordinates and keeps optional fields", () => {
		expect(
			toTransitStop({
				stop_id: "S2",
				stop_name: "Piata Unirii",
				stop_desc: "Near the fountain",
				stop_lat: "44.4269",
				stop_lon: "26.1025",
				location_type: "0",
			}),
		).toEqual({
			id: "S2",
			name: "Piata Unirii",
			description: "Near the fountain",
			lat: 44.4269,
			lon: 26.1025,
			locationType: "0",
		})
	})

	it("returns null when coordinates are missing", () => {
		expect(
			toTransitStop({
				stop_id: "S9",
				stop_name: "Nowhere",
				stop_lat: "",
				stop_lon: "26.1",
			}),
		).toBeNull()
	})
})

describe("loadTransitStops", () => {
	it("loads every stop in file order", async () => {
		const stops = await loadTransitStops(createTestGtfsZip(), {}, noProgress)
		expect(stops.map((s) => s.id)).toEqual(["S1", "S2", "S3"])
		expect(stops[0]).toEqual({
			id: "S1",
			name: "Main St",
			lat: 44.43,
			lon: 26.1,
			locationType: "0",
		})
	})

	it("filters stops by location type", async () => {
		const stations = await loadTransitStops(
			createTestGtfsZip(),
			{ stopTypes: [1] },
			noProgress,
		)
		expect(stations.map((s) => s.id)).toEqual(["S3"])
	})

	it("treats an empty location_type as a plain stop", async () => {
		const zip = createGtfsZip({
			"stops.txt": `stop_id,stop_name,stop_lat,stop_lon,location_type
A,Alpha,44.1,26.1,
B,Beta,44.2,26.2,1`,
		})
		const stops = await loadTransitStops(zip, { stopTypes: [0] }, noProgress)
		expect(stops.map((s) => s.id)).toEqual(["A"])
	})

	it("skips rows without coordinates and repeated ids", async () => {
		const zip = createGtfsZip({
			"stops.txt": `stop_id,stop_name,stop_lat,stop_lon
A,Alpha,44.1,26.1
B,Beta,,
A,Alpha again,44.3,26.3`,
		})
		const messages: string[] = []
		const stops = await loadTransitStops(zip, {}, (p) => messages.push(p.msg))
		expect(stops).toEqual([{ id: "A", name: "Alpha", lat: 44.1, lon: 26.1 }])
		expect(messages).toEqual([
			"Opening GTFS archive...",
			"Processing stops...",
			"Loaded 1 stops (1 without coordinates, 0 without stop_id, 1 duplicates, 0 filtered by type)",
		])
	})

	it("skips rows with an empty stop_id", async () => {
		const zip = createGtfsZip({
			"stops.txt": `stop_id,stop_name,stop_lat,stop_lon
,Nameless,44.43,26.1
 ,Blank,44.44,26.2
A,Alpha,44.1,26.1`,
		})
		const messages: string[] = []
		const stops = await loadTransitStops(zip, {}, (p) => messages.push(p.msg))
		expect(stops.map((s) => s.id)).toEqual(["A"])
		expect(messages.at(-1)).toBe(
			"Loaded 1 stops (0 without coordinates, 2 without stop_id, 0 duplicates, 0 filtered by type)",
		)
	})

	it("fails with FeedParseError on bytes that are not a zip archive", async () => {
		const bytes = new TextEncoder().encode("stop_id,stop_name\n")
		await expect(loadTransitStops(bytes, {}, noProgress)).rejects.toBeInstanceOf(
			FeedParseError,
		)
	})

	it("fails with FeedParseError when stops.txt is absent", async () => {
		const zip = createGtfsZip({ "agency.txt": AGENCY_TXT })
		await expect(loadTransitStops(zip, {}, noProgress)).rejects.toThrow(
			"GTFS archive has no stops.txt",
		)
	})

	it("fails with FeedParseError when stops.txt lacks coordinate columns", async () => {
		const zip = createGtfsZip({
			"stops.txt": `stop_id,stop_name
A,Alpha`,
		})
		const loading = loadTransitStops(zip, {}, noProgress)
		await expect(loading).rejects.toBeInstanceOf(FeedParseError)
		await expect(loading).rejects.toThrow(
			"stops.txt: Missing required columns: stop_lat, stop_lon",
		)
	})
})

describe("readTransitStops", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "stoplink-gtfs-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("reads a feed from disk", async () => {
		const path = join(dir, "feed.zip")
		await writeFile(path, createTestGtfsZip())
		const stops = await readTransitStops(path, {}, noProgress)
		expect(stops).toHaveLength(3)
	})

	it("wraps a missing file in FeedParseError", async () => {
		await expect(
			readTransitStops(join(dir, "missing.zip"), {}, noProgress),
		).rejects.toBeInstanceOf(FeedParseError)
	})
})
