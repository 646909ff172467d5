import { ConfigurationError } from "@stoplink/shared/errors"
import { describe, expect, it } from "vitest"
import { configFromEnv, parseBooleanish, resolveConfig } from "../src/config"

const REQUIRED_ENV = { GTFS_FILE: "feed.zip", OSM_FILE: "stops.json" }

function configError(run: () => unknown): ConfigurationError {
	try {
		run()
	} catch (error) {
		if (error instanceof ConfigurationError) return error
		throw error
	}
	throw new Error("expected a ConfigurationError")
}

describe("parseBooleanish", () => {
	it("reads the accepted spellings in any case", () => {
		expect(parseBooleanish("YES")).toBe(true)
		expect(parseBooleanish(" true ")).toBe(true)
		expect(parseBooleanish("1")).toBe(true)
		expect(parseBooleanish("No")).toBe(false)
		expect(parseBooleanish("0")).toBe(false)
		expect(parseBooleanish("false")).toBe(false)
	})

	it("passes other values through", () => {
		expect(parseBooleanish("maybe")).toBe("maybe")
		expect(parseBooleanish(false)).toBe(false)
	})
})

describe("configFromEnv", () => {
	it("treats empty variables as unset", () => {
		expect(
			configFromEnv({ ...REQUIRED_ENV, OUTPUT_FILE: "", RADIUS_METERS: "  " }),
		).toEqual({ gtfsFile: "feed.zip", osmFile: "stops.json" })
	})
})

describe("resolveConfig", () => {
	it("fills in defaults", () => {
		expect(resolveConfig({ env: REQUIRED_ENV })).toEqual({
			gtfsFile: "feed.zip",
			osmFile: "stops.json",
			outputFile: "correlation.csv",
			filterAlreadyCorrelated: true,
			radiusMeters: 100,
			maxResults: 5,
			logLevel: "info",
		})
	})

	it("reads options from the environment", () => {
		const config = resolveConfig({
			env: {
				...REQUIRED_ENV,
				OUTPUT_FILE: "out.csv",
				FILTER_ALREADY_CORRELATED_DATA: "no",
				RADIUS_METERS: "50.5",
				MAX_RESULTS: "3",
				GEOJSON_FILE: "view.geojson",
				STOP_TYPES: "0, 1",
				LOG_LEVEL: "debug",
			},
		})
		expect(config).toEqual({
			gtfsFile: "feed.zip",
			osmFile: "stops.json",
			outputFile: "out.csv",
			filterAlreadyCorrelated: false,
			radiusMeters: 50.5,
			maxResults: 3,
			geojsonFile: "view.geojson",
			stopTypes: [0, 1],
			logLevel: "debug",
		})
	})

	it("lets flags override the environment", () => {
		const config = resolveConfig({
			env: {
				...REQUIRED_ENV,
				RADIUS_METERS: "50",
				FILTER_ALREADY_CORRELATED_DATA: "false",
			},
			flags: {
				gtfsFile: "other.zip",
				radiusMeters: "25",
				filterAlreadyCorrelated: true,
				maxResults: undefined,
			},
		})
		expect(config.gtfsFile).toBe("other.zip")
		expect(config.radiusMeters).toBe(25)
		expect(config.filterAlreadyCorrelated).toBe(true)
		expect(config.maxResults).toBe(5)
	})

	it("names every missing input", () => {
		const error = configError(() => resolveConfig({ env: {} }))
		expect(error.code).toBe("INVALID_CONFIG")
		expect(error.issues).toEqual([
			"gtfsFile: set GTFS_FILE or --gtfs",
			"osmFile: set OSM_FILE or --osm",
		])
	})

	it("rejects out-of-range numbers", () => {
		const error = configError(() =>
			resolveConfig({
				env: { ...REQUIRED_ENV, RADIUS_METERS: "-5", MAX_RESULTS: "2.5" },
			}),
		)
		expect(error.issues.map((issue) => issue.split(":")[0])).toEqual([
			"radiusMeters",
			"maxResults",
		])
	})

	it("rejects a boolean it cannot read", () => {
		const error = configError(() =>
			resolveConfig({
				env: { ...REQUIRED_ENV, FILTER_ALREADY_CORRELATED_DATA: "maybe" },
			}),
		)
		expect(error.issues).toEqual([
			"filterAlreadyCorrelated: expected true, false, yes, no, 1 or 0",
		])
	})

	it("rejects an unknown log level and bad stop types", () => {
		const error = configError(() =>
			resolveConfig({
				env: { ...REQUIRED_ENV, LOG_LEVEL: "loud", STOP_TYPES: "0,x" },
			}),
		)
		expect(error.issues.map((issue) => issue.split(":")[0])).toEqual([
			"stopTypes.1",
			"logLevel",
		])
	})
})
