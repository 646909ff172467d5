/**
 * The `stoplink` command.
 *
 * @module
 */

import {
	isStoplinkError,
	type StoplinkErrorCode,
} from "@stoplink/shared/errors"
import { createLogger, setLogLevel } from "@stoplink/shared/logger"
import { Command, CommanderError } from "commander"
import { config as loadDotenv } from "dotenv"
import { type Config, type ConfigInput, resolveConfig } from "./config"
import { formatSummary, runSession } from "./session"
import {
	createReadlinePrompt,
	type Prompt,
	TerminalReviewer,
} from "./terminal-reviewer"

const log = createLogger({ component: "cli" })

export const VERSION = "0.1.0"

/** Errors that end the command with status 1. */
const INPUT_ERRORS: ReadonlySet<StoplinkErrorCode> = new Set([
	"FEED_PARSE",
	"MAP_DATA_PARSE",
	"CORRUPT_STORE_FILE",
	"IO_FAILURE",
])

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_INVALID_CONFIG = 2

interface CliFlags {
	gtfs?: string
	osm?: string
	output?: string
	filterCorrelated?: boolean
	radius?: string
	maxResults?: string
	geojson?: string
	stopTypes?: string
	logLevel?: string
}

export function createProgram(): Command {
	return new Command()
		.name("stoplink")
		.description(
			"Review GTFS stops against nearby OpenStreetMap platforms and record confirmed pairs",
		)
		.version(VERSION)
		.option("--gtfs <path>", "zipped GTFS feed (GTFS_FILE)")
		.option("--osm <path>", "Overpass JSON export (OSM_FILE)")
		.option("--output <path>", "correlation CSV file (OUTPUT_FILE)")
		.option(
			"--filter-correlated",
			"leave out stops and map stops already correlated (FILTER_ALREADY_CORRELATED_DATA)",
		)
		.option("--no-filter-correlated", "review every stop")
		.option("--radius <meters>", "search radius in meters (RADIUS_METERS)")
		.option("--max-results <n>", "candidates shown per stop (MAX_RESULTS)")
		.option(
			"--geojson <path>",
			"write each review step as GeoJSON (GEOJSON_FILE)",
		)
		.option(
			"--stop-types <types>",
			"comma-separated GTFS location_type values to review (STOP_TYPES)",
		)
		.option("--log-level <level>", "pino log level (LOG_LEVEL)")
		.exitOverride()
}

function flagsToConfig(flags: CliFlags): ConfigInput {
	return {
		gtfsFile: flags.gtfs,
		osmFile: flags.osm,
		outputFile: flags.output,
		filterAlreadyCorrelated: flags.filterCorrelated,
		radiusMeters: flags.radius,
		maxResults: flags.maxResults,
		geojsonFile: flags.geojson,
		stopTypes: flags.stopTypes,
		logLevel: flags.logLevel,
	}
}

export interface CliOptions {
	/** Defaults to process.env after loading `.env`. */
	env?: Record<string, string | undefined>
	/** Defaults to a readline prompt on stdin and stdout. */
	prompt?: Prompt
}

/**
 * Run the command.
 * @returns The process exit status.
 */
export async function main(
	argv: readonly string[] = process.argv,
	options: CliOptions = {},
): Promise<number> {
	const program = createProgram()
	try {
		program.parse([...argv])
	} catch (error) {
		if (!(error instanceof CommanderError)) throw error
		// Help and version exit 0; anything else is a usage error.
		return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID_CONFIG
	}

	let env = options.env
	if (!env) {
		loadDotenv()
		env = process.env
	}

	let config: Config
	try {
		config = resolveConfig({
			env,
			flags: flagsToConfig(program.opts<CliFlags>()),
		})
	} catch (error) {
		if (!isStoplinkError(error, "INVALID_CONFIG")) throw error
		log.error(error.message)
		return EXIT_INVALID_CONFIG
	}
	setLogLevel(config.logLevel)

	const prompt =
		options.prompt ?? createReadlinePrompt(process.stdin, process.stdout)
	try {
		const summary = await runSession(config, new TerminalReviewer(prompt))
		prompt.write(formatSummary(summary))
		return summary.endedBy === "write-failure" ? EXIT_FAILURE : EXIT_OK
	} catch (error) {
		if (!isStoplinkError(error) || !INPUT_ERRORS.has(error.code)) throw error
		log.error({ code: error.code }, error.message)
		return EXIT_FAILURE
	} finally {
		prompt.close()
	}
}
