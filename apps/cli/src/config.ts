/**
 * Session configuration from defaults, environment and command-line flags.
 *
 * @module
 */

import { ConfigurationError } from "@stoplink/shared/errors"
import { LOG_LEVELS } from "@stoplink/shared/logger"
import { z } from "zod"

const TRUE_VALUES = new Set(["true", "1", "yes"])
const FALSE_VALUES = new Set(["false", "0", "no"])

/**
 * Read `true/false/1/0/yes/no` (any case) as a boolean. Anything else is
 * returned unchanged for the schema to reject.
 */
export function parseBooleanish(value: unknown): unknown {
	if (typeof value !== "string") return value
	const normalized = value.trim().toLowerCase()
	if (TRUE_VALUES.has(normalized)) return true
	if (FALSE_VALUES.has(normalized)) return false
	return value
}

/** "0, 1" to [0, 1]. */
function parseNumberList(value: unknown): unknown {
	if (typeof value !== "string") return value
	return value.split(",").map((part) => Number(part.trim()))
}

export const ConfigSchema = z.object({
	gtfsFile: z
		.string({ required_error: "set GTFS_FILE or --gtfs" })
		.min(1, "set GTFS_FILE or --gtfs"),
	osmFile: z
		.string({ required_error: "set OSM_FILE or --osm" })
		.min(1, "set OSM_FILE or --osm"),
	outputFile: z.string().min(1).default("correlation.csv"),
	filterAlreadyCorrelated: z
		.preprocess(
			parseBooleanish,
			z.boolean({ invalid_type_error: "expected true, false, yes, no, 1 or 0" }),
		)
		.default(true),
	radiusMeters: z.coerce.number().finite().nonnegative().default(100),
	maxResults: z.coerce.number().int().positive().default(5),
	geojsonFile: z.string().min(1).optional(),
	/** GTFS location_type values to review; all stops when unset. */
	stopTypes: z
		.preprocess(parseNumberList, z.array(z.number().int().nonnegative()))
		.optional(),
	logLevel: z.enum(LOG_LEVELS).default("info"),
})

export type Config = z.output<typeof ConfigSchema>
export type ConfigKey = keyof Config

/** Environment variable for each option. */
export const CONFIG_ENV_VARS = {
	gtfsFile: "GTFS_FILE",
	osmFile: "OSM_FILE",
	outputFile: "OUTPUT_FILE",
	filterAlreadyCorrelated: "FILTER_ALREADY_CORRELATED_DATA",
	radiusMeters: "RADIUS_METERS",
	maxResults: "MAX_RESULTS",
	geojsonFile: "GEOJSON_FILE",
	stopTypes: "STOP_TYPES",
	logLevel: "LOG_LEVEL",
} as const satisfies Record<ConfigKey, string>

export type ConfigInput = Partial<Record<ConfigKey, unknown>>

export interface ConfigSources {
	env?: Record<string, string | undefined>
	/** Values from command-line flags, already keyed by option name. */
	flags?: ConfigInput
}

function definedEntries(input: ConfigInput): ConfigInput {
	const out: ConfigInput = {}
	for (const key of ConfigSchema.keyof().options) {
		if (input[key] !== undefined) out[key] = input[key]
	}
	return out
}

/** Options set in the environment. Empty variables count as unset. */
export function configFromEnv(
	env: Record<string, string | undefined>,
): ConfigInput {
	const input: ConfigInput = {}
	for (const key of ConfigSchema.keyof().options) {
		const value = env[CONFIG_ENV_VARS[key]]
		if (value !== undefined && value.trim() !== "") input[key] = value
	}
	return input
}

/**
 * Merge the sources, flags over environment over defaults, and validate.
 *
 * @throws ConfigurationError listing every invalid option.
 */
export function resolveConfig(sources: ConfigSources = {}): Config {
	const input = {
		...configFromEnv(sources.env ?? {}),
		...definedEntries(sources.flags ?? {}),
	}
	const result = ConfigSchema.safeParse(input)
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
		)
		throw new ConfigurationError(
			`Invalid configuration: ${issues.join("; ")}`,
			issues,
		)
	}
	return result.data
}
