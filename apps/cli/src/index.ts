/**
 * @stoplink/cli - Interactive review of GTFS to OSM stop correlations.
 *
 * @module @stoplink/cli
 */

export {
	createProgram,
	EXIT_FAILURE,
	EXIT_INVALID_CONFIG,
	EXIT_OK,
	main,
	VERSION,
} from "./cli"
export {
	type Config,
	CONFIG_ENV_VARS,
	ConfigSchema,
	type ConfigSources,
	configFromEnv,
	parseBooleanish,
	resolveConfig,
} from "./config"
export { formatSummary, geojsonFileRenderer, runSession } from "./session"
export {
	createReadlinePrompt,
	formatReviewView,
	parseReviewAnswer,
	type Prompt,
	TerminalReviewer,
} from "./terminal-reviewer"
