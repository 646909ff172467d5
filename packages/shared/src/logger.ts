/**
 * Application logger using pino.
 *
 * Logs go to stderr, leaving stdout to the interactive review prompt. When
 * stderr is a terminal and NODE_ENV is not "production" they are pretty
 * printed through pino-pretty.
 *
 * @module
 */

import pino, { type LevelWithSilent, type Logger } from "pino"

export const LOG_LEVELS = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
] as const satisfies readonly LevelWithSilent[]

export type LogLevel = (typeof LOG_LEVELS)[number]

const pretty =
	process.stderr.isTTY === true && process.env["NODE_ENV"] !== "production"

const level = process.env["LOG_LEVEL"] || "info"

export const logger: Logger = pretty
	? pino({
			level,
			base: null,
			transport: {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "HH:MM:ss",
					ignore: "pid,hostname",
					destination: 2,
				},
			},
		})
	: pino({ level, base: null }, pino.destination(2))

const children = new Set<Logger>()

/**
 * Create a child logger tagged with a component or other context.
 */
export function createLogger(context: Record<string, unknown>): Logger {
	const child = logger.child(context)
	children.add(child)
	return child
}

/**
 * Change the level of the root logger and of every child created so far.
 */
export function setLogLevel(level: LogLevel) {
	logger.level = level
	for (const child of children) child.level = level
}
