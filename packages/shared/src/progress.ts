/**
 * Progress helpers for long-running loads.
 *
 * @module
 */

import { logger } from "./logger"

export type Progress = {
	msg: string
	timestamp: number
}

export type ProgressHandler = (progress: Progress) => void

/**
 * Create a Progress payload with current timestamp.
 */
export function progress(msg: string): Progress {
	return {
		msg,
		timestamp: Date.now(),
	}
}

/**
 * Default progress handler: logs the message at info level.
 */
export function logProgress(progress: Progress) {
	logger.info(progress.msg)
}
