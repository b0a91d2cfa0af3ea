import { cliui } from '@poppinss/cliui'
import type { Environment } from '../settings/source.ts'

export const LOG_ENV_VAR = 'WASIXCC_LOG'

export type LogLevel = 'off' | 'warn' | 'info'

const LEVEL_RANK: Record<LogLevel, number> = {
	info: 2,
	off: 0,
	warn: 1,
}

/**
 * What the pipeline reports while it runs. Errors are not logged here;
 * they propagate to the CLI, which prints them.
 */
export interface DriverLogger {
	info(message: string): void
	warning(message: string): void
}

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_RANK, value)
}

export function resolveLogLevel(env: Environment): LogLevel {
	const value = env[LOG_ENV_VAR]?.trim().toLowerCase()
	if (value === undefined || value === '') return 'off'
	return isLogLevel(value) ? value : 'off'
}

type UI = ReturnType<typeof cliui>

/**
 * Logger backed by the cliui logger, filtered by `WASIXCC_LOG`. Writes to
 * stderr so that stdout carries only the tools' own output.
 */
export function createLogger(env: Environment, ui: UI = cliui()): DriverLogger {
	const rank = LEVEL_RANK[resolveLogLevel(env)]

	return {
		info(message: string): void {
			if (rank >= LEVEL_RANK.info) ui.logger.logError(ui.logger.prepareInfo(message))
		},
		warning(message: string): void {
			if (rank >= LEVEL_RANK.warn) ui.logger.logError(ui.logger.prepareWarning(message))
		},
	}
}

export const silentLogger: DriverLogger = {
	info(): void {},
	warning(): void {},
}
