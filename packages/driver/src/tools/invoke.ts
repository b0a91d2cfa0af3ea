import { spawnSync } from 'node:child_process'
import { WXTOOL001, WXTOOL002 } from '@wasixcc/diagnostics'
import { fail } from '../core/errors.ts'
import type { DriverLogger } from '../core/log.ts'

/**
 * One external tool invocation.
 */
export interface ToolCommand {
	readonly program: string
	readonly args: readonly string[]
}

/**
 * Runs a command to completion. Returns on exit status zero and throws a
 * DriverError otherwise.
 */
export interface ToolRunner {
	run(command: ToolCommand): void
}

function quoteArg(arg: string): string {
	return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replaceAll("'", "'\\''")}'`
}

/**
 * Render a command as a shell line, for logs and error messages.
 */
export function formatCommand(command: ToolCommand): string {
	return [command.program, ...command.args].map(quoteArg).join(' ')
}

function describeExit(status: number | null, signal: NodeJS.Signals | null): string {
	if (signal !== null) return `signal ${signal}`
	return `exit status ${status ?? 'unknown'}`
}

/**
 * Runner that spawns the tool with inherited stdio and waits for it.
 */
export function createSpawnRunner(logger: DriverLogger): ToolRunner {
	return {
		run(command: ToolCommand): void {
			logger.info(`Executing build command: ${formatCommand(command)}`)

			const result = spawnSync(command.program, command.args, { stdio: 'inherit' })
			if (result.error !== undefined) {
				fail(WXTOOL002, { program: command.program, reason: result.error.message })
			}
			if (result.status !== 0) {
				fail(WXTOOL001, {
					command: formatCommand(command),
					status: describeExit(result.status, result.signal),
				})
			}
		},
	}
}
