import { formatDiagnostic } from '@wasixcc/diagnostics'
import { DriverError, InternalError } from '@wasixcc/driver'

export const VERSION = '0.1.0'
export const VERSION_FLAG = '--version'
export const INSTALL_COMMAND = 'install-executables'

export function formatVersion(): string {
	return `wasixcc version: ${VERSION}`
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * One line for the error stream: `[CODE] message` for diagnostics,
 * the bare message otherwise.
 */
export function formatError(error: unknown): string {
	if (error instanceof DriverError) {
		return formatDiagnostic(error.def, error.args)
	}
	if (error instanceof InternalError) {
		return formatDiagnostic(error.def)
	}
	return getErrorMessage(error)
}
