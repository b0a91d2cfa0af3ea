/**
 * CLI diagnostic definitions.
 *
 * Error code format: WXCLI<NUMBER>
 * - WXCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (WXCLI001-099)
// =============================================================================

export const WXCLI001: DiagnosticDef = {
	code: 'WXCLI001',
	description: 'The driver picks its mode from the name it was started under.',
	message:
		"failed to get command name; this binary must be run with a name in the form 'wasix-<command-name>' or 'wasix<command-name>', such as wasix-cc; given {name}",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run `wasixcc install-executables <dir>` and call the created commands.',
}

export const WXCLI002: DiagnosticDef = {
	code: 'WXCLI002',
	description: 'The driver only knows cc, ++, cc++, ld, ar, nm and ranlib.',
	message: 'unknown command {command}',
	severity: DiagnosticSeverity.Error,
}

export const WXCLI003: DiagnosticDef = {
	code: 'WXCLI003',
	description: 'A command link could not be created in the target directory.',
	message: 'failed to install {target}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the target directory.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	WXCLI001,
	WXCLI002,
	WXCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
