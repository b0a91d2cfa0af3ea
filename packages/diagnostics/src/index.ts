/**
 * @wasixcc/diagnostics
 *
 * Shared diagnostic types and definitions for wasixcc packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	WXCLI001,
	WXCLI002,
	WXCLI003,
} from './cli.ts'
export {
	DRIVER_DIAGNOSTICS,
	type DriverDiagnosticCode,
	WXARG001,
	WXARG002,
	WXARG003,
	WXCFG001,
	WXCFG002,
	WXCFG003,
	WXCFG004,
	WXIN001,
	WXINT001,
	WXKIND001,
	WXTOOL001,
	WXTOOL002,
} from './driver.ts'
export { formatDiagnostic, interpolateMessage } from './format.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { DRIVER_DIAGNOSTICS } from './driver.ts'
import type { DiagnosticDef } from './types.ts'

/**
 * Every diagnostic the driver and the CLI report, by code.
 */
export const DIAGNOSTICS = {
	...DRIVER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

export type DiagnosticCode = keyof typeof DIAGNOSTICS

export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}

/**
 * Definition for a code that came from outside, such as a log line.
 */
export function findDiagnostic(code: string): DiagnosticDef | undefined {
	return isValidDiagnosticCode(code) ? DIAGNOSTICS[code] : undefined
}
