/**
 * Driver diagnostic definitions.
 *
 * Error code format: WX<AREA><NUMBER>
 * - WXCFG: Settings errors (001-099)
 * - WXARG: Argument grammar errors (001-099)
 * - WXIN / WXKIND: Input and module kind errors (001-099)
 * - WXTOOL: Subprocess errors (001-099)
 * - WXINT: Internal contract violations (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// SETTINGS ERRORS (WXCFG001-099)
// =============================================================================

export const WXCFG001: DiagnosticDef = {
	code: 'WXCFG001',
	description: 'Compiling and linking need the WASIX sysroot to find headers, libc and crt objects.',
	message: 'no sysroot configured',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Set it with -sSYSROOT=<path> or the WASIXCC_SYSROOT environment variable.',
}

export const WXCFG002: DiagnosticDef = {
	code: 'WXCFG002',
	description: 'Boolean settings accept 1/true/yes or 0/false/no, in any letter case.',
	message: 'invalid value "{value}" for {name}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use -s{name}=1 or -s{name}=0.',
}

export const WXCFG003: DiagnosticDef = {
	code: 'WXCFG003',
	description: 'The module kind decides which stages run and how the linker is invoked.',
	message: 'unknown module kind: {value}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use one of static-main, dynamic-main, shared-library or object-file.',
}

export const WXCFG004: DiagnosticDef = {
	code: 'WXCFG004',
	description: 'An inline -s argument names no known setting. It is not passed to the compiler.',
	message: 'unknown setting {name} ignored',
	severity: DiagnosticSeverity.Warning,
}

// =============================================================================
// ARGUMENT ERRORS (WXARG001-099)
// =============================================================================

export const WXARG001: DiagnosticDef = {
	code: 'WXARG001',
	description: 'This flag takes its value from the next argument, but it was the last one.',
	message: 'expected argument after {flag}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a value after {flag}.',
}

export const WXARG002: DiagnosticDef = {
	code: 'WXARG002',
	description: 'Optimization levels are -O0 through -O4, -Os and -Oz.',
	message: 'invalid argument: {flag}',
	severity: DiagnosticSeverity.Error,
}

export const WXARG003: DiagnosticDef = {
	code: 'WXARG003',
	description: 'Debug levels are -g and -g0 through -g3.',
	message: 'invalid argument: {flag}',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// INPUT ERRORS (WXIN001-099, WXKIND001-099)
// =============================================================================

export const WXIN001: DiagnosticDef = {
	code: 'WXIN001',
	description: 'Nothing was given to compile or link.',
	message: 'no input',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass at least one source file, object file or archive.',
}

export const WXKIND001: DiagnosticDef = {
	code: 'WXKIND001',
	description: 'The linker produces executables and shared libraries, never object files.',
	message: 'only binaries can be linked, current module kind is: {kind}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Drop the .o output extension or the object-file module kind.',
}

// =============================================================================
// TOOL ERRORS (WXTOOL001-099)
// =============================================================================

export const WXTOOL001: DiagnosticDef = {
	code: 'WXTOOL001',
	description: 'An underlying tool reported failure; its own output explains why.',
	message: 'command failed with {status}: {command}',
	severity: DiagnosticSeverity.Error,
}

export const WXTOOL002: DiagnosticDef = {
	code: 'WXTOOL002',
	description: 'The tool binary could not be started at all.',
	message: 'failed to run {program}: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check -sLLVM_LOCATION, or that the versioned tools are on PATH.',
}

// =============================================================================
// INTERNAL ERRORS (WXINT001-099)
// =============================================================================

export const WXINT001: DiagnosticDef = {
	code: 'WXINT001',
	description: 'Classification let an object-file module reach the link stage.',
	message: 'internal error: object files can not be linked',
	severity: DiagnosticSeverity.Error,
	suggestion: 'This is a driver bug, please report it with the full command line.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all driver diagnostics.
 */
export const DRIVER_DIAGNOSTICS = {
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
} as const

export type DriverDiagnosticCode = keyof typeof DRIVER_DIAGNOSTICS
