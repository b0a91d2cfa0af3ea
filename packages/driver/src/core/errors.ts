import {
	type DiagnosticArgs,
	type DiagnosticDef,
	interpolateMessage,
	WXINT001,
} from '@wasixcc/diagnostics'

/**
 * A user-facing failure: bad settings, bad arguments, missing input or a
 * failed subprocess. Always terminal for the invocation.
 */
export class DriverError extends Error {
	readonly def: DiagnosticDef
	readonly args: DiagnosticArgs | undefined

	constructor(def: DiagnosticDef, args?: DiagnosticArgs) {
		super(interpolateMessage(def.message, args))
		this.name = 'DriverError'
		this.def = def
		this.args = args
	}

	get code(): string {
		return this.def.code
	}
}

/**
 * A broken contract between driver stages. Never caused by user input.
 */
export class InternalError extends Error {
	readonly def: DiagnosticDef = WXINT001

	constructor() {
		super(WXINT001.message)
		this.name = 'InternalError'
	}
}

/**
 * Throws a driver error for the given diagnostic.
 */
export function fail(def: DiagnosticDef, args?: DiagnosticArgs): never {
	throw new DriverError(def, args)
}
