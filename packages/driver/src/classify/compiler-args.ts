import { WXARG001 } from '@wasixcc/diagnostics'
import { fail } from '../core/errors.ts'
import {
	type ModuleKind,
	moduleKindFromCompilerFlags,
	moduleKindFromLinkerFlags,
	moduleKindFromOutputPath,
} from '../module-kind.ts'
import { applyFlagEffect, type InterpreterState, interpretFlag } from './build-settings.ts'
import {
	type CompilerClassification,
	createBuildSettings,
	createClassifiedArguments,
} from './types.ts'

const LINKER_FORWARD_PREFIX = '-Wl,'

/**
 * Walks an argument list once, left to right.
 */
export class ArgumentCursor {
	private readonly args: readonly string[]
	private position = 0

	constructor(args: readonly string[]) {
		this.args = args
	}

	next(): string | undefined {
		const arg = this.args[this.position]
		if (arg !== undefined) this.position++
		return arg
	}

	/**
	 * The argument following `flag`.
	 * @throws {DriverError} If `flag` was the last argument
	 */
	valueFor(flag: string): string {
		const value = this.next()
		if (value === undefined) fail(WXARG001, { flag })
		return value
	}
}

export function isLinkerInputPath(path: string): boolean {
	return path.endsWith('.o') || path.endsWith('.a')
}

/**
 * Split `-Wl,a` into `[a]` and `-Wl,a,b` into `[a, b]`. Only the first
 * comma separates; `-Wl,a,b,c` yields `[a, b,c]`.
 */
export function splitLinkerForward(arg: string): string[] {
	const rest = arg.slice(LINKER_FORWARD_PREFIX.length)
	const comma = rest.indexOf(',')
	return comma === -1 ? [rest] : [rest.slice(0, comma), rest.slice(comma + 1)]
}

/**
 * Classify a compiler-driver command line (inline settings already removed).
 *
 * @param args - Pipeline arguments
 * @param moduleKind - Explicit module kind from settings; never overridden
 * @param wasmExceptions - Exceptions setting before flags are applied
 */
export function classifyCompilerArgs(
	args: readonly string[],
	moduleKind: ModuleKind | undefined,
	wasmExceptions: boolean
): CompilerClassification {
	const result = createClassifiedArguments()
	const state: InterpreterState = { build: createBuildSettings(), wasmExceptions }
	let kind = moduleKind

	const cursor = new ArgumentCursor(args)
	for (let arg = cursor.next(); arg !== undefined; arg = cursor.next()) {
		if (arg.startsWith(LINKER_FORWARD_PREFIX)) {
			result.linkerArgs.push(...splitLinkerForward(arg))
		} else if (arg === '-Xlinker') {
			result.linkerArgs.push(cursor.valueFor(arg))
		} else if (arg === '-z') {
			result.linkerArgs.push(arg, cursor.valueFor(arg))
		} else if (arg === '-o') {
			result.output = cursor.valueFor(arg)
			kind ??= moduleKindFromOutputPath(result.output)
		} else if (arg.startsWith('-')) {
			const { disposition, effect } = interpretFlag(arg)
			applyFlagEffect(state, effect)
			if (disposition !== 'suppress') result.compilerArgs.push(arg)
			if (disposition === 'forward-with-value') result.compilerArgs.push(cursor.valueFor(arg))
		} else if (isLinkerInputPath(arg)) {
			result.linkerInputs.push(arg)
		} else {
			result.compilerInputs.push(arg)
		}
	}

	kind ??= moduleKindFromCompilerFlags(result.compilerArgs)
	kind ??= moduleKindFromLinkerFlags(result.linkerArgs)

	return {
		args: result,
		build: state.build,
		moduleKind: kind,
		wasmExceptions: state.wasmExceptions,
	}
}
