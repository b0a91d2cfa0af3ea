import { WXARG002, WXARG003 } from '@wasixcc/diagnostics'
import { fail } from '../core/errors.ts'
import { COMPILER_FLAGS_WITH_VALUE } from './flag-tables.ts'
import { type BuildSettings, DebugLevel, OptLevel } from './types.ts'

/**
 * What a flag does to driver state.
 */
export type FlagEffect =
	| { readonly kind: 'none' }
	| { readonly kind: 'opt-level'; readonly level: OptLevel }
	| { readonly kind: 'debug-level'; readonly level: DebugLevel }
	| { readonly kind: 'wasm-exceptions'; readonly enabled: boolean }
	| { readonly kind: 'disable-wasm-opt' }

/**
 * Whether a flag stays on the compiler command line.
 * - `forward`: keep the flag
 * - `forward-with-value`: keep the flag and the argument after it
 * - `suppress`: the driver consumed it
 */
export type FlagDisposition = 'forward' | 'forward-with-value' | 'suppress'

export interface FlagInterpretation {
	readonly effect: FlagEffect
	readonly disposition: FlagDisposition
}

const OPT_LEVELS: ReadonlyMap<string, OptLevel> = new Map([
	['0', OptLevel.O0],
	['1', OptLevel.O1],
	['2', OptLevel.O2],
	['3', OptLevel.O3],
	['4', OptLevel.O4],
	['s', OptLevel.Os],
	['z', OptLevel.Oz],
])

const DEBUG_LEVELS: ReadonlyMap<string, DebugLevel> = new Map([
	['', DebugLevel.G2],
	['0', DebugLevel.G0],
	['1', DebugLevel.G1],
	['2', DebugLevel.G2],
	['3', DebugLevel.G3],
])

function forwarded(flag: string, effect: FlagEffect): FlagInterpretation {
	return {
		disposition: COMPILER_FLAGS_WITH_VALUE.has(flag) ? 'forward-with-value' : 'forward',
		effect,
	}
}

/**
 * Interpret one dash-prefixed compiler flag.
 *
 * Optimization and debug levels are read and forwarded. `-fwasm-exceptions`
 * and `--no-wasm-opt` are consumed: the compile stage adds its own
 * exceptions flag, and the compiler has no use for the other.
 * `-fno-wasm-exceptions` is read and forwarded.
 *
 * @throws {DriverError} On an unknown -O or -g suffix
 */
export function interpretFlag(flag: string): FlagInterpretation {
	if (flag.startsWith('-O')) {
		const level = OPT_LEVELS.get(flag.slice(2))
		if (level === undefined) fail(WXARG002, { flag })
		return forwarded(flag, { kind: 'opt-level', level })
	}

	if (flag.startsWith('-g')) {
		const level = DEBUG_LEVELS.get(flag.slice(2))
		if (level === undefined) fail(WXARG003, { flag })
		return forwarded(flag, { kind: 'debug-level', level })
	}

	switch (flag) {
		case '-fwasm-exceptions':
			return { disposition: 'suppress', effect: { enabled: true, kind: 'wasm-exceptions' } }
		case '-fno-wasm-exceptions':
			return forwarded(flag, { enabled: false, kind: 'wasm-exceptions' })
		case '--no-wasm-opt':
			return { disposition: 'suppress', effect: { kind: 'disable-wasm-opt' } }
		default:
			return forwarded(flag, { kind: 'none' })
	}
}

/**
 * Mutable state the classifier threads through {@link applyFlagEffect}.
 */
export interface InterpreterState {
	readonly build: BuildSettings
	wasmExceptions: boolean
}

export function applyFlagEffect(state: InterpreterState, effect: FlagEffect): void {
	switch (effect.kind) {
		case 'none':
			return
		case 'opt-level':
			state.build.optLevel = effect.level
			return
		case 'debug-level':
			state.build.debugLevel = effect.level
			return
		case 'wasm-exceptions':
			state.wasmExceptions = effect.enabled
			return
		case 'disable-wasm-opt':
			state.build.useWasmOpt = false
			return
	}
}
