import type { ModuleKind } from '../module-kind.ts'

export const OptLevel = {
	O0: 'O0',
	O1: 'O1',
	O2: 'O2',
	O3: 'O3',
	O4: 'O4',
	Os: 'Os',
	Oz: 'Oz',
} as const

export type OptLevel = (typeof OptLevel)[keyof typeof OptLevel]

/**
 * Debug info level. `None` means no -g flag was seen at all, which is
 * different from an explicit `-g0`.
 */
export const DebugLevel = {
	G0: 'G0',
	G1: 'G1',
	G2: 'G2',
	G3: 'G3',
	None: 'None',
} as const

export type DebugLevel = (typeof DebugLevel)[keyof typeof DebugLevel]

/**
 * Settings derived strictly from compiler flags.
 */
export interface BuildSettings {
	optLevel: OptLevel
	debugLevel: DebugLevel
	useWasmOpt: boolean
}

export function createBuildSettings(): BuildSettings {
	return {
		debugLevel: DebugLevel.None,
		optLevel: OptLevel.O0,
		useWasmOpt: true,
	}
}

/**
 * The argument list split by destination.
 */
export interface ClassifiedArguments {
	readonly compilerArgs: string[]
	readonly linkerArgs: string[]
	readonly compilerInputs: string[]
	/** Objects and archives; the compile stage appends its outputs here */
	readonly linkerInputs: string[]
	output: string | undefined
}

export function createClassifiedArguments(): ClassifiedArguments {
	return {
		compilerArgs: [],
		compilerInputs: [],
		linkerArgs: [],
		linkerInputs: [],
		output: undefined,
	}
}

/**
 * Result of classifying a compiler command line. Settings that flags can
 * override are returned here rather than written back into UserSettings.
 */
export interface CompilerClassification {
	readonly args: ClassifiedArguments
	readonly build: BuildSettings
	readonly moduleKind: ModuleKind | undefined
	readonly wasmExceptions: boolean
}

export interface LinkerClassification {
	readonly args: ClassifiedArguments
	readonly moduleKind: ModuleKind | undefined
}
