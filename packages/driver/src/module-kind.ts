import { extname } from 'node:path'

/**
 * The kind of artifact a driver invocation produces.
 *
 * Values double as the names accepted by the MODULE_KIND setting.
 */
export const ModuleKind = {
	/** Executable whose imports are resolved at link time. */
	StaticMain: 'static-main',
	/** Position-independent executable that loads shared libraries at run time. */
	DynamicMain: 'dynamic-main',
	SharedLibrary: 'shared-library',
	ObjectFile: 'object-file',
} as const

export type ModuleKind = (typeof ModuleKind)[keyof typeof ModuleKind]

const MODULE_KINDS: readonly ModuleKind[] = Object.values(ModuleKind)

export function isModuleKind(value: string): value is ModuleKind {
	return MODULE_KINDS.some((kind) => kind === value)
}

export function requiresPositionIndependentCode(kind: ModuleKind): boolean {
	switch (kind) {
		case ModuleKind.DynamicMain:
		case ModuleKind.SharedLibrary:
			return true
		case ModuleKind.StaticMain:
		case ModuleKind.ObjectFile:
			return false
	}
}

export function isLinkableBinary(kind: ModuleKind): boolean {
	switch (kind) {
		case ModuleKind.StaticMain:
		case ModuleKind.DynamicMain:
		case ModuleKind.SharedLibrary:
			return true
		case ModuleKind.ObjectFile:
			return false
	}
}

export function isExecutable(kind: ModuleKind): boolean {
	switch (kind) {
		case ModuleKind.StaticMain:
		case ModuleKind.DynamicMain:
			return true
		case ModuleKind.SharedLibrary:
		case ModuleKind.ObjectFile:
			return false
	}
}

/**
 * Kind implied by an output file name, if any. Only `.o` and `.so` say
 * anything; other extensions leave the decision to later rules.
 */
export function moduleKindFromOutputPath(path: string): ModuleKind | undefined {
	switch (extname(path)) {
		case '.o':
			return ModuleKind.ObjectFile
		case '.so':
			return ModuleKind.SharedLibrary
		default:
			return undefined
	}
}

/**
 * Kind implied by forwarded compiler flags: `-shared` builds a shared
 * library, `-c`/`-S`/`-E` stop before linking. First match wins.
 */
export function moduleKindFromCompilerFlags(flags: readonly string[]): ModuleKind | undefined {
	for (const flag of flags) {
		if (flag === '-shared') return ModuleKind.SharedLibrary
		if (flag === '-c' || flag === '-S' || flag === '-E') return ModuleKind.ObjectFile
	}
	return undefined
}

/**
 * Kind implied by forwarded linker flags: `-shared` or `-pie`. First match wins.
 */
export function moduleKindFromLinkerFlags(flags: readonly string[]): ModuleKind | undefined {
	for (const flag of flags) {
		if (flag === '-shared') return ModuleKind.SharedLibrary
		if (flag === '-pie') return ModuleKind.DynamicMain
	}
	return undefined
}

export function defaultOutputPath(kind: ModuleKind): string {
	return isLinkableBinary(kind) ? 'a.out' : 'a.o'
}
