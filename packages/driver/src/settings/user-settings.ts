import { join } from 'node:path'
import { WXCFG001 } from '@wasixcc/diagnostics'
import { fail } from '../core/errors.ts'
import type { ModuleKind } from '../module-kind.ts'
import { type Environment, SettingsSource, settingArgName } from './source.ts'
import { parseList, readBooleanSetting, readModuleKindSetting } from './values.ts'

/**
 * Setting names, as used after `-s` and after the `WASIXCC_` prefix.
 */
export const SettingName = {
	/** Older name of INCLUDE_CPP_STD, read when that one is unset */
	CppStd: 'CPPSTD',
	ExtraCompilerFlags: 'EXTRA_COMPILER_FLAGS',
	ExtraLinkerFlags: 'EXTRA_LINKER_FLAGS',
	ForceWasmOpt: 'FORCE_WASM_OPT',
	IncludeCppStd: 'INCLUDE_CPP_STD',
	LlvmLocation: 'LLVM_LOCATION',
	ModuleKind: 'MODULE_KIND',
	Pic: 'PIC',
	Sysroot: 'SYSROOT',
	WasmExceptions: 'WASM_EXCEPTIONS',
	WasmOptFlags: 'WASM_OPT_FLAGS',
} as const

export type SettingName = (typeof SettingName)[keyof typeof SettingName]

const KNOWN_SETTINGS: ReadonlySet<string> = new Set(Object.values(SettingName))

/**
 * Names of inline settings that no setting reads, in argument order.
 */
export function unknownSettingNames(settingsArgs: readonly string[]): string[] {
	return settingsArgs.map(settingArgName).filter((name) => !KNOWN_SETTINGS.has(name))
}

/** Version suffix of the system LLVM tools used when no location is set. */
export const DEFAULT_LLVM_VERSION = 20

/**
 * Where the LLVM tools live.
 * - `directory`: an explicit directory of unsuffixed binaries
 * - `system`: PATH lookup of `<tool>-<version>`
 */
export type ToolchainLocation =
	| { readonly kind: 'directory'; readonly directory: string }
	| { readonly kind: 'system'; readonly versionSuffix: number }

export function toolPath(location: ToolchainLocation, tool: string): string {
	switch (location.kind) {
		case 'directory':
			return join(location.directory, tool)
		case 'system':
			return `${tool}-${location.versionSuffix}`
	}
}

/**
 * Settings provided through `-s` flags or the environment. Some can be
 * overridden by compiler flags; `-fno-wasm-exceptions` takes priority
 * over `-sWASM_EXCEPTIONS=1`.
 */
export interface UserSettings {
	readonly toolchain: ToolchainLocation
	readonly sysroot: string | undefined
	readonly extraCompilerFlags: readonly string[]
	readonly extraLinkerFlags: readonly string[]
	readonly forceWasmOpt: boolean
	readonly wasmOptFlags: readonly string[]
	/** Explicit kind; inference only fills this in when absent */
	readonly moduleKind: ModuleKind | undefined
	readonly wasmExceptions: boolean
	/** Compile with -fPIC even when the module kind does not need it */
	readonly pic: boolean
	/** Link libc++ and libc++abi; unset means "if this is a C++ invocation" */
	readonly includeCppStd: boolean | undefined
}

function readBoolean(source: SettingsSource, name: SettingName, fallback: boolean): boolean {
	const value = source.get(name)
	return value === undefined ? fallback : readBooleanSetting(name, value)
}

function readList(source: SettingsSource, name: SettingName): string[] {
	const value = source.get(name)
	return value === undefined ? [] : parseList(value)
}

function readIncludeCppStd(source: SettingsSource): boolean | undefined {
	for (const name of [SettingName.IncludeCppStd, SettingName.CppStd]) {
		const value = source.get(name)
		if (value !== undefined) return readBooleanSetting(name, value)
	}
	return undefined
}

export function resolveToolchainLocation(source: SettingsSource): ToolchainLocation {
	const directory = source.get(SettingName.LlvmLocation)
	return directory === undefined
		? { kind: 'system', versionSuffix: DEFAULT_LLVM_VERSION }
		: { directory, kind: 'directory' }
}

/**
 * Build the typed settings from inline settings arguments and an
 * environment snapshot. Malformed values fail here, before anything runs.
 */
export function resolveUserSettings(
	settingsArgs: readonly string[],
	env: Environment
): UserSettings {
	const source = new SettingsSource(settingsArgs, env)

	const moduleKind = source.get(SettingName.ModuleKind)

	return {
		extraCompilerFlags: readList(source, SettingName.ExtraCompilerFlags),
		extraLinkerFlags: readList(source, SettingName.ExtraLinkerFlags),
		forceWasmOpt: readBoolean(source, SettingName.ForceWasmOpt, false),
		includeCppStd: readIncludeCppStd(source),
		moduleKind: moduleKind === undefined ? undefined : readModuleKindSetting(moduleKind),
		pic: readBoolean(source, SettingName.Pic, false),
		sysroot: source.get(SettingName.Sysroot),
		toolchain: resolveToolchainLocation(source),
		wasmExceptions: readBoolean(source, SettingName.WasmExceptions, false),
		wasmOptFlags: readList(source, SettingName.WasmOptFlags),
	}
}

/**
 * The sysroot, for stages that compile or link.
 */
export function requireSysroot(settings: UserSettings): string {
	if (settings.sysroot === undefined || settings.sysroot === '') {
		fail(WXCFG001)
	}
	return settings.sysroot
}
