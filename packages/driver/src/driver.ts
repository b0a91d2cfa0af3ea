/**
 * Driver entry points: full compile pipeline, link-only and raw tool
 * passthrough.
 */

import { formatDiagnostic, WXCFG004, WXIN001, WXKIND001 } from '@wasixcc/diagnostics'
import { classifyCompilerArgs } from './classify/compiler-args.ts'
import { classifyLinkerArgs } from './classify/linker-args.ts'
import { DebugLevel, OptLevel } from './classify/types.ts'
import { fail } from './core/errors.ts'
import { createLogger, type DriverLogger } from './core/log.ts'
import { isLinkableBinary, ModuleKind } from './module-kind.ts'
import { compileInputs, compilerPath } from './pipeline/compile.ts'
import type { BuildContext } from './pipeline/context.ts'
import { linkInputs } from './pipeline/link.ts'
import { runOptimizer } from './pipeline/optimize.ts'
import { type Environment, SettingsSource, separateSettingsArgs } from './settings/source.ts'
import {
	requireSysroot,
	resolveToolchainLocation,
	resolveUserSettings,
	toolPath,
	unknownSettingNames,
} from './settings/user-settings.ts'
import { createSpawnRunner, type ToolRunner } from './tools/invoke.ts'
import { withTempDir } from './tools/temp-dir.ts'

/**
 * Options shared by all entry points.
 */
export interface DriverOptions {
	/** Environment snapshot for WASIXCC_* settings and WASIXCC_LOG */
	env: Environment
	/** Defaults to spawning real processes */
	runner?: ToolRunner
	/** Defaults to the cliui logger filtered by WASIXCC_LOG */
	logger?: DriverLogger
}

interface ResolvedOptions {
	runner: ToolRunner
	logger: DriverLogger
}

function resolveOptions(options: DriverOptions): ResolvedOptions {
	const logger = options.logger ?? createLogger(options.env)
	return { logger, runner: options.runner ?? createSpawnRunner(logger) }
}

function warnUnknownSettings(settingsArgs: readonly string[], logger: DriverLogger): void {
	for (const name of unknownSettingNames(settingsArgs)) {
		logger.warning(formatDiagnostic(WXCFG004, { name }))
	}
}

/**
 * Compile and, for linkable kinds, link and optimize.
 *
 * With no inputs at all the arguments go to clang unchanged, which keeps
 * invocations such as `wasixcc -dumpmachine` working.
 *
 * @param argv - Arguments after the program name
 * @param cxx - Run as the C++ driver
 * @throws {DriverError} On any settings, argument, input or tool failure
 */
export function runCompiler(argv: readonly string[], cxx: boolean, options: DriverOptions): void {
	const { logger, runner } = resolveOptions(options)
	logger.info('Starting in compiler mode')

	const { settingsArgs, pipelineArgs } = separateSettingsArgs(argv)
	warnUnknownSettings(settingsArgs, logger)
	const user = resolveUserSettings(settingsArgs, options.env)
	const classified = classifyCompilerArgs(pipelineArgs, user.moduleKind, user.wasmExceptions)
	logger.info(`Compiler settings: ${JSON.stringify(user)}`)

	const { args } = classified
	if (args.compilerInputs.length === 0 && args.linkerInputs.length === 0) {
		runner.run({ args: pipelineArgs, program: compilerPath(user.toolchain, cxx) })
		return
	}

	const ctx: BuildContext = {
		args,
		build: classified.build,
		cxx,
		includeCppStd: user.includeCppStd ?? cxx,
		logger,
		moduleKind: classified.moduleKind ?? ModuleKind.StaticMain,
		runner,
		sysroot: requireSysroot(user),
		user,
		wasmExceptions: classified.wasmExceptions,
	}

	withTempDir((tempDir) => {
		compileInputs(ctx, tempDir)

		if (!isLinkableBinary(ctx.moduleKind)) return
		linkInputs(ctx)

		if (ctx.build.useWasmOpt || user.forceWasmOpt) {
			runOptimizer(ctx)
		}
	})

	logger.info('Done')
}

/**
 * Link already-built objects and archives, then optimize only when
 * FORCE_WASM_OPT is set: there are no compiler flags to take an
 * optimization level from.
 *
 * @throws {DriverError} On any settings, argument, input or tool failure
 */
export function runLinker(argv: readonly string[], options: DriverOptions): void {
	const { logger, runner } = resolveOptions(options)
	logger.info('Starting in linker mode')

	const { settingsArgs, pipelineArgs } = separateSettingsArgs(argv)
	warnUnknownSettings(settingsArgs, logger)
	const user = resolveUserSettings(settingsArgs, options.env)
	const classified = classifyLinkerArgs(pipelineArgs, user.moduleKind)
	const moduleKind = classified.moduleKind ?? ModuleKind.StaticMain

	if (!isLinkableBinary(moduleKind)) {
		fail(WXKIND001, { kind: moduleKind })
	}

	logger.info(`Linker settings: ${JSON.stringify(user)}`)

	if (classified.args.linkerInputs.length === 0) {
		fail(WXIN001)
	}

	const ctx: BuildContext = {
		args: classified.args,
		build: { debugLevel: DebugLevel.None, optLevel: OptLevel.O0, useWasmOpt: user.forceWasmOpt },
		cxx: false,
		includeCppStd: user.includeCppStd ?? false,
		logger,
		moduleKind,
		runner,
		sysroot: requireSysroot(user),
		user,
		wasmExceptions: user.wasmExceptions,
	}

	linkInputs(ctx)

	if (ctx.build.useWasmOpt) {
		runOptimizer(ctx)
	}

	logger.info('Done')
}

/**
 * LLVM binary utilities reachable through the driver.
 */
export const PassthroughTool = {
	Ar: 'llvm-ar',
	Nm: 'llvm-nm',
	Ranlib: 'llvm-ranlib',
} as const

export type PassthroughTool = (typeof PassthroughTool)[keyof typeof PassthroughTool]

/**
 * Run an LLVM utility with the arguments unchanged. Only the toolchain
 * location is resolved; no sysroot is needed.
 */
export function runPassthrough(
	tool: PassthroughTool,
	argv: readonly string[],
	options: DriverOptions
): void {
	const { runner } = resolveOptions(options)
	const source = new SettingsSource(separateSettingsArgs(argv).settingsArgs, options.env)
	runner.run({ args: argv, program: toolPath(resolveToolchainLocation(source), tool) })
}
