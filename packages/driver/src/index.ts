/**
 * @wasixcc/driver
 *
 * Translates C/C++ compiler and linker command lines into the clang,
 * wasm-ld and wasm-opt invocations that build WASIX modules.
 */

export {
	applyFlagEffect,
	type FlagDisposition,
	type FlagEffect,
	type FlagInterpretation,
	interpretFlag,
} from './classify/build-settings.ts'
export {
	ArgumentCursor,
	classifyCompilerArgs,
	isLinkerInputPath,
	splitLinkerForward,
} from './classify/compiler-args.ts'
export { COMPILER_FLAGS_WITH_VALUE, LINKER_FLAGS_WITH_VALUE } from './classify/flag-tables.ts'
export { classifyLinkerArgs } from './classify/linker-args.ts'
export {
	type BuildSettings,
	type ClassifiedArguments,
	type CompilerClassification,
	createBuildSettings,
	DebugLevel,
	type LinkerClassification,
	OptLevel,
} from './classify/types.ts'
export { DriverError, InternalError } from './core/errors.ts'
export {
	createLogger,
	type DriverLogger,
	LOG_ENV_VAR,
	type LogLevel,
	resolveLogLevel,
	silentLogger,
} from './core/log.ts'
export {
	type DriverOptions,
	PassthroughTool,
	runCompiler,
	runLinker,
	runPassthrough,
} from './driver.ts'
export {
	defaultOutputPath,
	isExecutable,
	isLinkableBinary,
	isModuleKind,
	ModuleKind,
	moduleKindFromCompilerFlags,
	moduleKindFromLinkerFlags,
	moduleKindFromOutputPath,
	requiresPositionIndependentCode,
} from './module-kind.ts'
export {
	compileInputs,
	compilerPath,
	compilerPrefix,
	ObjectFileNamer,
	WASIX_TARGET,
} from './pipeline/compile.ts'
export { type BuildContext, outputPath } from './pipeline/context.ts'
export { LINKER, linkerArgs, linkInputs, MAX_MEMORY, STACK_SIZE } from './pipeline/link.ts'
export { OPTIMIZER, optimizerArgs, runOptimizer } from './pipeline/optimize.ts'
export {
	type Environment,
	isSettingArg,
	SETTING_ARG_PREFIX,
	SETTING_ENV_PREFIX,
	type SeparatedArgs,
	SettingsSource,
	separateSettingsArgs,
	settingArgName,
} from './settings/source.ts'
export {
	DEFAULT_LLVM_VERSION,
	requireSysroot,
	resolveToolchainLocation,
	resolveUserSettings,
	SettingName,
	type ToolchainLocation,
	toolPath,
	type UserSettings,
	unknownSettingNames,
} from './settings/user-settings.ts'
export { formatList, LIST_DELIMITER, parseBoolean, parseList } from './settings/values.ts'
export {
	createSpawnRunner,
	formatCommand,
	type ToolCommand,
	type ToolRunner,
} from './tools/invoke.ts'
export { withTempDir } from './tools/temp-dir.ts'
