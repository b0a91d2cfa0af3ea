import type { BuildSettings, ClassifiedArguments } from '../classify/types.ts'
import type { DriverLogger } from '../core/log.ts'
import { defaultOutputPath, type ModuleKind } from '../module-kind.ts'
import type { UserSettings } from '../settings/user-settings.ts'
import type { ToolRunner } from '../tools/invoke.ts'

/**
 * Everything the pipeline stages read. Built once per invocation after
 * classification; only `args.linkerInputs` grows afterwards.
 */
export interface BuildContext {
	readonly user: UserSettings
	readonly sysroot: string
	readonly build: BuildSettings
	readonly args: ClassifiedArguments
	readonly moduleKind: ModuleKind
	/** Settings value with -f[no-]wasm-exceptions applied */
	readonly wasmExceptions: boolean
	/** Invoked as the C++ driver */
	readonly cxx: boolean
	readonly includeCppStd: boolean
	readonly runner: ToolRunner
	readonly logger: DriverLogger
}

export function outputPath(ctx: BuildContext): string {
	return ctx.args.output ?? defaultOutputPath(ctx.moduleKind)
}
