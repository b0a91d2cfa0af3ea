import { basename, join } from 'node:path'
import { DebugLevel } from '../classify/types.ts'
import { isLinkableBinary, requiresPositionIndependentCode } from '../module-kind.ts'
import { type ToolchainLocation, toolPath } from '../settings/user-settings.ts'
import { type BuildContext, outputPath } from './context.ts'

export const WASIX_TARGET = 'wasm32-wasi'

export function compilerPath(toolchain: ToolchainLocation, cxx: boolean): string {
	return toolPath(toolchain, cxx ? 'clang++' : 'clang')
}

/**
 * Flags shared by every compiler invocation: target and thread model,
 * user extras, then the flags that depend on settings and module kind,
 * and last the forwarded user flags so they can override ours.
 */
export function compilerPrefix(ctx: BuildContext): string[] {
	const args = [
		'--sysroot',
		ctx.sysroot,
		`--target=${WASIX_TARGET}`,
		'-c',
		'-matomics',
		'-mbulk-memory',
		'-mmutable-globals',
		'-pthread',
		'-mthread-model',
		'posix',
		'-fno-trapping-math',
		'-D_WASI_EMULATED_MMAN',
		'-D_WASI_EMULATED_SIGNAL',
		'-D_WASI_EMULATED_PROCESS_CLOCKS',
		...ctx.user.extraCompilerFlags,
	]

	if (ctx.wasmExceptions) {
		args.push('-fwasm-exceptions')
	}

	if (requiresPositionIndependentCode(ctx.moduleKind) || ctx.user.pic) {
		args.push('-fPIC', '-ftls-model=global-dynamic', '-fvisibility=default')
	} else {
		args.push('-ftls-model=local-exec')
	}

	// C++ exceptions aren't supported on WASIX yet
	if (ctx.cxx) {
		args.push('-fno-exceptions')
	}

	if (ctx.build.debugLevel !== DebugLevel.None) {
		args.push('-g')
	}

	args.push(...ctx.args.compilerArgs)
	return args
}

/**
 * Names per-source object files. Sources sharing a base name get
 * increasing counters: `main.c.0.o`, `main.c.1.o`.
 */
export class ObjectFileNamer {
	private readonly counters: Map<string, number> = new Map()

	next(input: string): string {
		const name = basename(input) || 'output'
		const counter = this.counters.get(name) ?? 0
		this.counters.set(name, counter + 1)
		return `${name}.${counter}.o`
	}
}

/**
 * Compile stage. For linkable kinds each source becomes its own object in
 * `tempDir`, appended to the linker inputs; otherwise all sources go to one
 * invocation writing the final output.
 */
export function compileInputs(ctx: BuildContext, tempDir: string): void {
	const inputs = ctx.args.compilerInputs
	if (inputs.length === 0) return

	const program = compilerPath(ctx.user.toolchain, ctx.cxx)
	const prefix = compilerPrefix(ctx)

	if (!isLinkableBinary(ctx.moduleKind)) {
		ctx.runner.run({ args: [...prefix, ...inputs, '-o', outputPath(ctx)], program })
		return
	}

	const namer = new ObjectFileNamer()
	for (const input of inputs) {
		const objectPath = join(tempDir, namer.next(input))
		ctx.args.linkerInputs.push(objectPath)
		ctx.runner.run({ args: [...prefix, input, '-o', objectPath], program })
	}
}
