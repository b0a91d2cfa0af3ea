import { join } from 'node:path'
import { InternalError } from '../core/errors.ts'
import {
	isExecutable,
	ModuleKind,
	requiresPositionIndependentCode,
} from '../module-kind.ts'
import { toolPath } from '../settings/user-settings.ts'
import { type BuildContext, outputPath } from './context.ts'

export const LINKER = 'wasm-ld'

// TODO: make the memory limit and main stack size configurable settings
export const MAX_MEMORY = 4294967296
export const STACK_SIZE = 8388608

const SHARED_FEATURES = [
	'--extra-features=atomics',
	'--extra-features=bulk-memory',
	'--extra-features=mutable-globals',
	'--shared-memory',
	`--max-memory=${MAX_MEMORY}`,
	'--import-memory',
	'--export-dynamic',
	'--export=__wasm_call_ctors',
]

const TLS_EXPORTS = [
	'--export=__wasm_init_tls',
	'--export=__wasm_signal',
	'--export=__tls_size',
	'--export=__tls_align',
	'--export=__tls_base',
]

const EXECUTABLE_EXPORTS = [
	'--export-if-defined=__stack_pointer',
	'--export-if-defined=__heap_base',
	'--export-if-defined=__data_end',
]

// libclang_rt is linked into libc, so it is not listed here
const BASE_LIBRARIES = [
	'-lwasi-emulated-mman',
	'-lc',
	'-lresolv',
	'-lrt',
	'-lm',
	'-lpthread',
	'-lutil',
]

const CPP_LIBRARIES = ['-lc++', '-lc++abi']

function kindFlags(kind: ModuleKind): string[] {
	switch (kind) {
		case ModuleKind.StaticMain:
			return ['-z', `stack-size=${STACK_SIZE}`]
		case ModuleKind.DynamicMain:
			return ['-pie', '-lcommon-tag-stubs']
		case ModuleKind.SharedLibrary:
			return ['-shared', '--no-entry', '--unresolved-symbols=import-dynamic']
		case ModuleKind.ObjectFile:
			throw new InternalError()
	}
}

/**
 * Full linker argument list for the context's module kind.
 *
 * @throws {InternalError} For object files, which never reach the linker
 */
export function linkerArgs(ctx: BuildContext): string[] {
	const kind = ctx.moduleKind
	const libDir = join(ctx.sysroot, 'lib')
	const targetLibDir = join(libDir, 'wasm32-wasi')

	const args = [...ctx.args.linkerArgs, ...SHARED_FEATURES, ...ctx.user.extraLinkerFlags]

	if (ctx.wasmExceptions) {
		args.push('-mllvm', '--wasm-enable-sjlj')
	}

	args.push(...TLS_EXPORTS)

	if (isExecutable(kind)) {
		args.push(...EXECUTABLE_EXPORTS)
	}

	if (kind === ModuleKind.DynamicMain) {
		args.push('--whole-archive', '--export-all')
	}

	if (isExecutable(kind)) {
		args.push(`-L${libDir}`, `-L${targetLibDir}`, ...BASE_LIBRARIES)
		if (ctx.includeCppStd) {
			args.push(...CPP_LIBRARIES)
		}
	}

	if (kind === ModuleKind.DynamicMain) {
		args.push('--no-whole-archive')
	}

	if (requiresPositionIndependentCode(kind)) {
		args.push('--experimental-pic', '--export-if-defined=__wasm_apply_data_relocs')
	}

	args.push(...kindFlags(kind))
	args.push(...ctx.args.linkerInputs)
	args.push(join(targetLibDir, isExecutable(kind) ? 'crt1.o' : 'scrt1.o'))
	args.push('-o', outputPath(ctx))

	return args
}

/**
 * Link stage.
 */
export function linkInputs(ctx: BuildContext): void {
	ctx.runner.run({ args: linkerArgs(ctx), program: toolPath(ctx.user.toolchain, LINKER) })
}
