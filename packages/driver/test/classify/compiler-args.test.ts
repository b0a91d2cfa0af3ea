import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	classifyCompilerArgs,
	isLinkerInputPath,
	splitLinkerForward,
} from '../../src/classify/compiler-args.ts'
import { DebugLevel, OptLevel } from '../../src/classify/types.ts'
import { DriverError } from '../../src/core/errors.ts'
import { ModuleKind } from '../../src/module-kind.ts'

describe('classify/compiler-args', () => {
	describe('splitLinkerForward', () => {
		it('should yield one value without a comma', () => {
			assert.deepStrictEqual(splitLinkerForward('-Wl,a'), ['a'])
		})

		it('should split on the first comma only', () => {
			assert.deepStrictEqual(splitLinkerForward('-Wl,a,b'), ['a', 'b'])
			assert.deepStrictEqual(splitLinkerForward('-Wl,a,b,c'), ['a', 'b,c'])
		})
	})

	describe('isLinkerInputPath', () => {
		it('should recognize objects and archives', () => {
			assert.strictEqual(isLinkerInputPath('lib.o'), true)
			assert.strictEqual(isLinkerInputPath('libfoo.a'), true)
			assert.strictEqual(isLinkerInputPath('main.c'), false)
			assert.strictEqual(isLinkerInputPath('main.cpp'), false)
		})
	})

	describe('classifyCompilerArgs', () => {
		it('should split a mixed command line', () => {
			const result = classifyCompilerArgs(
				[
					'-O2',
					'-g0',
					'-fwasm-exceptions',
					'--no-wasm-opt',
					'-Wl,-foo,bar',
					'-Xlinker',
					'baz',
					'-z',
					'zo',
					'-o',
					'out',
					'in.c',
					'lib.o',
				],
				undefined,
				false
			)

			assert.strictEqual(result.build.optLevel, OptLevel.O2)
			assert.strictEqual(result.build.debugLevel, DebugLevel.G0)
			assert.strictEqual(result.build.useWasmOpt, false)
			assert.strictEqual(result.wasmExceptions, true)
			assert.deepStrictEqual(result.args.compilerArgs, ['-O2', '-g0'])
			assert.deepStrictEqual(result.args.linkerArgs, ['-foo', 'bar', 'baz', '-z', 'zo'])
			assert.strictEqual(result.args.output, 'out')
			assert.deepStrictEqual(result.args.compilerInputs, ['in.c'])
			assert.deepStrictEqual(result.args.linkerInputs, ['lib.o'])
			assert.strictEqual(result.moduleKind, undefined)
		})

		it('should start from default build settings', () => {
			const result = classifyCompilerArgs(['main.c'], undefined, false)
			assert.deepStrictEqual(result.build, {
				debugLevel: DebugLevel.None,
				optLevel: OptLevel.O0,
				useWasmOpt: true,
			})
		})

		it('should forward the value of table flags', () => {
			const result = classifyCompilerArgs(['-I', 'include', '-D', 'X=1', 'a.c'], undefined, false)
			assert.deepStrictEqual(result.args.compilerArgs, ['-I', 'include', '-D', 'X=1'])
			assert.deepStrictEqual(result.args.compilerInputs, ['a.c'])
		})

		it('should not treat a table flag value as an input', () => {
			const result = classifyCompilerArgs(['-include', 'config.h', 'a.c'], undefined, false)
			assert.deepStrictEqual(result.args.compilerInputs, ['a.c'])
		})

		it('should keep duplicates in order', () => {
			const result = classifyCompilerArgs(['-Wall', '-Wall', '-Wl,-x', '-Wl,-x'], undefined, false)
			assert.deepStrictEqual(result.args.compilerArgs, ['-Wall', '-Wall'])
			assert.deepStrictEqual(result.args.linkerArgs, ['-x', '-x'])
		})

		for (const flag of ['-Xlinker', '-z', '-o', '-I']) {
			it(`should fail when ${flag} is the last argument`, () => {
				assert.throws(
					() => classifyCompilerArgs(['main.c', flag], undefined, false),
					(err: Error) => {
						assert.ok(err instanceof DriverError)
						assert.strictEqual(err.code, 'WXARG001')
						assert.strictEqual(err.message, `expected argument after ${flag}`)
						return true
					}
				)
			})
		}

		it('should let settings enable exceptions and flags disable them', () => {
			assert.strictEqual(classifyCompilerArgs([], undefined, true).wasmExceptions, true)
			assert.strictEqual(
				classifyCompilerArgs(['-fno-wasm-exceptions'], undefined, true).wasmExceptions,
				false
			)
		})

		describe('module kind inference', () => {
			it('should infer from the output extension', () => {
				assert.strictEqual(
					classifyCompilerArgs(['-o', 'libx.so'], undefined, false).moduleKind,
					ModuleKind.SharedLibrary
				)
				assert.strictEqual(
					classifyCompilerArgs(['-o', 'x.o'], undefined, false).moduleKind,
					ModuleKind.ObjectFile
				)
				assert.strictEqual(
					classifyCompilerArgs(['-o', 'x.wasm'], undefined, false).moduleKind,
					undefined
				)
			})

			it('should keep an explicit kind', () => {
				const result = classifyCompilerArgs(
					['-c', '-shared', '-Wl,-pie', '-o', 'x.so'],
					ModuleKind.StaticMain,
					false
				)
				assert.strictEqual(result.moduleKind, ModuleKind.StaticMain)
			})

			it('should prefer the output extension over flags', () => {
				const result = classifyCompilerArgs(['-c', '-o', 'libx.so'], undefined, false)
				assert.strictEqual(result.moduleKind, ModuleKind.SharedLibrary)
			})

			it('should infer object files from single-file-only flags', () => {
				assert.strictEqual(
					classifyCompilerArgs(['-E', 'a.c'], undefined, false).moduleKind,
					ModuleKind.ObjectFile
				)
			})

			it('should infer from linker flags', () => {
				assert.strictEqual(
					classifyCompilerArgs(['-Wl,-pie'], undefined, false).moduleKind,
					ModuleKind.DynamicMain
				)
				assert.strictEqual(
					classifyCompilerArgs(['-Xlinker', '-shared'], undefined, false).moduleKind,
					ModuleKind.SharedLibrary
				)
			})

			it('should prefer compiler flags over linker flags', () => {
				const result = classifyCompilerArgs(['-Wl,-pie', '-c'], undefined, false)
				assert.strictEqual(result.moduleKind, ModuleKind.ObjectFile)
			})
		})
	})
})
