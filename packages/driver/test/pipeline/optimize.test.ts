import assert from 'node:assert'
import { describe, it } from 'node:test'
import { createClassifiedArguments, DebugLevel, OptLevel } from '../../src/classify/types.ts'
import { optimizerArgs, runOptimizer } from '../../src/pipeline/optimize.ts'
import { buildContext, RecordingLogger, RecordingRunner, userSettings } from '../helpers.ts'

function withOutput(output: string) {
	const args = createClassifiedArguments()
	args.output = output
	return args
}

describe('pipeline/optimize', () => {
	describe('optimizerArgs', () => {
		it('should translate the optimization level', () => {
			const ctx = buildContext({
				args: withOutput('app.wasm'),
				build: { debugLevel: DebugLevel.None, optLevel: OptLevel.Oz, useWasmOpt: true },
			})
			assert.deepStrictEqual(optimizerArgs(ctx), ['-Oz', 'app.wasm', '-o', 'app.wasm'])
		})

		it('should return undefined when there is nothing to do', () => {
			assert.strictEqual(optimizerArgs(buildContext()), undefined)
		})

		it('should not count -g as something to do', () => {
			const ctx = buildContext({
				build: { debugLevel: DebugLevel.G3, optLevel: OptLevel.O0, useWasmOpt: true },
			})
			assert.strictEqual(optimizerArgs(ctx), undefined)
		})

		it('should combine exceptions, level, user flags and debug info', () => {
			const ctx = buildContext({
				build: { debugLevel: DebugLevel.G1, optLevel: OptLevel.O2, useWasmOpt: true },
				user: userSettings({ wasmOptFlags: ['--asyncify'] }),
				wasmExceptions: true,
			})
			assert.deepStrictEqual(optimizerArgs(ctx), [
				'--experimental-new-eh',
				'-O2',
				'--asyncify',
				'-g',
				'a.out',
				'-o',
				'a.out',
			])
		})

		it('should drop debug info at -g0', () => {
			const ctx = buildContext({
				build: { debugLevel: DebugLevel.G0, optLevel: OptLevel.O1, useWasmOpt: true },
			})
			assert.deepStrictEqual(optimizerArgs(ctx), ['-O1', 'a.out', '-o', 'a.out'])
		})
	})

	describe('runOptimizer', () => {
		it('should run wasm-opt from PATH', () => {
			const runner = new RecordingRunner()
			const ctx = buildContext({
				build: { debugLevel: DebugLevel.None, optLevel: OptLevel.O3, useWasmOpt: true },
				runner,
			})
			runOptimizer(ctx)
			assert.deepStrictEqual(runner.commands, [
				{ args: ['-O3', 'a.out', '-o', 'a.out'], program: 'wasm-opt' },
			])
		})

		it('should skip with a note when there are no passes', () => {
			const runner = new RecordingRunner()
			const logger = new RecordingLogger()
			runOptimizer(buildContext({ logger, runner }))
			assert.deepStrictEqual(runner.commands, [])
			assert.deepStrictEqual(logger.messages, [
				'info: Skipping wasm-opt as no passes were specified or needed',
			])
		})
	})
})
