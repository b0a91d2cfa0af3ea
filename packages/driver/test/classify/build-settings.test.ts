import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	applyFlagEffect,
	type InterpreterState,
	interpretFlag,
} from '../../src/classify/build-settings.ts'
import { createBuildSettings, DebugLevel, OptLevel } from '../../src/classify/types.ts'

function freshState(): InterpreterState {
	return { build: createBuildSettings(), wasmExceptions: false }
}

function apply(state: InterpreterState, flag: string): void {
	applyFlagEffect(state, interpretFlag(flag).effect)
}

describe('classify/build-settings', () => {
	describe('interpretFlag', () => {
		it('should read and forward optimization levels', () => {
			assert.deepStrictEqual(interpretFlag('-O3'), {
				disposition: 'forward',
				effect: { kind: 'opt-level', level: OptLevel.O3 },
			})
			assert.deepStrictEqual(interpretFlag('-Oz').effect, { kind: 'opt-level', level: OptLevel.Oz })
		})

		it('should reject unknown optimization levels', () => {
			assert.throws(() => interpretFlag('-O5'), { message: 'invalid argument: -O5' })
			assert.throws(() => interpretFlag('-Ofast'), { name: 'DriverError' })
			assert.throws(() => interpretFlag('-OtoString'), { message: 'invalid argument: -OtoString' })
			assert.throws(() => interpretFlag('-O__proto__'), { name: 'DriverError' })
		})

		it('should read and forward debug levels', () => {
			assert.deepStrictEqual(interpretFlag('-g'), {
				disposition: 'forward',
				effect: { kind: 'debug-level', level: DebugLevel.G2 },
			})
			assert.deepStrictEqual(interpretFlag('-g0').effect, {
				kind: 'debug-level',
				level: DebugLevel.G0,
			})
		})

		it('should reject unknown debug levels', () => {
			assert.throws(() => interpretFlag('-g4'), { message: 'invalid argument: -g4' })
			assert.throws(() => interpretFlag('-ggdb'), { name: 'DriverError' })
			assert.throws(() => interpretFlag('-gconstructor'), {
				message: 'invalid argument: -gconstructor',
			})
		})

		it('should consume -fwasm-exceptions', () => {
			assert.deepStrictEqual(interpretFlag('-fwasm-exceptions'), {
				disposition: 'suppress',
				effect: { enabled: true, kind: 'wasm-exceptions' },
			})
		})

		it('should forward -fno-wasm-exceptions', () => {
			assert.deepStrictEqual(interpretFlag('-fno-wasm-exceptions'), {
				disposition: 'forward',
				effect: { enabled: false, kind: 'wasm-exceptions' },
			})
		})

		it('should consume --no-wasm-opt', () => {
			assert.deepStrictEqual(interpretFlag('--no-wasm-opt'), {
				disposition: 'suppress',
				effect: { kind: 'disable-wasm-opt' },
			})
		})

		it('should mark table flags as taking a value', () => {
			assert.strictEqual(interpretFlag('-I').disposition, 'forward-with-value')
			assert.strictEqual(interpretFlag('-include').disposition, 'forward-with-value')
			assert.strictEqual(interpretFlag('-Iinclude').disposition, 'forward')
		})

		it('should forward other flags without effect', () => {
			assert.deepStrictEqual(interpretFlag('-Wall'), {
				disposition: 'forward',
				effect: { kind: 'none' },
			})
		})
	})

	describe('applyFlagEffect', () => {
		it('should update build settings', () => {
			const state = freshState()
			apply(state, '-O3')
			apply(state, '-g1')
			apply(state, '--no-wasm-opt')
			assert.deepStrictEqual(state.build, {
				debugLevel: DebugLevel.G1,
				optLevel: OptLevel.O3,
				useWasmOpt: false,
			})
		})

		it('should let the last exceptions flag win', () => {
			const state = freshState()
			apply(state, '-fwasm-exceptions')
			assert.strictEqual(state.wasmExceptions, true)
			apply(state, '-fno-wasm-exceptions')
			assert.strictEqual(state.wasmExceptions, false)
		})

		it('should leave state alone for plain flags', () => {
			const state = freshState()
			apply(state, '-Wall')
			assert.deepStrictEqual(state, freshState())
		})
	})
})
