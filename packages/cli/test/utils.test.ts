import assert from 'node:assert'
import { describe, it } from 'node:test'
import { WXCLI002 } from '@wasixcc/diagnostics'
import { DriverError, InternalError } from '@wasixcc/driver'
import { formatError, formatVersion, getErrorMessage } from '../src/utils.ts'

describe('formatVersion', () => {
	it('should print the package version', () => {
		assert.strictEqual(formatVersion(), 'wasixcc version: 0.1.0')
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
	})
})

describe('formatError', () => {
	it('should prefix driver errors with their code', () => {
		const error = new DriverError(WXCLI002, { command: 'as' })
		assert.strictEqual(formatError(error), '[WXCLI002] unknown command as')
	})

	it('should prefix internal errors with their code', () => {
		assert.strictEqual(
			formatError(new InternalError()),
			'[WXINT001] internal error: object files can not be linked'
		)
	})

	it('should print other errors as their message', () => {
		assert.strictEqual(formatError(new Error('disk full')), 'disk full')
		assert.strictEqual(formatError(null), 'null')
	})
})
