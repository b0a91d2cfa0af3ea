#!/usr/bin/env node

import { cliui } from '@poppinss/cliui'
import { run } from './run.ts'
import { formatError } from './utils.ts'

const ui = cliui()

try {
	await run(process.argv.slice(2), process.argv[1] ?? '', process.env)
} catch (error: unknown) {
	ui.logger.error(formatError(error))
	process.exitCode = 1
}
