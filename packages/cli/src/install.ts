import { chmodSync, mkdirSync, rmSync, symlinkSync } from 'node:fs'
import { join } from 'node:path'
import { WXCLI003 } from '@wasixcc/diagnostics'
import { DriverError } from '@wasixcc/driver'
import { COMMANDS } from './dispatch.ts'
import { getErrorMessage } from './utils.ts'

const EXECUTABLE_MODE = 0o755

function attempt(target: string, action: () => void): void {
	try {
		action()
	} catch (error: unknown) {
		throw new DriverError(WXCLI003, { reason: getErrorMessage(error), target })
	}
}

/**
 * Link `wasix<command>` to `executable` in `dir` for every command,
 * replacing existing entries.
 *
 * @returns The created link paths, in command order
 * @throws {DriverError} If the directory or a link can't be created
 */
export function installExecutables(dir: string, executable: string): string[] {
	attempt(dir, () => mkdirSync(dir, { recursive: true }))

	return COMMANDS.map((command) => {
		const target = join(dir, `wasix${command}`)
		attempt(target, () => {
			rmSync(target, { force: true })
			symlinkSync(executable, target)
			chmodSync(target, EXECUTABLE_MODE)
		})
		return target
	})
}
