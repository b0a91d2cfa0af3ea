import { basename } from 'node:path'
import { WXCLI001, WXCLI002 } from '@wasixcc/diagnostics'
import {
	DriverError,
	type DriverOptions,
	PassthroughTool,
	runCompiler,
	runLinker,
	runPassthrough,
} from '@wasixcc/driver'

/**
 * Command names, installed as `wasix<command>`.
 */
export const COMMANDS = ['cc', '++', 'cc++', 'ar', 'nm', 'ranlib', 'ld'] as const

export type CommandName = (typeof COMMANDS)[number]

const LAUNCHER_EXTENSION = '.js'

/**
 * Command name from the path the driver was started under:
 * `wasix-cc` and `wasixcc` both give `cc`.
 *
 * @throws {DriverError} If the name has neither prefix
 */
export function commandNameFromExecutable(executable: string): string {
	const name = basename(executable, LAUNCHER_EXTENSION)
	if (name.startsWith('wasix-')) return name.slice('wasix-'.length)
	if (name.startsWith('wasix')) return name.slice('wasix'.length)
	throw new DriverError(WXCLI001, { name })
}

/**
 * @throws {DriverError} For unknown commands and any pipeline failure
 */
export function runCommand(command: string, argv: readonly string[], options: DriverOptions): void {
	switch (command) {
		case 'cc':
			runCompiler(argv, false, options)
			return
		case '++':
		case 'cc++':
			runCompiler(argv, true, options)
			return
		case 'ld':
			runLinker(argv, options)
			return
		case 'ar':
			runPassthrough(PassthroughTool.Ar, argv, options)
			return
		case 'nm':
			runPassthrough(PassthroughTool.Nm, argv, options)
			return
		case 'ranlib':
			runPassthrough(PassthroughTool.Ranlib, argv, options)
			return
		default:
			throw new DriverError(WXCLI002, { command })
	}
}
