import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import type { DriverOptions, Environment } from '@wasixcc/driver'
import InstallExecutablesCommand from './commands/install-executables.ts'
import { commandNameFromExecutable, runCommand } from './dispatch.ts'
import { formatVersion, INSTALL_COMMAND, VERSION_FLAG } from './utils.ts'

async function runKernel(argv: string[]): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'wasixcc')
	kernel.info.set('version', formatVersion())

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([InstallExecutablesCommand, HelpCommand]))

	await kernel.handle(argv)
	process.exitCode = kernel.exitCode
}

/**
 * Entry point behind every installed command name.
 *
 * `install-executables` as the first argument goes to the ace kernel and
 * `--version` anywhere prints the version. Everything else runs the
 * pipeline picked by the executable name.
 *
 * @param argv - Arguments after the program name
 * @param executable - Path the driver was started under
 */
export async function run(
	argv: string[],
	executable: string,
	env: Environment,
	options: Omit<DriverOptions, 'env'> = {}
): Promise<void> {
	if (argv[0] === INSTALL_COMMAND) {
		await runKernel(argv)
		return
	}

	if (argv.includes(VERSION_FLAG)) {
		console.log(formatVersion())
		return
	}

	runCommand(commandNameFromExecutable(executable), argv, { ...options, env })
}
