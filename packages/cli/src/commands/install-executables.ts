import { args, BaseCommand } from '@adonisjs/ace'
import { installExecutables } from '../install.ts'
import { formatError } from '../utils.ts'

export default class InstallExecutablesCommand extends BaseCommand {
	static override commandName = 'install-executables'
	static override description = 'Create wasix<command> links to this driver in a directory'

	@args.string({ description: 'Directory to create the commands in' })
	declare path: string

	override async run(): Promise<void> {
		try {
			for (const created of installExecutables(this.path, process.argv[1] ?? '')) {
				this.logger.success(`Created command ${created}`)
			}
		} catch (error: unknown) {
			this.logger.error(formatError(error))
			this.exitCode = 1
		}
	}
}
