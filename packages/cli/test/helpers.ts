import type { ToolCommand, ToolRunner } from '@wasixcc/driver'

export class RecordingRunner implements ToolRunner {
	readonly commands: ToolCommand[] = []

	run(command: ToolCommand): void {
		this.commands.push({ args: [...command.args], program: command.program })
	}
}
