import { createBuildSettings, createClassifiedArguments } from '../src/classify/types.ts'
import type { DriverLogger } from '../src/core/log.ts'
import { ModuleKind } from '../src/module-kind.ts'
import type { BuildContext } from '../src/pipeline/context.ts'
import type { UserSettings } from '../src/settings/user-settings.ts'
import type { ToolCommand, ToolRunner } from '../src/tools/invoke.ts'

/**
 * Runner that records commands instead of spawning them. Optionally
 * throws for the command at `failAt`.
 */
export class RecordingRunner implements ToolRunner {
	readonly commands: ToolCommand[] = []
	private readonly failAt: number | undefined
	private readonly failure: Error | undefined

	constructor(failAt?: number, failure?: Error) {
		this.failAt = failAt
		this.failure = failure
	}

	run(command: ToolCommand): void {
		this.commands.push({ args: [...command.args], program: command.program })
		if (this.failAt === this.commands.length - 1) {
			throw this.failure ?? new Error('tool failed')
		}
	}

	programs(): string[] {
		return this.commands.map((command) => command.program)
	}
}

export class RecordingLogger implements DriverLogger {
	readonly messages: string[] = []

	info(message: string): void {
		this.messages.push(`info: ${message}`)
	}

	warning(message: string): void {
		this.messages.push(`warning: ${message}`)
	}
}

export function userSettings(overrides: Partial<UserSettings> = {}): UserSettings {
	return {
		extraCompilerFlags: [],
		extraLinkerFlags: [],
		forceWasmOpt: false,
		includeCppStd: undefined,
		moduleKind: undefined,
		pic: false,
		sysroot: '/sysroot',
		toolchain: { kind: 'system', versionSuffix: 20 },
		wasmExceptions: false,
		wasmOptFlags: [],
		...overrides,
	}
}

export function buildContext(overrides: Partial<BuildContext> = {}): BuildContext {
	return {
		args: createClassifiedArguments(),
		build: createBuildSettings(),
		cxx: false,
		includeCppStd: false,
		logger: new RecordingLogger(),
		moduleKind: ModuleKind.StaticMain,
		runner: new RecordingRunner(),
		sysroot: '/sysroot',
		user: userSettings(),
		wasmExceptions: false,
		...overrides,
	}
}
