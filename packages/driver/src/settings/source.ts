/**
 * Where setting values come from: inline `-s<NAME>=<value>` arguments,
 * then `WASIXCC_<NAME>` environment variables.
 */

export const SETTING_ARG_PREFIX = '-s'
export const SETTING_ENV_PREFIX = 'WASIXCC_'

/**
 * Snapshot of the process environment. Passed in explicitly so that
 * resolution is a function of its inputs.
 */
export type Environment = Readonly<Record<string, string | undefined>>

export interface SeparatedArgs {
	/** Inline settings, in command line order */
	readonly settingsArgs: readonly string[]
	/** Everything else, in command line order */
	readonly pipelineArgs: readonly string[]
}

// Setting names are upper case, which keeps -std=, -stdlib= and other
// compiler flags out
const SETTING_ARG = /^-s[A-Z][A-Z0-9_]*=/

export function isSettingArg(arg: string): boolean {
	return SETTING_ARG.test(arg)
}

/**
 * `-sNAME=value` gives `NAME`.
 */
export function settingArgName(arg: string): string {
	return arg.slice(SETTING_ARG_PREFIX.length, arg.indexOf('='))
}

/**
 * Split the raw argument list into inline settings and pipeline arguments.
 */
export function separateSettingsArgs(args: readonly string[]): SeparatedArgs {
	const settingsArgs: string[] = []
	const pipelineArgs: string[] = []
	for (const arg of args) {
		if (isSettingArg(arg)) {
			settingsArgs.push(arg)
		} else {
			pipelineArgs.push(arg)
		}
	}
	return { pipelineArgs, settingsArgs }
}

/**
 * Raw string lookup of settings by name.
 */
export class SettingsSource {
	private readonly settingsArgs: readonly string[]
	private readonly env: Environment

	constructor(settingsArgs: readonly string[], env: Environment) {
		this.settingsArgs = settingsArgs
		this.env = env
	}

	/**
	 * The first inline `-s<name>=` argument wins; the environment is only
	 * consulted when no inline argument names the setting.
	 */
	get(name: string): string | undefined {
		const prefix = `${SETTING_ARG_PREFIX}${name}=`
		for (const arg of this.settingsArgs) {
			if (arg.startsWith(prefix)) {
				return arg.slice(prefix.length)
			}
		}
		return this.env[`${SETTING_ENV_PREFIX}${name}`]
	}
}
