import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{key}` placeholders from `args`. Placeholders without a value
 * are left as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}

/**
 * `[CODE] message`, the form diagnostics take on the terminal.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
