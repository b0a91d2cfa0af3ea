/**
 * How a diagnostic affects the invocation. Errors end it; warnings are
 * logged and the build continues.
 */
export const DiagnosticSeverity = {
	Error: 'error',
	Warning: 'warning',
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Catalog entry. `message` and `suggestion` are templates with `{name}`
 * placeholders.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

export type DiagnosticArgs = Readonly<Record<string, string | number>>
