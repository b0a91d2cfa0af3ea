import { WXCFG002, WXCFG003 } from '@wasixcc/diagnostics'
import { fail } from '../core/errors.ts'
import { isModuleKind, type ModuleKind } from '../module-kind.ts'

export const LIST_DELIMITER = ':'

const ESCAPE = '\\'

/**
 * Parse a boolean setting. Accepts 1/true/yes and 0/false/no in any case.
 */
export function parseBoolean(value: string): boolean | undefined {
	switch (value.toLowerCase()) {
		case '1':
		case 'true':
		case 'yes':
			return true
		case '0':
		case 'false':
		case 'no':
			return false
		default:
			return undefined
	}
}

export function readBooleanSetting(name: string, value: string): boolean {
	const parsed = parseBoolean(value)
	if (parsed === undefined) {
		fail(WXCFG002, { name, value })
	}
	return parsed
}

export function readModuleKindSetting(value: string): ModuleKind {
	if (!isModuleKind(value)) {
		fail(WXCFG003, { value })
	}
	return value
}

/**
 * Parse a delimiter-separated list. `\:` is a literal delimiter and `\\` a
 * literal backslash; any other backslash is kept as is. Elements are
 * trimmed and empty ones dropped.
 */
export function parseList(value: string, delimiter = LIST_DELIMITER): string[] {
	const elements: string[] = []
	let current = ''

	for (let i = 0; i < value.length; i++) {
		const char = value.charAt(i)
		const next = value.charAt(i + 1)

		if (char === ESCAPE && (next === delimiter || next === ESCAPE)) {
			current += next
			i++
		} else if (char === delimiter) {
			elements.push(current)
			current = ''
		} else {
			current += char
		}
	}
	elements.push(current)

	return elements.map((element) => element.trim()).filter((element) => element !== '')
}

/**
 * Inverse of {@link parseList} for elements without surrounding whitespace.
 */
export function formatList(elements: readonly string[], delimiter = LIST_DELIMITER): string {
	return elements
		.map((element) =>
			element.replaceAll(ESCAPE, ESCAPE + ESCAPE).replaceAll(delimiter, ESCAPE + delimiter)
		)
		.join(delimiter)
}
