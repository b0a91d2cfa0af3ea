import {
	type ModuleKind,
	moduleKindFromLinkerFlags,
	moduleKindFromOutputPath,
} from '../module-kind.ts'
import { ArgumentCursor } from './compiler-args.ts'
import { LINKER_FLAGS_WITH_VALUE } from './flag-tables.ts'
import { createClassifiedArguments, type LinkerClassification } from './types.ts'

/**
 * Classify a link-only command line. Every dash-prefixed token is a linker
 * flag; everything else is a linker input.
 */
export function classifyLinkerArgs(
	args: readonly string[],
	moduleKind: ModuleKind | undefined
): LinkerClassification {
	const result = createClassifiedArguments()
	let kind = moduleKind

	const cursor = new ArgumentCursor(args)
	for (let arg = cursor.next(); arg !== undefined; arg = cursor.next()) {
		if (arg === '-o') {
			result.output = cursor.valueFor(arg)
			kind ??= moduleKindFromOutputPath(result.output)
		} else if (arg.startsWith('-')) {
			result.linkerArgs.push(arg)
			if (LINKER_FLAGS_WITH_VALUE.has(arg)) result.linkerArgs.push(cursor.valueFor(arg))
		} else {
			result.linkerInputs.push(arg)
		}
	}

	kind ??= moduleKindFromLinkerFlags(result.linkerArgs)

	return { args: result, moduleKind: kind }
}
