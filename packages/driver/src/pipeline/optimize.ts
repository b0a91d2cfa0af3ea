import { DebugLevel, OptLevel } from '../classify/types.ts'
import { type BuildContext, outputPath } from './context.ts'

export const OPTIMIZER = 'wasm-opt'

function optLevelFlag(level: OptLevel): string | undefined {
	switch (level) {
		// -O0 is a no-op for wasm-opt
		case OptLevel.O0:
			return undefined
		case OptLevel.O1:
			return '-O1'
		case OptLevel.O2:
			return '-O2'
		case OptLevel.O3:
			return '-O3'
		case OptLevel.O4:
			return '-O4'
		case OptLevel.Os:
			return '-Os'
		case OptLevel.Oz:
			return '-Oz'
	}
}

function keepsDebugInfo(level: DebugLevel): boolean {
	return level === DebugLevel.G1 || level === DebugLevel.G2 || level === DebugLevel.G3
}

/**
 * Optimizer arguments, or undefined when there is nothing for it to do.
 * The output is rewritten in place.
 */
export function optimizerArgs(ctx: BuildContext): string[] | undefined {
	const passes: string[] = []

	if (ctx.wasmExceptions) {
		passes.push('--experimental-new-eh')
	}

	const level = optLevelFlag(ctx.build.optLevel)
	if (level !== undefined) {
		passes.push(level)
	}

	passes.push(...ctx.user.wasmOptFlags)

	if (passes.length === 0) return undefined

	if (keepsDebugInfo(ctx.build.debugLevel)) {
		passes.push('-g')
	}

	const output = outputPath(ctx)
	return [...passes, output, '-o', output]
}

/**
 * Post-link optimize stage.
 */
export function runOptimizer(ctx: BuildContext): void {
	const args = optimizerArgs(ctx)
	if (args === undefined) {
		ctx.logger.info('Skipping wasm-opt as no passes were specified or needed')
		return
	}
	ctx.runner.run({ args, program: OPTIMIZER })
}
