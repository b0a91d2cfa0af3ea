import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

const TEMP_DIR_PREFIX = 'wasixcc-'

/**
 * Run `body` with a fresh private directory that is removed afterwards,
 * whether `body` returns or throws.
 */
export function withTempDir<T>(body: (dir: string) => T): T {
	const dir = mkdtempSync(join(tmpdir(), TEMP_DIR_PREFIX))
	try {
		return body(dir)
	} finally {
		rmSync(dir, { force: true, recursive: true })
	}
}
