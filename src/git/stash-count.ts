import { readFileSync } from 'node:fs'
import path from 'node:path'
import { debugLog } from '../logger/debug.js'
import { getGitDir } from './git-dir.js'
import type { GitRunner } from './spawn.js'

/** Path of the stash reflog below the git directory. */
export const STASH_LOG_PATH = path.join('logs', 'refs', 'stash')

/**
 * Count lines of text. A trailing newline ends the last line rather than
 * starting a new one, so `''` is 0 and `'a\nb\n'` is 2.
 */
export function countLines(text: string): number {
	if (text.length === 0) {
		return 0
	}
	const breaks = text.split('\n').length - 1
	return text.endsWith('\n') ? breaks : breaks + 1
}

/**
 * Count stash entries by reading the stash reflog, one line per stash.
 *
 * Returns 0 when the git directory cannot be resolved or the log is missing
 * or unreadable.
 */
export async function getStashCount(
	runGit: GitRunner,
	cwd: string,
): Promise<number> {
	const gitDir = await getGitDir(runGit, cwd)
	if (!gitDir) {
		debugLog('stash:count', { cwd, count: 0, reason: 'no-git-dir' })
		return 0
	}

	const logFile = path.join(gitDir, STASH_LOG_PATH)
	let contents: string
	try {
		contents = readFileSync(logFile, 'utf8')
	} catch (error) {
		debugLog('stash:count', {
			cwd,
			count: 0,
			reason: error instanceof Error ? error.message : String(error),
		})
		return 0
	}

	const count = countLines(contents)
	debugLog('stash:count', { cwd, count })
	return count
}
