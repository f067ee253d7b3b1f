import path from 'node:path'
import type { GitRunner } from './spawn.js'

/**
 * Resolve the repository's git directory (usually `<root>/.git`, or the
 * per-worktree directory inside a linked worktree).
 *
 * Uses `git rev-parse --git-dir`, whose output may be relative to `cwd`.
 *
 * @param runGit - Runner used for the query
 * @param cwd - Directory to resolve from
 * @returns Absolute path to the git directory, or null if not in a git repo
 */
export async function getGitDir(
	runGit: GitRunner,
	cwd: string,
): Promise<string | null> {
	const { stdout, exitCode } = await runGit(['rev-parse', '--git-dir'], {
		cwd,
	})

	if (exitCode !== 0) return null

	const gitDir = stdout.trim()
	if (!gitDir) return null

	return path.resolve(cwd, gitDir)
}
