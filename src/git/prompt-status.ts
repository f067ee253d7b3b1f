import { debugLog, isDebugEnabled } from '../logger/debug.js'
import { parseBranchHeader, resolveBranchInfo } from './branch-header.js'
import { resolveDetachedLabel } from './detached-ref.js'
import { parsePorcelainStatus } from './parse-status.js'
import { type GitRunner, runGit as defaultRunGit } from './spawn.js'
import { getStashCount } from './stash-count.js'
import { buildRunSummary } from './summary.js'
import { type RunSummary, STATUS_CATEGORIES } from './types.js'

/** Status query; `--branch` adds the `##` header line. */
export const STATUS_ARGS: readonly string[] = [
	'status',
	'--porcelain',
	'--branch',
]

export interface PromptStatusOptions {
	/** Directory to summarize. */
	readonly cwd: string
	/** Override for the git runner, defaults to the `git` binary. */
	readonly runGit?: GitRunner
}

/**
 * Summarize the working tree at `cwd` for a shell prompt.
 *
 * Queries run one after another: status, then the detached-HEAD label only
 * when HEAD is detached, then the stash count.
 *
 * @returns The run summary, or null when `cwd` is not inside a git
 * repository (the status query exited non-zero)
 * @throws {GitSpawnError} If git could not be started
 */
export async function getPromptStatus(
	options: PromptStatusOptions,
): Promise<RunSummary | null> {
	const { cwd } = options
	const runGit = options.runGit ?? defaultRunGit

	const status = await runGit(STATUS_ARGS, { cwd })
	debugLog('status:query', { cwd, exitCode: status.exitCode })
	if (status.exitCode !== 0) {
		debugLog('status:not-a-repo', { cwd, stderr: status.stderr.trim() })
		return null
	}

	const { header, buckets } = parsePorcelainStatus(status.stdout)
	if (isDebugEnabled()) {
		debugLog('status:parsed', {
			header,
			paths: Object.fromEntries(
				STATUS_CATEGORIES.map((category) => [
					category,
					buckets[category].map((entry) => entry.path),
				]),
			),
		})
	}
	const branch = await resolveBranchInfo(
		header === null ? null : parseBranchHeader(header),
		() => resolveDetachedLabel(runGit, cwd),
	)
	debugLog('branch:resolved', { header, ...branch })

	const stashes = await getStashCount(runGit, cwd)
	return buildRunSummary(buckets, branch, stashes)
}
