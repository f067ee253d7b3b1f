import type { GitRunner } from './spawn.js'

/** Tag query for HEAD; capped at two, enough to tell "one" from "several". */
export const HEAD_TAGS_ARGS: readonly string[] = [
	'for-each-ref',
	'--points-at=HEAD',
	'--count=2',
	'--sort=-version:refname',
	'--format=%(refname:short)',
	'refs/tags',
]

export const SHORT_HEAD_ARGS: readonly string[] = ['rev-parse', '--short', 'HEAD']

/**
 * Label a detached HEAD for display.
 *
 * The highest-versioned tag at HEAD wins, suffixed with `+` when another tag
 * points at the same commit. Without tags, falls back to the abbreviated
 * hash; null when that is empty too. Exit codes are not checked, only
 * output. Spawn failures propagate.
 */
export async function resolveDetachedLabel(
	runGit: GitRunner,
	cwd: string,
): Promise<string | null> {
	const tagsResult = await runGit(HEAD_TAGS_ARGS, { cwd })
	const tags = tagsResult.stdout.split(/\s+/).filter(Boolean)
	const [first, second] = tags
	if (first) {
		return second ? `${first}+` : first
	}

	const hashResult = await runGit(SHORT_HEAD_ARGS, { cwd })
	const hash = hashResult.stdout.trim()
	return hash.length > 0 ? hash : null
}
