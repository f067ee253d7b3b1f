import type {
	ParsedPorcelainStatus,
	StatusCategory,
	StatusEntry,
} from './types.js'

/** Result of classifying one porcelain line. */
export type ClassifiedLine =
	| { readonly kind: 'header'; readonly payload: string }
	| {
			readonly kind: 'entry'
			readonly category: StatusCategory
			readonly entry: StatusEntry
	  }

/**
 * Classify one line of `git status --porcelain --branch` output.
 *
 * Trailing whitespace is ignored; leading whitespace is not, since a space
 * is a valid index code. The entry path is the text after the codes and
 * their separating space. Returns null for lines shorter than three
 * characters and for lines no rule matches.
 *
 * Rules are positional and the first match wins, so a worktree `M` or `D`
 * outranks anything in the index column:
 *
 * | index     | worktree | result     |
 * |-----------|----------|------------|
 * | `#`       | `#`      | header     |
 * | `?`       | `?`      | untracked  |
 * | any       | `M`      | changed    |
 * | any       | `D`      | deleted    |
 * | `U`       | any      | conflicted |
 * | non-space | any      | staged     |
 */
export function classifyStatusLine(rawLine: string): ClassifiedLine | null {
	const line = rawLine.trimEnd()
	if (line.length < 3) {
		return null
	}

	const index = line.charAt(0)
	const worktree = line.charAt(1)
	const rest = line.slice(2)

	if (index === '#' && worktree === '#') {
		return { kind: 'header', payload: rest.trim() }
	}

	const category = categorize(index, worktree)
	if (!category) {
		return null
	}
	const path = rest.startsWith(' ') ? rest.slice(1) : rest
	return { kind: 'entry', category, entry: { index, worktree, path } }
}

function categorize(index: string, worktree: string): StatusCategory | null {
	if (index === '?' && worktree === '?') return 'untracked'
	if (worktree === 'M') return 'changed'
	if (worktree === 'D') return 'deleted'
	if (index === 'U') return 'conflicted'
	if (index !== ' ') return 'staged'
	return null
}

/**
 * Parse full `git status --porcelain --branch` output into the branch
 * header payload and per-category entry lists.
 *
 * Entries keep input order. If git printed several `##` lines, the last
 * one wins.
 */
export function parsePorcelainStatus(statusOut: string): ParsedPorcelainStatus {
	const buckets: Record<StatusCategory, StatusEntry[]> = {
		untracked: [],
		staged: [],
		changed: [],
		deleted: [],
		conflicted: [],
	}
	let header: string | null = null

	for (const line of statusOut.split('\n')) {
		const classified = classifyStatusLine(line)
		if (!classified) {
			continue
		}
		if (classified.kind === 'header') {
			header = classified.payload
			continue
		}
		buckets[classified.category].push(classified.entry)
	}

	return { header, buckets }
}
