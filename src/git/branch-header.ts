/**
 * Interpretation of the `##` line of `git status --porcelain --branch`.
 *
 * The marker phrases below are English text from git's porcelain v1
 * header. They are not localized and have changed wording before
 * ("Initial commit on" became "No commits yet on"); a future rewording
 * falls through to the plain-branch case.
 *
 * @module git/branch-header
 */

import type { BranchHeader, BranchInfo } from './types.js'

/** Header phrases for a branch with no commits yet. */
export const UNBORN_BRANCH_MARKERS: readonly string[] = [
	'Initial commit on',
	'No commits yet on',
]

/** Header phrase for a detached HEAD, as in `HEAD (no branch)`. */
export const DETACHED_HEAD_MARKER = 'no branch'

/** Separator between the local branch and its upstream. */
const UPSTREAM_SEPARATOR = '...'

/**
 * Parse a trimmed header payload such as `main...origin/main [ahead 2]`.
 */
export function parseBranchHeader(rawPayload: string): BranchHeader {
	const payload = rawPayload.trim()

	if (UNBORN_BRANCH_MARKERS.some((marker) => payload.includes(marker))) {
		const tokens = payload.split(/\s+/)
		return { kind: 'unborn', branch: tokens[tokens.length - 1] ?? '' }
	}

	if (payload.includes(DETACHED_HEAD_MARKER)) {
		return { kind: 'detached' }
	}

	const separatorAt = payload.indexOf(UPSTREAM_SEPARATOR)
	if (separatorAt === -1) {
		return { kind: 'local', branch: payload }
	}

	const branch = payload.slice(0, separatorAt)
	const [upstream = '', ...annotation] = payload
		.slice(separatorAt + UPSTREAM_SEPARATOR.length)
		.split(/\s+/)
		.filter(Boolean)
	const { ahead, behind } = parseDivergence(annotation.join(' '))

	return { kind: 'tracking', branch, upstream, ahead, behind }
}

/**
 * Parse a divergence annotation: `[ahead 2]`, `[behind 1]`,
 * `[ahead 2, behind 1]`. Unknown segments (such as `gone`) and
 * unparseable counts contribute 0.
 */
export function parseDivergence(annotation: string): {
	ahead: number
	behind: number
} {
	let ahead = 0
	let behind = 0
	if (!annotation) {
		return { ahead, behind }
	}

	const inner = annotation.replace(/^\[+/, '').replace(/\]+$/, '')
	for (const segment of inner.split(', ')) {
		if (segment.startsWith('ahead')) {
			ahead = parseCount(segment.slice('ahead'.length))
		} else if (segment.startsWith('behind')) {
			behind = parseCount(segment.slice('behind'.length))
		}
	}
	return { ahead, behind }
}

function parseCount(raw: string): number {
	const trimmed = raw.trim()
	if (!/^\d+$/.test(trimmed)) {
		return 0
	}
	const value = Number.parseInt(trimmed, 10)
	return Number.isSafeInteger(value) ? value : 0
}

/**
 * Turn a parsed header into branch name and divergence counts.
 *
 * `resolveDetached` runs only for a detached HEAD. A missing header
 * yields no name and zero counts.
 */
export async function resolveBranchInfo(
	header: BranchHeader | null,
	resolveDetached: () => Promise<string | null>,
): Promise<BranchInfo> {
	if (!header) {
		return { name: null, ahead: 0, behind: 0 }
	}

	switch (header.kind) {
		case 'unborn':
		case 'local':
			return { name: header.branch, ahead: 0, behind: 0 }
		case 'detached':
			return { name: await resolveDetached(), ahead: 0, behind: 0 }
		case 'tracking':
			return {
				name: header.branch,
				ahead: header.ahead,
				behind: header.behind,
			}
	}
}
