/**
 * Pure summary builder and prompt-line formatter.
 *
 * No git calls. Consumers (the CLI, shell integrations) render the same
 * fields in the same order.
 *
 * @module git/summary
 */

import {
	type BranchInfo,
	type RunSummary,
	STATUS_CATEGORIES,
	type StatusBuckets,
} from './types.js'

/** True when every category bucket is empty. */
export function isClean(buckets: StatusBuckets): boolean {
	return STATUS_CATEGORIES.every((category) => buckets[category].length === 0)
}

/**
 * Fold classified entries, branch state and stash count into a summary.
 */
export function buildRunSummary(
	buckets: StatusBuckets,
	branch: BranchInfo,
	stashes: number,
): RunSummary {
	return {
		branch: branch.name,
		ahead: branch.ahead,
		behind: branch.behind,
		staged: buckets.staged.length,
		conflicts: buckets.conflicted.length,
		changed: buckets.changed.length,
		untracked: buckets.untracked.length,
		stashes,
		clean: isClean(buckets),
		deleted: buckets.deleted.length,
	}
}

/**
 * Render the ten space-separated prompt fields:
 *
 * `<branch> <ahead> <behind> <staged> <conflicts> <changed> <untracked> <stashes> <clean> <deleted>`
 *
 * A missing branch is an empty field, so the line starts with a space.
 * `clean` renders as 1 or 0.
 */
export function formatSummaryLine(summary: RunSummary): string {
	return [
		summary.branch ?? '',
		summary.ahead,
		summary.behind,
		summary.staged,
		summary.conflicts,
		summary.changed,
		summary.untracked,
		summary.stashes,
		summary.clean ? 1 : 0,
		summary.deleted,
	].join(' ')
}
