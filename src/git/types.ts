/** Bucket a porcelain status line can be classified into. */
export type StatusCategory =
	| 'untracked'
	| 'staged'
	| 'changed'
	| 'deleted'
	| 'conflicted'

/** Every category, in classification-bucket order. */
export const STATUS_CATEGORIES: readonly StatusCategory[] = [
	'untracked',
	'staged',
	'changed',
	'deleted',
	'conflicted',
]

/** One path line of `git status --porcelain` output. */
export interface StatusEntry {
	/** Index (staged) status code, a single character. */
	readonly index: string
	/** Worktree (unstaged) status code, a single character. */
	readonly worktree: string
	/** Everything after the two status codes. */
	readonly path: string
}

/** Classified entries, one ordered list per category. */
export type StatusBuckets = {
	readonly [Category in StatusCategory]: readonly StatusEntry[]
}

/** Parsed `git status --porcelain --branch` output. */
export interface ParsedPorcelainStatus {
	/** Trimmed payload of the `##` line, or null when git printed none. */
	readonly header: string | null
	readonly buckets: StatusBuckets
}

/**
 * Interpretation of the `##` branch header.
 *
 * `detached` carries no name: the label comes from tags or the short hash.
 */
export type BranchHeader =
	| { readonly kind: 'unborn'; readonly branch: string }
	| { readonly kind: 'detached' }
	| { readonly kind: 'local'; readonly branch: string }
	| {
			readonly kind: 'tracking'
			readonly branch: string
			readonly upstream: string
			readonly ahead: number
			readonly behind: number
	  }

/** Resolved branch identity and divergence from upstream. */
export interface BranchInfo {
	readonly name: string | null
	readonly ahead: number
	readonly behind: number
}

/** Everything the prompt line reports for one run. */
export interface RunSummary {
	readonly branch: string | null
	readonly ahead: number
	readonly behind: number
	readonly staged: number
	readonly conflicts: number
	readonly changed: number
	readonly untracked: number
	readonly stashes: number
	readonly clean: boolean
	readonly deleted: number
}
