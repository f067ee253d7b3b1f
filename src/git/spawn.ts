import { spawn } from 'node:child_process'
import path from 'node:path'

/** Captured output of a finished subprocess. */
export interface SpawnResult {
	readonly stdout: string
	readonly stderr: string
	readonly exitCode: number
}

export interface SpawnOptions {
	readonly cwd: string
}

/**
 * Run a git subcommand and collect its output.
 *
 * `args` excludes the leading `git`. Injected into every query so tests can
 * answer with canned output instead of spawning git.
 */
export type GitRunner = (
	args: readonly string[],
	options: SpawnOptions,
) => Promise<SpawnResult>

/**
 * Raised when a subprocess could not be started at all (missing binary,
 * bad cwd). A non-zero exit is not an error here.
 */
export class GitSpawnError extends Error {
	override readonly name = 'GitSpawnError'
	readonly command: readonly string[]

	constructor(command: readonly string[], cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause)
		super(`Failed to run ${command.join(' ')}: ${reason}`, { cause })
		this.command = command
	}
}

/**
 * Spawn `command` and resolve with its stdout, stderr and exit code.
 *
 * Resolves for every exit status; a process killed by a signal reports
 * exit code 1. Rejects with {@link GitSpawnError} when the spawn fails.
 */
export function spawnAndCollect(
	command: readonly string[],
	options: SpawnOptions,
): Promise<SpawnResult> {
	const [file, ...args] = command
	if (!file) {
		return Promise.reject(new GitSpawnError(command, 'empty command'))
	}

	return new Promise((resolve, reject) => {
		const child = spawn(file, args, {
			cwd: path.resolve(options.cwd),
			stdio: ['ignore', 'pipe', 'pipe'],
		})
		let stdout = ''
		let stderr = ''
		child.stdout.setEncoding('utf8')
		child.stderr.setEncoding('utf8')
		child.stdout.on('data', (chunk: string) => {
			stdout += chunk
		})
		child.stderr.on('data', (chunk: string) => {
			stderr += chunk
		})
		child.once('error', (error) => {
			reject(new GitSpawnError(command, error))
		})
		child.once('close', (code) => {
			resolve({ stdout, stderr, exitCode: code ?? 1 })
		})
	})
}

/** Default {@link GitRunner}: the `git` binary on PATH. */
export const runGit: GitRunner = (args, options) =>
	spawnAndCollect(['git', ...args], options)
