import { GitSpawnError } from '../git/spawn.js'
import { EXIT_RUNTIME, EXIT_USAGE, type ExitCode } from './exit-codes.js'

/**
 * Machine-readable failure kinds reported in the error envelope.
 *
 * `E_GIT_UNAVAILABLE` means git itself could not be started; a git that
 * runs and exits non-zero is never an error for this tool.
 */
export type CliErrorCode = 'E_USAGE' | 'E_GIT_UNAVAILABLE' | 'E_RUNTIME'

/** Error payload of the stderr envelope. */
export interface CliErrorDetail {
	readonly code: CliErrorCode
	readonly name: string
	readonly message: string
	/** Argument vector that failed to start, for `E_GIT_UNAVAILABLE`. */
	readonly command?: readonly string[]
}

/**
 * Structured error envelope written to stderr.
 */
export interface CliErrorEnvelope {
	readonly status: 'error'
	readonly error: CliErrorDetail
}

/**
 * Failure surfaced by the CLI, with the exit code the process ends with.
 */
export class CliError extends Error {
	readonly code: CliErrorCode
	readonly exitCode: ExitCode
	readonly command?: readonly string[]
	override readonly name: string

	private constructor(
		detail: CliErrorDetail,
		exitCode: ExitCode,
		cause?: unknown,
	) {
		super(detail.message, { cause })
		this.code = detail.code
		this.name = detail.name
		this.command = detail.command
		this.exitCode = exitCode
	}

	/** Bad option or stray argument (`exit 2`). */
	static usage(message: string): CliError {
		return new CliError(
			{ code: 'E_USAGE', name: 'UsageError', message },
			EXIT_USAGE,
		)
	}

	/**
	 * git (or the directory it should run in) is missing (`exit 1`).
	 * Keeps the spawn error's name and failed command.
	 */
	static gitUnavailable(error: GitSpawnError): CliError {
		return new CliError(
			{
				code: 'E_GIT_UNAVAILABLE',
				name: error.name,
				message: error.message,
				command: error.command,
			},
			EXIT_RUNTIME,
			error,
		)
	}

	/** Anything else (`exit 1`). */
	static runtime(message: string, cause?: unknown): CliError {
		return new CliError(
			{ code: 'E_RUNTIME', name: 'RuntimeError', message },
			EXIT_RUNTIME,
			cause,
		)
	}

	toEnvelope(): CliErrorEnvelope {
		return {
			status: 'error',
			error: {
				code: this.code,
				name: this.name,
				message: this.message,
				...(this.command ? { command: this.command } : {}),
			},
		}
	}
}

/**
 * Map whatever a run threw onto a `CliError`.
 */
export function toCliError(error: unknown): CliError {
	if (error instanceof CliError) return error
	if (error instanceof GitSpawnError) return CliError.gitUnavailable(error)
	if (error instanceof Error) {
		return CliError.runtime(error.message || 'Unknown runtime error', error)
	}
	return CliError.runtime(String(error))
}
