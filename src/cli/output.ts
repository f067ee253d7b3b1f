import { toCliError } from './errors.js'

/**
 * Structured success envelope written to stdout in `--json` mode.
 */
export interface CliSuccessEnvelope<TData = unknown> {
	readonly status: 'ok'
	readonly data: TData
}

/**
 * Write the bare prompt line to stdout. No trailing newline: shells splice
 * it straight into the prompt.
 */
export function writePromptLine(line: string): void {
	process.stdout.write(line)
}

/**
 * Write a success envelope to stdout.
 */
export function writeSuccess(data: unknown): void {
	const envelope: CliSuccessEnvelope = { status: 'ok', data }
	process.stdout.write(`${JSON.stringify(envelope)}\n`)
}

/**
 * Write a structured error envelope to stderr.
 */
export function writeError(error: unknown): void {
	const envelope = toCliError(error).toEnvelope()
	process.stderr.write(`${JSON.stringify(envelope)}\n`)
}
