/**
 * Structured debug logger.
 *
 * Writes one JSON object per line to stderr, leaving stdout for the prompt
 * line. Enabled with GIT_PROMPT_STATUS_DEBUG=1; the flag is read once at
 * module load, and every call is a no-op when it is absent.
 *
 * @module logger/debug
 */

/** Environment variable that turns debug logging on. */
export const DEBUG_ENV_VAR = 'GIT_PROMPT_STATUS_DEBUG'

const _debugEnabled = process.env[DEBUG_ENV_VAR] === '1'

/**
 * Emit a structured JSON log line to stderr.
 *
 * @param event - Stable event name, e.g. 'status:query', 'stash:count'
 * @param data - Extra fields spread into the log object
 */
export function debugLog(event: string, data: Record<string, unknown>): void {
	if (!_debugEnabled) return
	const line = JSON.stringify({ event, ts: new Date().toISOString(), ...data })
	process.stderr.write(`${line}\n`)
}

/**
 * Whether debug logging is active, so callers can skip building
 * expensive payloads.
 */
export function isDebugEnabled(): boolean {
	return _debugEnabled
}
