/**
 * Typed process exit codes for CLI outcomes.
 *
 * "Not a git repository" is EXIT_OK: a prompt outside a repo shows nothing.
 */
export const EXIT_OK = 0
export const EXIT_RUNTIME = 1
export const EXIT_USAGE = 2

/**
 * Supported exit code union for the CLI.
 */
export type ExitCode = typeof EXIT_OK | typeof EXIT_RUNTIME | typeof EXIT_USAGE
