import path from 'node:path'
import { Command, CommanderError } from 'commander'
import { getPromptStatus } from '../git/prompt-status.js'
import type { GitRunner } from '../git/spawn.js'
import { formatSummaryLine } from '../git/summary.js'
import { CliError, toCliError } from './errors.js'
import { writeError, writePromptLine, writeSuccess } from './output.js'

/** Parsed command-line options. */
export type CliOptions = {
	readonly cwd?: string
	readonly json?: boolean
}

/** Seams for tests and embedding callers. */
export interface RunCliDeps {
	/** Base directory for `--cwd`, defaults to `process.cwd()`. */
	readonly cwd?: string
	readonly runGit?: GitRunner
}

function buildProgram(): Command {
	return new Command()
		.name('git-prompt-status')
		.description(
			'Print a one-line summary of the git working tree for a shell prompt.\n\n' +
				'Fields: <branch> <ahead> <behind> <staged> <conflicts> <changed> ' +
				'<untracked> <stashes> <clean> <deleted>',
		)
		.option('-C, --cwd <dir>', 'summarize <dir> instead of the current directory')
		.option('--json', 'write the summary as a JSON envelope')
		.allowExcessArguments(false)
		.exitOverride()
		.configureOutput({
			writeOut: (text) => {
				process.stdout.write(text)
			},
			outputError: () => {},
		})
}

async function parseOptions(argv: readonly string[]): Promise<CliOptions | null> {
	const program = buildProgram()
	try {
		await program.parseAsync([...argv], { from: 'user' })
	} catch (error) {
		if (error instanceof CommanderError) {
			// --help exits through the override with code 0
			if (error.exitCode === 0) return null
			throw CliError.usage(error.message)
		}
		throw error
	}
	return program.opts<CliOptions>()
}

/**
 * Execute the git-prompt-status CLI.
 *
 * Prints nothing and leaves the exit code at 0 outside a git repository.
 * Failures are written as an error envelope on stderr and set
 * `process.exitCode`.
 */
export async function runCli(
	argv: readonly string[] = process.argv.slice(2),
	deps: RunCliDeps = {},
): Promise<void> {
	try {
		const options = await parseOptions(argv)
		if (!options) {
			return
		}

		const cwd = path.resolve(deps.cwd ?? process.cwd(), options.cwd ?? '.')
		const summary = await getPromptStatus({ cwd, runGit: deps.runGit })
		if (!summary) {
			return
		}

		if (options.json) {
			writeSuccess(summary)
		} else {
			writePromptLine(formatSummaryLine(summary))
		}
	} catch (error) {
		const cliError = toCliError(error)
		writeError(cliError)
		process.exitCode = cliError.exitCode
	}
}
