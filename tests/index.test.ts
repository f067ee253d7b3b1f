import { describe, expect, test } from 'vitest'
import * as promptStatus from '../src/index.js'

describe('library exports', () => {
	test('exports key modules', () => {
		expect(typeof promptStatus.getPromptStatus).toBe('function')
		expect(typeof promptStatus.classifyStatusLine).toBe('function')
		expect(typeof promptStatus.parseBranchHeader).toBe('function')
		expect(typeof promptStatus.formatSummaryLine).toBe('function')
		expect(typeof promptStatus.runCli).toBe('function')
	})

	test('parses and formats a status end to end without git', async () => {
		const summary = await promptStatus.getPromptStatus({
			cwd: '/repo',
			runGit: async (args) =>
				args[0] === 'status'
					? {
							stdout: '## feature...origin/feature [behind 3]\nA  x.ts\n',
							stderr: '',
							exitCode: 0,
						}
					: { stdout: '', stderr: '', exitCode: 128 },
		})

		expect(summary).not.toBeNull()
		if (summary) {
			expect(promptStatus.formatSummaryLine(summary)).toBe(
				'feature 0 3 1 0 0 0 0 0 0',
			)
		}
	})
})
