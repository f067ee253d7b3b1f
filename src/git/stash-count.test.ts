import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, describe, expect, test } from 'vitest'
import type { GitRunner } from './spawn.js'
import { countLines, getStashCount } from './stash-count.js'

let dirs: string[] = []

afterEach(() => {
	for (const dir of dirs) {
		fs.rmSync(dir, { recursive: true, force: true })
	}
	dirs = []
})

/**
 * Create a scratch repo root with a `.git/logs/refs` directory.
 */
function makeRepoDir(): string {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), 'prompt-status-stash-'))
	dirs.push(root)
	fs.mkdirSync(path.join(root, '.git', 'logs', 'refs'), { recursive: true })
	return root
}

function gitDirRunner(stdout: string, exitCode = 0): GitRunner {
	return async () => ({ stdout, stderr: '', exitCode })
}

describe('countLines', () => {
	test('empty text has no lines', () => {
		expect(countLines('')).toBe(0)
	})

	test('trailing newline does not add a line', () => {
		expect(countLines('a\nb\n')).toBe(2)
	})

	test('last line without newline still counts', () => {
		expect(countLines('a\nb')).toBe(2)
	})

	test('blank lines count', () => {
		expect(countLines('\n\n')).toBe(2)
	})
})

describe('getStashCount', () => {
	test('counts stash reflog lines under a relative git dir', async () => {
		const root = makeRepoDir()
		fs.writeFileSync(
			path.join(root, '.git', 'logs', 'refs', 'stash'),
			'0000 1111 Test <test@example.com> 1700000000 +0000\tWIP on main: one\n' +
				'1111 2222 Test <test@example.com> 1700000100 +0000\tWIP on main: two\n' +
				'2222 3333 Test <test@example.com> 1700000200 +0000\tWIP on main: three\n',
		)

		expect(await getStashCount(gitDirRunner('.git\n'), root)).toBe(3)
	})

	test('accepts an absolute git dir', async () => {
		const root = makeRepoDir()
		const gitDir = path.join(root, '.git')
		fs.writeFileSync(path.join(gitDir, 'logs', 'refs', 'stash'), 'one\n')

		expect(await getStashCount(gitDirRunner(`${gitDir}\n`), '/elsewhere')).toBe(1)
	})

	test('missing stash log counts zero', async () => {
		const root = makeRepoDir()
		expect(await getStashCount(gitDirRunner('.git\n'), root)).toBe(0)
	})

	test('failed git dir lookup counts zero', async () => {
		const root = makeRepoDir()
		expect(await getStashCount(gitDirRunner('', 128), root)).toBe(0)
	})

	test('queries rev-parse --git-dir in cwd', async () => {
		const root = makeRepoDir()
		const calls: { args: readonly string[]; cwd: string }[] = []
		const runGit: GitRunner = async (args, options) => {
			calls.push({ args, cwd: options.cwd })
			return { stdout: '.git\n', stderr: '', exitCode: 0 }
		}

		await getStashCount(runGit, root)

		expect(calls).toEqual([{ args: ['rev-parse', '--git-dir'], cwd: root }])
	})
})
