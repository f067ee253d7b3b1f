import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, expect, test } from 'vitest'
import { GitSpawnError, spawnAndCollect } from './spawn.js'

/** Run an inline script with the current Node binary. */
function node(script: string): string[] {
	return [process.execPath, '-e', script]
}

describe('GitSpawnError', () => {
	test('names the command and keeps the cause', () => {
		const cause = new Error('spawn git ENOENT')
		const error = new GitSpawnError(['git', 'status'], cause)
		expect(error.name).toBe('GitSpawnError')
		expect(error.message).toBe('Failed to run git status: spawn git ENOENT')
		expect(error.command).toEqual(['git', 'status'])
		expect(error.cause).toBe(cause)
	})
})

describe('spawnAndCollect', () => {
	test('collects stdout and passes a non-zero exit code through', async () => {
		const result = await spawnAndCollect(
			node("process.stdout.write('hé'); process.exit(3)"),
			{ cwd: os.tmpdir() },
		)
		expect(result).toEqual({ stdout: 'hé', stderr: '', exitCode: 3 })
	})

	test('collects stderr separately', async () => {
		const result = await spawnAndCollect(
			node("process.stderr.write('fatal: not a git repository')"),
			{ cwd: os.tmpdir() },
		)
		expect(result).toEqual({
			stdout: '',
			stderr: 'fatal: not a git repository',
			exitCode: 0,
		})
	})

	test('runs in the requested directory', async () => {
		const dir = fs.realpathSync(
			fs.mkdtempSync(path.join(os.tmpdir(), 'prompt-status-spawn-')),
		)
		try {
			const result = await spawnAndCollect(
				node('process.stdout.write(process.cwd())'),
				{ cwd: dir },
			)
			expect(result.stdout).toBe(dir)
		} finally {
			fs.rmSync(dir, { recursive: true, force: true })
		}
	})

	test('a process killed by a signal reports exit code 1', async () => {
		const result = await spawnAndCollect(
			node("process.kill(process.pid, 'SIGKILL')"),
			{ cwd: os.tmpdir() },
		)
		expect(result.exitCode).toBe(1)
	})

	test('a missing binary rejects with GitSpawnError', async () => {
		await expect(
			spawnAndCollect(['prompt-status-no-such-binary', 'status'], {
				cwd: os.tmpdir(),
			}),
		).rejects.toBeInstanceOf(GitSpawnError)
	})

	test('a missing cwd rejects with GitSpawnError', async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'prompt-status-gone-'))
		fs.rmSync(dir, { recursive: true, force: true })

		await expect(
			spawnAndCollect(node('process.exit(0)'), { cwd: dir }),
		).rejects.toBeInstanceOf(GitSpawnError)
	})

	test('rejects an empty command without spawning', async () => {
		await expect(spawnAndCollect([], { cwd: '.' })).rejects.toBeInstanceOf(
			GitSpawnError,
		)
	})
})
