/**
 * Tests for the murmur CLI.
 *
 * What we test: argument parsing (commands, flags, usage errors, help) and
 * each command end to end against a temp MURMUR_HOME, with stdout/stderr
 * captured and the generator and detached spawner replaced by stubs.
 */

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CacheStore } from '../cache/store.js'
import { fingerprint, projectFingerprint } from '../fingerprint.js'
import type { Generator } from '../generator.js'
import { HistoryLog } from '../history/log.js'
import { type LogSink, setLogSink } from '../log.js'
import { PlaybackCoordinator } from '../playback/lock.js'
import type { SpawnDetached } from '../process.js'
import { createRuntime } from '../runtime.js'
import { allStaticMessages, loadTemplates } from '../templates.js'
import { type CliContext, parseCliArgs, runCli } from './command.js'

const argv = (...args: string[]) => ['node', 'murmur', ...args]

// ----------------------------------------------------------------------------
// parseCliArgs
// ----------------------------------------------------------------------------

describe('parseCliArgs', () => {
	it('treats no arguments, help and --help as a request for help', () => {
		for (const args of [[], ['help'], ['--help'], ['status', '-h']]) {
			const result = parseCliArgs(argv(...args))
			expect(result.ok).toBe(false)
			if (result.ok) continue
			expect(result.exitCode).toBe(0)
			expect(result.output.startsWith('murmur - voice feedback for coding agent hooks')).toBe(true)
		}
	})

	it('parses the simple commands', () => {
		expect(parseCliArgs(argv('hook'))).toEqual({ ok: true, options: { command: 'hook' } })
		expect(parseCliArgs(argv('unmute'))).toEqual({ ok: true, options: { command: 'unmute' } })
		expect(parseCliArgs(argv('suppress', '../other'))).toEqual({
			ok: true,
			options: { command: 'suppress', dir: '../other' },
		})
		expect(parseCliArgs(argv('status', '--json'))).toEqual({
			ok: true,
			options: { command: 'status', json: true, dir: null },
		})
	})

	it('parses generate targets in both flag forms', () => {
		expect(parseCliArgs(argv('generate', '--text', 'Hello there.'))).toEqual({
			ok: true,
			options: { command: 'generate', target: { kind: 'text', text: 'Hello there.' } },
		})
		expect(parseCliArgs(argv('generate', '--project=daylight'))).toEqual({
			ok: true,
			options: { command: 'generate', target: { kind: 'project', name: 'daylight' } },
		})
		expect(parseCliArgs(argv('generate', '--all'))).toEqual({
			ok: true,
			options: { command: 'generate', target: { kind: 'all' } },
		})
	})

	it('defaults the cache action to stats', () => {
		expect(parseCliArgs(argv('cache'))).toEqual({
			ok: true,
			options: { command: 'cache', action: 'stats', json: false },
		})
		expect(parseCliArgs(argv('cache', 'clear'))).toEqual({
			ok: true,
			options: { command: 'cache', action: 'clear', json: false },
		})
	})

	it('parses history limits', () => {
		expect(parseCliArgs(argv('history', '--limit', '5', '--json'))).toEqual({
			ok: true,
			options: { command: 'history', limit: 5, json: true },
		})
	})

	it.each([
		[['frobnicate'], 'Unknown command: frobnicate'],
		[['--json'], 'Unknown command: (none)'],
		[['hook', '--verbose'], 'Unknown option: --verbose'],
		[['status', '--json=1'], 'Unknown option: --json=1'],
		[['mute', '--json'], 'Option --json is not valid for mute'],
		[['hook', '--text', 'x'], 'Option --text is not valid for hook'],
		[['mute', 'extra'], 'Unexpected argument: extra'],
		[['cache', 'clear', 'now'], 'Unexpected argument: now'],
		[['cache', 'purge'], 'Unknown cache action: purge (expected stats or clear)'],
		[['history', '--limit'], 'Missing value for --limit'],
		[['history', '--limit', '0'], 'Invalid --limit: 0 (expected a positive integer)'],
		[['history', '--limit=2.5'], 'Invalid --limit: 2.5 (expected a positive integer)'],
		[['generate'], 'generate needs exactly one of --text, --project or --all'],
		[['generate', '--text', 'a', '--all'], 'generate needs exactly one of --text, --project or --all'],
	])('rejects %j with "%s"', (args, message) => {
		const result = parseCliArgs(argv(...args))
		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.exitCode).toBe(2)
		expect(result.message).toBe(message)
		expect(result.output.startsWith(`${message}\n\nmurmur - voice feedback`)).toBe(true)
	})
})

// ----------------------------------------------------------------------------
// runCli
// ----------------------------------------------------------------------------

let home: string
let projectDir: string
let out: string[]
let err: string[]
let spawnDetached: Mock<SpawnDetached>
let previous: LogSink

function run(args: string[], overrides: Partial<CliContext> = {}) {
	return runCli(argv(...args), {
		env: { MURMUR_HOME: home },
		cwd: projectDir,
		readStdin: async () => '',
		stdout: (text) => out.push(text),
		stderr: (text) => err.push(text),
		spawnDetached,
		...overrides,
	})
}

function withGenerator(generator: Generator): Partial<CliContext> {
	return { createRuntime: (config) => ({ ...createRuntime(config), generator }) }
}

beforeEach(async () => {
	home = await fs.mkdtemp(path.join(os.tmpdir(), 'murmur-cli-'))
	projectDir = path.join(home, 'work', 'daylight')
	await fs.mkdir(projectDir, { recursive: true })
	out = []
	err = []
	spawnDetached = vi.fn<SpawnDetached>()
	previous = setLogSink(() => {})
})

afterEach(async () => {
	setLogSink(previous)
	await fs.rm(home, { recursive: true, force: true })
})

describe('runCli', () => {
	it('prints help to stdout and usage errors to stderr', async () => {
		expect(await run([])).toBe(0)
		expect(out.join('').startsWith('murmur - voice feedback')).toBe(true)

		expect(await run(['nope'])).toBe(2)
		expect(err.join('').startsWith('Unknown command: nope\n\n')).toBe(true)
	})

	it('mutes and unmutes, reporting no-op toggles', async () => {
		expect(await run(['mute'])).toBe(0)
		expect(await run(['mute'])).toBe(0)
		await expect(fs.stat(path.join(home, '.muted'))).resolves.toBeDefined()
		expect(await run(['unmute'])).toBe(0)
		expect(await run(['unmute'])).toBe(0)

		expect(out).toEqual([
			'Voice muted\n',
			'Voice already muted\n',
			'Voice unmuted\n',
			'Voice already unmuted\n',
		])
		await expect(fs.stat(path.join(home, '.muted'))).rejects.toThrow()
	})

	it('suppresses the current directory or a relative one', async () => {
		expect(await run(['suppress'])).toBe(0)
		await expect(fs.stat(path.join(projectDir, '.murmur-suppress'))).resolves.toBeDefined()
		expect(await run(['unsuppress', '.'], { cwd: projectDir })).toBe(0)
		expect(await run(['suppress', 'work/daylight'], { cwd: home })).toBe(0)
		expect(await run(['suppress'])).toBe(0)

		expect(out).toEqual([
			'Project daylight suppressed\n',
			'Project daylight unsuppressed\n',
			'Project daylight suppressed\n',
			'Project daylight already suppressed\n',
		])
	})

	it('reports status as JSON', async () => {
		await run(['mute'])
		out = []

		expect(await run(['status', '--json'])).toBe(0)
		const parsed = JSON.parse(out.join(''))
		expect(parsed.status).toBe('data')
		expect(parsed.data).toMatchObject({
			home,
			enabled: true,
			muted: true,
			soundEnabled: true,
			commentary: false,
			generatorConfigured: false,
			voice: 'default',
			project: { name: 'daylight', suppressed: false },
			cache: { total: 0, valid: 0, capacity: 500, sizeBytes: 0 },
			historyEntries: 0,
			playing: false,
		})
	})

	it('shows playback as in progress while another process holds the device', async () => {
		const playback = new PlaybackCoordinator({ lockPath: path.join(home, 'playback') })
		const seen = await playback.withPlaybackLock(async () => {
			await run(['status', '--json'])
			return JSON.parse(out.join('')).data.playing
		})
		expect(seen).toEqual({ ok: true, value: true })
	})

	it('reports human-readable status', async () => {
		expect(await run(['status'])).toBe(0)
		const lines = out.join('').split('\n')
		expect(lines[0]).toBe(`Home:        ${home}`)
		expect(lines[1]).toBe('Voice:       on')
		expect(lines[5]).toBe('Project:     daylight')
		expect(lines[6]).toBe('Cache:       0/0 clips, capacity 500')
		expect(lines[7]).toBe('History:     0 entries')
		expect(lines[8]).toBe('Playback:    idle')
	})

	it('shows cache stats and clears the cache', async () => {
		const store = new CacheStore({ cacheDir: path.join(home, 'cache'), capacity: 500 })
		await store.insert('aaaaaaaaaaaaaaaa', new Uint8Array([1, 2, 3]))
		await store.insert('bbbbbbbbbbbbbbbb', new Uint8Array([4]))

		expect(await run(['cache', '--json'])).toBe(0)
		expect(out).toEqual([
			`${JSON.stringify({ status: 'data', data: { total: 2, valid: 2, capacity: 500, sizeBytes: 4 } })}\n`,
		])

		out = []
		expect(await run(['cache', 'clear'])).toBe(0)
		expect(out).toEqual(['Removed 2 clips\n'])
		expect((await store.stats()).total).toBe(0)
	})

	it('lists commentary history', async () => {
		expect(await run(['history'])).toBe(0)
		expect(out).toEqual(['No commentary yet\n'])

		const history = new HistoryLog({ file: path.join(home, 'history.json') })
		await history.append({ timestamp: 0, eventKind: 'stop', text: 'Done.', project: 'daylight' })
		await history.append({ timestamp: 1_000, eventKind: 'idle', text: 'Hello?' })

		out = []
		expect(await run(['history'])).toBe(0)
		expect(out).toEqual([
			'1970-01-01T00:00:00.000Z [daylight] stop: Done.\n1970-01-01T00:00:01.000Z [?] idle: Hello?\n',
		])

		out = []
		expect(await run(['history', '--limit', '1', '--json'])).toBe(0)
		expect(JSON.parse(out.join(''))).toEqual({
			status: 'data',
			data: [{ timestamp: 1_000, eventKind: 'idle', text: 'Hello?' }],
		})
	})

	it('refuses to generate without a configured generator', async () => {
		expect(await run(['generate', '--text', 'Hello there.'])).toBe(1)
		expect(err).toEqual([
			`[murmur] No generator configured; set generator.command in ${path.join(home, 'config.json')}\n`,
		])
	})

	it('generates a phrase once and skips it afterwards', async () => {
		const generate = vi.fn(async () => new Uint8Array([7, 7]))
		const expected = path.join(home, 'cache', `${fingerprint('Hello there.', 'default')}.wav`)

		expect(await run(['generate', '--text', 'Hello there.'], withGenerator({ generate }))).toBe(0)
		expect(await run(['generate', '--text', 'Hello there.'], withGenerator({ generate }))).toBe(0)

		expect(out).toEqual([
			`  [generated] "Hello there." -> ${expected}\n`,
			'  [skip] "Hello there." (already cached)\n',
		])
		expect(generate).toHaveBeenCalledTimes(1)
	})

	it('generates a project name under its project fingerprint', async () => {
		const generate = vi.fn(async () => new Uint8Array([1]))
		expect(await run(['generate', '--project', 'daylight'], withGenerator({ generate }))).toBe(0)
		expect(generate).toHaveBeenCalledWith({
			fingerprint: projectFingerprint('daylight', 'default'),
			text: 'daylight',
			voice: 'default',
		})
	})

	it('exits 1 when generation fails', async () => {
		const generator: Generator = {
			generate: async () => {
				throw new Error('engine crashed')
			},
		}
		expect(await run(['generate', '--text', 'Hello there.'], withGenerator(generator))).toBe(1)
		expect(out).toEqual(['  [failed] "Hello there.": engine crashed\n'])
	})

	it('pre-generates every static message with a summary line', async () => {
		const generate = vi.fn(async () => new Uint8Array([1]))
		const total = allStaticMessages(loadTemplates()).length

		expect(await run(['generate', '--all'], withGenerator({ generate }))).toBe(0)
		expect(generate).toHaveBeenCalledTimes(total)
		expect(out.at(-1)).toBe(`Generated ${total}, skipped 0, failed 0\n`)
	})

	it('queues background generation from the hook and exits 0', async () => {
		const payload = JSON.stringify({ hook_event_name: 'Stop', cwd: projectDir })
		expect(await run(['hook'], { readStdin: async () => payload })).toBe(0)

		expect(spawnDetached).toHaveBeenCalledWith(['generate', '--text', expect.any(String)])
		expect(spawnDetached).toHaveBeenCalledWith(['generate', '--project', 'daylight'])
		expect(out).toEqual([])
	})

	it('exits 0 from the hook even when it cannot read its input', async () => {
		const readStdin = async (): Promise<string> => {
			throw new Error('stdin closed')
		}
		expect(await run(['hook'], { readStdin })).toBe(0)
		expect(spawnDetached).not.toHaveBeenCalled()
	})

	it('exits 0 from commentate when no commentator is configured', async () => {
		expect(await run(['commentate'], { readStdin: async () => '{}' })).toBe(0)
		expect(out).toEqual([])
	})

	it('reports unexpected failures of interactive commands', async () => {
		const createRuntimeFailing = (): never => {
			throw new Error('disk on fire')
		}
		expect(await run(['status'], { createRuntime: createRuntimeFailing })).toBe(1)
		expect(err).toEqual(['[murmur] status failed: disk on fire\n'])
	})
})
