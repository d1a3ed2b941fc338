/**
 * Tests for PlaybackCoordinator.
 *
 * What we test: mutual exclusion across overlapping callers, the bounded
 * wait surfacing as `{ ok: false }`, and release after a failing callback.
 */

import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { LockTimeoutError } from '../errors.js'
import { PlaybackCoordinator } from './lock.js'

let dir: string
let coordinator: PlaybackCoordinator

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), 'murmur-playback-'))
	coordinator = new PlaybackCoordinator({ lockPath: path.join(dir, 'playback'), pollMs: 10 })
})

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true })
})

describe('PlaybackCoordinator', () => {
	it('returns the callback value', async () => {
		expect(await coordinator.withPlaybackLock(async () => 'played')).toEqual({
			ok: true,
			value: 'played',
		})
	})

	it('runs a second waiter only after the first releases', async () => {
		const events: string[] = []
		const play = (name: string) =>
			coordinator.withPlaybackLock(
				async () => {
					events.push(`start:${name}`)
					await sleep(60)
					events.push(`end:${name}`)
				},
				{ timeoutMs: Number.POSITIVE_INFINITY },
			)

		const [first, second] = await Promise.all([play('one'), play('two')])

		expect(first.ok).toBe(true)
		expect(second.ok).toBe(true)
		expect([events[0]?.slice(6), events[2]?.slice(6)].sort()).toEqual(['one', 'two'])
		expect(events[1]).toBe(`end:${events[0]?.slice(6)}`)
		expect(events[3]).toBe(`end:${events[2]?.slice(6)}`)
	})

	it('gives up with a LockTimeoutError while the device is busy', async () => {
		let finish = () => {}
		let started = () => {}
		const acquired = new Promise<void>((resolve) => {
			started = resolve
		})
		const holding = coordinator.withPlaybackLock(
			() =>
				new Promise<void>((resolve) => {
					finish = resolve
					started()
				}),
		)
		await acquired

		const result = await coordinator.withPlaybackLock(async () => 'late', { timeoutMs: 100 })
		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error).toBeInstanceOf(LockTimeoutError)

		finish()
		expect((await holding).ok).toBe(true)
	})

	it('releases the lock when playback throws', async () => {
		await expect(
			coordinator.withPlaybackLock(async () => {
				throw new Error('device gone')
			}),
		).rejects.toThrow('device gone')

		expect(await coordinator.withPlaybackLock(async () => 'next', { timeoutMs: 100 })).toEqual({
			ok: true,
			value: 'next',
		})
	})

	it('rethrows a timeout on another lock taken during playback', async () => {
		const foreign = new LockTimeoutError(path.join(dir, 'history.json'), 100)
		await expect(
			coordinator.withPlaybackLock(async () => {
				throw foreign
			}),
		).rejects.toBe(foreign)

		expect((await coordinator.withPlaybackLock(async () => 'next', { timeoutMs: 100 })).ok).toBe(true)
	})

	it('reports whether playback is in progress', async () => {
		expect(await coordinator.isPlaying()).toBe(false)
		const during = await coordinator.withPlaybackLock(() => coordinator.isPlaying())
		expect(during).toEqual({ ok: true, value: true })
		expect(await coordinator.isPlaying()).toBe(false)
	})
})
