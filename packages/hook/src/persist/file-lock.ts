/**
 * Scoped, cross-process exclusive locks on well-known paths.
 *
 * Why: Each hook invocation is its own short-lived process, so an in-memory
 * mutex coordinates nothing. proper-lockfile gives us an advisory lock that
 * every process can see (an atomic mkdir of `<target>.lock`), refreshes its
 * mtime while held, removes it on process exit, and lets a waiter take over
 * a lock whose holder died without cleaning up (stale after `staleMs`).
 *
 * Locks are only ever taken through withFileLock() so release happens in a
 * finally block on every exit path -- there is no manual unlock to forget.
 *
 * Waiting is a bounded poll: callers always pass a timeout (Infinity is
 * allowed for tests and tooling) and get a LockTimeoutError past it.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import lockfile from 'proper-lockfile'
import { isErrnoException, LockTimeoutError } from '../errors.js'
import { createLogger } from '../log.js'

const log = createLogger('file-lock')

/** Minimum stale age proper-lockfile accepts. */
const MIN_STALE_MS = 2_000

export interface FileLockOptions {
	/** Give up after this many ms. Infinity waits forever. Default 2000. */
	readonly timeoutMs?: number
	/** Delay between acquisition attempts. Default 25. */
	readonly pollMs?: number
	/** Age after which an un-refreshed lock is considered abandoned. Default 5000. */
	readonly staleMs?: number
}

/** Releases a held lock. Resolves even if the lock was already lost. */
export type ReleaseLock = () => Promise<void>

/** Path of the lock directory proper-lockfile creates for a target. */
export function lockPathFor(target: string): string {
	return `${target}.lock`
}

/**
 * Acquire the lock for `target`, polling until `timeoutMs` elapses.
 *
 * Prefer withFileLock(); this is exported for callers that must hand the
 * release function to a scope they control.
 *
 * @throws LockTimeoutError when the lock stays busy past the timeout
 */
export async function acquireFileLock(
	target: string,
	options: FileLockOptions = {},
): Promise<ReleaseLock> {
	const timeoutMs = options.timeoutMs ?? 2_000
	const pollMs = options.pollMs ?? 25
	const staleMs = Math.max(options.staleMs ?? 5_000, MIN_STALE_MS)
	const deadline = Date.now() + timeoutMs

	await fs.mkdir(path.dirname(target), { recursive: true })

	for (;;) {
		try {
			const release = await lockfile.lock(target, {
				realpath: false,
				retries: 0,
				stale: staleMs,
				onCompromised: (err) => {
					// Default handler throws from a timer and would crash the hook
					log.warn(`lock on ${target} compromised: ${err.message}`)
				},
			})
			return async () => {
				try {
					await release()
				} catch (err) {
					log.warn(`releasing lock on ${target} failed: ${String(err)}`)
				}
			}
		} catch (err) {
			if (!isErrnoException(err, 'ELOCKED')) throw err
			const remaining = deadline - Date.now()
			if (remaining <= 0) throw new LockTimeoutError(target, timeoutMs)
			await sleep(Math.min(pollMs, remaining))
		}
	}
}

/**
 * Run `fn` while holding the exclusive lock for `target`.
 *
 * The lock is released when `fn` settles, whether it resolves or throws.
 *
 * @example
 * ```ts
 * await withFileLock(indexPath, async () => {
 *   const index = await read()
 *   await write(mutate(index))
 * }, { timeoutMs: 2_000 })
 * ```
 *
 * @throws LockTimeoutError when the lock is not acquired in time
 */
export async function withFileLock<T>(
	target: string,
	fn: () => Promise<T>,
	options?: FileLockOptions,
): Promise<T> {
	const release = await acquireFileLock(target, options)
	try {
		return await fn()
	} finally {
		await release()
	}
}

/** Whether some process currently holds the lock for `target`. */
export async function isFileLocked(
	target: string,
	options: Pick<FileLockOptions, 'staleMs'> = {},
): Promise<boolean> {
	return lockfile.check(target, {
		realpath: false,
		stale: Math.max(options.staleMs ?? 5_000, MIN_STALE_MS),
	})
}
