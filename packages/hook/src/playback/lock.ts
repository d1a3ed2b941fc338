/**
 * System-wide playback serialization.
 *
 * Why: Two hook events in quick succession (Stop immediately followed by an
 * idle Notification) run as two unrelated processes. Without a shared lock
 * their clips overlap and neither is intelligible. The lock lives on a
 * well-known path so every invocation -- and the detached commentary
 * process -- contends for the same resource without a daemon.
 *
 * Policy: acquisition is bounded. A notification that cannot play within
 * the timeout is stale by the time it would, so the caller skips it instead
 * of queueing (no pile-ups playing minutes after the event).
 *
 * Release is tied to the callback's scope; a crashed holder's lock goes
 * stale after `staleMs` and is taken over by the next waiter.
 */

import { LockTimeoutError } from '../errors.js'
import { createLogger } from '../log.js'
import { isFileLocked, withFileLock } from '../persist/file-lock.js'

const log = createLogger('playback')

/** Default wait for the audio device before skipping playback. */
export const DEFAULT_PLAYBACK_LOCK_TIMEOUT_MS = 15_000

export interface PlaybackCoordinatorOptions {
	/** Well-known lock target; the lock itself is `${lockPath}.lock`. */
	readonly lockPath: string
	/** Default acquisition timeout. Default 15000ms. */
	readonly timeoutMs?: number
	/** Poll interval while waiting. Default 50ms. */
	readonly pollMs?: number
	/** Age after which a dead holder's lock is taken over. Default 5000ms. */
	readonly staleMs?: number
}

/**
 * Result of a guarded playback.
 *
 * Why: A timeout is an expected outcome, not an exception -- modelling it as
 * a result forces callers to decide what "skipped" means for them.
 */
export type PlaybackResult<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: LockTimeoutError }

export class PlaybackCoordinator {
	readonly lockPath: string
	private readonly timeoutMs: number
	private readonly pollMs: number
	private readonly staleMs: number | undefined

	constructor(options: PlaybackCoordinatorOptions) {
		this.lockPath = options.lockPath
		this.timeoutMs = options.timeoutMs ?? DEFAULT_PLAYBACK_LOCK_TIMEOUT_MS
		this.pollMs = options.pollMs ?? 50
		this.staleMs = options.staleMs
	}

	/** Whether some process is playing audio right now. */
	isPlaying(): Promise<boolean> {
		return isFileLocked(this.lockPath, { staleMs: this.staleMs })
	}

	/**
	 * Run `play` while holding the system-wide playback lock.
	 *
	 * Errors thrown by `play` propagate after the lock is released.
	 *
	 * @param play - Produces audio on the shared output device
	 * @param options.timeoutMs - Override the default wait; Infinity waits forever
	 * @returns The callback's value, or the timeout error if the device stayed busy
	 */
	async withPlaybackLock<T>(
		play: () => Promise<T>,
		options: { timeoutMs?: number } = {},
	): Promise<PlaybackResult<T>> {
		try {
			const value = await withFileLock(this.lockPath, play, {
				timeoutMs: options.timeoutMs ?? this.timeoutMs,
				pollMs: this.pollMs,
				staleMs: this.staleMs,
			})
			return { ok: true, value }
		} catch (err) {
			// A timeout on some other lock taken inside `play` is not ours to absorb
			if (err instanceof LockTimeoutError && err.target === this.lockPath) {
				log.info(`playback skipped: ${err.message}`)
				return { ok: false, error: err }
			}
			throw err
		}
	}
}
