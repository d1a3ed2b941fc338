/**
 * Audio clip playback through the platform's command-line player.
 *
 * Why: Spawning the OS player keeps audio decoding out of the hook process
 * entirely. The player can hang indefinitely on a corrupt file or a blocked
 * audio device, so every clip races a maxPlayMs timer and the process is
 * killed if it loses -- otherwise a wedged player would hold the playback
 * lock and silence every later event.
 *
 * Error contract: playClip never throws. A failed spawn or a killed player
 * resolves with an outcome the caller may log and ignore.
 *
 * Supported players:
 *   afplay  (macOS)   volume 0..1 via -v, speed via -r
 *   paplay  (Pulse)   volume 0..65536 via --volume
 *   aplay   (ALSA)    no volume or speed control
 *   ffplay  (ffmpeg)  volume 0..100, speed via atempo filter
 */

import childProcess from 'node:child_process'
import { createLogger } from '../log.js'

const log = createLogger('player')

export const PLAYER_NAMES = ['afplay', 'paplay', 'aplay', 'ffplay'] as const

export type PlayerName = (typeof PLAYER_NAMES)[number]

/** Kill a player that is still running after this long. */
export const DEFAULT_MAX_PLAY_MS = 15_000

export interface PlayOptions {
	readonly player: PlayerName
	/** Linear volume, 0..1. */
	readonly volume: number
	/** Playback rate; 1 is normal speed. */
	readonly speed: number
	/** Kill the player after this many ms. */
	readonly maxPlayMs?: number
}

/** How a single clip's playback ended. */
export type PlayOutcome = 'completed' | 'timeout' | 'failed'

/** Default player for the current platform. */
export function defaultPlayer(platform: NodeJS.Platform = process.platform): PlayerName {
	return platform === 'darwin' ? 'afplay' : 'paplay'
}

/**
 * Build the argv for a player invocation.
 *
 * @example
 * ```ts
 * buildPlayerArgs('/c/a.wav', { player: 'afplay', volume: 0.6, speed: 1.2 })
 * // => ['-v', '0.6', '-r', '1.2', '/c/a.wav']
 * ```
 */
export function buildPlayerArgs(file: string, options: PlayOptions): string[] {
	const volume = Math.min(Math.max(options.volume, 0), 1)
	switch (options.player) {
		case 'afplay': {
			const args = ['-v', String(volume)]
			if (options.speed !== 1) args.push('-r', String(options.speed))
			args.push(file)
			return args
		}
		case 'paplay':
			return [`--volume=${Math.round(volume * 65536)}`, file]
		case 'aplay':
			return ['-q', file]
		case 'ffplay': {
			const args = ['-nodisp', '-autoexit', '-loglevel', 'quiet']
			args.push('-volume', String(Math.round(volume * 100)))
			if (options.speed !== 1) args.push('-af', `atempo=${options.speed}`)
			args.push(file)
			return args
		}
	}
}

/**
 * Play one clip and wait for it to finish (or be killed).
 *
 * @param file - Absolute path to the audio file
 */
export async function playClip(file: string, options: PlayOptions): Promise<PlayOutcome> {
	const maxPlayMs = options.maxPlayMs ?? DEFAULT_MAX_PLAY_MS
	let proc: childProcess.ChildProcess
	try {
		proc = childProcess.spawn(options.player, buildPlayerArgs(file, options), {
			stdio: 'ignore',
		})
	} catch (err) {
		log.warn(`could not start ${options.player}: ${String(err)}`)
		return 'failed'
	}

	return new Promise<PlayOutcome>((resolve) => {
		let settled = false
		const finish = (outcome: PlayOutcome) => {
			if (settled) return
			settled = true
			clearTimeout(timer)
			resolve(outcome)
		}

		// Kill hung players so the playback lock is not held forever
		const timer = setTimeout(() => {
			log.warn(`${options.player} still running after ${maxPlayMs}ms, killing it`)
			proc.kill()
			finish('timeout')
		}, maxPlayMs)

		proc.once('error', (err) => {
			log.warn(`${options.player} failed: ${err.message}`)
			finish('failed')
		})
		proc.once('exit', (code) => {
			finish(code === 0 ? 'completed' : 'failed')
		})
	})
}

/**
 * Play clips back to back.
 *
 * Why: The caller holds the playback lock across the whole sequence so no
 * other process can slip a clip between the project name and the message.
 *
 * @returns One outcome per clip, in order
 */
export async function playSequence(
	files: readonly string[],
	options: PlayOptions,
): Promise<PlayOutcome[]> {
	const outcomes: PlayOutcome[] = []
	for (const file of files) {
		outcomes.push(await playClip(file, options))
	}
	return outcomes
}
