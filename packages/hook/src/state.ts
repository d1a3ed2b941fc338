/**
 * Sentinel-file state: global mute, per-project suppression, idle cooldown.
 *
 * Why: These toggles are flipped from a shell (`murmur mute`) or by another
 * hook process and must be visible to the very next invocation. A file's
 * existence is the cheapest cross-process flag there is.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import { SUPPRESS_FILE_NAME } from './config.js'
import { isErrnoException } from './errors.js'
import { fileExists, removeFile, writeFileAtomic } from './persist/atomic-write.js'

export function isMuted(muteFile: string): Promise<boolean> {
	return fileExists(muteFile)
}

/**
 * Create or remove the mute sentinel.
 *
 * @returns true if the state changed
 */
export async function setMuted(muteFile: string, muted: boolean): Promise<boolean> {
	if (!muted) return removeFile(muteFile)
	if (await fileExists(muteFile)) return false
	await writeFileAtomic(muteFile, '')
	return true
}

export function suppressFileFor(cwd: string): string {
	return path.join(path.resolve(cwd), SUPPRESS_FILE_NAME)
}

export function isSuppressed(cwd: string | undefined): Promise<boolean> {
	if (!cwd) return Promise.resolve(false)
	return fileExists(suppressFileFor(cwd))
}

/** @returns true if the state changed */
export async function setSuppressed(cwd: string, suppressed: boolean): Promise<boolean> {
	const file = suppressFileFor(cwd)
	if (!suppressed) return removeFile(file)
	if (await fileExists(file)) return false
	await fs.writeFile(file, '')
	return true
}

async function readTimestamp(file: string): Promise<number | null> {
	let raw: string
	try {
		raw = await fs.readFile(file, 'utf8')
	} catch (err) {
		if (isErrnoException(err, 'ENOENT')) return null
		throw err
	}
	const value = Number(raw.trim())
	return Number.isFinite(value) ? value : null
}

/**
 * Whether an idle notification may play now, and if so record it.
 *
 * Why: "Waiting for input" repeats every minute while the developer is away.
 * One reminder per cooldown window is useful; the rest is noise.
 *
 * Check-then-mark is not locked: two idle events racing within the same
 * millisecond may both play, which is harmless.
 *
 * @returns true when the cooldown has elapsed (the timestamp is updated)
 */
export async function takeIdleSlot(file: string, cooldownMs: number, now: number): Promise<boolean> {
	const last = await readTimestamp(file)
	if (last !== null && now - last < cooldownMs) return false
	await writeFileAtomic(file, String(now))
	return true
}
