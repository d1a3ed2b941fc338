/**
 * Content fingerprints for cached clips.
 *
 * Why: The cache is content-addressed -- the fingerprint of the spoken text
 * (plus the voice that speaks it) is both the index key and the artifact file
 * name, so a lookup never scans the cache directory and two processes that
 * want the same clip always agree on where it lives.
 *
 * Format: first 16 hex chars of SHA-256 over `${voice}:${normalizedText}`.
 */

import { createHash } from 'node:crypto'
import path from 'node:path'

/** Length of the hex fingerprint. 64 bits is ample for a 500-entry cache. */
export const FINGERPRINT_LENGTH = 16

const FINGERPRINT_PATTERN = /^[0-9a-f]{16}$/

/**
 * Normalize text so cosmetic differences do not split the cache.
 *
 * Applies Unicode NFC, trims, and collapses whitespace runs to one space.
 *
 * @example
 * ```ts
 * normalizeText('  Task\n complete. ') // => 'Task complete.'
 * ```
 */
export function normalizeText(text: string): string {
	return text.normalize('NFC').trim().replace(/\s+/g, ' ')
}

/**
 * Compute the deterministic fingerprint for a phrase spoken by a voice.
 *
 * Why: Combining voice + text means switching voices never plays a clip
 * recorded by the previous one.
 *
 * @param text - The phrase, e.g. 'Task complete.'
 * @param voice - Voice/engine discriminator, e.g. 'piper:en_US-amy'
 * @returns 16-char lowercase hex string
 */
export function fingerprint(text: string, voice: string): string {
	return createHash('sha256')
		.update(`${voice}:${normalizeText(text)}`)
		.digest('hex')
		.slice(0, FINGERPRINT_LENGTH)
}

/**
 * Fingerprint for the spoken project name that prefixes Stop messages.
 *
 * @param projectName - Basename of the agent's working directory
 * @param voice - Voice/engine discriminator
 */
export function projectFingerprint(projectName: string, voice: string): string {
	return fingerprint(projectKey(projectName), voice)
}

/** Cache text key for a project-name clip, e.g. `project:daylight`. */
export function projectKey(projectName: string): string {
	return `project:${projectName}`
}

/** Whether a string has the shape of a fingerprint. */
export function isFingerprint(value: string): boolean {
	return FINGERPRINT_PATTERN.test(value)
}

/**
 * Project name from the hook's working directory.
 *
 * @example
 * ```ts
 * projectNameFromCwd('/home/user/daylight/') // => 'daylight'
 * projectNameFromCwd('') // => ''
 * ```
 */
export function projectNameFromCwd(cwd: string | undefined): string {
	if (!cwd) return ''
	return path.basename(path.resolve(cwd))
}
