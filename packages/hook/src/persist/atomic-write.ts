/**
 * Atomic file replacement.
 *
 * Why: The cache index, the history log and every cached clip are read by
 * other processes at arbitrary moments. Writing to a unique temp sibling,
 * fsyncing, then renaming means a reader sees either the previous complete
 * file or the new complete file -- never a truncated one. rename(2) within a
 * directory is atomic on every filesystem we care about.
 *
 * A crash between the temp write and the rename leaves a stray
 * `*.tmp` file next to the target; the target itself is untouched.
 */

import { randomBytes } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import { isErrnoException } from '../errors.js'

/**
 * Build the temp sibling path for a target.
 *
 * Unique per process and call so concurrent writers never share a temp file.
 */
export function tempPathFor(target: string): string {
	const suffix = `${process.pid}.${randomBytes(4).toString('hex')}.tmp`
	return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}`)
}

/**
 * Atomically replace `target` with `data`.
 *
 * Creates the parent directory if needed. On any failure the temp file is
 * removed and the error is rethrown -- callers decide whether the write was
 * critical.
 *
 * @param target - Absolute destination path
 * @param data - File contents
 */
export async function writeFileAtomic(
	target: string,
	data: string | Uint8Array,
): Promise<void> {
	await fs.mkdir(path.dirname(target), { recursive: true })
	const tmp = tempPathFor(target)
	try {
		const handle = await fs.open(tmp, 'w')
		try {
			await handle.writeFile(data)
			await handle.sync()
		} finally {
			await handle.close()
		}
		await fs.rename(tmp, target)
	} catch (err) {
		await fs.rm(tmp, { force: true })
		throw err
	}
}

/**
 * Remove a file, treating "already gone" as success.
 *
 * @returns true if a file was removed
 */
export async function removeFile(target: string): Promise<boolean> {
	try {
		await fs.unlink(target)
		return true
	} catch (err) {
		if (isErrnoException(err, 'ENOENT')) return false
		throw err
	}
}

/** Whether a regular file exists at `target`. */
export async function fileExists(target: string): Promise<boolean> {
	try {
		const stat = await fs.stat(target)
		return stat.isFile()
	} catch (err) {
		if (isErrnoException(err, 'ENOENT') || isErrnoException(err, 'ENOTDIR')) {
			return false
		}
		throw err
	}
}
