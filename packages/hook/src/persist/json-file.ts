/**
 * Schema-checked JSON file reads.
 *
 * Why: Persisted state is written by other processes, older versions, or a
 * human with an editor. Reading it through a zod schema turns "file is
 * missing", "file is garbage" and "file is fine" into three explicit cases
 * so callers can fail open instead of crashing on a property access.
 */

import fs from 'node:fs/promises'
import type { z } from 'zod'
import { isErrnoException } from '../errors.js'
import { writeFileAtomic } from './atomic-write.js'

/** Outcome of reading a JSON file against a schema. */
export type JsonReadResult<T> =
	| { readonly status: 'ok'; readonly value: T }
	| { readonly status: 'missing' }
	| { readonly status: 'corrupt'; readonly error: unknown }

/**
 * Read and validate a JSON file.
 *
 * Never throws for missing or malformed files; permission and other IO
 * errors are reported as `corrupt` since the state is equally unusable.
 *
 * @param file - Absolute path to the JSON file
 * @param schema - zod schema the parsed value must satisfy
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
	file: string,
	schema: S,
): Promise<JsonReadResult<z.output<S>>> {
	let raw: string
	try {
		raw = await fs.readFile(file, 'utf8')
	} catch (err) {
		if (isErrnoException(err, 'ENOENT')) return { status: 'missing' }
		return { status: 'corrupt', error: err }
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (err) {
		return { status: 'corrupt', error: err }
	}

	const result = schema.safeParse(parsed)
	if (!result.success) return { status: 'corrupt', error: result.error }
	return { status: 'ok', value: result.data }
}

/**
 * Serialize a value as pretty JSON and atomically replace the file.
 *
 * @param file - Absolute path to the JSON file
 * @param value - JSON-serializable value
 */
export async function writeJsonFile(file: string, value: unknown): Promise<void> {
	await writeFileAtomic(file, `${JSON.stringify(value, null, 2)}\n`)
}
