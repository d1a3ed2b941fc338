/**
 * Persisted shape of the clip cache index (`<cacheDir>/_index.json`).
 *
 * Consumers outside the store (diagnostics, `murmur cache stats`) may read
 * this file but never write it.
 */

import { z } from 'zod'

export const INDEX_VERSION = 1

export const CacheEntrySchema = z.object({
	fingerprint: z.string().regex(/^[0-9a-f]{16}$/),
	/** Artifact file name, relative to the cache directory. */
	path: z.string().regex(/^[^/\\]+$/, 'must be a bare file name'),
	/** Epoch ms when the artifact was (re)written. */
	createdAt: z.number().int().nonnegative(),
	/** Epoch ms of the last cache hit (or of creation). */
	lastAccessedAt: z.number().int().nonnegative(),
	sizeBytes: z.number().int().nonnegative(),
	/** Source text, kept for inspection only. */
	text: z.string().optional(),
})

export const CacheIndexSchema = z
	.object({
		version: z.literal(INDEX_VERSION),
		capacity: z.number().int().positive(),
		entries: z.record(CacheEntrySchema),
	})
	.refine(
		(index) =>
			Object.entries(index.entries).every(([key, entry]) => key === entry.fingerprint),
		{ message: 'entry keys must match their fingerprint', path: ['entries'] },
	)

export type CacheEntry = z.infer<typeof CacheEntrySchema>
export type CacheIndex = z.infer<typeof CacheIndexSchema>

/** A fresh, empty index. */
export function emptyIndex(capacity: number): CacheIndex {
	return { version: INDEX_VERSION, capacity, entries: {} }
}
