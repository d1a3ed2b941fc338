/**
 * Content-addressed disk cache for synthesized voice clips.
 *
 * Why: Synthesizing speech takes seconds; a hook has milliseconds. Every clip
 * is generated once (in a detached background process) and stored under its
 * fingerprint, so the next event that needs the same phrase finds it with a
 * single index read and a stat.
 *
 * Layout:
 *   {cacheDir}/_index.json        index: fingerprint -> CacheEntry, plus capacity
 *   {cacheDir}/{fingerprint}.wav  one artifact per fingerprint
 *
 * The index is the single source of truth. Every mutation runs under the
 * index lock as one read-modify-write and lands via atomic rename, so
 * concurrent hook processes can never observe or produce a torn index.
 * Eviction is strict LRU on lastAccessedAt (ties: createdAt, then
 * fingerprint) and only happens on insert; lookups stay cheap.
 *
 * Files that exist on disk but not in the index are orphans and are ignored.
 * Index entries whose files have vanished are misses, and are dropped the
 * next time the index is written.
 *
 * Error contract: nothing here throws for IO, lock or corruption problems.
 * A broken index reads as empty and is rebuilt on the next write; a lock
 * timeout turns the operation into a miss / no-op. Voice is non-critical.
 */

import path from 'node:path'
import {
	ArtifactMissingError,
	CacheCorruptedError,
	describeError,
	LockTimeoutError,
} from '../errors.js'
import { isFingerprint } from '../fingerprint.js'
import { createLogger } from '../log.js'
import { fileExists, removeFile, writeFileAtomic } from '../persist/atomic-write.js'
import { type FileLockOptions, withFileLock } from '../persist/file-lock.js'
import { readJsonFile, writeJsonFile } from '../persist/json-file.js'
import {
	type CacheEntry,
	type CacheIndex,
	CacheIndexSchema,
	emptyIndex,
} from './schema.js'

const log = createLogger('cache-store')

/** Default maximum number of cached clips. */
export const DEFAULT_CACHE_CAPACITY = 500

/** Index file name inside the cache directory. */
export const INDEX_FILE_NAME = '_index.json'

export interface CacheStoreOptions {
	/** Directory holding the index and the artifacts. */
	readonly cacheDir: string
	/** Maximum number of entries (>= 1). Default 500. */
	readonly capacity?: number
	/** Artifact file extension without the dot. Default 'wav'. */
	readonly extension?: string
	/** Index lock acquisition timeout. Default 2000ms. */
	readonly lockTimeoutMs?: number
	/** Stale age for abandoned index locks. Default 5000ms. */
	readonly staleMs?: number
	/** Clock for createdAt / lastAccessedAt. Default Date.now. */
	readonly now?: () => number
}

/** Summary for diagnostics. */
export interface CacheStats {
	/** Entries in the index. */
	readonly total: number
	/** Entries whose artifact file exists. */
	readonly valid: number
	readonly capacity: number
	/** Sum of sizeBytes over valid entries. */
	readonly sizeBytes: number
}

/** Options accepted by insert(). */
export interface InsertOptions {
	/** Source text, stored in the index for inspection. */
	readonly text?: string
}

/**
 * Order entries least-recently-used first.
 *
 * @returns A new array; the input is not modified
 */
export function lruOrder(entries: Iterable<CacheEntry>): CacheEntry[] {
	return [...entries].sort(
		(a, b) =>
			a.lastAccessedAt - b.lastAccessedAt ||
			a.createdAt - b.createdAt ||
			a.fingerprint.localeCompare(b.fingerprint),
	)
}

export class CacheStore {
	readonly cacheDir: string
	readonly indexPath: string
	readonly capacity: number
	private readonly extension: string
	private readonly lockOptions: FileLockOptions
	private readonly now: () => number

	constructor(options: CacheStoreOptions) {
		const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`cache capacity must be a positive integer, got ${capacity}`)
		}
		this.cacheDir = path.resolve(options.cacheDir)
		this.indexPath = path.join(this.cacheDir, INDEX_FILE_NAME)
		this.capacity = capacity
		this.extension = options.extension ?? 'wav'
		this.lockOptions = {
			timeoutMs: options.lockTimeoutMs ?? 2_000,
			staleMs: options.staleMs,
		}
		this.now = options.now ?? Date.now
	}

	/**
	 * Deterministic artifact path for a fingerprint.
	 *
	 * Why: Derived from the fingerprint alone so a lookup never scans the
	 * directory and racing generators for the same content target one file.
	 */
	artifactPath(fingerprint: string): string {
		return path.join(this.cacheDir, `${fingerprint}.${this.extension}`)
	}

	/**
	 * Resolve a cached clip and mark it as recently used.
	 *
	 * Misses are answered from a lock-free read. On a hit the recency bump is
	 * persisted under the index lock before the path is returned, so eviction
	 * order stays accurate across processes. If the lock cannot be taken in
	 * time the call reports a miss rather than an un-bumped hit.
	 *
	 * @returns Absolute artifact path, or null on a miss
	 */
	async lookup(fingerprint: string): Promise<string | null> {
		const snapshot = await this.readIndex()
		const seen = snapshot.entries[fingerprint]
		if (!seen || !(await this.artifactExists(seen))) return null

		try {
			return await withFileLock(
				this.indexPath,
				async () => {
					const index = await this.readIndex()
					const entry = index.entries[fingerprint]
					if (!entry || !(await this.artifactExists(entry))) return null
					entry.lastAccessedAt = this.nextStamp(index)
					await this.pruneMissing(index)
					await this.persist(index)
					return this.resolve(entry)
				},
				this.lockOptions,
			)
		} catch (err) {
			this.report('lookup', err)
			return null
		}
	}

	/**
	 * Lock-free existence check. Does not touch recency.
	 *
	 * Used by background generators to skip work another process already did.
	 */
	async has(fingerprint: string): Promise<boolean> {
		const index = await this.readIndex()
		const entry = index.entries[fingerprint]
		return entry !== undefined && (await this.artifactExists(entry))
	}

	/**
	 * Store an artifact and register it in the index.
	 *
	 * The artifact is written under the index lock so a concurrent eviction
	 * can never delete a file between its write and its registration.
	 * Re-inserting an existing fingerprint overwrites the artifact and
	 * refreshes createdAt/lastAccessedAt. Overflow is evicted LRU-first, index
	 * first and files after, so a crash mid-eviction leaves orphans (ignored)
	 * rather than dangling entries.
	 *
	 * @param fingerprint - 16-char hex fingerprint
	 * @param bytes - Encoded audio
	 * @returns Absolute artifact path, or null if the insert did not happen
	 */
	async insert(
		fingerprint: string,
		bytes: Uint8Array,
		options: InsertOptions = {},
	): Promise<string | null> {
		if (!isFingerprint(fingerprint)) {
			log.warn(`refusing to cache malformed fingerprint ${JSON.stringify(fingerprint)}`)
			return null
		}

		try {
			return await withFileLock(
				this.indexPath,
				async () => {
					const file = this.artifactPath(fingerprint)
					await writeFileAtomic(file, bytes)

					const index = await this.readIndex()
					const now = this.nextStamp(index)
					index.entries[fingerprint] = {
						fingerprint,
						path: path.basename(file),
						createdAt: now,
						lastAccessedAt: now,
						sizeBytes: bytes.byteLength,
						...(options.text === undefined ? {} : { text: options.text }),
					}

					await this.pruneMissing(index)
					const victims = this.takeOverflow(index)
					await this.persist(index)
					await this.removeArtifacts(victims)
					return file
				},
				this.lockOptions,
			)
		} catch (err) {
			this.report('insert', err)
			return null
		}
	}

	/**
	 * Evict exactly the least-recently-used entry and its artifact.
	 *
	 * @returns The evicted entry, or null if the cache is empty or locked
	 */
	async evictOne(): Promise<CacheEntry | null> {
		try {
			return await withFileLock(
				this.indexPath,
				async () => {
					const index = await this.readIndex()
					await this.pruneMissing(index)
					const [victim] = lruOrder(Object.values(index.entries))
					if (!victim) return null
					delete index.entries[victim.fingerprint]
					await this.persist(index)
					await this.removeArtifacts([victim])
					return victim
				},
				this.lockOptions,
			)
		} catch (err) {
			this.report('evict', err)
			return null
		}
	}

	/**
	 * Any playable clip, preferring the most recently used.
	 *
	 * Why: On a miss the hook still wants to make *some* sound so the user
	 * knows the agent needs them; the specific phrase arrives next time.
	 */
	async anyArtifact(): Promise<string | null> {
		const index = await this.readIndex()
		for (const entry of lruOrder(Object.values(index.entries)).reverse()) {
			if (await this.artifactExists(entry)) return this.resolve(entry)
		}
		return null
	}

	/** Entries ordered most recently used first. Read-only snapshot. */
	async entries(): Promise<CacheEntry[]> {
		const index = await this.readIndex()
		return lruOrder(Object.values(index.entries)).reverse()
	}

	/** Count and size of cached clips. */
	async stats(): Promise<CacheStats> {
		const index = await this.readIndex()
		const entries = Object.values(index.entries)
		const present = await Promise.all(entries.map((entry) => this.artifactExists(entry)))
		const valid = entries.filter((_, i) => present[i])
		return {
			total: entries.length,
			valid: valid.length,
			capacity: this.capacity,
			sizeBytes: valid.reduce((sum, entry) => sum + entry.sizeBytes, 0),
		}
	}

	/**
	 * Drop every indexed clip and reset the index.
	 *
	 * @returns Number of entries removed, or null if the index was locked
	 */
	async clear(): Promise<number | null> {
		try {
			return await withFileLock(
				this.indexPath,
				async () => {
					const index = await this.readIndex()
					const victims = Object.values(index.entries)
					await this.persist(emptyIndex(this.capacity))
					await this.removeArtifacts(victims)
					return victims.length
				},
				this.lockOptions,
			)
		} catch (err) {
			this.report('clear', err)
			return null
		}
	}

	/**
	 * Read the index, failing open to an empty one.
	 *
	 * A missing file is a fresh cache. An unreadable or malformed file is
	 * CacheCorrupted: logged, treated as empty, overwritten on the next write.
	 */
	private async readIndex(): Promise<CacheIndex> {
		const result = await readJsonFile(this.indexPath, CacheIndexSchema)
		if (result.status === 'ok') return result.value
		if (result.status === 'corrupt') {
			const error = new CacheCorruptedError(this.indexPath, { cause: result.error })
			log.warnOnce('corrupt', `${error.message}; starting from an empty cache`)
		}
		return emptyIndex(this.capacity)
	}

	private async persist(index: CacheIndex): Promise<void> {
		await writeJsonFile(this.indexPath, { ...index, capacity: this.capacity })
	}

	/** Remove entries whose artifacts no longer exist (ArtifactMissing). */
	private async pruneMissing(index: CacheIndex): Promise<void> {
		const entries = Object.values(index.entries)
		const present = await Promise.all(entries.map((entry) => this.artifactExists(entry)))
		entries.forEach((entry, i) => {
			if (present[i]) return
			const missing = new ArtifactMissingError(entry.fingerprint, this.resolve(entry))
			log.debug(`${missing.message}; dropping entry`)
			delete index.entries[entry.fingerprint]
		})
	}

	/** Remove LRU entries from the index until it fits; returns them. */
	private takeOverflow(index: CacheIndex): CacheEntry[] {
		const ordered = lruOrder(Object.values(index.entries))
		const victims = ordered.slice(0, Math.max(0, ordered.length - this.capacity))
		for (const victim of victims) {
			delete index.entries[victim.fingerprint]
		}
		return victims
	}

	private async removeArtifacts(entries: readonly CacheEntry[]): Promise<void> {
		for (const entry of entries) {
			try {
				await removeFile(this.resolve(entry))
			} catch (err) {
				// The index no longer references it -- it is now an orphan
				log.warn(`could not delete ${entry.path}: ${describeError(err)}`)
			}
		}
	}

	/**
	 * Recency stamp strictly newer than every entry in the index.
	 *
	 * Why: The clock is only millisecond-precise; a lookup landing in the same
	 * millisecond as another entry's insert would otherwise tie and lose the
	 * promotion to the createdAt tie-break.
	 */
	private nextStamp(index: CacheIndex): number {
		let newest = 0
		for (const entry of Object.values(index.entries)) {
			newest = Math.max(newest, entry.lastAccessedAt, entry.createdAt)
		}
		return Math.max(this.now(), newest + 1)
	}

	private resolve(entry: CacheEntry): string {
		return path.join(this.cacheDir, entry.path)
	}

	private async artifactExists(entry: CacheEntry): Promise<boolean> {
		try {
			return await fileExists(this.resolve(entry))
		} catch (err) {
			log.debug(`cannot stat ${entry.path}: ${describeError(err)}`)
			return false
		}
	}

	private report(operation: string, err: unknown): void {
		if (err instanceof LockTimeoutError) {
			log.warnOnce(`${operation}:lock`, `${operation} skipped: ${err.message}`)
			return
		}
		log.warn(`${operation} failed: ${describeError(err)}`)
	}
}
