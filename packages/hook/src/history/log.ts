/**
 * Bounded, process-shared record of recent spoken commentary.
 *
 * Why: The commentary generator is asked not to repeat itself, which only
 * works if it can see what was said recently -- across every project and
 * every hook process, not just the current one. The log is a JSON array on
 * disk, capped at `maxEntries` (default 20), oldest dropped first.
 *
 * Ordering: recent() returns records oldest first, most recent LAST, which is
 * also the on-disk order and the order they are listed in prompts.
 *
 * Concurrency: append() is a read-modify-write under an exclusive file lock
 * with an atomic rename, so racing appends serialize. Every append that
 * reports success is present in the file when it returns (until pushed out
 * by 20 newer records); there is no lost-update window.
 */

import { z } from 'zod'
import { describeError, LockTimeoutError } from '../errors.js'
import { createLogger } from '../log.js'
import { type FileLockOptions, withFileLock } from '../persist/file-lock.js'
import { readJsonFile, writeJsonFile } from '../persist/json-file.js'

const log = createLogger('history')

/** Default number of records retained. */
export const DEFAULT_HISTORY_MAX = 20

/** What kind of event a piece of commentary was about. */
export const CommentaryKindSchema = z.enum([
	'stop',
	'subagent_stop',
	'idle',
	'permission',
	'error',
	'warning',
	'notification',
])

export type CommentaryKind = z.infer<typeof CommentaryKindSchema>

export const HistoryRecordSchema = z.object({
	/** Epoch ms when the commentary was produced. */
	timestamp: z.number().int().nonnegative(),
	eventKind: CommentaryKindSchema,
	/** What was spoken (without the project-name prefix). */
	text: z.string(),
	/** Project the event came from, if known. */
	project: z.string().optional(),
	/** The event prompt the commentary responded to (truncated). */
	prompt: z.string().optional(),
})

export type HistoryRecord = z.infer<typeof HistoryRecordSchema>

const HistoryFileSchema = z.array(HistoryRecordSchema)

export interface HistoryLogOptions {
	/** Path of the JSON history file. */
	readonly file: string
	/** Maximum records kept. Default 20. */
	readonly maxEntries?: number
	/** Lock acquisition timeout. Default 2000ms. */
	readonly lockTimeoutMs?: number
	readonly staleMs?: number
}

export class HistoryLog {
	readonly file: string
	readonly maxEntries: number
	private readonly lockOptions: FileLockOptions

	constructor(options: HistoryLogOptions) {
		const maxEntries = options.maxEntries ?? DEFAULT_HISTORY_MAX
		if (!Number.isInteger(maxEntries) || maxEntries < 1) {
			throw new RangeError(`history size must be a positive integer, got ${maxEntries}`)
		}
		this.file = options.file
		this.maxEntries = maxEntries
		this.lockOptions = {
			timeoutMs: options.lockTimeoutMs ?? 2_000,
			staleMs: options.staleMs,
		}
	}

	/**
	 * Up to `n` most recent records, oldest first (most recent last).
	 *
	 * Reads without the lock: the file is only ever replaced atomically.
	 */
	async recent(n: number = this.maxEntries): Promise<HistoryRecord[]> {
		if (n <= 0) return []
		const records = await this.read()
		return records.slice(-n)
	}

	/**
	 * Append a record, dropping the oldest beyond the bound.
	 *
	 * @returns true once the record is durably in the log; false if the lock
	 * timed out or the write failed (logged, never thrown)
	 */
	async append(record: HistoryRecord): Promise<boolean> {
		const parsed = HistoryRecordSchema.safeParse(record)
		if (!parsed.success) {
			log.warn(`rejected malformed history record: ${parsed.error.message}`)
			return false
		}

		try {
			await withFileLock(
				this.file,
				async () => {
					const records = await this.read()
					records.push(parsed.data)
					await writeJsonFile(this.file, records.slice(-this.maxEntries))
				},
				this.lockOptions,
			)
			return true
		} catch (err) {
			if (err instanceof LockTimeoutError) {
				log.warnOnce('append:lock', `append skipped: ${err.message}`)
			} else {
				log.warn(`append failed: ${describeError(err)}`)
			}
			return false
		}
	}

	/** Read the whole log, failing open to empty. */
	private async read(): Promise<HistoryRecord[]> {
		const result = await readJsonFile(this.file, HistoryFileSchema)
		if (result.status === 'ok') return result.value.slice(-this.maxEntries)
		if (result.status === 'corrupt') {
			log.warnOnce('corrupt', `history at ${this.file} is unreadable; starting empty`)
		}
		return []
	}
}
