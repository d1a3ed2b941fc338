/**
 * Error taxonomy for the voice hook.
 *
 * Why: Every failure in the cache, lock and history layers is recoverable
 * locally -- the worst outcome is silence or a stale clip. Stable `code`
 * strings let the CLI report failures as JSON (`{ name, code }`) and let
 * callers branch without string-matching messages.
 */

/** Stable error codes surfaced in logs and CLI JSON output. */
export type MurmurErrorCode =
	| 'CACHE_CORRUPTED'
	| 'LOCK_TIMEOUT'
	| 'GENERATION_FAILED'
	| 'ARTIFACT_MISSING'

/** Base class for all errors raised by this package. */
export abstract class MurmurError extends Error {
	abstract readonly code: MurmurErrorCode

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

/**
 * The cache index could not be read or failed schema validation.
 *
 * Recovered by treating the cache as empty; the index is rewritten on the
 * next mutation.
 */
export class CacheCorruptedError extends MurmurError {
	readonly code = 'CACHE_CORRUPTED'

	constructor(
		readonly indexPath: string,
		options?: { cause?: unknown },
	) {
		super(`cache index at ${indexPath} is unreadable or malformed`, options)
	}
}

/** A lock (playback, cache index or history) was not acquired in time. */
export class LockTimeoutError extends MurmurError {
	readonly code = 'LOCK_TIMEOUT'

	constructor(
		readonly target: string,
		readonly timeoutMs: number,
	) {
		super(`timed out after ${timeoutMs}ms waiting for lock on ${target}`)
	}
}

/** The external generator (synthesizer or commentator) failed. */
export class GenerationFailedError extends MurmurError {
	readonly code = 'GENERATION_FAILED'
}

/** An index entry references an artifact file that no longer exists. */
export class ArtifactMissingError extends MurmurError {
	readonly code = 'ARTIFACT_MISSING'

	constructor(
		readonly fingerprint: string,
		readonly artifactPath: string,
	) {
		super(`artifact for ${fingerprint} is missing at ${artifactPath}`)
	}
}

/**
 * Narrow an unknown thrown value to a Node errno exception.
 *
 * @param err - Value caught from a fs or child_process call
 * @param code - Optional errno code to match, e.g. 'ENOENT'
 */
export function isErrnoException(
	err: unknown,
	code?: string,
): err is NodeJS.ErrnoException {
	if (!(err instanceof Error) || !('code' in err)) return false
	return code === undefined || err.code === code
}

/** Render any thrown value as a short single-line message. */
export function describeError(err: unknown): string {
	if (err instanceof MurmurError) return `${err.code}: ${err.message}`
	if (err instanceof Error) return err.message
	return String(err)
}
