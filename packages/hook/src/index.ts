/**
 * Public API of the murmur hook package.
 *
 * The CLI (`murmur`) is the primary interface; these exports exist for
 * embedding the cache, locks and history in other tooling.
 */

export { type CacheEntry, type CacheIndex, CacheEntrySchema, CacheIndexSchema } from './cache/schema.js'
export { CacheStore, type CacheStats, type CacheStoreOptions, DEFAULT_CACHE_CAPACITY, lruOrder } from './cache/store.js'
export {
	type Commentator,
	CommandCommentator,
	type CommentaryOutcome,
	runCommentary,
} from './commentary.js'
export { ConfigFileSchema, loadConfig, type MurmurConfig, type MurmurPaths, resolvePaths } from './config.js'
export {
	ArtifactMissingError,
	CacheCorruptedError,
	GenerationFailedError,
	LockTimeoutError,
	MurmurError,
	type MurmurErrorCode,
} from './errors.js'
export { fingerprint, normalizeText, projectFingerprint } from './fingerprint.js'
export { CommandGenerator, type GenerationRequest, type Generator, populateCache } from './generator.js'
export { HistoryLog, type HistoryRecord } from './history/log.js'
export { classifyEvent, type HookEvent, type HookInput, parseHookInput } from './hook-input.js'
export { createLogger, type Logger, setLogSink } from './log.js'
export { handleHookEvent, type HookDeps, type HookOutcome } from './orchestrator.js'
export { writeFileAtomic } from './persist/atomic-write.js'
export { withFileLock } from './persist/file-lock.js'
export { PlaybackCoordinator, type PlaybackResult } from './playback/lock.js'
export { playClip, playSequence, type PlayerName } from './playback/player.js'
