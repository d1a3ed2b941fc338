/**
 * Per-event entry point: decide what (if anything) to say, and say it.
 *
 * Why: A hook invocation has a hard budget -- the agent waits for it -- so
 * the hot path only does cheap checks, cache lookups and playback. Anything
 * slow (synthesis, commentary) is handed to a detached `murmur` child.
 *
 * Order of checks:
 *   1. global mute          -> skipped: muted
 *   2. disabled in config   -> skipped: disabled
 *   3. .murmur-suppress     -> skipped: suppressed
 *   4. delegate session     -> skipped: delegate
 *   5. idle cooldown        -> skipped: cooldown
 *   6. pick a message
 *   7. commentary enabled   -> commentary (spawned detached)
 *   8. sound disabled       -> skipped: sound_disabled
 *   9. project + message clips from the cache; misses are generated in the
 *      background and a fallback plays now
 *  10. playback lock busy   -> silent: lock_timeout
 *
 * Contract: handleHookEvent never throws for expected failures; the CLI
 * wraps it anyway so the agent's pipeline never sees a non-zero exit.
 */

import type { CacheStore } from './cache/store.js'
import type { MurmurConfig } from './config.js'
import { fingerprint, projectFingerprint, projectNameFromCwd } from './fingerprint.js'
import { classifyEvent, type HookInput, isDelegateSession } from './hook-input.js'
import { createLogger } from './log.js'
import type { PlaybackCoordinator } from './playback/lock.js'
import type { SpawnDetached } from './process.js'
import { isMuted, isSuppressed, takeIdleSlot } from './state.js'
import { selectMessage, type Templates } from './templates.js'

const log = createLogger('hook')

export type SkipReason =
	| 'muted'
	| 'disabled'
	| 'suppressed'
	| 'delegate'
	| 'cooldown'
	| 'sound_disabled'

export type HookOutcome =
	/** Cached clips played; `generating` lists background fills for misses. */
	| { readonly kind: 'played'; readonly files: readonly string[]; readonly generating: readonly string[] }
	/** The message clip was missing; something else played meanwhile. */
	| { readonly kind: 'fallback'; readonly files: readonly string[]; readonly generating: readonly string[] }
	| { readonly kind: 'commentary' }
	| { readonly kind: 'skipped'; readonly reason: SkipReason }
	| {
			readonly kind: 'silent'
			readonly reason: 'lock_timeout' | 'no_audio'
			readonly generating: readonly string[]
	  }

export interface HookDeps {
	readonly config: MurmurConfig
	readonly store: CacheStore
	readonly playback: PlaybackCoordinator
	readonly templates: Templates
	/** Plays files back to back; called with the playback lock held. */
	readonly play: (files: readonly string[]) => Promise<unknown>
	readonly spawnDetached: SpawnDetached
	readonly now?: () => number
	readonly random?: () => number
}

/** Check the cheap gates in order; the first that applies wins. */
async function skipReason(input: HookInput, config: MurmurConfig): Promise<SkipReason | null> {
	if (await isMuted(config.paths.muteFile)) return 'muted'
	if (!config.enabled) return 'disabled'
	if (await isSuppressed(input.cwd)) return 'suppressed'
	if (config.suppressDelegateMode && isDelegateSession(input)) return 'delegate'
	return null
}

/**
 * Handle one hook event.
 *
 * @param input - Validated hook payload (see hook-input.ts)
 */
export async function handleHookEvent(input: HookInput, deps: HookDeps): Promise<HookOutcome> {
	const { config, store } = deps
	const now = deps.now ?? Date.now

	const skip = await skipReason(input, config)
	if (skip) return { kind: 'skipped', reason: skip }

	const event = classifyEvent(input)
	if (event.name === 'Notification' && event.idle) {
		const allowed = await takeIdleSlot(config.paths.idleCooldownFile, config.idleCooldownMs, now())
		if (!allowed) return { kind: 'skipped', reason: 'cooldown' }
	}

	const message = selectMessage(deps.templates, event, deps.random)

	if (config.commentary.enabled && config.commentary.command) {
		deps.spawnDetached(['commentate'], JSON.stringify(input))
		return { kind: 'commentary' }
	}

	if (!config.soundEnabled) return { kind: 'skipped', reason: 'sound_disabled' }

	const project = projectNameFromCwd(input.cwd)
	const [messageClip, projectClip] = await Promise.all([
		store.lookup(fingerprint(message, config.voice)),
		project ? store.lookup(projectFingerprint(project, config.voice)) : Promise.resolve(null),
	])

	const generating: string[] = []
	if (!messageClip) {
		deps.spawnDetached(['generate', '--text', message])
		generating.push(message)
	}
	if (project && !projectClip) {
		deps.spawnDetached(['generate', '--project', project])
		generating.push(project)
	}

	let files: string[]
	let kind: 'played' | 'fallback'
	if (messageClip) {
		files = projectClip ? [projectClip, messageClip] : [messageClip]
		kind = 'played'
	} else {
		const fallback = projectClip ?? (await store.anyArtifact())
		files = fallback ? [fallback] : []
		kind = 'fallback'
	}
	if (files.length === 0) {
		log.debug(`nothing cached yet for "${message}"`)
		return { kind: 'silent', reason: 'no_audio', generating }
	}

	const result = await deps.playback.withPlaybackLock(() => deps.play(files))
	if (!result.ok) return { kind: 'silent', reason: 'lock_timeout', generating }
	return { kind, files, generating }
}
