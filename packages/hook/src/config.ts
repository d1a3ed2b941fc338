/**
 * Configuration and well-known paths.
 *
 * Why: Every hook process loads the same small JSON file and resolves the
 * same shared paths; centralising both keeps the cache, history and lock
 * locations identical across `hook`, `generate` and `commentate` processes.
 *
 * Home directory: MURMUR_HOME, or ~/.cache/murmur
 *   config.json     user settings (all optional)
 *   cache/          clip cache (index + artifacts)
 *   history.json    commentary history
 *   playback.lock   playback lock (held while audio plays)
 *   .muted          global mute sentinel
 *   .idle_cooldown  timestamp of the last idle notification
 *
 * Environment:
 *   MURMUR_HOME       - relocate everything above
 *   MURMUR_VOICE=off  - disable voice without editing config.json
 *   MURMUR_LOG_LEVEL  - see log.ts
 *
 * A config file that is unreadable or fails validation is reported and
 * ignored: the hook runs on defaults rather than going silent.
 */

import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { createLogger } from './log.js'
import { readJsonFile } from './persist/json-file.js'
import { defaultPlayer, PLAYER_NAMES, type PlayerName } from './playback/player.js'

const log = createLogger('config')

/** Per-project sentinel file that silences the hook for that directory. */
export const SUPPRESS_FILE_NAME = '.murmur-suppress'

const DEFAULT_PERSONA = [
	'You are a dry, deadpan narrator living inside a developer notification sound.',
	'You comment on what the coding agent just did in ONE short line, at most 12 words.',
	'Reference a specific detail from the event. Plain text only: no quotes, no formatting.',
	'Never explain the joke, never ask questions, and vary your sentence structure.',
	'If history is provided, never repeat an earlier line or reuse its joke structure.',
].join('\n')

const PlayerSchema = z.enum(PLAYER_NAMES)

export const ConfigFileSchema = z.object({
	enabled: z.boolean().default(true),
	soundEnabled: z.boolean().default(true),
	/** Linear playback volume, 0..1. */
	volume: z.number().min(0).max(1).default(0.6),
	playbackSpeed: z.number().positive().max(4).default(1),
	/** Defaults to afplay on macOS and paplay elsewhere. */
	player: PlayerSchema.optional(),
	/** Voice/engine discriminator folded into every fingerprint. */
	voice: z.string().min(1).default('default'),
	suppressDelegateMode: z.boolean().default(true),
	idleCooldownMs: z.number().int().nonnegative().default(300_000),
	cache: z
		.object({
			capacity: z.number().int().positive().default(500),
			extension: z.string().regex(/^[a-z0-9]+$/).default('wav'),
			lockTimeoutMs: z.number().int().positive().default(2_000),
		})
		.default({}),
	history: z
		.object({
			maxEntries: z.number().int().positive().default(20),
		})
		.default({}),
	playback: z
		.object({
			lockTimeoutMs: z.number().int().positive().default(15_000),
			maxPlayMs: z.number().int().positive().default(15_000),
		})
		.default({}),
	generator: z
		.object({
			/** Synthesizer executable; audio is read from its stdout. */
			command: z.string().min(1).nullable().default(null),
			/** Arguments; `{text}` and `{voice}` are substituted. */
			args: z.array(z.string()).default([]),
			timeoutMs: z.number().int().positive().default(60_000),
		})
		.default({}),
	commentary: z
		.object({
			enabled: z.boolean().default(false),
			/** Text generator executable; reads the prompt on stdin. */
			command: z.string().min(1).nullable().default(null),
			args: z.array(z.string()).default([]),
			timeoutMs: z.number().int().positive().default(30_000),
			persona: z.string().min(1).default(DEFAULT_PERSONA),
		})
		.default({}),
})

export type ConfigFile = z.output<typeof ConfigFileSchema>

/** Absolute locations of all shared state. */
export interface MurmurPaths {
	readonly home: string
	readonly configFile: string
	readonly cacheDir: string
	readonly historyFile: string
	/** Lock target; the lock directory is `${playbackLock}.lock`. */
	readonly playbackLock: string
	readonly muteFile: string
	readonly idleCooldownFile: string
}

export type MurmurConfig = Omit<ConfigFile, 'player'> & {
	readonly player: PlayerName
	readonly paths: MurmurPaths
}

/** Resolve the home directory from the environment. */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
	const fromEnv = env.MURMUR_HOME?.trim()
	if (fromEnv) return path.resolve(fromEnv)
	return path.join(os.homedir(), '.cache', 'murmur')
}

/** Derive every well-known path from the home directory. */
export function resolvePaths(home: string): MurmurPaths {
	return {
		home,
		configFile: path.join(home, 'config.json'),
		cacheDir: path.join(home, 'cache'),
		historyFile: path.join(home, 'history.json'),
		playbackLock: path.join(home, 'playback'),
		muteFile: path.join(home, '.muted'),
		idleCooldownFile: path.join(home, '.idle_cooldown'),
	}
}

/**
 * Combine a parsed config file with environment overrides.
 *
 * Exposed separately from loadConfig() so tests can build configs without
 * touching disk.
 */
export function resolveConfig(
	file: ConfigFile,
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
): MurmurConfig {
	return {
		...file,
		enabled: file.enabled && env.MURMUR_VOICE !== 'off',
		player: file.player ?? defaultPlayer(platform),
		paths: resolvePaths(resolveHome(env)),
	}
}

/** Config with every default applied. */
export function defaultConfig(env: NodeJS.ProcessEnv = process.env): MurmurConfig {
	return resolveConfig(ConfigFileSchema.parse({}), env)
}

/**
 * Load `<home>/config.json` and apply environment overrides.
 *
 * Never throws: a missing file means defaults, a bad file is logged and
 * replaced by defaults.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<MurmurConfig> {
	const configFile = resolvePaths(resolveHome(env)).configFile
	const result = await readJsonFile(configFile, ConfigFileSchema)
	if (result.status === 'ok') return resolveConfig(result.value, env)
	if (result.status === 'corrupt') {
		log.warn(`ignoring invalid ${configFile}: ${String(result.error)}`)
	}
	return defaultConfig(env)
}
