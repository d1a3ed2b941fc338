/**
 * Wires configuration into the concrete collaborators each command needs.
 */

import { CacheStore } from './cache/store.js'
import { type Commentator, CommandCommentator } from './commentary.js'
import type { MurmurConfig } from './config.js'
import { CommandGenerator, type Generator } from './generator.js'
import { HistoryLog } from './history/log.js'
import { PlaybackCoordinator } from './playback/lock.js'
import { type PlayOptions, type PlayOutcome, playClip, playSequence } from './playback/player.js'
import { loadTemplates, type Templates } from './templates.js'

export interface Runtime {
	readonly config: MurmurConfig
	readonly store: CacheStore
	readonly playback: PlaybackCoordinator
	readonly history: HistoryLog
	readonly templates: Templates
	/** Null until `generator.command` is configured. */
	readonly generator: Generator | null
	/** Null until `commentary.command` is configured. */
	readonly commentator: Commentator | null
	playFiles(files: readonly string[]): Promise<PlayOutcome[]>
	playFile(file: string): Promise<PlayOutcome>
}

export function playOptions(config: MurmurConfig): PlayOptions {
	return {
		player: config.player,
		volume: config.volume,
		speed: config.playbackSpeed,
		maxPlayMs: config.playback.maxPlayMs,
	}
}

export function createRuntime(config: MurmurConfig): Runtime {
	const options = playOptions(config)
	const { generator, commentary } = config
	return {
		config,
		store: new CacheStore({
			cacheDir: config.paths.cacheDir,
			capacity: config.cache.capacity,
			extension: config.cache.extension,
			lockTimeoutMs: config.cache.lockTimeoutMs,
		}),
		playback: new PlaybackCoordinator({
			lockPath: config.paths.playbackLock,
			timeoutMs: config.playback.lockTimeoutMs,
		}),
		history: new HistoryLog({
			file: config.paths.historyFile,
			maxEntries: config.history.maxEntries,
		}),
		templates: loadTemplates(),
		generator: generator.command
			? new CommandGenerator({
					command: generator.command,
					args: generator.args,
					timeoutMs: generator.timeoutMs,
				})
			: null,
		commentator: commentary.command
			? new CommandCommentator({
					command: commentary.command,
					args: commentary.args,
					timeoutMs: commentary.timeoutMs,
				})
			: null,
		playFiles: (files) => playSequence(files, options),
		playFile: (file) => playClip(file, options),
	}
}
