/**
 * Dynamic commentary: a one-line quip about the event, spoken once.
 *
 * Why: Static phrases get repetitive. When enabled, `murmur hook` spawns
 * `murmur commentate` detached and this module does the slow part -- ask a
 * text generator for a line, remember it in the shared history so the next
 * call does not repeat it, synthesize it, and play it under the same
 * playback lock as cached clips.
 *
 * Commentary audio is never cached: each line is meant to be heard once.
 */

import { randomBytes } from 'node:crypto'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { GenerationFailedError } from './errors.js'
import { fingerprint, projectNameFromCwd } from './fingerprint.js'
import type { Generator } from './generator.js'
import type { HistoryLog } from './history/log.js'
import {
	buildEventPrompt,
	buildSystemPrompt,
	cleanCommentary,
	commentaryKind,
} from './history/prompt.js'
import type { HookInput } from './hook-input.js'
import { createLogger } from './log.js'
import { removeFile } from './persist/atomic-write.js'
import type { PlaybackCoordinator } from './playback/lock.js'
import { runCommand } from './process.js'

const log = createLogger('commentary')

export interface CommentaryRequest {
	/** Persona plus recent history. */
	readonly system: string
	/** One bracketed line describing the event. */
	readonly prompt: string
}

export interface Commentator {
	/**
	 * Produce raw commentary text (cleaned by the caller).
	 *
	 * @throws GenerationFailedError when nothing usable came back
	 */
	comment(request: CommentaryRequest): Promise<string>
}

export interface CommandCommentatorOptions {
	readonly command: string
	/** `{system}` is replaced with the system prompt in every argument. */
	readonly args: readonly string[]
	readonly timeoutMs: number
}

/**
 * Runs an external text generator with the event prompt on stdin.
 *
 * When no argument carries `{system}`, the system prompt is sent on stdin
 * ahead of the event prompt instead.
 */
export class CommandCommentator implements Commentator {
	constructor(private readonly options: CommandCommentatorOptions) {}

	async comment(request: CommentaryRequest): Promise<string> {
		const { command, timeoutMs } = this.options
		const takesSystemArg = this.options.args.some((arg) => arg.includes('{system}'))
		const args = this.options.args.map((arg) => arg.replaceAll('{system}', request.system))
		const input = takesSystemArg ? request.prompt : `${request.system}\n\n${request.prompt}`

		let stdout: string
		try {
			const result = await runCommand(command, args, { input, timeoutMs })
			if (result.timedOut) {
				throw new GenerationFailedError(`${command} timed out after ${timeoutMs}ms`)
			}
			if (result.code !== 0) {
				throw new GenerationFailedError(`${command} exited with code ${result.code}`)
			}
			stdout = result.stdout.toString('utf8')
		} catch (err) {
			if (err instanceof GenerationFailedError) throw err
			throw new GenerationFailedError(`could not start ${command}`, { cause: err })
		}
		if (!stdout.trim()) throw new GenerationFailedError(`${command} returned no text`)
		return stdout
	}
}

export interface CommentaryDeps {
	readonly commentator: Commentator
	readonly history: HistoryLog
	readonly persona: string
	/** Null when sound is off: the line is recorded but not spoken. */
	readonly speech: {
		readonly generator: Generator
		readonly voice: string
		readonly extension: string
		readonly playback: PlaybackCoordinator
		readonly play: (file: string) => Promise<unknown>
	} | null
	readonly now?: () => number
	/** Directory for the one-shot audio file. Default os.tmpdir(). */
	readonly tmpDir?: string
}

export type CommentaryOutcome =
	| { readonly status: 'played'; readonly text: string }
	| { readonly status: 'recorded'; readonly text: string }
	| { readonly status: 'silent'; readonly text: string; readonly reason: 'lock_timeout' }
	| { readonly status: 'failed'; readonly stage: 'comment' | 'synthesize' | 'play'; readonly error: unknown }

/**
 * Produce, remember and speak one line of commentary for a hook payload.
 *
 * Never throws. The history record is appended before synthesis so the
 * line counts as "said" even if audio fails.
 */
export async function runCommentary(input: HookInput, deps: CommentaryDeps): Promise<CommentaryOutcome> {
	const now = deps.now ?? Date.now
	const prompt = buildEventPrompt(input)
	const history = await deps.history.recent(deps.history.maxEntries)

	let text: string
	try {
		const raw = await deps.commentator.comment({
			system: buildSystemPrompt(deps.persona, history),
			prompt,
		})
		text = cleanCommentary(raw)
	} catch (err) {
		log.warn(`commentary failed: ${String(err)}`)
		return { status: 'failed', stage: 'comment', error: err }
	}
	if (!text) {
		const error = new GenerationFailedError('commentary was empty after cleanup')
		log.warn(error.message)
		return { status: 'failed', stage: 'comment', error }
	}

	const project = projectNameFromCwd(input.cwd)
	await deps.history.append({
		timestamp: now(),
		eventKind: commentaryKind(input),
		text,
		...(project ? { project } : {}),
		prompt,
	})

	const speech = deps.speech
	if (!speech) return { status: 'recorded', text }

	const spoken = project ? `${project}. ${text}` : text
	let audio: Uint8Array
	try {
		audio = await speech.generator.generate({
			fingerprint: fingerprint(spoken, speech.voice),
			text: spoken,
			voice: speech.voice,
		})
	} catch (err) {
		log.warn(`could not synthesize commentary: ${String(err)}`)
		return { status: 'failed', stage: 'synthesize', error: err }
	}

	const file = path.join(
		deps.tmpDir ?? os.tmpdir(),
		`murmur-commentary-${process.pid}-${randomBytes(4).toString('hex')}.${speech.extension}`,
	)
	try {
		await fs.writeFile(file, audio)
		const result = await speech.playback.withPlaybackLock(() => speech.play(file))
		return result.ok ? { status: 'played', text } : { status: 'silent', text, reason: 'lock_timeout' }
	} catch (err) {
		log.warn(`could not play commentary: ${String(err)}`)
		return { status: 'failed', stage: 'play', error: err }
	} finally {
		await removeFile(file).catch((err: unknown) => log.debug(`temp audio not removed: ${String(err)}`))
	}
}
