/**
 * Text-to-audio generation and cache population.
 *
 * Why: Synthesis is slow (hundreds of ms to seconds) and engine-specific, so
 * it sits behind a one-method interface and only ever runs off the hot path
 * -- in `murmur generate`, spawned detached on a cache miss, or ahead of time
 * with `--all`. The default implementation shells out to a configured
 * command (Piper, `say`, a wrapper script) and reads audio from its stdout.
 */

import type { CacheStore } from './cache/store.js'
import { GenerationFailedError } from './errors.js'
import { createLogger } from './log.js'
import { type CommandResult, runCommand } from './process.js'

const log = createLogger('generator')

export interface GenerationRequest {
	readonly fingerprint: string
	readonly text: string
	readonly voice: string
}

export interface Generator {
	/**
	 * Synthesize `text` with `voice`.
	 *
	 * @throws GenerationFailedError when no audio could be produced
	 */
	generate(request: GenerationRequest): Promise<Uint8Array>
}

export interface CommandGeneratorOptions {
	readonly command: string
	/** `{text}` and `{voice}` are replaced in every argument. */
	readonly args: readonly string[]
	readonly timeoutMs: number
}

/**
 * Substitute `{text}` and `{voice}` placeholders.
 *
 * @example
 * ```ts
 * expandArgs(['--voice', '{voice}'], { text: 'Done.', voice: 'amy' })
 * // => ['--voice', 'amy']
 * ```
 */
export function expandArgs(
	args: readonly string[],
	values: { readonly text: string; readonly voice: string },
): string[] {
	return args.map((arg) => arg.replaceAll('{text}', values.text).replaceAll('{voice}', values.voice))
}

/** Runs an external synthesizer; text on stdin, audio on stdout. */
export class CommandGenerator implements Generator {
	constructor(private readonly options: CommandGeneratorOptions) {}

	async generate(request: GenerationRequest): Promise<Uint8Array> {
		const { command, timeoutMs } = this.options
		const args = expandArgs(this.options.args, request)
		let result: CommandResult
		try {
			result = await runCommand(command, args, { input: request.text, timeoutMs })
		} catch (err) {
			throw new GenerationFailedError(`could not start ${command}`, { cause: err })
		}
		if (result.timedOut) {
			throw new GenerationFailedError(`${command} timed out after ${timeoutMs}ms`)
		}
		if (result.code !== 0) {
			const detail = result.stderr ? `: ${result.stderr}` : ''
			throw new GenerationFailedError(`${command} exited with code ${result.code}${detail}`)
		}
		if (result.stdout.length === 0) {
			throw new GenerationFailedError(`${command} produced no audio`)
		}
		return new Uint8Array(result.stdout)
	}
}

/** What populateCache() did for one request. */
export type PopulateOutcome =
	| { readonly status: 'present' }
	| { readonly status: 'generated'; readonly path: string }
	| { readonly status: 'failed'; readonly error: unknown }

/**
 * Ensure the cache holds audio for a request.
 *
 * Skips work when the fingerprint is already cached (several hook processes
 * may have spawned a generator for the same miss). Failures are reported in
 * the outcome, never thrown: the miss simply stays a miss.
 */
export async function populateCache(
	store: CacheStore,
	generator: Generator,
	request: GenerationRequest,
): Promise<PopulateOutcome> {
	if (await store.has(request.fingerprint)) return { status: 'present' }

	let audio: Uint8Array
	try {
		audio = await generator.generate(request)
	} catch (err) {
		log.warn(`generation failed for "${request.text}": ${String(err)}`)
		return { status: 'failed', error: err }
	}

	const stored = await store.insert(request.fingerprint, audio, { text: request.text })
	if (stored === null) {
		return { status: 'failed', error: new Error('cache insert failed') }
	}
	return { status: 'generated', path: stored }
}
