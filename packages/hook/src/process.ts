/**
 * Child-process helpers: bounded command runs and detached self-spawns.
 *
 * Why: Synthesis and commentary shell out to user-configured programs that
 * may hang, so every run is bounded by a timeout. Cache population and
 * commentary must outlive the hook process -- the agent waits on the hook --
 * so they run in a detached, unref'd child that re-invokes this CLI.
 */

import childProcess from 'node:child_process'
import { createLogger } from './log.js'

const log = createLogger('process')

export interface CommandResult {
	/** Exit code; null when killed by a signal. */
	readonly code: number | null
	readonly stdout: Buffer
	/** Last few KB of stderr, for diagnostics. */
	readonly stderr: string
	readonly timedOut: boolean
}

export interface RunCommandOptions {
	/** Written to the child's stdin, which is then closed. */
	readonly input?: string
	readonly timeoutMs: number
}

/** Max stderr retained per run. */
const STDERR_TAIL_BYTES = 4_096

/**
 * Run a command to completion, collecting stdout as bytes.
 *
 * Rejects only when the program cannot be started; a non-zero exit or a
 * timeout resolves with the details so the caller can decide.
 */
export function runCommand(
	command: string,
	args: readonly string[],
	options: RunCommandOptions,
): Promise<CommandResult> {
	return new Promise<CommandResult>((resolve, reject) => {
		// Default stdio is piped on all three streams
		const proc = childProcess.spawn(command, args)
		const stdout: Buffer[] = []
		let stderr = ''
		let timedOut = false

		const timer = setTimeout(() => {
			timedOut = true
			proc.kill('SIGKILL')
		}, options.timeoutMs)

		proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
		proc.stderr.on('data', (chunk: Buffer) => {
			stderr = (stderr + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES)
		})
		proc.once('error', (err) => {
			clearTimeout(timer)
			reject(err)
		})
		proc.once('close', (code) => {
			clearTimeout(timer)
			resolve({ code, stdout: Buffer.concat(stdout), stderr: stderr.trim(), timedOut })
		})

		// EPIPE when the program ignores stdin and exits early is not a failure
		proc.stdin.on('error', (err) => log.debug(`${command} stdin: ${err.message}`))
		proc.stdin.end(options.input ?? '')
	})
}

/** Launches a detached `murmur <args>` process. */
export type SpawnDetached = (args: readonly string[], stdinPayload?: string) => void

/**
 * Re-invoke this CLI in a detached background process.
 *
 * Uses the running interpreter, its exec flags (so a `--import tsx` loader
 * carries over) and the entry script of the current process. When a stdin
 * payload is given it is piped in and the pipe closed; the parent does not
 * wait for the child.
 */
export const spawnDetached: SpawnDetached = (args, stdinPayload) => {
	const entry = process.argv[1]
	if (!entry) {
		log.warn(`cannot spawn background "${args.join(' ')}": no entry script`)
		return
	}
	try {
		const child = childProcess.spawn(
			process.execPath,
			[...process.execArgv, entry, ...args],
			{
				detached: true,
				stdio: [stdinPayload === undefined ? 'ignore' : 'pipe', 'ignore', 'ignore'],
				env: process.env,
			},
		)
		child.once('error', (err) => log.warn(`background "${args[0]}" failed: ${err.message}`))
		if (stdinPayload !== undefined && child.stdin) {
			child.stdin.on('error', (err) => log.debug(`background stdin: ${err.message}`))
			child.stdin.end(stdinPayload)
		}
		child.unref()
	} catch (err) {
		log.warn(`could not spawn background "${args.join(' ')}": ${String(err)}`)
	}
}
