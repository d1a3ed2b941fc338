/**
 * Tagged stderr logging.
 *
 * Why: Hook invocations share the agent's terminal, so stdout stays clean and
 * everything diagnostic goes to stderr as a single `[tag] message` line.
 * Repeated warnings from the same call site are rate-limited to once per
 * 30 seconds so a wedged lock or a corrupt file cannot flood the output.
 *
 * Level is read from MURMUR_LOG_LEVEL (debug | info | warn | error | silent),
 * default `warn`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

/** Rate-limit interval for repeated warnings with the same key. */
const WARN_INTERVAL_MS = 30_000

/** Last emission time per rate-limit key, shared by every logger in the process. */
const lastWarnAt = new Map<string, number>()

/** Destination for formatted lines. Swappable in tests. */
export type LogSink = (line: string) => void

let sink: LogSink = (line) => {
	process.stderr.write(line)
}

/** Replace the log destination; returns the previous sink. */
export function setLogSink(next: LogSink): LogSink {
	const previous = sink
	sink = next
	return previous
}

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}

function currentLevel(): LogLevel {
	const raw = process.env.MURMUR_LOG_LEVEL
	return raw && isLogLevel(raw) ? raw : 'warn'
}

export interface Logger {
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
	error(message: string): void
	/**
	 * Warn at most once per 30s for the given key.
	 *
	 * @returns true when the line was written
	 */
	warnOnce(key: string, message: string): boolean
}

/**
 * Create a logger whose lines are prefixed with `[tag]`.
 *
 * @example
 * ```ts
 * const log = createLogger('cache-store')
 * log.warn('index unreadable, starting empty')
 * // stderr: [cache-store] index unreadable, starting empty
 * ```
 */
export function createLogger(tag: string): Logger {
	const write = (level: Exclude<LogLevel, 'silent'>, message: string) => {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return
		const marker = level === 'warn' || level === 'error' ? `${level}: ` : ''
		sink(`[${tag}] ${marker}${message}\n`)
	}

	return {
		debug: (message) => write('debug', message),
		info: (message) => write('info', message),
		warn: (message) => write('warn', message),
		error: (message) => write('error', message),
		warnOnce(key, message) {
			const now = Date.now()
			const scoped = `${tag}:${key}`
			const last = lastWarnAt.get(scoped) ?? 0
			if (now - last < WARN_INTERVAL_MS) return false
			lastWarnAt.set(scoped, now)
			write('warn', message)
			return true
		},
	}
}
