import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, type LogSink, setLogSink } from './log.js'

let lines: string[]
let previous: LogSink

beforeEach(() => {
	lines = []
	previous = setLogSink((line) => lines.push(line))
	vi.stubEnv('MURMUR_LOG_LEVEL', '')
})

afterEach(() => {
	setLogSink(previous)
	vi.unstubAllEnvs()
	vi.useRealTimers()
})

describe('createLogger', () => {
	it('prefixes lines with the tag and marks warnings', () => {
		const log = createLogger('cache-store')
		log.warn('index unreadable')
		log.error('gave up')
		expect(lines).toEqual(['[cache-store] warn: index unreadable\n', '[cache-store] error: gave up\n'])
	})

	it('hides info and debug at the default level', () => {
		const log = createLogger('quiet')
		log.info('hello')
		log.debug('details')
		expect(lines).toEqual([])
	})

	it('honours MURMUR_LOG_LEVEL', () => {
		vi.stubEnv('MURMUR_LOG_LEVEL', 'debug')
		createLogger('verbose').debug('details')
		vi.stubEnv('MURMUR_LOG_LEVEL', 'silent')
		createLogger('verbose').error('hidden')
		expect(lines).toEqual(['[verbose] details\n'])
	})

	it('falls back to warn for an unknown level', () => {
		vi.stubEnv('MURMUR_LOG_LEVEL', 'loud')
		const log = createLogger('fallback')
		log.info('hidden')
		log.warn('shown')
		expect(lines).toEqual(['[fallback] warn: shown\n'])
	})

	it('rate-limits repeated warnings per key', () => {
		vi.useFakeTimers()
		vi.setSystemTime(new Date('2026-01-01T00:00:00Z'))
		const log = createLogger('limited')

		expect(log.warnOnce('lock', 'busy')).toBe(true)
		expect(log.warnOnce('lock', 'busy again')).toBe(false)
		expect(log.warnOnce('other', 'different key')).toBe(true)

		vi.advanceTimersByTime(30_000)
		expect(log.warnOnce('lock', 'busy later')).toBe(true)
		expect(lines).toEqual([
			'[limited] warn: busy\n',
			'[limited] warn: different key\n',
			'[limited] warn: busy later\n',
		])
	})
})
