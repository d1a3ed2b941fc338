import { describe, expect, it } from 'vitest'
import {
	fingerprint,
	isFingerprint,
	normalizeText,
	projectFingerprint,
	projectKey,
	projectNameFromCwd,
} from './fingerprint.js'

describe('normalizeText', () => {
	it('trims and collapses whitespace', () => {
		expect(normalizeText('  Task\n\t complete. ')).toBe('Task complete.')
	})

	it('composes to NFC', () => {
		expect(normalizeText('Cafe\u0301')).toBe('Caf\u00e9')
	})
})

describe('fingerprint', () => {
	it('is 16 lowercase hex characters', () => {
		const fp = fingerprint('Task complete.', 'test-voice')
		expect(fp).toMatch(/^[0-9a-f]{16}$/)
		expect(isFingerprint(fp)).toBe(true)
	})

	it('is stable across cosmetic differences', () => {
		expect(fingerprint('Task complete.', 'test-voice')).toBe(
			fingerprint('  Task   complete.\n', 'test-voice'),
		)
	})

	it('differs per voice and per text', () => {
		const base = fingerprint('Task complete.', 'test-voice')
		expect(fingerprint('Task complete.', 'other-voice')).not.toBe(base)
		expect(fingerprint('Task done.', 'test-voice')).not.toBe(base)
	})

	it('keys project names under a prefix', () => {
		expect(projectKey('daylight')).toBe('project:daylight')
		expect(projectFingerprint('daylight', 'test-voice')).toBe(
			fingerprint('project:daylight', 'test-voice'),
		)
		expect(projectFingerprint('daylight', 'test-voice')).not.toBe(fingerprint('daylight', 'test-voice'))
	})
})

describe('isFingerprint', () => {
	it('rejects anything that is not 16 lowercase hex characters', () => {
		expect(isFingerprint('ABCDEFABCDEFABCD')).toBe(false)
		expect(isFingerprint('abc')).toBe(false)
		expect(isFingerprint('../../etc/passwd')).toBe(false)
	})
})

describe('projectNameFromCwd', () => {
	it('uses the directory basename', () => {
		expect(projectNameFromCwd('/home/dev/daylight/')).toBe('daylight')
		expect(projectNameFromCwd('/home/dev/daylight')).toBe('daylight')
		expect(projectNameFromCwd('')).toBe('')
		expect(projectNameFromCwd(undefined)).toBe('')
	})
})
