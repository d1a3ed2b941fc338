import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { type LogSink, setLogSink } from './log.js'
import { allStaticMessages, loadTemplates, messagePool, selectMessage, type Templates } from './templates.js'

let dir: string
let lines: string[]
let previous: LogSink

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), 'murmur-templates-'))
	lines = []
	previous = setLogSink((line) => lines.push(line))
})

afterEach(async () => {
	setLogSink(previous)
	await fs.rm(dir, { recursive: true, force: true })
})

const templates: Templates = {
	Stop: { generic: ['Done.', 'Finished.'] },
	SubagentStop: { generic: ['Helper done.'] },
	Notification: {
		general: ['Notification.'],
		permission_request: ['Permission needed.'],
	},
}

describe('loadTemplates', () => {
	it('loads the bundled message pools', () => {
		const loaded = loadTemplates()
		expect(loaded.Stop?.generic).toContain('Task complete.')
		expect(loaded.Notification?.idle_timeout?.length).toBeGreaterThan(0)
		expect(lines).toEqual([])
	})

	it('falls back to built-in messages when the file is missing', () => {
		const loaded = loadTemplates(path.join(dir, 'missing.json'))
		expect(loaded.Stop?.generic).toEqual(['Task complete.', 'Done. Standing by.'])
		expect(lines).toHaveLength(1)
	})

	it('falls back to built-in messages when a pool is empty', async () => {
		const file = path.join(dir, 'templates.json')
		await fs.writeFile(file, JSON.stringify({ Stop: { generic: [] } }))
		expect(loadTemplates(file).Notification?.general).toEqual(['Notification.', 'Attention required.'])
	})
})

describe('messagePool', () => {
	it('uses the category pool for notifications, then the general pool', () => {
		expect(
			messagePool(templates, { name: 'Notification', category: 'permission_request', idle: false }),
		).toEqual(['Permission needed.'])
		expect(messagePool(templates, { name: 'Notification', category: 'error', idle: false })).toEqual([
			'Notification.',
		])
	})

	it('uses the generic pool for stop events', () => {
		expect(messagePool(templates, { name: 'SubagentStop' })).toEqual(['Helper done.'])
	})
})

describe('selectMessage', () => {
	it('picks by the random source', () => {
		expect(selectMessage(templates, { name: 'Stop' }, () => 0)).toBe('Done.')
		expect(selectMessage(templates, { name: 'Stop' }, () => 0.99)).toBe('Finished.')
	})

	it('still returns something when no pool matches', () => {
		expect(selectMessage({}, { name: 'Stop' }, () => 0.5)).toBe('Task complete.')
	})
})

describe('allStaticMessages', () => {
	it('lists each distinct phrase once, sorted, skipping templated ones', () => {
		expect(
			allStaticMessages({
				Stop: { generic: ['b', 'a', '{project} done'] },
				Notification: { general: ['a'] },
			}),
		).toEqual(['a', 'b'])
	})
})
