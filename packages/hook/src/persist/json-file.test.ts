import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { readJsonFile, writeJsonFile } from './json-file.js'

const Schema = z.object({ name: z.string(), count: z.number() })

let dir: string

beforeEach(async () => {
	dir = await fs.mkdtemp(path.join(os.tmpdir(), 'murmur-json-'))
})

afterEach(async () => {
	await fs.rm(dir, { recursive: true, force: true })
})

describe('readJsonFile', () => {
	it('reports a missing file', async () => {
		expect(await readJsonFile(path.join(dir, 'none.json'), Schema)).toEqual({ status: 'missing' })
	})

	it('reports unparseable JSON as corrupt', async () => {
		const file = path.join(dir, 'bad.json')
		await fs.writeFile(file, '{"name":')
		const result = await readJsonFile(file, Schema)
		expect(result.status).toBe('corrupt')
	})

	it('reports a schema violation as corrupt', async () => {
		const file = path.join(dir, 'wrong.json')
		await fs.writeFile(file, JSON.stringify({ name: 'x', count: 'three' }))
		const result = await readJsonFile(file, Schema)
		expect(result.status).toBe('corrupt')
		if (result.status !== 'corrupt') return
		expect(result.error).toBeInstanceOf(z.ZodError)
	})

	it('reads back what writeJsonFile wrote', async () => {
		const file = path.join(dir, 'ok.json')
		await writeJsonFile(file, { name: 'clips', count: 3 })

		expect(await fs.readFile(file, 'utf8')).toBe('{\n  "name": "clips",\n  "count": 3\n}\n')
		expect(await readJsonFile(file, Schema)).toEqual({
			status: 'ok',
			value: { name: 'clips', count: 3 },
		})
	})
})
