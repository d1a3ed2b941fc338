/**
 * Message pools for static (cached) voice feedback.
 *
 * Why: Static phrases are what make the cache effective -- a few dozen
 * phrases, generated once, cover every Stop and Notification. Pools live in
 * templates.json beside this module so they can be edited without touching
 * code; a missing or malformed file falls back to a minimal built-in set.
 *
 * Shape: { [eventName]: { [pool]: string[] } }
 *   Stop / SubagentStop use the `generic` pool.
 *   Notification uses the pool named after the notification category,
 *   falling back to `general`.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import type { HookEvent } from './hook-input.js'
import { createLogger } from './log.js'

const log = createLogger('templates')

const TemplatesSchema = z.record(z.record(z.array(z.string().min(1)).min(1)))

export type Templates = z.infer<typeof TemplatesSchema>

/** Used only when templates.json is missing or invalid. */
const FALLBACK_TEMPLATES: Templates = {
	Stop: { generic: ['Task complete.', 'Done. Standing by.'] },
	Notification: { general: ['Notification.', 'Attention required.'] },
}

const LAST_RESORT_MESSAGE = 'Task complete.'

/**
 * Load message pools from JSON, falling back to built-ins.
 *
 * @param file - Defaults to templates.json next to this module
 */
export function loadTemplates(file: URL | string = new URL('./templates.json', import.meta.url)): Templates {
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(file, 'utf8'))
	} catch (err) {
		log.warn(`could not load templates (${String(err)}), using built-in messages`)
		return FALLBACK_TEMPLATES
	}
	const result = TemplatesSchema.safeParse(raw)
	if (!result.success) {
		log.warn(`templates are malformed (${result.error.issues[0]?.message}), using built-in messages`)
		return FALLBACK_TEMPLATES
	}
	return result.data
}

/** Candidate messages for an event. */
export function messagePool(templates: Templates, event: HookEvent): readonly string[] {
	const pools = templates[event.name] ?? {}
	if (event.name === 'Notification') {
		return pools[event.category] ?? pools.general ?? []
	}
	return pools.generic ?? Object.values(pools).flat()
}

/**
 * Pick a random message for an event.
 *
 * @param random - Injectable [0, 1) source for deterministic tests
 */
export function selectMessage(
	templates: Templates,
	event: HookEvent,
	random: () => number = Math.random,
): string {
	const pool = messagePool(templates, event)
	return pool[Math.floor(random() * pool.length)] ?? LAST_RESORT_MESSAGE
}

/**
 * Every distinct static phrase, sorted -- the pre-generation work list.
 *
 * Phrases containing `{` are treated as templated and skipped.
 */
export function allStaticMessages(templates: Templates): string[] {
	const messages = new Set<string>()
	for (const pools of Object.values(templates)) {
		for (const pool of Object.values(pools)) {
			for (const message of pool) {
				if (!message.includes('{')) messages.add(message)
			}
		}
	}
	return [...messages].sort()
}
