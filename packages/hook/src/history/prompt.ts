/**
 * Prompt assembly and output cleanup for the commentary generator.
 */

import type { HookInput, NotificationCategory } from '../hook-input.js'
import { classifyEvent } from '../hook-input.js'
import type { CommentaryKind, HistoryRecord } from './log.js'

/** Longest assistant message excerpt sent to the commentator. */
const MAX_MESSAGE_CHARS = 200

/** Longest hook notification excerpt sent to the commentator. */
const MAX_CONTEXT_CHARS = 150

/** Hard cap on words in a spoken quip. */
export const MAX_COMMENTARY_WORDS = 15

/** Preambles models like to emit before the actual line. */
const PREAMBLE_PREFIXES = ['here', 'i ', "i'", 'let me', 'sure', 'okay']

function truncate(text: string, max: number, ellipsis = false): string {
	if (text.length <= max) return text
	return ellipsis ? `${text.slice(0, max)}...` : text.slice(0, max)
}

/** Map a notification category to the history's event kind. */
function notificationKind(category: NotificationCategory): CommentaryKind {
	switch (category) {
		case 'idle_timeout':
			return 'idle'
		case 'permission_request':
			return 'permission'
		case 'error':
			return 'error'
		case 'warning':
			return 'warning'
		case 'general':
			return 'notification'
	}
}

/** Event kind recorded in history for a hook payload. */
export function commentaryKind(input: HookInput): CommentaryKind {
	const event = classifyEvent(input)
	if (event.name === 'Notification') return notificationKind(event.category)
	return event.name === 'SubagentStop' ? 'subagent_stop' : 'stop'
}

/**
 * Describe the event to the commentator in one bracketed line.
 *
 * @example
 * ```ts
 * buildEventPrompt({ hook_event_name: 'Stop', last_assistant_message: 'Fixed the login bug' })
 * // => '[The agent just finished a task] Fixed the login bug'
 * ```
 */
export function buildEventPrompt(input: HookInput): string {
	const event = classifyEvent(input)
	const lastMessage = input.last_assistant_message ?? ''
	const hookMessage = input.message ?? ''
	const context = (label: string) =>
		hookMessage ? `${label}${truncate(hookMessage, MAX_CONTEXT_CHARS)}` : ''

	if (event.name === 'Notification') {
		switch (event.category) {
			case 'idle_timeout':
				return '[The developer has gone quiet. The agent is idle, waiting for input.]'
			case 'permission_request':
				return `[The agent is asking the developer for permission.${context(' Context: ')}]`
			case 'error':
				return `[Something errored or failed.${context(' What happened: ')}]`
			case 'warning':
				return `[A warning was raised.${context(' Warning: ')}]`
			case 'general':
				return `[A notification occurred.${context(' ')}]`
		}
	}

	if (lastMessage) {
		const excerpt = truncate(lastMessage, MAX_MESSAGE_CHARS, true)
		return event.name === 'Stop' ? `[The agent just finished a task] ${excerpt}` : excerpt
	}
	return `[Event: ${event.name}]`
}

/**
 * Render recent history as a prompt section, oldest first.
 *
 * @returns Empty string when there is no history
 */
export function formatHistory(history: readonly HistoryRecord[]): string {
	if (history.length === 0) return ''
	const lines = ["RECENT HISTORY (what you've said before; don't repeat yourself):"]
	for (const record of history) {
		const prompt = record.prompt ? ` Event: "${record.prompt}" ->` : ''
		lines.push(`- [${record.project || '?'}]${prompt} You: "${record.text}"`)
	}
	return lines.join('\n')
}

/** System prompt with the history section appended. */
export function buildSystemPrompt(persona: string, history: readonly HistoryRecord[]): string {
	const section = formatHistory(history)
	return section ? `${persona}\n\n${section}` : persona
}

/**
 * Reduce raw model output to a single speakable line.
 *
 * Takes the last non-empty line that does not look like a preamble, strips
 * wrapping quotes and caps the length at 15 words (cut back to the last full
 * sentence when one fits).
 *
 * @example
 * ```ts
 * cleanCommentary('Sure, here you go:\n"Six files where one worked fine."')
 * // => 'Six files where one worked fine.'
 * ```
 */
export function cleanCommentary(raw: string): string {
	const lines = raw
		.trim()
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0)
	const kept = lines.filter((line) => {
		const lower = line.toLowerCase()
		return (
			!PREAMBLE_PREFIXES.some((prefix) => lower.startsWith(prefix)) &&
			!line.slice(0, 20).includes(':')
		)
	})
	let result = (kept.at(-1) ?? lines.at(-1) ?? '').replace(/^["']+|["']+$/g, '')

	const words = result.split(/\s+/).filter(Boolean)
	if (words.length > MAX_COMMENTARY_WORDS) {
		result = words.slice(0, MAX_COMMENTARY_WORDS).join(' ')
		const lastStop = result.lastIndexOf('.')
		if (lastStop !== -1) result = result.slice(0, lastStop + 1)
	}
	return result
}
