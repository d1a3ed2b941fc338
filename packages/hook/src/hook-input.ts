/**
 * Hook payload parsing and event classification.
 *
 * Why: The agent hands every hook a JSON object on stdin whose shape varies
 * by event and by agent version. Only a handful of fields matter here; the
 * schema validates those and passes everything else through untouched so
 * the payload can be forwarded to the detached commentary process intact.
 */

import { z } from 'zod'

export const HookInputSchema = z
	.object({
		hook_event_name: z.string().optional(),
		session_id: z.string().optional(),
		cwd: z.string().optional(),
		message: z.string().optional(),
		notification_type: z.string().optional(),
		last_assistant_message: z.string().optional(),
		session_mode: z.string().optional(),
		permission_mode: z.string().optional(),
	})
	.passthrough()

export type HookInput = z.infer<typeof HookInputSchema>

/** Lifecycle events that produce voice feedback. */
export type HookEventName = 'Stop' | 'SubagentStop' | 'Notification'

/** Sub-type of a Notification event, used to pick a message pool. */
export type NotificationCategory =
	| 'permission_request'
	| 'idle_timeout'
	| 'error'
	| 'warning'
	| 'general'

export type HookEvent =
	| { readonly name: 'Stop' }
	| { readonly name: 'SubagentStop' }
	| {
			readonly name: 'Notification'
			readonly category: NotificationCategory
			/** True for "waiting for input" prompts, which are rate-limited. */
			readonly idle: boolean
	  }

/**
 * Parse raw stdin into a hook payload.
 *
 * Malformed JSON or a non-object payload yields `{}`, which classifies as a
 * plain Stop -- the hook still makes a sound rather than failing silently.
 */
export function parseHookInput(raw: string): HookInput {
	if (!raw.trim()) return {}
	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch {
		return {}
	}
	const result = HookInputSchema.safeParse(parsed)
	return result.success ? result.data : {}
}

/**
 * Categorize a notification by its message text.
 *
 * @example
 * ```ts
 * categorizeNotification('Claude needs your permission to use Bash') // => 'permission_request'
 * categorizeNotification('Claude is waiting for your input') // => 'idle_timeout'
 * ```
 */
export function categorizeNotification(message: string | undefined): NotificationCategory {
	if (!message) return 'general'
	const lower = message.toLowerCase()
	if (lower.includes('permission') && lower.includes('use')) return 'permission_request'
	if (lower.includes('waiting for your input') || lower.includes('waiting for input')) {
		return 'idle_timeout'
	}
	if (['error', 'failed', 'exception', 'critical'].some((k) => lower.includes(k))) return 'error'
	if (['warning', 'warn', 'caution'].some((k) => lower.includes(k))) return 'warning'
	return 'general'
}

/**
 * Classify a payload into the event the voice layer reacts to.
 *
 * The explicit `notification_type: 'idle_prompt'` field wins over message
 * text. Unknown or missing event names are treated as Stop.
 */
export function classifyEvent(input: HookInput): HookEvent {
	switch (input.hook_event_name) {
		case 'SubagentStop':
			return { name: 'SubagentStop' }
		case 'Notification': {
			const category = categorizeNotification(input.message)
			const idle = input.notification_type === 'idle_prompt' || category === 'idle_timeout'
			return { name: 'Notification', category: idle ? 'idle_timeout' : category, idle }
		}
		default:
			return { name: 'Stop' }
	}
}

/** Whether the session runs in delegate (sub-agent orchestration) mode. */
export function isDelegateSession(input: HookInput): boolean {
	return input.session_mode === 'delegate' || input.permission_mode === 'delegate'
}
