import path from 'node:path'
import { runCommentary } from '../commentary.js'
import { loadConfig, type MurmurConfig } from '../config.js'
import { describeError } from '../errors.js'
import { fingerprint, projectFingerprint, projectNameFromCwd } from '../fingerprint.js'
import { type GenerationRequest, populateCache } from '../generator.js'
import type { HistoryRecord } from '../history/log.js'
import { parseHookInput } from '../hook-input.js'
import { createLogger } from '../log.js'
import { handleHookEvent } from '../orchestrator.js'
import { type SpawnDetached, spawnDetached } from '../process.js'
import { createRuntime, type Runtime } from '../runtime.js'
import { isMuted, isSuppressed, setMuted, setSuppressed } from '../state.js'
import { allStaticMessages } from '../templates.js'

const log = createLogger('cli')

const EXIT_OK = 0
const EXIT_RUNTIME = 1
const EXIT_USAGE = 2

type ExitCode = 0 | 1 | 2

type CommandName =
	| 'hook'
	| 'generate'
	| 'commentate'
	| 'mute'
	| 'unmute'
	| 'suppress'
	| 'unsuppress'
	| 'status'
	| 'cache'
	| 'history'

const COMMANDS: readonly CommandName[] = [
	'hook',
	'generate',
	'commentate',
	'mute',
	'unmute',
	'suppress',
	'unsuppress',
	'status',
	'cache',
	'history',
]

interface HookCommand {
	readonly command: 'hook'
}

type GenerateTarget =
	| { readonly kind: 'text'; readonly text: string }
	| { readonly kind: 'project'; readonly name: string }
	| { readonly kind: 'all' }

interface GenerateCommand {
	readonly command: 'generate'
	readonly target: GenerateTarget
}

interface CommentateCommand {
	readonly command: 'commentate'
}

interface MuteCommand {
	readonly command: 'mute' | 'unmute'
}

interface SuppressCommand {
	readonly command: 'suppress' | 'unsuppress'
	/** Project directory; null means the current directory. */
	readonly dir: string | null
}

interface StatusCommand {
	readonly command: 'status'
	readonly json: boolean
	readonly dir: string | null
}

interface CacheCommand {
	readonly command: 'cache'
	readonly action: 'stats' | 'clear'
	readonly json: boolean
}

interface HistoryCommand {
	readonly command: 'history'
	readonly limit: number | null
	readonly json: boolean
}

export type CliOptions =
	| HookCommand
	| GenerateCommand
	| CommentateCommand
	| MuteCommand
	| SuppressCommand
	| StatusCommand
	| CacheCommand
	| HistoryCommand

interface ParseCliError {
	readonly ok: false
	readonly exitCode: ExitCode
	readonly message: string
	readonly output: string
}

interface ParseCliOk {
	readonly ok: true
	readonly options: CliOptions
}

export type ParseCliResult = ParseCliError | ParseCliOk

/** Commands that accept one positional argument (a directory or an action). */
const TAKES_POSITIONAL: readonly CommandName[] = ['cache', 'suppress', 'unsuppress', 'status']

/** Flags that take a value, and the commands that accept them. */
const VALUE_FLAGS = {
	'--text': ['generate'],
	'--project': ['generate'],
	'--limit': ['history'],
} as const satisfies Record<string, readonly CommandName[]>

/** Boolean flags, and the commands that accept them. */
const SWITCH_FLAGS = {
	'--all': ['generate'],
	'--json': ['status', 'cache', 'history'],
} as const satisfies Record<string, readonly CommandName[]>

type ValueFlag = keyof typeof VALUE_FLAGS
type SwitchFlag = keyof typeof SWITCH_FLAGS

/**
 * Parse `murmur` command-line arguments.
 *
 * Why: The command surface is small and fixed, and the hook path pays for
 * every module it loads, so parsing is hand-rolled and dependency-free.
 * Help is modelled as a non-ok result with exit code 0 so callers handle
 * every "print and stop" case in one place.
 */
export function parseCliArgs(argv: readonly string[]): ParseCliResult {
	const args = argv.slice(2)
	if (args.length === 0) return parseHelp()

	const positionals: string[] = []
	const values = new Map<ValueFlag, string>()
	const switches = new Set<SwitchFlag>()

	for (let i = 0; i < args.length; i++) {
		const token = args[i]
		if (token === undefined) continue

		if (token === '-h' || token === '--help') return parseHelp()

		if (!token.startsWith('--')) {
			positionals.push(token)
			continue
		}

		const eq = token.indexOf('=')
		const name = eq === -1 ? token : token.slice(0, eq)
		if (isValueFlag(name)) {
			const value = eq === -1 ? args[++i] : token.slice(eq + 1)
			if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
				return parseUsageError(`Missing value for ${name}`)
			}
			values.set(name, value)
			continue
		}
		if (isSwitchFlag(name) && eq === -1) {
			switches.add(name)
			continue
		}
		return parseUsageError(`Unknown option: ${token}`)
	}

	const [commandToken, ...rest] = positionals
	if (commandToken === 'help') return parseHelp()
	if (commandToken === undefined || !isCommand(commandToken)) {
		return parseUsageError(`Unknown command: ${commandToken ?? '(none)'}`)
	}
	const command = commandToken

	for (const flag of values.keys()) {
		if (!flagAllowed(VALUE_FLAGS[flag], command)) {
			return parseUsageError(`Option ${flag} is not valid for ${command}`)
		}
	}
	for (const flag of switches) {
		if (!flagAllowed(SWITCH_FLAGS[flag], command)) {
			return parseUsageError(`Option ${flag} is not valid for ${command}`)
		}
	}

	const json = switches.has('--json')
	const maxPositionals = TAKES_POSITIONAL.includes(command) ? 1 : 0
	if (rest.length > maxPositionals) {
		return parseUsageError(`Unexpected argument: ${rest[maxPositionals]}`)
	}
	const dir = rest[0] ?? null

	switch (command) {
		case 'hook':
		case 'commentate':
			return { ok: true, options: { command } }
		case 'mute':
		case 'unmute':
			return { ok: true, options: { command } }
		case 'suppress':
		case 'unsuppress':
			return { ok: true, options: { command, dir } }
		case 'status':
			return { ok: true, options: { command, json, dir } }
		case 'cache': {
			const action = rest[0] ?? 'stats'
			if (action !== 'stats' && action !== 'clear') {
				return parseUsageError(`Unknown cache action: ${action} (expected stats or clear)`)
			}
			return { ok: true, options: { command, action, json } }
		}
		case 'history': {
			const raw = values.get('--limit')
			if (raw === undefined) return { ok: true, options: { command, limit: null, json } }
			const limit = Number(raw)
			if (!Number.isInteger(limit) || limit < 1) {
				return parseUsageError(`Invalid --limit: ${raw} (expected a positive integer)`)
			}
			return { ok: true, options: { command, limit, json } }
		}
		case 'generate': {
			const text = values.get('--text')
			const project = values.get('--project')
			const all = switches.has('--all')
			const chosen = [text !== undefined, project !== undefined, all].filter(Boolean).length
			if (chosen !== 1) {
				return parseUsageError('generate needs exactly one of --text, --project or --all')
			}
			if (text !== undefined) return { ok: true, options: { command, target: { kind: 'text', text } } }
			if (project !== undefined) {
				return { ok: true, options: { command, target: { kind: 'project', name: project } } }
			}
			return { ok: true, options: { command, target: { kind: 'all' } } }
		}
	}
}

/** Injection points for the command runners; defaults are the real process. */
export interface CliContext {
	readonly env: NodeJS.ProcessEnv
	readonly cwd: string
	readonly readStdin: () => Promise<string>
	readonly stdout: (text: string) => void
	readonly stderr: (text: string) => void
	readonly spawnDetached: SpawnDetached
	readonly createRuntime: (config: MurmurConfig) => Runtime
}

const defaultContext: CliContext = {
	env: process.env,
	cwd: process.cwd(),
	readStdin,
	stdout: (text) => {
		process.stdout.write(text)
	},
	stderr: (text) => {
		process.stderr.write(text)
	},
	spawnDetached,
	createRuntime,
}

/**
 * Run the murmur CLI.
 *
 * Why: `hook`, `generate` and `commentate` run inside the agent's event
 * pipeline and must never fail it -- they catch everything and exit 0 (or
 * 1 for an explicit `generate` that produced nothing). The interactive
 * commands report errors normally.
 */
export async function runCli(
	argv: readonly string[] = process.argv,
	overrides: Partial<CliContext> = {},
): Promise<ExitCode> {
	const ctx: CliContext = { ...defaultContext, ...overrides }
	const parsed = parseCliArgs(argv)
	if (!parsed.ok) {
		if (parsed.exitCode === EXIT_OK) ctx.stdout(`${parsed.output}\n`)
		else ctx.stderr(`${parsed.output}\n`)
		return parsed.exitCode
	}

	const options = parsed.options
	try {
		switch (options.command) {
			case 'hook':
				return await runHook(ctx)
			case 'commentate':
				return await runCommentate(ctx)
			case 'generate':
				return await runGenerate(ctx, options)
			case 'mute':
			case 'unmute':
				return await runMute(ctx, options)
			case 'suppress':
			case 'unsuppress':
				return await runSuppress(ctx, options)
			case 'status':
				return await runStatus(ctx, options)
			case 'cache':
				return await runCache(ctx, options)
			case 'history':
				return await runHistory(ctx, options)
		}
	} catch (err) {
		ctx.stderr(`[murmur] ${options.command} failed: ${describeError(err)}\n`)
		return EXIT_RUNTIME
	}
}

async function runHook(ctx: CliContext): Promise<ExitCode> {
	try {
		const input = parseHookInput(await ctx.readStdin())
		const config = await loadConfig(ctx.env)
		const runtime = ctx.createRuntime(config)
		const outcome = await handleHookEvent(input, {
			config,
			store: runtime.store,
			playback: runtime.playback,
			templates: runtime.templates,
			play: (files) => runtime.playFiles(files),
			spawnDetached: ctx.spawnDetached,
		})
		log.debug(`outcome: ${JSON.stringify(outcome)}`)
	} catch (err) {
		log.error(`hook failed: ${describeError(err)}`)
	}
	return EXIT_OK
}

async function runCommentate(ctx: CliContext): Promise<ExitCode> {
	try {
		const input = parseHookInput(await ctx.readStdin())
		const config = await loadConfig(ctx.env)
		const runtime = ctx.createRuntime(config)
		if (!runtime.commentator) {
			log.warn('commentary requested but commentary.command is not configured')
			return EXIT_OK
		}
		const generator = runtime.generator
		const outcome = await runCommentary(input, {
			commentator: runtime.commentator,
			history: runtime.history,
			persona: config.commentary.persona,
			speech:
				config.soundEnabled && generator
					? {
							generator,
							voice: config.voice,
							extension: config.cache.extension,
							playback: runtime.playback,
							play: (file) => runtime.playFile(file),
						}
					: null,
		})
		log.debug(`commentary: ${outcome.status}`)
	} catch (err) {
		log.error(`commentary failed: ${describeError(err)}`)
	}
	return EXIT_OK
}

async function runGenerate(ctx: CliContext, options: GenerateCommand): Promise<ExitCode> {
	const config = await loadConfig(ctx.env)
	const runtime = ctx.createRuntime(config)
	const generator = runtime.generator
	if (!generator) {
		ctx.stderr(`[murmur] No generator configured; set generator.command in ${config.paths.configFile}\n`)
		return EXIT_RUNTIME
	}

	const requests = generationRequests(options.target, runtime)
	let generated = 0
	let skipped = 0
	let failed = 0
	for (const request of requests) {
		const outcome = await populateCache(runtime.store, generator, request)
		switch (outcome.status) {
			case 'present':
				skipped++
				ctx.stdout(`  [skip] "${request.text}" (already cached)\n`)
				break
			case 'generated':
				generated++
				ctx.stdout(`  [generated] "${request.text}" -> ${outcome.path}\n`)
				break
			case 'failed':
				failed++
				ctx.stdout(`  [failed] "${request.text}": ${describeError(outcome.error)}\n`)
				break
		}
	}
	if (requests.length > 1) {
		ctx.stdout(`Generated ${generated}, skipped ${skipped}, failed ${failed}\n`)
	}
	return failed > 0 ? EXIT_RUNTIME : EXIT_OK
}

function generationRequests(target: GenerateTarget, runtime: Runtime): GenerationRequest[] {
	const voice = runtime.config.voice
	switch (target.kind) {
		case 'text':
			return [{ fingerprint: fingerprint(target.text, voice), text: target.text, voice }]
		case 'project':
			return [{ fingerprint: projectFingerprint(target.name, voice), text: target.name, voice }]
		case 'all':
			return allStaticMessages(runtime.templates).map((text) => ({
				fingerprint: fingerprint(text, voice),
				text,
				voice,
			}))
	}
}

async function runMute(ctx: CliContext, options: MuteCommand): Promise<ExitCode> {
	const config = await loadConfig(ctx.env)
	const muted = options.command === 'mute'
	const changed = await setMuted(config.paths.muteFile, muted)
	const state = muted ? 'muted' : 'unmuted'
	ctx.stdout(changed ? `Voice ${state}\n` : `Voice already ${state}\n`)
	return EXIT_OK
}

async function runSuppress(ctx: CliContext, options: SuppressCommand): Promise<ExitCode> {
	const dir = path.resolve(ctx.cwd, options.dir ?? '.')
	const suppressed = options.command === 'suppress'
	const changed = await setSuppressed(dir, suppressed)
	const state = suppressed ? 'suppressed' : 'unsuppressed'
	const project = projectNameFromCwd(dir)
	ctx.stdout(changed ? `Project ${project} ${state}\n` : `Project ${project} already ${state}\n`)
	return EXIT_OK
}

async function runStatus(ctx: CliContext, options: StatusCommand): Promise<ExitCode> {
	const config = await loadConfig(ctx.env)
	const runtime = ctx.createRuntime(config)
	const dir = path.resolve(ctx.cwd, options.dir ?? '.')
	const [muted, suppressed, playing, cache, history] = await Promise.all([
		isMuted(config.paths.muteFile),
		isSuppressed(dir),
		runtime.playback.isPlaying(),
		runtime.store.stats(),
		runtime.history.recent(),
	])
	const data = {
		home: config.paths.home,
		enabled: config.enabled,
		muted,
		soundEnabled: config.soundEnabled,
		commentary: config.commentary.enabled && config.commentary.command !== null,
		generatorConfigured: runtime.generator !== null,
		player: config.player,
		voice: config.voice,
		project: { name: projectNameFromCwd(dir), suppressed },
		cache,
		historyEntries: history.length,
		playing,
	}
	if (options.json) {
		ctx.stdout(`${JSON.stringify({ status: 'data', data })}\n`)
		return EXIT_OK
	}
	const onOff = (value: boolean) => (value ? 'on' : 'off')
	ctx.stdout(
		[
			`Home:        ${data.home}`,
			`Voice:       ${muted ? 'muted' : onOff(data.enabled)}`,
			`Sound:       ${onOff(data.soundEnabled)} (${data.player})`,
			`Commentary:  ${onOff(data.commentary)}`,
			`Generator:   ${data.generatorConfigured ? 'configured' : 'not configured'}`,
			`Project:     ${data.project.name}${suppressed ? ' (suppressed)' : ''}`,
			`Cache:       ${cache.valid}/${cache.total} clips, capacity ${cache.capacity}`,
			`History:     ${data.historyEntries} entries`,
			`Playback:    ${playing ? 'playing' : 'idle'}`,
		].join('\n') + '\n',
	)
	return EXIT_OK
}

async function runCache(ctx: CliContext, options: CacheCommand): Promise<ExitCode> {
	const config = await loadConfig(ctx.env)
	const runtime = ctx.createRuntime(config)
	if (options.action === 'clear') {
		const removed = await runtime.store.clear()
		if (removed === null) {
			ctx.stderr('[murmur] Cache is busy; try again\n')
			return EXIT_RUNTIME
		}
		ctx.stdout(`Removed ${removed} clips\n`)
		return EXIT_OK
	}

	const stats = await runtime.store.stats()
	if (options.json) {
		ctx.stdout(`${JSON.stringify({ status: 'data', data: stats })}\n`)
		return EXIT_OK
	}
	ctx.stdout(
		[
			`Cache:     ${config.paths.cacheDir}`,
			`Clips:     ${stats.valid} valid of ${stats.total} indexed`,
			`Capacity:  ${stats.capacity}`,
			`Size:      ${stats.sizeBytes} bytes`,
		].join('\n') + '\n',
	)
	return EXIT_OK
}

async function runHistory(ctx: CliContext, options: HistoryCommand): Promise<ExitCode> {
	const config = await loadConfig(ctx.env)
	const runtime = ctx.createRuntime(config)
	const records = await runtime.history.recent(options.limit ?? runtime.history.maxEntries)
	if (options.json) {
		ctx.stdout(`${JSON.stringify({ status: 'data', data: records })}\n`)
		return EXIT_OK
	}
	if (records.length === 0) {
		ctx.stdout('No commentary yet\n')
		return EXIT_OK
	}
	ctx.stdout(`${records.map(formatHistoryLine).join('\n')}\n`)
	return EXIT_OK
}

function formatHistoryLine(record: HistoryRecord): string {
	const time = new Date(record.timestamp).toISOString()
	return `${time} [${record.project ?? '?'}] ${record.eventKind}: ${record.text}`
}

function parseHelp(): ParseCliError {
	return { ok: false, exitCode: EXIT_OK, message: 'Help requested', output: usageText() }
}

function parseUsageError(message: string): ParseCliError {
	return {
		ok: false,
		exitCode: EXIT_USAGE,
		message,
		output: `${message}\n\n${usageText()}`,
	}
}

function usageText(): string {
	return [
		'murmur - voice feedback for coding agent hooks',
		'',
		'Usage:',
		'  murmur <command> [options]',
		'',
		'Hook commands (read the hook payload on stdin, always exit 0):',
		'  hook                    Speak feedback for a lifecycle event',
		'  commentate              Generate and speak one line of commentary',
		'',
		'Cache:',
		'  generate --text <t>     Synthesize and cache a phrase',
		'  generate --project <n>  Synthesize and cache a project name',
		'  generate --all          Pre-generate every static message',
		'  cache [stats|clear]     Show cache usage, or remove every clip',
		'',
		'Controls:',
		'  mute | unmute           Silence or restore all voice feedback',
		'  suppress [dir]          Silence one project (default: current dir)',
		'  unsuppress [dir]        Restore a suppressed project',
		'  status [dir]            Show the current state',
		'  history [--limit <n>]   Show recent commentary',
		'',
		'Options:',
		'  --json                  Machine-readable output (status, cache, history)',
		'  -h, --help              Show this help',
		'',
		'Environment:',
		'  MURMUR_HOME             State directory (default ~/.cache/murmur)',
		'  MURMUR_VOICE=off        Disable voice feedback',
		'  MURMUR_LOG_LEVEL        debug | info | warn | error | silent',
	].join('\n')
}

function isCommand(value: string): value is CommandName {
	return COMMANDS.some((command) => command === value)
}

function isValueFlag(value: string): value is ValueFlag {
	return Object.hasOwn(VALUE_FLAGS, value)
}

function isSwitchFlag(value: string): value is SwitchFlag {
	return Object.hasOwn(SWITCH_FLAGS, value)
}

function flagAllowed(commands: readonly CommandName[], command: CommandName): boolean {
	return commands.includes(command)
}

/** Read all of stdin; empty when stdin is a terminal. */
async function readStdin(): Promise<string> {
	if (process.stdin.isTTY) return ''
	const chunks: Buffer[] = []
	for await (const chunk of process.stdin) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
	}
	return Buffer.concat(chunks).toString('utf8')
}
