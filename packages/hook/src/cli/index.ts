#!/usr/bin/env node

/**
 * CLI entry point for murmur.
 *
 * Why: Agent hook configuration points at this binary (`murmur hook`), and
 * the hook re-invokes it detached for background generation and commentary.
 */

import { runCli } from './command.js'

runCli()
	.then((exitCode) => {
		process.exitCode = exitCode
	})
	.catch((err: unknown) => {
		process.stderr.write(`[murmur] Unexpected CLI failure: ${String(err)}\n`)
		process.exitCode = 1
	})
