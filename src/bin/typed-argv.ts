#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runCli.js";
import { processTokens } from "../shell/argv.js";

/**
 * CLI entry point.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @invariant exit code is 0 on success or --help, otherwise 1
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
try {
	const code = Effect.runSync(processTokens.pipe(Effect.flatMap(runCli)));
	// Shell boundary: single process exit
	process.exit(code);
} catch (error) {
	console.error("Fatal error:", error);
	process.exit(1);
}
