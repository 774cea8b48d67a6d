// CHANGE: Process-wide token source for the parser
// PURITY: SHELL (reads process.argv)
// EFFECT: Effect<readonly string[]>
// INVARIANT: Tokens exclude the runtime and script path

import { Effect } from "effect";

/**
 * Command-line tokens of the current process, program name excluded.
 *
 * @pure false (reads global process state)
 * @complexity O(n) where n = |argv|
 */
export const processTokens: Effect.Effect<readonly string[]> = Effect.sync(
	() => process.argv.slice(2),
);
