// CHANGE: Outcome models shared by the shell and the binary
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code of the command-line tool.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * How a parse run ended, as seen by the process boundary.
 *
 * - Parsed: every declaration validated
 * - Help: `--help` was requested (clean early exit)
 * - Failed: a real failure with its message
 */
export type ParseOutcome =
	| { readonly _tag: "Parsed" }
	| { readonly _tag: "Help"; readonly usage: string }
	| { readonly _tag: "Failed"; readonly message: string };
