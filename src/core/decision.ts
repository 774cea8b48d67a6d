// CHANGE: Pure decision functions mapping parse results to process outcomes
// FORMAT THEOREM: ∀o ∈ ParseOutcome: computeExitCode(o) = 1 ↔ o._tag = "Failed"
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping
// COMPLEXITY: O(1) time / O(1) space

import { Either } from "effect";
import { match } from "ts-pattern";

import { isHelpRequested, type ParseFailure } from "./errors.js";
import type { ExitCode, ParseOutcome } from "./models.js";

/**
 * Classifies a parse result; the help sentinel is not a failure.
 *
 * @pure true
 * @complexity O(1)
 */
export const toParseOutcome = (
	result: Either.Either<void, ParseFailure>,
): ParseOutcome =>
	Either.match(result, {
		onLeft: (error): ParseOutcome =>
			isHelpRequested(error)
				? { _tag: "Help", usage: error.usage }
				: { _tag: "Failed", message: error.message },
		onRight: (): ParseOutcome => ({ _tag: "Parsed" }),
	});

/**
 * Computes the process exit code for an outcome.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition outcome._tag = "Failed" → result = 1
 *
 * @example
 * ```ts
 * computeExitCode({ _tag: "Help", usage: "..." }); // 0
 * ```
 */
export const computeExitCode = (outcome: ParseOutcome): ExitCode =>
	match(outcome)
		.with({ _tag: "Failed" }, (): ExitCode => 1)
		.otherwise((): ExitCode => 0);
