// CHANGE: Console reporting of parse outcomes
// PURITY: SHELL (console I/O through Effect's Console service)
// EFFECT: Effect<void>
// INVARIANT: Usage goes to stdout, failures to stderr, successful parses print nothing

import { Console, Effect } from "effect";
import { match } from "ts-pattern";

import type { ParseOutcome } from "../../core/models.js";

/**
 * Prints what the user has to see for an outcome.
 *
 * @pure false (console output)
 * @complexity O(|text|)
 */
export const reportOutcome = (outcome: ParseOutcome): Effect.Effect<void> =>
	match(outcome)
		.with({ _tag: "Help" }, ({ usage }) => Console.log(usage))
		.with({ _tag: "Failed" }, ({ message }) => Console.error(message))
		.with({ _tag: "Parsed" }, () => Effect.void)
		.exhaustive();

/** Prints the registry's `--name=value` listing. */
export const reportValues = (listing: string): Effect.Effect<void> =>
	listing.length === 0 ? Effect.void : Console.log(listing);
