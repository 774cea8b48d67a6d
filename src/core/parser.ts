// CHANGE: Lookahead token walk and post-walk validation pass
// PURITY: CORE (mutation confined to the run table handed over by the registry)
// INVARIANT: A token consumed as a value is never re-read as a flag marker
// INVARIANT: Validation visits descriptors in name order; first failure wins
// COMPLEXITY: O(t + d log d) where t = |tokens|, d = |descriptors|

import { Data, Either, Option } from "effect";
import { match } from "ts-pattern";

import {
	acceptDefault,
	type ArgumentDescriptor,
	type DescriptorSlot,
	hasDefault,
	RunState,
} from "./descriptor.js";
import {
	conversionError,
	helpRequested,
	missingRequired,
	missingValue,
	type ParseFailure,
	unknownFlag,
	type ValidationFailure,
} from "./errors.js";
import { readValue } from "./kinds/convert.js";
import type { UnknownFlagPolicy } from "./types/options.js";
import type { ValueKind } from "./types/value-kind.js";

const FLAG_MARKER = "--";
const HELP_FLAG = "help";

/**
 * Walk position between two tokens.
 *
 * - ExpectingFlagOrValue: next token may be a flag marker
 * - ConsumingValue: next token is the value of `descriptor`
 */
export type WalkState = Data.TaggedEnum<{
	ExpectingFlagOrValue: {};
	ConsumingValue: {
		readonly descriptor: ArgumentDescriptor;
		readonly kind: ValueKind;
	};
}>;

export const WalkState = Data.taggedEnum<WalkState>();

/**
 * Everything a parse run reads and the run table it writes.
 *
 * @invariant slots iterates in name order (insertion order of the registry)
 */
export interface ParseContext {
	readonly slots: Map<string, DescriptorSlot>;
	readonly unknownFlags: UnknownFlagPolicy;
	readonly renderUsage: () => string;
}

const record = (
	ctx: ParseContext,
	descriptor: ArgumentDescriptor,
	state: RunState,
): void => {
	ctx.slots.set(descriptor.name, { descriptor, state });
};

/**
 * Extracts the name behind a `--name` marker.
 *
 * @returns None unless the token is `--` followed by at least one character
 *
 * @pure true
 * @complexity O(n)
 */
export const flagNameOf = (token: string): Option.Option<string> =>
	token.startsWith(FLAG_MARKER) && [...token].length > FLAG_MARKER.length
		? Option.some(token.slice(FLAG_MARKER.length))
		: Option.none();

const consumeValue = (
	ctx: ParseContext,
	descriptor: ArgumentDescriptor,
	kind: ValueKind,
	token: string,
): Either.Either<WalkState, ParseFailure> =>
	Either.match(readValue(kind, token), {
		onLeft: (reason) =>
			Either.left(conversionError(token, descriptor.name, kind, reason)),
		onRight: (value) => {
			record(ctx, descriptor, RunState.Valued({ value }));
			return Either.right(WalkState.ExpectingFlagOrValue());
		},
	});

const recognizeFlag = (
	ctx: ParseContext,
	name: string,
): Either.Either<WalkState, ParseFailure> => {
	if (name.toLowerCase() === HELP_FLAG) {
		return Either.left(helpRequested(ctx.renderUsage()));
	}
	const slot = ctx.slots.get(name);
	if (slot === undefined) {
		return ctx.unknownFlags === "reject"
			? Either.left(unknownFlag(name))
			: Either.right(WalkState.ExpectingFlagOrValue());
	}
	const { descriptor } = slot;
	return Option.match(descriptor.declaredKind, {
		onNone: () => {
			record(ctx, descriptor, RunState.Present());
			return Either.right(WalkState.ExpectingFlagOrValue());
		},
		onSome: (kind) => {
			record(ctx, descriptor, RunState.Pending());
			return Either.right(WalkState.ConsumingValue({ descriptor, kind }));
		},
	});
};

/**
 * Advances the walk by one token.
 *
 * @remarks
 * While a value is pending the token is read as that value, even when it
 * looks like a flag: `--threshold --help` on a u8 flag fails conversion
 * instead of requesting help.
 *
 * @pure false (writes the run table)
 * @complexity O(|token|)
 */
export const step = (
	ctx: ParseContext,
	state: WalkState,
	token: string,
): Either.Either<WalkState, ParseFailure> =>
	match(state)
		.with({ _tag: "ConsumingValue" }, ({ descriptor, kind }) =>
			consumeValue(ctx, descriptor, kind, token),
		)
		.with({ _tag: "ExpectingFlagOrValue" }, () =>
			Option.match(flagNameOf(token), {
				onNone: (): Either.Either<WalkState, ParseFailure> =>
					Either.right(WalkState.ExpectingFlagOrValue()),
				onSome: (name) => recognizeFlag(ctx, name),
			}),
		)
		.exhaustive();

/**
 * Walks every token; stops at the first failure (`--help` included).
 *
 * @returns the walk state after the last token
 */
export const walkTokens = (
	ctx: ParseContext,
	tokens: readonly string[],
): Either.Either<WalkState, ParseFailure> => {
	let state: WalkState = WalkState.ExpectingFlagOrValue();
	for (const token of tokens) {
		const next = step(ctx, state, token);
		if (Either.isLeft(next)) return next;
		state = next.right;
	}
	return Either.right(state);
};

const validateSlot = (
	ctx: ParseContext,
	{ descriptor, state }: DescriptorSlot,
): Either.Either<void, ValidationFailure> =>
	match(state)
		.with({ _tag: "Unseen" }, (): Either.Either<void, ValidationFailure> => {
			if (hasDefault(descriptor)) {
				return Either.map(acceptDefault(descriptor), (value) => {
					record(ctx, descriptor, RunState.Defaulted({ value }));
				});
			}
			return descriptor.required
				? Either.left(missingRequired(descriptor.name))
				: Either.right(undefined);
		})
		.with({ _tag: "Pending" }, (): Either.Either<void, ValidationFailure> =>
			hasDefault(descriptor)
				? Either.map(acceptDefault(descriptor), (value) => {
						record(ctx, descriptor, RunState.Valued({ value }));
					})
				: Either.left(missingValue(descriptor.name)),
		)
		.otherwise(() => Either.right(undefined));

/**
 * Applies required/default/needs-value rules in name order.
 *
 * @invariant Right ⇒ ∀ value-taking seen d: currentValue(d) ≠ None
 */
export const validate = (
	ctx: ParseContext,
): Either.Either<void, ValidationFailure> => {
	for (const slot of [...ctx.slots.values()]) {
		const checked = validateSlot(ctx, slot);
		if (Either.isLeft(checked)) return checked;
	}
	return Either.right(undefined);
};

/**
 * Resets the run table, walks `tokens`, then validates.
 *
 * @pure false (rewrites the run table)
 * @invariant Result depends only on `tokens` (no state survives between runs)
 * @complexity O(t + d)
 */
export const runParse = (
	ctx: ParseContext,
	tokens: readonly string[],
): Either.Either<void, ParseFailure> => {
	for (const { descriptor } of [...ctx.slots.values()]) {
		record(ctx, descriptor, RunState.Unseen());
	}
	const walked = walkTokens(ctx, tokens);
	if (Either.isLeft(walked)) return Either.left(walked.left);
	return validate(ctx);
};
