// CHANGE: Immutable argument declarations and their per-run state
// PURITY: CORE
// INVARIANT: A presence-only declaration never carries a default nor holds a typed value
// COMPLEXITY: O(1)

import { Data, Either, Option } from "effect";
import { match } from "ts-pattern";

import {
	type DefaultTypeMismatch,
	defaultTypeMismatch,
	type MissingValueKind,
	missingValueKind,
} from "./errors.js";
import { conformsToKind, formatTypedValue } from "./kinds/format.js";
import {
	type KindValue,
	type TypedValue,
	typedValue,
	type ValueKind,
} from "./types/value-kind.js";

/**
 * Static declaration of one named flag.
 *
 * @property name Identity key, stored without the leading `--`
 * @property declaredKind None for presence-only flags
 * @property defaultValue Tagged with `declaredKind` when present
 *
 * @invariant name.length > 0
 * @invariant declaredKind = None ⇒ defaultValue = None
 */
export interface ArgumentDescriptor {
	readonly name: string;
	readonly declaredKind: Option.Option<ValueKind>;
	readonly required: boolean;
	readonly defaultValue: Option.Option<TypedValue>;
	readonly description: string;
}

/**
 * Run-scoped state of a descriptor, owned by the registry.
 *
 * - Unseen: flag absent, nothing stored
 * - Defaulted: flag absent, default accepted by validation
 * - Present: presence-only flag seen
 * - Pending: value-taking flag seen, value token not read yet
 * - Valued: value-taking flag seen with a value (read or defaulted)
 */
export type RunState = Data.TaggedEnum<{
	Unseen: {};
	Defaulted: { readonly value: TypedValue };
	Present: {};
	Pending: {};
	Valued: { readonly value: TypedValue };
}>;

export const RunState = Data.taggedEnum<RunState>();

/** Descriptor paired with its run state, as held by a registry. */
export interface DescriptorSlot {
	readonly descriptor: ArgumentDescriptor;
	readonly state: RunState;
}

/**
 * Strips the leading `--` some callers write in flag names.
 *
 * @pure true
 * @complexity O(n)
 */
export const normalizeName = (name: string): string =>
	name.replace(/^-+/u, "");

const declare = (
	name: string,
	declaredKind: Option.Option<ValueKind>,
	defaultValue: Option.Option<TypedValue>,
	required: boolean,
): ArgumentDescriptor => {
	const normalized = normalizeName(name);
	if (normalized.length === 0) {
		throw new Error(`Argument name must not be empty (got "${name}")`);
	}
	return {
		name: normalized,
		declaredKind,
		required,
		defaultValue,
		description: "",
	};
};

/**
 * Declares a flag that consumes the next token as a value of `kind`.
 *
 * @throws Error when the name is empty once `--` is stripped
 *
 * @example
 * ```ts
 * const threshold = withValue("threshold", "u8", true);
 * ```
 */
export const withValue = (
	name: string,
	kind: ValueKind,
	required: boolean,
): ArgumentDescriptor => declare(name, Option.some(kind), Option.none(), required);

/**
 * Declares a value-taking flag with a default statically typed by `kind`.
 *
 * @example
 * ```ts
 * const thread = withDefaultValue("thread", "u8", 42, false);
 * ```
 */
export const withDefaultValue = <K extends ValueKind>(
	name: string,
	kind: K,
	defaultValue: KindValue<K>,
	required: boolean,
): ArgumentDescriptor =>
	declare(
		name,
		Option.some(kind),
		Option.some(typedValue(kind, defaultValue)),
		required,
	);

/**
 * Declares a value-taking flag whose default was produced at run time
 * (e.g. read from text); the flag's kind is the default's kind.
 */
export const withTypedDefault = (
	name: string,
	defaultValue: TypedValue,
	required: boolean,
): ArgumentDescriptor =>
	declare(
		name,
		Option.some(defaultValue.kind),
		Option.some(defaultValue),
		required,
	);

/** Declares a presence-only flag. */
export const withoutValue = (
	name: string,
	required: boolean,
): ArgumentDescriptor => declare(name, Option.none(), Option.none(), required);

/** Copy of `descriptor` carrying the usage description. */
export const setDescription = (
	descriptor: ArgumentDescriptor,
	description: string,
): ArgumentDescriptor => ({ ...descriptor, description });

export const takesValue = (descriptor: ArgumentDescriptor): boolean =>
	Option.isSome(descriptor.declaredKind);

export const hasDefault = (descriptor: ArgumentDescriptor): boolean =>
	Option.isSome(descriptor.defaultValue);

/**
 * Re-validates the stored default against the declared kind.
 *
 * @returns the default to store as current value
 *
 * @pure true
 * @invariant Right(v) ⇒ v.kind = declaredKind ∧ conformsToKind(v)
 * @complexity O(1)
 */
export const acceptDefault = (
	descriptor: ArgumentDescriptor,
): Either.Either<TypedValue, DefaultTypeMismatch | MissingValueKind> => {
	const { name, declaredKind, defaultValue } = descriptor;
	if (Option.isNone(declaredKind) || Option.isNone(defaultValue)) {
		return Either.left(missingValueKind(name));
	}
	const typed = defaultValue.value;
	if (typed.kind !== declaredKind.value || !conformsToKind(typed)) {
		return Either.left(
			defaultTypeMismatch(name, declaredKind.value, formatTypedValue(typed)),
		);
	}
	return Either.right(typed);
};

/** Value held by a run state, whether read from a token or defaulted. */
export const currentValue = (state: RunState): Option.Option<TypedValue> =>
	match(state)
		.with({ _tag: "Valued" }, { _tag: "Defaulted" }, ({ value }) =>
			Option.some(value),
		)
		.otherwise(() => Option.none());

/** True when the flag's marker appeared in the latest parse. */
export const isSeen = (state: RunState): boolean =>
	state._tag === "Present" || state._tag === "Pending" || state._tag === "Valued";

/**
 * Native text of the slot's current value.
 *
 * @returns "" when unset or when the descriptor takes no value
 */
export const formatValue = (slot: DescriptorSlot): string =>
	takesValue(slot.descriptor)
		? Option.match(currentValue(slot.state), {
				onNone: () => "",
				onSome: formatTypedValue,
			})
		: "";

/** Native text of the declared default, "" when there is none. */
export const formatDefault = (descriptor: ArgumentDescriptor): string =>
	Option.match(descriptor.defaultValue, {
		onNone: () => "",
		onSome: formatTypedValue,
	});
