// CHANGE: Typed domain error ADT for parsing and retrieval, built on Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`; every error carries its textual `message`
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { ValueKind } from "./types/value-kind.js";

/**
 * Token could not be read as the declared kind.
 *
 * @invariant reason.length > 0
 */
export class ConversionError extends Data.TaggedError("ConversionError")<{
	readonly token: string;
	readonly flag: string;
	readonly kind: ValueKind;
	readonly reason: string;
	readonly message: string;
}> {}

/** Required flag never seen and no default to fall back on. */
export class MissingRequired extends Data.TaggedError("MissingRequired")<{
	readonly flag: string;
	readonly message: string;
}> {}

/** Value-taking flag seen without a following value token, no default. */
export class MissingValue extends Data.TaggedError("MissingValue")<{
	readonly flag: string;
	readonly message: string;
}> {}

/**
 * Stored default does not conform to the declared kind.
 *
 * @remarks
 * Only reachable when a default bypasses the static typing of its constructor
 * (numbers out of range, fractional integers, multi-character chars).
 */
export class DefaultTypeMismatch extends Data.TaggedError(
	"DefaultTypeMismatch",
)<{
	readonly flag: string;
	readonly kind: ValueKind;
	readonly message: string;
}> {}

/** Default requested for a descriptor that declares no kind or has no default. */
export class MissingValueKind extends Data.TaggedError("MissingValueKind")<{
	readonly flag: string;
	readonly message: string;
}> {}

/** Unregistered `--name` token while the registry rejects unknown flags. */
export class UnknownFlag extends Data.TaggedError("UnknownFlag")<{
	readonly flag: string;
	readonly message: string;
}> {}

/**
 * `--help` was found; parsing stopped early.
 *
 * @invariant message === "" (sentinel distinguished from real failures)
 */
export class HelpRequested extends Data.TaggedError("HelpRequested")<{
	readonly usage: string;
	readonly message: string;
}> {}

export class UnknownArgument extends Data.TaggedError("UnknownArgument")<{
	readonly flag: string;
	readonly message: string;
}> {}

export class NotValueTaking extends Data.TaggedError("NotValueTaking")<{
	readonly flag: string;
	readonly message: string;
}> {}

/**
 * Requested kind differs from the declared kind.
 *
 * @invariant requested !== declared
 */
export class TypeMismatch extends Data.TaggedError("TypeMismatch")<{
	readonly flag: string;
	readonly requested: ValueKind;
	readonly declared: ValueKind;
	readonly message: string;
}> {}

export class NoValueNoDefault extends Data.TaggedError("NoValueNoDefault")<{
	readonly flag: string;
	readonly message: string;
}> {}

export class InternalCastError extends Data.TaggedError("InternalCastError")<{
	readonly flag: string;
	readonly message: string;
}> {}

/**
 * Argument manifest could not be read, decoded or turned into descriptors.
 *
 * @invariant detail.length > 0
 */
export class ManifestError extends Data.TaggedError("ManifestError")<{
	readonly path: string;
	readonly detail: string;
	readonly message: string;
}> {}

/** Failures of the validation pass run after the token walk. */
export type ValidationFailure =
	| MissingRequired
	| MissingValue
	| DefaultTypeMismatch
	| MissingValueKind;

/** Everything `parse` may fail with, including the help sentinel. */
export type ParseFailure =
	| ConversionError
	| UnknownFlag
	| HelpRequested
	| ValidationFailure;

/** Everything `get` may fail with. */
export type RetrievalError =
	| UnknownArgument
	| NotValueTaking
	| TypeMismatch
	| NoValueNoDefault
	| InternalCastError;

export const conversionError = (
	token: string,
	flag: string,
	kind: ValueKind,
	reason: string,
): ConversionError =>
	new ConversionError({
		token,
		flag,
		kind,
		reason,
		message: `Argument value ${token} for ${flag} must be ${kind}: ${reason}`,
	});

export const missingRequired = (flag: string): MissingRequired =>
	new MissingRequired({ flag, message: `Argument --${flag} is required !` });

export const missingValue = (flag: string): MissingValue =>
	new MissingValue({ flag, message: `Argument --${flag} needs a value !` });

export const defaultTypeMismatch = (
	flag: string,
	kind: ValueKind,
	rendered: string,
): DefaultTypeMismatch =>
	new DefaultTypeMismatch({
		flag,
		kind,
		message: `Default value ${rendered} for --${flag} does not conform to ${kind} !`,
	});

export const missingValueKind = (flag: string): MissingValueKind =>
	new MissingValueKind({
		flag,
		message: `Argument --${flag} takes no value and has no default !`,
	});

export const unknownFlag = (flag: string): UnknownFlag =>
	new UnknownFlag({ flag, message: `Unknown argument --${flag} !` });

export const helpRequested = (usage: string): HelpRequested =>
	new HelpRequested({ usage, message: "" });

export const unknownArgument = (flag: string): UnknownArgument =>
	new UnknownArgument({ flag, message: `Argument ${flag} does not exist !` });

export const notValueTaking = (flag: string): NotValueTaking =>
	new NotValueTaking({
		flag,
		message: `Argument ${flag} does not take a value !`,
	});

export const typeMismatch = (
	flag: string,
	requested: ValueKind,
	declared: ValueKind,
): TypeMismatch =>
	new TypeMismatch({
		flag,
		requested,
		declared,
		message: `The requested type for "${flag}" does not match the reading type ! (requested ${requested}, declared ${declared})`,
	});

export const noValueNoDefault = (flag: string): NoValueNoDefault =>
	new NoValueNoDefault({
		flag,
		message: `"${flag}" has no value nor default value !`,
	});

export const internalCastError = (flag: string): InternalCastError =>
	new InternalCastError({
		flag,
		message: `Error extracting value of argument ${flag}`,
	});

export const manifestError = (path: string, detail: string): ManifestError =>
	new ManifestError({
		path,
		detail,
		message: `Invalid argument manifest ${path}: ${detail}`,
	});

/**
 * True for the `--help` sentinel, which callers treat as a clean early exit.
 *
 * @pure true
 * @complexity O(1)
 */
export const isHelpRequested = (error: ParseFailure): error is HelpRequested =>
	error._tag === "HelpRequested";
