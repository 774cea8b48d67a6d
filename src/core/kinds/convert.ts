// CHANGE: Text → TypedValue conversion for every primitive kind
// PURITY: CORE
// INVARIANT: convertToken(kind, text) = Right(v) ⇒ v.kind = kind ∧ conforms(v)
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";
import { match, P } from "ts-pattern";

import {
	type BigIntKind,
	type FloatKind,
	type IntegerKind,
	integerBounds,
	INTEGER_LAYOUT,
	type SmallIntKind,
	type TypedValue,
	typedValue,
	type ValueKind,
} from "../types/value-kind.js";

// Reasons appear after the colon of a ConversionError message
export const REASON = {
	emptyInteger: "cannot parse integer from empty string",
	invalidDigit: "invalid digit found in string",
	tooLarge: "number too large to fit in target type",
	tooSmall: "number too small to fit in target type",
	emptyFloat: "cannot parse float from empty string",
	invalidFloat: "invalid float literal",
	invalidBool: "provided string was not `true` or `false`",
	emptyChar: "cannot parse char from empty string",
	tooManyChars: "too many characters in string",
} as const;

const UNSIGNED_DIGITS = /^\+?[0-9]+$/u;
const SIGNED_DIGITS = /^[+-]?[0-9]+$/u;
const FLOAT_LITERAL =
	/^[+-]?(?:inf|infinity|nan|(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?)$/iu;

/**
 * Reads a base-10 integer and checks it against the kind's bounds.
 *
 * @returns the integer as bigint, or a failure reason
 *
 * @pure true
 * @invariant Right(n) ⇒ min(kind) ≤ n ≤ max(kind)
 * @complexity O(n)
 */
export const readInteger = (
	kind: IntegerKind,
	text: string,
): Either.Either<bigint, string> => {
	if (text.length === 0) return Either.left(REASON.emptyInteger);
	const pattern = INTEGER_LAYOUT[kind].signed ? SIGNED_DIGITS : UNSIGNED_DIGITS;
	if (!pattern.test(text)) return Either.left(REASON.invalidDigit);
	const parsed = BigInt(text.startsWith("+") ? text.slice(1) : text);
	const { min, max } = integerBounds(kind);
	if (parsed > max) return Either.left(REASON.tooLarge);
	if (parsed < min) return Either.left(REASON.tooSmall);
	return Either.right(parsed);
};

/**
 * Reads a decimal or special (`inf`, `infinity`, `nan`) float literal.
 *
 * @pure true
 * @invariant kind = "f32" ⇒ result = Math.fround(result)
 * @complexity O(n)
 */
export const readFloat = (
	kind: FloatKind,
	text: string,
): Either.Either<number, string> => {
	if (text.length === 0) return Either.left(REASON.emptyFloat);
	if (!FLOAT_LITERAL.test(text)) return Either.left(REASON.invalidFloat);
	const unsigned = text.replace(/^[+-]/u, "").toLowerCase();
	const negative = text.startsWith("-");
	const magnitude = match(unsigned)
		.with(P.union("inf", "infinity"), () => Number.POSITIVE_INFINITY)
		.with("nan", () => Number.NaN)
		.otherwise((digits) => Number(digits));
	const value = negative ? -magnitude : magnitude;
	return Either.right(kind === "f32" ? Math.fround(value) : value);
};

export const readBool = (text: string): Either.Either<boolean, string> =>
	match(text)
		.with("true", () => Either.right(true))
		.with("false", () => Either.right(false))
		.otherwise(() => Either.left(REASON.invalidBool));

/**
 * Reads exactly one Unicode code point.
 *
 * @invariant Right(c) ⇒ [...c].length = 1
 */
export const readChar = (text: string): Either.Either<string, string> => {
	const codePoints = [...text];
	if (codePoints.length === 0) return Either.left(REASON.emptyChar);
	if (codePoints.length > 1) return Either.left(REASON.tooManyChars);
	return Either.right(text);
};

const readSmallInt = (
	kind: SmallIntKind,
	text: string,
): Either.Either<TypedValue, string> =>
	Either.map(readInteger(kind, text), (n) => typedValue(kind, Number(n)));

const readBigInt = (
	kind: BigIntKind,
	text: string,
): Either.Either<TypedValue, string> =>
	Either.map(readInteger(kind, text), (n) => typedValue(kind, n));

/**
 * Reads `text` as a value of `kind`.
 *
 * @returns TypedValue tagged with `kind`, or the reason the text was refused
 *
 * @pure true
 * @complexity O(n) where n = |text|
 *
 * @example
 * ```ts
 * readValue("u8", "200");  // Right({ kind: "u8", value: 200 })
 * readValue("u8", "256");  // Left("number too large to fit in target type")
 * ```
 */
export const readValue = (
	kind: ValueKind,
	text: string,
): Either.Either<TypedValue, string> =>
	match(kind)
		.with(P.union("u8", "u16", "u32", "i8", "i16", "i32"), (k) =>
			readSmallInt(k, text),
		)
		.with(P.union("u64", "u128", "usize", "i64", "i128", "isize"), (k) =>
			readBigInt(k, text),
		)
		.with(P.union("f32", "f64"), (k) =>
			Either.map(readFloat(k, text), (v) => typedValue(k, v)),
		)
		.with("bool", () =>
			Either.map(readBool(text), (v) => typedValue("bool", v)),
		)
		.with("char", () =>
			Either.map(readChar(text), (v) => typedValue("char", v)),
		)
		.with("string", () => Either.right(typedValue("string", text)))
		.exhaustive();
