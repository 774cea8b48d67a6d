// CHANGE: Native text rendering and conformance checks for typed values
// PURITY: CORE
// INVARIANT: ∀ v conforming: readValue(v.kind, formatTypedValue(v)) = Right(v)
// COMPLEXITY: O(1) per value (O(9) precision probes for f32)

import { match, P } from "ts-pattern";

import {
	type IntegerKind,
	integerBounds,
	type TypedValue,
} from "../types/value-kind.js";

// Nine significant digits identify every single-precision value
const MAX_F32_DIGITS = 9;

/**
 * Shortest double whose single-precision rounding is `value`.
 *
 * @invariant Math.fround(result) === value
 */
const shortestSingle = (value: number): number => {
	for (let digits = 1; digits < MAX_F32_DIGITS; digits++) {
		const candidate = Number(value.toPrecision(digits));
		if (Math.fround(candidate) === value) return candidate;
	}
	return Number(value.toPrecision(MAX_F32_DIGITS));
};

/**
 * Writes a finite number with positional digits, never in exponent form.
 *
 * @example
 * ```ts
 * positional(1e21); // "1000000000000000000000"
 * positional(1e-7); // "0.0000001"
 * ```
 */
export const positional = (value: number): string => {
	const scientific = value.toExponential();
	const cut = scientific.indexOf("e");
	const mantissa = scientific.slice(0, cut);
	const integerDigits = Number(scientific.slice(cut + 1)) + 1;
	const sign = mantissa.startsWith("-") ? "-" : "";
	const digits = mantissa.replace("-", "").replace(".", "");
	if (integerDigits <= 0) {
		return `${sign}0.${"0".repeat(-integerDigits)}${digits}`;
	}
	if (integerDigits >= digits.length) {
		return `${sign}${digits}${"0".repeat(integerDigits - digits.length)}`;
	}
	return `${sign}${digits.slice(0, integerDigits)}.${digits.slice(integerDigits)}`;
};

/**
 * Renders a float the way `inf`/`NaN` aware readers print it.
 *
 * @remarks
 * Digits are the shortest that read back to the same value, written
 * positionally. f32 values use the shortest precision that survives
 * single-precision rounding, so 0.1f32 prints as `0.1` and not as its
 * widened double.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatFloat = (value: number, single: boolean): string => {
	if (Number.isNaN(value)) return "NaN";
	if (value === Number.POSITIVE_INFINITY) return "inf";
	if (value === Number.NEGATIVE_INFINITY) return "-inf";
	if (Object.is(value, -0)) return "-0";
	return positional(single ? shortestSingle(value) : value);
};

/**
 * Native text form of a typed value.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatTypedValue({ kind: "u64", value: 7n }); // "7"
 * formatTypedValue({ kind: "bool", value: true }); // "true"
 * ```
 */
export const formatTypedValue = (typed: TypedValue): string =>
	match(typed)
		.with({ kind: "f32" }, ({ value }) => formatFloat(value, true))
		.with({ kind: "f64" }, ({ value }) => formatFloat(value, false))
		.with({ kind: "bool" }, ({ value }) => (value ? "true" : "false"))
		.with({ kind: P.union("char", "string") }, ({ value }) => value)
		.otherwise(({ value }) => value.toString());

const integerConforms = (kind: IntegerKind, value: number | bigint): boolean => {
	if (typeof value === "number" && !Number.isSafeInteger(value)) return false;
	const asBig = BigInt(value);
	const { min, max } = integerBounds(kind);
	return asBig >= min && asBig <= max;
};

/**
 * Checks that a value's runtime representation is one its kind can hold.
 *
 * @remarks
 * The static typing of `typedValue` only guarantees `number`/`bigint`/`string`;
 * ranges, integrality and single code points are verified here.
 *
 * @pure true
 * @complexity O(1)
 */
export const conformsToKind = (typed: TypedValue): boolean =>
	match(typed)
		.with(
			{ kind: P.union("u8", "u16", "u32", "i8", "i16", "i32") },
			({ kind, value }) => typeof value === "number" && integerConforms(kind, value),
		)
		.with(
			{ kind: P.union("u64", "u128", "usize", "i64", "i128", "isize") },
			({ kind, value }) => typeof value === "bigint" && integerConforms(kind, value),
		)
		.with({ kind: "f32" }, ({ value }) =>
			typeof value === "number" &&
			(Number.isNaN(value) || Math.fround(value) === value),
		)
		.with({ kind: "f64" }, ({ value }) => typeof value === "number")
		.with({ kind: "bool" }, ({ value }) => typeof value === "boolean")
		.with({ kind: "char" }, ({ value }) =>
			typeof value === "string" && [...value].length === 1,
		)
		.with({ kind: "string" }, ({ value }) => typeof value === "string")
		.exhaustive();
