// CHANGE: Closed set of primitive value kinds with their TypeScript representation
// PURITY: CORE
// INVARIANT: ∀ v: TypedValue, typeof v.value = representation(v.kind)
// COMPLEXITY: O(1)

/**
 * Every primitive kind a value-taking argument may be declared with.
 *
 * @invariant Order is the canonical listing order (unsigned, signed, float, other)
 */
export const VALUE_KINDS = [
	"u8",
	"u16",
	"u32",
	"u64",
	"u128",
	"usize",
	"i8",
	"i16",
	"i32",
	"i64",
	"i128",
	"isize",
	"f32",
	"f64",
	"bool",
	"char",
	"string",
] as const;

export type ValueKind = (typeof VALUE_KINDS)[number];

/** Integer kinds small enough to be held exactly by a `number`. */
export type SmallIntKind = "u8" | "u16" | "u32" | "i8" | "i16" | "i32";

/** Integer kinds held as `bigint`; pointer-sized kinds are 64 bits wide. */
export type BigIntKind = "u64" | "u128" | "usize" | "i64" | "i128" | "isize";

export type FloatKind = "f32" | "f64";

export type IntegerKind = SmallIntKind | BigIntKind;

/**
 * Representation of each kind's value.
 *
 * @invariant Keys are exactly ValueKind
 */
export interface KindValueMap {
	readonly u8: number;
	readonly u16: number;
	readonly u32: number;
	readonly u64: bigint;
	readonly u128: bigint;
	readonly usize: bigint;
	readonly i8: number;
	readonly i16: number;
	readonly i32: number;
	readonly i64: bigint;
	readonly i128: bigint;
	readonly isize: bigint;
	readonly f32: number;
	readonly f64: number;
	readonly bool: boolean;
	readonly char: string;
	readonly string: string;
}

export type KindValue<K extends ValueKind> = KindValueMap[K];

/**
 * Value tagged with the kind it was produced for.
 *
 * @remarks
 * Distributes over every kind, so narrowing on `kind` narrows `value`.
 */
export type TypedValue = {
	readonly [K in ValueKind]: { readonly kind: K; readonly value: KindValueMap[K] };
}[ValueKind];

/**
 * Bit width and signedness of every integer kind.
 *
 * @invariant usize/isize are 64 bits wide
 */
export const INTEGER_LAYOUT: {
	readonly [K in IntegerKind]: { readonly bits: number; readonly signed: boolean };
} = {
	u8: { bits: 8, signed: false },
	u16: { bits: 16, signed: false },
	u32: { bits: 32, signed: false },
	u64: { bits: 64, signed: false },
	u128: { bits: 128, signed: false },
	usize: { bits: 64, signed: false },
	i8: { bits: 8, signed: true },
	i16: { bits: 16, signed: true },
	i32: { bits: 32, signed: true },
	i64: { bits: 64, signed: true },
	i128: { bits: 128, signed: true },
	isize: { bits: 64, signed: true },
};

/**
 * Inclusive bounds of an integer kind.
 *
 * @pure true
 * @complexity O(1)
 */
export const integerBounds = (
	kind: IntegerKind,
): { readonly min: bigint; readonly max: bigint } => {
	const { bits, signed } = INTEGER_LAYOUT[kind];
	return signed
		? { min: -(1n << BigInt(bits - 1)), max: (1n << BigInt(bits - 1)) - 1n }
		: { min: 0n, max: (1n << BigInt(bits)) - 1n };
};

const typedValueMakers: {
	readonly [K in ValueKind]: (value: KindValueMap[K]) => TypedValue;
} = {
	u8: (value) => ({ kind: "u8", value }),
	u16: (value) => ({ kind: "u16", value }),
	u32: (value) => ({ kind: "u32", value }),
	u64: (value) => ({ kind: "u64", value }),
	u128: (value) => ({ kind: "u128", value }),
	usize: (value) => ({ kind: "usize", value }),
	i8: (value) => ({ kind: "i8", value }),
	i16: (value) => ({ kind: "i16", value }),
	i32: (value) => ({ kind: "i32", value }),
	i64: (value) => ({ kind: "i64", value }),
	i128: (value) => ({ kind: "i128", value }),
	isize: (value) => ({ kind: "isize", value }),
	f32: (value) => ({ kind: "f32", value: Math.fround(value) }),
	f64: (value) => ({ kind: "f64", value }),
	bool: (value) => ({ kind: "bool", value }),
	char: (value) => ({ kind: "char", value }),
	string: (value) => ({ kind: "string", value }),
};

/**
 * Tags a statically typed value with its kind.
 *
 * @remarks
 * f32 values are rounded to single precision on the way in.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * typedValue("u8", 42); // { kind: "u8", value: 42 }
 * ```
 */
export const typedValue = <K extends ValueKind>(
	kind: K,
	value: KindValue<K>,
): TypedValue => typedValueMakers[kind](value);
