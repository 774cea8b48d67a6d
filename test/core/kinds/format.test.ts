// CHANGE: Tests for native value rendering and kind conformance
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	conformsToKind,
	formatFloat,
	formatTypedValue,
	positional,
} from "../../../src/core/kinds/format.js";

describe("formatFloat", () => {
	it("renders the special values", () => {
		expect(formatFloat(Number.POSITIVE_INFINITY, false)).toBe("inf");
		expect(formatFloat(Number.NEGATIVE_INFINITY, true)).toBe("-inf");
		expect(formatFloat(Number.NaN, false)).toBe("NaN");
		expect(formatFloat(-0, false)).toBe("-0");
		expect(formatFloat(0, false)).toBe("0");
	});

	it("renders whole doubles without a fraction", () => {
		expect(formatFloat(1, false)).toBe("1");
		expect(formatFloat(-2.5, false)).toBe("-2.5");
	});

	it("renders f32 values with their shortest round-tripping digits", () => {
		expect(formatFloat(Math.fround(0.1), true)).toBe("0.1");
		expect(formatFloat(Math.fround(3.3), true)).toBe("3.3");
		expect(formatFloat(Math.fround(0.1), false)).toBe("0.10000000149011612");
	});

	it("falls back to nine digits for f32 values that need them", () => {
		expect(formatFloat(Math.fround(1000.00006), true)).toBe("1000.00006");
	});

	it("never switches to exponent notation", () => {
		expect(formatFloat(1e21, false)).toBe("1000000000000000000000");
		expect(formatFloat(1e-7, false)).toBe("0.0000001");
		expect(formatFloat(-1.5e-7, false)).toBe("-0.00000015");
		expect(formatFloat(3.4028234663852886e38, true)).toBe(
			"340282350000000000000000000000000000000",
		);
	});
});

describe("positional", () => {
	it("places the decimal point from the exponent", () => {
		expect(positional(0)).toBe("0");
		expect(positional(123.456)).toBe("123.456");
		expect(positional(-120)).toBe("-120");
		expect(positional(0.5)).toBe("0.5");
	});
});

describe("formatTypedValue", () => {
	it("renders each representation natively", () => {
		expect(formatTypedValue({ kind: "u8", value: 42 })).toBe("42");
		expect(formatTypedValue({ kind: "i128", value: -5n })).toBe("-5");
		expect(formatTypedValue({ kind: "bool", value: false })).toBe("false");
		expect(formatTypedValue({ kind: "char", value: "z" })).toBe("z");
		expect(formatTypedValue({ kind: "string", value: "a b" })).toBe("a b");
		expect(formatTypedValue({ kind: "f64", value: 1.5 })).toBe("1.5");
	});
});

describe("conformsToKind", () => {
	it("checks integer ranges and integrality", () => {
		expect(conformsToKind({ kind: "u8", value: 255 })).toBe(true);
		expect(conformsToKind({ kind: "u8", value: 256 })).toBe(false);
		expect(conformsToKind({ kind: "u8", value: -1 })).toBe(false);
		expect(conformsToKind({ kind: "i8", value: 1.5 })).toBe(false);
		expect(conformsToKind({ kind: "u32", value: Number.NaN })).toBe(false);
		expect(conformsToKind({ kind: "u64", value: 18446744073709551616n })).toBe(
			false,
		);
		expect(conformsToKind({ kind: "i128", value: -1n })).toBe(true);
	});

	it("requires f32 values to be single precision", () => {
		expect(conformsToKind({ kind: "f32", value: Math.fround(0.1) })).toBe(true);
		expect(conformsToKind({ kind: "f32", value: 0.1 })).toBe(false);
		expect(conformsToKind({ kind: "f32", value: Number.NaN })).toBe(true);
		expect(conformsToKind({ kind: "f64", value: 0.1 })).toBe(true);
	});

	it("requires char values to be one code point", () => {
		expect(conformsToKind({ kind: "char", value: "\u00e9" })).toBe(true);
		expect(conformsToKind({ kind: "char", value: "" })).toBe(false);
		expect(conformsToKind({ kind: "char", value: "ab" })).toBe(false);
		expect(conformsToKind({ kind: "string", value: "" })).toBe(true);
	});
});
