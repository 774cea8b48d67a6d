// CHANGE: Tests for decoding argument manifests
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { decodeManifest } from "../../src/core/manifest.js";
import { leftOf, rightOf } from "../utils/either.js";

const SOURCE = "inline.json";

describe("decodeManifest", () => {
	it("builds a registry with options and defaults", () => {
		const text = JSON.stringify({
			name: "app",
			description: "Demo",
			unknownFlags: "reject",
			arguments: [
				{ name: "threshold", kind: "u8", required: true, description: "limit" },
				{ name: "thread", kind: "u8", default: "42" },
				{ name: "verbose" },
			],
		});
		const registry = rightOf(decodeManifest(text, SOURCE));
		expect(registry.settings).toEqual({
			appName: "app",
			description: "Demo",
			unknownFlags: "reject",
		});
		expect(registry.descriptors().map((d) => d.name)).toEqual([
			"thread",
			"threshold",
			"verbose",
		]);
		rightOf(registry.parse(["--threshold", "9"]));
		expect(rightOf(registry.get("thread", "u8"))).toBe(42);
		expect(leftOf(registry.parse(["--threshold", "9", "--x"]))._tag).toBe(
			"UnknownFlag",
		);
	});

	it("leaves the header empty when the manifest has none", () => {
		const registry = rightOf(decodeManifest('{"arguments":[]}', SOURCE));
		expect(registry.settings).toEqual({
			appName: "",
			description: "",
			unknownFlags: "ignore",
		});
		expect(registry.toString()).toBe("");
	});

	it("refuses a default its kind cannot read", () => {
		const text = JSON.stringify({
			arguments: [{ name: "thread", kind: "u8", default: "300" }],
		});
		expect(leftOf(decodeManifest(text, SOURCE)).message).toBe(
			'Invalid argument manifest inline.json: default "300" of argument "thread" must be u8: number too large to fit in target type',
		);
	});

	it("refuses a default on a presence flag", () => {
		const text = JSON.stringify({
			arguments: [{ name: "verbose", default: "true" }],
		});
		expect(leftOf(decodeManifest(text, SOURCE)).message).toBe(
			'Invalid argument manifest inline.json: argument "verbose" takes no value but declares a default',
		);
	});

	it("refuses malformed JSON", () => {
		const error = leftOf(decodeManifest("{", SOURCE));
		expect(error._tag).toBe("ManifestError");
		expect(error.path).toBe(SOURCE);
		expect(error.detail.startsWith("SyntaxError: ")).toBe(true);
	});

	it("refuses unknown kinds and missing fields", () => {
		const badKind = JSON.stringify({ arguments: [{ name: "x", kind: "u7" }] });
		expect(leftOf(decodeManifest(badKind, SOURCE))._tag).toBe("ManifestError");
		expect(leftOf(decodeManifest("{}", SOURCE))._tag).toBe("ManifestError");
		const emptyName = JSON.stringify({ arguments: [{ name: "" }] });
		expect(leftOf(decodeManifest(emptyName, SOURCE))._tag).toBe("ManifestError");
		const dashes = JSON.stringify({ arguments: [{ name: "--" }] });
		expect(leftOf(decodeManifest(dashes, SOURCE)).message).toBe(
			'Invalid argument manifest inline.json: argument name "--" is empty once dashes are stripped',
		);
	});
});
