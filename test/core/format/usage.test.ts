// CHANGE: Tests for usage rendering helpers
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	setDescription,
	withDefaultValue,
	withoutValue,
} from "../../../src/core/descriptor.js";
import {
	argumentLine,
	flagSignature,
	renderUsage,
} from "../../../src/core/format/usage.js";

describe("usage", () => {
	it("writes value flags with a placeholder", () => {
		expect(flagSignature(withDefaultValue("thread", "u8", 42, false))).toBe(
			"--thread <value>",
		);
		expect(flagSignature(withoutValue("verbose", false))).toBe("--verbose");
	});

	it("renders native defaults in argument lines", () => {
		const ratio = setDescription(
			withDefaultValue("ratio", "f32", 0.25, false),
			"share",
		);
		expect(argumentLine(ratio)).toBe("--ratio <value>    share (default: 0.25)");
	});

	it("omits an empty program name from the signature", () => {
		expect(
			renderUsage({ appName: "", description: "" }, [
				withoutValue("verbose", false),
			]),
		).toBe(
			[
				"",
				"Usage:",
				"--verbose",
				"",
				"Arguments:",
				"--verbose     (default: )",
				"--help    Print this help message",
			].join("\n"),
		);
	});
});
