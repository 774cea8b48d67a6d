// CHANGE: Tests for console reporting of outcomes
// PURITY: SHELL (console spied)

import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";

import { reportOutcome, reportValues } from "../../../src/shell/output/index.js";

describe("reportOutcome", () => {
	it("prints usage to stdout and failures to stderr", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		Effect.runSync(reportOutcome({ _tag: "Help", usage: "Usage:" }));
		Effect.runSync(reportOutcome({ _tag: "Failed", message: "boom" }));
		Effect.runSync(reportOutcome({ _tag: "Parsed" }));

		expect(log).toHaveBeenCalledTimes(1);
		expect(log).toHaveBeenCalledWith("Usage:");
		expect(error).toHaveBeenCalledTimes(1);
		expect(error).toHaveBeenCalledWith("boom");
	});

	it("prints nothing for an empty listing", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		Effect.runSync(reportValues(""));
		expect(log).not.toHaveBeenCalled();
		Effect.runSync(reportValues("--verbose"));
		expect(log).toHaveBeenCalledWith("--verbose");
	});
});
