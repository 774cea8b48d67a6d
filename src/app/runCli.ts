// CHANGE: Application layer for the manifest-driven command-line tool
// PURITY: APP (no process.exit; console output goes through SHELL)
// EFFECT: Effect<ExitCode>
// INVARIANT: Returns ExitCode as value; 0 on success or --help, 1 on any failure
// COMPLEXITY: O(t + a) where t = |tokens|, a = manifest arguments

import { Effect, Either } from "effect";

import { createRegistryWith } from "../core/builder.js";
import { computeExitCode, toParseOutcome } from "../core/decision.js";
import { setDescription, withValue } from "../core/descriptor.js";
import type { ExitCode, ParseOutcome } from "../core/models.js";
import type { ArgumentRegistry } from "../core/registry.js";
import { loadManifest } from "../shell/config/index.js";
import { reportOutcome, reportValues } from "../shell/output/index.js";

export const TOOL_NAME = "typed-argv";

/** Number of leading tokens the tool reads for itself (`--manifest <path>`). */
export const TOOL_TOKEN_COUNT = 2;

/**
 * The tool's own flags, parsed from the first two tokens only.
 *
 * @pure true (fresh registry per call)
 */
export const createToolRegistry = (): ArgumentRegistry =>
	createRegistryWith(
		{
			appName: TOOL_NAME,
			description: "Parse command-line flags against a JSON argument manifest",
		},
		setDescription(
			withValue("manifest", "string", true),
			"path to the argument manifest",
		),
	);

const finish = (outcome: ParseOutcome): Effect.Effect<ExitCode> =>
	reportOutcome(outcome).pipe(Effect.as(computeExitCode(outcome)));

const failWith = (message: string): Effect.Effect<ExitCode> =>
	finish({ _tag: "Failed", message });

/**
 * Parses `tokens` against the manifest named by their first two tokens and
 * prints the resolved values.
 *
 * @param tokens Command-line tokens, program name excluded
 * @returns ExitCode (0 | 1)
 *
 * @pure false (reads the manifest, console output)
 * @effect Effect<ExitCode, never>
 * @invariant ExitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * // typed-argv --manifest args.json --threshold 200
 * const code = Effect.runSync(runCli(["--manifest", "args.json", "--threshold", "200"]));
 * ```
 */
export const runCli = (tokens: readonly string[]): Effect.Effect<ExitCode> =>
	Effect.gen(function* () {
		const tool = createToolRegistry();
		const own = toParseOutcome(tool.parseSubset(tokens, 0, TOOL_TOKEN_COUNT));
		if (own._tag !== "Parsed") return yield* finish(own);

		const manifestPath = tool.get("manifest", "string");
		if (Either.isLeft(manifestPath)) {
			return yield* failWith(manifestPath.left.message);
		}

		const loaded = yield* Effect.either(loadManifest(manifestPath.right));
		if (Either.isLeft(loaded)) return yield* failWith(loaded.left.message);

		const registry = loaded.right;
		const outcome = toParseOutcome(
			registry.parseSubset(tokens, TOOL_TOKEN_COUNT),
		);
		if (outcome._tag === "Parsed") {
			yield* reportValues(registry.toString());
		}
		return yield* finish(outcome);
	});
