// CHANGE: Read argument manifests from disk
// PURITY: SHELL (filesystem)
// EFFECT: Effect<ArgumentRegistry, ManifestError>
// INVARIANT: Decoding is delegated to the pure core; this module only reads bytes
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";

import { type ManifestError, manifestError } from "../../core/errors.js";
import { decodeManifest } from "../../core/manifest.js";
import type { ArgumentRegistry } from "../../core/registry.js";

/**
 * Loads and decodes the manifest at `manifestPath` (relative to cwd).
 *
 * @pure false (reads the filesystem)
 * @effect Effect<ArgumentRegistry, ManifestError>
 */
export const loadManifest = (
	manifestPath: string,
	cwd: string = process.cwd(),
): Effect.Effect<ArgumentRegistry, ManifestError> => {
	const resolved = path.resolve(cwd, manifestPath);
	return Effect.try({
		try: () => fs.readFileSync(resolved, "utf8"),
		catch: (error) =>
			manifestError(
				manifestPath,
				error instanceof Error ? error.message : "unreadable file",
			),
	}).pipe(
		Effect.flatMap((text) =>
			Either.match(decodeManifest(text, manifestPath), {
				onLeft: (error) => Effect.fail(error),
				onRight: (registry) => Effect.succeed(registry),
			}),
		),
	);
};
