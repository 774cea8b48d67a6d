// CHANGE: Temporary manifest files for shell and app tests
// PURITY: SHELL (filesystem)

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

type JSONPrimitive = string | number | boolean | null;
export type JSONValue =
	| JSONPrimitive
	| readonly JSONValue[]
	| { readonly [key: string]: JSONValue };

export interface TempManifest {
	readonly dir: string;
	readonly file: string;
	readonly cleanup: () => void;
}

/**
 * Writes `content` (serialized when not already text) to
 * `<tmp>/typed-argv-XXXX/args.json`.
 */
export function writeTempManifest(content: JSONValue): TempManifest {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "typed-argv-"));
	const file = path.join(dir, "args.json");
	const text =
		typeof content === "string" ? content : JSON.stringify(content, null, 2);
	fs.writeFileSync(file, text, "utf8");
	return {
		dir,
		file,
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}

/** Manifest used by the app-level suites. */
export const demoManifest: JSONValue = {
	name: "demo",
	description: "Demo tool",
	arguments: [
		{ name: "threshold", kind: "u8", required: true, description: "limit" },
		{ name: "thread", kind: "u8", default: "42", description: "workers" },
		{ name: "verbose", description: "chatty output" },
	],
};
