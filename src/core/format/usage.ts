// CHANGE: Usage text rendering for a set of declarations
// PURITY: CORE
// INVARIANT: Output depends only on options and declarations (never on run state)
// COMPLEXITY: O(d) where d = |descriptors|

import { type ArgumentDescriptor, formatDefault, takesValue } from "../descriptor.js";
import type { RegistryOptions } from "../types/options.js";

const COLUMN_GAP = "    ";
const HELP_LINE = `--help${COLUMN_GAP}Print this help message`;

/**
 * Flag as written on a command line: `--name <value>` or `--name`.
 *
 * @pure true
 */
export const flagSignature = (descriptor: ArgumentDescriptor): string =>
	takesValue(descriptor)
		? `--${descriptor.name} <value>`
		: `--${descriptor.name}`;

/**
 * One line of the `Arguments:` section.
 *
 * @example
 * ```ts
 * argumentLine(thread); // "--thread <value>    worker count (default: 42)"
 * ```
 */
export const argumentLine = (descriptor: ArgumentDescriptor): string =>
	`${flagSignature(descriptor)}${COLUMN_GAP}${descriptor.description} (default: ${formatDefault(descriptor)})`;

/**
 * Renders the complete usage text.
 *
 * @param descriptors Declarations in name order
 * @returns Lines joined by "\n", without a trailing newline
 *
 * @pure true
 * @complexity O(d)
 */
export const renderUsage = (
	options: Pick<RegistryOptions, "appName" | "description">,
	descriptors: readonly ArgumentDescriptor[],
): string => {
	const signature = [options.appName, ...descriptors.map(flagSignature)]
		.filter((part) => part.length > 0)
		.join(" ");
	return [
		options.description,
		"Usage:",
		signature,
		"",
		"Arguments:",
		...descriptors.map(argumentLine),
		HELP_LINE,
	].join("\n");
};
