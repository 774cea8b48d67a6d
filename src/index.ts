// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports CORE declarations, registry and the manifest loader; BIN stays private
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// DECLARATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Argument declarations.
 *
 * @example
 * ```typescript
 * import { createRegistry, withDefaultValue, withValue, withoutValue } from "typed-argv";
 *
 * const cli = createRegistry(
 *   withValue("config", "string", true),
 *   withDefaultValue("thread", "u8", 42, false),
 *   withoutValue("verbose", false),
 * );
 * ```
 */
export {
	acceptDefault,
	type ArgumentDescriptor,
	type DescriptorSlot,
	formatDefault,
	formatValue,
	hasDefault,
	RunState,
	setDescription,
	takesValue,
	withDefaultValue,
	withoutValue,
	withTypedDefault,
	withValue,
} from "./core/descriptor.js";

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export { createRegistry, createRegistryWith } from "./core/builder.js";
export { ArgumentRegistry } from "./core/registry.js";
export { renderUsage } from "./core/format/usage.js";
export { computeExitCode, toParseOutcome } from "./core/decision.js";
export type { ExitCode, ParseOutcome } from "./core/models.js";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE KINDS
// ═══════════════════════════════════════════════════════════════════════════════

export { readValue } from "./core/kinds/convert.js";
export { conformsToKind, formatTypedValue } from "./core/kinds/format.js";
export {
	DEFAULT_REGISTRY_OPTIONS,
	type KindValue,
	type KindValueMap,
	type RegistryOptions,
	type TypedValue,
	typedValue,
	type UnknownFlagPolicy,
	VALUE_KINDS,
	type ValueKind,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tagged errors; switch on `_tag`, read `message` for the text.
 * HelpRequested carries an empty message and the rendered usage.
 */
export {
	ConversionError,
	DefaultTypeMismatch,
	HelpRequested,
	InternalCastError,
	isHelpRequested,
	ManifestError,
	MissingRequired,
	MissingValue,
	MissingValueKind,
	NoValueNoDefault,
	NotValueTaking,
	type ParseFailure,
	type RetrievalError,
	TypeMismatch,
	UnknownArgument,
	UnknownFlag,
	type ValidationFailure,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// MANIFESTS
// ═══════════════════════════════════════════════════════════════════════════════

export { decodeManifest, Manifest, ManifestArgument } from "./core/manifest.js";
export { loadManifest } from "./shell/config/index.js";
export { processTokens } from "./shell/argv.js";
