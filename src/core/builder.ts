// CHANGE: Variadic registry construction
// PURITY: CORE
// INVARIANT: Later descriptors replace earlier ones with the same name

import type { ArgumentDescriptor } from "./descriptor.js";
import { ArgumentRegistry } from "./registry.js";
import type { RegistryOptions } from "./types/options.js";

/**
 * Builds a registry from descriptors listed inline.
 *
 * @example
 * ```ts
 * const cli = createRegistry(
 *   withValue("config", "string", true),
 *   withValue("thread", "u8", false),
 *   withoutValue("verbose", false),
 * );
 * ```
 */
export const createRegistry = (
	...descriptors: readonly ArgumentDescriptor[]
): ArgumentRegistry => new ArgumentRegistry(descriptors);

/** Same as createRegistry, with registry options up front. */
export const createRegistryWith = (
	options: Partial<RegistryOptions>,
	...descriptors: readonly ArgumentDescriptor[]
): ArgumentRegistry => new ArgumentRegistry(descriptors, options);
