// CHANGE: Registry configuration values
// PURITY: CORE
// INVARIANT: Options are immutable once handed to a registry

/**
 * What the walk does with `--name` tokens naming no registered descriptor.
 *
 * - ignore: skip the token (its following token is evaluated normally)
 * - reject: fail the parse with UnknownFlag
 */
export type UnknownFlagPolicy = "ignore" | "reject";

/**
 * Registry configuration.
 *
 * @property appName Program name printed in the usage signature
 * @property description First line of the usage text
 * @property unknownFlags Policy for unregistered `--name` tokens
 */
export interface RegistryOptions {
	readonly appName: string;
	readonly description: string;
	readonly unknownFlags: UnknownFlagPolicy;
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
	appName: "",
	description: "",
	unknownFlags: "ignore",
};
