// CHANGE: Central export point for core type definitions
// PURITY: CORE (re-exports only)

export {
	DEFAULT_REGISTRY_OPTIONS,
	type RegistryOptions,
	type UnknownFlagPolicy,
} from "./options.js";
export {
	type BigIntKind,
	type FloatKind,
	INTEGER_LAYOUT,
	type IntegerKind,
	integerBounds,
	type KindValue,
	type KindValueMap,
	type SmallIntKind,
	type TypedValue,
	typedValue,
	VALUE_KINDS,
	type ValueKind,
} from "./value-kind.js";
