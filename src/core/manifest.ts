// CHANGE: Declarative argument manifest decoded with Effect Schema
// SOURCE: https://effect.website/docs/schema/introduction
// PURITY: CORE
// INVARIANT: decodeManifest(json) = Right(r) ⇒ every default of r conforms to its kind
// COMPLEXITY: O(a) where a = |arguments|

import { Either, Schema } from "effect";

import {
	type ArgumentDescriptor,
	normalizeName,
	setDescription,
	withoutValue,
	withTypedDefault,
	withValue,
} from "./descriptor.js";
import { type ManifestError, manifestError } from "./errors.js";
import { readValue } from "./kinds/convert.js";
import { ArgumentRegistry } from "./registry.js";
import { VALUE_KINDS } from "./types/value-kind.js";

/**
 * Any value a JSON document may hold.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export const ManifestArgument = Schema.Struct({
	name: Schema.NonEmptyString,
	kind: Schema.optional(Schema.Literal(...VALUE_KINDS)),
	required: Schema.optional(Schema.Boolean),
	default: Schema.optional(Schema.String),
	description: Schema.optional(Schema.String),
});

export type ManifestArgument = typeof ManifestArgument.Type;

export const Manifest = Schema.Struct({
	name: Schema.optional(Schema.String),
	description: Schema.optional(Schema.String),
	unknownFlags: Schema.optional(Schema.Literal("ignore", "reject")),
	arguments: Schema.Array(ManifestArgument),
});

export type Manifest = typeof Manifest.Type;

/**
 * Turns one manifest entry into a descriptor.
 *
 * @remarks
 * `default` holds the value's text and is read with the command-line rules.
 */
export const descriptorFromEntry = (
	entry: ManifestArgument,
	source: string,
): Either.Either<ArgumentDescriptor, ManifestError> => {
	const required = entry.required ?? false;
	const describe = (descriptor: ArgumentDescriptor): ArgumentDescriptor =>
		setDescription(descriptor, entry.description ?? "");
	const { kind, default: defaultText } = entry;
	if (normalizeName(entry.name).length === 0) {
		return Either.left(
			manifestError(
				source,
				`argument name "${entry.name}" is empty once dashes are stripped`,
			),
		);
	}
	if (kind === undefined) {
		return defaultText === undefined
			? Either.right(describe(withoutValue(entry.name, required)))
			: Either.left(
					manifestError(
						source,
						`argument "${entry.name}" takes no value but declares a default`,
					),
				);
	}
	if (defaultText === undefined) {
		return Either.right(describe(withValue(entry.name, kind, required)));
	}
	return Either.match(readValue(kind, defaultText), {
		onLeft: (reason) =>
			Either.left(
				manifestError(
					source,
					`default "${defaultText}" of argument "${entry.name}" must be ${kind}: ${reason}`,
				),
			),
		onRight: (typed) =>
			Either.right(describe(withTypedDefault(entry.name, typed, required))),
	});
};

/**
 * Builds a registry from a decoded manifest.
 *
 * @returns the registry, or the first entry that could not be declared
 */
export const registryFromManifest = (
	manifest: Manifest,
	source: string,
): Either.Either<ArgumentRegistry, ManifestError> => {
	const descriptors: ArgumentDescriptor[] = [];
	for (const entry of manifest.arguments) {
		const declared = descriptorFromEntry(entry, source);
		if (Either.isLeft(declared)) return Either.left(declared.left);
		descriptors.push(declared.right);
	}
	return Either.right(
		new ArgumentRegistry(descriptors, {
			appName: manifest.name ?? "",
			description: manifest.description ?? "",
			unknownFlags: manifest.unknownFlags ?? "ignore",
		}),
	);
};

/**
 * Decodes manifest text into a ready registry.
 *
 * @param text JSON document
 * @param source Where the text came from, for error messages
 *
 * @pure true
 * @complexity O(|text| + a)
 */
export const decodeManifest = (
	text: string,
	source: string,
): Either.Either<ArgumentRegistry, ManifestError> => {
	const json = Either.try({
		try: (): JSONValue => JSON.parse(text),
		catch: (error) => manifestError(source, String(error)),
	});
	return Either.flatMap(json, (raw) =>
		Either.flatMap(
			Either.mapLeft(Schema.decodeUnknownEither(Manifest)(raw), (error) =>
				manifestError(source, error.message),
			),
			(manifest) => registryFromManifest(manifest, source),
		),
	);
};
