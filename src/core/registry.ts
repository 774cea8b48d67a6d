// CHANGE: Name-keyed registry owning descriptors and their run state
// PURITY: CORE (no I/O; parse rewrites the registry's own run table)
// INVARIANT: Each parse starts from a fully reset run table
// INVARIANT: get(name, k) succeeds only when k equals the declared kind
// COMPLEXITY: parse O(t + d log d); exists/get O(1)

import { Effect, Either, Option } from "effect";

import {
	type ArgumentDescriptor,
	currentValue,
	type DescriptorSlot,
	formatValue,
	isSeen,
	normalizeName,
	RunState,
} from "./descriptor.js";
import {
	internalCastError,
	noValueNoDefault,
	notValueTaking,
	type ParseFailure,
	type RetrievalError,
	typeMismatch,
	unknownArgument,
} from "./errors.js";
import { renderUsage } from "./format/usage.js";
import { conformsToKind } from "./kinds/format.js";
import { type ParseContext, runParse } from "./parser.js";
import {
	DEFAULT_REGISTRY_OPTIONS,
	type RegistryOptions,
} from "./types/options.js";
import type {
	KindValue,
	KindValueMap,
	TypedValue,
	ValueKind,
} from "./types/value-kind.js";

const asNumber = (typed: TypedValue): Option.Option<number> =>
	typeof typed.value === "number" ? Option.some(typed.value) : Option.none();

const asBigInt = (typed: TypedValue): Option.Option<bigint> =>
	typeof typed.value === "bigint" ? Option.some(typed.value) : Option.none();

const asBoolean = (typed: TypedValue): Option.Option<boolean> =>
	typeof typed.value === "boolean" ? Option.some(typed.value) : Option.none();

const asString = (typed: TypedValue): Option.Option<string> =>
	typeof typed.value === "string" ? Option.some(typed.value) : Option.none();

// Kind equality is checked before extraction; these only recover the representation
const extractors: {
	readonly [K in ValueKind]: (typed: TypedValue) => Option.Option<KindValueMap[K]>;
} = {
	u8: asNumber,
	u16: asNumber,
	u32: asNumber,
	u64: asBigInt,
	u128: asBigInt,
	usize: asBigInt,
	i8: asNumber,
	i16: asNumber,
	i32: asNumber,
	i64: asBigInt,
	i128: asBigInt,
	isize: asBigInt,
	f32: asNumber,
	f64: asNumber,
	bool: asBoolean,
	char: asString,
	string: asString,
};

// Names are unique once the latest declaration of each has been kept
const byName = (a: ArgumentDescriptor, b: ArgumentDescriptor): number =>
	a.name < b.name ? -1 : 1;

/**
 * Registry of named arguments with a typed, kind-checked read side.
 *
 * @remarks
 * Reusable across token streams; not reentrant. `exists`/`get` read the
 * state left by the latest `parse`.
 *
 * @example
 * ```ts
 * const cli = new ArgumentRegistry([
 *   withValue("threshold", "u8", true),
 *   withoutValue("verbose", false),
 * ]);
 * const status = cli.parse(["--threshold", "200", "--verbose"]);
 * // Either.isRight(status) === true
 * cli.get("threshold", "u8"); // Right(200)
 * cli.get("threshold", "u16"); // Left(TypeMismatch)
 * ```
 */
export class ArgumentRegistry {
	// Insertion order is name order; parse rewrites states in place
	private readonly table: Map<string, DescriptorSlot>;
	private options: RegistryOptions;

	constructor(
		descriptors: Iterable<ArgumentDescriptor>,
		options: Partial<RegistryOptions> = {},
	) {
		const latest = new Map<string, ArgumentDescriptor>();
		for (const descriptor of descriptors) {
			latest.set(descriptor.name, descriptor);
		}
		this.table = new Map(
			[...latest.values()]
				.sort(byName)
				.map((descriptor): [string, DescriptorSlot] => [
					descriptor.name,
					{ descriptor, state: RunState.Unseen() },
				]),
		);
		this.options = { ...DEFAULT_REGISTRY_OPTIONS, ...options };
	}

	/** Sets the program name and description printed by usage. */
	setInfo(appName: string, description: string): void {
		this.options = { ...this.options, appName, description };
	}

	get settings(): RegistryOptions {
		return this.options;
	}

	/** Declarations in name order. */
	descriptors(): readonly ArgumentDescriptor[] {
		return this.slots().map((slot) => slot.descriptor);
	}

	/** Declarations paired with their current run state, in name order. */
	slots(): readonly DescriptorSlot[] {
		return [...this.table.values()];
	}

	/**
	 * Parses a token stream (program name excluded).
	 *
	 * @returns Right on success; Left with the first failure, or the
	 * HelpRequested sentinel (empty message) when `--help` was found
	 *
	 * @invariant State after the call reflects only `tokens`
	 * @complexity O(t + d)
	 */
	parse(tokens: readonly string[]): Either.Either<void, ParseFailure> {
		return runParse(this.context(), tokens);
	}

	/**
	 * Parses `tokens.slice(start, end)`, e.g. what follows a leading
	 * program or command name.
	 */
	parseSubset(
		tokens: readonly string[],
		start = 0,
		end: number = tokens.length,
	): Either.Either<void, ParseFailure> {
		return this.parse(tokens.slice(start, end));
	}

	/** `parse` lifted into Effect for composition in the shell. */
	parseEffect(tokens: readonly string[]): Effect.Effect<void, ParseFailure> {
		return Either.match(this.parse(tokens), {
			onLeft: (error) => Effect.fail(error),
			onRight: () => Effect.void,
		});
	}

	/** True iff `name` is registered and was seen by the latest parse. */
	exists(name: string): boolean {
		const slot = this.table.get(normalizeName(name));
		return slot !== undefined && isSeen(slot.state);
	}

	/**
	 * Reads the value of `name` as `kind`.
	 *
	 * @returns current value, else the default; InternalCastError when the
	 * value found does not conform to `kind` (a default that escaped its
	 * constructor's typing)
	 *
	 * @invariant Left(TypeMismatch) whenever kind ≠ declared kind, set or not
	 * @invariant Right(v) ⇒ v conforms to kind
	 * @complexity O(1)
	 */
	get<K extends ValueKind>(
		name: string,
		kind: K,
	): Either.Either<KindValue<K>, RetrievalError> {
		const key = normalizeName(name);
		const slot = this.table.get(key);
		if (slot === undefined) return Either.left(unknownArgument(key));
		const { descriptor, state } = slot;
		const declared = descriptor.declaredKind;
		if (Option.isNone(declared)) return Either.left(notValueTaking(key));
		if (declared.value !== kind) {
			return Either.left(typeMismatch(key, kind, declared.value));
		}
		const resolved = Option.orElse(
			currentValue(state),
			() => descriptor.defaultValue,
		);
		if (Option.isNone(resolved)) return Either.left(noValueNoDefault(key));
		const typed = resolved.value;
		const extracted = Option.filter(
			extractors[kind](typed),
			() => typed.kind === kind && conformsToKind(typed),
		);
		return Option.match(extracted, {
			onNone: (): Either.Either<KindValue<K>, RetrievalError> =>
				Either.left(internalCastError(key)),
			onSome: (value) => Either.right(value),
		});
	}

	/** `get` lifted into Effect. */
	getEffect<K extends ValueKind>(
		name: string,
		kind: K,
	): Effect.Effect<KindValue<K>, RetrievalError> {
		return Either.match(this.get(name, kind), {
			onLeft: (error) => Effect.fail(error),
			onRight: (value) => Effect.succeed(value),
		});
	}

	/**
	 * Throwing form of `get` for callers that treat a mismatch as a bug.
	 *
	 * @throws RetrievalError
	 */
	getOrThrow<K extends ValueKind>(name: string, kind: K): KindValue<K> {
		return Either.getOrThrowWith(this.get(name, kind), (error) => error);
	}

	/** Native text of the current value of `name`; "" when unset. */
	formatValue(name: string): string {
		const slot = this.table.get(normalizeName(name));
		return slot === undefined ? "" : formatValue(slot);
	}

	/** Usage text; never touches run state. */
	generateUsage(): string {
		return renderUsage(this.options, this.descriptors());
	}

	/**
	 * One line per descriptor: `--name=<value>` (`None` when unset) for
	 * value-taking flags, `--name` for presence flags.
	 */
	toString(): string {
		return this.slots()
			.map((slot) => {
				const { name, declaredKind } = slot.descriptor;
				if (Option.isNone(declaredKind)) return `--${name}`;
				const value = Option.isSome(currentValue(slot.state))
					? formatValue(slot)
					: "None";
				return `--${name}=${value}`;
			})
			.join("\n");
	}

	private context(): ParseContext {
		return {
			slots: this.table,
			unknownFlags: this.options.unknownFlags,
			renderUsage: () => this.generateUsage(),
		};
	}
}
