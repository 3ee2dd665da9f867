/**
 * Type registry for config-driven condition construction.
 *
 * The registry turns a parsed ConditionConfig into a runtime Condition
 * without domain-specific construction code:
 * - RegistryBuilder -> .build() -> Registry (immutable)
 * - Projection factories are plain functions: (config) -> Projection
 * - loadCondition() walks the config tree and builds the combinators
 *
 * Example:
 *
 *   const builder = new RegistryBuilder();
 *   builder.input("condtree.v1.FieldInput", (cfg) => new FieldInput(String(cfg.path)).projection);
 *   const registry = builder.build();
 *
 *   const condition = registry.loadCondition(parseConditionConfig(yamlData));
 */

import { contains, elementAt, haveExactly } from "./collections.ts";
import { equals } from "./equality.ts";
import { field } from "./field.ts";
import {
	AllOfConditionConfig,
	AnyOfConditionConfig,
	type BuiltInMatch,
	type ConditionConfig,
	ContainsConditionConfig,
	ElementAtConditionConfig,
	EqualsConditionConfig,
	FieldConditionConfig,
	HaveExactlyConditionConfig,
	NestableConditionConfig,
	NotConditionConfig,
	type TypedConfig,
} from "./config.ts";
import { ConditionError } from "./errors.ts";
import { allOf, anyOf, not } from "./join.ts";
import { createLogger } from "./logging.ts";
import { nestable } from "./nestable.ts";
import {
	ContainsMatcher,
	ExactMatcher,
	PrefixMatcher,
	RegexMatcher,
	SuffixMatcher,
} from "./string-matchers.ts";
import type {
	Condition,
	DescriptionNode,
	EvaluationResult,
	Projection,
	ValueMatcher,
} from "./types.ts";

const log = createLogger("registry");

// =====================================================================
// Limits
// =====================================================================

export const MAX_CONDITIONS_PER_GROUP = 256;
export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;

// =====================================================================
// Error types
// =====================================================================

/** A type_url was not found in the registry. */
export class UnknownTypeUrlError extends ConditionError {
	readonly typeUrl: string;
	readonly available: string[];

	constructor(typeUrl: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unknown input type_url: "${typeUrl}" (registered: ${sorted.join(", ")})`
				: `unknown input type_url: "${typeUrl}" (no input types are registered)`;
		super(msg);
		this.name = "UnknownTypeUrlError";
		this.typeUrl = typeUrl;
		this.available = sorted;
	}
}

/** A config payload was malformed or semantically invalid. */
export class InvalidConfigError extends ConditionError {
	readonly source: string;

	constructor(source: string) {
		super(`invalid config: ${source}`);
		this.name = "InvalidConfigError";
		this.source = source;
	}
}

/** A group has too many children (width-based limit). */
export class TooManyConditionsError extends ConditionError {
	readonly count: number;
	readonly max: number;

	constructor(count: number, max: number) {
		super(`too many conditions in group: ${count} exceeds maximum ${max}`);
		this.name = "TooManyConditionsError";
		this.count = count;
		this.max = max;
	}
}

/** A match pattern exceeds the length limit. */
export class PatternTooLongError extends ConditionError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

// =====================================================================
// Factory types
// =====================================================================

export type InputFactory = (config: Record<string, unknown>) => Projection<unknown, unknown>;

// =====================================================================
// Builder
// =====================================================================

/**
 * Builder for constructing a Registry.
 *
 * Register projection factories under type URLs, then call build() to
 * produce an immutable Registry.
 */
export class RegistryBuilder {
	private readonly inputFactories = new Map<string, InputFactory>();

	/** Register a projection factory with a type URL. */
	input(typeUrl: string, factory: InputFactory): this {
		this.inputFactories.set(typeUrl, factory);
		return this;
	}

	/** Freeze the registry. No further registration is possible. */
	build(): Registry {
		return new Registry(new Map(this.inputFactories));
	}
}

// =====================================================================
// Registry
// =====================================================================

/**
 * Immutable registry of projection factories.
 *
 * Constructed via RegistryBuilder. Use loadCondition() to compile config
 * into a runtime Condition over untyped (JSON-shaped) values.
 */
export class Registry {
	private readonly inputFactories: ReadonlyMap<string, InputFactory>;

	constructor(inputFactories: Map<string, InputFactory>) {
		this.inputFactories = inputFactories;
		Object.freeze(this);
	}

	/**
	 * Load a Condition from configuration.
	 *
	 * Construction errors raised by the combinators (empty label, bad index,
	 * depth) propagate as-is.
	 */
	loadCondition(config: ConditionConfig): Condition<unknown> {
		const condition = this.load(config);
		log.debug({ condition: condition.description, depth: condition.depth }, "condition loaded");
		return condition;
	}

	/** Number of registered input types. */
	get inputCount(): number {
		return this.inputFactories.size;
	}

	/** Check if an input type URL is registered. */
	containsInput(typeUrl: string): boolean {
		return this.inputFactories.has(typeUrl);
	}

	/** Return all registered input type URLs (sorted). */
	inputTypeUrls(): string[] {
		return [...this.inputFactories.keys()].sort();
	}

	// -- Private loading methods -------------------------------------------

	private load(config: ConditionConfig): Condition<unknown> {
		if (config instanceof EqualsConditionConfig) {
			return equals(config.description, config.expected, this.loadInput(config.input));
		}
		if (config instanceof FieldConditionConfig) {
			return field(config.description, this.loadInput(config.input), compileBuiltIn(config.match));
		}
		if (config instanceof AllOfConditionConfig) {
			return allOf(config.label, this.loadGroup(config.conditions));
		}
		if (config instanceof AnyOfConditionConfig) {
			return anyOf(config.label, this.loadGroup(config.conditions));
		}
		if (config instanceof NotConditionConfig) {
			return not(this.load(config.condition));
		}
		if (config instanceof NestableConditionConfig) {
			const children = this.loadGroup(config.conditions);
			if (config.input === null) return nestable(config.label, children);
			return nestable(config.label, this.loadInput(config.input), children);
		}
		if (config instanceof ContainsConditionConfig) {
			return new Coerced(contains(this.load(config.condition)), toIterable);
		}
		if (config instanceof ElementAtConditionConfig) {
			return new Coerced(elementAt(config.index, this.loadGroup(config.conditions)), toArray);
		}
		if (config instanceof HaveExactlyConditionConfig) {
			return new Coerced(haveExactly(config.times, this.load(config.condition)), toIterable);
		}
		throw new InvalidConfigError("unknown condition config type");
	}

	private loadGroup(configs: readonly ConditionConfig[]): Condition<unknown>[] {
		if (configs.length > MAX_CONDITIONS_PER_GROUP) {
			throw new TooManyConditionsError(configs.length, MAX_CONDITIONS_PER_GROUP);
		}
		return configs.map((c) => this.load(c));
	}

	private loadInput(config: TypedConfig): Projection<unknown, unknown> {
		const factory = this.inputFactories.get(config.typeUrl);
		if (factory === undefined) {
			throw new UnknownTypeUrlError(config.typeUrl, [...this.inputFactories.keys()]);
		}
		try {
			return factory(config.config);
		} catch (e) {
			throw new InvalidConfigError(e instanceof Error ? e.message : String(e));
		}
	}
}

// =====================================================================
// Untyped collection access
// =====================================================================

function isIterable(value: unknown): value is Iterable<unknown> {
	return (
		typeof value === "object" &&
		value !== null &&
		Symbol.iterator in value &&
		typeof value[Symbol.iterator] === "function"
	);
}

/** Non-iterables behave as empty collections. */
function toIterable(value: unknown): Iterable<unknown> {
	return isIterable(value) ? value : [];
}

/** Non-arrays behave as empty arrays, so element_at reports a ProjectionError. */
function toArray(value: unknown): readonly unknown[] {
	return Array.isArray(value) ? value : [];
}

/** Feeds a typed condition from an untyped value. Adds no node of its own. */
class Coerced<U> implements Condition<unknown> {
	constructor(
		readonly inner: Condition<U>,
		readonly coerce: (value: unknown) => U,
	) {}

	get description(): string {
		return this.inner.description;
	}

	get depth(): number {
		return this.inner.depth;
	}

	matches(value: unknown): boolean {
		return this.inner.matches(this.coerce(value));
	}

	evaluate(value: unknown): EvaluationResult {
		return this.inner.evaluate(this.coerce(value));
	}

	describe(): DescriptionNode {
		return this.inner.describe();
	}
}

// =====================================================================
// Built-in matcher compilation
// =====================================================================

function checkPatternLength(variant: string, value: string): void {
	if (variant === "Regex") {
		if (value.length > MAX_REGEX_PATTERN_LENGTH) {
			throw new PatternTooLongError(value.length, MAX_REGEX_PATTERN_LENGTH);
		}
	} else if (value.length > MAX_PATTERN_LENGTH) {
		throw new PatternTooLongError(value.length, MAX_PATTERN_LENGTH);
	}
}

function compileBuiltIn(match: BuiltInMatch): ValueMatcher {
	checkPatternLength(match.variant, match.value);

	switch (match.variant) {
		case "Exact":
			return new ExactMatcher(match.value, match.ignoreCase);
		case "Prefix":
			return new PrefixMatcher(match.value, match.ignoreCase);
		case "Suffix":
			return new SuffixMatcher(match.value, match.ignoreCase);
		case "Contains":
			return new ContainsMatcher(match.value, match.ignoreCase);
		case "Regex":
			if (match.ignoreCase) {
				throw new InvalidConfigError("ignore_case is not supported for Regex; use (?i)");
			}
			try {
				return new RegexMatcher(match.value);
			} catch (e) {
				throw new InvalidConfigError(e instanceof Error ? e.message : String(e));
			}
		default:
			throw new InvalidConfigError(`unknown built-in match variant: "${match.variant}"`);
	}
}
