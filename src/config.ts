/**
 * Config types for data-driven condition construction.
 *
 * The same JSON/YAML shape can be written by hand or produced by tooling.
 * Construction path:
 *   dict -> parseConditionConfig() -> ConditionConfig -> Registry.loadCondition() -> Condition
 *
 * Relationship to runtime types:
 *
 * | Config type                | Runtime type     |
 * |----------------------------|------------------|
 * | EqualsConditionConfig      | equals()         |
 * | FieldConditionConfig       | FieldCondition   |
 * | AllOfConditionConfig       | AllOf            |
 * | AnyOfConditionConfig       | AnyOf            |
 * | NotConditionConfig         | Not              |
 * | NestableConditionConfig    | Nestable         |
 * | ContainsConditionConfig    | Contains         |
 * | ElementAtConditionConfig   | elementAt()      |
 * | HaveExactlyConditionConfig | HaveExactly      |
 * | TypedConfig                | Projection       |
 */

import { ConditionError } from "./errors.ts";

// =====================================================================
// Config types
// =====================================================================

/** Reference to a registered projection factory with its configuration. */
export class TypedConfig {
	constructor(
		readonly typeUrl: string,
		readonly config: Record<string, unknown> = {},
	) {}
}

/** Built-in string matching (Exact, Prefix, Suffix, Contains, Regex). */
export class BuiltInMatch {
	constructor(
		readonly variant: string,
		readonly value: string,
		readonly ignoreCase: boolean = false,
	) {}
}

export class EqualsConditionConfig {
	constructor(
		readonly description: string,
		readonly input: TypedConfig,
		readonly expected: unknown,
	) {}
}

export class FieldConditionConfig {
	constructor(
		readonly description: string,
		readonly input: TypedConfig,
		readonly match: BuiltInMatch,
	) {}
}

export class AllOfConditionConfig {
	constructor(
		readonly label: string,
		readonly conditions: readonly ConditionConfig[],
	) {}
}

export class AnyOfConditionConfig {
	constructor(
		readonly label: string,
		readonly conditions: readonly ConditionConfig[],
	) {}
}

export class NotConditionConfig {
	constructor(readonly condition: ConditionConfig) {}
}

/** `input` is null for a grouping that does not project. */
export class NestableConditionConfig {
	constructor(
		readonly label: string,
		readonly input: TypedConfig | null,
		readonly conditions: readonly ConditionConfig[],
	) {}
}

export class ContainsConditionConfig {
	constructor(readonly condition: ConditionConfig) {}
}

export class ElementAtConditionConfig {
	constructor(
		readonly index: number,
		readonly conditions: readonly ConditionConfig[],
	) {}
}

export class HaveExactlyConditionConfig {
	constructor(
		readonly times: number,
		readonly condition: ConditionConfig,
	) {}
}

export type ConditionConfig =
	| EqualsConditionConfig
	| FieldConditionConfig
	| AllOfConditionConfig
	| AnyOfConditionConfig
	| NotConditionConfig
	| NestableConditionConfig
	| ContainsConditionConfig
	| ElementAtConditionConfig
	| HaveExactlyConditionConfig;

// =====================================================================
// Parsing (unknown -> config types)
// =====================================================================

export const STRING_MATCH_VARIANTS: ReadonlySet<string> = new Set([
	"Exact",
	"Prefix",
	"Suffix",
	"Contains",
	"Regex",
]);

/** Error parsing a config dict into config types. */
export class ConfigParseError extends ConditionError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

function describeType(data: unknown): string {
	if (data === null) return "null";
	if (Array.isArray(data)) return "array";
	return typeof data;
}

function isRecord(data: unknown): data is Record<string, unknown> {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

function requireObject(data: unknown, what: string): Record<string, unknown> {
	if (!isRecord(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describeType(data)}`);
	}
	return data;
}

function requireString(obj: Record<string, unknown>, key: string, what: string): string {
	if (!(key in obj)) {
		throw new ConfigParseError(`${what} missing required field '${key}'`);
	}
	const value = obj[key];
	if (typeof value !== "string") {
		throw new ConfigParseError(`${what} '${key}' must be a string, got ${describeType(value)}`);
	}
	return value;
}

function requireNumber(obj: Record<string, unknown>, key: string, what: string): number {
	if (!(key in obj)) {
		throw new ConfigParseError(`${what} missing required field '${key}'`);
	}
	const value = obj[key];
	if (typeof value !== "number") {
		throw new ConfigParseError(`${what} '${key}' must be a number, got ${describeType(value)}`);
	}
	return value;
}

function parseChildren(obj: Record<string, unknown>, what: string): ConditionConfig[] {
	const raw = obj.conditions ?? [];
	if (!Array.isArray(raw)) {
		throw new ConfigParseError(`${what} 'conditions' must be an array, got ${describeType(raw)}`);
	}
	return raw.map((c) => parseConditionConfig(c));
}

function parseChild(obj: Record<string, unknown>, what: string): ConditionConfig {
	if (!("condition" in obj)) {
		throw new ConfigParseError(`${what} missing required field 'condition'`);
	}
	return parseConditionConfig(obj.condition);
}

/**
 * Parse an unknown value (JSON.parse or YAML load output) into a ConditionConfig.
 *
 * Every node carries a `type` discriminator; field names are snake_case.
 */
export function parseConditionConfig(data: unknown): ConditionConfig {
	const obj = requireObject(data, "condition");

	const condType = obj.type;
	if (condType === undefined) {
		throw new ConfigParseError("condition missing required field 'type'");
	}

	switch (condType) {
		case "equals":
			if (!("expected" in obj)) {
				throw new ConfigParseError("equals condition missing required field 'expected'");
			}
			return new EqualsConditionConfig(
				requireString(obj, "description", "equals condition"),
				parseTypedConfig(obj.input),
				obj.expected,
			);
		case "field":
			return new FieldConditionConfig(
				requireString(obj, "description", "field condition"),
				parseTypedConfig(obj.input),
				parseValueMatch(obj.value_match),
			);
		case "all_of":
			return new AllOfConditionConfig(
				requireString(obj, "label", "all_of condition"),
				parseChildren(obj, "all_of condition"),
			);
		case "any_of":
			return new AnyOfConditionConfig(
				requireString(obj, "label", "any_of condition"),
				parseChildren(obj, "any_of condition"),
			);
		case "not":
			return new NotConditionConfig(parseChild(obj, "not condition"));
		case "nestable":
			return new NestableConditionConfig(
				requireString(obj, "label", "nestable condition"),
				obj.input === undefined ? null : parseTypedConfig(obj.input),
				parseChildren(obj, "nestable condition"),
			);
		case "contains":
			return new ContainsConditionConfig(parseChild(obj, "contains condition"));
		case "element_at":
			return new ElementAtConditionConfig(
				requireNumber(obj, "index", "element_at condition"),
				parseChildren(obj, "element_at condition"),
			);
		case "have_exactly":
			return new HaveExactlyConditionConfig(
				requireNumber(obj, "times", "have_exactly condition"),
				parseChild(obj, "have_exactly condition"),
			);
		default:
			throw new ConfigParseError(`unknown condition type: "${String(condType)}"`);
	}
}

function parseValueMatch(data: unknown): BuiltInMatch {
	if (data === undefined) {
		throw new ConfigParseError("field condition missing required field 'value_match'");
	}
	const obj = requireObject(data, "value_match");

	const ignoreCase = obj.ignore_case ?? false;
	if (typeof ignoreCase !== "boolean") {
		throw new ConfigParseError(
			`value_match ignore_case must be a boolean, got ${describeType(ignoreCase)}`,
		);
	}

	for (const variant of STRING_MATCH_VARIANTS) {
		if (variant in obj) {
			const value = obj[variant];
			if (typeof value !== "string") {
				throw new ConfigParseError(
					`value_match ${variant} value must be a string, got ${describeType(value)}`,
				);
			}
			return new BuiltInMatch(variant, value, ignoreCase);
		}
	}

	const expected = [...STRING_MATCH_VARIANTS].sort();
	const keys = Object.keys(obj).sort();
	throw new ConfigParseError(
		`value_match must contain one of [${expected.join(", ")}], got keys: [${keys.join(", ")}]`,
	);
}

function parseTypedConfig(data: unknown): TypedConfig {
	if (data === undefined) {
		throw new ConfigParseError("condition missing required field 'input'");
	}
	const obj = requireObject(data, "typed_config");

	const typeUrl = requireString(obj, "type_url", "typed_config");
	const config = obj.config ?? {};
	if (!isRecord(config)) {
		throw new ConfigParseError(`config must be an object, got ${describeType(config)}`);
	}

	return new TypedConfig(typeUrl, config);
}
