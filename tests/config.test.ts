import { describe, expect, test } from "vitest";
import {
	AllOfConditionConfig,
	AnyOfConditionConfig,
	BuiltInMatch,
	ConfigParseError,
	ContainsConditionConfig,
	ElementAtConditionConfig,
	EqualsConditionConfig,
	FieldConditionConfig,
	HaveExactlyConditionConfig,
	NestableConditionConfig,
	NotConditionConfig,
	TypedConfig,
	parseConditionConfig,
} from "../src/config.ts";

const townInput = {
	type_url: "condtree.v1.FieldInput",
	config: { path: "address.town" },
};

describe("parseConditionConfig", () => {
	test("equals condition", () => {
		const config = parseConditionConfig({
			type: "equals",
			description: "town",
			input: townInput,
			expected: "Manchester",
		});

		expect(config).toBeInstanceOf(EqualsConditionConfig);
		if (!(config instanceof EqualsConditionConfig)) return;
		expect(config.description).toBe("town");
		expect(config.expected).toBe("Manchester");
		expect(config.input).toBeInstanceOf(TypedConfig);
		expect(config.input.typeUrl).toBe("condtree.v1.FieldInput");
		expect(config.input.config).toEqual({ path: "address.town" });
	});

	test("equals keeps structured expected values", () => {
		const config = parseConditionConfig({
			type: "equals",
			description: "tags",
			input: { type_url: "condtree.v1.FieldInput", config: { path: "tags" } },
			expected: ["a", "b"],
		});

		if (!(config instanceof EqualsConditionConfig)) throw new Error("expected equals config");
		expect(config.expected).toEqual(["a", "b"]);
	});

	test("field condition", () => {
		const config = parseConditionConfig({
			type: "field",
			description: "postcode",
			input: { type_url: "condtree.v1.FieldInput", config: { path: "postcode" } },
			value_match: { Prefix: "E18", ignore_case: true },
		});

		if (!(config instanceof FieldConditionConfig)) throw new Error("expected field config");
		expect(config.description).toBe("postcode");
		expect(config.match).toBeInstanceOf(BuiltInMatch);
		expect(config.match.variant).toBe("Prefix");
		expect(config.match.value).toBe("E18");
		expect(config.match.ignoreCase).toBe(true);
	});

	test("all string match variants", () => {
		for (const variant of ["Exact", "Prefix", "Suffix", "Contains", "Regex"]) {
			const config = parseConditionConfig({
				type: "field",
				description: "name",
				input: townInput,
				value_match: { [variant]: "x" },
			});
			if (!(config instanceof FieldConditionConfig)) throw new Error("expected field config");
			expect(config.match.variant).toBe(variant);
			expect(config.match.ignoreCase).toBe(false);
		}
	});

	test("all_of and any_of groups", () => {
		const leaf = { type: "equals", description: "town", input: townInput, expected: "Leeds" };

		const all = parseConditionConfig({ type: "all_of", label: "customer", conditions: [leaf, leaf] });
		expect(all).toBeInstanceOf(AllOfConditionConfig);
		if (!(all instanceof AllOfConditionConfig)) return;
		expect(all.label).toBe("customer");
		expect(all.conditions).toHaveLength(2);

		const any = parseConditionConfig({ type: "any_of", label: "either", conditions: [leaf] });
		expect(any).toBeInstanceOf(AnyOfConditionConfig);
		if (!(any instanceof AnyOfConditionConfig)) return;
		expect(any.conditions[0]).toBeInstanceOf(EqualsConditionConfig);
	});

	test("missing conditions defaults to an empty group", () => {
		const config = parseConditionConfig({ type: "all_of", label: "empty" });
		if (!(config instanceof AllOfConditionConfig)) throw new Error("expected all_of config");
		expect(config.conditions).toEqual([]);
	});

	test("not condition", () => {
		const config = parseConditionConfig({
			type: "not",
			condition: { type: "equals", description: "town", input: townInput, expected: "Leeds" },
		});
		if (!(config instanceof NotConditionConfig)) throw new Error("expected not config");
		expect(config.condition).toBeInstanceOf(EqualsConditionConfig);
	});

	test("nestable with and without input", () => {
		const projected = parseConditionConfig({
			type: "nestable",
			label: "address",
			input: { type_url: "condtree.v1.FieldInput", config: { path: "address" } },
			conditions: [],
		});
		if (!(projected instanceof NestableConditionConfig)) throw new Error("expected nestable config");
		expect(projected.input?.config).toEqual({ path: "address" });

		const grouping = parseConditionConfig({ type: "nestable", label: "customer", conditions: [] });
		if (!(grouping instanceof NestableConditionConfig)) throw new Error("expected nestable config");
		expect(grouping.input).toBeNull();
	});

	test("collection conditions", () => {
		const leaf = { type: "equals", description: "first name", input: townInput, expected: "Mike" };

		const contains = parseConditionConfig({ type: "contains", condition: leaf });
		expect(contains).toBeInstanceOf(ContainsConditionConfig);

		const at = parseConditionConfig({ type: "element_at", index: 1, conditions: [leaf] });
		if (!(at instanceof ElementAtConditionConfig)) throw new Error("expected element_at config");
		expect(at.index).toBe(1);
		expect(at.conditions).toHaveLength(1);

		const exactly = parseConditionConfig({ type: "have_exactly", times: 2, condition: leaf });
		if (!(exactly instanceof HaveExactlyConditionConfig)) throw new Error("expected have_exactly config");
		expect(exactly.times).toBe(2);
	});

	test("typed config defaults to an empty object", () => {
		const config = parseConditionConfig({
			type: "equals",
			description: "whole",
			input: { type_url: "condtree.v1.FieldInput" },
			expected: 1,
		});
		if (!(config instanceof EqualsConditionConfig)) throw new Error("expected equals config");
		expect(config.input.config).toEqual({});
	});
});

describe("parse errors", () => {
	test("non-object input", () => {
		expect(() => parseConditionConfig("hello")).toThrow("condition must be an object, got string");
	});

	test("null input", () => {
		expect(() => parseConditionConfig(null)).toThrow("condition must be an object, got null");
	});

	test("array input", () => {
		expect(() => parseConditionConfig([])).toThrow("condition must be an object, got array");
	});

	test("missing type", () => {
		expect(() => parseConditionConfig({ label: "x" })).toThrow(
			"condition missing required field 'type'",
		);
	});

	test("unknown type", () => {
		expect(() => parseConditionConfig({ type: "bogus" })).toThrow('unknown condition type: "bogus"');
	});

	test("errors are ConfigParseError", () => {
		expect(() => parseConditionConfig({ type: "bogus" })).toThrow(ConfigParseError);
	});

	test("missing label", () => {
		expect(() => parseConditionConfig({ type: "all_of", conditions: [] })).toThrow(
			"all_of condition missing required field 'label'",
		);
	});

	test("label must be a string", () => {
		expect(() => parseConditionConfig({ type: "any_of", label: 3 })).toThrow(
			"any_of condition 'label' must be a string, got number",
		);
	});

	test("conditions must be an array", () => {
		expect(() => parseConditionConfig({ type: "all_of", label: "g", conditions: {} })).toThrow(
			"all_of condition 'conditions' must be an array, got object",
		);
	});

	test("missing expected", () => {
		expect(() =>
			parseConditionConfig({ type: "equals", description: "town", input: townInput }),
		).toThrow("equals condition missing required field 'expected'");
	});

	test("missing input", () => {
		expect(() =>
			parseConditionConfig({ type: "equals", description: "town", expected: "Leeds" }),
		).toThrow("condition missing required field 'input'");
	});

	test("missing type_url", () => {
		expect(() =>
			parseConditionConfig({ type: "equals", description: "town", input: {}, expected: "Leeds" }),
		).toThrow("typed_config missing required field 'type_url'");
	});

	test("missing value_match", () => {
		expect(() =>
			parseConditionConfig({ type: "field", description: "town", input: townInput }),
		).toThrow("field condition missing required field 'value_match'");
	});

	test("value_match without a known variant", () => {
		expect(() =>
			parseConditionConfig({
				type: "field",
				description: "town",
				input: townInput,
				value_match: { Glob: "*" },
			}),
		).toThrow("value_match must contain one of [Contains, Exact, Prefix, Regex, Suffix], got keys: [Glob]");
	});

	test("ignore_case must be a boolean", () => {
		expect(() =>
			parseConditionConfig({
				type: "field",
				description: "town",
				input: townInput,
				value_match: { Exact: "x", ignore_case: "yes" },
			}),
		).toThrow("value_match ignore_case must be a boolean, got string");
	});

	test("missing child condition", () => {
		expect(() => parseConditionConfig({ type: "not" })).toThrow(
			"not condition missing required field 'condition'",
		);
	});

	test("index must be a number", () => {
		expect(() => parseConditionConfig({ type: "element_at", index: "0", conditions: [] })).toThrow(
			"element_at condition 'index' must be a number, got string",
		);
	});

	test("missing times", () => {
		expect(() =>
			parseConditionConfig({
				type: "have_exactly",
				condition: { type: "all_of", label: "g" },
			}),
		).toThrow("have_exactly condition missing required field 'times'");
	});

	test("nested errors surface from children", () => {
		expect(() =>
			parseConditionConfig({ type: "all_of", label: "g", conditions: [{ type: "nope" }] }),
		).toThrow('unknown condition type: "nope"');
	});
});
