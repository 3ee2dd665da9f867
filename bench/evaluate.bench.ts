/**
 * Evaluate benchmarks.
 *
 * Measures the hot paths: plain `matches()` against full `evaluate()` with
 * its diagnostic tree, rendering, collection scans, width scaling, and
 * regex matching on adversarial input.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	type Condition,
	ExactMatcher,
	RegexMatcher,
	allOf,
	contains,
	equals,
	field,
	haveExactly,
	nestable,
	parseConditionConfig,
	RegistryBuilder,
	renderResult,
} from "../src/index.ts";
import { register } from "../src/testing.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

interface Address {
	readonly town: string;
	readonly postcode: string;
}

interface Customer {
	readonly firstName: string;
	readonly lastName: string;
	readonly address: Address;
}

const john: Customer = {
	firstName: "John",
	lastName: "Doe",
	address: { town: "Manchester", postcode: "E18 5HT" },
};

function customerCondition(town: string): Condition<Customer> {
	return nestable<Customer>("customer", [
		equals("first name", "John", (c: Customer) => c.firstName),
		equals("last name", "Doe", (c: Customer) => c.lastName),
		nestable("address", (c: Customer) => c.address, [
			equals("town", town, (a: Address) => a.town),
			field("postcode", (a: Address) => a.postcode, new RegexMatcher("^E\\d+ ")),
		]),
	]);
}

// ── Core scenarios ───────────────────────────────────────────────────────────

summary(() => {
	const passing = customerCondition("Manchester");
	const failing = customerCondition("London");

	bench("matches_pass", () => passing.matches(john));
	bench("matches_fail", () => failing.matches(john));
	bench("evaluate_pass", () => passing.evaluate(john));
	bench("evaluate_fail", () => failing.evaluate(john));
});

summary(() => {
	const failing = customerCondition("London");
	bench("evaluate_and_render_fail", () => renderResult(failing.evaluate(john)));
});

// ── Collections ──────────────────────────────────────────────────────────────

summary(() => {
	const customers: Customer[] = [];
	for (let i = 0; i < 1000; i++) {
		customers.push({ ...john, firstName: `customer_${i}` });
	}
	const last = field("first name", (c: Customer) => c.firstName, new ExactMatcher("customer_999"));

	bench("contains_1000_last", () => contains(last).matches(customers));
	bench("have_exactly_1000", () => haveExactly(1, last).matches(customers));
});

// ── Scaling: group width ─────────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 50, 100, 200]) {
		const conditions: Condition<Customer>[] = [];
		for (let i = 0; i < n; i++) {
			conditions.push(equals(`field_${i}`, "John", (c: Customer) => c.firstName));
		}
		const group = allOf("wide", conditions);
		bench(`group_width_${n}_evaluate`, () => group.evaluate(john));
	}
});

// ── Config loading ───────────────────────────────────────────────────────────

summary(() => {
	const registry = register(new RegistryBuilder()).build();
	const data = {
		type: "nestable",
		label: "customer",
		conditions: [
			{
				type: "field",
				description: "town",
				input: { type_url: "condtree.v1.FieldInput", config: { path: "address.town" } },
				value_match: { Prefix: "Man" },
			},
		],
	};
	const loaded = registry.loadCondition(parseConditionConfig(data));

	bench("config_parse_and_load", () => registry.loadCondition(parseConditionConfig(data)));
	bench("config_loaded_evaluate", () => loaded.evaluate(john));
});

// ── Regex: linear time on adversarial input ──────────────────────────────────

summary(() => {
	const nested = new RegexMatcher("^(a+)+$");
	for (const n of [10, 100, 1000]) {
		const input = `${"a".repeat(n)}!`;
		bench(`regex_nested_quantifier_${n}`, () => nested.matches(input));
	}
});

await run();
