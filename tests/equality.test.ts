import { describe, expect, it } from "vitest";
import { equals, formatValue, structurallyEqual } from "../src/equality.ts";
import { Postcode } from "./helpers/model.ts";

function nullPrototype(fields: Record<string, unknown>): object {
	const record: object = Object.create(null);
	return Object.assign(record, fields);
}

describe("structurallyEqual", () => {
	it("compares primitives by value", () => {
		expect(structurallyEqual("a", "a")).toBe(true);
		expect(structurallyEqual(1, 2)).toBe(false);
	});

	it("compares records deeply, not by identity", () => {
		expect(structurallyEqual({ a: 1, b: [1, 2] }, { a: 1, b: [1, 2] })).toBe(true);
		expect(structurallyEqual({ a: 1 }, { a: 2 })).toBe(false);
	});

	it("compares dates by time", () => {
		expect(structurallyEqual(new Date(Date.UTC(2020, 0, 1)), new Date(Date.UTC(2020, 0, 1)))).toBe(
			true,
		);
	});

	it("defers to an equals() method on the expected value", () => {
		expect(structurallyEqual(new Postcode("E18 5HT"), new Postcode("E18 5HT"))).toBe(true);
		expect(structurallyEqual(new Postcode("E18 5HT"), new Postcode("M15 5HT"))).toBe(false);
		expect(structurallyEqual(new Postcode("E18 5HT"), "E18 5HT")).toBe(false);
	});

	it("distinguishes null from undefined", () => {
		expect(structurallyEqual(null, undefined)).toBe(false);
	});

	it("treats 0 and -0 as the same number", () => {
		expect(structurallyEqual(0, -0)).toBe(true);
		expect(structurallyEqual(-0, 0)).toBe(true);
	});

	it("treats NaN as equal to itself", () => {
		expect(structurallyEqual(Number.NaN, Number.NaN)).toBe(true);
	});
});

describe("formatValue", () => {
	it("keeps strings verbatim", () => {
		expect(formatValue("John")).toBe("John");
		expect(formatValue("")).toBe("");
	});

	it("renders dates as ISO strings", () => {
		expect(formatValue(new Date(Date.UTC(1980, 11, 11)))).toBe("1980-12-11T00:00:00.000Z");
	});

	it("uses a custom toString", () => {
		expect(formatValue(new Postcode("E18 5HT"))).toBe("E18 5HT");
	});

	it("inspects plain objects and arrays on one line", () => {
		expect(formatValue({ a: 1 })).toBe("{ a: 1 }");
		expect(formatValue([1, 2])).toBe("[ 1, 2 ]");
	});

	it("inspects null-prototype objects", () => {
		const record = nullPrototype({ town: "Leeds" });
		expect(formatValue(record)).toBe("[Object: null prototype] { town: 'Leeds' }");
	});

	it("stringifies other primitives", () => {
		expect(formatValue(42)).toBe("42");
		expect(formatValue(null)).toBe("null");
		expect(formatValue(undefined)).toBe("undefined");
	});
});

describe("equals", () => {
	interface Person {
		readonly name: string;
		readonly tags: string[];
	}
	const ann: Person = { name: "Ann", tags: ["a", "b"] };

	it("labels with the description and expected value", () => {
		expect(equals("name", "Ann", (p: Person) => p.name).description).toBe("name: 'Ann'");
	});

	it("matches iff the projected value equals the expected one", () => {
		expect(equals("name", "Ann", (p: Person) => p.name).matches(ann)).toBe(true);
		expect(equals("name", "Bob", (p: Person) => p.name).matches(ann)).toBe(false);
	});

	it("uses structural equality for composite values", () => {
		const tags = equals("tags", ["a", "b"], (p: Person) => p.tags);
		expect(tags.matches(ann)).toBe(true);
	});

	it("reports the actual value on failure", () => {
		const result = equals("name", "Bob", (p: Person) => p.name).evaluate(ann);
		expect(result.matched).toBe(false);
		expect(result.node.detail).toBe("but was: 'Ann'");
	});

	it("has no detail on success", () => {
		expect(equals("name", "Ann", (p: Person) => p.name).evaluate(ann).node.detail).toBeUndefined();
	});

	it("matches a negative zero against zero", () => {
		const amount = equals("amount", 0, (v: { amount: number }) => v.amount);
		const result = amount.evaluate({ amount: -0 });
		expect(result.matched).toBe(true);
		expect(result.node).toEqual({ label: "amount: '0'", status: "passed", children: [] });
	});

	it("labels a null-prototype expected value", () => {
		const expected = nullPrototype({ town: "London" });
		const meta = equals("meta", expected, (v: { meta: unknown }) => v.meta);
		expect(meta.description).toBe("meta: '[Object: null prototype] { town: 'London' }'");
	});

	it("reports a null-prototype actual value", () => {
		const meta = equals("meta", { town: "London" }, (v: { meta: unknown }) => v.meta);
		const actual = nullPrototype({ town: "Leeds" });
		const result = meta.evaluate({ meta: actual });
		expect(result.matched).toBe(false);
		expect(result.node.detail).toBe("but was: '[Object: null prototype] { town: 'Leeds' }'");
	});
});
