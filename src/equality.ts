import { inspect, isDeepStrictEqual } from "node:util";

import { VerboseCondition } from "./condition.ts";
import type { Projection } from "./types.ts";

/** A value object that defines its own equality, e.g. `Postcode.equals()`. */
export interface Equatable {
	equals(other: unknown): boolean;
}

function isEquatable(value: unknown): value is Equatable {
	return (
		typeof value === "object" &&
		value !== null &&
		"equals" in value &&
		typeof value.equals === "function"
	);
}

/**
 * Structural equality.
 *
 * A value that implements `equals()` decides for itself; everything else is
 * compared with deep strict equality (same prototype, same own properties).
 */
export function structurallyEqual(expected: unknown, actual: unknown): boolean {
	if (isEquatable(expected)) return expected.equals(actual);
	// === first: 0 and -0 are the same number
	return expected === actual || isDeepStrictEqual(expected, actual);
}

/** True when the object overrides `toString`. Null-prototype objects have none. */
function overridesToString(value: object): boolean {
	return (
		"toString" in value &&
		typeof value.toString === "function" &&
		value.toString !== Object.prototype.toString
	);
}

/** Render a value for a label or a "but was" detail. */
export function formatValue(value: unknown): string {
	if (typeof value === "string") return value;
	if (value instanceof Date) return value.toISOString();
	if (typeof value === "object" && value !== null) {
		if (!Array.isArray(value) && overridesToString(value)) {
			return String(value);
		}
		return inspect(value, { breakLength: Number.POSITIVE_INFINITY, depth: 4 });
	}
	return String(value);
}

/**
 * The leaf condition for "field X equals Y".
 *
 * Label is `<description>: '<expected>'`; on failure the detail is
 * `but was: '<actual>'`.
 */
export function equals<T, K>(
	description: string,
	expected: K,
	project: Projection<T, K>,
): VerboseCondition<T> {
	return new VerboseCondition<T>(
		(value) => structurallyEqual(expected, project(value)),
		`${description}: '${formatValue(expected)}'`,
		(value) => `but was: '${formatValue(project(value))}'`,
	);
}
