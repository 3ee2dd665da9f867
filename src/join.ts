import { ConstructionError, requireLabel } from "./errors.ts";
import type { Condition, DescriptionNode, EvaluationResult } from "./types.ts";
import { statusOf } from "./types.ts";

/** Maximum nesting depth for condition trees. Validated at construction. */
export const MAX_DEPTH = 32;

export function groupDepth<T>(conditions: readonly Condition<T>[]): number {
	const maxChild = conditions.reduce((max, c) => Math.max(max, c.depth), 0);
	const depth = 1 + maxChild;
	if (depth > MAX_DEPTH) {
		throw new ConstructionError(
			`condition depth ${depth} exceeds maximum allowed depth ${MAX_DEPTH}`,
		);
	}
	return depth;
}

function groupNode(
	label: string,
	matched: boolean,
	results: readonly EvaluationResult[],
): DescriptionNode {
	return { label, status: statusOf(matched), children: results.map((r) => r.node) };
}

/**
 * All conditions must match. Empty AllOf is vacuously true.
 *
 * Every child is evaluated, even after a failure, so the diagnostic tree is
 * complete. Children keep construction order.
 */
export class AllOf<T> implements Condition<T> {
	readonly depth: number;

	constructor(
		readonly description: string,
		readonly conditions: readonly Condition<T>[],
	) {
		requireLabel(description, "group");
		this.depth = groupDepth(conditions);
	}

	matches(value: T): boolean {
		return this.conditions.map((c) => c.matches(value)).every(Boolean);
	}

	evaluate(value: T): EvaluationResult {
		const results = this.conditions.map((c) => c.evaluate(value));
		const matched = results.every((r) => r.matched);
		return { matched, node: groupNode(this.description, matched, results) };
	}

	describe(): DescriptionNode {
		return {
			label: this.description,
			status: "unknown",
			children: this.conditions.map((c) => c.describe()),
		};
	}
}

/** At least one condition must match. Empty AnyOf is vacuously false. Never short-circuits. */
export class AnyOf<T> implements Condition<T> {
	readonly depth: number;

	constructor(
		readonly description: string,
		readonly conditions: readonly Condition<T>[],
	) {
		requireLabel(description, "group");
		this.depth = groupDepth(conditions);
	}

	matches(value: T): boolean {
		return this.conditions.map((c) => c.matches(value)).some(Boolean);
	}

	evaluate(value: T): EvaluationResult {
		const results = this.conditions.map((c) => c.evaluate(value));
		const matched = results.some((r) => r.matched);
		return { matched, node: groupNode(this.description, matched, results) };
	}

	describe(): DescriptionNode {
		return {
			label: this.description,
			status: "unknown",
			children: this.conditions.map((c) => c.describe()),
		};
	}
}

/** Inverts a condition. The child node keeps its own status. */
export class Not<T> implements Condition<T> {
	readonly description = "not";
	readonly depth: number;

	constructor(readonly condition: Condition<T>) {
		this.depth = groupDepth([condition]);
	}

	matches(value: T): boolean {
		return !this.condition.matches(value);
	}

	evaluate(value: T): EvaluationResult {
		const inner = this.condition.evaluate(value);
		const matched = !inner.matched;
		return { matched, node: groupNode(this.description, matched, [inner]) };
	}

	describe(): DescriptionNode {
		return { label: this.description, status: "unknown", children: [this.condition.describe()] };
	}
}

export function allOf<T>(label: string, conditions: readonly Condition<T>[]): AllOf<T> {
	return new AllOf(label, conditions);
}

export function anyOf<T>(label: string, conditions: readonly Condition<T>[]): AnyOf<T> {
	return new AnyOf(label, conditions);
}

export function not<T>(condition: Condition<T>): Not<T> {
	return new Not(condition);
}
