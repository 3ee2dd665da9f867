import { ConstructionError, ProjectionError } from "./errors.ts";
import { groupDepth } from "./join.ts";
import { Nestable } from "./nestable.ts";
import type { Condition, DescriptionNode, EvaluationResult } from "./types.ts";
import { statusOf } from "./types.ts";

/**
 * Some element must satisfy the element condition. Empty collections never match.
 *
 * The search is existential, so the node shows the sought condition as its
 * single child (status unknown) rather than every element's outcome.
 */
export class Contains<V> implements Condition<Iterable<V>> {
	readonly description = "contains";
	readonly depth: number;

	constructor(readonly condition: Condition<V>) {
		this.depth = groupDepth([condition]);
	}

	matches(values: Iterable<V>): boolean {
		for (const value of values) {
			if (this.condition.matches(value)) return true;
		}
		return false;
	}

	evaluate(values: Iterable<V>): EvaluationResult {
		const matched = this.matches(values);
		return {
			matched,
			node: {
				label: this.description,
				status: statusOf(matched),
				children: [this.condition.describe()],
			},
		};
	}

	describe(): DescriptionNode {
		return { label: this.description, status: "unknown", children: [this.condition.describe()] };
	}
}

/** Exactly `times` elements must satisfy the element condition. Reports the real count on failure. */
export class HaveExactly<V> implements Condition<Iterable<V>> {
	readonly description: string;
	readonly depth: number;

	constructor(
		readonly times: number,
		readonly condition: Condition<V>,
	) {
		if (!Number.isInteger(times) || times < 0) {
			throw new ConstructionError(`expected count must be a non-negative integer, got ${times}`);
		}
		this.description = `have exactly ${times} times`;
		this.depth = groupDepth([condition]);
	}

	matches(values: Iterable<V>): boolean {
		return this.count(values) === this.times;
	}

	evaluate(values: Iterable<V>): EvaluationResult {
		const count = this.count(values);
		const children = [this.condition.describe()];
		if (count === this.times) {
			return { matched: true, node: { label: this.description, status: "passed", children } };
		}
		return {
			matched: false,
			node: { label: this.description, status: "failed", detail: `but was: ${count}`, children },
		};
	}

	describe(): DescriptionNode {
		return { label: this.description, status: "unknown", children: [this.condition.describe()] };
	}

	private count(values: Iterable<V>): number {
		let n = 0;
		for (const value of values) {
			if (this.condition.matches(value)) n++;
		}
		return n;
	}
}

export function contains<V>(elementCondition: Condition<V>): Contains<V> {
	return new Contains(elementCondition);
}

export function haveExactly<V>(times: number, elementCondition: Condition<V>): HaveExactly<V> {
	return new HaveExactly(times, elementCondition);
}

/**
 * Evaluate conditions against the element at `index` (0-based).
 *
 * A negative or fractional index throws ConstructionError here; an index past
 * the end of the evaluated collection throws ProjectionError, since that is a
 * malformed assertion rather than a failed one.
 */
export function elementAt<V>(
	index: number,
	conditions: readonly Condition<V>[],
): Nestable<readonly V[], V> {
	if (!Number.isInteger(index) || index < 0) {
		throw new ConstructionError(`element index must be a non-negative integer, got ${index}`);
	}
	return new Nestable<readonly V[], V>(
		`element at ${index}`,
		(elements) => {
			if (index >= elements.length) throw new ProjectionError(index, elements.length);
			return elements[index];
		},
		conditions,
	);
}
