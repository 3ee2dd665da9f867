import type { Condition, DescriptionNode, EvaluationResult } from "./types.ts";
import { statusOf } from "./types.ts";

/** A leaf condition: one predicate, one label. */
export class SimpleCondition<T> implements Condition<T> {
	readonly depth = 1;

	constructor(
		readonly predicate: (value: T) => boolean,
		readonly description: string,
	) {}

	matches(value: T): boolean {
		return this.predicate(value);
	}

	evaluate(value: T): EvaluationResult {
		const matched = this.matches(value);
		return { matched, node: { label: this.description, status: statusOf(matched), children: [] } };
	}

	describe(): DescriptionNode {
		return { label: this.description, status: "unknown", children: [] };
	}
}

/**
 * A leaf condition that also reports the actual value when it fails.
 *
 * The renderer runs only on failure, so it may assume the predicate was false.
 */
export class VerboseCondition<T> extends SimpleCondition<T> {
	constructor(
		predicate: (value: T) => boolean,
		description: string,
		readonly actualRenderer: (value: T) => string,
	) {
		super(predicate, description);
	}

	override evaluate(value: T): EvaluationResult {
		const matched = this.matches(value);
		if (matched) {
			return { matched, node: { label: this.description, status: "passed", children: [] } };
		}
		return {
			matched,
			node: {
				label: this.description,
				status: "failed",
				detail: this.actualRenderer(value),
				children: [],
			},
		};
	}
}

export function condition<T>(predicate: (value: T) => boolean, description: string): Condition<T> {
	return new SimpleCondition(predicate, description);
}

export function verboseCondition<T>(
	predicate: (value: T) => boolean,
	description: string,
	actualRenderer: (value: T) => string,
): VerboseCondition<T> {
	return new VerboseCondition(predicate, description, actualRenderer);
}
