import { ConstructionError } from "./errors.ts";
import { AllOf } from "./join.ts";
import type { Condition, DescriptionNode, EvaluationResult, Projection } from "./types.ts";

/**
 * Projects the parent value into a child value, then evaluates a labeled
 * group of child conditions against it.
 *
 * The group renders as one node whose children are the nested nodes, so a
 * nestable inside a nestable yields an indented sub-tree. A projection that
 * yields `null` is passed through unchanged; compose a presence condition
 * when the field is optional.
 */
export class Nestable<T, U> implements Condition<T> {
	private readonly group: AllOf<U>;

	constructor(
		readonly description: string,
		readonly project: Projection<T, U>,
		conditions: readonly Condition<U>[],
	) {
		this.group = new AllOf(description, conditions);
	}

	get conditions(): readonly Condition<U>[] {
		return this.group.conditions;
	}

	get depth(): number {
		return this.group.depth;
	}

	matches(value: T): boolean {
		return this.group.matches(this.project(value));
	}

	evaluate(value: T): EvaluationResult {
		return this.group.evaluate(this.project(value));
	}

	describe(): DescriptionNode {
		return this.group.describe();
	}
}

export function nestable<T, U>(
	label: string,
	project: Projection<T, U>,
	conditions: readonly Condition<U>[],
): Nestable<T, U>;
export function nestable<T>(label: string, conditions: readonly Condition<T>[]): Nestable<T, T>;
/**
 * Group conditions under one labeled node, optionally projecting the value
 * first. `nestable("customer", [...])` only adds the label;
 * `nestable("address", (c) => c.address, [...])` evaluates against the address.
 */
export function nestable<T, U>(
	label: string,
	projectOrConditions: Projection<T, U> | readonly Condition<T>[],
	conditions?: readonly Condition<U>[],
): Nestable<T, U> | Nestable<T, T> {
	if (typeof projectOrConditions === "function") {
		if (conditions === undefined) {
			throw new ConstructionError(`nestable "${label}" has a projection but no conditions`);
		}
		return new Nestable(label, projectOrConditions, conditions);
	}
	return new Nestable<T, T>(label, (value) => value, projectOrConditions);
}
