import { VerboseCondition } from "./condition.ts";
import { formatValue } from "./equality.ts";
import type { Projection, ValueMatcher } from "./types.ts";

/** Pairs a field projection with a value matcher. */
export class FieldCondition<T> extends VerboseCondition<T> {
	constructor(
		description: string,
		readonly project: Projection<T, unknown>,
		readonly matcher: ValueMatcher,
	) {
		super(
			(value) => {
				const actual = project(value);
				if (actual === null || actual === undefined) return false; // absent field never matches
				return matcher.matches(actual);
			},
			`${description}: ${matcher.describe()}`,
			(value) => `but was: '${formatValue(project(value))}'`,
		);
	}
}

export function field<T>(
	description: string,
	project: Projection<T, unknown>,
	matcher: ValueMatcher,
): FieldCondition<T> {
	return new FieldCondition(description, project, matcher);
}
