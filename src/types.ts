/** Outcome of one node in one evaluation. `unknown` means the node was described, not evaluated. */
export type Status = "unknown" | "passed" | "failed";

/**
 * One node of a diagnostic tree.
 *
 * Status lives here, never on the Condition: conditions are reusable and a
 * status belongs to a single evaluation.
 */
export interface DescriptionNode {
	readonly label: string;
	readonly status: Status;
	readonly detail?: string;
	readonly children: readonly DescriptionNode[];
}

export interface EvaluationResult {
	readonly matched: boolean;
	readonly node: DescriptionNode;
}

/**
 * Project a value into another value, typically one of its fields.
 *
 * Must be pure. Returning `null` or `undefined` is allowed; only field
 * matchers treat it as a non-match, every other condition sees it as-is.
 */
export type Projection<T, U> = (value: T) => U;

/** A named, immutable predicate that can explain itself. */
export interface Condition<T> {
	readonly description: string;
	/** Nesting depth of the condition tree; 1 for a leaf. */
	readonly depth: number;
	matches(value: T): boolean;
	evaluate(value: T): EvaluationResult;
	describe(): DescriptionNode;
}

export function statusOf(matched: boolean): Status {
	return matched ? "passed" : "failed";
}

/**
 * Match a projected field value.
 *
 * Non-generic on purpose: the same PrefixMatcher works for any field of any
 * record. Matchers reject values of a type they do not handle.
 */
export interface ValueMatcher {
	matches(value: unknown): boolean;
	/** Expected-side text used in the condition label, e.g. `starts with 'Lon'`. */
	describe(): string;
}
