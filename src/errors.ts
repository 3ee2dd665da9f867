/** Root of every error this library raises. A non-match is never one of them. */
export class ConditionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConditionError";
	}
}

/** Malformed combinator arguments, raised by the factory that received them. */
export class ConstructionError extends ConditionError {
	constructor(message: string) {
		super(message);
		this.name = "ConstructionError";
	}
}

/** A projection could not produce a value for the input (e.g. index past the end). */
export class ProjectionError extends ConditionError {
	readonly index: number;
	readonly length: number;

	constructor(index: number, length: number) {
		super(`index ${index} out of range for collection of length ${length}`);
		this.name = "ProjectionError";
		this.index = index;
		this.length = length;
	}
}

/** Reject an empty or whitespace-only group label. */
export function requireLabel(label: string, what: string): string {
	if (label.trim().length === 0) {
		throw new ConstructionError(`${what} label must not be empty`);
	}
	return label;
}
