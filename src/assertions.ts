import { formatValue } from "./equality.ts";
import { ConditionError } from "./errors.ts";
import { createLogger } from "./logging.ts";
import { renderResult } from "./render.ts";
import type { Condition, EvaluationResult } from "./types.ts";

const log = createLogger("assertions");

function failureMessage(actual: unknown, result: EvaluationResult): string {
	return `Expecting actual:\n  ${formatValue(actual)}\nto have:\n${renderResult(result)}`;
}

/** Raised by `assertThat(...).has()` when the condition does not match. */
export class ConditionFailedError extends ConditionError {
	readonly actual: unknown;
	readonly result: EvaluationResult;

	constructor(actual: unknown, result: EvaluationResult) {
		super(failureMessage(actual, result));
		this.name = "ConditionFailedError";
		this.actual = actual;
		this.result = result;
	}
}

/** One recorded soft failure. */
export interface SoftFailure {
	readonly actual: unknown;
	readonly result: EvaluationResult;
}

/** Raised by `SoftConditions.assertAll()`; lists failures in the order they were recorded. */
export class SoftConditionsError extends ConditionError {
	readonly failures: readonly SoftFailure[];

	constructor(failures: readonly SoftFailure[]) {
		const lines = failures.map((f, i) => `${i + 1}) ${failureMessage(f.actual, f.result)}`);
		super(`Multiple failures (${failures.length}):\n${lines.join("\n\n")}`);
		this.name = "SoftConditionsError";
		this.failures = failures;
	}
}

/** Hard assertion over one value. Throws on the first non-matching condition. */
export class ConditionAssert<T> {
	constructor(readonly actual: T) {}

	has(condition: Condition<T>): this {
		const result = condition.evaluate(this.actual);
		if (!result.matched) {
			log.debug({ condition: condition.description }, "condition failed");
			throw new ConditionFailedError(this.actual, result);
		}
		return this;
	}

	is(condition: Condition<T>): this {
		return this.has(condition);
	}
}

export function assertThat<T>(actual: T): ConditionAssert<T> {
	return new ConditionAssert(actual);
}

/** Anything that accumulates evaluation outcomes and can be chained. */
export interface EvaluationRecorder {
	record(actual: unknown, result: EvaluationResult): this;
}

/**
 * Caller-owned accumulator for soft assertions.
 *
 *   new SoftConditions()
 *     .check(customer, customerCondition)
 *     .check(customers, contains(firstName("Mike")))
 *     .assertAll();
 *
 * Not synchronized; share one instance per test.
 */
export class SoftConditions implements EvaluationRecorder {
	private readonly recorded: SoftFailure[] = [];

	/** Every recorded evaluation, passed or failed, in record order. */
	get results(): readonly EvaluationResult[] {
		return this.recorded.map((r) => r.result);
	}

	check<T>(actual: T, condition: Condition<T>): this {
		return this.record(actual, condition.evaluate(actual));
	}

	record(actual: unknown, result: EvaluationResult): this {
		if (!result.matched) {
			log.debug({ condition: result.node.label }, "soft failure recorded");
		}
		this.recorded.push({ actual, result });
		return this;
	}

	failures(): readonly SoftFailure[] {
		return this.recorded.filter((r) => !r.result.matched);
	}

	/** Throw one SoftConditionsError if anything failed; otherwise return. */
	assertAll(): void {
		const failures = this.failures();
		if (failures.length > 0) {
			throw new SoftConditionsError(failures);
		}
	}
}
