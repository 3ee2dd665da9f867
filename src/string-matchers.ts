import { RE2JS } from "re2js";

import { ConstructionError } from "./errors.ts";
import type { ValueMatcher } from "./types.ts";

/**
 * Shared shape of the literal matchers: the operand is folded once at
 * construction, the input on every call. Non-string inputs never match.
 */
abstract class LiteralMatcher implements ValueMatcher {
	private readonly folded: string;

	constructor(
		readonly operand: string,
		readonly ignoreCase: boolean,
	) {
		this.folded = ignoreCase ? operand.toLowerCase() : operand;
	}

	protected abstract test(input: string, operand: string): boolean;
	protected abstract verb(): string;

	matches(value: unknown): boolean {
		if (typeof value !== "string") return false;
		return this.test(this.ignoreCase ? value.toLowerCase() : value, this.folded);
	}

	describe(): string {
		const note = this.ignoreCase ? " (ignoring case)" : "";
		return `${this.verb()}'${this.operand}'${note}`;
	}
}

export class ExactMatcher extends LiteralMatcher {
	constructor(value: string, ignoreCase = false) {
		super(value, ignoreCase);
	}

	protected test(input: string, operand: string): boolean {
		return input === operand;
	}

	protected verb(): string {
		return "";
	}
}

export class PrefixMatcher extends LiteralMatcher {
	constructor(prefix: string, ignoreCase = false) {
		super(prefix, ignoreCase);
	}

	protected test(input: string, operand: string): boolean {
		return input.startsWith(operand);
	}

	protected verb(): string {
		return "starts with ";
	}
}

export class SuffixMatcher extends LiteralMatcher {
	constructor(suffix: string, ignoreCase = false) {
		super(suffix, ignoreCase);
	}

	protected test(input: string, operand: string): boolean {
		return input.endsWith(operand);
	}

	protected verb(): string {
		return "ends with ";
	}
}

/** Substring containment; the empty substring matches every string. */
export class ContainsMatcher extends LiteralMatcher {
	constructor(substring: string, ignoreCase = false) {
		super(substring, ignoreCase);
	}

	protected test(input: string, operand: string): boolean {
		return input.includes(operand);
	}

	protected verb(): string {
		return "contains ";
	}
}

/**
 * Regular expression search using RE2, so matching time stays linear in the
 * input. `find()` searches anywhere in the string; anchor the pattern for a
 * full match.
 *
 * RE2 has no backreferences or lookaround. Patterns using them are rejected
 * at construction.
 */
export class RegexMatcher implements ValueMatcher {
	private readonly compiled: RE2JS;

	constructor(readonly pattern: string) {
		try {
			this.compiled = RE2JS.compile(pattern);
		} catch (e) {
			throw new ConstructionError(
				`invalid regex pattern "${pattern}": ${e instanceof Error ? e.message : String(e)}`,
			);
		}
	}

	matches(value: unknown): boolean {
		if (typeof value !== "string") return false;
		return this.compiled.matcher(value).find();
	}

	describe(): string {
		return `matches /${this.pattern}/`;
	}
}
