import type { RegistryBuilder } from "./registry.ts";
import type { Projection } from "./types.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}

/**
 * Projection over plain records by dotted path, e.g. `address.town`.
 * A missing segment yields `undefined`. Array indices work as segments.
 *
 * For real domains, write typed projections (`(c: Customer) => c.address`).
 */
export class FieldInput {
	readonly segments: readonly string[];

	constructor(readonly path: string) {
		this.segments = path.split(".").filter((s) => s.length > 0);
	}

	get(value: unknown): unknown {
		let current = value;
		for (const segment of this.segments) {
			if (!isRecord(current) || !Object.hasOwn(current, segment)) return undefined;
			current = current[segment];
		}
		return current;
	}

	/** The projection as a plain function, for the combinators. */
	get projection(): Projection<unknown, unknown> {
		return (value) => this.get(value);
	}
}

export const FIELD_INPUT_TYPE_URL = "condtree.v1.FieldInput";

/** Register the dotted-path FieldInput with the registry builder. */
export function register(builder: RegistryBuilder): RegistryBuilder {
	builder.input(FIELD_INPUT_TYPE_URL, (config) => {
		const path = config.path;
		if (typeof path !== "string") {
			throw new Error("FieldInput config requires 'path' (string)");
		}
		return new FieldInput(path).projection;
	});
	return builder;
}
