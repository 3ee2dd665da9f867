// Core types
export type {
	Condition,
	DescriptionNode,
	EvaluationResult,
	Projection,
	Status,
	ValueMatcher,
} from "./types.ts";
// Test utilities (FieldInput): import from "condtree/testing"

// Errors
export { ConditionError, ConstructionError, ProjectionError } from "./errors.ts";

// Leaf conditions
export { SimpleCondition, VerboseCondition, condition, verboseCondition } from "./condition.ts";
export { equals, formatValue, structurallyEqual } from "./equality.ts";
export type { Equatable } from "./equality.ts";
export { FieldCondition, field } from "./field.ts";

// Composites
export { AllOf, AnyOf, MAX_DEPTH, Not, allOf, anyOf, not } from "./join.ts";
export { Nestable, nestable } from "./nestable.ts";
export { Contains, HaveExactly, contains, elementAt, haveExactly } from "./collections.ts";

// String matchers
export {
	ContainsMatcher,
	ExactMatcher,
	PrefixMatcher,
	RegexMatcher,
	SuffixMatcher,
} from "./string-matchers.ts";

// Rendering
export { DEFAULT_RENDER_OPTIONS, renderDescription, renderResult } from "./render.ts";
export type { RenderOptions } from "./render.ts";

// Host assertion surface
export {
	ConditionAssert,
	ConditionFailedError,
	SoftConditions,
	SoftConditionsError,
	assertThat,
} from "./assertions.ts";
export type { EvaluationRecorder, SoftFailure } from "./assertions.ts";

// Config types
export {
	AllOfConditionConfig,
	AnyOfConditionConfig,
	BuiltInMatch,
	ConfigParseError,
	ContainsConditionConfig,
	ElementAtConditionConfig,
	EqualsConditionConfig,
	FieldConditionConfig,
	HaveExactlyConditionConfig,
	NestableConditionConfig,
	NotConditionConfig,
	TypedConfig,
	parseConditionConfig,
} from "./config.ts";
export type { ConditionConfig } from "./config.ts";

// Registry
export {
	InvalidConfigError,
	MAX_CONDITIONS_PER_GROUP,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	PatternTooLongError,
	Registry,
	RegistryBuilder,
	TooManyConditionsError,
	UnknownTypeUrlError,
} from "./registry.ts";
export type { InputFactory } from "./registry.ts";

// Logging
export { createLogger, getLogLevel } from "./logging.ts";
export type { LogLevel, Logger } from "./logging.ts";
