// CHANGE: Typed domain error ADT for the detection engine using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Calibration could not produce a single usable failure sample.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class CalibrationError extends Data.TaggedError("CalibrationError")<{
	readonly detail: string;
}> {}

/**
 * Pattern analysis was asked to summarize an empty sample.
 *
 * @pure true (Data class)
 */
export class InsufficientSampleError extends Data.TaggedError(
	"InsufficientSampleError",
)<{
	readonly sampleSize: number;
}> {}

/**
 * Failure classes a transport can report.
 */
export type TransportFailureKind = "timeout" | "connection" | "dns" | "unknown";

/**
 * Transport-level failure for one attempt (timeout, refused, DNS).
 *
 * @pure true (Data class)
 * @invariant recovered per attempt; never aborts a run
 */
export class TransportError extends Data.TaggedError("TransportError")<{
	readonly kind: TransportFailureKind;
	readonly detail: string;
}> {}

/**
 * One or more options failed validation.
 *
 * @pure true (Data class)
 * @invariant issues.length > 0
 */
export class InvalidOptions extends Data.TaggedError("InvalidOptions")<{
	readonly issues: readonly string[];
}> {}

/**
 * Invariant violation - a guarantee of the engine was broken
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Parse error for configuration input
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ParseError extends Data.TaggedError("ParseError")<{
	readonly entity: "config";
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Calibration responses disagreed on one or more dimensions.
 * Carried on the signature as metadata, never raised.
 *
 * @pure true (Data class)
 * @invariant dimensions.length > 0
 */
export class DegradedSignatureWarning extends Data.TaggedClass(
	"DegradedSignatureWarning",
)<{
	readonly dimensions: readonly ("status" | "url")[];
	readonly detail: string;
}> {}

/**
 * Errors that abort a run before any candidate is tested.
 */
export type StartupError =
	| CalibrationError
	| InsufficientSampleError
	| InvalidOptions;
