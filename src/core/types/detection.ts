// CHANGE: Detection domain models (signature, verdict, run summary)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable

import type { DegradedSignatureWarning } from "../errors.js";
import type { ResponseSummary } from "./exchange.js";

/**
 * Tolerant description of what a rejected login looks like for one target.
 *
 * @remarks
 * - @invariant 0 ≤ lengthLow ≤ lengthHigh
 * - @invariant statusReliable ⇔ all calibration statuses were equal
 * - @invariant urlReliable ⇔ all calibration final URLs were equal
 * - Shared read-only by every worker.
 */
export interface FailureSignature {
	readonly expectedStatus: number;
	readonly statusReliable: boolean;
	readonly lengthLow: number;
	readonly lengthHigh: number;
	readonly expectedUrl: string;
	readonly urlReliable: boolean;
	readonly toleranceRatio: number;
	readonly sampleSize: number;
	readonly warnings: readonly DegradedSignatureWarning[];
}

export type Classification = "REJECTED" | "SUSPECT";

/**
 * Result of testing one credential pair.
 *
 * @remarks
 * - summary === null only when the transport failed (score = 0, REJECTED)
 * - reasons are ordered status, length, url, then calibration flags
 */
export interface Verdict {
	readonly username: string;
	readonly password: string;
	readonly score: number;
	readonly reasons: readonly string[];
	readonly summary: ResponseSummary | null;
	readonly classifiedAs: Classification;
	readonly worker: number;
}

/**
 * Weighted deviation of one response against the signature.
 */
export interface DeviationScore {
	readonly points: number;
	readonly reasons: readonly string[];
}

/**
 * Per-dimension weights after redistribution for unreliable dimensions.
 */
export interface DimensionWeights {
	readonly status: number;
	readonly length: number;
	readonly url: number;
}

/**
 * Counters reported when a pipeline run completes.
 *
 * @invariant suspectCount ≤ testedCount
 */
export interface PipelineSummary {
	readonly testedCount: number;
	readonly suspectCount: number;
	readonly faultedCount: number;
	readonly elapsedMs: number;
}

/**
 * Lifecycle of one credential pair inside the pipeline.
 */
export type AttemptState =
	| "QUEUED"
	| "IN_FLIGHT"
	| "SCORED"
	| "REJECTED"
	| "SUSPECT";
