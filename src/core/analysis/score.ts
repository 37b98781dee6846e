// CHANGE: Deviation scoring and classification against a failure signature
// PURITY: CORE
// INVARIANT: Total function - never throws; a malformed field contributes 0 points
// COMPLEXITY: O(1) per response

import { match } from "ts-pattern";

import type { TransportError } from "../errors.js";
import type {
	Classification,
	Credential,
	DeviationScore,
	FailureSignature,
	ResponseSummary,
	ScoringOptions,
	Verdict,
} from "../types/index.js";
import { effectiveWeights, isLengthOnly } from "./weights.js";

export const DEGRADED_CALIBRATION_REASON =
	"calibration degraded: scoring on length only";

/**
 * Score one response against the signature.
 *
 * @param summary - Live response digest
 * @param signature - Calibrated failure signature
 * @param options - Weights used before redistribution
 * @returns Points and ordered reasons (status, length, url, calibration)
 *
 * @pure true
 * @invariant points ≥ 0
 * @invariant score(s, sig) = score(s, sig) (idempotent)
 * @complexity O(1)
 */
export function scoreResponse(
	summary: ResponseSummary,
	signature: FailureSignature,
	options: ScoringOptions,
): DeviationScore {
	const weights = effectiveWeights(signature, options);
	const reasons: string[] = [];
	let points = 0;

	if (
		weights.status > 0 &&
		Number.isInteger(summary.statusCode) &&
		summary.statusCode !== signature.expectedStatus
	) {
		points += weights.status;
		reasons.push(
			`status changed: expected ${signature.expectedStatus}, was ${summary.statusCode}`,
		);
	}

	if (
		weights.length > 0 &&
		Number.isFinite(summary.bodyLength) &&
		(summary.bodyLength < signature.lengthLow ||
			summary.bodyLength > signature.lengthHigh)
	) {
		points += weights.length;
		reasons.push(
			`length anomaly: ${summary.bodyLength} bytes, expected ${signature.lengthLow}-${signature.lengthHigh}`,
		);
	}

	if (
		weights.url > 0 &&
		typeof summary.finalUrl === "string" &&
		summary.finalUrl.length > 0 &&
		summary.finalUrl !== signature.expectedUrl
	) {
		points += weights.url;
		reasons.push(
			`redirected: expected ${signature.expectedUrl}, got ${summary.finalUrl}`,
		);
	}

	if (isLengthOnly(signature)) {
		reasons.push(DEGRADED_CALIBRATION_REASON);
	}

	return { points, reasons };
}

/**
 * Decision rule.
 *
 * @pure true
 * @postcondition points ≥ threshold ⇔ result = "SUSPECT"
 * @complexity O(1)
 */
export function classify(points: number, threshold: number): Classification {
	return points >= threshold ? "SUSPECT" : "REJECTED";
}

/**
 * Score a response and wrap it as a Verdict.
 *
 * @pure true
 * @complexity O(1)
 */
export function judge(
	credential: Credential,
	summary: ResponseSummary,
	signature: FailureSignature,
	options: ScoringOptions,
	worker: number,
): Verdict {
	const { points, reasons } = scoreResponse(summary, signature, options);
	return Object.freeze({
		username: credential.username,
		password: credential.password,
		score: points,
		reasons: Object.freeze(reasons),
		summary,
		classifiedAs: classify(points, options.scoreThreshold),
		worker,
	});
}

/**
 * Reason line for a transport failure.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeTransportFailure(error: TransportError): string {
	const label = match(error.kind)
		.with("timeout", () => "timed out")
		.with("connection", () => "connection failed")
		.with("dns", () => "name resolution failed")
		.with("unknown", () => "unexpected error")
		.exhaustive();
	return `transport failure (${label}): ${error.detail}`;
}

/**
 * REJECTED verdict for an attempt whose transport failed.
 *
 * @pure true
 * @postcondition result.score = 0 ∧ result.summary = null
 * @complexity O(1)
 */
export function transportFailureVerdict(
	credential: Credential,
	error: TransportError,
	worker: number,
): Verdict {
	const verdict: Verdict = {
		username: credential.username,
		password: credential.password,
		score: 0,
		reasons: Object.freeze([describeTransportFailure(error)]),
		summary: null,
		classifiedAs: "REJECTED",
		worker,
	};
	return Object.freeze(verdict);
}
