// CHANGE: Pure text rendering of signatures, verdicts and run summaries
// PURITY: CORE
// INVARIANT: No side effects; output depends only on input
// COMPLEXITY: O(r) where r = |reasons|

import { match } from "ts-pattern";

import type {
	FailureSignature,
	PipelineSummary,
	Verdict,
} from "../types/index.js";

/**
 * One-line description of a failure signature.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * formatSignature(sig);
 * // "status 422, length 9259-9359, url /login (5 samples)"
 * ```
 */
export function formatSignature(signature: FailureSignature): string {
	const status = signature.statusReliable
		? `status ${signature.expectedStatus}`
		: `status ${signature.expectedStatus} (unreliable)`;
	const url = signature.urlReliable
		? `url ${signature.expectedUrl}`
		: `url ${signature.expectedUrl} (unreliable)`;
	return `${status}, length ${signature.lengthLow}-${signature.lengthHigh}, ${url} (${signature.sampleSize} samples)`;
}

/**
 * Lines describing one verdict: a header followed by indented reasons.
 *
 * @pure true
 * @invariant result.length = 1 + |verdict.reasons|
 * @complexity O(r)
 */
export function formatVerdict(
	verdict: Verdict,
	maxScore: number,
): readonly string[] {
	const header = match(verdict.classifiedAs)
		.with(
			"SUSPECT",
			() =>
				`SUSPECT ${verdict.username} (score ${verdict.score}/${maxScore}, worker ${verdict.worker})`,
		)
		.with(
			"REJECTED",
			() => `rejected ${verdict.username} (score ${verdict.score}/${maxScore})`,
		)
		.exhaustive();
	return [header, ...verdict.reasons.map((reason) => `  - ${reason}`)];
}

/**
 * Final summary line of a run.
 *
 * @pure true
 * @complexity O(1)
 */
export function formatSummary(summary: PipelineSummary): string {
	const seconds = summary.elapsedMs / 1000;
	const rate = seconds > 0 ? summary.testedCount / seconds : 0;
	const faulted =
		summary.faultedCount > 0 ? `, ${summary.faultedCount} faulted` : "";
	return `tested ${summary.testedCount}, suspect ${summary.suspectCount}${faulted} in ${seconds.toFixed(1)}s (${rate.toFixed(2)}/s)`;
}
