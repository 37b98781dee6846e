// CHANGE: Reduce calibration samples into a tolerant failure signature
// PURITY: CORE
// FORMAT THEOREM: ∀ s ∈ samples: lengthLow ≤ s.bodyLength ≤ lengthHigh
// INVARIANT: Deterministic; same sample sequence ⇒ identical signature
// COMPLEXITY: O(n) where n = |samples|

import { Either, pipe } from "effect";

import { DegradedSignatureWarning, InsufficientSampleError } from "../errors.js";
import type { FailureSignature, ResponseSummary } from "../types/index.js";

export interface ModeResult<T> {
	readonly value: T;
	readonly unanimous: boolean;
}

/**
 * Most frequent value of a non-empty sequence. Ties resolve to the value
 * seen first.
 *
 * @pure true
 * @precondition values.length > 0
 * @invariant unanimous ⇔ |distinct(values)| = 1
 * @complexity O(n)
 */
export function modeOf<T>(
	first: T,
	rest: readonly T[],
): ModeResult<T> {
	const counts = new Map<T, number>([[first, 1]]);
	for (const value of rest) {
		counts.set(value, (counts.get(value) ?? 0) + 1);
	}
	let best = first;
	let bestCount = 0;
	// Map iteration follows insertion order, so earlier values win ties.
	for (const [value, count] of counts) {
		if (count > bestCount) {
			best = value;
			bestCount = count;
		}
	}
	return { value: best, unanimous: counts.size === 1 };
}

/**
 * Length band widened by the tolerance ratio.
 *
 * @pure true
 * @invariant 0 ≤ low ≤ min ≤ max ≤ high
 * @complexity O(1)
 */
export function toleranceBand(
	min: number,
	max: number,
	toleranceRatio: number,
): { readonly low: number; readonly high: number } {
	return {
		low: Math.max(0, Math.floor(min * (1 - toleranceRatio))),
		high: Math.ceil(max * (1 + toleranceRatio)),
	};
}

function describeDegradation(
	statusReliable: boolean,
	urlReliable: boolean,
	statuses: readonly number[],
	urls: readonly string[],
): readonly DegradedSignatureWarning[] {
	const dimensions: ("status" | "url")[] = [];
	const details: string[] = [];
	if (!statusReliable) {
		dimensions.push("status");
		details.push(`status codes varied (${statuses.join(", ")})`);
	}
	if (!urlReliable) {
		dimensions.push("url");
		details.push(`final URLs varied (${[...new Set(urls)].join(", ")})`);
	}
	if (dimensions.length === 0) return [];
	return [
		new DegradedSignatureWarning({ dimensions, detail: details.join("; ") }),
	];
}

/**
 * Build the failure signature from calibration samples.
 *
 * @param samples - Responses to known-invalid credentials
 * @param toleranceRatio - Relative margin applied to the length band
 * @returns Signature, or InsufficientSampleError for an empty sample
 *
 * @pure true
 * @invariant lengthLow ≤ lengthHigh
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const signature = analyzeSamples(samples, 0.01);
 * // Either.right({ expectedStatus: 422, lengthLow: 9259, ... })
 * ```
 */
export function analyzeSamples(
	samples: readonly ResponseSummary[],
	toleranceRatio: number,
): Either.Either<FailureSignature, InsufficientSampleError> {
	const [head, ...tail] = samples;
	if (head === undefined) {
		return Either.left(new InsufficientSampleError({ sampleSize: 0 }));
	}

	const statuses = samples.map((s) => s.statusCode);
	const urls = samples.map((s) => s.finalUrl);

	const status = modeOf(head.statusCode, tail.map((s) => s.statusCode));
	const url = modeOf(head.finalUrl, tail.map((s) => s.finalUrl));
	const range = tail.reduce(
		(acc, s) => ({
			min: Math.min(acc.min, s.bodyLength),
			max: Math.max(acc.max, s.bodyLength),
		}),
		{ min: head.bodyLength, max: head.bodyLength },
	);
	const band = toleranceBand(range.min, range.max, toleranceRatio);

	return pipe(
		{
			expectedStatus: status.value,
			statusReliable: status.unanimous,
			lengthLow: band.low,
			lengthHigh: band.high,
			expectedUrl: url.value,
			urlReliable: url.unanimous,
			toleranceRatio,
			sampleSize: samples.length,
			warnings: describeDegradation(
				status.unanimous,
				url.unanimous,
				statuses,
				urls,
			),
		} satisfies FailureSignature,
		(signature) => Object.freeze(signature),
		Either.right,
	);
}
