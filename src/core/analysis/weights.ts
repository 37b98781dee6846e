// CHANGE: Redistribute the weight of unreliable dimensions to reliable ones
// PURITY: CORE
// FORMAT THEOREM: Σ effective = weightStatus + weightLength + weightUrl whenever Σ configured(reliable) > 0
// INVARIANT: length is always reliable; unreliable dimensions get 0
// COMPLEXITY: O(1)

import type {
	DimensionWeights,
	FailureSignature,
	ScoringOptions,
} from "../types/index.js";

type Dimension = keyof DimensionWeights;

/**
 * Effective per-dimension weights for a signature.
 *
 * Reliable dimensions share the configured total in proportion to their own
 * configured weights (rounded, the last reliable dimension takes the
 * remainder). With every dimension reliable this is the identity.
 *
 * @pure true
 * @invariant ¬signature.statusReliable → result.status = 0
 * @invariant ¬signature.urlReliable → result.url = 0
 * @complexity O(1)
 *
 * @example
 * ```ts
 * // 3/2/3 with status unreliable
 * effectiveWeights(signature, options); // { status: 0, length: 3, url: 5 }
 * ```
 */
export function effectiveWeights(
	signature: Pick<FailureSignature, "statusReliable" | "urlReliable">,
	options: ScoringOptions,
): DimensionWeights {
	const configured: DimensionWeights = {
		status: options.weightStatus,
		length: options.weightLength,
		url: options.weightUrl,
	};
	const reliable: readonly Dimension[] = (
		["status", "length", "url"] as const
	).filter(
		(d) =>
			(d !== "status" || signature.statusReliable) &&
			(d !== "url" || signature.urlReliable),
	);
	if (reliable.length === 3) return configured;

	const total = configured.status + configured.length + configured.url;
	const reliableTotal = reliable.reduce((sum, d) => sum + configured[d], 0);
	const result: Record<Dimension, number> = { status: 0, length: 0, url: 0 };
	if (reliableTotal === 0) return result;

	let assigned = 0;
	reliable.forEach((dimension, index) => {
		const share =
			index === reliable.length - 1
				? total - assigned
				: Math.round((configured[dimension] * total) / reliableTotal);
		result[dimension] = share;
		assigned += share;
	});
	return result;
}

/**
 * True when calibration left only the length dimension usable.
 *
 * @pure true
 * @complexity O(1)
 */
export function isLengthOnly(
	signature: Pick<FailureSignature, "statusReliable" | "urlReliable">,
): boolean {
	return !signature.statusReliable && !signature.urlReliable;
}
