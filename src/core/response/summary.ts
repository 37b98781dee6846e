// CHANGE: Pure builder for ResponseSummary
// PURITY: CORE
// INVARIANT: Output is frozen; cookie names deduplicated; elapsedMs ≥ 0
// COMPLEXITY: O(c) where c = |cookieNames|

import type { HttpExchange, ResponseSummary } from "../types/index.js";

/**
 * Digest an HTTP exchange into the fields the scorer compares.
 *
 * @param exchange - Raw exchange from the transport
 * @param elapsedMs - Wall time of the exchange
 * @returns Frozen summary
 *
 * @pure true
 * @invariant result.bodyLength = exchange.body.length
 * @complexity O(c)
 */
export function summarizeExchange(
	exchange: HttpExchange,
	elapsedMs: number,
): ResponseSummary {
	return Object.freeze({
		statusCode: exchange.status,
		bodyLength: exchange.body.length,
		finalUrl: exchange.finalUrl,
		cookieNames: new Set(exchange.cookieNames),
		elapsedMs: Math.max(0, elapsedMs),
	});
}
