// CHANGE: Domain types for one HTTP exchange and its normalized digest
// PURITY: CORE
// INVARIANT: All fields readonly; summaries are frozen on construction

/**
 * Candidate username/password pair.
 *
 * @invariant username.length > 0 ∧ password.length > 0
 */
export interface Credential {
	readonly username: string;
	readonly password: string;
}

/**
 * What the transport hands back for one submitted credential.
 *
 * @property status HTTP status code of the final response
 * @property body Decoded response body
 * @property finalUrl URL after all redirects were followed
 * @property cookieNames Names of cookies set during the exchange
 */
export interface HttpExchange {
	readonly status: number;
	readonly body: string;
	readonly finalUrl: string;
	readonly cookieNames: readonly string[];
}

/**
 * Normalized digest of one HTTP exchange.
 *
 * @invariant bodyLength ≥ 0 ∧ elapsedMs ≥ 0
 */
export interface ResponseSummary {
	readonly statusCode: number;
	readonly bodyLength: number;
	readonly finalUrl: string;
	readonly cookieNames: ReadonlySet<string>;
	readonly elapsedMs: number;
}
