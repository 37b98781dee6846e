// CHANGE: Transport boundary - the only place an HTTP exchange enters the engine
// PURITY: SHELL
// EFFECT: Effect<HttpExchange, TransportError>
// INVARIANT: Every transport failure surfaces as a typed TransportError, never a throw
// COMPLEXITY: O(1) besides the exchange itself

import { Duration, Effect } from "effect";

import { TransportError, type TransportFailureKind } from "../../core/errors.js";
import type { Credential, HttpExchange } from "../../core/types/index.js";

/**
 * Submits one credential pair to the target and returns the exchange.
 */
export type Transport = (
	credential: Credential,
) => Effect.Effect<HttpExchange, TransportError>;

/**
 * Promise flavoured submit function, e.g. a wrapper around an HTTP client.
 * The signal is aborted when the attempt times out.
 */
export type PromiseSubmit = (
	username: string,
	password: string,
	signal: AbortSignal,
) => Promise<HttpExchange>;

const KIND_BY_CODE: Readonly<Record<string, TransportFailureKind>> = {
	AbortError: "timeout",
	TimeoutError: "timeout",
	ETIMEDOUT: "timeout",
	ESOCKETTIMEDOUT: "timeout",
	UND_ERR_CONNECT_TIMEOUT: "timeout",
	UND_ERR_HEADERS_TIMEOUT: "timeout",
	UND_ERR_BODY_TIMEOUT: "timeout",
	UND_ERR_SOCKET: "connection",
	ECONNREFUSED: "connection",
	ECONNRESET: "connection",
	EPIPE: "connection",
	EHOSTUNREACH: "connection",
	ENETUNREACH: "connection",
	ENOTFOUND: "dns",
	EAI_AGAIN: "dns",
};

/**
 * Find an error code on a rejection, following `cause` chains
 * (fetch wraps socket errors in a TypeError).
 *
 * @pure true
 * @complexity O(d) where d = depth of the cause chain
 */
function errorCodeOf(error: unknown, depth = 0): string | undefined {
	if (depth > 4 || typeof error !== "object" || error === null) {
		return undefined;
	}
	if ("code" in error && typeof error.code === "string") return error.code;
	if (
		"name" in error &&
		typeof error.name === "string" &&
		Object.hasOwn(KIND_BY_CODE, error.name)
	) {
		return error.name;
	}
	return "cause" in error ? errorCodeOf(error.cause, depth + 1) : undefined;
}

/**
 * Map an arbitrary rejection to a TransportError.
 *
 * @pure true
 * @complexity O(1)
 */
export function classifyTransportFailure(error: unknown): TransportError {
	const code = errorCodeOf(error);
	const kind: TransportFailureKind =
		code !== undefined && Object.hasOwn(KIND_BY_CODE, code)
			? (KIND_BY_CODE[code] ?? "unknown")
			: "unknown";
	const message = error instanceof Error ? error.message : String(error);
	const detail =
		code === undefined || message.includes(code)
			? message
			: `${code}: ${message}`;
	return new TransportError({
		kind,
		detail: detail.length > 0 ? detail : "no detail",
	});
}

/**
 * Adapt a Promise-returning submit function into a Transport.
 *
 * @example
 * ```ts
 * const transport = fromPromiseTransport(async (username, password, signal) => {
 *   const exchange = await myClient.login(username, password, { signal });
 *   return exchange;
 * });
 * ```
 */
export function fromPromiseTransport(submit: PromiseSubmit): Transport {
	return (credential) =>
		Effect.tryPromise({
			try: (signal) => submit(credential.username, credential.password, signal),
			catch: classifyTransportFailure,
		});
}

/**
 * Bound one transport call. Expiry interrupts the call (aborting its signal)
 * and fails with a timeout TransportError.
 *
 * @effect Effect<HttpExchange, TransportError>
 */
export function withTimeout(transport: Transport, timeoutMs: number): Transport {
	return (credential) =>
		transport(credential).pipe(
			Effect.timeoutFail({
				duration: Duration.millis(timeoutMs),
				onTimeout: () =>
					new TransportError({
						kind: "timeout",
						detail: `no response within ${timeoutMs}ms`,
					}),
			}),
		);
}
