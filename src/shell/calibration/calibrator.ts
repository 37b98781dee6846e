// CHANGE: Sequential calibration probes with synthesized invalid credentials
// PURITY: SHELL
// EFFECT: Effect<readonly ResponseSummary[], CalibrationError>
// INVARIANT: Success ⇒ 1 ≤ |result| ≤ count; probes never overlap
// COMPLEXITY: O(count) requests

import { Clock, Duration, Effect, Either, Random } from "effect";

import { describeTransportFailure } from "../../core/analysis/score.js";
import { CalibrationError, type TransportError } from "../../core/errors.js";
import { summarizeExchange } from "../../core/response/summary.js";
import type { Credential, ResponseSummary } from "../../core/types/index.js";
import { type Transport, withTimeout } from "../transport/transport.js";

export interface CalibrationSettings {
	readonly count: number;
	readonly pacingMs: number;
	readonly timeoutMs: number;
}

const PROBE_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
export const PROBE_USERNAME_PREFIX = "nx-probe-";

const randomToken = (length: number): Effect.Effect<string> =>
	Effect.replicateEffect(
		Random.nextIntBetween(0, PROBE_ALPHABET.length),
		length,
	).pipe(
		Effect.map((indices) =>
			indices.map((i) => PROBE_ALPHABET.charAt(i)).join(""),
		),
	);

/**
 * Credential that cannot belong to a real account: a prefixed random
 * username and a random password.
 *
 * @effect Effect<Credential> (uses the Random service)
 */
export const synthesizeProbeCredential: Effect.Effect<Credential> = Effect.all({
	username: randomToken(12).pipe(
		Effect.map((token) => `${PROBE_USERNAME_PREFIX}${token}`),
	),
	password: randomToken(20),
});

/**
 * Send `count` known-invalid attempts one after another and collect their
 * summaries.
 *
 * Probes that fail at the transport level are logged and dropped; the run
 * fails only when none succeeds.
 *
 * @param transport - Submit function for the target
 * @param settings - Probe count, delay between probes and per-probe timeout
 * @returns Summaries in probe order
 *
 * @pure false - network calls and timers
 * @effect Effect<readonly ResponseSummary[], CalibrationError>
 * @invariant count < 1 → CalibrationError before any request
 * @complexity O(count)
 */
export function calibrate(
	transport: Transport,
	settings: CalibrationSettings,
): Effect.Effect<readonly ResponseSummary[], CalibrationError> {
	const { count, pacingMs } = settings;
	const submit = withTimeout(transport, settings.timeoutMs);

	return Effect.gen(function* () {
		if (!Number.isInteger(count) || count < 1) {
			return yield* Effect.fail(
				new CalibrationError({
					detail: `calibration count must be an integer ≥ 1, got ${count}`,
				}),
			);
		}

		const summaries: ResponseSummary[] = [];
		let lastFailure: TransportError | null = null;

		for (let attempt = 1; attempt <= count; attempt++) {
			if (attempt > 1 && pacingMs > 0) {
				yield* Effect.sleep(Duration.millis(pacingMs));
			}
			const probe = yield* synthesizeProbeCredential;
			const startedAt = yield* Clock.currentTimeMillis;
			const outcome = yield* Effect.either(submit(probe));
			const finishedAt = yield* Clock.currentTimeMillis;

			if (Either.isLeft(outcome)) {
				lastFailure = outcome.left;
				yield* Effect.logWarning(
					`probe ${attempt}/${count} failed: ${describeTransportFailure(outcome.left)}`,
				);
				continue;
			}

			const summary = summarizeExchange(outcome.right, finishedAt - startedAt);
			summaries.push(summary);
			yield* Effect.logInfo(
				`probe ${attempt}/${count}: status ${summary.statusCode}, length ${summary.bodyLength}, url ${summary.finalUrl}`,
			);
		}

		if (summaries.length === 0) {
			const last =
				lastFailure === null ? "none" : describeTransportFailure(lastFailure);
			return yield* Effect.fail(
				new CalibrationError({
					detail: `all ${count} calibration probes failed (last: ${last})`,
				}),
			);
		}

		yield* Effect.logInfo(
			`calibration complete: ${summaries.length}/${count} baseline responses`,
		);
		return summaries;
	}).pipe(Effect.withLogSpan("calibration"));
}
