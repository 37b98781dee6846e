// CHANGE: Single owner of run counters, persistence and the output channel
// PURITY: SHELL
// EFFECT: Effect<ResultSink>
// INVARIANT: Every mutation runs under one permit; counters are never exposed by reference
// COMPLEXITY: O(1) per record (plus the recorder's own cost)

import { Effect, Ref } from "effect";

import type { Verdict } from "../../core/types/index.js";
import type { VerdictRecorder } from "../output/recorder.js";

export interface SinkCounters {
	readonly testedCount: number;
	readonly suspectCount: number;
	readonly faultedCount: number;
}

export interface ResultSink {
	/** Persist (if SUSPECT), publish and count one verdict atomically. */
	readonly record: (verdict: Verdict) => Effect.Effect<void>;
	/** Count a pair lost to a worker fault. */
	readonly recordFault: Effect.Effect<void>;
	/** Copy of the counters at this instant. */
	readonly snapshot: Effect.Effect<SinkCounters>;
}

const EMPTY: SinkCounters = { testedCount: 0, suspectCount: 0, faultedCount: 0 };

/**
 * Create a sink publishing verdicts through `publish`.
 *
 * @param publish - Output channel (single writer: only the sink calls it)
 * @param recorder - Persistence for SUSPECT verdicts
 *
 * @effect Effect<ResultSink>
 * @invariant snapshot.testedCount = number of completed record calls
 */
export function makeResultSink(
	publish: (verdict: Verdict) => Effect.Effect<void>,
	recorder: VerdictRecorder,
): Effect.Effect<ResultSink> {
	return Effect.gen(function* () {
		const lock = yield* Effect.makeSemaphore(1);
		const counters = yield* Ref.make(EMPTY);

		// A recorder that fails or dies never costs the verdict.
		const persist = (verdict: Verdict): Effect.Effect<void> =>
			recorder(verdict).pipe(
				Effect.catchAll((error) =>
					Effect.logError(
						`could not persist verdict for ${verdict.username}: ${error.detail}`,
					),
				),
				Effect.catchAllCause((cause) =>
					Effect.logError(`could not persist verdict for ${verdict.username}`, cause),
				),
			);

		const record = (verdict: Verdict): Effect.Effect<void> =>
			lock.withPermits(1)(
				Effect.gen(function* () {
					const suspect = verdict.classifiedAs === "SUSPECT";
					if (suspect) yield* persist(verdict);
					yield* publish(verdict);
					yield* Ref.update(counters, (c) => ({
						...c,
						testedCount: c.testedCount + 1,
						suspectCount: c.suspectCount + (suspect ? 1 : 0),
					}));
				}),
			);

		const recordFault = lock.withPermits(1)(
			Ref.update(counters, (c) => ({ ...c, faultedCount: c.faultedCount + 1 })),
		);

		return {
			record,
			recordFault,
			snapshot: lock.withPermits(1)(Ref.get(counters)),
		} satisfies ResultSink;
	});
}
