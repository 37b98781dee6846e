// CHANGE: Global stop signal shared by every worker of a run
// PURITY: SHELL
// INVARIANT: Once raised it stays raised; raising twice is a no-op

import { Deferred, Effect } from "effect";

export interface StopSignal {
	/** Raise the signal. */
	readonly raise: Effect.Effect<void>;
	readonly isRaised: Effect.Effect<boolean>;
	/** Completes when the signal is raised. */
	readonly await: Effect.Effect<void>;
}

export const makeStopSignal: Effect.Effect<StopSignal> = Effect.map(
	Deferred.make<void>(),
	(deferred) => ({
		raise: Effect.asVoid(Deferred.succeed(deferred, undefined)),
		isRaised: Deferred.isDone(deferred),
		await: Deferred.await(deferred),
	}),
);

/**
 * Raise `stop` when an AbortSignal fires. Runs until the signal aborts, so
 * callers fork it into the scope of the run.
 *
 * @effect Effect<void>
 */
export function raiseOnAbort(
	signal: AbortSignal,
	stop: StopSignal,
): Effect.Effect<void> {
	const aborted = Effect.async<void>((resume) => {
		if (signal.aborted) {
			resume(Effect.void);
			return;
		}
		const onAbort = (): void => resume(Effect.void);
		signal.addEventListener("abort", onAbort, { once: true });
		return Effect.sync(() => signal.removeEventListener("abort", onAbort));
	});
	return Effect.zipRight(aborted, stop.raise);
}
