import { Effect, Fiber } from "effect";
import { describe, expect, it } from "vitest";

import { makeStopSignal, raiseOnAbort } from "../../../src/shell/pipeline/stop.js";

describe("makeStopSignal", () => {
	it("stays raised once raised", async () => {
		const states = await Effect.runPromise(
			Effect.gen(function* () {
				const stop = yield* makeStopSignal;
				const before = yield* stop.isRaised;
				yield* stop.raise;
				yield* stop.raise;
				yield* stop.await;
				return [before, yield* stop.isRaised];
			}),
		);
		expect(states).toEqual([false, true]);
	});
});

describe("raiseOnAbort", () => {
	it("raises the signal when the controller aborts", async () => {
		const controller = new AbortController();
		const raised = await Effect.runPromise(
			Effect.gen(function* () {
				const stop = yield* makeStopSignal;
				const fiber = yield* Effect.fork(raiseOnAbort(controller.signal, stop));
				yield* Effect.sleep("5 millis");
				const early = yield* stop.isRaised;
				controller.abort();
				yield* Fiber.join(fiber);
				return [early, yield* stop.isRaised];
			}),
		);
		expect(raised).toEqual([false, true]);
	});

	it("raises immediately for an already aborted signal", async () => {
		const raised = await Effect.runPromise(
			Effect.gen(function* () {
				const stop = yield* makeStopSignal;
				yield* raiseOnAbort(AbortSignal.abort(), stop);
				return yield* stop.isRaised;
			}),
		);
		expect(raised).toBe(true);
	});
});
