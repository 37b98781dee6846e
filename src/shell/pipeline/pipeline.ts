// CHANGE: Bounded worker pool driving submit → summarize → judge → record
// PURITY: SHELL
// EFFECT: Effect<PipelineRun<E>, never, Scope>
// FORMAT THEOREM: ∀ pair extracted and answered: exactly one Verdict is published
// INVARIANT: |workers| = options.workerCount for the whole run; extraction is serialized
// COMPLEXITY: O(n) attempts where n = |credentials| (bounded by stop signal)

import {
	Chunk,
	Clock,
	Deferred,
	Duration,
	Effect,
	Either,
	Option,
	Queue,
	Ref,
	type Scope,
	Stream,
	Take,
} from "effect";

import { judge, transportFailureVerdict } from "../../core/analysis/score.js";
import { InvariantViolation } from "../../core/errors.js";
import { advanceAttempt, isTerminal } from "../../core/pipeline/attempt.js";
import { summarizeExchange } from "../../core/response/summary.js";
import type {
	AttemptState,
	Credential,
	DetectionOptions,
	FailureSignature,
	PipelineSummary,
	Verdict,
} from "../../core/types/index.js";
import { discardRecorder, type VerdictRecorder } from "../output/recorder.js";
import { type Transport, withTimeout } from "../transport/transport.js";
import { makeResultSink, type ResultSink } from "./sink.js";
import { makeStopSignal, type StopSignal } from "./stop.js";

export interface PipelineInput<E> {
	readonly credentials: Stream.Stream<Credential, E>;
	readonly signature: FailureSignature;
	readonly transport: Transport;
	readonly options: DetectionOptions;
	readonly recorder?: VerdictRecorder;
	readonly stop?: StopSignal;
}

/**
 * Handle on a running pipeline. Must be consumed inside the scope that
 * created it; closing the scope interrupts the workers.
 */
export interface PipelineRun<E> {
	/** Verdicts in completion order; fails with E if the credential source failed. */
	readonly verdicts: Stream.Stream<Verdict, E>;
	/** Completes once every worker has exited. */
	readonly summary: Effect.Effect<PipelineSummary>;
	/** Raise the stop signal of this run. */
	readonly stop: Effect.Effect<void>;
}

/**
 * Shared, mutually exclusive pull on the credential source.
 */
interface ExtractionPoint<E> {
	readonly next: Effect.Effect<Option.Option<Credential>>;
	readonly isExhausted: Effect.Effect<boolean>;
	readonly failure: Effect.Effect<Option.Option<E>>;
}

interface WorkerContext<E> {
	readonly source: ExtractionPoint<E>;
	readonly sink: ResultSink;
	readonly signature: FailureSignature;
	readonly options: DetectionOptions;
	readonly submit: Transport;
	readonly stop: StopSignal;
}

/**
 * Turn the credential stream into a single serialized extraction point.
 * Source errors and defects end extraction; errors are kept for the
 * verdict stream. Once `stop` is raised no pull starts, and a pull still
 * waiting on the source is abandoned.
 */
function makeExtractionPoint<E>(
	credentials: Stream.Stream<Credential, E>,
	stop: StopSignal,
): Effect.Effect<ExtractionPoint<E>, never, Scope.Scope> {
	return Effect.gen(function* () {
		const pull = yield* Stream.toPull(Stream.rechunk(credentials, 1));
		const lock = yield* Effect.makeSemaphore(1);
		const exhausted = yield* Ref.make(false);
		const failure = yield* Ref.make<Option.Option<E>>(Option.none());

		const finish = (reason: Option.Option<E>): Effect.Effect<void> =>
			Effect.gen(function* () {
				yield* Ref.set(exhausted, true);
				if (Option.isSome(reason)) {
					yield* Ref.set(failure, reason);
					yield* Effect.logError("credential source failed", reason.value);
				}
			});

		const pullOne: Effect.Effect<Option.Option<Credential>> = Effect.suspend(
			() =>
				pull.pipe(
					Effect.flatMap((chunk) =>
						Option.match(Chunk.head(chunk), {
							onNone: () => pullOne,
							onSome: (credential) => Effect.succeed(Option.some(credential)),
						}),
					),
					Effect.catchAll((reason) =>
						finish(reason).pipe(Effect.as(Option.none<Credential>())),
					),
					Effect.catchAllDefect((defect) =>
						Effect.logError("credential source died", defect).pipe(
							Effect.zipRight(Ref.set(exhausted, true)),
							Effect.as(Option.none<Credential>()),
						),
					),
				),
		);

		const stopped: Effect.Effect<Option.Option<Credential>> = Effect.as(
			stop.await,
			Option.none<Credential>(),
		);

		return {
			next: lock.withPermits(1)(
				Effect.gen(function* () {
					if ((yield* stop.isRaised) || (yield* Ref.get(exhausted))) {
						return Option.none<Credential>();
					}
					return yield* Effect.race(pullOne, stopped);
				}),
			),
			isExhausted: Ref.get(exhausted),
			failure: Ref.get(failure),
		};
	});
}

const transition = (
	from: AttemptState,
	to: AttemptState,
): Effect.Effect<AttemptState> =>
	Either.match(advanceAttempt(from, to), {
		onLeft: (violation) => Effect.die(violation),
		onRight: (state) => Effect.succeed(state),
	});

/**
 * Test one credential pair and hand the verdict to the sink.
 * Transport failures become REJECTED verdicts; anything else is a defect.
 */
function attempt<E>(
	worker: number,
	credential: Credential,
	ctx: WorkerContext<E>,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		let state = yield* transition("QUEUED", "IN_FLIGHT");
		const startedAt = yield* Clock.currentTimeMillis;
		const outcome = yield* Effect.either(ctx.submit(credential));
		const finishedAt = yield* Clock.currentTimeMillis;

		let verdict: Verdict;
		if (Either.isLeft(outcome)) {
			state = yield* transition(state, "REJECTED");
			verdict = transportFailureVerdict(credential, outcome.left, worker);
			yield* Effect.logDebug(`transport failure for ${credential.username}`);
		} else {
			state = yield* transition(state, "SCORED");
			const summary = summarizeExchange(outcome.right, finishedAt - startedAt);
			verdict = judge(credential, summary, ctx.signature, ctx.options, worker);
			state = yield* transition(state, verdict.classifiedAs);
		}

		if (!isTerminal(state)) {
			return yield* Effect.die(
				new InvariantViolation({
					where: "pipeline.attempt",
					detail: `attempt ended in non-terminal state ${state}`,
				}),
			);
		}
		yield* ctx.sink.record(verdict);
	});
}

/**
 * One worker: pull, pace, attempt, until the source is exhausted or the
 * stop signal is raised. An in-flight attempt always completes.
 */
function runWorker<E>(
	id: number,
	ctx: WorkerContext<E>,
	lastStartRef: Ref.Ref<number | null>,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		for (;;) {
			if ((yield* ctx.stop.isRaised) || (yield* ctx.source.isExhausted)) {
				return;
			}
			const lastStart = yield* Ref.get(lastStartRef);
			if (lastStart !== null) {
				const now = yield* Clock.currentTimeMillis;
				const wait = ctx.options.requestPacingMs - (now - lastStart);
				if (wait > 0) {
					yield* Effect.race(Effect.sleep(Duration.millis(wait)), ctx.stop.await);
					if (yield* ctx.stop.isRaised) return;
				}
			}

			const next = yield* ctx.source.next;
			if (Option.isNone(next)) return;

			yield* Ref.set(lastStartRef, yield* Clock.currentTimeMillis);
			yield* attempt(id, next.value, ctx);
		}
	});
}

function superviseWorker<E>(
	id: number,
	ctx: WorkerContext<E>,
	lastStart: Ref.Ref<number | null>,
): Effect.Effect<void> {
	return runWorker(id, ctx, lastStart).pipe(
		Effect.catchAllDefect((defect) =>
			Effect.logError(`worker ${id} faulted, restarting`, defect).pipe(
				Effect.zipRight(ctx.sink.recordFault),
				Effect.zipRight(
					Effect.suspend(() => superviseWorker(id, ctx, lastStart)),
				),
			),
		),
	);
}

/**
 * Worker slot: restarts its worker after a defect. The pair in flight at
 * the time of the fault is counted as faulted and gets no verdict. The
 * slot owns the last request start, so pacing holds across restarts.
 */
function runSlot<E>(id: number, ctx: WorkerContext<E>): Effect.Effect<void> {
	return Ref.make<number | null>(null).pipe(
		Effect.flatMap((lastStart) => superviseWorker(id, ctx, lastStart)),
		Effect.annotateLogs("worker", id),
	);
}

/**
 * Start the execution pipeline.
 *
 * @param input - Credential source, calibrated signature, transport and options
 * @returns Handle exposing the verdict stream, the completion summary and stop
 *
 * @pure false - spawns worker fibers in the current scope
 * @effect Effect<PipelineRun<E>, never, Scope>
 * @invariant summary.testedCount = number of verdicts published
 *
 * @example
 * ```ts
 * const report = Effect.scoped(
 *   Effect.gen(function* () {
 *     const run = yield* runPipeline({ credentials, signature, transport, options });
 *     yield* Stream.runForEach(run.verdicts, (v) => Effect.log(v.classifiedAs));
 *     return yield* run.summary;
 *   }),
 * );
 * ```
 */
export function runPipeline<E>(
	input: PipelineInput<E>,
): Effect.Effect<PipelineRun<E>, never, Scope.Scope> {
	return Effect.gen(function* () {
		const { options } = input;
		const stop = input.stop ?? (yield* makeStopSignal);
		const output = yield* Queue.unbounded<Take.Take<Verdict, E>>();
		const sink = yield* makeResultSink(
			(verdict) => Queue.offer(output, Take.of(verdict)).pipe(Effect.asVoid),
			input.recorder ?? discardRecorder,
		);
		const source = yield* makeExtractionPoint(input.credentials, stop);
		const done = yield* Deferred.make<PipelineSummary>();
		const startedAt = yield* Clock.currentTimeMillis;

		const ctx: WorkerContext<E> = {
			source,
			sink,
			signature: input.signature,
			options,
			submit: withTimeout(input.transport, options.requestTimeoutMs),
			stop,
		};

		const complete = Effect.gen(function* () {
			const counters = yield* sink.snapshot;
			const finishedAt = yield* Clock.currentTimeMillis;
			yield* Deferred.succeed(done, {
				...counters,
				elapsedMs: finishedAt - startedAt,
			});
			const failure = yield* source.failure;
			yield* Queue.offer(
				output,
				Option.match(failure, {
					onNone: (): Take.Take<Verdict, E> => Take.end,
					onSome: (error): Take.Take<Verdict, E> => Take.fail(error),
				}),
			);
		});

		const slots = Array.from({ length: options.workerCount }, (_, i) => i + 1);
		yield* Effect.logInfo(`starting ${slots.length} workers`);
		yield* Effect.forEach(slots, (id) => runSlot(id, ctx), {
			concurrency: "unbounded",
			discard: true,
		}).pipe(Effect.zipRight(complete), Effect.forkScoped);

		return {
			verdicts: Stream.flattenTake(Stream.fromQueue(output)),
			summary: Deferred.await(done),
			stop: stop.raise,
		};
	});
}
