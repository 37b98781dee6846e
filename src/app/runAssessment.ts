// CHANGE: Application layer orchestration - calibrate, analyze, run the pipeline
// PURITY: APP (no process.exit; returns the report as a value)
// EFFECT: Effect<AssessmentReport, StartupError | FSError | ParseError | E>
// INVARIANT: No candidate is submitted unless options, calibration and analysis all succeeded
// COMPLEXITY: O(c + n) requests where c = calibrationCount, n = |credentials|

import { Effect, Stream } from "effect";

import { analyzeSamples } from "../core/analysis/pattern.js";
import { resolveOptions } from "../core/config/options.js";
import type { FSError, ParseError, StartupError } from "../core/errors.js";
import {
	formatSignature,
	formatSummary,
	formatVerdict,
} from "../core/format/report.js";
import type {
	Credential,
	DetectionOptions,
	FailureSignature,
	PipelineSummary,
	Verdict,
} from "../core/types/index.js";
import { calibrate } from "../shell/calibration/calibrator.js";
import { loadDetectionConfig } from "../shell/config/loader.js";
import { discardRecorder, type VerdictRecorder } from "../shell/output/recorder.js";
import { runPipeline } from "../shell/pipeline/pipeline.js";
import { makeStopSignal, raiseOnAbort } from "../shell/pipeline/stop.js";
import type { Transport } from "../shell/transport/transport.js";

export interface AssessmentInput<E> {
	readonly credentials: Stream.Stream<Credential, E>;
	readonly transport: Transport;
	/** Overrides; they win over values from `configPath`. */
	readonly options?: Partial<DetectionOptions>;
	/** JSON config file with option overrides. */
	readonly configPath?: string;
	readonly recorder?: VerdictRecorder;
	/** Aborting raises the stop signal: in-flight attempts finish, no new pairs are pulled. */
	readonly signal?: AbortSignal;
}

export interface AssessmentReport {
	readonly signature: FailureSignature;
	readonly summary: PipelineSummary;
}

export const PROGRESS_INTERVAL = 10;

/**
 * Log one verdict as it arrives: SUSPECT at warning level, REJECTED at
 * debug level, plus a progress line every PROGRESS_INTERVAL verdicts.
 *
 * @pure false - logging
 */
function reportVerdict(
	verdict: Verdict,
	position: number,
	maxScore: number,
): Effect.Effect<void> {
	return Effect.gen(function* () {
		const text = formatVerdict(verdict, maxScore).join("\n");
		if (verdict.classifiedAs === "SUSPECT") {
			yield* Effect.logWarning(text);
		} else {
			yield* Effect.logDebug(text);
		}
		if (position % PROGRESS_INTERVAL === 0) {
			yield* Effect.logInfo(`progress: ${position} tested`);
		}
	});
}

function resolveEffectiveOptions(
	input: Pick<AssessmentInput<never>, "options" | "configPath">,
): Effect.Effect<DetectionOptions, StartupError | FSError | ParseError> {
	return Effect.gen(function* () {
		const fromFile =
			input.configPath === undefined
				? null
				: yield* loadDetectionConfig(input.configPath);
		return yield* resolveOptions({ ...fromFile, ...input.options });
	});
}

/**
 * Run a complete assessment against one target.
 *
 * @param input - Credential source, transport and configuration
 * @returns Calibrated signature and run summary
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<AssessmentReport, StartupError | FSError | ParseError | E>
 * @invariant Calibration errors abort before any candidate is tested
 *
 * @example
 * ```ts
 * const report = await Effect.runPromise(
 *   runAssessment({
 *     credentials: credentialsFromFile("combo.txt"),
 *     transport: fromPromiseTransport(submitLogin),
 *     options: { workerCount: 8 },
 *     recorder: appendVerdictRecorder("suspects.jsonl"),
 *   }),
 * );
 * ```
 */
export function runAssessment<E>(
	input: AssessmentInput<E>,
): Effect.Effect<AssessmentReport, StartupError | FSError | ParseError | E> {
	return Effect.gen(function* () {
		const options = yield* resolveEffectiveOptions(input);

		const samples = yield* calibrate(input.transport, {
			count: options.calibrationCount,
			pacingMs: options.requestPacingMs,
			timeoutMs: options.requestTimeoutMs,
		});
		const signature = yield* analyzeSamples(samples, options.toleranceRatio);

		yield* Effect.logInfo(`failure signature: ${formatSignature(signature)}`);
		for (const warning of signature.warnings) {
			yield* Effect.logWarning(
				`degraded calibration (${warning.dimensions.join(", ")}): ${warning.detail}`,
			);
		}

		const maxScore =
			options.weightStatus + options.weightLength + options.weightUrl;

		const summary = yield* Effect.scoped(
			Effect.gen(function* () {
				const stop = yield* makeStopSignal;
				if (input.signal !== undefined) {
					yield* Effect.forkScoped(raiseOnAbort(input.signal, stop));
				}
				const run = yield* runPipeline({
					credentials: input.credentials,
					signature,
					transport: input.transport,
					options,
					recorder: input.recorder ?? discardRecorder,
					stop,
				});
				yield* Stream.runForEach(
					Stream.zipWithIndex(run.verdicts),
					([verdict, index]) => reportVerdict(verdict, index + 1, maxScore),
				);
				return yield* run.summary;
			}),
		);

		yield* Effect.logInfo(formatSummary(summary));
		return { signature, summary };
	}).pipe(Effect.withLogSpan("assessment"));
}

/**
 * Promise entry point for programmatic usage.
 *
 * @returns Report; rejects with the first fatal error
 */
export function assess<E>(input: AssessmentInput<E>): Promise<AssessmentReport> {
	return Effect.runPromise(runAssessment(input));
}
