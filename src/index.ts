// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effect constructors or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Calibrate against a target and test every credential of a source.
 *
 * @example
 * ```typescript
 * import { assess, credentialsFromFile, fromPromiseTransport } from "deviation-probe";
 *
 * const report = await assess({
 *   credentials: credentialsFromFile("combo.txt"),
 *   transport: fromPromiseTransport(submitLogin),
 * });
 * console.log(report.summary.suspectCount);
 * ```
 */
export {
	type AssessmentInput,
	type AssessmentReport,
	assess,
	runAssessment,
} from "./app/runAssessment.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure Detection Engine)
// ═══════════════════════════════════════════════════════════════════════════════

export { analyzeSamples, modeOf, toleranceBand } from "./core/analysis/pattern.js";
export {
	classify,
	DEGRADED_CALIBRATION_REASON,
	judge,
	scoreResponse,
	transportFailureVerdict,
} from "./core/analysis/score.js";
export { effectiveWeights } from "./core/analysis/weights.js";
export {
	DEFAULT_OPTIONS,
	MAX_WORKERS,
	MIN_WORKERS,
	resolveOptions,
} from "./core/config/options.js";
export { parseCredentialLine } from "./core/credentials/parse.js";
export {
	CalibrationError,
	DegradedSignatureWarning,
	FSError,
	InsufficientSampleError,
	InvalidOptions,
	InvariantViolation,
	ParseError,
	type StartupError,
	TransportError,
	type TransportFailureKind,
} from "./core/errors.js";
export {
	formatSignature,
	formatSummary,
	formatVerdict,
} from "./core/format/report.js";
export { advanceAttempt } from "./core/pipeline/attempt.js";
export { summarizeExchange } from "./core/response/summary.js";
export type {
	AttemptState,
	Classification,
	Credential,
	DetectionOptions,
	FailureSignature,
	HttpExchange,
	PipelineSummary,
	ResponseSummary,
	ScoringOptions,
	Verdict,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Effects: transport, calibration, pipeline, IO)
// ═══════════════════════════════════════════════════════════════════════════════

export { calibrate } from "./shell/calibration/calibrator.js";
export { loadDetectionConfig } from "./shell/config/loader.js";
export {
	credentialsFromFile,
	credentialsFromIterable,
} from "./shell/credentials/source.js";
export {
	appendVerdictRecorder,
	discardRecorder,
	type VerdictRecorder,
} from "./shell/output/recorder.js";
export {
	type PipelineInput,
	type PipelineRun,
	runPipeline,
} from "./shell/pipeline/pipeline.js";
export { makeStopSignal, type StopSignal } from "./shell/pipeline/stop.js";
export {
	classifyTransportFailure,
	fromPromiseTransport,
	type PromiseSubmit,
	type Transport,
	withTimeout,
} from "./shell/transport/transport.js";
