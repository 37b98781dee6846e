// CHANGE: Central export file for all type definitions
// PURITY: Re-exports only

export type { DetectionOptions, ScoringOptions } from "./config.js";
export type {
	AttemptState,
	Classification,
	DeviationScore,
	DimensionWeights,
	FailureSignature,
	PipelineSummary,
	Verdict,
} from "./detection.js";
export type { Credential, HttpExchange, ResponseSummary } from "./exchange.js";
