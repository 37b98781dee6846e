// CHANGE: Named configuration surface for calibration, scoring and the pipeline
// PURITY: CORE

/**
 * Tunable options of a detection run.
 *
 * @property calibrationCount Number of known-invalid probes sent before testing
 * @property workerCount Concurrent workers (1-20)
 * @property requestPacingMs Minimum gap between request starts of one worker
 * @property requestTimeoutMs Upper bound on one transport call
 * @property scoreThreshold Points at which a response becomes SUSPECT
 * @property toleranceRatio Relative margin around the calibrated length band
 * @property weightStatus Points for a changed status code
 * @property weightLength Points for a body length outside the band
 * @property weightUrl Points for a changed final URL
 */
export interface DetectionOptions {
	readonly calibrationCount: number;
	readonly workerCount: number;
	readonly requestPacingMs: number;
	readonly requestTimeoutMs: number;
	readonly scoreThreshold: number;
	readonly toleranceRatio: number;
	readonly weightStatus: number;
	readonly weightLength: number;
	readonly weightUrl: number;
}

export type ScoringOptions = Pick<
	DetectionOptions,
	"scoreThreshold" | "weightStatus" | "weightLength" | "weightUrl"
>;
