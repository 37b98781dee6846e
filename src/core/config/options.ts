// CHANGE: Defaults and validation for DetectionOptions
// PURITY: CORE
// INVARIANT: resolveOptions returns Right only when every constraint holds
// COMPLEXITY: O(k) where k = number of options

import { Either } from "effect";

import { InvalidOptions } from "../errors.js";
import type { DetectionOptions } from "../types/index.js";

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 20;

export const DEFAULT_OPTIONS: DetectionOptions = Object.freeze({
	calibrationCount: 5,
	workerCount: 5,
	requestPacingMs: 2000,
	requestTimeoutMs: 15000,
	scoreThreshold: 3,
	toleranceRatio: 0.01,
	weightStatus: 3,
	weightLength: 2,
	weightUrl: 3,
});

type Check = readonly [keyof DetectionOptions, (v: number) => boolean, string];

const CHECKS: readonly Check[] = [
	["calibrationCount", (v) => Number.isInteger(v) && v >= 1, "an integer ≥ 1"],
	[
		"workerCount",
		(v) => Number.isInteger(v) && v >= MIN_WORKERS && v <= MAX_WORKERS,
		`an integer in [${MIN_WORKERS}, ${MAX_WORKERS}]`,
	],
	["requestPacingMs", (v) => Number.isFinite(v) && v >= 0, "≥ 0"],
	["requestTimeoutMs", (v) => Number.isFinite(v) && v > 0, "> 0"],
	["scoreThreshold", (v) => Number.isFinite(v) && v >= 0, "≥ 0"],
	["toleranceRatio", (v) => Number.isFinite(v) && v >= 0 && v < 1, "in [0, 1)"],
	["weightStatus", (v) => Number.isInteger(v) && v >= 0, "an integer ≥ 0"],
	["weightLength", (v) => Number.isInteger(v) && v >= 0, "an integer ≥ 0"],
	["weightUrl", (v) => Number.isInteger(v) && v >= 0, "an integer ≥ 0"],
];

/**
 * Merge overrides with defaults and validate every option.
 *
 * @param overrides - Named options to change
 * @returns Right(options) or Left(InvalidOptions) listing every violation
 *
 * @pure true
 * @invariant resolveOptions({}) = Right(DEFAULT_OPTIONS)
 * @complexity O(k)
 *
 * @example
 * ```ts
 * resolveOptions({ workerCount: 10 }); // Either.right({ ...DEFAULT_OPTIONS, workerCount: 10 })
 * resolveOptions({ workerCount: 0 });  // Either.left(InvalidOptions)
 * ```
 */
export function resolveOptions(
	overrides: Partial<DetectionOptions> = {},
): Either.Either<DetectionOptions, InvalidOptions> {
	const options: DetectionOptions = { ...DEFAULT_OPTIONS, ...overrides };
	const issues = CHECKS.filter(([key, valid]) => !valid(options[key])).map(
		([key, , expected]) => `${key} must be ${expected}, got ${options[key]}`,
	);
	return issues.length === 0
		? Either.right(Object.freeze(options))
		: Either.left(new InvalidOptions({ issues }));
}
