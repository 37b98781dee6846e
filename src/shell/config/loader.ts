// CHANGE: Load detection options from deviation-probe.config.json
// PURITY: SHELL
// EFFECT: Effect<Partial<DetectionOptions> | null, FSError | ParseError>
// INVARIANT: Only known numeric keys are taken; everything else is ignored
// COMPLEXITY: O(k) where k = number of keys in the file

import { Effect } from "effect";

import { FSError, ParseError } from "../../core/errors.js";
import type { DetectionOptions } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

export const CONFIG_FILE_NAME = "deviation-probe.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

const OPTION_KEYS: readonly (keyof DetectionOptions)[] = [
	"calibrationCount",
	"workerCount",
	"requestPacingMs",
	"requestTimeoutMs",
	"scoreThreshold",
	"toleranceRatio",
	"weightStatus",
	"weightLength",
	"weightUrl",
];

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null object
 */
function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Pick the recognised numeric options out of a parsed config document.
 *
 * @param value Parsed JSON
 * @returns Overrides, or null when the document is not an object
 *
 * @pure true
 * @complexity O(k)
 */
export function extractOptions(
	value: JSONValue,
): Partial<DetectionOptions> | null {
	if (!isJSONObject(value)) return null;
	const overrides: Partial<Record<keyof DetectionOptions, number>> = {};
	for (const key of OPTION_KEYS) {
		const raw = value[key];
		if (typeof raw === "number") {
			overrides[key] = raw;
		}
	}
	return overrides;
}

const isMissingFile = (error: unknown): boolean =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	error.code === "ENOENT";

/**
 * Read option overrides from a JSON config file.
 *
 * @param configPath Path to the config file
 * @returns Overrides, or null when the file does not exist
 *
 * @effect Effect<Partial<DetectionOptions> | null, FSError | ParseError>
 *
 * @example
 * ```json
 * { "workerCount": 8, "requestPacingMs": 1000, "weightUrl": 4 }
 * ```
 */
export function loadDetectionConfig(
	configPath = path.resolve(process.cwd(), CONFIG_FILE_NAME),
): Effect.Effect<Partial<DetectionOptions> | null, FSError | ParseError> {
	return Effect.gen(function* () {
		const raw = yield* Effect.tryPromise({
			try: () => fs.promises.readFile(configPath, "utf8"),
			catch: (error) => error,
		}).pipe(
			Effect.map((content): string | null => content),
			Effect.catchAll((error) =>
				isMissingFile(error)
					? Effect.succeed(null)
					: Effect.fail(
							new FSError({
								detail: error instanceof Error ? error.message : String(error),
								path: configPath,
							}),
						),
			),
		);
		if (raw === null) return null;

		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new ParseError({
					entity: "config",
					detail: `${configPath}: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});
		const overrides = extractOptions(parsed);
		if (overrides === null) {
			return yield* Effect.fail(
				new ParseError({
					entity: "config",
					detail: `${configPath}: expected a JSON object`,
				}),
			);
		}
		return overrides;
	});
}
