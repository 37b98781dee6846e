// CHANGE: Append-only persistence of SUSPECT verdicts
// PURITY: SHELL
// EFFECT: Effect<void, FSError>
// INVARIANT: One JSON line per recorded verdict; existing content never rewritten
// COMPLEXITY: O(r) per record where r = |reasons|

import { Clock, Effect } from "effect";

import { FSError } from "../../core/errors.js";
import type { Verdict } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Persists one verdict outside the process.
 */
export type VerdictRecorder = (verdict: Verdict) => Effect.Effect<void, FSError>;

/**
 * Shape of one persisted line.
 */
export interface VerdictRecord {
	readonly recordedAt: string;
	readonly username: string;
	readonly password: string;
	readonly score: number;
	readonly reasons: readonly string[];
}

/**
 * @pure true
 * @complexity O(r)
 */
export function toRecordLine(verdict: Verdict, recordedAtMs: number): string {
	const record: VerdictRecord = {
		recordedAt: new Date(recordedAtMs).toISOString(),
		username: verdict.username,
		password: verdict.password,
		score: verdict.score,
		reasons: verdict.reasons,
	};
	return `${JSON.stringify(record)}\n`;
}

/**
 * Recorder appending JSON lines to a file. Parent directories are created
 * on first use.
 *
 * @param filePath - Target file
 * @effect Effect<void, FSError>
 */
export function appendVerdictRecorder(filePath: string): VerdictRecorder {
	const target = path.resolve(filePath);
	return (verdict) =>
		Effect.gen(function* () {
			const now = yield* Clock.currentTimeMillis;
			yield* Effect.tryPromise({
				try: async () => {
					await fs.promises.mkdir(path.dirname(target), { recursive: true });
					await fs.promises.appendFile(
						target,
						toRecordLine(verdict, now),
						"utf8",
					);
				},
				catch: (error) =>
					new FSError({
						detail: error instanceof Error ? error.message : String(error),
						path: target,
					}),
			});
		});
}

/**
 * Recorder that keeps nothing.
 */
export const discardRecorder: VerdictRecorder = () => Effect.void;
