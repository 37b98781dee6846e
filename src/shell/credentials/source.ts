// CHANGE: Lazy credential sources backed by files or in-memory iterables
// PURITY: SHELL
// EFFECT: Stream<Credential, FSError>
// INVARIANT: Malformed lines are skipped; every run of the stream restarts from the first line
// COMPLEXITY: O(n) lines, O(1) memory per line

import { Effect, Stream } from "effect";

import { parseCredentialLine } from "../../core/credentials/parse.js";
import { FSError } from "../../core/errors.js";
import type { Credential } from "../../core/types/index.js";
import { fs, path } from "../utils/node-mods.js";

export interface FileSourceOptions {
	/** Explicit delimiter; auto-detected per line when omitted. */
	readonly delimiter?: string;
}

const toFSError =
	(target: string) =>
	(error: unknown): FSError =>
		new FSError({
			detail: error instanceof Error ? error.message : String(error),
			path: target,
		});

/**
 * Stream raw lines of a UTF-8 text file. The file is opened when the stream
 * runs and closed when it ends, fails or is interrupted.
 *
 * @effect Stream<string, FSError>
 */
export function linesOfFile(filePath: string): Stream.Stream<string, FSError> {
	const target = path.resolve(filePath);
	const onError = toFSError(target);
	return Stream.unwrapScoped(
		Effect.acquireRelease(
			Effect.tryPromise({
				try: () => fs.promises.open(target, "r"),
				catch: onError,
			}),
			(handle) => Effect.promise(() => handle.close()),
		).pipe(
			Effect.map((handle) =>
				Stream.fromAsyncIterable(
					handle.readLines({ encoding: "utf8", autoClose: false }),
					onError,
				),
			),
		),
	);
}

/**
 * Credential pairs from a delimited text file, one pair per line.
 *
 * @example
 * ```ts
 * // alice:secret\nbob,hunter2
 * credentialsFromFile("combo.txt"); // Stream of 2 credentials
 * ```
 */
export function credentialsFromFile(
	filePath: string,
	options: FileSourceOptions = {},
): Stream.Stream<Credential, FSError> {
	return linesOfFile(filePath).pipe(
		Stream.filterMap((line) => parseCredentialLine(line, options.delimiter)),
	);
}

/**
 * Credential pairs from any iterable (arrays, generators).
 */
export function credentialsFromIterable(
	credentials: Iterable<Credential>,
): Stream.Stream<Credential> {
	return Stream.fromIterable(credentials);
}
