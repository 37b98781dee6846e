// CHANGE: Pure credential line parser with delimiter normalization
// PURITY: CORE
// INVARIANT: Some(c) ⇒ c.username.length > 0 ∧ c.password.length > 0
// COMPLEXITY: O(n) where n = line length

import { Option } from "effect";

import type { Credential } from "../types/index.js";

export const DEFAULT_DELIMITERS: readonly string[] = [":", ",", ";", "|"];

/**
 * Parse one line of a credential list.
 *
 * Without an explicit delimiter the first of `: , ; |` present in the line
 * is used. The line splits on its first occurrence only, so passwords may
 * contain the delimiter.
 *
 * @param line - Raw line
 * @param delimiter - Explicit delimiter, or undefined to auto-detect
 * @returns Some(credential) or None for blank/malformed lines
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseCredentialLine("alice:pa:ss"); // Some({ username: "alice", password: "pa:ss" })
 * parseCredentialLine("no-delimiter"); // None
 * ```
 */
export function parseCredentialLine(
	line: string,
	delimiter?: string,
): Option.Option<Credential> {
	const clean = line.trim();
	if (clean.length === 0) return Option.none();

	const candidates =
		delimiter !== undefined && delimiter.length > 0
			? [delimiter]
			: DEFAULT_DELIMITERS;
	const used = candidates.find((d) => clean.includes(d));
	if (used === undefined) return Option.none();

	const at = clean.indexOf(used);
	const username = clean.slice(0, at).trim();
	const password = clean.slice(at + used.length).trim();
	if (username.length === 0 || password.length === 0) return Option.none();

	return Option.some({ username, password });
}
