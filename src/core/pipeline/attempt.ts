// CHANGE: Forward-only lifecycle of one credential pair
// PURITY: CORE
// FORMAT THEOREM: QUEUED → IN_FLIGHT → (SCORED → {REJECTED | SUSPECT} | REJECTED)
// INVARIANT: No backward or skipping transitions
// COMPLEXITY: O(1)

import { Either } from "effect";

import { InvariantViolation } from "../errors.js";
import type { AttemptState } from "../types/index.js";

const TRANSITIONS: Readonly<Record<AttemptState, readonly AttemptState[]>> = {
	QUEUED: ["IN_FLIGHT"],
	// IN_FLIGHT → REJECTED is the transport-failure edge (no summary exists)
	IN_FLIGHT: ["SCORED", "REJECTED"],
	SCORED: ["REJECTED", "SUSPECT"],
	REJECTED: [],
	SUSPECT: [],
};

/**
 * @pure true
 * @complexity O(1)
 */
export function isTerminal(state: AttemptState): boolean {
	return TRANSITIONS[state].length === 0;
}

/**
 * Validate one transition of the attempt state machine.
 *
 * @param from - Current state
 * @param to - Requested next state
 * @returns Right(to) for an allowed edge, Left(InvariantViolation) otherwise
 *
 * @pure true
 * @invariant advanceAttempt(s, t) is Right ⇒ t ∈ TRANSITIONS[s]
 * @complexity O(1)
 */
export function advanceAttempt(
	from: AttemptState,
	to: AttemptState,
): Either.Either<AttemptState, InvariantViolation> {
	return TRANSITIONS[from].includes(to)
		? Either.right(to)
		: Either.left(
				new InvariantViolation({
					where: "attempt",
					detail: `illegal transition ${from} → ${to}`,
				}),
			);
}
