// CHANGE: Unit tests for deviation scoring, classification and verdict wrapping
// WHY: Scoring decides what gets flagged; points, reasons and their order are asserted exactly

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	classify,
	DEGRADED_CALIBRATION_REASON,
	describeTransportFailure,
	judge,
	scoreResponse,
	transportFailureVerdict,
} from "../../../src/core/analysis/score.js";
import { DEFAULT_OPTIONS } from "../../../src/core/config/options.js";
import { TransportError } from "../../../src/core/errors.js";
import { signatureOf, summaryOf } from "../../utils/builders.js";

const alice = { username: "alice", password: "test-pass" };

describe("scoreResponse", () => {
	it("scores a redirect away from the login page", () => {
		const result = scoreResponse(
			summaryOf({ statusCode: 302, finalUrl: "/dashboard" }),
			signatureOf(),
			DEFAULT_OPTIONS,
		);
		expect(result).toEqual({
			points: 6,
			reasons: [
				"status changed: expected 422, was 302",
				"redirected: expected /login, got /dashboard",
			],
		});
	});

	it("scores nothing for a response matching the signature", () => {
		expect(
			scoreResponse(summaryOf({ bodyLength: 9320 }), signatureOf(), DEFAULT_OPTIONS),
		).toEqual({ points: 0, reasons: [] });
	});

	it("treats the band edges as inside", () => {
		for (const bodyLength of [9259, 9359]) {
			expect(
				scoreResponse(summaryOf({ bodyLength }), signatureOf(), DEFAULT_OPTIONS)
					.points,
			).toBe(0);
		}
	});

	it("orders reasons status, length, url", () => {
		const result = scoreResponse(
			summaryOf({ statusCode: 200, bodyLength: 120, finalUrl: "/home" }),
			signatureOf(),
			DEFAULT_OPTIONS,
		);
		expect(result.points).toBe(8);
		expect(result.reasons).toEqual([
			"status changed: expected 422, was 200",
			"length anomaly: 120 bytes, expected 9259-9359",
			"redirected: expected /login, got /home",
		]);
	});

	it("gives an unreliable status's weight to length and url", () => {
		const signature = signatureOf({ statusReliable: false });
		expect(
			scoreResponse(summaryOf({ statusCode: 500 }), signature, DEFAULT_OPTIONS),
		).toEqual({ points: 0, reasons: [] });
		expect(
			scoreResponse(summaryOf({ bodyLength: 20000 }), signature, DEFAULT_OPTIONS),
		).toEqual({
			points: 3,
			reasons: ["length anomaly: 20000 bytes, expected 9259-9359"],
		});
		expect(
			scoreResponse(summaryOf({ finalUrl: "/home" }), signature, DEFAULT_OPTIONS)
				.points,
		).toBe(5);
	});

	it("scores on length only when status and url are unreliable", () => {
		const signature = signatureOf({ statusReliable: false, urlReliable: false });
		expect(
			scoreResponse(
				summaryOf({ statusCode: 302, finalUrl: "/dashboard" }),
				signature,
				DEFAULT_OPTIONS,
			),
		).toEqual({ points: 0, reasons: [DEGRADED_CALIBRATION_REASON] });
		expect(
			scoreResponse(summaryOf({ bodyLength: 20000 }), signature, DEFAULT_OPTIONS),
		).toEqual({
			points: 8,
			reasons: [
				"length anomaly: 20000 bytes, expected 9259-9359",
				DEGRADED_CALIBRATION_REASON,
			],
		});
	});

	it("lets a malformed field contribute nothing", () => {
		const result = scoreResponse(
			summaryOf({
				statusCode: Number.NaN,
				bodyLength: Number.NaN,
				finalUrl: "",
			}),
			signatureOf(),
			DEFAULT_OPTIONS,
		);
		expect(result).toEqual({ points: 0, reasons: [] });
	});

	it("never decreases as the deviation grows", () => {
		const steps = [
			summaryOf(),
			summaryOf({ bodyLength: 1 }),
			summaryOf({ bodyLength: 1, finalUrl: "/home" }),
			summaryOf({ bodyLength: 1, finalUrl: "/home", statusCode: 200 }),
		];
		const points = steps.map(
			(s) => scoreResponse(s, signatureOf(), DEFAULT_OPTIONS).points,
		);
		expect(points).toEqual([0, 2, 5, 8]);
	});

	it("is idempotent", () => {
		const summary = summaryOf({ statusCode: 302 });
		expect(scoreResponse(summary, signatureOf(), DEFAULT_OPTIONS)).toEqual(
			scoreResponse(summary, signatureOf(), DEFAULT_OPTIONS),
		);
	});
});

describe("classify", () => {
	it("flags at and above the threshold", () => {
		expect(classify(2, 3)).toBe("REJECTED");
		expect(classify(3, 3)).toBe("SUSPECT");
		expect(classify(8, 3)).toBe("SUSPECT");
	});

	it("flags everything at threshold 0", () => {
		expect(classify(0, 0)).toBe("SUSPECT");
	});
});

describe("judge", () => {
	it("wraps the score as a frozen verdict", () => {
		const summary = summaryOf({ statusCode: 302, finalUrl: "/dashboard" });
		const verdict = judge(alice, summary, signatureOf(), DEFAULT_OPTIONS, 4);
		expect(verdict).toEqual({
			username: "alice",
			password: "test-pass",
			score: 6,
			reasons: [
				"status changed: expected 422, was 302",
				"redirected: expected /login, got /dashboard",
			],
			summary,
			classifiedAs: "SUSPECT",
			worker: 4,
		});
		expect(Object.isFrozen(verdict)).toBe(true);
	});

	it("uses the configured weights and threshold", () => {
		const options = { ...DEFAULT_OPTIONS, weightUrl: 1, scoreThreshold: 2 };
		const verdict = judge(
			alice,
			summaryOf({ finalUrl: "/home" }),
			signatureOf(),
			options,
			1,
		);
		expect(verdict.score).toBe(1);
		expect(verdict.classifiedAs).toBe("REJECTED");
	});
});

describe("transport failures", () => {
	it("labels every failure kind", () => {
		const detail = "x";
		expect(
			describeTransportFailure(new TransportError({ kind: "timeout", detail })),
		).toBe("transport failure (timed out): x");
		expect(
			describeTransportFailure(new TransportError({ kind: "connection", detail })),
		).toBe("transport failure (connection failed): x");
		expect(
			describeTransportFailure(new TransportError({ kind: "dns", detail })),
		).toBe("transport failure (name resolution failed): x");
		expect(
			describeTransportFailure(new TransportError({ kind: "unknown", detail })),
		).toBe("transport failure (unexpected error): x");
	});

	it("produces a zero-score REJECTED verdict without a summary", () => {
		const verdict = transportFailureVerdict(
			alice,
			new TransportError({ kind: "timeout", detail: "no response within 50ms" }),
			2,
		);
		expect(verdict).toEqual({
			username: "alice",
			password: "test-pass",
			score: 0,
			reasons: ["transport failure (timed out): no response within 50ms"],
			summary: null,
			classifiedAs: "REJECTED",
			worker: 2,
		});
	});
});

describe("scoring invariants", () => {
	const deviations = fc.record({
		status: fc.boolean(),
		length: fc.boolean(),
		url: fc.boolean(),
	});
	type Deviation = { status: boolean; length: boolean; url: boolean };

	const responseWith = (d: Deviation) =>
		summaryOf({
			statusCode: d.status ? 200 : 422,
			bodyLength: d.length ? 50_000 : 9309,
			finalUrl: d.url ? "/home" : "/login",
		});

	it("never scores a deviation lower than a subset of it", () => {
		fc.assert(
			fc.property(deviations, deviations, (base, extra) => {
				const widened = {
					status: base.status || extra.status,
					length: base.length || extra.length,
					url: base.url || extra.url,
				};
				const before = scoreResponse(responseWith(base), signatureOf(), DEFAULT_OPTIONS);
				const after = scoreResponse(responseWith(widened), signatureOf(), DEFAULT_OPTIONS);
				expect(after.points).toBeGreaterThanOrEqual(before.points);
			}),
		);
	});

	it("stays within zero and the sum of the weights", () => {
		fc.assert(
			fc.property(deviations, fc.boolean(), fc.boolean(), (d, statusReliable, urlReliable) => {
				const { points } = scoreResponse(
					responseWith(d),
					signatureOf({ statusReliable, urlReliable }),
					DEFAULT_OPTIONS,
				);
				expect(points).toBeGreaterThanOrEqual(0);
				expect(points).toBeLessThanOrEqual(8);
			}),
		);
	});
});
