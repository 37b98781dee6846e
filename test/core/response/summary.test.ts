import { describe, expect, it } from "vitest";

import { summarizeExchange } from "../../../src/core/response/summary.js";

describe("summarizeExchange", () => {
	it("digests the exchange", () => {
		const summary = summarizeExchange(
			{
				status: 200,
				body: "hello",
				finalUrl: "/home",
				cookieNames: ["a", "a", "b"],
			},
			42,
		);
		expect(summary.statusCode).toBe(200);
		expect(summary.bodyLength).toBe(5);
		expect(summary.finalUrl).toBe("/home");
		expect([...summary.cookieNames]).toEqual(["a", "b"]);
		expect(summary.elapsedMs).toBe(42);
		expect(Object.isFrozen(summary)).toBe(true);
	});

	it("clamps negative durations to zero", () => {
		const summary = summarizeExchange(
			{ status: 401, body: "", finalUrl: "/login", cookieNames: [] },
			-5,
		);
		expect(summary.elapsedMs).toBe(0);
		expect(summary.bodyLength).toBe(0);
	});
});
