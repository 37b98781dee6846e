import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import type { TransportError } from "../../../src/core/errors.js";
import type { Credential, HttpExchange } from "../../../src/core/types/index.js";
import {
	type CalibrationSettings,
	calibrate,
	PROBE_USERNAME_PREFIX,
} from "../../../src/shell/calibration/calibrator.js";
import type { Transport } from "../../../src/shell/transport/transport.js";
import { exchangeOf, refused, runQuiet } from "../../utils/builders.js";

type Reply = Effect.Effect<HttpExchange, TransportError>;

/** Answers the i-th call with replies[i], the consensus afterwards. */
const recordingTransport = (
	replies: readonly Reply[] = [],
): { readonly calls: Credential[]; readonly transport: Transport } => {
	const calls: Credential[] = [];
	const transport: Transport = (credential) => {
		calls.push(credential);
		return replies[calls.length - 1] ?? Effect.succeed(exchangeOf());
	};
	return { calls, transport };
};

const settings = (count: number): CalibrationSettings => ({
	count,
	pacingMs: 0,
	timeoutMs: 1000,
});

describe("calibrate", () => {
	it("collects one summary per probe", async () => {
		const { calls, transport } = recordingTransport();
		const samples = await runQuiet(calibrate(transport, settings(3)));
		expect(samples).toHaveLength(3);
		expect(samples.map((s) => s.statusCode)).toEqual([422, 422, 422]);
		expect(samples.map((s) => s.bodyLength)).toEqual([9309, 9309, 9309]);
		expect(calls).toHaveLength(3);
	});

	it("submits random probe credentials", async () => {
		const { calls, transport } = recordingTransport();
		await runQuiet(calibrate(transport, settings(3)));
		for (const probe of calls) {
			expect(probe.username.startsWith(PROBE_USERNAME_PREFIX)).toBe(true);
			expect(probe.username).toHaveLength(PROBE_USERNAME_PREFIX.length + 12);
			expect(probe.password).toMatch(/^[a-z0-9]{20}$/);
		}
		expect(new Set(calls.map((c) => c.username)).size).toBe(3);
	});

	it("drops failed probes and keeps the rest in order", async () => {
		const { transport } = recordingTransport([
			refused(),
			Effect.succeed(exchangeOf({ status: 401 })),
			Effect.succeed(exchangeOf()),
		]);
		const samples = await runQuiet(calibrate(transport, settings(3)));
		expect(samples.map((s) => s.statusCode)).toEqual([401, 422]);
	});

	it("fails when every probe fails", async () => {
		const { calls, transport } = recordingTransport([refused(), refused()]);
		const result = await runQuiet(
			Effect.either(calibrate(transport, settings(2))),
		);
		expect(calls).toHaveLength(2);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.detail).toBe(
				"all 2 calibration probes failed (last: transport failure (connection failed): refused)",
			);
		}
	});

	it("rejects a count below one without sending anything", async () => {
		const { calls, transport } = recordingTransport();
		const result = await runQuiet(
			Effect.either(calibrate(transport, settings(0))),
		);
		expect(calls).toHaveLength(0);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("CalibrationError");
			expect(result.left.detail).toBe(
				"calibration count must be an integer ≥ 1, got 0",
			);
		}
	});

	it("waits between probes", async () => {
		const { transport } = recordingTransport();
		const startedAt = Date.now();
		await runQuiet(calibrate(transport, { ...settings(3), pacingMs: 30 }));
		expect(Date.now() - startedAt).toBeGreaterThanOrEqual(55);
	});
});
