// CHANGE: Vitest configuration for CORE and SHELL test suites
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects outside the process

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import describe/it/expect from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// Pipeline tests rely on real timers for pacing; keep headroom.
		testTimeout: 20_000,

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
		},

		// Clear mocks between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
