// CHANGE: Vitest configuration for the maskfile-lint test suite
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: runs in isolation, no shared mocks between files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // tests import describe/it/expect from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Full coverage expected for CORE, shell is exercised through temp dirs and fake runners
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
