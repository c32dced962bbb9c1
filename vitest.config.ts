// CHANGE: Vitest configuration for the codec test suite
// WHY: Native ESM with explicit imports; CORE held to full coverage
// PURITY: SHELL (configuration only)
// INVARIANT: Tests under test/** mirror src/**; no test reaches outside its process
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // explicit imports from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) ≥ threshold
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 95,
					lines: 95,
					statements: 95,
				},
			},
		},

		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
