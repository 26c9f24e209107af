// CHANGE: Vitest configuration for covrun
// WHY: Native ESM, explicit imports, isolated mocks between tests
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: no shared state between test files

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Coverage with 100% threshold for CORE
		// WHY: CORE is pure and fully reachable from unit tests
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		// CHANGE: Clear mocks between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
