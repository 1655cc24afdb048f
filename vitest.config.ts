// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		// Prevent test contamination, ensure test independence
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
