// PURITY: SHELL (configuration only)
// INVARIANT: Tests import describe/it/expect explicitly; no shared global state
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
