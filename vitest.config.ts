// CHANGE: Vitest configuration for the snapshot pipeline
// WHY: Native ESM, explicit imports, CORE held to full coverage
// PURITY: SHELL (configuration only)
// INVARIANT: Tests never reach outside their own process

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Full coverage for CORE, a floor for SHELL
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
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
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		// Prevent test contamination between cases
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
