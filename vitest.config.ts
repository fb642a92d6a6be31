import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		globals: false, // Explicit imports preferred
		environment: "node",
		testTimeout: 30000,
		setupFiles: ["test/helpers/setup.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/cli/**", "src/logger.ts", "src/ui.ts"],
			thresholds: {
				// Decision logic - data integrity
				"src/hash.ts": { statements: 95, branches: 90 },
				"src/core/staleness.ts": { statements: 90, branches: 80 },
				"src/variables.ts": { statements: 90, branches: 80 },
				"src/chunks.ts": { statements: 90 },
				// IO modules - reliability critical
				"src/metadata.ts": { statements: 80 },
				"src/extract.ts": { statements: 55 },
			},
		},
	},
})
