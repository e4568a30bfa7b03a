import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
		environment: "node",
		// keeps pipeline log lines out of the test output
		env: {
			LOG_LEVEL: "error",
		},
	},
});
