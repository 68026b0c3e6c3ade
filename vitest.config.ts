import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["tests/**/*.test.ts"],
		// Keep test runs from writing to the user's log directory
		env: {
			TUNEDECK_LOG_FILE: "false",
			TUNEDECK_LOG_CONSOLE: "false",
		},
		testTimeout: 10000,
	},
});
