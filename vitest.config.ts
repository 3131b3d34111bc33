import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/__tests__/**/*.test.ts"],
		// Built output must never be picked up as a second copy of the tests.
		exclude: ["**/node_modules/**", "**/dist/**"],
		environment: "node",
	},
});
