import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false,
		// Component tests parse rendered markup
		environment: "happy-dom",
		include: ["packages/*/src/**/*.test.ts"],
		// Setup file for @effect/vitest
		setupFiles: ["./vitest.setup.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
	},
});
