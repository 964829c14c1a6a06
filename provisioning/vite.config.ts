import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			all: true,
			exclude: ["**/*.mock.ts", "**/index.ts", "src/test/**"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
		},
		env: {
			DISABLE_LOGGING: "true",
		},
		include: ["src/**/*.test.ts"],
		restoreMocks: true,
	},
});
