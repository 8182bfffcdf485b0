import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			exclude: ["**/*.mock.ts", "**/index.ts", "src/onboarding/types.ts"],
			include: ["src/**/*.ts"],
			reporter: ["json", "lcov", "text"],
		},
		env: {
			DISABLE_LOGGING: "true",
			LOG_TRANSPORTS: "console",
		},
		globals: true,
		include: ["src/**/*.test.ts"],
		restoreMocks: true,
	},
});
