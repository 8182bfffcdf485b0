import { VitePluginNode } from "vite-plugin-node";
import { defineConfig } from "vitest/config";

export default defineConfig({
	build: {
		minify: "esbuild",
		target: "es2022",
	},
	plugins: [
		...VitePluginNode({
			adapter: "express",
			appPath: "./src/Main.ts",
			exportName: "viteNodeApp",
			initAppOnBoot: process.env.NODE_ENV === "development",
			outputFormat: "module",
		}),
	],
	server: {
		open: false,
		port: 7034,
	},
	test: {
		setupFiles: ["./src/test/setup.ts"],
		include: ["src/**/*.test.ts"],
		coverage: {
			exclude: ["**/*.mock.ts", "src/Main.ts", "src/index.ts", "src/util/ModelDef.ts", "src/test/**"],
			include: ["src/**"],
			reporter: ["json", "lcov", "text"],
		},
		env: {
			LOG_TRANSPORTS: "console",
			DISABLE_LOGGING: "true",
			NODE_ENV: "test",
		},
		globals: true,
		pool: "threads",
		// every PGlite test binds a port from a small range
		fileParallelism: false,
		restoreMocks: true,
		testTimeout: 20000,
		hookTimeout: 20000,
	},
});
