import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL("./src", import.meta.url)),
			"@tests": fileURLToPath(new URL("./tests", import.meta.url)),
		},
	},
	test: {
		environment: "node",
		env: {
			NODE_ENV: "test",
			LOG_TO_CONSOLE: "false",
		},
		include: ["tests/**/*.spec.ts"],
		setupFiles: ["./tests/setup.ts"],
		restoreMocks: true,
	},
});
