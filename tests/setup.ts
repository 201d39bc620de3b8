import { vi } from "vitest";

import type { Environment } from "@/utils/env.util";

/**
 * Mock only the exported `env` constant for global test usage.
 *
 * Individual test files (like env.util.spec.ts) can import the real `validateEnv`
 * function to test its actual validation behavior.
 */
vi.mock("@/utils/env.util", async (importOriginal) => {
	const actual = await importOriginal<typeof import("@/utils/env.util")>();
	const { LogLevel, RuntimeEnvironment, TranslatorKind } = await import("@/utils/constants.util");

	return {
		...actual,
		env: {
			NODE_ENV: RuntimeEnvironment.Test,
			LOG_LEVEL: LogLevel.Debug,
			LOG_TO_CONSOLE: false,
			TRANSLATOR: TranslatorKind.Mock,
			LLM_API_KEY: "test-secret-key-for-unit-tests",
			LLM_API_BASE_URL: "https://llm.example.test/v1",
			LLM_MODEL: "test-model",
			HEADER_APP_TITLE: "Test App",
			MAX_TOKENS: 4096,
			MAX_RETRY_ATTEMPTS: 0,
			TRANSLATION_CONCURRENCY: 1,
			SOURCE_LANGUAGE: "en",
			TARGET_LANGUAGE: "zh",
			CHUNK_TOKEN_LIMIT: 1500,
			PLACEHOLDER_LENGTH: 6,
		} satisfies Environment,
	};
});
