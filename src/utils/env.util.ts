import { z } from "zod";

import {
	environmentDefaults,
	LogLevel,
	MIN_API_TOKEN_LENGTH,
	RuntimeEnvironment,
	TranslatorKind,
} from "./constants.util";

/**
 * Creates a secure token validation schema with common security checks.
 *
 * @param envName The name of the environment variable (for error messages)
 *
 * @returns A Zod schema that validates API tokens/keys
 */
function createTokenSchema(envName: string) {
	return z
		.string()
		.min(MIN_API_TOKEN_LENGTH, `${envName} looks too short; ensure your API key is set`)
		.refine((value) => !/\s/.test(value), `${envName} must not contain whitespace`)
		.refine(
			(value) =>
				!["CHANGE_ME", "dev-token", "dev-key", "your-token-here", "your-key-here"].includes(value),
			`${envName} appears to be a placeholder. Set a real token`,
		);
}

/** Environment configuration schema for runtime validation */
const envSchema = z
	.object({
		/**
		 * Node.js's runtime environment.
		 *
		 * @default "development"
		 */
		NODE_ENV: z.enum(RuntimeEnvironment).default(environmentDefaults.NODE_ENV),

		/**
		 * Logging level for the application.
		 *
		 * @default "info"
		 */
		LOG_LEVEL: z.enum(LogLevel).default(environmentDefaults.LOG_LEVEL),

		/**
		 * Whether to enable console logging in addition to file logging.
		 *
		 * @default true
		 */
		LOG_TO_CONSOLE: z.stringbool().default(environmentDefaults.LOG_TO_CONSOLE),

		/**
		 * Which translation backend handles the chunks.
		 *
		 * @default "llm"
		 */
		TRANSLATOR: z.enum(TranslatorKind).default(environmentDefaults.TRANSLATOR),

		/** The OpenAI/OpenRouter/etc API key. Only required by the `llm` translator */
		LLM_API_KEY: createTokenSchema("LLM_API_KEY").optional(),

		/**
		 * The OpenAI-compatible API base URL.
		 *
		 * @default "https://api.openai.com/v1"
		 */
		LLM_API_BASE_URL: z.url().default(environmentDefaults.LLM_API_BASE_URL),

		/**
		 * The LLM model to use.
		 *
		 * @default "gpt-4o-mini"
		 */
		LLM_MODEL: z.string().default(environmentDefaults.LLM_MODEL),

		/** The OpenAI project's ID. Used for activity tracking on OpenAI. */
		OPENAI_PROJECT_ID: z.string().optional(),

		/**
		 * The title sent as `X-Title` header to OpenAI-compatible routers.
		 *
		 * @default `"${pkgJson.name} v${pkgJson.version}"`
		 */
		HEADER_APP_TITLE: z.string().default(environmentDefaults.HEADER_APP_TITLE),

		/**
		 * Maximum tokens to generate in a single LLM response.
		 *
		 * @default 8192
		 */
		MAX_TOKENS: z.coerce.number().positive().default(environmentDefaults.MAX_TOKENS),

		/**
		 * Retries performed by the LLM client for a single call.
		 *
		 * @default 3
		 */
		MAX_RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(environmentDefaults.MAX_RETRY_ATTEMPTS),

		/**
		 * Maximum simultaneous translation calls.
		 *
		 * `1` keeps chunk dispatch strictly sequential. Output order never depends
		 * on this value.
		 *
		 * @default 1
		 */
		TRANSLATION_CONCURRENCY: z.coerce
			.number()
			.int()
			.positive()
			.default(environmentDefaults.TRANSLATION_CONCURRENCY),

		/**
		 * Locale of the source documents. Only `en*` locale attributes are rewritten.
		 *
		 * @default "en"
		 */
		SOURCE_LANGUAGE: z.string().min(2).default(environmentDefaults.SOURCE_LANGUAGE),

		/**
		 * Locale code written into `lang`/`xml:lang` attributes and the package metadata.
		 *
		 * @default "zh"
		 */
		TARGET_LANGUAGE: z.string().min(2).default(environmentDefaults.TARGET_LANGUAGE),

		/**
		 * Token budget of a single chunk.
		 *
		 * @default 1500
		 */
		CHUNK_TOKEN_LIMIT: z.coerce.number().int().positive().default(environmentDefaults.CHUNK_TOKEN_LIMIT),

		/**
		 * Random characters inside each placeholder token.
		 *
		 * @default 6
		 */
		PLACEHOLDER_LENGTH: z.coerce
			.number()
			.int()
			.min(4)
			.max(32)
			.default(environmentDefaults.PLACEHOLDER_LENGTH),

		/**
		 * Suffix of the output archive name (`<book>-<suffix>.epub`).
		 * Falls back to `TARGET_LANGUAGE` when unset.
		 */
		OUTPUT_SUFFIX: z.string().min(1).optional(),
	})
	.superRefine((value, context) => {
		if (
			value.TRANSLATOR === TranslatorKind.LLM &&
			value.NODE_ENV !== RuntimeEnvironment.Test &&
			!value.LLM_API_KEY
		) {
			context.addIssue({
				code: "custom",
				path: ["LLM_API_KEY"],
				message: "LLM_API_KEY is required when TRANSLATOR is 'llm'",
			});
		}
	});

/** Type definition for the environment configuration */
export type Environment = z.infer<typeof envSchema>;

/**
 * Validates all environment variables against the defined schema.
 *
 * Performs runtime checks to ensure all required variables are present and correctly typed.
 *
 * @param env Optional environment object to validate (defaults to `process.env`)
 *
 * @throws {Error} Detailed validation errors if environment variables are invalid
 */
export function validateEnv(env?: Record<string, unknown>): Environment {
	try {
		return envSchema.parse(env ?? process.env);
	} catch (error) {
		if (error instanceof z.ZodError) {
			const issues = error.issues
				.map((issue) => `- ${issue.path.join(".")}: ${issue.message}`)
				.join("\n");
			throw new Error(`❌ Invalid environment variables:\n${issues}`);
		}

		throw error;
	}
}

export const env = validateEnv();
