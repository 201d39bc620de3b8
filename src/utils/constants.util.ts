import { name, version } from "../../package.json";

/**
 * Available runtime environments for the application.
 *
 * Maps to the `NODE_ENV` environment variable
 */
export enum RuntimeEnvironment {
	Development = "development",
	Test = "test",
	Staging = "staging",
	Production = "production",
}

/** Logging levels used throughout the application */
export enum LogLevel {
	Trace = "trace",
	Debug = "debug",
	Info = "info",
	Warn = "warn",
	Error = "error",
	Fatal = "fatal",
}

/** Translation backends that can be selected through configuration */
export enum TranslatorKind {
	/** OpenAI-compatible chat completion API */
	LLM = "llm",

	/** Deterministic in-process translator used for dry runs and tests */
	Mock = "mock",

	/** Returns every input unchanged */
	Noop = "noop",
}

/** Process signal constants used for event handling */
export const processSignals = {
	interrupt: "SIGINT",
	terminate: "SIGTERM",
} satisfies Record<string, NodeJS.Signals>;

/** Standard error messages used throughout the application */
export const errorMessages = {
	snapshotSaveFailed: "Failed to save snapshot",
	snapshotLoadFailed: "Failed to load snapshot",
	archiveNotFound: (path: string) => `Source archive not found: ${path}`,
	archiveUnreadable: (path: string) => `Source archive could not be read: ${path}`,
} as const;

/** Minimum length required for a valid API token */
export const MIN_API_TOKEN_LENGTH = 20;

export const environmentDefaults = {
	NODE_ENV: RuntimeEnvironment.Development,
	LOG_LEVEL: LogLevel.Info,
	TRANSLATOR: TranslatorKind.LLM,
	LLM_API_BASE_URL: "https://api.openai.com/v1",
	LLM_MODEL: "gpt-4o-mini",
	HEADER_APP_TITLE: `${name} v${version}`,
	SOURCE_LANGUAGE: "en",
	TARGET_LANGUAGE: "zh",

	/** Maximum tokens to generate in a single LLM response */
	MAX_TOKENS: 8192,

	/** Attempts made by the LLM client before a chunk is reported as failed */
	MAX_RETRY_ATTEMPTS: 3,

	/** Simultaneous translation calls; `1` keeps dispatch strictly sequential */
	TRANSLATION_CONCURRENCY: 1,

	/** Token budget of a single chunk */
	CHUNK_TOKEN_LIMIT: 1500,

	/** Random characters inside a placeholder token */
	PLACEHOLDER_LENGTH: 6,

	/** Whether to enable console logging in addition to file logging */
	LOG_TO_CONSOLE: true,
} as const;
