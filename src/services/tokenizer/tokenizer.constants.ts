import type { TiktokenModel } from "js-tiktoken";

/** Divisor used for fallback token estimation when encoding fails (chars per token estimate) */
export const TOKEN_ESTIMATION_FALLBACK_DIVISOR = 3.5;

/** Default tiktoken model to use for token counting */
export const DEFAULT_TIKTOKEN_MODEL: TiktokenModel = "gpt-4o";

/**
 * Models recognised by substring match against the configured LLM model.
 *
 * More specific names come first: `gpt-4o-mini` must win over `gpt-4o` and `gpt-4`.
 */
export const SUPPORTED_TIKTOKEN_MODELS: TiktokenModel[] = [
	"gpt-4o-mini",
	"gpt-4o",
	"gpt-4-turbo",
	"gpt-4",
	"gpt-3.5-turbo",
];
