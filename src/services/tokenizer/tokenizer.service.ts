import { encodingForModel } from "js-tiktoken";

import type { Tiktoken, TiktokenModel } from "js-tiktoken";

import { logger } from "@/utils";

import {
	DEFAULT_TIKTOKEN_MODEL,
	SUPPORTED_TIKTOKEN_MODELS,
	TOKEN_ESTIMATION_FALLBACK_DIVISOR,
} from "./tokenizer.constants";

/** Counts tokens the way the translation backend will see them */
export interface Tokenizer {
	/**
	 * Counts the tokens of a string. Must be pure and return `0` for `""`.
	 *
	 * @param text Text to count
	 */
	countTokens(text: string): number;
}

/** {@link Tokenizer} backed by `js-tiktoken` encodings */
export class TiktokenTokenizer implements Tokenizer {
	private readonly logger = logger.child({ component: TiktokenTokenizer.name });

	/** Lazily-initialized tiktoken encoder instance, cached for performance */
	private cachedEncoder: Tiktoken | null = null;

	constructor(private readonly model: string) {}

	/**
	 * Gets or creates a cached tiktoken encoder instance.
	 *
	 * The encoder is expensive to create due to vocabulary loading and regex
	 * compilation, so it is reused across all calls.
	 */
	private get encoder(): Tiktoken {
		this.cachedEncoder ??= encodingForModel(this.getTiktokenModel(this.model));

		return this.cachedEncoder;
	}

	/**
	 * Maps the configured LLM model to a compatible `tiktoken` model.
	 *
	 * Non-OpenAI models are mapped to {@link DEFAULT_TIKTOKEN_MODEL}. The counts are
	 * then approximate, which is sufficient for chunking.
	 *
	 * @param model The configured LLM model identifier
	 */
	public getTiktokenModel(model: string): TiktokenModel {
		const supportedModel = SUPPORTED_TIKTOKEN_MODELS.find((supportedModel) =>
			model.includes(supportedModel),
		);
		if (supportedModel) return supportedModel;

		this.logger.debug(
			{ model, fallback: DEFAULT_TIKTOKEN_MODEL },
			"Model not supported by tiktoken, using fallback for token counting",
		);

		return DEFAULT_TIKTOKEN_MODEL;
	}

	public countTokens(text: string): number {
		if (!text) return 0;

		try {
			return this.encoder.encode(text).length;
		} catch (error) {
			this.logger.error({ error }, "Error counting tokens, using fallback estimation");

			return Math.ceil(text.length / TOKEN_ESTIMATION_FALLBACK_DIVISOR);
		}
	}
}
