import type OpenAI from "openai";
import type PQueue from "p-queue";

import { getOpenAIClient, llmQueue } from "@/clients";
import { env } from "@/utils";
import { TranslatorKind } from "@/utils/constants.util";

import type { Glossary } from "./translator.schemas";
import type { Translator, TranslatorLanguages } from "./translator.types";

import { LLMTranslatorService } from "./llm-translator.service";
import { MockTranslatorService } from "./mock-translator.service";
import { NoopTranslatorService } from "./noop-translator.service";

export interface TranslatorFactoryOptions {
	kind: TranslatorKind;
	languages: TranslatorLanguages;
	placeholderLength: number;
	glossary?: Glossary;

	/** Client used by the `llm` variant (defaults to the application-wide instance) */
	openai?: OpenAI;

	/** Queue used by the `llm` variant (defaults to the application-wide instance) */
	queue?: PQueue;
}

/**
 * Creates the translator variant selected by configuration.
 *
 * @example
 * ```typescript
 * const translator = createTranslator({
 *   kind: env.TRANSLATOR,
 *   languages: { source: "en", target: "zh" },
 *   placeholderLength: 6,
 * });
 * ```
 */
export function createTranslator(options: TranslatorFactoryOptions): Translator {
	switch (options.kind) {
		case TranslatorKind.LLM:
			return new LLMTranslatorService({
				openai: options.openai ?? getOpenAIClient(),
				queue: options.queue ?? llmQueue,
				model: env.LLM_MODEL,
				maxTokens: env.MAX_TOKENS,
				retryConfig: { retries: env.MAX_RETRY_ATTEMPTS },
				languages: options.languages,
				placeholderLength: options.placeholderLength,
				glossary: options.glossary,
			});
		case TranslatorKind.Mock:
			return new MockTranslatorService(options.placeholderLength);
		case TranslatorKind.Noop:
			return new NoopTranslatorService(options.placeholderLength);
	}
}
