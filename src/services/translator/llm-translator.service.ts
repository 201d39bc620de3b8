import { StatusCodes } from "http-status-codes";
import { APIError } from "openai/error";
import pRetry, { AbortError } from "p-retry";

import type OpenAI from "openai";
import type PQueue from "p-queue";
import type { Options as RetryOptions } from "p-retry";
import type { z } from "zod";

import { ApplicationError, ErrorCode, mapError } from "@/errors";
import { logger } from "@/utils";
import { TranslatorKind } from "@/utils/constants.util";

import type { Glossary } from "./translator.schemas";
import type { Corrections, TranslatorLanguages } from "./translator.types";

import { BaseTranslatorService } from "./base.service";
import {
	buildProofreadingPrompt,
	buildTranslationPrompt,
	CONNECTIVITY_TEST_MAX_TOKENS,
	LLM_TEMPERATURE,
} from "./translator.constants";
import { proofreadingResponseSchema, translationResponseSchema } from "./translator.schemas";

/** Dependency injection interface for {@link LLMTranslatorService} */
export interface LLMTranslatorDependencies {
	/** OpenAI client instance for LLM API calls */
	openai: OpenAI;

	/** LLM model identifier for chat completions */
	model: string;

	/** Rate limiting queue for LLM API calls */
	queue: PQueue;

	/** Retry configuration for LLM API calls */
	retryConfig: RetryOptions;

	languages: TranslatorLanguages;

	/** Maximum tokens generated per response */
	maxTokens: number;

	/** Random characters inside a placeholder token */
	placeholderLength: number;

	/** Terms with a fixed translation, injected into the prompt */
	glossary?: Glossary;
}

/** Body of the user message sent with every request */
interface RequestPayload {
	text: string;
	placeholders: readonly string[];
}

/**
 * Translator backed by an OpenAI-compatible chat completion API.
 *
 * Requests run in JSON mode and answers are validated with zod. Calls are gated by
 * the shared queue and retried with backoff, except on `400` and `401`.
 *
 * @example
 * ```typescript
 * const translator = new LLMTranslatorService({ openai, model: "gpt-4o-mini", ... });
 * const text = await translator.translate("<p>Hello ##Ab12Cd##</p>", ["##Ab12Cd##"]);
 * ```
 */
export class LLMTranslatorService extends BaseTranslatorService {
	private readonly logger = logger.child({ component: LLMTranslatorService.name });

	public readonly kind = TranslatorKind.LLM;

	private readonly openai: OpenAI;
	private readonly model: string;
	private readonly queue: PQueue;
	private readonly retryConfig: RetryOptions;
	private readonly maxTokens: number;

	/** System prompts, built once per run */
	private readonly prompts: { translation: string; proofreading: string };

	constructor(dependencies: LLMTranslatorDependencies) {
		super(dependencies.placeholderLength);

		this.openai = dependencies.openai;
		this.model = dependencies.model;
		this.queue = dependencies.queue;
		this.retryConfig = dependencies.retryConfig;
		this.maxTokens = dependencies.maxTokens;
		this.prompts = {
			translation: buildTranslationPrompt(dependencies.languages, dependencies.glossary ?? {}),
			proofreading: buildProofreadingPrompt(dependencies.languages),
		};
	}

	/**
	 * Tests LLM API connectivity and authentication.
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.InitializationError} If LLM API is not accessible or credentials are invalid
	 */
	public async testConnectivity(): Promise<void> {
		let response: OpenAI.Chat.Completions.ChatCompletion;

		try {
			response = await this.openai.chat.completions.create({
				model: this.model,
				messages: [{ role: "user", content: "ping" }],
				max_tokens: CONNECTIVITY_TEST_MAX_TOKENS,
				temperature: LLM_TEMPERATURE,
			});
		} catch (error) {
			const mapped = mapError(error, `${LLMTranslatorService.name}.${this.testConnectivity.name}`);

			throw new ApplicationError(
				`LLM API is not reachable: ${mapped.message}`,
				ErrorCode.InitializationError,
				mapped.operation,
				{ model: this.model, cause: mapped.code },
			);
		}

		if (!response.id && !response.choices.at(0)?.message) {
			throw new ApplicationError(
				"Invalid LLM API response",
				ErrorCode.InitializationError,
				`${LLMTranslatorService.name}.${this.testConnectivity.name}`,
				{ model: this.model },
			);
		}

		this.logger.info(
			{ model: this.model, id: response.id, usage: response.usage },
			"LLM API connectivity test successful",
		);
	}

	public async translate(text: string, doNotTranslate: readonly string[]): Promise<string> {
		const { translation } = await this.complete(
			this.prompts.translation,
			{ text, placeholders: doNotTranslate },
			translationResponseSchema,
		);

		return translation;
	}

	public async proofread(text: string, doNotTranslate: readonly string[]): Promise<Corrections> {
		const { corrections } = await this.complete(
			this.prompts.proofreading,
			{ text, placeholders: doNotTranslate },
			proofreadingResponseSchema,
		);

		return corrections;
	}

	/**
	 * Sends one JSON-mode request and validates the answer.
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.NoContent} if the model returns no content
	 * @throws {ApplicationError} with {@link ErrorCode.MalformedResponse} if the answer is not the expected JSON
	 */
	private async complete<TSchema extends z.ZodType>(
		systemPrompt: string,
		payload: RequestPayload,
		schema: TSchema,
	): Promise<z.infer<TSchema>> {
		const operation = `${LLMTranslatorService.name}.${this.complete.name}`;
		const callStartTime = Date.now();

		const result = await this.queue.add(() =>
			pRetry(
				async () => {
					try {
						const completion = await this.openai.chat.completions.create({
							model: this.model,
							temperature: LLM_TEMPERATURE,
							max_tokens: this.maxTokens,
							response_format: { type: "json_object" },
							messages: [
								{ role: "system", content: systemPrompt },
								{ role: "user", content: JSON.stringify(payload) },
							],
						});

						const content = completion.choices[0]?.message.content;

						if (!content) {
							throw new ApplicationError(
								"No content returned from language model",
								ErrorCode.NoContent,
								operation,
								{ model: this.model, textLength: payload.text.length },
							);
						}

						this.logger.debug(
							{
								model: this.model,
								inputTokens: completion.usage?.prompt_tokens,
								outputTokens: completion.usage?.completion_tokens,
							},
							"LLM API call successful",
						);

						return this.parseResponse(content, schema, operation);
					} catch (error) {
						if (
							error instanceof APIError &&
							(error.status === StatusCodes.UNAUTHORIZED || error.status === StatusCodes.BAD_REQUEST)
						) {
							throw new AbortError(error);
						}

						throw error;
					}
				},
				{
					...this.retryConfig,
					onFailedAttempt: ({ attemptNumber: attempt, error, retriesLeft }) => {
						this.logger.warn(
							{
								attempt,
								retriesLeft,
								error: error.message,
								totalElapsedMs: Date.now() - callStartTime,
							},
							`LLM call attempt ${attempt} failed, ${retriesLeft} retries remaining`,
						);
					},
				},
			),
		);

		if (result === undefined) {
			throw new ApplicationError(
				"LLM call was dropped by the queue",
				ErrorCode.TranslationFailed,
				operation,
				{ model: this.model },
			);
		}

		return result;
	}

	private parseResponse<TSchema extends z.ZodType>(
		content: string,
		schema: TSchema,
		operation: string,
	): z.infer<TSchema> {
		let parsed: unknown;

		try {
			parsed = JSON.parse(content);
		} catch (error) {
			throw new ApplicationError(
				"Language model answered with invalid JSON",
				ErrorCode.MalformedResponse,
				operation,
				{ content: content.slice(0, 200), reason: error instanceof Error ? error.message : String(error) },
			);
		}

		const validation = schema.safeParse(parsed);
		if (!validation.success) throw mapError(validation.error, operation, { model: this.model });

		return validation.data;
	}
}
