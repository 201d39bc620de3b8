import { OpenAI } from "openai";

import { ApplicationError, ErrorCode } from "@/errors/error";
import { env } from "@/utils";

let client: OpenAI | null = null;

/**
 * Returns the application-wide {@link OpenAI} instance, creating it on first use.
 *
 * Creation is deferred so runs with the `mock` or `noop` translator need no API key.
 *
 * @throws {ApplicationError} with {@link ErrorCode.InvalidConfiguration} if `LLM_API_KEY` is not set
 */
export function getOpenAIClient(): OpenAI {
	if (client) return client;

	if (!env.LLM_API_KEY) {
		throw new ApplicationError(
			"LLM_API_KEY is required by the llm translator",
			ErrorCode.InvalidConfiguration,
			getOpenAIClient.name,
		);
	}

	client = new OpenAI({
		baseURL: env.LLM_API_BASE_URL,
		apiKey: env.LLM_API_KEY,
		project: env.OPENAI_PROJECT_ID,
		defaultHeaders: {
			"X-Title": env.HEADER_APP_TITLE,
		},
	});

	return client;
}
