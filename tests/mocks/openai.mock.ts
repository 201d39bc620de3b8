import OpenAI from "openai";
import { vi } from "vitest";

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

/**
 * Creates a ChatCompletion response whose first choice carries `content`.
 *
 * @param content Message content of the first choice
 */
export function createMockChatCompletion(content: string | null): ChatCompletion {
	return {
		id: "chatcmpl-test-123",
		created: 1_700_000_000,
		model: "test-model",
		object: "chat.completion",
		choices: [
			{
				message: { content, refusal: null, role: "assistant" },
				finish_reason: "stop",
				index: 0,
				logprobs: null,
			},
		],
		usage: { total_tokens: 50, completion_tokens: 30, prompt_tokens: 20 },
	};
}

/**
 * Creates an {@link OpenAI} client that never reaches the network.
 *
 * `chat.completions.create` is replaced by a spy; script it with
 * `mockResolvedValueOnce(createMockChatCompletion(...))`.
 *
 * @example
 * ```typescript
 * const { openai, create } = createMockOpenAI();
 * create.mockResolvedValueOnce(createMockChatCompletion('{"translation":"你好"}'));
 * ```
 */
export function createMockOpenAI() {
	const openai = new OpenAI({ apiKey: "test-secret", baseURL: "https://llm.example.test/v1" });
	const create = vi.spyOn(openai.chat.completions, "create");

	create.mockRejectedValue(new Error("Unexpected chat completion call"));

	return { openai, create };
}
