import { describe, expect, test } from "vitest";

import {
	createTranslator,
	LLMTranslatorService,
	MockTranslatorService,
	NoopTranslatorService,
} from "@/services/translator";
import { TranslatorKind } from "@/utils/constants.util";

import { createMockOpenAI } from "@tests/mocks";

describe("createTranslator", () => {
	const base = { languages: { source: "en", target: "zh" }, placeholderLength: 6 };

	test("should create the mock translator", () => {
		expect(createTranslator({ ...base, kind: TranslatorKind.Mock })).toBeInstanceOf(
			MockTranslatorService,
		);
	});

	test("should create the noop translator", () => {
		expect(createTranslator({ ...base, kind: TranslatorKind.Noop })).toBeInstanceOf(
			NoopTranslatorService,
		);
	});

	test("should create the llm translator with the given client", () => {
		const { openai } = createMockOpenAI();

		const translator = createTranslator({ ...base, kind: TranslatorKind.LLM, openai });

		expect(translator).toBeInstanceOf(LLMTranslatorService);
		expect(translator.kind).toBe(TranslatorKind.LLM);
	});
});
