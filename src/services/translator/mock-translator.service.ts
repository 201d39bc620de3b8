import { TranslatorKind } from "@/utils/constants.util";

import type { Corrections } from "./translator.types";

import { logger } from "@/utils";

import { BaseTranslatorService } from "./base.service";
import { MOCK_TRANSLATION_PREFIX } from "./translator.constants";

/** One recorded call of a {@link MockTranslatorService} */
export interface MockTranslatorCall {
	method: "translate" | "proofread";
	text: string;
	doNotTranslate: string[];
}

export interface MockTranslatorOptions {
	/** Produces the translation of a text; prefixes {@link MOCK_TRANSLATION_PREFIX} by default */
	transform?: (text: string) => string;

	/** Corrections returned by every proofreading call */
	corrections?: Corrections;
}

/**
 * Deterministic in-process translator for dry runs.
 *
 * Records every call, so a run can be inspected without a model behind it.
 */
export class MockTranslatorService extends BaseTranslatorService {
	private readonly logger = logger.child({ component: MockTranslatorService.name });

	public readonly kind = TranslatorKind.Mock;

	public readonly calls: MockTranslatorCall[] = [];

	private readonly transform: (text: string) => string;
	private readonly corrections: Corrections;

	constructor(placeholderLength: number, options: MockTranslatorOptions = {}) {
		super(placeholderLength);

		this.transform = options.transform ?? ((text) => `${MOCK_TRANSLATION_PREFIX}${text}`);
		this.corrections = options.corrections ?? {};
	}

	public translate(text: string, doNotTranslate: readonly string[]): Promise<string> {
		this.calls.push({ method: "translate", text, doNotTranslate: [...doNotTranslate] });
		this.logger.debug({ length: text.length, placeholders: doNotTranslate.length }, "Mock translation");

		return Promise.resolve(this.transform(text));
	}

	public proofread(text: string, doNotTranslate: readonly string[]): Promise<Corrections> {
		this.calls.push({ method: "proofread", text, doNotTranslate: [...doNotTranslate] });

		return Promise.resolve({ ...this.corrections });
	}
}
