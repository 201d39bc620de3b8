import type { TranslatorKind } from "@/utils/constants.util";

import type { Corrections, Translator } from "./translator.types";

import { PlaceholderValidatorManager } from "./managers";

/**
 * Base of every {@link Translator} variant.
 *
 * Provides the batch form on top of the single-text call.
 */
export abstract class BaseTranslatorService implements Translator {
	public abstract readonly kind: TranslatorKind;

	protected readonly placeholderValidator: PlaceholderValidatorManager;

	constructor(placeholderLength: number) {
		this.placeholderValidator = new PlaceholderValidatorManager(placeholderLength);
	}

	public abstract translate(text: string, doNotTranslate: readonly string[]): Promise<string>;

	public abstract proofread(text: string, doNotTranslate: readonly string[]): Promise<Corrections>;

	/**
	 * Translates each text with its own placeholder tokens.
	 *
	 * Results keep the input order however the calls complete.
	 */
	public translateBatch(texts: readonly string[]): Promise<string[]> {
		return Promise.all(
			texts.map((text) => this.translate(text, this.placeholderValidator.extract(text))),
		);
	}
}
