import type { TranslatorKind } from "@/utils/constants.util";

/** Phrase replacements proposed by proofreading, wrong phrase to corrected phrase */
export type Corrections = Record<string, string>;

/** Language pair a translator works on */
export interface TranslatorLanguages {
	/** Locale code of the source documents, e.g. `en` */
	source: string;

	/** Locale code of the translation, e.g. `zh` */
	target: string;
}

/**
 * Translation backend consumed by the pipeline.
 *
 * Implementations own their timeouts and retries; the pipeline never retries a call.
 */
export interface Translator {
	readonly kind: TranslatorKind;

	/**
	 * Translates one chunk of protected markup.
	 *
	 * @param text Chunk text
	 * @param doNotTranslate Placeholder tokens that must come back verbatim
	 */
	translate(text: string, doNotTranslate: readonly string[]): Promise<string>;

	/**
	 * Translates several texts. The result has the same length and order as the input.
	 *
	 * @param texts Texts to translate
	 */
	translateBatch(texts: readonly string[]): Promise<string[]>;

	/**
	 * Reviews a translation and proposes phrase corrections.
	 *
	 * @param text Translated chunk text
	 * @param doNotTranslate Placeholder tokens that must not be touched
	 *
	 * @returns Corrections to apply, empty when none are needed
	 */
	proofread(text: string, doNotTranslate: readonly string[]): Promise<Corrections>;
}
