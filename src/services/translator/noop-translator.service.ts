import { TranslatorKind } from "@/utils/constants.util";

import type { Corrections } from "./translator.types";

import { BaseTranslatorService } from "./base.service";

/** Translator that hands every text back unchanged and never proposes corrections */
export class NoopTranslatorService extends BaseTranslatorService {
	public readonly kind = TranslatorKind.Noop;

	public translate(text: string): Promise<string> {
		return Promise.resolve(text);
	}

	public proofread(): Promise<Corrections> {
		return Promise.resolve({});
	}
}
