import { writeFile } from "node:fs/promises";

import type { Chunk, Item } from "@/services/book/book.types";
import type { ProtectorService } from "@/services/protector";

import { mapError } from "@/errors";
import { logger } from "@/utils";

import { ENGLISH_LOCALE_ATTRIBUTE_REGEX } from "./reassembler.constants";

/**
 * Turns translated chunks back into a finished document.
 *
 * Merging orders by sequence number, never by completion order.
 */
export class ReassemblerService {
	private readonly logger = logger.child({ component: ReassemblerService.name });

	constructor(private readonly protector: ProtectorService) {}

	/**
	 * Joins the translations of the chunks and rewrites English locale attributes.
	 *
	 * A chunk without a translation contributes an empty string; the missing
	 * sequence numbers are logged.
	 *
	 * @param chunks Chunks of one item, in any order
	 * @param targetLocale Locale written into `lang`/`xml:lang`
	 */
	public merge(chunks: readonly Chunk[], targetLocale: string): string {
		if (chunks.length === 0) return "";

		const ordered = [...chunks].sort((a, b) => a.sequence - b.sequence);
		const missing = ordered.filter((chunk) => chunk.translated === null).map((chunk) => chunk.sequence);

		if (missing.length > 0) {
			this.logger.warn(
				{ missing, total: ordered.length },
				"Chunks without translation merged as empty text",
			);
		}

		return this.rewriteLocale(ordered.map((chunk) => chunk.translated ?? "").join(""), targetLocale);
	}

	/**
	 * Rewrites every English `lang`/`xml:lang` value to the target locale.
	 *
	 * @param content Markup to rewrite
	 * @param targetLocale Replacement locale code
	 *
	 * @example
	 * ```typescript
	 * reassembler.rewriteLocale(`<html lang="en-US" xml:lang='en_GB'>`, "zh");
	 * // `<html lang="zh" xml:lang='zh'>`
	 * ```
	 */
	public rewriteLocale(content: string, targetLocale: string): string {
		let replacements = 0;

		const rewritten = content.replace(
			ENGLISH_LOCALE_ATTRIBUTE_REGEX,
			(_match, attribute: string, separator: string, quote: string) => {
				replacements++;

				return `${attribute}${separator}${quote}${targetLocale}${quote}`;
			},
		);

		if (replacements === 0) {
			this.logger.info({ targetLocale }, "No English locale attribute found");
		}

		return rewritten;
	}

	/**
	 * Merges an item, restores its placeholders and writes it to its backing file.
	 *
	 * An empty merge writes nothing and leaves `item.translated` as it was.
	 *
	 * @param item Item to finish
	 * @param targetLocale Locale written into `lang`/`xml:lang`
	 *
	 * @returns Whether the file was written
	 */
	public async restoreItem(item: Item, targetLocale: string): Promise<boolean> {
		const itemLogger = this.logger.child({ item: item.id });
		const merged = this.merge(item.chunks, targetLocale);

		if (!merged) {
			itemLogger.info("Nothing translated, file left unchanged");

			return false;
		}

		const restored = this.protector.restore(merged, item.placeholders);

		try {
			await writeFile(item.path, restored, "utf8");
		} catch (error) {
			throw mapError(error, `${ReassemblerService.name}.${this.restoreItem.name}`, {
				item: item.id,
				path: item.path,
			});
		}

		item.translated = restored;
		itemLogger.debug({ length: restored.length }, "Item written");

		return true;
	}
}
