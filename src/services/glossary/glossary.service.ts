import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { Book } from "@/services/book/book.types";
import type { Glossary } from "@/services/translator/translator.schemas";

import { extractErrorMessage } from "@/errors";
import { glossarySchema } from "@/services/translator/translator.schemas";
import { logger } from "@/utils";

/** Suffix of a glossary file next to its archive: `<book>.glossary.json` */
export const GLOSSARY_FILE_SUFFIX = ".glossary.json";

/**
 * Loads the term list prepared for a book.
 *
 * Glossaries are produced outside this tool; a missing or invalid file yields an
 * empty glossary.
 */
export class GlossaryService {
	private readonly logger = logger.child({ component: GlossaryService.name });

	public getGlossaryPath(book: Pick<Book, "name" | "path">): string {
		return join(dirname(book.path), `${book.name}${GLOSSARY_FILE_SUFFIX}`);
	}

	/**
	 * Reads the glossary of a book.
	 *
	 * @param book Book or the fields locating it
	 */
	public async load(book: Pick<Book, "name" | "path">): Promise<Glossary> {
		const glossaryPath = this.getGlossaryPath(book);
		let raw: string;

		try {
			raw = await readFile(glossaryPath, "utf8");
		} catch {
			this.logger.debug({ glossaryPath }, "No glossary found");

			return {};
		}

		try {
			const glossary = glossarySchema.parse(JSON.parse(raw));

			this.logger.info({ glossaryPath, terms: Object.keys(glossary).length }, "Glossary loaded");

			return glossary;
		} catch (error) {
			this.logger.warn(
				{ glossaryPath, error: extractErrorMessage(error) },
				"Ignoring invalid glossary file",
			);

			return {};
		}
	}
}
