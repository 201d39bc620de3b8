import { readFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";

import type { ArchiveService } from "@/services/archive";
import type { ProtectorService } from "@/services/protector";
import type { SegmenterService } from "@/services/segmenter";

import type { Book, Item } from "./book.types";
import type { SnapshotService } from "./snapshot.service";

import { mapError } from "@/errors";
import { EXTRACTION_DIRECTORY, getMarkupMode } from "@/services/archive";
import { logger } from "@/utils";

/** Dependency injection interface for {@link BookService} */
export interface BookServiceDependencies {
	archive: ArchiveService;
	protector: ProtectorService;
	segmenter: SegmenterService;
	snapshot: SnapshotService;
}

/**
 * Builds the {@link Book} of an archive, or resumes it from its snapshot.
 *
 * ### Workflow
 *
 * 1. Load `<archive dir>/<name>.json` if it exists and is valid
 * 2. Otherwise extract the archive into `<archive dir>/temp/<name>/`
 * 3. Protect and segment every translatable document
 * 4. Save the snapshot
 */
export class BookService {
	private readonly logger = logger.child({ component: BookService.name });

	constructor(private readonly services: BookServiceDependencies) {}

	/**
	 * @param archivePath Source archive
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.ResourceLoadError} if the archive cannot be read
	 */
	public async parse(archivePath: string): Promise<Book> {
		const path = resolve(archivePath);
		const name = basename(path, extname(path));

		const snapshotPath = this.services.snapshot.getSnapshotPath({ name, path });
		const snapshot = await this.services.snapshot.load(snapshotPath);
		if (snapshot) return snapshot;

		const extractPath = join(dirname(path), EXTRACTION_DIRECTORY, name);
		const entries = await this.services.archive.extract(path, extractPath);
		const items: Item[] = [];

		for (const id of this.services.archive.discoverTranslatableFiles(entries)) {
			items.push(await this.createItem(id, join(extractPath, id)));
		}

		const book: Book = { name, path, extractPath, items };

		this.logger.info(
			{
				book: name,
				items: items.length,
				chunks: items.reduce((total, item) => total + item.chunks.length, 0),
			},
			"Book parsed",
		);

		await this.services.snapshot.save(book);

		return book;
	}

	private async createItem(id: string, path: string): Promise<Item> {
		let source: string;

		try {
			source = await readFile(path, "utf8");
		} catch (error) {
			throw mapError(error, `${BookService.name}.${this.createItem.name}`, { item: id, path });
		}

		const { content, placeholders } = this.services.protector.replace(source, getMarkupMode(id));
		const chunks = this.services.segmenter.chunk(content);

		this.logger.debug(
			{ item: id, chunks: chunks.length, placeholders: Object.keys(placeholders).length },
			"Item prepared",
		);

		return { id, path, content, translated: null, placeholders, chunks };
	}
}
