import { access, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { ArchiveService } from "@/services/archive";
import { BookService, ChunkStatus, SnapshotService } from "@/services/book";
import { ProtectorService } from "@/services/protector";
import { SegmenterService } from "@/services/segmenter";

import {
	CHAPTER_FIXTURE,
	createTempDirectory,
	removeTempDirectory,
	writeEpubFixture,
} from "@tests/fixtures";
import { createMockTokenizer } from "@tests/mocks";

describe("BookService", () => {
	let directory: string;
	let archivePath: string;
	let archive: ArchiveService;
	let snapshot: SnapshotService;
	let protector: ProtectorService;
	let bookService: BookService;

	beforeEach(async () => {
		directory = await createTempDirectory();
		archivePath = await writeEpubFixture(join(directory, "book.epub"));

		archive = new ArchiveService();
		snapshot = new SnapshotService();
		protector = new ProtectorService({ placeholderLength: 6 });
		bookService = new BookService({
			archive,
			snapshot,
			protector,
			segmenter: new SegmenterService({
				limit: 1500,
				tokenizer: createMockTokenizer(),
				placeholderLength: 6,
			}),
		});
	});

	afterEach(async () => {
		await removeTempDirectory(directory);
	});

	test("should create one item per translatable document", async () => {
		const book = await bookService.parse(archivePath);

		expect(book.name).toBe("book");
		expect(book.path).toBe(archivePath);
		expect(book.extractPath).toBe(join(directory, "temp", "book"));
		expect(book.items.map(({ id }) => id)).toEqual(["OEBPS/ch01.xhtml", "OEBPS/toc.ncx"]);
		expect(book.items[0]?.path).toBe(join(directory, "temp", "book", "OEBPS", "ch01.xhtml"));
	});

	test("should protect non-translatable markup of each item", async () => {
		const book = await bookService.parse(archivePath);

		expect(Object.values(book.items[0]?.placeholders ?? {})).toEqual([
			'<link rel="stylesheet" href="style.css"/>',
			"<code>npm test</code>",
			"<pre>const answer = 42;</pre>",
		]);
		expect(Object.values(book.items[1]?.placeholders ?? {})).toEqual([
			'<content src="ch01.xhtml"/>',
		]);
	});

	test("should segment each item into pending chunks", async () => {
		const book = await bookService.parse(archivePath);
		const [chapter] = book.items;

		expect(chapter?.chunks).toHaveLength(1);
		expect(chapter?.chunks[0]?.status).toBe(ChunkStatus.Pending);
		expect(chapter?.chunks.map(({ original }) => original).join("")).toBe(chapter?.content);
	});

	test("should save a snapshot beside the archive", async () => {
		await bookService.parse(archivePath);

		await expect(access(join(directory, "book.json"))).resolves.toBeUndefined();
	});

	test("should resume from the snapshot without extracting again", async () => {
		const first = await bookService.parse(archivePath);
		const chunk = first.items[0]?.chunks[0];
		if (chunk) chunk.status = ChunkStatus.Completed;
		await snapshot.save(first);

		const extract = vi.spyOn(archive, "extract");
		const resumed = await bookService.parse(archivePath);

		expect(extract).not.toHaveBeenCalled();
		expect(resumed.items[0]?.chunks[0]?.status).toBe(ChunkStatus.Completed);
	});

	test("should parse the archive sources again when the snapshot is corrupted", async () => {
		const first = await bookService.parse(archivePath);
		const chapter = first.items[0];
		if (chapter) await writeFile(chapter.path, "[TRANSLATED] <p>stale output</p>");
		await writeFile(join(directory, "book.json"), "{ truncated");

		const reparsed = await bookService.parse(archivePath);
		const [item] = reparsed.items;

		expect(item?.chunks[0]?.original.startsWith("<?xml")).toBe(true);
		expect(protector.restore(item?.content ?? "", item?.placeholders ?? {})).toBe(CHAPTER_FIXTURE);
	});
});
