import { readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { ChunkStatus, SnapshotService } from "@/services/book";

import {
	createBookFixture,
	createChunkFixture,
	createItemFixture,
	createTempDirectory,
	removeTempDirectory,
} from "@tests/fixtures";

describe("SnapshotService", () => {
	let snapshot: SnapshotService;
	let directory: string;

	beforeEach(async () => {
		snapshot = new SnapshotService();
		directory = await createTempDirectory();
	});

	afterEach(async () => {
		await removeTempDirectory(directory);
	});

	test("should place the snapshot beside the archive", () => {
		expect(snapshot.getSnapshotPath({ name: "novel", path: "/books/novel.epub" })).toBe(
			"/books/novel.json",
		);
	});

	test("should reload a saved book unchanged", async () => {
		const book = createBookFixture({
			path: join(directory, "book.epub"),
			items: [
				createItemFixture({
					placeholders: { "##abc123##": "<code>x</code>" },
					chunks: [
						createChunkFixture({ sequence: 1, status: ChunkStatus.Completed, translated: "你好" }),
						createChunkFixture({ sequence: 2, status: ChunkStatus.Failed, error: "timeout" }),
					],
				}),
			],
		});

		const snapshotPath = await snapshot.save(book);

		expect(snapshotPath).toBe(join(directory, "book.json"));
		expect(await snapshot.load(snapshotPath)).toEqual(book);
	});

	test("should leave no temporary file after saving", async () => {
		await snapshot.save(createBookFixture({ path: join(directory, "book.epub") }));

		expect(await readdir(directory)).toEqual(["book.json"]);
	});

	test("should publish a complete snapshot when two saves overlap", async () => {
		const path = join(directory, "book.epub");
		const pending = createBookFixture({ path });
		const completed = createBookFixture({
			path,
			items: [
				createItemFixture({
					chunks: [createChunkFixture({ status: ChunkStatus.Completed, translated: "你好" })],
				}),
			],
		});

		await expect(Promise.all([snapshot.save(pending), snapshot.save(completed)])).resolves.toEqual([
			join(directory, "book.json"),
			join(directory, "book.json"),
		]);

		expect(await readdir(directory)).toEqual(["book.json"]);
		expect([pending, completed]).toContainEqual(await snapshot.load(join(directory, "book.json")));
	});

	test("should return null when the snapshot does not exist", async () => {
		expect(await snapshot.load(join(directory, "missing.json"))).toBeNull();
	});

	test("should return null when the snapshot is not valid JSON", async () => {
		const snapshotPath = join(directory, "book.json");
		await writeFile(snapshotPath, "{ not json");

		expect(await snapshot.load(snapshotPath)).toBeNull();
	});

	test("should return null when the snapshot does not match the book shape", async () => {
		const snapshotPath = join(directory, "book.json");
		await writeFile(snapshotPath, JSON.stringify({ name: 1, items: [] }));

		expect(await snapshot.load(snapshotPath)).toBeNull();
	});
});
