import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { ProtectorService } from "@/services/protector";
import { ReassemblerService } from "@/services/reassembler";

import {
	createChunkFixture,
	createItemFixture,
	createTempDirectory,
	removeTempDirectory,
} from "@tests/fixtures";

describe("ReassemblerService", () => {
	let reassembler: ReassemblerService;
	let protector: ProtectorService;

	beforeEach(() => {
		protector = new ProtectorService({ placeholderLength: 6 });
		reassembler = new ReassemblerService(protector);
	});

	describe("merge", () => {
		test("should return an empty string when there are no chunks", () => {
			expect(reassembler.merge([], "zh")).toBe("");
		});

		test("should join translations by sequence number, not by list order", () => {
			const chunks = [
				createChunkFixture({ sequence: 3, translated: "C" }),
				createChunkFixture({ sequence: 1, translated: "A" }),
				createChunkFixture({ sequence: 2, translated: "B" }),
			];

			expect(reassembler.merge(chunks, "zh")).toBe("ABC");
		});

		test("should merge a chunk without translation as empty text", () => {
			const chunks = [
				createChunkFixture({ sequence: 1, translated: "A" }),
				createChunkFixture({ sequence: 2, translated: null }),
				createChunkFixture({ sequence: 3, translated: "C" }),
			];

			expect(reassembler.merge(chunks, "zh")).toBe("AC");
		});

		test("should rewrite lang and xml:lang of the merged document", () => {
			const chunks = [
				createChunkFixture({
					sequence: 1,
					translated: '<html xmlns="http://www.w3.org/1999/xhtml" lang="en" xml:lang="en">',
				}),
				createChunkFixture({ sequence: 2, translated: "<p>你好</p>" }),
			];

			expect(reassembler.merge(chunks, "zh")).toBe(
				'<html xmlns="http://www.w3.org/1999/xhtml" lang="zh" xml:lang="zh"><p>你好</p>',
			);
		});
	});

	describe("rewriteLocale", () => {
		test("should keep the quote style and drop the region", () => {
			expect(reassembler.rewriteLocale(`<html lang='en_GB' xml:lang = "en-US">`, "ja")).toBe(
				`<html lang='ja' xml:lang = "ja">`,
			);
		});

		test("should leave other locales and attributes untouched", () => {
			const content = '<p lang="fr">a</p><p lang="eng">b</p><p data-lang="en">c</p>';

			expect(reassembler.rewriteLocale(content, "zh")).toBe(content);
		});
	});

	describe("restoreItem", () => {
		let directory: string;

		beforeEach(async () => {
			directory = await createTempDirectory();
		});

		afterEach(async () => {
			await removeTempDirectory(directory);
		});

		test("should restore placeholders and write the item file", async () => {
			const item = createItemFixture({
				path: join(directory, "ch01.xhtml"),
				placeholders: { "##abc123##": "<code>x</code>" },
				chunks: [
					createChunkFixture({ sequence: 1, translated: '<p lang="en">你好 ##abc123##</p>' }),
				],
			});

			const written = await reassembler.restoreItem(item, "zh");

			expect(written).toBe(true);
			expect(item.translated).toBe('<p lang="zh">你好 <code>x</code></p>');
			expect(await readFile(item.path, "utf8")).toBe('<p lang="zh">你好 <code>x</code></p>');
		});

		test("should write nothing when no chunk has a translation", async () => {
			const item = createItemFixture({
				path: join(directory, "ch01.xhtml"),
				chunks: [createChunkFixture({ translated: null })],
			});

			const written = await reassembler.restoreItem(item, "zh");

			expect(written).toBe(false);
			expect(item.translated).toBeNull();
			await expect(readFile(item.path, "utf8")).rejects.toThrow();
		});
	});
});
