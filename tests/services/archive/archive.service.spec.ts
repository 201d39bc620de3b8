import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { ApplicationError, ErrorCode } from "@/errors";
import { ArchiveService, getMarkupMode, isTranslatablePath } from "@/services/archive";

import {
	CHAPTER_FIXTURE,
	createTempDirectory,
	EPUB_FIXTURE_FILES,
	OPF_FIXTURE,
	removeTempDirectory,
	writeEpubFixture,
} from "@tests/fixtures";

describe("ArchiveService", () => {
	let archive: ArchiveService;
	let directory: string;

	beforeEach(async () => {
		archive = new ArchiveService();
		directory = await createTempDirectory();
	});

	afterEach(async () => {
		await removeTempDirectory(directory);
	});

	describe("extract", () => {
		test("should write every file entry and return the sorted names", async () => {
			const archivePath = await writeEpubFixture(join(directory, "book.epub"));
			const extractPath = join(directory, "out");

			const entries = await archive.extract(archivePath, extractPath);

			expect(entries).toEqual([
				"META-INF/container.xml",
				"OEBPS/ch01.xhtml",
				"OEBPS/content.opf",
				"OEBPS/style.css",
				"OEBPS/toc.ncx",
				"mimetype",
			]);
			expect(await readFile(join(extractPath, "OEBPS", "content.opf"), "utf8")).toBe(OPF_FIXTURE);
		});

		test("should overwrite files left in the target directory by an earlier run", async () => {
			const archivePath = await writeEpubFixture(join(directory, "book.epub"));
			const extractPath = join(directory, "out");
			const chapterPath = join(extractPath, "OEBPS", "ch01.xhtml");

			await archive.extract(archivePath, extractPath);
			await writeFile(chapterPath, "translated");
			await archive.extract(archivePath, extractPath);

			expect(await readFile(chapterPath, "utf8")).toBe(CHAPTER_FIXTURE);
		});

		test("should throw ResourceLoadError when the archive does not exist", async () => {
			await expect(
				archive.extract(join(directory, "missing.epub"), join(directory, "out")),
			).rejects.toMatchObject({ code: ErrorCode.ResourceLoadError });
		});

		test("should throw ResourceLoadError when the file is not a zip archive", async () => {
			const archivePath = join(directory, "broken.epub");
			await writeFile(archivePath, "not a zip");

			await expect(archive.extract(archivePath, join(directory, "out"))).rejects.toBeInstanceOf(
				ApplicationError,
			);
			await expect(archive.extract(archivePath, join(directory, "out"))).rejects.toMatchObject({
				code: ErrorCode.ResourceLoadError,
			});
		});
	});

	describe("discoverTranslatableFiles", () => {
		test("should keep markup documents outside META-INF", () => {
			expect(archive.discoverTranslatableFiles(Object.keys(EPUB_FIXTURE_FILES).sort())).toEqual([
				"OEBPS/ch01.xhtml",
				"OEBPS/toc.ncx",
			]);
		});
	});

	describe("setPackageLanguage", () => {
		test("should replace the language of the package named by the container", async () => {
			const archivePath = await writeEpubFixture(join(directory, "book.epub"));
			const extractPath = join(directory, "out");
			await archive.extract(archivePath, extractPath);

			const packagePath = await archive.setPackageLanguage(extractPath, "zh");

			expect(packagePath).toBe(join(extractPath, "OEBPS", "content.opf"));
			expect(await readFile(join(extractPath, "OEBPS", "content.opf"), "utf8")).toBe(
				OPF_FIXTURE.replace("<dc:language>en</dc:language>", "<dc:language>zh</dc:language>"),
			);
		});

		test("should insert a language element when the metadata has none", async () => {
			const packagePath = join(directory, "book.opf");
			await writeFile(packagePath, "<package><metadata><dc:title>T</dc:title></metadata></package>");

			await archive.setPackageLanguage(directory, "zh");

			expect(await readFile(packagePath, "utf8")).toBe(
				"<package><metadata><dc:title>T</dc:title><dc:language>zh</dc:language>\n</metadata></package>",
			);
		});

		test("should fall back to the first package document when there is no container", async () => {
			await mkdir(join(directory, "OPS"));
			await writeFile(join(directory, "OPS", "package.opf"), OPF_FIXTURE);

			expect(await archive.setPackageLanguage(directory, "zh")).toBe(
				join(directory, "OPS", "package.opf"),
			);
		});

		test("should return null when there is no package document", async () => {
			expect(await archive.setPackageLanguage(directory, "zh")).toBeNull();
		});
	});

	describe("package", () => {
		test("should store the mimetype entry first and uncompressed", async () => {
			const archivePath = await writeEpubFixture(join(directory, "book.epub"));
			const extractPath = join(directory, "out");
			await archive.extract(archivePath, extractPath);

			const result = await archive.package(extractPath, join(directory, "book-zh.epub"));
			const bytes = await readFile(result.outputPath);

			expect(result.entries).toBe(6);
			expect(result.size).toBe(bytes.length);
			expect(bytes.readUInt16LE(8)).toBe(0);
			expect(bytes.toString("utf8", 30, 38)).toBe("mimetype");
		});

		test("should keep entry names relative to the packaged directory", async () => {
			const archivePath = await writeEpubFixture(join(directory, "book.epub"));
			const extractPath = join(directory, "out");
			await archive.extract(archivePath, extractPath);

			const result = await archive.package(extractPath, join(directory, "book-zh.epub"));
			const zip = await JSZip.loadAsync(await readFile(result.outputPath));

			expect(await zip.file("OEBPS/ch01.xhtml")?.async("string")).toBe(
				EPUB_FIXTURE_FILES["OEBPS/ch01.xhtml"],
			);
		});

		test("should write the default mimetype when the directory has none", async () => {
			const sourcePath = join(directory, "src");
			await mkdir(sourcePath);
			await writeFile(join(sourcePath, "index.xhtml"), "<html/>");

			const result = await archive.package(sourcePath, join(directory, "out", "book.epub"));
			const zip = await JSZip.loadAsync(await readFile(result.outputPath));

			expect(result.entries).toBe(1);
			expect(await zip.file("mimetype")?.async("string")).toBe("application/epub+zip");
		});
	});
});

describe("isTranslatablePath", () => {
	test.each([
		["OEBPS/ch01.xhtml", true],
		["Text/chapter.HTML", true],
		["index.htm", true],
		["toc.ncx", true],
		["OEBPS/notes.xml", true],
		["META-INF/container.xml", false],
		["META-INF/encryption.xml", false],
		["container.xml", false],
		["OEBPS/content.opf", false],
		["OEBPS/style.css", false],
		["mimetype", false],
	])("should return %s -> %s", (entryPath, expected) => {
		expect(isTranslatablePath(entryPath)).toBe(expected);
	});
});

describe("getMarkupMode", () => {
	test("should parse html and htm documents leniently", () => {
		expect(getMarkupMode("a/index.html")).toBe("html");
		expect(getMarkupMode("a/index.HTM")).toBe("html");
	});

	test("should parse every other document as xml", () => {
		expect(getMarkupMode("a/ch01.xhtml")).toBe("xml");
		expect(getMarkupMode("toc.ncx")).toBe("xml");
	});
});
