import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, extname, join, relative, resolve, sep } from "node:path";

import { load } from "cheerio";
import JSZip from "jszip";
import prettyBytes from "pretty-bytes";

import type { MarkupMode } from "@/services/protector";

import { ApplicationError, ErrorCode, extractErrorMessage, mapError } from "@/errors";
import { errorMessages, logger } from "@/utils";

import {
	CONTAINER_FILE_NAME,
	CONTAINER_PATH,
	DC_LANGUAGE_REGEX,
	DEFAULT_MIMETYPE,
	HTML_EXTENSIONS,
	META_INF_DIRECTORY,
	METADATA_CLOSE_TAG,
	MIMETYPE_FILE_NAME,
	TRANSLATABLE_EXTENSIONS,
} from "./archive.constants";

/** Result of {@link ArchiveService.package} */
export interface PackageResult {
	outputPath: string;

	/** Size of the written archive in bytes */
	size: number;

	/** Number of file entries written */
	entries: number;
}

/**
 * Reads and writes EPUB containers on disk.
 *
 * Extraction and packaging are plain I/O; the archive layout itself is never
 * interpreted beyond the package document's language.
 */
export class ArchiveService {
	private readonly logger = logger.child({ component: ArchiveService.name });

	/**
	 * Extracts every file entry of an archive.
	 *
	 * Files already in `extractPath` are overwritten: a book is only extracted when
	 * no snapshot describes it, and documents written by an earlier run would then be
	 * parsed as source text.
	 *
	 * @param archivePath Source archive
	 * @param extractPath Target directory
	 *
	 * @returns Archive-relative POSIX paths of all file entries, sorted
	 *
	 * @throws {ApplicationError} with {@link ErrorCode.ResourceLoadError} if the archive is missing or not a zip
	 * @throws {ApplicationError} with {@link ErrorCode.ArchiveError} if an entry points outside `extractPath`
	 */
	public async extract(archivePath: string, extractPath: string): Promise<string[]> {
		const zip = await this.open(archivePath);
		const root = resolve(extractPath);
		const entries = Object.values(zip.files).filter((entry) => !entry.dir);

		for (const entry of entries) {
			const target = resolve(root, entry.name);

			if (!target.startsWith(`${root}${sep}`)) {
				throw new ApplicationError(
					`Archive entry escapes the extraction directory: ${entry.name}`,
					ErrorCode.ArchiveError,
					`${ArchiveService.name}.${this.extract.name}`,
					{ archivePath, entry: entry.name },
				);
			}

			await mkdir(dirname(target), { recursive: true });
			await writeFile(target, await entry.async("nodebuffer"));
		}

		this.logger.info(
			{ archivePath, extractPath: root, entries: entries.length },
			"Archive extracted",
		);

		return entries.map((entry) => entry.name).sort();
	}

	/**
	 * Keeps the entries handed to the translation pipeline.
	 *
	 * @param entries Archive-relative paths
	 */
	public discoverTranslatableFiles(entries: readonly string[]): string[] {
		return entries.filter(isTranslatablePath);
	}

	/**
	 * Writes the target locale into `<dc:language>` of the package document.
	 *
	 * The package document is located through `META-INF/container.xml`, falling
	 * back to the first `.opf` file of the tree.
	 *
	 * @param extractPath Extracted book directory
	 * @param locale Locale code to write
	 *
	 * @returns Path of the updated package document, `null` if none was found
	 */
	public async setPackageLanguage(extractPath: string, locale: string): Promise<string | null> {
		const packagePath = await this.findPackageDocument(extractPath);

		if (!packagePath) {
			this.logger.warn({ extractPath }, "No package document found, language left unchanged");

			return null;
		}

		const document = await readFile(packagePath, "utf8");
		const languageElement = `<dc:language>${locale}</dc:language>`;
		let updated: string;

		if (DC_LANGUAGE_REGEX.test(document)) {
			updated = document.replace(DC_LANGUAGE_REGEX, languageElement);
		} else if (document.includes(METADATA_CLOSE_TAG)) {
			updated = document.replace(METADATA_CLOSE_TAG, `${languageElement}\n${METADATA_CLOSE_TAG}`);
		} else {
			this.logger.warn({ packagePath }, "Package document has no metadata section");

			return null;
		}

		await writeFile(packagePath, updated, "utf8");

		this.logger.info({ packagePath, locale }, "Package language set");

		return packagePath;
	}

	/**
	 * Zips a directory into an EPUB container.
	 *
	 * The `mimetype` entry comes first and is stored uncompressed; every other file
	 * is deflated under its path relative to `sourcePath`.
	 *
	 * @param sourcePath Directory to package
	 * @param outputPath Archive to write
	 */
	public async package(sourcePath: string, outputPath: string): Promise<PackageResult> {
		const operation = `${ArchiveService.name}.${this.package.name}`;

		try {
			const files = await listFiles(sourcePath);
			const zip = new JSZip();

			const mimetypePath = join(sourcePath, MIMETYPE_FILE_NAME);
			const mimetype =
				files.includes(mimetypePath) ? await readFile(mimetypePath) : Buffer.from(DEFAULT_MIMETYPE);
			zip.file(MIMETYPE_FILE_NAME, mimetype, { compression: "STORE" });

			for (const file of files) {
				if (file === mimetypePath) continue;

				const entryName = relative(sourcePath, file).split(sep).join("/");
				zip.file(entryName, await readFile(file), { compression: "DEFLATE" });
			}

			const archive = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
			await mkdir(dirname(outputPath), { recursive: true });
			await writeFile(outputPath, archive);

			this.logger.info(
				{ outputPath, size: prettyBytes(archive.length), entries: files.length },
				"Archive packaged",
			);

			return { outputPath, size: archive.length, entries: files.length };
		} catch (error) {
			throw mapError(error, operation, { sourcePath, outputPath });
		}
	}

	private async open(archivePath: string): Promise<JSZip> {
		const operation = `${ArchiveService.name}.${this.open.name}`;
		let data: Buffer;

		try {
			data = await readFile(archivePath);
		} catch (error) {
			throw new ApplicationError(
				errorMessages.archiveNotFound(archivePath),
				ErrorCode.ResourceLoadError,
				operation,
				{ archivePath, reason: extractErrorMessage(error) },
			);
		}

		try {
			return await JSZip.loadAsync(data);
		} catch (error) {
			throw new ApplicationError(
				errorMessages.archiveUnreadable(archivePath),
				ErrorCode.ResourceLoadError,
				operation,
				{ archivePath, reason: extractErrorMessage(error) },
			);
		}
	}

	private async findPackageDocument(extractPath: string): Promise<string | null> {
		const containerPath = join(extractPath, CONTAINER_PATH);

		if (await exists(containerPath)) {
			const $ = load(await readFile(containerPath, "utf8"), { xml: true });
			const fullPath = $("rootfile").first().attr("full-path");

			if (fullPath) {
				const packagePath = join(extractPath, fullPath);
				if (await exists(packagePath)) return packagePath;

				this.logger.warn({ fullPath }, "Package document named in container not found");
			}
		}

		const files = await listFiles(extractPath);

		return files.find((file) => extname(file).toLowerCase() === ".opf") ?? null;
	}
}

/**
 * Tells whether an archive entry is a translatable document.
 *
 * @param entryPath Archive-relative POSIX path
 */
export function isTranslatablePath(entryPath: string): boolean {
	const segments = entryPath.split("/");
	const fileName = segments.at(-1) ?? "";

	if (segments.includes(META_INF_DIRECTORY) || fileName === CONTAINER_FILE_NAME) return false;

	return TRANSLATABLE_EXTENSIONS.has(getExtension(fileName));
}

/**
 * Parser mode for a document, by extension.
 *
 * @param entryPath Path of the document
 */
export function getMarkupMode(entryPath: string): MarkupMode {
	return HTML_EXTENSIONS.has(getExtension(entryPath)) ? "html" : "xml";
}

function getExtension(path: string): string {
	return extname(path).slice(1).toLowerCase();
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);

		return true;
	} catch {
		return false;
	}
}

/** Lists every file below a directory, depth-first in name order */
async function listFiles(directory: string): Promise<string[]> {
	const entries = await readdir(directory, { withFileTypes: true });
	const files: string[] = [];

	for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
		const path = join(directory, entry.name);

		if (entry.isDirectory()) {
			files.push(...(await listFiles(path)));
		} else if (entry.isFile()) {
			files.push(path);
		}
	}

	return files;
}
