import { randomUUID } from "node:crypto";
import { readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { Book } from "./book.types";

import { ApplicationError, ErrorCode, extractErrorMessage, mapError } from "@/errors";
import { errorMessages, logger } from "@/utils";

import { bookSchema } from "./book.schema";

/**
 * Persists a {@link Book} as one JSON file beside its source archive.
 *
 * Saves go through a temporary file and a rename, so an interrupted save leaves
 * the previous snapshot intact. Each save has its own temporary file, so saves
 * that overlap (a signal handler racing the pipeline) never share one.
 */
export class SnapshotService {
	private readonly logger = logger.child({ component: SnapshotService.name });

	/**
	 * Path of the snapshot belonging to a book: `<archive dir>/<book name>.json`.
	 *
	 * @param book Book or the fields locating it
	 */
	public getSnapshotPath(book: Pick<Book, "name" | "path">): string {
		return join(dirname(book.path), `${book.name}.json`);
	}

	/**
	 * Reads and validates a snapshot.
	 *
	 * @param snapshotPath Snapshot file to read
	 *
	 * @returns The stored book, or `null` if the file is missing, unreadable or invalid
	 */
	public async load(snapshotPath: string): Promise<Book | null> {
		let raw: string;

		try {
			raw = await readFile(snapshotPath, "utf8");
		} catch (error) {
			this.logger.debug({ snapshotPath, error: extractErrorMessage(error) }, "No snapshot found");

			return null;
		}

		try {
			const book = bookSchema.parse(JSON.parse(raw));

			this.logger.info({ snapshotPath, items: book.items.length }, "Snapshot loaded");

			return book;
		} catch (error) {
			const snapshotError = new ApplicationError(
				errorMessages.snapshotLoadFailed,
				ErrorCode.SnapshotCorrupted,
				`${SnapshotService.name}.${this.load.name}`,
				{ snapshotPath, reason: extractErrorMessage(error) },
			);

			this.logger.warn({ error: snapshotError }, "Ignoring unreadable snapshot, book will be re-parsed");

			return null;
		}
	}

	/**
	 * Writes the whole book to its snapshot path.
	 *
	 * @param book Book to persist
	 *
	 * @returns The snapshot path
	 *
	 * @throws {ApplicationError} if the file cannot be written
	 */
	public async save(book: Book): Promise<string> {
		const snapshotPath = this.getSnapshotPath(book);
		const temporaryPath = `${snapshotPath}.${randomUUID()}.tmp`;

		try {
			await writeFile(temporaryPath, JSON.stringify(book, null, 2), "utf8");
			await rename(temporaryPath, snapshotPath);
		} catch (error) {
			throw mapError(error, `${SnapshotService.name}.${this.save.name}`, {
				snapshotPath,
				reason: errorMessages.snapshotSaveFailed,
			});
		}

		this.logger.debug({ snapshotPath }, "Snapshot saved");

		return snapshotPath;
	}
}
