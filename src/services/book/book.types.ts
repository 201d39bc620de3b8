import type { PlaceholderMap } from "@/services/protector";

/** Lifecycle of a chunk; `completed`, `failed` and `skipped` end a run for the chunk */
export enum ChunkStatus {
	Pending = "pending",
	InProgress = "in_progress",
	Translated = "translated",
	Failed = "failed",
	Skipped = "skipped",
	Completed = "completed",
}

/** One token-bounded segment of an item's protected content */
export interface Chunk {
	/** 1-based position within the item, assigned once by the segmenter */
	sequence: number;

	/** Protected source text of the segment */
	original: string;

	/** Translated text, `null` until a translation was accepted */
	translated: string | null;

	/** Token count of `original` at segmentation time */
	tokens: number;

	status: ChunkStatus;

	/** Reason of the last failure, `null` unless `status` is `failed` */
	error: string | null;
}

/** One translatable document of the archive */
export interface Item {
	/** Archive-relative POSIX path, e.g. `OEBPS/ch01.xhtml` */
	id: string;

	/** Absolute path of the extracted file the translation is written to */
	path: string;

	/** Protected content the chunks were cut from */
	content: string;

	/** Restored translation once written, `null` before */
	translated: string | null;

	placeholders: PlaceholderMap;

	chunks: Chunk[];
}

/** Aggregate root persisted as the resume snapshot */
export interface Book {
	/** File name of the source archive without extension */
	name: string;

	/** Absolute path of the source archive */
	path: string;

	/** Directory the archive was extracted into */
	extractPath: string;

	items: Item[];
}
