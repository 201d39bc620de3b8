import type { ArchiveService } from "@/services/archive";
import type { ChunkStatus } from "@/services/book/book.types";
import type { SnapshotService } from "@/services/book/snapshot.service";
import type { ReassemblerService } from "@/services/reassembler";
import type { Translator } from "@/services/translator";

/** Dependency injection interface for the orchestrator */
export interface OrchestratorDependencies {
	translator: Translator;
	reassembler: ReassemblerService;
	snapshot: SnapshotService;
	archive: ArchiveService;
}

/** Configuration options for a run */
export interface OrchestratorOptions {
	/** Locale written into documents and the package metadata */
	targetLocale: string;

	/** Suffix of the output archive, `<book>-<suffix>.epub` */
	outputSuffix: string;

	/** Maximum chunks translated at the same time; `1` keeps dispatch sequential */
	concurrency: number;

	/** Random characters inside a placeholder token */
	placeholderLength: number;

	/** Called before each item is processed */
	onProgress?: (progress: ItemProgress) => void;
}

/** Position of the item being processed */
export interface ItemProgress {
	/** Archive-relative path of the item */
	item: string;

	/** 1-based index of the item */
	index: number;

	total: number;
}

/** Summary of a finished run */
export interface OrchestratorStatistics {
	items: number;

	totalChunks: number;

	/** Chunk counts by final status */
	chunks: Record<ChunkStatus, number>;

	/** Share of chunks that ended `completed` or `skipped` */
	successRate: number;

	/** Path of the packaged archive */
	outputPath: string;

	/** Human-readable run duration */
	elapsedTime: string;
}
