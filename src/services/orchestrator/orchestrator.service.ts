import { dirname, join } from "node:path";

import PQueue from "p-queue";

import type { Logger } from "pino";

import type { Book, Chunk, Item } from "@/services/book/book.types";
import type { Corrections } from "@/services/translator";

import { extractErrorMessage } from "@/errors";
import { OUTPUT_EXTENSION } from "@/services/archive";
import { ChunkStatus } from "@/services/book/book.types";
import { PlaceholderValidatorManager } from "@/services/translator/managers";
import { containsCjkScript, formatElapsedTime, logger } from "@/utils";

import type {
	OrchestratorDependencies,
	OrchestratorOptions,
	OrchestratorStatistics,
} from "./orchestrator.types";

/**
 * Drives a book through translation, item by item.
 *
 * ### Chunk workflow
 *
 * 1. Skip chunks that are `completed` or already hold a CJK translation
 * 2. Translate and check the placeholder set (`translated`)
 * 3. Proofread, apply corrections and check again (`completed`)
 *
 * Any failure marks the chunk `failed` and the run goes on. After each item the
 * document is written and the snapshot saved, so an interrupted run resumes from
 * the last finished item.
 */
export class OrchestratorService {
	private readonly logger = logger.child({ component: OrchestratorService.name });

	private readonly placeholderValidator: PlaceholderValidatorManager;

	constructor(
		private readonly services: OrchestratorDependencies,
		private readonly options: OrchestratorOptions,
	) {
		this.placeholderValidator = new PlaceholderValidatorManager(options.placeholderLength);
	}

	/**
	 * Translates every pending chunk, writes the documents and packages the result.
	 *
	 * @param book Parsed or resumed book
	 *
	 * @throws {ApplicationError} if a document, the snapshot or the output archive cannot be written
	 */
	public async run(book: Book): Promise<OrchestratorStatistics> {
		const startTime = Date.now();
		const queue = new PQueue({ concurrency: this.options.concurrency });

		this.logger.info(
			{ book: book.name, items: book.items.length, translator: this.services.translator.kind },
			"Starting translation run",
		);

		for (const [index, item] of book.items.entries()) {
			this.options.onProgress?.({ item: item.id, index: index + 1, total: book.items.length });

			await this.processItem(item, queue);
			await this.services.reassembler.restoreItem(item, this.options.targetLocale);
			await this.services.snapshot.save(book);
		}

		await this.services.archive.setPackageLanguage(book.extractPath, this.options.targetLocale);

		const outputPath = join(
			dirname(book.path),
			`${book.name}-${this.options.outputSuffix}${OUTPUT_EXTENSION}`,
		);
		await this.services.archive.package(book.extractPath, outputPath);

		return this.collectStatistics(book, outputPath, startTime);
	}

	/**
	 * Processes all chunks of an item through the shared concurrency gate.
	 *
	 * Completion order does not matter: the chunks keep their sequence numbers.
	 */
	public async processItem(item: Item, queue: PQueue): Promise<void> {
		const itemLogger = this.logger.child({ item: item.id });

		await Promise.all(
			item.chunks.map((chunk) => queue.add(() => this.processChunk(chunk, itemLogger))),
		);

		itemLogger.info(
			{
				chunks: item.chunks.length,
				failed: item.chunks.filter((chunk) => chunk.status === ChunkStatus.Failed).length,
			},
			"Item processed",
		);
	}

	/**
	 * Runs one chunk through the workflow. Never throws.
	 *
	 * @param chunk Chunk to process, mutated in place
	 * @param chunkLogger Logger carrying the item context
	 */
	public async processChunk(chunk: Chunk, chunkLogger: Logger = this.logger): Promise<void> {
		if (this.shouldSkip(chunk)) {
			if (chunk.status !== ChunkStatus.Completed) chunk.status = ChunkStatus.Skipped;
			chunkLogger.debug({ sequence: chunk.sequence, status: chunk.status }, "Chunk skipped");

			return;
		}

		const doNotTranslate = this.placeholderValidator.extract(chunk.original);

		try {
			let translated = chunk.status === ChunkStatus.Translated ? chunk.translated : null;

			if (!translated) {
				chunk.status = ChunkStatus.InProgress;
				chunk.error = null;

				translated = await this.services.translator.translate(chunk.original, doNotTranslate);
				this.placeholderValidator.validate(chunk.original, translated);

				chunk.translated = translated;
				chunk.status = ChunkStatus.Translated;
			}

			const corrections = await this.services.translator.proofread(translated, doNotTranslate);
			const corrected = applyCorrections(translated, corrections);
			this.placeholderValidator.validate(chunk.original, corrected);

			chunk.translated = corrected;
			chunk.status = ChunkStatus.Completed;
			chunk.error = null;

			chunkLogger.debug(
				{ sequence: chunk.sequence, corrections: Object.keys(corrections).length },
				"Chunk completed",
			);
		} catch (error) {
			chunk.status = ChunkStatus.Failed;
			chunk.error = extractErrorMessage(error);

			chunkLogger.error({ sequence: chunk.sequence, error }, "Chunk translation failed");
		}
	}

	/**
	 * Tells whether a chunk needs no translation call.
	 *
	 * The CJK check recognizes translations of runs whose status was lost; it only
	 * holds for CJK target languages.
	 */
	public shouldSkip(chunk: Chunk): boolean {
		if (chunk.status === ChunkStatus.Completed) return true;

		return !!chunk.translated && containsCjkScript(chunk.translated);
	}

	private collectStatistics(
		book: Book,
		outputPath: string,
		startTime: number,
	): OrchestratorStatistics {
		const chunks: Record<ChunkStatus, number> = {
			[ChunkStatus.Pending]: 0,
			[ChunkStatus.InProgress]: 0,
			[ChunkStatus.Translated]: 0,
			[ChunkStatus.Failed]: 0,
			[ChunkStatus.Skipped]: 0,
			[ChunkStatus.Completed]: 0,
		};

		for (const chunk of book.items.flatMap((item) => item.chunks)) {
			chunks[chunk.status]++;
		}

		const totalChunks = Object.values(chunks).reduce((total, count) => total + count, 0);
		const successful = chunks[ChunkStatus.Completed] + chunks[ChunkStatus.Skipped];

		const statistics: OrchestratorStatistics = {
			items: book.items.length,
			totalChunks,
			chunks,
			successRate: totalChunks > 0 ? successful / totalChunks : 1,
			outputPath,
			elapsedTime: formatElapsedTime(Date.now() - startTime),
		};

		if (chunks[ChunkStatus.Failed] > 0) {
			this.logger.warn(
				{
					failures: book.items.flatMap((item) =>
						item.chunks
							.filter((chunk) => chunk.status === ChunkStatus.Failed)
							.map((chunk) => ({ item: item.id, sequence: chunk.sequence, error: chunk.error })),
					),
				},
				`Failed chunks (${chunks[ChunkStatus.Failed]})`,
			);
		}

		this.logger.info(statistics, "Final statistics");

		return statistics;
	}
}

/**
 * Replaces every occurrence of each wrong phrase with its correction.
 *
 * @param text Translated text
 * @param corrections Wrong phrase to corrected phrase
 */
export function applyCorrections(text: string, corrections: Corrections): string {
	let corrected = text;

	for (const [phrase, replacement] of Object.entries(corrections)) {
		if (!phrase) continue;

		corrected = corrected.split(phrase).join(replacement);
	}

	return corrected;
}
