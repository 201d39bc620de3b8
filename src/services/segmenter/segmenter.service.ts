import type { Chunk } from "@/services/book/book.types";
import type { Tokenizer } from "@/services/tokenizer";

import { ApplicationError, ErrorCode } from "@/errors";
import { ChunkStatus } from "@/services/book/book.types";
import { createPlaceholderRegex, PLACEHOLDER_DELIMITER } from "@/services/protector";
import { logger } from "@/utils";

import { SPLIT_TAG_REGEX } from "./segmenter.constants";

export interface SegmenterOptions {
	/** Token budget of one chunk */
	limit: number;

	tokenizer: Tokenizer;

	/** Random characters between the delimiters of a placeholder token; no token is ever cut */
	placeholderLength: number;
}

/**
 * Splits protected markup into ordered chunks that fit a token budget.
 *
 * Chunks end on the last block-level closing tag that fits, or on a raw character
 * boundary when no such tag exists. A raw boundary never falls inside a placeholder
 * token or a surrogate pair. Joining the originals of the returned chunks
 * reproduces the input.
 *
 * @example
 * ```typescript
 * const segmenter = new SegmenterService({ limit: 1500, tokenizer, placeholderLength: 6 });
 * const chunks = segmenter.chunk(item.content);
 * ```
 */
export class SegmenterService {
	private readonly logger = logger.child({ component: SegmenterService.name });

	private readonly limit: number;
	private readonly tokenizer: Tokenizer;
	private readonly placeholderRegex: RegExp;
	private readonly tokenLength: number;

	/** @throws {ApplicationError} with {@link ErrorCode.InvalidConfiguration} if `limit` is not a positive integer */
	constructor(options: SegmenterOptions) {
		if (!Number.isInteger(options.limit) || options.limit <= 0) {
			throw new ApplicationError(
				`Chunk token limit must be a positive integer, got ${options.limit}`,
				ErrorCode.InvalidConfiguration,
				`${SegmenterService.name}.constructor`,
				{ limit: options.limit },
			);
		}

		this.limit = options.limit;
		this.tokenizer = options.tokenizer;
		this.placeholderRegex = createPlaceholderRegex(options.placeholderLength);
		this.tokenLength = options.placeholderLength + PLACEHOLDER_DELIMITER.length * 2;
	}

	/**
	 * Cuts content into pending chunks numbered from 1.
	 *
	 * Whitespace-only spans produce no chunk. A single character above the budget
	 * becomes a chunk of its own.
	 *
	 * @param content Protected markup
	 */
	public chunk(content: string): Chunk[] {
		const chunks: Chunk[] = [];
		let position = 0;

		while (position < content.length) {
			const end = this.findSplitPoint(content, position);
			const original = content.slice(position, end);

			if (original.trim()) {
				chunks.push({
					sequence: chunks.length + 1,
					original,
					translated: null,
					tokens: this.tokenizer.countTokens(original),
					status: ChunkStatus.Pending,
					error: null,
				});
			} else {
				this.logger.debug({ start: position, end }, "Dropped blank span");
			}

			position = end;
		}

		this.logger.debug(
			{ length: content.length, chunks: chunks.length, limit: this.limit },
			"Content segmented",
		);

		return chunks;
	}

	/**
	 * Finds where the chunk starting at `position` ends.
	 *
	 * A remainder that fits the budget is taken whole. The result is always past
	 * `position`.
	 */
	private findSplitPoint(content: string, position: number): number {
		const length = this.findMaxLength(content, position);
		if (length === 0) return this.adjustRawSplit(content, position, position + 1);

		const windowEnd = position + length;
		if (windowEnd === content.length) return windowEnd;

		let lastTagEnd = 0;
		for (const match of content.slice(position, windowEnd).matchAll(SPLIT_TAG_REGEX)) {
			lastTagEnd = (match.index ?? 0) + match[0].length;
		}

		return lastTagEnd > 0 ? position + lastTagEnd : this.adjustRawSplit(content, position, windowEnd);
	}

	/**
	 * Moves a raw split off a placeholder token or a surrogate pair.
	 *
	 * The split goes back to the start of the straddled unit, or past its end when
	 * the unit starts the chunk.
	 */
	private adjustRawSplit(content: string, position: number, split: number): number {
		const token = this.findStraddlingToken(content, split);
		if (token) return token.start > position ? token.start : token.end;

		if (isSurrogatePairSplit(content, split)) return split - 1 > position ? split - 1 : split + 1;

		return split;
	}

	private findStraddlingToken(
		content: string,
		split: number,
	): { start: number; end: number } | null {
		const from = Math.max(0, split - this.tokenLength + 1);
		const to = split + this.tokenLength - 1;

		for (const match of content.slice(from, to).matchAll(this.placeholderRegex)) {
			const start = from + (match.index ?? 0);
			const end = start + match[0].length;

			if (start < split && end > split) return { start, end };
			if (start >= split) break;
		}

		return null;
	}

	/** Binary-searches the longest slice from `position` whose token count fits the budget */
	private findMaxLength(content: string, position: number): number {
		let low = 0;
		let high = content.length - position;

		while (low < high) {
			const middle = Math.ceil((low + high) / 2);

			if (this.tokenizer.countTokens(content.slice(position, position + middle)) <= this.limit) {
				low = middle;
			} else {
				high = middle - 1;
			}
		}

		return low;
	}
}

function isSurrogatePairSplit(content: string, split: number): boolean {
	const high = content.charCodeAt(split - 1);
	const low = content.charCodeAt(split);

	return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}
