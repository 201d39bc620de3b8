import { randomInt } from "node:crypto";

import { logger } from "@/utils";

import type { MarkupMode, MarkupNode } from "./markup-tree";

import { MarkupTree } from "./markup-tree";
import {
	createPlaceholderRegex,
	IGNORED_TAG_CLASSES,
	IGNORED_TAGS,
	LEFTOVER_SAMPLE_SIZE,
	PLACEHOLDER_ALPHABET,
	PLACEHOLDER_DELIMITER,
} from "./protector.constants";

/** Token to original markup, in insertion order */
export type PlaceholderMap = Record<string, string>;

/** Result of {@link ProtectorSession.replace} */
export interface ProtectedContent {
	/** Input with every ignored subtree replaced by its token */
	content: string;

	/** Tokens issued for this call */
	placeholders: PlaceholderMap;
}

export interface ProtectorOptions {
	/** Random characters between the delimiters of a token */
	placeholderLength: number;
}

/**
 * Placeholder state for one document.
 *
 * Owns the issued tokens and their originals, so identical markup within the same
 * document reuses a token and no token is issued twice.
 */
export class ProtectorSession {
	private readonly logger = logger.child({ component: ProtectorSession.name });

	private readonly tokensByOriginal = new Map<string, string>();
	private readonly originalsByToken = new Map<string, string>();

	constructor(private readonly options: ProtectorOptions) {}

	/** Every token issued by this session so far */
	public get placeholders(): PlaceholderMap {
		return Object.fromEntries(this.originalsByToken);
	}

	/**
	 * Replaces every ignored element, descendants included, by a token.
	 *
	 * Everything outside the replaced spans is copied from the input unchanged.
	 *
	 * @param content Markup to protect
	 * @param mode Parser mode matching the document type
	 *
	 * @example
	 * ```typescript
	 * const session = new ProtectorSession({ placeholderLength: 6 });
	 * session.replace("<div><script>alert(1)</script><p>Hello</p></div>", "xml");
	 * // { content: "<div>##k3Xa9Q##<p>Hello</p></div>", placeholders: { "##k3Xa9Q##": "<script>alert(1)</script>" } }
	 * ```
	 */
	public replace(content: string, mode: MarkupMode): ProtectedContent {
		const tree = MarkupTree.parse(content, mode);
		const spans = this.collectIgnoredSpans(tree, tree.rootIds);

		if (spans.length === 0) return { content, placeholders: {} };

		const placeholders: PlaceholderMap = {};
		const parts: string[] = [];
		let cursor = 0;

		for (const span of spans) {
			const original = content.slice(span.start, span.end);
			const token = this.tokenFor(original, content);

			parts.push(content.slice(cursor, span.start), token);
			placeholders[token] = original;
			cursor = span.end;
		}

		parts.push(content.slice(cursor));

		this.logger.debug(
			{ elements: spans.length, tokens: Object.keys(placeholders).length },
			"Protected ignored elements",
		);

		return { content: parts.join(""), placeholders };
	}

	/**
	 * Walks the tree depth-first and collects the spans of ignored elements.
	 *
	 * The walk does not descend into an ignored element.
	 */
	private collectIgnoredSpans(tree: MarkupTree, ids: readonly number[]): MarkupNode[] {
		const spans: MarkupNode[] = [];

		for (const id of ids) {
			const node = tree.get(id);

			if (!node) {
				this.logger.warn({ id, size: tree.size }, "Markup node not found, skipping");
				continue;
			}

			if (isIgnored(node)) {
				spans.push(node);
				continue;
			}

			spans.push(...this.collectIgnoredSpans(tree, node.childIds));
		}

		return spans;
	}

	/**
	 * Returns the token for the given markup, issuing a new one on first sight.
	 *
	 * A new token never collides with an earlier token or with text already in
	 * the document being protected.
	 */
	private tokenFor(original: string, document: string): string {
		const existing = this.tokensByOriginal.get(original);
		if (existing) return existing;

		let token = generateToken(this.options.placeholderLength);
		while (this.originalsByToken.has(token) || document.includes(token)) {
			token = generateToken(this.options.placeholderLength);
		}

		this.tokensByOriginal.set(original, token);
		this.originalsByToken.set(token, original);

		return token;
	}
}

/**
 * Stateless entry point of the protection step.
 *
 * {@link ProtectorService.replace} opens a fresh {@link ProtectorSession} per call;
 * {@link ProtectorService.restore} needs only the map saved with the document.
 */
export class ProtectorService {
	private readonly logger = logger.child({ component: ProtectorService.name });

	constructor(private readonly options: ProtectorOptions) {}

	/** Opens a session whose tokens are unique across all of its calls */
	public createSession(): ProtectorSession {
		return new ProtectorSession(this.options);
	}

	/**
	 * Protects a single document.
	 *
	 * @param content Markup to protect
	 * @param mode Parser mode matching the document type
	 */
	public replace(content: string, mode: MarkupMode): ProtectedContent {
		return this.createSession().replace(content, mode);
	}

	/**
	 * Puts the original markup back in place of every token.
	 *
	 * Substitution is literal. Token-shaped text left afterwards is reported as a
	 * warning and kept in the output.
	 *
	 * @param content Content carrying tokens
	 * @param placeholders Map saved when the content was protected
	 */
	public restore(content: string, placeholders: PlaceholderMap): string {
		let restored = content;

		for (const [token, original] of Object.entries(placeholders)) {
			restored = restored.split(token).join(original);
		}

		const leftovers = restored.match(createPlaceholderRegex(this.options.placeholderLength)) ?? [];
		if (leftovers.length > 0) {
			this.logger.warn(
				{ count: leftovers.length, samples: leftovers.slice(0, LEFTOVER_SAMPLE_SIZE) },
				"Placeholder tokens left after restore",
			);
		}

		return restored;
	}
}

/**
 * Lists the token-shaped substrings of a text, each once, in order of appearance.
 *
 * @param text Text to scan
 * @param placeholderLength Random characters between the delimiters
 */
export function extractPlaceholders(text: string, placeholderLength: number): string[] {
	return [...new Set(text.match(createPlaceholderRegex(placeholderLength)) ?? [])];
}

function isIgnored(node: MarkupNode): boolean {
	const tagName = node.tagName.toLowerCase();
	const localName = tagName.slice(tagName.indexOf(":") + 1);

	if (IGNORED_TAGS.has(tagName) || IGNORED_TAGS.has(localName)) return true;

	return IGNORED_TAG_CLASSES.some(
		({ tag, className }) => tag === localName && node.classNames.includes(className),
	);
}

function generateToken(length: number): string {
	let token = "";

	for (let index = 0; index < length; index++) {
		token += PLACEHOLDER_ALPHABET.charAt(randomInt(PLACEHOLDER_ALPHABET.length));
	}

	return `${PLACEHOLDER_DELIMITER}${token}${PLACEHOLDER_DELIMITER}`;
}
