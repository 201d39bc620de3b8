import { load } from "cheerio";
import { isTag } from "domhandler";

import type { AnyNode } from "domhandler";

/**
 * How a document is tokenized.
 *
 * Both modes parse leniently, so an unclosed void element such as `<img src="x">`
 * stays empty. `xml` (XHTML, NCX, OPF) also honors `<tag/>` and CDATA sections.
 */
export type MarkupMode = "xml" | "html";

/** One element of a {@link MarkupTree}, addressed by its arena index */
export interface MarkupNode {
	/** Stable id assigned in document order at parse time */
	id: number;

	/** Lower-cased tag name, namespace prefix included */
	tagName: string;

	/** Values of the `class` attribute */
	classNames: string[];

	/** Id of the enclosing element, `null` for top-level elements */
	parentId: number | null;

	/** Ids of the child elements in document order */
	childIds: number[];

	/** Offset of the opening `<` in the source */
	start: number;

	/** Offset one past the closing `>` of the element in the source */
	end: number;
}

/**
 * Element tree of a markup document stored as an arena.
 *
 * Each element keeps its source offsets, so callers can address the exact source
 * slice of a subtree by id instead of re-deriving a path through the tree.
 */
export class MarkupTree {
	private readonly nodes: MarkupNode[] = [];

	/** Ids of the top-level elements */
	public readonly rootIds: number[] = [];

	private constructor(private readonly sourceLength: number) {}

	/**
	 * Parses a document into an arena of elements.
	 *
	 * Entities are not decoded and nothing is re-serialized; only offsets are kept.
	 *
	 * @param content Markup source
	 * @param mode `xml` for XHTML/XML/NCX documents, `html` for legacy HTML
	 */
	public static parse(content: string, mode: MarkupMode): MarkupTree {
		const $ = load(content, {
			xml: {
				xmlMode: false,
				recognizeSelfClosing: mode === "xml",
				recognizeCDATA: mode === "xml",
				decodeEntities: false,
				withStartIndices: true,
				withEndIndices: true,
			},
		});

		const tree = new MarkupTree(content.length);

		for (const document of $.root().toArray()) {
			tree.addChildren(document.children, null);
		}

		return tree;
	}

	/** Number of elements in the arena */
	public get size(): number {
		return this.nodes.length;
	}

	/**
	 * Looks up an element by id.
	 *
	 * @param id Arena index assigned at parse time
	 */
	public get(id: number): MarkupNode | undefined {
		return this.nodes[id];
	}

	private addChildren(children: AnyNode[], parentId: number | null): number[] {
		const childIds: number[] = [];

		for (const child of children) {
			if (!isTag(child)) continue;

			const start = child.startIndex ?? 0;
			const node: MarkupNode = {
				id: this.nodes.length,
				tagName: child.name,
				classNames: (child.attribs["class"] ?? "").split(/\s+/).filter(Boolean),
				parentId,
				childIds: [],
				start,
				end: child.endIndex == null ? this.sourceLength : child.endIndex + 1,
			};

			this.nodes.push(node);
			if (parentId === null) this.rootIds.push(node.id);
			childIds.push(node.id);

			node.childIds = this.addChildren(child.children, node.id);
		}

		return childIds;
	}
}
