import {
	type BlockType,
	classifyBlock,
	parseCodeBlockContent,
	segmentBlocks,
} from "./block-parser";
import { type HtmlNode, LeafNode, ParentNode } from "./html-node";
import { tokenize } from "./inline-parser";
import { spansToHtmlNodes } from "./text-span";

/**
 * Converts a markdown document into a single `<div>` holding one node per block, in document order.
 *
 * @example
 * ```ts
 * buildDocument("- First item\n- Second **item**").render();
 * // "<div><ul><li>First item</li><li>Second <b>item</b></li></ul></div>"
 * ```
 */
export function buildDocument(markdown: string): ParentNode {
	const nodes: HtmlNode[] = [];
	for (const block of segmentBlocks(markdown)) {
		nodes.push(buildBlock(block));
	}
	return new ParentNode("div", nodes);
}

/**
 * Converts one block into an HTML node. The block is classified first unless its type is passed in.
 */
export function buildBlock(
	block: string,
	blockType: BlockType = classifyBlock(block),
): ParentNode {
	switch (blockType.type) {
		case "heading":
			// Drop the `#` run and the single space after it.
			return new ParentNode(
				`h${blockType.level}`,
				textToChildren(block.slice(blockType.level + 1)),
			);
		case "code":
			// Code is never tokenized.
			return new ParentNode("pre", [
				new LeafNode("code", parseCodeBlockContent(block)),
			]);
		case "quote": {
			const text = block
				.split("\n")
				.map((line) => stripQuoteMarker(line).trim())
				.join(" ");
			return new ParentNode("blockquote", textToChildren(text));
		}
		case "unordered-list":
			return new ParentNode(
				"ul",
				block
					.split("\n")
					.map((line) => new ParentNode("li", textToChildren(line.slice(2)))),
			);
		case "ordered-list":
			return new ParentNode(
				"ol",
				block
					.split("\n")
					.map(
						(line) =>
							new ParentNode("li", textToChildren(stripOrderedListMarker(line))),
					),
			);
		case "paragraph":
			return new ParentNode("p", textToChildren(block.split("\n").join(" ")));
	}
}

/**
 * Tokenizes inline markdown and converts each span into its leaf node.
 */
export function textToChildren(text: string): LeafNode[] {
	return spansToHtmlNodes(tokenize(text));
}

function stripQuoteMarker(line: string): string {
	return line.startsWith(">") ? line.slice(1) : line;
}

// Everything after the first ". ", e.g. "12. Item" -> "Item".
function stripOrderedListMarker(line: string): string {
	const markerEnd = line.indexOf(". ");
	if (markerEnd === -1) return line;
	return line.slice(markerEnd + 2);
}
