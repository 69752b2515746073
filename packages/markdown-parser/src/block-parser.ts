import { normalizeLineEndings } from "./line-splitter";

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type BlockType =
	| { type: "heading"; level: HeadingLevel }
	| { type: "code" }
	| { type: "quote" }
	| { type: "unordered-list" }
	| { type: "ordered-list" }
	| { type: "paragraph" };

const BLOCK_SEPARATOR = "\n\n";

const CODE_FENCE = "```";

/**
 * Splits a document into blocks separated by blank lines. Each block is trimmed, and blocks that are empty after trimming are dropped.
 *
 * @example
 * ```ts
 * segmentBlocks("First\n\n\n\nSecond"); // ["First", "Second"]
 * ```
 */
export function segmentBlocks(markdown: string): string[] {
	const blocks: string[] = [];
	for (const block of normalizeLineEndings(markdown).split(BLOCK_SEPARATOR)) {
		const trimmed = block.trim();
		if (trimmed.length > 0) blocks.push(trimmed);
	}
	return blocks;
}

/**
 * Classifies a block by its lines. The first matching rule wins:
 * 1. heading: 1 to 6 `#` followed by a space
 * 2. code: starts with a fence and a line break, ends with a fence
 * 3. quote: every line starts with `>`
 * 4. unordered list: every line starts with `- `
 * 5. ordered list: every line starts with its 1-based position followed by `. `
 * 6. paragraph: everything else, including the empty block
 */
export function classifyBlock(block: string): BlockType {
	if (block.length === 0) return { type: "paragraph" };

	const heading = parseHeading(block);
	if (heading !== null) return { type: "heading", level: heading.level };

	if (isCodeBlock(block)) return { type: "code" };

	const lines = block.split("\n");

	if (lines.every((line) => line.startsWith(">"))) return { type: "quote" };

	if (lines.every((line) => line.startsWith("- "))) {
		return { type: "unordered-list" };
	}

	if (lines.every((line, index) => line.startsWith(orderedListMarker(index)))) {
		return { type: "ordered-list" };
	}

	return { type: "paragraph" };
}

/**
 * Parses the leading `#` run of a heading block.
 *
 * ┌───┬───┬───┬───┬───┬───┐
 * │ 0 | 1 | 2 | 3 | 4 | 5 |
 * ├───┼───┼───┼───┼───┼───┤
 * │ # | # | ␣ | T | h | e |
 * └───┴───┴───┴───┴───┴───┘
 *   ▲   ▲   ▲
 *   └───┘   └ must be a space
 *
 * @returns The heading level and everything after the space, or null if the block is not a heading.
 */
export function parseHeading(
	block: string,
): { level: HeadingLevel; content: string } | null {
	let numOfHashes = 0;
	while (numOfHashes < block.length && block.charAt(numOfHashes) === "#") {
		numOfHashes++;
	}

	if (!isHeadingLevel(numOfHashes)) return null;
	if (block.charAt(numOfHashes) !== " ") return null;

	return { level: numOfHashes, content: block.slice(numOfHashes + 1) };
}

/**
 * Returns the content between the opening fence line and the closing fence, byte for byte.
 */
export function parseCodeBlockContent(block: string): string {
	return block.slice(CODE_FENCE.length + 1, block.length - CODE_FENCE.length);
}

/**
 * The marker an ordered list line must start with at the given 0-based position, e.g. `"1. "` for the first line.
 */
export function orderedListMarker(index: number): string {
	return `${index + 1}. `;
}

function isCodeBlock(block: string): boolean {
	return block.startsWith(`${CODE_FENCE}\n`) && block.endsWith(CODE_FENCE);
}

function isHeadingLevel(level: number): level is HeadingLevel {
	return level >= 1 && level <= 6;
}
