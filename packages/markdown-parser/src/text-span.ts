import { UnknownSpanVariantError } from "./errors";
import { LeafNode } from "./html-node";

export interface PlainSpan {
	readonly type: "plain";
	readonly text: string;
}

export interface BoldSpan {
	readonly type: "bold";
	readonly text: string;
}

export interface ItalicSpan {
	readonly type: "italic";
	readonly text: string;
}

export interface CodeSpan {
	readonly type: "code";
	readonly text: string;
}

export interface LinkSpan {
	readonly type: "link";
	readonly text: string;
	readonly url?: string;
}

export interface ImageSpan {
	readonly type: "image";
	/** The alt text of the image. */
	readonly text: string;
	readonly url?: string;
}

export type TextSpan =
	| PlainSpan
	| BoldSpan
	| ItalicSpan
	| CodeSpan
	| LinkSpan
	| ImageSpan;

/** The variants a delimiter pass can produce. */
export type StyledSpanType = "bold" | "italic" | "code";

export function plainSpan(text: string): PlainSpan {
	return { type: "plain", text };
}

export function styledSpan(
	type: StyledSpanType,
	text: string,
): BoldSpan | ItalicSpan | CodeSpan {
	return { type, text };
}

export function linkSpan(text: string, url?: string): LinkSpan {
	return url === undefined ? { type: "link", text } : { type: "link", text, url };
}

export function imageSpan(text: string, url?: string): ImageSpan {
	return url === undefined
		? { type: "image", text }
		: { type: "image", text, url };
}

/**
 * Structural equality: same variant, same text, same url. A missing url and an empty url are different.
 */
export function spansEqual(a: TextSpan, b: TextSpan): boolean {
	if (a.type !== b.type || a.text !== b.text) return false;

	const urlA = a.type === "link" || a.type === "image" ? a.url : undefined;
	const urlB = b.type === "link" || b.type === "image" ? b.url : undefined;
	return urlA === urlB;
}

/**
 * Converts a text span into the leaf node that renders it.
 */
export function spanToHtmlNode(span: TextSpan): LeafNode {
	switch (span.type) {
		case "plain":
			return new LeafNode(null, span.text);
		case "bold":
			return new LeafNode("b", span.text);
		case "italic":
			return new LeafNode("i", span.text);
		case "code":
			return new LeafNode("code", span.text);
		case "link":
			return new LeafNode("a", span.text, new Map([["href", span.url ?? ""]]));
		case "image":
			return new LeafNode(
				"img",
				"",
				new Map([
					["src", span.url ?? ""],
					["alt", span.text],
				]),
			);
		default: {
			// Only reachable with spans built outside the tokenizer.
			const unknownSpan: { type: string } = span;
			throw new UnknownSpanVariantError(unknownSpan.type);
		}
	}
}

export function spansToHtmlNodes(spans: ReadonlyArray<TextSpan>): LeafNode[] {
	return spans.map(spanToHtmlNode);
}
