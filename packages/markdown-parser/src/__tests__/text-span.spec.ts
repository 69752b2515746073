import { describe, expect, it } from "vitest";
import { UnknownSpanVariantError } from "../errors";
import {
	imageSpan,
	linkSpan,
	plainSpan,
	spansEqual,
	spanToHtmlNode,
	styledSpan,
} from "../text-span";

describe("spanToHtmlNode", () => {
	it("renders plain text without a tag", () => {
		const node = spanToHtmlNode(plainSpan("This is a text node"));
		expect(node.tag).toBeNull();
		expect(node.render()).toBe("This is a text node");
	});

	it("renders styled spans", () => {
		expect(spanToHtmlNode(styledSpan("bold", "strong")).render()).toBe(
			"<b>strong</b>",
		);
		expect(spanToHtmlNode(styledSpan("italic", "slanted")).render()).toBe(
			"<i>slanted</i>",
		);
		expect(spanToHtmlNode(styledSpan("code", "x = 1")).render()).toBe(
			"<code>x = 1</code>",
		);
	});

	it("renders links with an href", () => {
		expect(spanToHtmlNode(linkSpan("Example", "https://example.com")).render()).toBe(
			'<a href="https://example.com">Example</a>',
		);
		expect(spanToHtmlNode(linkSpan("Nowhere")).render()).toBe(
			'<a href="">Nowhere</a>',
		);
	});

	it("renders images as void elements with src then alt", () => {
		const node = spanToHtmlNode(imageSpan("A kitten", "/img/kitten.png"));
		expect(node.value).toBe("");
		expect([...(node.attributes ?? [])]).toEqual([
			["src", "/img/kitten.png"],
			["alt", "A kitten"],
		]);
		expect(node.render()).toBe('<img src="/img/kitten.png" alt="A kitten">');
	});

	it("fails on a span variant it does not know", () => {
		expect(() =>
			spanToHtmlNode(JSON.parse('{ "type": "strikethrough", "text": "gone" }')),
		).toThrow(new UnknownSpanVariantError("strikethrough"));
	});
});

describe("spansEqual", () => {
	it("compares variant and text", () => {
		expect(spansEqual(plainSpan("a"), plainSpan("a"))).toBe(true);
		expect(spansEqual(plainSpan("a"), plainSpan("b"))).toBe(false);
		expect(spansEqual(styledSpan("bold", "a"), styledSpan("italic", "a"))).toBe(
			false,
		);
	});

	it("compares urls", () => {
		expect(spansEqual(linkSpan("a", "/x"), linkSpan("a", "/x"))).toBe(true);
		expect(spansEqual(linkSpan("a", "/x"), linkSpan("a", "/y"))).toBe(false);
		expect(spansEqual(linkSpan("a", ""), linkSpan("a"))).toBe(false);
		expect(spansEqual(imageSpan("a", "/x"), linkSpan("a", "/x"))).toBe(false);
	});
});
