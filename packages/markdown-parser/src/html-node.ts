import {
	MissingChildrenError,
	MissingTagError,
	MissingValueError,
} from "./errors";

/**
 * Tags that never have children or a closing tag.
 */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
	"area",
	"base",
	"br",
	"col",
	"embed",
	"hr",
	"img",
	"input",
	"link",
	"meta",
	"source",
	"track",
	"wbr",
]);

/**
 * Attributes are rendered in insertion order, integer-like keys included. Values are written as-is, without escaping.
 */
export type Attributes = ReadonlyMap<string, string>;

/**
 * An HTML element holding a single text value, or a raw text passthrough when it has no tag.
 *
 * `value` is `null` when it was never set, which is distinct from the empty string: rendering a leaf without a value fails, while `""` renders an element with an empty body.
 */
export class LeafNode {
	readonly kind = "leaf";

	constructor(
		readonly tag: string | null,
		readonly value: string | null,
		readonly attributes: Attributes | null = null,
	) {}

	render(): string {
		if (this.value === null) throw new MissingValueError();
		if (this.tag === null) return this.value;

		const attributes = this.attributesToString();
		if (VOID_ELEMENTS.has(this.tag)) return `<${this.tag}${attributes}>`;

		return `<${this.tag}${attributes}>${this.value}</${this.tag}>`;
	}

	attributesToString(): string {
		return formatAttributes(this.attributes);
	}
}

/**
 * An HTML element wrapping an ordered list of child nodes.
 *
 * `children` is `null` when it was never set; an empty array is valid and renders as an empty element.
 */
export class ParentNode {
	readonly kind = "parent";

	constructor(
		readonly tag: string | null,
		readonly children: ReadonlyArray<HtmlNode> | null,
		readonly attributes: Attributes | null = null,
	) {}

	render(): string {
		if (this.tag === null) throw new MissingTagError();
		if (this.children === null) throw new MissingChildrenError();

		let inner = "";
		for (const child of this.children) {
			inner += child.render();
		}

		return `<${this.tag}${this.attributesToString()}>${inner}</${this.tag}>`;
	}

	attributesToString(): string {
		return formatAttributes(this.attributes);
	}
}

export type HtmlNode = LeafNode | ParentNode;

/**
 * Formats attributes as ` key="value"` pairs separated by a single space.
 * @returns An empty string if there are no attributes, otherwise the pairs with a leading space.
 */
function formatAttributes(attributes: Attributes | null): string {
	if (attributes === null) return "";

	const pairs: string[] = [];
	for (const [key, value] of attributes) {
		pairs.push(`${key}="${value}"`);
	}
	if (pairs.length === 0) return "";

	return ` ${pairs.join(" ")}`;
}
