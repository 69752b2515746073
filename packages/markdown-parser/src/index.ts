export {
	type BlockType,
	classifyBlock,
	type HeadingLevel,
	orderedListMarker,
	parseCodeBlockContent,
	parseHeading,
	segmentBlocks,
} from "./block-parser";
export {
	MarkdownError,
	type MarkdownErrorCode,
	MissingChildrenError,
	MissingTagError,
	MissingValueError,
	NoHeadingFoundError,
	UnclosedDelimiterError,
	UnknownSpanVariantError,
} from "./errors";
export {
	type Attributes,
	type HtmlNode,
	LeafNode,
	ParentNode,
	VOID_ELEMENTS,
} from "./html-node";
export {
	extractImages,
	extractLinks,
	splitSpansOnDelimiter,
	splitSpansOnImages,
	splitSpansOnLinks,
	tokenize,
} from "./inline-parser";
export { normalizeLineEndings, splitLines } from "./line-splitter";
export { buildBlock, buildDocument, textToChildren } from "./markdown-parser";
export {
	type BoldSpan,
	type CodeSpan,
	type ImageSpan,
	type ItalicSpan,
	type LinkSpan,
	type PlainSpan,
	type StyledSpanType,
	type TextSpan,
	imageSpan,
	linkSpan,
	plainSpan,
	spansEqual,
	spanToHtmlNode,
	spansToHtmlNodes,
	styledSpan,
} from "./text-span";
export { extractTitle } from "./title";
