export type MarkdownErrorCode =
	| "UNCLOSED_DELIMITER"
	| "MISSING_VALUE"
	| "MISSING_TAG"
	| "MISSING_CHILDREN"
	| "UNKNOWN_SPAN_VARIANT"
	| "NO_HEADING_FOUND";

/**
 * Base class of every error thrown while converting a markdown document. None of these are recovered from inside the parser; the whole conversion is aborted.
 */
export class MarkdownError extends Error {
	readonly code: MarkdownErrorCode;

	constructor(code: MarkdownErrorCode, message: string) {
		super(message);
		this.name = "MarkdownError";
		this.code = code;
	}
}

/** Thrown when a text span contains an odd number of a styling delimiter. */
export class UnclosedDelimiterError extends MarkdownError {
	readonly delimiter: string;

	constructor(delimiter: string) {
		super("UNCLOSED_DELIMITER", `Invalid markdown: unclosed delimiter "${delimiter}"`);
		this.name = "UnclosedDelimiterError";
		this.delimiter = delimiter;
	}
}

export class MissingValueError extends MarkdownError {
	constructor() {
		super("MISSING_VALUE", "Leaf node must have a value");
		this.name = "MissingValueError";
	}
}

export class MissingTagError extends MarkdownError {
	constructor() {
		super("MISSING_TAG", "Parent node must have a tag");
		this.name = "MissingTagError";
	}
}

export class MissingChildrenError extends MarkdownError {
	constructor() {
		super("MISSING_CHILDREN", "Parent node must have children");
		this.name = "MissingChildrenError";
	}
}

export class UnknownSpanVariantError extends MarkdownError {
	readonly variant: string;

	constructor(variant: string) {
		super("UNKNOWN_SPAN_VARIANT", `Unknown text span variant: ${variant}`);
		this.name = "UnknownSpanVariantError";
		this.variant = variant;
	}
}

export class NoHeadingFoundError extends MarkdownError {
	constructor() {
		super("NO_HEADING_FOUND", 'No level 1 heading ("# ") found in markdown');
		this.name = "NoHeadingFoundError";
	}
}
