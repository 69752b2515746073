export type SiteErrorCode =
	| "CONFIG_INVALID"
	| "CLI_USAGE"
	| "PAGE_GENERATION_FAILED";

/**
 * Thrown when the site configuration cannot be read or does not match the schema. Each issue is formatted as `path: message`.
 */
export class ConfigError extends Error {
	readonly code: SiteErrorCode = "CONFIG_INVALID";
	readonly issues: ReadonlyArray<string>;

	constructor(source: string, issues: ReadonlyArray<string>) {
		super(`Invalid site configuration (${source}):\n  ${issues.join("\n  ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

export class CliUsageError extends Error {
	readonly code: SiteErrorCode = "CLI_USAGE";

	constructor(message: string) {
		super(message);
		this.name = "CliUsageError";
	}
}

/**
 * Wraps whatever went wrong while turning one markdown file into a page. The original error is kept as `cause`.
 */
export class PageGenerationError extends Error {
	readonly code: SiteErrorCode = "PAGE_GENERATION_FAILED";
	readonly sourcePath: string;

	constructor(sourcePath: string, cause: unknown) {
		super(
			`Failed to generate page from ${sourcePath}: ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			{ cause },
		);
		this.name = "PageGenerationError";
		this.sourcePath = sourcePath;
	}
}
