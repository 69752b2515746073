export {
	DEFAULT_CONFIG_FILE,
	type LoadConfigOptions,
	loadConfig,
	type SiteConfig,
	siteConfigSchema,
} from "./config";
export {
	CliUsageError,
	ConfigError,
	PageGenerationError,
	type SiteErrorCode,
} from "./errors";
export {
	buildSite,
	copyDirectory,
	type GeneratePageOptions,
	generatePage,
	generatePagesRecursive,
} from "./generate";
export { createConsoleLogger, type Logger, silentLogger } from "./logger";
export { type CliArguments, main, parseCliArguments, USAGE } from "./cli";
export {
	CONTENT_PLACEHOLDER,
	fillTemplate,
	renderPage,
	rewriteRootRelativeUrls,
	TITLE_PLACEHOLDER,
} from "./page";
