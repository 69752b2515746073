import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { isNotFoundError } from "./fs-utils";

export const DEFAULT_CONFIG_FILE = "mdsite.config.json";

export const siteConfigSchema = z
	.object({
		/** Directory searched recursively for `.md` files. */
		contentDir: z.string().min(1).default("content"),
		/** Directory copied as-is into the output directory before pages are generated. */
		staticDir: z.string().min(1).default("static"),
		templatePath: z.string().min(1).default("template.html"),
		outputDir: z.string().min(1).default("docs"),
		/** Prefix written in place of the leading `/` of root-relative `href` and `src` attributes. */
		basePath: z.string().min(1).endsWith("/", 'must end with "/"').default("/"),
	})
	.strict();

export type SiteConfig = z.infer<typeof siteConfigSchema>;

export interface LoadConfigOptions {
	cwd: string;
	/** Config file to read, relative to `cwd`. Defaults to `mdsite.config.json` if that file exists. */
	configPath?: string;
	/** Values that take precedence over the config file, e.g. from the command line. */
	overrides?: Partial<SiteConfig>;
}

/**
 * Loads and validates the site configuration. Directory and template paths in the result are absolute, resolved against the directory of the config file (or `cwd` when there is none).
 *
 * @throws {ConfigError} If the file cannot be read, is not a JSON object, or does not match the schema.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<SiteConfig> {
	const explicit = options.configPath !== undefined;
	const configFile = resolve(options.cwd, options.configPath ?? DEFAULT_CONFIG_FILE);

	let text: string | null = null;
	try {
		text = await readFile(configFile, "utf8");
	} catch (error) {
		if (explicit || !isNotFoundError(error)) {
			throw new ConfigError(configFile, [
				`cannot read file: ${error instanceof Error ? error.message : String(error)}`,
			]);
		}
	}

	const raw: Record<string, unknown> =
		text === null ? {} : parseJsonObject(configFile, text);
	for (const [key, value] of Object.entries(options.overrides ?? {})) {
		if (value !== undefined) raw[key] = value;
	}

	const result = siteConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			text === null ? "defaults" : configFile,
			result.error.issues.map(
				(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
			),
		);
	}

	const baseDir = text === null ? options.cwd : dirname(configFile);
	const config = result.data;
	return {
		...config,
		contentDir: resolve(baseDir, config.contentDir),
		staticDir: resolve(baseDir, config.staticDir),
		templatePath: resolve(baseDir, config.templatePath),
		outputDir: resolve(baseDir, config.outputDir),
	};
}

function parseJsonObject(
	configFile: string,
	text: string,
): Record<string, unknown> {
	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(configFile, [
			`invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
		]);
	}

	if (!isRecord(value)) {
		throw new ConfigError(configFile, ["(root): must be a JSON object"]);
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
