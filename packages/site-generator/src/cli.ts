import { loadConfig } from "./config";
import { CliUsageError } from "./errors";
import { buildSite } from "./generate";
import { createConsoleLogger, type Logger } from "./logger";

export const USAGE = `Usage: mdsite [basePath] [options]

Arguments:
  basePath          Prefix for root-relative href and src urls (default: "/")

Options:
  --config <path>   Config file to read (default: mdsite.config.json)
  --quiet           Only log errors
  --help            Show this message`;

export interface CliArguments {
	basePath?: string;
	configPath?: string;
	quiet: boolean;
	help: boolean;
}

/**
 * @throws {CliUsageError} On an unknown option, a missing option value or more than one positional argument.
 */
export function parseCliArguments(argv: ReadonlyArray<string>): CliArguments {
	const args: CliArguments = { quiet: false, help: false };

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";

		if (arg === "--quiet") {
			args.quiet = true;
		} else if (arg === "--help" || arg === "-h") {
			args.help = true;
		} else if (arg === "--config") {
			const value = argv[i + 1];
			if (value === undefined || value.startsWith("--")) {
				throw new CliUsageError("Option --config requires a path");
			}
			args.configPath = value;
			i++;
		} else if (arg.startsWith("--config=")) {
			const value = arg.slice("--config=".length);
			if (value.length === 0) {
				throw new CliUsageError("Option --config requires a path");
			}
			args.configPath = value;
		} else if (arg.startsWith("-")) {
			throw new CliUsageError(`Unknown option: ${arg}`);
		} else if (args.basePath === undefined) {
			args.basePath = arg;
		} else {
			throw new CliUsageError(`Unexpected argument: ${arg}`);
		}
	}

	return args;
}

/**
 * Runs the site generator.
 * @returns The process exit code: 0 on success, 2 on a usage error, 1 on any other failure.
 */
export async function main(
	argv: ReadonlyArray<string>,
	options?: { cwd?: string; logger?: Logger },
): Promise<number> {
	let args: CliArguments;
	try {
		args = parseCliArguments(argv);
	} catch (error) {
		if (!(error instanceof CliUsageError)) throw error;
		const logger = options?.logger ?? createConsoleLogger();
		logger.error(error.message);
		logger.error(USAGE);
		return 2;
	}

	// Usage goes out before --quiet applies.
	if (args.help) {
		(options?.logger ?? createConsoleLogger()).info(USAGE);
		return 0;
	}

	const logger = options?.logger ?? createConsoleLogger({ quiet: args.quiet });

	try {
		const config = await loadConfig({
			cwd: options?.cwd ?? process.cwd(),
			configPath: args.configPath,
			overrides: { basePath: args.basePath },
		});
		await buildSite(config, logger);
		return 0;
	} catch (error) {
		logger.error("Site generation failed", error);
		return 1;
	}
}
