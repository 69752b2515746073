export interface Logger {
	info(message: string): void;
	error(message: string, error?: unknown): void;
}

/**
 * Logs to the console. `quiet` silences `info` but never `error`.
 */
export function createConsoleLogger(options?: { quiet?: boolean }): Logger {
	const quiet = options?.quiet ?? false;
	return {
		info(message) {
			if (!quiet) console.log(message);
		},
		error(message, error) {
			if (error === undefined) {
				console.error(message);
			} else {
				console.error(message, error);
			}
		},
	};
}

export const silentLogger: Logger = {
	info() {},
	error() {},
};
