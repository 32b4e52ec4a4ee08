// Console-backed logging with a scope tag and level threshold

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
};

/**
 * Create a logger that writes `[scope] message` lines to the console,
 * dropping anything below `level`.
 */
export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
	const threshold = LEVEL_ORDER[level];
	const tag = "[" + scope + "] ";

	return {
		debug(message) {
			if (threshold <= LEVEL_ORDER.debug) console.debug(tag + message);
		},
		info(message) {
			if (threshold <= LEVEL_ORDER.info) console.info(tag + message);
		},
		warn(message) {
			if (threshold <= LEVEL_ORDER.warn) console.warn(tag + message);
		},
		error(message) {
			if (threshold <= LEVEL_ORDER.error) console.error(tag + message);
		},
	};
}

export const silentLogger: Logger = createLogger("silent", "silent");
