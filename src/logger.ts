export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
	debug: (...args: unknown[]) => void;
	info: (...args: unknown[]) => void;
	warn: (...args: unknown[]) => void;
	error: (...args: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Leveled logger writing to stderr. Lines below `level` are dropped.
 */
export function createLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level];
	const emit =
		(at: LogLevel) =>
		(...args: unknown[]) => {
			if (LEVEL_ORDER[at] < threshold) return;
			console.error(`[${at.toUpperCase()}]`, ...args);
		};
	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	};
}

export const logger = createLogger("info");
