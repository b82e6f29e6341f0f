import { Logger, type ILogObj } from "tslog";

export type { Logger } from "tslog";

/**
 * Structured log object with common context fields.
 * Extend this interface for domain-specific fields.
 */
export interface AppLogObj extends ILogObj {
	layer?: string;
	file?: string;
	count?: number;
	[key: string]: unknown;
}

/**
 * Log verbosity mode.
 */
export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
	silent: 6,
	error: 5,
	info: 3,
	debug: 2,
};

/**
 * Create a logger with human-readable pretty output.
 *
 * Output goes to stderr so that a document written to stdout stays clean.
 */
export function createLogger(
	name: string,
	mode: LogMode = "info",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "pretty",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
		overwrite: {
			transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
				console.error(logMetaMarkup, ...logArgs, ...logErrors);
			},
		},
	});
}

/**
 * Create a logger with structured JSON output, one object per line on stderr.
 */
export function createJsonLogger(
	name: string,
	mode: LogMode = "debug",
): Logger<AppLogObj> {
	return new Logger<AppLogObj>({
		name,
		type: mode === "silent" ? "hidden" : "json",
		minLevel: MIN_LEVELS[mode],
		hideLogPositionForProduction: true,
		overwrite: {
			transportJSON: (logObj) => {
				console.error(JSON.stringify(logObj));
			},
		},
	});
}

/**
 * Logger that drops everything; the default for library callers that pass none.
 */
export function createSilentLogger(name: string): Logger<AppLogObj> {
	return createLogger(name, "silent");
}
