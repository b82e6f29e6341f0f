import type { UserErrorMessage } from "./types.js";

/**
 * Raised for invalid input detected before any output is produced:
 * bad grid parameters, inconsistent keymap data, unknown layers.
 */
export class ConfigurationError extends Error {
	readonly code: string;
	readonly userMessage: UserErrorMessage;

	constructor(code: string, userMessage: UserErrorMessage) {
		const [headline, detail] = userMessage;
		super(detail ? `${headline}: ${detail}` : headline);
		this.name = "ConfigurationError";
		this.code = code;
		this.userMessage = userMessage;
	}
}

/**
 * Type guard used by the CLI to report configuration errors with their code.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
	return error instanceof ConfigurationError;
}
