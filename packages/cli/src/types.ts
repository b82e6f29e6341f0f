/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    RENDER_ERROR = 1,
    CONFIG_ERROR = 2,
}

/**
 * Parsed `draw` arguments.
 */
export interface DrawOptions {
    keymapPath: string;
    configPath?: string;
    noConfig: boolean;
    outputPath?: string;
    selectLayers: string[];
    keysOnly: boolean;
    combosOnly: boolean;
    verbose: boolean;
    quiet: boolean;
    /** Structured JSON log lines instead of pretty output */
    logJson: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Output mode for logging.
 */
export type OutputMode = "normal" | "verbose" | "quiet";
