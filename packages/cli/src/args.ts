import { CLIErrors, type UserErrorMessage } from "@keysketch/errors";
import { Command as CommanderProgram, CommanderError } from "commander";
import type { DrawOptions } from "./types.js";

export const VERSION = "0.1.0";

/**
 * Option values as commander hands them to the draw action.
 * `config` is false after --no-config.
 */
type DrawCommandOpts = {
    config?: string | false;
    output?: string;
    selectLayers: string[];
    keysOnly: boolean;
    combosOnly: boolean;
    verbose: boolean;
    quiet: boolean;
    logJson: boolean;
};

/**
 * Collect repeatable option values into an array.
 */
function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

function usageError(message: UserErrorMessage): Error {
    const [headline, detail] = message;
    return new Error(detail ? `${headline}. ${detail}` : headline);
}

/**
 * Create the commander program with the draw subcommand.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("keysketch")
        .description("Draw keyboard keymaps, layers and combos as SVG")
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    program
        .command("draw")
        .description("Render a keymap JSON file to SVG")
        .argument("<keymap>", "keymap JSON file")
        .option("-c, --config <path>", "use specific draw config file")
        .option("--no-config", "skip config file loading")
        .option("-o, --output <path>", "write SVG to a file instead of stdout")
        .option("-s, --select-layers <name>", "draw only this layer (repeatable)", collect, [])
        .option("--keys-only", "draw keys without combos", false)
        .option("--combos-only", "draw combos over blank keys", false)
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--log-json", "write log lines as JSON to stderr", false);

    return program;
}

function emptyOptions(): DrawOptions {
    return {
        keymapPath: "",
        noConfig: false,
        selectLayers: [],
        keysOnly: false,
        combosOnly: false,
        verbose: false,
        quiet: false,
        logJson: false,
        help: false,
        version: false,
    };
}

/**
 * Map commander-parsed options to DrawOptions.
 */
function buildDrawOptions(keymapPath: string, opts: DrawCommandOpts): DrawOptions {
    // Post-parse validation: conflicting flags
    if (opts.verbose && opts.quiet) {
        throw usageError(CLIErrors.CONFLICTING_LOG_FLAGS);
    }
    if (opts.keysOnly && opts.combosOnly) {
        throw usageError(CLIErrors.CONFLICTING_MODE_FLAGS);
    }

    return {
        ...emptyOptions(),
        keymapPath,
        configPath: typeof opts.config === "string" ? opts.config : undefined,
        noConfig: opts.config === false,
        outputPath: opts.output,
        selectLayers: opts.selectLayers,
        keysOnly: opts.keysOnly,
        combosOnly: opts.combosOnly,
        verbose: opts.verbose,
        quiet: opts.quiet,
        logJson: opts.logJson,
    };
}

/**
 * Parse CLI arguments into DrawOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, missing keymap or invalid subcommand
 */
export function parseArgs(args: string[]): DrawOptions {
    const program = createProgram();

    let result: DrawOptions | undefined;

    for (const cmd of program.commands) {
        cmd.action((keymapPath: string) => {
            result = buildDrawOptions(keymapPath, cmd.opts<DrawCommandOpts>());
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return { ...emptyOptions(), help: true };
            }
            if (err.code === "commander.version") {
                return { ...emptyOptions(), version: true };
            }
            if (err.code === "commander.help") {
                throw usageError(CLIErrors.MISSING_COMMAND);
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw usageError(CLIErrors.MISSING_COMMAND);
    }

    return result;
}
