import { writeFile, readFile } from "node:fs/promises";
import { CLIErrors, ConfigurationError, isConfigurationError } from "@keysketch/errors";
import { parseKeymapInput, type KeymapDocument } from "@keysketch/keymap";
import { KeymapDrawer, type DrawConfig, type OutputSink } from "@keysketch/keymap-svg";
import { createJsonLogger, createLogger, type AppLogObj, type LogMode, type Logger } from "@keysketch/logger";
import { createProgram, parseArgs } from "./args.js";
import { ConfigLoader } from "./config-loader.js";
import { ExitCode, type DrawOptions, type OutputMode } from "./types.js";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
};

/**
 * Main CLI class.
 */
export class CLI {
    private readonly stdout: OutputSink;

    constructor(stdout: OutputSink = process.stdout) {
        this.stdout = stdout;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        let logger = createLogger("keysketch", "info");
        let options: DrawOptions;

        // Unknown flags, missing command, conflicting options → CONFIG_ERROR
        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        const logMode = LOG_MODE_MAP[this.getOutputMode(options)];
        logger = options.logJson ? createJsonLogger("keysketch", logMode) : createLogger("keysketch", logMode);

        let config: DrawConfig;
        try {
            config = await this.loadConfig(options, logger);
        } catch (error) {
            this.reportError(logger, "Config error", error);
            return ExitCode.CONFIG_ERROR;
        }

        try {
            const keymap = await this.loadKeymap(options.keymapPath);
            logger.debug(`Loaded keymap from ${options.keymapPath}`, {
                file: options.keymapPath,
                count: keymap.layers.size,
            });
            await this.draw(keymap, config, options, logger);
        } catch (error) {
            this.reportError(logger, "Draw error", error);
            return ExitCode.RENDER_ERROR;
        }

        return ExitCode.SUCCESS;
    }

    /**
     * Resolve the draw config: --config, else the discovered file, else defaults.
     */
    async loadConfig(options: DrawOptions, logger: Logger<AppLogObj>): Promise<DrawConfig> {
        if (options.noConfig) {
            return ConfigLoader.load(undefined);
        }

        const configPath = options.configPath ?? ConfigLoader.findConfigFile();
        if (configPath) {
            logger.debug(`Using config file ${configPath}`, { file: configPath });
        }
        return ConfigLoader.load(configPath);
    }

    /**
     * Read and validate a keymap JSON file.
     * @throws ConfigurationError if the file is not valid JSON or not a valid keymap
     */
    async loadKeymap(path: string): Promise<KeymapDocument> {
        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new ConfigurationError("KEYMAP_PARSE_ERROR", CLIErrors.KEYMAP_PARSE_ERROR(path));
            }
            throw error;
        }
        return parseKeymapInput(parsed);
    }

    private async draw(
        keymap: KeymapDocument,
        config: DrawConfig,
        options: DrawOptions,
        logger: Logger<AppLogObj>,
    ): Promise<void> {
        const drawer = new KeymapDrawer(config, keymap, { logger });
        const renderOptions = {
            drawLayers: options.selectLayers,
            keysOnly: options.keysOnly,
            combosOnly: options.combosOnly,
        };

        if (!options.outputPath) {
            drawer.printBoard(this.stdout, renderOptions);
            return;
        }

        const chunks: string[] = [];
        drawer.printBoard({ write: (chunk: string) => chunks.push(chunk) }, renderOptions);
        await writeFile(options.outputPath, chunks.join(""), "utf-8");
        logger.info(`Wrote ${options.outputPath}`, { file: options.outputPath });
    }

    private reportError(logger: Logger<AppLogObj>, prefix: string, error: unknown): void {
        if (isConfigurationError(error)) {
            logger.error(`${prefix}: ${error.message}`, { code: error.code });
            return;
        }
        logger.error(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
    }

    private getOutputMode(options: DrawOptions): OutputMode {
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }
}
