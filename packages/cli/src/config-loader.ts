import { ConfigErrors, ConfigurationError } from "@keysketch/errors";
import { defaultDrawConfig, parseDrawConfig, type DrawConfig } from "@keysketch/keymap-svg";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["keysketch.config.json", ".keysketch.json"];

/**
 * Finds and loads draw configuration files.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. KEYSKETCH_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/keysketch/config.json)
     */
    static findConfigFile(startDir: string = process.cwd()): string | undefined {
        const envConfig = process.env.KEYSKETCH_CONFIG;
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            // Stop at the git root
            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        const homeDir = process.env.HOME;
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "keysketch", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load a draw config file and merge it over the defaults.
     * @throws ConfigurationError if the file is not valid JSON or not a valid draw config
     */
    static async load(path?: string): Promise<DrawConfig> {
        if (!path) {
            return { ...defaultDrawConfig };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new ConfigurationError("PARSE_ERROR", ConfigErrors.PARSE_ERROR(path));
            }
            throw error;
        }
        return parseDrawConfig(parsed);
    }
}
