export { CLI } from "./cli.js";
export { ConfigLoader } from "./config-loader.js";
export { createProgram, parseArgs, VERSION } from "./args.js";
export { ExitCode, type DrawOptions, type OutputMode } from "./types.js";
