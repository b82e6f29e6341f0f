export type { UserErrorMessage } from "./types.js";
export { ConfigurationError, isConfigurationError } from "./configuration-error.js";
export { LayoutErrors } from "./layout.js";
export { KeymapErrors } from "./keymap.js";
export { RenderErrors, ConfigErrors } from "./render.js";
export { CLIErrors } from "./cli.js";
