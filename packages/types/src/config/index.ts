export { ConfigLoader, ConfigError, CONFIG_ENV, PACKAGE_JSON_KEY } from './loader.js';
export type { ResolveConfigOptions, ResolvedConfig } from './loader.js';
export { validateWorkspace, workspaceSchema, optionsSchema, contextSchema } from './validator.js';
export type { ConfigOptions, WorkspaceOptions } from './validator.js';
