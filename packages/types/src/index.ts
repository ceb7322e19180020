/**
 * @fragmentlog/types
 * fragmentlogの共通型定義
 */

// Fragment
export type { FragmentId, FragmentIdentifier, Fragment, Sections } from './fragment.js';

// Config
export type {
  Context,
  PathsConfig,
  LevelsConfig,
  IndentsConfig,
  FormatsConfig,
  ChangelogConfig,
  Workspace,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  ConfigError,
  CONFIG_ENV,
  PACKAGE_JSON_KEY,
  validateWorkspace,
  workspaceSchema,
  optionsSchema,
  contextSchema,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type ConfigOptions,
  type WorkspaceOptions,
} from './config/index.js';

// Collaborators
export type { VersionControl, Editor } from './collaborators.js';
