/**
 * @fragmentlog/core
 * フラグメントの収集・描画とチェンジログへの書き込み
 */

export { ChangelogBuilder, NO_SIGNIFICANT_CHANGES } from './builder/builder.js';
export type { ChangelogBuilderOptions } from './builder/builder.js';
export { collectSections, collectPaths } from './builder/collector.js';
export { TemplateRenderer, TITLE, FRAGMENT } from './builder/renderer.js';
export { HandlebarsTemplateEngine } from './builder/template-engine.js';
export type { TemplateEngine } from './builder/template-engine.js';
export { wrapText, heading, indent } from './builder/wrapper.js';
export { spliceEntry } from './builder/splicer.js';

export {
  parseIdentifier,
  validateName,
  isValidName,
  compareIds,
  compareFragments,
  STRING_ID_PREFIX,
} from './fragment/identifier.js';
export { loadFragment } from './fragment/loader.js';

export { createFragment, PLACEHOLDER } from './create.js';
export type { CreateFragmentOptions } from './create.js';
export { today, parseDate, formatDate } from './date.js';

export {
  FragmentlogError,
  FragmentParseError,
  FragmentLoadError,
  CollectError,
  RendererInitError,
  RenderError,
  BuildError,
  WriteError,
  CreateError,
  DateError,
} from './errors.js';
export type {
  FragmentParseErrorReason,
  FragmentLoadErrorReason,
  TemplateName,
  BuildPhase,
  WriteErrorReason,
  CreateErrorReason,
} from './errors.js';
