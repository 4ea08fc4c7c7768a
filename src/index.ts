/**
 * linkmend: scan a documentation tree for path references, validate them,
 * and heal them across file renames.
 */

export {
  type LinkClass,
  type PatternClass,
  LINK_CLASSES,
  SOURCE_CLASSES,
  MARKDOWN_EXTENSIONS,
  DEFAULT_DOCS_PREFIX,
  buildPatternTable,
  normalizeDocsPrefix,
  isLinkClass,
  isMarkdownPath,
  classesFor,
} from './core/patterns.js';

export {
  type Document,
  type LinkReference,
  type ScanResult,
  findDocuments,
  readDocument,
  extractReferences,
  tableFor,
  scanTree,
} from './core/scanner.js';

export {
  type LinkStatus,
  type ResolvedLink,
  type ValidationResult,
  resolveTarget,
  resolveReference,
  validateReferences,
  normalizeRootPath,
  isExternal,
  isRootAnchored,
  isBroken,
} from './core/resolver.js';

export {
  type RenamePair,
  type RenameMapping,
  type PlannedEdit,
  type HealOptions,
  type HealOutcome,
  type MoveOutcome,
  prepareMapping,
  rewriteTarget,
  planHeal,
  applyEdits,
  healDocuments,
  moveFiles,
  healAndMove,
} from './core/healer.js';

export {
  type LinkCounts,
  type BrokenEntry,
  type EditEntry,
  type ValidationReport,
  type HealingReport,
  summarize,
  partitionBroken,
  buildHealingReport,
  formatTable,
  formatHealReport,
} from './core/reporter.js';

export { type CheckResult, type HealTreeOptions, checkTree, healTree } from './core/pipeline.js';

export { type LinkmendConfig, type ConfigOverrides, loadConfig, loadConfigFile } from './core/config.js';

export { parseRenamePairs, loadRenameMapping, parseRenameArg } from './core/mapping.js';

export { loadIgnorePatterns, isIgnored } from './core/ignore.js';

export {
  type ErrorCode,
  type ErrorRecord,
  LinkmendError,
  ConfigurationError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRewriteError,
  PathEscapeError,
  FileMoveError,
} from './core/errors.js';
