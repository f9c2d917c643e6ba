/**
 * agents-adopt -- Adopt a shared standards library through a managed AGENTS.md.
 *
 * Library exports for programmatic usage.
 */

export type {
  AdoptionConfig,
  AdoptionMode,
  CheckReport,
  ClaudeMode,
  CommandName,
  CommandSet,
  CriticalPaths,
  ErrorCategory,
  ExistingMode,
  Finding,
  FindingSeverity,
  GlobalOptions,
  PinMetadata,
  RuntimeSettings,
  StackKind,
  StackProfile,
  StandardsTopic,
} from './types.js';

export {
  AdoptError,
  GitError,
  UserError,
  ValidationError,
  AGENTS_FILENAME,
  CLAUDE_FILENAME,
  DEFAULT_PILOT_DIR,
  DEFAULT_PINNED_DIR,
  PIN_METADATA_FILENAME,
} from './types.js';

export {
  resolveSettings,
  loadAdoptionConfig,
  parseKeyValueConfig,
  parseYamlConfig,
  mergeAdoptionConfigs,
  ADOPTION_DEFAULTS,
} from './config.js';
export { detectStack, applyCommandOverrides } from './stack.js';
export { renderTemplate, stripSetupInstructions, findTokens } from './template.js';
export type { TemplateBindings } from './template.js';
export {
  buildStandardsBlock,
  parseStandardsTopics,
  parseStandardsPath,
  resolveGuidePath,
  MANAGED_BEGIN,
  MANAGED_END,
} from './standards.js';
export { removeManagedBlock, insertManagedBlock, mergeManagedBlock } from './managed-block.js';
export { mergeStandardsReference } from './merge.js';
export type { MergeOptions, MergeResult } from './merge.js';
export { pinStandardsVersion, sanitizeRefName, snapshotName, readPinMetadata } from './pin.js';
export type { PinOptions, PinResult } from './pin.js';
export type { GitClient } from './git.js';
export { ExecaGitClient } from './git.js';
export { adoptIntoProject, renderAgentsFile } from './adopt.js';
export type { AdoptOptions, AdoptResult } from './adopt.js';
export { validateAdoption } from './validate.js';
export type { ValidateOptions, ValidationReport } from './validate.js';
export { preparePilotProject, checkPilotReadiness, summarizePilotFindings } from './pilot.js';
export type {
  PreparePilotOptions,
  PreparePilotResult,
  PilotReadinessOptions,
  PilotReadinessReport,
  PilotSummaryOptions,
  PilotSummaryResult,
} from './pilot.js';
export { checkGuideFreshness } from './freshness.js';
export type { FreshnessOptions, FreshnessReport } from './freshness.js';
export { reportPassed } from './report.js';
export { createProgram } from './commands.js';
export { formatJson, formatJsonError } from './format.js';
