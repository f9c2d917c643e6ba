/**
 * Shared type definitions for agents-adopt.
 *
 * Central types and error classes used across the codebase. No runtime logic
 * beyond error formatting.
 */

export type AdoptionMode = 'latest' | 'pinned';
export type ExistingMode = 'fail' | 'overwrite' | 'merge';
export type ClaudeMode = 'auto' | 'symlink' | 'copy' | 'skip';

export const ADOPTION_MODES: readonly AdoptionMode[] = ['latest', 'pinned'];
export const EXISTING_MODES: readonly ExistingMode[] = ['fail', 'overwrite', 'merge'];
export const CLAUDE_MODES: readonly ClaudeMode[] = ['auto', 'symlink', 'copy', 'skip'];

export const AGENTS_FILENAME = 'AGENTS.md';
export const CLAUDE_FILENAME = 'CLAUDE.md';

/** Project-relative default for pinned snapshots. */
export const DEFAULT_PINNED_DIR = '.agentic-best-practices/pinned';
/** Project-relative default for pilot artifacts. */
export const DEFAULT_PILOT_DIR = '.agentic-best-practices/pilot';
export const PIN_METADATA_FILENAME = '.abp-pin.json';

/**
 * Process-wide settings, resolved once at startup and passed down.
 * Nothing below the CLI layer reads the environment directly.
 */
export interface RuntimeSettings {
  /** Default standards library location */
  standardsHome: string;
  /** Home directory used for `~/` expansion */
  homeDir: string;
  /** Directory holding the bundled markdown templates */
  templatesDir: string;
  /** Clock for backups, pin metadata and pilot dates */
  now: () => Date;
}

/** Values read from a KEY=VALUE (or YAML) adoption config file. */
export interface AdoptionConfig {
  projectName?: string | undefined;
  agentRole?: string | undefined;
  projectDescription?: string | undefined;
  priorityOne?: string | undefined;
  priorityTwo?: string | undefined;
  priorityThree?: string | undefined;
  standardsTopics?: string | undefined;
  deviationPolicy?: string | undefined;
  commands?: Partial<CommandSet> | undefined;
}

/** The six commands every rendered AGENTS.md lists. */
export interface CommandSet {
  dev: string;
  test: string;
  coverage: string;
  lint: string;
  typecheck: string;
  build: string;
}

export type CommandName = keyof CommandSet;

export const COMMAND_NAMES: readonly CommandName[] = [
  'dev',
  'test',
  'coverage',
  'lint',
  'typecheck',
  'build',
];

/** Paths an agent should read first, guessed per stack. */
export interface CriticalPaths {
  entry: string;
  config: string;
  routes: string;
  services: string;
  types: string;
}

export type StackKind = 'node' | 'python' | 'go' | 'rust' | 'jvm' | 'generic';

interface StackProfileBase {
  language: string;
  languageVersion: string;
  runtime: string;
  runtimeVersion: string;
  framework: string;
  frameworkVersion: string;
  testing: string;
  testingVersion: string;
  commands: CommandSet;
  criticalPaths: CriticalPaths;
}

export type PackageManager = 'npm' | 'pnpm' | 'yarn' | 'bun';
export type PythonRunner = 'uv' | 'poetry' | 'pipenv' | 'none';
export type JvmBuildTool = 'gradle' | 'maven-wrapper' | 'maven';

/** Detected project stack. Each variant carries the facts its commands came from. */
export type StackProfile =
  | (StackProfileBase & { kind: 'node'; packageManager: PackageManager; scripts: string[] })
  | (StackProfileBase & { kind: 'python'; runner: PythonRunner })
  | (StackProfileBase & { kind: 'go' })
  | (StackProfileBase & { kind: 'rust' })
  | (StackProfileBase & { kind: 'jvm'; buildTool: JvmBuildTool })
  | (StackProfileBase & { kind: 'generic' });

/** One row of the Standards Reference table. */
export interface StandardsTopic {
  topic: string;
  guidePath: string;
}

/** Contents of `.abp-pin.json` inside a pinned snapshot. */
export interface PinMetadata {
  source_repo_path: string;
  source_repo_remote: string;
  pinned_ref: string;
  resolved_sha: string;
  snapshot_name: string;
  pinned_at_utc: string;
}

/** Stable field ordering for pin metadata serialization. */
export const PIN_METADATA_FIELD_ORDER = [
  'source_repo_path',
  'source_repo_remote',
  'pinned_ref',
  'resolved_sha',
  'snapshot_name',
  'pinned_at_utc',
] as const;

export type FindingSeverity = 'error' | 'warning' | 'info';

/** A single validation or readiness check result. */
export interface Finding {
  check: string;
  severity: FindingSeverity;
  message: string;
  /** Extra lines, e.g. offending placeholder lines */
  details?: string[] | undefined;
}

/** Aggregated findings of a read-only check run. */
export interface CheckReport {
  findings: Finding[];
  errors: number;
  warnings: number;
}

/** Global CLI options shared across all commands. */
export interface GlobalOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
}

export type ErrorCategory = 'usage' | 'precondition' | 'validation' | 'git' | 'unknown';

/** Structured CLI error with category and optional troubleshooting. */
export class AdoptError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly exitCode = 1,
    public readonly suggestions?: string[],
  ) {
    super(message);
    this.name = 'AdoptError';
  }
}

/** Validation error for malformed input (config, topics, templates, metadata). */
export class ValidationError extends AdoptError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'validation', 1, suggestions);
    this.name = 'ValidationError';
  }
}

/** Git invocation failure (not a repository, unresolvable ref, archive failure). */
export class GitError extends AdoptError {
  constructor(message: string, suggestions?: string[]) {
    super(message, 'git', 1, suggestions);
    this.name = 'GitError';
  }
}

/**
 * Precondition failure with a single actionable hint.
 * Reported before anything is written.
 */
export class UserError extends AdoptError {
  constructor(
    message: string,
    public readonly hint?: string,
    exitCode = 1,
  ) {
    super(message, 'precondition', exitCode, hint ? [hint] : undefined);
    this.name = 'UserError';
  }

  format(): string {
    return this.hint ? `✗ ${this.message}\n  ${this.hint}` : `✗ ${this.message}`;
  }
}
