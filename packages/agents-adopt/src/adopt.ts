/**
 * adopt-into-project: create or update a project's AGENTS.md (and CLAUDE.md)
 * from the standards template.
 *
 * Existing files are handled per the existing mode: fail, overwrite (with a
 * backup) or merge (refresh only the managed Standards Reference block).
 * Pinned adoption first snapshots the standards repository into the project
 * and points AGENTS.md at the snapshot.
 */

import { readFile, readlink, symlink, unlink } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

import { writeFile } from 'atomically';

import type { LoadedConfig } from './config.js';
import { ADOPTION_DEFAULTS, loadAdoptionConfig, mergeAdoptionConfigs } from './config.js';
import { backupIfExists, expandHome, isDirectory, isFile, isSymlink, pathExistsOrLink } from './fs-utils.js';
import type { GitClient } from './git.js';
import { mergeStandardsReference, resolveStandardsLocation } from './merge.js';
import { pinStandardsVersion } from './pin.js';
import { detectStack, applyCommandOverrides } from './stack.js';
import { buildGuideRows, buildStandardsBlock, parseStandardsTopics } from './standards.js';
import { LEGACY_STANDARDS_HOME_LITERAL, renderTemplate, stackTemplateValues } from './template.js';
import type {
  AdoptionConfig,
  AdoptionMode,
  ClaudeMode,
  CommandSet,
  ExistingMode,
  RuntimeSettings,
  StackKind,
} from './types.js';
import { AGENTS_FILENAME, CLAUDE_FILENAME, UserError } from './types.js';

export const DEFAULT_TEMPLATE_FILENAME = 'agents-template.md';

export interface AdoptOptions {
  projectDir: string;
  standardsPath?: string | undefined;
  templatePath?: string | undefined;
  configFile?: string | undefined;
  projectName?: string | undefined;
  agentRole?: string | undefined;
  projectDescription?: string | undefined;
  priorityOne?: string | undefined;
  priorityTwo?: string | undefined;
  priorityThree?: string | undefined;
  adoptionMode?: AdoptionMode | undefined;
  pinnedRef?: string | undefined;
  pinnedDir?: string | undefined;
  existingMode?: ExistingMode | undefined;
  claudeMode?: ClaudeMode | undefined;
  force?: boolean | undefined;
  /** Command overrides applied on top of the config file */
  commands?: Partial<CommandSet> | undefined;
}

export type AdoptOperation =
  | 'rendered-template'
  | 'merged-standards-reference'
  | 'overwrote-existing-agents';

export type ClaudeStatus =
  | 'created'
  | 'overwritten'
  | 'kept-existing-symlink'
  | 'kept-existing-copy'
  | 'kept-existing-different'
  | 'skipped';

export interface AdoptResult {
  operation: AdoptOperation;
  projectDir: string;
  agentsPath: string;
  claudePath: string;
  claudeStatus: ClaudeStatus;
  adoptionMode: AdoptionMode;
  pinnedRef?: string | undefined;
  /** Standards repository the adoption was made from */
  standardsSource: string;
  /** Standards path written into AGENTS.md */
  standardsPath: string;
  stack: StackKind | null;
  backups: string[];
  warnings: string[];
}

/** Inputs to one AGENTS.md render. */
export interface RenderAgentsInput {
  projectDir: string;
  templateText: string;
  standardsPath: string;
  config: AdoptionConfig;
  projectName: string;
  homeDir: string;
}

/** Render AGENTS.md text for a project from a template. */
export function renderAgentsFile(input: RenderAgentsInput): { text: string; stack: StackKind } {
  const stack = detectStack(input.projectDir);
  const { config } = input;
  const topics = parseStandardsTopics(config.standardsTopics, input.standardsPath, input.homeDir);
  const deviationPolicy = config.deviationPolicy ?? ADOPTION_DEFAULTS.deviationPolicy;

  const text = renderTemplate(input.templateText, {
    values: {
      ...stackTemplateValues(stack),
      projectName: input.projectName,
      agentRole: config.agentRole,
      projectDescription: config.projectDescription,
      priorityOne: config.priorityOne,
      priorityTwo: config.priorityTwo,
      priorityThree: config.priorityThree,
    },
    commands: applyCommandOverrides(stack.commands, config.commands),
    criticalPaths: stack.criticalPaths,
    tokens: {
      STANDARDS_REFERENCE: buildStandardsBlock({
        standardsPath: input.standardsPath,
        topics,
        deviationPolicy,
      }),
      STANDARDS_GUIDE_ROWS: buildGuideRows(topics),
      DEVIATION_POLICY: deviationPolicy,
      STANDARDS_PATH: input.standardsPath,
    },
    literals: { [LEGACY_STANDARDS_HOME_LITERAL]: input.standardsPath },
  });
  return { text, stack: stack.kind };
}

function flagConfig(options: AdoptOptions): AdoptionConfig {
  return {
    projectName: options.projectName,
    agentRole: options.agentRole,
    projectDescription: options.projectDescription,
    priorityOne: options.priorityOne,
    priorityTwo: options.priorityTwo,
    priorityThree: options.priorityThree,
    commands: options.commands,
  };
}

async function writeClaudeFile(agentsPath: string, claudePath: string, mode: ClaudeMode): Promise<void> {
  const copy = async (): Promise<void> => {
    await writeFile(claudePath, await readFile(agentsPath));
  };
  if (mode === 'copy') {
    await copy();
    return;
  }
  try {
    await symlink(AGENTS_FILENAME, claudePath);
  } catch (err) {
    if (mode === 'symlink') {
      throw err;
    }
    await copy();
  }
}

async function classifyExistingClaude(agentsPath: string, claudePath: string): Promise<ClaudeStatus> {
  if (isSymlink(claudePath) && (await readlink(claudePath)) === AGENTS_FILENAME) {
    return 'kept-existing-symlink';
  }
  if (isFile(claudePath) && !isSymlink(claudePath)) {
    const [agents, claude] = await Promise.all([readFile(agentsPath), readFile(claudePath)]);
    if (agents.equals(claude)) {
      return 'kept-existing-copy';
    }
  }
  return 'kept-existing-different';
}

/** Adopt the standards into a project. */
export async function adoptIntoProject(
  options: AdoptOptions,
  settings: RuntimeSettings,
  git?: GitClient,
): Promise<AdoptResult> {
  const projectDir = resolve(expandHome(options.projectDir, settings.homeDir));
  if (!isDirectory(projectDir)) {
    throw new UserError(`Project directory does not exist: ${options.projectDir}`);
  }

  const source = resolveStandardsLocation(
    options.standardsPath ?? settings.standardsHome,
    projectDir,
    settings.homeDir,
  );
  if (!isDirectory(source.resolvedPath)) {
    throw new UserError(
      `Standards path does not exist: ${source.resolvedPath}`,
      'Pass --standards-path or set AGENTIC_BEST_PRACTICES_HOME.',
    );
  }

  const loaded: LoadedConfig = options.configFile
    ? await loadAdoptionConfig(expandHome(options.configFile, settings.homeDir))
    : { config: {}, warnings: [] };
  const config = mergeAdoptionConfigs(
    mergeAdoptionConfigs({ ...ADOPTION_DEFAULTS }, loaded.config),
    flagConfig(options),
  );
  const projectName =
    config.projectName !== undefined && config.projectName.length > 0
      ? config.projectName
      : basename(projectDir);

  const force = options.force ?? false;
  const claudeMode = options.claudeMode ?? 'auto';
  const adoptionMode = options.adoptionMode ?? 'latest';
  let existingMode = options.existingMode ?? 'fail';
  if (force && existingMode === 'fail') {
    existingMode = 'overwrite';
  }

  const agentsPath = join(projectDir, AGENTS_FILENAME);
  const claudePath = join(projectDir, CLAUDE_FILENAME);
  const agentsExists = pathExistsOrLink(agentsPath);
  if (agentsExists && existingMode === 'fail') {
    throw new UserError(
      `${AGENTS_FILENAME} already exists in ${projectDir}`,
      'Use --existing-mode merge, --existing-mode overwrite, or --force.',
    );
  }

  if (adoptionMode === 'pinned' && !options.pinnedRef) {
    throw new UserError('--pinned-ref is required when --adoption-mode pinned.');
  }

  const mergeExisting = agentsExists && existingMode === 'merge';
  let templateText: string | null = null;
  if (!mergeExisting) {
    const templatePath = options.templatePath
      ? expandHome(options.templatePath, settings.homeDir)
      : join(settings.templatesDir, DEFAULT_TEMPLATE_FILENAME);
    if (!isFile(templatePath)) {
      throw new UserError(`Template file not found: ${templatePath}`);
    }
    templateText = await readFile(templatePath, 'utf-8');
  }
  const render = (text: string, standardsPath: string): { text: string; stack: StackKind } =>
    renderAgentsFile({
      projectDir,
      templateText: text,
      standardsPath,
      config,
      projectName,
      homeDir: settings.homeDir,
    });

  // Template errors surface before any snapshot is written.
  let rendered = templateText === null ? null : render(templateText, source.docPath);

  let standardsPath = source.docPath;
  if (adoptionMode === 'pinned' && options.pinnedRef) {
    const pin = await pinStandardsVersion(
      {
        projectDir,
        pinnedRef: options.pinnedRef,
        standardsPath: source.resolvedPath,
        pinnedDir: options.pinnedDir,
      },
      settings,
      git,
    );
    standardsPath = pin.relativePath;
    if (templateText !== null) {
      rendered = render(templateText, standardsPath);
    }
  }

  const backups: string[] = [];
  const warnings = [...loaded.warnings];
  let operation: AdoptOperation;
  let stack: StackKind | null = null;

  if (mergeExisting || rendered === null) {
    const merged = await mergeStandardsReference(
      {
        projectDir,
        standardsPath,
        standardsTopics: config.standardsTopics,
        deviationPolicy: config.deviationPolicy,
      },
      settings,
    );
    if (merged.backupPath) {
      backups.push(merged.backupPath);
    }
    operation = 'merged-standards-reference';
  } else {
    stack = rendered.stack;

    if (agentsExists) {
      const backup = await backupIfExists(agentsPath, settings.now());
      if (backup) {
        backups.push(backup);
      }
      if (isSymlink(agentsPath)) {
        await unlink(agentsPath);
      }
      operation = 'overwrote-existing-agents';
    } else {
      operation = 'rendered-template';
    }
    await writeFile(agentsPath, rendered.text);
  }

  let claudeStatus: ClaudeStatus = 'skipped';
  if (claudeMode !== 'skip') {
    if (pathExistsOrLink(claudePath)) {
      if (force) {
        const backup = await backupIfExists(claudePath, settings.now());
        if (backup) {
          backups.push(backup);
        }
        await unlink(claudePath);
        await writeClaudeFile(agentsPath, claudePath, claudeMode);
        claudeStatus = 'overwritten';
      } else {
        claudeStatus = await classifyExistingClaude(agentsPath, claudePath);
        if (claudeStatus === 'kept-existing-different') {
          warnings.push(
            `${CLAUDE_FILENAME} exists and differs from ${AGENTS_FILENAME}. Use --force to overwrite or --claude-mode skip to ignore.`,
          );
        }
      }
    } else {
      await writeClaudeFile(agentsPath, claudePath, claudeMode);
      claudeStatus = 'created';
    }
  }

  return {
    operation,
    projectDir,
    agentsPath,
    claudePath,
    claudeStatus,
    adoptionMode,
    pinnedRef: adoptionMode === 'pinned' ? options.pinnedRef : undefined,
    standardsSource: source.resolvedPath,
    standardsPath,
    stack,
    backups,
    warnings,
  };
}
