/**
 * merge-standards-reference: refresh the managed Standards Reference block in
 * an existing AGENTS.md without touching the rest of the file.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { writeFile } from 'atomically';

import type { LoadedConfig } from './config.js';
import { loadAdoptionConfig } from './config.js';
import {
  backupIfExists,
  expandHome,
  isDirectory,
  isFile,
  resolveFromProject,
  stripTrailingSlash,
} from './fs-utils.js';
import { mergeManagedBlock } from './managed-block.js';
import { buildStandardsBlock, parseStandardsTopics } from './standards.js';
import type { RuntimeSettings } from './types.js';
import { AGENTS_FILENAME, UserError } from './types.js';

/** Standards path as written into AGENTS.md, and where it points on disk. */
export interface StandardsLocation {
  docPath: string;
  resolvedPath: string;
}

/**
 * Expand `~/` and drop a trailing slash for the written form; resolve relative
 * paths against the project directory for the on-disk form.
 */
export function resolveStandardsLocation(
  standardsPath: string,
  projectDir: string,
  homeDir: string,
): StandardsLocation {
  return {
    docPath: stripTrailingSlash(expandHome(standardsPath, homeDir)),
    resolvedPath: resolveFromProject(standardsPath, projectDir, homeDir),
  };
}

export interface MergeOptions {
  projectDir: string;
  standardsPath?: string | undefined;
  configFile?: string | undefined;
  /** Overrides STANDARDS_TOPICS from the config file */
  standardsTopics?: string | undefined;
  /** Overrides DEVIATION_POLICY from the config file */
  deviationPolicy?: string | undefined;
}

export interface MergeResult {
  changed: boolean;
  agentsPath: string;
  backupPath: string | null;
  standardsPath: string;
  /** Non-fatal config problems */
  warnings: string[];
}

/** Merge the managed block into `<projectDir>/AGENTS.md`. */
export async function mergeStandardsReference(
  options: MergeOptions,
  settings: RuntimeSettings,
): Promise<MergeResult> {
  const projectDir = resolve(expandHome(options.projectDir, settings.homeDir));
  if (!isDirectory(projectDir)) {
    throw new UserError(`Project directory not found: ${options.projectDir}`);
  }

  const location = resolveStandardsLocation(
    options.standardsPath ?? settings.standardsHome,
    projectDir,
    settings.homeDir,
  );
  if (!isDirectory(location.resolvedPath)) {
    throw new UserError(
      `Standards path does not exist: ${location.resolvedPath}`,
      'Pass --standards-path or set AGENTIC_BEST_PRACTICES_HOME.',
    );
  }

  const loaded: LoadedConfig = options.configFile
    ? await loadAdoptionConfig(expandHome(options.configFile, settings.homeDir))
    : { config: {}, warnings: [] };

  const agentsPath = join(projectDir, AGENTS_FILENAME);
  if (!isFile(agentsPath)) {
    throw new UserError(
      `${AGENTS_FILENAME} not found in project: ${projectDir}`,
      'Use adopt-into-project for first-time setup.',
    );
  }

  const topics = parseStandardsTopics(
    options.standardsTopics ?? loaded.config.standardsTopics,
    location.docPath,
    settings.homeDir,
  );
  const block = buildStandardsBlock({
    standardsPath: location.docPath,
    topics,
    deviationPolicy: options.deviationPolicy ?? loaded.config.deviationPolicy,
  });

  const current = await readFile(agentsPath, 'utf-8');
  const merged = mergeManagedBlock(current, block);

  if (merged === current) {
    return {
      changed: false,
      agentsPath,
      backupPath: null,
      standardsPath: location.docPath,
      warnings: loaded.warnings,
    };
  }

  const backupPath = await backupIfExists(agentsPath, settings.now());
  await writeFile(agentsPath, merged);
  return {
    changed: true,
    agentsPath,
    backupPath,
    standardsPath: location.docPath,
    warnings: loaded.warnings,
  };
}
