/**
 * Configuration loading and merging.
 *
 * Two layers: runtime settings resolved once from the environment, and the
 * per-project adoption config file (KEY=VALUE lines, or YAML when the file
 * name ends in .yml/.yaml). Resolution order for adoption values:
 * built-in defaults <- config file <- CLI flags, with shallow merge semantics.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { parse as parseYaml } from 'yaml';

import { expandHome } from './fs-utils.js';
import type { AdoptionConfig, CommandName, RuntimeSettings } from './types.js';
import { COMMAND_NAMES, UserError, ValidationError } from './types.js';

/** Environment variable naming the shared standards library location. */
export const STANDARDS_HOME_ENV = 'AGENTIC_BEST_PRACTICES_HOME';

const DEFAULT_STANDARDS_DIRNAME = 'agentic-best-practices';

/** Environment subset the settings are built from. */
export type SettingsEnv = Record<string, string | undefined>;

/**
 * Build runtime settings from the environment. Called once by the CLI; tests
 * construct settings directly.
 */
export function resolveSettings(env: SettingsEnv, overrides?: Partial<RuntimeSettings>): RuntimeSettings {
  const homeDir = overrides?.homeDir ?? env.HOME ?? homedir();
  const fromEnv = env[STANDARDS_HOME_ENV];
  const standardsHome =
    fromEnv !== undefined && fromEnv.trim().length > 0
      ? expandHome(fromEnv.trim(), homeDir)
      : join(homeDir, DEFAULT_STANDARDS_DIRNAME);

  return {
    standardsHome: overrides?.standardsHome ?? standardsHome,
    homeDir,
    templatesDir: overrides?.templatesDir ?? getBundledTemplatesDir(),
    now: overrides?.now ?? (() => new Date()),
  };
}

/** Directory of the templates shipped with the package (src/ and dist/ are siblings of it). */
export function getBundledTemplatesDir(): string {
  return fileURLToPath(new URL('../templates/', import.meta.url));
}

/** Built-in adoption values used when neither config nor flags provide one. */
export const ADOPTION_DEFAULTS = {
  agentRole: 'project-focused software engineer',
  projectDescription: 'this project',
  priorityOne: 'Correctness over speed',
  priorityTwo: 'Security over convenience',
  priorityThree: 'Readability over cleverness',
  deviationPolicy:
    'Do not deviate from these standards without explicit approval. If deviation is necessary, document it in the Project-Specific Overrides section with rationale.',
} as const;

type ScalarKey = Exclude<keyof AdoptionConfig, 'commands'>;

const SCALAR_KEYS: Record<string, ScalarKey> = {
  PROJECT_NAME: 'projectName',
  AGENT_ROLE: 'agentRole',
  PROJECT_DESCRIPTION: 'projectDescription',
  PRIORITY_ONE: 'priorityOne',
  PRIORITY_TWO: 'priorityTwo',
  PRIORITY_THREE: 'priorityThree',
  STANDARDS_TOPICS: 'standardsTopics',
  DEVIATION_POLICY: 'deviationPolicy',
};

const COMMAND_KEYS: Record<string, CommandName> = {
  DEV_CMD: 'dev',
  TEST_CMD: 'test',
  COVERAGE_CMD: 'coverage',
  LINT_CMD: 'lint',
  TYPECHECK_CMD: 'typecheck',
  BUILD_CMD: 'build',
};

/** Parsed config plus non-fatal problems (unknown keys). */
export interface LoadedConfig {
  config: AdoptionConfig;
  warnings: string[];
}

/** Strip one layer of matching single or double quotes. */
export function stripWrappingQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse KEY=VALUE config text.
 *
 * Blank lines and `#` comments are skipped. A non-empty line without `=` is an
 * error; unknown keys become warnings.
 */
export function parseKeyValueConfig(content: string, sourcePath: string): LoadedConfig {
  const config: AdoptionConfig = {};
  const warnings: string[] = [];

  const lines = content.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const lineNo = index + 1;
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }

    const eq = line.indexOf('=');
    if (eq < 0) {
      throw new ValidationError(
        `Invalid config entry at ${sourcePath}:${lineNo} (expected KEY=VALUE).`,
      );
    }

    const key = line.slice(0, eq).trim();
    const value = stripWrappingQuotes(line.slice(eq + 1).trim());
    if (key.length === 0) {
      return;
    }
    if (!applyConfigValue(config, key, value)) {
      warnings.push(`Unknown config key '${key}' ignored (${sourcePath}:${lineNo}).`);
    }
  });

  return { config, warnings };
}

/** Parse a YAML mapping with the same keys as the KEY=VALUE format. */
export function parseYamlConfig(content: string, sourcePath: string): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ValidationError(
      `Malformed YAML in config file: ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`,
      ['Check that the config file contains a YAML mapping of KEY: value pairs.'],
    );
  }

  if (parsed === null || parsed === undefined) {
    return { config: {}, warnings: [] };
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError(`Invalid config file (not a mapping): ${sourcePath}`);
  }

  const config: AdoptionConfig = {};
  const warnings: string[] = [];
  for (const [key, raw] of Object.entries(parsed)) {
    if (typeof raw !== 'string' && typeof raw !== 'number' && typeof raw !== 'boolean') {
      throw new ValidationError(`Invalid value for ${key} in ${sourcePath}: expected a scalar`);
    }
    if (!applyConfigValue(config, key, String(raw))) {
      warnings.push(`Unknown config key '${key}' ignored (${sourcePath}).`);
    }
  }
  return { config, warnings };
}

function applyConfigValue(config: AdoptionConfig, key: string, value: string): boolean {
  const scalarKey = SCALAR_KEYS[key];
  if (scalarKey) {
    config[scalarKey] = value;
    return true;
  }
  const commandKey = COMMAND_KEYS[key];
  if (commandKey) {
    const commands = { ...config.commands };
    commands[commandKey] = value;
    config.commands = commands;
    return true;
  }
  return false;
}

/** Read and parse an adoption config file. */
export async function loadAdoptionConfig(filePath: string): Promise<LoadedConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err: unknown) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      throw new UserError(`Config file not found: ${filePath}`, 'Check the --config-file path.');
    }
    throw new ValidationError(`Cannot read config file: ${filePath}: ${error.message}`);
  }

  if (/\.ya?ml$/i.test(filePath)) {
    return parseYamlConfig(content, filePath);
  }
  return parseKeyValueConfig(content, filePath);
}

/**
 * Shallow merge: defined override values replace base values. Empty strings
 * count as unset, matching how blank flags and `KEY=` lines behave.
 * Command overrides merge per command.
 */
export function mergeAdoptionConfigs(
  base: AdoptionConfig,
  override: AdoptionConfig,
): AdoptionConfig {
  const result: AdoptionConfig = { ...base };

  for (const key of Object.values(SCALAR_KEYS)) {
    const value = override[key];
    if (value !== undefined && value.length > 0) {
      result[key] = value;
    }
  }

  if (override.commands) {
    const commands = { ...base.commands };
    for (const name of COMMAND_NAMES) {
      const value = override.commands[name];
      if (value !== undefined && value.length > 0) {
        commands[name] = value;
      }
    }
    result.commands = commands;
  }

  return result;
}
