/**
 * validate-adoption: read-only checks of a project's AGENTS.md and CLAUDE.md.
 *
 * Every problem becomes a finding; nothing here throws for content issues.
 * Only a missing project directory is a precondition error.
 */

import { readFile, readlink } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { expandHome, isDirectory, isFile, isSymlink, pathExistsOrLink, resolveFromProject } from './fs-utils.js';
import { countManagedMarkers } from './managed-block.js';
import { readPinMetadata } from './pin.js';
import { ReportBuilder } from './report.js';
import { DEVIATION_POLICY_PREFIX, parseStandardsPath } from './standards.js';
import { SETUP_BLOCK_MARKER, findPlaceholderLines, findTokenLines } from './template.js';
import type { CheckReport, RuntimeSettings } from './types.js';
import { AGENTS_FILENAME, CLAUDE_FILENAME, UserError } from './types.js';

export const RECOMMENDED_HEADINGS = ['## Agent Role', '## Tech Stack', '## Key Commands', '## Boundaries'];

const STANDARDS_HEADING = /^##\s+Standards Reference\s*$/;
const GUIDE_REFERENCE = /`([^`]+guides\/[^`]+\.md)`/g;
const MIN_GUIDE_REFERENCES = 3;

export interface ValidateOptions {
  projectDir: string;
  expectStandardsPath?: string | undefined;
}

export interface ValidationReport extends CheckReport {
  projectDir: string;
  /** Standards path as written in AGENTS.md, when it could be parsed */
  standardsPath: string | null;
}

/** True for paths inside a project's pinned snapshots directory. */
export function isPinnedPath(path: string): boolean {
  return (
    path.includes('/.agentic-best-practices/pinned/') ||
    path.startsWith('.agentic-best-practices/pinned/') ||
    path.startsWith('./.agentic-best-practices/pinned/')
  );
}

/** Tags like v1.2.3 / 1.2.3-rc1, or a 7-40 char hex commit SHA. */
export function looksLikeVersionOrSha(ref: string): boolean {
  return /^v?\d+\.\d+\.\d+([-.][A-Za-z0-9]+)?$/.test(ref) || /^[0-9a-f]{7,40}$/.test(ref);
}

/** Distinct guide references (`...guides/....md`) in backticks, sorted. */
export function extractGuideReferences(content: string): string[] {
  const refs = new Set<string>();
  for (const line of content.split('\n')) {
    for (const match of line.matchAll(GUIDE_REFERENCE)) {
      if (match[1]) {
        refs.add(match[1]);
      }
    }
  }
  return [...refs].sort();
}

async function checkStandardsPath(
  report: ReportBuilder,
  standardsPath: string,
  projectDir: string,
  options: ValidateOptions,
  homeDir: string,
): Promise<void> {
  const resolved = resolveFromProject(standardsPath, projectDir, homeDir);
  if (!isDirectory(resolved)) {
    report.error('standards-path', `Standards path does not exist: ${resolved}`);
  } else {
    report.pass('standards-path', `Standards path exists: ${resolved}`);
    if (!isFile(join(resolved, 'README.md'))) {
      report.warn('standards-readme', `Standards path does not contain README.md: ${resolved}`);
    }
  }

  if (isPinnedPath(standardsPath)) {
    const metadata = await readPinMetadata(resolved);
    if (!metadata) {
      report.error('pin-metadata', `Pinned standards path is missing .abp-pin.json metadata: ${resolved}`);
    } else if (metadata.pinned_ref.length === 0) {
      report.warn('pinned-ref', `Pinned metadata exists but pinned_ref could not be parsed: ${resolved}`);
    } else if (!looksLikeVersionOrSha(metadata.pinned_ref)) {
      report.warn(
        'pinned-ref',
        `Pinned metadata uses non-version/non-sha ref ('${metadata.pinned_ref}'); prefer tags or commit SHA for reproducibility`,
      );
    } else {
      report.pass('pinned-ref', `Pinned to ${metadata.pinned_ref} (${metadata.resolved_sha.slice(0, 12)})`);
    }
  }

  if (options.expectStandardsPath !== undefined && options.expectStandardsPath.length > 0) {
    const expected = resolveFromProject(options.expectStandardsPath, projectDir, homeDir);
    if (expected !== resolved) {
      report.error(
        'expected-path',
        `Standards path mismatch. Expected '${expected}' but ${AGENTS_FILENAME} uses '${resolved}'`,
      );
    }
  }
}

async function checkAgentsFile(
  report: ReportBuilder,
  content: string,
  projectDir: string,
  options: ValidateOptions,
  homeDir: string,
): Promise<string | null> {
  if (content.includes(SETUP_BLOCK_MARKER)) {
    report.error('setup-instructions', `Template setup instructions are still present in ${AGENTS_FILENAME}`);
  }

  const placeholders = findPlaceholderLines(content);
  if (placeholders.length > 0) {
    report.error(
      'placeholders',
      `Unresolved template placeholders found in ${AGENTS_FILENAME}`,
      placeholders.map((p) => `${p.line}:${p.text}`),
    );
  }
  const tokens = findTokenLines(content);
  if (tokens.length > 0) {
    report.error(
      'tokens',
      `Unresolved token placeholders found in ${AGENTS_FILENAME}`,
      tokens.map((t) => `${t.line}:${t.text}`),
    );
  }

  const lines = content.split('\n').map((line) => line.replace(/\r$/, ''));
  const sectionCount = lines.filter((line) => STANDARDS_HEADING.test(line)).length;
  if (sectionCount === 0) {
    report.error('standards-section', 'Missing required section: ## Standards Reference');
  } else if (sectionCount > 1) {
    report.error('standards-section', `Multiple Standards Reference sections detected (${sectionCount})`);
  } else {
    report.pass('standards-section', 'Standards Reference section present');
  }

  if (!content.includes(DEVIATION_POLICY_PREFIX)) {
    report.error('deviation-policy', `Deviation policy statement is missing from ${AGENTS_FILENAME}`);
  }

  const markers = countManagedMarkers(content);
  if (markers.begin !== markers.end) {
    report.error(
      'managed-markers',
      `Managed standards markers are unbalanced (${markers.begin} begin, ${markers.end} end)`,
    );
  }

  for (const heading of RECOMMENDED_HEADINGS) {
    if (!content.includes(heading)) {
      report.warn('recommended-sections', `Missing recommended section: ${heading}`);
    }
  }

  if (content.includes('TODO: set command for')) {
    report.warn('todo-commands', 'Key Commands still contain TODO placeholders');
  }

  const standardsPath = parseStandardsPath(content);
  if (standardsPath === null) {
    report.error('standards-path', `Could not parse standards path from ${AGENTS_FILENAME} Standards Reference`);
  } else {
    await checkStandardsPath(report, standardsPath, projectDir, options, homeDir);
  }

  const guideRefs = extractGuideReferences(content);
  if (guideRefs.length === 0) {
    report.error('guide-references', `No guide references found in ${AGENTS_FILENAME}`);
  } else {
    if (guideRefs.length < MIN_GUIDE_REFERENCES) {
      report.warn(
        'guide-references',
        `Only ${guideRefs.length} guide references found; expected at least ${MIN_GUIDE_REFERENCES} references for effective guidance`,
      );
    }
    let missing = 0;
    for (const ref of guideRefs) {
      const resolved = resolveFromProject(ref, projectDir, homeDir);
      if (!isFile(resolved)) {
        missing++;
        report.error('guide-references', `Guide reference does not exist: ${resolved}`);
      }
    }
    if (missing === 0) {
      report.pass('guide-references', `${guideRefs.length} guide references resolve`);
    }
  }

  return standardsPath;
}

async function checkClaudeFile(report: ReportBuilder, projectDir: string): Promise<void> {
  const agentsPath = join(projectDir, AGENTS_FILENAME);
  const claudePath = join(projectDir, CLAUDE_FILENAME);

  if (!pathExistsOrLink(claudePath)) {
    report.warn('claude-file', `${CLAUDE_FILENAME} not found (recommended so Claude reads the same instructions)`);
    return;
  }
  if (isSymlink(claudePath)) {
    const target = await readlink(claudePath);
    if (target !== AGENTS_FILENAME) {
      report.warn('claude-file', `${CLAUDE_FILENAME} symlink target is '${target}' (expected ${AGENTS_FILENAME})`);
    } else {
      report.pass('claude-file', `${CLAUDE_FILENAME} links to ${AGENTS_FILENAME}`);
    }
    return;
  }
  if (isFile(claudePath)) {
    const claude = await readFile(claudePath);
    const agents = isFile(agentsPath) ? await readFile(agentsPath) : null;
    if (!agents?.equals(claude)) {
      report.warn('claude-file', `${CLAUDE_FILENAME} exists but differs from ${AGENTS_FILENAME}`);
    } else {
      report.pass('claude-file', `${CLAUDE_FILENAME} matches ${AGENTS_FILENAME}`);
    }
  }
}

/** Validate an adopted project. */
export async function validateAdoption(
  options: ValidateOptions,
  settings: RuntimeSettings,
): Promise<ValidationReport> {
  const projectDir = resolve(expandHome(options.projectDir, settings.homeDir));
  if (!isDirectory(projectDir)) {
    throw new UserError(`Project directory not found: ${options.projectDir}`);
  }

  const report = new ReportBuilder();
  const agentsPath = join(projectDir, AGENTS_FILENAME);
  let standardsPath: string | null = null;

  if (!isFile(agentsPath)) {
    report.error('agents-file', `${AGENTS_FILENAME} not found at ${agentsPath}`);
  } else {
    report.pass('agents-file', `${AGENTS_FILENAME} found`);
    const content = await readFile(agentsPath, 'utf-8');
    standardsPath = await checkAgentsFile(report, content, projectDir, options, settings.homeDir);
  }

  await checkClaudeFile(report, projectDir);

  return { ...report.build(), projectDir, standardsPath };
}
