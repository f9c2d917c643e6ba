/**
 * Adoption pilot tooling: artifact scaffolding, readiness checks and the
 * findings summary.
 *
 * Pilot artifacts live in a project-relative directory (default
 * `.agentic-best-practices/pilot`). Weekly check-ins are `weekly-*.md` files and
 * completed retrospectives are `retrospective*.md` files, templates excluded.
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { writeFile } from 'atomically';
import picomatch from 'picomatch';

import type { AdoptOptions, AdoptResult } from './adopt.js';
import { adoptIntoProject } from './adopt.js';
import { ensureDir, expandHome, isDirectory, isFile, pathExistsOrLink, resolveFromProject } from './fs-utils.js';
import type { GitClient } from './git.js';
import { formatUtcTimestamp } from './pin.js';
import { ReportBuilder, reportPassed } from './report.js';
import { renderTemplate } from './template.js';
import type { CheckReport, RuntimeSettings } from './types.js';
import { AGENTS_FILENAME, CLAUDE_FILENAME, DEFAULT_PILOT_DIR, UserError } from './types.js';
import type { ValidationReport } from './validate.js';
import { validateAdoption } from './validate.js';

export const KICKOFF_FILENAME = 'kickoff.md';
export const WEEKLY_TEMPLATE_FILENAME = 'weekly-checkin-template.md';
export const RETROSPECTIVE_TEMPLATE_FILENAME = 'retrospective-template.md';
export const PILOT_README_FILENAME = 'README.md';
export const PILOT_SUMMARY_FILENAME = 'pilot-summary.md';

/** Generated artifact name and the bundled template it is rendered from. */
export const PILOT_ARTIFACTS = [
  { filename: KICKOFF_FILENAME, template: 'pilot-kickoff-template.md' },
  { filename: WEEKLY_TEMPLATE_FILENAME, template: 'pilot-weekly-checkin-template.md' },
  { filename: RETROSPECTIVE_TEMPLATE_FILENAME, template: 'pilot-retrospective-template.md' },
] as const;

const REQUIRED_PILOT_FILES = [
  KICKOFF_FILENAME,
  WEEKLY_TEMPLATE_FILENAME,
  RETROSPECTIVE_TEMPLATE_FILENAME,
  PILOT_README_FILENAME,
];

const isWeeklyName = picomatch('weekly-*.md');
const isRetrospectiveName = picomatch('retrospective*.md');

const START_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** `YYYY-MM-DD` in local time. */
export function formatLocalDate(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Reject anything but a non-negative integer count. */
export function assertMinWeeklyCheckins(value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new UserError('--min-weekly-checkins must be a non-negative integer.');
  }
}

function resolveProjectDir(projectDir: string, homeDir: string): string {
  const resolved = resolve(expandHome(projectDir, homeDir));
  if (!isDirectory(resolved)) {
    throw new UserError(`Project directory not found: ${projectDir}`);
  }
  return resolved;
}

export interface PilotFiles {
  /** Weekly check-in paths, sorted */
  weekly: string[];
  /** Completed retrospective paths, sorted */
  retrospectives: string[];
}

/** Weekly check-ins and completed retrospectives directly inside the pilot dir. */
export async function listPilotFiles(pilotDir: string): Promise<PilotFiles> {
  const entries = await readdir(pilotDir, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
  return {
    weekly: names
      .filter((name) => isWeeklyName(name) && name !== WEEKLY_TEMPLATE_FILENAME)
      .map((name) => join(pilotDir, name)),
    retrospectives: names
      .filter((name) => isRetrospectiveName(name) && name !== RETROSPECTIVE_TEMPLATE_FILENAME)
      .map((name) => join(pilotDir, name)),
  };
}

// --- prepare-pilot-project ---

export interface PreparePilotOptions extends AdoptOptions {
  pilotDir?: string | undefined;
  pilotOwner?: string | undefined;
  /** `YYYY-MM-DD`; defaults to today */
  startDate?: string | undefined;
  /** Replace existing pilot artifacts */
  overwrite?: boolean | undefined;
}

export interface PreparePilotResult {
  adoption: AdoptResult;
  validation: ValidationReport;
  projectName: string;
  pilotDir: string;
  pilotOwner: string;
  startDate: string;
  /** Standards path as written in AGENTS.md */
  standardsPath: string;
  written: string[];
  skipped: string[];
}

interface PilotReadmeInput {
  projectName: string;
  projectDir: string;
  adoptionMode: string;
  standardsPath: string;
  pilotOwner: string;
  startDate: string;
}

function buildPilotReadme(input: PilotReadmeInput): string {
  return `# Adoption Pilot Artifacts

Generated by \`agents-adopt prepare-pilot-project\` on ${input.startDate}.

| File | Purpose |
| --- | --- |
| ${KICKOFF_FILENAME} | Pilot setup checklist and baseline metadata |
| ${WEEKLY_TEMPLATE_FILENAME} | Weekly progress and friction tracking |
| ${RETROSPECTIVE_TEMPLATE_FILENAME} | End-of-pilot outcomes and decisions |

| Context | Value |
| --- | --- |
| Project | ${input.projectName} |
| Project directory | ${input.projectDir} |
| Adoption mode | ${input.adoptionMode} |
| Standards path in AGENTS | ${input.standardsPath} |
| Pilot owner | ${input.pilotOwner} |

## Suggested Workflow

1. Fill \`${KICKOFF_FILENAME}\` before week 1 starts.
2. Duplicate \`${WEEKLY_TEMPLATE_FILENAME}\` each week (for example, \`weekly-01.md\`).
3. File concrete issues using \`${input.standardsPath}/docs/templates/feedback-template.md\` when guidance fails.
4. Complete \`${RETROSPECTIVE_TEMPLATE_FILENAME}\` at pilot end and link resulting change requests.
`;
}

/**
 * Adopt the standards (merging by default), require a strict validation pass,
 * then scaffold the pilot artifacts.
 */
export async function preparePilotProject(
  options: PreparePilotOptions,
  settings: RuntimeSettings,
  git?: GitClient,
): Promise<PreparePilotResult> {
  const projectDir = resolveProjectDir(options.projectDir, settings.homeDir);

  const startDate = options.startDate ?? formatLocalDate(settings.now());
  if (!START_DATE_PATTERN.test(startDate)) {
    throw new UserError('--start-date must be in YYYY-MM-DD format.');
  }
  const pilotOwner = options.pilotOwner ?? 'TBD';
  const projectName =
    options.projectName !== undefined && options.projectName.length > 0 ? options.projectName : basename(projectDir);

  const templates = PILOT_ARTIFACTS.map((artifact) => ({
    ...artifact,
    templatePath: join(settings.templatesDir, artifact.template),
  }));
  for (const { templatePath } of templates) {
    if (!isFile(templatePath)) {
      throw new UserError(`Required template not found: ${templatePath}`);
    }
  }

  const adoption = await adoptIntoProject(
    { ...options, projectDir, existingMode: options.existingMode ?? 'merge' },
    settings,
    git,
  );

  const validation = await validateAdoption(
    {
      projectDir,
      expectStandardsPath: adoption.adoptionMode === 'latest' ? adoption.standardsSource : undefined,
    },
    settings,
  );
  if (!reportPassed(validation, true)) {
    const problems = validation.findings
      .filter((f) => f.severity !== 'info')
      .map((f) => `  - ${f.message}`);
    throw new UserError(
      `Adoption validation failed (strict):\n${problems.join('\n')}`,
      `Fix the findings above, then rerun: agents-adopt validate-adoption --project-dir ${projectDir} --strict`,
    );
  }

  const standardsPath = validation.standardsPath ?? adoption.standardsPath;
  const pilotDir = resolveFromProject(options.pilotDir ?? DEFAULT_PILOT_DIR, projectDir, settings.homeDir);
  await ensureDir(pilotDir);

  const overwrite = options.overwrite ?? false;
  const written: string[] = [];
  const skipped: string[] = [];
  const tokens = {
    PROJECT_NAME: projectName,
    PROJECT_DIR: projectDir,
    PILOT_OWNER: pilotOwner,
    START_DATE: startDate,
    ADOPTION_MODE: adoption.adoptionMode,
    STANDARDS_PATH: standardsPath,
  };

  const writeArtifact = async (dest: string, render: () => Promise<string>): Promise<void> => {
    if (isFile(dest) && !overwrite) {
      skipped.push(dest);
      return;
    }
    await writeFile(dest, await render());
    written.push(dest);
  };

  for (const { filename, templatePath } of templates) {
    await writeArtifact(join(pilotDir, filename), async () =>
      renderTemplate(await readFile(templatePath, 'utf-8'), { values: {}, tokens }),
    );
  }
  await writeArtifact(join(pilotDir, PILOT_README_FILENAME), () =>
    Promise.resolve(
      buildPilotReadme({
        projectName,
        projectDir,
        adoptionMode: adoption.adoptionMode,
        standardsPath,
        pilotOwner,
        startDate,
      }),
    ),
  );

  return {
    adoption,
    validation,
    projectName,
    pilotDir,
    pilotOwner,
    startDate,
    standardsPath,
    written,
    skipped,
  };
}

// --- check-pilot-readiness ---

export interface PilotReadinessOptions {
  projectDir: string;
  pilotDir?: string | undefined;
  /** Default 1 */
  minWeeklyCheckins?: number | undefined;
  requireRetrospective?: boolean | undefined;
  /** Weekly shortfall becomes an error and adoption validation runs strict */
  strict?: boolean | undefined;
}

export interface PilotReadinessReport extends CheckReport {
  projectDir: string;
  pilotDir: string;
  /** Null when the pilot directory is missing */
  weeklyCheckins: number | null;
  retrospectives: number | null;
}

export async function checkPilotReadiness(
  options: PilotReadinessOptions,
  settings: RuntimeSettings,
): Promise<PilotReadinessReport> {
  const minWeekly = options.minWeeklyCheckins ?? 1;
  assertMinWeeklyCheckins(minWeekly);
  const strict = options.strict ?? false;
  const projectDir = resolveProjectDir(options.projectDir, settings.homeDir);
  const pilotDir = resolveFromProject(options.pilotDir ?? DEFAULT_PILOT_DIR, projectDir, settings.homeDir);

  const report = new ReportBuilder();

  const agentsPath = join(projectDir, AGENTS_FILENAME);
  if (!isFile(agentsPath)) {
    report.error('agents-file', `${AGENTS_FILENAME} missing at ${agentsPath}`);
  }
  const claudePath = join(projectDir, CLAUDE_FILENAME);
  if (!pathExistsOrLink(claudePath)) {
    report.warn('claude-file', `${CLAUDE_FILENAME} missing at ${claudePath}`);
  }

  const validation = await validateAdoption({ projectDir }, settings);
  if (!reportPassed(validation, strict)) {
    report.error(
      'adoption',
      'Adoption validation failed. Run validate-adoption and fix reported issues.',
      validation.findings.filter((f) => f.severity !== 'info').map((f) => f.message),
    );
  } else {
    report.pass('adoption', 'Adoption validation passed');
  }

  if (!isDirectory(pilotDir)) {
    report.error('pilot-dir', `Pilot directory missing at ${pilotDir}`);
    return { ...report.build(), projectDir, pilotDir, weeklyCheckins: null, retrospectives: null };
  }

  for (const required of REQUIRED_PILOT_FILES) {
    const path = join(pilotDir, required);
    if (!isFile(path)) {
      report.error('pilot-artifacts', `Missing pilot artifact file: ${path}`);
    }
  }

  const kickoffPath = join(pilotDir, KICKOFF_FILENAME);
  if (isFile(kickoffPath) && (await readFile(kickoffPath, 'utf-8')).includes('{{')) {
    report.error('kickoff', `${KICKOFF_FILENAME} still contains unresolved template tokens`);
  }

  const files = await listPilotFiles(pilotDir);
  const weeklyCount = files.weekly.length;
  if (weeklyCount < minWeekly) {
    const message = `Weekly check-ins below target. Required: ${minWeekly}, found: ${weeklyCount}`;
    if (strict) {
      report.error('weekly-checkins', message);
    } else {
      report.warn('weekly-checkins', message);
    }
  } else {
    report.pass('weekly-checkins', `${weeklyCount} weekly check-ins found`);
  }

  const retroCount = files.retrospectives.length;
  if (options.requireRetrospective && retroCount === 0) {
    report.error(
      'retrospective',
      'Completed retrospective file not found (expected retrospective*.md excluding template)',
    );
  }

  return { ...report.build(), projectDir, pilotDir, weeklyCheckins: weeklyCount, retrospectives: retroCount };
}

// --- summarize-pilot-findings ---

export interface PilotSummaryOptions {
  projectDir: string;
  pilotDir?: string | undefined;
  /** Defaults to `<pilotDir>/pilot-summary.md` */
  output?: string | undefined;
  minWeeklyCheckins?: number | undefined;
  requireRetrospective?: boolean | undefined;
  /** Build the summary without writing it */
  printOnly?: boolean | undefined;
}

export interface PilotSummaryResult extends CheckReport {
  projectDir: string;
  pilotDir: string;
  markdown: string;
  /** Null with printOnly */
  outputPath: string | null;
  weeklyCheckins: number;
  retrospectives: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Value of the first `| key | value |` table row, or '' when there is none. */
export function extractTableValue(content: string, key: string): string {
  const pattern = new RegExp(`^\\|\\s*${escapeRegExp(key)}\\s*\\|(.*)\\|\\s*$`);
  for (const line of content.split('\n')) {
    const match = pattern.exec(line.replace(/\r$/, ''));
    if (match) {
      return (match[1] ?? '').trim();
    }
  }
  return '';
}

/** Escape pipes for a table cell; blank values read as N/A. */
export function escapeTableValue(value: string): string {
  const cleaned = value.replace(/\r/g, '').replace(/\|/g, '\\|');
  return cleaned.trim().length === 0 ? 'N/A' : cleaned;
}

const WEEKLY_KEYS = ['Reporting Period', 'Blockers encountered', 'Critical defects linked to guidance'];

const RETROSPECTIVE_ROWS: readonly (readonly [string, string])[] = [
  ['Rollout decision', 'Continue rollout / pause / iterate'],
  ['Preferred adoption mode', 'Preferred adoption mode (latest or pinned)'],
  ['Follow-up owners/deadlines', 'Follow-up owners and deadlines'],
];

interface SummaryInput {
  projectDir: string;
  pilotDir: string;
  generatedAt: string;
  weekly: { name: string; content: string }[];
  latestRetrospective: { name: string; content: string } | null;
  retrospectiveCount: number;
}

export function buildPilotSummary(input: SummaryInput): string {
  const lines = [
    '# Pilot Findings Summary',
    '',
    `Generated by \`agents-adopt summarize-pilot-findings\` on ${input.generatedAt}.`,
    '',
    '| Field | Value |',
    '| --- | --- |',
    `| Project | ${basename(input.projectDir)} |`,
    `| Project Directory | ${input.projectDir} |`,
    `| Pilot Directory | ${input.pilotDir} |`,
    `| Weekly Check-ins Found | ${input.weekly.length} |`,
    `| Retrospectives Found | ${input.retrospectiveCount} |`,
    '',
    '## Weekly Snapshot',
    '',
    '| Weekly File | Reporting Period | Blockers Encountered | Critical Defects |',
    '| --- | --- | --- | --- |',
  ];
  if (input.weekly.length === 0) {
    lines.push('| N/A | N/A | N/A | N/A |');
  }
  for (const weekly of input.weekly) {
    const cells = WEEKLY_KEYS.map((key) => escapeTableValue(extractTableValue(weekly.content, key)));
    lines.push(`| \`${weekly.name}\` | ${cells.join(' | ')} |`);
  }

  lines.push('', '## Retrospective Snapshot', '', '| Field | Value |', '| --- | --- |');
  const retro = input.latestRetrospective;
  lines.push(`| Latest retrospective | ${retro ? `\`${retro.name}\`` : 'N/A'} |`);
  for (const [label, key] of RETROSPECTIVE_ROWS) {
    lines.push(`| ${label} | ${retro ? escapeTableValue(extractTableValue(retro.content, key)) : 'N/A'} |`);
  }

  lines.push(
    '',
    '## Backlog Intake Checklist',
    '',
    '| Item | Owner | Status |',
    '| --- | --- | --- |',
    '| Review weekly blockers and defects from all weekly files | Maintainer + pilot owner | Pending |',
    '| Convert confirmed gaps into feedback issues using `docs/templates/feedback-template.md` | Maintainer + contributors | Pending |',
    '| Map accepted issues into next release backlog and roadmap milestones | Maintainer | Pending |',
    '',
  );
  return lines.join('\n');
}

async function readNamed(path: string): Promise<{ name: string; content: string }> {
  return { name: basename(path), content: await readFile(path, 'utf-8') };
}

/** Summarize weekly check-ins and the latest retrospective into markdown. */
export async function summarizePilotFindings(
  options: PilotSummaryOptions,
  settings: RuntimeSettings,
): Promise<PilotSummaryResult> {
  const minWeekly = options.minWeeklyCheckins ?? 1;
  assertMinWeeklyCheckins(minWeekly);
  const projectDir = resolveProjectDir(options.projectDir, settings.homeDir);
  const pilotDir = resolveFromProject(options.pilotDir ?? DEFAULT_PILOT_DIR, projectDir, settings.homeDir);
  const outputPath = options.output
    ? resolveFromProject(options.output, projectDir, settings.homeDir)
    : join(pilotDir, PILOT_SUMMARY_FILENAME);

  const report = new ReportBuilder();
  let weekly: { name: string; content: string }[] = [];
  let latestRetrospective: { name: string; content: string } | null = null;
  let retrospectiveCount = 0;

  if (!isDirectory(pilotDir)) {
    report.error('pilot-dir', `Pilot directory not found: ${pilotDir}`);
  } else {
    const files = await listPilotFiles(pilotDir);
    weekly = await Promise.all(files.weekly.map(readNamed));
    if (weekly.length < minWeekly) {
      report.warn(
        'weekly-checkins',
        `Weekly check-ins below target. Required: ${minWeekly}, found: ${weekly.length}`,
      );
    }

    retrospectiveCount = files.retrospectives.length;
    const latest = files.retrospectives.at(-1);
    if (latest !== undefined) {
      latestRetrospective = await readNamed(latest);
    } else if (options.requireRetrospective) {
      report.error(
        'retrospective',
        'No completed retrospective found (expected retrospective*.md excluding template).',
      );
    } else {
      report.warn('retrospective', 'No completed retrospective found yet.');
    }
  }

  const markdown = buildPilotSummary({
    projectDir,
    pilotDir,
    generatedAt: formatUtcTimestamp(settings.now()),
    weekly,
    latestRetrospective,
    retrospectiveCount,
  });

  if (!options.printOnly) {
    await ensureDir(dirname(outputPath));
    await writeFile(outputPath, markdown);
  }

  return {
    ...report.build(),
    projectDir,
    pilotDir,
    markdown,
    outputPath: options.printOnly ? null : outputPath,
    weeklyCheckins: weekly.length,
    retrospectives: retrospectiveCount,
  };
}
