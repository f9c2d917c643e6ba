/**
 * Commander program and command handlers.
 *
 * Every subcommand shares the global --json/--quiet/--verbose/--color flags and
 * the same error handling (see wrapAction). Handlers only parse options,
 * call the library operation and print its result.
 */

import { Command, InvalidArgumentError, Option } from 'commander';

import { adoptIntoProject } from './adopt.js';
import type { AdoptOptions, AdoptResult } from './adopt.js';
import { resolveSettings } from './config.js';
import { checkGuideFreshness } from './freshness.js';
import type { ColorMode } from './format.js';
import {
  c,
  formatCheckFail,
  formatCommand,
  formatError,
  formatHint,
  formatJson,
  formatJsonError,
  formatKeyValues,
  formatReportTotals,
  formatSuccess,
  formatWarning,
  initColors,
} from './format.js';
import type { GitClient } from './git.js';
import { isInteractive, paginateOutput, renderMarkdown } from './markdown-output.js';
import { mergeStandardsReference } from './merge.js';
import { pinStandardsVersion } from './pin.js';
import { checkPilotReadiness, preparePilotProject, summarizePilotFindings } from './pilot.js';
import { renderSection, reportPassed } from './report.js';
import type {
  AdoptionMode,
  CheckReport,
  ClaudeMode,
  CommandName,
  CommandSet,
  ExistingMode,
  GlobalOptions,
  RuntimeSettings,
} from './types.js';
import {
  ADOPTION_MODES,
  AdoptError,
  CLAUDE_MODES,
  DEFAULT_PILOT_DIR,
  DEFAULT_PINNED_DIR,
  EXISTING_MODES,
  UserError,
  ValidationError,
} from './types.js';
import { validateAdoption } from './validate.js';

const VERSION = '0.1.0';
const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export interface ProgramDeps {
  settings?: RuntimeSettings | undefined;
  git?: GitClient | undefined;
  /** Pager command for long markdown output */
  pager?: string | undefined;
}

export function getGlobalOpts(cmd: Command): GlobalOptions {
  const root = cmd.parent ?? cmd;
  const opts = root.opts();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
  };
}

/** Commander argument parser for counts such as --min-weekly-checkins. */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value);
}

// --- Option shapes as parsed by commander ---

interface AdoptionFlags {
  projectDir: string;
  standardsPath?: string;
  templatePath?: string;
  configFile?: string;
  projectName?: string;
  agentRole?: string;
  projectDescription?: string;
  priorityOne?: string;
  priorityTwo?: string;
  priorityThree?: string;
  adoptionMode: AdoptionMode;
  pinnedRef?: string;
  pinnedDir: string;
  existingMode: ExistingMode;
  claudeMode: ClaudeMode;
  force?: boolean;
  devCmd?: string;
  testCmd?: string;
  coverageCmd?: string;
  lintCmd?: string;
  typecheckCmd?: string;
  buildCmd?: string;
}

interface MergeFlags {
  projectDir: string;
  standardsPath?: string;
  configFile?: string;
}

interface PinFlags {
  projectDir: string;
  pinnedRef: string;
  standardsPath?: string;
  pinnedDir: string;
  printRelativeOnly?: boolean;
}

interface ValidateFlags {
  projectDir: string;
  expectStandardsPath?: string;
  strict?: boolean;
}

interface PrepareFlags extends AdoptionFlags {
  pilotDir: string;
  pilotOwner: string;
  startDate?: string;
  overwrite?: boolean;
}

interface ReadinessFlags {
  projectDir: string;
  pilotDir: string;
  minWeeklyCheckins: number;
  requireRetrospective?: boolean;
  strict?: boolean;
}

interface SummaryFlags extends ReadinessFlags {
  output?: string;
  printOnly?: boolean;
}

interface FreshnessFlags {
  standardsPath?: string;
  thresholdDays: number;
  strict?: boolean;
}

function commandOverrides(flags: AdoptionFlags): Partial<CommandSet> {
  const given: [CommandName, string | undefined][] = [
    ['dev', flags.devCmd],
    ['test', flags.testCmd],
    ['coverage', flags.coverageCmd],
    ['lint', flags.lintCmd],
    ['typecheck', flags.typecheckCmd],
    ['build', flags.buildCmd],
  ];
  const overrides: Partial<CommandSet> = {};
  for (const [name, command] of given) {
    if (command !== undefined) {
      overrides[name] = command;
    }
  }
  return overrides;
}

function toAdoptOptions(flags: AdoptionFlags): AdoptOptions {
  return {
    projectDir: flags.projectDir,
    standardsPath: flags.standardsPath,
    templatePath: flags.templatePath,
    configFile: flags.configFile,
    projectName: flags.projectName,
    agentRole: flags.agentRole,
    projectDescription: flags.projectDescription,
    priorityOne: flags.priorityOne,
    priorityTwo: flags.priorityTwo,
    priorityThree: flags.priorityThree,
    adoptionMode: flags.adoptionMode,
    pinnedRef: flags.pinnedRef,
    pinnedDir: flags.pinnedDir,
    existingMode: flags.existingMode,
    claudeMode: flags.claudeMode,
    force: flags.force,
    commands: commandOverrides(flags),
  };
}

function addAdoptionOptions(cmd: Command, defaultExistingMode: ExistingMode): Command {
  return cmd
    .requiredOption('--project-dir <path>', 'Target project directory')
    .option('--standards-path <path>', 'Standards library location (default: $AGENTIC_BEST_PRACTICES_HOME)')
    .option('--template-path <path>', 'AGENTS.md template (default: bundled template)')
    .option('--config-file <path>', 'KEY=VALUE or YAML file with adoption values')
    .option('--project-name <name>', 'Project name (default: directory name)')
    .option('--agent-role <text>', 'Agent role statement')
    .option('--project-description <text>', 'Short project description')
    .option('--priority-one <text>', 'First priority')
    .option('--priority-two <text>', 'Second priority')
    .option('--priority-three <text>', 'Third priority')
    .addOption(
      new Option('--adoption-mode <mode>', 'Reference the live library or a pinned snapshot')
        .choices(ADOPTION_MODES)
        .default('latest'),
    )
    .option('--pinned-ref <ref>', 'Git ref to pin (required with --adoption-mode pinned)')
    .option('--pinned-dir <path>', 'Project-relative pinned snapshots directory', DEFAULT_PINNED_DIR)
    .addOption(
      new Option('--existing-mode <mode>', 'What to do with an existing AGENTS.md')
        .choices(EXISTING_MODES)
        .default(defaultExistingMode),
    )
    .addOption(
      new Option('--claude-mode <mode>', 'How to provide CLAUDE.md').choices(CLAUDE_MODES).default('auto'),
    )
    .option('--force', 'Overwrite AGENTS.md (when existing mode is fail) and CLAUDE.md, with backups')
    .option('--dev-cmd <cmd>', 'Override the detected dev command')
    .option('--test-cmd <cmd>', 'Override the detected test command')
    .option('--coverage-cmd <cmd>', 'Override the detected coverage command')
    .option('--lint-cmd <cmd>', 'Override the detected lint command')
    .option('--typecheck-cmd <cmd>', 'Override the detected typecheck command')
    .option('--build-cmd <cmd>', 'Override the detected build command');
}

/**
 * Wrap a command action with error handling and JSON output.
 */
function wrapAction<A extends unknown[]>(handler: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    const cmd = args.find((a): a is Command => a instanceof Command);
    const globalOpts = cmd ? getGlobalOpts(cmd) : { json: false, quiet: false, verbose: false };
    try {
      if (globalOpts.quiet && globalOpts.verbose) {
        throw new ValidationError('--quiet and --verbose cannot be used together.');
      }
      await handler(...args);
    } catch (err) {
      if (err instanceof UserError) {
        console.error(globalOpts.json ? formatJsonError(err) : err.format());
        process.exitCode = err.exitCode;
      } else if (err instanceof AdoptError) {
        console.error(globalOpts.json ? formatJsonError(err) : formatError(err));
        process.exitCode = err.exitCode;
      } else {
        const error = err instanceof Error ? err : new Error(String(err));
        console.error(globalOpts.json ? formatJsonError(error) : `Error: ${error.message}`);
        process.exitCode = 1;
      }
    }
  };
}

function printWarnings(warnings: readonly string[], g: GlobalOptions): void {
  if (g.json) {
    return;
  }
  for (const warning of warnings) {
    console.error(formatWarning(warning));
  }
}

function nextStepCommand(projectDir: string, standardsPath: string): string {
  return `agents-adopt validate-adoption --project-dir "${projectDir}" --expect-standards-path "${standardsPath}"`;
}

/**
 * Print a check report and set the exit code. Errors always fail; warnings
 * fail under strict.
 */
function printReport<T extends CheckReport>(
  title: string,
  report: T,
  rows: readonly (readonly [string, string])[],
  strict: boolean,
  passMessage: string,
  g: GlobalOptions,
): void {
  const passed = reportPassed(report, strict);
  if (!passed) {
    process.exitCode = 1;
  }

  if (g.json) {
    console.log(formatJson({ ...report, strict, passed }));
    return;
  }
  if (g.quiet) {
    for (const finding of report.findings) {
      if (finding.severity === 'error') {
        console.error(formatCheckFail(finding.message));
      }
    }
    return;
  }

  renderSection(title, report.findings, g.verbose);
  console.log(`${title} summary:`);
  console.log(formatKeyValues([...rows, ['Errors', String(report.errors)], ['Warnings', String(report.warnings)]]));
  if (passed) {
    console.log(formatSuccess(passMessage));
  } else {
    const reason = report.errors > 0 ? formatReportTotals(report) : `${formatReportTotals(report)} (strict)`;
    console.log(c.error(`${title} failed: ${reason}`));
  }
}

function printAdoptSummary(result: AdoptResult, configFile: string | undefined): void {
  const rows: [string, string][] = [
    ['Project', result.projectDir],
    ['AGENTS.md', result.agentsPath],
    ['CLAUDE.md', result.claudeStatus === 'skipped' ? 'skipped' : `${result.claudePath} (${result.claudeStatus})`],
    ['Mode', result.adoptionMode],
  ];
  if (result.pinnedRef !== undefined) {
    rows.push(['Pinned ref', result.pinnedRef]);
  }
  rows.push(['Standards source', result.standardsSource], ['Standards path', result.standardsPath]);
  if (result.stack !== null) {
    rows.push(['Detected stack', result.stack]);
  }
  if (configFile !== undefined) {
    rows.push(['Config file', configFile]);
  }
  for (const backup of result.backups) {
    rows.push(['Backup', backup]);
  }
  console.log(formatSuccess(`Adoption bootstrap complete (${result.operation}).`));
  console.log(formatKeyValues(rows));
}

/** Build the program. Settings default to the process environment. */
export function createProgram(deps: ProgramDeps = {}): Command {
  const settings = deps.settings ?? resolveSettings(process.env);
  const git = deps.git;
  const program = new Command();

  program
    .name('agents-adopt')
    .description('Adopt a shared standards library into projects through a managed AGENTS.md')
    .version(VERSION, '--version', 'Show version number')
    .helpOption('-h, --help', 'Display help for command')
    .option('--json', 'Structured JSON output')
    .option('--quiet', 'Suppress all output except errors')
    .option('--verbose', 'Also list passing checks')
    .addOption(new Option('--color <mode>', 'Color output').choices(COLOR_MODES).default('auto'))
    .hook('preAction', (thisCommand) => {
      const color: unknown = thisCommand.opts().color;
      initColors(COLOR_MODES.find((mode) => mode === color) ?? 'auto');
    });

  addAdoptionOptions(
    program.command('adopt-into-project').description('Create or update AGENTS.md (and CLAUDE.md) in a project'),
    'fail',
  ).action(
    wrapAction(async (flags: AdoptionFlags, cmd: Command) => {
      const g = getGlobalOpts(cmd);
      const result = await adoptIntoProject(toAdoptOptions(flags), settings, git);
      if (g.json) {
        console.log(formatJson(result));
        return;
      }
      printWarnings(result.warnings, g);
      if (g.quiet) {
        return;
      }
      printAdoptSummary(result, flags.configFile);
      console.log('');
      console.log(`Next step: ${formatCommand(nextStepCommand(flags.projectDir, result.standardsPath))}`);
    }),
  );

  program
    .command('merge-standards-reference')
    .description('Refresh the managed Standards Reference block in an existing AGENTS.md')
    .requiredOption('--project-dir <path>', 'Target project directory')
    .option('--standards-path <path>', 'Standards library location (default: $AGENTIC_BEST_PRACTICES_HOME)')
    .option('--config-file <path>', 'Config file providing STANDARDS_TOPICS and DEVIATION_POLICY')
    .action(
      wrapAction(async (flags: MergeFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const result = await mergeStandardsReference(flags, settings);
        if (g.json) {
          console.log(formatJson(result));
          return;
        }
        printWarnings(result.warnings, g);
        if (g.quiet) {
          return;
        }
        if (!result.changed) {
          console.log('No changes needed. Standards Reference already up to date.');
          return;
        }
        const rows: [string, string][] = [
          ['Project', flags.projectDir],
          ['AGENTS.md', result.agentsPath],
          ['Backup', result.backupPath ?? 'none'],
          ['Standards', result.standardsPath],
        ];
        if (flags.configFile !== undefined) {
          rows.push(['Config', flags.configFile]);
        }
        console.log(formatSuccess('Merged Standards Reference into AGENTS.md.'));
        console.log(formatKeyValues(rows));
        console.log('');
        console.log(`Next step: ${formatCommand(nextStepCommand(flags.projectDir, result.standardsPath))}`);
      }),
    );

  program
    .command('pin-standards-version')
    .description('Snapshot the standards library at a git ref into the project')
    .requiredOption('--project-dir <path>', 'Target project directory')
    .requiredOption('--pinned-ref <ref>', 'Tag, branch or commit to pin')
    .option('--standards-path <path>', 'Standards git repository (default: $AGENTIC_BEST_PRACTICES_HOME)')
    .option('--pinned-dir <path>', 'Project-relative pinned snapshots directory', DEFAULT_PINNED_DIR)
    .option('--print-relative-only', 'Print only the project-relative snapshot path')
    .action(
      wrapAction(async (flags: PinFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const result = await pinStandardsVersion(flags, settings, git);
        if (g.json) {
          console.log(formatJson(result));
          return;
        }
        if (flags.printRelativeOnly) {
          console.log(result.relativePath);
          return;
        }
        if (g.quiet) {
          return;
        }
        console.log(
          result.created ? formatSuccess('Pinned standards snapshot created.') : 'Pinned snapshot already up to date.',
        );
        console.log(
          formatKeyValues([
            ['Ref', result.metadata.pinned_ref],
            ['SHA', result.metadata.resolved_sha],
            ['Path', result.relativePath],
          ]),
        );
      }),
    );

  program
    .command('validate-adoption')
    .description("Check a project's AGENTS.md and CLAUDE.md against the standards")
    .option('--project-dir <path>', 'Target project directory', '.')
    .option('--expect-standards-path <path>', 'Fail unless AGENTS.md references this standards path')
    .option('--strict', 'Fail if warnings are present')
    .action(
      wrapAction(async (flags: ValidateFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const report = await validateAdoption(flags, settings);
        printReport(
          'Adoption validation',
          report,
          [['Project', flags.projectDir]],
          flags.strict ?? false,
          'Validation passed.',
          g,
        );
      }),
    );

  addAdoptionOptions(
    program
      .command('prepare-pilot-project')
      .description('Adopt, validate strictly, and scaffold pilot tracking artifacts'),
    'merge',
  )
    .option('--pilot-dir <path>', 'Project-relative pilot artifact directory', DEFAULT_PILOT_DIR)
    .option('--pilot-owner <text>', 'Pilot owner for generated files', 'TBD')
    .option('--start-date <date>', 'Pilot start date, YYYY-MM-DD (default: today)')
    .option('--overwrite', 'Overwrite existing pilot artifact files')
    .action(
      wrapAction(async (flags: PrepareFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const result = await preparePilotProject(
          {
            ...toAdoptOptions(flags),
            pilotDir: flags.pilotDir,
            pilotOwner: flags.pilotOwner,
            startDate: flags.startDate,
            overwrite: flags.overwrite,
          },
          settings,
          git,
        );
        if (g.json) {
          console.log(formatJson(result));
          return;
        }
        printWarnings(result.adoption.warnings, g);
        if (g.quiet) {
          return;
        }
        for (const path of result.skipped) {
          console.log(formatHint(`Skipping existing pilot artifact: ${path}`));
        }
        console.log(formatSuccess('Pilot preparation complete.'));
        console.log(
          formatKeyValues([
            ['Project', result.adoption.projectDir],
            ['Adoption mode', result.adoption.adoptionMode],
            ['Standards path', result.standardsPath],
            ['Pilot artifacts', result.pilotDir],
          ]),
        );
        console.log('');
        console.log('Next: fill kickoff.md and start weekly check-ins.');
      }),
    );

  program
    .command('check-pilot-readiness')
    .description('Check that a pilot has its artifacts, check-ins and retrospective')
    .option('--project-dir <path>', 'Target project directory', '.')
    .option('--pilot-dir <path>', 'Project-relative pilot artifact directory', DEFAULT_PILOT_DIR)
    .option('--min-weekly-checkins <n>', 'Minimum weekly check-in files', parseNonNegativeInt, 1)
    .option('--require-retrospective', 'Require a completed retrospective (retrospective*.md, template excluded)')
    .option('--strict', 'Fail if warnings are present')
    .action(
      wrapAction(async (flags: ReadinessFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const report = await checkPilotReadiness(flags, settings);
        const rows: [string, string][] = [
          ['Project', flags.projectDir],
          ['Pilot directory', report.pilotDir],
        ];
        if (report.weeklyCheckins !== null && report.retrospectives !== null) {
          rows.push(['Weekly check-ins', String(report.weeklyCheckins)]);
          rows.push(['Retrospectives found', String(report.retrospectives)]);
        }
        printReport('Pilot readiness', report, rows, flags.strict ?? false, 'Pilot readiness check passed.', g);
      }),
    );

  program
    .command('summarize-pilot-findings')
    .description('Collect weekly check-ins and the latest retrospective into a summary')
    .option('--project-dir <path>', 'Target project directory', '.')
    .option('--pilot-dir <path>', 'Project-relative pilot artifact directory', DEFAULT_PILOT_DIR)
    .option('--output <path>', 'Output markdown file (default: <pilot-dir>/pilot-summary.md)')
    .option('--min-weekly-checkins <n>', 'Minimum weekly check-in files expected', parseNonNegativeInt, 1)
    .option('--require-retrospective', 'Require at least one completed retrospective')
    .option('--print-only', 'Print the summary instead of writing it')
    .option('--strict', 'Fail if warnings are present')
    .action(
      wrapAction(async (flags: SummaryFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const result = await summarizePilotFindings(flags, settings);
        if (flags.printOnly && !g.json) {
          const interactive = isInteractive(g);
          await paginateOutput(renderMarkdown(result.markdown, interactive), interactive, deps.pager);
        } else if (result.outputPath !== null && !g.json && !g.quiet) {
          console.log(`Pilot summary written to: ${result.outputPath}`);
        }
        printReport(
          'Summary checks',
          result,
          [['Weekly check-ins', String(result.weeklyCheckins)]],
          flags.strict ?? false,
          'Pilot findings summary complete.',
          g,
        );
      }),
    );

  program
    .command('check-guide-freshness')
    .description('Report guides not modified within a threshold')
    .option('--standards-path <path>', 'Standards library location (default: $AGENTIC_BEST_PRACTICES_HOME)')
    .option('--threshold-days <n>', 'Age in days after which a guide is stale', parseNonNegativeInt, 180)
    .option('--strict', 'Fail if any guide is stale')
    .action(
      wrapAction(async (flags: FreshnessFlags, cmd: Command) => {
        const g = getGlobalOpts(cmd);
        const report = await checkGuideFreshness(flags, settings);
        const rows: [string, string][] = [
          ['Total guides', String(report.totalGuides)],
          [`Stale guides (>${report.thresholdDays} days)`, String(report.stale.length)],
        ];
        if (report.stalePercent !== null && report.stale.length > 0) {
          rows.push(['Stale percentage', `${report.stalePercent}%`]);
        }
        printReport(
          'Guide freshness',
          report,
          rows,
          flags.strict ?? false,
          `Fresh guides are those modified within the last ${report.thresholdDays} days.`,
          g,
        );
      }),
    );

  return program;
}
