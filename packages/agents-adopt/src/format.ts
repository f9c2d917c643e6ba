/**
 * Output formatting for CLI display.
 *
 * Check result lines, section headings, JSON envelopes, structured error
 * formatting, and semantic coloring via picocolors.
 *
 * Colors are automatically disabled when output is piped (non-TTY),
 * when NO_COLOR is set, or via the --color never flag.
 */

import colors, { createColors } from 'picocolors';

import type { AdoptError, CheckReport, Finding } from './types.js';

/** JSON schema version for agents-adopt output */
const SCHEMA_VERSION = '0.1';

// --- Semantic color map ---

type ColorFn = (s: string | number) => string;

/** Semantic color wrappers for CLI output. */
export const c: {
  success: ColorFn;
  error: ColorFn;
  warning: ColorFn;
  command: ColorFn;
  heading: ColorFn;
  hint: ColorFn;
  muted: ColorFn;
} = {
  success: colors.green,
  error: colors.red,
  warning: colors.yellow,
  command: colors.bold,
  heading: colors.bold,
  hint: colors.dim,
  muted: colors.gray,
};

export type ColorMode = 'always' | 'never' | 'auto';

/**
 * Re-initialize the semantic color map with explicit color mode.
 * Call this after parsing the --color flag, before any output.
 */
export function initColors(mode: ColorMode): void {
  if (mode === 'auto') {
    return; // Use picocolors default detection
  }
  const pc = createColors(mode === 'always');
  c.success = pc.green;
  c.error = pc.red;
  c.warning = pc.yellow;
  c.command = pc.bold;
  c.heading = pc.bold;
  c.hint = pc.dim;
  c.muted = pc.gray;
}

/** Wrap data in a JSON envelope with schema_version. */
export function formatJson(data: unknown): string {
  const envelope = {
    schema_version: SCHEMA_VERSION,
    ...(typeof data === 'object' && data !== null ? data : { data }),
  };
  return JSON.stringify(envelope, null, 2);
}

/** Format an error as JSON. */
export function formatJsonError(error: AdoptError | Error): string {
  if ('category' in error) {
    return formatJson({
      error: error.message,
      type: error.category,
      ...(error.suggestions ? { suggestions: error.suggestions } : {}),
    });
  }
  return formatJson({ error: error.message, type: 'unknown' });
}

/** Format an error with troubleshooting suggestions. */
export function formatError(error: AdoptError | Error): string {
  const lines: string[] = [c.error(`Error: ${error.message}`)];

  if ('suggestions' in error && error.suggestions) {
    lines.push('');
    for (const suggestion of error.suggestions) {
      lines.push(c.hint(`  ${suggestion}`));
    }
  }

  return lines.join('\n');
}

/** Centralized symbols for check output. */
export const OUTPUT_SYMBOLS = {
  pass: '✓',
  fail: '✗',
  warn: '⚠',
} as const;

/** Format a section heading: "=== NAME ===" */
export function formatHeading(name: string): string {
  return c.heading(`=== ${name.toUpperCase()} ===`);
}

/** Format a passing check: "  ✓  message" */
export function formatCheckPass(message: string): string {
  return `  ${c.success(OUTPUT_SYMBOLS.pass)}  ${message}`;
}

/** Format a failing check: "  ✗  message" */
export function formatCheckFail(message: string): string {
  return `  ${c.error(OUTPUT_SYMBOLS.fail)}  ${message}`;
}

/** Format a warning check: "  ⚠  message" */
export function formatCheckWarn(message: string): string {
  return `  ${c.warning(OUTPUT_SYMBOLS.warn)}  ${message}`;
}

/** Format one finding according to its severity. */
export function formatFinding(finding: Finding): string {
  switch (finding.severity) {
    case 'error':
      return formatCheckFail(finding.message);
    case 'warning':
      return formatCheckWarn(finding.message);
    case 'info':
      return formatCheckPass(finding.message);
  }
}

/** Pluralize: "1 error" / "3 errors". Custom plural form optional. */
export function formatCount(n: number, singular: string, plural?: string): string {
  return `${n} ${n === 1 ? singular : (plural ?? `${singular}s`)}`;
}

/** Format a warning message: "⚠  message" */
export function formatWarning(message: string): string {
  return `${c.warning(OUTPUT_SYMBOLS.warn)}  ${c.warning(message)}`;
}

/** Format a note/hint: "  hint text" */
export function formatHint(hint: string): string {
  return c.hint(`  ${hint}`);
}

/** Format a success/completion message with color. */
export function formatSuccess(message: string): string {
  return c.success(message);
}

/** Format a CLI command reference with bold. */
export function formatCommand(command: string): string {
  return c.command(command);
}

/** Aligned "  Label:  value" lines for command summaries. */
export function formatKeyValues(rows: readonly (readonly [string, string])[]): string {
  const width = Math.max(0, ...rows.map(([label]) => label.length)) + 1;
  return rows.map(([label, value]) => `  ${`${label}:`.padEnd(width)}  ${value}`).join('\n');
}

/** Report totals line: "2 errors, 1 warning". */
export function formatReportTotals(report: CheckReport): string {
  return `${formatCount(report.errors, 'error')}, ${formatCount(report.warnings, 'warning')}`;
}

export { SCHEMA_VERSION };
