/**
 * Check report assembly and rendering, shared by validation, pilot readiness,
 * pilot summaries and guide freshness.
 */

import { formatFinding, formatHeading } from './format.js';
import type { CheckReport, Finding, FindingSeverity } from './types.js';

/** Collects findings for one check run. */
export class ReportBuilder {
  private readonly findings: Finding[] = [];

  add(check: string, severity: FindingSeverity, message: string, details?: string[]): this {
    this.findings.push(details && details.length > 0 ? { check, severity, message, details } : { check, severity, message });
    return this;
  }

  error(check: string, message: string, details?: string[]): this {
    return this.add(check, 'error', message, details);
  }

  warn(check: string, message: string, details?: string[]): this {
    return this.add(check, 'warning', message, details);
  }

  pass(check: string, message: string): this {
    return this.add(check, 'info', message);
  }

  /** Append every finding of another report. */
  merge(report: CheckReport): this {
    this.findings.push(...report.findings);
    return this;
  }

  build(): CheckReport {
    return summarizeFindings(this.findings);
  }
}

export function summarizeFindings(findings: readonly Finding[]): CheckReport {
  return {
    findings: [...findings],
    errors: findings.filter((f) => f.severity === 'error').length,
    warnings: findings.filter((f) => f.severity === 'warning').length,
  };
}

/** Errors always fail; warnings fail only in strict mode. */
export function reportPassed(report: CheckReport, strict: boolean): boolean {
  return report.errors === 0 && !(strict && report.warnings > 0);
}

/**
 * Print a section of findings. Passing checks are shown only when verbose;
 * a section with nothing to show is skipped entirely.
 */
export function renderSection(name: string, findings: readonly Finding[], verbose: boolean): void {
  const visible = findings.filter((f) => verbose || f.severity !== 'info');
  if (visible.length === 0) {
    return;
  }

  console.log(formatHeading(name));
  for (const finding of visible) {
    console.log(formatFinding(finding));
    for (const detail of finding.details ?? []) {
      console.log(`       ${detail}`);
    }
  }
  console.log('');
}
