/**
 * check-guide-freshness: report standards guides whose last modification is
 * older than a threshold.
 */

import { readdirSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';

import picomatch from 'picomatch';

import { expandHome, isDirectory } from './fs-utils.js';
import { ReportBuilder } from './report.js';
import type { CheckReport, RuntimeSettings } from './types.js';
import { UserError } from './types.js';

export const DEFAULT_THRESHOLD_DAYS = 180;
/** Stale share (percent) above which the whole library gets a warning. */
export const STALE_PERCENT_WARNING = 25;

const DAY_MS = 86_400_000;
const isGuideFile = picomatch('guides/**/*.md');

export interface FreshnessOptions {
  standardsPath?: string | undefined;
  thresholdDays?: number | undefined;
}

export interface StaleGuide {
  /** Path relative to the standards root */
  path: string;
  ageDays: number;
}

export interface FreshnessReport extends CheckReport {
  standardsPath: string;
  thresholdDays: number;
  totalGuides: number;
  stale: StaleGuide[];
  /** Integer percentage, null when there are no guides */
  stalePercent: number | null;
}

function walkFiles(dir: string, rootDir: string, callback: (relPath: string) => void): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      walkFiles(fullPath, rootDir, callback);
    } else if (entry.isFile()) {
      callback(relative(rootDir, fullPath).split('\\').join('/'));
    }
  }
}

/** Guide paths (`guides/**\/*.md`) under a standards root, relative and sorted. */
export function listGuides(standardsPath: string): string[] {
  const guidesDir = join(standardsPath, 'guides');
  if (!isDirectory(guidesDir)) {
    return [];
  }
  const guides: string[] = [];
  walkFiles(guidesDir, standardsPath, (relPath) => {
    if (isGuideFile(relPath)) {
      guides.push(relPath);
    }
  });
  return guides.sort();
}

export async function checkGuideFreshness(
  options: FreshnessOptions,
  settings: RuntimeSettings,
): Promise<FreshnessReport> {
  const thresholdDays = options.thresholdDays ?? DEFAULT_THRESHOLD_DAYS;
  if (!Number.isInteger(thresholdDays) || thresholdDays < 0) {
    throw new UserError('--threshold-days must be a non-negative integer.');
  }

  const standardsPath = resolve(expandHome(options.standardsPath ?? settings.standardsHome, settings.homeDir));
  if (!isDirectory(join(standardsPath, 'guides'))) {
    throw new UserError(
      `Guides directory not found: ${join(standardsPath, 'guides')}`,
      'Pass --standards-path or set AGENTIC_BEST_PRACTICES_HOME.',
    );
  }

  const now = settings.now().getTime();
  const guides = listGuides(standardsPath);
  const stale: StaleGuide[] = [];
  for (const guide of guides) {
    const { mtimeMs } = await stat(join(standardsPath, guide));
    const ageDays = Math.floor((now - mtimeMs) / DAY_MS);
    if (ageDays > thresholdDays) {
      stale.push({ path: guide, ageDays });
    }
  }

  const report = new ReportBuilder();
  for (const guide of stale) {
    report.warn('stale-guide', `Stale (${guide.ageDays} days): ${guide.path}`);
  }

  const stalePercent = guides.length > 0 ? Math.floor((stale.length * 100) / guides.length) : null;
  if (stalePercent !== null && stalePercent > STALE_PERCENT_WARNING) {
    report.warn(
      'stale-percentage',
      `More than ${STALE_PERCENT_WARNING}% of guides are stale (${stalePercent}%). Consider increasing maintenance frequency.`,
    );
  } else if (stale.length === 0) {
    report.pass('stale-guide', `All ${guides.length} guides modified within ${thresholdDays} days`);
  }

  return {
    ...report.build(),
    standardsPath,
    thresholdDays,
    totalGuides: guides.length,
    stale,
    stalePercent,
  };
}
