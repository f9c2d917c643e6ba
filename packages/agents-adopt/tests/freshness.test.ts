import { mkdir, rm, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { checkGuideFreshness, listGuides } from '../src/freshness.js';
import type { RuntimeSettings } from '../src/types.js';
import { UserError } from '../src/types.js';
import { createStandardsDir, defaultGuidePaths, FIXED_NOW, testSettings, tmpDir } from './helpers.js';

const DAY_MS = 86_400_000;

function daysAgo(days: number): Date {
  return new Date(FIXED_NOW.getTime() - days * DAY_MS);
}

describe('checkGuideFreshness', () => {
  let root: string;
  let standards: string;
  let settings: RuntimeSettings;

  async function age(guide: string, days: number): Promise<void> {
    await utimes(join(standards, guide), daysAgo(days), daysAgo(days));
  }

  beforeEach(async () => {
    root = await tmpDir('freshness');
    standards = await createStandardsDir(root);
    settings = testSettings(root, standards);
    for (const guide of defaultGuidePaths()) {
      await age(guide, 10);
    }
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('passes when every guide is recent', async () => {
    const report = await checkGuideFreshness({}, settings);

    expect(report.standardsPath).toBe(standards);
    expect(report.totalGuides).toBe(6);
    expect(report.stale).toEqual([]);
    expect(report.stalePercent).toBe(0);
    expect(report.findings).toEqual([
      { check: 'stale-guide', severity: 'info', message: 'All 6 guides modified within 180 days' },
    ]);
  });

  it('lists stale guides and warns above the stale share', async () => {
    await age('guides/error-handling/error-handling.md', 400);
    await age('guides/api-design/api-design.md', 200);

    const report = await checkGuideFreshness({ standardsPath: standards }, settings);

    expect(report.stale).toEqual([
      { path: 'guides/api-design/api-design.md', ageDays: 200 },
      { path: 'guides/error-handling/error-handling.md', ageDays: 400 },
    ]);
    expect(report.stalePercent).toBe(33);
    expect(report.findings.map((f) => f.message)).toEqual([
      'Stale (200 days): guides/api-design/api-design.md',
      'Stale (400 days): guides/error-handling/error-handling.md',
      'More than 25% of guides are stale (33%). Consider increasing maintenance frequency.',
    ]);
    expect(report.warnings).toBe(3);
    expect(report.errors).toBe(0);
  });

  it('does not warn about the share when it stays at or below the limit', async () => {
    await age('guides/api-design/api-design.md', 200);
    const report = await checkGuideFreshness({}, settings);
    expect(report.stalePercent).toBe(16);
    expect(report.warnings).toBe(1);
  });

  it('treats a guide exactly at the threshold as fresh', async () => {
    await age('guides/api-design/api-design.md', 180);
    const report = await checkGuideFreshness({ thresholdDays: 180 }, settings);
    expect(report.stale).toEqual([]);
  });

  it('honors a custom threshold', async () => {
    const report = await checkGuideFreshness({ thresholdDays: 5 }, settings);
    expect(report.stale).toHaveLength(6);
    expect(report.stalePercent).toBe(100);
  });

  it('counts only markdown files under guides/', async () => {
    await writeFile(join(standards, 'guides', 'notes.txt'), 'x');
    await writeFile(join(standards, 'guides', 'top.md'), '# Top\n');
    await mkdir(join(standards, 'docs'));
    await writeFile(join(standards, 'docs', 'other.md'), '# Other\n');

    expect(listGuides(standards)).toEqual([
      'guides/api-design/api-design.md',
      'guides/coding-guidelines/coding-guidelines.md',
      'guides/commenting-guidelines/commenting-guidelines.md',
      'guides/documentation-guidelines/documentation-guidelines.md',
      'guides/error-handling/error-handling.md',
      'guides/logging-practices/logging-practices.md',
      'guides/top.md',
    ]);
  });

  it('requires a guides directory', async () => {
    await rm(join(standards, 'guides'), { recursive: true });
    await expect(checkGuideFreshness({}, settings)).rejects.toThrow(
      `Guides directory not found: ${join(standards, 'guides')}`,
    );
  });

  it('rejects a negative threshold', async () => {
    await expect(checkGuideFreshness({ thresholdDays: -1 }, settings)).rejects.toThrow(UserError);
  });
});
