import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { mergeManagedBlock } from '../src/managed-block.js';
import { mergeStandardsReference } from '../src/merge.js';
import { buildStandardsBlock, MANAGED_BEGIN, parseStandardsTopics } from '../src/standards.js';
import type { RuntimeSettings } from '../src/types.js';
import { UserError, ValidationError } from '../src/types.js';
import { createStandardsDir, FIXED_BACKUP_SUFFIX, testSettings, tmpDir } from './helpers.js';

const ORIGINAL = '# AGENTS.md - Demo\n\n## Agent Role\n\nRole.\n';

describe('mergeStandardsReference', () => {
  let root: string;
  let standards: string;
  let projectDir: string;
  let agentsPath: string;
  let settings: RuntimeSettings;

  beforeEach(async () => {
    root = await tmpDir('merge');
    standards = await createStandardsDir(root);
    projectDir = join(root, 'project');
    await mkdir(projectDir);
    agentsPath = join(projectDir, 'AGENTS.md');
    await writeFile(agentsPath, ORIGINAL);
    settings = testSettings(root, standards);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function backups(): Promise<string[]> {
    return (await readdir(projectDir)).filter((name) => name.includes('.bak.'));
  }

  it('inserts the block and backs up the previous file', async () => {
    const result = await mergeStandardsReference({ projectDir, standardsPath: standards }, settings);

    const expected = mergeManagedBlock(
      ORIGINAL,
      buildStandardsBlock({
        standardsPath: standards,
        topics: parseStandardsTopics(undefined, standards, settings.homeDir),
      }),
    );
    expect(result.changed).toBe(true);
    expect(result.backupPath).toBe(`${agentsPath}${FIXED_BACKUP_SUFFIX}`);
    expect(await readFile(agentsPath, 'utf-8')).toBe(expected);
    expect(await readFile(`${agentsPath}${FIXED_BACKUP_SUFFIX}`, 'utf-8')).toBe(ORIGINAL);
  });

  it('leaves an up-to-date file untouched and makes no backup', async () => {
    await mergeStandardsReference({ projectDir, standardsPath: standards }, settings);
    const afterFirst = await readFile(agentsPath, 'utf-8');

    const second = await mergeStandardsReference({ projectDir, standardsPath: standards }, settings);
    expect(second.changed).toBe(false);
    expect(second.backupPath).toBeNull();
    expect(await readFile(agentsPath, 'utf-8')).toBe(afterFirst);
    expect(await backups()).toEqual([`AGENTS.md${FIXED_BACKUP_SUFFIX}`]);
  });

  it('falls back to the standards home from settings', async () => {
    const result = await mergeStandardsReference({ projectDir }, settings);
    expect(result.standardsPath).toBe(standards);
  });

  it('writes the standards path without a trailing slash', async () => {
    await mergeStandardsReference({ projectDir, standardsPath: `${standards}/` }, settings);
    const content = await readFile(agentsPath, 'utf-8');
    expect(content).toContain(`defined in \`${standards}/\`.`);
    expect(content).not.toContain(`${standards}//`);
  });

  it('keeps a relative standards path as written', async () => {
    const result = await mergeStandardsReference({ projectDir, standardsPath: '../standards' }, settings);
    expect(result.standardsPath).toBe('../standards');
    expect(await readFile(agentsPath, 'utf-8')).toContain(
      '| Logging | `../standards/guides/logging-practices/logging-practices.md` |',
    );
  });

  it('takes topics and deviation policy from the config file', async () => {
    const configFile = join(root, 'adopt.env');
    await writeFile(
      configFile,
      'STANDARDS_TOPICS=Logging|guides/logging-practices/logging-practices.md\nDEVIATION_POLICY=Ask the platform team.\nBOGUS=1\n',
    );

    const result = await mergeStandardsReference(
      { projectDir, standardsPath: standards, configFile },
      settings,
    );
    const content = await readFile(agentsPath, 'utf-8');
    expect(content).toContain(
      `| Logging | \`${standards}/guides/logging-practices/logging-practices.md\` |`,
    );
    expect(content).toContain('**Deviation policy**: Ask the platform team.');
    expect(content).not.toContain('| Error handling |');
    expect(result.warnings).toEqual([`Unknown config key 'BOGUS' ignored (${configFile}:3).`]);
  });

  it('requires an existing AGENTS.md', async () => {
    await rm(agentsPath);
    await expect(
      mergeStandardsReference({ projectDir, standardsPath: standards }, settings),
    ).rejects.toThrow(`AGENTS.md not found in project: ${projectDir}`);
  });

  it('requires the standards path to exist', async () => {
    await expect(
      mergeStandardsReference({ projectDir, standardsPath: join(root, 'nope') }, settings),
    ).rejects.toThrow(UserError);
  });

  it('refuses to edit a file with unbalanced markers', async () => {
    const broken = `# AGENTS.md\n\n${MANAGED_BEGIN}\n## Agent Role\n`;
    await writeFile(agentsPath, broken);

    await expect(
      mergeStandardsReference({ projectDir, standardsPath: standards }, settings),
    ).rejects.toThrow(ValidationError);
    expect(await readFile(agentsPath, 'utf-8')).toBe(broken);
    expect(await backups()).toEqual([]);
  });
});
