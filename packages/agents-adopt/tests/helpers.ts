/**
 * Shared fixtures: temp directories, a minimal standards library, node
 * projects, fixed-clock settings and an in-memory GitClient.
 */

import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { getBundledTemplatesDir } from '../src/config.js';
import type { GitClient } from '../src/git.js';
import { DEFAULT_STANDARDS_TOPICS } from '../src/standards.js';
import type { RuntimeSettings } from '../src/types.js';
import { GitError } from '../src/types.js';

/** 2026-03-14 09:26:53 local time. */
export const FIXED_NOW = new Date(2026, 2, 14, 9, 26, 53);
export const FIXED_BACKUP_SUFFIX = '.bak.20260314092653';

export const SHA_A = 'aaaaaaaaaaaa1111111111111111111111111111';
export const SHA_B = 'bbbbbbbbbbbb2222222222222222222222222222';

export const ALL_NODE_SCRIPTS = ['dev', 'test', 'test:coverage', 'lint', 'typecheck', 'build'];

export function tmpDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `agents-adopt-${prefix}-`));
}

/** Guide paths (relative to the standards root) of the default topic list. */
export function defaultGuidePaths(): string[] {
  return DEFAULT_STANDARDS_TOPICS.split(';').map((entry) => entry.slice(entry.indexOf('|') + 1));
}

/** A standards library with README.md and every default guide. */
export async function createStandardsDir(root: string, name = 'standards'): Promise<string> {
  const dir = join(root, name);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'README.md'), '# Standards\n');
  for (const guide of defaultGuidePaths()) {
    await mkdir(dirname(join(dir, guide)), { recursive: true });
    await writeFile(join(dir, guide), `# ${guide}\n`);
  }
  return dir;
}

/** A node project whose package.json defines the given scripts. */
export async function createNodeProject(root: string, scripts: readonly string[], name = 'project'): Promise<string> {
  const dir = join(root, name);
  await mkdir(dir, { recursive: true });
  const scriptMap = Object.fromEntries(scripts.map((s) => [s, `echo ${s}`]));
  await writeFile(join(dir, 'package.json'), JSON.stringify({ name, scripts: scriptMap }, null, 2));
  return dir;
}

export function testSettings(root: string, standardsHome: string): RuntimeSettings {
  return {
    standardsHome,
    homeDir: join(root, 'home'),
    templatesDir: getBundledTemplatesDir(),
    now: () => FIXED_NOW,
  };
}

/** GitClient over a fixed ref table; archive writes a single README.md. */
export class FakeGitClient implements GitClient {
  archiveCalls = 0;

  constructor(
    private readonly refs: Record<string, string>,
    private readonly repository = true,
    private readonly remote = '',
  ) {}

  isRepository(): Promise<boolean> {
    return Promise.resolve(this.repository);
  }

  resolveCommit(repoPath: string, ref: string): Promise<string> {
    const sha = this.refs[ref];
    if (sha === undefined) {
      return Promise.reject(new GitError(`Unable to resolve pinned ref '${ref}' in ${repoPath}`));
    }
    return Promise.resolve(sha);
  }

  remoteUrl(): Promise<string> {
    return Promise.resolve(this.remote);
  }

  async archive(_repoPath: string, sha: string, destDir: string): Promise<void> {
    this.archiveCalls++;
    await writeFile(join(destDir, 'README.md'), `# Standards at ${sha}\n`);
  }
}
