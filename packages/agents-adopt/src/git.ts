/**
 * Git access for pinning standards snapshots.
 *
 * Pinning needs four operations on the standards repository. They sit behind
 * the GitClient interface so tests can run without a git binary.
 */

import { execa } from 'execa';

import { GitError } from './types.js';

export interface GitClient {
  /** True when the path is inside a git work tree. */
  isRepository(repoPath: string): Promise<boolean>;
  /** Full commit SHA for `<ref>^{commit}`; throws GitError when it does not resolve. */
  resolveCommit(repoPath: string, ref: string): Promise<string>;
  /** URL of the `origin` remote, or '' when there is none. */
  remoteUrl(repoPath: string): Promise<string>;
  /** Write the tree at `sha` into an existing, empty destination directory. */
  archive(repoPath: string, sha: string, destDir: string): Promise<void>;
}

/** GitClient backed by the git and tar binaries. */
export class ExecaGitClient implements GitClient {
  async isRepository(repoPath: string): Promise<boolean> {
    const result = await execa('git', ['-C', repoPath, 'rev-parse', '--is-inside-work-tree'], {
      reject: false,
    });
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async resolveCommit(repoPath: string, ref: string): Promise<string> {
    const result = await execa('git', ['-C', repoPath, 'rev-parse', '--verify', '--quiet', `${ref}^{commit}`], {
      reject: false,
    });
    const sha = result.stdout.trim();
    if (result.exitCode !== 0 || sha.length === 0) {
      throw new GitError(`Unable to resolve pinned ref '${ref}' in ${repoPath}`, [
        'Check that the tag, branch or commit exists: git -C <standards-path> tag --list',
      ]);
    }
    return sha;
  }

  async remoteUrl(repoPath: string): Promise<string> {
    const result = await execa('git', ['-C', repoPath, 'config', '--get', 'remote.origin.url'], {
      reject: false,
    });
    return result.exitCode === 0 ? result.stdout.trim() : '';
  }

  async archive(repoPath: string, sha: string, destDir: string): Promise<void> {
    try {
      await execa('git', ['-C', repoPath, 'archive', '--format=tar', sha]).pipe('tar', [
        '-xf',
        '-',
        '-C',
        destDir,
      ]);
    } catch (err) {
      throw new GitError(
        `Failed to archive ${sha} from ${repoPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
