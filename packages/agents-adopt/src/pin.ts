/**
 * Pinned standards snapshots.
 *
 * A snapshot is the standards repository tree at one commit, extracted under
 * the project's pinned directory as `<sanitized-ref>-<sha12>` with a
 * `.abp-pin.json` metadata file. Re-pinning the same commit is a no-op.
 */

import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rename, rm } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { writeFile } from 'atomically';

import { ensureDir, expandHome, isDirectory, resolveFromProject, stripTrailingSlash } from './fs-utils.js';
import type { GitClient } from './git.js';
import { ExecaGitClient } from './git.js';
import type { PinMetadata, RuntimeSettings } from './types.js';
import { DEFAULT_PINNED_DIR, PIN_METADATA_FIELD_ORDER, PIN_METADATA_FILENAME, UserError } from './types.js';

export interface PinOptions {
  projectDir: string;
  pinnedRef: string;
  /** Standards repository; defaults to settings.standardsHome */
  standardsPath?: string | undefined;
  /** Project-relative snapshots directory */
  pinnedDir?: string | undefined;
}

export interface PinResult {
  /** False when an up-to-date snapshot already existed */
  created: boolean;
  /** Snapshot path relative to the project directory */
  relativePath: string;
  absolutePath: string;
  metadata: PinMetadata;
}

/** Map `/ : @ space` to `-` and drop anything outside `[A-Za-z0-9._-]`. */
export function sanitizeRefName(ref: string): string {
  const sanitized = ref.replace(/[/:@ ]/g, '-').replace(/[^A-Za-z0-9._-]/g, '');
  return sanitized.length > 0 ? sanitized : 'ref';
}

export function snapshotName(ref: string, sha: string): string {
  return `${sanitizeRefName(ref)}-${sha.slice(0, 12)}`;
}

/** `YYYY-MM-DDTHH:MM:SSZ` */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function serializePinMetadata(metadata: PinMetadata): string {
  return JSON.stringify(metadata, [...PIN_METADATA_FIELD_ORDER], 2) + '\n';
}

/** Parse `.abp-pin.json` content; null when it is not a JSON object. String fields missing from it read as ''. */
export function parsePinMetadata(content: string): PinMetadata | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const record = new Map<string, unknown>(Object.entries(parsed));
  const field = (key: keyof PinMetadata): string => {
    const value = record.get(key);
    return typeof value === 'string' ? value : '';
  };
  return {
    source_repo_path: field('source_repo_path'),
    source_repo_remote: field('source_repo_remote'),
    pinned_ref: field('pinned_ref'),
    resolved_sha: field('resolved_sha'),
    snapshot_name: field('snapshot_name'),
    pinned_at_utc: field('pinned_at_utc'),
  };
}

/** Read a snapshot's metadata; null when the file is missing or unreadable. */
export async function readPinMetadata(snapshotDir: string): Promise<PinMetadata | null> {
  const metadataPath = join(snapshotDir, PIN_METADATA_FILENAME);
  if (!existsSync(metadataPath)) {
    return null;
  }
  try {
    return parsePinMetadata(await readFile(metadataPath, 'utf-8'));
  } catch {
    return null;
  }
}

/** Create (or reuse) a pinned snapshot of the standards repository. */
export async function pinStandardsVersion(
  options: PinOptions,
  settings: RuntimeSettings,
  git: GitClient = new ExecaGitClient(),
): Promise<PinResult> {
  const projectDir = resolve(expandHome(options.projectDir, settings.homeDir));
  if (!isDirectory(projectDir)) {
    throw new UserError(`Project directory not found: ${options.projectDir}`);
  }

  const standardsPath = resolveFromProject(
    options.standardsPath ?? settings.standardsHome,
    projectDir,
    settings.homeDir,
  );
  if (!isDirectory(standardsPath)) {
    throw new UserError(
      `Standards path not found: ${standardsPath}`,
      'Pass --standards-path or set AGENTIC_BEST_PRACTICES_HOME.',
    );
  }
  if (!(await git.isRepository(standardsPath))) {
    throw new UserError(
      `Standards path is not a git repository: ${standardsPath}`,
      'Pinning needs a git clone of the standards library.',
    );
  }

  const sha = await git.resolveCommit(standardsPath, options.pinnedRef);
  const name = snapshotName(options.pinnedRef, sha);
  const pinnedDir = stripTrailingSlash(options.pinnedDir ?? DEFAULT_PINNED_DIR);
  const relativePath = `${pinnedDir}/${name}`;
  const absolutePath = resolve(projectDir, relativePath);

  const existing = isDirectory(absolutePath) ? await readPinMetadata(absolutePath) : null;
  if (existing?.resolved_sha === sha) {
    return { created: false, relativePath, absolutePath, metadata: existing };
  }

  const metadata: PinMetadata = {
    source_repo_path: standardsPath,
    source_repo_remote: await git.remoteUrl(standardsPath),
    pinned_ref: options.pinnedRef,
    resolved_sha: sha,
    snapshot_name: name,
    pinned_at_utc: formatUtcTimestamp(settings.now()),
  };

  const parent = dirname(absolutePath);
  await ensureDir(parent);
  const staging = await mkdtemp(join(parent, `.${basename(absolutePath)}.tmp-`));
  try {
    await git.archive(standardsPath, sha, staging);
    await writeFile(join(staging, PIN_METADATA_FILENAME), serializePinMetadata(metadata));
    await rm(absolutePath, { recursive: true, force: true });
    await rename(staging, absolutePath);
  } catch (err) {
    await rm(staging, { recursive: true, force: true });
    throw err;
  }

  return { created: true, relativePath, absolutePath, metadata };
}
