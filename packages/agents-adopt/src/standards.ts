/**
 * Standards Reference content: topic list parsing, guide path resolution and
 * the managed block text itself.
 */

import { isAbsolute } from 'node:path';

import { ADOPTION_DEFAULTS } from './config.js';
import { expandHome } from './fs-utils.js';
import type { StandardsTopic } from './types.js';
import { ValidationError } from './types.js';

export const MANAGED_BEGIN = '<!-- BEGIN MANAGED: STANDARDS_REFERENCE -->';
export const MANAGED_END = '<!-- END MANAGED: STANDARDS_REFERENCE -->';

export const STANDARDS_REFERENCE_HEADING = '## Standards Reference';

/** Line that records the standards path inside the block. */
export const STANDARDS_PATH_LINE_PREFIX = 'This project follows organizational standards defined in `';

export const DEVIATION_POLICY_PREFIX = '**Deviation policy**:';

export const DEFAULT_STANDARDS_TOPICS =
  'Error handling|guides/error-handling/error-handling.md;' +
  'Logging|guides/logging-practices/logging-practices.md;' +
  'API design|guides/api-design/api-design.md;' +
  'Documentation|guides/documentation-guidelines/documentation-guidelines.md;' +
  'Code style|guides/coding-guidelines/coding-guidelines.md;' +
  'Comments|guides/commenting-guidelines/commenting-guidelines.md';

/**
 * Resolve a guide path from a topic entry against the standards path:
 * `~/` expanded, `{{STANDARDS_PATH}}` substituted, absolute paths kept,
 * anything else joined under the standards path.
 */
export function resolveGuidePath(standardsPath: string, guide: string, homeDir: string): string {
  const expanded = expandHome(guide, homeDir);
  if (expanded.includes('{{STANDARDS_PATH}}')) {
    return expanded.split('{{STANDARDS_PATH}}').join(standardsPath);
  }
  if (isAbsolute(expanded)) {
    return expanded;
  }
  const relative = expanded.startsWith('./') ? expanded.slice(2) : expanded;
  return `${standardsPath}/${relative}`;
}

/**
 * Parse a `Topic|path;Topic|path` list. Empty entries are skipped; the default
 * list is used when the input is empty or undefined.
 */
export function parseStandardsTopics(
  topicsConfig: string | undefined,
  standardsPath: string,
  homeDir: string,
): StandardsTopic[] {
  const source =
    topicsConfig !== undefined && topicsConfig.trim().length > 0 ? topicsConfig : DEFAULT_STANDARDS_TOPICS;

  const topics: StandardsTopic[] = [];
  for (const rawEntry of source.split(';')) {
    const entry = rawEntry.trim();
    if (entry.length === 0) {
      continue;
    }
    const sep = entry.indexOf('|');
    if (sep < 0) {
      throw new ValidationError(`Invalid STANDARDS_TOPICS entry '${entry}' (expected 'Topic|path').`);
    }
    const topic = entry.slice(0, sep).trim();
    const guide = entry.slice(sep + 1).trim();
    if (topic.length === 0 || guide.length === 0) {
      throw new ValidationError(
        `Invalid STANDARDS_TOPICS entry '${entry}' (topic/path cannot be empty).`,
      );
    }
    topics.push({ topic, guidePath: resolveGuidePath(standardsPath, guide, homeDir) });
  }

  if (topics.length === 0) {
    throw new ValidationError('Standards topics list is empty after parsing.');
  }
  return topics;
}

/** Table rows, one per topic, without a trailing newline. */
export function buildGuideRows(topics: readonly StandardsTopic[]): string {
  return topics.map((t) => `| ${t.topic} | \`${t.guidePath}\` |`).join('\n');
}

export interface StandardsBlockInput {
  standardsPath: string;
  topics: readonly StandardsTopic[];
  deviationPolicy?: string | undefined;
}

/** The full managed Standards Reference block, markers included, no trailing newline. */
export function buildStandardsBlock(input: StandardsBlockInput): string {
  const { standardsPath } = input;
  const policy =
    input.deviationPolicy !== undefined && input.deviationPolicy.length > 0
      ? input.deviationPolicy
      : ADOPTION_DEFAULTS.deviationPolicy;

  return [
    MANAGED_BEGIN,
    STANDARDS_REFERENCE_HEADING,
    '',
    `${STANDARDS_PATH_LINE_PREFIX}${standardsPath}/\`.`,
    '',
    '**Before implementing**, consult the relevant guide:',
    '',
    '| Topic | Guide |',
    '| --- | --- |',
    buildGuideRows(input.topics),
    '',
    `For other topics, check \`${standardsPath}/README.md\` for the full guide index (all guides are in \`${standardsPath}/guides/\`).`,
    '',
    `${DEVIATION_POLICY_PREFIX} ${policy}`,
    MANAGED_END,
  ].join('\n');
}

/**
 * Extract the standards path from AGENTS.md text: the first line of the form
 * "This project follows organizational standards defined in `<path>/`."
 * Returns null when no such line exists.
 */
export function parseStandardsPath(content: string): string | null {
  const pattern = /^This project follows organizational standards defined in `([^`]*?)\/?`\.$/;
  for (const line of content.split('\n')) {
    const match = pattern.exec(line.replace(/\r$/, ''));
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}
