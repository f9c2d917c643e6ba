/**
 * Managed Standards Reference block editing.
 *
 * The block lives between BEGIN/END marker comments in AGENTS.md. Editing is
 * line based: remove every existing Standards Reference (marked or legacy
 * unmarked), then insert the new block before the first level-2 heading.
 * Merging twice with the same block yields the same bytes. Files using CRLF
 * line endings keep them.
 */

import { MANAGED_BEGIN, MANAGED_END } from './standards.js';
import { ValidationError } from './types.js';

const LEGACY_HEADING = /^##\s+Standards Reference\s*$/;
const LEVEL_TWO_HEADING = /^##\s+/;
const LEVEL_ONE_OR_TWO_HEADING = /^#{1,2}\s+/;

function splitLines(text: string): string[] {
  const lines = text.replace(/\r\n/g, '\n').split('\n');
  // A trailing newline produces one empty element that is not a line.
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** `\r\n` when the text uses CRLF line endings, else `\n`. */
export function detectLineEnding(text: string): string {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

function isBlank(line: string | undefined): boolean {
  return line !== undefined && line.trim() === '';
}

/**
 * Remove every managed block and every unmarked `## Standards Reference`
 * section. Legacy sections end at the next level-1 or level-2 heading.
 * Returns the remaining lines joined with the input's line ending, with a
 * trailing one when any line remains.
 */
export function removeManagedBlock(text: string): string {
  const eol = detectLineEnding(text);
  const kept: string[] = [];
  let inManaged = false;
  let inLegacy = false;
  let beginLine = 0;

  splitLines(text).forEach((line, index) => {
    const trimmed = line.trim();
    if (inManaged) {
      if (trimmed === MANAGED_BEGIN) {
        throw new ValidationError(
          `Nested managed block begin marker at line ${index + 1} (block opened at line ${beginLine}).`,
        );
      }
      if (trimmed === MANAGED_END) {
        inManaged = false;
      }
      return;
    }
    if (trimmed === MANAGED_BEGIN) {
      inManaged = true;
      inLegacy = false;
      beginLine = index + 1;
      return;
    }
    if (trimmed === MANAGED_END) {
      throw new ValidationError(
        `Managed block end marker at line ${index + 1} has no matching begin marker.`,
        ['Remove the stray marker or restore the matching begin marker, then rerun.'],
      );
    }
    if (inLegacy) {
      if (LEVEL_ONE_OR_TWO_HEADING.test(line) && !LEGACY_HEADING.test(line)) {
        inLegacy = false;
      } else {
        return;
      }
    }
    if (LEGACY_HEADING.test(line)) {
      inLegacy = true;
      return;
    }
    kept.push(line);
  });

  if (inManaged) {
    throw new ValidationError(
      `Managed block begin marker at line ${beginLine} has no matching end marker.`,
      ['Restore the end marker (or remove the begin marker) and rerun.'],
    );
  }

  return kept.length > 0 ? `${kept.join(eol)}${eol}` : '';
}

/**
 * Insert the block before the first `## ` heading, with exactly one blank line
 * on each side. Without such a heading the block is appended after one blank
 * line. The result always ends with a single line ending.
 */
export function insertManagedBlock(text: string, block: string, eol: string = detectLineEnding(text)): string {
  const lines = splitLines(text);
  const blockLines = splitLines(block);

  const headingIndex = lines.findIndex((line) => LEVEL_TWO_HEADING.test(line));
  const before = headingIndex < 0 ? lines : lines.slice(0, headingIndex);
  const after = headingIndex < 0 ? [] : lines.slice(headingIndex);

  while (before.length > 0 && isBlank(before[before.length - 1])) {
    before.pop();
  }

  const result = [...before];
  if (result.length > 0) {
    result.push('');
  }
  result.push(...blockLines);
  if (after.length > 0) {
    result.push('', ...after);
  }

  while (result.length > 0 && isBlank(result[result.length - 1])) {
    result.pop();
  }
  return `${result.join(eol)}${eol}`;
}

/** Remove any existing Standards Reference, then insert the given block. */
export function mergeManagedBlock(text: string, block: string): string {
  return insertManagedBlock(removeManagedBlock(text), block, detectLineEnding(text));
}

/** Count lines equal to the begin and end markers. */
export function countManagedMarkers(text: string): { begin: number; end: number } {
  let begin = 0;
  let end = 0;
  for (const line of splitLines(text)) {
    const trimmed = line.trim();
    if (trimmed === MANAGED_BEGIN) {
      begin++;
    } else if (trimmed === MANAGED_END) {
      end++;
    }
  }
  return { begin, end };
}
