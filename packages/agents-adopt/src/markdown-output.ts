/**
 * Markdown rendering and pagination for generated reports.
 *
 * TTY: colorized markdown via marked-terminal, paginated through $PAGER
 * Piped/non-TTY: plain markdown, no ANSI codes, no pagination
 */

import { spawn } from 'node:child_process';

import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

import type { GlobalOptions } from './types.js';

const MAX_WIDTH = 100;
const PAGINATION_THRESHOLD = 40;
const DEFAULT_PAGER = 'less -R';

function getTerminalWidth(): number {
  return Math.min(MAX_WIDTH, process.stdout.columns ?? 80);
}

/** True when stdout is a TTY and --json/--quiet are not set. */
export function isInteractive(opts: Pick<GlobalOptions, 'json' | 'quiet'>): boolean {
  return !opts.json && !opts.quiet && process.stdout.isTTY === true;
}

/**
 * Render markdown to colorized terminal output.
 * Returns plain markdown when not interactive.
 */
export function renderMarkdown(content: string, interactive: boolean): string {
  if (!interactive) {
    return content;
  }
  marked.use(
    markedTerminal({
      width: getTerminalWidth(),
      reflowText: false,
    }) as unknown as Parameters<typeof marked.use>[0],
  );
  return marked.parse(content, { async: false });
}

/**
 * Output content, paginating through the pager if interactive and long.
 * Falls back to console.log if the pager cannot be started.
 */
export async function paginateOutput(
  content: string,
  interactive: boolean,
  pager: string = DEFAULT_PAGER,
): Promise<void> {
  const lines = content.split('\n').length;
  const [cmd, ...args] = pager.trim().split(/\s+/);

  if (!interactive || lines < PAGINATION_THRESHOLD || !process.stdout.isTTY || !cmd) {
    console.log(content);
    return;
  }

  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      stdio: ['pipe', 'inherit', 'inherit'],
    });

    child.stdin.on('error', (err: NodeJS.ErrnoException) => {
      // The pager exiting early closes its stdin.
      if (err.code !== 'EPIPE') {
        console.error(err.message);
      }
    });

    child.stdin.write(content);
    child.stdin.end();

    child.on('close', () => {
      resolve();
    });
    child.on('error', () => {
      console.log(content);
      resolve();
    });
  });
}
