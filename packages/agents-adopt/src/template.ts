/**
 * AGENTS.md template rendering.
 *
 * Templates contain two kinds of placeholders: a fixed set of bracketed
 * literals such as `[Project Name]` or `[npm test]`, and `{{TOKEN}}` markers.
 * Both are replaced in a single pass, so substituted values are never
 * rescanned. A `{{TOKEN}}` without a binding is rejected.
 */

import type { CommandName, CommandSet, CriticalPaths, StackProfile } from './types.js';
import { ValidationError } from './types.js';
import { todoCommand } from './stack.js';

/** Value kinds a bracket placeholder can be bound to. */
type PlaceholderSource =
  | { kind: 'value'; key: TemplateValueKey }
  | { kind: 'command'; name: CommandName }
  | { kind: 'path'; key: keyof CriticalPaths }
  | { kind: 'literal'; text: string };

export type TemplateValueKey =
  | 'projectName'
  | 'agentRole'
  | 'projectDescription'
  | 'priorityOne'
  | 'priorityTwo'
  | 'priorityThree'
  | 'language'
  | 'languageVersion'
  | 'framework'
  | 'frameworkVersion'
  | 'runtime'
  | 'runtimeVersion'
  | 'testing'
  | 'testingVersion';

/**
 * Every bracket placeholder the default template uses, with its binding.
 * The validator checks rendered files against the same list.
 */
export const BRACKET_PLACEHOLDERS: readonly (readonly [string, PlaceholderSource])[] = [
  ['[Project Name]', { kind: 'value', key: 'projectName' }],
  ['[specific role, e.g., "security-conscious backend developer"]', { kind: 'value', key: 'agentRole' }],
  ['[brief project description]', { kind: 'value', key: 'projectDescription' }],
  ['[First priority, e.g., "Security over convenience"]', { kind: 'value', key: 'priorityOne' }],
  ['[Second priority, e.g., "Correctness over speed"]', { kind: 'value', key: 'priorityTwo' }],
  ['[Third priority, e.g., "Readability over cleverness"]', { kind: 'value', key: 'priorityThree' }],
  ['[e.g., TypeScript]', { kind: 'value', key: 'language' }],
  ['[e.g., 5.x]', { kind: 'value', key: 'languageVersion' }],
  ['[e.g., Express]', { kind: 'value', key: 'framework' }],
  ['[e.g., 4.x]', { kind: 'value', key: 'frameworkVersion' }],
  ['[e.g., Node.js]', { kind: 'value', key: 'runtime' }],
  ['[e.g., 20+]', { kind: 'value', key: 'runtimeVersion' }],
  ['[e.g., PostgreSQL]', { kind: 'literal', text: 'TBD' }],
  ['[e.g., 15]', { kind: 'literal', text: 'TBD' }],
  ['[e.g., Jest]', { kind: 'value', key: 'testing' }],
  ['[e.g., 29.x]', { kind: 'value', key: 'testingVersion' }],
  ['[npm run dev]', { kind: 'command', name: 'dev' }],
  ['[npm test]', { kind: 'command', name: 'test' }],
  ['[npm run test:coverage]', { kind: 'command', name: 'coverage' }],
  ['[npm run lint]', { kind: 'command', name: 'lint' }],
  ['[npm run typecheck]', { kind: 'command', name: 'typecheck' }],
  ['[npm run build]', { kind: 'command', name: 'build' }],
  ['[Start dev server with hot reload]', { kind: 'literal', text: 'Start development environment' }],
  ['[Run all tests]', { kind: 'literal', text: 'Run the default test suite' }],
  ['[Run tests with coverage report]', { kind: 'literal', text: 'Run tests with coverage' }],
  ['[Run linter]', { kind: 'literal', text: 'Run lint checks' }],
  ['[Run type checker]', { kind: 'literal', text: 'Run type checks' }],
  ['[Production build]', { kind: 'literal', text: 'Build production artifacts' }],
  ['[Add your own]', { kind: 'literal', text: 'None' }],
  ['[Rationale]', { kind: 'literal', text: 'N/A' }],
  ['[Topic]', { kind: 'literal', text: 'Topic' }],
  ['[What best-practices says]', { kind: 'literal', text: 'Describe the standard' }],
  ['[What this project does instead]', { kind: 'literal', text: 'Describe the override' }],
  ['[Why the deviation is necessary]', { kind: 'literal', text: 'Explain rationale' }],
  ['[Date]', { kind: 'literal', text: 'YYYY-MM-DD' }],
  ['[src/index.ts]', { kind: 'path', key: 'entry' }],
  ['[src/config/]', { kind: 'path', key: 'config' }],
  ['[src/routes/]', { kind: 'path', key: 'routes' }],
  ['[src/services/]', { kind: 'path', key: 'services' }],
  ['[src/types/]', { kind: 'path', key: 'types' }],
];

/** Placeholders the validator reports as unresolved (command descriptions excluded). */
export const KNOWN_PLACEHOLDERS: readonly string[] = BRACKET_PLACEHOLDERS.map(([p]) => p).filter(
  (p) => !/^\[(Start dev server|Run all tests|Run tests with|Run linter|Run type checker|Production build)/.test(p),
);

export const SETUP_BLOCK_MARKER = 'SETUP INSTRUCTIONS (delete this block after setup):';

/** Literal home path used by hand-written templates, replaced by the standards path. */
export const LEGACY_STANDARDS_HOME_LITERAL = '~/agentic-best-practices';

const TOKEN_PATTERN = /\{\{([A-Z_]+)\}\}/g;

/** Values available to bracket placeholders. */
export type TemplateValues = Partial<Record<TemplateValueKey, string | undefined>>;

export interface TemplateBindings {
  values: TemplateValues;
  commands?: Partial<CommandSet> | undefined;
  criticalPaths?: Partial<CriticalPaths> | undefined;
  /** `{{TOKEN}}` bindings keyed by token name */
  tokens: Record<string, string>;
  /** Literal substring replacements applied in the same pass */
  literals?: Record<string, string> | undefined;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function valueOrTbd(value: string | undefined): string {
  return value !== undefined && value.length > 0 ? value : 'TBD';
}

function bracketReplacement(source: PlaceholderSource, bindings: TemplateBindings): string {
  switch (source.kind) {
    case 'value':
      return valueOrTbd(bindings.values[source.key]);
    case 'command': {
      const command = bindings.commands?.[source.name];
      return command !== undefined && command.length > 0 ? command : todoCommand(source.name);
    }
    case 'path':
      return valueOrTbd(bindings.criticalPaths?.[source.key]);
    case 'literal':
      return source.text;
  }
}

/**
 * Remove the setup-instructions comment block: from the line containing the
 * setup marker through the line that closes the comment, plus the blank lines
 * after it.
 */
export function stripSetupInstructions(text: string): string {
  const lines = text.split('\n');
  const start = lines.findIndex((line) => line.includes(SETUP_BLOCK_MARKER));
  if (start < 0) {
    return text;
  }
  let end = start;
  while (end < lines.length && !(lines[end] ?? '').includes('-->')) {
    end++;
  }
  if (end >= lines.length) {
    throw new ValidationError('Template setup instructions block is not closed with -->.');
  }
  end++;
  while (end < lines.length && (lines[end] ?? '').trim() === '') {
    end++;
  }
  return [...lines.slice(0, start), ...lines.slice(end)].join('\n');
}

/** Distinct `{{TOKEN}}` names in the text, in order of first appearance. */
export function findTokens(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    if (match[1]) {
      names.add(match[1]);
    }
  }
  return [...names];
}

/**
 * Render a template: strip the setup block, then replace every bracket
 * placeholder, literal and `{{TOKEN}}` in one pass.
 */
export function renderTemplate(text: string, bindings: TemplateBindings): string {
  const stripped = stripSetupInstructions(text);

  const unbound = findTokens(stripped).filter((name) => !(name in bindings.tokens));
  if (unbound.length > 0) {
    throw new ValidationError(
      `Template contains unbound tokens: ${unbound.map((n) => `{{${n}}}`).join(', ')}`,
      ['Remove the tokens from the template or use a template built for this tool.'],
    );
  }

  const replacements = new Map<string, string>();
  for (const [placeholder, source] of BRACKET_PLACEHOLDERS) {
    replacements.set(placeholder, bracketReplacement(source, bindings));
  }
  for (const [literal, value] of Object.entries(bindings.literals ?? {})) {
    replacements.set(literal, value);
  }
  for (const [name, value] of Object.entries(bindings.tokens)) {
    replacements.set(`{{${name}}}`, value);
  }

  // Longest first so a literal never shadows a longer one sharing its prefix.
  const keys = [...replacements.keys()].sort((a, b) => b.length - a.length);
  const pattern = new RegExp(keys.map(escapeRegExp).join('|'), 'g');
  return stripped.replace(pattern, (match) => replacements.get(match) ?? match);
}

/** Template values derived from a detected stack. */
export function stackTemplateValues(stack: StackProfile): TemplateValues {
  return {
    language: stack.language,
    languageVersion: stack.languageVersion,
    framework: stack.framework,
    frameworkVersion: stack.frameworkVersion,
    runtime: stack.runtime,
    runtimeVersion: stack.runtimeVersion,
    testing: stack.testing,
    testingVersion: stack.testingVersion,
  };
}

/** Lines (1-based) containing a known bracket placeholder. */
export function findPlaceholderLines(text: string): { line: number; text: string }[] {
  const hits: { line: number; text: string }[] = [];
  text.split('\n').forEach((line, index) => {
    if (KNOWN_PLACEHOLDERS.some((p) => line.includes(p))) {
      hits.push({ line: index + 1, text: line });
    }
  });
  return hits;
}

/** Lines (1-based) containing a `{{TOKEN}}`. */
export function findTokenLines(text: string): { line: number; text: string }[] {
  const hits: { line: number; text: string }[] = [];
  text.split('\n').forEach((line, index) => {
    if (/\{\{[A-Z_]+\}\}/.test(line)) {
      hits.push({ line: index + 1, text: line });
    }
  });
  return hits;
}
