import { existsSync } from 'node:fs';
import { rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  ADOPTION_DEFAULTS,
  loadAdoptionConfig,
  mergeAdoptionConfigs,
  parseKeyValueConfig,
  parseYamlConfig,
  resolveSettings,
  stripWrappingQuotes,
} from '../src/config.js';
import { UserError, ValidationError } from '../src/types.js';
import { tmpDir } from './helpers.js';

describe('stripWrappingQuotes', () => {
  it('strips one layer of matching quotes', () => {
    expect(stripWrappingQuotes('"a b"')).toBe('a b');
    expect(stripWrappingQuotes("'x'")).toBe('x');
    expect(stripWrappingQuotes('"\'nested\'"')).toBe("'nested'");
  });

  it('leaves mismatched or lone quotes alone', () => {
    expect(stripWrappingQuotes('"mixed\'')).toBe('"mixed\'');
    expect(stripWrappingQuotes('"')).toBe('"');
    expect(stripWrappingQuotes('plain')).toBe('plain');
  });
});

describe('parseKeyValueConfig', () => {
  it('parses keys, strips quotes and skips comments', () => {
    const content = [
      '# adoption values',
      '',
      'PROJECT_NAME = "Billing API"',
      "AGENT_ROLE='careful reviewer'",
      'TEST_CMD=make check',
      'EXTRA=1',
    ].join('\n');

    const { config, warnings } = parseKeyValueConfig(content, 'adopt.env');
    expect(config).toEqual({
      projectName: 'Billing API',
      agentRole: 'careful reviewer',
      commands: { test: 'make check' },
    });
    expect(warnings).toEqual(["Unknown config key 'EXTRA' ignored (adopt.env:6)."]);
  });

  it('keeps everything after the first = in the value', () => {
    const { config } = parseKeyValueConfig('STANDARDS_TOPICS=Logging|guides/a=b.md\n', 'adopt.env');
    expect(config.standardsTopics).toBe('Logging|guides/a=b.md');
  });

  it('rejects a line without = and names its line number', () => {
    expect(() => parseKeyValueConfig('PROJECT_NAME=x\nnot a pair\n', 'adopt.env')).toThrow(
      'Invalid config entry at adopt.env:2 (expected KEY=VALUE).',
    );
  });

  it('accumulates several command keys', () => {
    const { config } = parseKeyValueConfig('LINT_CMD=eslint .\nBUILD_CMD=tsc -b\n', 'adopt.env');
    expect(config.commands).toEqual({ lint: 'eslint .', build: 'tsc -b' });
  });
});

describe('parseYamlConfig', () => {
  it('reads a mapping with the same keys, stringifying scalars', () => {
    const { config, warnings } = parseYamlConfig(
      'PROJECT_NAME: Billing\nBUILD_CMD: make dist\nPRIORITY_ONE: 42\nOTHER: x\n',
      'adopt.yml',
    );
    expect(config).toEqual({
      projectName: 'Billing',
      priorityOne: '42',
      commands: { build: 'make dist' },
    });
    expect(warnings).toEqual(["Unknown config key 'OTHER' ignored (adopt.yml)."]);
  });

  it('treats an empty document as no values', () => {
    expect(parseYamlConfig('', 'adopt.yml')).toEqual({ config: {}, warnings: [] });
  });

  it('rejects a non-mapping document', () => {
    expect(() => parseYamlConfig('- a\n- b\n', 'adopt.yml')).toThrow('Invalid config file (not a mapping): adopt.yml');
  });

  it('rejects nested values', () => {
    expect(() => parseYamlConfig('PROJECT_NAME:\n  nested: 1\n', 'adopt.yml')).toThrow(
      'Invalid value for PROJECT_NAME in adopt.yml: expected a scalar',
    );
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseYamlConfig('PROJECT_NAME: [unclosed\n', 'adopt.yml')).toThrow(ValidationError);
  });
});

describe('loadAdoptionConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tmpDir('config');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('picks the parser by file extension', async () => {
    await writeFile(join(dir, 'adopt.yaml'), 'AGENT_ROLE: reviewer\n');
    await writeFile(join(dir, 'adopt.env'), 'AGENT_ROLE=builder\n');

    expect((await loadAdoptionConfig(join(dir, 'adopt.yaml'))).config.agentRole).toBe('reviewer');
    expect((await loadAdoptionConfig(join(dir, 'adopt.env'))).config.agentRole).toBe('builder');
  });

  it('reports a missing file as a UserError', async () => {
    await expect(loadAdoptionConfig(join(dir, 'missing.env'))).rejects.toThrow(UserError);
  });
});

describe('mergeAdoptionConfigs', () => {
  it('lets defined, non-empty values override', () => {
    const merged = mergeAdoptionConfigs(
      { ...ADOPTION_DEFAULTS, commands: { test: 'npm test' } },
      { agentRole: '', priorityOne: 'Speed', commands: { lint: 'eslint .', build: '' } },
    );
    expect(merged.agentRole).toBe(ADOPTION_DEFAULTS.agentRole);
    expect(merged.priorityOne).toBe('Speed');
    expect(merged.priorityTwo).toBe(ADOPTION_DEFAULTS.priorityTwo);
    expect(merged.commands).toEqual({ test: 'npm test', lint: 'eslint .' });
  });
});

describe('resolveSettings', () => {
  it('reads the standards home from the environment with ~ expansion', () => {
    const settings = resolveSettings({ HOME: '/home/dev', AGENTIC_BEST_PRACTICES_HOME: '~/std' });
    expect(settings.standardsHome).toBe('/home/dev/std');
    expect(settings.homeDir).toBe('/home/dev');
  });

  it('falls back to ~/agentic-best-practices', () => {
    const settings = resolveSettings({ HOME: '/home/dev', AGENTIC_BEST_PRACTICES_HOME: '  ' });
    expect(settings.standardsHome).toBe('/home/dev/agentic-best-practices');
  });

  it('locates the bundled templates', () => {
    const settings = resolveSettings({ HOME: '/home/dev' });
    expect(existsSync(join(settings.templatesDir, 'agents-template.md'))).toBe(true);
    expect(existsSync(join(settings.templatesDir, 'pilot-kickoff-template.md'))).toBe(true);
  });

  it('applies overrides', () => {
    const now = new Date(0);
    const settings = resolveSettings({ HOME: '/home/dev' }, { standardsHome: '/opt/std', now: () => now });
    expect(settings.standardsHome).toBe('/opt/std');
    expect(settings.now()).toBe(now);
  });
});
