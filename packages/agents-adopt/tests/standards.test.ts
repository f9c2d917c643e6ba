import { describe, expect, it } from 'vitest';

import { ADOPTION_DEFAULTS } from '../src/config.js';
import {
  buildStandardsBlock,
  parseStandardsPath,
  parseStandardsTopics,
  resolveGuidePath,
} from '../src/standards.js';
import { ValidationError } from '../src/types.js';

describe('resolveGuidePath', () => {
  it('joins relative guides under the standards path', () => {
    expect(resolveGuidePath('/std', 'guides/a.md', '/home/dev')).toBe('/std/guides/a.md');
    expect(resolveGuidePath('/std', './guides/a.md', '/home/dev')).toBe('/std/guides/a.md');
  });

  it('expands home, keeps absolute paths and substitutes the path token', () => {
    expect(resolveGuidePath('/std', '~/notes/a.md', '/home/dev')).toBe('/home/dev/notes/a.md');
    expect(resolveGuidePath('/std', '/abs/a.md', '/home/dev')).toBe('/abs/a.md');
    expect(resolveGuidePath('/std', '{{STANDARDS_PATH}}/extra/g.md', '/home/dev')).toBe('/std/extra/g.md');
  });
});

describe('parseStandardsTopics', () => {
  it('uses the six default topics when unset or blank', () => {
    const topics = parseStandardsTopics(undefined, '/std', '/home/dev');
    expect(topics).toHaveLength(6);
    expect(topics[0]).toEqual({
      topic: 'Error handling',
      guidePath: '/std/guides/error-handling/error-handling.md',
    });
    expect(parseStandardsTopics('  ', '/std', '/home/dev')).toEqual(topics);
  });

  it('skips empty entries and trims whitespace', () => {
    expect(parseStandardsTopics(' A | a.md ; ;B|b.md;', '/std', '/home/dev')).toEqual([
      { topic: 'A', guidePath: '/std/a.md' },
      { topic: 'B', guidePath: '/std/b.md' },
    ]);
  });

  it('rejects entries without a separator', () => {
    expect(() => parseStandardsTopics('nopipe', '/std', '/home/dev')).toThrow(
      "Invalid STANDARDS_TOPICS entry 'nopipe' (expected 'Topic|path').",
    );
  });

  it('rejects empty topic or path', () => {
    expect(() => parseStandardsTopics('|x.md', '/std', '/home/dev')).toThrow(
      "Invalid STANDARDS_TOPICS entry '|x.md' (topic/path cannot be empty).",
    );
  });

  it('rejects a list with only separators', () => {
    expect(() => parseStandardsTopics(';;', '/std', '/home/dev')).toThrow(ValidationError);
    expect(() => parseStandardsTopics(';;', '/std', '/home/dev')).toThrow(
      'Standards topics list is empty after parsing.',
    );
  });
});

describe('buildStandardsBlock', () => {
  it('renders the full block between markers', () => {
    const block = buildStandardsBlock({
      standardsPath: '/std',
      topics: [{ topic: 'Logging', guidePath: '/std/guides/logging.md' }],
      deviationPolicy: 'Ask first.',
    });
    expect(block).toBe(
      [
        '<!-- BEGIN MANAGED: STANDARDS_REFERENCE -->',
        '## Standards Reference',
        '',
        'This project follows organizational standards defined in `/std/`.',
        '',
        '**Before implementing**, consult the relevant guide:',
        '',
        '| Topic | Guide |',
        '| --- | --- |',
        '| Logging | `/std/guides/logging.md` |',
        '',
        'For other topics, check `/std/README.md` for the full guide index (all guides are in `/std/guides/`).',
        '',
        '**Deviation policy**: Ask first.',
        '<!-- END MANAGED: STANDARDS_REFERENCE -->',
      ].join('\n'),
    );
  });

  it('uses the default deviation policy when none is given', () => {
    const block = buildStandardsBlock({ standardsPath: '/std', topics: [], deviationPolicy: '' });
    expect(block).toContain(`**Deviation policy**: ${ADOPTION_DEFAULTS.deviationPolicy}`);
  });
});

describe('parseStandardsPath', () => {
  it('reads the path back from a block', () => {
    const block = buildStandardsBlock({ standardsPath: '/std', topics: [] });
    expect(parseStandardsPath(block)).toBe('/std');
  });

  it('accepts a path without a trailing slash and CRLF endings', () => {
    expect(
      parseStandardsPath('x\r\nThis project follows organizational standards defined in `rel/std`.\r\n'),
    ).toBe('rel/std');
  });

  it('returns null without a path line', () => {
    expect(parseStandardsPath('# AGENTS.md\n')).toBeNull();
  });
});
