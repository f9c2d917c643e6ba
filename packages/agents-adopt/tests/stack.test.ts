import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  applyCommandOverrides,
  commandForScript,
  detectGoEntryPath,
  detectStack,
  detectStackKind,
  nodeCommands,
  readPackageScripts,
} from '../src/stack.js';
import { tmpDir } from './helpers.js';

describe('stack detection', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await tmpDir('stack');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function touch(...files: string[]): Promise<void> {
    for (const file of files) {
      await mkdir(dirname(join(dir, file)), { recursive: true });
      await writeFile(join(dir, file), '');
    }
  }

  async function writePackageJson(scripts: Record<string, string>): Promise<void> {
    await writeFile(join(dir, 'package.json'), JSON.stringify({ name: 'demo', scripts }));
  }

  describe('detectStackKind', () => {
    it('falls back to generic without markers', () => {
      expect(detectStackKind(dir)).toBe('generic');
    });

    it('checks markers in node, python, go, rust, jvm order', async () => {
      await touch('pom.xml');
      expect(detectStackKind(dir)).toBe('jvm');
      await touch('Cargo.toml');
      expect(detectStackKind(dir)).toBe('rust');
      await touch('go.mod');
      expect(detectStackKind(dir)).toBe('go');
      await touch('requirements.txt');
      expect(detectStackKind(dir)).toBe('python');
      await touch('package.json');
      expect(detectStackKind(dir)).toBe('node');
    });

    it('ignores a marker that is a directory', async () => {
      await mkdir(join(dir, 'go.mod'));
      expect(detectStackKind(dir)).toBe('generic');
    });
  });

  describe('node', () => {
    it('maps available scripts and marks the rest TODO', async () => {
      await writePackageJson({ dev: 'vite', test: 'vitest', lint: 'eslint .' });
      const stack = detectStack(dir);

      expect(stack.kind).toBe('node');
      expect(stack.commands).toEqual({
        dev: 'npm run dev',
        test: 'npm test',
        coverage: 'TODO: set command for coverage',
        lint: 'npm run lint',
        typecheck: 'TODO: set command for typecheck',
        build: 'TODO: set command for build',
      });
      expect(stack.language).toBe('JavaScript/TypeScript');
    });

    it('uses the lockfile package manager', async () => {
      await writePackageJson({ test: 'vitest', build: 'tsc', coverage: 'c8' });
      await touch('yarn.lock');
      expect(detectStack(dir).commands.build).toBe('yarn build');

      await touch('pnpm-lock.yaml');
      const stack = detectStack(dir);
      expect(stack.commands.test).toBe('pnpm test');
      expect(stack.commands.coverage).toBe('pnpm run coverage');
    });

    it('prefers test:coverage and reports TypeScript with a tsconfig', async () => {
      await writePackageJson({ 'test:coverage': 'x', coverage: 'y', 'type-check': 'tsc' });
      await touch('tsconfig.json');
      const stack = detectStack(dir);
      expect(stack.commands.coverage).toBe('npm run test:coverage');
      expect(stack.commands.typecheck).toBe('npm run type-check');
      expect(stack.language).toBe('TypeScript');
    });

    it('resolves existing critical paths and falls back for missing ones', async () => {
      await writePackageJson({});
      await mkdir(join(dir, 'src', 'routes'), { recursive: true });
      await touch('index.js');
      expect(detectStack(dir).criticalPaths).toEqual({
        entry: 'index.js',
        config: 'src/config/',
        routes: 'src/routes',
        services: 'src/services/',
        types: 'src/types/',
      });
    });

    it('treats unreadable package.json as having no scripts', async () => {
      await writeFile(join(dir, 'package.json'), '{ not json');
      expect(readPackageScripts(dir)).toEqual([]);
      expect(detectStack(dir).commands.test).toBe('TODO: set command for test');
    });
  });

  describe('other stacks', () => {
    it('prefixes python commands with the runner', async () => {
      await touch('pyproject.toml', 'uv.lock', 'manage.py');
      const stack = detectStack(dir);
      expect(stack.kind).toBe('python');
      if (stack.kind !== 'python') {
        throw new Error('expected python');
      }
      expect(stack.runner).toBe('uv');
      expect(stack.commands.dev).toBe('uv run python manage.py runserver');
      expect(stack.commands.test).toBe('uv run pytest');
      expect(stack.criticalPaths.entry).toBe('manage.py');
    });

    it('uses bare python commands without a runner', async () => {
      await touch('requirements.txt');
      const stack = detectStack(dir);
      expect(stack.commands.dev).toBe('python -m app');
      expect(stack.commands.lint).toBe('ruff check .');
    });

    it('picks the first cmd/ service as the go entry', async () => {
      await touch('go.mod', 'cmd/worker/main.go', 'cmd/api/main.go');
      const stack = detectStack(dir);
      expect(stack.commands.dev).toBe('go run .');
      expect(stack.commands.test).toBe('go test ./...');
      expect(stack.criticalPaths.entry).toBe('cmd/api/main.go');
    });

    it('falls back to main.go, then a placeholder path', async () => {
      expect(detectGoEntryPath(dir)).toBe('cmd/<service>/main.go');
      await touch('main.go');
      expect(detectGoEntryPath(dir)).toBe('main.go');
    });

    it('uses cargo for rust', async () => {
      await touch('Cargo.toml');
      expect(detectStack(dir).commands.test).toBe('cargo test');
    });

    it('distinguishes gradle, maven wrapper and maven', async () => {
      await touch('pom.xml');
      expect(detectStack(dir).commands.test).toBe('mvn test');
      await touch('mvnw');
      const wrapped = detectStack(dir);
      if (wrapped.kind !== 'jvm') {
        throw new Error('expected jvm');
      }
      expect(wrapped.buildTool).toBe('maven-wrapper');
      expect(wrapped.commands.test).toBe('./mvnw test');
      await touch('build.gradle');
      expect(detectStack(dir).commands.test).toBe('./gradlew test');
    });

    it('uses make targets for unknown projects', () => {
      const stack = detectStack(dir);
      expect(stack.kind).toBe('generic');
      expect(stack.commands.test).toBe('make test');
      expect(stack.language).toBe('TBD');
    });
  });
});

describe('command helpers', () => {
  it('formats scripts per package manager', () => {
    expect(commandForScript('npm', 'test')).toBe('npm test');
    expect(commandForScript('npm', 'lint')).toBe('npm run lint');
    expect(commandForScript('yarn', 'test')).toBe('yarn test');
    expect(commandForScript('bun', 'build')).toBe('bun run build');
  });

  it('builds a full command set from scripts', () => {
    expect(nodeCommands('bun', ['test']).test).toBe('bun run test');
  });

  it('applies only non-empty overrides', () => {
    const base = nodeCommands('npm', ['test', 'lint']);
    const result = applyCommandOverrides(base, { test: 'vitest run', lint: '' });
    expect(result.test).toBe('vitest run');
    expect(result.lint).toBe('npm run lint');
    expect(applyCommandOverrides(base, undefined)).toEqual(base);
  });
});
