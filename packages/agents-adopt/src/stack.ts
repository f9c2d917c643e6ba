/**
 * Project stack detection.
 *
 * Inspects marker files in a project directory and produces a StackProfile:
 * language, runtime, framework and testing labels, the six key commands, and
 * guessed critical paths. Detection never fails; unknown projects get the
 * generic (make-based) profile.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import type {
  CommandName,
  CommandSet,
  CriticalPaths,
  JvmBuildTool,
  PackageManager,
  PythonRunner,
  StackKind,
  StackProfile,
} from './types.js';
import { COMMAND_NAMES } from './types.js';
import { isFile } from './fs-utils.js';

const TBD = 'TBD';

/** Placeholder command used when nothing better is known. */
export function todoCommand(name: CommandName): string {
  return `TODO: set command for ${name}`;
}

/** First matching marker set wins. */
const STACK_MARKERS: readonly { kind: Exclude<StackKind, 'generic'>; files: string[] }[] = [
  { kind: 'node', files: ['package.json'] },
  { kind: 'python', files: ['pyproject.toml', 'requirements.txt', 'setup.py', 'Pipfile'] },
  { kind: 'go', files: ['go.mod'] },
  { kind: 'rust', files: ['Cargo.toml'] },
  { kind: 'jvm', files: ['pom.xml', 'build.gradle', 'build.gradle.kts'] },
];

export function detectStackKind(projectDir: string): StackKind {
  for (const marker of STACK_MARKERS) {
    if (marker.files.some((f) => isFile(join(projectDir, f)))) {
      return marker.kind;
    }
  }
  return 'generic';
}

export function detectPackageManager(projectDir: string): PackageManager {
  if (isFile(join(projectDir, 'pnpm-lock.yaml'))) {
    return 'pnpm';
  }
  if (isFile(join(projectDir, 'yarn.lock'))) {
    return 'yarn';
  }
  if (isFile(join(projectDir, 'bun.lock')) || isFile(join(projectDir, 'bun.lockb'))) {
    return 'bun';
  }
  return 'npm';
}

/** Script names of package.json, or [] when it is missing or unreadable. */
export function readPackageScripts(projectDir: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(join(projectDir, 'package.json'), 'utf-8'));
  } catch {
    return [];
  }
  if (typeof parsed !== 'object' || parsed === null || !('scripts' in parsed)) {
    return [];
  }
  const scripts = parsed.scripts;
  if (typeof scripts !== 'object' || scripts === null) {
    return [];
  }
  return Object.keys(scripts);
}

/** Candidate script names per command, in lookup order. */
const NODE_SCRIPT_CANDIDATES: Record<CommandName, string[]> = {
  dev: ['dev'],
  test: ['test'],
  coverage: ['test:coverage', 'coverage'],
  lint: ['lint'],
  typecheck: ['typecheck', 'type-check'],
  build: ['build'],
};

/** Shell command that runs a package.json script with the given package manager. */
export function commandForScript(packageManager: PackageManager, script: string): string {
  switch (packageManager) {
    case 'yarn':
      return `yarn ${script}`;
    case 'bun':
      return `bun run ${script}`;
    case 'npm':
    case 'pnpm':
      return script === 'test' ? `${packageManager} test` : `${packageManager} run ${script}`;
  }
}

export function nodeCommands(packageManager: PackageManager, scripts: readonly string[]): CommandSet {
  const available = new Set(scripts);
  const pick = (name: CommandName): string => {
    const script = NODE_SCRIPT_CANDIDATES[name].find((s) => available.has(s));
    return script ? commandForScript(packageManager, script) : todoCommand(name);
  };
  return {
    dev: pick('dev'),
    test: pick('test'),
    coverage: pick('coverage'),
    lint: pick('lint'),
    typecheck: pick('typecheck'),
    build: pick('build'),
  };
}

export function detectPythonRunner(projectDir: string): PythonRunner {
  if (isFile(join(projectDir, 'uv.lock'))) {
    return 'uv';
  }
  if (isFile(join(projectDir, 'poetry.lock'))) {
    return 'poetry';
  }
  if (isFile(join(projectDir, 'Pipfile.lock')) || isFile(join(projectDir, 'Pipfile'))) {
    return 'pipenv';
  }
  return 'none';
}

const PYTHON_PREFIXES: Record<PythonRunner, string> = {
  uv: 'uv run ',
  poetry: 'poetry run ',
  pipenv: 'pipenv run ',
  none: '',
};

const PYTHON_DEV_ENTRIES: readonly [string, string][] = [
  ['manage.py', 'python manage.py runserver'],
  ['app.py', 'python app.py'],
  ['src/main.py', 'python src/main.py'],
  ['main.py', 'python main.py'],
];

function pythonCommands(projectDir: string, runner: PythonRunner): CommandSet {
  const prefix = PYTHON_PREFIXES[runner];
  const dev =
    PYTHON_DEV_ENTRIES.find(([file]) => isFile(join(projectDir, file)))?.[1] ?? 'python -m app';
  return {
    dev: `${prefix}${dev}`,
    test: `${prefix}pytest`,
    coverage: `${prefix}pytest --cov`,
    lint: `${prefix}ruff check .`,
    typecheck: `${prefix}mypy .`,
    build: `${prefix}python -m build`,
  };
}

export function detectJvmBuildTool(projectDir: string): JvmBuildTool {
  if (['gradlew', 'build.gradle', 'build.gradle.kts'].some((f) => isFile(join(projectDir, f)))) {
    return 'gradle';
  }
  return isFile(join(projectDir, 'mvnw')) ? 'maven-wrapper' : 'maven';
}

function jvmCommands(tool: JvmBuildTool): CommandSet {
  if (tool === 'gradle') {
    return {
      dev: './gradlew run',
      test: './gradlew test',
      coverage: './gradlew test',
      lint: './gradlew check',
      typecheck: './gradlew classes',
      build: './gradlew build',
    };
  }
  const mvn = tool === 'maven-wrapper' ? './mvnw' : 'mvn';
  return {
    dev: `${mvn} spring-boot:run`,
    test: `${mvn} test`,
    coverage: `${mvn} test`,
    lint: `${mvn} -q -DskipTests verify`,
    typecheck: `${mvn} -q -DskipTests compile`,
    build: `${mvn} -DskipTests package`,
  };
}

const GO_COMMANDS: CommandSet = {
  dev: 'go run .',
  test: 'go test ./...',
  coverage: 'go test ./... -cover',
  lint: 'go vet ./...',
  typecheck: 'go test ./...',
  build: 'go build ./...',
};

const RUST_COMMANDS: CommandSet = {
  dev: 'cargo run',
  test: 'cargo test',
  coverage: 'cargo test',
  lint: 'cargo clippy --all-targets --all-features -- -D warnings',
  typecheck: 'cargo check',
  build: 'cargo build --release',
};

const GENERIC_COMMANDS: CommandSet = {
  dev: 'make dev',
  test: 'make test',
  coverage: 'make test-coverage',
  lint: 'make lint',
  typecheck: 'make typecheck',
  build: 'make build',
};

/** First candidate that exists under the project, else the fallback. */
export function chooseExistingPath(
  projectDir: string,
  fallback: string,
  candidates: readonly string[],
): string {
  return candidates.find((c) => existsSync(join(projectDir, c))) ?? fallback;
}

type PathRule = { fallback: string; candidates: string[] };
type PathRules = Record<keyof CriticalPaths, PathRule>;

const CRITICAL_PATH_RULES: Record<Exclude<StackKind, 'go'>, PathRules> = {
  node: {
    entry: { fallback: 'src/index.ts', candidates: ['src/index.ts', 'src/index.js', 'index.ts', 'index.js'] },
    config: { fallback: 'src/config/', candidates: ['src/config', 'config'] },
    routes: { fallback: 'src/routes/', candidates: ['src/routes', 'routes'] },
    services: { fallback: 'src/services/', candidates: ['src/services', 'services', 'src/lib'] },
    types: { fallback: 'src/types/', candidates: ['src/types', 'types'] },
  },
  python: {
    entry: { fallback: 'src/main.py', candidates: ['manage.py', 'app.py', 'src/main.py', 'main.py'] },
    config: { fallback: 'config/', candidates: ['app/config', 'src/config', 'config'] },
    routes: { fallback: 'app/routes/', candidates: ['app/routes', 'src/routes', 'routes'] },
    services: { fallback: 'app/services/', candidates: ['app/services', 'src/services', 'services'] },
    types: { fallback: 'app/schemas/', candidates: ['app/schemas', 'src/types', 'types'] },
  },
  rust: {
    entry: { fallback: 'src/main.rs', candidates: ['src/main.rs', 'src/lib.rs'] },
    config: { fallback: 'config/', candidates: ['src/config', 'config'] },
    routes: { fallback: 'src/routes/', candidates: ['src/routes', 'src/http'] },
    services: { fallback: 'src/services/', candidates: ['src/services', 'src/domain'] },
    types: { fallback: 'src/types/', candidates: ['src/types', 'src/domain/types'] },
  },
  jvm: {
    entry: { fallback: 'src/main/java/', candidates: ['src/main/java', 'src/main/kotlin'] },
    config: { fallback: 'src/main/resources/', candidates: ['src/main/resources', 'config'] },
    routes: { fallback: 'src/main/java/', candidates: ['src/main/java', 'src/main/kotlin'] },
    services: { fallback: 'src/main/java/', candidates: ['src/main/java', 'src/main/kotlin'] },
    types: { fallback: 'src/main/java/', candidates: ['src/main/java', 'src/main/kotlin'] },
  },
  generic: {
    entry: { fallback: 'src/', candidates: ['src', 'app'] },
    config: { fallback: 'config/', candidates: ['config', 'src/config'] },
    routes: { fallback: 'src/', candidates: ['src/routes', 'routes'] },
    services: { fallback: 'src/', candidates: ['src/services', 'services'] },
    types: { fallback: 'src/', candidates: ['src/types', 'types'] },
  },
};

const GO_PATH_RULES: Omit<PathRules, 'entry'> = {
  config: { fallback: 'internal/config/', candidates: ['internal/config', 'pkg/config', 'config'] },
  routes: { fallback: 'internal/http/', candidates: ['internal/http', 'pkg/http', 'api'] },
  services: { fallback: 'internal/service/', candidates: ['internal/service', 'pkg/service', 'service'] },
  types: { fallback: 'internal/types/', candidates: ['internal/types', 'pkg/types', 'api/types'] },
};

function resolvePaths(projectDir: string, rules: PathRules): CriticalPaths {
  const pick = (rule: PathRule): string => chooseExistingPath(projectDir, rule.fallback, rule.candidates);
  return {
    entry: pick(rules.entry),
    config: pick(rules.config),
    routes: pick(rules.routes),
    services: pick(rules.services),
    types: pick(rules.types),
  };
}

/** `cmd/<name>/main.go` for the first service (sorted), else `main.go`, else a placeholder. */
export function detectGoEntryPath(projectDir: string): string {
  const cmdDir = join(projectDir, 'cmd');
  let services: string[] = [];
  try {
    services = readdirSync(cmdDir).sort();
  } catch {
    services = [];
  }
  for (const name of services) {
    if (isFile(join(cmdDir, name, 'main.go'))) {
      return `cmd/${name}/main.go`;
    }
  }
  if (isFile(join(projectDir, 'main.go'))) {
    return 'main.go';
  }
  return 'cmd/<service>/main.go';
}

/** Detect the stack of a project directory. */
export function detectStack(projectDir: string): StackProfile {
  const kind = detectStackKind(projectDir);
  const versions = { languageVersion: TBD, frameworkVersion: TBD, testingVersion: TBD };

  switch (kind) {
    case 'node': {
      const packageManager = detectPackageManager(projectDir);
      const scripts = readPackageScripts(projectDir);
      const hasTsconfig =
        isFile(join(projectDir, 'tsconfig.json')) || isFile(join(projectDir, 'tsconfig.base.json'));
      return {
        kind,
        packageManager,
        scripts,
        language: hasTsconfig ? 'TypeScript' : 'JavaScript/TypeScript',
        runtime: 'Node.js',
        runtimeVersion: '20+',
        framework: 'Express/Next.js/TBD',
        testing: 'Jest/Vitest/TBD',
        ...versions,
        commands: nodeCommands(packageManager, scripts),
        criticalPaths: resolvePaths(projectDir, CRITICAL_PATH_RULES.node),
      };
    }
    case 'python': {
      const runner = detectPythonRunner(projectDir);
      return {
        kind,
        runner,
        language: 'Python',
        runtime: 'Python',
        runtimeVersion: '3.11+',
        framework: 'Django/FastAPI/TBD',
        testing: 'pytest',
        ...versions,
        commands: pythonCommands(projectDir, runner),
        criticalPaths: resolvePaths(projectDir, CRITICAL_PATH_RULES.python),
      };
    }
    case 'go': {
      const entry = detectGoEntryPath(projectDir);
      return {
        kind,
        language: 'Go',
        runtime: 'Go',
        runtimeVersion: '1.22+',
        framework: 'net/http/Fiber/TBD',
        testing: 'go test',
        ...versions,
        commands: { ...GO_COMMANDS },
        criticalPaths: resolvePaths(projectDir, {
          entry: { fallback: entry, candidates: [] },
          ...GO_PATH_RULES,
        }),
      };
    }
    case 'rust':
      return {
        kind,
        language: 'Rust',
        runtime: 'Rust',
        runtimeVersion: 'stable',
        framework: 'Axum/Actix/TBD',
        testing: 'cargo test',
        ...versions,
        commands: { ...RUST_COMMANDS },
        criticalPaths: resolvePaths(projectDir, CRITICAL_PATH_RULES.rust),
      };
    case 'jvm': {
      const buildTool = detectJvmBuildTool(projectDir);
      return {
        kind,
        buildTool,
        language: 'Java/Kotlin',
        runtime: 'JVM',
        runtimeVersion: '17+',
        framework: 'Spring Boot/TBD',
        testing: 'JUnit/TestNG',
        ...versions,
        commands: jvmCommands(buildTool),
        criticalPaths: resolvePaths(projectDir, CRITICAL_PATH_RULES.jvm),
      };
    }
    case 'generic':
      return {
        kind,
        language: TBD,
        runtime: TBD,
        runtimeVersion: TBD,
        framework: TBD,
        testing: TBD,
        ...versions,
        commands: { ...GENERIC_COMMANDS },
        criticalPaths: resolvePaths(projectDir, CRITICAL_PATH_RULES.generic),
      };
  }
}

/** Replace detected commands with non-empty overrides. */
export function applyCommandOverrides(
  commands: CommandSet,
  overrides: Partial<CommandSet> | undefined,
): CommandSet {
  const result = { ...commands };
  if (!overrides) {
    return result;
  }
  for (const name of COMMAND_NAMES) {
    const value = overrides[name];
    if (value !== undefined && value.length > 0) {
      result[name] = value;
    }
  }
  return result;
}
