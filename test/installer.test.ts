/**
 * Tests for the dependency installer
 *
 * Covers environment creation, reuse, the lifecycle marker and the two fatal
 * error kinds.
 */
import yaml from 'js-yaml';

import { FakeHost, failed, hostWithPython } from './helpers/fake-host';
import { installDependencies, resolveEnvironmentPaths } from '../src/bootstrap/installer';
import { DependencyInstallError, EnvironmentCreationError } from '../src/bootstrap/errors';
import { DEFAULT_CONFIG, loadConfig } from '../src/utils/config-loader';
import { createEnvironmentState } from '../src/types/bootstrap';
import type { LauncherConfig } from '../src/types/config';

const ROOT = '/project';
const ENV_PYTHON = '/project/.venv/bin/python';
const MARKER = '/project/.venv/.launcher-deps-installed';
const MANIFEST = '/project/requirements.txt';

function config(): LauncherConfig {
  return structuredClone(DEFAULT_CONFIG);
}

function install(host: FakeHost, reinstall = false) {
  const state = createEnvironmentState();
  const outcome = installDependencies({ host, rootDir: ROOT, config: config(), state, reinstall, silent: true });
  return { state, outcome };
}

describe('resolveEnvironmentPaths', () => {
  test('posix layout keeps the interpreter under bin/', () => {
    expect(resolveEnvironmentPaths(ROOT, config(), 'linux')).toEqual({
      root: '/project/.venv',
      python: ENV_PYTHON,
      marker: MARKER,
      manifest: MANIFEST,
    });
  });

  test('Windows layout keeps the interpreter under Scripts/', () => {
    expect(resolveEnvironmentPaths(ROOT, config(), 'win32').python).toBe('/project/.venv/Scripts/python.exe');
  });

  test('environment root is configurable', () => {
    const custom = config();
    custom.environment.path = '.conda';
    expect(resolveEnvironmentPaths(ROOT, custom, 'darwin').marker).toBe('/project/.conda/.launcher-deps-installed');
  });
});

describe('installDependencies - fresh environment', () => {
  test('creates the environment, installs the manifest and writes the marker', () => {
    const host = hostWithPython().addFile(MANIFEST, 'flask\nqrcode\n');
    const { state, outcome } = install(host);

    expect(outcome).toEqual({ ok: true, skipped: false });
    expect(state).toEqual({
      runtimePresent: true,
      dependenciesInstalled: true,
      optionalComponentInstalled: false,
      optionalComponentDegraded: false,
    });
    expect(host.commands.map((c) => [c.command, ...c.args])).toEqual([
      ['python3', '--version'],
      ['python3', '-m', 'venv', '/project/.venv'],
      [ENV_PYTHON, '-m', 'pip', 'install', '-r', MANIFEST],
    ]);
  });

  test('marker records the manifest it was written for', () => {
    const host = hostWithPython().addFile(MANIFEST);
    install(host);

    const marker = yaml.load(host.readFile(MARKER));
    expect(marker).toMatchObject({ manifest: MANIFEST, installed_at: expect.anything() });
  });

  test('streams pip output unless silent', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const host = hostWithPython().addFile(MANIFEST);
    installDependencies({ host, rootDir: ROOT, config: config(), state: createEnvironmentState() });

    expect(host.commandsMatching(ENV_PYTHON, 'pip')[0]?.options.inherit).toBe(true);
    log.mockRestore();
  });
});

describe('installDependencies - Windows', () => {
  const WIN_ENV_PYTHON = '/project/.venv/Scripts/python.exe';

  test('default config uses python where python3 is only the store alias', () => {
    const host = new FakeHost('win32').addFile(MANIFEST);
    host
      .when('python3', ['--version'], failed('Python was not found; run without arguments to install from the Microsoft Store', 9009))
      .when('python', ['--version'], { stdout: 'Python 3.12.1\n' })
      .when('python', ['-m', 'venv'], {}, () => {
        host.addFile(WIN_ENV_PYTHON);
      });

    const outcome = installDependencies({
      host,
      rootDir: ROOT,
      config: loadConfig(host, ROOT),
      state: createEnvironmentState(),
      silent: true,
    });

    expect(outcome).toEqual({ ok: true, skipped: false });
    expect(host.commands.map((c) => [c.command, ...c.args])).toEqual([
      ['python', '--version'],
      ['python', '-m', 'venv', '/project/.venv'],
      [WIN_ENV_PYTHON, '-m', 'pip', 'install', '-r', MANIFEST],
    ]);
  });
});

describe('installDependencies - idempotence', () => {
  test('a second run reuses the environment and skips the install', () => {
    const host = hostWithPython().addFile(MANIFEST);

    install(host);
    const second = install(host);

    expect(second.outcome).toEqual({ ok: true, skipped: true });
    expect(second.state.dependenciesInstalled).toBe(true);
    expect(host.commandsMatching(ENV_PYTHON, 'pip', 'install')).toHaveLength(1);
    expect(host.commandsMatching('python3', 'venv')).toHaveLength(1);
  });

  test('an existing marker means no command runs at all', () => {
    const host = new FakeHost().addFile(ENV_PYTHON).addFile(MARKER).addFile(MANIFEST);
    const { outcome } = install(host);

    expect(outcome).toEqual({ ok: true, skipped: true });
    expect(host.commands).toEqual([]);
  });

  test('reinstall drops the marker and installs again', () => {
    const host = new FakeHost().addFile(ENV_PYTHON).addFile(MARKER, 'old').addFile(MANIFEST);
    const { outcome } = install(host, true);

    expect(outcome).toEqual({ ok: true, skipped: false });
    expect(host.commandsMatching(ENV_PYTHON, 'pip', 'install')).toHaveLength(1);
    expect(host.readFile(MARKER)).not.toBe('old');
  });
});

describe('installDependencies - environment creation errors', () => {
  test('missing interpreter names the runtime check and suggests installing Python', () => {
    const host = new FakeHost().when('python3', ['--version'], {
      ok: false,
      status: null,
      error: 'spawn python3 ENOENT',
    });
    const { outcome } = install(host);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(EnvironmentCreationError);
      expect(outcome.error.step).toBe('runtime check');
      expect(outcome.error.message).toBe('Python interpreter "python3" not found (spawn python3 ENOENT)');
      expect(outcome.error.hint).toContain('Install Python 3.8+');
    }
  });

  test('an interpreter older than 3.8 is rejected', () => {
    const { outcome } = install(hostWithPython('linux', '3.6.9'));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Python 3.6.9 is too old');
    }
  });

  test('failed venv creation is an EnvironmentCreationError', () => {
    const host = new FakeHost()
      .when('python3', ['--version'], { stdout: 'Python 3.11.4\n' })
      .when('python3', ['venv'], failed('No module named venv'));
    const { outcome, state } = install(host);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(EnvironmentCreationError);
      expect(outcome.error.step).toBe('environment creation');
      expect(outcome.error.message).toBe('Failed to create environment at /project/.venv: No module named venv');
    }
    expect(state.runtimePresent).toBe(false);
  });

  test('an environment directory without an interpreter is not reused', () => {
    const host = new FakeHost().addDir('/project/.venv').addFile(MANIFEST);
    const { outcome } = install(host);

    expect(outcome.ok).toBe(false);
    expect(host.commands).toEqual([]);
  });
});

describe('installDependencies - dependency install errors', () => {
  test('missing manifest is a DependencyInstallError', () => {
    const { outcome } = install(hostWithPython());

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(DependencyInstallError);
      expect(outcome.error.message).toBe(`Dependency manifest not found: ${MANIFEST}`);
    }
  });

  test('failed pip install leaves no marker behind', () => {
    const host = hostWithPython()
      .addFile(MANIFEST)
      .when(ENV_PYTHON, ['pip'], failed('ERROR: ResolutionImpossible'));
    const { outcome, state } = install(host);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(DependencyInstallError);
      expect(outcome.error.step).toBe('dependency install');
    }
    expect(host.exists(MARKER)).toBe(false);
    expect(state.runtimePresent).toBe(true);
    expect(state.dependenciesInstalled).toBe(false);
  });
});
