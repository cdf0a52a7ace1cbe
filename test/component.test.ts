/**
 * Tests for the optional component builder
 *
 * Only a missing component under `required: true` is fatal; every other
 * failure degrades and carries on.
 */
import { FakeHost, failed } from './helpers/fake-host';
import { buildComponent, findComponentDescriptor } from '../src/bootstrap/component';
import { MissingComponentError } from '../src/bootstrap/errors';
import { DEFAULT_CONFIG } from '../src/utils/config-loader';
import { createEnvironmentState } from '../src/types/bootstrap';
import type { LauncherConfig } from '../src/types/config';

const ROOT = '/project';
const PYTHON = '/project/.venv/bin/python';
const SETUP = '/project/pyVNC/setup.py';

// Submodule sync is off here so command lists show only the component steps
function config(overrides: Partial<LauncherConfig['component']> = {}): LauncherConfig {
  const base = structuredClone(DEFAULT_CONFIG);
  base.component = { ...base.component, sync_submodules: false, ...overrides };
  return base;
}

function build(host: FakeHost, cfg: LauncherConfig = config()) {
  const state = createEnvironmentState();
  const outcome = buildComponent({ host, rootDir: ROOT, config: cfg, state, python: PYTHON, silent: true });
  return { state, outcome };
}

describe('findComponentDescriptor', () => {
  test('returns the first descriptor present', () => {
    const host = new FakeHost().addFile('/project/pyVNC/pyproject.toml').addFile(SETUP);
    expect(findComponentDescriptor(host, ROOT, config())).toBe(SETUP);
  });

  test('a directory without a descriptor does not count', () => {
    const host = new FakeHost().addFile('/project/pyVNC/README.md');
    expect(findComponentDescriptor(host, ROOT, config())).toBeNull();
  });
});

describe('buildComponent - component absent', () => {
  test('skips quietly when the component is optional', () => {
    const host = new FakeHost();
    const { state, outcome } = build(host);

    expect(outcome).toEqual({ ok: true, present: false, warnings: [] });
    expect(state.optionalComponentInstalled).toBe(false);
    expect(state.optionalComponentDegraded).toBe(false);
    expect(host.commands).toEqual([]);
  });

  test('is fatal when the component is required', () => {
    const { outcome } = build(new FakeHost(), config({ required: true }));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(MissingComponentError);
      expect(outcome.error.step).toBe('component install');
    }
  });
});

describe('buildComponent - component present', () => {
  test('upgrades the numeric dependency, installs and smoke-loads', () => {
    const host = new FakeHost().addFile(SETUP);
    const { state, outcome } = build(host);

    expect(outcome).toEqual({ ok: true, present: true, warnings: [] });
    expect(state.optionalComponentInstalled).toBe(true);
    expect(state.optionalComponentDegraded).toBe(false);
    expect(host.commands.map((c) => c.args)).toEqual([
      ['-m', 'pip', 'install', '--upgrade', 'numpy'],
      ['-m', 'pip', 'install', '-e', '/project/pyVNC'],
      ['-c', 'from pyVNC.Client import Client'],
    ]);
  });

  test('a failed numeric upgrade is only a warning', () => {
    const host = new FakeHost().addFile(SETUP).when(PYTHON, ['--upgrade'], failed());
    const { state, outcome } = build(host);

    expect(outcome.ok).toBe(true);
    expect(outcome.warnings).toEqual([
      { kind: 'OptionalComponentWarning', message: 'Failed to upgrade numpy' },
    ]);
    expect(state.optionalComponentInstalled).toBe(true);
    expect(state.optionalComponentDegraded).toBe(false);
  });

  test('no numeric dependency configured means no upgrade', () => {
    const host = new FakeHost().addFile(SETUP);
    build(host, config({ numeric_dependency: null }));

    expect(host.commandsMatching(PYTHON, '--upgrade')).toEqual([]);
  });

  test('a failed install degrades and continues', () => {
    const host = new FakeHost().addFile(SETUP).when(PYTHON, ['-e'], failed('error: metadata-generation-failed'));
    const { state, outcome } = build(host);

    expect(outcome.ok).toBe(true);
    expect(outcome.warnings.map((w) => w.kind)).toEqual(['OptionalComponentWarning']);
    expect(outcome.warnings[0]?.message).toBe('Failed to install pyVNC: error: metadata-generation-failed');
    expect(state.optionalComponentInstalled).toBe(false);
    expect(state.optionalComponentDegraded).toBe(true);
    // the smoke load is not attempted after a failed install
    expect(host.commandsMatching(PYTHON, '-c')).toEqual([]);
  });

  test('a failed smoke load degrades with a diagnostics hint', () => {
    const host = new FakeHost().addFile(SETUP).when(PYTHON, ['-c'], failed('ImportError'));
    const { state, outcome } = build(host);

    expect(outcome.ok).toBe(true);
    expect(outcome.warnings).toEqual([
      {
        kind: 'OptionalComponentSmokeTestWarning',
        message: 'pyVNC import test failed (ImportError) - VNC functionality may be limited',
        hint: 'Run: vnc-qr-launcher doctor for detailed diagnostics',
      },
    ]);
    expect(state.optionalComponentInstalled).toBe(true);
    expect(state.optionalComponentDegraded).toBe(true);
  });
});

describe('buildComponent - submodules', () => {
  test('syncs submodules first by default', () => {
    const host = new FakeHost().addFile(SETUP);
    build(host, structuredClone(DEFAULT_CONFIG));

    expect(host.commands[0]).toEqual({
      command: 'git',
      args: ['submodule', 'update', '--init', '--recursive'],
      options: { cwd: ROOT },
    });
  });

  test('can be turned off', () => {
    const host = new FakeHost().addFile(SETUP);
    build(host, config({ sync_submodules: false }));

    expect(host.commandsMatching('git')).toEqual([]);
  });

  test('a failed sync is a warning, not an abort', () => {
    const host = new FakeHost().when('git', ['submodule'], failed('fatal: not a git repository'));
    const { outcome } = build(host, config({ sync_submodules: true }));

    expect(outcome).toEqual({
      ok: true,
      present: false,
      warnings: [
        {
          kind: 'OptionalComponentWarning',
          message: 'Failed to update git submodules: fatal: not a git repository',
          hint: 'Run: git submodule update --init --recursive',
        },
      ],
    });
  });
});
