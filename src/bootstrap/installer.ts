/**
 * Dependency Installer
 *
 * Guarantees the isolated environment exists and the manifest packages are
 * installed in it. Reuses an existing environment and skips the install when
 * the lifecycle marker is present.
 */

import * as path from 'path';
import yaml from 'js-yaml';

import { DEPS_MARKER_FILENAME } from '../constants/config-files.js';
import { describeFailure } from '../utils/host.js';
import { isCompatible, MIN_PYTHON_VERSION, parsePythonVersion } from '../utils/version-check.js';
import { DependencyInstallError, EnvironmentCreationError } from './errors.js';
import type { HostSystem } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';
import type { EnvironmentState, InstallOutcome } from '../types/bootstrap.js';

const PYTHON_HINT = 'Install Python 3.8+ from https://www.python.org/downloads/ or set "python" in launcher.yml';

/**
 * Resolved locations of the environment for one project
 */
export interface EnvironmentPaths {
  root: string;
  python: string;
  marker: string;
  manifest: string;
}

export interface InstallerOptions {
  host: HostSystem;
  rootDir: string;
  config: LauncherConfig;
  state: EnvironmentState;
  /** Drop the marker first so the manifest is installed again */
  reinstall?: boolean;
  silent?: boolean;
}

/**
 * Work out where the environment, its interpreter, marker and manifest live
 */
export function resolveEnvironmentPaths(
  rootDir: string,
  config: LauncherConfig,
  platform: NodeJS.Platform
): EnvironmentPaths {
  const root = path.resolve(rootDir, config.environment.path);
  const python = platform === 'win32'
    ? path.join(root, 'Scripts', 'python.exe')
    : path.join(root, 'bin', 'python');

  return {
    root,
    python,
    marker: path.join(root, DEPS_MARKER_FILENAME),
    manifest: path.resolve(rootDir, config.environment.manifest),
  };
}

/**
 * Check the interpreter used to create the environment is present and recent enough
 */
function checkRuntime(host: HostSystem, python: string): string {
  const result = host.run(python, ['--version']);
  if (!result.ok) {
    throw new EnvironmentCreationError(
      `Python interpreter "${python}" not found (${describeFailure(result)})`,
      PYTHON_HINT,
      'runtime check'
    );
  }

  const version = parsePythonVersion(result.stdout + '\n' + result.stderr);
  if (!version) {
    throw new EnvironmentCreationError(
      `Could not read the version of "${python}"`,
      PYTHON_HINT,
      'runtime check'
    );
  }
  if (!isCompatible(version, MIN_PYTHON_VERSION)) {
    throw new EnvironmentCreationError(
      `Python ${version} is too old`,
      PYTHON_HINT,
      'runtime check'
    );
  }
  return version;
}

function ensureEnvironment(options: InstallerOptions, paths: EnvironmentPaths): void {
  const { host, config, state } = options;
  const log = (msg: string): void => {
    if (!options.silent) console.log(msg);
  };

  if (host.exists(paths.root)) {
    if (!host.exists(paths.python)) {
      throw new EnvironmentCreationError(
        `Environment at ${paths.root} has no interpreter (${paths.python})`,
        `Delete ${paths.root} and run the launcher again to recreate it`
      );
    }
    log(`✅ Using environment at ${paths.root}`);
    state.runtimePresent = true;
    return;
  }

  const version = checkRuntime(host, config.python);
  log(`🔧 Creating environment at ${paths.root} (Python ${version})...`);

  const created = host.run(config.python, ['-m', 'venv', paths.root], { cwd: options.rootDir });
  if (!created.ok || !host.exists(paths.python)) {
    throw new EnvironmentCreationError(
      `Failed to create environment at ${paths.root}: ${describeFailure(created)}`,
      `Make sure the venv module is available (Debian/Ubuntu: sudo apt-get install -y python3-venv)`
    );
  }

  log('   Environment created');
  state.runtimePresent = true;
}

function installManifest(options: InstallerOptions, paths: EnvironmentPaths): void {
  const { host, state } = options;
  const log = (msg: string): void => {
    if (!options.silent) console.log(msg);
  };

  if (!host.exists(paths.manifest)) {
    throw new DependencyInstallError(
      `Dependency manifest not found: ${paths.manifest}`,
      'Add the manifest or set environment.manifest in launcher.yml'
    );
  }

  log('📦 Installing dependencies...');
  const result = host.run(paths.python, ['-m', 'pip', 'install', '-r', paths.manifest], {
    cwd: options.rootDir,
    inherit: !options.silent,
  });

  if (!result.ok) {
    throw new DependencyInstallError(
      `Failed to install dependencies from ${paths.manifest}: ${describeFailure(result)}`,
      `Run: ${paths.python} -m pip install -r ${paths.manifest} and fix the reported errors`
    );
  }

  // Only a fully successful install leaves the marker behind
  host.writeFile(
    paths.marker,
    yaml.dump({ manifest: paths.manifest, installed_at: new Date().toISOString() })
  );
  state.dependenciesInstalled = true;
  log('✅ Dependencies installed');
}

/**
 * Ensure the environment exists and its dependencies are installed
 */
export function installDependencies(options: InstallerOptions): InstallOutcome {
  const paths = resolveEnvironmentPaths(options.rootDir, options.config, options.host.platform);

  try {
    ensureEnvironment(options, paths);

    if (options.reinstall && options.host.exists(paths.marker)) {
      options.host.removeFile(paths.marker);
    }

    if (options.host.exists(paths.marker)) {
      if (!options.silent) console.log('✅ Dependencies already installed (marker present)');
      options.state.dependenciesInstalled = true;
      return { ok: true, skipped: true };
    }

    installManifest(options, paths);
    return { ok: true, skipped: false };
  } catch (e) {
    if (e instanceof EnvironmentCreationError || e instanceof DependencyInstallError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
