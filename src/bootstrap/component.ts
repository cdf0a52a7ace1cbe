/**
 * Optional Component Builder
 *
 * Installs the bundled VNC client component from local source when it is
 * present. Every failure past the presence check degrades the component
 * instead of aborting: the application still starts in QR-only mode.
 */

import * as path from 'path';

import { describeFailure } from '../utils/host.js';
import { MissingComponentError } from './errors.js';
import type { HostSystem } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';
import type { BootstrapWarning, EnvironmentState } from '../types/bootstrap.js';

export interface ComponentOptions {
  host: HostSystem;
  rootDir: string;
  config: LauncherConfig;
  state: EnvironmentState;
  /** Interpreter inside the prepared environment */
  python: string;
  silent?: boolean;
}

export type ComponentOutcome =
  | { ok: true; present: boolean; warnings: BootstrapWarning[] }
  | { ok: false; error: MissingComponentError; warnings: BootstrapWarning[] };

/**
 * Locate the component's build descriptor, null when the source is absent
 */
export function findComponentDescriptor(
  host: HostSystem,
  rootDir: string,
  config: LauncherConfig
): string | null {
  const dir = path.resolve(rootDir, config.component.path);
  if (!host.exists(dir)) return null;

  for (const descriptor of config.component.descriptors) {
    const descriptorPath = path.join(dir, descriptor);
    if (host.exists(descriptorPath)) return descriptorPath;
  }
  return null;
}

/**
 * Build and smoke-load the optional component
 */
export function buildComponent(options: ComponentOptions): ComponentOutcome {
  const { host, rootDir, config, state, python } = options;
  const component = config.component;
  const warnings: BootstrapWarning[] = [];
  const log = (msg: string): void => {
    if (!options.silent) console.log(msg);
  };
  const warn = (warning: BootstrapWarning): void => {
    warnings.push(warning);
    if (!options.silent) {
      console.log(`⚠️  Warning: ${warning.message}`);
      if (warning.hint) console.log(`   💡 ${warning.hint}`);
    }
  };

  if (component.sync_submodules) {
    log('Updating git submodules...');
    const synced = host.run('git', ['submodule', 'update', '--init', '--recursive'], { cwd: rootDir });
    if (!synced.ok) {
      warn({
        kind: 'OptionalComponentWarning',
        message: `Failed to update git submodules: ${describeFailure(synced)}`,
        hint: 'Run: git submodule update --init --recursive',
      });
    }
  }

  const componentDir = path.resolve(rootDir, component.path);
  const descriptor = findComponentDescriptor(host, rootDir, config);

  if (!descriptor) {
    state.optionalComponentInstalled = false;
    if (component.required) {
      return {
        ok: false,
        warnings,
        error: new MissingComponentError(
          `No build descriptor (${component.descriptors.join(', ')}) found in ${componentDir}`,
          'Run: git submodule update --init --recursive, or set component.required: false in launcher.yml'
        ),
      };
    }
    log(`   No ${component.path} component source found, skipping`);
    return { ok: true, present: false, warnings };
  }

  log(`📦 Installing ${component.path} from ${componentDir}...`);

  if (component.numeric_dependency) {
    const upgraded = host.run(python, ['-m', 'pip', 'install', '--upgrade', component.numeric_dependency], {
      cwd: rootDir,
      inherit: !options.silent,
    });
    if (!upgraded.ok) {
      warn({
        kind: 'OptionalComponentWarning',
        message: `Failed to upgrade ${component.numeric_dependency}`,
      });
    }
  }

  const installed = host.run(python, ['-m', 'pip', 'install', '-e', componentDir], {
    cwd: rootDir,
    inherit: !options.silent,
  });
  if (!installed.ok) {
    state.optionalComponentInstalled = false;
    state.optionalComponentDegraded = true;
    warn({
      kind: 'OptionalComponentWarning',
      message: `Failed to install ${component.path}: ${describeFailure(installed)}`,
      hint: 'The application will start with QR code functionality only',
    });
    return { ok: true, present: true, warnings };
  }
  state.optionalComponentInstalled = true;

  log(`Testing ${component.path} import...`);
  const smoke = host.run(python, ['-c', component.smoke_import], { cwd: rootDir });
  if (!smoke.ok) {
    state.optionalComponentDegraded = true;
    warn({
      kind: 'OptionalComponentSmokeTestWarning',
      message: `${component.path} import test failed (${describeFailure(smoke)}) - VNC functionality may be limited`,
      hint: 'Run: vnc-qr-launcher doctor for detailed diagnostics',
    });
    return { ok: true, present: true, warnings };
  }

  log(`✅ ${component.path} imports working correctly`);
  return { ok: true, present: true, warnings };
}
