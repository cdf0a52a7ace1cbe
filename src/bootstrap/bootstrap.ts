/**
 * Bootstrap
 *
 * install → optional component → probe → gate, each stage finishing before
 * the next starts. A fatal error skips straight to the gate.
 */

import { installDependencies, resolveEnvironmentPaths } from './installer.js';
import { buildComponent } from './component.js';
import { decideLaunch } from './gate.js';
import { detectPlatform } from '../probe/platform.js';
import { probeCapabilities } from '../probe/prober.js';
import { printCapabilityReport } from '../probe/report.js';
import { createEnvironmentState } from '../types/bootstrap.js';
import type { HostSystem } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';
import type { CapabilityReport, Platform } from '../probe/types.js';
import type { BootstrapWarning, EnvironmentState, LaunchDecision } from '../types/bootstrap.js';

export interface BootstrapOptions {
  host: HostSystem;
  rootDir: string;
  config: LauncherConfig;
  /** Defaults to the host's platform */
  platform?: Platform;
  reinstall?: boolean;
  silent?: boolean;
}

export interface BootstrapResult {
  state: EnvironmentState;
  /** Null when a fatal error stopped the run before probing */
  report: CapabilityReport | null;
  warnings: BootstrapWarning[];
  decision: LaunchDecision;
  /** Interpreter inside the environment */
  python: string;
}

export function runBootstrap(options: BootstrapOptions): BootstrapResult {
  const { host, rootDir, config } = options;
  const state = createEnvironmentState();
  const { python } = resolveEnvironmentPaths(rootDir, config, host.platform);

  const install = installDependencies({
    host,
    rootDir,
    config,
    state,
    reinstall: options.reinstall,
    silent: options.silent,
  });
  if (!install.ok) {
    return {
      state,
      report: null,
      warnings: [],
      decision: decideLaunch({ kind: 'failed', error: install.error }),
      python,
    };
  }

  const component = buildComponent({ host, rootDir, config, state, python, silent: options.silent });
  if (!component.ok) {
    return {
      state,
      report: null,
      warnings: component.warnings,
      decision: decideLaunch({ kind: 'failed', error: component.error }),
      python,
    };
  }

  const report = probeCapabilities({
    host,
    platform: options.platform ?? detectPlatform(host.platform),
    searchRoot: rootDir,
    viewers: config.viewers,
  });
  if (!options.silent) printCapabilityReport(report);

  return {
    state,
    report,
    warnings: component.warnings,
    decision: decideLaunch({ kind: 'ready', state, report }),
    python,
  };
}
