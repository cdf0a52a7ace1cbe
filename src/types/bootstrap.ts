/**
 * Bootstrap Types
 *
 * State shared by the installer, the component builder and the launch gate.
 */

import type { LauncherError } from '../bootstrap/errors.js';

/**
 * Environment readiness for one run
 *
 * Mutated only by the installer and the component builder.
 */
export interface EnvironmentState {
  runtimePresent: boolean;
  dependenciesInstalled: boolean;
  optionalComponentInstalled: boolean;
  /** Component source was present but its install or smoke load failed */
  optionalComponentDegraded: boolean;
}

export type WarningKind = 'OptionalComponentWarning' | 'OptionalComponentSmokeTestWarning';

/**
 * Non-fatal problem recorded during bootstrap
 */
export interface BootstrapWarning {
  kind: WarningKind;
  message: string;
  hint?: string;
}

/**
 * Outcome of the installer stage
 */
export type InstallOutcome =
  | { ok: true; skipped: boolean }
  | { ok: false; error: LauncherError };

/**
 * What the launch gate decided
 */
export type LaunchDecision =
  | { outcome: 'abort'; error: LauncherError }
  | { outcome: 'start-degraded'; reason: string }
  | { outcome: 'start-full' };

/**
 * Mode advertised to the main application
 */
export type AppMode = 'full' | 'qr-only';

export function createEnvironmentState(): EnvironmentState {
  return {
    runtimePresent: false,
    dependenciesInstalled: false,
    optionalComponentInstalled: false,
    optionalComponentDegraded: false,
  };
}
