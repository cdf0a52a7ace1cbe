/**
 * Launch Gate
 *
 * Pure decision between abort, QR-only and full mode.
 */

import type { LauncherError } from './errors.js';
import type { CapabilityReport } from '../probe/types.js';
import type { AppMode, EnvironmentState, LaunchDecision } from '../types/bootstrap.js';

/**
 * Inputs available once the earlier stages are final.
 * A fatal error means the prober never ran, so there is no report.
 */
export type GateInput =
  | { kind: 'failed'; error: LauncherError }
  | { kind: 'ready'; state: EnvironmentState; report: CapabilityReport };

export function decideLaunch(input: GateInput): LaunchDecision {
  if (input.kind === 'failed') {
    return { outcome: 'abort', error: input.error };
  }

  const { state, report } = input;

  if (!report.vncAvailable) {
    return { outcome: 'start-degraded', reason: 'No VNC viewer detected' };
  }

  if (state.optionalComponentDegraded) {
    return { outcome: 'start-degraded', reason: 'VNC client component failed to install or load' };
  }

  return { outcome: 'start-full' };
}

/**
 * Mode the main application is told to run in, null on abort
 */
export function modeFor(decision: LaunchDecision): AppMode | null {
  switch (decision.outcome) {
    case 'abort':
      return null;
    case 'start-degraded':
      return 'qr-only';
    case 'start-full':
      return 'full';
  }
}
