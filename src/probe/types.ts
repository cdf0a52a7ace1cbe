/**
 * Probe Types
 *
 * Types for VNC viewer capability detection.
 */

import type { HostSystem } from '../utils/host.js';

/**
 * Supported platforms for viewer probing
 */
export type Platform = 'mac' | 'linux' | 'windows';

/**
 * How a viewer candidate was found
 */
export type CandidateKind = 'known-path' | 'path-lookup' | 'glob-pattern' | 'built-in';

/**
 * A detected VNC viewer
 */
export interface ViewerCandidate {
  readonly name: string;
  readonly kind: CandidateKind;
  readonly resolvedPath?: string;
}

/**
 * Result of probing the host for VNC viewers
 *
 * vncAvailable === candidatesFound.length > 0 on every platform;
 * on mac the built-in Screen Sharing candidate is always present.
 */
export interface CapabilityReport {
  readonly platform: Platform;
  readonly candidatesFound: readonly ViewerCandidate[];
  readonly vncAvailable: boolean;
}

/**
 * A viewer product with well-known install locations
 */
export interface KnownViewer {
  name: string;
  paths: string[];
}

/**
 * Context handed to a prober
 */
export interface ProbeContext {
  host: HostSystem;
  /** Directory the versioned-executable search starts from */
  searchRoot: string;
}

/**
 * Platform-specific viewer detection
 */
export interface ViewerProber {
  readonly platform: Platform;
  /** Install suggestions shown when nothing is found */
  readonly installHints: readonly string[];
  probe(context: ProbeContext): ViewerCandidate[];
}
