/**
 * Capability Prober
 *
 * Produces the capability report consumed by the launch gate. The report is
 * advisory: finding nothing only selects QR-only mode.
 */

import type { HostSystem } from '../utils/host.js';
import type { ViewerSettings } from '../types/config.js';
import type { CapabilityReport, Platform, ViewerProber } from './types.js';
import { createProber } from './viewers/index.js';

export interface ProbeOptions {
  host: HostSystem;
  platform: Platform;
  /** Where versioned executables are searched from (defaults to host cwd) */
  searchRoot?: string;
  viewers?: ViewerSettings;
  /** Supply a prober directly instead of picking one by platform */
  prober?: ViewerProber;
}

/**
 * Probe the host for VNC viewers
 */
export function probeCapabilities(options: ProbeOptions): CapabilityReport {
  const prober = options.prober ?? createProber(options.platform, options.viewers);
  const candidatesFound = prober.probe({
    host: options.host,
    searchRoot: options.searchRoot ?? options.host.cwd(),
  });

  return {
    platform: prober.platform,
    candidatesFound,
    vncAvailable: candidatesFound.length > 0,
  };
}

/**
 * Install suggestions for a platform
 */
export function installHintsFor(platform: Platform): readonly string[] {
  return createProber(platform).installHints;
}
