/**
 * macOS Viewer Probe
 *
 * Screen Sharing ships with the OS and opens vnc:// URLs, so nothing is probed.
 */

import type { ProbeContext, ViewerCandidate, ViewerProber } from '../types.js';

export const BUILT_IN_VIEWER: ViewerCandidate = {
  name: 'Screen Sharing (built-in)',
  kind: 'built-in',
};

export class MacViewerProber implements ViewerProber {
  readonly platform = 'mac' as const;
  readonly installHints: readonly string[] = [];

  probe(_context: ProbeContext): ViewerCandidate[] {
    return [BUILT_IN_VIEWER];
  }
}
