/**
 * Viewer Probes Index
 *
 * One prober per platform.
 */

import type { ViewerSettings } from '../../types/config.js';
import type { Platform, ViewerProber } from '../types.js';
import { LinuxViewerProber } from './linux.js';
import { MacViewerProber } from './mac.js';
import { WindowsViewerProber } from './windows.js';

export { LinuxViewerProber } from './linux.js';
export { MacViewerProber, BUILT_IN_VIEWER } from './mac.js';
export { WindowsViewerProber } from './windows.js';

/**
 * Get the prober for a platform
 */
export function createProber(platform: Platform, settings?: ViewerSettings): ViewerProber {
  switch (platform) {
    case 'windows':
      return new WindowsViewerProber(settings?.extra_windows_paths);
    case 'mac':
      return new MacViewerProber();
    case 'linux':
      return new LinuxViewerProber(settings?.extra_linux_programs);
  }
}
