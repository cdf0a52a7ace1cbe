/**
 * Autostart
 *
 * Starts the launcher when the user logs in. macOS and Windows only.
 */

import { detectPlatform } from '../probe/platform.js';
import { MacAutostart } from './mac.js';
import { WindowsAutostart } from './windows.js';
import type { Platform } from '../probe/types.js';
import type { AutostartContext, AutostartManager } from './types.js';

export * from './types.js';
export { MacAutostart, renderPlist, LAUNCH_AGENT_LABEL } from './mac.js';
export { WindowsAutostart, renderRunCommand, RUN_KEY, RUN_VALUE_NAME } from './windows.js';

class UnsupportedAutostart implements AutostartManager {
  readonly supported = false;
  readonly location = '';

  constructor(private readonly platform: Platform) {}

  isEnabled(): boolean {
    return false;
  }

  enable(): boolean {
    console.log(`Auto-startup not supported on ${this.platform}`);
    return false;
  }

  disable(): boolean {
    return false;
  }
}

export function createAutostart(context: AutostartContext, platform?: Platform): AutostartManager {
  const resolved = platform ?? detectPlatform(context.host.platform);
  switch (resolved) {
    case 'mac':
      return new MacAutostart(context);
    case 'windows':
      return new WindowsAutostart(context);
    case 'linux':
      return new UnsupportedAutostart(resolved);
  }
}
