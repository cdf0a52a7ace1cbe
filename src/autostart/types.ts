/**
 * Autostart Types
 */

import type { HostSystem } from '../utils/host.js';

/**
 * Command the login session runs to start the launcher
 */
export interface LaunchCommand {
  executable: string;
  args: string[];
  workingDirectory: string;
}

export interface AutostartContext {
  host: HostSystem;
  command: LaunchCommand;
}

/**
 * Login-time start for one platform
 */
export interface AutostartManager {
  readonly supported: boolean;
  /** Where the entry lives, for status output */
  readonly location: string;
  isEnabled(): boolean;
  enable(): boolean;
  disable(): boolean;
}
