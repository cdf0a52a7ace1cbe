/**
 * CLI Types
 *
 * Types for CLI command options.
 */

import type { HostSystem } from '../utils/host.js';

/**
 * Base options shared by most commands
 */
export interface BaseOptions {
  rootDir?: string;
  /** Injected host; the real machine when omitted */
  host?: HostSystem;
}

/**
 * Options for the launch command
 */
export interface LaunchOptions extends BaseOptions {
  reinstall?: boolean;
  /** false stops after the launch decision */
  handoff?: boolean;
  silent?: boolean;
}

/**
 * Options for the probe command
 */
export type ProbeCommandOptions = BaseOptions;

/**
 * Options for the doctor command
 */
export type DoctorCommandOptions = BaseOptions;

export type AutostartAction = 'enable' | 'disable' | 'status';

/**
 * Options for the autostart command
 */
export interface AutostartOptions extends BaseOptions {
  /** Launcher script registered to run at login (defaults to the running script) */
  script?: string;
}
