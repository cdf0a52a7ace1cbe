/**
 * File names used across the launcher.
 * Single source of truth for launcher.yml and the lifecycle marker.
 */

import * as path from 'path';

/** User-editable launcher config */
export const LAUNCHER_CONFIG_FILENAME = 'launcher.yml';

/** Sentinel inside the environment root; its presence means dependencies are installed */
export const DEPS_MARKER_FILENAME = '.launcher-deps-installed';

/** Overrides the project root when --root is not given */
export const ROOT_ENV_VAR = 'VNC_QR_LAUNCHER_ROOT';

/** Tells the main application which mode it was started in */
export const MODE_ENV_VAR = 'VNC_QR_MODE';

/**
 * Resolve path to launcher.yml
 */
export function getLauncherConfigPath(rootDir: string): string {
  return path.join(rootDir, LAUNCHER_CONFIG_FILENAME);
}

/**
 * Resolve the project root from an explicit option, the environment, or cwd
 */
export function resolveRootDir(explicit: string | undefined, cwd: string): string {
  const fromEnv = process.env[ROOT_ENV_VAR];
  return path.resolve(cwd, explicit ?? fromEnv ?? '.');
}
