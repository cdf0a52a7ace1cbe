/**
 * Handoff
 *
 * Starts the main application inside the prepared environment and waits for it.
 */

import * as path from 'path';

import { MODE_ENV_VAR } from '../constants/config-files.js';
import type { HostSystem } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';
import type { AppMode } from '../types/bootstrap.js';

export interface HandoffOptions {
  host: HostSystem;
  rootDir: string;
  config: LauncherConfig;
  python: string;
  mode: AppMode;
}

/**
 * Run the main application and return the exit code the launcher should use
 */
export function handOff(options: HandoffOptions): number {
  const { host, rootDir, config, python, mode } = options;
  const entry = path.resolve(rootDir, config.app.entry);

  if (!host.exists(entry)) {
    console.error(`❌ Application entry point not found: ${entry}`);
    console.error('   💡 Set app.entry in launcher.yml');
    return 1;
  }

  console.log('');
  console.log(`🚀 Starting application (${mode === 'full' ? 'QR + VNC control' : 'QR-only'} mode)...`);
  console.log('Press Ctrl+C to stop the server');
  console.log('');

  const result = host.run(python, [entry], {
    cwd: rootDir,
    env: { [MODE_ENV_VAR]: mode },
    inherit: true,
  });

  if (result.error) {
    console.error(`❌ Failed to start application: ${result.error}`);
    return 1;
  }
  return result.status ?? 1;
}
