/**
 * Launch Command
 *
 * Prepares the environment, probes for VNC viewers, decides the mode and
 * hands off to the main application.
 *
 * Usage:
 *   vnc-qr-launcher                 # Bootstrap and start the application
 *   vnc-qr-launcher --reinstall     # Install the manifest again
 *   vnc-qr-launcher --no-handoff    # Stop after the launch decision
 */

import { resolveRootDir } from '../constants/config-files.js';
import { runBootstrap } from '../bootstrap/bootstrap.js';
import { ConfigError, printFatal } from '../bootstrap/errors.js';
import { modeFor } from '../bootstrap/gate.js';
import { handOff } from '../bootstrap/handoff.js';
import { loadConfig } from '../utils/config-loader.js';
import { createNodeHost } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';
import type { LaunchOptions } from '../types/cli.js';

/**
 * Main launch function; resolves to the process exit code
 */
export async function launch(options: LaunchOptions = {}): Promise<number> {
  const host = options.host ?? createNodeHost();
  const rootDir = resolveRootDir(options.rootDir, host.cwd());

  if (!options.silent) {
    console.log('Starting VNC QR Launcher...');
    console.log('');
  }

  let config: LauncherConfig;
  try {
    config = loadConfig(host, rootDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      printFatal(e);
      return 1;
    }
    throw e;
  }

  const { decision, python } = runBootstrap({
    host,
    rootDir,
    config,
    reinstall: options.reinstall,
    silent: options.silent,
  });

  if (decision.outcome === 'abort') {
    printFatal(decision.error);
    return 1;
  }

  if (!options.silent) {
    if (decision.outcome === 'start-degraded') {
      console.log(`⚠️  Starting in QR-only mode: ${decision.reason}`);
    } else {
      console.log('✅ Full VNC functionality enabled');
    }
  }

  if (options.handoff === false) {
    return 0;
  }

  return handOff({ host, rootDir, config, python, mode: modeFor(decision) ?? 'qr-only' });
}

export default launch;
