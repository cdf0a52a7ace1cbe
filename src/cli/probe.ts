/**
 * Probe Command
 *
 * Prints the VNC viewer capability report without touching the environment.
 */

import { resolveRootDir } from '../constants/config-files.js';
import { ConfigError, printFatal } from '../bootstrap/errors.js';
import { detectPlatform } from '../probe/platform.js';
import { probeCapabilities } from '../probe/prober.js';
import { printCapabilityReport } from '../probe/report.js';
import { loadConfig } from '../utils/config-loader.js';
import { createNodeHost } from '../utils/host.js';
import type { ProbeCommandOptions } from '../types/cli.js';

export async function probe(options: ProbeCommandOptions = {}): Promise<number> {
  const host = options.host ?? createNodeHost();
  const rootDir = resolveRootDir(options.rootDir, host.cwd());

  try {
    const config = loadConfig(host, rootDir);
    console.log('🔍 Checking for VNC viewers...');
    const report = probeCapabilities({
      host,
      platform: detectPlatform(host.platform),
      searchRoot: rootDir,
      viewers: config.viewers,
    });
    printCapabilityReport(report);
    return 0;
  } catch (e) {
    if (e instanceof ConfigError) {
      printFatal(e);
      return 1;
    }
    throw e;
  }
}

export default probe;
