/**
 * Doctor Command
 *
 * Diagnoses why the VNC client component does or does not load.
 * Exits 0 only when the component imports cleanly.
 */

import { resolveRootDir } from '../constants/config-files.js';
import { diagnoseComponent, formatDoctorReport } from '../bootstrap/doctor.js';
import { ConfigError, printFatal } from '../bootstrap/errors.js';
import { resolveEnvironmentPaths } from '../bootstrap/installer.js';
import { loadConfig } from '../utils/config-loader.js';
import { createNodeHost } from '../utils/host.js';
import type { DoctorCommandOptions } from '../types/cli.js';

export async function doctor(options: DoctorCommandOptions = {}): Promise<number> {
  const host = options.host ?? createNodeHost();
  const rootDir = resolveRootDir(options.rootDir, host.cwd());

  try {
    const config = loadConfig(host, rootDir);
    const { python } = resolveEnvironmentPaths(rootDir, config, host.platform);
    const report = diagnoseComponent({ host, rootDir, config, python });

    for (const line of formatDoctorReport(report)) {
      console.log(line);
    }
    return report.verdict === 'healthy' ? 0 : 1;
  } catch (e) {
    if (e instanceof ConfigError) {
      printFatal(e);
      return 1;
    }
    throw e;
  }
}

export default doctor;
