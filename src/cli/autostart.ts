/**
 * Autostart Command
 *
 * Usage:
 *   vnc-qr-launcher autostart enable
 *   vnc-qr-launcher autostart disable
 *   vnc-qr-launcher autostart status
 */

import { resolveRootDir } from '../constants/config-files.js';
import { createAutostart } from '../autostart/index.js';
import { createNodeHost } from '../utils/host.js';
import type { AutostartAction, AutostartOptions } from '../types/cli.js';

export async function autostart(action: AutostartAction, options: AutostartOptions = {}): Promise<number> {
  const host = options.host ?? createNodeHost();
  const rootDir = resolveRootDir(options.rootDir, host.cwd());
  const script = options.script ?? process.argv[1];

  if (!script) {
    console.error('❌ Could not determine the launcher script to register');
    return 1;
  }

  const manager = createAutostart({
    host,
    command: {
      executable: process.execPath,
      args: [script, 'launch', '--root', rootDir],
      workingDirectory: rootDir,
    },
  });

  switch (action) {
    case 'status': {
      const enabled = manager.isEnabled();
      console.log(`Auto-startup: ${enabled ? 'ENABLED' : 'DISABLED'}`);
      if (manager.supported) console.log(`   ${manager.location}`);
      return 0;
    }
    case 'enable':
      if (manager.enable()) {
        console.log('✅ Auto-startup enabled');
        return 0;
      }
      console.error('❌ Failed to enable auto-startup');
      return 1;
    case 'disable':
      if (manager.disable()) {
        console.log('✅ Auto-startup disabled');
        return 0;
      }
      console.error('❌ Failed to disable auto-startup');
      return 1;
  }
}

export default autostart;
