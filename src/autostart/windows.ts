/**
 * Windows Autostart
 *
 * A value under the current user's Run key, managed with reg.exe.
 */

import { describeFailure } from '../utils/host.js';
import type { AutostartContext, AutostartManager, LaunchCommand } from './types.js';

export const RUN_KEY = 'HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Run';
export const RUN_VALUE_NAME = 'VNCQRLauncher';

function quote(arg: string): string {
  return /[\s"]/.test(arg) ? '"' + arg.replace(/"/g, '\\"') + '"' : arg;
}

/**
 * Command line stored in the Run value
 */
export function renderRunCommand(command: LaunchCommand): string {
  return [command.executable, ...command.args].map(quote).join(' ');
}

export class WindowsAutostart implements AutostartManager {
  readonly supported = true;
  readonly location = RUN_KEY + '\\' + RUN_VALUE_NAME;

  constructor(private readonly context: AutostartContext) {}

  isEnabled(): boolean {
    return this.context.host.run('reg', ['query', RUN_KEY, '/v', RUN_VALUE_NAME]).ok;
  }

  enable(): boolean {
    const result = this.context.host.run('reg', [
      'add', RUN_KEY,
      '/v', RUN_VALUE_NAME,
      '/t', 'REG_SZ',
      '/d', renderRunCommand(this.context.command),
      '/f',
    ]);
    if (!result.ok) {
      console.log('   Failed to write registry value: ' + describeFailure(result));
      return false;
    }
    return true;
  }

  disable(): boolean {
    if (!this.isEnabled()) return true;

    const result = this.context.host.run('reg', ['delete', RUN_KEY, '/v', RUN_VALUE_NAME, '/f']);
    if (!result.ok) {
      console.log('   Failed to remove registry value: ' + describeFailure(result));
      return false;
    }
    return true;
  }
}
