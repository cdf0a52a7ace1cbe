/**
 * macOS Autostart
 *
 * A user LaunchAgent that runs the launcher at login.
 */

import * as path from 'path';

import { describeFailure } from '../utils/host.js';
import type { AutostartContext, AutostartManager } from './types.js';

export const LAUNCH_AGENT_LABEL = 'com.vncqrlauncher.app';

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Render the LaunchAgent property list
 */
export function renderPlist(context: AutostartContext): string {
  const { command } = context;
  const args = [command.executable, ...command.args]
    .map((arg) => `        <string>${escapeXml(arg)}</string>`)
    .join('\n');

  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">
<plist version="1.0">
<dict>
    <key>Label</key>
    <string>${LAUNCH_AGENT_LABEL}</string>
    <key>ProgramArguments</key>
    <array>
${args}
    </array>
    <key>RunAtLoad</key>
    <true/>
    <key>KeepAlive</key>
    <false/>
    <key>WorkingDirectory</key>
    <string>${escapeXml(command.workingDirectory)}</string>
    <key>StandardOutPath</key>
    <string>/tmp/vncqrlauncher.log</string>
    <key>StandardErrorPath</key>
    <string>/tmp/vncqrlauncher.error.log</string>
</dict>
</plist>
`;
}

export class MacAutostart implements AutostartManager {
  readonly supported = true;
  readonly location: string;

  constructor(private readonly context: AutostartContext) {
    this.location = path.join(context.host.homedir(), 'Library', 'LaunchAgents', LAUNCH_AGENT_LABEL + '.plist');
  }

  isEnabled(): boolean {
    return this.context.host.run('launchctl', ['list', LAUNCH_AGENT_LABEL]).ok;
  }

  enable(): boolean {
    const { host } = this.context;
    host.writeFile(this.location, renderPlist(this.context));

    const loaded = host.run('launchctl', ['load', this.location]);
    if (!loaded.ok) {
      console.log('   Failed to load LaunchAgent: ' + describeFailure(loaded));
      return false;
    }
    return true;
  }

  disable(): boolean {
    const { host } = this.context;
    if (!host.exists(this.location)) return true;

    // unload fails when the agent is not loaded; removing the plist is what matters
    host.run('launchctl', ['unload', this.location]);
    host.removeFile(this.location);
    return true;
  }
}
