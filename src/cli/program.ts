/**
 * Command Registration
 *
 * Builds the Commander program. `launch` is the default command.
 */

import { Argument, Command } from 'commander';

import { launch } from './launch.js';
import { probe } from './probe.js';
import { doctor } from './doctor.js';
import { autostart } from './autostart.js';
import { getLauncherVersion } from '../utils/version-check.js';
import type { AutostartAction } from '../types/cli.js';

interface RootOption {
  root?: string;
}

interface LaunchFlags extends RootOption {
  reinstall?: boolean;
  handoff: boolean;
  silent?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vnc-qr-launcher')
    .description('Prepare and start the QR code VNC bridge')
    .version(getLauncherVersion());

  program
    .command('launch', { isDefault: true })
    .description('Install dependencies, detect VNC viewers and start the application')
    .option('--root <dir>', 'Project root (defaults to the current directory)')
    .option('--reinstall', 'Install the dependency manifest again')
    .option('--no-handoff', 'Stop after deciding the launch mode')
    .option('--silent', 'Only print errors')
    .action(async (options: LaunchFlags) => {
      process.exitCode = await launch({
        rootDir: options.root,
        reinstall: options.reinstall,
        handoff: options.handoff,
        silent: options.silent,
      });
    });

  program
    .command('probe')
    .description('Report which VNC viewers are installed')
    .option('--root <dir>', 'Project root (defaults to the current directory)')
    .action(async (options: RootOption) => {
      process.exitCode = await probe({ rootDir: options.root });
    });

  program
    .command('doctor')
    .description('Diagnose the bundled VNC client component')
    .option('--root <dir>', 'Project root (defaults to the current directory)')
    .action(async (options: RootOption) => {
      process.exitCode = await doctor({ rootDir: options.root });
    });

  program
    .command('autostart')
    .description('Start the launcher at login (macOS and Windows)')
    .addArgument(new Argument('<action>', 'what to do').choices(['enable', 'disable', 'status']))
    .option('--root <dir>', 'Project root (defaults to the current directory)')
    .action(async (action: AutostartAction, options: RootOption) => {
      process.exitCode = await autostart(action, { rootDir: options.root });
    });

  return program;
}
