/**
 * Host System
 *
 * Everything the launcher touches on the machine goes through this interface:
 * file existence, directory listing, search-path lookup and process execution.
 * Tests inject an in-memory host instead of the real one.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

export interface CommandResult {
  ok: boolean;
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be spawned at all */
  error?: string;
}

export interface HostSystem {
  readonly platform: NodeJS.Platform;
  cwd(): string;
  homedir(): string;
  exists(filePath: string): boolean;
  listDir(dirPath: string): DirEntry[];
  readFile(filePath: string): string;
  writeFile(filePath: string, content: string): void;
  removeFile(filePath: string): void;
  /** Resolve a program on the search path, null when absent */
  which(program: string): string | null;
  run(command: string, args: string[], options?: RunOptions): CommandResult;
}

/**
 * Host backed by the real filesystem and child processes
 */
export function createNodeHost(): HostSystem {
  return {
    platform: process.platform,

    cwd: () => process.cwd(),

    homedir: () => os.homedir(),

    exists: (filePath: string): boolean => fs.existsSync(filePath),

    listDir: (dirPath: string): DirEntry[] =>
      fs.readdirSync(dirPath, { withFileTypes: true }).map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
      })),

    readFile: (filePath: string): string => fs.readFileSync(filePath, 'utf8'),

    writeFile: (filePath: string, content: string): void => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content);
    },

    removeFile: (filePath: string): void => {
      fs.rmSync(filePath, { force: true });
    },

    which: (program: string): string | null => {
      const lookup = process.platform === 'win32' ? 'where' : 'which';
      const result = spawnSync(lookup, [program], { encoding: 'utf8', stdio: 'pipe' });
      if (result.status !== 0 || !result.stdout) return null;
      const first = result.stdout.split(/\r?\n/)[0]?.trim();
      return first ? first : null;
    },

    run: (command: string, args: string[], options: RunOptions = {}): CommandResult => {
      const result = spawnSync(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        encoding: 'utf8',
        stdio: options.inherit ? 'inherit' : 'pipe',
      });

      return {
        ok: !result.error && result.status === 0,
        status: result.status,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        error: result.error ? result.error.message : undefined,
      };
    },
  };
}

/**
 * Short description of why a command failed, for log lines
 */
export function describeFailure(result: CommandResult): string {
  if (result.error) return result.error;
  const stderr = result.stderr.trim();
  if (stderr) return stderr.split(/\r?\n/).slice(-1)[0] ?? stderr;
  return 'exit code ' + String(result.status);
}
