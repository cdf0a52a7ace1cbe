/**
 * Version Check Utilities
 *
 * Utilities for reading and comparing versions.
 */

import * as fs from 'fs';
import * as path from 'path';

interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
}

/** Oldest interpreter the bridge application runs on */
export const MIN_PYTHON_VERSION = '3.8.0';

/**
 * Get current launcher package version
 */
export function getLauncherVersion(): string {
  // Sources run from src/utils, the build from dist/src/utils
  for (const relative of ['../../package.json', '../../../package.json']) {
    const packageJsonPath = path.join(__dirname, relative);
    if (!fs.existsSync(packageJsonPath)) continue;
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (typeof pkg !== 'object' || pkg === null) continue;
      if ('name' in pkg && pkg.name === 'vnc-qr-launcher') {
        return 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '1.0.0';
      }
    } catch {
      // Unreadable package.json, try the next location
    }
  }
  return '1.0.0';
}

/**
 * Parse semantic version string
 * @param version - Version string (e.g., "1.2.3"); a missing patch counts as 0
 */
export function parseVersion(version: string): ParsedVersion | null {
  if (!version) return null;

  const match = version.match(/^(\d+)\.(\d+)(?:\.(\d+))?/);
  if (!match) return null;

  return {
    major: parseInt(match[1] ?? '0', 10),
    minor: parseInt(match[2] ?? '0', 10),
    patch: parseInt(match[3] ?? '0', 10),
  };
}

/**
 * Compare two versions
 * @returns Negative if a < b, 0 if equal, positive if a > b
 */
export function compareVersions(a: string, b: string): number {
  const vA = parseVersion(a);
  const vB = parseVersion(b);

  if (!vA || !vB) return 0;

  if (vA.major !== vB.major) return vA.major - vB.major;
  if (vA.minor !== vB.minor) return vA.minor - vB.minor;
  return vA.patch - vB.patch;
}

/**
 * Check if version a is compatible with minimum version b
 */
export function isCompatible(current: string, minimum: string): boolean {
  return compareVersions(current, minimum) >= 0;
}

/**
 * Extract the version from `python --version` output ("Python 3.10.12")
 */
export function parsePythonVersion(output: string): string | null {
  const match = output.match(/Python\s+(\d+\.\d+(?:\.\d+)?)/i);
  return match?.[1] ?? null;
}
