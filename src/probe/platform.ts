/**
 * Platform Detection
 *
 * Maps the Node.js platform identifier onto the platforms viewers are probed for.
 */

import type { Platform } from './types.js';

/**
 * Detect the platform
 *
 * @param nodePlatform Defaults to process.platform
 * @returns Platform identifier ('mac', 'linux', 'windows')
 */
export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  if (nodePlatform === 'darwin') {
    return 'mac';
  }

  if (nodePlatform === 'win32') {
    return 'windows';
  }

  // Linux and the other unixes all look viewers up on PATH
  return 'linux';
}

/**
 * Human-readable platform label for reports
 */
export function platformLabel(platform: Platform): string {
  switch (platform) {
    case 'mac':
      return 'macOS';
    case 'windows':
      return 'Windows';
    case 'linux':
      return 'Linux';
  }
}
