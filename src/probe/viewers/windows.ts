/**
 * Windows Viewer Probe
 *
 * Known install locations, versioned portable executables, then PATH.
 */

import * as path from 'path';
import { findFirstMatch } from '../../utils/glob.js';
import type { KnownViewer, ProbeContext, ViewerCandidate, ViewerProber } from '../types.js';

export const knownViewers: KnownViewer[] = [
  {
    name: 'TightVNC',
    paths: [
      'C:\\Program Files\\TightVNC\\tvnviewer.exe',
      'C:\\Program Files (x86)\\TightVNC\\tvnviewer.exe',
    ],
  },
  {
    name: 'RealVNC',
    paths: [
      'C:\\Program Files\\RealVNC\\VNC Viewer\\vncviewer.exe',
      'C:\\Program Files (x86)\\RealVNC\\VNC Viewer\\vncviewer.exe',
    ],
  },
  {
    name: 'TigerVNC',
    paths: [
      'C:\\Program Files\\TigerVNC\\vncviewer.exe',
      'C:\\Program Files (x86)\\TigerVNC\\vncviewer.exe',
    ],
  },
  {
    name: 'UltraVNC',
    paths: [
      'C:\\Program Files\\uvnc bvba\\UltraVNC\\vncviewer.exe',
      'C:\\Program Files (x86)\\uvnc bvba\\UltraVNC\\vncviewer.exe',
      'C:\\Program Files\\UltraVNC\\vncviewer.exe',
      'C:\\Program Files (x86)\\UltraVNC\\vncviewer.exe',
    ],
  },
];

/** Portable downloads carry their version in the filename */
export const versionedPatterns = ['vncviewer-*.*.*.exe', 'vncviewer64-*.*.*.exe', 'tvnviewer-*.exe'];

export const pathExecutables = ['tvnviewer.exe', 'vncviewer.exe'];

export const installHints = [
  'TightVNC: https://www.tightvnc.com/download.php',
  'RealVNC Viewer: https://www.realvnc.com/en/connect/download/viewer/',
  'UltraVNC: https://uvnc.com/downloads/ultravnc.html',
];

export class WindowsViewerProber implements ViewerProber {
  readonly platform = 'windows' as const;
  readonly installHints = installHints;

  private readonly viewers: KnownViewer[];

  constructor(extraPaths: string[] = []) {
    this.viewers = extraPaths.length > 0
      ? [...knownViewers, ...extraPaths.map((p) => ({ name: path.win32.basename(p), paths: [p] }))]
      : knownViewers;
  }

  probe({ host, searchRoot }: ProbeContext): ViewerCandidate[] {
    const candidates: ViewerCandidate[] = [];
    const seen = new Set<string>();

    const add = (candidate: ViewerCandidate): void => {
      const key = (candidate.resolvedPath ?? candidate.name).toLowerCase();
      if (seen.has(key)) return;
      seen.add(key);
      candidates.push(candidate);
    };

    for (const viewer of this.viewers) {
      const found = viewer.paths.find((p) => host.exists(p));
      if (found) {
        add({ name: viewer.name, kind: 'known-path', resolvedPath: found });
      }
    }

    // First pattern with a match wins; later patterns are never walked
    for (const pattern of versionedPatterns) {
      const match = findFirstMatch(host, searchRoot, pattern);
      if (match) {
        add({ name: path.basename(match), kind: 'glob-pattern', resolvedPath: match });
        break;
      }
    }

    for (const executable of pathExecutables) {
      const resolved = host.which(executable);
      if (resolved) {
        add({ name: executable, kind: 'path-lookup', resolvedPath: resolved });
      }
    }

    return candidates;
  }
}
