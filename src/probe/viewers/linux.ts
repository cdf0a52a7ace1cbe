/**
 * Linux Viewer Probe
 *
 * Any of the client programs on PATH counts.
 */

import type { ProbeContext, ViewerCandidate, ViewerProber } from '../types.js';

export const linuxPrograms = ['remmina', 'vncviewer', 'vinagre', 'krdc'];

export const installHints = [
  'Remmina: sudo apt-get install -y remmina',
  'TigerVNC Viewer: sudo apt-get install -y tigervnc-viewer',
  'Vinagre: sudo apt-get install -y vinagre',
];

export class LinuxViewerProber implements ViewerProber {
  readonly platform = 'linux' as const;
  readonly installHints = installHints;

  private readonly programs: string[];

  constructor(extraPrograms: string[] = []) {
    this.programs = [...linuxPrograms, ...extraPrograms.filter((p) => !linuxPrograms.includes(p))];
  }

  probe({ host }: ProbeContext): ViewerCandidate[] {
    const candidates: ViewerCandidate[] = [];

    for (const program of this.programs) {
      const resolved = host.which(program);
      if (resolved) {
        candidates.push({ name: program, kind: 'path-lookup', resolvedPath: resolved });
      }
    }

    return candidates;
  }
}
