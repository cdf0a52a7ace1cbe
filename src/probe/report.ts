/**
 * Capability Report Formatting
 */

import { platformLabel } from './platform.js';
import { installHintsFor } from './prober.js';
import type { CapabilityReport, ViewerCandidate } from './types.js';

function formatCandidate(candidate: ViewerCandidate): string {
  return candidate.resolvedPath
    ? `✅ ${candidate.name} → ${candidate.resolvedPath}`
    : `✅ ${candidate.name}`;
}

/**
 * Render a capability report as the lines printed to stdout
 */
export function formatCapabilityReport(report: CapabilityReport): string[] {
  const lines: string[] = [
    '',
    '═'.repeat(60),
    'VNC VIEWER CHECK',
    '═'.repeat(60),
    '',
    `Platform: ${platformLabel(report.platform)}`,
  ];

  for (const candidate of report.candidatesFound) {
    lines.push(formatCandidate(candidate));
  }

  lines.push('─'.repeat(60));

  if (report.vncAvailable) {
    const count = report.candidatesFound.length;
    lines.push(`✅ VNC available (${count} viewer${count > 1 ? 's' : ''} found)`);
    return lines;
  }

  lines.push('⚠️  No VNC viewer detected - QR-only mode');
  const hints = installHintsFor(report.platform);
  if (hints.length > 0) {
    lines.push('   Install one of the following:');
    for (const hint of hints) {
      lines.push(`   💡 ${hint}`);
    }
  }

  return lines;
}

/**
 * Print a capability report
 */
export function printCapabilityReport(report: CapabilityReport): void {
  for (const line of formatCapabilityReport(report)) {
    console.log(line);
  }
}
