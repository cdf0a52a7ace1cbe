/**
 * Component Doctor
 *
 * Step-by-step diagnostics for the bundled VNC client component: numeric and
 * helper imports, source layout, then the import itself.
 */

import * as path from 'path';

import { describeFailure } from '../utils/host.js';
import { findComponentDescriptor } from './component.js';
import type { HostSystem } from '../utils/host.js';
import type { LauncherConfig } from '../types/config.js';

export interface DoctorCheck {
  label: string;
  ok: boolean;
  detail?: string;
}

export type DoctorVerdict = 'healthy' | 'imports-failing' | 'multiple-issues';

export interface DoctorReport {
  checks: DoctorCheck[];
  verdict: DoctorVerdict;
}

export interface DoctorOptions {
  host: HostSystem;
  rootDir: string;
  config: LauncherConfig;
  python: string;
}

function importCheck(host: HostSystem, python: string, rootDir: string, label: string, statement: string): DoctorCheck {
  const result = host.run(python, ['-c', statement], { cwd: rootDir });
  return result.ok
    ? { label, ok: true, detail: result.stdout.trim() || undefined }
    : { label, ok: false, detail: describeFailure(result) };
}

export function diagnoseComponent(options: DoctorOptions): DoctorReport {
  const { host, rootDir, config, python } = options;
  const component = config.component;
  const checks: DoctorCheck[] = [];

  const interpreter: DoctorCheck = { label: 'Environment interpreter', ok: host.exists(python), detail: python };
  checks.push(interpreter);

  const basics: DoctorCheck[] = [];
  if (interpreter.ok) {
    if (component.numeric_dependency) {
      const name = component.numeric_dependency;
      basics.push(
        importCheck(host, python, rootDir, `${name} import`, `import ${name}; print(${name}.__version__)`)
      );
    }
    for (const helper of component.helper_imports) {
      basics.push(importCheck(host, python, rootDir, `${helper} import`, `import ${helper}`));
    }
  }
  checks.push(...basics);

  const componentDir = path.resolve(rootDir, component.path);
  const dirExists = host.exists(componentDir);
  checks.push({ label: `${component.path} directory`, ok: dirExists, detail: componentDir });

  const descriptor = findComponentDescriptor(host, rootDir, config);
  checks.push({
    label: 'Build descriptor',
    ok: descriptor !== null,
    detail: descriptor ?? component.descriptors.join(' / ') + ' not found',
  });

  const clientPath = path.join(componentDir, component.client_module);
  const clientExists = host.exists(clientPath);
  checks.push({ label: 'Client module', ok: clientExists, detail: clientPath });

  const basicOk = interpreter.ok && basics.every((c) => c.ok);
  const structureOk = dirExists && descriptor !== null && clientExists;

  let importOk = false;
  if (interpreter.ok && structureOk) {
    const smoke = importCheck(host, python, rootDir, `${component.path} import`, component.smoke_import);
    checks.push(smoke);
    importOk = smoke.ok;
  }

  let verdict: DoctorVerdict;
  if (importOk && basicOk) verdict = 'healthy';
  else if (basicOk && structureOk) verdict = 'imports-failing';
  else verdict = 'multiple-issues';

  return { checks, verdict };
}

export function formatDoctorReport(report: DoctorReport): string[] {
  const lines: string[] = ['', 'VNC COMPONENT DIAGNOSTICS', '═'.repeat(60)];

  for (const check of report.checks) {
    lines.push(`${check.ok ? '✅' : '❌'} ${check.label}`);
    if (check.detail) lines.push(`   ${check.detail}`);
  }

  lines.push('─'.repeat(60));
  switch (report.verdict) {
    case 'healthy':
      lines.push('✅ All checks passed - full VNC functionality available');
      break;
    case 'imports-failing':
      lines.push('⚠️  Component layout is good but its import fails');
      lines.push('   This is likely a dependency compatibility issue.');
      lines.push('   The application will run with QR code functionality only.');
      break;
    case 'multiple-issues':
      lines.push('❌ Multiple issues detected');
      lines.push('   💡 Check the component installation and its dependencies');
      break;
  }

  return lines;
}
