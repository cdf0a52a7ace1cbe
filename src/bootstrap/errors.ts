/**
 * Bootstrap Errors
 *
 * Fatal conditions. Each names the step that failed and a remediation hint
 * shown to the user instead of a generic failure message.
 */

export type BootstrapStep =
  | 'config'
  | 'runtime check'
  | 'environment creation'
  | 'dependency install'
  | 'component install';

export class LauncherError extends Error {
  readonly step: BootstrapStep;
  readonly hint: string;

  constructor(step: BootstrapStep, message: string, hint: string) {
    super(message);
    this.name = 'LauncherError';
    this.step = step;
    this.hint = hint;
  }
}

export class ConfigError extends LauncherError {
  constructor(message: string, hint = 'Check launcher.yml against the documented keys') {
    super('config', message, hint);
    this.name = 'ConfigError';
  }
}

export class EnvironmentCreationError extends LauncherError {
  constructor(message: string, hint: string, step: 'runtime check' | 'environment creation' = 'environment creation') {
    super(step, message, hint);
    this.name = 'EnvironmentCreationError';
  }
}

export class DependencyInstallError extends LauncherError {
  constructor(message: string, hint: string) {
    super('dependency install', message, hint);
    this.name = 'DependencyInstallError';
  }
}

export class MissingComponentError extends LauncherError {
  constructor(message: string, hint: string) {
    super('component install', message, hint);
    this.name = 'MissingComponentError';
  }
}

/**
 * Normalise a caught value to a message
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Print a fatal error with its remediation hint
 */
export function printFatal(error: LauncherError): void {
  console.error(`\n❌ ${error.step} failed: ${error.message}`);
  console.error(`   💡 ${error.hint}\n`);
}
