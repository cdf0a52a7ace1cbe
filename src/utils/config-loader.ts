/**
 * Config Loader
 *
 * Reads launcher.yml and merges it over the defaults for the host platform.
 * A missing file means defaults; malformed YAML or a wrong-typed key is a
 * ConfigError.
 */

import yaml from 'js-yaml';

import { getLauncherConfigPath } from '../constants/config-files.js';
import { ConfigError, errorMessage } from '../bootstrap/errors.js';
import type { HostSystem } from './host.js';
import type { LauncherConfig } from '../types/config.js';

export const DEFAULT_CONFIG: LauncherConfig = {
  python: 'python3',
  environment: {
    path: '.venv',
    manifest: 'requirements.txt',
  },
  component: {
    path: 'pyVNC',
    descriptors: ['setup.py', 'pyproject.toml'],
    client_module: 'pyVNC/Client.py',
    smoke_import: 'from pyVNC.Client import Client',
    numeric_dependency: 'numpy',
    helper_imports: ['pygame', 'twisted'],
    required: false,
    sync_submodules: true,
  },
  app: {
    entry: 'main.py',
  },
  viewers: {
    extra_windows_paths: [],
    extra_linux_programs: [],
  },
};

/**
 * Defaults for one platform. Windows installs ship `python`, not `python3`.
 */
export function defaultConfigFor(platform: NodeJS.Platform): LauncherConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  if (platform === 'win32') config.python = 'python';
  return config;
}

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`"${key}" must be a mapping`);
  }
  return value;
}

function str(sec: Section, key: string, where: string, fallback: string): string {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`"${where}.${key}" must be a non-empty string`);
  }
  return value;
}

function bool(sec: Section, key: string, where: string, fallback: boolean): boolean {
  const value = sec[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${where}.${key}" must be true or false`);
  }
  return value;
}

function strList(sec: Section, key: string, where: string, fallback: string[]): string[] {
  const value = sec[key];
  if (value === undefined || value === null) return [...fallback];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`"${where}.${key}" must be a list of strings`);
  }
  return [...value];
}

/**
 * Validate parsed YAML and apply defaults
 */
export function normalizeConfig(raw: unknown, platform: NodeJS.Platform = process.platform): LauncherConfig {
  const d = defaultConfigFor(platform);
  if (raw === undefined || raw === null) {
    return d;
  }
  if (!isRecord(raw)) {
    throw new ConfigError('launcher.yml must contain a mapping at the top level');
  }

  const env = section(raw, 'environment');
  const component = section(raw, 'component');
  const app = section(raw, 'app');
  const viewers = section(raw, 'viewers');

  let numericDependency: string | null = d.component.numeric_dependency;
  if (component.numeric_dependency === null) {
    numericDependency = null;
  } else if (component.numeric_dependency !== undefined) {
    numericDependency = str(component, 'numeric_dependency', 'component', '');
  }

  return {
    python: str(raw, 'python', 'launcher', d.python),
    environment: {
      path: str(env, 'path', 'environment', d.environment.path),
      manifest: str(env, 'manifest', 'environment', d.environment.manifest),
    },
    component: {
      path: str(component, 'path', 'component', d.component.path),
      descriptors: strList(component, 'descriptors', 'component', d.component.descriptors),
      client_module: str(component, 'client_module', 'component', d.component.client_module),
      smoke_import: str(component, 'smoke_import', 'component', d.component.smoke_import),
      numeric_dependency: numericDependency,
      helper_imports: strList(component, 'helper_imports', 'component', d.component.helper_imports),
      required: bool(component, 'required', 'component', d.component.required),
      sync_submodules: bool(component, 'sync_submodules', 'component', d.component.sync_submodules),
    },
    app: {
      entry: str(app, 'entry', 'app', d.app.entry),
    },
    viewers: {
      extra_windows_paths: strList(viewers, 'extra_windows_paths', 'viewers', d.viewers.extra_windows_paths),
      extra_linux_programs: strList(viewers, 'extra_linux_programs', 'viewers', d.viewers.extra_linux_programs),
    },
  };
}

/**
 * Load config from launcher.yml
 */
export function loadConfig(host: HostSystem, rootDir: string): LauncherConfig {
  const configPath = getLauncherConfigPath(rootDir);

  if (!host.exists(configPath)) {
    return defaultConfigFor(host.platform);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(host.readFile(configPath));
  } catch (e) {
    throw new ConfigError(`Error parsing launcher.yml: ${errorMessage(e)}`, 'Fix the YAML syntax in ' + configPath);
  }

  return normalizeConfig(parsed, host.platform);
}
