/**
 * Configuration Types
 *
 * Types for launcher.yml. Keys mirror the YAML file, so they stay snake_case.
 */

/**
 * Isolated runtime environment the bridge application runs in
 */
export interface EnvironmentSettings {
  /** Environment root, relative to the project root unless absolute */
  path: string;
  /** Dependency manifest, one package specifier per line */
  manifest: string;
}

/**
 * Bundled VNC client component built from local source
 */
export interface ComponentSettings {
  /** Source directory of the component */
  path: string;
  /** Build descriptors, any one of which marks the directory as installable */
  descriptors: string[];
  /** Client module file, relative to the component directory (used by doctor) */
  client_module: string;
  /** Statement the environment interpreter runs to prove the component loads */
  smoke_import: string;
  /** Native numeric package upgraded before the component install; null skips it */
  numeric_dependency: string | null;
  /** Modules the component imports at load time, checked by doctor */
  helper_imports: string[];
  /** Abort when the component source is missing */
  required: boolean;
  /** Run `git submodule update` before looking for the component */
  sync_submodules: boolean;
}

export interface AppSettings {
  /** Main application entry point, relative to the project root */
  entry: string;
}

export interface ViewerSettings {
  extra_windows_paths: string[];
  extra_linux_programs: string[];
}

/**
 * Main launcher.yml configuration (after defaults are applied)
 */
export interface LauncherConfig {
  /** Interpreter used to create the environment */
  python: string;
  environment: EnvironmentSettings;
  component: ComponentSettings;
  app: AppSettings;
  viewers: ViewerSettings;
}
