/**
 * VNC QR Launcher
 * Main entry point for programmatic usage
 */

// Bootstrap pipeline
export * from './bootstrap/index.js';

// Viewer probing
export * from './probe/index.js';

// Login-time start
export * from './autostart/index.js';

// Host abstraction and config
export { createNodeHost, describeFailure } from './utils/host.js';
export type { HostSystem, DirEntry, RunOptions, CommandResult } from './utils/host.js';
export { loadConfig, normalizeConfig, DEFAULT_CONFIG } from './utils/config-loader.js';

// Commands
export { launch, probe, doctor, autostart, createProgram } from './cli/index.js';

// Types
export * from './types/index.js';
