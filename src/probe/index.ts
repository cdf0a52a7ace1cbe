/**
 * Probe Library
 *
 * Platform-aware VNC viewer detection.
 */

// Types
export * from './types.js';

// Platform detection
export * from './platform.js';

// Per-platform probers
export * from './viewers/index.js';

// Report
export * from './prober.js';
export * from './report.js';
