/**
 * CLI Commands Index
 *
 * Re-exports all CLI command modules.
 */

export { launch } from './launch.js';
export { probe } from './probe.js';
export { doctor } from './doctor.js';
export { autostart } from './autostart.js';
export { createProgram } from './program.js';
