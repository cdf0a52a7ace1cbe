/**
 * Bootstrap Library
 */

export * from './errors.js';
export * from './installer.js';
export * from './component.js';
export * from './gate.js';
export * from './handoff.js';
export * from './bootstrap.js';
export * from './doctor.js';
