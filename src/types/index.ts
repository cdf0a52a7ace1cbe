/**
 * Types Index
 */

export * from './config.js';
export * from './bootstrap.js';
export * from './cli.js';
