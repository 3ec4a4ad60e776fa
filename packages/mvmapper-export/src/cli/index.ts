/**
 * mvmapper-export CLI
 *
 * @module cli
 */

export * from './lib/index.js';
export * from './commands/index.js';

export const CLI_NAME = 'mvmapper-export';
