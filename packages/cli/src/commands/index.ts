/**
 * Command exports
 */

export { mergeCommand } from './merge.js';
export { pathsCommand } from './paths.js';
export { checkCommand } from './check.js';
