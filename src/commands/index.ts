/**
 * Command re-exports
 */

export { inspectCommand } from './inspect.js';
export { dumpCommand } from './dump.js';
export { importCommand } from './import.js';
export { typesCommand } from './types.js';
export { configCommand } from './config.js';
