/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerNormalizeCommand } from './normalize.js';
export { registerClassifyCommand, runClassifyCommand } from './classify.js';
export { registerStatsCommand } from './stats.js';
export { registerValidateCommand, formatReport } from './validate.js';
