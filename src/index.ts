/**
 * convo-grader
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './utils/index.js';
export * from './ingest/export/index.js';
export * from './normalize/index.js';
export * from './llm/index.js';
export * from './classify/index.js';
export * from './pipeline/index.js';
export * from './store/index.js';
export * from './stats/index.js';
export * from './finetune/index.js';
export { version } from './version.js';
