/**
 * Services exports
 * Search, selection, prompting, process spawning and the operations built on them
 */

export * from './search.js';
export * from './selector.js';
export * from './prompter.js';
export * from './process-runner.js';
export * from './editor.js';
export * from './output.js';
export * from './operations.js';
export * from './error-handler.js';
