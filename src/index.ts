/**
 * taskpilot library entry point.
 *
 * `createPipeline` wires the default collaborators; `createOrchestrator`
 * takes them injected.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './config/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './store/index.js';
export * from './report/index.js';
