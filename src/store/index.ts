/**
 * Persistence module.
 * Key/value storage for generated scripts. No pipeline logic.
 */

export type { ScriptStore } from './store.js';
export { createFileScriptStore } from './fileStore.js';
export { createMemoryScriptStore } from './memoryStore.js';
export type { MemoryScriptStore } from './memoryStore.js';
