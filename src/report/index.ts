/**
 * Report generation module.
 * Deterministic: turns an ExecutionResult into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON } from './reporter.js';
