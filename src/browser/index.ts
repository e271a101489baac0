/**
 * Browser execution module.
 * Playwright-backed implementation of the browser capability. No LLM calls.
 * Receives structured actions, executes them, reports outcomes.
 */

export { resolveSelector, describeSelector, selectorKey } from './selectors.js';
export { createPlaywrightLauncher } from './runner.js';
export type {
  RunnerConfig,
  BrowserSession,
  BrowserLauncher,
  LaunchOptions,
} from './runner.js';
export { observePage } from './prescan.js';
