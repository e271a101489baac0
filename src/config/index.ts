/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated; every field has a default from defaults.ts.
 */

export { TIMEOUTS, LIMITS, RATE_LIMIT, TOKEN_GUARDS, THRESHOLDS, LIBRARY } from './defaults.js';
export { loadConfigFile, parseConfig } from './loader.js';
