/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 8_000,
  LLM_CALL_TIMEOUT: 60_000,
  EXPLORATION_TIMEOUT: 180_000,
  INVOCATION_TIMEOUT: 300_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 25,
} as const;

export const RATE_LIMIT = {
  MAX_ATTEMPTS: 3,
  BACKOFF_MS: 5_000,
} as const;

export const TOKEN_GUARDS = {
  MAX_VISIBLE_TEXT_CHARS: 8_000,
  MAX_ELEMENTS: 150,
  MAX_EXTRACT_CHARS: 2_000,
} as const;

export const THRESHOLDS = {
  MIN_DETERMINISM: 0.8,
  MIN_OBSTACLE_PREDICTABILITY: 0.8,
  MAX_DECISION_COMPLEXITY: 0.2,
  MAX_SCRIPTABLE_STEPS: 30,
} as const;

export const LIBRARY = {
  DIR: '.taskpilot/scripts',
  MAX_SCRIPT_AGE_DAYS: 30,
} as const;
