import type { ErrorCode, ErrorDetail, GeneratedScript } from '../schema/index.js';

// ── Base ─────────────────────────────────────────────────────

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;

  toDetail(): ErrorDetail {
    return { code: this.code, message: this.message };
  }
}

// ── Taxonomy ─────────────────────────────────────────────────

/** The agent could not reach a terminal state (budget, timeout, abort). */
export class ExplorationError extends PipelineError {
  readonly code = 'EXPLORATION_FAILED';
  readonly stepsTaken: number;

  constructor(message: string, stepsTaken: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExplorationError';
    this.stepsTaken = stepsTaken;
  }
}

/** A freshly generated script failed its single trial run. */
export class ValidationError extends PipelineError {
  readonly code = 'VALIDATION_FAILED';
  readonly script: GeneratedScript;

  constructor(message: string, script: GeneratedScript, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
    this.script = script;
  }
}

/** A script failed at run time. */
export class ExecutionError extends PipelineError {
  readonly code = 'EXECUTION_FAILED';
  readonly instructionIndex: number | undefined;

  constructor(message: string, instructionIndex?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ExecutionError';
    this.instructionIndex = instructionIndex;
  }
}

/** Script Library read/write failure. */
export class PersistenceError extends PipelineError {
  readonly code = 'PERSISTENCE_FAILED';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

// ── Non-pipeline errors ──────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** Misuse of the Script Library contract (a programming error, not I/O). */
export class ScriptLibraryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScriptLibraryError';
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
