import type {
  ErrorDetail,
  ExecutionResult,
  ExplorationTrace,
  GeneratedScript,
  Payload,
  TaskSpec,
  Thresholds,
} from '../schema/index.js';
import { LIBRARY, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { DEFAULT_THRESHOLDS, analyze } from './analyzer.js';
import { ExecutionError, ExplorationError, ValidationError, errorMessage } from './errors.js';
import type { ScriptRunner } from './executor.js';
import type { Explorer } from './explorer.js';
import { fingerprint } from './fingerprint.js';
import type { ScriptGenerator } from './generator.js';
import type { ScriptLibrary } from './library.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorConfig {
  library: ScriptLibrary;
  explorer: Explorer;
  generator: ScriptGenerator;
  runner: ScriptRunner;
  thresholds?: Thresholds | undefined;
  invocationTimeoutMs?: number | undefined;
  /** Stored scripts older than this are re-explored. `Infinity` disables. */
  maxScriptAgeMs?: number | undefined;
  now?: (() => Date) | undefined;
}

export interface ExecuteOptions {
  signal?: AbortSignal | undefined;
}

export interface Orchestrator {
  execute(task: TaskSpec, options?: ExecuteOptions): Promise<ExecutionResult>;
  close(): Promise<void>;
}

// ── Constants ────────────────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

// ── Helpers ──────────────────────────────────────────────────

type Outcome = Omit<ExecutionResult, 'fingerprint' | 'durationMs'>;

type ScriptRun =
  | { ok: true; payload: Payload }
  | { ok: false; error: ErrorDetail | undefined };

function payloadOf(trace: ExplorationTrace): Payload {
  return {
    summary: trace.completion.summary,
    url: trace.completion.url,
    data: trace.completion.data,
  };
}

function invocationSignal(outer: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return outer ? AbortSignal.any([outer, timeout]) : timeout;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Opens the library and returns the pipeline's single entry point.
 *
 *   LOOKUP ─hit──▶ SCRIPT_EXECUTE ─ok──▶ DONE(SCRIPT)
 *     │                  │fail
 *     └─miss──▶ EXPLORE ◀┘ (fallback: DONE(EXPLORATION) right after)
 *                  │
 *               ANALYZE ─not scriptable──▶ DONE(EXPLORATION)
 *                  │
 *               GENERATE ─passed──▶ store, DONE(SCRIPT)
 *                        └failed──▶ DONE(EXPLORATION)
 */
export async function createOrchestrator(config: OrchestratorConfig): Promise<Orchestrator> {
  const { library, explorer, generator, runner } = config;
  const thresholds = config.thresholds ?? DEFAULT_THRESHOLDS;
  const invocationTimeoutMs = config.invocationTimeoutMs ?? TIMEOUTS.INVOCATION_TIMEOUT;
  const maxScriptAgeMs = config.maxScriptAgeMs ?? LIBRARY.MAX_SCRIPT_AGE_DAYS * DAY_MS;
  const now = config.now ?? (() => new Date());

  await library.open();

  function isStale(script: GeneratedScript): boolean {
    const createdAt = Date.parse(script.createdAt);
    return now().getTime() - createdAt > maxScriptAgeMs;
  }

  /** A runner that rejects counts as a failed script run. */
  async function runStoredScript(
    script: GeneratedScript,
    task: TaskSpec,
    signal: AbortSignal,
  ): Promise<ScriptRun> {
    try {
      const run = await runner.runScript(script, task, { signal });
      return run.success ? { ok: true, payload: run.payload } : { ok: false, error: run.error };
    } catch (err) {
      const error = err instanceof ExecutionError
        ? err
        : new ExecutionError(`Script run failed: ${errorMessage(err)}`, undefined, { cause: err });
      return { ok: false, error: error.toDetail() };
    }
  }

  async function generateAndStore(
    trace: ExplorationTrace,
    task: TaskSpec,
    key: string,
    signal: AbortSignal,
  ): Promise<boolean> {
    try {
      const draft = generator.generate(trace, task);
      const validated = await generator.validate(draft, task, { signal });
      await library.put(key, validated);
      return true;
    } catch (err) {
      if (err instanceof ValidationError) {
        log.warn(`Script discarded: ${err.message}`);
      } else {
        log.error(`Script generation failed: ${errorMessage(err)}`);
      }
      return false;
    }
  }

  return {
    async execute(task: TaskSpec, options?: ExecuteOptions): Promise<ExecutionResult> {
      const startedAt = Date.now();
      const key = fingerprint(task);
      const signal = invocationSignal(options?.signal, invocationTimeoutMs);

      const finish = (outcome: Outcome): ExecutionResult => {
        const result: ExecutionResult = {
          ...outcome,
          fingerprint: key,
          durationMs: Date.now() - startedAt,
        };
        const verb = result.success ? 'succeeded' : 'failed';
        log.info(`Task ${verb} via ${result.method} (${result.scriptOutcome}) in ${(result.durationMs / 1000).toFixed(1)}s`);
        return result;
      };

      log.section(`Task ${task.name ?? key}`);

      // ── LOOKUP ───────────────────────────────────────────

      const stored = await library.get(key);
      let stale = false;
      let scriptFailure: ErrorDetail | undefined;

      if (!stored) {
        log.library(`No script for ${key}`);
      } else if (isStale(stored)) {
        log.library(`Script for ${key} is past the staleness limit, re-exploring`);
        stale = true;
      } else {
        // ── SCRIPT_EXECUTE ─────────────────────────────────

        log.library(`Found script for ${key} (created ${stored.createdAt})`);
        const run = await runStoredScript(stored, task, signal);
        if (run.ok) {
          return finish({
            success: true,
            method: 'SCRIPT',
            payload: run.payload,
            scriptOutcome: 'executed',
          });
        }

        scriptFailure = run.error;
        log.warn(`Script failed (${scriptFailure?.message ?? 'unknown error'}), falling back to exploration`);
      }

      // ── EXPLORE ──────────────────────────────────────────

      let trace: ExplorationTrace;
      try {
        trace = await explorer.explore(task, { signal });
      } catch (err) {
        const error = err instanceof ExplorationError
          ? err
          : new ExplorationError(`Exploration failed: ${errorMessage(err)}`, 0, { cause: err });
        log.error(error.message);
        return finish({
          success: false,
          method: 'EXPLORATION',
          payload: { data: {} },
          error: error.toDetail(),
          scriptOutcome: 'exploration_failed',
        });
      }

      const payload = payloadOf(trace);

      if (stored && !stale) {
        // The stored script stays: its failure may have been transient.
        return finish({
          success: true,
          method: 'EXPLORATION',
          payload,
          scriptOutcome: 'fallback',
        });
      }

      // ── ANALYZE ──────────────────────────────────────────

      const score = analyze(trace, thresholds);
      log.analysis(`Verdict: ${score.verdict}`);
      for (const reason of score.reasons) log.detail(reason);

      if (score.verdict === 'NOT_SCRIPTABLE') {
        return finish({
          success: true,
          method: 'EXPLORATION',
          payload,
          scriptOutcome: stale ? 'stale' : 'not_scriptable',
        });
      }

      // ── GENERATE ─────────────────────────────────────────
      // This run's result still comes from the exploration.

      const persisted = await generateAndStore(trace, task, key, signal);
      return finish({
        success: true,
        method: persisted ? 'SCRIPT' : 'EXPLORATION',
        payload,
        scriptOutcome: persisted ? 'generated' : 'validation_failed',
      });
    },

    async close(): Promise<void> {
      await library.close();
    },
  };
}
