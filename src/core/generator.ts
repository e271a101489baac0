import type {
  ExplorationTrace,
  GeneratedScript,
  ObstacleHandler,
  ScriptInstruction,
  ScriptProgram,
  SelectorHint,
  TaskSpec,
  TraceStep,
} from '../schema/index.js';
import { SCRIPT_PROGRAM_VERSION, serializeProgram } from '../schema/index.js';
import { selectorKey } from '../browser/selectors.js';
import * as log from '../utils/logger.js';
import { isPredictableObstacle } from './analyzer.js';
import { ValidationError } from './errors.js';
import type { RunScriptOptions, ScriptRunner } from './executor.js';
import { fingerprint } from './fingerprint.js';
import type { Parameterizer } from './template.js';
import { TARGET_PARAMETER, createParameterizer, placeholdersIn } from './template.js';

// ── Public types ─────────────────────────────────────────────

export interface ScriptGeneratorConfig {
  runner: ScriptRunner;
  now?: (() => Date) | undefined;
}

export interface ScriptGenerator {
  /** Compile a scriptable trace into an UNVALIDATED script. */
  generate(trace: ExplorationTrace, task: TaskSpec): GeneratedScript;
  /**
   * Run the script once. Resolves with a PASSED copy, or rejects with a
   * ValidationError carrying the FAILED copy.
   */
  validate(script: GeneratedScript, task: TaskSpec, options?: RunScriptOptions): Promise<GeneratedScript>;
}

// ── Step translation ─────────────────────────────────────────

function paramSelector(selector: SelectorHint, p: Parameterizer): SelectorHint {
  const out: SelectorHint = { ...selector, value: p(selector.value) };
  if (selector.name !== undefined) out.name = p(selector.name);
  return out;
}

/**
 * One trace step → structural instructions. Element actions are always
 * preceded by a `locate` so the runner fails fast on a missing element.
 */
export function translateStep(step: TraceStep, p: Parameterizer): ScriptInstruction[] {
  const action = step.action;

  switch (action.type) {
    case 'navigate':
      return [{ op: 'navigate', url: p(action.value) }];

    case 'click': {
      const selector = paramSelector(action.selector, p);
      return [
        { op: 'locate', selector, timeout: action.timeout },
        { op: 'act', action: 'click', selector },
      ];
    }

    case 'type': {
      const selector = paramSelector(action.selector, p);
      return [
        { op: 'locate', selector, timeout: action.timeout },
        { op: 'act', action: 'fill', selector, value: p(action.value) },
      ];
    }

    case 'select': {
      const selector = paramSelector(action.selector, p);
      return [
        { op: 'locate', selector, timeout: action.timeout },
        { op: 'act', action: 'select', selector, value: p(action.value) },
      ];
    }

    case 'press_key': {
      if (!action.selector) {
        return [{ op: 'act', action: 'press', value: action.value }];
      }
      const selector = paramSelector(action.selector, p);
      return [
        { op: 'locate', selector, timeout: action.timeout },
        { op: 'act', action: 'press', selector, value: action.value },
      ];
    }

    case 'wait': {
      if (action.selector) {
        return [{ op: 'wait_for', condition: { kind: 'selector', selector: paramSelector(action.selector, p) } }];
      }
      if (action.value === undefined) {
        return [{ op: 'wait_for', condition: { kind: 'load' } }];
      }
      const ms = Number(action.value);
      return Number.isNaN(ms)
        ? [{ op: 'wait_for', condition: { kind: 'text', value: p(action.value) } }]
        : [{ op: 'wait_for', condition: { kind: 'delay', ms: Math.max(0, Math.round(ms)) } }];
    }

    case 'scroll':
      return [{ op: 'scroll', direction: action.value ?? 'down' }];

    case 'extract': {
      const selector = paramSelector(action.selector, p);
      return [
        { op: 'locate', selector, timeout: action.timeout },
        { op: 'extract', selector, name: action.name },
      ];
    }
  }
}

/** Handlers for every predictable obstacle in the trace, one per kind + selector. */
export function collectObstacleHandlers(
  trace: ExplorationTrace,
  p: Parameterizer,
): ObstacleHandler[] {
  const seen = new Set<string>();
  const handlers: ObstacleHandler[] = [];

  for (const step of trace.steps) {
    if (step.outcome !== 'obstacle' || !isPredictableObstacle(step)) continue;
    const obstacle = step.obstacle;
    if (!obstacle?.selector) continue;

    const key = `${obstacle.kind}:${selectorKey(obstacle.selector)}`;
    if (seen.has(key)) continue;
    seen.add(key);

    handlers.push({ kind: obstacle.kind, selector: paramSelector(obstacle.selector, p) });
  }

  return handlers;
}

export function buildProgram(trace: ExplorationTrace, task: TaskSpec): ScriptProgram {
  const p = createParameterizer(task);

  const instructions = trace.steps
    .filter((step) => step.outcome === 'success')
    .flatMap((step) => translateStep(step, p));

  const successCondition: ScriptProgram['successCondition'] = {
    url: p(trace.completion.url),
  };
  if (trace.completion.evidence !== undefined) {
    successCondition.text = p(trace.completion.evidence);
  }

  return {
    version: SCRIPT_PROGRAM_VERSION,
    instructions,
    obstacleHandlers: collectObstacleHandlers(trace, p),
    successCondition,
  };
}

// ── Generator ────────────────────────────────────────────────

export function createScriptGenerator(config: ScriptGeneratorConfig): ScriptGenerator {
  const now = config.now ?? (() => new Date());

  return {
    generate(trace: ExplorationTrace, task: TaskSpec): GeneratedScript {
      const program = buildProgram(trace, task);
      const body = serializeProgram(program);

      const requiredParameters = placeholdersIn(body)
        .filter((name) => name !== TARGET_PARAMETER)
        .sort();

      log.script(
        `Generated ${String(program.instructions.length)} instructions, ${String(program.obstacleHandlers.length)} obstacle handlers`,
      );

      return {
        fingerprint: fingerprint(task),
        body,
        requiredParameters,
        validation: 'UNVALIDATED',
        createdAt: now().toISOString(),
        sourceTrace: trace,
      };
    },

    async validate(
      script: GeneratedScript,
      task: TaskSpec,
      options?: RunScriptOptions,
    ): Promise<GeneratedScript> {
      log.script('Validating generated script with one trial run...');
      const run = await config.runner.runScript(script, task, options);

      if (run.success) {
        log.script('Validation passed');
        return { ...script, validation: 'PASSED' };
      }

      const reason = run.error?.message ?? 'trial run did not reach the terminal condition';
      log.warn(`Validation failed: ${reason}`);
      throw new ValidationError(`Generated script failed validation: ${reason}`, {
        ...script,
        validation: 'FAILED',
      });
    },
  };
}
