import type {
  AgentAction,
  ExecutionResult,
  GeneratedScript,
  ObstacleHandler,
  PageSnapshot,
  ScriptInstruction,
  ScriptProgram,
  SelectorHint,
  SuccessCondition,
  TaskSpec,
  WaitCondition,
} from '../schema/index.js';
import { parseProgram } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { BrowserLauncher, BrowserSession } from '../browser/runner.js';
import { describeSelector } from '../browser/selectors.js';
import * as log from '../utils/logger.js';
import { ExecutionError, errorMessage } from './errors.js';
import { bindTemplate, taskParameters } from './template.js';

// ── Public types ─────────────────────────────────────────────

export interface ScriptRunnerConfig {
  launch: BrowserLauncher;
  actionTimeoutMs?: number | undefined;
}

export interface RunScriptOptions {
  signal?: AbortSignal | undefined;
}

export interface ScriptRunner {
  /**
   * Run a script against the live target. Never rejects: any failure is
   * reported as `success: false` with an EXECUTION_FAILED error detail.
   */
  runScript(
    script: GeneratedScript,
    task: TaskSpec,
    options?: RunScriptOptions,
  ): Promise<ExecutionResult>;
}

// ── Program loading + binding ───────────────────────────────

function loadProgram(body: string): ScriptProgram {
  try {
    return parseProgram(body);
  } catch (err) {
    throw new ExecutionError(`Script body is not a valid program: ${errorMessage(err)}`, undefined, {
      cause: err,
    });
  }
}

function bindSelector(selector: SelectorHint, bind: (s: string) => string): SelectorHint {
  const bound: SelectorHint = { ...selector, value: bind(selector.value) };
  if (selector.name !== undefined) bound.name = bind(selector.name);
  return bound;
}

function bindCondition(condition: WaitCondition, bind: (s: string) => string): WaitCondition {
  switch (condition.kind) {
    case 'selector':
      return { kind: 'selector', selector: bindSelector(condition.selector, bind) };
    case 'text':
      return { kind: 'text', value: bind(condition.value) };
    case 'delay':
    case 'load':
      return condition;
  }
}

function bindInstruction(
  instruction: ScriptInstruction,
  bind: (s: string) => string,
): ScriptInstruction {
  switch (instruction.op) {
    case 'navigate':
      return { ...instruction, url: bind(instruction.url) };
    case 'locate':
      return { ...instruction, selector: bindSelector(instruction.selector, bind) };
    case 'act':
      return {
        ...instruction,
        selector: instruction.selector && bindSelector(instruction.selector, bind),
        value: instruction.value === undefined ? undefined : bind(instruction.value),
      };
    case 'wait_for':
      return { ...instruction, condition: bindCondition(instruction.condition, bind) };
    case 'scroll':
      return instruction;
    case 'extract':
      return { ...instruction, selector: bindSelector(instruction.selector, bind) };
  }
}

export function bindProgram(program: ScriptProgram, task: TaskSpec): ScriptProgram {
  const params = taskParameters(task);
  const bind = (text: string): string => {
    try {
      return bindTemplate(text, params);
    } catch (err) {
      throw new ExecutionError(errorMessage(err), undefined, { cause: err });
    }
  };

  const successCondition: SuccessCondition = {};
  if (program.successCondition.url !== undefined) {
    successCondition.url = bind(program.successCondition.url);
  }
  if (program.successCondition.text !== undefined) {
    successCondition.text = bind(program.successCondition.text);
  }

  return {
    version: program.version,
    instructions: program.instructions.map((i) => bindInstruction(i, bind)),
    obstacleHandlers: program.obstacleHandlers.map((h) => ({
      kind: h.kind,
      selector: bindSelector(h.selector, bind),
    })),
    successCondition,
  };
}

// ── Success condition ───────────────────────────────────────

function locationOf(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname.replace(/\/+$/, '')}`;
  } catch {
    return url;
  }
}

/** Returns the reason the condition is unmet, or null when it holds. */
export function checkSuccessCondition(
  condition: SuccessCondition,
  snapshot: PageSnapshot,
): string | null {
  if (condition.url !== undefined && locationOf(condition.url) !== locationOf(snapshot.url)) {
    return `expected to finish at ${condition.url}, ended at ${snapshot.url}`;
  }
  if (condition.text !== undefined && !snapshot.visibleText.includes(condition.text)) {
    return `expected text "${condition.text}" not found on final page`;
  }
  return null;
}

// ── Instruction dispatch ────────────────────────────────────

function elementAction(
  instruction: Extract<ScriptInstruction, { op: 'act' }>,
  index: number,
  description: string,
): AgentAction {
  if (instruction.action === 'press') {
    return {
      type: 'press_key',
      description,
      selector: instruction.selector,
      value: instruction.value ?? 'Enter',
    };
  }

  const selector = instruction.selector;
  if (!selector) {
    throw new ExecutionError(
      `Instruction ${String(index + 1)} (${instruction.action}) has no selector`,
      index,
    );
  }

  switch (instruction.action) {
    case 'click':
      return { type: 'click', description, selector };
    case 'fill':
      return { type: 'type', description, selector, value: instruction.value ?? '' };
    case 'select':
      return { type: 'select', description, selector, value: instruction.value ?? '' };
  }
}

function waitAction(condition: WaitCondition, description: string): AgentAction {
  switch (condition.kind) {
    case 'selector':
      return { type: 'wait', description, selector: condition.selector };
    case 'text':
      return { type: 'wait', description, value: condition.value };
    case 'delay':
      return { type: 'wait', description, value: String(condition.ms) };
    case 'load':
      return { type: 'wait', description };
  }
}

/** Page-level instructions (navigate, locate) have no single action. */
function toAction(instruction: ScriptInstruction, index: number): AgentAction | null {
  const description = `script instruction ${String(index + 1)}`;

  switch (instruction.op) {
    case 'navigate':
    case 'locate':
      return null;
    case 'act':
      return elementAction(instruction, index, description);
    case 'wait_for':
      return waitAction(instruction.condition, description);
    case 'scroll':
      return { type: 'scroll', description, value: instruction.direction };
    case 'extract':
      return { type: 'extract', description, selector: instruction.selector, name: instruction.name };
  }
}

async function dismissObstacles(
  session: BrowserSession,
  handlers: readonly ObstacleHandler[],
): Promise<void> {
  for (const handler of handlers) {
    if (!(await session.isPresent(handler.selector))) continue;

    const outcome = await session.act({
      type: 'click',
      description: `dismiss ${handler.kind}`,
      selector: handler.selector,
    });
    if (outcome.ok) {
      log.obstacle(`Dismissed ${handler.kind} via ${describeSelector(handler.selector)}`);
    } else {
      log.warn(`Could not dismiss ${handler.kind}: ${outcome.error}`);
    }
  }
}

async function runInstruction(
  session: BrowserSession,
  instruction: ScriptInstruction,
  index: number,
  data: Record<string, string>,
  actionTimeoutMs: number,
): Promise<void> {
  const label = `Instruction ${String(index + 1)} (${instruction.op})`;

  if (instruction.op === 'navigate') {
    try {
      await session.navigate(instruction.url);
    } catch (err) {
      throw new ExecutionError(`${label} failed: ${errorMessage(err)}`, index, { cause: err });
    }
    return;
  }

  if (instruction.op === 'locate') {
    const found = await session.isPresent(instruction.selector, instruction.timeout ?? actionTimeoutMs);
    if (!found) {
      throw new ExecutionError(`${label} failed: element not found ${describeSelector(instruction.selector)}`, index);
    }
    return;
  }

  const action = toAction(instruction, index);
  if (!action) return;

  const outcome = await session.act(action);
  if (!outcome.ok) {
    throw new ExecutionError(`${label} failed: ${outcome.error}`, index);
  }
  if (instruction.op === 'extract') {
    data[instruction.name] = outcome.text ?? '';
  }
}

function needsObstacleCheck(instruction: ScriptInstruction): boolean {
  return instruction.op === 'locate' || instruction.op === 'act' || instruction.op === 'extract';
}

// ── Runner ──────────────────────────────────────────────────

export function createScriptRunner(config: ScriptRunnerConfig): ScriptRunner {
  const actionTimeoutMs = config.actionTimeoutMs ?? TIMEOUTS.ACTION_TIMEOUT;

  return {
    async runScript(
      script: GeneratedScript,
      task: TaskSpec,
      options?: RunScriptOptions,
    ): Promise<ExecutionResult> {
      const signal = options?.signal;
      const startedAt = Date.now();
      let session: BrowserSession | undefined;

      log.script(`Running script ${script.fingerprint}`);

      try {
        const program = bindProgram(loadProgram(script.body), task);
        session = await config.launch({ signal });

        const data: Record<string, string> = {};
        const total = program.instructions.length;

        for (const [index, instruction] of program.instructions.entries()) {
          signal?.throwIfAborted();

          if (needsObstacleCheck(instruction)) {
            await dismissObstacles(session, program.obstacleHandlers);
          }

          log.step(index, total, instruction.op);
          await runInstruction(session, instruction, index, data, actionTimeoutMs);
        }

        const finalPage = await session.observe();
        const unmet = checkSuccessCondition(program.successCondition, finalPage);
        if (unmet !== null) {
          throw new ExecutionError(`Terminal condition not reached: ${unmet}`);
        }

        log.script(`Script finished at ${finalPage.url}`);

        return {
          success: true,
          method: 'SCRIPT',
          fingerprint: script.fingerprint,
          payload: {
            summary: `Script completed ${String(total)} instructions`,
            url: finalPage.url,
            data,
          },
          scriptOutcome: 'executed',
          durationMs: Date.now() - startedAt,
        };
      } catch (err) {
        const error = err instanceof ExecutionError
          ? err
          : new ExecutionError(`Script run failed: ${errorMessage(err)}`, undefined, { cause: err });
        log.warn(error.message);

        return {
          success: false,
          method: 'SCRIPT',
          fingerprint: script.fingerprint,
          payload: { data: {} },
          error: error.toDetail(),
          scriptOutcome: 'executed',
          durationMs: Date.now() - startedAt,
        };
      } finally {
        if (session) {
          await session.close().catch((closeErr: unknown) => {
            log.warn(`Failed to close script session: ${errorMessage(closeErr)}`);
          });
        }
      }
    },
  };
}
