import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import type {
  ActionHistoryEntry,
  AgentAction,
  AgentStepResponse,
  ExplorationTrace,
  Observation,
  PageSnapshot,
  TaskSpec,
  TraceStep,
} from '../schema/index.js';
import { agentStepResponseSchema, summarizeSnapshot } from '../schema/index.js';
import { LIMITS, TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import type { BrowserLauncher, BrowserSession } from '../browser/runner.js';
import { describeSelector } from '../browser/selectors.js';
import * as log from '../utils/logger.js';
import { ExplorationError, errorMessage } from './errors.js';
import { fingerprint } from './fingerprint.js';
import { isInterpretive } from './analyzer.js';

// ── Public types ─────────────────────────────────────────────

export interface ExplorerConfig {
  launch: BrowserLauncher;
  client: LLMClient;
  maxSteps?: number | undefined;
  timeoutMs?: number | undefined;
  llmTimeoutMs?: number | undefined;
}

export interface ExploreOptions {
  signal?: AbortSignal | undefined;
}

export interface Explorer {
  explore(task: TaskSpec, options?: ExploreOptions): Promise<ExplorationTrace>;
}

// ── Constants ────────────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const VALID_STRATEGIES = ['testid', 'role', 'text', 'css'];

// ── Pre-validation fixups ───────────────────────────────────
// The LLM sometimes invents strategies like "placeholder" or "name", or
// leaves out bookkeeping fields. Repair these before Zod validation.

function fixupSelector(selector: unknown): void {
  if (typeof selector !== 'object' || selector === null) return;
  const sel = selector as Record<string, unknown>;
  const strategy = sel['strategy'];
  const value = sel['value'];

  if (typeof strategy !== 'string' || typeof value !== 'string') return;
  if (VALID_STRATEGIES.includes(strategy)) return;

  switch (strategy) {
    case 'placeholder':
      sel['strategy'] = 'css';
      sel['value'] = `[placeholder='${value}']`;
      break;
    case 'name':
      sel['strategy'] = 'css';
      sel['value'] = `[name='${value}']`;
      break;
    case 'id':
      sel['strategy'] = 'css';
      sel['value'] = `#${value}`;
      break;
    case 'label':
      sel['strategy'] = 'text';
      break;
    default:
      sel['strategy'] = 'css';
      sel['value'] = `[${strategy}='${value}']`;
      break;
  }
}

export function fixupRawDecision(parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null) return parsed;
  const obj = parsed as Record<string, unknown>;

  const action = obj['action'];
  if (obj['done'] === undefined && typeof action === 'object') {
    obj['done'] = false;
  }
  if (typeof action !== 'object' || action === null) return parsed;

  const step = action as Record<string, unknown>;

  if (!step['description'] && typeof step['type'] === 'string') {
    step['description'] = `${step['type']} step`;
  }
  fixupSelector(step['selector']);

  const obstacle = obj['obstacle'];
  if (typeof obstacle === 'object' && obstacle !== null) {
    fixupSelector((obstacle as Record<string, unknown>)['selector']);
  } else if (obstacle === null) {
    delete obj['obstacle'];
  }

  let rationale = obj['rationale'];
  if (typeof rationale !== 'string' || rationale.length === 0) {
    rationale = String(step['description'] ?? 'no rationale given');
    obj['rationale'] = rationale;
  }

  if (typeof obj['basis'] !== 'string') {
    obj['basis'] = isInterpretive(String(rationale)) ? 'interpretation' : 'structural';
  }

  return parsed;
}

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Prompt formatting ───────────────────────────────────────

function formatElement(el: PageSnapshot['elements'][number]): string {
  const parts = [`<${el.tag}`];

  if (el.type) parts.push(`type="${el.type}"`);
  if (el.testId) parts.push(`data-testid="${el.testId}"`);
  if (el.id) parts.push(`id="${el.id}"`);
  if (el.role) parts.push(`role="${el.role}"`);
  if (el.name) parts.push(`name="${el.name}"`);
  if (el.placeholder) parts.push(`placeholder="${el.placeholder}"`);
  if (el.href) parts.push(`href="${el.href}"`);

  parts.push('>');

  if (el.text) parts.push(el.text);
  if (el.options && el.options.length > 0) {
    parts.push(`options=[${el.options.join(', ')}]`);
  }

  return parts.join(' ');
}

function formatHistory(history: readonly ActionHistoryEntry[]): string {
  if (history.length === 0) return '(no actions taken yet)';

  return history
    .map((entry) => {
      const icon = entry.success ? '✓' : '✗';
      return `${String(entry.stepIndex + 1)}. [${entry.action}] ${entry.description} → ${icon} ${entry.observation}`;
    })
    .join('\n');
}

function formatConstraints(task: TaskSpec): string {
  const entries = Object.entries(task.constraints);
  if (entries.length === 0) return '(none)';
  return entries.map(([key, value]) => `- ${key}: ${String(value)}`).join('\n');
}

export function describeAction(action: AgentAction): string {
  switch (action.type) {
    case 'navigate':
      return `navigate ${action.value}`;
    case 'click':
    case 'type':
    case 'select':
    case 'extract':
      return `${action.type} ${describeSelector(action.selector)}`;
    case 'press_key':
      return `press_key ${action.value}`;
    case 'wait':
      return action.selector
        ? `wait ${describeSelector(action.selector)}`
        : `wait ${action.value ?? 'load'}`;
    case 'scroll':
      return `scroll ${action.value ?? 'down'}`;
  }
}

async function buildStepPrompt(
  task: TaskSpec,
  snapshot: PageSnapshot,
  history: readonly ActionHistoryEntry[],
): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'explorer_step.txt'),
    'utf-8',
  );

  const elementsText = snapshot.elements
    .map((el) => formatElement(el))
    .join('\n');

  return template
    .replace('{{goal}}', () => task.instructions)
    .replace('{{constraints}}', () => formatConstraints(task))
    .replace('{{url}}', () => snapshot.url)
    .replace('{{title}}', () => snapshot.title)
    .replace('{{visibleText}}', () => snapshot.visibleText.slice(0, TOKEN_GUARDS.MAX_VISIBLE_TEXT_CHARS))
    .replace('{{elements}}', () => elementsText || '(none)')
    .replace('{{overlays}}', () => snapshot.overlays?.join('\n') ?? '(none)')
    .replace('{{history}}', () => formatHistory(history));
}

// ── LLM call: decide next step ──────────────────────────────

/**
 * Ask the model for the next action (or completion) given the task and
 * what has been observed so far. Rejects on invalid or unparseable replies.
 */
export async function decideNextStep(
  client: LLMClient,
  task: TaskSpec,
  snapshot: PageSnapshot,
  history: readonly ActionHistoryEntry[],
  signal?: AbortSignal,
): Promise<AgentStepResponse> {
  const prompt = await buildStepPrompt(task, snapshot, history);
  const raw = await client.generate(prompt, task.instructions, { signal });

  const json = extractJSON(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new Error(`Agent returned invalid JSON: ${raw.slice(0, 200)}`);
  }

  const result = agentStepResponseSchema.safeParse(fixupRawDecision(parsed));
  if (!result.success) {
    throw new Error(`Agent response validation failed: ${result.error.message}`);
  }

  return result.data;
}

// ── Helpers ─────────────────────────────────────────────────

function toObservation(snapshot: PageSnapshot): Observation {
  return {
    url: snapshot.url,
    title: snapshot.title,
    summary: summarizeSnapshot(snapshot),
  };
}

function callSignal(
  outer: AbortSignal | undefined,
  llmTimeoutMs: number,
  deadline: number,
): AbortSignal {
  const budget = Math.max(1, Math.min(llmTimeoutMs, deadline - Date.now()));
  const timeout = AbortSignal.timeout(budget);
  return outer ? AbortSignal.any([outer, timeout]) : timeout;
}

// ── Explorer ────────────────────────────────────────────────

export function createExplorer(config: ExplorerConfig): Explorer {
  const maxSteps = config.maxSteps ?? LIMITS.MAX_STEPS;
  const timeoutMs = config.timeoutMs ?? TIMEOUTS.EXPLORATION_TIMEOUT;
  const llmTimeoutMs = config.llmTimeoutMs ?? TIMEOUTS.LLM_CALL_TIMEOUT;

  return {
    async explore(task: TaskSpec, options?: ExploreOptions): Promise<ExplorationTrace> {
      const signal = options?.signal;
      const startedAt = new Date();
      const deadline = startedAt.getTime() + timeoutMs;
      const steps: TraceStep[] = [];
      const history: ActionHistoryEntry[] = [];
      const extracted: Record<string, string> = {};

      log.section(`Explore: ${task.instructions}`);
      log.info(`Target: ${task.target}`);

      let session: BrowserSession;
      try {
        session = await config.launch({ signal });
      } catch (err) {
        throw new ExplorationError(`Could not start browser: ${errorMessage(err)}`, 0, { cause: err });
      }

      try {
        // ── 1. Open the entry point ──────────────────────

        await session.navigate(task.target);
        let snapshot = await session.observe();

        steps.push({
          index: 0,
          observation: toObservation(snapshot),
          action: { type: 'navigate', value: task.target, description: 'Open task target' },
          outcome: 'success',
          rationale: 'Task entry point',
          basis: 'structural',
        });

        // ── 2. Observe → decide → act ────────────────────

        for (let i = 0; i < maxSteps; i++) {
          if (signal?.aborted) {
            throw new ExplorationError('Exploration aborted', steps.length, { cause: signal.reason });
          }
          if (Date.now() > deadline) {
            throw new ExplorationError(
              `Exploration timed out after ${String(timeoutMs)}ms`,
              steps.length,
            );
          }

          log.llm(`Agent deciding step ${String(i + 1)}/${String(maxSteps)}...`);

          let decision: AgentStepResponse;
          try {
            decision = await decideNextStep(
              config.client,
              task,
              snapshot,
              history,
              callSignal(signal, llmTimeoutMs, deadline),
            );
          } catch (err) {
            if (signal?.aborted) {
              throw new ExplorationError('Exploration aborted', steps.length, { cause: err });
            }
            const msg = errorMessage(err);
            log.error(`Agent decision failed: ${msg}`);
            history.push({
              stepIndex: i,
              action: 'decide',
              description: 'LLM decision call',
              success: false,
              observation: `LLM error: ${msg}`,
            });
            continue;
          }

          // ── CHECK DONE ─────────────────────────────────
          if (decision.done) {
            log.info(`Agent says done: ${decision.summary}`);
            const finishedAt = new Date();

            return {
              traceId: randomUUID(),
              fingerprint: fingerprint(task),
              target: task.target,
              startedAt: startedAt.toISOString(),
              finishedAt: finishedAt.toISOString(),
              steps,
              completion: {
                summary: decision.summary,
                url: snapshot.url,
                evidence: decision.evidence,
                data: { ...extracted, ...decision.data },
              },
            };
          }

          // ── ACT ────────────────────────────────────────
          const stepIndex = steps.length;
          log.step(i, maxSteps, decision.action.description);

          const outcome = await session.act(decision.action);

          if (outcome.ok && decision.action.type === 'extract' && outcome.text !== undefined) {
            extracted[decision.action.name] = outcome.text;
          }
          if (outcome.ok && decision.obstacle) {
            log.obstacle(`Dismissed ${decision.obstacle.kind}`);
          }

          const step: TraceStep = {
            index: stepIndex,
            observation: toObservation(snapshot),
            action: decision.action,
            outcome: !outcome.ok ? 'failed' : decision.obstacle ? 'obstacle' : 'success',
            rationale: decision.rationale,
            basis: decision.basis,
          };
          if (decision.obstacle) step.obstacle = decision.obstacle;
          if (!outcome.ok) step.error = outcome.error;
          steps.push(step);

          log.stepResult(i, maxSteps, outcome.ok, decision.action.description);

          // ── OBSERVE ────────────────────────────────────
          snapshot = await session.observe();

          history.push({
            stepIndex: i,
            action: describeAction(decision.action),
            description: decision.action.description,
            success: outcome.ok,
            observation: outcome.ok
              ? `Page at ${snapshot.url}`
              : `Failed: ${outcome.error}`,
          });
        }

        throw new ExplorationError(
          `Step budget of ${String(maxSteps)} exhausted without reaching a terminal state`,
          steps.length,
        );
      } catch (err) {
        if (err instanceof ExplorationError) throw err;
        throw new ExplorationError(`Exploration failed: ${errorMessage(err)}`, steps.length, {
          cause: err,
        });
      } finally {
        await session.close();
      }
    },
  };
}
