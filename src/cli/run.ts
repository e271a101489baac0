import { access, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { ZodError } from 'zod';

import type { ConstraintValue, ExecutionResult, FileConfig, TaskSpec } from '../schema/index.js';
import { createTask } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMConfig } from '../llm/index.js';
import { ConfigError, createPipeline, createScriptLibrary, errorMessage } from '../core/index.js';
import type { Orchestrator } from '../core/index.js';
import { createFileScriptStore } from '../store/index.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import { loadConfigFile, parseConfig } from '../config/loader.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_SUCCESS = 0;
export const EXIT_TASK_FAILED = 1;
export const EXIT_USAGE = 4;

const DEFAULT_CONFIG_PATH = '.taskpilot.yaml';

// ── Option parsing ───────────────────────────────────────────

/** `-c key=value`: numbers and booleans keep their type so fingerprints match config files. */
export function parseConstraintValue(raw: string): ConstraintValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (/^-?\d+(?:\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

export function collectConstraint(
  pair: string,
  previous: Record<string, ConstraintValue>,
): Record<string, ConstraintValue> {
  const eqIndex = pair.indexOf('=');
  if (eqIndex <= 0) {
    throw new InvalidArgumentError(`Constraint "${pair}" must look like key=value`);
  }
  const key = pair.slice(0, eqIndex).trim();
  const value = pair.slice(eqIndex + 1).trim();
  return { ...previous, [key]: parseConstraintValue(value) };
}

interface OverrideOptions {
  headed?: true;
  maxSteps?: string;
  timeout?: string;
}

/** CLI flags take precedence over the config file. */
export function applyOverrides(config: FileConfig, opts: OverrideOptions): FileConfig {
  const merged: FileConfig = { ...config };
  if (opts.headed) merged.headless = false;
  if (opts.maxSteps !== undefined) {
    const maxSteps = Number(opts.maxSteps);
    if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
      throw new ConfigError(`--max-steps must be a positive integer, got "${opts.maxSteps}"`);
    }
    merged.maxSteps = maxSteps;
  }
  if (opts.timeout !== undefined) {
    const timeout = Number(opts.timeout);
    if (!(timeout > 0)) {
      throw new ConfigError(`--timeout must be a positive number of seconds, got "${opts.timeout}"`);
    }
    merged.timeout = timeout;
  }
  return merged;
}

/** Config provider/model override the environment. */
export function resolveLLMConfig(config: FileConfig, env: NodeJS.ProcessEnv = process.env): LLMConfig {
  return loadLLMConfig(env, {
    provider: config.provider,
    model: config.model,
    maxAttempts: config.llmMaxAttempts,
  });
}

// ── Config loading ───────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** A missing default config file means all defaults; a missing explicit one is an error. */
async function loadConfig(configPath: string | undefined): Promise<FileConfig> {
  if (configPath !== undefined) return loadConfigFile(configPath);
  if (await fileExists(DEFAULT_CONFIG_PATH)) return loadConfigFile(DEFAULT_CONFIG_PATH);
  return parseConfig('', 'yaml');
}

// ── Task execution ───────────────────────────────────────────

interface OutputOptions {
  json?: true;
  reportPath?: string;
}

function printSummary(result: ExecutionResult, task: TaskSpec): void {
  process.stderr.write(`\n--- taskpilot result ---\n`);
  if (task.name !== undefined) process.stderr.write(`Task:        ${task.name}\n`);
  process.stderr.write(`Target:      ${task.target}\n`);
  process.stderr.write(`Fingerprint: ${result.fingerprint}\n`);
  process.stderr.write(`Result:      ${result.success ? 'SUCCESS' : 'FAILED'}\n`);
  process.stderr.write(`Method:      ${result.method} (${result.scriptOutcome})\n`);
  if (result.error) {
    process.stderr.write(`Error:       ${result.error.code}: ${result.error.message}\n`);
  }
  process.stderr.write(`Time:        ${(result.durationMs / 1000).toFixed(1)}s\n\n`);
}

async function executeTask(
  orchestrator: Orchestrator,
  task: TaskSpec,
  opts: OutputOptions,
  signal: AbortSignal,
): Promise<number> {
  const result = await orchestrator.execute(task, { signal });
  const exitCode = result.success ? EXIT_SUCCESS : EXIT_TASK_FAILED;

  if (opts.reportPath !== undefined) {
    const outputDir = path.resolve(opts.reportPath);
    await mkdir(outputDir, { recursive: true });
    await writeFile(
      path.join(outputDir, `${result.fingerprint}.md`),
      generateMarkdown(result, task),
      'utf-8',
    );
  }

  if (opts.json) {
    process.stdout.write(serializeJSON(generateJSON(result, task, exitCode)) + '\n');
  }

  printSummary(result, task);
  return exitCode;
}

/** Ctrl-C aborts the running invocation; its browser session is closed. */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    log.warn('Interrupted, cancelling...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}

async function withOrchestrator(
  config: FileConfig,
  fn: (orchestrator: Orchestrator, signal: AbortSignal) => Promise<number>,
): Promise<number> {
  const client = createLLMClient(resolveLLMConfig(config));
  const orchestrator = await createPipeline({ config, client });
  const { signal, dispose } = interruptSignal();
  try {
    return await fn(orchestrator, signal);
  } finally {
    dispose();
    await orchestrator.close();
  }
}

/** Bad config or task input is a usage error; anything else failed the run. */
function reportFatal(err: unknown): number {
  if (err instanceof ConfigError) {
    process.stderr.write(`Config error: ${err.message}\n`);
    return EXIT_USAGE;
  }
  if (err instanceof ZodError) {
    const issues = err.issues.map((i) => `${i.path.map(String).join('.')}: ${i.message}`).join('; ');
    process.stderr.write(`Invalid task: ${issues}\n`);
    return EXIT_USAGE;
  }
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  return EXIT_TASK_FAILED;
}

// ── Command registration ─────────────────────────────────────

export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Run one task: replay its stored script, or explore it live')
    .argument('<target>', 'Target URL')
    .argument('<instructions>', 'Natural language instructions')
    .option('-c, --constraint <key=value>', 'Task constraint (repeatable)', collectConstraint, {})
    .option('--name <name>', 'Display name for the task')
    .option('--config <path>', `Path to config file (default: ${DEFAULT_CONFIG_PATH} if present)`)
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Write a markdown report to this directory')
    .option('--max-steps <n>', 'Override max exploration steps')
    .option('--headed', 'Show the browser window')
    .option('--timeout <seconds>', 'Per-invocation timeout in seconds')
    .action(
      async (
        target: string,
        instructions: string,
        opts: OutputOptions & OverrideOptions & {
          constraint: Record<string, ConstraintValue>;
          name?: string;
          config?: string;
        },
      ) => {
        try {
          const config = applyOverrides(await loadConfig(opts.config), opts);
          const task = createTask({
            name: opts.name,
            target,
            instructions,
            constraints: opts.constraint,
          });

          process.exitCode = await withOrchestrator(config, (orchestrator, signal) =>
            executeTask(orchestrator, task, opts, signal),
          );
        } catch (err) {
          process.exitCode = reportFatal(err);
        }
      },
    );
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description(`Run tasks defined in a ${DEFAULT_CONFIG_PATH} config file`)
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--task <name>', 'Run a single task by name')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Write markdown reports to this directory')
    .option('--max-steps <n>', 'Override max exploration steps')
    .option('--headed', 'Show the browser window')
    .option('--timeout <seconds>', 'Per-invocation timeout in seconds')
    .action(
      async (opts: OutputOptions & OverrideOptions & { config: string; task?: string }) => {
        let config: FileConfig;
        let tasks: TaskSpec[];
        try {
          config = applyOverrides(await loadConfigFile(opts.config), opts);
          tasks = selectTasks(config, opts.task);
        } catch (err) {
          process.exitCode = reportFatal(err);
          return;
        }

        try {
          process.exitCode = await withOrchestrator(config, async (orchestrator, signal) => {
            let worstExitCode = EXIT_SUCCESS;
            for (const task of tasks) {
              if (signal.aborted) break;
              const exitCode = await executeTask(orchestrator, task, opts, signal);
              worstExitCode = Math.max(worstExitCode, exitCode);
            }
            return worstExitCode;
          });
        } catch (err) {
          process.exitCode = reportFatal(err);
        }
      },
    );
}

/** Config task entries → TaskSpecs, resolving `baseUrl` for entries without a target. */
export function selectTasks(config: FileConfig, name?: string): TaskSpec[] {
  const entries = name !== undefined
    ? config.tasks.filter((t) => t.name === name)
    : config.tasks;

  if (entries.length === 0) {
    throw new ConfigError(
      name !== undefined ? `No task named "${name}" found in config` : 'No tasks defined in config',
    );
  }

  return entries.map((entry) => {
    const target = entry.target ?? config.baseUrl;
    if (target === undefined) {
      throw new ConfigError(`Task "${entry.name}" has no target and the config has no baseUrl`);
    }
    return createTask({
      name: entry.name,
      target,
      instructions: entry.instructions,
      constraints: entry.constraints,
    });
  });
}

// ── Script library inspection ────────────────────────────────

export function registerScriptsCommand(program: Command): void {
  const scripts = program
    .command('scripts')
    .description('Inspect the script library');

  scripts
    .command('list')
    .description('List stored scripts')
    .option('--config <path>', `Path to config file (default: ${DEFAULT_CONFIG_PATH} if present)`)
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: { config?: string; json?: true }) => {
      try {
        const config = await loadConfig(opts.config);
        const library = createScriptLibrary(createFileScriptStore(path.resolve(config.library.dir)));
        await library.open();
        const stored = await library.list();
        await library.close();

        if (opts.json) {
          const rows = stored.map((s) => ({
            fingerprint: s.fingerprint,
            target: s.sourceTrace.target,
            createdAt: s.createdAt,
            requiredParameters: s.requiredParameters,
          }));
          process.stdout.write(serializeJSON(rows) + '\n');
        } else if (stored.length === 0) {
          process.stdout.write('No stored scripts\n');
        } else {
          for (const s of stored) {
            const params = s.requiredParameters.length > 0 ? ` [${s.requiredParameters.join(', ')}]` : '';
            process.stdout.write(`${s.fingerprint}  ${s.createdAt}  ${s.sourceTrace.target}${params}\n`);
          }
        }
        process.exitCode = EXIT_SUCCESS;
      } catch (err) {
        process.exitCode = reportFatal(err);
      }
    });

  scripts
    .command('show')
    .description('Print a stored script')
    .argument('<fingerprint>', 'Task fingerprint')
    .option('--config <path>', `Path to config file (default: ${DEFAULT_CONFIG_PATH} if present)`)
    .action(async (key: string, opts: { config?: string }) => {
      try {
        const config = await loadConfig(opts.config);
        const library = createScriptLibrary(createFileScriptStore(path.resolve(config.library.dir)));
        await library.open();
        const script = await library.get(key);
        await library.close();

        if (!script) {
          process.stderr.write(`No script stored for ${key}\n`);
          process.exitCode = EXIT_TASK_FAILED;
          return;
        }
        process.stdout.write(serializeJSON(script) + '\n');
        process.exitCode = EXIT_SUCCESS;
      } catch (err) {
        process.exitCode = reportFatal(err);
      }
    });
}
