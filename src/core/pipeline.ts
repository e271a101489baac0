import path from 'node:path';

import type { FileConfig } from '../schema/index.js';
import type { BrowserLauncher } from '../browser/runner.js';
import { createPlaywrightLauncher } from '../browser/runner.js';
import type { LLMClient } from '../llm/index.js';
import type { ScriptStore } from '../store/index.js';
import { createFileScriptStore } from '../store/index.js';
import { createScriptRunner } from './executor.js';
import { createExplorer } from './explorer.js';
import { createScriptGenerator } from './generator.js';
import { createScriptLibrary } from './library.js';
import { createOrchestrator } from './orchestrator.js';
import type { Orchestrator } from './orchestrator.js';

// ── Wiring ───────────────────────────────────────────────────

export interface PipelineOptions {
  config: FileConfig;
  client: LLMClient;
  /** Defaults to a Playwright launcher honouring `config.headless`. */
  launch?: BrowserLauncher | undefined;
  /** Defaults to a file store under `config.library.dir`. */
  store?: ScriptStore | undefined;
  now?: (() => Date) | undefined;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build an orchestrator from a validated config file and an LLM client.
 */
export async function createPipeline(options: PipelineOptions): Promise<Orchestrator> {
  const { config, client, now } = options;
  const launch = options.launch ?? createPlaywrightLauncher({ headless: config.headless });
  const store = options.store ?? createFileScriptStore(path.resolve(config.library.dir));

  const runner = createScriptRunner({ launch });

  return createOrchestrator({
    library: createScriptLibrary(store),
    explorer: createExplorer({ launch, client, maxSteps: config.maxSteps }),
    generator: createScriptGenerator({ runner, now }),
    runner,
    thresholds: config.thresholds,
    invocationTimeoutMs: config.timeout * 1000,
    maxScriptAgeMs: config.library.maxScriptAgeDays * DAY_MS,
    now,
  });
}
