/**
 * Core pipeline module.
 * Explorer → analyzer → generator → library, driven by the orchestrator.
 * Browser, LLM and persistence are injected collaborators.
 */

export * from './errors.js';
export { canonicalTaskJSON, fingerprint } from './fingerprint.js';
export { analyze, isDeterministicStep, isInterpretive, isPredictableObstacle, isSemanticStep, DEFAULT_THRESHOLDS } from './analyzer.js';
export { createExplorer, decideNextStep, extractJSON } from './explorer.js';
export type { Explorer, ExplorerConfig, ExploreOptions } from './explorer.js';
export { createScriptGenerator, buildProgram } from './generator.js';
export type { ScriptGenerator, ScriptGeneratorConfig } from './generator.js';
export { createScriptRunner, bindProgram, checkSuccessCondition } from './executor.js';
export type { ScriptRunner, ScriptRunnerConfig, RunScriptOptions } from './executor.js';
export { createScriptLibrary, createKeyedLock } from './library.js';
export type { ScriptLibrary } from './library.js';
export { createOrchestrator } from './orchestrator.js';
export type { Orchestrator, OrchestratorConfig, ExecuteOptions } from './orchestrator.js';
export { createPipeline } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';
