import type {
  ExplorationTrace,
  ObstacleKind,
  RepeatabilityScore,
  Thresholds,
  TraceStep,
} from '../schema/index.js';
import { THRESHOLDS } from '../config/defaults.js';

// ── Heuristics ───────────────────────────────────────────────

const INTERPRETATION_PATTERNS: readonly RegExp[] = [
  /\bsummar(?:y|ize|ise|izing|ising)\b/i,
  /\brelevan(?:t|ce)\b/i,
  /\bbest\b/i,
  /\bmost\b/i,
  /\banaly[sz](?:e|is|ing)\b/i,
  /\bdetermin(?:e|ing)\b/i,
  /\bevaluat(?:e|ing|ion)\b/i,
  /\bassess(?:ing|ment)?\b/i,
  /\bjudg(?:e|ing|ment)\b/i,
  /\binterpret(?:s|ing|ation)?\b/i,
  /\bin (?:my|your) own words\b/i,
  /\bopinion\b/i,
];

/** Obstacles that reappear the same way and can be dismissed by a fixed selector. */
const PREDICTABLE_OBSTACLES: ReadonlySet<ObstacleKind> = new Set<ObstacleKind>([
  'cookie_banner',
  'modal',
  'ad',
  'newsletter',
  'notification_prompt',
]);

/** True when free text asks for reading page content for meaning. */
export function isInterpretive(text: string): boolean {
  return INTERPRETATION_PATTERNS.some((pattern) => pattern.test(text));
}

export function isSemanticStep(step: TraceStep): boolean {
  return step.basis === 'interpretation' || isInterpretive(step.rationale);
}

export function isDeterministicStep(step: TraceStep): boolean {
  return step.basis === 'structural' && !isSemanticStep(step);
}

export function isPredictableObstacle(step: TraceStep): boolean {
  if (!step.obstacle) return false;
  return PREDICTABLE_OBSTACLES.has(step.obstacle.kind) && step.obstacle.selector !== undefined;
}

// ── Scoring ──────────────────────────────────────────────────

function ratio(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}

function formatScore(value: number): string {
  return value.toFixed(2);
}

export const DEFAULT_THRESHOLDS: Thresholds = {
  minDeterminism: THRESHOLDS.MIN_DETERMINISM,
  minObstaclePredictability: THRESHOLDS.MIN_OBSTACLE_PREDICTABILITY,
  maxDecisionComplexity: THRESHOLDS.MAX_DECISION_COMPLEXITY,
  maxScriptableSteps: THRESHOLDS.MAX_SCRIPTABLE_STEPS,
};

/**
 * Score how deterministic an exploration was and classify it.
 *
 * Failed steps are left out: they did not change the page, so a script
 * never needs to reproduce them. Every comparison is strict, so a score
 * sitting exactly on its threshold classifies NOT_SCRIPTABLE.
 */
export function analyze(
  trace: ExplorationTrace,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): RepeatabilityScore {
  const effective = trace.steps.filter((s) => s.outcome !== 'failed');
  const obstacles = effective.filter((s) => s.outcome === 'obstacle');

  const determinism = ratio(effective.filter(isDeterministicStep).length, effective.length);
  const obstaclePredictability = obstacles.length === 0
    ? 1
    : ratio(obstacles.filter(isPredictableObstacle).length, obstacles.length);
  const decisionComplexity = ratio(effective.filter(isSemanticStep).length, effective.length);

  const reasons: string[] = [];

  const deterministicOk = determinism > thresholds.minDeterminism;
  reasons.push(
    `${deterministicOk ? '✓' : '✗'} determinism ${formatScore(determinism)} (needs > ${formatScore(thresholds.minDeterminism)})`,
  );

  const obstaclesOk = obstaclePredictability > thresholds.minObstaclePredictability;
  reasons.push(
    `${obstaclesOk ? '✓' : '✗'} obstacle predictability ${formatScore(obstaclePredictability)} (needs > ${formatScore(thresholds.minObstaclePredictability)})`,
  );

  const complexityOk = decisionComplexity < thresholds.maxDecisionComplexity;
  reasons.push(
    `${complexityOk ? '✓' : '✗'} decision complexity ${formatScore(decisionComplexity)} (needs < ${formatScore(thresholds.maxDecisionComplexity)})`,
  );

  const lengthOk = effective.length <= thresholds.maxScriptableSteps;
  reasons.push(
    `${lengthOk ? '✓' : '✗'} ${String(effective.length)} effective steps (max ${String(thresholds.maxScriptableSteps)})`,
  );

  const scriptable = deterministicOk && obstaclesOk && complexityOk && lengthOk;

  return {
    determinism,
    obstaclePredictability,
    decisionComplexity,
    verdict: scriptable ? 'SCRIPTABLE' : 'NOT_SCRIPTABLE',
    reasons,
  };
}
