import { describe, expect, it } from 'vitest';

import type { TraceStep } from '../schema/index.js';
import { COOKIE_ACCEPT, NAME_INPUT, makeTrace, traceStep } from '../__tests__/fixtures.js';
import { DEFAULT_THRESHOLDS, analyze, isInterpretive, isPredictableObstacle, isSemanticStep } from './analyzer.js';

function structural(count: number): TraceStep[] {
  return Array.from({ length: count }, () => traceStep());
}

const fill = traceStep({
  action: { type: 'type', description: 'Fill name', selector: NAME_INPUT, value: 'Ada' },
  rationale: 'Name field is empty',
});

function obstacle(kind: 'cookie_banner' | 'captcha', withSelector = true): TraceStep {
  return traceStep({
    action: { type: 'click', description: 'Dismiss', selector: COOKIE_ACCEPT },
    outcome: 'obstacle',
    rationale: 'Overlay blocks the form',
    obstacle: withSelector ? { kind, selector: COOKIE_ACCEPT } : { kind },
  });
}

describe('isInterpretive', () => {
  it.each([
    'Summarize the listing',
    'Choose the most relevant result',
    'Pick the best offer',
    'Determine which plan applies',
    'Describe it in your own words',
  ])('flags "%s"', (text) => {
    expect(isInterpretive(text)).toBe(true);
  });

  it('leaves plain structural rationales alone', () => {
    expect(isInterpretive('Name field is empty')).toBe(false);
    expect(isInterpretive('Submit button is visible')).toBe(false);
  });
});

describe('isSemanticStep', () => {
  it('is true for interpretation basis', () => {
    expect(isSemanticStep(traceStep({ basis: 'interpretation' }))).toBe(true);
  });

  it('is true for a structural step whose rationale interprets content', () => {
    expect(isSemanticStep(traceStep({ rationale: 'Open the most recent posting' }))).toBe(true);
  });

  it('is false for a lookahead step with a plain rationale', () => {
    expect(isSemanticStep(traceStep({ basis: 'lookahead' }))).toBe(false);
  });
});

describe('isPredictableObstacle', () => {
  it('requires a recognised kind and a selector', () => {
    expect(isPredictableObstacle(obstacle('cookie_banner'))).toBe(true);
    expect(isPredictableObstacle(obstacle('cookie_banner', false))).toBe(false);
    expect(isPredictableObstacle(obstacle('captcha'))).toBe(false);
  });
});

describe('analyze', () => {
  it('classifies a fully structural trace as SCRIPTABLE', () => {
    const score = analyze(makeTrace([...structural(2), fill, obstacle('cookie_banner')]));

    expect(score).toMatchObject({
      determinism: 1,
      obstaclePredictability: 1,
      decisionComplexity: 0,
      verdict: 'SCRIPTABLE',
    });
    expect(score.reasons).toEqual([
      '✓ determinism 1.00 (needs > 0.80)',
      '✓ obstacle predictability 1.00 (needs > 0.80)',
      '✓ decision complexity 0.00 (needs < 0.20)',
      '✓ 4 effective steps (max 30)',
    ]);
  });

  it('is NOT_SCRIPTABLE when determinism sits exactly on the threshold', () => {
    const score = analyze(makeTrace([...structural(4), traceStep({ basis: 'lookahead' })]));

    expect(score.determinism).toBeCloseTo(0.8);
    expect(score.decisionComplexity).toBe(0);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
    expect(score.reasons[0]).toBe('✗ determinism 0.80 (needs > 0.80)');
  });

  it('is NOT_SCRIPTABLE when decision complexity sits exactly on the threshold', () => {
    const semantic = traceStep({ basis: 'interpretation' });
    const score = analyze(
      makeTrace([...structural(4), semantic]),
      { ...DEFAULT_THRESHOLDS, minDeterminism: 0.5 },
    );

    expect(score.decisionComplexity).toBeCloseTo(0.2);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
    expect(score.reasons[2]).toBe('✗ decision complexity 0.20 (needs < 0.20)');
  });

  it('is NOT_SCRIPTABLE when obstacle predictability sits exactly on the threshold', () => {
    const obstacles = [...Array.from({ length: 4 }, () => obstacle('cookie_banner')), obstacle('captcha')];
    const score = analyze(makeTrace([...structural(10), ...obstacles]));

    expect(score.determinism).toBe(1);
    expect(score.obstaclePredictability).toBeCloseTo(0.8);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
    expect(score.reasons[1]).toBe('✗ obstacle predictability 0.80 (needs > 0.80)');
  });

  it('leaves failed steps out of every ratio', () => {
    const failed = traceStep({ outcome: 'failed', basis: 'interpretation', error: 'Element not found' });
    const score = analyze(makeTrace([...structural(3), failed, failed]));

    expect(score.determinism).toBe(1);
    expect(score.decisionComplexity).toBe(0);
    expect(score.verdict).toBe('SCRIPTABLE');
  });

  it('scores unpredictable obstacles', () => {
    const score = analyze(makeTrace([...structural(8), obstacle('cookie_banner'), obstacle('captcha')]));

    expect(score.obstaclePredictability).toBe(0.5);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
  });

  it('gives an empty trace zero determinism', () => {
    const score = analyze(makeTrace([]));

    expect(score.determinism).toBe(0);
    expect(score.obstaclePredictability).toBe(1);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
  });

  it('rejects traces longer than maxScriptableSteps', () => {
    const score = analyze(makeTrace(structural(31)));

    expect(score.determinism).toBe(1);
    expect(score.verdict).toBe('NOT_SCRIPTABLE');
    expect(score.reasons[3]).toBe('✗ 31 effective steps (max 30)');
  });

  it('honours custom thresholds', () => {
    const trace = makeTrace([...structural(4), traceStep({ basis: 'lookahead' })]);

    expect(analyze(trace, { ...DEFAULT_THRESHOLDS, minDeterminism: 0.75 }).verdict).toBe('SCRIPTABLE');
  });
});
