import { describe, expect, it } from 'vitest';

import type { GeneratedScript, PageSnapshot, ScriptProgram } from '../schema/index.js';
import { createTask, serializeProgram } from '../schema/index.js';
import { selectorKey } from '../browser/selectors.js';
import { createFakeBrowser } from '../__tests__/fakeBrowser.js';
import {
  CONFIRMATION,
  COOKIE_ACCEPT,
  DONE_URL,
  FORM_URL,
  NAME_INPUT,
  SUBMIT,
  applyTask,
  donePage,
  formPage,
  formSite,
  makeTrace,
} from '../__tests__/fixtures.js';
import { bindProgram, checkSuccessCondition, createScriptRunner } from './executor.js';
import { fingerprint } from './fingerprint.js';

function program(overrides: Partial<ScriptProgram> = {}): ScriptProgram {
  return {
    version: 1,
    instructions: [
      { op: 'navigate', url: '{{target}}' },
      { op: 'locate', selector: NAME_INPUT },
      { op: 'act', action: 'fill', selector: NAME_INPUT, value: '{{applicant}}' },
      { op: 'locate', selector: SUBMIT },
      { op: 'act', action: 'click', selector: SUBMIT },
      { op: 'locate', selector: CONFIRMATION },
      { op: 'extract', selector: CONFIRMATION, name: 'reference' },
    ],
    obstacleHandlers: [{ kind: 'cookie_banner', selector: COOKIE_ACCEPT }],
    successCondition: { url: '{{target}}/done', text: 'application received' },
    ...overrides,
  };
}

function script(body: string): GeneratedScript {
  return {
    fingerprint: fingerprint(applyTask()),
    body,
    requiredParameters: ['applicant'],
    validation: 'PASSED',
    createdAt: '2026-10-19T12:00:00.000Z',
    sourceTrace: makeTrace([]),
  };
}

function snapshot(url: string, visibleText = ''): PageSnapshot {
  return { url, title: '', visibleText, elements: [] };
}

describe('checkSuccessCondition', () => {
  it('ignores trailing slashes, query and hash', () => {
    expect(checkSuccessCondition({ url: `${DONE_URL}/` }, snapshot(`${DONE_URL}?ref=1#top`))).toBeNull();
  });

  it('reports a different final page', () => {
    expect(checkSuccessCondition({ url: DONE_URL }, snapshot(FORM_URL))).toBe(
      `expected to finish at ${DONE_URL}, ended at ${FORM_URL}`,
    );
  });

  it('reports missing evidence text', () => {
    expect(checkSuccessCondition({ text: 'received' }, snapshot(DONE_URL, 'Form'))).toBe(
      'expected text "received" not found on final page',
    );
  });
});

describe('bindProgram', () => {
  it('substitutes task parameters everywhere', () => {
    const bound = bindProgram(program(), applyTask());

    expect(bound.instructions[0]).toEqual({ op: 'navigate', url: FORM_URL });
    expect(bound.instructions[2]).toEqual({
      op: 'act',
      action: 'fill',
      selector: NAME_INPUT,
      value: 'Ada Lovelace',
    });
    expect(bound.successCondition).toEqual({ url: DONE_URL, text: 'application received' });
  });
});

describe('createScriptRunner', () => {
  it('runs the script, dismissing obstacles and collecting extracts', async () => {
    const browser = createFakeBrowser(formSite());
    const runner = createScriptRunner({ launch: browser.launch });

    const result = await runner.runScript(script(serializeProgram(program())), applyTask());

    expect(result).toMatchObject({
      success: true,
      method: 'SCRIPT',
      scriptOutcome: 'executed',
      payload: {
        summary: 'Script completed 7 instructions',
        url: DONE_URL,
        data: { reference: 'REF-1042' },
      },
    });
    expect(browser.filled[selectorKey(NAME_INPUT)]).toBe('Ada Lovelace');
    expect(browser.actions[0]).toEqual({
      type: 'click',
      description: 'dismiss cookie_banner',
      selector: COOKIE_ACCEPT,
    });
    expect(browser.openSessions).toBe(0);
  });

  it('checks for obstacles without waiting and waits only for located elements', async () => {
    const browser = createFakeBrowser(formSite());
    const runner = createScriptRunner({ launch: browser.launch, actionTimeoutMs: 250 });

    await runner.runScript(script(serializeProgram(program())), applyTask());

    const cookie = selectorKey(COOKIE_ACCEPT);
    expect(browser.presenceChecks.filter((check) => check.key === cookie)).toEqual(
      Array.from({ length: 6 }, () => ({ key: cookie, timeout: undefined })),
    );
    expect(browser.presenceChecks.filter((check) => check.key !== cookie)).toEqual([
      { key: selectorKey(NAME_INPUT), timeout: 250 },
      { key: selectorKey(SUBMIT), timeout: 250 },
      { key: selectorKey(CONFIRMATION), timeout: 250 },
    ]);
  });

  it('fails with the instruction that could not find its element', async () => {
    const browser = createFakeBrowser({ [FORM_URL]: formPage('send'), [DONE_URL]: donePage() });
    const runner = createScriptRunner({ launch: browser.launch, actionTimeoutMs: 10 });

    const result = await runner.runScript(script(serializeProgram(program())), applyTask());

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'EXECUTION_FAILED',
      message: 'Instruction 4 (locate) failed: element not found [data-testid="submit"]',
    });
    expect(result.payload).toEqual({ data: {} });
    expect(browser.openSessions).toBe(0);
  });

  it('fails when the terminal condition is not reached', async () => {
    const browser = createFakeBrowser(formSite());
    const runner = createScriptRunner({ launch: browser.launch });
    const body = serializeProgram(program({ successCondition: { text: 'Order shipped' } }));

    const result = await runner.runScript(script(body), applyTask());

    expect(result.error?.message).toBe(
      'Terminal condition not reached: expected text "Order shipped" not found on final page',
    );
  });

  it('fails before launching when a parameter is unbound', async () => {
    const browser = createFakeBrowser(formSite());
    const runner = createScriptRunner({ launch: browser.launch });
    const task = createTask({ target: FORM_URL, instructions: 'Submit the application form' });

    const result = await runner.runScript(script(serializeProgram(program())), task);

    expect(result.error?.message).toBe('No value bound for parameter "applicant"');
    expect(browser.launches).toBe(0);
  });

  it('fails on a body that is not a program', async () => {
    const runner = createScriptRunner({ launch: createFakeBrowser(formSite()).launch });

    const result = await runner.runScript(script('not a program'), applyTask());

    expect(result.success).toBe(false);
    expect(result.error?.message).toMatch(/^Script body is not a valid program: /);
  });

  it('fails without throwing when the signal is already aborted', async () => {
    const browser = createFakeBrowser(formSite());
    const runner = createScriptRunner({ launch: browser.launch });
    const controller = new AbortController();
    controller.abort();

    const result = await runner.runScript(script(serializeProgram(program())), applyTask(), {
      signal: controller.signal,
    });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('EXECUTION_FAILED');
    expect(browser.launches).toBe(0);
  });
});
