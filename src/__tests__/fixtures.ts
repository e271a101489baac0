import type {
  AgentAction,
  Completion,
  ExplorationTrace,
  GeneratedScript,
  TaskSpec,
  TraceStep,
} from '../schema/index.js';
import { createTask, serializeProgram } from '../schema/index.js';
import { fingerprint } from '../core/fingerprint.js';
import type { FakePage } from './fakeBrowser.js';

// ── Application form site ────────────────────────────────────

export const FORM_URL = 'https://jobs.test/apply';
export const DONE_URL = 'https://jobs.test/apply/done';

export const COOKIE_ACCEPT = { strategy: 'css', value: '#cookie-accept' } as const;
export const NAME_INPUT = { strategy: 'testid', value: 'name-input' } as const;
export const EMAIL_INPUT = { strategy: 'testid', value: 'email-input' } as const;
export const SUBMIT = { strategy: 'testid', value: 'submit' } as const;
export const CONFIRMATION = { strategy: 'css', value: '#confirmation' } as const;
export const RELATED_ROLE = { strategy: 'text', value: 'Senior Engineer' } as const;

export function formPage(submitTestId = 'submit'): FakePage {
  return {
    title: 'Apply',
    text: 'Application form',
    elements: [
      { selector: COOKIE_ACCEPT, text: 'Accept cookies', dismiss: true },
      { selector: NAME_INPUT, tag: 'input' },
      { selector: EMAIL_INPUT, tag: 'input' },
      { selector: RELATED_ROLE, tag: 'a', text: 'Senior Engineer' },
      { selector: { strategy: 'testid', value: submitTestId }, text: 'Submit', href: DONE_URL },
    ],
  };
}

export function donePage(): FakePage {
  return {
    title: 'Thanks',
    text: 'Thanks Ada Lovelace, application received',
    elements: [{ selector: CONFIRMATION, tag: 'p', text: 'REF-1042' }],
  };
}

export function formSite(): Record<string, FakePage> {
  return { [FORM_URL]: formPage(), [DONE_URL]: donePage() };
}

export function applyTask(): TaskSpec {
  return createTask({
    name: 'apply',
    target: FORM_URL,
    instructions: 'Submit the application form',
    constraints: { applicant: 'Ada Lovelace', email: 'ada@example.test' },
  });
}

// ── Agent replies ────────────────────────────────────────────

export function reply(value: unknown): string {
  return JSON.stringify(value);
}

const acceptCookies = reply({
  done: false,
  action: { type: 'click', description: 'Accept cookies', selector: COOKIE_ACCEPT },
  rationale: 'Cookie banner covers the form',
  basis: 'structural',
  obstacle: { kind: 'cookie_banner', selector: COOKIE_ACCEPT },
});

const fillName = reply({
  done: false,
  action: { type: 'type', description: 'Fill name', selector: NAME_INPUT, value: 'Ada Lovelace' },
  rationale: 'Name field is empty',
  basis: 'structural',
});

const fillEmail = reply({
  done: false,
  action: { type: 'type', description: 'Fill email', selector: EMAIL_INPUT, value: 'ada@example.test' },
  rationale: 'Email field is empty',
  basis: 'structural',
});

function clickSubmit(testId: string): string {
  return reply({
    done: false,
    action: { type: 'click', description: 'Submit form', selector: { strategy: 'testid', value: testId } },
    rationale: 'Form is filled in',
    basis: 'structural',
  });
}

const readReference = reply({
  done: false,
  action: { type: 'extract', description: 'Read reference', selector: CONFIRMATION, name: 'reference' },
  rationale: 'Reference number shown on page',
  basis: 'structural',
});

/** A structural run through the form that ends on the confirmation page. */
export function applyReplies(evidence = 'application received'): string[] {
  return [
    acceptCookies,
    fillName,
    fillEmail,
    clickSubmit('submit'),
    readReference,
    reply({ done: true, summary: 'Application submitted', evidence }),
  ];
}

/** The same run against a form whose submit button was renamed. */
export function renamedSubmitReplies(testId: string): string[] {
  return [
    acceptCookies,
    fillName,
    fillEmail,
    clickSubmit(testId),
    reply({ done: true, summary: 'Application submitted after redesign' }),
  ];
}

/** A run whose choices depend on reading the page for meaning. */
export function interpretiveReplies(): string[] {
  return [
    reply({
      done: false,
      action: { type: 'click', description: 'Open listing', selector: RELATED_ROLE },
      rationale: 'Pick the most relevant listing for the applicant',
      basis: 'interpretation',
    }),
    reply({ done: true, summary: 'Chose a listing' }),
  ];
}

// ── Trace builders ───────────────────────────────────────────

const NAVIGATE: AgentAction = { type: 'navigate', value: FORM_URL, description: 'Open task target' };

export function traceStep(overrides: Partial<TraceStep> = {}): TraceStep {
  return {
    index: 0,
    observation: { url: FORM_URL, title: 'Apply', summary: '0 interactive elements; Application form' },
    action: NAVIGATE,
    outcome: 'success',
    rationale: 'Task entry point',
    basis: 'structural',
    ...overrides,
  };
}

export function makeTrace(
  steps: TraceStep[],
  task: TaskSpec = applyTask(),
  completion: Partial<Completion> = {},
): ExplorationTrace {
  return {
    traceId: 'trace-1',
    fingerprint: fingerprint(task),
    target: task.target,
    startedAt: '2026-10-19T10:00:00.000Z',
    finishedAt: '2026-10-19T10:01:00.000Z',
    steps: steps.map((step, index) => ({ ...step, index })),
    completion: { summary: 'done', url: DONE_URL, data: {}, ...completion },
  };
}

// ── Stored scripts ───────────────────────────────────────────

export function storedScript(overrides: Partial<GeneratedScript> = {}): GeneratedScript {
  return {
    fingerprint: fingerprint(applyTask()),
    body: serializeProgram({
      version: 1,
      instructions: [{ op: 'navigate', url: '{{target}}' }],
      obstacleHandlers: [],
      successCondition: { text: 'Application form' },
    }),
    requiredParameters: [],
    validation: 'PASSED',
    createdAt: '2026-10-19T12:00:00.000Z',
    sourceTrace: makeTrace([traceStep()]),
    ...overrides,
  };
}
