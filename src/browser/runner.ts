import { chromium, errors } from 'playwright';
import type { Browser, Page } from 'playwright';

import type {
  ActionOutcome,
  AgentAction,
  PageSnapshot,
  SelectorHint,
  WaitAction,
} from '../schema/index.js';
import { TIMEOUTS, TOKEN_GUARDS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { observePage } from './prescan.js';
import { resolveSelector } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
}

/**
 * The browser-automation capability. Everything the pipeline knows about
 * a live page goes through these five calls.
 */
export interface BrowserSession {
  navigate(url: string): Promise<void>;
  observe(): Promise<PageSnapshot>;
  act(action: AgentAction): Promise<ActionOutcome>;
  /** Without a timeout this checks the page as it is, without waiting. */
  isPresent(selector: SelectorHint, timeout?: number): Promise<boolean>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  /** Aborting closes the session; later calls reject. */
  signal?: AbortSignal | undefined;
}

export type BrowserLauncher = (options?: LaunchOptions) => Promise<BrowserSession>;

// ── Launcher ─────────────────────────────────────────────────

export function createPlaywrightLauncher(config: RunnerConfig): BrowserLauncher {
  return async (options?: LaunchOptions): Promise<BrowserSession> => {
    options?.signal?.throwIfAborted();

    const browser = await chromium.launch({ headless: config.headless });
    const context = await browser.newContext();
    const page = await context.newPage();

    return createPlaywrightSession(browser, page, options?.signal);
  };
}

function createPlaywrightSession(
  browser: Browser,
  page: Page,
  signal: AbortSignal | undefined,
): BrowserSession {
  let closed = false;

  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    signal?.removeEventListener('abort', onAbort);
    await browser.close();
  };

  // Cancellation must not leave an automated session acting.
  function onAbort(): void {
    log.warn('Abort received, closing browser session');
    close().catch((err: unknown) => {
      log.error(`Browser close after abort failed: ${String(err)}`);
    });
  }

  signal?.addEventListener('abort', onAbort, { once: true });

  function ensureOpen(): void {
    signal?.throwIfAborted();
    if (closed) throw new Error('Browser session is closed');
  }

  return {
    async navigate(url: string): Promise<void> {
      ensureOpen();
      await page.goto(url, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
    },

    async observe(): Promise<PageSnapshot> {
      ensureOpen();
      return observePage(page);
    },

    async act(action: AgentAction): Promise<ActionOutcome> {
      ensureOpen();
      try {
        const text = await performAction(page, action);
        return { ok: true, text };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    },

    async isPresent(selector: SelectorHint, timeout?: number): Promise<boolean> {
      ensureOpen();
      const locator = resolveSelector(page, selector).first();
      if (timeout === undefined) return locator.isVisible();
      try {
        await locator.waitFor({ state: 'visible', timeout });
        return true;
      } catch (err) {
        if (err instanceof errors.TimeoutError) return false;
        throw err;
      }
    },

    close,
  };
}

// ── Action dispatch ──────────────────────────────────────────

async function performAction(
  page: Page,
  action: AgentAction,
): Promise<string | undefined> {
  switch (action.type) {
    case 'navigate':
      await page.goto(action.value, {
        timeout: action.timeout ?? TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
      return undefined;

    case 'click': {
      const locator = resolveSelector(page, action.selector);
      await locator.first().click({
        timeout: action.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return undefined;
    }

    case 'type': {
      const locator = resolveSelector(page, action.selector);
      await locator.first().fill(action.value, {
        timeout: action.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return undefined;
    }

    case 'select': {
      const locator = resolveSelector(page, action.selector);
      await locator.first().selectOption(action.value, {
        timeout: action.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return undefined;
    }

    case 'press_key':
      if (action.selector) {
        await resolveSelector(page, action.selector).first().press(action.value, {
          timeout: action.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
        });
      } else {
        await page.keyboard.press(action.value);
      }
      return undefined;

    case 'wait':
      await handleWait(page, action);
      return undefined;

    case 'scroll':
      await page.mouse.wheel(0, action.value === 'up' ? -600 : 600);
      return undefined;

    case 'extract': {
      const locator = resolveSelector(page, action.selector).first();
      await locator.waitFor({
        state: 'visible',
        timeout: action.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      const text = await locator.innerText();
      return text.trim().slice(0, TOKEN_GUARDS.MAX_EXTRACT_CHARS);
    }
  }
}

// ── Wait handling ────────────────────────────────────────────

async function handleWait(page: Page, action: WaitAction): Promise<void> {
  const timeout = action.timeout ?? TIMEOUTS.ACTION_TIMEOUT;

  if (action.selector) {
    const locator = resolveSelector(page, action.selector);
    await locator.first().waitFor({ state: 'visible', timeout });
  } else if (action.value) {
    const ms = Number(action.value);
    if (!Number.isNaN(ms)) {
      await page.waitForTimeout(ms);
    } else {
      await page.getByText(action.value).first().waitFor({ state: 'visible', timeout });
    }
  } else {
    await page.waitForLoadState('domcontentloaded', { timeout });
  }
}
