/**
 * Playwright-backed browser sessions
 *
 * playwright-core is loaded lazily so the HTTP methods keep working on
 * hosts without a Chromium build. A launch failure surfaces as an ordinary
 * method error and the cascade moves on.
 */

import type { Browser } from 'playwright-core';
import type { FetchedPage } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type {
  BrowserLoadOptions,
  BrowserSession,
  BrowserSessionOptions,
  BrowserSessionProvider,
} from './types.js';

const log = logger.browser;

type PlaywrightModule = typeof import('playwright-core');

let playwrightModule: PlaywrightModule | null = null;
let playwrightLoadAttempted = false;
let playwrightLoadError: string | null = null;

/**
 * Try to load playwright-core dynamically
 */
async function tryLoadPlaywright(): Promise<PlaywrightModule | null> {
  if (playwrightLoadAttempted) {
    return playwrightModule;
  }

  playwrightLoadAttempted = true;

  try {
    playwrightModule = await import('playwright-core');
    return playwrightModule;
  } catch (error) {
    playwrightLoadError = error instanceof Error ? error.message : 'Failed to load playwright-core';
    log.warn('playwright-core not available; browser emulation disabled', { error: playwrightLoadError });
    return null;
  }
}

/**
 * Split a proxy URL into Playwright's proxy settings
 */
export function toPlaywrightProxy(proxyUrl: string): { server: string; username?: string; password?: string } {
  const parsed = new URL(proxyUrl);
  return {
    server: `${parsed.protocol}//${parsed.host}`,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };
}

class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly userAgent: string | undefined
  ) {}

  async load(url: string, options: BrowserLoadOptions): Promise<FetchedPage> {
    const context = await this.browser.newContext({ userAgent: this.userAgent });
    const page = await context.newPage();

    const response = await page.goto(url, {
      timeout: options.navigationTimeoutMs,
      waitUntil: 'domcontentloaded',
    });
    if (options.settleMs > 0) {
      await page.waitForTimeout(options.settleMs);
    }

    return {
      // A navigation with no response (same-document) has nothing to classify
      status: response ? response.status() : 0,
      headers: response ? await response.allHeaders() : {},
      body: await page.content(),
      finalUrl: page.url(),
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }
}

export interface PlaywrightSessionProviderOptions {
  /** Chromium executable; defaults to Playwright's own lookup */
  executablePath?: string;
}

export class PlaywrightSessionProvider implements BrowserSessionProvider {
  constructor(private readonly options: PlaywrightSessionProviderOptions = {}) {}

  async open(options: BrowserSessionOptions): Promise<BrowserSession> {
    const pw = await tryLoadPlaywright();
    if (!pw) {
      throw new Error(
        `playwright-core is not installed (${playwrightLoadError ?? 'unknown error'}). ` +
        'Install it with: npm install playwright-core'
      );
    }

    const browser = await pw.chromium.launch({
      headless: options.headless,
      executablePath: this.options.executablePath,
      proxy: options.proxyUrl ? toPlaywrightProxy(options.proxyUrl) : undefined,
    });

    log.debug('Browser session opened', { proxied: Boolean(options.proxyUrl) });
    return new PlaywrightSession(browser, options.userAgent);
  }
}
