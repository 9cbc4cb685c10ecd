/**
 * Browser emulation extraction method
 *
 * Last resort: a full emulated browser, optionally behind a proxy, with a
 * longer timeout than the HTTP methods. The session is closed on every
 * path, including when the cascade aborts the attempt mid-navigation.
 */

import type { ArticleContent, FetchedPage } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { TIMEOUTS } from '../../utils/timeouts.js';
import { parseHeuristicArticle, parseStructuredArticle } from '../article-parser.js';
import { BROWSER_PROFILES } from './header-profiles.js';
import type {
  BrowserSession,
  BrowserSessionProvider,
  ExtractionMethod,
} from './types.js';

const log = logger.browser;

export interface BrowserEmulationMethodOptions {
  provider: BrowserSessionProvider;
  timeoutMs?: number;
  navigationTimeoutMs?: number;
  settleMs?: number;
  proxyUrl?: string;
  headless?: boolean;
}

export class BrowserAbortedError extends Error {
  constructor(url: string) {
    super(`Browser load aborted: ${url}`);
    this.name = 'BrowserAbortedError';
  }
}

async function closeSession(session: BrowserSession, url: string): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    log.warn('Failed to close browser session', { url, error: String(error) });
  }
}

export class BrowserEmulationMethod implements ExtractionMethod {
  readonly name = 'browser_emulation' as const;
  readonly timeoutMs: number;
  private readonly provider: BrowserSessionProvider;
  private readonly navigationTimeoutMs: number;
  private readonly settleMs: number;
  private readonly proxyUrl?: string;
  private readonly headless: boolean;

  constructor(options: BrowserEmulationMethodOptions) {
    this.provider = options.provider;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.BROWSER_METHOD;
    // Navigation must finish inside the attempt budget
    this.navigationTimeoutMs = Math.min(
      options.navigationTimeoutMs ?? TIMEOUTS.BROWSER_NAVIGATION,
      this.timeoutMs
    );
    this.settleMs = options.settleMs ?? TIMEOUTS.BROWSER_SETTLE;
    this.proxyUrl = options.proxyUrl;
    this.headless = options.headless ?? true;
  }

  usesProxy(): boolean {
    return Boolean(this.proxyUrl);
  }

  async fetch(url: string, signal: AbortSignal): Promise<FetchedPage> {
    if (signal.aborted) {
      throw new BrowserAbortedError(url);
    }

    const session = await this.provider.open({
      proxyUrl: this.proxyUrl,
      headless: this.headless,
      userAgent: BROWSER_PROFILES.chrome_120.userAgent,
    });

    let rejectAborted: (error: Error) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject;
    });
    const onAbort = (): void => {
      log.debug('Aborting browser load', { url });
      rejectAborted(new BrowserAbortedError(url));
      void closeSession(session, url);
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      if (signal.aborted) {
        throw new BrowserAbortedError(url);
      }
      return await Promise.race([
        session.load(url, {
          navigationTimeoutMs: this.navigationTimeoutMs,
          settleMs: this.settleMs,
        }),
        aborted,
      ]);
    } finally {
      signal.removeEventListener('abort', onAbort);
      await closeSession(session, url);
    }
  }

  /**
   * Rendered pages often keep their JSON-LD; prefer it, then fall back to
   * the paragraph heuristic
   */
  parse(page: FetchedPage): ArticleContent | null {
    return parseStructuredArticle(page.body) ?? parseHeuristicArticle(page.body);
  }
}
