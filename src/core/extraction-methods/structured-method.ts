/**
 * Structured-metadata extraction method
 *
 * Cheapest method: one GET with desktop browser headers, then JSON-LD,
 * meta tags and itemprop markup.
 */

import type { ArticleContent, FetchedPage } from '../../types/index.js';
import { TIMEOUTS } from '../../utils/timeouts.js';
import { parseStructuredArticle } from '../article-parser.js';
import { headersForProfile } from './header-profiles.js';
import { fetchPage } from './http-fetch.js';
import type { ProxyRouter } from './proxy-router.js';
import type { ExtractionMethod, FetchImpl } from './types.js';

export interface StructuredMethodOptions {
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
  proxy?: ProxyRouter;
}

export class StructuredMethod implements ExtractionMethod {
  readonly name = 'structured' as const;
  readonly timeoutMs: number;
  private readonly fetchImpl?: FetchImpl;
  private readonly proxy?: ProxyRouter;

  constructor(options: StructuredMethodOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.STRUCTURED_METHOD;
    this.fetchImpl = options.fetchImpl;
    this.proxy = options.proxy;
  }

  usesProxy(url: string): boolean {
    return this.proxy?.usesProxy(url) ?? false;
  }

  fetch(url: string, signal: AbortSignal): Promise<FetchedPage> {
    return fetchPage(url, {
      headers: headersForProfile('chrome_120'),
      signal,
      dispatcher: this.proxy?.dispatcherFor(url),
      fetchImpl: this.fetchImpl,
    });
  }

  parse(page: FetchedPage): ArticleContent | null {
    return parseStructuredArticle(page.body);
  }
}
