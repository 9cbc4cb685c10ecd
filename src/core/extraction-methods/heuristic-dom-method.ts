/**
 * Heuristic DOM extraction method
 *
 * GET with a rotated browser header profile, then the densest-paragraph
 * heuristic. Works on pages with no structured article markup.
 */

import type { ArticleContent, FetchedPage } from '../../types/index.js';
import { TIMEOUTS } from '../../utils/timeouts.js';
import { parseHeuristicArticle } from '../article-parser.js';
import { ProfileRotator, headersForProfile } from './header-profiles.js';
import { fetchPage } from './http-fetch.js';
import type { ProxyRouter } from './proxy-router.js';
import type { ExtractionMethod, FetchImpl } from './types.js';

export interface HeuristicDomMethodOptions {
  timeoutMs?: number;
  fetchImpl?: FetchImpl;
  proxy?: ProxyRouter;
  rotator?: ProfileRotator;
}

export class HeuristicDomMethod implements ExtractionMethod {
  readonly name = 'heuristic_dom' as const;
  readonly timeoutMs: number;
  private readonly fetchImpl?: FetchImpl;
  private readonly proxy?: ProxyRouter;
  private readonly rotator: ProfileRotator;

  constructor(options: HeuristicDomMethodOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.HEURISTIC_METHOD;
    this.fetchImpl = options.fetchImpl;
    this.proxy = options.proxy;
    this.rotator = options.rotator ?? new ProfileRotator();
  }

  usesProxy(url: string): boolean {
    return this.proxy?.usesProxy(url) ?? false;
  }

  fetch(url: string, signal: AbortSignal): Promise<FetchedPage> {
    return fetchPage(url, {
      headers: headersForProfile(this.rotator.next()),
      signal,
      dispatcher: this.proxy?.dispatcherFor(url),
      fetchImpl: this.fetchImpl,
    });
  }

  parse(page: FetchedPage): ArticleContent | null {
    return parseHeuristicArticle(page.body);
  }
}
