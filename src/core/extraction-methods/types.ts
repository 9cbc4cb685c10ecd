/**
 * Extraction method contracts
 */

import type { Dispatcher } from 'undici';
import type { ArticleContent, FetchedPage, MethodName } from '../../types/index.js';

export interface HttpRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
  /** Routes the request through a proxy when set */
  dispatcher?: Dispatcher;
}

/**
 * The parts of a fetch Response the methods read
 */
export interface HttpResponse {
  readonly status: number;
  readonly url: string;
  readonly headers: { forEach(callback: (value: string, key: string) => void): void };
  text(): Promise<string>;
}

/**
 * fetch() as the methods use it; injectable for tests
 */
export type FetchImpl = (input: string, init: HttpRequestInit) => Promise<HttpResponse>;

/**
 * One strategy for turning a URL into article content.
 *
 * The cascade owns the timeout: it aborts `signal` when `timeoutMs` passes
 * and methods must release whatever they hold when that happens.
 */
export interface ExtractionMethod {
  readonly name: MethodName;
  readonly timeoutMs: number;
  /** Whether a request for `url` leaves through a proxy */
  usesProxy(url: string): boolean;
  fetch(url: string, signal: AbortSignal): Promise<FetchedPage>;
  parse(page: FetchedPage): ArticleContent | null;
}

// ============================================
// BROWSER SESSIONS
// ============================================

export interface BrowserLoadOptions {
  navigationTimeoutMs: number;
  /** Wait after DOMContentLoaded for client-rendered bodies */
  settleMs: number;
}

/**
 * A live emulated browser bound to one page
 */
export interface BrowserSession {
  load(url: string, options: BrowserLoadOptions): Promise<FetchedPage>;
  /** Idempotent */
  close(): Promise<void>;
}

export interface BrowserSessionOptions {
  proxyUrl?: string;
  headless: boolean;
  userAgent?: string;
}

export interface BrowserSessionProvider {
  open(options: BrowserSessionOptions): Promise<BrowserSession>;
}
