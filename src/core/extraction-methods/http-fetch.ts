/**
 * Plain HTTP GET used by the fetch-based methods
 */

import { fetch as undiciFetch, type Dispatcher } from 'undici';
import type { FetchedPage } from '../../types/index.js';
import type { FetchImpl } from './types.js';

export interface HttpFetchOptions {
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
  fetchImpl?: FetchImpl;
}

/**
 * GET a page and read its body. Non-2xx statuses are returned, not thrown:
 * the detector needs to see them.
 */
export async function fetchPage(url: string, options: HttpFetchOptions): Promise<FetchedPage> {
  const fetchImpl: FetchImpl = options.fetchImpl ?? undiciFetch;

  const response = await fetchImpl(url, {
    method: 'GET',
    headers: options.headers,
    redirect: 'follow',
    signal: options.signal,
    dispatcher: options.dispatcher,
  });

  const body = await response.text();
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
    finalUrl: response.url || url,
  };
}
