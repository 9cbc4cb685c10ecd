/**
 * Bot Protection Detector
 *
 * Classifies an HTTP response (status, headers, body) into a protection kind
 * or null. Pure: no I/O, no state, and never throws on null, undefined or
 * empty input.
 *
 * Rule order:
 * 1. 429 is always rate limiting
 * 2. not-found statuses are never protection (the cascade handles them)
 * 3. blocking statuses are matched against signature families, then the
 *    short-response heuristic, then fall back to server_block
 * 4. 2xx bodies that are small enough to be an interstitial and carry no
 *    article markup are matched against the narrower challenge-page
 *    signatures
 */

import type {
  BotDetectionEventType,
  FetchedPage,
  ProtectionKind,
  ResponseHeaders,
} from '../types/index.js';
import {
  detectorConfigSchema,
  type DetectorConfig,
  type SignatureFamilies,
} from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';

const log = logger.detector;

export type DetectorOptions = DetectorConfig;

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = detectorConfigSchema.parse({});

/** Order in which signature families are checked */
const SIGNATURE_ORDER: ReadonlyArray<keyof SignatureFamilies> = [
  'cloudflare_challenge',
  'captcha',
  'generic_block',
];

// ============================================
// HELPERS
// ============================================

/**
 * Case-insensitive header lookup; repeated headers are joined with ', '
 */
export function getHeader(headers: ResponseHeaders | null | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? value.join(', ') : value;
  }
  return undefined;
}

function containsKeywords(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword.toLowerCase()));
}

function matchSignatureFamily(
  lowerBody: string,
  headers: ResponseHeaders | null | undefined,
  signatures: SignatureFamilies
): ProtectionKind | null {
  if (getHeader(headers, 'cf-mitigated')?.toLowerCase() === 'challenge') {
    return 'cloudflare_challenge';
  }
  if (!lowerBody) return null;

  for (const family of SIGNATURE_ORDER) {
    if (containsKeywords(lowerBody, signatures[family])) {
      return family;
    }
  }
  return null;
}

function byteLength(body: string): number {
  return Buffer.byteLength(body, 'utf8');
}

// ============================================
// CLASSIFICATION
// ============================================

/**
 * Classify a response into a protection kind, or null when the response
 * shows no sign of anti-automation defenses.
 */
export function classifyProtection(
  status: number | null | undefined,
  headers: ResponseHeaders | null | undefined,
  body: string | null | undefined,
  options: DetectorOptions = DEFAULT_DETECTOR_OPTIONS
): ProtectionKind | null {
  if (typeof status !== 'number' || !Number.isFinite(status)) {
    return null;
  }

  if (status === 429) {
    return 'rate_limited';
  }

  if (options.notFoundStatuses.includes(status)) {
    return null;
  }

  const text = typeof body === 'string' ? body : '';
  const lowerBody = text.toLowerCase();

  if (options.blockingStatuses.includes(status)) {
    const family = matchSignatureFamily(lowerBody, headers, options.signatures);
    if (family) {
      return family;
    }
    if (options.shortResponseStatuses.includes(status) && byteLength(text) < options.minResponseBytes) {
      return 'suspicious_short_response';
    }
    return 'server_block';
  }

  if (status >= 200 && status < 300) {
    if (byteLength(text) > options.maxChallengePageBytes) {
      return null;
    }
    if (containsKeywords(lowerBody, options.articleMarkers)) {
      return null;
    }
    return matchSignatureFamily(lowerBody, headers, options.challengePageSignatures);
  }

  return null;
}

/**
 * Map a protection kind to the audit-log event type it escalates with
 */
export function eventTypeForProtection(kind: ProtectionKind, status: number | null): BotDetectionEventType {
  switch (kind) {
    case 'rate_limited':
      return 'rate_limit_429';
    case 'cloudflare_challenge':
    case 'captcha':
      return 'captcha_detected';
    case 'generic_block':
    case 'suspicious_short_response':
      return 'forbidden_403';
    case 'server_block':
      return status !== null && status >= 500 ? 'multiple_failures' : 'forbidden_403';
  }
}

export function describeProtection(kind: ProtectionKind): string {
  switch (kind) {
    case 'rate_limited':
      return 'Rate limited (HTTP 429)';
    case 'cloudflare_challenge':
      return 'Cloudflare browser challenge';
    case 'captcha':
      return 'CAPTCHA challenge';
    case 'generic_block':
      return 'Access blocked by bot protection';
    case 'server_block':
      return 'Blocked by server';
    case 'suspicious_short_response':
      return 'Suspiciously short blocking response';
  }
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfterMs(
  headers: ResponseHeaders | null | undefined,
  now: number = Date.now()
): number | null {
  const value = getHeader(headers, 'retry-after')?.trim();
  if (!value) return null;

  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

// ============================================
// DETECTOR
// ============================================

/**
 * Detector bound to one configuration
 */
export class BotProtectionDetector {
  readonly options: DetectorOptions;

  constructor(options: Partial<DetectorOptions> = {}) {
    this.options = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
  }

  classify(
    status: number | null | undefined,
    headers: ResponseHeaders | null | undefined,
    body: string | null | undefined
  ): ProtectionKind | null {
    return classifyProtection(status, headers, body, this.options);
  }

  classifyPage(page: FetchedPage, context: { url?: string; method?: string } = {}): ProtectionKind | null {
    const kind = this.classify(page.status, page.headers, page.body);
    if (kind) {
      log.debug('Protection detected', {
        ...context,
        status: page.status,
        protectionKind: kind,
      });
    }
    return kind;
  }

  isNotFound(status: number): boolean {
    return this.options.notFoundStatuses.includes(status);
  }
}
