/**
 * Shared types for the extraction resilience engine
 */

// ============================================
// PROTECTION & DETECTION
// ============================================

/**
 * Classified category of an anti-automation response
 */
export type ProtectionKind =
  | 'rate_limited'
  | 'cloudflare_challenge'
  | 'captcha'
  | 'generic_block'
  | 'server_block'
  | 'suspicious_short_response';

/**
 * Event types recorded in the bot detection audit log
 */
export type BotDetectionEventType =
  | 'rate_limit_429'
  | 'forbidden_403'
  | 'captcha_detected'
  | 'connection_timeout'
  | 'multiple_failures';

export const BOT_DETECTION_EVENT_TYPES: readonly BotDetectionEventType[] = [
  'rate_limit_429',
  'forbidden_403',
  'captcha_detected',
  'connection_timeout',
  'multiple_failures',
];

/**
 * Header bag as received from fetch() or a browser response.
 * Values may be arrays when a header repeats.
 */
export type ResponseHeaders = Record<string, string | string[] | undefined>;

// ============================================
// DOMAIN SENSITIVITY
// ============================================

export interface DomainSensitivity {
  domain: string;
  /** Integer in [1, 10] */
  level: number;
  encounters: number;
  lastDetectionAt: number | null;
  cooldownUntil: number | null;
  /** Consecutive successes since the last detection or decay step */
  successStreak: number;
}

export interface BotDetectionEvent {
  domain: string;
  eventType: BotDetectionEventType;
  detectedAt: number;
  url?: string;
  httpStatus?: number | null;
  protectionKind?: ProtectionKind | null;
  previousLevel: number;
  newLevel: number;
  /** False when the event landed inside an active cooldown */
  adjusted: boolean;
}

/**
 * Extra context for a detection record
 */
export interface DetectionDetails {
  url?: string;
  httpStatus?: number | null;
  protectionKind?: ProtectionKind | null;
  /**
   * Identity of the detected instance. A second record with the same key is
   * treated as a retry of that instance and ignored.
   */
  instanceKey?: string;
}

export interface SensitivityPolicy {
  /** Inter-request delay bounds in seconds */
  interRequestDelayRange: readonly [number, number];
  batchPauseSeconds: number;
  /** Backoff bounds in seconds */
  backoffRange: readonly [number, number];
}

// ============================================
// EXTRACTION
// ============================================

export type MethodName = 'structured' | 'heuristic_dom' | 'browser_emulation';

/**
 * Raw response a method hands to the detector and parser
 */
export interface FetchedPage {
  status: number;
  headers: ResponseHeaders;
  body: string;
  finalUrl: string;
}

export interface ArticleContent {
  title: string;
  author: string | null;
  publishedAt: string | null;
  bodyText: string;
}

export type AttemptOutcome = 'success' | 'not_found' | 'rate_limited' | 'failed';

export interface ExtractionAttempt {
  url: string;
  domain: string;
  methodsTried: MethodName[];
  finalMethod: MethodName | null;
  outcome: AttemptOutcome;
  elapsedMs: number;
  httpStatus: number | null;
  protectionKind: ProtectionKind | null;
  proxyUsed: boolean;
}

/**
 * Record handed downstream (cleaning, NER, classification) for successes only
 */
export interface ExtractedArticle {
  url: string;
  title: string;
  author: string | null;
  publishedAt: string | null;
  bodyText: string;
  extractionMethodUsed: MethodName;
}

// ============================================
// UPSTREAM / DOWNSTREAM
// ============================================

export interface CandidateUrl {
  url: string;
  domain: string;
  sourceId: string;
  status: 'candidate';
}

/**
 * One of four outcome classes emitted per URL
 */
export type UrlOutcome =
  | { class: 'extracted'; candidate: CandidateUrl; article: ExtractedArticle; attempt: ExtractionAttempt }
  | { class: 'not_found'; candidate: CandidateUrl; attempt: ExtractionAttempt }
  | { class: 'failed'; candidate: CandidateUrl; attempt: ExtractionAttempt; reason: string }
  | { class: 'pending'; candidate: CandidateUrl; attempt: ExtractionAttempt | null; retryAfterMs: number };

export type OutcomeClass = UrlOutcome['class'];

export interface DomainPartition {
  index: number;
  count: number;
}

// ============================================
// TELEMETRY
// ============================================

export interface ExtractionTelemetryRecord {
  url: string;
  domain: string;
  methodsAttempted: MethodName[];
  successfulMethod: MethodName | null;
  httpStatus: number | null;
  detectedProtectionKind: ProtectionKind | null;
  elapsedMs: number;
  proxyUsed: boolean;
  recordedAt: string;
}

// ============================================
// BATCHES
// ============================================

export interface BatchResult {
  processed: number;
  /** URLs skipped because their domain was cooling down */
  skippedDomains: number;
  /** Domain of every processed URL, in processing order */
  domainsProcessed: string[];
  /** Longest run of consecutive same-domain URLs, counted as repeats */
  sameDomainConsecutive: number;
  errors: number;
  outcomes: Record<OutcomeClass, number>;
  /** Distinct domains found in cooldown during the batch */
  cooledDownDomains: string[];
}

export type PauseKind = 'long' | 'short';

export interface PauseDecision {
  kind: PauseKind;
  reason: string;
  pauseMs: number;
}
