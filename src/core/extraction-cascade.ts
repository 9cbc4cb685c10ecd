/**
 * Extraction Method Cascade
 *
 * Tries extraction methods in order (structured → heuristic DOM → browser
 * emulation) until one yields an article, a terminal not-found, or the
 * methods run out. The control flow is driven by the pure state machine in
 * cascade-state.ts; this class performs the I/O each state asks for.
 *
 * Rules the state machine encodes:
 * - Domain cooldown is consulted once, before the first method.
 * - 404/410 from any method ends the cascade; later methods never run.
 * - A protection response is recorded in the sensitivity store and the
 *   cascade moves on to the next method.
 * - Fallback methods skip a domain after too many consecutive failures,
 *   until the suppression window passes or the domain yields an article.
 */

import type {
  ExtractedArticle,
  ExtractionAttempt,
  FetchedPage,
  ArticleContent,
  MethodName,
  ProtectionKind,
  AttemptOutcome,
  BotDetectionEventType,
  DetectionDetails,
} from '../types/index.js';
import { cascadeConfigSchema, type CascadeConfig } from '../utils/config-schemas.js';
import { getDomain } from '../utils/domain.js';
import { logger } from '../utils/logger.js';
import {
  BotProtectionDetector,
  eventTypeForProtection,
  parseRetryAfterMs,
} from './bot-protection-detector.js';
import {
  INITIAL_STATE,
  transition,
  type CascadeEvent,
  type CascadeState,
} from './cascade-state.js';
import type { DomainSensitivityStore } from './domain-sensitivity-store.js';
import {
  GenericExtractionError,
  NotFoundError,
  RateLimitedError,
} from './extraction-errors.js';
import type { ExtractionMethod } from './extraction-methods/types.js';
import type { TelemetryRecorder } from './telemetry-writer.js';

const log = logger.cascade;

export interface CascadeResult {
  article: ExtractedArticle;
  attempt: ExtractionAttempt;
}

export interface ExtractionCascadeOptions {
  store: DomainSensitivityStore;
  methods: readonly ExtractionMethod[];
  detector?: BotProtectionDetector;
  telemetry?: TelemetryRecorder | null;
  config?: Partial<CascadeConfig>;
  now?: () => number;
}

export class MethodTimeoutError extends Error {
  constructor(method: MethodName, timeoutMs: number) {
    super(`${method} timed out after ${timeoutMs}ms`);
    this.name = 'MethodTimeoutError';
  }
}

/**
 * Result of one method attempt, before it becomes a state machine event
 */
type MethodOutcome =
  | { type: 'success'; page: FetchedPage; content: ArticleContent }
  | { type: 'not_found'; status: number }
  | { type: 'protection'; kind: ProtectionKind; status: number; retryAfterMs: number | null }
  | { type: 'error'; message: string; status: number | null; timedOut: boolean };

/**
 * Reject when the signal aborts, whether or not the method honors it
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, onAbortError: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(onAbortError());
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

interface MethodFailureRecord {
  count: number;
  lastFailureAt: number;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export class ExtractionCascade {
  private readonly store: DomainSensitivityStore;
  private readonly methods: readonly ExtractionMethod[];
  private readonly methodNames: readonly MethodName[];
  private readonly detector: BotProtectionDetector;
  private readonly telemetry: TelemetryRecorder | null;
  private readonly config: CascadeConfig;
  private readonly now: () => number;

  /** Consecutive failures keyed by `${domain}|${method}` */
  private methodFailures: Map<string, MethodFailureRecord> = new Map();

  constructor(options: ExtractionCascadeOptions) {
    this.store = options.store;
    this.methods = options.methods;
    this.methodNames = options.methods.map((method) => method.name);
    this.detector = options.detector ?? new BotProtectionDetector();
    this.telemetry = options.telemetry ?? null;
    this.config = { ...cascadeConfigSchema.parse({}), ...options.config };
    this.now = options.now ?? Date.now;
  }

  /**
   * Extract one article.
   *
   * @throws NotFoundError when the article is gone
   * @throws RateLimitedError when the domain is cooling down or every method
   * that ran hit bot protection
   * @throws GenericExtractionError when no method produced usable content
   */
  async extract(url: string, domainHint?: string): Promise<CascadeResult> {
    const startTime = this.now();
    const domain = getDomain(domainHint ?? url);

    const methodsTried: MethodName[] = [];
    const causes: Array<{ method: string; message: string }> = [];
    let httpStatus: number | null = null;
    let protectionKind: ProtectionKind | null = null;
    let proxyUsed = false;
    let timeouts = 0;
    let retryAfterHintMs = 0;
    let success: { method: MethodName; content: ArticleContent } | null = null;

    let state: CascadeState = transition(
      INITIAL_STATE,
      { type: 'start', cooldownActive: this.store.isInCooldown(domain) },
      this.methodNames
    );

    while (state.kind === 'trying') {
      const index = state.index;
      const method = this.methods[index];

      // Only fallbacks are skipped; the first method always runs
      if (index > 0 && this.isMethodSuppressed(domain, method.name)) {
        log.debug('Skipping method after repeated failures', {
          domain,
          method: method.name,
          failures: this.getMethodFailureCount(domain, method.name),
        });
        state = transition(state, { type: 'skipped' }, this.methodNames);
        continue;
      }

      methodsTried.push(method.name);
      if (method.usesProxy(url)) proxyUsed = true;

      const outcome = await this.runMethod(method, url);
      let event: CascadeEvent;

      switch (outcome.type) {
        case 'success':
          httpStatus = outcome.page.status;
          this.resetMethodFailures(domain, index);
          success = { method: method.name, content: outcome.content };
          event = { type: 'success' };
          break;

        case 'not_found':
          httpStatus = outcome.status;
          event = { type: 'not_found' };
          break;

        case 'protection':
          httpStatus = outcome.status;
          protectionKind = outcome.kind;
          retryAfterHintMs = Math.max(retryAfterHintMs, outcome.retryAfterMs ?? 0);
          this.incrementMethodFailures(domain, method.name);
          await this.recordDetection(domain, eventTypeForProtection(outcome.kind, outcome.status), {
            url,
            httpStatus: outcome.status,
            protectionKind: outcome.kind,
          });
          log.warn('Bot protection encountered', {
            domain,
            url,
            method: method.name,
            status: outcome.status,
            protectionKind: outcome.kind,
          });
          event = { type: 'protection', kind: outcome.kind };
          break;

        case 'error':
          if (outcome.status !== null) httpStatus = outcome.status;
          if (outcome.timedOut) timeouts++;
          this.incrementMethodFailures(domain, method.name);
          causes.push({ method: method.name, message: outcome.message });
          log.debug('Method failed', { domain, url, method: method.name, error: outcome.message });
          event = { type: 'error' };
          break;
      }

      state = transition(state, event, this.methodNames);
    }

    const buildAttempt = (outcome: AttemptOutcome, finalMethod: MethodName | null): ExtractionAttempt => ({
      url,
      domain,
      methodsTried: [...methodsTried],
      finalMethod,
      outcome,
      elapsedMs: this.now() - startTime,
      httpStatus,
      protectionKind,
      proxyUsed,
    });

    switch (state.kind) {
      case 'succeeded': {
        const attempt = buildAttempt('success', state.method);
        this.emitTelemetry(attempt);
        await this.recordSuccess(domain);

        if (!success) {
          throw new GenericExtractionError(attempt, [{ method: state.method, message: 'no content captured' }]);
        }

        log.info('Article extracted', {
          domain,
          url,
          method: state.method,
          methodsTried: attempt.methodsTried,
          durationMs: attempt.elapsedMs,
        });

        return {
          attempt,
          article: {
            url,
            title: success.content.title,
            author: success.content.author,
            publishedAt: success.content.publishedAt,
            bodyText: success.content.bodyText,
            extractionMethodUsed: success.method,
          },
        };
      }

      case 'not_found': {
        const attempt = buildAttempt('not_found', state.method);
        this.emitTelemetry(attempt);
        log.info('Article not found', { domain, url, status: httpStatus, method: state.method });
        throw new NotFoundError(attempt);
      }

      case 'blocked': {
        const attempt = buildAttempt('rate_limited', null);
        this.emitTelemetry(attempt);
        const retryAfterMs = this.retryAfterMs(domain, retryAfterHintMs);
        if (state.reason === 'cooldown') {
          log.debug('Domain in cooldown; no method invoked', { domain, url, retryAfterMs });
        } else {
          log.warn('All methods blocked', { domain, url, protectionKind, retryAfterMs });
        }
        throw new RateLimitedError(attempt, retryAfterMs, state.reason);
      }

      case 'failed': {
        if (methodsTried.length > 0 && timeouts === methodsTried.length) {
          await this.recordDetection(domain, 'connection_timeout', { url, httpStatus });
        }
        const attempt = buildAttempt('failed', null);
        this.emitTelemetry(attempt);
        log.warn('Extraction failed', { domain, url, methodsTried: attempt.methodsTried, causes });
        throw new GenericExtractionError(attempt, causes);
      }

      case 'not_started':
        throw new GenericExtractionError(buildAttempt('failed', null), [
          { method: 'cascade', message: 'cascade never started' },
        ]);
    }
  }

  getMethodFailureCount(domain: string, method: MethodName): number {
    return this.methodFailures.get(this.failureKey(domain, method))?.count ?? 0;
  }

  /**
   * True while a method has failed `methodFailureThreshold` times in a row on
   * the domain and its last failure is inside the suppression window. Once
   * the window passes the method gets one more run; another failure
   * suppresses it again.
   */
  isMethodSuppressed(domain: string, method: MethodName): boolean {
    const record = this.methodFailures.get(this.failureKey(domain, method));
    if (!record || record.count < this.config.methodFailureThreshold) return false;
    return this.now() - record.lastFailureAt < this.config.methodSuppressionSeconds * 1000;
  }

  // ============================================
  // METHOD EXECUTION
  // ============================================

  private async runMethod(method: ExtractionMethod, url: string): Promise<MethodOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), method.timeoutMs);

    try {
      const page = await raceAbort(
        method.fetch(url, controller.signal),
        controller.signal,
        () => new MethodTimeoutError(method.name, method.timeoutMs)
      );
      return this.evaluatePage(method, url, page);
    } catch (error) {
      return {
        type: 'error',
        message: error instanceof Error ? error.message : String(error),
        status: null,
        timedOut: controller.signal.aborted,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private evaluatePage(method: ExtractionMethod, url: string, page: FetchedPage): MethodOutcome {
    if (this.detector.isNotFound(page.status)) {
      return { type: 'not_found', status: page.status };
    }

    const kind = this.detector.classifyPage(page, { url, method: method.name });
    if (kind) {
      return {
        type: 'protection',
        kind,
        status: page.status,
        retryAfterMs: parseRetryAfterMs(page.headers, this.now()),
      };
    }

    if (!isSuccessStatus(page.status)) {
      return { type: 'error', message: `HTTP ${page.status}`, status: page.status, timedOut: false };
    }

    const content = method.parse(page);
    if (!content) {
      return { type: 'error', message: 'no article content found', status: page.status, timedOut: false };
    }
    if (content.bodyText.length < this.config.minContentLength) {
      return {
        type: 'error',
        message: `article body too short (${content.bodyText.length} < ${this.config.minContentLength})`,
        status: page.status,
        timedOut: false,
      };
    }

    return { type: 'success', page, content };
  }

  // ============================================
  // SIDE EFFECTS (best-effort)
  // ============================================

  private async recordDetection(
    domain: string,
    eventType: BotDetectionEventType,
    details: DetectionDetails
  ): Promise<void> {
    try {
      await this.store.recordDetection(domain, eventType, details);
    } catch (error) {
      log.error('Failed to record bot detection', { domain, eventType, error });
    }
  }

  private async recordSuccess(domain: string): Promise<void> {
    try {
      await this.store.recordSuccess(domain);
    } catch (error) {
      log.error('Failed to record success', { domain, error });
    }
  }

  private emitTelemetry(attempt: ExtractionAttempt): void {
    if (!this.telemetry) return;
    this.telemetry.enqueue({
      url: attempt.url,
      domain: attempt.domain,
      methodsAttempted: attempt.methodsTried,
      successfulMethod: attempt.outcome === 'success' ? attempt.finalMethod : null,
      httpStatus: attempt.httpStatus,
      detectedProtectionKind: attempt.protectionKind,
      elapsedMs: attempt.elapsedMs,
      proxyUsed: attempt.proxyUsed,
      recordedAt: new Date(this.now()).toISOString(),
    });
  }

  /**
   * Cooldown remaining, or the server's Retry-After if longer; the policy's
   * minimum backoff when neither is known
   */
  private retryAfterMs(domain: string, serverHintMs: number): number {
    const waitMs = Math.max(this.store.getCooldownRemainingMs(domain), serverHintMs);
    if (waitMs > 0) return waitMs;
    return this.store.getPolicy(domain).backoffRange[0] * 1000;
  }

  // ============================================
  // METHOD FAILURE COUNTERS
  // ============================================

  private failureKey(domain: string, method: MethodName): string {
    return `${getDomain(domain)}|${method}`;
  }

  private incrementMethodFailures(domain: string, method: MethodName): void {
    const key = this.failureKey(domain, method);
    const count = (this.methodFailures.get(key)?.count ?? 0) + 1;
    this.methodFailures.set(key, { count, lastFailureAt: this.now() });
  }

  /**
   * Clear the counters of the method that succeeded and of every method
   * after it. Earlier methods failed on this URL and keep their counts.
   */
  private resetMethodFailures(domain: string, fromIndex: number): void {
    for (const name of this.methodNames.slice(fromIndex)) {
      this.methodFailures.delete(this.failureKey(domain, name));
    }
  }
}
