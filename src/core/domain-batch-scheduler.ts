/**
 * Domain Batch Scheduler
 *
 * Pulls candidate URLs in batches, rotates them across domains, skips
 * domains that are cooling down, paces requests per domain and hands each
 * URL to the extraction cascade. At the end of a batch it picks the pause
 * before the next one.
 *
 * The pause rule separates two cases that look alike:
 * - one domain processed and nothing skipped: the dataset really is a
 *   single domain, so a long pause protects it.
 * - one domain processed but others skipped: those domains are only
 *   cooling down, so a short pause is enough.
 */

import type {
  BatchResult,
  CandidateUrl,
  DomainPartition,
  ExtractionAttempt,
  OutcomeClass,
  PauseDecision,
  UrlOutcome,
} from '../types/index.js';
import { schedulerConfigSchema, type SchedulerConfig } from '../utils/config-schemas.js';
import { getDomain } from '../utils/domain.js';
import { logger, type Logger } from '../utils/logger.js';
import { RateLimiter, SleepAbortedError, sleep, type PolicySource, type SleepFn } from '../utils/rate-limiter.js';
import type { CascadeResult } from './extraction-cascade.js';
import { GenericExtractionError, NotFoundError, RateLimitedError } from './extraction-errors.js';
import type { CandidateSource, OutcomeSink } from './work-queue.js';

/** Candidates sampled by analyzeDomains() at the start of a run */
const ANALYSIS_SAMPLE_SIZE = 1000;

/** Below this, a single-domain dataset is paced too aggressively */
const SINGLE_DOMAIN_MIN_SLEEP_SECONDS = 60;

// ============================================
// COLLABORATORS
// ============================================

export interface CascadeRunner {
  extract(url: string, domainHint?: string): Promise<CascadeResult>;
}

/**
 * The part of the sensitivity store the scheduler reads
 */
export interface SchedulerStore extends PolicySource {
  isInCooldown(domain: string): boolean;
  getCooldownRemainingMs(domain: string): number;
}

export interface BatchAlert {
  workerId: string;
  batchNumber: number;
  processed: number;
  errors: number;
  message: string;
}

export interface RunSummary {
  workerId: string;
  batches: number;
  processed: number;
  skippedDomains: number;
  errors: number;
  outcomes: Record<OutcomeClass, number>;
  stoppedReason: 'exhausted' | 'cooling_down' | 'max_batches' | 'aborted';
}

export interface DomainAnalysis {
  totalCandidates: number;
  uniqueDomains: number;
  isSingleDomain: boolean;
  domainCounts: Record<string, number>;
  sampleDomains: string[];
}

export interface DomainBatchSchedulerOptions {
  source: CandidateSource;
  sink: OutcomeSink;
  cascade: CascadeRunner;
  store: SchedulerStore;
  pacer?: RateLimiter;
  config?: Partial<SchedulerConfig>;
  partition?: DomainPartition;
  workerId?: string;
  sleep?: SleepFn;
  random?: () => number;
  onAlert?: (alert: BatchAlert) => void;
}

// ============================================
// PURE HELPERS
// ============================================

const OUTCOME_CLASSES: readonly OutcomeClass[] = ['extracted', 'not_found', 'failed', 'pending'];

export function emptyOutcomeCounts(): Record<OutcomeClass, number> {
  return { extracted: 0, not_found: 0, failed: 0, pending: 0 };
}

/**
 * Round-robin across domains, keeping each domain's own order.
 * Domains take turns in order of first appearance.
 */
export function interleaveByDomain(candidates: readonly CandidateUrl[]): CandidateUrl[] {
  const groups: Map<string, CandidateUrl[]> = new Map();
  for (const candidate of candidates) {
    const domain = getDomain(candidate.domain || candidate.url);
    const group = groups.get(domain);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(domain, [candidate]);
    }
  }

  const queues = [...groups.values()];
  const result: CandidateUrl[] = [];
  let round = 0;
  let added = true;
  while (added) {
    added = false;
    for (const queue of queues) {
      if (round < queue.length) {
        result.push(queue[round]);
        added = true;
      }
    }
    round++;
  }
  return result;
}

/**
 * Longest run of the same domain in processing order, counted as repeats
 * (a run of three is two repeats)
 */
export function longestSameDomainRun(domains: readonly string[]): number {
  let longest = 0;
  let current = 0;
  for (let i = 1; i < domains.length; i++) {
    current = domains[i] === domains[i - 1] ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
}

export function jitteredBatchSize(batchSize: number, jitter: number, random: () => number): number {
  if (jitter <= 0) return batchSize;
  const spread = batchSize * jitter;
  return Math.max(1, Math.round(batchSize - spread + 2 * spread * random()));
}

export interface PauseOptions {
  maxSameDomainConsecutive: number;
  longPauseSeconds: number;
  longPauseJitter: number;
  shortPauseSeconds: number;
}

export function decidePause(
  result: Pick<BatchResult, 'domainsProcessed' | 'skippedDomains' | 'sameDomainConsecutive'>,
  options: PauseOptions,
  random: () => number = Math.random
): PauseDecision {
  const uniqueDomains = new Set(result.domainsProcessed).size;
  const isSingleDomainDataset = uniqueDomains <= 1 && result.skippedDomains === 0;
  const exhaustedRotation = result.sameDomainConsecutive > options.maxSameDomainConsecutive;

  if (isSingleDomainDataset || exhaustedRotation) {
    const base = options.longPauseSeconds;
    const spread = base * options.longPauseJitter;
    const seconds = spread > 0 ? base - spread + 2 * spread * random() : base;
    return {
      kind: 'long',
      reason: isSingleDomainDataset
        ? 'single-domain dataset'
        : `same domain hit ${result.sameDomainConsecutive} times in a row`,
      pauseMs: Math.round(Math.max(0, seconds) * 1000),
    };
  }

  return {
    kind: 'short',
    reason:
      result.skippedDomains > 0
        ? `multiple domains available (${result.skippedDomains} URLs cooling down)`
        : `rotated through ${uniqueDomains} domains`,
    pauseMs: Math.round(options.shortPauseSeconds * 1000),
  };
}

function syntheticAttempt(candidate: CandidateUrl, domain: string): ExtractionAttempt {
  return {
    url: candidate.url,
    domain,
    methodsTried: [],
    finalMethod: null,
    outcome: 'failed',
    elapsedMs: 0,
    httpStatus: null,
    protectionKind: null,
    proxyUsed: false,
  };
}

// ============================================
// SCHEDULER
// ============================================

export class DomainBatchScheduler {
  private readonly source: CandidateSource;
  private readonly sink: OutcomeSink;
  private readonly cascade: CascadeRunner;
  private readonly store: SchedulerStore;
  private readonly pacer: RateLimiter;
  private readonly config: SchedulerConfig;
  private readonly partition?: DomainPartition;
  private readonly sleepFn: SleepFn;
  private readonly random: () => number;
  private readonly onAlert?: (alert: BatchAlert) => void;
  private readonly log: Logger;
  readonly workerId: string;
  private batchNumber = 0;

  constructor(options: DomainBatchSchedulerOptions) {
    this.source = options.source;
    this.sink = options.sink;
    this.cascade = options.cascade;
    this.store = options.store;
    this.config = { ...schedulerConfigSchema.parse({}), ...options.config };
    this.partition = options.partition;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.pacer =
      options.pacer ?? new RateLimiter(options.store, { sleep: this.sleepFn, random: this.random });
    this.onAlert = options.onAlert;
    this.workerId = options.workerId ?? 'worker-0';
    this.log = logger.scheduler.child({ workerId: this.workerId });
  }

  /**
   * Report domain diversity of a candidate set and warn about pacing that
   * is too aggressive for a single-domain dataset
   */
  analyzeDomains(candidates: readonly CandidateUrl[]): DomainAnalysis {
    const domainCounts: Record<string, number> = {};
    for (const candidate of candidates) {
      const domain = getDomain(candidate.domain || candidate.url);
      domainCounts[domain] = (domainCounts[domain] ?? 0) + 1;
    }

    const domains = Object.keys(domainCounts).sort();
    const analysis: DomainAnalysis = {
      totalCandidates: candidates.length,
      uniqueDomains: domains.length,
      isSingleDomain: domains.length === 1,
      domainCounts,
      sampleDomains: domains.slice(0, 5),
    };

    this.log.info('Domain analysis', {
      totalCandidates: analysis.totalCandidates,
      uniqueDomains: analysis.uniqueDomains,
      sampleDomains: analysis.sampleDomains,
    });

    if (analysis.isSingleDomain) {
      const sleepSeconds = this.longPauseSeconds(domains);
      if (sleepSeconds < SINGLE_DOMAIN_MIN_SLEEP_SECONDS) {
        this.log.warn('Single-domain dataset with a short batch pause', {
          domain: domains[0],
          batchSleepSeconds: sleepSeconds,
          recommendedMinSeconds: SINGLE_DOMAIN_MIN_SLEEP_SECONDS,
        });
      }
    }

    return analysis;
  }

  /**
   * Process one batch. Every URL taken from the batch gets exactly one
   * outcome recorded in the sink.
   */
  async runBatch(signal?: AbortSignal): Promise<BatchResult> {
    this.batchNumber++;
    const batchSize = jitteredBatchSize(this.config.batchSize, this.config.batchSizeJitter, this.random);
    const candidates = await this.source.fetchCandidates(
      batchSize * this.config.candidateBufferMultiplier,
      this.partition
    );
    const ordered = interleaveByDomain(candidates);

    const result: BatchResult = {
      processed: 0,
      skippedDomains: 0,
      domainsProcessed: [],
      sameDomainConsecutive: 0,
      errors: 0,
      outcomes: emptyOutcomeCounts(),
      cooledDownDomains: [],
    };
    const articlesPerDomain: Map<string, number> = new Map();
    const failuresPerDomain: Map<string, number> = new Map();
    const cooled: Set<string> = new Set();

    for (const candidate of ordered) {
      if (result.processed >= batchSize || signal?.aborted) break;

      const domain = getDomain(candidate.domain || candidate.url);
      if ((articlesPerDomain.get(domain) ?? 0) >= this.config.maxArticlesPerDomainPerBatch) continue;
      if ((failuresPerDomain.get(domain) ?? 0) >= this.config.maxFailuresPerDomainPerBatch) continue;

      if (this.store.isInCooldown(domain)) {
        result.skippedDomains++;
        result.outcomes.pending++;
        cooled.add(domain);
        await this.emit({
          class: 'pending',
          candidate,
          attempt: null,
          retryAfterMs: this.store.getCooldownRemainingMs(domain),
        });
        continue;
      }

      try {
        await this.pacer.acquire(domain, signal);
      } catch (error) {
        if (error instanceof SleepAbortedError) break;
        throw error;
      }

      result.processed++;
      result.domainsProcessed.push(domain);
      articlesPerDomain.set(domain, (articlesPerDomain.get(domain) ?? 0) + 1);

      const outcome = await this.extractOne(candidate, domain);
      result.outcomes[outcome.class]++;
      if (outcome.class === 'failed' || outcome.class === 'pending') {
        result.errors++;
        failuresPerDomain.set(domain, (failuresPerDomain.get(domain) ?? 0) + 1);
      }
      await this.emit(outcome);
    }

    result.sameDomainConsecutive = longestSameDomainRun(result.domainsProcessed);
    result.cooledDownDomains = [...cooled];

    this.log.info('Batch complete', {
      batchNumber: this.batchNumber,
      processed: result.processed,
      skippedDomains: result.skippedDomains,
      errors: result.errors,
      uniqueDomains: new Set(result.domainsProcessed).size,
      outcomes: result.outcomes,
    });

    if (result.processed > 0 && result.errors === result.processed) {
      this.raiseAlert({
        workerId: this.workerId,
        batchNumber: this.batchNumber,
        processed: result.processed,
        errors: result.errors,
        message: `Every URL in batch ${this.batchNumber} failed`,
      });
    }

    return result;
  }

  decidePause(result: BatchResult): PauseDecision {
    return decidePause(
      result,
      {
        maxSameDomainConsecutive: this.config.maxSameDomainConsecutive,
        longPauseSeconds: this.longPauseSeconds(result.domainsProcessed),
        longPauseJitter: this.config.batchSleepJitter,
        shortPauseSeconds: this.config.interBatchMinPauseSeconds,
      },
      this.random
    );
  }

  /**
   * Run batches until nothing is processable, maxBatches is reached or the
   * signal aborts
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    const summary: RunSummary = {
      workerId: this.workerId,
      batches: 0,
      processed: 0,
      skippedDomains: 0,
      errors: 0,
      outcomes: emptyOutcomeCounts(),
      stoppedReason: 'exhausted',
    };

    this.analyzeDomains(await this.source.fetchCandidates(ANALYSIS_SAMPLE_SIZE, this.partition));

    for (;;) {
      if (signal?.aborted) {
        summary.stoppedReason = 'aborted';
        break;
      }

      const result = await this.runBatch(signal);
      summary.batches++;
      summary.processed += result.processed;
      summary.skippedDomains += result.skippedDomains;
      summary.errors += result.errors;
      for (const cls of OUTCOME_CLASSES) {
        summary.outcomes[cls] += result.outcomes[cls];
      }

      if (result.processed === 0) {
        summary.stoppedReason = result.skippedDomains > 0 ? 'cooling_down' : 'exhausted';
        break;
      }
      if (this.config.maxBatches !== undefined && summary.batches >= this.config.maxBatches) {
        summary.stoppedReason = 'max_batches';
        break;
      }

      const pause = this.decidePause(result);
      this.log.info('Pausing before next batch', {
        kind: pause.kind,
        reason: pause.reason,
        pauseMs: pause.pauseMs,
      });
      try {
        await this.sleepFn(pause.pauseMs, signal);
      } catch (error) {
        if (!(error instanceof SleepAbortedError)) throw error;
        summary.stoppedReason = 'aborted';
        break;
      }
    }

    this.log.info('Run finished', {
      batches: summary.batches,
      processed: summary.processed,
      skippedDomains: summary.skippedDomains,
      errors: summary.errors,
      stoppedReason: summary.stoppedReason,
    });
    return summary;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async extractOne(candidate: CandidateUrl, domain: string): Promise<UrlOutcome> {
    try {
      const { article, attempt } = await this.cascade.extract(candidate.url, domain);
      return { class: 'extracted', candidate, article, attempt };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return { class: 'not_found', candidate, attempt: error.attempt };
      }
      if (error instanceof RateLimitedError) {
        return { class: 'pending', candidate, attempt: error.attempt, retryAfterMs: error.retryAfterMs };
      }
      if (error instanceof GenericExtractionError) {
        return { class: 'failed', candidate, attempt: error.attempt, reason: error.message };
      }

      this.log.error('Unexpected extraction error', { url: candidate.url, domain, error });
      return {
        class: 'failed',
        candidate,
        attempt: syntheticAttempt(candidate, domain),
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private async emit(outcome: UrlOutcome): Promise<void> {
    try {
      await this.sink.record(outcome);
    } catch (error) {
      this.log.error('Failed to record outcome', {
        url: outcome.candidate.url,
        outcome: outcome.class,
        error,
      });
    }
  }

  private longPauseSeconds(domains: readonly string[]): number {
    if (this.config.batchSleepSeconds !== undefined) {
      return this.config.batchSleepSeconds;
    }
    let seconds = 0;
    for (const domain of new Set(domains)) {
      seconds = Math.max(seconds, this.store.getPolicy(domain).batchPauseSeconds);
    }
    return seconds;
  }

  private raiseAlert(alert: BatchAlert): void {
    this.log.error('Batch failed entirely', { ...alert });
    if (!this.onAlert) return;
    try {
      this.onAlert(alert);
    } catch (error) {
      this.log.error('Alert handler threw', { error });
    }
  }
}
