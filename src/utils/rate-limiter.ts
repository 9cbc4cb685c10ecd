/**
 * Rate Limiter - Per-domain request pacing
 *
 * The delay between two requests to one domain comes from that domain's
 * sensitivity policy, so a domain that has been escalating gets paced more
 * slowly without any separate configuration.
 */

import type { SensitivityPolicy } from '../types/index.js';
import { getDomain } from './domain.js';
import { KeyedMutex } from './keyed-mutex.js';
import { logger } from './logger.js';

const log = logger.pacer;

/**
 * The part of the sensitivity store the pacer reads
 */
export interface PolicySource {
  getPolicy(domain: string): SensitivityPolicy;
  getLevel(domain: string): number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export class SleepAbortedError extends Error {
  constructor() {
    super('Sleep aborted');
    this.name = 'SleepAbortedError';
  }
}

export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SleepAbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RateLimiterOptions {
  sleep?: SleepFn;
  random?: () => number;
  now?: () => number;
}

export interface RateLimitStatus {
  domain: string;
  level: number;
  lastRequestAt: number | null;
  delayRangeMs: readonly [number, number];
  nextAllowedInMs: number;
}

export class RateLimiter {
  private lastRequestAt: Map<string, number> = new Map();
  private domainLocks = new KeyedMutex();
  private readonly sleepFn: SleepFn;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    private readonly policies: PolicySource,
    options: RateLimiterOptions = {}
  ) {
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Pick a delay inside the domain's inter-request range
   */
  pickDelayMs(domain: string): number {
    const [min, max] = this.policies.getPolicy(domain).interRequestDelayRange;
    return Math.round((min + (max - min) * this.random()) * 1000);
  }

  /**
   * Calculate how long to wait before the next request to this domain
   */
  calculateDelay(domain: string): number {
    const last = this.lastRequestAt.get(domain);
    if (last === undefined) {
      return 0;
    }
    const elapsed = this.now() - last;
    return Math.max(0, this.pickDelayMs(domain) - elapsed);
  }

  /**
   * Wait for the domain's pacing delay and record the request. Takes a URL
   * or a domain key.
   *
   * Does not take the domain lock; use throttle() for serialized access.
   */
  async acquire(target: string, signal?: AbortSignal): Promise<number> {
    const domain = getDomain(target);
    const delay = this.calculateDelay(domain);

    if (delay > 0) {
      log.debug('Pacing request', { domain, delayMs: delay, level: this.policies.getLevel(domain) });
      await this.sleepFn(delay, signal);
    }

    this.lastRequestAt.set(domain, this.now());
    return delay;
  }

  /**
   * Wrap an async function with per-domain pacing and serialization
   */
  throttle<T>(url: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.domainLocks.runExclusive(getDomain(url), async () => {
      await this.acquire(url, signal);
      return fn();
    });
  }

  getStatus(url: string): RateLimitStatus {
    const domain = getDomain(url);
    const [min, max] = this.policies.getPolicy(domain).interRequestDelayRange;
    const last = this.lastRequestAt.get(domain) ?? null;
    const maxDelayMs = Math.round(max * 1000);

    return {
      domain,
      level: this.policies.getLevel(domain),
      lastRequestAt: last,
      delayRangeMs: [Math.round(min * 1000), maxDelayMs],
      nextAllowedInMs: last === null ? 0 : Math.max(0, last + maxDelayMs - this.now()),
    };
  }

  reset(domain?: string): void {
    if (domain) {
      this.lastRequestAt.delete(getDomain(domain));
    } else {
      this.lastRequestAt.clear();
    }
  }
}
