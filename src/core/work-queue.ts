/**
 * Work queue collaborators
 *
 * URL discovery upstream and persistence downstream are outside this
 * package. The scheduler sees them only through CandidateSource and
 * OutcomeSink. InMemoryCandidateQueue implements both for tests and for
 * embedding without a database.
 */

import type { CandidateUrl, DomainPartition, OutcomeClass, UrlOutcome } from '../types/index.js';
import { getDomain, partitionForDomain } from '../utils/domain.js';

export interface CandidateSource {
  /**
   * Return up to `limit` candidates that are ready to process. Candidates
   * stay available until an outcome is recorded for them.
   */
  fetchCandidates(limit: number, partition?: DomainPartition): Promise<CandidateUrl[]>;
}

export interface OutcomeSink {
  record(outcome: UrlOutcome): Promise<void>;
}

interface QueueEntry {
  candidate: CandidateUrl;
  /** Epoch ms before which a pending candidate is not handed out */
  availableAt: number;
}

export interface InMemoryCandidateQueueOptions {
  now?: () => number;
}

export class InMemoryCandidateQueue implements CandidateSource, OutcomeSink {
  private entries: Map<string, QueueEntry> = new Map();
  private readonly now: () => number;
  readonly outcomes: UrlOutcome[] = [];

  constructor(options: InMemoryCandidateQueueOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Add candidates; a URL already queued is ignored
   */
  add(...items: Array<{ url: string; sourceId?: string; domain?: string }>): number {
    let added = 0;
    for (const item of items) {
      if (this.entries.has(item.url)) continue;
      this.entries.set(item.url, {
        candidate: {
          url: item.url,
          domain: item.domain ?? getDomain(item.url),
          sourceId: item.sourceId ?? 'default',
          status: 'candidate',
        },
        availableAt: 0,
      });
      added++;
    }
    return added;
  }

  async fetchCandidates(limit: number, partition?: DomainPartition): Promise<CandidateUrl[]> {
    const now = this.now();
    const result: CandidateUrl[] = [];

    for (const entry of this.entries.values()) {
      if (result.length >= limit) break;
      if (entry.availableAt > now) continue;
      if (partition && partitionForDomain(entry.candidate.domain, partition.count) !== partition.index) {
        continue;
      }
      result.push({ ...entry.candidate });
    }

    return result;
  }

  async record(outcome: UrlOutcome): Promise<void> {
    this.outcomes.push(outcome);
    const url = outcome.candidate.url;

    if (outcome.class === 'pending') {
      const entry = this.entries.get(url);
      if (entry) {
        entry.availableAt = this.now() + outcome.retryAfterMs;
      }
      return;
    }

    this.entries.delete(url);
  }

  size(): number {
    return this.entries.size;
  }

  outcomesOf<C extends OutcomeClass>(cls: C): Array<Extract<UrlOutcome, { class: C }>> {
    return this.outcomes.filter((o): o is Extract<UrlOutcome, { class: C }> => o.class === cls);
  }
}
