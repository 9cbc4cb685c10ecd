import { describe, it, expect } from 'vitest';
import { WorkerPool } from '../../src/core/worker-pool.js';
import { DomainBatchScheduler, type CascadeRunner } from '../../src/core/domain-batch-scheduler.js';
import { DomainSensitivityStore } from '../../src/core/domain-sensitivity-store.js';
import type { CascadeResult } from '../../src/core/extraction-cascade.js';
import { InMemoryCandidateQueue } from '../../src/core/work-queue.js';
import { getDomain, partitionForDomain } from '../../src/utils/domain.js';
import type { DomainPartition } from '../../src/types/index.js';

class RecordingCascade implements CascadeRunner {
  constructor(
    private readonly seen: Array<{ partition: number; url: string }>,
    private readonly partition: number
  ) {}

  async extract(url: string): Promise<CascadeResult> {
    this.seen.push({ partition: this.partition, url });
    return {
      article: {
        url,
        title: 'Story',
        author: null,
        publishedAt: null,
        bodyText: 'Body',
        extractionMethodUsed: 'structured',
      },
      attempt: {
        url,
        domain: getDomain(url),
        methodsTried: ['structured'],
        finalMethod: 'structured',
        outcome: 'success',
        elapsedMs: 1,
        httpStatus: 200,
        protectionKind: null,
        proxyUsed: false,
      },
    };
  }
}

class ThrowingCascade implements CascadeRunner {
  async extract(): Promise<CascadeResult> {
    throw new Error('unused');
  }
}

describe('WorkerPool', () => {
  const domains = ['a.example', 'b.example', 'c.example', 'd.example', 'e.example', 'f.example'];

  function setup(count: number) {
    const queue = new InMemoryCandidateQueue();
    queue.add(...domains.map((domain) => ({ url: `https://${domain}/story` })));
    const store = new DomainSensitivityStore();
    const seen: Array<{ partition: number; url: string }> = [];

    const pool = new WorkerPool({
      count,
      createScheduler: (partition: DomainPartition, workerId: string) =>
        new DomainBatchScheduler({
          source: queue,
          sink: queue,
          cascade: new RecordingCascade(seen, partition.index),
          store,
          partition,
          workerId,
          sleep: async () => undefined,
          random: () => 0.5,
        }),
    });
    return { pool, queue, seen };
  }

  it('splits domains across workers without overlap', async () => {
    const { pool, queue, seen } = setup(3);

    const results = await pool.run();

    expect(results.map((r) => r.workerId)).toEqual(['worker-0', 'worker-1', 'worker-2']);
    expect(results.every((r) => r.error === null)).toBe(true);
    expect(results.reduce((sum, r) => sum + (r.summary?.processed ?? 0), 0)).toBe(domains.length);
    for (const { partition, url } of seen) {
      expect(partitionForDomain(getDomain(url), 3)).toBe(partition);
    }
    expect(seen.map((s) => getDomain(s.url)).sort()).toEqual(domains);
    expect(queue.size()).toBe(0);
  });

  it('reports a crashed worker and keeps the others', async () => {
    const queue = new InMemoryCandidateQueue();
    const store = new DomainSensitivityStore();
    const pool = new WorkerPool({
      count: 2,
      createScheduler: (partition, workerId) => {
        const scheduler = new DomainBatchScheduler({
          source: {
            fetchCandidates: async () => {
              if (partition.index === 1) throw new Error('queue unavailable');
              return queue.fetchCandidates(10, partition);
            },
          },
          sink: queue,
          cascade: new ThrowingCascade(),
          store,
          partition,
          workerId,
          sleep: async () => undefined,
        });
        return scheduler;
      },
    });

    const results = await pool.run();

    expect(results[0]).toMatchObject({ workerId: 'worker-0', error: null });
    expect(results[0].summary?.stoppedReason).toBe('exhausted');
    expect(results[1]).toEqual({
      workerId: 'worker-1',
      partition: { index: 1, count: 2 },
      summary: null,
      error: 'queue unavailable',
    });
    expect(pool.isRunning()).toBe(false);
  });

  it('refuses a second concurrent run', async () => {
    const { pool } = setup(1);

    const first = pool.run();
    expect(pool.isRunning()).toBe(true);
    await expect(pool.run()).rejects.toThrow('Worker pool is already running');
    await first;
  });

  it('normalizes the worker count', () => {
    const createScheduler = (): DomainBatchScheduler => {
      throw new Error('not started');
    };
    expect(new WorkerPool({ count: 0, createScheduler }).size).toBe(1);
    expect(new WorkerPool({ count: 2.7, createScheduler }).size).toBe(2);
  });
});
