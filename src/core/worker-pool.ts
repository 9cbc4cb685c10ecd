/**
 * Worker Pool
 *
 * Runs N schedulers concurrently, each owning a disjoint partition of the
 * domain space (stable hash of the domain mod N). Workers share one
 * sensitivity store and one telemetry writer; each gets its own cascade so
 * method failure counters stay per worker.
 */

import type { DomainPartition } from '../types/index.js';
import { logger } from '../utils/logger.js';
import type { DomainBatchScheduler, RunSummary } from './domain-batch-scheduler.js';

const log = logger.workers;

export type SchedulerFactory = (partition: DomainPartition, workerId: string) => DomainBatchScheduler;

export interface WorkerResult {
  workerId: string;
  partition: DomainPartition;
  summary: RunSummary | null;
  error: string | null;
}

export interface WorkerPoolOptions {
  count: number;
  createScheduler: SchedulerFactory;
}

export class WorkerPool {
  private readonly count: number;
  private readonly createScheduler: SchedulerFactory;
  private running = false;

  constructor(options: WorkerPoolOptions) {
    this.count = Math.max(1, Math.floor(options.count));
    this.createScheduler = options.createScheduler;
  }

  get size(): number {
    return this.count;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run every worker to completion. A worker that throws is reported in its
   * result; the others keep running.
   */
  async run(signal?: AbortSignal): Promise<WorkerResult[]> {
    if (this.running) {
      throw new Error('Worker pool is already running');
    }
    this.running = true;
    const startTime = Date.now();

    try {
      const workers = Array.from({ length: this.count }, (_, index) => {
        const partition: DomainPartition = { index, count: this.count };
        const workerId = `worker-${index}`;
        return { workerId, partition, scheduler: this.createScheduler(partition, workerId) };
      });

      log.info('Starting workers', { count: this.count });

      const settled = await Promise.allSettled(workers.map((w) => w.scheduler.run(signal)));

      const results = settled.map((outcome, i): WorkerResult => {
        const { workerId, partition } = workers[i];
        if (outcome.status === 'fulfilled') {
          return { workerId, partition, summary: outcome.value, error: null };
        }
        log.error('Worker crashed', { workerId, error: outcome.reason });
        return {
          workerId,
          partition,
          summary: null,
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        };
      });

      log.timed('Workers finished', startTime, {
        processed: results.reduce((sum, r) => sum + (r.summary?.processed ?? 0), 0),
        crashed: results.filter((r) => r.error !== null).length,
      });
      return results;
    } finally {
      this.running = false;
    }
  }
}
