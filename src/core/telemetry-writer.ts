/**
 * Telemetry Writer
 *
 * A bounded single-consumer queue in front of a telemetry sink. Producers
 * call enqueue() from the extraction path; it never blocks and never throws.
 * When the queue is full the oldest record is dropped. Each sink write is
 * wrapped in its own catch-all so one bad record cannot stop the consumer.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ExtractionTelemetryRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.telemetry;

/**
 * What the cascade sees of the writer
 */
export interface TelemetryRecorder {
  enqueue(record: ExtractionTelemetryRecord): void;
}

export interface TelemetrySink {
  write(record: ExtractionTelemetryRecord): Promise<void>;
  close?(): Promise<void>;
}

export interface TelemetryWriterStats {
  enqueued: number;
  written: number;
  dropped: number;
  failed: number;
  pending: number;
}

// ============================================
// SINKS
// ============================================

/**
 * Writes each record as a structured log line
 */
export class LoggingTelemetrySink implements TelemetrySink {
  async write(record: ExtractionTelemetryRecord): Promise<void> {
    log.info('Extraction telemetry', { ...record });
  }
}

/**
 * Appends one JSON object per line
 */
export class JsonlTelemetrySink implements TelemetrySink {
  private dirReady = false;

  constructor(private readonly filePath: string) {}

  async write(record: ExtractionTelemetryRecord): Promise<void> {
    if (!this.dirReady) {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }
    await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
  }

  getFilePath(): string {
    return this.filePath;
  }
}

export class InMemoryTelemetrySink implements TelemetrySink {
  readonly records: ExtractionTelemetryRecord[] = [];

  async write(record: ExtractionTelemetryRecord): Promise<void> {
    this.records.push(record);
  }

  clear(): void {
    this.records.length = 0;
  }
}

// ============================================
// WRITER
// ============================================

export interface TelemetryWriterOptions {
  maxQueueSize?: number;
}

export class TelemetryWriter implements TelemetryRecorder {
  private readonly maxQueueSize: number;
  private queue: ExtractionTelemetryRecord[] = [];
  private draining: Promise<void> | null = null;
  private stats = { enqueued: 0, written: 0, dropped: 0, failed: 0 };
  private closed = false;

  constructor(
    private readonly sink: TelemetrySink,
    options: TelemetryWriterOptions = {}
  ) {
    this.maxQueueSize = Math.max(1, options.maxQueueSize ?? 1000);
  }

  enqueue(record: ExtractionTelemetryRecord): void {
    if (this.closed) {
      this.stats.dropped++;
      return;
    }

    this.stats.enqueued++;
    this.queue.push(record);
    if (this.queue.length > this.maxQueueSize) {
      this.queue.shift();
      this.stats.dropped++;
      log.warn('Telemetry queue full; dropped oldest record', { maxQueueSize: this.maxQueueSize });
    }

    this.scheduleDrain();
  }

  /**
   * Resolves once every queued record has been handed to the sink
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Flush, then close the sink. Later records are dropped.
   */
  async close(): Promise<void> {
    await this.flush();
    this.closed = true;
    if (this.sink.close) {
      try {
        await this.sink.close();
      } catch (error) {
        log.error('Failed to close telemetry sink', { error });
      }
    }
  }

  getStats(): TelemetryWriterStats {
    return { ...this.stats, pending: this.queue.length };
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
  }

  private async drain(): Promise<void> {
    // Let the producer finish its synchronous work first
    await Promise.resolve();

    let record = this.queue.shift();
    while (record) {
      try {
        await this.sink.write(record);
        this.stats.written++;
      } catch (error) {
        this.stats.failed++;
        log.error('Telemetry write failed', { url: record.url, error });
      }
      record = this.queue.shift();
    }
  }
}
