/**
 * Persistent Store - Debounced & Atomic File Persistence
 *
 * Provides reliable file persistence with:
 * - Debounced writes: Batches rapid save calls to reduce I/O
 * - Atomic writes: Uses temp file + rename to prevent corruption
 * - Validated loads: the file is parsed through a Zod schema
 *
 * Usage:
 *   const store = new PersistentStore('./state.json', stateSchema);
 *   store.save(data);                 // Debounced, atomic write
 *   const data = await store.load();  // Load and validate
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';
import { logger } from './logger.js';

const log = logger.create('PersistentStore');

/**
 * Configuration for PersistentStore
 */
export interface PersistentStoreConfig {
  /** Debounce delay in milliseconds (default: 250ms) */
  debounceMs: number;

  /** Pretty-print JSON with indentation (default: true) */
  prettyPrint: boolean;

  /** Component name for logging */
  componentName: string;
}

export const DEFAULT_PERSISTENT_STORE_CONFIG: PersistentStoreConfig = {
  debounceMs: 250,
  prettyPrint: true,
  componentName: 'PersistentStore',
};

/**
 * Statistics about store operations
 */
export interface PersistentStoreStats {
  saveRequests: number;
  actualWrites: number;
  failedWrites: number;
  lastWriteTime: number | null;
  lastError: string | null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * PersistentStore - Debounced & Atomic JSON file persistence
 */
export class PersistentStore<T> {
  private filePath: string;
  private config: PersistentStoreConfig;
  private stats: PersistentStoreStats = {
    saveRequests: 0,
    actualWrites: 0,
    failedWrites: 0,
    lastWriteTime: null,
    lastError: null,
  };

  private pendingData: T | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  /** Tail of the write chain; writes never overlap */
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    config: Partial<PersistentStoreConfig> = {}
  ) {
    this.filePath = path.resolve(filePath);
    this.config = { ...DEFAULT_PERSISTENT_STORE_CONFIG, ...config };
  }

  getFilePath(): string {
    return this.filePath;
  }

  getStats(): PersistentStoreStats {
    return { ...this.stats };
  }

  /**
   * Schedule a debounced write of the latest data. Only the last data
   * passed within the debounce window is written. Write failures are
   * recorded in stats and logged.
   */
  save(data: T): void {
    this.stats.saveRequests++;
    this.pendingData = data;

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.enqueuePending().catch((error: unknown) => {
        log.warn(`${this.config.componentName}: debounced write failed`, { error: String(error) });
      });
    }, this.config.debounceMs);
  }

  /**
   * Write immediately, cancelling any pending debounced write
   */
  async saveImmediate(data: T): Promise<void> {
    this.stats.saveRequests++;
    this.cancel();
    this.pendingData = data;
    await this.enqueuePending();
  }

  /**
   * Flush any pending debounced write and wait for in-flight writes
   */
  async flush(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    await this.enqueuePending();
  }

  /**
   * Load data from file. Returns null if the file doesn't exist.
   *
   * @throws when the file is unreadable or fails validation
   */
  async load(): Promise<T | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      log.error(`${this.config.componentName}: Failed to load from ${this.filePath}`, { error });
      throw error;
    }

    return this.schema.parse(JSON.parse(content));
  }

  /**
   * Cancel any pending debounced write without flushing
   */
  cancel(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    this.pendingData = null;
  }

  hasPendingWrite(): boolean {
    return this.pendingData !== null || this.debounceTimer !== null;
  }

  private enqueuePending(): Promise<void> {
    const next = this.writeChain.then(async () => {
      const data = this.pendingData;
      this.pendingData = null;
      if (data !== null) {
        await this.atomicWrite(data);
      }
    });
    // Keep the chain alive after a failed write; the caller still sees the error
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  /**
   * Perform atomic write: write to temp file, then rename
   */
  private async atomicWrite(data: T): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${Date.now()}.${Math.random().toString(36).slice(2)}`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });

      const content = this.config.prettyPrint
        ? JSON.stringify(data, null, 2)
        : JSON.stringify(data);

      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);

      this.stats.actualWrites++;
      this.stats.lastWriteTime = Date.now();
      this.stats.lastError = null;

      log.debug(`${this.config.componentName}: Saved to ${this.filePath}`, { size: content.length });
    } catch (error) {
      this.stats.failedWrites++;
      this.stats.lastError = String(error);

      log.error(`${this.config.componentName}: Failed to save to ${this.filePath}`, { error });

      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
