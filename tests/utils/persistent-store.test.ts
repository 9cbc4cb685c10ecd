/**
 * Tests for PersistentStore - Debounced & Atomic File Persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { PersistentStore, DEFAULT_PERSISTENT_STORE_CONFIG } from '../../src/utils/persistent-store.js';

const counterSchema = z.object({ value: z.number() });
type Counter = z.infer<typeof counterSchema>;

describe('PersistentStore', () => {
  let testDir: string;
  let testFilePath: string;

  const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'persistent-store-'));
    testFilePath = path.join(testDir, 'state.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  // ============================================
  // BASIC OPERATIONS
  // ============================================
  describe('Basic Operations', () => {
    it('should resolve the file path', () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);
      expect(store.getFilePath()).toBe(path.resolve(testFilePath));
    });

    it('should return null when the file does not exist', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);
      expect(await store.load()).toBeNull();
    });

    it('should save immediately and load back', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);
      await store.saveImmediate({ value: 42 });

      expect(await store.load()).toEqual({ value: 42 });
      expect(await fs.readFile(testFilePath, 'utf-8')).toBe(JSON.stringify({ value: 42 }, null, 2));
    });

    it('should write compact JSON when prettyPrint is off', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema, { prettyPrint: false });
      await store.saveImmediate({ value: 1 });

      expect(await fs.readFile(testFilePath, 'utf-8')).toBe('{"value":1}');
    });

    it('should create missing parent directories', async () => {
      const nested = path.join(testDir, 'a', 'b', 'state.json');
      const store = new PersistentStore<Counter>(nested, counterSchema);
      await store.saveImmediate({ value: 3 });

      expect(await store.load()).toEqual({ value: 3 });
    });
  });

  // ============================================
  // VALIDATION
  // ============================================
  describe('Validation', () => {
    it('should reject a file that fails the schema', async () => {
      await fs.writeFile(testFilePath, JSON.stringify({ value: 'many' }));
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);

      await expect(store.load()).rejects.toBeInstanceOf(z.ZodError);
    });

    it('should reject malformed JSON', async () => {
      await fs.writeFile(testFilePath, '{ broken');
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);

      await expect(store.load()).rejects.toBeInstanceOf(SyntaxError);
    });
  });

  // ============================================
  // DEBOUNCING
  // ============================================
  describe('Debouncing', () => {
    it('should write only the last value of a burst', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema, { debounceMs: 20 });

      store.save({ value: 1 });
      store.save({ value: 2 });
      store.save({ value: 3 });
      expect(store.hasPendingWrite()).toBe(true);

      await wait(80);
      await store.flush();

      expect(await store.load()).toEqual({ value: 3 });
      expect(store.getStats()).toMatchObject({ saveRequests: 3, actualWrites: 1, failedWrites: 0 });
      expect(store.hasPendingWrite()).toBe(false);
    });

    it('should write pending data on flush', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema, { debounceMs: 60_000 });

      store.save({ value: 7 });
      await store.flush();

      expect(await store.load()).toEqual({ value: 7 });
    });

    it('should drop pending data on cancel', async () => {
      const store = new PersistentStore<Counter>(testFilePath, counterSchema, { debounceMs: 60_000 });

      store.save({ value: 7 });
      store.cancel();
      await store.flush();

      expect(await store.load()).toBeNull();
      expect(store.getStats().actualWrites).toBe(0);
    });
  });

  // ============================================
  // ERROR HANDLING
  // ============================================
  describe('Error Handling', () => {
    it('should record failed writes and leave no temp files', async () => {
      // A directory in the way of the target makes rename fail
      await fs.mkdir(testFilePath);
      await fs.writeFile(path.join(testFilePath, 'occupant'), 'x');
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);

      await expect(store.saveImmediate({ value: 1 })).rejects.toThrow();

      const stats = store.getStats();
      expect(stats.failedWrites).toBe(1);
      expect(stats.lastError).not.toBeNull();
      expect((await fs.readdir(testDir)).sort()).toEqual(['state.json']);
    });

    it('should keep writing after a failure', async () => {
      await fs.mkdir(testFilePath);
      await fs.writeFile(path.join(testFilePath, 'occupant'), 'x');
      const store = new PersistentStore<Counter>(testFilePath, counterSchema);

      await expect(store.saveImmediate({ value: 1 })).rejects.toThrow();
      await fs.rm(testFilePath, { recursive: true });
      await store.saveImmediate({ value: 2 });

      expect(await store.load()).toEqual({ value: 2 });
      expect(store.getStats().lastError).toBeNull();
    });
  });

  it('should expose its defaults', () => {
    expect(DEFAULT_PERSISTENT_STORE_CONFIG).toEqual({
      debounceMs: 250,
      prettyPrint: true,
      componentName: 'PersistentStore',
    });
  });
});
