import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  InMemoryTelemetrySink,
  JsonlTelemetrySink,
  LoggingTelemetrySink,
  TelemetryWriter,
  type TelemetrySink,
} from '../../src/core/telemetry-writer.js';
import type { ExtractionTelemetryRecord } from '../../src/types/index.js';

function record(url: string): ExtractionTelemetryRecord {
  return {
    url,
    domain: 'news.example.com',
    methodsAttempted: ['structured'],
    successfulMethod: 'structured',
    httpStatus: 200,
    detectedProtectionKind: null,
    elapsedMs: 12,
    proxyUsed: false,
    recordedAt: '2024-06-01T00:00:00.000Z',
  };
}

class FlakySink implements TelemetrySink {
  written: string[] = [];

  async write(r: ExtractionTelemetryRecord): Promise<void> {
    if (r.url.endsWith('/bad')) {
      throw new Error('sink rejected record');
    }
    this.written.push(r.url);
  }
}

describe('TelemetryWriter', () => {
  it('delivers records in order', async () => {
    const sink = new InMemoryTelemetrySink();
    const writer = new TelemetryWriter(sink);

    writer.enqueue(record('https://news.example.com/1'));
    writer.enqueue(record('https://news.example.com/2'));
    await writer.flush();

    expect(sink.records.map((r) => r.url)).toEqual(['https://news.example.com/1', 'https://news.example.com/2']);
    expect(writer.getStats()).toEqual({ enqueued: 2, written: 2, dropped: 0, failed: 0, pending: 0 });
  });

  it('drops the oldest record when the queue overflows', async () => {
    const sink = new InMemoryTelemetrySink();
    const writer = new TelemetryWriter(sink, { maxQueueSize: 2 });

    // All three land before the consumer runs
    writer.enqueue(record('https://news.example.com/1'));
    writer.enqueue(record('https://news.example.com/2'));
    writer.enqueue(record('https://news.example.com/3'));
    await writer.flush();

    expect(sink.records.map((r) => r.url)).toEqual(['https://news.example.com/2', 'https://news.example.com/3']);
    expect(writer.getStats().dropped).toBe(1);
  });

  it('keeps consuming after a sink failure', async () => {
    const sink = new FlakySink();
    const writer = new TelemetryWriter(sink);

    expect(() => writer.enqueue(record('https://news.example.com/bad'))).not.toThrow();
    writer.enqueue(record('https://news.example.com/good'));
    await writer.flush();

    expect(sink.written).toEqual(['https://news.example.com/good']);
    expect(writer.getStats().failed).toBe(1);
  });

  it('drops records after close', async () => {
    const sink = new InMemoryTelemetrySink();
    const writer = new TelemetryWriter(sink);

    writer.enqueue(record('https://news.example.com/1'));
    await writer.close();
    writer.enqueue(record('https://news.example.com/2'));
    await writer.flush();

    expect(sink.records).toHaveLength(1);
    expect(writer.getStats().dropped).toBe(1);
  });

  it('accepts the logging sink', async () => {
    const writer = new TelemetryWriter(new LoggingTelemetrySink());
    writer.enqueue(record('https://news.example.com/1'));
    await writer.flush();
    expect(writer.getStats().written).toBe(1);
  });
});

describe('JsonlTelemetrySink', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'telemetry-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('appends one JSON object per line, creating the directory', async () => {
    const filePath = path.join(tmpDir, 'nested', 'telemetry.jsonl');
    const writer = new TelemetryWriter(new JsonlTelemetrySink(filePath));

    writer.enqueue(record('https://news.example.com/1'));
    writer.enqueue(record('https://news.example.com/2'));
    await writer.close();

    const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toEqual(record('https://news.example.com/2'));
  });
});
