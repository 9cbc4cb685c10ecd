/**
 * Extraction engine factory
 *
 * Wires configuration into the shared store, detector and telemetry writer,
 * and builds one cascade plus scheduler per worker partition.
 *
 * @example
 * ```typescript
 * const queue = new InMemoryCandidateQueue();
 * queue.add({ url: 'https://news.example.com/story' });
 *
 * const engine = await createExtractionEngine(undefined, { source: queue, sink: queue });
 * const results = await engine.run();
 * await engine.close();
 * ```
 */

import type { DomainPartition } from '../types/index.js';
import { loadEngineConfig } from '../utils/config-loader.js';
import {
  engineConfigSchema,
  parseSection,
  type EngineConfig,
  type EngineConfigInput,
} from '../utils/config-schemas.js';
import { configureLogger, logger } from '../utils/logger.js';
import type { SleepFn } from '../utils/rate-limiter.js';
import { BotProtectionDetector } from './bot-protection-detector.js';
import { DomainBatchScheduler, type BatchAlert } from './domain-batch-scheduler.js';
import {
  DomainSensitivityStore,
  JsonFileSensitivityPersistence,
} from './domain-sensitivity-store.js';
import { ExtractionCascade } from './extraction-cascade.js';
import {
  BrowserEmulationMethod,
  HeuristicDomMethod,
  PlaywrightSessionProvider,
  ProxyRouter,
  StructuredMethod,
  type BrowserSessionProvider,
  type ExtractionMethod,
  type FetchImpl,
} from './extraction-methods/index.js';
import {
  JsonlTelemetrySink,
  LoggingTelemetrySink,
  TelemetryWriter,
  type TelemetrySink,
} from './telemetry-writer.js';
import type { CandidateSource, OutcomeSink } from './work-queue.js';
import { WorkerPool, type WorkerResult } from './worker-pool.js';

const log = logger.create('ExtractionEngine');

export interface ExtractionEngineDeps {
  source: CandidateSource;
  sink: OutcomeSink;
  fetchImpl?: FetchImpl;
  browserProvider?: BrowserSessionProvider;
  telemetrySink?: TelemetrySink;
  /** Replaces the default method list for every worker */
  createMethods?: () => ExtractionMethod[];
  store?: DomainSensitivityStore;
  now?: () => number;
  sleep?: SleepFn;
  random?: () => number;
  onAlert?: (alert: BatchAlert) => void;
}

export class ExtractionEngine {
  readonly store: DomainSensitivityStore;
  readonly detector: BotProtectionDetector;
  readonly telemetry: TelemetryWriter;
  readonly proxy: ProxyRouter;
  private readonly browserProvider: BrowserSessionProvider;

  constructor(
    readonly config: EngineConfig,
    private readonly deps: ExtractionEngineDeps
  ) {
    this.store =
      deps.store ??
      new DomainSensitivityStore({
        config: config.sensitivity,
        persistence: config.sensitivity.statePath
          ? new JsonFileSensitivityPersistence(config.sensitivity.statePath)
          : undefined,
        now: deps.now,
      });
    this.detector = new BotProtectionDetector(config.detector);
    this.telemetry = new TelemetryWriter(deps.telemetrySink ?? this.defaultTelemetrySink(), {
      maxQueueSize: config.telemetry.maxQueueSize,
    });
    this.proxy = new ProxyRouter({
      proxyUrl: config.proxy.proxyUrl,
      bypassHosts: config.proxy.bypassHosts,
    });
    this.browserProvider = deps.browserProvider ?? new PlaywrightSessionProvider();
  }

  /**
   * Restore persisted sensitivity state, if any
   */
  async initialize(): Promise<void> {
    const restored = await this.store.load();
    log.info('Extraction engine ready', {
      restoredState: restored,
      workers: this.config.workers.count,
      browserEnabled: this.config.browser.enabled,
      httpProxy: this.proxy.enabled,
    });
  }

  createMethods(): ExtractionMethod[] {
    if (this.deps.createMethods) {
      return this.deps.createMethods();
    }

    const { cascade, browser } = this.config;
    const { fetchImpl } = this.deps;
    const methods: ExtractionMethod[] = [
      new StructuredMethod({ timeoutMs: cascade.structuredTimeoutMs, fetchImpl, proxy: this.proxy }),
      new HeuristicDomMethod({ timeoutMs: cascade.heuristicTimeoutMs, fetchImpl, proxy: this.proxy }),
    ];
    if (browser.enabled) {
      methods.push(
        new BrowserEmulationMethod({
          provider: this.browserProvider,
          timeoutMs: cascade.browserTimeoutMs,
          navigationTimeoutMs: browser.navigationTimeoutMs,
          settleMs: browser.settleMs,
          proxyUrl: browser.proxyUrl,
          headless: browser.headless,
        })
      );
    }
    return methods;
  }

  createCascade(): ExtractionCascade {
    return new ExtractionCascade({
      store: this.store,
      methods: this.createMethods(),
      detector: this.detector,
      telemetry: this.telemetry,
      config: this.config.cascade,
      now: this.deps.now,
    });
  }

  createScheduler(partition?: DomainPartition, workerId?: string): DomainBatchScheduler {
    return new DomainBatchScheduler({
      source: this.deps.source,
      sink: this.deps.sink,
      cascade: this.createCascade(),
      store: this.store,
      config: this.config.scheduler,
      partition,
      workerId,
      sleep: this.deps.sleep,
      random: this.deps.random,
      onAlert: this.deps.onAlert,
    });
  }

  /**
   * Run every worker until its partition is drained
   */
  async run(signal?: AbortSignal): Promise<WorkerResult[]> {
    const pool = new WorkerPool({
      count: this.config.workers.count,
      // A single worker owns the whole domain space
      createScheduler: (partition, workerId) =>
        this.createScheduler(this.config.workers.count > 1 ? partition : undefined, workerId),
    });
    return pool.run(signal);
  }

  /**
   * Drain telemetry, write the final sensitivity snapshot and release the
   * proxy connections
   */
  async close(): Promise<void> {
    await this.telemetry.close();
    await this.store.flush();
    await this.proxy.close();
  }

  private defaultTelemetrySink(): TelemetrySink {
    const { jsonlPath } = this.config.telemetry;
    return jsonlPath ? new JsonlTelemetrySink(jsonlPath) : new LoggingTelemetrySink();
  }
}

/**
 * Create and initialize an extraction engine.
 *
 * Without a config the engine reads `.newsextractorrc` and the environment.
 *
 * @throws ConfigValidationError when the configuration is invalid
 */
export async function createExtractionEngine(
  config: EngineConfigInput | undefined,
  deps: ExtractionEngineDeps
): Promise<ExtractionEngine> {
  const resolved = config === undefined ? loadEngineConfig() : parseSection('engine', engineConfigSchema, config);
  configureLogger({ level: resolved.log.level, prettyPrint: resolved.log.prettyPrint });

  const engine = new ExtractionEngine(resolved, deps);
  await engine.initialize();
  return engine;
}
