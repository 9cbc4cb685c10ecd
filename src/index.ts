/**
 * News Extraction Resilience Engine
 *
 * Fetches and parses news article bodies from publisher servers that run
 * anti-automation defenses:
 * - classifies bot-protection responses
 * - tracks a per-domain sensitivity level with adaptive cooldowns
 * - falls back across extraction methods, up to browser emulation
 * - schedules batches with domain rotation and adaptive pauses
 */

export * from './types/index.js';

// Detection and sensitivity
export {
  BotProtectionDetector,
  classifyProtection,
  describeProtection,
  eventTypeForProtection,
  getHeader,
  parseRetryAfterMs,
  DEFAULT_DETECTOR_OPTIONS,
  type DetectorOptions,
} from './core/bot-protection-detector.js';
export {
  DomainSensitivityStore,
  JsonFileSensitivityPersistence,
  sensitivitySnapshotSchema,
  type DomainSensitivityStoreOptions,
  type EncounterStats,
  type SensitivityPersistence,
  type SensitivitySnapshot,
} from './core/domain-sensitivity-store.js';
export {
  DEFAULT_COOLDOWN_MULTIPLIERS,
  DEFAULT_EVENT_RULES,
  DEFAULT_LEVEL,
  DEFAULT_LEVEL_POLICIES,
  MAX_LEVEL,
  MIN_LEVEL,
  clampLevel,
  cooldownDurationMs,
  cooldownMultiplier,
  escalatedLevel,
  policyForLevel,
} from './core/sensitivity-policy.js';

// Extraction
export {
  ExtractionCascade,
  MethodTimeoutError,
  type CascadeResult,
  type ExtractionCascadeOptions,
} from './core/extraction-cascade.js';
export {
  INITIAL_STATE,
  CascadeTransitionError,
  isTerminal,
  transition,
  type CascadeEvent,
  type CascadeState,
  type TerminalState,
} from './core/cascade-state.js';
export {
  ExtractionError,
  NotFoundError,
  RateLimitedError,
  GenericExtractionError,
  isExtractionError,
  type ExtractionErrorCode,
} from './core/extraction-errors.js';
export { parseHeuristicArticle, parseStructuredArticle } from './core/article-parser.js';
export * from './core/extraction-methods/index.js';

// Scheduling
export {
  DomainBatchScheduler,
  decidePause,
  interleaveByDomain,
  jitteredBatchSize,
  longestSameDomainRun,
  type BatchAlert,
  type CascadeRunner,
  type DomainAnalysis,
  type DomainBatchSchedulerOptions,
  type PauseOptions,
  type RunSummary,
  type SchedulerStore,
} from './core/domain-batch-scheduler.js';
export { WorkerPool, type WorkerResult, type SchedulerFactory } from './core/worker-pool.js';
export { RateLimiter, SleepAbortedError, sleep, type PolicySource, type SleepFn } from './utils/rate-limiter.js';
export {
  InMemoryCandidateQueue,
  type CandidateSource,
  type OutcomeSink,
} from './core/work-queue.js';

// Telemetry
export {
  TelemetryWriter,
  LoggingTelemetrySink,
  JsonlTelemetrySink,
  InMemoryTelemetrySink,
  type TelemetryRecorder,
  type TelemetrySink,
  type TelemetryWriterStats,
} from './core/telemetry-writer.js';

// Engine and configuration
export { ExtractionEngine, createExtractionEngine, type ExtractionEngineDeps } from './core/engine.js';
export { loadEngineConfig, generateSampleConfig, findConfigFile } from './utils/config-loader.js';
export {
  ConfigValidationError,
  engineConfigSchema,
  type EngineConfig,
  type EngineConfigInput,
} from './utils/config-schemas.js';
export { configureLogger, logger } from './utils/logger.js';
