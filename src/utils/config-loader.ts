/**
 * Configuration File Loader
 *
 * Loads configuration from .newsextractorrc or .newsextractorrc.json files.
 * Configuration precedence: Environment Variables > Config File > Defaults
 *
 * Search paths (in order):
 * 1. Current working directory
 * 2. Home directory (~/.newsextractorrc)
 *
 * @example
 * // .newsextractorrc in project root
 * {
 *   "log": { "level": "debug" },
 *   "scheduler": { "batchSize": 25, "maxArticlesPerDomainPerBatch": 2 },
 *   "sensitivity": { "initialLevels": { "example-daily.com": 8 } }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  logLevelSchema,
  logConfigSchema,
  detectorConfigSchema,
  sensitivityConfigSchema,
  cascadeConfigSchema,
  browserConfigSchema,
  proxyConfigSchema,
  schedulerConfigSchema,
  workerConfigSchema,
  telemetryConfigSchema,
  levelPolicyRowSchema,
  eventAdjustmentRuleSchema,
  cooldownMultiplierSchema,
  parseSection,
  type LogConfig,
  type DetectorConfig,
  type SensitivityConfig,
  type CascadeConfig,
  type BrowserConfig,
  type ProxyConfig,
  type SchedulerConfig,
  type WorkerConfig,
  type TelemetryConfig,
  type EngineConfig,
} from './config-schemas.js';
import { logger } from './logger.js';

const log = logger.config;

// ============================================
// CONFIG FILE SCHEMA
// ============================================

const statusList = z.array(z.number().int().min(100).max(599));

const signatureFamiliesFileSchema = z.object({
  cloudflare_challenge: z.array(z.string()).optional(),
  captcha: z.array(z.string()).optional(),
  generic_block: z.array(z.string()).optional(),
});

/**
 * Schema for configuration file contents.
 * All fields are optional - missing fields use defaults or env vars.
 */
export const configFileSchema = z.object({
  log: z.object({
    level: logLevelSchema.optional(),
    prettyPrint: z.boolean().optional(),
  }).optional(),

  detector: z.object({
    minResponseBytes: z.number().int().min(0).optional(),
    maxChallengePageBytes: z.number().int().min(0).optional(),
    blockingStatuses: statusList.optional(),
    shortResponseStatuses: statusList.optional(),
    notFoundStatuses: statusList.optional(),
    signatures: signatureFamiliesFileSchema.optional(),
    challengePageSignatures: signatureFamiliesFileSchema.optional(),
    articleMarkers: z.array(z.string()).optional(),
  }).optional(),

  sensitivity: z.object({
    defaultLevel: z.number().int().optional(),
    initialLevels: z.record(z.string(), z.number().int()).optional(),
    levels: z.array(levelPolicyRowSchema).optional(),
    eventRules: z.object({
      rate_limit_429: eventAdjustmentRuleSchema.optional(),
      forbidden_403: eventAdjustmentRuleSchema.optional(),
      captcha_detected: eventAdjustmentRuleSchema.optional(),
      connection_timeout: eventAdjustmentRuleSchema.optional(),
      multiple_failures: eventAdjustmentRuleSchema.optional(),
    }).optional(),
    cooldownMultipliers: z.array(cooldownMultiplierSchema).optional(),
    decay: z.object({
      enabled: z.boolean().optional(),
      successThreshold: z.number().int().optional(),
      quietHours: z.number().optional(),
    }).optional(),
    statePath: z.string().optional(),
  }).optional(),

  cascade: z.object({
    methodFailureThreshold: z.number().int().optional(),
    methodSuppressionSeconds: z.number().optional(),
    minContentLength: z.number().int().optional(),
    structuredTimeoutMs: z.number().int().optional(),
    heuristicTimeoutMs: z.number().int().optional(),
    browserTimeoutMs: z.number().int().optional(),
  }).optional(),

  browser: z.object({
    enabled: z.boolean().optional(),
    proxyUrl: z.string().optional(),
    headless: z.boolean().optional(),
    navigationTimeoutMs: z.number().int().optional(),
    settleMs: z.number().int().optional(),
  }).optional(),

  proxy: z.object({
    proxyUrl: z.string().optional(),
    bypassHosts: z.array(z.string()).optional(),
  }).optional(),

  scheduler: z.object({
    batchSize: z.number().int().optional(),
    batchSizeJitter: z.number().optional(),
    candidateBufferMultiplier: z.number().int().optional(),
    batchSleepSeconds: z.number().optional(),
    batchSleepJitter: z.number().optional(),
    interBatchMinPauseSeconds: z.number().optional(),
    maxSameDomainConsecutive: z.number().int().optional(),
    maxArticlesPerDomainPerBatch: z.number().int().optional(),
    maxFailuresPerDomainPerBatch: z.number().int().optional(),
    maxBatches: z.number().int().optional(),
  }).optional(),

  workers: z.object({
    count: z.number().int().optional(),
  }).optional(),

  telemetry: z.object({
    maxQueueSize: z.number().int().optional(),
    jsonlPath: z.string().optional(),
  }).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================
// FILE SEARCH
// ============================================

/**
 * Names of config files to search for (in priority order).
 */
export const CONFIG_FILE_NAMES = ['.newsextractorrc', '.newsextractorrc.json'];

/**
 * Get directories to search for config files.
 */
function getSearchPaths(): string[] {
  const paths: string[] = [process.cwd()];

  const home = homedir();
  if (home && !paths.includes(home)) {
    paths.push(home);
  }

  return paths;
}

/**
 * Find the first existing config file.
 */
export function findConfigFile(searchPaths: string[] = getSearchPaths()): string | null {
  for (const dir of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        log.debug('Found config file', { path: filePath });
        return filePath;
      }
    }
  }

  log.debug('No config file found', { searchPaths, fileNames: CONFIG_FILE_NAMES });
  return null;
}

// ============================================
// FILE LOADING
// ============================================

/**
 * Load and parse a config file. Invalid files log a warning and yield {}.
 */
export function loadConfigFile(filePath: string): ConfigFile {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');

    // Allow // and /* */ comments in rc files
    const stripped = content
      .replace(/\/\*[\s\S]*?\*\//g, '')
      .replace(/^\s*\/\/.*$/gm, '');

    parsed = JSON.parse(stripped);
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.warn('Config file has invalid JSON', { path: filePath, error: error.message });
    } else {
      log.warn('Failed to read config file', { path: filePath, error: String(error) });
    }
    return {};
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    log.warn('Config file validation failed', {
      path: filePath,
      errors: result.error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    });
    return {};
  }

  log.info('Loaded config file', {
    path: filePath,
    sections: Object.entries(result.data)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key),
  });

  return result.data;
}

// ============================================
// CACHED CONFIG
// ============================================

let cachedConfigFile: ConfigFile | null = null;

/**
 * Get the loaded config file (cached after first load).
 */
export function getConfigFile(searchPaths?: string[]): ConfigFile {
  if (cachedConfigFile === null) {
    const filePath = findConfigFile(searchPaths);
    cachedConfigFile = filePath ? loadConfigFile(filePath) : {};
  }
  return cachedConfigFile;
}

/**
 * Clear the config file cache.
 */
export function clearConfigFileCache(): void {
  cachedConfigFile = null;
}

// ============================================
// MERGE HELPERS
// ============================================

function boolToEnvString(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? 'true' : 'false';
}

function numToEnvString(value: number | undefined): string | undefined {
  if (value === undefined) return undefined;
  return String(value);
}

/**
 * Read an env var, treating the empty string as unset
 */
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

// ============================================
// MERGED CONFIG FUNCTIONS
// ============================================

/**
 * Get merged log configuration.
 * Config file values are used unless overridden by environment variables.
 */
export function getMergedLogConfig(file: ConfigFile = getConfigFile()): LogConfig {
  const section = file.log ?? {};

  return parseSection('log', logConfigSchema, {
    level: env('LOG_LEVEL') ?? section.level,
    prettyPrint: env('LOG_PRETTY') ?? boolToEnvString(section.prettyPrint),
  });
}

export function getMergedDetectorConfig(file: ConfigFile = getConfigFile()): DetectorConfig {
  const section = file.detector ?? {};

  return parseSection('detector', detectorConfigSchema, {
    ...section,
    minResponseBytes: env('MIN_RESPONSE_BYTES') ?? numToEnvString(section.minResponseBytes),
  });
}

export function getMergedSensitivityConfig(file: ConfigFile = getConfigFile()): SensitivityConfig {
  const section = file.sensitivity ?? {};

  return parseSection('sensitivity', sensitivityConfigSchema, {
    ...section,
    statePath: env('SENSITIVITY_STATE_PATH') ?? section.statePath,
  });
}

export function getMergedCascadeConfig(file: ConfigFile = getConfigFile()): CascadeConfig {
  const section = file.cascade ?? {};

  return parseSection('cascade', cascadeConfigSchema, {
    ...section,
    methodFailureThreshold:
      env('METHOD_FAILURE_THRESHOLD') ?? numToEnvString(section.methodFailureThreshold),
    browserTimeoutMs: env('BROWSER_TIMEOUT_MS') ?? numToEnvString(section.browserTimeoutMs),
  });
}

export function getMergedBrowserConfig(file: ConfigFile = getConfigFile()): BrowserConfig {
  const section = file.browser ?? {};

  return parseSection('browser', browserConfigSchema, {
    ...section,
    proxyUrl: env('BROWSER_PROXY_URL') ?? section.proxyUrl,
  });
}

export function getMergedProxyConfig(file: ConfigFile = getConfigFile()): ProxyConfig {
  const section = file.proxy ?? {};

  return parseSection('proxy', proxyConfigSchema, {
    proxyUrl: env('PROXY_URL') ?? section.proxyUrl,
    bypassHosts: env('PROXY_BYPASS') ?? section.bypassHosts,
  });
}

export function getMergedSchedulerConfig(file: ConfigFile = getConfigFile()): SchedulerConfig {
  const section = file.scheduler ?? {};

  return parseSection('scheduler', schedulerConfigSchema, {
    ...section,
    batchSize: env('BATCH_SIZE') ?? numToEnvString(section.batchSize),
    batchSizeJitter: env('BATCH_SIZE_JITTER') ?? numToEnvString(section.batchSizeJitter),
    batchSleepSeconds: env('BATCH_SLEEP_SECONDS') ?? numToEnvString(section.batchSleepSeconds),
    batchSleepJitter: env('BATCH_SLEEP_JITTER') ?? numToEnvString(section.batchSleepJitter),
    interBatchMinPauseSeconds:
      env('INTER_BATCH_MIN_PAUSE') ?? numToEnvString(section.interBatchMinPauseSeconds),
    maxSameDomainConsecutive:
      env('MAX_SAME_DOMAIN_CONSECUTIVE') ?? numToEnvString(section.maxSameDomainConsecutive),
    maxArticlesPerDomainPerBatch:
      env('MAX_ARTICLES_PER_DOMAIN_PER_BATCH') ?? numToEnvString(section.maxArticlesPerDomainPerBatch),
  });
}

export function getMergedWorkerConfig(file: ConfigFile = getConfigFile()): WorkerConfig {
  return parseSection('workers', workerConfigSchema, file.workers ?? {});
}

export function getMergedTelemetryConfig(file: ConfigFile = getConfigFile()): TelemetryConfig {
  return parseSection('telemetry', telemetryConfigSchema, file.telemetry ?? {});
}

/**
 * Load the complete engine configuration: env over file over defaults.
 *
 * @throws ConfigValidationError when a merged section is invalid
 */
export function loadEngineConfig(file: ConfigFile = getConfigFile()): EngineConfig {
  return {
    log: getMergedLogConfig(file),
    detector: getMergedDetectorConfig(file),
    sensitivity: getMergedSensitivityConfig(file),
    cascade: getMergedCascadeConfig(file),
    browser: getMergedBrowserConfig(file),
    proxy: getMergedProxyConfig(file),
    scheduler: getMergedSchedulerConfig(file),
    workers: getMergedWorkerConfig(file),
    telemetry: getMergedTelemetryConfig(file),
  };
}

/**
 * Generate a sample .newsextractorrc file with the commonly tuned options.
 */
export function generateSampleConfig(): string {
  const sample = {
    log: { level: 'info', prettyPrint: false },
    detector: { minResponseBytes: 500, maxChallengePageBytes: 100000 },
    sensitivity: {
      defaultLevel: 5,
      initialLevels: {},
      decay: { enabled: false, successThreshold: 20, quietHours: 72 },
    },
    cascade: { methodFailureThreshold: 3, methodSuppressionSeconds: 1800, minContentLength: 200, browserTimeoutMs: 60000 },
    browser: { enabled: true, headless: true },
    proxy: { bypassHosts: [] },
    scheduler: {
      batchSize: 50,
      candidateBufferMultiplier: 3,
      interBatchMinPauseSeconds: 5,
      maxSameDomainConsecutive: 3,
      maxArticlesPerDomainPerBatch: 3,
      maxFailuresPerDomainPerBatch: 2,
    },
    workers: { count: 1 },
    telemetry: { maxQueueSize: 1000 },
  };

  return JSON.stringify(sample, null, 2);
}
