/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';
import {
  DEFAULT_COOLDOWN_MULTIPLIERS,
  DEFAULT_EVENT_RULES,
  DEFAULT_LEVEL,
  DEFAULT_LEVEL_POLICIES,
  MAX_LEVEL,
  MIN_LEVEL,
} from '../core/sensitivity-policy.js';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: {
  min?: number;
  max?: number;
  default: number;
}) {
  let schema = z.coerce.number().int();

  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);

  return schema.default(options.default);
}

/**
 * Schema for parsing a string as a non-negative number of seconds.
 */
export function secondsStringSchema(defaultVal: number) {
  return z.coerce.number().min(0).default(defaultVal);
}

/**
 * Schema for parsing a string as a float between 0 and 1 (jitter fraction).
 */
export function rateSchema(defaultVal: number) {
  return z.coerce.number().min(0).max(1).default(defaultVal);
}

/**
 * Optional string that treats '' as unset
 */
const optionalStringSchema = z
  .string()
  .optional()
  .transform((val) => (val ? val : undefined));

const levelSchema = z.number().int().min(MIN_LEVEL).max(MAX_LEVEL);

const httpStatusListSchema = z.array(z.number().int().min(100).max(599));

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// DETECTOR CONFIGURATION
// ============================================

export const DEFAULT_SIGNATURES = {
  cloudflare_challenge: [
    'checking your browser',
    'cloudflare ray id',
    'ddos protection by cloudflare',
    'cf-browser-verification',
    'cf_chl_opt',
    'just a moment...',
    'under attack mode',
  ],
  captcha: [
    'captcha verification',
    'complete the captcha',
    'solve the captcha',
    'are you a robot',
    'verify you are human',
    'prove you are human',
  ],
  generic_block: [
    'access denied',
    'blocked by',
    'bot protection',
    'security check',
    'please wait while we verify',
    'browser check',
    'request blocked',
    'unusual traffic',
  ],
};

/**
 * Markers of an interstitial served with 2xx. Narrower than the blocking
 * signatures: ordinary pages load Cloudflare scripts and reCAPTCHA widgets.
 */
export const DEFAULT_CHALLENGE_PAGE_SIGNATURES = {
  cloudflare_challenge: [
    '<title>just a moment...</title>',
    'cf_chl_opt',
    'cf-browser-verification',
    'checking your browser before accessing',
  ],
  captcha: [
    'please complete the captcha',
    'complete the captcha to continue',
    'are you a robot',
    'verify you are human',
    'prove you are human',
  ],
  generic_block: [
    'please wait while we verify',
    'request blocked',
    'unusual traffic from your computer',
  ],
};

/** Lower-cased markup that identifies a real article page */
export const DEFAULT_ARTICLE_MARKERS = [
  '<article',
  '"newsarticle"',
  'schema.org/newsarticle',
  'og:type" content="article"',
];

const signatureListSchema = z.array(z.string().min(1));

export const signatureFamiliesSchema = z.object({
  cloudflare_challenge: signatureListSchema.default(DEFAULT_SIGNATURES.cloudflare_challenge),
  captcha: signatureListSchema.default(DEFAULT_SIGNATURES.captcha),
  generic_block: signatureListSchema.default(DEFAULT_SIGNATURES.generic_block),
});

export const challengePageSignaturesSchema = z.object({
  cloudflare_challenge: signatureListSchema.default(DEFAULT_CHALLENGE_PAGE_SIGNATURES.cloudflare_challenge),
  captcha: signatureListSchema.default(DEFAULT_CHALLENGE_PAGE_SIGNATURES.captcha),
  generic_block: signatureListSchema.default(DEFAULT_CHALLENGE_PAGE_SIGNATURES.generic_block),
});

export type SignatureFamilies = z.infer<typeof signatureFamiliesSchema>;

export const detectorConfigSchema = z.object({
  minResponseBytes: integerStringSchema({ min: 0, max: 1_000_000, default: 500 }),
  maxChallengePageBytes: integerStringSchema({ min: 0, max: 10_000_000, default: 100_000 }),
  blockingStatuses: httpStatusListSchema.default([401, 403, 502, 503, 504]),
  shortResponseStatuses: httpStatusListSchema.default([403, 503]),
  notFoundStatuses: httpStatusListSchema.default([404, 410]),
  signatures: signatureFamiliesSchema.default({}),
  challengePageSignatures: challengePageSignaturesSchema.default({}),
  articleMarkers: signatureListSchema.default(DEFAULT_ARTICLE_MARKERS),
});

export type DetectorConfig = z.infer<typeof detectorConfigSchema>;

// ============================================
// SENSITIVITY CONFIGURATION
// ============================================

export const levelPolicyRowSchema = z
  .object({
    level: levelSchema,
    interRequestMinSeconds: z.number().min(0),
    interRequestMaxSeconds: z.number().min(0),
    batchPauseSeconds: z.number().min(0),
    backoffBaseSeconds: z.number().min(0),
    backoffMaxSeconds: z.number().min(0),
  })
  .refine((row) => row.interRequestMinSeconds <= row.interRequestMaxSeconds, {
    message: 'interRequestMinSeconds must not exceed interRequestMaxSeconds',
  })
  .refine((row) => row.backoffBaseSeconds <= row.backoffMaxSeconds, {
    message: 'backoffBaseSeconds must not exceed backoffMaxSeconds',
  });

export const eventAdjustmentRuleSchema = z.object({
  increase: z.number().int().min(0).max(MAX_LEVEL),
  maxCap: levelSchema,
  baseCooldownHours: z.number().min(0),
});

export const eventRulesSchema = z.object({
  rate_limit_429: eventAdjustmentRuleSchema.default(DEFAULT_EVENT_RULES.rate_limit_429),
  forbidden_403: eventAdjustmentRuleSchema.default(DEFAULT_EVENT_RULES.forbidden_403),
  captcha_detected: eventAdjustmentRuleSchema.default(DEFAULT_EVENT_RULES.captcha_detected),
  connection_timeout: eventAdjustmentRuleSchema.default(DEFAULT_EVENT_RULES.connection_timeout),
  multiple_failures: eventAdjustmentRuleSchema.default(DEFAULT_EVENT_RULES.multiple_failures),
});

export const cooldownMultiplierSchema = z.object({
  maxLevel: levelSchema,
  multiplier: z.number().min(0),
});

export const decayConfigSchema = z.object({
  enabled: z.boolean().default(false),
  successThreshold: z.number().int().min(1).default(20),
  quietHours: z.number().min(0).default(72),
});

export const sensitivityConfigSchema = z.object({
  defaultLevel: levelSchema.default(DEFAULT_LEVEL),
  /** Known sensitive publishers start above the default */
  initialLevels: z.record(z.string(), levelSchema).default({}),
  levels: z
    .array(levelPolicyRowSchema)
    .length(MAX_LEVEL)
    .refine((rows) => rows.every((row, index) => row.level === index + MIN_LEVEL), {
      message: 'levels must list each level from 1 to 10 in order',
    })
    .default(DEFAULT_LEVEL_POLICIES.map((row) => ({ ...row }))),
  eventRules: eventRulesSchema.default({}),
  cooldownMultipliers: z
    .array(cooldownMultiplierSchema)
    .min(1)
    .default(DEFAULT_COOLDOWN_MULTIPLIERS.map((bucket) => ({ ...bucket }))),
  decay: decayConfigSchema.default({}),
  statePath: optionalStringSchema,
});

export type SensitivityConfig = z.infer<typeof sensitivityConfigSchema>;

// ============================================
// CASCADE CONFIGURATION
// ============================================

export const cascadeConfigSchema = z.object({
  methodFailureThreshold: integerStringSchema({ min: 1, max: 100, default: 3 }),
  /** How long a suppressed fallback method sits out before it is retried */
  methodSuppressionSeconds: secondsStringSchema(1800),
  minContentLength: integerStringSchema({ min: 0, max: 100_000, default: 200 }),
  structuredTimeoutMs: integerStringSchema({ min: 100, max: 300_000, default: TIMEOUTS.STRUCTURED_METHOD }),
  heuristicTimeoutMs: integerStringSchema({ min: 100, max: 300_000, default: TIMEOUTS.HEURISTIC_METHOD }),
  browserTimeoutMs: integerStringSchema({ min: 1000, max: 600_000, default: TIMEOUTS.BROWSER_METHOD }),
});

export type CascadeConfig = z.infer<typeof cascadeConfigSchema>;

// ============================================
// BROWSER CONFIGURATION
// ============================================

export const browserConfigSchema = z.object({
  enabled: z.boolean().default(true),
  proxyUrl: optionalStringSchema.pipe(z.string().url().optional()),
  headless: z.boolean().default(true),
  navigationTimeoutMs: integerStringSchema({ min: 1000, max: 600_000, default: TIMEOUTS.BROWSER_NAVIGATION }),
  settleMs: integerStringSchema({ min: 0, max: 60_000, default: TIMEOUTS.BROWSER_SETTLE }),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// PROXY CONFIGURATION (fetch-based methods)
// ============================================

/**
 * Comma-separated string or list of hosts that skip the proxy
 */
const bypassHostsSchema = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((val) => {
    const entries = val === undefined ? [] : typeof val === 'string' ? val.split(',') : val;
    return [...new Set(entries.map((entry) => entry.trim().toLowerCase()).filter(Boolean))];
  });

export const proxyConfigSchema = z.object({
  /** HTTP proxy for the structured and heuristic methods; unset connects directly */
  proxyUrl: optionalStringSchema,
  bypassHosts: bypassHostsSchema,
});

export type ProxyConfig = z.infer<typeof proxyConfigSchema>;

// ============================================
// SCHEDULER CONFIGURATION
// ============================================

export const schedulerConfigSchema = z.object({
  batchSize: integerStringSchema({ min: 1, max: 10_000, default: 50 }),
  /** Fractional +/- jitter applied to batchSize */
  batchSizeJitter: rateSchema(0),
  candidateBufferMultiplier: integerStringSchema({ min: 1, max: 20, default: 3 }),
  /** Long pause override; unset means the domain policy's batch pause */
  batchSleepSeconds: z.coerce.number().min(0).optional(),
  batchSleepJitter: rateSchema(0.2),
  interBatchMinPauseSeconds: secondsStringSchema(TIMEOUTS.INTER_BATCH_MIN_PAUSE / 1000),
  maxSameDomainConsecutive: integerStringSchema({ min: 0, max: 1000, default: 3 }),
  maxArticlesPerDomainPerBatch: integerStringSchema({ min: 1, max: 1000, default: 3 }),
  maxFailuresPerDomainPerBatch: integerStringSchema({ min: 1, max: 1000, default: 2 }),
  maxBatches: z.coerce.number().int().min(1).optional(),
});

export type SchedulerConfig = z.infer<typeof schedulerConfigSchema>;

// ============================================
// WORKERS & TELEMETRY
// ============================================

export const workerConfigSchema = z.object({
  count: integerStringSchema({ min: 1, max: 64, default: 1 }),
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;

export const telemetryConfigSchema = z.object({
  maxQueueSize: integerStringSchema({ min: 1, max: 1_000_000, default: 1000 }),
  /** When set, records are appended to this JSONL file */
  jsonlPath: optionalStringSchema,
});

export type TelemetryConfig = z.infer<typeof telemetryConfigSchema>;

// ============================================
// COMPLETE ENGINE CONFIGURATION
// ============================================

/**
 * Complete validated configuration for the extraction engine.
 */
export const engineConfigSchema = z.object({
  log: logConfigSchema.default({}),
  detector: detectorConfigSchema.default({}),
  sensitivity: sensitivityConfigSchema.default({}),
  cascade: cascadeConfigSchema.default({}),
  browser: browserConfigSchema.default({}),
  proxy: proxyConfigSchema.default({}),
  scheduler: schedulerConfigSchema.default({}),
  workers: workerConfigSchema.default({}),
  telemetry: telemetryConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse a section, throwing ConfigValidationError on failure
 */
export function parseSection<T extends z.ZodTypeAny>(
  section: string,
  schema: T,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}
