/**
 * Sensitivity Policy Tables
 *
 * Pure data describing how cautious to be with a domain at each sensitivity
 * level, how each detection event moves the level, and how long the
 * resulting cooldown lasts. Everything here is configuration-overridable;
 * the functions only read the tables they are given.
 */

import type { BotDetectionEventType, SensitivityPolicy } from '../types/index.js';

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 10;
export const DEFAULT_LEVEL = 5;

/**
 * One row of the level → policy table
 */
export interface LevelPolicyRow {
  level: number;
  interRequestMinSeconds: number;
  interRequestMaxSeconds: number;
  batchPauseSeconds: number;
  backoffBaseSeconds: number;
  backoffMaxSeconds: number;
}

/**
 * Default level table. Delay and backoff grow faster than linearly:
 * level 1 waits about a second between requests, level 10 waits up to a
 * minute and a half and backs off for hours.
 */
export const DEFAULT_LEVEL_POLICIES: readonly LevelPolicyRow[] = [
  { level: 1, interRequestMinSeconds: 0.5, interRequestMaxSeconds: 1.5, batchPauseSeconds: 5, backoffBaseSeconds: 300, backoffMaxSeconds: 900 },
  { level: 2, interRequestMinSeconds: 1, interRequestMaxSeconds: 3, batchPauseSeconds: 10, backoffBaseSeconds: 600, backoffMaxSeconds: 1800 },
  { level: 3, interRequestMinSeconds: 2, interRequestMaxSeconds: 5, batchPauseSeconds: 20, backoffBaseSeconds: 900, backoffMaxSeconds: 3600 },
  { level: 4, interRequestMinSeconds: 3, interRequestMaxSeconds: 8, batchPauseSeconds: 30, backoffBaseSeconds: 1200, backoffMaxSeconds: 5400 },
  { level: 5, interRequestMinSeconds: 5, interRequestMaxSeconds: 12, batchPauseSeconds: 60, backoffBaseSeconds: 1800, backoffMaxSeconds: 7200 },
  { level: 6, interRequestMinSeconds: 8, interRequestMaxSeconds: 18, batchPauseSeconds: 90, backoffBaseSeconds: 3600, backoffMaxSeconds: 10800 },
  { level: 7, interRequestMinSeconds: 12, interRequestMaxSeconds: 25, batchPauseSeconds: 120, backoffBaseSeconds: 5400, backoffMaxSeconds: 14400 },
  { level: 8, interRequestMinSeconds: 18, interRequestMaxSeconds: 35, batchPauseSeconds: 180, backoffBaseSeconds: 7200, backoffMaxSeconds: 21600 },
  { level: 9, interRequestMinSeconds: 30, interRequestMaxSeconds: 60, batchPauseSeconds: 240, backoffBaseSeconds: 10800, backoffMaxSeconds: 32400 },
  { level: 10, interRequestMinSeconds: 45, interRequestMaxSeconds: 90, batchPauseSeconds: 300, backoffBaseSeconds: 14400, backoffMaxSeconds: 43200 },
];

/**
 * How a detection event moves a domain's level
 */
export interface EventAdjustmentRule {
  increase: number;
  /** Ceiling this event type alone may push the level to */
  maxCap: number;
  baseCooldownHours: number;
}

export const DEFAULT_EVENT_RULES: Readonly<Record<BotDetectionEventType, EventAdjustmentRule>> = {
  rate_limit_429: { increase: 1, maxCap: 8, baseCooldownHours: 1 },
  forbidden_403: { increase: 2, maxCap: 8, baseCooldownHours: 2 },
  captcha_detected: { increase: 3, maxCap: 10, baseCooldownHours: 2 },
  connection_timeout: { increase: 1, maxCap: 7, baseCooldownHours: 0.5 },
  multiple_failures: { increase: 1, maxCap: 9, baseCooldownHours: 1 },
};

/**
 * Cooldown multiplier bucket: applies to levels up to and including maxLevel
 */
export interface CooldownMultiplierBucket {
  maxLevel: number;
  multiplier: number;
}

export const DEFAULT_COOLDOWN_MULTIPLIERS: readonly CooldownMultiplierBucket[] = [
  { maxLevel: 4, multiplier: 1 },
  { maxLevel: 6, multiplier: 2 },
  { maxLevel: 8, multiplier: 4 },
  { maxLevel: 10, multiplier: 8 },
];

const HOUR_MS = 60 * 60 * 1000;

export function clampLevel(level: number): number {
  if (!Number.isFinite(level)) {
    return DEFAULT_LEVEL;
  }
  return Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, Math.round(level)));
}

/**
 * Look up the policy row for a level. Out-of-range levels are clamped.
 */
export function policyForLevel(
  level: number,
  table: readonly LevelPolicyRow[] = DEFAULT_LEVEL_POLICIES
): SensitivityPolicy {
  const clamped = clampLevel(level);
  const row = table.find((r) => r.level === clamped) ?? table[table.length - 1];

  return {
    interRequestDelayRange: [row.interRequestMinSeconds, row.interRequestMaxSeconds],
    batchPauseSeconds: row.batchPauseSeconds,
    backoffRange: [row.backoffBaseSeconds, row.backoffMaxSeconds],
  };
}

/**
 * Step multiplier for a level, read from the bucket table
 */
export function cooldownMultiplier(
  level: number,
  buckets: readonly CooldownMultiplierBucket[] = DEFAULT_COOLDOWN_MULTIPLIERS
): number {
  const clamped = clampLevel(level);
  const bucket = buckets.find((b) => clamped <= b.maxLevel);
  return bucket ? bucket.multiplier : buckets[buckets.length - 1].multiplier;
}

/**
 * Cooldown duration in milliseconds for an event at the given level
 */
export function cooldownDurationMs(
  rule: EventAdjustmentRule,
  level: number,
  buckets: readonly CooldownMultiplierBucket[] = DEFAULT_COOLDOWN_MULTIPLIERS
): number {
  return Math.round(rule.baseCooldownHours * cooldownMultiplier(level, buckets) * HOUR_MS);
}

/**
 * Level after applying a rule. Never lowers the level: when the rule's cap
 * is already below the current level, the current level stands.
 */
export function escalatedLevel(current: number, rule: EventAdjustmentRule): number {
  const base = clampLevel(current);
  const target = Math.min(base + rule.increase, rule.maxCap);
  return clampLevel(Math.max(base, target));
}
