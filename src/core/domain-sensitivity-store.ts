/**
 * Domain Sensitivity Store
 *
 * Per-domain adaptive state: a sensitivity level in [1, 10], a cooldown
 * window, an encounter count and an append-only audit log of bot detection
 * events. The level drives the pacing policy the scheduler reads.
 *
 * Mutations for one domain are serialized through a keyed mutex, so two
 * workers reporting the same block cannot double-escalate. Callers that
 * may retry the same detection pass an instanceKey; a repeated key is
 * ignored.
 */

import { z } from 'zod';
import type {
  BotDetectionEvent,
  BotDetectionEventType,
  DetectionDetails,
  DomainSensitivity,
  SensitivityPolicy,
} from '../types/index.js';
import { sensitivityConfigSchema, type SensitivityConfig } from '../utils/config-schemas.js';
import { getDomain } from '../utils/domain.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger } from '../utils/logger.js';
import { PersistentStore } from '../utils/persistent-store.js';
import {
  MIN_LEVEL,
  clampLevel,
  cooldownDurationMs,
  escalatedLevel,
  policyForLevel,
} from './sensitivity-policy.js';

const log = logger.sensitivity;

const HOUR_MS = 60 * 60 * 1000;

/** Oldest events are dropped past this many */
const DEFAULT_MAX_EVENTS = 10_000;

/** Remembered instance keys for retry de-duplication */
const MAX_INSTANCE_KEYS = 10_000;

// ============================================
// SNAPSHOTS & PERSISTENCE
// ============================================

const protectionKindSchema = z.enum([
  'rate_limited',
  'cloudflare_challenge',
  'captcha',
  'generic_block',
  'server_block',
  'suspicious_short_response',
]);

const eventTypeSchema = z.enum([
  'rate_limit_429',
  'forbidden_403',
  'captcha_detected',
  'connection_timeout',
  'multiple_failures',
]);

export const sensitivitySnapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.number(),
  domains: z.array(
    z.object({
      domain: z.string(),
      level: z.number().int().min(1).max(10),
      encounters: z.number().int().min(0),
      lastDetectionAt: z.number().nullable(),
      cooldownUntil: z.number().nullable(),
      successStreak: z.number().int().min(0).default(0),
    })
  ),
  events: z.array(
    z.object({
      domain: z.string(),
      eventType: eventTypeSchema,
      detectedAt: z.number(),
      url: z.string().optional(),
      httpStatus: z.number().nullable().optional(),
      protectionKind: protectionKindSchema.nullable().optional(),
      previousLevel: z.number(),
      newLevel: z.number(),
      adjusted: z.boolean(),
    })
  ),
});

export type SensitivitySnapshot = z.infer<typeof sensitivitySnapshotSchema>;

/**
 * Where snapshots go after each mutation
 */
export interface SensitivityPersistence {
  load(): Promise<SensitivitySnapshot | null>;
  save(snapshot: SensitivitySnapshot): Promise<void>;
  flush(): Promise<void>;
}

/**
 * JSON file persistence with debounced atomic writes
 */
export class JsonFileSensitivityPersistence implements SensitivityPersistence {
  private store: PersistentStore<SensitivitySnapshot>;

  constructor(filePath: string, options: { debounceMs?: number } = {}) {
    this.store = new PersistentStore(filePath, sensitivitySnapshotSchema, {
      componentName: 'SensitivityState',
      debounceMs: options.debounceMs ?? 250,
    });
  }

  load(): Promise<SensitivitySnapshot | null> {
    return this.store.load();
  }

  async save(snapshot: SensitivitySnapshot): Promise<void> {
    this.store.save(snapshot);
  }

  flush(): Promise<void> {
    return this.store.flush();
  }

  getFilePath(): string {
    return this.store.getFilePath();
  }
}

// ============================================
// STORE
// ============================================

export interface EncounterStats {
  totalEvents: number;
  byEventType: Record<BotDetectionEventType, number>;
  domains: number;
  domainsInCooldown: number;
  lastDetectionAt: number | null;
}

export interface DomainSensitivityStoreOptions {
  config?: SensitivityConfig;
  persistence?: SensitivityPersistence;
  now?: () => number;
  maxEvents?: number;
}

export class DomainSensitivityStore {
  private readonly config: SensitivityConfig;
  private readonly persistence: SensitivityPersistence | null;
  private readonly now: () => number;
  private readonly maxEvents: number;
  private readonly mutex = new KeyedMutex();

  private domains: Map<string, DomainSensitivity> = new Map();
  private events: BotDetectionEvent[] = [];
  private seenInstanceKeys: Set<string> = new Set();

  constructor(options: DomainSensitivityStoreOptions = {}) {
    this.config = options.config ?? sensitivityConfigSchema.parse({});
    this.persistence = options.persistence ?? null;
    this.now = options.now ?? Date.now;
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS;
  }

  // ============================================
  // READS
  // ============================================

  /**
   * Current state for a domain. Unknown domains report their initial level
   * without being stored.
   */
  get(domain: string): DomainSensitivity {
    const key = getDomain(domain);
    const existing = this.domains.get(key);
    return existing ? { ...existing } : this.initialRecord(key);
  }

  getLevel(domain: string): number {
    return this.get(domain).level;
  }

  getPolicy(domain: string): SensitivityPolicy {
    return policyForLevel(this.getLevel(domain), this.config.levels);
  }

  isInCooldown(domain: string): boolean {
    return this.getCooldownRemainingMs(domain) > 0;
  }

  getCooldownRemainingMs(domain: string): number {
    const { cooldownUntil } = this.get(domain);
    if (cooldownUntil === null) return 0;
    return Math.max(0, cooldownUntil - this.now());
  }

  /**
   * Audit log, oldest first, optionally for one domain
   */
  getEvents(domain?: string): BotDetectionEvent[] {
    if (domain === undefined) {
      return this.events.map((event) => ({ ...event }));
    }
    const key = getDomain(domain);
    return this.events.filter((event) => event.domain === key).map((event) => ({ ...event }));
  }

  getEncounterStats(domain?: string): EncounterStats {
    const events = this.getEvents(domain);
    const byEventType: Record<BotDetectionEventType, number> = {
      rate_limit_429: 0,
      forbidden_403: 0,
      captcha_detected: 0,
      connection_timeout: 0,
      multiple_failures: 0,
    };
    for (const event of events) {
      byEventType[event.eventType]++;
    }

    const records = domain === undefined
      ? [...this.domains.values()]
      : [this.get(domain)];
    const now = this.now();

    return {
      totalEvents: events.length,
      byEventType,
      domains: records.length,
      domainsInCooldown: records.filter((r) => r.cooldownUntil !== null && r.cooldownUntil > now).length,
      lastDetectionAt: records.reduce<number | null>(
        (latest, r) =>
          r.lastDetectionAt !== null && (latest === null || r.lastDetectionAt > latest)
            ? r.lastDetectionAt
            : latest,
        null
      ),
    };
  }

  listDomains(): DomainSensitivity[] {
    return [...this.domains.values()].map((record) => ({ ...record }));
  }

  // ============================================
  // MUTATIONS
  // ============================================

  /**
   * Record one detected instance of bot protection.
   *
   * Outside a cooldown the level escalates and a cooldown starts. Inside an
   * active cooldown the event is still logged and counted, but the level and
   * window stay as they are.
   *
   * @returns the appended event, or null when details.instanceKey was
   * already recorded
   */
  recordDetection(
    domain: string,
    eventType: BotDetectionEventType,
    details: DetectionDetails = {}
  ): Promise<BotDetectionEvent | null> {
    const key = getDomain(domain);

    return this.mutex.runExclusive(key, async () => {
      if (details.instanceKey !== undefined && !this.rememberInstance(key, details.instanceKey)) {
        log.debug('Duplicate detection ignored', { domain: key, eventType, instanceKey: details.instanceKey });
        return null;
      }

      const now = this.now();
      const record = this.ensure(key);
      const rule = this.config.eventRules[eventType];
      const previousLevel = record.level;
      const inCooldown = record.cooldownUntil !== null && record.cooldownUntil > now;

      if (!inCooldown) {
        record.level = escalatedLevel(previousLevel, rule);
        // Multiplier uses the level the domain was at when the block hit
        const until = now + cooldownDurationMs(rule, previousLevel, this.config.cooldownMultipliers);
        record.cooldownUntil = Math.max(record.cooldownUntil ?? 0, until);
      }

      record.encounters++;
      record.lastDetectionAt = now;
      record.successStreak = 0;

      const event: BotDetectionEvent = {
        domain: key,
        eventType,
        detectedAt: now,
        url: details.url,
        httpStatus: details.httpStatus ?? null,
        protectionKind: details.protectionKind ?? null,
        previousLevel,
        newLevel: record.level,
        adjusted: !inCooldown,
      };
      this.appendEvent(event);

      if (inCooldown) {
        log.debug('Detection during cooldown; level unchanged', {
          domain: key,
          eventType,
          level: record.level,
          encounters: record.encounters,
        });
      } else {
        log.warn('Bot detection recorded', {
          domain: key,
          eventType,
          protectionKind: event.protectionKind,
          previousLevel,
          level: record.level,
          cooldownUntil: record.cooldownUntil === null ? null : new Date(record.cooldownUntil).toISOString(),
        });
      }

      await this.persist();
      return { ...event };
    });
  }

  /**
   * Record a successful extraction. Never lowers the level immediately;
   * with decay enabled, a long enough quiet streak lowers it by one.
   */
  recordSuccess(domain: string): Promise<DomainSensitivity> {
    const key = getDomain(domain);

    return this.mutex.runExclusive(key, async () => {
      const record = this.ensure(key);
      record.successStreak++;

      if (this.shouldDecay(record)) {
        const previousLevel = record.level;
        record.level = Math.max(MIN_LEVEL, record.level - 1);
        record.successStreak = 0;
        log.info('Sensitivity decayed', { domain: key, previousLevel, level: record.level });
        await this.persist();
      }

      return { ...record };
    });
  }

  /**
   * Set a level directly (operator override). Cooldown is left untouched.
   */
  setLevel(domain: string, level: number): Promise<DomainSensitivity> {
    const key = getDomain(domain);
    return this.mutex.runExclusive(key, async () => {
      const record = this.ensure(key);
      record.level = clampLevel(level);
      await this.persist();
      return { ...record };
    });
  }

  // ============================================
  // SNAPSHOTS
  // ============================================

  snapshot(): SensitivitySnapshot {
    return {
      version: 1,
      savedAt: this.now(),
      domains: this.listDomains(),
      events: this.getEvents(),
    };
  }

  restore(snapshot: SensitivitySnapshot): void {
    this.domains = new Map(
      snapshot.domains.map((record) => [
        record.domain,
        { ...record, level: clampLevel(record.level) },
      ])
    );
    this.events = snapshot.events.slice(-this.maxEvents).map((event) => ({ ...event }));
    this.seenInstanceKeys.clear();
  }

  /**
   * Restore from the configured persistence, if any
   *
   * @returns true when a snapshot was found
   */
  async load(): Promise<boolean> {
    if (!this.persistence) return false;
    const snapshot = await this.persistence.load();
    if (!snapshot) return false;
    this.restore(snapshot);
    log.info('Restored sensitivity state', {
      domains: snapshot.domains.length,
      events: snapshot.events.length,
    });
    return true;
  }

  async flush(): Promise<void> {
    if (!this.persistence) return;
    try {
      await this.persistence.flush();
    } catch (error) {
      log.error('Failed to flush sensitivity state', { error });
    }
  }

  // ============================================
  // INTERNALS
  // ============================================

  private initialRecord(domain: string): DomainSensitivity {
    return {
      domain,
      level: clampLevel(this.config.initialLevels[domain] ?? this.config.defaultLevel),
      encounters: 0,
      lastDetectionAt: null,
      cooldownUntil: null,
      successStreak: 0,
    };
  }

  private ensure(domain: string): DomainSensitivity {
    let record = this.domains.get(domain);
    if (!record) {
      record = this.initialRecord(domain);
      this.domains.set(domain, record);
    }
    return record;
  }

  private shouldDecay(record: DomainSensitivity): boolean {
    const { decay } = this.config;
    if (!decay.enabled || record.level <= MIN_LEVEL) return false;
    if (record.successStreak < decay.successThreshold) return false;

    const now = this.now();
    if (record.cooldownUntil !== null && record.cooldownUntil > now) return false;
    if (record.lastDetectionAt !== null && now - record.lastDetectionAt < decay.quietHours * HOUR_MS) {
      return false;
    }
    return true;
  }

  /**
   * @returns false when the key was already seen
   */
  private rememberInstance(domain: string, instanceKey: string): boolean {
    const key = `${domain}\u0000${instanceKey}`;
    if (this.seenInstanceKeys.has(key)) return false;

    this.seenInstanceKeys.add(key);
    if (this.seenInstanceKeys.size > MAX_INSTANCE_KEYS) {
      const oldest = this.seenInstanceKeys.values().next();
      if (!oldest.done) this.seenInstanceKeys.delete(oldest.value);
    }
    return true;
  }

  private appendEvent(event: BotDetectionEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
  }

  private async persist(): Promise<void> {
    if (!this.persistence) return;
    try {
      await this.persistence.save(this.snapshot());
    } catch (error) {
      log.error('Failed to persist sensitivity state', { error });
    }
  }
}
