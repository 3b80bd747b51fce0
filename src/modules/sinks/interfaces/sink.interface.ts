import { CanonicalValue } from '../../change-detection/canonicalize';
import { SourceName } from '../../sources/interfaces/readings.interface';

export type FieldValue = number | string | boolean | null;

export type HealthStatus = 'ok' | 'error' | 'rate_limited';

export interface HealthEvent {
  service: SourceName;
  status: HealthStatus;
  message: string;
  timestamp: Date;
  /** Set when the condition halted a polling loop */
  fatal: boolean;
}

export type ChangelogSource = 'system' | 'user';

export interface ChangelogEntry {
  timestamp: Date;
  source: ChangelogSource;
  category: string;
  /** Feature key */
  item: string;
  oldValue: CanonicalValue | null;
  newValue: CanonicalValue | null;
  description: string;
}

export interface ShadowStateEntry {
  key: string;
  canonicalValue: CanonicalValue;
  hash: string;
  lastConfirmedAt: Date;
}

export interface RateLimitWindowState {
  /** Call instants inside the trailing window, oldest first */
  calls: Date[];
  cooldownUntil: Date | null;
}

export interface SourceStatusRecord {
  service: SourceName;
  status: HealthStatus;
  message: string;
  fatal: boolean;
  lastEventAt: Date;
}

/**
 * Append-only time-series store. Null fields are stored as nulls, never coerced.
 */
export interface TimeSeriesSink {
  write(
    measurement: string,
    tags: Record<string, string>,
    fields: Record<string, FieldValue>,
    timestamp: Date,
  ): Promise<void>;
}

/**
 * Durable relational store for change detection, rate-limit state and
 * per-source status. Every write has completed durably when its promise
 * resolves; failures reject with a PersistenceFailure.
 */
export interface RelationalSink {
  /**
   * Upsert a shadow entry together with its changelog entry (null on a
   * heartbeat). Both rows are written or neither is.
   */
  recordObservation(changelog: ChangelogEntry | null, entry: ShadowStateEntry): Promise<void>;
  loadShadowState(): Promise<ShadowStateEntry[]>;
  persistRateLimitWindow(state: RateLimitWindowState): Promise<void>;
  loadRateLimitWindow(): Promise<RateLimitWindowState | null>;
  upsertSourceStatus(status: SourceStatusRecord): Promise<void>;
  getSourceStatuses(): Promise<SourceStatusRecord[]>;
}

export const TIME_SERIES_SINK = Symbol('TIME_SERIES_SINK');
export const RELATIONAL_SINK = Symbol('RELATIONAL_SINK');
