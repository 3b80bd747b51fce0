import { PersistenceFailure } from '../common/errors';
import {
  ChangelogEntry,
  FieldValue,
  RateLimitWindowState,
  RelationalSink,
  ShadowStateEntry,
  SourceStatusRecord,
  TimeSeriesSink,
} from '../modules/sinks/interfaces/sink.interface';

export interface WrittenPoint {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, FieldValue>;
  timestamp: Date;
}

/**
 * Time-series sink that keeps points in an array.
 */
export class InMemoryTimeSeriesSink implements TimeSeriesSink {
  readonly points: WrittenPoint[] = [];
  failWrites = false;

  async write(
    measurement: string,
    tags: Record<string, string>,
    fields: Record<string, FieldValue>,
    timestamp: Date,
  ): Promise<void> {
    if (this.failWrites) {
      throw new PersistenceFailure('time-series sink unavailable');
    }
    this.points.push({ measurement, tags: { ...tags }, fields: { ...fields }, timestamp });
  }

  byMeasurement(measurement: string): WrittenPoint[] {
    return this.points.filter((point) => point.measurement === measurement);
  }
}

/**
 * Relational sink backed by plain maps. Survives "restarts" when the same
 * instance is handed to a fresh store or governor.
 */
export class InMemoryRelationalSink implements RelationalSink {
  readonly shadow = new Map<string, ShadowStateEntry>();
  readonly changelog: ChangelogEntry[] = [];
  readonly statuses = new Map<string, SourceStatusRecord>();
  rateLimitWindow: RateLimitWindowState | null = null;
  failWrites = false;
  failReads = false;
  /** Rejects the shadow upsert of an observation; its changelog entry is discarded with it */
  failShadowUpserts = false;

  async recordObservation(changelog: ChangelogEntry | null, entry: ShadowStateEntry): Promise<void> {
    this.assertWritable();
    if (this.failShadowUpserts) {
      throw new PersistenceFailure(`shadow state upsert for ${entry.key} rejected`);
    }
    if (changelog) {
      this.changelog.push(changelog);
    }
    this.shadow.set(entry.key, { ...entry });
  }

  async loadShadowState(): Promise<ShadowStateEntry[]> {
    this.assertReadable();
    return [...this.shadow.values()].map((entry) => ({ ...entry }));
  }

  async persistRateLimitWindow(state: RateLimitWindowState): Promise<void> {
    this.assertWritable();
    this.rateLimitWindow = { calls: [...state.calls], cooldownUntil: state.cooldownUntil };
  }

  async loadRateLimitWindow(): Promise<RateLimitWindowState | null> {
    this.assertReadable();
    return this.rateLimitWindow
      ? { calls: [...this.rateLimitWindow.calls], cooldownUntil: this.rateLimitWindow.cooldownUntil }
      : null;
  }

  async upsertSourceStatus(status: SourceStatusRecord): Promise<void> {
    this.assertWritable();
    this.statuses.set(status.service, { ...status });
  }

  async getSourceStatuses(): Promise<SourceStatusRecord[]> {
    this.assertReadable();
    return [...this.statuses.values()];
  }

  private assertWritable(): void {
    if (this.failWrites) {
      throw new PersistenceFailure('relational sink unavailable');
    }
  }

  private assertReadable(): void {
    if (this.failReads) {
      throw new PersistenceFailure('relational sink unavailable');
    }
  }
}
