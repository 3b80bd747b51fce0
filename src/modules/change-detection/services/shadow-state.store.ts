import { Inject, Injectable, Logger } from '@nestjs/common';
import { PersistenceFailure, toPersistenceFailure } from '../../../common/errors';
import {
  ChangelogEntry,
  RELATIONAL_SINK,
  RelationalSink,
  ShadowStateEntry,
} from '../../sinks/interfaces/sink.interface';
import { canonicalize, hashCanonical } from '../canonicalize';
import { ConfigurationFeature } from '../configuration-features';

export type ObservationOutcome =
  | { kind: 'created'; entry: ShadowStateEntry; changelog: ChangelogEntry }
  | { kind: 'changed'; entry: ShadowStateEntry; changelog: ChangelogEntry }
  | { kind: 'unchanged'; entry: ShadowStateEntry };

/**
 * Decide what one observation means for a feature. Pure; the store applies
 * the outcome.
 *
 * Unknown key -> `created` (first changelog entry, old value null).
 * Same hash  -> `unchanged` (heartbeat: only `lastConfirmedAt` moves).
 * Other hash -> `changed` (changelog with old and new canonical values).
 */
export function evaluateObservation(
  previous: ShadowStateEntry | undefined,
  feature: ConfigurationFeature,
  now: Date,
): ObservationOutcome {
  const canonicalValue = canonicalize(feature.value);
  const hash = hashCanonical(canonicalValue);
  const entry: ShadowStateEntry = {
    key: feature.key,
    canonicalValue,
    hash,
    lastConfirmedAt: now,
  };

  if (!previous) {
    return {
      kind: 'created',
      entry,
      changelog: {
        timestamp: now,
        source: 'system',
        category: feature.category,
        item: feature.key,
        oldValue: null,
        newValue: canonicalValue,
        description: `Initial value recorded for ${feature.key}`,
      },
    };
  }

  if (previous.hash === hash) {
    return { kind: 'unchanged', entry: { ...previous, lastConfirmedAt: now } };
  }

  return {
    kind: 'changed',
    entry,
    changelog: {
      timestamp: now,
      source: 'system',
      category: feature.category,
      item: feature.key,
      oldValue: previous.canonicalValue,
      newValue: canonicalValue,
      description: `${feature.key} changed`,
    },
  };
}

/**
 * Persisted shadow copy of every monitored configuration feature.
 *
 * Sole owner of the shadow entries: the in-memory map only moves after the
 * relational sink has durably accepted the write, so a failed write leaves
 * the previous state in place and the next poll retries the comparison.
 */
@Injectable()
export class ShadowStateStore {
  private readonly logger = new Logger(ShadowStateStore.name);
  private readonly entries = new Map<string, ShadowStateEntry>();
  private loaded = false;

  constructor(
    @Inject(RELATIONAL_SINK)
    private readonly sink: RelationalSink,
  ) {}

  isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * Rebuild the map from storage so a restart does not re-announce known features
   */
  async load(): Promise<void> {
    try {
      const stored = await this.sink.loadShadowState();
      this.entries.clear();
      for (const entry of stored) {
        this.entries.set(entry.key, entry);
      }
      this.loaded = true;
      this.logger.log(`Loaded ${stored.length} shadow state entries`);
    } catch (error) {
      this.loaded = false;
      throw toPersistenceFailure('Failed to load shadow state', error);
    }
  }

  get(key: string): ShadowStateEntry | undefined {
    return this.entries.get(key);
  }

  size(): number {
    return this.entries.size;
  }

  async observe(feature: ConfigurationFeature, now: Date): Promise<ObservationOutcome> {
    if (!this.loaded) {
      throw new PersistenceFailure('Shadow state has not been loaded');
    }

    const outcome = evaluateObservation(this.entries.get(feature.key), feature, now);

    try {
      await this.sink.recordObservation(
        outcome.kind === 'unchanged' ? null : outcome.changelog,
        outcome.entry,
      );
    } catch (error) {
      throw toPersistenceFailure(`Failed to persist shadow state for ${feature.key}`, error);
    }

    this.entries.set(feature.key, outcome.entry);

    if (outcome.kind === 'unchanged') {
      this.logger.debug(`No change for ${feature.key}`);
    } else {
      this.logger.log(outcome.changelog.description);
    }
    return outcome;
  }

  /**
   * Observe every feature in order; stops at the first persistence failure.
   */
  async observeAll(features: ConfigurationFeature[], now: Date): Promise<ObservationOutcome[]> {
    const outcomes: ObservationOutcome[] = [];
    for (const feature of features) {
      outcomes.push(await this.observe(feature, now));
    }
    return outcomes;
  }
}
