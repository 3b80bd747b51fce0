import { Test, TestingModule } from '@nestjs/testing';
import { PersistenceFailure } from '../../../common/errors';
import { InMemoryRelationalSink } from '../../../test-utils/in-memory-sinks';
import { T0, secondsAfter, slot } from '../../../test-utils/fixtures';
import { RELATIONAL_SINK } from '../../sinks/interfaces/sink.interface';
import { ConfigurationFeature } from '../configuration-features';
import { ShadowStateStore, evaluateObservation } from './shadow-state.store';

const setpoints = (value: Record<string, number>): ConfigurationFeature => ({
  key: 'circuit_0_setpoints',
  category: 'setpoint',
  value,
});

describe('ShadowStateStore', () => {
  let store: ShadowStateStore;
  let sink: InMemoryRelationalSink;

  beforeEach(async () => {
    sink = new InMemoryRelationalSink();

    const module: TestingModule = await Test.createTestingModule({
      providers: [ShadowStateStore, { provide: RELATIONAL_SINK, useValue: sink }],
    }).compile();

    store = module.get<ShadowStateStore>(ShadowStateStore);
    await store.load();
  });

  describe('observe', () => {
    it('should record the first observation with a null old value', async () => {
      const outcome = await store.observe(setpoints({ comfort: 21, normal: 20 }), T0);

      expect(outcome.kind).toBe('created');
      expect(sink.changelog).toEqual([
        {
          timestamp: T0,
          source: 'system',
          category: 'setpoint',
          item: 'circuit_0_setpoints',
          oldValue: null,
          newValue: { comfort: 21, normal: 20 },
          description: 'Initial value recorded for circuit_0_setpoints',
        },
      ]);
      expect(sink.shadow.get('circuit_0_setpoints')?.lastConfirmedAt).toEqual(T0);
    });

    it('should produce exactly one changelog entry for a repeated value', async () => {
      const later = secondsAfter(T0, 300);

      await store.observe(setpoints({ comfort: 21, normal: 20 }), T0);
      const second = await store.observe(setpoints({ comfort: 21, normal: 20 }), later);

      expect(second.kind).toBe('unchanged');
      expect(sink.changelog).toHaveLength(1);
      expect(sink.shadow.get('circuit_0_setpoints')?.lastConfirmedAt).toEqual(later);
      expect(store.get('circuit_0_setpoints')?.lastConfirmedAt).toEqual(later);
    });

    it('should ignore float noise below the rounding precision', async () => {
      await store.observe(setpoints({ comfort: 21.02, normal: 20, reduced: 16 }), T0);
      const outcome = await store.observe(
        setpoints({ reduced: 16.0, comfort: 20.98, normal: 20.01 }),
        secondsAfter(T0, 300),
      );

      expect(outcome.kind).toBe('unchanged');
      expect(sink.changelog).toHaveLength(1);
    });

    it('should ignore reordered slots that share identity keys', async () => {
      const schedule = (slots: ReturnType<typeof slot>[]): ConfigurationFeature => ({
        key: 'circuit_0_schedule',
        category: 'schedule',
        value: { active: true, days: { mon: slots } },
      });

      await store.observe(schedule([slot(0, '06:00', '08:00'), slot(1, '17:00', '22:00')]), T0);
      const outcome = await store.observe(
        schedule([slot(1, '17:00', '22:00'), slot(0, '06:00', '08:00')]),
        secondsAfter(T0, 300),
      );

      expect(outcome.kind).toBe('unchanged');
    });

    it('should report a real change with old and new canonical values', async () => {
      await store.observe(setpoints({ comfort: 21, normal: 20 }), T0);
      const outcome = await store.observe(setpoints({ comfort: 21, normal: 19 }), secondsAfter(T0, 300));

      expect(outcome.kind).toBe('changed');
      expect(sink.changelog).toHaveLength(2);
      expect(sink.changelog[1]).toMatchObject({
        item: 'circuit_0_setpoints',
        oldValue: { comfort: 21, normal: 20 },
        newValue: { comfort: 21, normal: 19 },
        description: 'circuit_0_setpoints changed',
      });
      expect(sink.shadow.get('circuit_0_setpoints')?.canonicalValue).toEqual({ comfort: 21, normal: 19 });
    });

    it('should not announce known features again after a restart', async () => {
      await store.observe(setpoints({ comfort: 21, normal: 20 }), T0);

      const restarted = new ShadowStateStore(sink);
      await restarted.load();
      const outcome = await restarted.observe(setpoints({ comfort: 21, normal: 20 }), secondsAfter(T0, 600));

      expect(outcome.kind).toBe('unchanged');
      expect(sink.changelog).toHaveLength(1);
    });

    it('should announce a feature once when its shadow row failed before a restart', async () => {
      const dhwSetpoint: ConfigurationFeature = { key: 'dhw_setpoint', category: 'setpoint', value: 50 };
      sink.failShadowUpserts = true;

      await expect(store.observe(dhwSetpoint, T0)).rejects.toThrow(
        'shadow state upsert for dhw_setpoint rejected',
      );
      expect(sink.changelog).toHaveLength(0);

      sink.failShadowUpserts = false;
      const restarted = new ShadowStateStore(sink);
      await restarted.load();
      const outcome = await restarted.observe(dhwSetpoint, secondsAfter(T0, 300));
      await restarted.observe(dhwSetpoint, secondsAfter(T0, 600));

      expect(outcome.kind).toBe('created');
      expect(sink.changelog.map((entry) => [entry.item, entry.oldValue, entry.newValue])).toEqual([
        ['dhw_setpoint', null, 50],
      ]);
    });

    it('should leave memory untouched when persistence fails', async () => {
      sink.failWrites = true;

      await expect(store.observe(setpoints({ comfort: 21 }), T0)).rejects.toBeInstanceOf(
        PersistenceFailure,
      );
      expect(store.get('circuit_0_setpoints')).toBeUndefined();

      sink.failWrites = false;
      const retry = await store.observe(setpoints({ comfort: 21 }), secondsAfter(T0, 300));
      expect(retry.kind).toBe('created');
    });
  });

  describe('load', () => {
    it('should refuse observations until loaded', async () => {
      const fresh = new ShadowStateStore(sink);

      await expect(fresh.observe(setpoints({ comfort: 21 }), T0)).rejects.toBeInstanceOf(
        PersistenceFailure,
      );
    });

    it('should surface a read failure as a persistence failure', async () => {
      sink.failReads = true;
      const fresh = new ShadowStateStore(sink);

      await expect(fresh.load()).rejects.toBeInstanceOf(PersistenceFailure);
      expect(fresh.isLoaded()).toBe(false);
    });
  });

  describe('observeAll', () => {
    it('should observe features in order', async () => {
      const outcomes = await store.observeAll(
        [
          setpoints({ comfort: 21 }),
          { key: 'dhw_setpoint', category: 'setpoint', value: 50 },
        ],
        T0,
      );

      expect(outcomes.map((o) => o.kind)).toEqual(['created', 'created']);
      expect(sink.changelog.map((entry) => entry.item)).toEqual(['circuit_0_setpoints', 'dhw_setpoint']);
    });
  });
});

describe('evaluateObservation', () => {
  it('should keep the stored value on a heartbeat', () => {
    const first = evaluateObservation(undefined, setpoints({ comfort: 21 }), T0);
    const later = secondsAfter(T0, 60);

    const second = evaluateObservation(first.entry, setpoints({ comfort: 21.04 }), later);

    expect(second).toEqual({
      kind: 'unchanged',
      entry: { ...first.entry, lastConfirmedAt: later },
    });
  });
});
