import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { PersistenceFailure } from '../../../common/errors';
import { ChangelogRecord, RateLimitWindow, ShadowState, SourceStatus } from '../../../entities';
import { T0, secondsAfter } from '../../../test-utils/fixtures';
import { TypeOrmRelationalSink } from './typeorm-relational.sink';

const mockQueryRunner = () => ({
  isTransactionActive: false,
  connect: jest.fn(),
  startTransaction: jest.fn(),
  commitTransaction: jest.fn(),
  rollbackTransaction: jest.fn(),
  release: jest.fn(),
  manager: {
    insert: jest.fn(),
    upsert: jest.fn(),
  },
});

const mockRepository = () => ({
  find: jest.fn(),
  findOneBy: jest.fn(),
  insert: jest.fn(),
  upsert: jest.fn(),
});

describe('TypeOrmRelationalSink', () => {
  let sink: TypeOrmRelationalSink;
  let shadowRepo: ReturnType<typeof mockRepository>;
  let queryRunner: ReturnType<typeof mockQueryRunner>;
  let rateLimitRepo: ReturnType<typeof mockRepository>;
  let sourceStatusRepo: ReturnType<typeof mockRepository>;

  beforeEach(async () => {
    shadowRepo = mockRepository();
    queryRunner = mockQueryRunner();
    queryRunner.startTransaction.mockImplementation(async () => {
      queryRunner.isTransactionActive = true;
    });
    queryRunner.commitTransaction.mockImplementation(async () => {
      queryRunner.isTransactionActive = false;
    });
    queryRunner.rollbackTransaction.mockImplementation(async () => {
      queryRunner.isTransactionActive = false;
    });
    rateLimitRepo = mockRepository();
    sourceStatusRepo = mockRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TypeOrmRelationalSink,
        { provide: getRepositoryToken(ShadowState), useValue: shadowRepo },
        { provide: DataSource, useValue: { createQueryRunner: () => queryRunner } },
        { provide: getRepositoryToken(RateLimitWindow), useValue: rateLimitRepo },
        { provide: getRepositoryToken(SourceStatus), useValue: sourceStatusRepo },
      ],
    }).compile();

    sink = module.get<TypeOrmRelationalSink>(TypeOrmRelationalSink);
  });

  describe('shadow state', () => {
    const entry = {
      key: 'dhw_setpoint',
      canonicalValue: 50,
      hash: 'a'.repeat(64),
      lastConfirmedAt: T0,
    };
    const changelog = {
      timestamp: T0,
      source: 'system' as const,
      category: 'setpoint',
      item: 'dhw_setpoint',
      oldValue: null,
      newValue: 50,
      description: 'Initial value recorded for dhw_setpoint',
    };

    it('should write the changelog entry and the shadow row in one transaction', async () => {
      await sink.recordObservation(changelog, entry);

      expect(queryRunner.startTransaction).toHaveBeenCalledTimes(1);
      expect(queryRunner.manager.insert).toHaveBeenCalledWith(ChangelogRecord, {
        timestamp: T0,
        source: 'system',
        category: 'setpoint',
        item: 'dhw_setpoint',
        oldValue: null,
        newValue: '50',
        description: 'Initial value recorded for dhw_setpoint',
      });
      expect(queryRunner.manager.upsert).toHaveBeenCalledWith(
        ShadowState,
        { key: 'dhw_setpoint', canonicalValue: '50', hash: 'a'.repeat(64), lastConfirmedAt: T0 },
        ['key'],
      );
      expect(queryRunner.commitTransaction).toHaveBeenCalledTimes(1);
      expect(queryRunner.release).toHaveBeenCalledTimes(1);
    });

    it('should store canonical values as canonical JSON on a heartbeat', async () => {
      await sink.recordObservation(null, {
        ...entry,
        key: 'circuit_0_setpoints',
        canonicalValue: { comfort: 22, normal: 20 },
      });

      expect(queryRunner.manager.insert).not.toHaveBeenCalled();
      expect(queryRunner.manager.upsert).toHaveBeenCalledWith(
        ShadowState,
        {
          key: 'circuit_0_setpoints',
          canonicalValue: '{"comfort":22,"normal":20}',
          hash: 'a'.repeat(64),
          lastConfirmedAt: T0,
        },
        ['key'],
      );
    });

    it('should roll back the changelog entry when the shadow upsert fails', async () => {
      queryRunner.manager.upsert.mockRejectedValue(new Error('connection terminated'));

      const write = sink.recordObservation(changelog, entry);

      await expect(write).rejects.toBeInstanceOf(PersistenceFailure);
      await expect(write).rejects.toThrow(
        'Failed to record shadow state dhw_setpoint: connection terminated',
      );
      expect(queryRunner.manager.insert).toHaveBeenCalledTimes(1);
      expect(queryRunner.rollbackTransaction).toHaveBeenCalledTimes(1);
      expect(queryRunner.commitTransaction).not.toHaveBeenCalled();
      expect(queryRunner.release).toHaveBeenCalledTimes(1);
    });

    it('should not roll back when the connection could not be opened', async () => {
      queryRunner.connect.mockRejectedValue(new Error('too many clients'));

      await expect(sink.recordObservation(changelog, entry)).rejects.toThrow(
        'Failed to record shadow state dhw_setpoint: too many clients',
      );
      expect(queryRunner.rollbackTransaction).not.toHaveBeenCalled();
      expect(queryRunner.release).toHaveBeenCalledTimes(1);
    });

    it('should parse stored rows back into canonical values', async () => {
      shadowRepo.find.mockResolvedValue([
        {
          key: 'dhw_setpoint',
          canonicalValue: '50',
          hash: 'b'.repeat(64),
          lastConfirmedAt: T0,
          updatedAt: T0,
        },
      ]);

      await expect(sink.loadShadowState()).resolves.toEqual([
        { key: 'dhw_setpoint', canonicalValue: 50, hash: 'b'.repeat(64), lastConfirmedAt: T0 },
      ]);
    });
  });

  describe('rate limit window', () => {
    it('should persist call instants as ISO strings', async () => {
      await sink.persistRateLimitWindow({
        calls: [T0, secondsAfter(T0, 300)],
        cooldownUntil: null,
      });

      expect(rateLimitRepo.upsert).toHaveBeenCalledWith(
        {
          api: 'heat_pump',
          calls: ['2026-01-15T12:00:00.000Z', '2026-01-15T12:05:00.000Z'],
          cooldownUntil: null,
        },
        ['api'],
      );
    });

    it('should restore the window', async () => {
      const cooldownUntil = secondsAfter(T0, 3600);
      rateLimitRepo.findOneBy.mockResolvedValue({
        api: 'heat_pump',
        calls: ['2026-01-15T12:00:00.000Z'],
        cooldownUntil,
        updatedAt: T0,
      });

      await expect(sink.loadRateLimitWindow()).resolves.toEqual({
        calls: [T0],
        cooldownUntil,
      });
    });

    it('should report no window when nothing was stored yet', async () => {
      rateLimitRepo.findOneBy.mockResolvedValue(null);

      await expect(sink.loadRateLimitWindow()).resolves.toBeNull();
    });

    it('should fail when the window cannot be read', async () => {
      rateLimitRepo.findOneBy.mockRejectedValue(new Error('timeout'));

      await expect(sink.loadRateLimitWindow()).rejects.toBeInstanceOf(PersistenceFailure);
    });
  });

  it('should upsert the latest status per source', async () => {
    await sink.upsertSourceStatus({
      service: 'power_meter',
      status: 'error',
      message: 'Shelly request failed: fetch failed',
      fatal: false,
      lastEventAt: T0,
    });

    expect(sourceStatusRepo.upsert).toHaveBeenCalledWith(
      {
        service: 'power_meter',
        status: 'error',
        message: 'Shelly request failed: fetch failed',
        fatal: false,
        lastEventAt: T0,
      },
      ['service'],
    );
  });
});
