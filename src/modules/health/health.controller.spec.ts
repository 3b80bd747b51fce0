import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { InMemoryRelationalSink } from '../../test-utils/in-memory-sinks';
import { CollectorScheduler } from '../collector/services/collector.scheduler';
import { RELATIONAL_SINK } from '../sinks/interfaces/sink.interface';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  let relational: InMemoryRelationalSink;
  let dataSource: { isInitialized: boolean; query: jest.Mock };
  let scheduler: { isRunning: jest.Mock; isHeatPumpHalted: jest.Mock };

  beforeEach(async () => {
    relational = new InMemoryRelationalSink();
    dataSource = { isInitialized: true, query: jest.fn().mockResolvedValue([{ '?column?': 1 }]) };
    scheduler = {
      isRunning: jest.fn().mockReturnValue(true),
      isHeatPumpHalted: jest.fn().mockReturnValue(false),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: DataSource, useValue: dataSource },
        { provide: CollectorScheduler, useValue: scheduler },
        { provide: RELATIONAL_SINK, useValue: relational },
        {
          provide: ConfigService,
          useValue: new ConfigService({ HEAT_PUMP_POLL_INTERVAL: 300, POWER_POLL_INTERVAL: 10 }),
        },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('check', () => {
    it('should report ok when the database answers and both loops run', async () => {
      const result = await controller.check();

      expect(result.status).toBe('ok');
      expect(result.database).toBe('connected');
      expect(dataSource.query).toHaveBeenCalledWith('SELECT 1');
    });

    it('should report degraded once the heat pump loop has halted', async () => {
      scheduler.isHeatPumpHalted.mockReturnValue(true);

      const result = await controller.check();

      expect(result.status).toBe('degraded');
      expect(result.heatPumpHalted).toBe(true);
    });

    it('should report the database error', async () => {
      dataSource.query.mockRejectedValue(new Error('connection refused'));

      const result = await controller.check();

      expect(result.status).toBe('degraded');
      expect(result.database).toBe('error: connection refused');
    });
  });

  describe('ready', () => {
    it('should refuse traffic while the collector is stopped', async () => {
      scheduler.isRunning.mockReturnValue(false);

      await expect(controller.ready()).rejects.toBeInstanceOf(ServiceUnavailableException);
    });

    it('should be ready with a database and a running collector', async () => {
      await expect(controller.ready()).resolves.toEqual(
        expect.objectContaining({ status: 'ready' }),
      );
    });
  });

  describe('sources', () => {
    it('should list the latest status per source and flag silent ones', async () => {
      jest.useFakeTimers({ now: new Date('2026-01-15T12:10:00.000Z') });
      await relational.upsertSourceStatus({
        service: 'heat_pump',
        status: 'rate_limited',
        message: 'Skipped: 1400/1400 calls in the last 24h',
        fatal: false,
        lastEventAt: new Date('2026-01-15T12:05:00.000Z'),
      });
      await relational.upsertSourceStatus({
        service: 'power_meter',
        status: 'ok',
        message: '2500 W',
        fatal: false,
        lastEventAt: new Date('2026-01-15T12:09:00.000Z'),
      });

      const result = await controller.sources();

      expect(result).toEqual([
        {
          service: 'heat_pump',
          status: 'rate_limited',
          message: 'Skipped: 1400/1400 calls in the last 24h',
          fatal: false,
          lastEventAt: '2026-01-15T12:05:00.000Z',
          stale: false,
        },
        {
          service: 'power_meter',
          status: 'ok',
          message: '2500 W',
          fatal: false,
          lastEventAt: '2026-01-15T12:09:00.000Z',
          stale: true,
        },
      ]);
    });

    it('should answer 503 when the status store is unreachable', async () => {
      relational.failReads = true;

      await expect(controller.sources()).rejects.toBeInstanceOf(ServiceUnavailableException);
    });
  });
});
