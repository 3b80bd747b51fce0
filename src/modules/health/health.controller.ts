import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DataSource } from 'typeorm';
import { describeError } from '../../common/errors';
import { CollectorScheduler } from '../collector/services/collector.scheduler';
import {
  HealthStatus,
  RELATIONAL_SINK,
  RelationalSink,
  SourceStatusRecord,
} from '../sinks/interfaces/sink.interface';
import { SourceName } from '../sources/interfaces/readings.interface';

// A source is reported stale after this many missed poll intervals
const STALE_AFTER_INTERVALS = 3;

export interface HealthCheckResponse {
  status: 'ok' | 'degraded';
  timestamp: string;
  database: string;
  collectorRunning: boolean;
  heatPumpHalted: boolean;
  uptime: number;
}

export interface SourceStatusResponse {
  service: SourceName;
  status: HealthStatus;
  message: string;
  fatal: boolean;
  lastEventAt: string;
  stale: boolean;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly pollIntervalsMs: Record<SourceName, number>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly scheduler: CollectorScheduler,

    @Inject(RELATIONAL_SINK)
    private readonly relational: RelationalSink,

    private readonly configService: ConfigService,
  ) {
    this.pollIntervalsMs = {
      heat_pump: this.configService.get<number>('HEAT_PUMP_POLL_INTERVAL', 300) * 1000,
      power_meter: this.configService.get<number>('POWER_POLL_INTERVAL', 10) * 1000,
    };
  }

  @Get()
  @ApiOperation({
    summary: 'Health check',
    description: 'Returns the state of the database connection and the polling loops.',
  })
  @ApiResponse({
    status: 200,
    description: 'Health summary',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        timestamp: { type: 'string', example: '2026-01-15T12:00:00.000Z' },
        database: { type: 'string', example: 'connected' },
        collectorRunning: { type: 'boolean', example: true },
        heatPumpHalted: { type: 'boolean', example: false },
        uptime: { type: 'number', example: 3600 },
      },
    },
  })
  async check(): Promise<HealthCheckResponse> {
    let dbStatus = 'disconnected';

    try {
      if (this.dataSource.isInitialized) {
        await this.dataSource.query('SELECT 1');
        dbStatus = 'connected';
      }
    } catch (error) {
      dbStatus = `error: ${describeError(error)}`;
    }

    const collectorRunning = this.scheduler.isRunning();
    const heatPumpHalted = this.scheduler.isHeatPumpHalted();

    return {
      status: dbStatus === 'connected' && collectorRunning && !heatPumpHalted ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      database: dbStatus,
      collectorRunning,
      heatPumpHalted,
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiOperation({
    summary: 'Readiness check',
    description: 'Succeeds once the database is connected and the collector is polling.',
  })
  @ApiResponse({ status: 503, description: 'Collector not ready' })
  async ready(): Promise<{ status: 'ready'; timestamp: string }> {
    if (!this.dataSource.isInitialized) {
      throw new ServiceUnavailableException('Database not initialized');
    }
    if (!this.scheduler.isRunning()) {
      throw new ServiceUnavailableException('Collector not running');
    }
    return { status: 'ready', timestamp: new Date().toISOString() };
  }

  @Get('live')
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Returns whether the service process is alive.',
  })
  async live(): Promise<{ status: 'alive'; timestamp: string; pid: number }> {
    return {
      status: 'alive',
      timestamp: new Date().toISOString(),
      pid: process.pid,
    };
  }

  @Get('sources')
  @ApiOperation({
    summary: 'Per-source status',
    description:
      'Latest health event of each source, from the hot store. A source with no event within three poll intervals is flagged stale.',
  })
  @ApiResponse({
    status: 200,
    description: 'One entry per source that has reported at least once',
    schema: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          service: { type: 'string', example: 'heat_pump' },
          status: { type: 'string', example: 'ok' },
          message: { type: 'string', example: 'Snapshot collected' },
          fatal: { type: 'boolean', example: false },
          lastEventAt: { type: 'string', example: '2026-01-15T12:00:00.000Z' },
          stale: { type: 'boolean', example: false },
        },
      },
    },
  })
  @ApiResponse({ status: 503, description: 'Status store unavailable' })
  async sources(): Promise<SourceStatusResponse[]> {
    let statuses: SourceStatusRecord[];
    try {
      statuses = await this.relational.getSourceStatuses();
    } catch (error) {
      throw new ServiceUnavailableException(describeError(error));
    }

    const now = Date.now();
    return statuses.map((status) => ({
      service: status.service,
      status: status.status,
      message: status.message,
      fatal: status.fatal,
      lastEventAt: status.lastEventAt.toISOString(),
      stale:
        now - status.lastEventAt.getTime() >
        this.pollIntervalsMs[status.service] * STALE_AFTER_INTERVALS,
    }));
  }
}
