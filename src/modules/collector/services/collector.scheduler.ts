import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { RateLimitExceeded, describeError } from '../../../common/errors';
import { extractConfigurationFeatures } from '../../change-detection/configuration-features';
import { ShadowStateStore } from '../../change-detection/services/shadow-state.store';
import { CopThresholds, DerivedMetric, deriveMetrics } from '../../metrics/metrics.engine';
import { RateLimitGovernor } from '../../rate-limit/rate-limit.governor';
import {
  HealthEvent,
  HealthStatus,
  RELATIONAL_SINK,
  RelationalSink,
  TIME_SERIES_SINK,
  TimeSeriesSink,
} from '../../sinks/interfaces/sink.interface';
import {
  HeatPumpReading,
  PowerReading,
  SourceName,
} from '../../sources/interfaces/readings.interface';
import {
  HEAT_PUMP_SOURCE,
  HeatPumpSource,
  POWER_METER_SOURCE,
  PowerMeterSource,
} from '../../sources/interfaces/source.interface';
import { AlignedSample, AlignmentMode, AlignmentOptions, PowerBuffer } from './power-buffer';

export type TickOutcome = 'ok' | 'failed' | 'skipped' | 'halted';

// Power readings older than this make the heat pump health message report a stale meter
const POWER_STALE_AFTER_MS = 120_000;
const POWER_STALE_GRACE_MS = 60_000;

const LITRES_PER_M3 = 1000;

/**
 * Drives the two polling loops.
 *
 * Heat pump (slow, quota-bound): governor check -> record call -> read ->
 * store reading -> change detection -> derived metrics -> health.
 * Power meter (fast): read (one retry on transport errors) -> buffer -> store -> health.
 *
 * Each loop awaits its tick before arming the next timer, so ticks of one
 * source never overlap and a slow heat pump call never delays the power loop.
 */
@Injectable()
export class CollectorScheduler implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(CollectorScheduler.name);

  private readonly heatPumpIntervalMs: number;
  private readonly powerIntervalMs: number;
  private readonly powerRetryDelayMs: number;
  private readonly ratedPowerFallbackKw: number;
  private readonly flowRateM3h: number;
  private readonly thresholds: CopThresholds;
  private readonly alignment: AlignmentOptions;
  private readonly powerBuffer: PowerBuffer;

  private running = false;
  private heatPumpHalted = false;
  private startedAt: Date | null = null;
  private heatPumpTimer: NodeJS.Timeout | null = null;
  private powerTimer: NodeJS.Timeout | null = null;
  private heatPumpInFlight: Promise<void> | null = null;
  private powerInFlight: Promise<void> | null = null;
  private readonly lastHealth = new Map<SourceName, HealthEvent>();

  constructor(
    @Inject(HEAT_PUMP_SOURCE)
    private readonly heatPumpSource: HeatPumpSource,

    @Inject(POWER_METER_SOURCE)
    private readonly powerMeterSource: PowerMeterSource,

    @Inject(TIME_SERIES_SINK)
    private readonly timeSeries: TimeSeriesSink,

    @Inject(RELATIONAL_SINK)
    private readonly relational: RelationalSink,

    private readonly governor: RateLimitGovernor,
    private readonly shadowStore: ShadowStateStore,
    private readonly configService: ConfigService,
  ) {
    this.heatPumpIntervalMs = this.configService.get<number>('HEAT_PUMP_POLL_INTERVAL', 300) * 1000;
    this.powerIntervalMs = this.configService.get<number>('POWER_POLL_INTERVAL', 10) * 1000;
    this.powerRetryDelayMs = this.configService.get<number>('POWER_RETRY_DELAY_MS', 2000);
    this.ratedPowerFallbackKw = this.configService.get<number>('HEAT_PUMP_RATED_POWER', 16);
    this.flowRateM3h = this.configService.get<number>('ESTIMATED_FLOW_RATE', 1000) / LITRES_PER_M3;
    this.thresholds = {
      minimumWatts: this.configService.get<number>('COP_MIN_WATTS', 50),
      copMin: this.configService.get<number>('COP_MIN', 0.5),
      copMax: this.configService.get<number>('COP_MAX', 10),
    };
    this.alignment = {
      mode: this.configService.get<AlignmentMode>('POWER_ALIGNMENT_MODE', 'average'),
      averageWindowMs:
        this.configService.get<number>('POWER_AVERAGE_WINDOW_SECONDS', 300) * 1000,
      toleranceMs: this.configService.get<number>('POWER_ALIGNMENT_TOLERANCE_SECONDS', 300) * 1000,
    };
    this.powerBuffer = PowerBuffer.forAlignment(this.alignment);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  isRunning(): boolean {
    return this.running;
  }

  isHeatPumpHalted(): boolean {
    return this.heatPumpHalted;
  }

  latestHealth(service: SourceName): HealthEvent | undefined {
    return this.lastHealth.get(service);
  }

  /**
   * Load persisted state, then arm both loops. Their first ticks run immediately.
   */
  async start(now: Date = new Date()): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    this.heatPumpHalted = false;
    this.startedAt = now;

    try {
      await this.governor.load(now);
    } catch (error) {
      this.logger.error(`${describeError(error)}; heat pump calls stay blocked until it loads`);
    }

    try {
      await this.shadowStore.load();
    } catch (error) {
      await this.haltHeatPump(error, now);
    }

    this.logger.log(
      `Collector started: heat pump every ${this.heatPumpIntervalMs / 1000}s, ` +
        `power meter every ${this.powerIntervalMs / 1000}s, ${this.alignment.mode} alignment`,
    );
    this.schedulePower(0);
    this.scheduleHeatPump(0);
  }

  /**
   * Stop arming new ticks and wait for in-flight ones to finish their writes.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.clearTimers();
    await Promise.all([this.heatPumpInFlight, this.powerInFlight]);
    this.logger.log('Collector stopped');
  }

  async runHeatPumpTick(now: Date): Promise<TickOutcome> {
    if (this.heatPumpHalted) {
      return 'halted';
    }

    if (!this.governor.isReady()) {
      try {
        await this.governor.load(now);
      } catch (error) {
        await this.reportHealth(
          'heat_pump',
          'error',
          `Call budget unavailable: ${describeError(error)}`,
          now,
        );
        return 'skipped';
      }
    }

    if (!this.governor.canCall(now)) {
      await this.reportHealth('heat_pump', 'rate_limited', this.budgetMessage(now), now);
      return 'skipped';
    }

    try {
      await this.governor.recordCall(now);
    } catch (error) {
      if (error instanceof RateLimitExceeded) {
        await this.reportHealth('heat_pump', 'rate_limited', error.message, now);
        return 'skipped';
      }
      return this.haltHeatPump(error, now);
    }

    const result = await this.heatPumpSource.readSnapshot(now);
    if (!result.ok) {
      if (result.error.kind === 'rate_limit') {
        try {
          await this.governor.registerRateLimitSignal(now);
        } catch (error) {
          return this.haltHeatPump(error, now);
        }
      }
      await this.reportHealth('heat_pump', 'error', result.error.message, now);
      return 'failed';
    }

    const reading = result.value;
    try {
      await this.writeHeatPumpReading(reading);
    } catch (error) {
      await this.reportHealth(
        'heat_pump',
        'error',
        `Failed to store heat pump reading: ${describeError(error)}`,
        now,
      );
      return 'failed';
    }

    if (reading.configuration) {
      try {
        await this.shadowStore.observeAll(extractConfigurationFeatures(reading.configuration), now);
      } catch (error) {
        return this.haltHeatPump(error, now);
      }
    }

    const aligned = this.powerBuffer.align(reading.timestamp, this.alignment);
    const metrics = this.deriveHeatPumpMetrics(reading, aligned);
    // One failed point does not drop the others
    const failures: string[] = [];
    for (const metric of metrics) {
      try {
        await this.writeMetric(metric, aligned);
      } catch (error) {
        failures.push(`${metric.kind}: ${describeError(error)}`);
      }
    }
    if (failures.length > 0) {
      await this.reportHealth(
        'heat_pump',
        'error',
        `Failed to store ${failures.length}/${metrics.length} derived metrics: ${failures.join('; ')}`,
        now,
      );
      return 'failed';
    }

    await this.reportHealth('heat_pump', 'ok', this.heatPumpMessage(aligned, now), now);
    return 'ok';
  }

  async runPowerTick(now: Date): Promise<TickOutcome> {
    let result = await this.powerMeterSource.readSnapshot(now);

    if (!result.ok && result.error.kind === 'transport') {
      this.logger.warn(
        `Power meter read failed (${result.error.message}), retrying in ${this.powerRetryDelayMs}ms`,
      );
      await sleep(this.powerRetryDelayMs);
      result = await this.powerMeterSource.readSnapshot(
        new Date(now.getTime() + this.powerRetryDelayMs),
      );
    }

    if (!result.ok) {
      await this.reportHealth('power_meter', 'error', result.error.message, now);
      return 'failed';
    }

    const reading = result.value;
    this.powerBuffer.append(reading);

    try {
      await this.writePowerReading(reading);
    } catch (error) {
      await this.reportHealth(
        'power_meter',
        'error',
        `Failed to store power reading: ${describeError(error)}`,
        now,
      );
      return 'failed';
    }

    await this.reportHealth('power_meter', 'ok', `${reading.powerWatts} W`, now);
    return 'ok';
  }

  private scheduleHeatPump(delayMs: number): void {
    if (!this.running || this.heatPumpHalted) {
      return;
    }
    this.heatPumpTimer = setTimeout(() => {
      this.heatPumpTimer = null;
      this.heatPumpInFlight = this.runHeatPumpTick(new Date())
        .then(
          (outcome) => this.logger.debug(`Heat pump tick: ${outcome}`),
          (error: unknown) => this.logger.error(`Heat pump tick crashed: ${describeError(error)}`),
        )
        .finally(() => {
          this.heatPumpInFlight = null;
          this.scheduleHeatPump(this.heatPumpIntervalMs);
        });
    }, delayMs);
  }

  private schedulePower(delayMs: number): void {
    if (!this.running) {
      return;
    }
    this.powerTimer = setTimeout(() => {
      this.powerTimer = null;
      this.powerInFlight = this.runPowerTick(new Date())
        .then(
          (outcome) => this.logger.verbose(`Power tick: ${outcome}`),
          (error: unknown) => this.logger.error(`Power tick crashed: ${describeError(error)}`),
        )
        .finally(() => {
          this.powerInFlight = null;
          this.schedulePower(this.powerIntervalMs);
        });
    }, delayMs);
  }

  private clearTimers(): void {
    if (this.heatPumpTimer) {
      clearTimeout(this.heatPumpTimer);
      this.heatPumpTimer = null;
    }
    if (this.powerTimer) {
      clearTimeout(this.powerTimer);
      this.powerTimer = null;
    }
  }

  /**
   * A persistence failure on the heat pump path cannot be retried safely:
   * stop the loop and leave the power loop running.
   */
  private async haltHeatPump(error: unknown, now: Date): Promise<TickOutcome> {
    this.heatPumpHalted = true;
    if (this.heatPumpTimer) {
      clearTimeout(this.heatPumpTimer);
      this.heatPumpTimer = null;
    }
    await this.reportHealth(
      'heat_pump',
      'error',
      `Heat pump loop halted: ${describeError(error)}`,
      now,
      true,
    );
    return 'halted';
  }

  private deriveHeatPumpMetrics(
    reading: HeatPumpReading,
    aligned: AlignedSample | null,
  ): DerivedMetric[] {
    // Delta-T uses the first circuit that reports a supply temperature
    const supply = [...reading.circuits]
      .sort((a, b) => a.circuitId - b.circuitId)
      .find((circuit) => circuit.supplyTemperature !== null);

    return deriveMetrics(
      {
        timestamp: reading.timestamp,
        ratedPowerKw: reading.compressorPowerRated ?? this.ratedPowerFallbackKw,
        modulationPct: reading.compressorModulation,
        flowRateM3h: this.flowRateM3h,
        supplyC: supply?.supplyTemperature ?? null,
        returnC: reading.returnTemperature,
        electricalPowerW: aligned?.powerWatts ?? null,
      },
      this.thresholds,
    );
  }

  private async writeHeatPumpReading(reading: HeatPumpReading): Promise<void> {
    await this.timeSeries.write(
      'heat_pump',
      {},
      {
        outside_temperature: reading.outsideTemperature,
        return_temperature: reading.returnTemperature,
        dhw_storage_temperature: reading.dhwStorageTemperature,
        compressor_modulation: reading.compressorModulation,
        compressor_power_rated: reading.compressorPowerRated,
        compressor_runtime_hours: reading.compressorRuntimeHours,
        circulation_pump_active: reading.circulationPumpActive,
      },
      reading.timestamp,
    );

    for (const circuit of reading.circuits) {
      await this.timeSeries.write(
        'heating_circuit',
        { circuit_id: String(circuit.circuitId) },
        { supply_temperature: circuit.supplyTemperature, pump_status: circuit.pumpStatus },
        reading.timestamp,
      );
    }
  }

  private async writeMetric(metric: DerivedMetric, aligned: AlignedSample | null): Promise<void> {
    const isCop = metric.kind === 'cop' || metric.kind === 'cop_delta_t';
    await this.timeSeries.write(
      'derived_metric',
      { kind: metric.kind, method: metric.method },
      isCop && aligned
        ? {
            value: metric.value,
            electrical_power_watts: aligned.powerWatts,
            alignment: aligned.mode,
            power_samples: aligned.sampleCount,
          }
        : { value: metric.value },
      metric.timestamp,
    );
  }

  private async writePowerReading(reading: PowerReading): Promise<void> {
    await this.timeSeries.write(
      'power_meter',
      {},
      {
        power_watts: reading.powerWatts,
        voltage: reading.voltage,
        current: reading.current,
        total_energy_wh: reading.totalEnergyWh,
      },
      reading.timestamp,
    );

    for (const phase of reading.phases) {
      await this.timeSeries.write(
        'power_phase',
        { phase: String(phase.phase) },
        { power_watts: phase.powerWatts, voltage: phase.voltage, current: phase.current },
        reading.timestamp,
      );
    }
  }

  /**
   * Record a health event. Best effort: a failing sink is logged, never thrown,
   * so health reporting cannot take a loop down.
   */
  private async reportHealth(
    service: SourceName,
    status: HealthStatus,
    message: string,
    timestamp: Date,
    fatal = false,
  ): Promise<void> {
    const event: HealthEvent = { service, status, message, timestamp, fatal };
    this.lastHealth.set(service, event);

    if (status === 'ok') {
      this.logger.debug(`[${service}] ${message}`);
    } else if (status === 'rate_limited') {
      this.logger.warn(`[${service}] ${message}`);
    } else {
      this.logger.error(`[${service}] ${message}`);
    }

    try {
      await this.timeSeries.write('health', { service, status }, { message, fatal }, timestamp);
    } catch (error) {
      this.logger.error(`Failed to write ${service} health event: ${describeError(error)}`);
    }

    try {
      await this.relational.upsertSourceStatus({
        service,
        status,
        message,
        fatal,
        lastEventAt: timestamp,
      });
    } catch (error) {
      this.logger.error(`Failed to update ${service} status: ${describeError(error)}`);
    }
  }

  private budgetMessage(now: Date): string {
    const cooldownEnd = this.governor.cooldownEndsAt();
    if (this.governor.isCoolingDown(now) && cooldownEnd) {
      return `Skipped: upstream rate limit cool-down until ${cooldownEnd.toISOString()}`;
    }
    return `Skipped: ${this.governor.callsInWindow(now)}/${this.governor.threshold} calls in the last 24h`;
  }

  private heatPumpMessage(aligned: AlignedSample | null, now: Date): string {
    const parts = ['Snapshot collected'];
    if (!aligned) {
      parts.push('no aligned power sample, COP omitted');
    }
    if (this.isPowerMeterStale(now)) {
      parts.push('power meter stale');
    }
    return parts.join('; ');
  }

  private isPowerMeterStale(now: Date): boolean {
    if (this.startedAt && now.getTime() - this.startedAt.getTime() < POWER_STALE_GRACE_MS) {
      return false;
    }
    const latest = this.powerBuffer.latest();
    return !latest || now.getTime() - latest.timestamp.getTime() > POWER_STALE_AFTER_MS;
  }
}
