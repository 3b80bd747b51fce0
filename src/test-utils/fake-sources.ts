import { SourceFailure } from '../common/errors';
import { Result, ok } from '../common/result';
import { HeatPumpReading, PowerReading } from '../modules/sources/interfaces/readings.interface';
import { HeatPumpSource, PowerMeterSource } from '../modules/sources/interfaces/source.interface';
import { buildHeatPumpReading, buildPowerReading } from './fixtures';

/**
 * Source that replays queued results, then falls back to a default reading
 * stamped with the requested instant.
 */
export class FakeHeatPumpSource implements HeatPumpSource {
  readonly calls: Date[] = [];
  readonly queue: Result<HeatPumpReading, SourceFailure>[] = [];

  async readSnapshot(now: Date): Promise<Result<HeatPumpReading, SourceFailure>> {
    this.calls.push(now);
    return this.queue.shift() ?? ok(buildHeatPumpReading({ timestamp: now }));
  }
}

export class FakePowerMeterSource implements PowerMeterSource {
  readonly calls: Date[] = [];
  readonly queue: Result<PowerReading, SourceFailure>[] = [];

  async readSnapshot(now: Date): Promise<Result<PowerReading, SourceFailure>> {
    this.calls.push(now);
    return this.queue.shift() ?? ok(buildPowerReading({ timestamp: now }));
  }
}
