import { SourceFailure } from '../../../common/errors';
import { Result } from '../../../common/result';
import { HeatPumpReading, PowerReading } from './readings.interface';

/**
 * Port for the quota-constrained heat pump API.
 *
 * Implementations never throw: a field-level absence is a null inside a
 * successful result, a transport, auth or quota problem is a failure value.
 */
export interface HeatPumpSource {
  readSnapshot(now: Date): Promise<Result<HeatPumpReading, SourceFailure>>;
}

/**
 * Port for the local power meter. Same contract as {@link HeatPumpSource}.
 */
export interface PowerMeterSource {
  readSnapshot(now: Date): Promise<Result<PowerReading, SourceFailure>>;
}

export const HEAT_PUMP_SOURCE = Symbol('HEAT_PUMP_SOURCE');
export const POWER_METER_SOURCE = Symbol('POWER_METER_SOURCE');
