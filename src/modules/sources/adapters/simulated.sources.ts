import { Logger } from '@nestjs/common';
import { SourceFailure } from '../../../common/errors';
import { Result, ok } from '../../../common/result';
import { HeatPumpReading, PowerReading } from '../interfaces/readings.interface';
import { HeatPumpSource, PowerMeterSource } from '../interfaces/source.interface';

/**
 * Fixed, plausible heat pump values for running without hardware or API access.
 */
export class SimulatedHeatPumpSource implements HeatPumpSource {
  private readonly logger = new Logger(SimulatedHeatPumpSource.name);

  async readSnapshot(now: Date): Promise<Result<HeatPumpReading, SourceFailure>> {
    this.logger.debug('Simulated heat pump snapshot');
    return ok({
      source: 'heat_pump',
      timestamp: now,
      outsideTemperature: 10,
      returnTemperature: 30,
      dhwStorageTemperature: 45,
      compressorModulation: 20,
      compressorPowerRated: 16,
      compressorRuntimeHours: 1000,
      circulationPumpActive: false,
      circuits: [{ circuitId: 0, supplyTemperature: 35, pumpStatus: 'on' }],
      configuration: {
        circuits: [
          {
            circuitId: 0,
            name: 'Heating Circuit 1',
            setpoints: { comfort: 21, normal: null, reduced: null },
            schedule: null,
          },
        ],
        dhw: { active: true, targetTemperature: 50, schedule: null, circulationSchedule: null },
      },
    });
  }
}

export class SimulatedPowerMeterSource implements PowerMeterSource {
  private readonly logger = new Logger(SimulatedPowerMeterSource.name);

  async readSnapshot(now: Date): Promise<Result<PowerReading, SourceFailure>> {
    this.logger.debug('Simulated power reading');
    return ok({
      source: 'power_meter',
      timestamp: now,
      powerWatts: 500,
      voltage: 230,
      current: 2.17,
      totalEnergyWh: 10000,
      phases: [],
    });
  }
}
