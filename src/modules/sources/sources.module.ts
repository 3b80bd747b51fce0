import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SimulatedHeatPumpSource, SimulatedPowerMeterSource } from './adapters/simulated.sources';
import { ShellyPowerMeterSource } from './adapters/shelly.power-meter.source';
import { ViessmannHeatPumpSource } from './adapters/viessmann.heat-pump.source';
import {
  HEAT_PUMP_SOURCE,
  HeatPumpSource,
  POWER_METER_SOURCE,
  PowerMeterSource,
} from './interfaces/source.interface';

export type CollectorMode = 'production' | 'simulation';

const isSimulation = (configService: ConfigService): boolean =>
  configService.get<CollectorMode>('COLLECTOR_MODE', 'production') === 'simulation';

/**
 * Binds the source ports to real devices, or to simulated ones when
 * COLLECTOR_MODE=simulation.
 */
@Module({
  providers: [
    {
      provide: HEAT_PUMP_SOURCE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): HeatPumpSource =>
        isSimulation(configService)
          ? new SimulatedHeatPumpSource()
          : new ViessmannHeatPumpSource(configService),
    },
    {
      provide: POWER_METER_SOURCE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): PowerMeterSource =>
        isSimulation(configService)
          ? new SimulatedPowerMeterSource()
          : new ShellyPowerMeterSource(configService),
    },
  ],
  exports: [HEAT_PUMP_SOURCE, POWER_METER_SOURCE],
})
export class SourcesModule {}
