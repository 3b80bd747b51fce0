import {
  HeatPumpConfiguration,
  WeeklySchedule,
} from '../sources/interfaces/readings.interface';
import { ConfigValue } from './canonicalize';

export type FeatureCategory = 'schedule' | 'setpoint' | 'mode';

export interface ConfigurationFeature {
  /** Unique feature identifier, e.g. `circuit_0_schedule` */
  key: string;
  category: FeatureCategory;
  value: ConfigValue;
}

const scheduleValue = (schedule: WeeklySchedule): ConfigValue => ({
  active: schedule.active,
  days: schedule.days,
});

/**
 * Flatten the configuration of a snapshot into independently tracked features.
 * A feature the snapshot does not carry is left out: absence is not a change.
 */
export function extractConfigurationFeatures(
  configuration: HeatPumpConfiguration,
): ConfigurationFeature[] {
  const features: ConfigurationFeature[] = [];

  for (const circuit of configuration.circuits) {
    const prefix = `circuit_${circuit.circuitId}`;
    const { comfort, normal, reduced } = circuit.setpoints;

    if (comfort !== null || normal !== null || reduced !== null) {
      features.push({
        key: `${prefix}_setpoints`,
        category: 'setpoint',
        value: { comfort, normal, reduced },
      });
    }
    if (circuit.schedule) {
      features.push({
        key: `${prefix}_schedule`,
        category: 'schedule',
        value: scheduleValue(circuit.schedule),
      });
    }
    if (circuit.name !== null) {
      features.push({ key: `${prefix}_name`, category: 'mode', value: circuit.name });
    }
  }

  const dhw = configuration.dhw;
  if (dhw) {
    if (dhw.active !== null) {
      features.push({ key: 'dhw_active', category: 'mode', value: dhw.active });
    }
    if (dhw.targetTemperature !== null) {
      features.push({ key: 'dhw_setpoint', category: 'setpoint', value: dhw.targetTemperature });
    }
    if (dhw.schedule) {
      features.push({
        key: 'dhw_schedule',
        category: 'schedule',
        value: scheduleValue(dhw.schedule),
      });
    }
    if (dhw.circulationSchedule) {
      features.push({
        key: 'dhw_circulation_schedule',
        category: 'schedule',
        value: scheduleValue(dhw.circulationSchedule),
      });
    }
  }

  return features;
}
