import {
  HeatPumpConfiguration,
  HeatPumpReading,
  PowerReading,
  TimeSlot,
  WeeklySchedule,
} from '../modules/sources/interfaces/readings.interface';

export const T0 = new Date('2026-01-15T12:00:00.000Z');

export const secondsAfter = (base: Date, seconds: number): Date =>
  new Date(base.getTime() + seconds * 1000);

export const slot = (position: number, start: string, end: string, mode = 'normal'): TimeSlot => ({
  start,
  end,
  mode,
  position,
});

export function buildSchedule(slots: TimeSlot[] = [slot(0, '06:00', '22:00')]): WeeklySchedule {
  return {
    active: true,
    days: {
      mon: slots,
      tue: slots,
      wed: slots,
      thu: slots,
      fri: slots,
      sat: slots,
      sun: slots,
    },
  };
}

export function buildConfiguration(
  overrides: Partial<HeatPumpConfiguration> = {},
): HeatPumpConfiguration {
  return {
    circuits: [
      {
        circuitId: 0,
        name: 'Floor heating',
        setpoints: { comfort: 22, normal: 20, reduced: 16 },
        schedule: buildSchedule(),
      },
    ],
    dhw: {
      active: true,
      targetTemperature: 50,
      schedule: null,
      circulationSchedule: null,
    },
    ...overrides,
  };
}

export function buildHeatPumpReading(overrides: Partial<HeatPumpReading> = {}): HeatPumpReading {
  return {
    source: 'heat_pump',
    timestamp: T0,
    outsideTemperature: 4.5,
    returnTemperature: 30,
    dhwStorageTemperature: 48,
    compressorModulation: 50,
    compressorPowerRated: 16,
    compressorRuntimeHours: 1200,
    circulationPumpActive: false,
    circuits: [{ circuitId: 0, supplyTemperature: 35, pumpStatus: 'on' }],
    configuration: buildConfiguration(),
    ...overrides,
  };
}

export function buildPowerReading(overrides: Partial<PowerReading> = {}): PowerReading {
  return {
    source: 'power_meter',
    timestamp: T0,
    powerWatts: 2500,
    voltage: 230,
    current: 10.9,
    totalEnergyWh: 125000,
    phases: [],
    ...overrides,
  };
}
