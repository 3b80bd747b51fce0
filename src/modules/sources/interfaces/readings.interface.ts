export type SourceName = 'heat_pump' | 'power_meter';

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun';

export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];

export type TimeSlot = {
  start: string;
  end: string;
  mode: string;
  position: number;
};

export type WeeklySchedule = {
  active: boolean | null;
  days: Record<Weekday, TimeSlot[]>;
};

export type CircuitSetpoints = {
  comfort: number | null;
  normal: number | null;
  reduced: number | null;
};

export type CircuitConfiguration = {
  circuitId: number;
  name: string | null;
  setpoints: CircuitSetpoints;
  schedule: WeeklySchedule | null;
};

export type DhwConfiguration = {
  active: boolean | null;
  targetTemperature: number | null;
  schedule: WeeklySchedule | null;
  circulationSchedule: WeeklySchedule | null;
};

/**
 * Configuration-bearing subset of a heat pump snapshot.
 * Declared as type aliases so they stay assignable to `ConfigValue`.
 */
export type HeatPumpConfiguration = {
  circuits: CircuitConfiguration[];
  dhw: DhwConfiguration | null;
};

export interface CircuitReading {
  circuitId: number;
  supplyTemperature: number | null;
  pumpStatus: string | null;
}

/**
 * One batched heat pump snapshot. Every sensor field is nullable;
 * a missing value is a gap, never 0.
 */
export interface HeatPumpReading {
  source: 'heat_pump';
  timestamp: Date;
  outsideTemperature: number | null;
  returnTemperature: number | null;
  dhwStorageTemperature: number | null;
  /** Percentage of rated capacity, 0-100 */
  compressorModulation: number | null;
  /** Rated thermal power in kW */
  compressorPowerRated: number | null;
  compressorRuntimeHours: number | null;
  circulationPumpActive: boolean | null;
  circuits: CircuitReading[];
  configuration: HeatPumpConfiguration | null;
}

export interface PhaseReading {
  phase: number;
  powerWatts: number | null;
  voltage: number | null;
  current: number | null;
}

export interface PowerReading {
  source: 'power_meter';
  timestamp: Date;
  powerWatts: number;
  voltage: number | null;
  current: number | null;
  /** Cumulative energy counter in Wh */
  totalEnergyWh: number | null;
  phases: PhaseReading[];
}
