import { PhaseReading, PowerReading } from '../interfaces/readings.interface';

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const numberOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

// Gen 1 relay meters count energy in watt-minutes
const WATT_MINUTES_PER_WH = 60;

/**
 * Gen 2 `Switch.GetStatus`:
 * `{ id, output, apower, voltage, current, aenergy: { total } }`.
 * Null when `apower` is missing: a power reading without power is unusable.
 */
export function parseGen2Switch(payload: unknown, timestamp: Date): PowerReading | null {
  if (!isObject(payload)) {
    return null;
  }
  const powerWatts = numberOrNull(payload.apower);
  if (powerWatts === null) {
    return null;
  }
  return {
    source: 'power_meter',
    timestamp,
    powerWatts,
    voltage: numberOrNull(payload.voltage),
    current: numberOrNull(payload.current),
    totalEnergyWh: isObject(payload.aenergy) ? numberOrNull(payload.aenergy.total) : null,
    phases: [],
  };
}

/**
 * Gen 1 `/status`. Relay devices report `meters[0]` (energy in
 * watt-minutes); energy meters report one `emeters[]` entry per phase
 * (energy in Wh), which are summed.
 */
export function parseGen1Status(payload: unknown, timestamp: Date): PowerReading | null {
  if (!isObject(payload)) {
    return null;
  }

  if (Array.isArray(payload.meters) && isObject(payload.meters[0])) {
    const meter = payload.meters[0];
    const powerWatts = numberOrNull(meter.power);
    if (powerWatts === null) {
      return null;
    }
    const total = numberOrNull(meter.total);
    return {
      source: 'power_meter',
      timestamp,
      powerWatts,
      voltage: numberOrNull(meter.voltage),
      current: numberOrNull(meter.current),
      totalEnergyWh: total === null ? null : total / WATT_MINUTES_PER_WH,
      phases: [],
    };
  }

  if (Array.isArray(payload.emeters) && payload.emeters.length > 0) {
    const emeters = payload.emeters.filter(isObject);
    const phases: PhaseReading[] = emeters.map((emeter, index) => ({
      phase: index + 1,
      powerWatts: numberOrNull(emeter.power),
      voltage: numberOrNull(emeter.voltage),
      current: numberOrNull(emeter.current),
    }));

    const powers = phases.map((phase) => phase.powerWatts);
    if (powers.length === 0 || powers.some((power) => power === null)) {
      return null;
    }
    const totals = emeters.map((emeter) => numberOrNull(emeter.total));

    return {
      source: 'power_meter',
      timestamp,
      powerWatts: sum(powers),
      voltage: phases[0].voltage,
      current: phases.some((phase) => phase.current === null)
        ? null
        : sum(phases.map((phase) => phase.current)),
      totalEnergyWh: totals.some((total) => total === null) ? null : sum(totals),
      phases,
    };
  }

  return null;
}

function sum(values: (number | null)[]): number {
  return values.reduce<number>((total, value) => total + (value ?? 0), 0);
}
