import {
  CircuitConfiguration,
  CircuitReading,
  DhwConfiguration,
  HeatPumpConfiguration,
  HeatPumpReading,
  TimeSlot,
  WeeklySchedule,
  Weekday,
} from '../interfaces/readings.interface';

/**
 * One entry of the IoT `features` response:
 * `{ feature, isEnabled, properties: { <name>: { type, value, unit? } } }`
 */
export interface FeatureRecord {
  feature: string;
  isEnabled: boolean;
  properties: Record<string, unknown>;
}

export type FeatureMap = Map<string, FeatureRecord>;

const CIRCUIT_FEATURE = /^heating\.circuits\.(\d+)(?:\.|$)/;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const numberOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const stringOrNull = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

const booleanOrNull = (value: unknown): boolean | null =>
  typeof value === 'boolean' ? value : null;

/**
 * Index the `data` array of a features response by feature name.
 * Returns null when the payload does not have that shape.
 */
export function parseFeatures(payload: unknown): FeatureMap | null {
  if (!isObject(payload) || !Array.isArray(payload.data)) {
    return null;
  }
  const features: FeatureMap = new Map();
  for (const item of payload.data) {
    if (!isObject(item) || typeof item.feature !== 'string') continue;
    features.set(item.feature, {
      feature: item.feature,
      isEnabled: item.isEnabled !== false,
      properties: isObject(item.properties) ? item.properties : {},
    });
  }
  return features;
}

export function propertyValue(features: FeatureMap, name: string, property: string): unknown {
  const record = features.get(name);
  if (!record || !record.isEnabled) {
    return undefined;
  }
  const entry = record.properties[property];
  return isObject(entry) ? entry.value : undefined;
}

function circuitIds(features: FeatureMap): number[] {
  const ids = new Set<number>();
  for (const name of features.keys()) {
    const match = CIRCUIT_FEATURE.exec(name);
    if (!match) continue;
    const id = Number(match[1]);
    const base = features.get(`heating.circuits.${id}`);
    if (!base || base.isEnabled) {
      ids.add(id);
    }
  }
  return [...ids].sort((a, b) => a - b);
}

function parseSlot(value: unknown): TimeSlot | null {
  if (!isObject(value)) return null;
  const { start, end, mode, position } = value;
  if (typeof start !== 'string' || typeof end !== 'string' || typeof mode !== 'string') {
    return null;
  }
  return { start, end, mode, position: numberOrNull(position) ?? 0 };
}

function parseSchedule(features: FeatureMap, name: string): WeeklySchedule | null {
  const entries = propertyValue(features, name, 'entries');
  if (!isObject(entries)) {
    return null;
  }
  const slotsFor = (day: Weekday): TimeSlot[] => {
    const raw = entries[day];
    return Array.isArray(raw)
      ? raw.map(parseSlot).filter((slot): slot is TimeSlot => slot !== null)
      : [];
  };
  return {
    active: booleanOrNull(propertyValue(features, name, 'active')),
    days: {
      mon: slotsFor('mon'),
      tue: slotsFor('tue'),
      wed: slotsFor('wed'),
      thu: slotsFor('thu'),
      fri: slotsFor('fri'),
      sat: slotsFor('sat'),
      sun: slotsFor('sun'),
    },
  };
}

function parseConfiguration(features: FeatureMap, ids: number[]): HeatPumpConfiguration {
  const circuits: CircuitConfiguration[] = ids.map((id) => {
    const prefix = `heating.circuits.${id}`;
    const program = (name: string) =>
      numberOrNull(propertyValue(features, `${prefix}.operating.programs.${name}`, 'temperature'));
    return {
      circuitId: id,
      name: stringOrNull(propertyValue(features, prefix, 'name')),
      setpoints: {
        comfort: program('comfort'),
        normal: program('normal'),
        reduced: program('reduced'),
      },
      schedule: parseSchedule(features, `${prefix}.heating.schedule`),
    };
  });

  const dhw: DhwConfiguration | null = features.has('heating.dhw')
    ? {
        active: booleanOrNull(propertyValue(features, 'heating.dhw', 'active')),
        targetTemperature: numberOrNull(
          propertyValue(features, 'heating.dhw.temperature.main', 'value'),
        ),
        schedule: parseSchedule(features, 'heating.dhw.schedule'),
        circulationSchedule: parseSchedule(features, 'heating.dhw.pumps.circulation.schedule'),
      }
    : null;

  return { circuits, dhw };
}

/**
 * Map a features response onto a heat pump snapshot. Missing or disabled
 * features become nulls.
 */
export function toHeatPumpReading(features: FeatureMap, timestamp: Date): HeatPumpReading {
  const ids = circuitIds(features);
  const circuits: CircuitReading[] = ids.map((id) => ({
    circuitId: id,
    supplyTemperature: numberOrNull(
      propertyValue(features, `heating.circuits.${id}.sensors.temperature.supply`, 'value'),
    ),
    pumpStatus: stringOrNull(
      propertyValue(features, `heating.circuits.${id}.circulation.pump`, 'status'),
    ),
  }));

  const circulationStatus = stringOrNull(
    propertyValue(features, 'heating.dhw.pumps.circulation', 'status'),
  );

  return {
    source: 'heat_pump',
    timestamp,
    outsideTemperature: numberOrNull(
      propertyValue(features, 'heating.sensors.temperature.outside', 'value'),
    ),
    returnTemperature: numberOrNull(
      propertyValue(features, 'heating.sensors.temperature.return', 'value'),
    ),
    dhwStorageTemperature: numberOrNull(
      propertyValue(features, 'heating.dhw.sensors.temperature.hotWaterStorage', 'value'),
    ),
    compressorModulation: numberOrNull(
      propertyValue(features, 'heating.compressors.0.sensors.power', 'value'),
    ),
    compressorPowerRated: numberOrNull(
      propertyValue(features, 'heating.compressors.0.power', 'value'),
    ),
    compressorRuntimeHours: numberOrNull(
      propertyValue(features, 'heating.compressors.0.statistics', 'hours'),
    ),
    circulationPumpActive: circulationStatus === null ? null : circulationStatus === 'on',
    circuits,
    configuration: parseConfiguration(features, ids),
  };
}
