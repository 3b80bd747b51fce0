/**
 * Metric derivation for heat pump efficiency.
 *
 * Pure functions without I/O or clock access. A function that
 * cannot produce a trustworthy value returns null so the caller writes a gap.
 */

/** Specific heat of water in Wh/(l*K), expressed per m³/h as kW/K */
export const WATER_HEAT_CAPACITY_KW_PER_M3H_K = 1.16;

export type DerivedMetricKind =
  | 'thermal_power_modulation'
  | 'thermal_power_delta_t'
  | 'cop'
  | 'cop_delta_t';

export type DerivationMethod = 'modulation' | 'delta_t';

export interface DerivedMetric {
  timestamp: Date;
  kind: DerivedMetricKind;
  method: DerivationMethod;
  value: number;
}

export interface CopThresholds {
  /** Electrical power at or below this is treated as compressor-off */
  minimumWatts: number;
  copMin: number;
  copMax: number;
}

export const DEFAULT_COP_THRESHOLDS: CopThresholds = {
  minimumWatts: 50,
  copMin: 0.5,
  copMax: 10,
};

const isFiniteNumber = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

/**
 * Thermal output estimated from compressor modulation:
 * `rated_kw * modulation_pct / 100`.
 */
export function thermalPowerModulation(
  ratedPowerKw: number | null,
  modulationPct: number | null,
): number | null {
  if (!isFiniteNumber(ratedPowerKw) || ratedPowerKw <= 0) {
    return null;
  }
  if (!isFiniteNumber(modulationPct) || modulationPct < 0 || modulationPct > 100) {
    return null;
  }
  return (ratedPowerKw * modulationPct) / 100;
}

/**
 * Thermal output from the hydraulic side:
 * `flow_m3h * 1.16 * (supply - return)`.
 *
 * A negative spread yields 0: the heat pump never produces negative heat,
 * a reversed spread means it is idle or defrosting.
 */
export function thermalPowerDeltaT(
  flowRateM3h: number | null,
  supplyC: number | null,
  returnC: number | null,
): number | null {
  if (!isFiniteNumber(flowRateM3h) || flowRateM3h <= 0) {
    return null;
  }
  if (!isFiniteNumber(supplyC) || !isFiniteNumber(returnC)) {
    return null;
  }
  const deltaT = supplyC - returnC;
  if (deltaT <= 0) {
    return 0;
  }
  return flowRateM3h * WATER_HEAT_CAPACITY_KW_PER_M3H_K * deltaT;
}

/**
 * Coefficient of performance. Omitted (null) when the electrical input is
 * at or below the compressor-off threshold, or when the ratio falls
 * outside the plausibility band.
 */
export function cop(
  thermalPowerKw: number | null,
  electricalPowerW: number | null,
  thresholds: CopThresholds = DEFAULT_COP_THRESHOLDS,
): number | null {
  if (!isFiniteNumber(thermalPowerKw) || !isFiniteNumber(electricalPowerW)) {
    return null;
  }
  if (electricalPowerW <= thresholds.minimumWatts) {
    return null;
  }
  const value = (thermalPowerKw * 1000) / electricalPowerW;
  if (value < thresholds.copMin || value > thresholds.copMax) {
    return null;
  }
  return value;
}

export interface PowerSample {
  timestamp: Date;
  powerKw: number;
}

export interface IntegrationOptions {
  /** Intervals longer than this contribute nothing. Unbounded by default. */
  maxGapSeconds?: number;
}

/**
 * Energy in kWh as `Σ power_kw_i * Δt_i / 3600`, where `Δt_i` is the real
 * time until the next sample. Samples are sorted first; the last sample
 * closes the series and contributes no interval of its own.
 */
export function integrateEnergy(
  samples: readonly PowerSample[],
  options: IntegrationOptions = {},
): number {
  const maxGapSeconds = options.maxGapSeconds ?? Number.POSITIVE_INFINITY;
  const ordered = [...samples]
    .filter((sample) => isFiniteNumber(sample.powerKw))
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  let kwh = 0;
  for (let i = 0; i < ordered.length - 1; i++) {
    const intervalSeconds =
      (ordered[i + 1].timestamp.getTime() - ordered[i].timestamp.getTime()) / 1000;
    if (intervalSeconds <= 0 || intervalSeconds > maxGapSeconds) {
      continue;
    }
    kwh += (ordered[i].powerKw * intervalSeconds) / 3600;
  }
  return kwh;
}

/**
 * Seasonal COP (JAZ): integrated thermal energy over integrated electrical energy.
 */
export function seasonalCop(thermalKwh: number, electricalKwh: number): number | null {
  if (!isFiniteNumber(thermalKwh) || !isFiniteNumber(electricalKwh) || electricalKwh <= 0) {
    return null;
  }
  return thermalKwh / electricalKwh;
}

export interface TimedPower {
  timestamp: Date;
  powerWatts: number;
}

export interface PowerEstimate {
  powerWatts: number;
  sampleCount: number;
}

/**
 * Mean power of the samples in `(windowStart, windowEnd]`.
 */
export function averagePower(
  samples: readonly TimedPower[],
  windowStart: Date,
  windowEnd: Date,
): PowerEstimate | null {
  const from = windowStart.getTime();
  const to = windowEnd.getTime();
  const inWindow = samples.filter((sample) => {
    const ts = sample.timestamp.getTime();
    return ts > from && ts <= to && isFiniteNumber(sample.powerWatts);
  });
  if (inWindow.length === 0) {
    return null;
  }
  const total = inWindow.reduce((sum, sample) => sum + sample.powerWatts, 0);
  return { powerWatts: total / inWindow.length, sampleCount: inWindow.length };
}

/**
 * The sample closest to `at`, provided it lies within `toleranceMs` on either side.
 * Ties go to the earlier sample.
 */
export function nearestPower(
  samples: readonly TimedPower[],
  at: Date,
  toleranceMs: number,
): PowerEstimate | null {
  const target = at.getTime();
  let best: TimedPower | null = null;
  let bestOffset = Number.POSITIVE_INFINITY;

  for (const sample of samples) {
    if (!isFiniteNumber(sample.powerWatts)) continue;
    const offset = Math.abs(sample.timestamp.getTime() - target);
    if (offset > toleranceMs) continue;
    if (
      offset < bestOffset ||
      (offset === bestOffset && best !== null && sample.timestamp < best.timestamp)
    ) {
      best = sample;
      bestOffset = offset;
    }
  }

  return best ? { powerWatts: best.powerWatts, sampleCount: 1 } : null;
}

export interface DerivationInput {
  timestamp: Date;
  ratedPowerKw: number | null;
  modulationPct: number | null;
  flowRateM3h: number | null;
  supplyC: number | null;
  returnC: number | null;
  /** Aligned electrical power; null when no aligned sample exists */
  electricalPowerW: number | null;
}

/**
 * All metrics one heat pump sample supports. Thermal power needs no
 * electrical side; COP values appear only with an aligned power value.
 */
export function deriveMetrics(
  input: DerivationInput,
  thresholds: CopThresholds = DEFAULT_COP_THRESHOLDS,
): DerivedMetric[] {
  const metrics: DerivedMetric[] = [];
  const push = (kind: DerivedMetricKind, method: DerivationMethod, value: number | null) => {
    if (value !== null) {
      metrics.push({ timestamp: input.timestamp, kind, method, value });
    }
  };

  const modulationKw = thermalPowerModulation(input.ratedPowerKw, input.modulationPct);
  const deltaTKw = thermalPowerDeltaT(input.flowRateM3h, input.supplyC, input.returnC);

  push('thermal_power_modulation', 'modulation', modulationKw);
  push('thermal_power_delta_t', 'delta_t', deltaTKw);

  if (input.electricalPowerW !== null) {
    push('cop', 'modulation', cop(modulationKw, input.electricalPowerW, thresholds));
    push('cop_delta_t', 'delta_t', cop(deltaTKw, input.electricalPowerW, thresholds));
  }

  return metrics;
}
