import { averagePower, nearestPower } from '../../metrics/metrics.engine';
import { PowerReading } from '../../sources/interfaces/readings.interface';

export type AlignmentMode = 'average' | 'nearest';

export interface AlignmentOptions {
  mode: AlignmentMode;
  /** Length of the preceding window averaged in `average` mode */
  averageWindowMs: number;
  /** Maximum distance to the chosen reading in `nearest` mode */
  toleranceMs: number;
}

/**
 * A heat pump instant paired with the electrical power that belongs to it.
 */
export interface AlignedSample {
  timestamp: Date;
  powerWatts: number;
  mode: AlignmentMode;
  sampleCount: number;
}

/**
 * Recent power readings kept for alignment with heat pump samples.
 *
 * Written by the power loop, read by the heat pump loop. Every method is
 * synchronous, so no access can interleave with another on the event loop.
 */
export class PowerBuffer {
  private readings: PowerReading[] = [];

  constructor(private readonly retentionMs: number) {}

  static forAlignment(options: AlignmentOptions): PowerBuffer {
    return new PowerBuffer(Math.max(options.averageWindowMs, options.toleranceMs) * 2);
  }

  /**
   * Insert in timestamp order and prune everything older than the
   * retention span measured from the newest reading.
   */
  append(reading: PowerReading): void {
    const ts = reading.timestamp.getTime();
    let index = this.readings.length;
    while (index > 0 && this.readings[index - 1].timestamp.getTime() > ts) {
      index--;
    }
    this.readings.splice(index, 0, reading);

    const newest = this.readings[this.readings.length - 1].timestamp.getTime();
    const cutoff = newest - this.retentionMs;
    this.readings = this.readings.filter((entry) => entry.timestamp.getTime() >= cutoff);
  }

  latest(): PowerReading | null {
    return this.readings.length > 0 ? this.readings[this.readings.length - 1] : null;
  }

  size(): number {
    return this.readings.length;
  }

  /**
   * Pair `at` with buffered power, or null when there is nothing to pair it
   * with. Never fabricates a value.
   */
  align(at: Date, options: AlignmentOptions): AlignedSample | null {
    const estimate =
      options.mode === 'average'
        ? averagePower(this.readings, new Date(at.getTime() - options.averageWindowMs), at)
        : nearestPower(this.readings, at, options.toleranceMs);

    if (!estimate) {
      return null;
    }
    return {
      timestamp: at,
      powerWatts: estimate.powerWatts,
      mode: options.mode,
      sampleCount: estimate.sampleCount,
    };
  }
}
