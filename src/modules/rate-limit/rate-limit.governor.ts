import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PersistenceFailure,
  RateLimitExceeded,
  toPersistenceFailure,
} from '../../common/errors';
import {
  RELATIONAL_SINK,
  RateLimitWindowState,
  RelationalSink,
} from '../sinks/interfaces/sink.interface';

export const RATE_LIMIT_WINDOW_MS = 24 * 60 * 60 * 1000;

type GovernorState = 'unloaded' | 'ready' | 'failed_closed';

/**
 * Rolling 24h call budget for the quota-constrained heat pump API.
 *
 * - A call is recorded (and durably persisted) before it is made
 * - `canCall` turns false at the safety threshold, which sits below the vendor cap
 * - An upstream 429 starts a cool-down that overrides the window count
 * - Fails closed: until the persisted window is loaded, or after a write
 *   fails, no call is allowed
 */
@Injectable()
export class RateLimitGovernor {
  private readonly logger = new Logger(RateLimitGovernor.name);
  private readonly dailyCap: number;
  private readonly safetyThreshold: number;
  private readonly backoffMs: number;

  private calls: number[] = [];
  private cooldownUntil: number | null = null;
  private state: GovernorState = 'unloaded';

  constructor(
    @Inject(RELATIONAL_SINK)
    private readonly sink: RelationalSink,
    private readonly configService: ConfigService,
  ) {
    this.dailyCap = this.configService.get<number>('RATE_LIMIT_DAILY_CAP', 1450);
    this.safetyThreshold = this.configService.get<number>('RATE_LIMIT_SAFETY_THRESHOLD', 1400);
    this.backoffMs = this.configService.get<number>('RATE_LIMIT_BACKOFF_SECONDS', 3600) * 1000;

    if (this.safetyThreshold >= this.dailyCap) {
      throw new Error(
        `RATE_LIMIT_SAFETY_THRESHOLD (${this.safetyThreshold}) must be below RATE_LIMIT_DAILY_CAP (${this.dailyCap})`,
      );
    }
  }

  get threshold(): number {
    return this.safetyThreshold;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  /**
   * Restore the persisted window so a restart cannot burst past the budget.
   */
  async load(now: Date = new Date()): Promise<void> {
    let stored: RateLimitWindowState | null;
    try {
      stored = await this.sink.loadRateLimitWindow();
    } catch (error) {
      this.state = 'failed_closed';
      throw toPersistenceFailure('Failed to load rate limit window', error);
    }

    this.calls = (stored?.calls ?? [])
      .map((call) => call.getTime())
      .filter((ts) => Number.isFinite(ts))
      .sort((a, b) => a - b);
    this.cooldownUntil = stored?.cooldownUntil?.getTime() ?? null;
    this.state = 'ready';
    this.prune(now.getTime());

    this.logger.log(
      `Rate limit window restored: ${this.calls.length}/${this.safetyThreshold} calls in the last 24h`,
    );
  }

  callsInWindow(now: Date): number {
    this.prune(now.getTime());
    return this.calls.length;
  }

  isCoolingDown(now: Date): boolean {
    this.prune(now.getTime());
    return this.cooldownUntil !== null;
  }

  cooldownEndsAt(): Date | null {
    return this.cooldownUntil === null ? null : new Date(this.cooldownUntil);
  }

  canCall(now: Date): boolean {
    if (this.state !== 'ready') {
      return false;
    }
    if (this.isCoolingDown(now)) {
      return false;
    }
    return this.callsInWindow(now) < this.safetyThreshold;
  }

  /**
   * Reserve one call. Throws RateLimitExceeded when the budget is spent and
   * PersistenceFailure when the reservation cannot be made durable; in
   * both cases the upstream call must not happen.
   */
  async recordCall(now: Date): Promise<void> {
    if (!this.canCall(now)) {
      throw new RateLimitExceeded(
        `Call budget unavailable (${this.calls.length}/${this.safetyThreshold} in window)`,
      );
    }
    this.calls.push(now.getTime());
    await this.persist('Failed to persist rate limit window');
  }

  /**
   * The upstream answered "too many requests": stop calling for the back-off interval.
   */
  async registerRateLimitSignal(now: Date): Promise<void> {
    this.cooldownUntil = now.getTime() + this.backoffMs;
    this.logger.warn(
      `Upstream rate limit signalled, cooling down until ${new Date(this.cooldownUntil).toISOString()}`,
    );
    await this.persist('Failed to persist rate limit cool-down');
  }

  private prune(nowMs: number): void {
    const cutoff = nowMs - RATE_LIMIT_WINDOW_MS;
    let firstInside = 0;
    while (firstInside < this.calls.length && this.calls[firstInside] < cutoff) {
      firstInside++;
    }
    if (firstInside > 0) {
      this.calls = this.calls.slice(firstInside);
    }
    if (this.cooldownUntil !== null && nowMs >= this.cooldownUntil) {
      this.cooldownUntil = null;
    }
  }

  private async persist(action: string): Promise<void> {
    try {
      await this.sink.persistRateLimitWindow({
        calls: this.calls.map((ts) => new Date(ts)),
        cooldownUntil: this.cooldownUntil === null ? null : new Date(this.cooldownUntil),
      });
    } catch (error) {
      this.state = 'failed_closed';
      const failure: PersistenceFailure = toPersistenceFailure(action, error);
      this.logger.error(`${failure.message}; denying further calls`);
      throw failure;
    }
  }
}
