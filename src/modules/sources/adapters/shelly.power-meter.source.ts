import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AuthFailure,
  PartialDataFailure,
  SourceFailure,
  TransportFailure,
  describeError,
} from '../../../common/errors';
import { Result, fail, ok } from '../../../common/result';
import { PowerReading } from '../interfaces/readings.interface';
import { PowerMeterSource } from '../interfaces/source.interface';
import { parseGen1Status, parseGen2Switch } from './shelly-status.parser';

export const SHELLY_GEN2_PATH = '/rpc/Switch.GetStatus?id=0';
export const SHELLY_GEN1_PATH = '/status';

/**
 * Power meter source for Shelly devices on the local network.
 * Tries the Gen 2 RPC API first and falls back to the Gen 1 status endpoint.
 */
export class ShellyPowerMeterSource implements PowerMeterSource {
  private readonly logger = new Logger(ShellyPowerMeterSource.name);
  private readonly host: string;
  private readonly password: string;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.host = this.configService.get<string>('SHELLY_HOST', '');
    this.password = this.configService.get<string>('SHELLY_PASSWORD', '');
    this.timeoutMs = this.configService.get<number>('SOURCE_TIMEOUT_MS', 10000);
  }

  async readSnapshot(now: Date): Promise<Result<PowerReading, SourceFailure>> {
    if (!this.host) {
      return fail(new TransportFailure('SHELLY_HOST is not configured'));
    }

    const gen2 = await this.getJson(SHELLY_GEN2_PATH);
    if (gen2.ok) {
      const reading = parseGen2Switch(gen2.value, now);
      if (reading) {
        return ok(reading);
      }
    } else {
      this.logger.debug(`Gen 2 API unavailable: ${gen2.error.message}`);
    }

    const gen1 = await this.getJson(SHELLY_GEN1_PATH);
    if (!gen1.ok) {
      return gen1;
    }
    const reading = parseGen1Status(gen1.value, now);
    if (!reading) {
      return fail(new PartialDataFailure('Shelly status carries no power value'));
    }
    return ok(reading);
  }

  private async getJson(path: string): Promise<Result<unknown, SourceFailure>> {
    const headers: Record<string, string> = {};
    if (this.password) {
      const credentials = Buffer.from(`admin:${this.password}`).toString('base64');
      headers.Authorization = `Basic ${credentials}`;
    }

    let response: Response;
    try {
      response = await fetch(`http://${this.host}${path}`, {
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return fail(
        new TransportFailure(`Shelly request failed: ${describeError(error)}`, { cause: error }),
      );
    }

    if (response.status === 401) {
      return fail(new AuthFailure(`Shelly rejected credentials for ${path}`));
    }
    if (!response.ok) {
      return fail(new TransportFailure(`Shelly ${path} failed with HTTP ${response.status}`));
    }

    try {
      const body: unknown = await response.json();
      return ok(body);
    } catch (error) {
      return fail(
        new PartialDataFailure(`Shelly ${path} returned invalid JSON`, { cause: error }),
      );
    }
  }
}
