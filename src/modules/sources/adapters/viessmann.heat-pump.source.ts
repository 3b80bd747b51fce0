import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AuthFailure,
  PartialDataFailure,
  RateLimitExceeded,
  SourceFailure,
  TransportFailure,
  describeError,
} from '../../../common/errors';
import { Result, fail, ok } from '../../../common/result';
import { HeatPumpReading } from '../interfaces/readings.interface';
import { HeatPumpSource } from '../interfaces/source.interface';
import { parseFeatures, toHeatPumpReading } from './viessmann-feature.parser';

export const VIESSMANN_TOKEN_URL = 'https://iam.viessmann.com/idp/v3/token';
export const VIESSMANN_API_URL = 'https://api.viessmann.com/iot/v2';

// Refresh the access token this long before it actually expires
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

interface AccessToken {
  value: string;
  expiresAt: number;
}

/**
 * Heat pump source backed by the Viessmann IoT API.
 *
 * One snapshot is one `GET .../features` call, which is the unit the daily
 * quota counts. The OAuth refresh-token exchange goes to the IAM service
 * and is not part of that quota.
 */
export class ViessmannHeatPumpSource implements HeatPumpSource {
  private readonly logger = new Logger(ViessmannHeatPumpSource.name);
  private readonly clientId: string;
  private readonly refreshToken: string;
  private readonly installationId: string;
  private readonly gatewaySerial: string;
  private readonly deviceId: string;
  private readonly timeoutMs: number;

  private token: AccessToken | null = null;

  constructor(private readonly configService: ConfigService) {
    this.clientId = this.configService.get<string>('VIESSMANN_CLIENT_ID', '');
    this.refreshToken = this.configService.get<string>('VIESSMANN_REFRESH_TOKEN', '');
    this.installationId = this.configService.get<string>('VIESSMANN_INSTALLATION_ID', '');
    this.gatewaySerial = this.configService.get<string>('VIESSMANN_GATEWAY_SERIAL', '');
    this.deviceId = this.configService.get<string>('VIESSMANN_DEVICE_ID', '0');
    this.timeoutMs = this.configService.get<number>('SOURCE_TIMEOUT_MS', 10000);
  }

  get featuresUrl(): string {
    return (
      `${VIESSMANN_API_URL}/features/installations/${this.installationId}` +
      `/gateways/${this.gatewaySerial}/devices/${this.deviceId}/features`
    );
  }

  async readSnapshot(now: Date): Promise<Result<HeatPumpReading, SourceFailure>> {
    const token = await this.accessToken(now);
    if (!token.ok) {
      return token;
    }

    let response: Response;
    try {
      response = await fetch(this.featuresUrl, {
        headers: { Authorization: `Bearer ${token.value}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return fail(
        new TransportFailure(`Heat pump request failed: ${describeError(error)}`, { cause: error }),
      );
    }

    if (!response.ok) {
      return fail(this.statusFailure(response.status, 'Heat pump request'));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return fail(
        new PartialDataFailure(`Heat pump response is not JSON: ${describeError(error)}`, {
          cause: error,
        }),
      );
    }

    const features = parseFeatures(payload);
    if (!features) {
      return fail(new PartialDataFailure('Heat pump response carries no feature list'));
    }

    this.logger.debug(`Fetched ${features.size} features`);
    return ok(toHeatPumpReading(features, now));
  }

  private async accessToken(now: Date): Promise<Result<string, SourceFailure>> {
    if (this.token && now.getTime() < this.token.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return ok(this.token.value);
    }
    if (!this.clientId || !this.refreshToken) {
      return fail(new AuthFailure('Viessmann client id or refresh token is not configured'));
    }

    let response: Response;
    try {
      response = await fetch(VIESSMANN_TOKEN_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'refresh_token',
          client_id: this.clientId,
          refresh_token: this.refreshToken,
        }).toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      return fail(
        new TransportFailure(`Token refresh failed: ${describeError(error)}`, { cause: error }),
      );
    }

    if (!response.ok) {
      // The IAM service answers a revoked refresh token with 400; a throttled
      // refresh (429) is transient
      return fail(
        response.status >= 500 || response.status === 429
          ? new TransportFailure(`Token refresh failed with HTTP ${response.status}`)
          : new AuthFailure(`Token refresh rejected with HTTP ${response.status}`),
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return fail(new AuthFailure('Token response is not JSON', { cause: error }));
    }
    if (
      typeof body !== 'object' ||
      body === null ||
      !('access_token' in body) ||
      typeof body.access_token !== 'string'
    ) {
      return fail(new AuthFailure('Token response carries no access token'));
    }

    const expiresIn =
      'expires_in' in body && typeof body.expires_in === 'number' ? body.expires_in : 3600;
    this.token = { value: body.access_token, expiresAt: now.getTime() + expiresIn * 1000 };
    this.logger.log('Access token refreshed');
    return ok(this.token.value);
  }

  private statusFailure(status: number, action: string): SourceFailure {
    if (status === 429) {
      return new RateLimitExceeded(`${action} rejected with HTTP 429`);
    }
    if (status === 401 || status === 403) {
      this.token = null;
      return new AuthFailure(`${action} rejected with HTTP ${status}`);
    }
    return new TransportFailure(`${action} failed with HTTP ${status}`);
  }
}
