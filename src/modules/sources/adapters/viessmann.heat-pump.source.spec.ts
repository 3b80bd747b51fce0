import { ConfigService } from '@nestjs/config';
import { T0, secondsAfter } from '../../../test-utils/fixtures';
import {
  VIESSMANN_TOKEN_URL,
  ViessmannHeatPumpSource,
} from './viessmann.heat-pump.source';

const feature = (name: string, properties: Record<string, unknown>, isEnabled = true) => ({
  feature: name,
  isEnabled,
  properties,
});

const value = (v: unknown) => ({ type: 'number', value: v });

const featuresPayload = {
  data: [
    feature('heating.sensors.temperature.outside', { value: value(4.2) }),
    feature('heating.sensors.temperature.return', { value: value(29.8) }),
    feature('heating.dhw.sensors.temperature.hotWaterStorage', { value: value(47.5) }),
    feature('heating.compressors.0.sensors.power', { value: value(55) }),
    feature('heating.compressors.0.power', { value: value(16) }),
    feature('heating.compressors.0.statistics', { hours: value(1234.5), starts: value(880) }),
    feature('heating.dhw.pumps.circulation', { status: { type: 'string', value: 'off' } }),
    feature('heating.circuits.0', { name: { type: 'string', value: 'Floor heating' } }),
    feature('heating.circuits.0.sensors.temperature.supply', { value: value(34.6) }),
    feature('heating.circuits.0.circulation.pump', { status: { type: 'string', value: 'on' } }),
    feature('heating.circuits.0.operating.programs.comfort', { temperature: value(22) }),
    feature('heating.circuits.0.operating.programs.normal', { temperature: value(20) }),
    feature('heating.circuits.0.operating.programs.reduced', { temperature: value(17) }),
    feature('heating.circuits.0.heating.schedule', {
      active: { type: 'boolean', value: true },
      entries: {
        type: 'Schedule',
        value: {
          mon: [{ start: '05:30', end: '22:00', mode: 'normal', position: 0 }],
          tue: [],
        },
      },
    }),
    feature('heating.circuits.1', {}, false),
    feature('heating.circuits.1.sensors.temperature.supply', { value: value(20) }, false),
    feature('heating.dhw', { active: { type: 'boolean', value: true } }),
    feature('heating.dhw.temperature.main', { value: value(50) }),
  ],
};

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const tokenResponse = () => json({ access_token: 'test-access-token', expires_in: 3600 });

describe('ViessmannHeatPumpSource', () => {
  let fetchSpy: jest.SpyInstance;
  let source: ViessmannHeatPumpSource;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    source = new ViessmannHeatPumpSource(
      new ConfigService({
        VIESSMANN_CLIENT_ID: 'test-client',
        VIESSMANN_REFRESH_TOKEN: 'test-refresh-token',
        VIESSMANN_INSTALLATION_ID: '1001',
        VIESSMANN_GATEWAY_SERIAL: '7700000000000001',
        VIESSMANN_DEVICE_ID: '0',
      }),
    );
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should map one features call onto a snapshot', async () => {
    fetchSpy.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json(featuresPayload));

    const result = await source.readSnapshot(T0);

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(fetchSpy.mock.calls[0][0]).toBe(VIESSMANN_TOKEN_URL);
    expect(fetchSpy.mock.calls[1][0]).toBe(
      'https://api.viessmann.com/iot/v2/features/installations/1001/gateways/7700000000000001/devices/0/features',
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const reading = result.value;
    expect(reading.timestamp).toBe(T0);
    expect(reading.outsideTemperature).toBe(4.2);
    expect(reading.returnTemperature).toBe(29.8);
    expect(reading.dhwStorageTemperature).toBe(47.5);
    expect(reading.compressorModulation).toBe(55);
    expect(reading.compressorPowerRated).toBe(16);
    expect(reading.compressorRuntimeHours).toBe(1234.5);
    expect(reading.circulationPumpActive).toBe(false);
    expect(reading.circuits).toEqual([{ circuitId: 0, supplyTemperature: 34.6, pumpStatus: 'on' }]);
    expect(reading.configuration?.circuits[0].setpoints).toEqual({
      comfort: 22,
      normal: 20,
      reduced: 17,
    });
    expect(reading.configuration?.circuits[0].schedule?.days.mon).toEqual([
      { start: '05:30', end: '22:00', mode: 'normal', position: 0 },
    ]);
    expect(reading.configuration?.circuits[0].schedule?.days.wed).toEqual([]);
    expect(reading.configuration?.dhw).toEqual({
      active: true,
      targetTemperature: 50,
      schedule: null,
      circulationSchedule: null,
    });
  });

  it('should report missing features as nulls, not zeros', async () => {
    fetchSpy.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json({ data: [] }));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.outsideTemperature).toBeNull();
    expect(result.value.compressorModulation).toBeNull();
    expect(result.value.circulationPumpActive).toBeNull();
    expect(result.value.circuits).toEqual([]);
  });

  it('should reuse the access token until shortly before it expires', async () => {
    fetchSpy
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json(featuresPayload))
      .mockResolvedValueOnce(json(featuresPayload));

    await source.readSnapshot(T0);
    await source.readSnapshot(secondsAfter(T0, 300));

    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(fetchSpy.mock.calls[2][0]).not.toBe(VIESSMANN_TOKEN_URL);
  });

  it('should surface HTTP 429 as a rate limit failure', async () => {
    fetchSpy
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json({ message: 'quota' }, 429));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('rate_limit');
  });

  it('should surface a rejected token as an auth failure and refresh again next time', async () => {
    fetchSpy
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json({}, 401))
      .mockResolvedValueOnce(tokenResponse())
      .mockResolvedValueOnce(json(featuresPayload));

    const first = await source.readSnapshot(T0);
    const second = await source.readSnapshot(secondsAfter(T0, 60));

    expect(first.ok).toBe(false);
    if (!first.ok) {
      expect(first.error.kind).toBe('auth');
    }
    expect(second.ok).toBe(true);
    expect(fetchSpy.mock.calls[2][0]).toBe(VIESSMANN_TOKEN_URL);
  });

  it('should surface a failed token refresh as an auth failure', async () => {
    fetchSpy.mockResolvedValueOnce(json({ error: 'invalid_grant' }, 400));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('auth');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should treat a throttled token refresh as a transport failure', async () => {
    fetchSpy.mockResolvedValueOnce(json({ error: 'too_many_requests' }, 429));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('transport');
    expect(result.error.message).toBe('Token refresh failed with HTTP 429');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should surface network errors as transport failures', async () => {
    fetchSpy
      .mockResolvedValueOnce(tokenResponse())
      .mockRejectedValueOnce(new TypeError('fetch failed'));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('transport');
    expect(result.error.message).toBe('Heat pump request failed: fetch failed');
  });

  it('should treat a payload without a feature list as partial data', async () => {
    fetchSpy.mockResolvedValueOnce(tokenResponse()).mockResolvedValueOnce(json({ items: [] }));

    const result = await source.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('partial_data');
  });

  it('should not call the API without credentials', async () => {
    const unconfigured = new ViessmannHeatPumpSource(new ConfigService({}));

    const result = await unconfigured.readSnapshot(T0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('auth');
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
