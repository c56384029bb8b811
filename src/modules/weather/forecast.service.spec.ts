import { Test } from '@nestjs/testing';
import { UpstreamError } from '../utils/etl-errors';
import { ForecastService } from './forecast.service';
import { TomorrowWeatherService } from './tomorrow-weather.service';

describe('ForecastService', () => {
  let service: ForecastService;
  let fetch: jest.Mock;

  const lisbon = { lat: 38.7223, lon: -9.1393 };
  const quito = { lat: -0.1807, lon: -78.4678 };

  beforeEach(async () => {
    fetch = jest.fn();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ForecastService,
        { provide: TomorrowWeatherService, useValue: { fetch } },
      ],
    }).compile();

    service = moduleRef.get(ForecastService);
  });

  it('queries the relative window when no snapshot time is given', async () => {
    fetch.mockResolvedValue([]);

    await service.getHistoryAndForecast('test-api-key', [lisbon]);

    expect(fetch).toHaveBeenCalledWith(
      'test-api-key',
      [lisbon],
      'nowMinus1h',
      'nowPlus5d',
      undefined,
    );
  });

  it('queries an absolute window around the snapshot time', async () => {
    fetch.mockResolvedValue([]);

    await service.getHistoryAndForecast(
      'test-api-key',
      [lisbon],
      '2024-01-10T00:00:00Z',
    );

    expect(fetch.mock.calls[0].slice(2, 4)).toEqual([
      '2024-01-09T23:00:00Z',
      '2024-01-15T00:00:00Z',
    ]);
  });

  it('assembles normalized rows in fetch order', async () => {
    fetch.mockResolvedValue([
      {
        interval: {
          startTime: '2024-01-10T00:00:00Z',
          values: { temperature: 14.2, windSpeed: 3.3 },
        },
        location: lisbon,
      },
      {
        interval: {
          startTime: '2024-01-10T00:00:00Z',
          values: { temperature: 12.8, windSpeed: 1.4 },
        },
        location: quito,
      },
    ]);

    const table = await service.getHistoryAndForecast('test-api-key', [
      lisbon,
      quito,
    ]);

    expect(table.columns).toEqual([
      'snapshot_time',
      'latitude',
      'longitude',
      'temperature',
      'wind_speed',
    ]);
    expect(table.rows).toEqual([
      {
        snapshot_time: new Date('2024-01-10T00:00:00Z'),
        latitude: 38.7223,
        longitude: -9.1393,
        temperature: 14.2,
        wind_speed: 3.3,
      },
      {
        snapshot_time: new Date('2024-01-10T00:00:00Z'),
        latitude: -0.1807,
        longitude: -78.4678,
        temperature: 12.8,
        wind_speed: 1.4,
      },
    ]);
  });

  it('returns an empty table with the canonical columns', async () => {
    fetch.mockResolvedValue([]);

    const table = await service.getHistoryAndForecast('test-api-key', []);

    expect(table.size).toBe(0);
    expect(table.columns).toHaveLength(5);
  });

  it('produces no table when any location fails', async () => {
    fetch.mockRejectedValue(new UpstreamError('Weather request failed', 500));

    await expect(
      service.getHistoryAndForecast('test-api-key', [lisbon, quito]),
    ).rejects.toBeInstanceOf(UpstreamError);
  });
});
