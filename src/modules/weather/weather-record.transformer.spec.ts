import { Location } from '../locations/location.dto';
import { transformRow } from './weather-record.transformer';

describe('transformRow', () => {
  it('maps an interval and its location to a flat row', () => {
    const row = {
      startTime: '2024-11-22T10:00:00Z',
      values: {
        temperature: 21.5,
        windSpeed: 5.2,
      },
    };
    const location = {
      lat: 40.7128,
      lon: -74.006,
    };

    expect(transformRow(row, location)).toStrictEqual({
      latitude: 40.7128,
      longitude: -74.006,
      snapshot_time: '2024-11-22T10:00:00Z',
      temperature: 21.5,
      wind_speed: 5.2,
    });
  });

  it('ignores the location name', () => {
    const location: Location = { name: 'nuuk', lat: 64.1814, lon: -51.6941 };
    const result = transformRow(
      { startTime: '2024-11-22T11:00:00Z', values: { temperature: -3, windSpeed: 0 } },
      location,
    );

    expect(Object.keys(result)).toEqual([
      'latitude',
      'longitude',
      'snapshot_time',
      'temperature',
      'wind_speed',
    ]);
  });
});
