import { Location } from '../locations/location.dto';
import { RawInterval } from './tomorrow.dto';
import { TransformedRow } from './weather-record';

export function transformRow(
  row: RawInterval,
  location: Pick<Location, 'lat' | 'lon'>,
): TransformedRow {
  const { values } = row;
  return {
    latitude: location.lat,
    longitude: location.lon,
    snapshot_time: row.startTime,
    temperature: values.temperature,
    wind_speed: values.windSpeed,
  };
}
