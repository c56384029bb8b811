import { Injectable, Logger } from '@nestjs/common';
import { Location } from '../locations/location.dto';
import { computeForecastWindow } from './forecast-window';
import {
  TimelineQueryParams,
  TomorrowWeatherService,
} from './tomorrow-weather.service';
import { WeatherTable, normalizeRecord } from './weather-record';
import { transformRow } from './weather-record.transformer';

@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(private readonly weatherService: TomorrowWeatherService) {}

  /**
   * Fetch history + forecast for every location around `snapshotTime`
   * (or around "now" when it is absent) and assemble one table.
   * Any failing location fails the whole call; no partial table is returned.
   */
  async getHistoryAndForecast(
    apiKey: string,
    locations: readonly Location[],
    snapshotTime?: string,
    extraParams?: TimelineQueryParams,
  ): Promise<WeatherTable> {
    const window = computeForecastWindow(snapshotTime);
    this.logger.log(
      `Fetching ${locations.length} locations from ${window.startTime} to ${window.endTime}`,
    );

    const intervals = await this.weatherService.fetch(
      apiKey,
      locations,
      window.startTime,
      window.endTime,
      extraParams,
    );

    const table = new WeatherTable(
      intervals.map(({ interval, location }) =>
        normalizeRecord(transformRow(interval, location)),
      ),
    );
    this.logger.log(`Assembled ${table.size} weather rows`);
    return table;
  }
}
