import { Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import { EtlConfigService } from '../config/etl-config.service';
import { Location } from '../locations/location.dto';
import { SchemaError, UpstreamError } from '../utils/etl-errors';
import { validatePayload } from '../utils/validation';
import {
  DEFAULT_END_TIME,
  DEFAULT_START_TIME,
  RawInterval,
  TOMORROW_QUERY_FIELDS,
  TimelinesResponseDto,
} from './tomorrow.dto';

export type TimelineQueryParams = Record<string, string | number | boolean>;

export interface LocatedInterval {
  interval: RawInterval;
  location: Location;
}

/**
 * Client for the Tomorrow.io timelines endpoint.
 * One request per location, strictly sequential; the first failure aborts the fetch.
 */
@Injectable()
export class TomorrowWeatherService {
  private readonly logger = new Logger(TomorrowWeatherService.name);

  constructor(private readonly config: EtlConfigService) {}

  async fetch(
    apiKey: string,
    locations: readonly Location[],
    startTime: string = DEFAULT_START_TIME,
    endTime: string = DEFAULT_END_TIME,
    extraParams: TimelineQueryParams = {},
  ): Promise<LocatedInterval[]> {
    const rows: LocatedInterval[] = [];

    for (const location of locations) {
      const intervals = await this.fetchIntervals(
        apiKey,
        location,
        startTime,
        endTime,
        extraParams,
      );
      for (const interval of intervals) {
        rows.push({ interval, location });
      }
    }

    return rows;
  }

  private async fetchIntervals(
    apiKey: string,
    location: Location,
    startTime: string,
    endTime: string,
    extraParams: TimelineQueryParams,
  ): Promise<RawInterval[]> {
    const coordinates = `${location.lat}, ${location.lon}`;
    const params: TimelineQueryParams = {
      apikey: apiKey,
      fields: TOMORROW_QUERY_FIELDS.join(','),
      units: 'metric',
      timesteps: '1h',
      location: coordinates,
      startTime,
      endTime,
      ...extraParams,
    };

    let payload: unknown;
    try {
      const response = await axios.get<unknown>(this.config.apiUrl, {
        params,
        headers: { accept: 'application/json' },
        timeout: this.config.requestTimeoutMs,
      });
      payload = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        this.logger.error(
          `Weather API error (${status ?? error.code ?? 'unknown'}) for coordinates (${coordinates}): ${error.message}`,
        );
        throw new UpstreamError(
          `Weather request for (${coordinates}) failed: ${error.message}`,
          status,
          { cause: error },
        );
      }
      this.logger.error(
        `Unexpected error fetching weather data for coordinates (${coordinates}):`,
        error,
      );
      throw new UpstreamError(
        `Weather request for (${coordinates}) failed`,
        undefined,
        { cause: error },
      );
    }

    const body = validatePayload(
      TimelinesResponseDto,
      payload,
      (violation) =>
        new SchemaError(
          `Unexpected weather response for (${coordinates}): ${violation}`,
        ),
    );
    const intervals = body.data.timelines[0].intervals;

    this.logger.debug(
      `Received ${intervals.length} intervals for coordinates (${coordinates})`,
    );
    return intervals;
  }
}
