import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsNumber,
  IsObject,
  IsString,
  ValidateNested,
} from 'class-validator';

export const TOMORROW_QUERY_FIELDS = ['temperature', 'windSpeed'] as const;

/** Relative window tokens understood by the timelines endpoint. */
export const DEFAULT_START_TIME = 'nowMinus1h';
export const DEFAULT_END_TIME = 'nowPlus5d';

export interface RawIntervalValues {
  temperature: number;
  windSpeed: number;
}

export interface RawInterval {
  startTime: string;
  values: RawIntervalValues;
}

export class IntervalValuesDto implements RawIntervalValues {
  @IsNumber()
  temperature!: number;

  @IsNumber()
  windSpeed!: number;
}

export class IntervalDto implements RawInterval {
  @IsString()
  startTime!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => IntervalValuesDto)
  values!: IntervalValuesDto;
}

export class TimelineDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => IntervalDto)
  intervals!: IntervalDto[];
}

export class TimelinesDataDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => TimelineDto)
  timelines!: TimelineDto[];
}

/**
 * `GET /v4/timelines` body. Only the first timeline is read:
 * a single `timesteps` value is requested.
 */
export class TimelinesResponseDto {
  @IsObject()
  @ValidateNested()
  @Type(() => TimelinesDataDto)
  data!: TimelinesDataDto;
}
