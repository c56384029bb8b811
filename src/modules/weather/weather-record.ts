import { SchemaError } from '../utils/etl-errors';
import { parseInstant } from './forecast-window';

/** Column names and order shared by the parquet snapshot and the SQL column lists. */
export const CANONICAL_COLUMNS = [
  'snapshot_time',
  'latitude',
  'longitude',
  'temperature',
  'wind_speed',
] as const;

export type WeatherColumn = (typeof CANONICAL_COLUMNS)[number];

/** Natural key of a weather row. */
export const KEY_COLUMNS: readonly WeatherColumn[] = [
  'latitude',
  'longitude',
  'snapshot_time',
];

/** Output of `transformRow`: the provider timestamp is passed through untouched. */
export interface TransformedRow {
  latitude: number | string;
  longitude: number | string;
  snapshot_time: string;
  temperature: number;
  wind_speed: number;
}

export interface WeatherRecord {
  snapshot_time: Date;
  latitude: number;
  longitude: number;
  temperature: number;
  wind_speed: number;
}

export type WeatherValue = Date | number;

export function isWeatherColumn(name: string): name is WeatherColumn {
  return CANONICAL_COLUMNS.some((column) => column === name);
}

function toFiniteNumber(value: number | string, column: string): number {
  const parsed =
    typeof value === 'number'
      ? value
      : value.trim() === ''
        ? Number.NaN
        : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new SchemaError(`${column} is not a number: ${String(value)}`);
  }
  return parsed;
}

/**
 * Coerce a transformed row to column types: a real timestamp and
 * floating-point coordinates, even when upstream sent strings.
 */
export function normalizeRecord(row: TransformedRow): WeatherRecord {
  // Same zone rule as the configured snapshot time: no designator means UTC
  const snapshotTime = parseInstant(row.snapshot_time);
  if (snapshotTime === undefined) {
    throw new SchemaError(`snapshot_time is not a timestamp: ${row.snapshot_time}`);
  }

  return {
    snapshot_time: snapshotTime,
    latitude: toFiniteNumber(row.latitude, 'latitude'),
    longitude: toFiniteNumber(row.longitude, 'longitude'),
    temperature: toFiniteNumber(row.temperature, 'temperature'),
    wind_speed: toFiniteNumber(row.wind_speed, 'wind_speed'),
  };
}

/**
 * Ordered weather rows with the fixed canonical column set.
 * The column list is exposed even when there are no rows.
 */
export class WeatherTable {
  readonly columns: readonly WeatherColumn[] = CANONICAL_COLUMNS;

  constructor(readonly rows: readonly WeatherRecord[] = []) {}

  get size(): number {
    return this.rows.length;
  }

  /** Rows as value tuples in column order. */
  toRowValues(
    columns: readonly WeatherColumn[] = this.columns,
  ): WeatherValue[][] {
    return this.rows.map((row) => columns.map((column) => row[column]));
  }
}
