/// <reference path="../../types/parquetjs-lite.d.ts" />
import { Injectable, Logger } from '@nestjs/common';
import { mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import * as parquet from 'parquetjs-lite';
import { SnapshotIOError, describeError } from '../utils/etl-errors';
import {
  CANONICAL_COLUMNS,
  WeatherColumn,
  WeatherRecord,
  WeatherTable,
} from '../weather/weather-record';
import { parseInstant } from '../weather/forecast-window';

export const SNAPSHOT_FILE_NAME = 'weather_data.parquet';

// Field order follows CANONICAL_COLUMNS; no index column is stored.
// snapshot_time is ISO-8601 UTC text: the reader decodes INT64 timestamps as BigInt.
const SNAPSHOT_SCHEMA = new parquet.ParquetSchema({
  snapshot_time: { type: 'UTF8' },
  latitude: { type: 'DOUBLE' },
  longitude: { type: 'DOUBLE' },
  temperature: { type: 'DOUBLE' },
  wind_speed: { type: 'DOUBLE' },
} satisfies Record<WeatherColumn, parquet.ParquetFieldDefinition>);

export function snapshotPath(outputDir: string): string {
  return join(outputDir, SNAPSHOT_FILE_NAME);
}

@Injectable()
export class SnapshotService {
  private readonly logger = new Logger(SnapshotService.name);

  /**
   * Write the table as a parquet file, replacing whatever is at `path`.
   */
  async writeSnapshot(table: WeatherTable, path: string): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      const writer = await parquet.ParquetWriter.openFile(SNAPSHOT_SCHEMA, path);
      for (const row of table.rows) {
        await writer.appendRow({
          ...row,
          snapshot_time: row.snapshot_time.toISOString(),
        });
      }
      await writer.close();
    } catch (error) {
      this.logger.error(`Failed to write snapshot ${path}: ${describeError(error)}`);
      throw new SnapshotIOError(
        `Cannot write snapshot ${path}: ${describeError(error)}`,
        { cause: error },
      );
    }

    this.logger.log(`Wrote ${table.size} rows to ${path}`);
  }

  /**
   * Read a snapshot written by `writeSnapshot` back into a table.
   */
  async readSnapshot(path: string): Promise<WeatherTable> {
    let reader: parquet.ParquetReader;
    try {
      reader = await parquet.ParquetReader.openFile(path);
    } catch (error) {
      throw new SnapshotIOError(
        `Cannot open snapshot ${path}: ${describeError(error)}`,
        { cause: error },
      );
    }

    const rows: WeatherRecord[] = [];
    try {
      const cursor = reader.getCursor([...CANONICAL_COLUMNS]);
      let record = await cursor.next();
      while (record) {
        rows.push(this.toWeatherRecord(record, path, rows.length));
        record = await cursor.next();
      }
    } catch (error) {
      if (error instanceof SnapshotIOError) {
        throw error;
      }
      throw new SnapshotIOError(
        `Cannot read snapshot ${path}: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await reader.close();
    }

    this.logger.log(`Read ${rows.length} rows from ${path}`);
    return new WeatherTable(rows);
  }

  private toWeatherRecord(
    record: Record<string, unknown>,
    path: string,
    index: number,
  ): WeatherRecord {
    const { latitude, longitude, temperature, wind_speed } = record;
    const snapshot_time =
      typeof record.snapshot_time === 'string'
        ? parseInstant(record.snapshot_time)
        : undefined;
    if (
      snapshot_time === undefined ||
      typeof latitude !== 'number' ||
      typeof longitude !== 'number' ||
      typeof temperature !== 'number' ||
      typeof wind_speed !== 'number'
    ) {
      throw new SnapshotIOError(
        `Snapshot ${path} row ${index} does not match the weather columns`,
      );
    }
    return { snapshot_time, latitude, longitude, temperature, wind_speed };
  }
}
