import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, QueryRunner } from 'typeorm';
import { EtlConfigService, UpsertStrategy } from '../config/etl-config.service';
import { UpsertError, describeError } from '../utils/etl-errors';
import {
  WeatherColumn,
  WeatherRecord,
  WeatherTable,
  WeatherValue,
  isWeatherColumn,
} from '../weather/weather-record';
import {
  ColumnDefinition,
  MergeTarget,
  buildColumnTypesQuery,
  buildCreateTable,
  buildDropTable,
  buildInsertValues,
  buildMergeStatement,
  buildOnConflictStatement,
  qualifiedName,
  stagingTableName,
} from './merge-statement.builder';

export interface UpsertResult {
  destination: string;
  rows: number;
  discardedDuplicates: number;
}

// 1000 rows x 5 columns stays far below the 65535 bind parameter limit
const INSERT_BATCH_SIZE = 1000;

interface ColumnTypeRow {
  column_name: string;
  data_type: string;
}

function isColumnTypeRow(value: unknown): value is ColumnTypeRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'column_name' in value &&
    typeof value.column_name === 'string' &&
    'data_type' in value &&
    typeof value.data_type === 'string'
  );
}

const NUMERIC_SCALE = /^numeric\(\d+,\s*(\d+)\)$/i;

/** Digits kept after the decimal point by a `numeric(p,s)` column type. */
export function numericScale(dataType: string): number | undefined {
  const match = NUMERIC_SCALE.exec(dataType.trim());
  return match ? Number(match[1]) : undefined;
}

function keyOf(
  row: WeatherRecord,
  keyColumns: readonly WeatherColumn[],
  scales: ReadonlyMap<string, number>,
): string {
  return keyColumns
    .map((column) => {
      const value = row[column];
      if (value instanceof Date) {
        return String(value.getTime());
      }
      const scale = scales.get(column);
      return scale === undefined ? String(value) : value.toFixed(scale);
    })
    .join('|');
}

/**
 * Collapse rows sharing a key so the MERGE never sees two source rows for one
 * destination row. The values of the last occurrence win. Numeric key columns
 * listed in `scales` are compared at the precision the destination stores.
 */
export function dedupeByKey(
  rows: readonly WeatherRecord[],
  keyColumns: readonly WeatherColumn[],
  scales: ReadonlyMap<string, number> = new Map(),
): WeatherRecord[] {
  const byKey = new Map<string, WeatherRecord>();
  for (const row of rows) {
    byKey.set(keyOf(row, keyColumns, scales), row);
  }
  return [...byKey.values()];
}

function toParameter(value: WeatherValue): string | number {
  // ISO text keeps timestamp columns in UTC regardless of the session time zone
  return value instanceof Date ? value.toISOString() : value;
}

@Injectable()
export class UpsertLoaderService {
  private readonly logger = new Logger(UpsertLoaderService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly config: EtlConfigService,
  ) {}

  /**
   * Merge `table` into `schema.tableName` through a staging copy, inside one
   * transaction. The destination must already exist.
   */
  async upsert(
    table: WeatherTable,
    tableName: string,
    schema: string,
    keyColumns: readonly string[],
    strategy: UpsertStrategy = this.config.upsertStrategy,
  ): Promise<UpsertResult> {
    const destination = qualifiedName(schema, tableName);
    const keys = this.resolveKeyColumns(keyColumns);

    if (table.size === 0) {
      this.logger.log(`No rows to upsert into ${destination}`);
      return { destination, rows: 0, discardedDuplicates: 0 };
    }

    const target: MergeTarget = {
      schema,
      table: tableName,
      stagingTable: stagingTableName(tableName),
      columns: table.columns,
      keyColumns: keys,
    };
    const statement =
      strategy === 'merge'
        ? buildMergeStatement(target)
        : buildOnConflictStatement(target);

    const dataSource = await this.getDataSource();
    const queryRunner = dataSource.createQueryRunner();
    let staged: number;
    try {
      await queryRunner.connect();
      await queryRunner.startTransaction();

      const columnTypes = await this.readColumnTypes(queryRunner, schema, tableName);
      const rows = this.dedupe(table, keys, columnTypes);
      staged = rows.length;
      await this.writeStaging(queryRunner, target, columnTypes, new WeatherTable(rows));

      await queryRunner.query(statement);
      await queryRunner.query(buildDropTable(schema, target.stagingTable));
      await queryRunner.commitTransaction();
    } catch (error) {
      await this.rollback(queryRunner);
      this.logger.error(`Upsert into ${destination} failed: ${describeError(error)}`);
      if (error instanceof UpsertError) {
        throw error;
      }
      throw new UpsertError(
        `Upsert into ${destination} failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      await queryRunner.release();
    }

    this.logger.log(
      `Upserted ${staged} rows into ${destination} using ${strategy}`,
    );
    return { destination, rows: staged, discardedDuplicates: table.size - staged };
  }

  private dedupe(
    table: WeatherTable,
    keys: readonly WeatherColumn[],
    columnTypes: ReadonlyMap<string, string>,
  ): WeatherRecord[] {
    const scales = new Map<string, number>();
    for (const key of keys) {
      const scale = numericScale(columnTypes.get(key) ?? '');
      if (scale !== undefined) {
        scales.set(key, scale);
      }
    }

    const rows = dedupeByKey(table.rows, keys, scales);
    const discarded = table.size - rows.length;
    if (discarded > 0) {
      this.logger.warn(
        `Discarded ${discarded} rows with duplicate keys (${keys.join(', ')}); last occurrence kept`,
      );
    }
    return rows;
  }

  private resolveKeyColumns(keyColumns: readonly string[]): WeatherColumn[] {
    const keys: WeatherColumn[] = [];
    for (const column of keyColumns) {
      if (!isWeatherColumn(column)) {
        throw new UpsertError(`Key column ${column} is not a weather column`);
      }
      keys.push(column);
    }
    if (keys.length === 0) {
      throw new UpsertError('At least one key column is required');
    }
    return keys;
  }

  private async getDataSource(): Promise<DataSource> {
    if (!this.dataSource.isInitialized) {
      // Surfaces a ConfigurationError when POSTGRES_URI is missing
      const uri = this.config.postgresUri;
      this.logger.log(`Connecting to ${uri.replace(/\/\/[^@/]*@/, '//***@')}`);
      try {
        await this.dataSource.initialize();
      } catch (error) {
        throw new UpsertError(
          `Cannot connect to the database: ${describeError(error)}`,
          { cause: error },
        );
      }
    }
    return this.dataSource;
  }

  /**
   * Column name -> declared type of the destination, e.g. `numeric(9,6)`.
   */
  private async readColumnTypes(
    queryRunner: QueryRunner,
    schema: string,
    tableName: string,
  ): Promise<Map<string, string>> {
    const query = buildColumnTypesQuery(schema, tableName);
    const result: unknown = await queryRunner.query(query.text, query.parameters);
    const rows = Array.isArray(result) ? result.filter(isColumnTypeRow) : [];
    if (rows.length === 0) {
      throw new UpsertError(
        `Destination table ${qualifiedName(schema, tableName)} does not exist`,
      );
    }
    return new Map(rows.map((row) => [row.column_name, row.data_type]));
  }

  private async writeStaging(
    queryRunner: QueryRunner,
    target: MergeTarget,
    columnTypes: Map<string, string>,
    table: WeatherTable,
  ): Promise<void> {
    const definitions: ColumnDefinition[] = table.columns.map((name) => {
      const type = columnTypes.get(name);
      if (!type) {
        throw new UpsertError(
          `Destination ${qualifiedName(target.schema, target.table)} has no column ${name}`,
        );
      }
      return { name, type };
    });

    await queryRunner.query(buildDropTable(target.schema, target.stagingTable));
    await queryRunner.query(
      buildCreateTable(target.schema, target.stagingTable, definitions),
    );

    const values = table.toRowValues().map((row) => row.map(toParameter));
    for (let i = 0; i < values.length; i += INSERT_BATCH_SIZE) {
      const insert = buildInsertValues(
        target.schema,
        target.stagingTable,
        table.columns,
        values.slice(i, i + INSERT_BATCH_SIZE),
      );
      await queryRunner.query(insert.text, insert.parameters);
    }

    this.logger.debug(
      `Staged ${values.length} rows in ${qualifiedName(target.schema, target.stagingTable)}`,
    );
  }

  private async rollback(queryRunner: QueryRunner): Promise<void> {
    if (!queryRunner.isTransactionActive) {
      return;
    }
    try {
      await queryRunner.rollbackTransaction();
    } catch (rollbackError) {
      this.logger.error(
        `Rollback failed: ${describeError(rollbackError)}`,
      );
    }
  }
}
