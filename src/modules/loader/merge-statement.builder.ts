import { UpsertError } from '../utils/etl-errors';

export interface SqlStatement {
  text: string;
  parameters: unknown[];
}

export interface ColumnDefinition {
  name: string;
  type: string;
}

export interface MergeTarget {
  schema: string;
  table: string;
  stagingTable: string;
  columns: readonly string[];
  keyColumns: readonly string[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
// format_type() output: "numeric(9,6)", "timestamp without time zone", "text[]", ...
const TYPE_NAME = /^[A-Za-z_][A-Za-z0-9_ ,.()[\]"]*$/;

/**
 * Identifiers cannot be bound as parameters, so they are checked against a
 * strict pattern and double-quoted. Anything else is rejected.
 */
export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new UpsertError(`Unsafe SQL identifier: '${name}'`);
  }
  return `"${name}"`;
}

export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdentifier(schema)}.${quoteIdentifier(table)}`;
}

export function stagingTableName(table: string): string {
  return `temp_${table}`;
}

export function buildColumnTypesQuery(
  schema: string,
  table: string,
): SqlStatement {
  return {
    text: [
      'SELECT a.attname AS column_name, format_type(a.atttypid, a.atttypmod) AS data_type',
      'FROM pg_catalog.pg_attribute a',
      'JOIN pg_catalog.pg_class c ON c.oid = a.attrelid',
      'JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace',
      'WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped',
      'ORDER BY a.attnum',
    ].join(' '),
    parameters: [schema, table],
  };
}

export function buildDropTable(schema: string, table: string): string {
  return `DROP TABLE IF EXISTS ${qualifiedName(schema, table)}`;
}

export function buildCreateTable(
  schema: string,
  table: string,
  columns: readonly ColumnDefinition[],
): string {
  const definitions = columns.map(({ name, type }) => {
    if (!TYPE_NAME.test(type)) {
      throw new UpsertError(`Unsupported column type for ${name}: '${type}'`);
    }
    return `${quoteIdentifier(name)} ${type}`;
  });
  return `CREATE TABLE ${qualifiedName(schema, table)} (${definitions.join(', ')})`;
}

export function buildInsertValues(
  schema: string,
  table: string,
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
): SqlStatement {
  const parameters: unknown[] = [];
  const tuples = rows.map((row) => {
    if (row.length !== columns.length) {
      throw new UpsertError(
        `Row has ${row.length} values for ${columns.length} columns`,
      );
    }
    const placeholders = row.map((value) => {
      parameters.push(value);
      return `$${parameters.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  return {
    text: `INSERT INTO ${qualifiedName(schema, table)} (${quoteColumns(columns)}) VALUES ${tuples.join(', ')}`,
    parameters,
  };
}

/**
 * `MERGE` from staging into the destination: update non-key columns of
 * matching rows, insert the rest. Requires PostgreSQL 15+.
 */
export function buildMergeStatement(target: MergeTarget): string {
  const { columns, keyColumns } = assertKeys(target);
  const updates = columns.filter((column) => !keyColumns.includes(column));

  const matchedAction =
    updates.length > 0
      ? `UPDATE SET ${updates
          .map((column) => `${quoteIdentifier(column)} = src.${quoteIdentifier(column)}`)
          .join(', ')}`
      : 'DO NOTHING';

  return [
    `MERGE INTO ${qualifiedName(target.schema, target.table)} AS dst`,
    `USING ${qualifiedName(target.schema, target.stagingTable)} AS src`,
    `ON ${keyColumns
      .map((column) => `dst.${quoteIdentifier(column)} = src.${quoteIdentifier(column)}`)
      .join(' AND ')}`,
    `WHEN MATCHED THEN ${matchedAction}`,
    `WHEN NOT MATCHED THEN INSERT (${quoteColumns(columns)})`,
    `VALUES (${columns.map((column) => `src.${quoteIdentifier(column)}`).join(', ')})`,
  ].join(' ');
}

/**
 * `INSERT ... ON CONFLICT` variant; the destination needs a unique
 * constraint over exactly the key columns.
 */
export function buildOnConflictStatement(target: MergeTarget): string {
  const { columns, keyColumns } = assertKeys(target);
  const updates = columns.filter((column) => !keyColumns.includes(column));

  const conflictAction =
    updates.length > 0
      ? `DO UPDATE SET ${updates
          .map((column) => `${quoteIdentifier(column)} = EXCLUDED.${quoteIdentifier(column)}`)
          .join(', ')}`
      : 'DO NOTHING';

  return [
    `INSERT INTO ${qualifiedName(target.schema, target.table)} (${quoteColumns(columns)})`,
    `SELECT ${quoteColumns(columns)} FROM ${qualifiedName(target.schema, target.stagingTable)}`,
    `ON CONFLICT (${quoteColumns(keyColumns)}) ${conflictAction}`,
  ].join(' ');
}

function quoteColumns(columns: readonly string[]): string {
  return columns.map(quoteIdentifier).join(', ');
}

function assertKeys(target: MergeTarget): MergeTarget {
  if (target.keyColumns.length === 0) {
    throw new UpsertError('At least one key column is required');
  }
  const unknown = target.keyColumns.filter(
    (column) => !target.columns.includes(column),
  );
  if (unknown.length > 0) {
    throw new UpsertError(`Unknown key columns: ${unknown.join(', ')}`);
  }
  return target;
}
