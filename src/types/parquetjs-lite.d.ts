// parquetjs-lite ships plain JavaScript; these are the parts of its API in use here.
declare module 'parquetjs-lite' {
  export type ParquetPrimitiveType = 'DOUBLE' | 'UTF8';

  export interface ParquetFieldDefinition {
    type: ParquetPrimitiveType;
  }

  export type ParquetSchemaDefinition = Record<string, ParquetFieldDefinition>;

  export class ParquetSchema {
    constructor(schema: ParquetSchemaDefinition);
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>;
    appendRow(row: Record<string, unknown>): Promise<void>;
    close(): Promise<void>;
  }

  export interface ParquetCursor {
    next(): Promise<Record<string, unknown> | null>;
  }

  export class ParquetReader {
    static openFile(path: string): Promise<ParquetReader>;
    getCursor(columns?: string[]): ParquetCursor;
    close(): Promise<void>;
  }
}
