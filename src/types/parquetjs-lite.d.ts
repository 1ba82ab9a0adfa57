// parquetjs-lite ships no type declarations; only the parts used here are declared.
declare module 'parquetjs-lite' {
  export type ParquetPrimitive = 'BOOLEAN' | 'INT32' | 'INT64' | 'FLOAT' | 'DOUBLE' | 'UTF8' | 'TIMESTAMP_MILLIS'

  export interface ParquetFieldDefinition {
    type: ParquetPrimitive
    optional?: boolean
    compression?: 'UNCOMPRESSED' | 'GZIP' | 'SNAPPY'
  }

  export class ParquetSchema {
    constructor(fields: Record<string, ParquetFieldDefinition>)
  }

  export class ParquetWriter {
    static openFile(schema: ParquetSchema, path: string): Promise<ParquetWriter>
    appendRow(row: Record<string, unknown>): Promise<void>
    close(): Promise<void>
  }

  export interface ParquetCursor {
    next(): Promise<Record<string, unknown> | null>
  }

  export class ParquetReader {
    static openFile(path: string): Promise<ParquetReader>
    getCursor(columns?: string[]): ParquetCursor
    close(): Promise<void>
  }

  const parquet: {
    ParquetSchema: typeof ParquetSchema
    ParquetWriter: typeof ParquetWriter
    ParquetReader: typeof ParquetReader
  }
  export default parquet
}
