/**
 * A base table in the source database
 */
export interface TableRef {
  schemaName: string;
  tableName: string;
}

/**
 * One row of the source catalog describing a column
 */
export interface ColumnMetadata {
  name: string;
  typeName: string;

  /** Declared maximum length; -1 when the column is unbounded (MAX) */
  maxLength: number | null;
  precision: number | null;
  scale: number | null;
}

/**
 * A column value as the driver reads and bulk-loads it. Exact numerics
 * (decimal, numeric, money) travel as their text form.
 */
export type SqlValue = string | number | boolean | Date | Buffer | null | undefined;

/**
 * Every row of a table, values ordered like `columns`
 */
export interface TableData {
  columns: ColumnMetadata[];
  rows: SqlValue[][];
}

export interface BackupDescriptor {
  fileName: string;
  fullPath: string;
  timestamp: Date;
}

export interface BackupInfo {
  filePath: string;
  databaseName: string;
  timestamp: Date;
}

export interface BackupSink {
  /** Full backup that initializes (overwrites) the destination file */
  backup(databaseName: string, destinationPath: string, signal?: AbortSignal): Promise<BackupInfo>;
}

export interface CatalogReader {
  listBaseTables(databaseName: string): Promise<TableRef[]>;
  listColumns(table: TableRef): Promise<ColumnMetadata[]>;
}

export interface TableReader {
  readTable(table: TableRef, columns: ColumnMetadata[], signal?: AbortSignal): Promise<TableData>;
}

export interface SourceDatabase extends BackupSink, CatalogReader, TableReader {
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}
