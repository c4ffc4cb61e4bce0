import { TableData } from './SourceDatabase';

/**
 * Typed access to the database that receives replicated tables
 */
export interface RemoteEndpoint {
  tableExists(tableName: string, signal?: AbortSignal): Promise<boolean>;

  /** Run a DDL or DML statement */
  execute(statement: string, signal?: AbortSignal): Promise<void>;

  /** Insert every row in one operation; returns the number of rows written */
  bulkInsert(targetTable: string, data: TableData, signal?: AbortSignal): Promise<number>;
}

export interface RemoteConnection extends RemoteEndpoint {
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}
