import * as sql from 'mssql';
import {
  BackupInfo,
  ColumnMetadata,
  SourceDatabase,
  SqlValue,
  TableData,
  TableRef,
} from '../interfaces/SourceDatabase';
import {
  BackupFailedError,
  EnumerationFailedError,
  errorCode,
  formatError,
  toError,
} from '../errors/ReplicationError';
import { ConnectionSettings, buildPoolConfig, cancelOnAbort } from './connection';
import { qualifiedName, quoteIdentifier } from '../utils/naming';
import { selectExpression } from '../schema/sqlTypes';
import { Logger } from '../interfaces/Logger';

interface TableRow {
  schemaName: string;
  tableName: string;
}

interface ColumnRow {
  name: string;
  typeName: string;
  maxLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
}

/**
 * Client for the local SQL Server that owns the source database.
 * Provides the backup, the catalog and full-table reads.
 */
export class SqlServerClient implements SourceDatabase {
  private settings: ConnectionSettings;
  private logger: Logger;
  private poolPromise: Promise<sql.ConnectionPool> | null = null;

  constructor(settings: ConnectionSettings, logger: Logger) {
    this.settings = settings;
    this.logger = logger;
  }

  /**
   * Test connection to the source server
   */
  async testConnection(): Promise<boolean> {
    try {
      const pool = await this.getPool();
      await pool.request().query('SELECT 1 AS ok');
      return true;
    } catch (error) {
      this.logger.error('Source connection test failed', toError(error), {
        server: this.settings.serverAddress,
        database: this.settings.database,
        code: errorCode(error),
      });
      return false;
    }
  }

  /**
   * Full backup of the database to a file on the server. WITH INIT overwrites
   * any backup sets already in the file.
   */
  async backup(databaseName: string, destinationPath: string, signal?: AbortSignal): Promise<BackupInfo> {
    const timestamp = new Date();

    try {
      const pool = await this.getPool();
      const request = pool
        .request()
        .input('databaseName', sql.NVarChar(128), databaseName)
        .input('destinationPath', sql.NVarChar(4000), destinationPath);

      const detach = cancelOnAbort(request, signal);
      try {
        this.logger.debug('Executing BACKUP DATABASE', { databaseName, destinationPath });
        await request.query('BACKUP DATABASE @databaseName TO DISK = @destinationPath WITH INIT');
      } finally {
        detach();
      }

      return { filePath: destinationPath, databaseName, timestamp };
    } catch (error) {
      throw new BackupFailedError(
        `Failed to back up database ${databaseName} to ${destinationPath}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  /**
   * User base tables of the database; views and shipped objects excluded
   */
  async listBaseTables(databaseName: string): Promise<TableRef[]> {
    const database = quoteIdentifier(databaseName);

    try {
      const pool = await this.getPool();
      const result = await pool.request().query<TableRow>(
        `SELECT s.name AS schemaName, t.name AS tableName
           FROM ${database}.sys.tables AS t
           INNER JOIN ${database}.sys.schemas AS s ON s.schema_id = t.schema_id
          WHERE t.is_ms_shipped = 0`
      );

      return result.recordset.map(row => ({ schemaName: row.schemaName, tableName: row.tableName }));
    } catch (error) {
      throw new EnumerationFailedError(
        `Failed to list tables of ${databaseName}: ${formatError(error)}`,
        toError(error)
      );
    }
  }

  async listColumns(table: TableRef): Promise<ColumnMetadata[]> {
    const pool = await this.getPool();
    const result = await pool
      .request()
      .input('schemaName', sql.NVarChar(128), table.schemaName)
      .input('tableName', sql.NVarChar(128), table.tableName)
      .query<ColumnRow>(
        `SELECT COLUMN_NAME AS name,
                DATA_TYPE AS typeName,
                CHARACTER_MAXIMUM_LENGTH AS maxLength,
                NUMERIC_PRECISION AS numericPrecision,
                NUMERIC_SCALE AS numericScale
           FROM INFORMATION_SCHEMA.COLUMNS
          WHERE TABLE_SCHEMA = @schemaName AND TABLE_NAME = @tableName
          ORDER BY ORDINAL_POSITION`
      );

    return result.recordset.map(row => ({
      name: row.name,
      typeName: row.typeName,
      maxLength: row.maxLength,
      precision: row.numericPrecision,
      scale: row.numericScale,
    }));
  }

  /**
   * Read every row of the table, values ordered like `columns`. Exact
   * numerics come back as text so no digit is lost on the way.
   */
  async readTable(table: TableRef, columns: ColumnMetadata[], signal?: AbortSignal): Promise<TableData> {
    const pool = await this.getPool();
    const columnList = columns.map(selectExpression).join(', ');
    const source = `${quoteIdentifier(table.schemaName)}.${quoteIdentifier(table.tableName)}`;

    const request = pool.request();
    request.arrayRowMode = true;

    const detach = cancelOnAbort(request, signal);
    try {
      this.logger.debug('Reading source table', { table: qualifiedName(table), columns: columns.length });
      // In array row mode every recordset row is a value array
      const result = await request.query<SqlValue[][]>(`SELECT ${columnList} FROM ${source}`);
      return { columns, rows: result.recordset.map(row => [...row]) };
    } finally {
      detach();
    }
  }

  async close(): Promise<void> {
    if (!this.poolPromise) {
      return;
    }

    const poolPromise = this.poolPromise;
    this.poolPromise = null;

    try {
      const pool = await poolPromise;
      await pool.close();
    } catch (error) {
      this.logger.warn('Failed to close source connection', { error: formatError(error) });
    }
  }

  private getPool(): Promise<sql.ConnectionPool> {
    if (!this.poolPromise) {
      const pool = new sql.ConnectionPool(buildPoolConfig(this.settings));
      this.poolPromise = pool.connect().catch(error => {
        this.poolPromise = null;
        throw error;
      });
    }
    return this.poolPromise;
  }
}
