import * as sql from 'mssql';
import { RemoteConnection } from '../interfaces/RemoteEndpoint';
import { TableData } from '../interfaces/SourceDatabase';
import { Logger } from '../interfaces/Logger';
import {
  RemoteUnreachableError,
  errorCode,
  formatError,
  toError,
} from '../errors/ReplicationError';
import { ConnectionSettings, buildPoolConfig, cancelOnAbort } from './connection';
import { bulkColumnType } from '../schema/sqlTypes';

/**
 * Driver codes that mean the server could not be reached or the link dropped
 */
const CONNECTION_FAILURE_CODES = new Set(['ELOGIN', 'ESOCKET', 'ECONNCLOSED', 'ENOTOPEN', 'EINSTLOOKUP', 'ECONNRESET']);

export function isConnectionFailure(error: unknown): boolean {
  if (error instanceof sql.ConnectionError) {
    return true;
  }
  const code = errorCode(error);
  return code !== undefined && CONNECTION_FAILURE_CODES.has(code);
}

/**
 * Remote SQL Server database that receives replicated tables.
 * Connects lazily; after a failed connect the next call tries again.
 */
export class RemoteSqlServerEndpoint implements RemoteConnection {
  private settings: ConnectionSettings;
  private logger: Logger;
  private poolPromise: Promise<sql.ConnectionPool> | null = null;

  constructor(settings: ConnectionSettings, logger: Logger) {
    this.settings = settings;
    this.logger = logger;
  }

  async testConnection(): Promise<boolean> {
    try {
      const pool = await this.getPool();
      await pool.request().query('SELECT 1 AS ok');
      return true;
    } catch (error) {
      this.logger.error('Remote connection test failed', toError(error), {
        server: this.settings.serverAddress,
        database: this.settings.database,
        code: errorCode(error),
      });
      return false;
    }
  }

  /**
   * Whether a user table with this unqualified name resolves for the login,
   * the same lookup CREATE TABLE, DELETE and the bulk load use
   */
  async tableExists(tableName: string, signal?: AbortSignal): Promise<boolean> {
    const pool = await this.getPool();
    const request = pool.request().input('tableName', sql.NVarChar(128), tableName);

    const result = await this.run(request, signal, () =>
      request.query<{ objectId: number | null }>(`SELECT OBJECT_ID(QUOTENAME(@tableName), 'U') AS objectId`)
    );

    return result.recordset.length > 0 && result.recordset[0].objectId !== null;
  }

  async execute(statement: string, signal?: AbortSignal): Promise<void> {
    const pool = await this.getPool();
    const request = pool.request();

    this.logger.debug('Executing remote statement', { statement });
    await this.run(request, signal, () => request.batch(statement));
  }

  /**
   * Bulk-load every row inside one transaction; nothing stays committed
   * when the load fails or is cancelled.
   */
  async bulkInsert(targetTable: string, data: TableData, signal?: AbortSignal): Promise<number> {
    if (data.rows.length === 0) {
      return 0;
    }

    const table = new sql.Table(targetTable);
    table.create = false;
    for (const column of data.columns) {
      table.columns.add(column.name, bulkColumnType(column), { nullable: true });
    }
    for (const row of data.rows) {
      table.rows.add(...row);
    }

    const pool = await this.getPool();
    const transaction = pool.transaction();
    await this.run(null, signal, () => transaction.begin());

    try {
      const request = transaction.request();
      const result = await this.run(request, signal, () => request.bulk(table));
      await transaction.commit();
      return result.rowsAffected;
    } catch (error) {
      await transaction.rollback().catch(rollbackError => {
        this.logger.warn('Failed to roll back bulk insert', {
          targetTable,
          error: formatError(rollbackError),
        });
      });
      throw error;
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
      this.logger.warn('Failed to close remote connection', { error: formatError(error) });
    }
  }

  private getPool(): Promise<sql.ConnectionPool> {
    if (!this.poolPromise) {
      const pool = new sql.ConnectionPool(buildPoolConfig(this.settings));
      this.poolPromise = pool.connect().catch(error => {
        this.poolPromise = null;
        throw new RemoteUnreachableError(
          `Cannot connect to ${this.settings.serverAddress}/${this.settings.database}: ${formatError(error)}`,
          toError(error)
        );
      });
    }
    return this.poolPromise;
  }

  /**
   * Run one driver call with cancellation wired in; connection failures
   * surface as RemoteUnreachableError.
   */
  private async run<T>(request: sql.Request | null, signal: AbortSignal | undefined, call: () => Promise<T>): Promise<T> {
    const detach = request ? cancelOnAbort(request, signal) : () => undefined;

    try {
      return await call();
    } catch (error) {
      if (isConnectionFailure(error)) {
        throw new RemoteUnreachableError(
          `Lost connection to ${this.settings.serverAddress}/${this.settings.database}: ${formatError(error)}`,
          toError(error)
        );
      }
      throw error;
    } finally {
      detach();
    }
  }
}
