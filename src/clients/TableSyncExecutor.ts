import { CatalogReader, ColumnMetadata, TableReader, TableRef } from '../interfaces/SourceDatabase';
import { RemoteEndpoint } from '../interfaces/RemoteEndpoint';
import { Logger } from '../interfaces/Logger';
import {
  ReplicationError,
  RemoteCopyError,
  RemoteDDLError,
  RemoteUnreachableError,
  ReplicationCancelledError,
  TranslationError,
  formatError,
  throwIfCancelled,
  toError,
} from '../errors/ReplicationError';
import { assertBulkLoadable, buildCreateTableStatement } from '../schema/SchemaTranslator';
import { deriveTargetTableName, qualifiedName, quoteIdentifier } from '../utils/naming';

export interface TableSyncResult {
  table: string;
  targetTable: string;
  created: boolean;
  rowCount: number;
  duration: number;
}

type SyncStep = 'translate' | 'check' | 'create' | 'clear' | 'copy';

/**
 * Wrap a step failure in the error kind that step reports. Errors that
 * already carry a kind (connection loss, cancellation) keep it.
 */
function stepError(step: SyncStep, table: string, error: unknown): ReplicationError {
  if (error instanceof ReplicationError) {
    return error;
  }

  const cause = toError(error);
  const message = formatError(error);

  switch (step) {
    case 'translate':
      return new TranslationError(`Failed to translate schema of ${table}: ${message}`, table, cause);
    case 'check':
      return new RemoteUnreachableError(`Failed to look up remote table for ${table}: ${message}`, cause);
    case 'create':
      return new RemoteDDLError(`Failed to create remote table for ${table}: ${message}`, cause);
    case 'clear':
      return new RemoteCopyError(`Failed to clear remote table for ${table}: ${message}`, cause);
    case 'copy':
      return new RemoteCopyError(`Failed to copy rows of ${table}: ${message}`, cause);
  }
}

/**
 * Reconciles one remote table with one source table:
 * check, create if absent, clear, copy.
 */
export class TableSyncExecutor {
  private catalog: CatalogReader;
  private reader: TableReader;
  private remote: RemoteEndpoint;
  private nameSuffix: string;
  private logger: Logger;

  constructor(catalog: CatalogReader, reader: TableReader, remote: RemoteEndpoint, nameSuffix: string, logger: Logger) {
    this.catalog = catalog;
    this.reader = reader;
    this.remote = remote;
    this.nameSuffix = nameSuffix;
    this.logger = logger;
  }

  targetNameFor(table: TableRef): string {
    return deriveTargetTableName(table, this.nameSuffix);
  }

  async syncTable(table: TableRef, signal?: AbortSignal): Promise<TableSyncResult> {
    const startTime = Date.now();
    const name = qualifiedName(table);
    const targetTable = this.targetNameFor(table);

    const step = async <T>(stepName: SyncStep, action: () => Promise<T>): Promise<T> => {
      throwIfCancelled(signal);
      try {
        return await action();
      } catch (error) {
        if (signal?.aborted && !(error instanceof ReplicationError)) {
          throw new ReplicationCancelledError(`Replication of ${name} was cancelled during ${stepName}`);
        }
        throw stepError(stepName, name, error);
      }
    };

    const { columns, statement } = await step('translate', async () => {
      const sourceColumns: ColumnMetadata[] = await this.catalog.listColumns(table);
      assertBulkLoadable(targetTable, sourceColumns);
      return { columns: sourceColumns, statement: buildCreateTableStatement(targetTable, sourceColumns) };
    });

    const exists = await step('check', () => this.remote.tableExists(targetTable, signal));

    if (!exists) {
      this.logger.info(`Creating remote table ${targetTable}`, { table: name, columns: columns.length });
      await step('create', () => this.remote.execute(statement, signal));
    }

    await step('clear', () => this.remote.execute(`DELETE FROM ${quoteIdentifier(targetTable)}`, signal));

    const rowCount = await step('copy', async () => {
      const data = await this.reader.readTable(table, columns, signal);
      throwIfCancelled(signal);
      return this.remote.bulkInsert(targetTable, data, signal);
    });

    const duration = Date.now() - startTime;
    this.logger.logTableSynced(name, targetTable, rowCount, !exists, duration);

    return { table: name, targetTable, created: !exists, rowCount, duration };
  }
}
