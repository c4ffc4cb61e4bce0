import { v4 as uuidv4 } from 'uuid';
import {
  ReplicationManager as IReplicationManager,
  ReplicationReport,
  RunStatus,
  TableOutcome,
} from '../interfaces/ReplicationManager';
import { BackupDescriptor, SourceDatabase, TableRef } from '../interfaces/SourceDatabase';
import { RemoteConnection } from '../interfaces/RemoteEndpoint';
import { ReplicationConfig } from '../interfaces/ReplicationConfig';
import { Logger } from '../interfaces/Logger';
import {
  EnumerationFailedError,
  BackupFailedError,
  ReplicationCancelledError,
  ReplicationError,
  TargetNameCollisionError,
  formatError,
  throwIfCancelled,
  toError,
} from '../errors/ReplicationError';
import { TableSyncExecutor } from './TableSyncExecutor';
import { buildBackupDescriptor, qualifiedName } from '../utils/naming';

export type Clock = () => Date;

/**
 * Orchestrates a run: backup first, then every base table in turn.
 * Backup and enumeration failures end the run; table failures are
 * recorded and handled according to the configured failure policy.
 */
export class ReplicationManager implements IReplicationManager {
  private source: SourceDatabase;
  private remote: RemoteConnection;
  private config: ReplicationConfig;
  private logger: Logger;
  private clock: Clock;
  private executor: TableSyncExecutor;

  constructor(
    source: SourceDatabase,
    remote: RemoteConnection,
    config: ReplicationConfig,
    logger: Logger,
    clock: Clock = () => new Date()
  ) {
    this.source = source;
    this.remote = remote;
    this.config = config;
    this.logger = logger;
    this.clock = clock;
    this.executor = new TableSyncExecutor(source, source, remote, config.nameSuffix, logger);
  }

  async executeRun(signal?: AbortSignal): Promise<ReplicationReport> {
    const startTime = Date.now();
    const runId = uuidv4();
    const deadline = this.createDeadline(signal);

    this.logger.logRunStart(this.config.sourceDatabaseName, {
      runId,
      remoteServer: this.config.remoteServerAddress,
      remoteDatabase: this.config.remoteDatabaseName,
      nameSuffix: this.config.nameSuffix,
    });

    let backup: BackupDescriptor | undefined;
    const outcomes: TableOutcome[] = [];

    try {
      backup = await this.runBackup(deadline.signal);
      const tables = await this.enumerateTables();
      const aborted = await this.syncTables(tables, outcomes, deadline.signal);

      return this.buildReport(runId, startTime, outcomes, backup, aborted);
    } catch (error) {
      if (!(error instanceof ReplicationError)) {
        throw error;
      }

      this.logger.error('Replication run stopped', error, { runId, kind: error.kind });
      return this.buildReport(runId, startTime, outcomes, backup, false, error);
    } finally {
      deadline.dispose();
    }
  }

  /**
   * Test connectivity to the source and remote servers
   */
  async validateConfiguration(): Promise<boolean> {
    this.logger.info('Testing source connection...');
    if (!(await this.source.testConnection())) {
      return false;
    }

    this.logger.info('Testing remote connection...');
    if (!(await this.remote.testConnection())) {
      return false;
    }

    return true;
  }

  private async runBackup(signal: AbortSignal): Promise<BackupDescriptor> {
    const descriptor = buildBackupDescriptor(
      this.config.sourceDatabaseName,
      this.config.localBackupDirectory,
      this.clock()
    );
    const startTime = Date.now();
    throwIfCancelled(signal);

    try {
      await this.source.backup(this.config.sourceDatabaseName, descriptor.fullPath, signal);
    } catch (error) {
      if (signal.aborted) {
        throw new ReplicationCancelledError('Replication run was cancelled during the backup', toError(error));
      }
      if (error instanceof BackupFailedError) {
        throw error;
      }
      throw new BackupFailedError(`Backup to ${descriptor.fullPath} failed: ${formatError(error)}`, toError(error));
    }

    this.logger.logBackupComplete(descriptor.fileName, descriptor.fullPath, Date.now() - startTime);
    return descriptor;
  }

  private async enumerateTables(): Promise<TableRef[]> {
    try {
      const tables = await this.source.listBaseTables(this.config.sourceDatabaseName);
      this.logger.info(`Found ${tables.length} base tables`, { databaseName: this.config.sourceDatabaseName });
      return tables;
    } catch (error) {
      if (error instanceof EnumerationFailedError) {
        throw error;
      }
      throw new EnumerationFailedError(`Failed to list base tables: ${formatError(error)}`, toError(error));
    }
  }

  /**
   * Replicate tables in enumeration order. Returns true when the run
   * stopped early because of the failure policy or cancellation.
   */
  private async syncTables(tables: TableRef[], outcomes: TableOutcome[], signal: AbortSignal): Promise<boolean> {
    const collisions = this.findCollisions(tables);
    let stopped = false;

    for (const table of tables) {
      const targetTable = this.executor.targetNameFor(table);

      if (stopped) {
        outcomes.push({ ...this.sourceOf(table), targetTable, status: 'skipped', duration: 0 });
        continue;
      }

      const collision = collisions.get(targetTable);
      if (collision) {
        outcomes.push(this.failedOutcome(table, targetTable, 0, collision));
        continue;
      }

      const startTime = Date.now();
      try {
        const result = await this.executor.syncTable(table, signal);
        outcomes.push({
          ...this.sourceOf(table),
          targetTable,
          status: 'succeeded',
          created: result.created,
          rowCount: result.rowCount,
          duration: result.duration,
        });
      } catch (error) {
        if (!(error instanceof ReplicationError)) {
          throw error;
        }
        outcomes.push(this.failedOutcome(table, targetTable, Date.now() - startTime, error));

        if (error.kind === 'Cancelled' || this.config.tableFailurePolicy === 'abort') {
          this.logger.warn('Stopping run after table failure', { table: qualifiedName(table), kind: error.kind });
          stopped = true;
        }
      }
    }

    return stopped;
  }

  /**
   * Target names shared by more than one source table
   */
  private findCollisions(tables: TableRef[]): Map<string, TargetNameCollisionError> {
    const byTarget = new Map<string, string[]>();
    for (const table of tables) {
      const targetTable = this.executor.targetNameFor(table);
      const names = byTarget.get(targetTable) ?? [];
      names.push(qualifiedName(table));
      byTarget.set(targetTable, names);
    }

    const collisions = new Map<string, TargetNameCollisionError>();
    for (const [targetTable, names] of byTarget) {
      if (names.length > 1) {
        collisions.set(targetTable, new TargetNameCollisionError(targetTable, names));
      }
    }
    return collisions;
  }

  private sourceOf(table: TableRef): Pick<TableOutcome, 'table' | 'schemaName' | 'tableName'> {
    return { table: qualifiedName(table), schemaName: table.schemaName, tableName: table.tableName };
  }

  private failedOutcome(table: TableRef, targetTable: string, duration: number, error: ReplicationError): TableOutcome {
    this.logger.logTableFailed(qualifiedName(table), error.kind, error);
    return {
      ...this.sourceOf(table),
      targetTable,
      status: 'failed',
      duration,
      errorKind: error.kind,
      error: error.message,
    };
  }

  private buildReport(
    runId: string,
    startTime: number,
    tables: TableOutcome[],
    backup: BackupDescriptor | undefined,
    aborted: boolean,
    fatalError?: ReplicationError
  ): ReplicationReport {
    const succeededCount = tables.filter(outcome => outcome.status === 'succeeded').length;
    const failedCount = tables.filter(outcome => outcome.status === 'failed').length;
    const skippedCount = tables.filter(outcome => outcome.status === 'skipped').length;

    let status: RunStatus = 'completed';
    if (fatalError?.kind === 'Cancelled' || aborted) {
      status = 'aborted';
    } else if (fatalError) {
      status = 'failed';
    } else if (failedCount > 0) {
      status = 'completed_with_failures';
    }

    const report: ReplicationReport = {
      runId,
      status,
      tables,
      succeededCount,
      failedCount,
      skippedCount,
      duration: Date.now() - startTime,
    };

    if (backup) {
      report.backup = backup;
    }
    if (fatalError) {
      report.fatalError = { kind: fatalError.kind, message: fatalError.message };
    }

    this.logger.logRunSummary(report);
    return report;
  }

  /**
   * Combine the caller's signal with the configured run timeout
   */
  private createDeadline(signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    if (this.config.runTimeoutMs !== undefined) {
      const timeoutMs = this.config.runTimeoutMs;
      timer = setTimeout(() => {
        this.logger.warn(`Run deadline of ${timeoutMs}ms reached, cancelling`);
        controller.abort();
      }, timeoutMs);
    }

    return {
      signal: controller.signal,
      dispose: () => {
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      },
    };
  }
}
