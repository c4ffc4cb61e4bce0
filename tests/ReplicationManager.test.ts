import { ReplicationManager } from '../src/clients/ReplicationManager';
import { ReplicationConfig } from '../src/interfaces/ReplicationConfig';
import { ColumnMetadata, SqlValue } from '../src/interfaces/SourceDatabase';
import {
  InMemoryRemoteEndpoint,
  InMemorySourceDatabase,
  SourceTable,
  createMockLogger,
} from './support/fakes';

const ID_COLUMN: ColumnMetadata = { name: 'Id', typeName: 'int', maxLength: null, precision: 10, scale: 0 };
const NOTE_COLUMN: ColumnMetadata = { name: 'Note', typeName: 'nvarchar', maxLength: 50, precision: null, scale: null };

function ordersTable(rows: SqlValue[][] = [[1, 'first'], [2, 'second']]): SourceTable {
  return { ref: { schemaName: 'dbo', tableName: 'Orders' }, columns: [ID_COLUMN, NOTE_COLUMN], rows };
}

function simpleTable(tableName: string, schemaName = 'dbo'): SourceTable {
  return { ref: { schemaName, tableName }, columns: [ID_COLUMN], rows: [[1], [2], [3]] };
}

describe('ReplicationManager', () => {
  const fixedTime = new Date(2024, 0, 5, 9, 7);
  let config: ReplicationConfig;
  let source: InMemorySourceDatabase;
  let remote: InMemoryRemoteEndpoint;
  let logger: ReturnType<typeof createMockLogger>;

  const createManager = (overrides: Partial<ReplicationConfig> = {}): ReplicationManager =>
    new ReplicationManager(source, remote, { ...config, ...overrides }, logger, () => fixedTime);

  beforeEach(() => {
    config = {
      sourceDatabaseName: 'Shop',
      nameSuffix: 'bi',
      localBackupDirectory: 'D:\\Backups',
      remoteServerAddress: 'remote-sql',
      remoteDatabaseName: 'Warehouse',
      sourceServerAddress: 'localhost',
      tableFailurePolicy: 'continue',
    };
    source = new InMemorySourceDatabase();
    remote = new InMemoryRemoteEndpoint();
    logger = createMockLogger();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('executeRun', () => {
    it('should back up, create and populate a table missing on the remote', async () => {
      source.addTable(ordersTable());

      const report = await createManager().executeRun();

      expect(source.backups).toEqual(['D:\\Backups\\Shop_05012024_09_07.bak']);
      expect(report.backup).toEqual({
        fileName: 'Shop_05012024_09_07.bak',
        fullPath: 'D:\\Backups\\Shop_05012024_09_07.bak',
        timestamp: fixedTime,
      });
      expect(remote.statements).toEqual([
        'CREATE TABLE [dbo_Orders_bi] ([Id] int, [Note] nvarchar(50))',
        'DELETE FROM [dbo_Orders_bi]',
      ]);
      expect(remote.tables.get('dbo_Orders_bi')?.rows).toEqual([
        [1, 'first'],
        [2, 'second'],
      ]);
      expect(report.status).toBe('completed');
      expect(report.tables).toEqual([
        {
          table: 'dbo.Orders',
          schemaName: 'dbo',
          tableName: 'Orders',
          targetTable: 'dbo_Orders_bi',
          status: 'succeeded',
          created: true,
          rowCount: 2,
          duration: expect.any(Number),
        },
      ]);
      expect(report.succeededCount).toBe(1);
      expect(report.failedCount).toBe(0);
      expect(logger.logTableSynced).toHaveBeenCalledWith('dbo.Orders', 'dbo_Orders_bi', 2, true, expect.any(Number));
      expect(logger.logRunSummary).toHaveBeenCalledWith(report);
    });

    it('should replace the rows of an existing remote table instead of appending', async () => {
      source.addTable(ordersTable());
      remote.tables.set('dbo_Orders_bi', {
        statement: 'existing',
        rows: [[7, 'old'], [8, 'old'], [9, 'old']],
      });

      const report = await createManager().executeRun();

      expect(remote.statements).toEqual(['DELETE FROM [dbo_Orders_bi]']);
      expect(remote.tables.get('dbo_Orders_bi')?.rows).toEqual([
        [1, 'first'],
        [2, 'second'],
      ]);
      expect(report.tables[0].created).toBe(false);
      expect(report.tables[0].rowCount).toBe(2);
    });

    it('should leave exactly the current source rows after repeated runs', async () => {
      source.addTable(ordersTable());
      const manager = createManager();

      await manager.executeRun();
      source.setRows({ schemaName: 'dbo', tableName: 'Orders' }, [[5, 'only']]);
      const second = await manager.executeRun();

      expect(remote.tables.get('dbo_Orders_bi')?.rows).toEqual([[5, 'only']]);
      expect(second.tables[0]).toMatchObject({ status: 'succeeded', created: false, rowCount: 1 });
    });

    it('should keep syncing other tables when one remote table is unreachable', async () => {
      ['T1', 'T2', 'T3', 'T4', 'T5'].forEach(name => source.addTable(simpleTable(name)));
      remote.unreachableTables.add('dbo_T3_bi');

      const report = await createManager().executeRun();

      expect(report.status).toBe('completed_with_failures');
      expect(report.succeededCount).toBe(4);
      expect(report.failedCount).toBe(1);
      expect(report.tables.map(outcome => [outcome.table, outcome.status, outcome.errorKind])).toEqual([
        ['dbo.T1', 'succeeded', undefined],
        ['dbo.T2', 'succeeded', undefined],
        ['dbo.T3', 'failed', 'RemoteUnreachable'],
        ['dbo.T4', 'succeeded', undefined],
        ['dbo.T5', 'succeeded', undefined],
      ]);
      for (const name of ['dbo_T1_bi', 'dbo_T2_bi', 'dbo_T4_bi', 'dbo_T5_bi']) {
        expect(remote.tables.get(name)?.rows).toEqual([[1], [2], [3]]);
      }
      expect(remote.tables.has('dbo_T3_bi')).toBe(false);
    });

    it('should stop before touching tables when the backup fails', async () => {
      source.addTable(ordersTable());
      source.failBackup = new Error('Operating system error 5(Access is denied.)');
      const listSpy = jest.spyOn(source, 'listBaseTables');

      const report = await createManager().executeRun();

      expect(report.status).toBe('failed');
      expect(report.fatalError).toEqual({
        kind: 'BackupFailed',
        message: 'Backup to D:\\Backups\\Shop_05012024_09_07.bak failed: Error: Operating system error 5(Access is denied.)',
      });
      expect(report.tables).toEqual([]);
      expect(report.backup).toBeUndefined();
      expect(listSpy).not.toHaveBeenCalled();
      expect(remote.statements).toEqual([]);
    });

    it('should stop when the tables cannot be listed', async () => {
      source.failEnumeration = new Error('catalog unavailable');

      const report = await createManager().executeRun();

      expect(report.status).toBe('failed');
      expect(report.fatalError?.kind).toBe('EnumerationFailed');
      expect(report.backup?.fileName).toBe('Shop_05012024_09_07.bak');
      expect(remote.statements).toEqual([]);
    });

    it('should fail a table without columns without touching the remote', async () => {
      source.addTable({ ref: { schemaName: 'dbo', tableName: 'Empty' }, columns: [], rows: [] });
      source.addTable(ordersTable());

      const report = await createManager().executeRun();

      expect(report.tables[0]).toMatchObject({
        table: 'dbo.Empty',
        targetTable: 'dbo_Empty_bi',
        status: 'failed',
        errorKind: 'TranslationFailed',
      });
      expect(report.tables[1].status).toBe('succeeded');
      expect(remote.statements.some(statement => statement.includes('dbo_Empty_bi'))).toBe(false);
    });

    it('should report a rejected CREATE TABLE as a DDL failure', async () => {
      source.addTable(ordersTable());
      remote.rejectCreate = new Error("There is already an object named 'dbo_Orders_bi' in the database.");

      const report = await createManager().executeRun();

      expect(report.tables[0]).toMatchObject({ status: 'failed', errorKind: 'RemoteDDLFailed' });
    });

    it('should fail every table that maps to the same target name', async () => {
      source.addTable(simpleTable('c', 'a.b'));
      source.addTable(simpleTable('b.c', 'a'));
      source.addTable(simpleTable('Other'));

      const report = await createManager().executeRun();

      expect(
        report.tables.map(outcome => [
          outcome.schemaName,
          outcome.tableName,
          outcome.targetTable,
          outcome.status,
          outcome.errorKind,
        ])
      ).toEqual([
        ['a.b', 'c', 'a_b_c_bi', 'failed', 'TargetNameCollision'],
        ['a', 'b.c', 'a_b_c_bi', 'failed', 'TargetNameCollision'],
        ['dbo', 'Other', 'dbo_Other_bi', 'succeeded', undefined],
      ]);
      expect(report.tables[0].error).toBe('Tables a.b.c, a.b.c all map to remote table a_b_c_bi');
      expect(remote.tables.has('a_b_c_bi')).toBe(false);
    });

    it('should skip the remaining tables under the abort policy', async () => {
      ['T1', 'T2', 'T3'].forEach(name => source.addTable(simpleTable(name)));
      remote.unreachableTables.add('dbo_T2_bi');

      const report = await createManager({ tableFailurePolicy: 'abort' }).executeRun();

      expect(report.status).toBe('aborted');
      expect(report.tables.map(outcome => outcome.status)).toEqual(['succeeded', 'failed', 'skipped']);
      expect(report.skippedCount).toBe(1);
      expect(remote.tables.has('dbo_T3_bi')).toBe(false);
    });

    it('should cancel the current table and skip the rest when the signal aborts', async () => {
      ['T1', 'T2'].forEach(name => source.addTable(simpleTable(name)));
      const controller = new AbortController();
      const listBaseTables = source.listBaseTables.bind(source);
      jest.spyOn(source, 'listBaseTables').mockImplementation(async () => {
        const tables = await listBaseTables();
        controller.abort();
        return tables;
      });

      const report = await createManager().executeRun(controller.signal);

      expect(source.backups).toHaveLength(1);
      expect(report.status).toBe('aborted');
      expect(report.tables.map(outcome => [outcome.status, outcome.errorKind])).toEqual([
        ['failed', 'Cancelled'],
        ['skipped', undefined],
      ]);
      expect(remote.statements).toEqual([]);
    });

    it('should not take the backup when the signal aborted before the run', async () => {
      source.addTable(ordersTable());
      const controller = new AbortController();
      controller.abort();

      const report = await createManager().executeRun(controller.signal);

      expect(source.backups).toEqual([]);
      expect(report.status).toBe('aborted');
      expect(report.fatalError).toEqual({ kind: 'Cancelled', message: 'Replication run was cancelled' });
      expect(report.tables).toEqual([]);
    });

    it('should report a backup interrupted by cancellation as aborted', async () => {
      source.addTable(ordersTable());
      const controller = new AbortController();
      source.onBackup = () => controller.abort();
      source.failBackup = new Error('Operation cancelled by user.');

      const report = await createManager().executeRun(controller.signal);

      expect(report.status).toBe('aborted');
      expect(report.fatalError).toEqual({
        kind: 'Cancelled',
        message: 'Replication run was cancelled during the backup',
      });
      expect(remote.statements).toEqual([]);
    });

    it('should complete normally within the run deadline and clear its timer', async () => {
      source.addTable(ordersTable());
      const setTimeoutSpy = jest.spyOn(global, 'setTimeout');
      const clearTimeoutSpy = jest.spyOn(global, 'clearTimeout');

      const report = await createManager({ runTimeoutMs: 60_000 }).executeRun();

      expect(report.status).toBe('completed');
      const deadlineCall = setTimeoutSpy.mock.calls.findIndex(call => call[1] === 60_000);
      expect(deadlineCall).toBeGreaterThanOrEqual(0);
      expect(clearTimeoutSpy).toHaveBeenCalledWith(setTimeoutSpy.mock.results[deadlineCall].value);
    });

    it('should cancel the running table and skip the rest when the run deadline passes', async () => {
      ['T1', 'T2'].forEach(name => source.addTable(simpleTable(name)));
      source.readDelayMs = 50;

      const report = await createManager({ runTimeoutMs: 10 }).executeRun();

      expect(logger.warn).toHaveBeenCalledWith('Run deadline of 10ms reached, cancelling');
      expect(report.status).toBe('aborted');
      expect(report.tables.map(outcome => [outcome.table, outcome.status, outcome.errorKind])).toEqual([
        ['dbo.T1', 'failed', 'Cancelled'],
        ['dbo.T2', 'skipped', undefined],
      ]);
      expect(report.failedCount).toBe(1);
      expect(report.skippedCount).toBe(1);
      expect(remote.tables.has('dbo_T2_bi')).toBe(false);
    });

    it('should assign a fresh run id to every run', async () => {
      const manager = createManager();

      const first = await manager.executeRun();
      const second = await manager.executeRun();

      expect(first.runId).toMatch(/^[0-9a-f-]{36}$/);
      expect(second.runId).not.toBe(first.runId);
    });
  });

  describe('validateConfiguration', () => {
    it('should pass when both connections work', async () => {
      await expect(createManager().validateConfiguration()).resolves.toBe(true);
    });

    it('should fail when the remote connection fails', async () => {
      jest.spyOn(remote, 'testConnection').mockResolvedValue(false);

      await expect(createManager().validateConfiguration()).resolves.toBe(false);
    });

    it('should not test the remote when the source connection fails', async () => {
      jest.spyOn(source, 'testConnection').mockResolvedValue(false);
      const remoteSpy = jest.spyOn(remote, 'testConnection');

      await expect(createManager().validateConfiguration()).resolves.toBe(false);
      expect(remoteSpy).not.toHaveBeenCalled();
    });
  });
});
