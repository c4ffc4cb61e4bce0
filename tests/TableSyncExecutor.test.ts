import { TableSyncExecutor } from '../src/clients/TableSyncExecutor';
import { CatalogReader, ColumnMetadata, TableData, TableReader } from '../src/interfaces/SourceDatabase';
import { RemoteEndpoint } from '../src/interfaces/RemoteEndpoint';
import { ReplicationError, RemoteUnreachableError } from '../src/errors/ReplicationError';
import { createMockLogger } from './support/fakes';

describe('TableSyncExecutor', () => {
  const table = { schemaName: 'dbo', tableName: 'Orders' };
  const columns: ColumnMetadata[] = [
    { name: 'Id', typeName: 'int', maxLength: null, precision: 10, scale: 0 },
    { name: 'Note', typeName: 'nvarchar', maxLength: 50, precision: null, scale: null },
  ];
  const data: TableData = { columns, rows: [[1, 'a'], [2, 'b']] };

  let catalog: jest.Mocked<CatalogReader>;
  let reader: jest.Mocked<TableReader>;
  let remote: jest.Mocked<RemoteEndpoint>;
  let executor: TableSyncExecutor;
  let calls: string[];

  const syncError = async (): Promise<ReplicationError> => {
    try {
      await executor.syncTable(table);
    } catch (error) {
      if (error instanceof ReplicationError) {
        return error;
      }
      throw error;
    }
    throw new Error('syncTable did not fail');
  };

  beforeEach(() => {
    calls = [];
    catalog = {
      listBaseTables: jest.fn(),
      listColumns: jest.fn().mockResolvedValue(columns),
    };
    reader = {
      readTable: jest.fn().mockImplementation(async () => {
        calls.push('read');
        return data;
      }),
    };
    remote = {
      tableExists: jest.fn().mockImplementation(async () => {
        calls.push('check');
        return false;
      }),
      execute: jest.fn().mockImplementation(async (statement: string) => {
        calls.push(statement.startsWith('CREATE') ? 'create' : 'clear');
      }),
      bulkInsert: jest.fn().mockImplementation(async () => {
        calls.push('copy');
        return 2;
      }),
    };
    executor = new TableSyncExecutor(catalog, reader, remote, 'bi', createMockLogger());
  });

  it('should check, create, clear and copy in that order', async () => {
    const result = await executor.syncTable(table);

    expect(calls).toEqual(['check', 'create', 'clear', 'read', 'copy']);
    expect(remote.tableExists).toHaveBeenCalledWith('dbo_Orders_bi', undefined);
    expect(remote.execute).toHaveBeenNthCalledWith(
      1,
      'CREATE TABLE [dbo_Orders_bi] ([Id] int, [Note] nvarchar(50))',
      undefined
    );
    expect(remote.execute).toHaveBeenNthCalledWith(2, 'DELETE FROM [dbo_Orders_bi]', undefined);
    expect(reader.readTable).toHaveBeenCalledWith(table, columns, undefined);
    expect(remote.bulkInsert).toHaveBeenCalledWith('dbo_Orders_bi', data, undefined);
    expect(result).toEqual({
      table: 'dbo.Orders',
      targetTable: 'dbo_Orders_bi',
      created: true,
      rowCount: 2,
      duration: expect.any(Number),
    });
  });

  it('should skip creation when the remote table exists', async () => {
    remote.tableExists.mockResolvedValue(true);

    const result = await executor.syncTable(table);

    expect(remote.execute).toHaveBeenCalledTimes(1);
    expect(remote.execute).toHaveBeenCalledWith('DELETE FROM [dbo_Orders_bi]', undefined);
    expect(result.created).toBe(false);
  });

  it('should report a failed existence check as unreachable', async () => {
    remote.tableExists.mockRejectedValue(new Error('Login failed'));

    const error = await syncError();

    expect(error.kind).toBe('RemoteUnreachable');
    expect(error.message).toBe('Failed to look up remote table for dbo.Orders: Error: Login failed');
  });

  it('should report a failed catalog read as a translation failure', async () => {
    catalog.listColumns.mockRejectedValue(new Error('catalog gone'));

    const error = await syncError();

    expect(error.kind).toBe('TranslationFailed');
    expect(remote.tableExists).not.toHaveBeenCalled();
  });

  it('should report a failed clear as a copy failure', async () => {
    remote.tableExists.mockResolvedValue(true);
    remote.execute.mockRejectedValue(new Error('permission denied'));

    const error = await syncError();

    expect(error.kind).toBe('RemoteCopyFailed');
    expect(reader.readTable).not.toHaveBeenCalled();
  });

  it('should report a failed insert as a copy failure', async () => {
    remote.bulkInsert.mockRejectedValue(new Error('String or binary data would be truncated'));

    const error = await syncError();

    expect(error.kind).toBe('RemoteCopyFailed');
    expect(error.message).toBe('Failed to copy rows of dbo.Orders: Error: String or binary data would be truncated');
  });

  it('should keep the kind of errors that already carry one', async () => {
    remote.bulkInsert.mockRejectedValue(new RemoteUnreachableError('connection reset'));

    const error = await syncError();

    expect(error.kind).toBe('RemoteUnreachable');
  });

  it('should report a driver error raised by cancellation as cancelled', async () => {
    const controller = new AbortController();
    remote.bulkInsert.mockImplementation(async () => {
      controller.abort();
      throw new Error('Canceled.');
    });

    await expect(executor.syncTable(table, controller.signal)).rejects.toMatchObject({ kind: 'Cancelled' });
  });

  it('should not start the copy once the signal has aborted', async () => {
    const controller = new AbortController();
    remote.execute.mockImplementation(async (statement: string) => {
      if (statement.startsWith('DELETE')) {
        controller.abort();
      }
    });

    await expect(executor.syncTable(table, controller.signal)).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(reader.readTable).not.toHaveBeenCalled();
    expect(remote.bulkInsert).not.toHaveBeenCalled();
  });

  it('should fail translation before touching the remote when a column name has a bracket', async () => {
    catalog.listColumns.mockResolvedValue([{ name: 'a]b', typeName: 'int', maxLength: null, precision: 10, scale: 0 }]);

    const error = await syncError();

    expect(error.kind).toBe('TranslationFailed');
    expect(error.message).toBe('Cannot bulk load into dbo_Orders_bi: identifier a]b contains a square bracket');
    expect(calls).toEqual([]);
  });
});
