import { ReplicationConfig } from './interfaces/ReplicationConfig';
import { ReplicationReport } from './interfaces/ReplicationManager';
import { Logger as ILogger } from './interfaces/Logger';
import { Logger } from './clients/Logger';
import { SqlServerClient } from './clients/SqlServerClient';
import { RemoteSqlServerEndpoint } from './clients/RemoteSqlServerEndpoint';
import { ReplicationManager } from './clients/ReplicationManager';

export interface ReplicationComponents {
  manager: ReplicationManager;
  source: SqlServerClient;
  remote: RemoteSqlServerEndpoint;
}

/**
 * Wire the source client, remote endpoint and orchestrator for one configuration
 */
export function createReplicationComponents(config: ReplicationConfig, logger: ILogger): ReplicationComponents {
  const source = new SqlServerClient(
    {
      serverAddress: config.sourceServerAddress,
      database: config.sourceDatabaseName,
      credentials: config.sourceCredentials,
      // backups and full-table reads run as long as they need; runTimeoutMs bounds the run
      requestTimeout: 0,
    },
    logger
  );

  const remote = new RemoteSqlServerEndpoint(
    {
      serverAddress: config.remoteServerAddress,
      database: config.remoteDatabaseName,
      credentials: config.remoteCredentials,
      // whole-table DELETE and bulk load
      requestTimeout: 0,
    },
    logger
  );

  const manager = new ReplicationManager(source, remote, config, logger);

  return { manager, source, remote };
}

/**
 * Back up the source database and replicate its base tables, closing every
 * connection afterwards.
 */
export async function replicateDatabase(
  config: ReplicationConfig,
  logger: ILogger = new Logger(),
  signal?: AbortSignal
): Promise<ReplicationReport> {
  const { manager, source, remote } = createReplicationComponents(config, logger);

  try {
    return await manager.executeRun(signal);
  } finally {
    await source.close();
    await remote.close();
  }
}
