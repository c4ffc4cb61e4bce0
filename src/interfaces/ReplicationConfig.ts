export interface DatabaseCredentials {
  user: string;
  password: string;
}

/**
 * What to do with the remaining tables once one table fails
 */
export type TableFailurePolicy = 'continue' | 'abort';

export interface ReplicationConfig {
  sourceDatabaseName: string;
  nameSuffix: string;
  localBackupDirectory: string;
  remoteServerAddress: string;
  remoteDatabaseName: string;
  remoteCredentials?: DatabaseCredentials;
  sourceServerAddress: string;
  sourceCredentials?: DatabaseCredentials;
  tableFailurePolicy: TableFailurePolicy;
  runTimeoutMs?: number; // overall deadline for the run
  logLevel?: string;
}
