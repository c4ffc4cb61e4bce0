import { ReplicationErrorKind } from '../errors/ReplicationError';
import { ReplicationReport } from './ReplicationManager';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for replication runs
  logRunStart(databaseName: string, meta?: LogMeta): void;
  logBackupComplete(fileName: string, fullPath: string, duration: number): void;
  logTableSynced(table: string, targetTable: string, rowCount: number, created: boolean, duration: number): void;
  logTableFailed(table: string, kind: ReplicationErrorKind, error: Error): void;
  logRunSummary(report: ReplicationReport): void;
  logConfigurationStart(config: LogMeta): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
