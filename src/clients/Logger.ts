import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { ReplicationErrorKind, errorCode } from '../errors/ReplicationError';
import { ReplicationReport } from '../interfaces/ReplicationManager';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'remotepassword', 'sourcepassword'];

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: LogMeta = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = this.sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  private sanitizeMeta(meta: LogMeta): LogMeta {
    const sanitized: LogMeta = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const code = error ? errorCode(error) : undefined;
    const errorMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(code !== undefined && { code }),
        },
      }),
    };
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  logRunStart(databaseName: string, meta?: LogMeta): void {
    this.info('Replication run started', {
      operation: 'run_start',
      databaseName,
      ...meta,
    });
  }

  logBackupComplete(fileName: string, fullPath: string, duration: number): void {
    this.info('Database backup completed', {
      operation: 'backup_complete',
      fileName,
      fullPath,
      duration,
    });
  }

  logTableSynced(table: string, targetTable: string, rowCount: number, created: boolean, duration: number): void {
    this.info(`Table ${table} replicated`, {
      operation: 'table_synced',
      table,
      targetTable,
      rowCount,
      created,
      duration,
    });
  }

  logTableFailed(table: string, kind: ReplicationErrorKind, error: Error): void {
    this.error(`Table ${table} failed: ${kind}`, error, {
      operation: 'table_failed',
      table,
      kind,
    });
  }

  logRunSummary(report: ReplicationReport): void {
    const meta: LogMeta = {
      operation: 'run_summary',
      runId: report.runId,
      status: report.status,
      succeeded: report.succeededCount,
      failed: report.failedCount,
      skipped: report.skippedCount,
      duration: report.duration,
    };

    if (report.fatalError) {
      meta.fatalError = report.fatalError;
    }

    if (report.status === 'completed') {
      this.info('Replication run completed', meta);
    } else {
      this.warn('Replication run finished with problems', meta);
    }
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config: this.sanitizeMeta(config),
    });
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
