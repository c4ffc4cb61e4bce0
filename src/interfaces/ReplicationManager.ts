import { ReplicationErrorKind } from '../errors/ReplicationError';
import { BackupDescriptor } from './SourceDatabase';

export type TableStatus = 'succeeded' | 'failed' | 'skipped';

/**
 * Outcome of replicating a single table
 */
export interface TableOutcome {
  /** Qualified source name (schema.table) */
  table: string;

  /** Source schema and table; `table` alone is ambiguous when names contain dots */
  schemaName: string;
  tableName: string;

  targetTable: string;
  status: TableStatus;

  /** Whether the remote table was created during this run */
  created?: boolean;

  rowCount?: number;

  /** Duration in milliseconds */
  duration: number;

  errorKind?: ReplicationErrorKind;
  error?: string;
}

export type RunStatus = 'completed' | 'completed_with_failures' | 'failed' | 'aborted';

/**
 * Structured result of a backup-and-replicate run
 */
export interface ReplicationReport {
  runId: string;
  status: RunStatus;
  backup?: BackupDescriptor;
  tables: TableOutcome[];
  succeededCount: number;
  failedCount: number;
  skippedCount: number;
  duration: number;

  /** Set when the run stopped before replicating any table */
  fatalError?: {
    kind: ReplicationErrorKind;
    message: string;
  };
}

export interface ReplicationManager {
  /** Back up the source database, then replicate every base table */
  executeRun(signal?: AbortSignal): Promise<ReplicationReport>;

  /** Test connectivity to the source and remote servers */
  validateConfiguration(): Promise<boolean>;
}
