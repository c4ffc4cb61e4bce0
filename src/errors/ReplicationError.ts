export type ReplicationErrorKind =
  | 'BackupFailed'
  | 'EnumerationFailed'
  | 'TranslationFailed'
  | 'RemoteUnreachable'
  | 'RemoteDDLFailed'
  | 'RemoteCopyFailed'
  | 'TargetNameCollision'
  | 'Cancelled';

/**
 * Base class for every failure raised while backing up or replicating
 */
export class ReplicationError extends Error {
  constructor(
    message: string,
    public readonly kind: ReplicationErrorKind,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ReplicationError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class BackupFailedError extends ReplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'BackupFailed', cause);
    this.name = 'BackupFailedError';
  }
}

export class EnumerationFailedError extends ReplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'EnumerationFailed', cause);
    this.name = 'EnumerationFailedError';
  }
}

export class TranslationError extends ReplicationError {
  constructor(
    message: string,
    public readonly table?: string,
    cause?: Error
  ) {
    super(message, 'TranslationFailed', cause);
    this.name = 'TranslationError';
  }
}

export class RemoteUnreachableError extends ReplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'RemoteUnreachable', cause);
    this.name = 'RemoteUnreachableError';
  }
}

export class RemoteDDLError extends ReplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'RemoteDDLFailed', cause);
    this.name = 'RemoteDDLError';
  }
}

export class RemoteCopyError extends ReplicationError {
  constructor(message: string, cause?: Error) {
    super(message, 'RemoteCopyFailed', cause);
    this.name = 'RemoteCopyError';
  }
}

export class TargetNameCollisionError extends ReplicationError {
  constructor(
    public readonly targetTable: string,
    public readonly tables: string[]
  ) {
    super(`Tables ${tables.join(', ')} all map to remote table ${targetTable}`, 'TargetNameCollision');
    this.name = 'TargetNameCollisionError';
  }
}

export class ReplicationCancelledError extends ReplicationError {
  constructor(message = 'Replication run was cancelled', cause?: Error) {
    super(message, 'Cancelled', cause);
    this.name = 'ReplicationCancelledError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Driver error code (e.g. ESOCKET, ELOGIN), if the error carries one
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ReplicationCancelledError();
  }
}
