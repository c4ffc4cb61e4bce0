import * as sql from 'mssql';
import { DatabaseCredentials } from '../interfaces/ReplicationConfig';
import { throwIfCancelled } from '../errors/ReplicationError';

export interface ConnectionSettings {
  /** host, host,port or host\instance */
  serverAddress: string;
  database: string;
  credentials?: DatabaseCredentials;

  /** Milliseconds; 0 disables the driver's request timeout */
  requestTimeout?: number;
}

/**
 * Build an mssql pool configuration. Without credentials the connection uses
 * the trusted identity of the invoking session.
 */
export function buildPoolConfig(settings: ConnectionSettings): sql.config {
  const { host, port, instanceName } = parseServerAddress(settings.serverAddress);

  const config: sql.config = {
    server: host,
    database: settings.database,
    options: {
      encrypt: true,
      trustServerCertificate: true,
      trustedConnection: settings.credentials === undefined,
    },
  };

  if (port !== undefined) {
    config.port = port;
  }
  if (instanceName !== undefined && config.options) {
    config.options.instanceName = instanceName;
  }
  if (settings.credentials) {
    config.user = settings.credentials.user;
    config.password = settings.credentials.password;
  }
  if (settings.requestTimeout !== undefined) {
    config.requestTimeout = settings.requestTimeout;
  }

  return config;
}

export function parseServerAddress(address: string): { host: string; port?: number; instanceName?: string } {
  const trimmed = address.trim();

  const commaIndex = trimmed.lastIndexOf(',');
  if (commaIndex > 0) {
    const port = Number(trimmed.substring(commaIndex + 1));
    if (Number.isInteger(port) && port > 0) {
      return { host: trimmed.substring(0, commaIndex), port };
    }
  }

  const slashIndex = trimmed.indexOf('\\');
  if (slashIndex > 0) {
    return { host: trimmed.substring(0, slashIndex), instanceName: trimmed.substring(slashIndex + 1) };
  }

  return { host: trimmed };
}

/**
 * Cancel the request when the signal aborts. Returns the detach function.
 * A signal that has already aborted raises ReplicationCancelledError before
 * the request is sent.
 */
export function cancelOnAbort(request: sql.Request, signal?: AbortSignal): () => void {
  if (!signal) {
    return () => undefined;
  }
  throwIfCancelled(signal);

  const onAbort = (): void => {
    request.cancel();
  };
  signal.addEventListener('abort', onAbort, { once: true });

  return () => signal.removeEventListener('abort', onAbort);
}
