import {
  DatabaseCredentials,
  ReplicationConfig,
  TableFailurePolicy,
} from '../interfaces/ReplicationConfig';
import { parseLogLevel } from '../clients/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const REQUIRED_VARIABLES = [
  'SOURCE_DATABASE',
  'NAME_SUFFIX',
  'BACKUP_DIRECTORY',
  'REMOTE_SERVER',
  'REMOTE_DATABASE',
] as const;

const FAILURE_POLICIES: readonly TableFailurePolicy[] = ['continue', 'abort'];

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): ReplicationConfig {
    const value = (name: string): string | undefined => {
      const raw = env[name]?.trim();
      return raw ? raw : undefined;
    };

    const missingVars = REQUIRED_VARIABLES.filter(name => value(name) === undefined);
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const nameSuffix = value('NAME_SUFFIX') ?? '';
    if (!/^[A-Za-z0-9_]+$/.test(nameSuffix)) {
      throw new ConfigurationError(
        'NAME_SUFFIX may only contain letters, digits and underscores',
        'NAME_SUFFIX'
      );
    }

    const config: ReplicationConfig = {
      sourceDatabaseName: value('SOURCE_DATABASE') ?? '',
      nameSuffix,
      localBackupDirectory: value('BACKUP_DIRECTORY') ?? '',
      remoteServerAddress: value('REMOTE_SERVER') ?? '',
      remoteDatabaseName: value('REMOTE_DATABASE') ?? '',
      sourceServerAddress: value('SOURCE_SERVER') ?? 'localhost',
      tableFailurePolicy: this.parseFailurePolicy(value('TABLE_FAILURE_POLICY')),
    };

    const remoteCredentials = this.parseCredentials(value('REMOTE_USER'), value('REMOTE_PASSWORD'), 'REMOTE');
    if (remoteCredentials) {
      config.remoteCredentials = remoteCredentials;
    }

    const sourceCredentials = this.parseCredentials(value('SOURCE_USER'), value('SOURCE_PASSWORD'), 'SOURCE');
    if (sourceCredentials) {
      config.sourceCredentials = sourceCredentials;
    }

    const runTimeout = value('RUN_TIMEOUT_MS');
    if (runTimeout !== undefined) {
      const parsed = Number(runTimeout);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError('RUN_TIMEOUT_MS must be a positive integer', 'RUN_TIMEOUT_MS');
      }
      config.runTimeoutMs = parsed;
    }

    const logLevel = value('LOG_LEVEL');
    if (logLevel !== undefined) {
      const parsed = parseLogLevel(logLevel);
      if (parsed === undefined) {
        throw new ConfigurationError('LOG_LEVEL must be one of error, warn, info, debug', 'LOG_LEVEL');
      }
      config.logLevel = parsed;
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: ReplicationConfig): Record<string, unknown> {
    const { remoteCredentials, sourceCredentials, ...rest } = config;

    return {
      ...rest,
      remoteCredentials: remoteCredentials ? { user: remoteCredentials.user, password: '[REDACTED]' } : 'trusted',
      sourceCredentials: sourceCredentials ? { user: sourceCredentials.user, password: '[REDACTED]' } : 'trusted',
    };
  }

  private static parseFailurePolicy(raw: string | undefined): TableFailurePolicy {
    if (raw === undefined) {
      return 'continue';
    }

    const policy = FAILURE_POLICIES.find(candidate => candidate === raw.toLowerCase());
    if (!policy) {
      throw new ConfigurationError(
        'TABLE_FAILURE_POLICY must be either continue or abort',
        'TABLE_FAILURE_POLICY'
      );
    }
    return policy;
  }

  private static parseCredentials(
    user: string | undefined,
    password: string | undefined,
    prefix: 'REMOTE' | 'SOURCE'
  ): DatabaseCredentials | undefined {
    if (user === undefined && password === undefined) {
      return undefined;
    }
    if (user === undefined || password === undefined) {
      const missing = user === undefined ? `${prefix}_USER` : `${prefix}_PASSWORD`;
      throw new ConfigurationError(
        `${prefix}_USER and ${prefix}_PASSWORD must be set together`,
        missing
      );
    }
    return { user, password };
  }
}
