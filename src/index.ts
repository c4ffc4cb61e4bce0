#!/usr/bin/env node
import { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
import { Logger, parseLogLevel } from './clients/Logger';
import { ReplicationConfig } from './interfaces/ReplicationConfig';
import { ReplicationReport } from './interfaces/ReplicationManager';
import { LogLevel } from './interfaces/Logger';
import { ReplicationComponents, createReplicationComponents } from './replicate';
import { toError } from './errors/ReplicationError';

export const EXIT_CODES = {
  success: 0,
  configuration: 1,
  initialization: 2,
  fatal: 3,
  tableFailures: 4,
} as const;

/**
 * Exit code for a finished run
 */
export function exitCodeFor(report: ReplicationReport): number {
  switch (report.status) {
    case 'completed':
      return EXIT_CODES.success;
    case 'failed':
      return EXIT_CODES.fatal;
    case 'completed_with_failures':
    case 'aborted':
      return EXIT_CODES.tableFailures;
  }
}

/**
 * Command-line application: one backup-and-replicate run per invocation
 */
class ReplicationApplication {
  private logger: Logger;
  private config: ReplicationConfig | null = null;
  private components: ReplicationComponents | null = null;
  private abortController = new AbortController();

  constructor() {
    // Reconfigured once the configuration is loaded
    this.logger = new Logger(LogLevel.INFO);
  }

  /**
   * Load configuration, build the clients and test both connections.
   * Returns an exit code when initialization failed.
   */
  async initialize(): Promise<number | null> {
    try {
      this.logger.info('SQL Server backup replicator starting...');

      const config = ConfigurationManager.loadConfiguration();
      this.config = config;

      const logLevel = parseLogLevel(config.logLevel);
      if (logLevel) {
        this.logger = new Logger(logLevel);
      }

      this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

      this.components = createReplicationComponents(config, this.logger);

      this.logger.info('Validating configuration and testing connections...');
      const isValid = await this.components.manager.validateConfiguration();
      if (!isValid) {
        throw new Error('Configuration validation failed');
      }

      this.logger.info('Application initialized successfully');
      return null;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error('Configuration error', error, { field: error.field });
        return EXIT_CODES.configuration;
      }
      this.logger.error('Failed to initialize application', toError(error));
      return EXIT_CODES.initialization;
    }
  }

  /**
   * Execute the run and return the exit code for its report
   */
  async run(): Promise<number> {
    if (!this.components) {
      throw new Error('Application not initialized. Call initialize() first.');
    }

    const report = await this.components.manager.executeRun(this.abortController.signal);

    for (const outcome of report.tables.filter(table => table.status === 'failed')) {
      this.logger.warn(`Table ${outcome.table} was not replicated`, {
        targetTable: outcome.targetTable,
        kind: outcome.errorKind,
        reason: outcome.error,
      });
    }

    return exitCodeFor(report);
  }

  /**
   * Cancel the running table; the run finishes with an aborted report
   */
  cancel(reason: string): void {
    if (this.abortController.signal.aborted) {
      return;
    }
    this.logger.warn(`Cancelling replication run: ${reason}`);
    this.abortController.abort();
  }

  async shutdown(): Promise<void> {
    if (!this.components) {
      return;
    }
    await this.components.source.close();
    await this.components.remote.close();
    this.components = null;
    this.logger.info('Connections closed');
  }

  /**
   * Setup signal handlers for cancellation
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.on(signal, () => this.cancel(`received ${signal}`));
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
      this.cancel('unhandled promise rejection');
    });
  }

  getConfig(): ReplicationConfig | null {
    return this.config;
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<number> {
  const app = new ReplicationApplication();
  app.setupSignalHandlers();

  const initError = await app.initialize();
  if (initError !== null) {
    await app.shutdown();
    return initError;
  }

  try {
    return await app.run();
  } finally {
    await app.shutdown();
  }
}

export { ReplicationApplication, main };
export { replicateDatabase, createReplicationComponents } from './replicate';

// Start the application
if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      console.error('Fatal error running replication:', error);
      process.exit(EXIT_CODES.fatal);
    });
}
