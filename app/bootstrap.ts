import 'reflect-metadata';
import { loadConfig, type AppConfig } from './core/config';
import { ApplicationContainer, TYPES, type ContainerOverrides, type IApplicationContainer } from './core/container';
import type { ILogger } from './core/logging';

export interface BootstrapOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ContainerOverrides;
  /** Installs SIGTERM/SIGINT and process-level failure handlers. */
  readonly handleSignals?: boolean;
}

type ShutdownHook = () => Promise<void>;

export class ApplicationBootstrap {
  private logger?: ILogger;
  private container?: IApplicationContainer;
  private config?: AppConfig;
  private readonly shutdownHooks: ShutdownHook[] = [];
  private isShuttingDown = false;

  constructor(private readonly options: BootstrapOptions = {}) {}

  get configuration(): AppConfig {
    if (!this.config) {
      throw new Error('Application is not initialized');
    }
    return this.config;
  }

  /**
   * Reads the configuration and builds the container, which creates one
   * upstream client per credential. Fails with a StartupError when the
   * credentials are missing or a client cannot be created.
   */
  async initialize(): Promise<IApplicationContainer> {
    this.config = loadConfig(this.options.env ?? process.env);

    const container = new ApplicationContainer(this.config, this.options.overrides);
    this.container = container;
    await container.initialize();

    this.logger = container.get<ILogger>(TYPES.Logger).createChild('ApplicationBootstrap');
    this.logger.info('Application bootstrap initialized successfully', {
      metadata: {
        environment: this.config.environment,
        nodeVersion: process.version,
        platform: process.platform,
        credentials: this.config.credentials.length,
        metricsListener: this.config.metrics !== undefined,
        logLevel: this.config.logLevel
      }
    });

    if (this.options.handleSignals) {
      this.setupGracefulShutdown();
    }

    return container;
  }

  onShutdown(hook: ShutdownHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Runs the registered hooks (listeners first), then releases the
   * container: the credential pool, the metrics registry and the logger.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;
    this.logger?.info('Application shutdown initiated');

    try {
      for (const hook of this.shutdownHooks) {
        await hook();
      }
    } finally {
      await this.disposeContainer();
    }
  }

  private async disposeContainer(): Promise<void> {
    if (this.container) {
      this.logger?.info('Application shutdown completed');
      await this.container.dispose();
      this.container = undefined;
    }
  }

  private setupGracefulShutdown(): void {
    const shutdownHandler = async (signal: string): Promise<void> => {
      this.logger?.info(`Received ${signal}, initiating graceful shutdown`);

      try {
        await this.shutdown();
        process.exit(0);
      } catch (error) {
        console.error('Error during graceful shutdown:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdownHandler('SIGTERM'));
    process.on('SIGINT', () => void shutdownHandler('SIGINT'));

    process.on('uncaughtException', error => {
      this.logger?.error('Uncaught exception', error);
      void shutdownHandler('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', reason => {
      this.logger?.error('Unhandled rejection', reason);
      void shutdownHandler('UNHANDLED_REJECTION');
    });
  }
}
