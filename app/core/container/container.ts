import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import type { AppConfig } from '../config';
import { Logger, type ILogger } from '../logging';
import { PrometheusCollector, MetricsService } from '../metrics';
import { ErrorClassificationService } from '../error-classification';
import { StartupError } from '../errors';
import { CredentialPool } from '../../domain/services';
import { GeminiClient, type UpstreamClientFactory } from '../../infrastructure/providers/gemini';
import { EmbeddingsService, ModelsService } from '../../application/services';
import { EmbeddingsController, ModelsController } from '../../api/controllers';
import { ErrorPlugin } from '../../api/plugins';

export interface ContainerOverrides {
  /** Replaces the Gemini client construction, one call per credential. */
  readonly clientFactory?: UpstreamClientFactory;
  readonly logger?: ILogger;
}

export interface IApplicationContainer {
  get<T>(serviceIdentifier: symbol): T;
  isBound(serviceIdentifier: symbol): boolean;
  initialize(): Promise<void>;
  dispose(): Promise<void>;
}

/**
 * Composition root. Everything with process lifetime, the credential pool
 * included, is created here once and handed to its consumers through
 * constructor injection.
 */
export class ApplicationContainer implements IApplicationContainer {
  private readonly container: Container;
  private readonly logger: ILogger;
  private isInitialized = false;

  constructor(
    private readonly configuration: AppConfig,
    private readonly overrides: ContainerOverrides = {}
  ) {
    this.container = new Container({ defaultScope: 'Singleton', skipBaseClassChecks: true });
    this.logger = overrides.logger ?? new Logger({
      level: configuration.logLevel,
      directory: configuration.logDirectory,
      silent: configuration.environment === 'test'
    });
  }

  public async initialize(): Promise<void> {
    if (this.isInitialized) {
      throw new Error('Container is already initialized');
    }

    this.configureServices();
    this.validateServices();
    this.isInitialized = true;
  }

  public get<T>(serviceIdentifier: symbol): T {
    this.ensureInitialized();

    try {
      return this.container.get<T>(serviceIdentifier);
    } catch (error) {
      throw new Error(`Failed to resolve service ${String(serviceIdentifier)}`, { cause: error });
    }
  }

  public isBound(serviceIdentifier: symbol): boolean {
    return this.container.isBound(serviceIdentifier);
  }

  public async dispose(): Promise<void> {
    this.container.unbindAll();
    this.isInitialized = false;

    if (this.logger instanceof Logger) {
      await this.logger.close();
    }
  }

  private configureServices(): void {
    this.configureCore();
    this.configureMetrics();
    this.configureProviders();
    this.configureApplicationServices();
    this.configureControllers();
  }

  private configureCore(): void {
    this.container.bind<AppConfig>(TYPES.AppConfig).toConstantValue(this.configuration);
    this.container.bind<ILogger>(TYPES.Logger).toConstantValue(this.logger);
    this.container.bind(TYPES.ErrorClassificationService).to(ErrorClassificationService).inSingletonScope();
  }

  private configureMetrics(): void {
    this.container.bind(TYPES.MetricsCollector).to(PrometheusCollector).inSingletonScope();
    this.container.bind(TYPES.MetricsService).to(MetricsService).inSingletonScope();
  }

  private configureProviders(): void {
    const clientFactory: UpstreamClientFactory =
      this.overrides.clientFactory ?? (apiKey => new GeminiClient(apiKey, this.logger));

    this.container.bind<UpstreamClientFactory>(TYPES.UpstreamClientFactory).toConstantValue(clientFactory);
    this.container.bind(TYPES.CredentialPool).to(CredentialPool).inSingletonScope();
  }

  private configureApplicationServices(): void {
    this.container.bind(TYPES.EmbeddingsService).to(EmbeddingsService).inSingletonScope();
    this.container.bind(TYPES.ModelsService).to(ModelsService).inSingletonScope();
  }

  private configureControllers(): void {
    this.container.bind(TYPES.EmbeddingsController).to(EmbeddingsController).inSingletonScope();
    this.container.bind(TYPES.ModelsController).to(ModelsController).inSingletonScope();
    this.container.bind(TYPES.ErrorPlugin).to(ErrorPlugin).inSingletonScope();
  }

  /**
   * The pool is resolved eagerly: a credential that cannot produce a client
   * must stop the process before it starts listening.
   */
  private validateServices(): void {
    try {
      const pool = this.container.get<CredentialPool>(TYPES.CredentialPool);

      this.logger.info('Container validation completed successfully', {
        metadata: {
          environment: this.configuration.environment,
          credentials: pool.size
        }
      });
    } catch (error) {
      if (error instanceof StartupError) {
        throw error;
      }
      throw new StartupError('Service validation failed', { cause: error });
    }
  }

  private ensureInitialized(): void {
    if (!this.isInitialized) {
      throw new Error('Container must be initialized before use. Call initialize() first.');
    }
  }
}
