import { Elysia } from 'elysia';
import { injectable } from 'inversify';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { ErrorClassificationService, ErrorResponseBody } from '../../core/error-classification';
import { MethodNotAllowedError } from '../../core/errors';

export interface RequestContext {
  readonly requestId: string;
  readonly startTime: number;
  readonly method: string;
  readonly path: string;
  readonly userAgent: string;
  readonly signal: AbortSignal;
}

/**
 * The slice of an Elysia handler context a controller touches.
 */
export interface HttpContext {
  readonly request: Request;
  readonly path: string;
  readonly set: { status?: number | string };
}

export interface ControllerConfiguration {
  readonly prefix: string;
}

export interface ControllerDependencies {
  readonly logger: ILogger;
  readonly metricsService: IMetricsService;
  readonly errorClassificationService: ErrorClassificationService;
}

/**
 * Every request runs through `executeWithContext`: failures are classified,
 * logged with their cause and answered with a generic error body, and every
 * outcome is recorded as a (path, method, status) count plus its latency.
 */
@injectable()
export abstract class BaseController {
  protected readonly logger: ILogger;
  protected readonly metricsService: IMetricsService;
  protected readonly errorClassificationService: ErrorClassificationService;
  protected readonly configuration: ControllerConfiguration;

  constructor(configuration: ControllerConfiguration, dependencies: ControllerDependencies) {
    this.configuration = configuration;
    this.logger = dependencies.logger.createChild(this.constructor.name);
    this.metricsService = dependencies.metricsService;
    this.errorClassificationService = dependencies.errorClassificationService;

    this.validateConfiguration();
  }

  protected createApplication() {
    return new Elysia({ name: this.constructor.name, prefix: this.configuration.prefix });
  }

  protected async executeWithContext<T>(
    operation: string,
    context: HttpContext,
    handler: (requestContext: RequestContext) => Promise<T>
  ): Promise<T | ErrorResponseBody> {
    const requestContext = this.createRequestContext(context);

    this.logger.debug(`${operation} operation initiated`, {
      requestId: requestContext.requestId,
      operation,
      metadata: {
        path: requestContext.path,
        userAgent: requestContext.userAgent
      }
    });

    try {
      const result = await handler(requestContext);
      this.complete(operation, requestContext, 200);
      return result;
    } catch (error) {
      const classification = this.errorClassificationService.classify(error);
      context.set.status = classification.status;

      this.logger.error(`${operation} operation failed`, error, {
        requestId: requestContext.requestId,
        operation,
        duration: Date.now() - requestContext.startTime,
        metadata: {
          path: requestContext.path,
          userAgent: requestContext.userAgent,
          statusCode: classification.status,
          category: classification.category
        }
      });
      this.recordMetrics(requestContext, classification.status);

      return classification.body;
    }
  }

  /**
   * Answers any method the route does not serve; the body is never read.
   */
  protected rejectMethod(operation: string, context: HttpContext, allowed: string): Promise<ErrorResponseBody> {
    return this.executeWithContext(operation, context, async requestContext => {
      throw new MethodNotAllowedError(requestContext.method, allowed);
    });
  }

  private complete(operation: string, context: RequestContext, statusCode: number): void {
    const duration = Date.now() - context.startTime;

    this.logger.info(`${operation} operation completed successfully`, {
      requestId: context.requestId,
      operation,
      duration,
      metadata: { path: context.path, statusCode }
    });
    this.recordMetrics(context, statusCode);
  }

  private recordMetrics(context: RequestContext, statusCode: number): void {
    this.metricsService.recordHttpRequest(
      context.method,
      context.path,
      statusCode,
      Date.now() - context.startTime
    );
  }

  private createRequestContext(context: HttpContext): RequestContext {
    return {
      requestId: this.generateRequestId(),
      startTime: Date.now(),
      method: context.request.method,
      path: context.path,
      userAgent: context.request.headers.get('user-agent') ?? 'unknown',
      signal: context.request.signal
    };
  }

  private generateRequestId(): string {
    return `req-${Date.now()}-${Math.random().toString(36).slice(2, 14)}`;
  }

  private validateConfiguration(): void {
    if (!this.configuration.prefix.startsWith('/')) {
      throw new Error('Controller prefix must start with "/"');
    }
  }
}
