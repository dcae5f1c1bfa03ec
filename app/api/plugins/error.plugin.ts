import { Elysia } from 'elysia';
import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import type { ErrorClassificationService, ErrorResponseBody } from '../../core/error-classification';

export interface FrameworkErrorContext {
  readonly code: string;
  readonly error: unknown;
  readonly request: Request;
  readonly path: string;
  readonly set: { status?: number | string };
}

/**
 * Catches what never reaches a controller: unknown routes, bodies the
 * framework could not read, and anything thrown outside `executeWithContext`.
 */
@injectable()
export class ErrorPlugin {
  private readonly pluginName = 'error';
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService,
    @inject(TYPES.ErrorClassificationService) private readonly errorClassificationService: ErrorClassificationService
  ) {
    this.logger = logger.createChild('ErrorPlugin');
  }

  createPlugin() {
    return new Elysia({ name: this.pluginName })
      .onError({ as: 'global' }, ({ code, error, request, path, set }) =>
        this.handleError({ code: String(code), error, request, path, set })
      );
  }

  handleError(context: FrameworkErrorContext): ErrorResponseBody {
    const classification = this.errorClassificationService.classify(context.error, context.code);
    context.set.status = classification.status;

    if (classification.category === 'not_found') {
      this.logger.debug('Route not found', {
        metadata: { method: context.request.method, path: context.path }
      });
      return classification.body;
    }

    this.logger.error('Request failed', context.error, {
      metadata: {
        code: context.code,
        method: context.request.method,
        path: context.path,
        statusCode: classification.status
      }
    });
    this.metricsService.recordHttpRequest(context.request.method, context.path, classification.status);

    return classification.body;
  }
}
