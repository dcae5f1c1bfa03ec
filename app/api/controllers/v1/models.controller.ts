import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ErrorClassificationService } from '../../../core/error-classification';
import type { ModelsService } from '../../../application/services';
import { BaseController } from '../base.controller';

@injectable()
export class ModelsController extends BaseController {
  private readonly modelsService: ModelsService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.ErrorClassificationService) errorClassificationService: ErrorClassificationService,
    @inject(TYPES.ModelsService) modelsService: ModelsService
  ) {
    super({ prefix: '/v1' }, { logger, metricsService, errorClassificationService });
    this.modelsService = modelsService;
  }

  public registerRoutes() {
    return this.createApplication()
      .get('/models', ({ request, path, set }) =>
        this.executeWithContext('list_models', { request, path, set }, requestContext =>
          this.modelsService.listModels({
            requestId: requestContext.requestId,
            signal: requestContext.signal
          })
        )
      )
      .all('/models', ({ request, path, set }) =>
        this.rejectMethod('list_models', { request, path, set }, 'GET')
      );
  }
}
