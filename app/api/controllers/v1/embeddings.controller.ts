import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import type { ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { ErrorClassificationService } from '../../../core/error-classification';
import { InvalidRequestBodyError } from '../../../core/errors';
import type { EmbeddingsService } from '../../../application/services';
import type { EmbedRequest, EmbedResponse } from '../../../application/types';
import { BaseController, type RequestContext } from '../base.controller';

@injectable()
export class EmbeddingsController extends BaseController {
  private readonly embeddingsService: EmbeddingsService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsService) metricsService: IMetricsService,
    @inject(TYPES.ErrorClassificationService) errorClassificationService: ErrorClassificationService,
    @inject(TYPES.EmbeddingsService) embeddingsService: EmbeddingsService
  ) {
    super({ prefix: '/v1' }, { logger, metricsService, errorClassificationService });
    this.embeddingsService = embeddingsService;
  }

  public registerRoutes() {
    return this.createApplication()
      .post(
        '/embeddings',
        ({ body, request, path, set }) =>
          this.executeWithContext('create_embeddings', { request, path, set }, requestContext =>
            this.createEmbeddings(body, requestContext)
          ),
        { parse: 'text' }
      )
      .all('/embeddings', ({ request, path, set }) =>
        this.rejectMethod('create_embeddings', { request, path, set }, 'POST')
      );
  }

  private async createEmbeddings(body: unknown, requestContext: RequestContext): Promise<EmbedResponse> {
    const request = this.parseRequest(body);

    this.logger.debug('Embedding request details', {
      requestId: requestContext.requestId,
      metadata: {
        model: request.model,
        inputType: Array.isArray(request.input) ? 'array' : typeof request.input,
        inputCount: Array.isArray(request.input) ? request.input.length : 1,
        encodingFormat: request.encoding_format,
        dimensions: request.dimensions
      }
    });

    return this.embeddingsService.createEmbeddings(request, {
      requestId: requestContext.requestId,
      signal: requestContext.signal
    });
  }

  private parseRequest(body: unknown): EmbedRequest {
    if (typeof body !== 'string') {
      throw new InvalidRequestBodyError('failed to read request body');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      throw new InvalidRequestBodyError('failed to unmarshal request body', { cause: error });
    }

    const request = toEmbedRequest(payload);
    if (!request) {
      throw new InvalidRequestBodyError('request body is not a valid embeddings request');
    }

    return request;
  }
}

/**
 * Checks the scalar fields of a decoded body. `input` is carried as is and
 * checked when the request is converted; JSON nulls count as absent.
 */
function toEmbedRequest(payload: unknown): EmbedRequest | undefined {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return undefined;
  }

  const fields: Record<string, unknown> = { ...payload };
  const { model, input, encoding_format, dimensions, user } = fields;

  if (typeof model !== 'string' || input === undefined) {
    return undefined;
  }
  if (!isAbsentOr(encoding_format, isString) || !isAbsentOr(dimensions, Number.isInteger) || !isAbsentOr(user, isString)) {
    return undefined;
  }

  return {
    input,
    model,
    ...(typeof encoding_format === 'string' ? { encoding_format } : {}),
    ...(typeof dimensions === 'number' ? { dimensions } : {}),
    ...(typeof user === 'string' ? { user } : {})
  };
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isAbsentOr(value: unknown, check: (value: unknown) => boolean): boolean {
  return value === undefined || value === null || check(value);
}
