import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import { UpstreamError } from '../../core/errors';
import type { CredentialPool } from '../../domain/services';
import type { BatchEmbedResult, EmbeddingBatch, EmbeddingModelHandle } from '../../infrastructure/providers/gemini';
import { convertRequest, convertResponse } from '../converters';
import type { EmbedRequest, EmbedResponse } from '../types';

export interface OperationOptions {
  readonly requestId: string;
  readonly signal?: AbortSignal;
}

@injectable()
export class EmbeddingsService {
  private readonly logger: ILogger;
  private readonly credentialPool: CredentialPool;
  private readonly metricsService: IMetricsService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.CredentialPool) credentialPool: CredentialPool,
    @inject(TYPES.MetricsService) metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('EmbeddingsService');
    this.credentialPool = credentialPool;
    this.metricsService = metricsService;
  }

  async createEmbeddings(request: EmbedRequest, options: OperationOptions): Promise<EmbedResponse> {
    const { index, client } = this.credentialPool.next();

    this.logger.info('Processing request', {
      requestId: options.requestId,
      metadata: { model: request.model, client: index }
    });

    const embeddingModel = client.embeddingModel(request.model);
    const batch = convertRequest(request, embeddingModel);
    const result = await this.submitBatch(embeddingModel, batch, options);

    if (result.embeddings.length !== batch.size) {
      throw new UpstreamError(
        `match embeddings to inputs, got ${result.embeddings.length} embeddings for ${batch.size} inputs`
      );
    }

    this.metricsService.recordEmbeddingBatch(request.model, batch.size);

    return convertResponse(result, request.model);
  }

  private async submitBatch(
    embeddingModel: EmbeddingModelHandle,
    batch: EmbeddingBatch,
    options: OperationOptions
  ): Promise<BatchEmbedResult> {
    // Gemini rejects a batch without contents; an empty input list embeds to nothing.
    if (batch.size === 0) {
      return { embeddings: [] };
    }

    try {
      return await embeddingModel.batchEmbedContents(batch, options.signal);
    } catch (error) {
      throw new UpstreamError('batch embed contents', error);
    }
  }
}
