import { injectable, inject } from 'inversify';
import { TYPES } from '../../core/container/types';
import type { ILogger } from '../../core/logging';
import { UpstreamError } from '../../core/errors';
import type { CredentialPool } from '../../domain/services';
import { convertModel, supportsEmbeddings } from '../converters';
import type { ModelResponse, ModelResponseData } from '../types';
import type { OperationOptions } from './embeddings.service';

@injectable()
export class ModelsService {
  private readonly logger: ILogger;
  private readonly credentialPool: CredentialPool;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.CredentialPool) credentialPool: CredentialPool
  ) {
    this.logger = logger.createChild('ModelsService');
    this.credentialPool = credentialPool;
  }

  /**
   * Drains the whole upstream catalog before answering; a failure on any page
   * discards what was collected so far.
   */
  async listModels(options: OperationOptions): Promise<ModelResponse> {
    const data: ModelResponseData[] = [];
    let scanned = 0;

    try {
      for await (const model of this.credentialPool.primary().listModels(options.signal)) {
        scanned++;
        if (supportsEmbeddings(model)) {
          data.push(convertModel(model));
        }
      }
    } catch (error) {
      throw new UpstreamError('list models', error);
    }

    this.logger.info('Models listed', {
      requestId: options.requestId,
      metadata: { scanned, embeddingModels: data.length }
    });

    return { object: 'list', data };
  }
}
