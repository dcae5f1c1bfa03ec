import { GoogleGenAI, type Model } from '@google/genai';
import type { ILogger } from '../../../core/logging';
import { EmbeddingBatch } from './embedding-batch';
import type {
  BatchEmbedResult,
  EmbeddingModelHandle,
  UpstreamClient,
  UpstreamEmbedding,
  UpstreamModel
} from './types';

export class GeminiEmbeddingModel implements EmbeddingModelHandle {
  constructor(
    private readonly client: GoogleGenAI,
    public readonly name: string,
    private readonly logger: ILogger
  ) {}

  newBatch(): EmbeddingBatch {
    return new EmbeddingBatch(this.name);
  }

  async batchEmbedContents(batch: EmbeddingBatch, signal?: AbortSignal): Promise<BatchEmbedResult> {
    const startTime = Date.now();

    const response = await this.client.models.embedContent({
      model: batch.model,
      contents: batch.texts.map(text => ({ role: 'user', parts: [{ text }] })),
      config: signal ? { abortSignal: signal } : undefined
    });

    const embeddings: UpstreamEmbedding[] = (response.embeddings ?? []).map((embedding, index) => {
      if (!Array.isArray(embedding.values)) {
        throw new Error(`Gemini returned no values for embedding ${index}`);
      }
      return { values: embedding.values };
    });

    this.logger.debug('Gemini batch embedded', {
      duration: Date.now() - startTime,
      metadata: { model: batch.model, items: batch.size, embeddings: embeddings.length }
    });

    return { embeddings };
  }
}

/**
 * Upstream client for one Gemini API key.
 */
export class GeminiClient implements UpstreamClient {
  private readonly client: GoogleGenAI;
  private readonly logger: ILogger;

  constructor(apiKey: string, logger: ILogger) {
    if (!apiKey) {
      throw new Error('API key is required');
    }

    this.client = new GoogleGenAI({ apiKey });
    this.logger = logger.createChild('GeminiClient');
  }

  embeddingModel(name: string): EmbeddingModelHandle {
    return new GeminiEmbeddingModel(this.client, name, this.logger);
  }

  async *listModels(signal?: AbortSignal): AsyncIterable<UpstreamModel> {
    const pager = await this.client.models.list({
      config: signal ? { abortSignal: signal } : undefined
    });

    for await (const model of pager) {
      yield toUpstreamModel(model);
    }
  }
}

function toUpstreamModel(model: Model): UpstreamModel {
  return {
    name: model.name ?? '',
    supportedActions: model.supportedActions ?? []
  };
}
