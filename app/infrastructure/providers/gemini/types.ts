import type { EmbeddingBatch } from './embedding-batch';

export interface UpstreamEmbedding {
  readonly values: readonly number[];
}

/**
 * One embedding per submitted item, in submission order.
 */
export interface BatchEmbedResult {
  readonly embeddings: readonly UpstreamEmbedding[];
}

export interface UpstreamModel {
  readonly name: string;
  readonly supportedActions: readonly string[];
}

export interface EmbeddingModelHandle {
  readonly name: string;
  newBatch(): EmbeddingBatch;
  batchEmbedContents(batch: EmbeddingBatch, signal?: AbortSignal): Promise<BatchEmbedResult>;
}

export interface UpstreamClient {
  embeddingModel(name: string): EmbeddingModelHandle;
  /**
   * Walks the whole catalog page by page. Completion of the iteration is the
   * end of the catalog; any failure is thrown from the iterator.
   */
  listModels(signal?: AbortSignal): AsyncIterable<UpstreamModel>;
}

export type UpstreamClientFactory = (apiKey: string) => UpstreamClient;

export const EMBED_CONTENT_ACTION = 'embedContent';
