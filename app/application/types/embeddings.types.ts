/**
 * OpenAI embeddings API shapes. Key names are part of the wire contract.
 */
export interface EmbedRequest {
  /** A string or an array of strings; anything else is rejected on conversion. */
  input: unknown;
  model: string;
  encoding_format?: string;
  dimensions?: number;
  user?: string;
}

/**
 * `input` once its runtime shape has been checked.
 */
export type EmbeddingInput =
  | { readonly kind: 'single'; readonly text: string }
  | { readonly kind: 'many'; readonly texts: readonly string[] };

export interface EmbedResponseData {
  object: 'embedding';
  embedding: number[];
  index: number;
}

export interface Usage {
  prompt_tokens: number;
  total_tokens: number;
}

export interface EmbedResponse {
  object: 'list';
  data: EmbedResponseData[];
  model: string;
  usage: Usage;
}
