import { UnsupportedFormatError, UnsupportedInputTypeError } from '../../core/errors';
import type { BatchEmbedResult, EmbeddingBatch, EmbeddingModelHandle } from '../../infrastructure/providers/gemini';
import type { EmbedRequest, EmbedResponse, EmbeddingInput } from '../types';

export const FLOAT_ENCODING_FORMAT = 'float';

/**
 * Builds the Gemini batch for an OpenAI embeddings request. Only float vectors
 * can be produced, so any other `encoding_format` is refused up front.
 */
export function convertRequest(
  request: EmbedRequest,
  targetModel: Pick<EmbeddingModelHandle, 'newBatch'>
): EmbeddingBatch {
  if (request.encoding_format && request.encoding_format !== FLOAT_ENCODING_FORMAT) {
    throw new UnsupportedFormatError(request.encoding_format);
  }

  const input = classifyInput(request.input);
  const batch = targetModel.newBatch();

  switch (input.kind) {
    case 'single':
      batch.addText(input.text);
      break;
    case 'many':
      for (const text of input.texts) {
        batch.addText(text);
      }
      break;
    default:
      return assertNever(input);
  }

  return batch;
}

export function classifyInput(input: unknown): EmbeddingInput {
  if (typeof input === 'string') {
    return { kind: 'single', text: input };
  }

  if (Array.isArray(input)) {
    const texts: string[] = [];
    input.forEach((item: unknown, position) => {
      if (typeof item !== 'string') {
        throw new UnsupportedInputTypeError(describeType(item), position);
      }
      texts.push(item);
    });
    return { kind: 'many', texts };
  }

  throw new UnsupportedInputTypeError(describeType(input));
}

/**
 * Maps a Gemini batch result back to the OpenAI response, one entry per
 * vector, in submission order. Vectors are passed through untouched.
 */
export function convertResponse(result: BatchEmbedResult, model: string): EmbedResponse {
  return {
    object: 'list',
    data: result.embeddings.map((embedding, index) => ({
      object: 'embedding',
      embedding: [...embedding.values],
      index
    })),
    model,
    usage: {
      prompt_tokens: 0,
      total_tokens: 0
    }
  };
}

export function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled embedding input: ${JSON.stringify(value)}`);
}
