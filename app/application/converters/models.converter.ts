import { EMBED_CONTENT_ACTION, type UpstreamModel } from '../../infrastructure/providers/gemini';
import type { ModelResponseData } from '../types';

export const MODEL_OWNER = 'google';

export function supportsEmbeddings(model: UpstreamModel): boolean {
  return model.supportedActions.includes(EMBED_CONTENT_ACTION);
}

export function convertModel(model: UpstreamModel): ModelResponseData {
  return {
    object: 'model',
    id: model.name,
    created: 0,
    owned_by: MODEL_OWNER
  };
}
