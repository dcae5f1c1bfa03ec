export * from './embeddings.types';
export * from './models.types';
