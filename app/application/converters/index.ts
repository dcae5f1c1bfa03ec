export * from './embeddings.converter';
export * from './models.converter';
