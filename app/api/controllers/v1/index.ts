export * from './embeddings.controller';
export * from './models.controller';
