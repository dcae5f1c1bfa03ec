export * from './embeddings.service';
export * from './models.service';
