export * from './types';
export * from './embedding-batch';
export * from './gemini.client';
