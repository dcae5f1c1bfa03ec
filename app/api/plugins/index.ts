export * from './error.plugin';
