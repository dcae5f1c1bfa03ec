export * from './proxy.errors';
