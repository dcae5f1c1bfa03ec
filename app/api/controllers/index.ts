export * from './base.controller';
export * from './v1';
