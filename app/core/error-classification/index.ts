export * from './error-classification.service';
