export const TYPES = {
  AppConfig: Symbol.for('AppConfig'),
  Logger: Symbol.for('Logger'),
  MetricsService: Symbol.for('MetricsService'),
  MetricsCollector: Symbol.for('MetricsCollector'),
  ErrorClassificationService: Symbol.for('ErrorClassificationService'),

  UpstreamClientFactory: Symbol.for('UpstreamClientFactory'),
  CredentialPool: Symbol.for('CredentialPool'),

  EmbeddingsService: Symbol.for('EmbeddingsService'),
  ModelsService: Symbol.for('ModelsService'),

  EmbeddingsController: Symbol.for('EmbeddingsController'),
  ModelsController: Symbol.for('ModelsController'),
  ErrorPlugin: Symbol.for('ErrorPlugin')
};
