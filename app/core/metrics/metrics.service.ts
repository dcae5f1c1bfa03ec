import { injectable, inject } from 'inversify';
import { STATUS_CODES } from 'http';
import type { ILogger } from '../logging';
import { TYPES } from '../container/types';
import { METRIC_NAMES } from './collectors';
import type { IMetricsCollector, MetricLabels } from './types';

export interface IMetricsService {
  recordHttpRequest(method: string, path: string, statusCode: number, durationMs?: number): void;
  recordEmbeddingBatch(model: string, batchSize: number): void;
  getMetricsEndpoint(): Promise<string>;
  readonly contentType: string;
}

@injectable()
export class MetricsService implements IMetricsService {
  private readonly logger: ILogger;
  private readonly collector: IMetricsCollector;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.MetricsCollector) collector: IMetricsCollector
  ) {
    this.logger = logger.createChild('MetricsService');
    this.collector = collector;
  }

  get contentType(): string {
    return this.collector.contentType;
  }

  /**
   * The status label carries the HTTP reason phrase ("OK", "Bad Request"),
   * the latency histogram is keyed by path and method only. Requests that
   * failed before a handler started have no latency to report.
   */
  recordHttpRequest(method: string, path: string, statusCode: number, durationMs?: number): void {
    const normalizedMethod = method.toUpperCase();
    const counterLabels: MetricLabels = {
      path,
      method: normalizedMethod,
      status: STATUS_CODES[statusCode] ?? String(statusCode)
    };

    this.collector.incrementCounter(METRIC_NAMES.requestsTotal, counterLabels);
    if (durationMs !== undefined) {
      this.collector.observeHistogram(METRIC_NAMES.requestLatency, durationMs / 1000, { path, method: normalizedMethod });
    }

    this.logger.debug('HTTP request metrics recorded', {
      metadata: { method: normalizedMethod, path, statusCode, durationMs }
    });
  }

  recordEmbeddingBatch(model: string, batchSize: number): void {
    this.collector.observeHistogram(METRIC_NAMES.embeddingBatchSize, batchSize, { model });
  }

  async getMetricsEndpoint(): Promise<string> {
    try {
      return await this.collector.getMetrics();
    } catch (error) {
      this.logger.error('Failed to get metrics endpoint data', error);
      return '';
    }
  }
}
