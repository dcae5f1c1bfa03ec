import { injectable, inject } from 'inversify';
import { Registry, Counter, Histogram, collectDefaultMetrics, linearBuckets } from 'prom-client';
import type { ILogger } from '../logging';
import type { AppConfig } from '../config';
import { TYPES } from '../container/types';
import type { IMetricsCollector, MetricLabels, CounterMetric, HistogramMetric, MetricsConfig } from './types';

export const METRIC_NAMES = {
  requestsTotal: 'requests_total',
  requestLatency: 'request_latency_seconds',
  embeddingBatchSize: 'embedding_batch_size'
} as const;

/**
 * prom-client collector bound to its own registry, so several containers in
 * one process never collide on metric names.
 */
@injectable()
export class PrometheusCollector implements IMetricsCollector {
  private readonly logger: ILogger;
  private readonly registry = new Registry();
  private readonly counters: Map<string, Counter<string>> = new Map();
  private readonly histograms: Map<string, Histogram<string>> = new Map();
  private readonly config: MetricsConfig;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.AppConfig) appConfig: AppConfig
  ) {
    this.logger = logger.createChild('PrometheusCollector');
    this.config = {
      prefix: appConfig.metricsPrefix,
      collectDefaultMetrics: appConfig.environment !== 'test'
    };

    if (this.config.collectDefaultMetrics) {
      this.initializeDefaultMetrics();
    }

    this.initializeApplicationMetrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  incrementCounter(name: string, labels?: MetricLabels, value: number = 1): void {
    try {
      const counter = this.getCounter(name);

      if (labels) {
        counter.inc(labels, value);
      } else {
        counter.inc(value);
      }
    } catch (error) {
      this.logger.error('Failed to increment counter', error, {
        metadata: { name, labels, value }
      });
    }
  }

  observeHistogram(name: string, value: number, labels?: MetricLabels): void {
    try {
      const histogram = this.getHistogram(name);

      if (labels) {
        histogram.observe(labels, value);
      } else {
        histogram.observe(value);
      }
    } catch (error) {
      this.logger.error('Failed to observe histogram', error, {
        metadata: { name, labels, value }
      });
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private initializeDefaultMetrics(): void {
    collectDefaultMetrics({
      register: this.registry,
      prefix: this.config.prefix ? `${this.config.prefix}_` : ''
    });

    this.logger.debug('Default metrics collection initialized');
  }

  private initializeApplicationMetrics(): void {
    this.createCounter({
      name: METRIC_NAMES.requestsTotal,
      help: 'Total number of requests',
      labels: ['path', 'method', 'status']
    });

    // prom-client's default buckets, the usual 5ms..10s latency spread
    this.createHistogram({
      name: METRIC_NAMES.requestLatency,
      help: 'Request latency in seconds',
      labels: ['path', 'method']
    });

    this.createHistogram({
      name: METRIC_NAMES.embeddingBatchSize,
      help: 'Size of embedding batches',
      labels: ['model'],
      buckets: linearBuckets(1, 1, 10)
    });

    this.logger.debug('Application metrics initialized');
  }

  private metricName(name: string): string {
    return this.config.prefix ? `${this.config.prefix}_${name}` : name;
  }

  private createCounter(config: CounterMetric): void {
    const counter = new Counter({
      name: this.metricName(config.name),
      help: config.help,
      labelNames: config.labels || [],
      registers: [this.registry]
    });

    this.counters.set(config.name, counter);
  }

  private createHistogram(config: HistogramMetric): void {
    const histogram = new Histogram({
      name: this.metricName(config.name),
      help: config.help,
      labelNames: config.labels || [],
      ...(config.buckets ? { buckets: config.buckets } : {}),
      registers: [this.registry]
    });

    this.histograms.set(config.name, histogram);
  }

  private getCounter(name: string): Counter<string> {
    const counter = this.counters.get(name);
    if (!counter) {
      throw new Error(`Unknown counter: ${name}`);
    }
    return counter;
  }

  private getHistogram(name: string): Histogram<string> {
    const histogram = this.histograms.get(name);
    if (!histogram) {
      throw new Error(`Unknown histogram: ${name}`);
    }
    return histogram;
  }
}
