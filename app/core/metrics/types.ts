export interface MetricLabels {
  [key: string]: string | number;
}

export interface CounterMetric {
  name: string;
  help: string;
  labels?: string[];
}

export interface HistogramMetric {
  name: string;
  help: string;
  labels?: string[];
  buckets?: number[];
}

export interface MetricsConfig {
  prefix: string;
  collectDefaultMetrics: boolean;
}

export interface IMetricsCollector {
  readonly contentType: string;
  incrementCounter(name: string, labels?: MetricLabels, value?: number): void;
  observeHistogram(name: string, value: number, labels?: MetricLabels): void;
  getMetrics(): Promise<string>;
}
