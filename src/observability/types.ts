// Observability result types

export interface LogEvent {
  timestamp?: number;
  timestampIso?: string;
  message?: string;
  logStreamName?: string;
}

export interface LogsResult {
  projectName: string;
  logGroupName: string;
  /** Newest first */
  events: LogEvent[];
}

export interface MetricDatapoint {
  timestamp: string;
  value: number;
}

export interface MetricSeries {
  /** The name as requested */
  metric: string;
  /** The CloudWatch metric name it resolved to */
  awsName: string;
  statistic: string;
  /** Oldest first */
  datapoints: MetricDatapoint[];
}

export interface MetricsResult {
  projectName: string;
  namespace: string;
  dimensions: Record<string, string>;
  startTime: string;
  endTime: string;
  period: number;
  metrics: MetricSeries[];
}
