import {
  CloudWatchClient,
  Dimension,
  GetMetricDataCommand,
  MetricDataQuery,
  MetricDataResult,
  ScanBy
} from '@aws-sdk/client-cloudwatch';
import { DeploymentRecord } from '../types';
import { InvalidSpecError, NotFoundError } from '../errors';
import { GetMetricsParams } from '../config/validator';
import { ResourceNamingService } from '../config/naming';
import { toEngineError } from '../engine/error-classifier';
import { RecordStore } from '../store/record-store';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { parseTime, requireDeployed } from './deployed-record';
import { MetricSeries, MetricsResult } from './types';

const DEFAULT_WINDOW_MS = 3 * 60 * 60 * 1000;

/** CloudFront publishes its metrics in us-east-1 only */
const CLOUDFRONT_METRICS_REGION = 'us-east-1';

export const LAMBDA_METRIC_NAMES: Readonly<Record<string, string>> = {
  invocations: 'Invocations',
  errors: 'Errors',
  duration: 'Duration',
  throttles: 'Throttles',
  concurrentexecutions: 'ConcurrentExecutions',
  memory: 'MemoryUtilization'
};

export const CLOUDFRONT_METRIC_NAMES: Readonly<Record<string, string>> = {
  requests: 'Requests',
  bytesdownloaded: 'BytesDownloaded',
  bytesuploaded: 'BytesUploaded',
  totalerrorrate: 'TotalErrorRate',
  '4xxerrorrate': '4xxErrorRate',
  '5xxerrorrate': '5xxErrorRate'
};

interface MetricTarget {
  namespace: string;
  dimensions: Dimension[];
  names: Readonly<Record<string, string>>;
  region: string;
}

/**
 * Resolve a friendly metric name; unknown names pass through unchanged
 */
export function awsMetricName(name: string, names: Readonly<Record<string, string>>): string {
  return names[name.toLowerCase()] ?? name;
}

export interface MetricsReaderOptions {
  now?: () => Date;
}

/**
 * Reads CloudWatch metrics of a deployment: Lambda metrics for anything with
 * a backend, CloudFront metrics for a static site
 */
export class MetricsReader {
  private readonly clients = new Map<string, CloudWatchClient>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: RecordStore,
    private readonly session: AwsSession,
    options: MetricsReaderOptions = {},
    private readonly naming: ResourceNamingService = new ResourceNamingService(),
    log: Logger = rootLogger
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = log.child({ component: 'metrics-reader' });
  }

  async getMetrics(params: GetMetricsParams): Promise<MetricsResult> {
    const projectName = params.project_name;
    const record = await requireDeployed(this.store, projectName);
    const target = this.targetOf(record, params.region);

    const endTime = parseTime(params.end_time, 'end_time') ?? this.now();
    const startTime = parseTime(params.start_time, 'start_time') ?? new Date(endTime.getTime() - DEFAULT_WINDOW_MS);
    if (startTime.getTime() >= endTime.getTime()) {
      throw new InvalidSpecError('start_time must be before end_time', [], { projectName });
    }

    const series: MetricSeries[] = [];
    const queries: MetricDataQuery[] = [];
    for (const metric of params.metric_names) {
      const awsName = awsMetricName(metric, target.names);
      for (const statistic of params.statistics) {
        queries.push({
          Id: `m${queries.length}`,
          MetricStat: {
            Metric: { Namespace: target.namespace, MetricName: awsName, Dimensions: target.dimensions },
            Period: params.period,
            Stat: statistic
          },
          ReturnData: true
        });
        series.push({ metric, awsName, statistic, datapoints: [] });
      }
    }

    const results = await this.fetch(target.region, queries, startTime, endTime, projectName);
    for (const result of results) {
      const index = Number(result.Id?.slice(1));
      const entry = series[index];
      if (!entry) {
        continue;
      }
      const timestamps = result.Timestamps ?? [];
      const values = result.Values ?? [];
      timestamps.forEach((timestamp, i) => {
        const value = values[i];
        if (value !== undefined) {
          entry.datapoints.push({ timestamp: timestamp.toISOString(), value });
        }
      });
    }
    for (const entry of series) {
      entry.datapoints.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
    }

    this.log.debug({ projectName, namespace: target.namespace, queries: queries.length }, 'Read metrics');
    return {
      projectName,
      namespace: target.namespace,
      dimensions: Object.fromEntries(target.dimensions.map(dimension => [dimension.Name ?? '', dimension.Value ?? ''])),
      startTime: startTime.toISOString(),
      endTime: endTime.toISOString(),
      period: params.period,
      metrics: series
    };
  }

  private targetOf(record: DeploymentRecord, region: string | undefined): MetricTarget {
    if (record.deploymentType === 'frontend') {
      const distributionId = record.resources.distributionId;
      if (!distributionId) {
        throw new NotFoundError(`No distribution recorded for ${record.projectName}`, {
          projectName: record.projectName
        });
      }
      return {
        namespace: 'AWS/CloudFront',
        dimensions: [
          { Name: 'DistributionId', Value: distributionId },
          { Name: 'Region', Value: 'Global' }
        ],
        names: CLOUDFRONT_METRIC_NAMES,
        region: CLOUDFRONT_METRICS_REGION
      };
    }

    const functionName = record.resources.functionName ?? this.naming.generateFunctionName(record.projectName);
    return {
      namespace: 'AWS/Lambda',
      dimensions: [{ Name: 'FunctionName', Value: functionName }],
      names: LAMBDA_METRIC_NAMES,
      region: region ?? record.region
    };
  }

  private async fetch(
    region: string,
    queries: MetricDataQuery[],
    startTime: Date,
    endTime: Date,
    projectName: string
  ): Promise<MetricDataResult[]> {
    const results: MetricDataResult[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const page = await this.client(region).send(new GetMetricDataCommand({
          MetricDataQueries: queries,
          StartTime: startTime,
          EndTime: endTime,
          ScanBy: ScanBy.TIMESTAMP_ASCENDING,
          NextToken: nextToken
        }));
        results.push(...(page.MetricDataResults ?? []));
        nextToken = page.NextToken;
      } while (nextToken);
    } catch (error) {
      throw toEngineError(error, { operation: 'GetMetricData', projectName });
    }
    return results;
  }

  private client(region: string): CloudWatchClient {
    let client = this.clients.get(region);
    if (!client) {
      client = new CloudWatchClient(clientConfig(this.session, region));
      this.clients.set(region, client);
    }
    return client;
  }
}
