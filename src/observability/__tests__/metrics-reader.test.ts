import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { GetMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { awsMetricName, CLOUDFRONT_METRIC_NAMES, LAMBDA_METRIC_NAMES, MetricsReader } from '../metrics-reader';
import { FileRecordStore } from '../../store/record-store';
import { InvalidSpecError, NotFoundError } from '../../errors';
import { makeRecord } from '../../store/__tests__/fixtures';
import { sentInputs } from '../../__tests__/helpers/aws-sdk';

const mocks = vi.hoisted(() => {
  const regions: string[] = [];
  return { send: vi.fn(), regions };
});

vi.mock('@aws-sdk/client-cloudwatch', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-cloudwatch')>()),
  CloudWatchClient: class {
    send = mocks.send;
    constructor(config: { region: string }) {
      mocks.regions.push(config.region);
    }
  }
}));

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('awsMetricName', () => {
  it('should resolve friendly names case-insensitively', () => {
    expect(awsMetricName('invocations', LAMBDA_METRIC_NAMES)).toBe('Invocations');
    expect(awsMetricName('concurrentExecutions', LAMBDA_METRIC_NAMES)).toBe('ConcurrentExecutions');
    expect(awsMetricName('memory', LAMBDA_METRIC_NAMES)).toBe('MemoryUtilization');
    expect(awsMetricName('4xxErrorRate', CLOUDFRONT_METRIC_NAMES)).toBe('4xxErrorRate');
    expect(awsMetricName('bytesDownloaded', CLOUDFRONT_METRIC_NAMES)).toBe('BytesDownloaded');
  });

  it('should pass unknown names through', () => {
    expect(awsMetricName('ProvisionedConcurrencyInvocations', LAMBDA_METRIC_NAMES)).toBe(
      'ProvisionedConcurrencyInvocations'
    );
  });
});

describe('MetricsReader', () => {
  let directory: string;
  let store: FileRecordStore;
  let reader: MetricsReader;

  beforeEach(() => {
    mocks.send.mockReset();
    mocks.regions.length = 0;
    directory = mkdtempSync(join(tmpdir(), 'webapp-deployer-metrics-'));
    store = new FileRecordStore({ directory, lockTimeoutMs: 2_000, staleLockMs: 60_000 });
    reader = new MetricsReader(store, { region: 'us-east-1' }, { now: () => NOW });
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should read Lambda metrics for a backend over the last three hours', async () => {
    await store.put(makeRecord({ region: 'eu-west-1' }));
    mocks.send.mockResolvedValueOnce({
      MetricDataResults: [
        {
          Id: 'm0',
          Timestamps: [new Date('2024-05-01T11:01:00Z'), new Date('2024-05-01T11:00:00Z')],
          Values: [4, 7]
        },
        { Id: 'm1', Timestamps: [], Values: [] }
      ]
    });

    const result = await reader.getMetrics({
      project_name: 'api1',
      metric_names: ['invocations', 'errors'],
      period: 60,
      statistics: ['Sum']
    });

    expect(result).toEqual({
      projectName: 'api1',
      namespace: 'AWS/Lambda',
      dimensions: { FunctionName: 'api1-function' },
      startTime: '2024-05-01T09:00:00.000Z',
      endTime: '2024-05-01T12:00:00.000Z',
      period: 60,
      metrics: [
        {
          metric: 'invocations',
          awsName: 'Invocations',
          statistic: 'Sum',
          datapoints: [
            { timestamp: '2024-05-01T11:00:00.000Z', value: 7 },
            { timestamp: '2024-05-01T11:01:00.000Z', value: 4 }
          ]
        },
        { metric: 'errors', awsName: 'Errors', statistic: 'Sum', datapoints: [] }
      ]
    });
    expect(mocks.regions).toEqual(['eu-west-1']);

    const [input] = sentInputs(mocks.send, GetMetricDataCommand);
    expect(input.StartTime).toEqual(new Date('2024-05-01T09:00:00.000Z'));
    expect(input.EndTime).toEqual(NOW);
    expect(input.MetricDataQueries?.[0]).toEqual({
      Id: 'm0',
      MetricStat: {
        Metric: {
          Namespace: 'AWS/Lambda',
          MetricName: 'Invocations',
          Dimensions: [{ Name: 'FunctionName', Value: 'api1-function' }]
        },
        Period: 60,
        Stat: 'Sum'
      },
      ReturnData: true
    });
  });

  it('should issue one query per metric and statistic', async () => {
    await store.put(makeRecord());
    mocks.send.mockResolvedValueOnce({ MetricDataResults: [] });

    const result = await reader.getMetrics({
      project_name: 'api1',
      metric_names: ['duration'],
      period: 300,
      statistics: ['Average', 'Maximum']
    });

    const [input] = sentInputs(mocks.send, GetMetricDataCommand);
    expect(input.MetricDataQueries?.map(query => [query.Id, query.MetricStat?.Stat])).toEqual([
      ['m0', 'Average'],
      ['m1', 'Maximum']
    ]);
    expect(result.metrics.map(series => series.statistic)).toEqual(['Average', 'Maximum']);
  });

  it('should read CloudFront metrics for a static site in us-east-1', async () => {
    await store.put(makeRecord({
      projectName: 'site1',
      deploymentType: 'frontend',
      region: 'eu-west-1',
      resources: { bucketName: 'site1-bucket', distributionId: 'E1ABCDEF' }
    }));
    mocks.send.mockResolvedValueOnce({ MetricDataResults: [] });

    const result = await reader.getMetrics({
      project_name: 'site1',
      metric_names: ['requests'],
      start_time: '2024-05-01T00:00:00Z',
      end_time: '2024-05-01T06:00:00Z',
      period: 3600,
      statistics: ['Sum']
    });

    expect(result.namespace).toBe('AWS/CloudFront');
    expect(result.dimensions).toEqual({ DistributionId: 'E1ABCDEF', Region: 'Global' });
    expect(result.metrics[0].awsName).toBe('Requests');
    expect(result.startTime).toBe('2024-05-01T00:00:00.000Z');
    expect(mocks.regions).toEqual(['us-east-1']);
  });

  it('should follow result pages', async () => {
    await store.put(makeRecord());
    mocks.send
      .mockResolvedValueOnce({
        MetricDataResults: [{ Id: 'm0', Timestamps: [new Date('2024-05-01T10:00:00Z')], Values: [1] }],
        NextToken: 'next'
      })
      .mockResolvedValueOnce({
        MetricDataResults: [{ Id: 'm0', Timestamps: [new Date('2024-05-01T10:01:00Z')], Values: [2] }]
      });

    const result = await reader.getMetrics({
      project_name: 'api1',
      metric_names: ['invocations'],
      period: 60,
      statistics: ['Sum']
    });

    expect(result.metrics[0].datapoints.map(point => point.value)).toEqual([1, 2]);
    expect(sentInputs(mocks.send, GetMetricDataCommand).map(input => input.NextToken)).toEqual([undefined, 'next']);
  });

  it('should reject a static site without a distribution', async () => {
    await store.put(makeRecord({ projectName: 'site1', deploymentType: 'frontend', resources: {} }));

    await expect(reader.getMetrics({
      project_name: 'site1',
      metric_names: ['requests'],
      period: 60,
      statistics: ['Sum']
    })).rejects.toThrow(new NotFoundError('No distribution recorded for site1'));
  });

  it('should reject an empty time range', async () => {
    await store.put(makeRecord());

    await expect(reader.getMetrics({
      project_name: 'api1',
      metric_names: ['invocations'],
      start_time: '2024-05-01T06:00:00Z',
      end_time: '2024-05-01T06:00:00Z',
      period: 60,
      statistics: ['Sum']
    })).rejects.toBeInstanceOf(InvalidSpecError);
    expect(mocks.send).not.toHaveBeenCalled();
  });
});
