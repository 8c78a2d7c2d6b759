import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FilterLogEventsCommand } from '@aws-sdk/client-cloudwatch-logs';
import { LogsReader } from '../logs-reader';
import { FileRecordStore } from '../../store/record-store';
import { EngineError, InvalidSpecError, NotFoundError } from '../../errors';
import { makeRecord } from '../../store/__tests__/fixtures';
import { awsError, sentInputs } from '../../__tests__/helpers/aws-sdk';

const mocks = vi.hoisted(() => {
  const regions: string[] = [];
  return { send: vi.fn(), regions };
});

vi.mock('@aws-sdk/client-cloudwatch-logs', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-cloudwatch-logs')>()),
  CloudWatchLogsClient: class {
    send = mocks.send;
    constructor(config: { region: string }) {
      mocks.regions.push(config.region);
    }
  }
}));

describe('LogsReader', () => {
  let directory: string;
  let store: FileRecordStore;
  let reader: LogsReader;

  beforeEach(() => {
    mocks.send.mockReset();
    mocks.regions.length = 0;
    directory = mkdtempSync(join(tmpdir(), 'webapp-deployer-logs-'));
    store = new FileRecordStore({ directory, lockTimeoutMs: 2_000, staleLockMs: 60_000 });
    reader = new LogsReader(store, { region: 'us-east-1' });
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should read the function log group newest first', async () => {
    await store.put(makeRecord({
      region: 'eu-west-1',
      resources: { functionName: 'api1-function', logGroupName: '/aws/lambda/api1-function' }
    }));
    mocks.send.mockResolvedValueOnce({
      events: [
        { timestamp: 1_700_000_000_000, message: 'first', logStreamName: 's1' },
        { timestamp: 1_700_000_060_000, message: 'second', logStreamName: 's1' }
      ]
    });

    const result = await reader.getLogs({
      project_name: 'api1',
      limit: 100,
      start_time: '2023-11-14T00:00:00Z',
      filter_pattern: 'ERROR'
    });

    expect(result).toEqual({
      projectName: 'api1',
      logGroupName: '/aws/lambda/api1-function',
      events: [
        { timestamp: 1_700_000_060_000, timestampIso: '2023-11-14T22:14:20.000Z', message: 'second', logStreamName: 's1' },
        { timestamp: 1_700_000_000_000, timestampIso: '2023-11-14T22:13:20.000Z', message: 'first', logStreamName: 's1' }
      ]
    });
    expect(sentInputs(mocks.send, FilterLogEventsCommand)).toEqual([{
      logGroupName: '/aws/lambda/api1-function',
      startTime: Date.parse('2023-11-14T00:00:00Z'),
      endTime: undefined,
      filterPattern: 'ERROR',
      limit: 100,
      nextToken: undefined
    }]);
    expect(mocks.regions).toEqual(['eu-west-1']);
  });

  it('should fall back to the function name for the log group', async () => {
    await store.put(makeRecord({ resources: { functionName: 'api1-function' } }));
    mocks.send.mockResolvedValueOnce({ events: [] });

    const result = await reader.getLogs({ project_name: 'api1', limit: 10 });

    expect(result.logGroupName).toBe('/aws/lambda/api1-function');
  });

  it('should honor an explicit log group', async () => {
    await store.put(makeRecord());
    mocks.send.mockResolvedValueOnce({ events: [] });

    const result = await reader.getLogs({ project_name: 'api1', limit: 10, log_group_name: '/custom/group' });

    expect(result.logGroupName).toBe('/custom/group');
  });

  it('should keep the newest events across pages', async () => {
    await store.put(makeRecord());
    mocks.send
      .mockResolvedValueOnce({ events: [{ timestamp: 1, message: 'a' }, { timestamp: 2, message: 'b' }], nextToken: 't1' })
      .mockResolvedValueOnce({ events: [{ timestamp: 3, message: 'c' }, { timestamp: 4, message: 'd' }] });

    const result = await reader.getLogs({ project_name: 'api1', limit: 2 });

    expect(result.events.map(event => event.message)).toEqual(['d', 'c']);
    const inputs = sentInputs(mocks.send, FilterLogEventsCommand);
    expect(inputs.map(input => [input.limit, input.nextToken])).toEqual([[2, undefined], [2, 't1']]);
  });

  it('should default to the three hours before now', async () => {
    await store.put(makeRecord());
    mocks.send.mockResolvedValueOnce({ events: [] });
    const now = new Date('2024-05-01T12:00:00.000Z');
    reader = new LogsReader(store, { region: 'us-east-1' }, { now: () => now });

    await reader.getLogs({ project_name: 'api1', limit: 10 });

    const [input] = sentInputs(mocks.send, FilterLogEventsCommand);
    expect(input.startTime).toBe(Date.parse('2024-05-01T09:00:00.000Z'));
    expect(input.endTime).toBeUndefined();
  });

  it('should reject a frontend-only deployment', async () => {
    await store.put(makeRecord({ projectName: 'site1', deploymentType: 'frontend', resources: { bucketName: 'b' } }));

    await expect(reader.getLogs({ project_name: 'site1', limit: 10 })).rejects.toThrow(
      new NotFoundError('Frontend-only deployment site1 has no function logs')
    );
    expect(mocks.send).not.toHaveBeenCalled();
  });

  it('should reject a deployment that is not DEPLOYED', async () => {
    await store.put(makeRecord({ status: 'FAILED' }));

    await expect(reader.getLogs({ project_name: 'api1', limit: 10 })).rejects.toThrow(
      new NotFoundError('Deployment api1 is FAILED, not DEPLOYED')
    );
  });

  it('should reject an unknown project', async () => {
    await expect(reader.getLogs({ project_name: 'nope', limit: 10 })).rejects.toThrow(
      new NotFoundError('No deployment found for project nope')
    );
  });

  it('should reject a malformed timestamp', async () => {
    await store.put(makeRecord());

    await expect(reader.getLogs({ project_name: 'api1', limit: 10, end_time: 'yesterday' })).rejects.toBeInstanceOf(
      InvalidSpecError
    );
  });

  it('should wrap AWS failures', async () => {
    await store.put(makeRecord());
    mocks.send.mockRejectedValueOnce(awsError('ResourceNotFoundException', 'The specified log group does not exist.'));

    const error = await reader.getLogs({ project_name: 'api1', limit: 10 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      operation: 'FilterLogEvents',
      awsCode: 'ResourceNotFoundException',
      message: 'FilterLogEvents failed: ResourceNotFoundException: The specified log group does not exist.'
    });
  });
});
