import {
  CloudWatchLogsClient,
  FilterLogEventsCommand,
  FilterLogEventsCommandInput
} from '@aws-sdk/client-cloudwatch-logs';
import { DeploymentRecord } from '../types';
import { NotFoundError } from '../errors';
import { GetLogsParams } from '../config/validator';
import { ResourceNamingService } from '../config/naming';
import { toEngineError } from '../engine/error-classifier';
import { RecordStore } from '../store/record-store';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { parseTime, requireDeployed } from './deployed-record';
import { LogEvent, LogsResult } from './types';

const DEFAULT_WINDOW_MS = 3 * 60 * 60 * 1000;

export interface LogsReaderOptions {
  now?: () => Date;
}

/**
 * Reads function logs of a deployed backend from CloudWatch Logs
 */
export class LogsReader {
  private readonly clients = new Map<string, CloudWatchLogsClient>();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: RecordStore,
    private readonly session: AwsSession,
    options: LogsReaderOptions = {},
    private readonly naming: ResourceNamingService = new ResourceNamingService(),
    log: Logger = rootLogger
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = log.child({ component: 'logs-reader' });
  }

  /**
   * The newest `limit` events in the window; without start_time the window
   * is the three hours before end_time.
   */
  async getLogs(params: GetLogsParams): Promise<LogsResult> {
    const projectName = params.project_name;
    const record = await requireDeployed(this.store, projectName);
    const logGroupName = params.log_group_name ?? this.logGroupOf(record);
    const client = this.client(params.region ?? record.region);

    const endTime = parseTime(params.end_time, 'end_time');
    const startTime = parseTime(params.start_time, 'start_time')
      ?? new Date((endTime ?? this.now()).getTime() - DEFAULT_WINDOW_MS);
    const base: FilterLogEventsCommandInput = {
      logGroupName,
      startTime: startTime.getTime(),
      endTime: endTime?.getTime(),
      filterPattern: params.filter_pattern
    };

    // Pages come oldest first; read to the end and keep the newest
    let events: LogEvent[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const page = await client.send(new FilterLogEventsCommand({
          ...base,
          limit: params.limit,
          nextToken
        }));
        for (const event of page.events ?? []) {
          events.push({
            timestamp: event.timestamp,
            timestampIso: event.timestamp === undefined ? undefined : new Date(event.timestamp).toISOString(),
            message: event.message,
            logStreamName: event.logStreamName
          });
        }
        events = newestFirst(events).slice(0, params.limit);
        nextToken = page.nextToken;
      } while (nextToken);
    } catch (error) {
      throw toEngineError(error, { operation: 'FilterLogEvents', projectName });
    }

    this.log.debug({ projectName, logGroupName, count: events.length }, 'Read log events');
    return { projectName, logGroupName, events };
  }

  private logGroupOf(record: DeploymentRecord): string {
    if (record.deploymentType === 'frontend') {
      throw new NotFoundError(`Frontend-only deployment ${record.projectName} has no function logs`, {
        projectName: record.projectName
      });
    }
    const { logGroupName, functionName } = record.resources;
    return logGroupName ?? `/aws/lambda/${functionName ?? this.naming.generateFunctionName(record.projectName)}`;
  }

  private client(region: string): CloudWatchLogsClient {
    let client = this.clients.get(region);
    if (!client) {
      client = new CloudWatchLogsClient(clientConfig(this.session, region));
      this.clients.set(region, client);
    }
    return client;
  }
}

function newestFirst(events: LogEvent[]): LogEvent[] {
  return [...events].sort((a, b) => (b.timestamp ?? 0) - (a.timestamp ?? 0));
}
