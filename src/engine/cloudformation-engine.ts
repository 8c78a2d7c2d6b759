import {
  CloudFormationClient,
  Capability,
  CreateStackCommand,
  DeleteStackCommand,
  DescribeStackEventsCommand,
  DescribeStackResourcesCommand,
  DescribeStacksCommand,
  Stack,
  UpdateStackCommand
} from '@aws-sdk/client-cloudformation';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { sleep as defaultSleep } from '../lib/retry';
import { Template } from '../templates/types';
import { ArtifactPackager } from './artifact-packager';
import { describeAwsError, toEngineError } from './error-classifier';
import {
  DeployOptions,
  DeploymentEngine,
  PackagedArtifact,
  PackageRequest,
  StackEvent,
  StackOutcome,
  StackResult
} from './types';

export interface CloudFormationEngineOptions {
  /** Cap on the total time spent waiting for one stack operation */
  timeoutMs: number;
  /** Cap on the interval between two polls */
  pollIntervalMs: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const SUCCESS_STATUSES = new Set(['CREATE_COMPLETE', 'UPDATE_COMPLETE', 'IMPORT_COMPLETE']);
const MAX_FAILURE_EVENTS = 10;

export function outcomeForStatus(status: string | undefined): StackOutcome {
  if (!status || status === 'DELETE_COMPLETE') {
    return 'NOT_FOUND';
  }
  if (status.endsWith('_IN_PROGRESS')) {
    return 'IN_PROGRESS';
  }
  if (SUCCESS_STATUSES.has(status)) {
    return 'SUCCEEDED';
  }
  return 'FAILED';
}

function isMissingStack(error: unknown): boolean {
  const { code, message } = describeAwsError(error);
  return code === 'ValidationError' && /does not exist/.test(message);
}

function isNoUpdates(error: unknown): boolean {
  const { code, message } = describeAwsError(error);
  return code === 'ValidationError' && /No updates are to be performed/.test(message);
}

function capabilitiesOf(template: Template): Capability[] {
  return Object.values(Capability).filter(capability => template.capabilities.includes(capability));
}

/**
 * Drives CloudFormation stacks: create or update, then poll until the stack
 * settles or the deadline passes
 */
export class CloudFormationEngine implements DeploymentEngine {
  private readonly client: CloudFormationClient;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    session: AwsSession,
    private readonly packager: ArtifactPackager,
    private readonly options: CloudFormationEngineOptions,
    log: Logger = rootLogger
  ) {
    this.client = new CloudFormationClient(clientConfig(session));
    this.log = log.child({ component: 'cloudformation' });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  package(request: PackageRequest): Promise<PackagedArtifact> {
    return this.packager.package(request);
  }

  async deploy(
    template: Template,
    stackName: string,
    parameters: Record<string, string>,
    options: DeployOptions = {}
  ): Promise<StackResult> {
    const wait = options.wait ?? true;
    const deadline = this.now() + this.options.timeoutMs;

    let current = await this.describe(stackName);

    if (current.outcome === 'IN_PROGRESS') {
      this.log.info({ stackName, stackStatus: current.stackStatus }, 'Waiting for running stack operation');
      current = await this.waitForStack(stackName, deadline);
      if (current.outcome === 'TIMED_OUT') {
        return current;
      }
    }

    if (current.stackStatus === 'ROLLBACK_COMPLETE') {
      // A stack whose creation failed cannot be updated, only replaced
      this.log.warn({ stackName }, 'Deleting stack left in ROLLBACK_COMPLETE before re-creating it');
      current = await this.deleteAndWait(stackName, deadline);
      if (current.outcome !== 'NOT_FOUND') {
        return current;
      }
    }

    const stackParameters = Object.entries(parameters).map(([ParameterKey, ParameterValue]) => ({
      ParameterKey,
      ParameterValue
    }));
    const capabilities = capabilitiesOf(template);
    const tags = [
      { Key: 'webapp-deployer:project', Value: template.projectName },
      { Key: 'ManagedBy', Value: 'webapp-deployer' }
    ];

    if (current.outcome === 'NOT_FOUND') {
      this.log.info({ stackName }, 'Creating stack');
      await this.call('CreateStack', stackName, () => this.client.send(new CreateStackCommand({
        StackName: stackName,
        TemplateBody: template.body,
        Parameters: stackParameters,
        Capabilities: capabilities,
        Tags: tags
      })));
    } else {
      this.log.info({ stackName, stackStatus: current.stackStatus }, 'Updating stack');
      try {
        await this.client.send(new UpdateStackCommand({
          StackName: stackName,
          TemplateBody: template.body,
          Parameters: stackParameters,
          Capabilities: capabilities,
          Tags: tags
        }));
      } catch (error) {
        if (isNoUpdates(error)) {
          this.log.info({ stackName }, 'Stack is already up to date');
          return this.describe(stackName);
        }
        throw toEngineError(error, { operation: 'UpdateStack', stackName, stage: 'SUBMITTING' });
      }
    }

    if (!wait) {
      return this.describe(stackName);
    }
    return this.waitForStack(stackName, deadline);
  }

  async describe(stackName: string): Promise<StackResult> {
    let stack: Stack | undefined;
    try {
      const response = await this.client.send(new DescribeStacksCommand({ StackName: stackName }));
      stack = response.Stacks?.[0];
    } catch (error) {
      if (isMissingStack(error)) {
        return this.emptyResult(stackName, 'NOT_FOUND');
      }
      throw toEngineError(error, { operation: 'DescribeStacks', stackName });
    }

    if (!stack) {
      return this.emptyResult(stackName, 'NOT_FOUND');
    }

    const outcome = outcomeForStatus(stack.StackStatus);
    const outputs: Record<string, string> = {};
    for (const output of stack.Outputs ?? []) {
      if (output.OutputKey && output.OutputValue !== undefined) {
        outputs[output.OutputKey] = output.OutputValue;
      }
    }

    const result: StackResult = {
      stackName,
      outcome,
      stackStatus: stack.StackStatus,
      statusReason: stack.StackStatusReason,
      outputs,
      resourceIds: {},
      rawEvents: [],
      lastUpdatedAt: (stack.LastUpdatedTime ?? stack.CreationTime)?.toISOString()
    };

    if (outcome === 'SUCCEEDED') {
      result.resourceIds = await this.resourceIds(stackName);
    } else if (outcome === 'FAILED') {
      result.rawEvents = await this.failureEvents(stackName);
      result.statusReason = result.statusReason ?? result.rawEvents[0]?.reason;
    }

    return result;
  }

  async delete(stackName: string, options: DeployOptions = {}): Promise<StackResult> {
    const current = await this.describe(stackName);
    if (current.outcome === 'NOT_FOUND') {
      return current;
    }

    const deadline = this.now() + this.options.timeoutMs;
    if (!(options.wait ?? true)) {
      await this.call('DeleteStack', stackName, () => this.client.send(new DeleteStackCommand({ StackName: stackName })));
      return this.describe(stackName);
    }
    return this.deleteAndWait(stackName, deadline);
  }

  private async deleteAndWait(stackName: string, deadline: number): Promise<StackResult> {
    this.log.info({ stackName }, 'Deleting stack');
    await this.call('DeleteStack', stackName, () => this.client.send(new DeleteStackCommand({ StackName: stackName })));
    return this.waitForStack(stackName, deadline);
  }

  private async waitForStack(stackName: string, deadline: number): Promise<StackResult> {
    for (;;) {
      const result = await this.describe(stackName);
      if (result.outcome !== 'IN_PROGRESS') {
        this.log.info({ stackName, stackStatus: result.stackStatus, outcome: result.outcome }, 'Stack settled');
        return result;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.log.warn({ stackName, stackStatus: result.stackStatus }, 'Gave up waiting for stack');
        return {
          ...result,
          outcome: 'TIMED_OUT',
          statusReason: `Stack ${stackName} still ${result.stackStatus} after ${this.options.timeoutMs}ms`
        };
      }

      this.log.debug({ stackName, stackStatus: result.stackStatus }, 'Stack operation in progress');
      await this.sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private async resourceIds(stackName: string): Promise<Record<string, string>> {
    const response = await this.call('DescribeStackResources', stackName, () =>
      this.client.send(new DescribeStackResourcesCommand({ StackName: stackName }))
    );
    const ids: Record<string, string> = {};
    for (const resource of response.StackResources ?? []) {
      if (resource.LogicalResourceId && resource.PhysicalResourceId) {
        ids[resource.LogicalResourceId] = resource.PhysicalResourceId;
      }
    }
    return ids;
  }

  private async failureEvents(stackName: string): Promise<StackEvent[]> {
    const response = await this.call('DescribeStackEvents', stackName, () =>
      this.client.send(new DescribeStackEventsCommand({ StackName: stackName }))
    );
    return (response.StackEvents ?? [])
      .filter(event => event.ResourceStatus?.endsWith('_FAILED'))
      .slice(0, MAX_FAILURE_EVENTS)
      .map(event => ({
        logicalResourceId: event.LogicalResourceId,
        resourceType: event.ResourceType,
        status: event.ResourceStatus,
        reason: event.ResourceStatusReason,
        timestamp: event.Timestamp?.toISOString()
      }));
  }

  private emptyResult(stackName: string, outcome: StackOutcome): StackResult {
    return { stackName, outcome, outputs: {}, resourceIds: {}, rawEvents: [] };
  }

  private async call<T>(operation: string, stackName: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toEngineError(error, { operation, stackName });
    }
  }
}
