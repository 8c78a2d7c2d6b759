import { v4 as uuidv4 } from 'uuid';
import {
  DeploymentRecord,
  DeploymentResources,
  DeploymentSpec,
  DeploymentStatus,
  DeploymentType,
  FailureStage,
  NormalizedDeploymentSpec
} from '../types';
import {
  DriftDetectedError,
  EngineError,
  InvalidSpecError,
  InvalidTransitionError,
  NotFoundError
} from '../errors';
import { normalizeDeploymentSpec } from '../config/validator';
import { TemplateEngine } from '../templates/template-engine';
import { CODE_BUCKET_PARAMETER, CODE_KEY_PARAMETER } from '../templates/cloudformation-generator';
import { Template } from '../templates/types';
import { DeploymentEngine, StackResult } from '../engine/types';
import { toEngineError } from '../engine/error-classifier';
import { AssetPublisher, CdnManager } from '../provisioning/types';
import { RecordStore } from '../store/record-store';
import { assertTransition } from '../store/status-transitions';
import { directoryDigest } from '../lib/digest';
import { withRetry } from '../lib/retry';
import { logger as rootLogger, Logger } from '../lib/logger';
import { failureFrom, markFailed, resourcesFromOutputs } from './record-helpers';
import {
  AttemptState,
  DeployRequestOptions,
  DestroyResult,
  OrchestratorDependencies,
  OrchestratorSettings
} from './types';

/** Type changes that would delete the compute or the website of a live deployment */
const DESTRUCTIVE_TYPE_CHANGES: Record<DeploymentType, readonly DeploymentType[]> = {
  backend: ['frontend'],
  frontend: ['backend'],
  fullstack: ['backend', 'frontend']
};

const ACTIVE_STATUSES: readonly DeploymentStatus[] = ['IN_PROGRESS', 'UPDATING'];

function now(): string {
  return new Date().toISOString();
}

/**
 * Runs deploy attempts end to end and keeps the deployment record in step
 * with the stack: synthesize, submit with retries on transient errors, wait,
 * then publish assets and persist the outcome.
 */
export class DeploymentOrchestrator {
  private readonly store: RecordStore;
  private readonly engine: DeploymentEngine;
  private readonly assets: AssetPublisher;
  private readonly cdn: CdnManager;
  private readonly templates: TemplateEngine;
  private readonly settings: OrchestratorSettings;
  private readonly log: Logger;
  private readonly onStateChange?: (state: AttemptState, attemptId: string) => void;

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.engine = deps.engine;
    this.assets = deps.assets;
    this.cdn = deps.cdn;
    this.settings = deps.settings;
    this.log = (deps.log ?? rootLogger).child({ component: 'orchestrator' });
    this.templates = deps.templates ?? new TemplateEngine(undefined, undefined, this.log);
    this.onStateChange = deps.onStateChange;
  }

  /**
   * Create or update the stack for a spec and record the result
   * @throws InvalidSpecError before any store write or AWS call
   * @throws EngineError after the record has been marked FAILED
   */
  async deploy(spec: DeploymentSpec, options: DeployRequestOptions = {}): Promise<DeploymentRecord> {
    const attemptId = uuidv4();
    const setState = (state: AttemptState, log: Logger): void => {
      log.debug({ state }, 'Attempt state changed');
      this.onStateChange?.(state, attemptId);
    };
    setState('PENDING', this.log.child({ attemptId }));

    const normalized = normalizeDeploymentSpec(spec, { region: this.settings.defaultRegion });
    const projectName = normalized.project_name;
    const log = this.log.child({ projectName, attemptId });
    setState('SYNTHESIZING', log);

    const existing = await this.store.get(projectName);
    if (existing) {
      this.checkCanDeploy(existing, normalized, options);
    }
    const template = this.templates.synthesize(this.withBoundDomain(spec, existing), {
      defaultRegion: this.settings.defaultRegion
    });

    let record = await this.store.update(projectName, current => this.beginAttempt(current, template, attemptId));
    setState('SUBMITTING', log);
    log.info({ stackName: template.stackName, status: record.status }, 'Deploying');

    let stage: FailureStage = 'SUBMITTING';
    try {
      const result = await withRetry(
        async () => {
          const parameters = await this.stackParameters(template);
          setState('WAITING', log);
          return this.engine.deploy(template, template.stackName, parameters);
        },
        {
          maxAttempts: this.settings.maxSubmitAttempts,
          baseDelayMs: this.settings.retryBaseDelayMs,
          maxDelayMs: this.settings.retryMaxDelayMs,
          shouldRetry: error => error instanceof EngineError && error.transient,
          onRetry: (attempt, error, delayMs) => {
            log.warn({ attempt, delayMs, err: error }, 'Transient deployment error, retrying');
            setState('SUBMITTING', log);
          },
          sleep: this.settings.sleep
        }
      );

      if (result.outcome !== 'SUCCEEDED') {
        throw this.stackFailure(projectName, result);
      }

      const resources: DeploymentResources = { ...record.resources, ...resourcesFromOutputs(result.outputs) };
      const frontend = template.spec.frontend_configuration;
      if (frontend) {
        if (frontend.custom_domain) {
          resources.customDomain = frontend.custom_domain;
          resources.certificateArn = frontend.certificate_arn;
        }
        stage = 'PUBLISHING';
        await this.publishAssets(projectName, record, resources, frontend.built_assets_path, log);
      }

      stage = 'STORAGE';
      record = await this.store.update(projectName, current => {
        if (!current) {
          throw new NotFoundError(`Deployment record ${projectName} disappeared during the attempt`, { projectName });
        }
        assertTransition(projectName, current.status, 'DEPLOYED');
        return { ...current, status: 'DEPLOYED', resources, updatedAt: now() };
      });
    } catch (error) {
      setState('FAILED', log);
      const failure = failureFrom(error, stage);
      log.error({ err: error, stage: failure.stage }, 'Deployment failed');
      await markFailed(this.store, projectName, failure, log);
      throw error;
    }

    setState('SUCCEEDED', log);
    log.info({ resources: record.resources }, 'Deployment succeeded');
    return record;
  }

  /**
   * Reconcile a record with its stack
   * @throws DriftDetectedError when a live deployment's stack is gone; the
   * record is marked FAILED first
   */
  async refresh(projectName: string): Promise<DeploymentRecord> {
    const existing = await this.store.get(projectName);
    if (!existing) {
      throw new NotFoundError(`No deployment record found for ${projectName}`, { projectName });
    }

    const result = await this.engine.describe(existing.stackName);
    const log = this.log.child({ projectName });
    let drifted = false;

    const record = await this.store.update(projectName, current => {
      if (!current) {
        throw new NotFoundError(`No deployment record found for ${projectName}`, { projectName });
      }
      const settled = this.settle(current, result);
      drifted = settled.drifted;
      return settled.record;
    });

    if (drifted) {
      log.warn({ stackName: record.stackName }, 'Stack is gone, deployment marked FAILED');
      throw new DriftDetectedError(record.stackName, { projectName });
    }
    if (record.status !== existing.status) {
      log.info({ from: existing.status, to: record.status }, 'Settled deployment status');
    }
    return record;
  }

  /**
   * Empty the website bucket, delete the stack, then forget the record
   */
  async destroy(projectName: string): Promise<DestroyResult> {
    const record = await this.store.get(projectName);
    if (!record) {
      throw new NotFoundError(`No deployment record found for ${projectName}`, { projectName });
    }

    const log = this.log.child({ projectName, stackName: record.stackName });
    let deletedObjects = 0;

    try {
      const bucketName = record.resources.bucketName;
      if (bucketName) {
        try {
          deletedObjects = await this.assets.emptyBucket(bucketName);
        } catch (error) {
          throw toEngineError(error, { operation: 'EmptyBucket', stage: 'DELETING', projectName });
        }
      }

      const result = await this.engine.delete(record.stackName);
      if (result.outcome !== 'NOT_FOUND') {
        throw new EngineError(
          `Stack ${record.stackName} could not be deleted: ${result.stackStatus ?? result.outcome}` +
            (result.statusReason ? ` (${result.statusReason})` : ''),
          {
            kind: result.outcome === 'TIMED_OUT' ? 'transient' : 'permanent',
            operation: 'DeleteStack',
            stackName: record.stackName,
            stage: 'DELETING',
            awsCode: result.stackStatus,
            projectName
          }
        );
      }
    } catch (error) {
      log.error({ err: error }, 'Teardown failed');
      await markFailed(this.store, projectName, failureFrom(error, 'DELETING'), log, { reconcile: true });
      throw error;
    }

    await this.store.delete(projectName);
    log.info({ deletedObjects }, 'Deployment destroyed');
    return { projectName, stackName: record.stackName, deletedObjects };
  }

  private checkCanDeploy(existing: DeploymentRecord, spec: NormalizedDeploymentSpec, options: DeployRequestOptions): void {
    const projectName = existing.projectName;
    const type = spec.deployment_type;

    if (ACTIVE_STATUSES.includes(existing.status)) {
      const target = existing.status === 'UPDATING' ? 'UPDATING' : 'IN_PROGRESS';
      throw new InvalidTransitionError(existing.status, target, { projectName });
    }

    if (existing.region !== spec.region) {
      throw new InvalidSpecError(
        `${projectName} is deployed in ${existing.region}; destroy it before deploying to ${spec.region}`,
        [],
        { projectName }
      );
    }

    if (!options.allowDestructiveTypeChange && DESTRUCTIVE_TYPE_CHANGES[existing.deploymentType].includes(type)) {
      throw new InvalidSpecError(
        `Changing ${projectName} from ${existing.deploymentType} to ${type} deletes deployed resources; ` +
          'set allowDestructiveTypeChange to proceed',
        [],
        { projectName }
      );
    }
  }

  /** Keep a domain bound by configureDomain across redeploys */
  private withBoundDomain(spec: DeploymentSpec, existing: DeploymentRecord | null): DeploymentSpec {
    const frontend = spec.frontend_configuration;
    const bound = existing?.resources;
    if (!frontend || frontend.custom_domain || !bound?.customDomain || !bound.certificateArn) {
      return spec;
    }
    return {
      ...spec,
      frontend_configuration: {
        ...frontend,
        custom_domain: bound.customDomain,
        certificate_arn: bound.certificateArn
      }
    };
  }

  private beginAttempt(current: DeploymentRecord | null, template: Template, attemptId: string): DeploymentRecord {
    const projectName = template.projectName;
    const from = current?.status ?? 'NOT_STARTED';
    const to: DeploymentStatus = from === 'DEPLOYED' ? 'UPDATING' : 'IN_PROGRESS';
    assertTransition(projectName, from, to);

    const timestamp = now();
    return {
      projectName,
      deploymentType: template.deploymentType,
      status: to,
      stackName: template.stackName,
      region: template.spec.region,
      resources: current && current.deploymentType === template.deploymentType ? current.resources : {},
      createdAt: current?.createdAt ?? timestamp,
      updatedAt: timestamp,
      lastAttemptId: attemptId,
      configuration: template.spec
    };
  }

  private async stackParameters(template: Template): Promise<Record<string, string>> {
    const backend = template.spec.backend_configuration;
    if (!backend || !template.parameters.includes(CODE_KEY_PARAMETER)) {
      return {};
    }

    const artifact = await this.engine.package({
      projectName: template.projectName,
      artifactsPath: backend.built_artifacts_path,
      startupScript: backend.startup_script
    });
    return {
      [CODE_BUCKET_PARAMETER]: artifact.bucket,
      [CODE_KEY_PARAMETER]: artifact.key
    };
  }

  /**
   * Upload assets when they or the bucket changed. On an update the CDN is
   * invalidated so the new release is served at once.
   */
  private async publishAssets(
    projectName: string,
    record: DeploymentRecord,
    resources: DeploymentResources,
    assetsPath: string,
    log: Logger
  ): Promise<void> {
    const bucketName = resources.bucketName;
    if (!bucketName) {
      throw new EngineError(`Stack ${record.stackName} has no website bucket output`, {
        kind: 'permanent',
        operation: 'PublishAssets',
        stackName: record.stackName,
        stage: 'PUBLISHING',
        projectName
      });
    }

    const previous = record.resources;
    const digest = directoryDigest(assetsPath);
    if (digest === previous.assetDigest && bucketName === previous.bucketName) {
      log.info({ bucketName }, 'Assets unchanged, skipping upload');
      return;
    }

    try {
      const published = await this.assets.publishDirectory(bucketName, assetsPath, { prune: true });
      resources.assetDigest = published.digest;
    } catch (error) {
      throw toEngineError(error, { operation: 'PublishAssets', stage: 'PUBLISHING', projectName });
    }

    if (record.status === 'UPDATING' && previous.assetDigest !== undefined && resources.distributionId) {
      try {
        resources.lastInvalidationId = await this.cdn.invalidate(resources.distributionId, ['/*']);
      } catch (error) {
        throw toEngineError(error, { operation: 'CreateInvalidation', stage: 'INVALIDATING', projectName });
      }
    }
  }

  private stackFailure(projectName: string, result: StackResult): EngineError {
    if (result.outcome === 'TIMED_OUT') {
      return new EngineError(result.statusReason ?? `Timed out waiting for stack ${result.stackName}`, {
        kind: 'transient',
        operation: 'WaitForStack',
        stackName: result.stackName,
        stage: 'WAITING',
        projectName
      });
    }

    const status = result.stackStatus ?? result.outcome;
    return new EngineError(
      `Stack ${result.stackName} ended in ${status}${result.statusReason ? `: ${result.statusReason}` : ''}`,
      {
        kind: 'permanent',
        operation: 'DeployStack',
        stackName: result.stackName,
        stage: 'WAITING',
        awsCode: result.stackStatus,
        projectName
      }
    );
  }

  private settle(current: DeploymentRecord, result: StackResult): { record: DeploymentRecord; drifted: boolean } {
    const projectName = current.projectName;
    const unchanged = { record: current, drifted: false };
    const fail = (stage: FailureStage, message: string, code?: string): DeploymentRecord => {
      assertTransition(projectName, current.status, 'FAILED', { reconcile: true });
      return { ...current, status: 'FAILED', lastError: { stage, message, code }, updatedAt: now() };
    };

    switch (result.outcome) {
      case 'NOT_FOUND':
        if (current.status === 'DEPLOYED' || current.status === 'UPDATING') {
          const drift = new DriftDetectedError(current.stackName, { projectName });
          return { record: fail('RECONCILE', drift.message, drift.code), drifted: true };
        }
        if (current.status === 'IN_PROGRESS') {
          return { record: fail('RECONCILE', `Stack ${current.stackName} does not exist`, 'NotFound'), drifted: false };
        }
        return unchanged;

      case 'SUCCEEDED': {
        if (current.status === 'FAILED' || current.status === 'NOT_STARTED') {
          return unchanged;
        }
        if (current.status !== 'DEPLOYED') {
          assertTransition(projectName, current.status, 'DEPLOYED');
        }
        const resources = { ...current.resources, ...resourcesFromOutputs(result.outputs) };
        return { record: { ...current, status: 'DEPLOYED', resources, updatedAt: now() }, drifted: false };
      }

      case 'FAILED':
        if (ACTIVE_STATUSES.includes(current.status)) {
          const reason = result.statusReason ? `: ${result.statusReason}` : '';
          return {
            record: fail('WAITING', `Stack ${current.stackName} ended in ${result.stackStatus}${reason}`, result.stackStatus),
            drifted: false
          };
        }
        return unchanged;

      default:
        return unchanged;
    }
  }
}
