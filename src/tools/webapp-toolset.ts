import { DeploymentRecord, DeploymentSummary } from '../types';
import { ToolConfig } from '../config/types';
import {
  normalizeConfigureDomainParams,
  normalizeDeploymentSpec,
  normalizeGetLogsParams,
  normalizeGetMetricsParams,
  normalizeUpdateFrontendParams
} from '../config/validator';
import { AwsSession, createAwsSession } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { FileRecordStore, RecordStore } from '../store/record-store';
import { ArtifactPackager } from '../engine/artifact-packager';
import { CloudFormationEngine } from '../engine/cloudformation-engine';
import { S3Manager } from '../provisioning/s3-manager';
import { CloudFrontManager } from '../provisioning/cloudfront-manager';
import { AcmManager } from '../provisioning/acm-manager';
import { Route53Manager } from '../provisioning/route53-manager';
import { DeploymentOrchestrator } from '../orchestration/deployment-orchestrator';
import { AttemptState, DeployRequestOptions, DestroyResult } from '../orchestration/types';
import { FrontendUpdater } from '../post-deploy/frontend-updater';
import { DomainBinder } from '../post-deploy/domain-binder';
import { LogsReader } from '../observability/logs-reader';
import { MetricsReader } from '../observability/metrics-reader';
import { LogsResult, MetricsResult } from '../observability/types';
import { DeploymentResourceReader, normalizeListOptions, Reconciler } from '../resources/deployment-resources';
import { DeploymentHelp, deploymentHelp } from '../guidance/deployment-help';
import { IacGuidance, iacGuidance } from '../guidance/iac-guidance';

/** The services that act on stacks of one region */
export interface RegionalServices {
  orchestrator: DeploymentOrchestrator;
  frontendUpdater: FrontendUpdater;
  domainBinder: DomainBinder;
}

export type RegionalServicesFactory = (region: string) => RegionalServices;

export interface ToolsetDependencies {
  store: RecordStore;
  defaultRegion: string;
  regional: RegionalServicesFactory;
  logs: LogsReader;
  metrics: MetricsReader;
  log?: Logger;
}

/**
 * Tool-level operations. Parameters arrive unvalidated and are normalized
 * here; each call is routed to the region its deployment lives in.
 */
export class WebAppToolset implements Reconciler {
  private readonly services = new Map<string, RegionalServices>();
  private readonly resources: DeploymentResourceReader;
  private readonly log: Logger;

  constructor(private readonly deps: ToolsetDependencies) {
    this.resources = new DeploymentResourceReader(deps.store, this);
    this.log = (deps.log ?? rootLogger).child({ component: 'toolset' });
  }

  async deployWebapp(params: unknown, options: DeployRequestOptions = {}): Promise<DeploymentRecord> {
    const spec = normalizeDeploymentSpec(params, { region: this.deps.defaultRegion });
    return this.servicesFor(spec.region).orchestrator.deploy(spec, options);
  }

  async updateFrontend(params: unknown): Promise<DeploymentRecord> {
    const normalized = normalizeUpdateFrontendParams(params);
    const region = await this.regionOf(normalized.project_name);
    return this.servicesFor(region).frontendUpdater.updateFrontend(normalized);
  }

  async configureDomain(params: unknown): Promise<DeploymentRecord> {
    const normalized = normalizeConfigureDomainParams(params);
    const region = await this.regionOf(normalized.project_name);
    return this.servicesFor(region).domainBinder.configureDomain(normalized);
  }

  async deleteDeployment(projectName: string): Promise<DestroyResult> {
    const region = await this.regionOf(projectName);
    return this.servicesFor(region).orchestrator.destroy(projectName);
  }

  async refresh(projectName: string): Promise<DeploymentRecord> {
    const region = await this.regionOf(projectName);
    return this.servicesFor(region).orchestrator.refresh(projectName);
  }

  async getLogs(params: unknown): Promise<LogsResult> {
    return this.deps.logs.getLogs(normalizeGetLogsParams(params));
  }

  async getMetrics(params: unknown): Promise<MetricsResult> {
    return this.deps.metrics.getMetrics(normalizeGetMetricsParams(params));
  }

  async listDeployments(options: unknown = {}): Promise<DeploymentSummary[]> {
    return this.resources.listDeployments(normalizeListOptions(options));
  }

  getDeployment(projectName: string, options: { refresh?: boolean } = {}): Promise<DeploymentRecord> {
    return this.resources.getDeployment(projectName, options);
  }

  readResource(uri: string): Promise<DeploymentSummary[] | DeploymentRecord> {
    return this.resources.read(uri);
  }

  deploymentHelp(deploymentType?: string): DeploymentHelp {
    return deploymentHelp(deploymentType);
  }

  iacGuidance(tool?: string): IacGuidance {
    return iacGuidance(tool);
  }

  private async regionOf(projectName: string): Promise<string> {
    const record = await this.deps.store.get(projectName);
    return record?.region ?? this.deps.defaultRegion;
  }

  private servicesFor(region: string): RegionalServices {
    let services = this.services.get(region);
    if (!services) {
      this.log.debug({ region }, 'Creating regional services');
      services = this.deps.regional(region);
      this.services.set(region, services);
    }
    return services;
  }
}

export interface CreateToolsetOptions {
  log?: Logger;
  onStateChange?: (state: AttemptState, attemptId: string) => void;
}

/**
 * Wire the toolset against AWS from a loaded configuration
 */
export function createWebAppToolset(config: ToolConfig, options: CreateToolsetOptions = {}): WebAppToolset {
  const log = options.log ?? rootLogger;
  const store = new FileRecordStore(config.store, log);
  const baseSession = createAwsSession(config.aws);

  const regional: RegionalServicesFactory = region => {
    const session: AwsSession = { ...baseSession, region };
    const s3 = new S3Manager(session, log);
    const cdn = new CloudFrontManager(session, log);
    const packager = new ArtifactPackager(session, s3, {
      bucket: config.deployment.artifactBucket,
      bucketPrefix: config.deployment.artifactBucketPrefix
    }, undefined, log);
    const engine = new CloudFormationEngine(session, packager, {
      timeoutMs: config.deployment.timeoutMs,
      pollIntervalMs: config.deployment.pollIntervalMs
    }, log);

    return {
      orchestrator: new DeploymentOrchestrator({
        store,
        engine,
        assets: s3,
        cdn,
        settings: {
          defaultRegion: config.aws.region,
          maxSubmitAttempts: config.deployment.maxSubmitAttempts,
          retryBaseDelayMs: config.deployment.retryBaseDelayMs,
          retryMaxDelayMs: config.deployment.retryMaxDelayMs
        },
        log,
        onStateChange: options.onStateChange
      }),
      frontendUpdater: new FrontendUpdater({ store, assets: s3, cdn, log }),
      domainBinder: new DomainBinder({
        store,
        certificates: new AcmManager(session, log),
        cdn,
        dns: new Route53Manager(session, log),
        log
      })
    };
  };

  return new WebAppToolset({
    store,
    defaultRegion: config.aws.region,
    regional,
    logs: new LogsReader(store, baseSession, {}, undefined, log),
    metrics: new MetricsReader(store, baseSession, {}, undefined, log),
    log
  });
}
