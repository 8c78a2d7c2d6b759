// Public entry point for the serverless web-app deployer
export * from './types';
export * from './errors';

export type { ToolConfig, Capabilities, StoreSettings, DeploymentSettings } from './config/types';
export { loadToolConfig, ToolConfigLoader, DeploymentSpecLoader, DEFAULT_TOOL_CONFIG } from './config/loader';
export {
  normalizeDeploymentSpec,
  validateDeploymentSpec,
  SUPPORTED_RUNTIMES
} from './config/validator';
export type { UpdateFrontendParams, ConfigureDomainParams, GetLogsParams, GetMetricsParams } from './config/validator';
export { isOperationAllowed } from './config/capabilities';
export type { ToolOperation, OperationDecision } from './config/capabilities';
export { ResourceNamingService } from './config/naming';

export { createAwsSession } from './lib/aws-session';
export type { AwsSession } from './lib/aws-session';
export { createLogger } from './lib/logger';

export { TemplateEngine } from './templates/template-engine';
export type { Template } from './templates/types';
export { FileRecordStore } from './store/record-store';
export type { RecordStore } from './store/record-store';
export { CloudFormationEngine } from './engine/cloudformation-engine';
export type { DeploymentEngine, StackResult, StackOutcome } from './engine/types';
export type { AssetPublisher, CdnManager, CertificateInspector, DnsManager } from './provisioning/types';

export { DeploymentOrchestrator } from './orchestration/deployment-orchestrator';
export type { AttemptState, DeployRequestOptions, DestroyResult } from './orchestration/types';
export { FrontendUpdater } from './post-deploy/frontend-updater';
export { DomainBinder } from './post-deploy/domain-binder';
export { LogsReader } from './observability/logs-reader';
export { MetricsReader } from './observability/metrics-reader';
export type { LogsResult, MetricsResult } from './observability/types';
export { deploymentHelp } from './guidance/deployment-help';
export { iacGuidance } from './guidance/iac-guidance';
export { DEPLOYMENT_LIST_URI, DeploymentResourceReader, normalizeListOptions } from './resources/deployment-resources';
export type { Reconciler } from './resources/deployment-resources';

export { WebAppToolset, createWebAppToolset } from './tools/webapp-toolset';
export type { RegionalServices, RegionalServicesFactory } from './tools/webapp-toolset';
