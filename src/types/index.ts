// Core type definitions for the web-app deployer

export type DeploymentType = 'backend' | 'frontend' | 'fullstack';

export const DEPLOYMENT_TYPES: readonly DeploymentType[] = ['backend', 'frontend', 'fullstack'];

export type LambdaArchitecture = 'x86_64' | 'arm64';

export interface DatabaseConfiguration {
  table_name: string;
  attribute_definitions: Array<{ name: string; type: 'S' | 'N' | 'B' }>;
  key_schema: Array<{ name: string; type: 'HASH' | 'RANGE' }>;
  billing_mode?: 'PAY_PER_REQUEST' | 'PROVISIONED';
  read_capacity?: number;
  write_capacity?: number;
}

export interface BackendConfiguration {
  built_artifacts_path: string;
  runtime: string;
  port: number;
  /** Executable launched by the web adapter, relative to built_artifacts_path */
  startup_script: string;
  framework?: string;
  entry_point?: string;
  architecture?: LambdaArchitecture;
  memory_size?: number;
  timeout?: number;
  stage?: string;
  cors?: boolean;
  environment?: Record<string, string>;
  database_configuration?: DatabaseConfiguration;
}

export interface FrontendConfiguration {
  built_assets_path: string;
  framework?: string;
  index_document?: string;
  error_document?: string;
  custom_domain?: string;
  certificate_arn?: string;
}

export interface DeploymentSpec {
  project_name: string;
  deployment_type: DeploymentType;
  project_root: string;
  region?: string;
  backend_configuration?: BackendConfiguration;
  frontend_configuration?: FrontendConfiguration;
}

/**
 * A spec after boundary normalization: region resolved, defaults applied and
 * paths made absolute.
 */
export interface NormalizedDeploymentSpec extends DeploymentSpec {
  region: string;
  backend_configuration?: BackendConfiguration & Required<Pick<BackendConfiguration,
    'architecture' | 'memory_size' | 'timeout' | 'stage' | 'cors'>>;
  frontend_configuration?: FrontendConfiguration & Required<Pick<FrontendConfiguration, 'index_document'>>;
}

export type DeploymentStatus = 'NOT_STARTED' | 'IN_PROGRESS' | 'DEPLOYED' | 'FAILED' | 'UPDATING';

export const DEPLOYMENT_STATUSES: readonly DeploymentStatus[] = [
  'NOT_STARTED',
  'IN_PROGRESS',
  'DEPLOYED',
  'FAILED',
  'UPDATING'
];

/** Where in an operation a failure happened */
export type FailureStage =
  | 'VALIDATION'
  | 'SYNTHESIZING'
  | 'SUBMITTING'
  | 'WAITING'
  | 'PUBLISHING'
  | 'INVALIDATING'
  | 'CERTIFICATE_CHECK'
  | 'DISTRIBUTION_UPDATE'
  | 'DNS_UPDATE'
  | 'RECONCILE'
  | 'DELETING'
  | 'STORAGE';

export const FAILURE_STAGES: readonly FailureStage[] = [
  'VALIDATION',
  'SYNTHESIZING',
  'SUBMITTING',
  'WAITING',
  'PUBLISHING',
  'INVALIDATING',
  'CERTIFICATE_CHECK',
  'DISTRIBUTION_UPDATE',
  'DNS_UPDATE',
  'RECONCILE',
  'DELETING',
  'STORAGE'
];

export interface DeploymentResources {
  functionArn?: string;
  functionName?: string;
  apiEndpoint?: string;
  apiId?: string;
  tableName?: string;
  logGroupName?: string;
  bucketName?: string;
  distributionId?: string;
  distributionDomain?: string;
  websiteUrl?: string;
  assetDigest?: string;
  lastInvalidationId?: string;
  customDomain?: string;
  certificateArn?: string;
  dnsChangeId?: string;
}

export interface DeploymentFailure {
  stage: FailureStage;
  message: string;
  code?: string;
}

export interface DeploymentRecord {
  projectName: string;
  deploymentType: DeploymentType;
  status: DeploymentStatus;
  stackName: string;
  region: string;
  resources: DeploymentResources;
  createdAt: string;
  updatedAt: string;
  lastAttemptId?: string;
  lastError?: DeploymentFailure;
  configuration: DeploymentSpec;
}

export interface DeploymentSummary {
  uri: string;
  projectName: string;
  type: DeploymentType;
  status: DeploymentStatus;
  lastUpdated: string;
}
