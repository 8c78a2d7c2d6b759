import { Capabilities } from './types';

export type ToolOperation =
  | 'deploy_webapp'
  | 'configure_domain'
  | 'update_frontend'
  | 'delete_deployment'
  | 'get_logs'
  | 'get_metrics'
  | 'get_deployment'
  | 'list_deployments'
  | 'deployment_help'
  | 'iac_guidance';

const MUTATING_OPERATIONS: ReadonlySet<ToolOperation> = new Set<ToolOperation>([
  'deploy_webapp',
  'configure_domain',
  'update_frontend',
  'delete_deployment'
]);

const SENSITIVE_OPERATIONS: ReadonlySet<ToolOperation> = new Set<ToolOperation>(['get_logs']);

export interface OperationDecision {
  allowed: boolean;
  reason?: string;
}

export function isOperationAllowed(operation: ToolOperation, capabilities: Capabilities): OperationDecision {
  if (MUTATING_OPERATIONS.has(operation) && !capabilities.allowWrite) {
    return {
      allowed: false,
      reason: `${operation} changes AWS resources and requires write access (--allow-write)`
    };
  }
  if (SENSITIVE_OPERATIONS.has(operation) && !capabilities.allowSensitiveDataAccess) {
    return {
      allowed: false,
      reason: `${operation} reads application logs and requires sensitive data access (--allow-sensitive-data-access)`
    };
  }
  return { allowed: true };
}

