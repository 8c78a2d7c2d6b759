import { Template } from '../templates/types';

export type StackOutcome = 'SUCCEEDED' | 'FAILED' | 'IN_PROGRESS' | 'NOT_FOUND' | 'TIMED_OUT';

export interface StackEvent {
  logicalResourceId?: string;
  resourceType?: string;
  status?: string;
  reason?: string;
  timestamp?: string;
}

export interface StackResult {
  stackName: string;
  outcome: StackOutcome;
  stackStatus?: string;
  statusReason?: string;
  outputs: Record<string, string>;
  /** Logical id to physical id, filled once the stack has settled successfully */
  resourceIds: Record<string, string>;
  /** Failure events, newest first, when the stack failed */
  rawEvents: StackEvent[];
  lastUpdatedAt?: string;
}

export interface PackageRequest {
  projectName: string;
  artifactsPath: string;
  /** Made executable before zipping */
  startupScript?: string;
}

export interface PackagedArtifact {
  bucket: string;
  key: string;
  digest: string;
  /** False when an identical artifact was already uploaded */
  uploaded: boolean;
}

export interface DeployOptions {
  /** Return right after submission instead of waiting for a terminal status */
  wait?: boolean;
}

/**
 * The deployment engine behind the orchestrator: packages code and drives a
 * stack to a terminal state
 */
export interface DeploymentEngine {
  package(request: PackageRequest): Promise<PackagedArtifact>;
  deploy(
    template: Template,
    stackName: string,
    parameters: Record<string, string>,
    options?: DeployOptions
  ): Promise<StackResult>;
  describe(stackName: string): Promise<StackResult>;
  delete(stackName: string, options?: DeployOptions): Promise<StackResult>;
}
