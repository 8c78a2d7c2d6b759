/**
 * Error taxonomy shared by the orchestrator, the record store and the
 * post-deploy mutators.
 */
import { DeploymentStatus, FailureStage } from '../types';

export interface ErrorContext {
  projectName?: string;
  stage?: FailureStage;
  cause?: unknown;
}

/**
 * Base class for every error the deployer raises on purpose
 */
export class DeploymentToolError extends Error {
  readonly code: string;
  readonly projectName?: string;
  readonly stage?: FailureStage;
  readonly cause?: unknown;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'DeploymentToolError';
    this.code = code;
    this.projectName = context.projectName;
    this.stage = context.stage;
    this.cause = context.cause;
  }
}

/**
 * Caller-fixable input problem. Never retried.
 */
export class InvalidSpecError extends DeploymentToolError {
  readonly details: string[];

  constructor(message: string, details: string[] = [], context: ErrorContext = {}) {
    super(message, 'InvalidSpec', { stage: 'VALIDATION', ...context });
    this.name = 'InvalidSpecError';
    this.details = details;
  }
}

export type EngineErrorKind = 'transient' | 'permanent';

export interface EngineErrorContext extends ErrorContext {
  kind: EngineErrorKind;
  operation: string;
  stackName?: string;
  awsCode?: string;
}

/**
 * Failure reported by the deployment engine or the AWS APIs behind it
 */
export class EngineError extends DeploymentToolError {
  readonly kind: EngineErrorKind;
  readonly operation: string;
  readonly stackName?: string;
  readonly awsCode?: string;

  constructor(message: string, context: EngineErrorContext) {
    super(message, context.kind === 'transient' ? 'EngineTransient' : 'EngineFailed', context);
    this.name = 'EngineError';
    this.kind = context.kind;
    this.operation = context.operation;
    this.stackName = context.stackName;
    this.awsCode = context.awsCode;
  }

  get transient(): boolean {
    return this.kind === 'transient';
  }
}

export class NotFoundError extends DeploymentToolError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'NotFound', context);
    this.name = 'NotFoundError';
  }
}

/**
 * The certificate exists but is not usable yet. The user has to finish
 * validation outside the deployer; no automatic waiting happens.
 */
export class CertificateNotReadyError extends DeploymentToolError {
  readonly certificateArn: string;
  readonly certificateStatus: string;

  constructor(certificateArn: string, certificateStatus: string, context: ErrorContext = {}) {
    super(
      `Certificate ${certificateArn} is ${certificateStatus}; it must be ISSUED before it can be attached`,
      'CertificateNotReady',
      { stage: 'CERTIFICATE_CHECK', ...context }
    );
    this.name = 'CertificateNotReadyError';
    this.certificateArn = certificateArn;
    this.certificateStatus = certificateStatus;
  }
}

export class StorageError extends DeploymentToolError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'StorageError', { stage: 'STORAGE', ...context });
    this.name = 'StorageError';
  }
}

/**
 * The record says the deployment exists but the stack behind it is gone
 */
export class DriftDetectedError extends DeploymentToolError {
  readonly stackName: string;

  constructor(stackName: string, context: ErrorContext = {}) {
    super(
      `Stack ${stackName} no longer exists although the deployment was recorded as live`,
      'DriftDetected',
      { stage: 'RECONCILE', ...context }
    );
    this.name = 'DriftDetectedError';
    this.stackName = stackName;
  }
}

/**
 * A status change the record lifecycle does not allow, e.g. deploying while
 * another attempt is still in progress
 */
export class InvalidTransitionError extends DeploymentToolError {
  readonly from: DeploymentStatus;
  readonly to: DeploymentStatus;

  constructor(from: DeploymentStatus, to: DeploymentStatus, context: ErrorContext = {}) {
    super(
      `Deployment${context.projectName ? ` ${context.projectName}` : ''} cannot move from ${from} to ${to}`,
      'InvalidTransition',
      context
    );
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

export interface StructuredError {
  error: string;
  code: string;
  message: string;
  projectName?: string;
  stage?: FailureStage;
  cause?: string;
  details?: string[];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flatten any thrown value into the shape returned to callers
 */
export function toStructuredError(error: unknown, fallback: ErrorContext = {}): StructuredError {
  if (error instanceof DeploymentToolError) {
    return {
      error: error.name,
      code: error.code,
      message: error.message,
      projectName: error.projectName ?? fallback.projectName,
      stage: error.stage ?? fallback.stage,
      cause: error.cause === undefined ? undefined : errorMessage(error.cause),
      details: error instanceof InvalidSpecError && error.details.length > 0 ? error.details : undefined
    };
  }

  return {
    error: error instanceof Error ? error.name : 'Error',
    code: 'Unexpected',
    message: errorMessage(error),
    projectName: fallback.projectName,
    stage: fallback.stage
  };
}
