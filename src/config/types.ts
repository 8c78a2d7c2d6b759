// Configuration-specific types
import type { LevelWithSilent } from 'pino';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface StoreSettings {
  /** Directory holding one JSON record per project */
  directory: string;
  /** Give up acquiring a record lock after this long */
  lockTimeoutMs: number;
  /** A lock file older than this is considered abandoned */
  staleLockMs: number;
}

export interface DeploymentSettings {
  /** Cap on the total time spent waiting for a stack to settle */
  timeoutMs: number;
  /** Cap on the interval between two stack status polls */
  pollIntervalMs: number;
  /** Submission attempts on transient engine errors */
  maxSubmitAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Bucket for packaged function code; derived from the account when absent */
  artifactBucket?: string;
  artifactBucketPrefix: string;
}

export interface Capabilities {
  allowWrite: boolean;
  allowSensitiveDataAccess: boolean;
}

export interface ToolConfig {
  aws: {
    region: string;
    profile?: string;
  };
  store: StoreSettings;
  deployment: DeploymentSettings;
  capabilities: Capabilities;
  logging: {
    level: LevelWithSilent;
  };
}

export interface ConfigLoader<T> {
  load(path?: string): Promise<T>;
  validate(config: unknown): ConfigValidationResult;
}
