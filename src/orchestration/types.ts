import { AssetPublisher, CdnManager } from '../provisioning/types';
import { DeploymentEngine } from '../engine/types';
import { RecordStore } from '../store/record-store';
import { TemplateEngine } from '../templates/template-engine';
import { Logger } from '../lib/logger';

/** Progress of one deploy attempt */
export type AttemptState = 'PENDING' | 'SYNTHESIZING' | 'SUBMITTING' | 'WAITING' | 'SUCCEEDED' | 'FAILED';

export interface DeployRequestOptions {
  /** Permit backend/frontend swaps and dropping half of a fullstack deployment */
  allowDestructiveTypeChange?: boolean;
}

export interface OrchestratorSettings {
  /** Region for specs that name none */
  defaultRegion?: string;
  maxSubmitAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface OrchestratorDependencies {
  store: RecordStore;
  engine: DeploymentEngine;
  assets: AssetPublisher;
  cdn: CdnManager;
  settings: OrchestratorSettings;
  templates?: TemplateEngine;
  log?: Logger;
  /** Called on every attempt state change */
  onStateChange?: (state: AttemptState, attemptId: string) => void;
}

export interface DestroyResult {
  projectName: string;
  stackName: string;
  /** Objects removed from the website bucket before the stack was deleted */
  deletedObjects: number;
}
