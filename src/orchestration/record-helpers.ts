import { DeploymentFailure, DeploymentRecord, DeploymentResources, FailureStage } from '../types';
import { DeploymentToolError, EngineError, errorMessage } from '../errors';
import { OUTPUT_KEYS } from '../templates/cloudformation-generator';
import { RecordStore } from '../store/record-store';
import { assertTransition } from '../store/status-transitions';
import { Logger } from '../lib/logger';

type OutputField = keyof typeof OUTPUT_KEYS;

const OUTPUT_FIELDS: readonly OutputField[] = [
  'functionArn',
  'functionName',
  'logGroupName',
  'apiEndpoint',
  'apiId',
  'tableName',
  'bucketName',
  'distributionId',
  'distributionDomain',
  'websiteUrl'
];

/**
 * Resource identifiers published as stack outputs
 */
export function resourcesFromOutputs(outputs: Record<string, string>): DeploymentResources {
  const resources: DeploymentResources = {};
  for (const field of OUTPUT_FIELDS) {
    const value = outputs[OUTPUT_KEYS[field]];
    if (value !== undefined) {
      resources[field] = value;
    }
  }
  return resources;
}

export function failureFrom(error: unknown, fallbackStage: FailureStage): DeploymentFailure {
  if (error instanceof EngineError) {
    return { stage: error.stage ?? fallbackStage, message: error.message, code: error.awsCode ?? error.code };
  }
  if (error instanceof DeploymentToolError) {
    return { stage: error.stage ?? fallbackStage, message: error.message, code: error.code };
  }
  return { stage: fallbackStage, message: errorMessage(error) };
}

/**
 * Move a record to FAILED with the failure attached. A failed write is logged
 * and callers keep the original error.
 */
export async function markFailed(
  store: RecordStore,
  projectName: string,
  failure: DeploymentFailure,
  log: Logger,
  options: { reconcile?: boolean } = {}
): Promise<DeploymentRecord | null> {
  try {
    return await store.update(projectName, current => {
      if (!current) {
        throw new Error(`Record ${projectName} disappeared`);
      }
      assertTransition(projectName, current.status, 'FAILED', options);
      return { ...current, status: 'FAILED', lastError: failure, updatedAt: new Date().toISOString() };
    });
  } catch (error) {
    log.error({ projectName, err: error, failure }, 'Could not record deployment failure');
    return null;
  }
}
