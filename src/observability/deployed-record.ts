import { DeploymentRecord } from '../types';
import { InvalidSpecError, NotFoundError } from '../errors';
import { RecordStore } from '../store/record-store';

/**
 * @throws NotFoundError unless the project has a DEPLOYED record
 */
export async function requireDeployed(store: RecordStore, projectName: string): Promise<DeploymentRecord> {
  const record = await store.get(projectName);
  if (!record) {
    throw new NotFoundError(`No deployment found for project ${projectName}`, { projectName });
  }
  if (record.status !== 'DEPLOYED') {
    throw new NotFoundError(`Deployment ${projectName} is ${record.status}, not DEPLOYED`, { projectName });
  }
  return record;
}

export function parseTime(value: string | undefined, name: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const time = new Date(value);
  if (Number.isNaN(time.getTime())) {
    throw new InvalidSpecError(`${name} must be an ISO 8601 timestamp, got ${value}`);
  }
  return time;
}
