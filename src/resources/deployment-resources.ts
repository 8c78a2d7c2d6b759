import Joi from 'joi';
import { DEPLOYMENT_STATUSES, DeploymentRecord, DeploymentStatus, DeploymentSummary } from '../types';
import { InvalidSpecError, NotFoundError } from '../errors';
import { RecordStore } from '../store/record-store';

export const DEPLOYMENT_URI_PREFIX = 'deployment://';
export const DEPLOYMENT_LIST_URI = `${DEPLOYMENT_URI_PREFIX}list`;

export type DeploymentSortField = 'projectName' | 'type' | 'status' | 'lastUpdated';

export interface ListDeploymentsOptions {
  limit?: number;
  sortBy: DeploymentSortField;
  sortOrder: 'asc' | 'desc';
  status?: DeploymentStatus;
}

const listOptionsSchema = Joi.object<ListDeploymentsOptions>({
  limit: Joi.number().integer().min(1).optional(),
  sortBy: Joi.string().valid('projectName', 'type', 'status', 'lastUpdated').default('lastUpdated'),
  sortOrder: Joi.string().valid('asc', 'desc').default('desc'),
  status: Joi.string().valid(...DEPLOYMENT_STATUSES).optional()
});

export function normalizeListOptions(input: unknown = {}): ListDeploymentsOptions {
  const { error, value } = listOptionsSchema.validate(input, { abortEarly: false });
  if (error) {
    const details = error.details.map(detail => detail.message);
    throw new InvalidSpecError(`Invalid list parameters: ${details.join('; ')}`, details);
  }
  return value;
}

export function deploymentUri(projectName: string): string {
  return `${DEPLOYMENT_URI_PREFIX}${projectName}`;
}

export function summarize(record: DeploymentRecord): DeploymentSummary {
  return {
    uri: deploymentUri(record.projectName),
    projectName: record.projectName,
    type: record.deploymentType,
    status: record.status,
    lastUpdated: record.updatedAt
  };
}

function sortKey(summary: DeploymentSummary, field: DeploymentSortField): string {
  switch (field) {
    case 'projectName':
      return summary.projectName;
    case 'type':
      return summary.type;
    case 'status':
      return summary.status;
    case 'lastUpdated':
      return summary.lastUpdated;
  }
}

export interface Reconciler {
  refresh(projectName: string): Promise<DeploymentRecord>;
}

/**
 * Read side of the deployment:// resources
 */
export class DeploymentResourceReader {
  constructor(
    private readonly store: RecordStore,
    private readonly reconciler: Reconciler
  ) {}

  async listDeployments(options: ListDeploymentsOptions): Promise<DeploymentSummary[]> {
    const records = await this.store.list();
    const direction = options.sortOrder === 'asc' ? 1 : -1;

    const summaries = records
      .filter(record => options.status === undefined || record.status === options.status)
      .map(summarize)
      .sort((a, b) => direction * sortKey(a, options.sortBy).localeCompare(sortKey(b, options.sortBy)));

    return options.limit === undefined ? summaries : summaries.slice(0, options.limit);
  }

  /**
   * @param options.refresh reconcile with the stack before returning
   */
  async getDeployment(projectName: string, options: { refresh?: boolean } = {}): Promise<DeploymentRecord> {
    if (options.refresh) {
      return this.reconciler.refresh(projectName);
    }
    const record = await this.store.get(projectName);
    if (!record) {
      throw new NotFoundError(`No deployment record found for ${projectName}`, { projectName });
    }
    return record;
  }

  /**
   * Resolve a deployment:// URI: the list, or one deployment
   */
  async read(uri: string): Promise<DeploymentSummary[] | DeploymentRecord> {
    if (!uri.startsWith(DEPLOYMENT_URI_PREFIX)) {
      throw new InvalidSpecError(`Unsupported resource URI ${uri}`);
    }
    if (uri === DEPLOYMENT_LIST_URI) {
      return this.listDeployments(normalizeListOptions());
    }
    return this.getDeployment(uri.slice(DEPLOYMENT_URI_PREFIX.length));
  }
}
