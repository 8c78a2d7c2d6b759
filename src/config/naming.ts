import { createHash } from 'crypto';
import { DeploymentSpec } from '../types';

/**
 * Names the deployer chooses itself. Buckets, the API and the distribution
 * are left to CloudFormation so that two projects never collide.
 */
export interface ResourceNames {
  /** CloudFormation stack name */
  stackName: string;
  /** Lambda function name */
  functionName?: string;
  /** CloudWatch log group name */
  logGroupName?: string;
  /** HTTP API name */
  apiName?: string;
}

const MAX_BUCKET_NAME_LENGTH = 63;
const MAX_FUNCTION_NAME_LENGTH = 64;

/**
 * Deterministic names derived from the project name
 */
export class ResourceNamingService {
  generateResourceNames(spec: Pick<DeploymentSpec, 'project_name' | 'deployment_type'>): ResourceNames {
    const stackName = this.generateStackName(spec.project_name);
    const needsLambda = spec.deployment_type === 'backend' || spec.deployment_type === 'fullstack';
    const functionName = needsLambda ? this.generateFunctionName(spec.project_name) : undefined;

    return {
      stackName,
      functionName,
      logGroupName: functionName ? `/aws/lambda/${functionName}` : undefined,
      apiName: needsLambda ? `${spec.project_name}-api` : undefined
    };
  }

  /**
   * The project name itself; validated project names are valid stack names
   */
  generateStackName(projectName: string): string {
    return projectName;
  }

  generateFunctionName(projectName: string): string {
    return this.fitToLimit(`${projectName}-function`, MAX_FUNCTION_NAME_LENGTH);
  }

  /**
   * Shared bucket for packaged function code, one per account and region
   */
  generateArtifactBucketName(prefix: string, accountId: string, region: string): string {
    const name = this.sanitizeName(`${prefix}-${accountId}-${region}`).toLowerCase();
    return this.fitToLimit(name, MAX_BUCKET_NAME_LENGTH);
  }

  /**
   * Letters, digits and single hyphens, starting with a letter
   */
  private sanitizeName(name: string): string {
    const collapsed = name
      .replace(/[^a-zA-Z0-9-]+/g, '-')
      .replace(/-{2,}/g, '-')
      .replace(/^-|-$/g, '');

    if (!collapsed) {
      return 'app';
    }
    return /^[a-zA-Z]/.test(collapsed) ? collapsed : `app-${collapsed}`;
  }

  /**
   * Names over the limit keep a prefix plus a digest of the full name
   */
  private fitToLimit(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const suffix = createHash('sha1').update(name).digest('hex').slice(0, 6);
    const head = name.slice(0, maxLength - suffix.length - 1).replace(/-+$/, '');
    return `${head}-${suffix}`;
  }
}
