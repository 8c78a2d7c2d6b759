import { DeploymentRecord } from '../../types';

export function makeRecord(overrides: Partial<DeploymentRecord> = {}): DeploymentRecord {
  return {
    projectName: 'api1',
    deploymentType: 'backend',
    status: 'DEPLOYED',
    stackName: 'api1',
    region: 'us-east-1',
    resources: {
      functionArn: 'arn:aws:lambda:us-east-1:123456789012:function:api1-function',
      functionName: 'api1-function'
    },
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
    lastAttemptId: '6f1c1b0a-2b8e-4b59-9d7e-0d0f1c6c8a11',
    configuration: {
      project_name: 'api1',
      deployment_type: 'backend',
      project_root: '/work/api1'
    },
    ...overrides
  };
}
