import { DEPLOYMENT_TYPES, DeploymentType } from '../types';
import { InvalidSpecError } from '../errors';
import helpContent from './deployment-help.json';

export interface DeploymentTypeHelp {
  description: string;
  supportedFrameworks: string[];
  requirements: string[];
  /** A deployment spec for this type */
  example: Record<string, unknown>;
}

export interface DeploymentHelp {
  description: string;
  deploymentTypes: Record<DeploymentType, string>;
  workflow: string[];
  specificHelp?: DeploymentTypeHelp;
}

interface HelpContent extends DeploymentHelp {
  types: Record<DeploymentType, DeploymentTypeHelp>;
}

const content: HelpContent = helpContent;

function isDeploymentType(value: string): value is DeploymentType {
  return DEPLOYMENT_TYPES.some(type => type === value);
}

/**
 * General deployment help, plus the part for one deployment type when given
 * @throws InvalidSpecError for an unknown deployment type
 */
export function deploymentHelp(deploymentType?: string): DeploymentHelp {
  const { types, ...general } = content;
  if (deploymentType === undefined) {
    return general;
  }
  if (!isDeploymentType(deploymentType)) {
    throw new InvalidSpecError(
      `Unknown deployment type ${deploymentType}; expected one of ${DEPLOYMENT_TYPES.join(', ')}`
    );
  }
  return { ...general, specificHelp: types[deploymentType] };
}
