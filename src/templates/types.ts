// Template-specific types
import { DeploymentType, NormalizedDeploymentSpec } from '../types';

/** Any JSON value, including intrinsic functions such as { Ref: 'X' } */
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export interface TemplateResource {
  Type: string;
  Properties?: Record<string, TemplateValue>;
  DependsOn?: string | string[];
}

export interface TemplateParameter {
  Type: string;
  Description?: string;
  Default?: string;
}

export interface TemplateOutput {
  Description: string;
  Value: TemplateValue;
}

export interface CloudFormationTemplate {
  AWSTemplateFormatVersion: string;
  Description: string;
  Parameters: Record<string, TemplateParameter>;
  Resources: Record<string, TemplateResource>;
  Outputs: Record<string, TemplateOutput>;
}

export interface TemplateGenerator {
  generate(spec: NormalizedDeploymentSpec): CloudFormationTemplate;
}

/**
 * A synthesized, ready-to-submit stack template
 */
export interface Template {
  stackName: string;
  projectName: string;
  deploymentType: DeploymentType;
  /** Serialized document, as submitted to CloudFormation */
  body: string;
  document: CloudFormationTemplate;
  /** Logical ids in declaration order */
  resourceOrder: string[];
  /** Parameters that must be supplied at deploy time */
  parameters: string[];
  capabilities: string[];
  spec: NormalizedDeploymentSpec;
}
