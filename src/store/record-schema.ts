import Joi from 'joi';
import { DEPLOYMENT_STATUSES, DeploymentRecord, FAILURE_STAGES } from '../types';
import { ConfigValidationResult } from '../config/types';

const resourcesSchema = Joi.object({
  functionArn: Joi.string(),
  functionName: Joi.string(),
  apiEndpoint: Joi.string(),
  apiId: Joi.string(),
  tableName: Joi.string(),
  logGroupName: Joi.string(),
  bucketName: Joi.string(),
  distributionId: Joi.string(),
  distributionDomain: Joi.string(),
  websiteUrl: Joi.string(),
  assetDigest: Joi.string(),
  lastInvalidationId: Joi.string(),
  customDomain: Joi.string(),
  certificateArn: Joi.string(),
  dnsChangeId: Joi.string()
});

const deploymentRecordSchema = Joi.object<DeploymentRecord>({
  projectName: Joi.string().pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/).max(128).required(),
  deploymentType: Joi.string().valid('backend', 'frontend', 'fullstack').required(),
  status: Joi.string().valid(...DEPLOYMENT_STATUSES).required(),
  stackName: Joi.string().required(),
  region: Joi.string().required(),
  resources: resourcesSchema.required(),
  createdAt: Joi.string().isoDate().required(),
  updatedAt: Joi.string().isoDate().required(),
  lastAttemptId: Joi.string().guid(),
  lastError: Joi.object({
    stage: Joi.string().valid(...FAILURE_STAGES).required(),
    message: Joi.string().allow('').required(),
    code: Joi.string()
  }),
  // The spec was validated when it was accepted; only its key fields matter here
  configuration: Joi.object({
    project_name: Joi.string().required(),
    deployment_type: Joi.string().required(),
    project_root: Joi.string().required()
  }).unknown(true).required()
});

export function validateRecord(value: unknown): ConfigValidationResult {
  const { error } = deploymentRecordSchema.validate(value, { abortEarly: false, convert: false });
  if (error) {
    return { valid: false, errors: error.details.map(detail => detail.message) };
  }
  return { valid: true, errors: [] };
}

/**
 * @returns the record, or null when the value is not a valid record
 */
export function parseRecord(value: unknown): DeploymentRecord | null {
  const { error, value: record } = deploymentRecordSchema.validate(value, { convert: false });
  return error ? null : record;
}
