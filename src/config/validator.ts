import Joi from 'joi';
import { isAbsolute, resolve } from 'path';
import { DeploymentSpec, NormalizedDeploymentSpec } from '../types';
import { InvalidSpecError } from '../errors';
import { ConfigValidationResult, ToolConfig } from './types';

export const SUPPORTED_RUNTIMES = [
  'nodejs18.x',
  'nodejs20.x',
  'nodejs22.x',
  'python3.9',
  'python3.10',
  'python3.11',
  'python3.12',
  'python3.13',
  'ruby3.2',
  'ruby3.3',
  'java17',
  'java21',
  'dotnet8',
  'provided.al2023'
] as const;

const projectNameSchema = Joi.string()
  .pattern(/^[a-zA-Z][a-zA-Z0-9-]*$/)
  .min(1)
  .max(128)
  .required()
  .messages({
    'string.pattern.base': 'Project name must start with a letter and contain only alphanumeric characters and hyphens',
    'string.max': 'Project name must be no more than 128 characters long'
  });

const regionSchema = Joi.string()
  .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
  .messages({
    'string.pattern.base': 'AWS region must be a valid region identifier'
  });

const databaseConfigurationSchema = Joi.object({
  table_name: Joi.string()
    .pattern(/^[a-zA-Z0-9_.-]{3,255}$/)
    .required()
    .messages({
      'string.pattern.base': 'Table name must be 3-255 characters of letters, digits, underscore, hyphen or dot'
    }),
  attribute_definitions: Joi.array()
    .items(Joi.object({
      name: Joi.string().required(),
      type: Joi.string().valid('S', 'N', 'B').required()
    }))
    .min(1)
    .required(),
  key_schema: Joi.array()
    .items(Joi.object({
      name: Joi.string().required(),
      type: Joi.string().valid('HASH', 'RANGE').required()
    }))
    .min(1)
    .max(2)
    .required(),
  billing_mode: Joi.string().valid('PAY_PER_REQUEST', 'PROVISIONED').default('PAY_PER_REQUEST'),
  read_capacity: Joi.number().integer().min(1).when('billing_mode', {
    is: 'PROVISIONED',
    then: Joi.required()
  }),
  write_capacity: Joi.number().integer().min(1).when('billing_mode', {
    is: 'PROVISIONED',
    then: Joi.required()
  })
});

const backendConfigurationSchema = Joi.object({
  built_artifacts_path: Joi.string()
    .required()
    .messages({
      'any.required': 'Backend built_artifacts_path is required when deployment type includes backend'
    }),
  runtime: Joi.string()
    .valid(...SUPPORTED_RUNTIMES)
    .required()
    .messages({
      'any.only': 'Runtime must be a supported Lambda runtime'
    }),
  port: Joi.number()
    .integer()
    .min(1)
    .max(65535)
    .required(),
  startup_script: Joi.string()
    .required()
    .messages({
      'any.required': 'A startup_script (relative to built_artifacts_path) is required for backend deployments'
    }),
  framework: Joi.string().optional(),
  entry_point: Joi.string().optional(),
  architecture: Joi.string().valid('x86_64', 'arm64').default('x86_64'),
  memory_size: Joi.number()
    .integer()
    .min(128)
    .max(10240)
    .default(512)
    .messages({
      'number.min': 'Memory must be at least 128 MB',
      'number.max': 'Memory must be no more than 10240 MB'
    }),
  timeout: Joi.number()
    .integer()
    .min(1)
    .max(900)
    .default(30)
    .messages({
      'number.min': 'Timeout must be at least 1 second',
      'number.max': 'Timeout must be no more than 900 seconds (15 minutes)'
    }),
  stage: Joi.string().pattern(/^[a-zA-Z0-9_-]+$/).default('prod'),
  cors: Joi.boolean().default(true),
  environment: Joi.object()
    .pattern(Joi.string(), Joi.string())
    .optional()
    .messages({
      'object.pattern.match': 'Environment variables must be key-value pairs of strings'
    }),
  database_configuration: databaseConfigurationSchema.optional()
});

const frontendConfigurationSchema = Joi.object({
  built_assets_path: Joi.string()
    .required()
    .messages({
      'any.required': 'Frontend built_assets_path is required when deployment type includes frontend'
    }),
  framework: Joi.string().optional(),
  index_document: Joi.string().default('index.html'),
  error_document: Joi.string().optional(),
  custom_domain: Joi.string()
    .domain()
    .optional()
    .messages({
      'string.domain': 'Custom domain must be a valid domain name'
    }),
  certificate_arn: Joi.string()
    .pattern(/^arn:aws:acm:us-east-1:\d{12}:certificate\/.+$/)
    .optional()
    .messages({
      'string.pattern.base': 'certificate_arn must be an ACM certificate ARN in us-east-1, where CloudFront reads certificates'
    })
});

const deploymentSpecSchema = Joi.object<NormalizedDeploymentSpec>({
  project_name: projectNameSchema,
  deployment_type: Joi.string()
    .valid('backend', 'frontend', 'fullstack')
    .required()
    .messages({
      'any.only': 'Deployment type must be one of: backend, frontend, fullstack'
    }),
  project_root: Joi.string().required(),
  region: regionSchema.default('us-east-1'),
  backend_configuration: backendConfigurationSchema.when('deployment_type', {
    is: Joi.valid('backend', 'fullstack'),
    then: Joi.required().messages({
      'any.required': 'backend_configuration is required for backend and fullstack deployments'
    }),
    otherwise: Joi.optional()
  }),
  frontend_configuration: frontendConfigurationSchema.when('deployment_type', {
    is: Joi.valid('frontend', 'fullstack'),
    then: Joi.required().messages({
      'any.required': 'frontend_configuration is required for frontend and fullstack deployments'
    }),
    otherwise: Joi.optional()
  })
}).unknown(false);

/**
 * Validates a deployment spec without normalizing it
 */
export function validateDeploymentSpec(spec: unknown): ConfigValidationResult {
  const { error } = deploymentSpecSchema.validate(spec, { abortEarly: false });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return { valid: true, errors: [] };
}

/**
 * Validates a deployment spec, applies defaults and resolves paths against
 * project_root.
 * @throws InvalidSpecError listing every validation problem
 */
export function normalizeDeploymentSpec(
  spec: DeploymentSpec | unknown,
  defaults: { region?: string } = {}
): NormalizedDeploymentSpec {
  const input = withDefaultRegion(spec, defaults.region);
  const { error, value } = deploymentSpecSchema.validate(input, { abortEarly: false });

  if (error) {
    throw new InvalidSpecError(
      `Invalid deployment spec: ${error.details.map(detail => detail.message).join('; ')}`,
      error.details.map(detail => detail.message),
      { projectName: projectNameOf(spec) }
    );
  }

  if (!isAbsolute(value.project_root)) {
    throw new InvalidSpecError(
      `project_root must be an absolute path, got ${value.project_root}`,
      [],
      { projectName: value.project_name }
    );
  }

  const normalized: NormalizedDeploymentSpec = { ...value };
  if (value.backend_configuration) {
    normalized.backend_configuration = {
      ...value.backend_configuration,
      built_artifacts_path: resolve(value.project_root, value.backend_configuration.built_artifacts_path)
    };
  }
  if (value.frontend_configuration) {
    normalized.frontend_configuration = {
      ...value.frontend_configuration,
      built_assets_path: resolve(value.project_root, value.frontend_configuration.built_assets_path)
    };
  }

  return normalized;
}

function withDefaultRegion(spec: unknown, region: string | undefined): unknown {
  if (!region || !spec || typeof spec !== 'object' || Array.isArray(spec)) {
    return spec;
  }
  if (!('region' in spec) || spec.region === undefined) {
    return { ...spec, region };
  }
  return spec;
}

function projectNameOf(spec: unknown): string | undefined {
  if (spec && typeof spec === 'object' && 'project_name' in spec && typeof spec.project_name === 'string') {
    return spec.project_name;
  }
  return undefined;
}

// Operation parameter schemas, applied at the tool boundary

export interface UpdateFrontendParams {
  project_name: string;
  project_root: string;
  built_assets_path: string;
  invalidate_cache: boolean;
}

export interface ConfigureDomainParams {
  project_name: string;
  domain_name: string;
  certificate_arn: string;
  hosted_zone_id?: string;
  create_route53_record: boolean;
}

export interface GetLogsParams {
  project_name: string;
  start_time?: string;
  end_time?: string;
  limit: number;
  filter_pattern?: string;
  log_group_name?: string;
  region?: string;
}

export interface GetMetricsParams {
  project_name: string;
  metric_names: string[];
  start_time?: string;
  end_time?: string;
  period: number;
  statistics: string[];
  region?: string;
}

const updateFrontendSchema = Joi.object<UpdateFrontendParams>({
  project_name: projectNameSchema,
  project_root: Joi.string().required(),
  built_assets_path: Joi.string().required(),
  invalidate_cache: Joi.boolean().default(true)
});

const configureDomainSchema = Joi.object<ConfigureDomainParams>({
  project_name: projectNameSchema,
  domain_name: Joi.string().domain().required().messages({
    'string.domain': 'Domain name must be a valid domain name'
  }),
  certificate_arn: Joi.string().pattern(/^arn:aws:acm:[a-z0-9-]+:\d{12}:certificate\/.+$/).required().messages({
    'string.pattern.base': 'certificate_arn must be an ACM certificate ARN'
  }),
  hosted_zone_id: Joi.string().optional(),
  create_route53_record: Joi.boolean().default(false)
});

const getLogsSchema = Joi.object<GetLogsParams>({
  project_name: projectNameSchema,
  start_time: Joi.string().isoDate().optional(),
  end_time: Joi.string().isoDate().optional(),
  limit: Joi.number().integer().min(1).max(10000).default(100),
  filter_pattern: Joi.string().optional(),
  log_group_name: Joi.string().optional(),
  region: regionSchema.optional()
});

const getMetricsSchema = Joi.object<GetMetricsParams>({
  project_name: projectNameSchema,
  metric_names: Joi.array().items(Joi.string()).min(1).required(),
  start_time: Joi.string().isoDate().optional(),
  end_time: Joi.string().isoDate().optional(),
  period: Joi.number().integer().min(1).default(60),
  statistics: Joi.array()
    .items(Joi.string().valid('Sum', 'Average', 'Minimum', 'Maximum', 'SampleCount'))
    .min(1)
    .default(['Sum']),
  region: regionSchema.optional()
});

function normalizeWith<T>(schema: Joi.ObjectSchema<T>, input: unknown, operation: string): T {
  const { error, value } = schema.validate(input, { abortEarly: false });
  if (error) {
    const details = error.details.map(detail => detail.message);
    throw new InvalidSpecError(`Invalid ${operation} parameters: ${details.join('; ')}`, details, {
      projectName: projectNameOf(input)
    });
  }
  return value;
}

export function normalizeUpdateFrontendParams(input: unknown): UpdateFrontendParams {
  return normalizeWith(updateFrontendSchema, input, 'update_frontend');
}

export function normalizeConfigureDomainParams(input: unknown): ConfigureDomainParams {
  return normalizeWith(configureDomainSchema, input, 'configure_domain');
}

export function normalizeGetLogsParams(input: unknown): GetLogsParams {
  return normalizeWith(getLogsSchema, input, 'get_logs');
}

export function normalizeGetMetricsParams(input: unknown): GetMetricsParams {
  return normalizeWith(getMetricsSchema, input, 'get_metrics');
}

// Tool configuration

const toolConfigSchema = Joi.object<ToolConfig>({
  aws: Joi.object({
    region: regionSchema.required(),
    profile: Joi.string().optional()
  }).required(),
  store: Joi.object({
    directory: Joi.string().required(),
    lockTimeoutMs: Joi.number().integer().min(0).required(),
    staleLockMs: Joi.number().integer().min(1).required()
  }).required(),
  deployment: Joi.object({
    timeoutMs: Joi.number().integer().min(1000).required(),
    pollIntervalMs: Joi.number().integer().min(1).required(),
    maxSubmitAttempts: Joi.number().integer().min(1).max(10).required(),
    retryBaseDelayMs: Joi.number().integer().min(0).required(),
    retryMaxDelayMs: Joi.number().integer().min(0).required(),
    artifactBucket: Joi.string().optional(),
    artifactBucketPrefix: Joi.string().pattern(/^[a-z0-9-]+$/).required()
  }).required(),
  capabilities: Joi.object({
    allowWrite: Joi.boolean().required(),
    allowSensitiveDataAccess: Joi.boolean().required()
  }).required(),
  logging: Joi.object({
    level: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent').required()
  }).required()
}).unknown(false);

export function validateToolConfig(config: unknown): ConfigValidationResult {
  const { error } = toolConfigSchema.validate(config, { abortEarly: false });
  if (error) {
    return { valid: false, errors: error.details.map(detail => detail.message) };
  }
  return { valid: true, errors: [] };
}

/**
 * @throws Error if validation fails
 */
export function validateAndNormalizeToolConfig(config: unknown): ToolConfig {
  const { error, value } = toolConfigSchema.validate(config, { abortEarly: false, convert: true });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return value;
}
