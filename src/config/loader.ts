// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import type { LevelWithSilent } from 'pino';
import { NormalizedDeploymentSpec } from '../types';
import { ConfigLoader, ConfigValidationResult, ToolConfig } from './types';
import {
  normalizeDeploymentSpec,
  validateAndNormalizeToolConfig,
  validateDeploymentSpec,
  validateToolConfig
} from './validator';

type PlainObject = Record<string, unknown>;

export const DEFAULT_TOOL_CONFIG: ToolConfig = {
  aws: {
    region: 'us-east-1'
  },
  store: {
    directory: join(homedir(), '.webapp-deployer', 'deployments'),
    lockTimeoutMs: 10_000,
    staleLockMs: 60_000
  },
  deployment: {
    timeoutMs: 30 * 60 * 1000,
    pollIntervalMs: 10_000,
    maxSubmitAttempts: 3,
    retryBaseDelayMs: 1_000,
    retryMaxDelayMs: 20_000,
    artifactBucketPrefix: 'webapp-deployer-artifacts'
  },
  capabilities: {
    allowWrite: false,
    allowSensitiveDataAccess: false
  },
  logging: {
    level: 'info'
  }
};

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Substitute environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
 */
export function substituteEnvironmentVariables(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
    const [varName, defaultValue] = varExpression.split(':-');
    const envValue = env[varName];

    if (envValue !== undefined) {
      return envValue;
    }

    if (defaultValue !== undefined) {
      return defaultValue;
    }

    // Unset and no default: keep the placeholder
    return match;
  });
}

/**
 * Recursively resolve environment variables in a parsed document
 */
export function resolveEnvironmentVariables(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return substituteEnvironmentVariables(value, env);
  }

  if (Array.isArray(value)) {
    return value.map(item => resolveEnvironmentVariables(item, env));
  }

  if (isPlainObject(value)) {
    const result: PlainObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveEnvironmentVariables(entry, env);
    }
    return result;
  }

  return value;
}

/**
 * Deep merge two objects, with the second object taking precedence
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Read a YAML or JSON document and substitute environment variables in it
 */
export async function readStructuredFile(path: string, env: NodeJS.ProcessEnv = process.env): Promise<unknown> {
  if (!existsSync(path)) {
    throw new Error(`Configuration file not found: ${path}`);
  }

  const content = await readFile(path, 'utf-8');

  let raw: unknown;
  if (path.endsWith('.json')) {
    raw = JSON.parse(content);
  } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
    raw = parseYaml(content);
  } else {
    throw new Error('Unsupported file format. Only .json, .yml, and .yaml files are supported.');
  }

  return resolveEnvironmentVariables(raw, env);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
  return LOG_LEVELS.find(level => level === value);
}

/**
 * Loads the deployer's own settings: defaults, then the file, then the
 * environment
 */
export class ToolConfigLoader implements ConfigLoader<ToolConfig> {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(path?: string): Promise<ToolConfig> {
    const configPath = path ?? this.env.WEBAPP_DEPLOYER_CONFIG;

    try {
      const fromFile = configPath ? await readStructuredFile(configPath, this.env) : {};
      if (!isPlainObject(fromFile)) {
        throw new Error('Configuration document must be a mapping');
      }

      const merged = deepMerge(deepMerge(this.defaults(), fromFile), this.environmentOverrides());
      return validateAndNormalizeToolConfig(merged);
    } catch (error) {
      const source = configPath ?? 'environment';
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration from ${source}: ${error.message}`);
      }
      throw new Error(`Failed to load configuration from ${source}: ${String(error)}`);
    }
  }

  validate(config: unknown): ConfigValidationResult {
    return validateToolConfig(config);
  }

  private defaults(): PlainObject {
    return {
      aws: { ...DEFAULT_TOOL_CONFIG.aws },
      store: { ...DEFAULT_TOOL_CONFIG.store },
      deployment: { ...DEFAULT_TOOL_CONFIG.deployment },
      capabilities: { ...DEFAULT_TOOL_CONFIG.capabilities },
      logging: { ...DEFAULT_TOOL_CONFIG.logging }
    };
  }

  private environmentOverrides(): PlainObject {
    return {
      aws: {
        region: this.env.AWS_REGION || this.env.AWS_DEFAULT_REGION || undefined,
        profile: this.env.AWS_PROFILE || undefined
      },
      store: {
        directory: this.env.WEBAPP_DEPLOYER_STORE_DIR || undefined
      },
      capabilities: {
        allowWrite: parseBoolean(this.env.WEBAPP_DEPLOYER_ALLOW_WRITE),
        allowSensitiveDataAccess: parseBoolean(this.env.WEBAPP_DEPLOYER_ALLOW_SENSITIVE_DATA_ACCESS)
      },
      logging: {
        level: parseLogLevel(this.env.LOG_LEVEL)
      }
    };
  }
}

/**
 * Loads a deployment spec file for the CLI
 */
export class DeploymentSpecLoader implements ConfigLoader<NormalizedDeploymentSpec> {
  constructor(
    private readonly defaultRegion?: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * A relative project_root is taken from the directory holding the file
   */
  async load(path: string): Promise<NormalizedDeploymentSpec> {
    const raw = await readStructuredFile(path, this.env);
    if (isPlainObject(raw) && typeof raw.project_root === 'string' && !isAbsolute(raw.project_root)) {
      return normalizeDeploymentSpec(
        { ...raw, project_root: resolve(dirname(path), raw.project_root) },
        { region: this.defaultRegion }
      );
    }
    return normalizeDeploymentSpec(raw, { region: this.defaultRegion });
  }

  validate(config: unknown): ConfigValidationResult {
    return validateDeploymentSpec(config);
  }
}

/**
 * Load tool configuration from WEBAPP_DEPLOYER_CONFIG (if set) and the environment
 */
export async function loadToolConfig(path?: string): Promise<ToolConfig> {
  return new ToolConfigLoader().load(path);
}
