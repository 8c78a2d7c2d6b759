import { existsSync, readdirSync } from 'fs';
import { isAbsolute, join } from 'path';
import { CloudFormationGenerator, CODE_BUCKET_PARAMETER, CODE_KEY_PARAMETER } from './cloudformation-generator';
import { DeploymentSpec, NormalizedDeploymentSpec } from '../types';
import { CloudFormationTemplate, Template, TemplateGenerator } from './types';
import { normalizeDeploymentSpec } from '../config/validator';
import { ResourceNamingService } from '../config/naming';
import { InvalidSpecError } from '../errors';
import { logger as rootLogger, Logger } from '../lib/logger';
import { isDirectory } from '../lib/digest';

export interface SynthesizeOptions {
  /** Region used when the spec names none */
  defaultRegion?: string;
}

/**
 * Whether the artifacts directory already carries the runtime's third-party
 * dependencies
 */
export function hasInstalledDependencies(artifactsPath: string, runtime: string): boolean {
  if (runtime.startsWith('nodejs')) {
    return existsSync(join(artifactsPath, 'node_modules'));
  }

  if (runtime.startsWith('python')) {
    if (['site-packages', '.venv', 'dist-packages'].some(dir => existsSync(join(artifactsPath, dir)))) {
      return true;
    }
    // pip install -t . leaves *.dist-info directories beside the code
    return readdirSync(artifactsPath).some(entry => entry.endsWith('.dist-info'));
  }

  if (runtime.startsWith('ruby')) {
    return existsSync(join(artifactsPath, 'vendor', 'bundle'));
  }

  return true;
}

export function dependencyInstallInstructions(artifactsPath: string, runtime: string): string {
  if (runtime.startsWith('nodejs')) {
    return `1. Copy package.json to ${artifactsPath}\n2. Run 'npm install --omit=dev' in ${artifactsPath}`;
  }
  if (runtime.startsWith('python')) {
    return `1. Copy requirements.txt to ${artifactsPath}\n2. Run 'pip install -r requirements.txt -t .' in ${artifactsPath}`;
  }
  if (runtime.startsWith('ruby')) {
    return `1. Copy Gemfile to ${artifactsPath}\n2. Run 'bundle install' in ${artifactsPath}`;
  }
  return `Install all required dependencies in ${artifactsPath}`;
}

export class TemplateEngine {
  private readonly log: Logger;

  constructor(
    private readonly generator: TemplateGenerator = new CloudFormationGenerator(),
    private readonly naming: ResourceNamingService = new ResourceNamingService(),
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'template-engine' });
  }

  /**
   * Turn a deployment spec into a stack template. The output depends on the
   * spec alone.
   * @throws InvalidSpecError when the spec is invalid or its paths are unusable
   */
  synthesize(spec: DeploymentSpec, options: SynthesizeOptions = {}): Template {
    const normalized = normalizeDeploymentSpec(spec, { region: options.defaultRegion });

    this.checkPaths(normalized);

    const document = this.generator.generate(normalized);
    this.validateTemplate(document);

    const stackName = this.naming.generateStackName(normalized.project_name);
    const parameters = [CODE_BUCKET_PARAMETER, CODE_KEY_PARAMETER]
      .filter(name => name in document.Parameters);

    this.log.debug(
      { projectName: normalized.project_name, stackName, resources: Object.keys(document.Resources).length },
      'Synthesized template'
    );

    return {
      stackName,
      projectName: normalized.project_name,
      deploymentType: normalized.deployment_type,
      body: JSON.stringify(document, null, 2),
      document,
      resourceOrder: Object.keys(document.Resources),
      parameters,
      capabilities: parameters.length > 0 ? ['CAPABILITY_IAM'] : [],
      spec: normalized
    };
  }

  /**
   * Structural checks on a generated document
   * @throws Error naming the first problem found
   */
  validateTemplate(document: CloudFormationTemplate): void {
    if (!document.AWSTemplateFormatVersion) {
      throw new Error('CloudFormation template validation failed: Missing AWSTemplateFormatVersion');
    }

    if (Object.keys(document.Resources).length === 0) {
      throw new Error('CloudFormation template validation failed: Template must contain at least one resource');
    }

    for (const [resourceName, resource] of Object.entries(document.Resources)) {
      if (!resource.Type) {
        throw new Error(`CloudFormation template validation failed: Resource ${resourceName} missing Type property`);
      }
    }
  }

  private checkPaths(spec: NormalizedDeploymentSpec): void {
    const fail = (message: string, details: string[] = []): never => {
      throw new InvalidSpecError(message, details, { projectName: spec.project_name });
    };

    if (!isDirectory(spec.project_root)) {
      fail(`Project root ${spec.project_root} does not exist or is not a directory`);
    }

    const backend = spec.backend_configuration;
    if (backend && spec.deployment_type !== 'frontend') {
      const artifactsPath = backend.built_artifacts_path;
      if (!isDirectory(artifactsPath)) {
        fail(`Built artifacts path ${artifactsPath} does not exist or is not a directory`);
      }

      if (isAbsolute(backend.startup_script)) {
        fail('Startup script must be relative to built_artifacts_path, not an absolute path');
      }
      const scriptPath = join(artifactsPath, backend.startup_script);
      if (!existsSync(scriptPath)) {
        fail(
          `Startup script not found at ${scriptPath}. ` +
          'The startup script should be specified as a path relative to built_artifacts_path.'
        );
      }

      if (!hasInstalledDependencies(artifactsPath, backend.runtime)) {
        const instructions = dependencyInstallInstructions(artifactsPath, backend.runtime);
        fail(
          `Dependencies are not installed in ${artifactsPath} for runtime ${backend.runtime}.\n${instructions}`,
          [instructions]
        );
      }
    }

    const frontend = spec.frontend_configuration;
    if (frontend && spec.deployment_type !== 'backend') {
      if (!isDirectory(frontend.built_assets_path)) {
        fail(`Built assets path ${frontend.built_assets_path} does not exist or is not a directory`);
      }
    }
  }
}
