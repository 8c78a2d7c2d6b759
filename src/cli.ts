#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { DeploymentSpecLoader, loadToolConfig } from './config/loader';
import { isOperationAllowed, ToolOperation } from './config/capabilities';
import { ToolConfig } from './config/types';
import { createLogger } from './lib/logger';
import { createWebAppToolset, WebAppToolset } from './tools/webapp-toolset';
import { DEPLOYMENT_TYPES, DeploymentRecord, DeploymentSpec, DeploymentType } from './types';
import { InvalidSpecError, toStructuredError } from './errors';

interface GlobalOptions {
  config?: string;
  region?: string;
  profile?: string;
  allowWrite?: boolean;
  allowSensitiveDataAccess?: boolean;
}

function readVersion(): string {
  const content: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (content && typeof content === 'object' && 'version' in content && typeof content.version === 'string') {
    return content.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('webapp-deploy')
  .description('Deploy web applications to AWS Lambda, API Gateway and CloudFront')
  .version(readVersion())
  .option('-c, --config <path>', 'Path to the deployer configuration file')
  .option('-r, --region <region>', 'AWS region')
  .option('-p, --profile <profile>', 'AWS credentials profile')
  .option('--allow-write', 'Permit operations that change AWS resources')
  .option('--allow-sensitive-data-access', 'Permit reading application logs')
  .helpCommand(false);

async function loadConfig(): Promise<ToolConfig> {
  const options = program.opts<GlobalOptions>();
  const config = await loadToolConfig(options.config);
  return {
    ...config,
    aws: {
      region: options.region ?? config.aws.region,
      profile: options.profile ?? config.aws.profile
    },
    capabilities: {
      allowWrite: options.allowWrite === true || config.capabilities.allowWrite,
      allowSensitiveDataAccess: options.allowSensitiveDataAccess === true || config.capabilities.allowSensitiveDataAccess
    }
  };
}

interface CommandContext {
  config: ToolConfig;
  toolset: WebAppToolset;
}

/**
 * Gate the operation, then run it under a spinner. Failures print the
 * structured error and set a non-zero exit code.
 */
async function run(
  operation: ToolOperation,
  label: string,
  action: (context: CommandContext) => Promise<string | void>
): Promise<void> {
  const spinner = ora(label).start();
  try {
    const config = await loadConfig();
    const decision = isOperationAllowed(operation, config.capabilities);
    if (!decision.allowed) {
      spinner.fail(decision.reason);
      process.exitCode = 2;
      return;
    }

    const toolset = createWebAppToolset(config, {
      log: createLogger({ level: config.logging.level }),
      onStateChange: state => {
        spinner.text = `${label} (${state.toLowerCase()})`;
      }
    });
    const message = await action({ config, toolset });
    spinner.succeed(message ?? label);
  } catch (error) {
    spinner.fail(`${label} failed`);
    console.error(chalk.red(JSON.stringify(toStructuredError(error), null, 2)));
    process.exitCode = 1;
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function statusColor(status: string): string {
  switch (status) {
    case 'DEPLOYED':
      return chalk.green(status);
    case 'FAILED':
      return chalk.red(status);
    case 'IN_PROGRESS':
    case 'UPDATING':
      return chalk.yellow(status);
    default:
      return chalk.gray(status);
  }
}

function printRecord(record: DeploymentRecord): void {
  console.log(`${chalk.bold(record.projectName)} ${statusColor(record.status)} (${record.deploymentType}, ${record.region})`);
  const { apiEndpoint, websiteUrl, customDomain, functionName, distributionId } = record.resources;
  const rows: Array<[string, string | undefined]> = [
    ['API', apiEndpoint && chalk.underline(apiEndpoint)],
    ['Website', websiteUrl && chalk.underline(websiteUrl)],
    ['Domain', customDomain],
    ['Function', functionName],
    ['Distribution', distributionId]
  ];
  for (const [label, value] of rows) {
    if (value) {
      console.log(`  ${`${label}:`.padEnd(14)}${value}`);
    }
  }
  if (record.lastError) {
    console.log(chalk.red(`  ${'Last error:'.padEnd(14)}[${record.lastError.stage}] ${record.lastError.message}`));
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parseDeploymentType(value: string): DeploymentType {
  const type = DEPLOYMENT_TYPES.find(candidate => candidate === value);
  if (!type) {
    throw new InvalidSpecError(`Unknown deployment type ${value}; expected one of ${DEPLOYMENT_TYPES.join(', ')}`);
  }
  return type;
}

program
  .command('deploy')
  .description('Deploy or update a web application from a spec file')
  .requiredOption('-f, --file <path>', 'Deployment spec (YAML or JSON)')
  .option('--allow-destructive-type-change', 'Permit changing the deployment type of an existing project')
  .option('--dry-run', 'Validate the spec and print it without deploying')
  .action(async (options: { file: string; allowDestructiveTypeChange?: boolean; dryRun?: boolean }) => {
    await run('deploy_webapp', 'Deploying', async ({ config, toolset }) => {
      const spec = await new DeploymentSpecLoader(config.aws.region).load(resolve(options.file));
      if (options.dryRun) {
        printJson(spec);
        return `Spec for ${spec.project_name} is valid`;
      }
      const record = await toolset.deployWebapp(spec, {
        allowDestructiveTypeChange: options.allowDestructiveTypeChange === true
      });
      printRecord(record);
      return `Deployed ${record.projectName}`;
    });
  });

program
  .command('update-frontend <project>')
  .description('Publish new static assets to a deployed frontend')
  .requiredOption('--assets <path>', 'Built assets directory, relative to the project root')
  .option('--root <path>', 'Project root', process.cwd())
  .option('--no-invalidate', 'Skip the CDN cache invalidation')
  .action(async (project: string, options: { assets: string; root: string; invalidate: boolean }) => {
    await run('update_frontend', `Updating frontend of ${project}`, async ({ toolset }) => {
      const record = await toolset.updateFrontend({
        project_name: project,
        project_root: resolve(options.root),
        built_assets_path: options.assets,
        invalidate_cache: options.invalidate
      });
      printRecord(record);
      return `Frontend of ${project} updated`;
    });
  });

program
  .command('configure-domain <project>')
  .description('Attach a custom domain to a deployed frontend')
  .requiredOption('-d, --domain <name>', 'Domain name')
  .requiredOption('--certificate <arn>', 'ACM certificate ARN (us-east-1)')
  .option('--hosted-zone <id>', 'Route 53 hosted zone id')
  .option('--create-record', 'Create Route 53 alias records')
  .action(async (
    project: string,
    options: { domain: string; certificate: string; hostedZone?: string; createRecord?: boolean }
  ) => {
    await run('configure_domain', `Configuring ${options.domain}`, async ({ toolset }) => {
      const record = await toolset.configureDomain({
        project_name: project,
        domain_name: options.domain,
        certificate_arn: options.certificate,
        hosted_zone_id: options.hostedZone,
        create_route53_record: options.createRecord === true
      });
      printRecord(record);
      return `${options.domain} now serves ${project}`;
    });
  });

program
  .command('status <project>')
  .description('Show a deployment')
  .option('--refresh', 'Reconcile with the stack first')
  .option('--json', 'Print the full record')
  .action(async (project: string, options: { refresh?: boolean; json?: boolean }) => {
    await run('get_deployment', `Reading ${project}`, async ({ toolset }) => {
      const record = await toolset.getDeployment(project, { refresh: options.refresh === true });
      if (options.json) {
        printJson(record);
      } else {
        printRecord(record);
      }
    });
  });

program
  .command('list')
  .description('List recorded deployments')
  .option('-s, --status <status>', 'Only deployments in this status')
  .option('--sort-by <field>', 'projectName, type, status or lastUpdated')
  .option('--sort-order <order>', 'asc or desc')
  .option('-l, --limit <n>', 'Maximum number of deployments', value => Number.parseInt(value, 10))
  .action(async (options: { status?: string; sortBy?: string; sortOrder?: string; limit?: number }) => {
    await run('list_deployments', 'Listing deployments', async ({ toolset }) => {
      const summaries = await toolset.listDeployments(options);
      for (const summary of summaries) {
        console.log(`${summary.projectName.padEnd(32)} ${summary.type.padEnd(10)} ${statusColor(summary.status)} ${chalk.gray(summary.lastUpdated)}`);
      }
      return `${summaries.length} deployment(s)`;
    });
  });

program
  .command('destroy <project>')
  .description('Delete a deployment and all of its resources')
  .action(async (project: string) => {
    await run('delete_deployment', `Destroying ${project}`, async ({ toolset }) => {
      const result = await toolset.deleteDeployment(project);
      return `Deleted stack ${result.stackName} (${result.deletedObjects} website object(s) removed)`;
    });
  });

program
  .command('logs <project>')
  .description('Read function logs of a deployment')
  .option('--start <time>', 'ISO 8601 start time')
  .option('--end <time>', 'ISO 8601 end time')
  .option('-l, --limit <n>', 'Maximum number of events', value => Number.parseInt(value, 10))
  .option('--filter <pattern>', 'CloudWatch Logs filter pattern')
  .option('--log-group <name>', 'Log group to read instead of the recorded one')
  .action(async (
    project: string,
    options: { start?: string; end?: string; limit?: number; filter?: string; logGroup?: string }
  ) => {
    await run('get_logs', `Reading logs of ${project}`, async ({ toolset }) => {
      const result = await toolset.getLogs({
        project_name: project,
        start_time: options.start,
        end_time: options.end,
        limit: options.limit,
        filter_pattern: options.filter,
        log_group_name: options.logGroup
      });
      for (const event of result.events) {
        console.log(`${chalk.gray(event.timestampIso)} ${event.message.trimEnd()}`);
      }
      return `${result.events.length} event(s) from ${result.logGroupName}`;
    });
  });

program
  .command('metrics <project>')
  .description('Read CloudWatch metrics of a deployment')
  .option('-m, --metric <name>', 'Metric to read (repeatable)', collect)
  .option('--statistic <name>', 'Statistic to read (repeatable)', collect)
  .option('--start <time>', 'ISO 8601 start time')
  .option('--end <time>', 'ISO 8601 end time')
  .option('--period <seconds>', 'Aggregation period', value => Number.parseInt(value, 10))
  .action(async (
    project: string,
    options: { metric?: string[]; statistic?: string[]; start?: string; end?: string; period?: number }
  ) => {
    await run('get_metrics', `Reading metrics of ${project}`, async ({ toolset }) => {
      const result = await toolset.getMetrics({
        project_name: project,
        metric_names: options.metric ?? ['invocations', 'errors'],
        statistics: options.statistic,
        start_time: options.start,
        end_time: options.end,
        period: options.period
      });
      printJson(result);
      return `${result.metrics.length} series from ${result.namespace}`;
    });
  });

program
  .command('help [type]')
  .description('Explain deployment types and the workflow')
  .action(async (type: string | undefined) => {
    await run('deployment_help', 'Deployment help', async ({ toolset }) => {
      printJson(toolset.deploymentHelp(type));
    });
  });

program
  .command('iac [tool]')
  .description('Compare infrastructure-as-code tools')
  .action(async (tool: string | undefined) => {
    await run('iac_guidance', 'IaC guidance', async ({ toolset }) => {
      printJson(toolset.iacGuidance(tool));
    });
  });

program
  .command('init')
  .description('Write a starter deployment spec')
  .option('-t, --type <type>', 'backend, frontend or fullstack', 'fullstack')
  .option('-n, --name <name>', 'Project name', 'my-app')
  .option('-o, --output <path>', 'Output file', 'deploy.yml')
  .option('--force', 'Overwrite an existing file')
  .action((options: { type: string; name: string; output: string; force?: boolean }) => {
    const spinner = ora('Writing deployment spec').start();
    try {
      const type = parseDeploymentType(options.type);
      if (existsSync(options.output) && !options.force) {
        throw new InvalidSpecError(`${options.output} already exists; pass --force to overwrite it`);
      }

      const spec: DeploymentSpec = { project_name: options.name, deployment_type: type, project_root: '.' };
      if (type !== 'frontend') {
        spec.backend_configuration = {
          built_artifacts_path: 'dist',
          runtime: 'nodejs20.x',
          port: 3000,
          startup_script: 'run.sh',
          memory_size: 512,
          timeout: 30
        };
      }
      if (type !== 'backend') {
        spec.frontend_configuration = { built_assets_path: 'build', index_document: 'index.html' };
      }

      writeFileSync(options.output, stringifyYaml(spec));
      spinner.succeed(`Deployment spec written to ${options.output}`);
      console.log(`Review it, then run ${chalk.cyan(`webapp-deploy --allow-write deploy -f ${options.output}`)}`);
    } catch (error) {
      spinner.fail('init failed');
      console.error(chalk.red(JSON.stringify(toStructuredError(error), null, 2)));
      process.exitCode = 1;
    }
  });

program.on('command:*', () => {
  console.error(chalk.red('Invalid command. See --help for available commands.'));
  process.exitCode = 1;
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(JSON.stringify(toStructuredError(error), null, 2)));
  process.exitCode = 1;
});
