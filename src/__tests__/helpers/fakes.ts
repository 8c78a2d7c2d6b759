import { DeploymentEngine, PackagedArtifact, PackageRequest, StackOutcome, StackResult } from '../../engine/types';
import { Template } from '../../templates/types';
import {
  AliasBinding,
  AssetPublisher,
  CdnManager,
  CertificateDetails,
  CertificateInspector,
  DnsManager,
  PublishOptions,
  PublishResult
} from '../../provisioning/types';
import { directoryDigest, listFilesRecursively, toPosixRelative } from '../../lib/digest';

export function stackResult(
  stackName: string,
  outcome: StackOutcome,
  outputs: Record<string, string> = {},
  extra: Partial<StackResult> = {}
): StackResult {
  return {
    stackName,
    outcome,
    stackStatus: outcome === 'SUCCEEDED' ? 'CREATE_COMPLETE' : undefined,
    outputs,
    resourceIds: {},
    rawEvents: [],
    ...extra
  };
}

export interface DeployCall {
  template: Template;
  stackName: string;
  parameters: Record<string, string>;
}

/**
 * Engine that answers from queued results. Without a queued result a deploy
 * succeeds with the current outputs.
 */
export class FakeEngine implements DeploymentEngine {
  outputs: Record<string, string> = {};
  deployResults: Array<StackResult | Error> = [];
  describeResult: StackResult | Error = stackResult('unknown', 'NOT_FOUND');
  deleteResult: StackResult | Error = stackResult('unknown', 'NOT_FOUND');

  readonly packageCalls: PackageRequest[] = [];
  readonly deployCalls: DeployCall[] = [];
  readonly describeCalls: string[] = [];
  readonly deleteCalls: string[] = [];

  async package(request: PackageRequest): Promise<PackagedArtifact> {
    this.packageCalls.push(request);
    return {
      bucket: 'artifact-bucket',
      key: `${request.projectName}/digest.zip`,
      digest: 'digest',
      uploaded: true
    };
  }

  async deploy(template: Template, stackName: string, parameters: Record<string, string>): Promise<StackResult> {
    this.deployCalls.push({ template, stackName, parameters });
    const next = this.deployResults.shift() ?? stackResult(stackName, 'SUCCEEDED', { ...this.outputs });
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  async describe(stackName: string): Promise<StackResult> {
    this.describeCalls.push(stackName);
    if (this.describeResult instanceof Error) {
      throw this.describeResult;
    }
    return this.describeResult;
  }

  async delete(stackName: string): Promise<StackResult> {
    this.deleteCalls.push(stackName);
    if (this.deleteResult instanceof Error) {
      throw this.deleteResult;
    }
    return this.deleteResult;
  }
}

export interface PublishCall {
  bucketName: string;
  localPath: string;
  options: PublishOptions;
}

export class FakeAssetPublisher implements AssetPublisher {
  readonly publishCalls: PublishCall[] = [];
  readonly emptied: string[] = [];
  objectCount = 0;
  failWith?: Error;

  async publishDirectory(bucketName: string, localPath: string, options: PublishOptions = {}): Promise<PublishResult> {
    this.publishCalls.push({ bucketName, localPath, options });
    if (this.failWith) {
      throw this.failWith;
    }
    const keys = listFilesRecursively(localPath).map(file => toPosixRelative(localPath, file));
    return { digest: directoryDigest(localPath), uploaded: keys.length, deleted: 0, keys };
  }

  async emptyBucket(bucketName: string): Promise<number> {
    this.emptied.push(bucketName);
    return this.objectCount;
  }
}

export class FakeCdn implements CdnManager {
  readonly invalidations: Array<{ distributionId: string; paths: string[] }> = [];
  readonly bindings: Array<{ distributionId: string; domainName: string; certificateArn: string }> = [];
  distributionDomain = 'd111111abcdef8.cloudfront.net';
  failWith?: Error;

  async invalidate(distributionId: string, paths: string[]): Promise<string> {
    this.invalidations.push({ distributionId, paths });
    return `INV${this.invalidations.length}`;
  }

  async bindAlias(distributionId: string, domainName: string, certificateArn: string): Promise<AliasBinding> {
    this.bindings.push({ distributionId, domainName, certificateArn });
    if (this.failWith) {
      throw this.failWith;
    }
    return { distributionId, distributionDomain: this.distributionDomain, aliases: [domainName] };
  }
}

export class FakeCertificates implements CertificateInspector {
  readonly described: string[] = [];

  constructor(public certificate: Omit<CertificateDetails, 'arn'>) {}

  async describeCertificate(certificateArn: string): Promise<CertificateDetails> {
    this.described.push(certificateArn);
    return { arn: certificateArn, ...this.certificate };
  }
}

export class FakeDns implements DnsManager {
  readonly upserts: Array<{ hostedZoneId: string; domainName: string; distributionDomain: string }> = [];

  async upsertAliasRecords(hostedZoneId: string, domainName: string, distributionDomain: string): Promise<string> {
    this.upserts.push({ hostedZoneId, domainName, distributionDomain });
    return '/change/C1';
  }
}
