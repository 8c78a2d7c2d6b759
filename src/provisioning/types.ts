// Provisioning-specific types

export interface PublishOptions {
  /** Key prefix inside the bucket */
  prefix?: string;
  /** Delete objects that are not part of the published directory */
  prune?: boolean;
}

export interface PublishResult {
  digest: string;
  uploaded: number;
  deleted: number;
  keys: string[];
}

/** Static-asset storage behind the distribution */
export interface AssetPublisher {
  publishDirectory(bucketName: string, localPath: string, options?: PublishOptions): Promise<PublishResult>;
  emptyBucket(bucketName: string): Promise<number>;
}

export interface AliasBinding {
  distributionId: string;
  /** The distribution's own domain, e.g. d111111abcdef8.cloudfront.net */
  distributionDomain: string;
  aliases: string[];
}

/** CDN operations on an existing distribution */
export interface CdnManager {
  /** @returns the invalidation id */
  invalidate(distributionId: string, paths: string[]): Promise<string>;
  bindAlias(distributionId: string, domainName: string, certificateArn: string): Promise<AliasBinding>;
}

export interface CertificateDetails {
  arn: string;
  status: string;
  domainName?: string;
  subjectAlternativeNames: string[];
  region: string;
}

export interface CertificateInspector {
  describeCertificate(certificateArn: string): Promise<CertificateDetails>;
}

export interface DnsManager {
  /** @returns the Route 53 change id */
  upsertAliasRecords(hostedZoneId: string, domainName: string, distributionDomain: string): Promise<string>;
}
