import {
  CloudFrontClient,
  CreateInvalidationCommand,
  DistributionConfig,
  GetDistributionConfigCommand,
  UpdateDistributionCommand
} from '@aws-sdk/client-cloudfront';
import { v4 as uuidv4 } from 'uuid';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { toEngineError } from '../engine/error-classifier';
import { AliasBinding, CdnManager } from './types';

// CloudFront is a global service served from us-east-1
const CLOUDFRONT_REGION = 'us-east-1';

export class CloudFrontManager implements CdnManager {
  private readonly client: CloudFrontClient;
  private readonly log: Logger;

  constructor(session: AwsSession, log: Logger = rootLogger) {
    this.client = new CloudFrontClient(clientConfig(session, CLOUDFRONT_REGION));
    this.log = log.child({ component: 'cloudfront' });
  }

  async invalidate(distributionId: string, paths: string[]): Promise<string> {
    try {
      const result = await this.client.send(new CreateInvalidationCommand({
        DistributionId: distributionId,
        InvalidationBatch: {
          CallerReference: uuidv4(),
          Paths: { Quantity: paths.length, Items: paths }
        }
      }));

      const invalidationId = result.Invalidation?.Id;
      if (!invalidationId) {
        throw new Error('CreateInvalidation returned no invalidation id');
      }
      this.log.info({ distributionId, invalidationId, paths }, 'Created invalidation');
      return invalidationId;
    } catch (error) {
      throw toEngineError(error, { operation: 'CreateInvalidation', stage: 'INVALIDATING' });
    }
  }

  /**
   * Add a domain to the distribution's aliases and serve it with the given
   * ACM certificate. Existing aliases are kept.
   */
  async bindAlias(distributionId: string, domainName: string, certificateArn: string): Promise<AliasBinding> {
    try {
      const { DistributionConfig: current, ETag } = await this.client.send(
        new GetDistributionConfigCommand({ Id: distributionId })
      );
      if (!current || !ETag) {
        throw new Error(`Distribution ${distributionId} returned no configuration`);
      }

      const aliases = mergeAliases(current.Aliases?.Items ?? [], domainName);
      const updated: DistributionConfig = {
        ...current,
        Aliases: { Quantity: aliases.length, Items: aliases },
        ViewerCertificate: {
          ACMCertificateArn: certificateArn,
          SSLSupportMethod: 'sni-only',
          MinimumProtocolVersion: 'TLSv1.2_2021',
          CloudFrontDefaultCertificate: false
        }
      };

      const result = await this.client.send(new UpdateDistributionCommand({
        Id: distributionId,
        IfMatch: ETag,
        DistributionConfig: updated
      }));

      const distributionDomain = result.Distribution?.DomainName;
      if (!distributionDomain) {
        throw new Error('UpdateDistribution returned no domain name');
      }

      this.log.info({ distributionId, aliases }, 'Updated distribution aliases');
      return { distributionId, distributionDomain, aliases };
    } catch (error) {
      throw toEngineError(error, { operation: 'UpdateDistribution', stage: 'DISTRIBUTION_UPDATE' });
    }
  }
}

export function mergeAliases(existing: string[], domainName: string): string[] {
  const wanted = domainName.toLowerCase();
  return existing.some(alias => alias.toLowerCase() === wanted) ? [...existing] : [...existing, domainName];
}
