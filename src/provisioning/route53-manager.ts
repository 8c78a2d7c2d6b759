import {
  Change,
  ChangeAction,
  ChangeResourceRecordSetsCommand,
  Route53Client,
  RRType
} from '@aws-sdk/client-route-53';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { toEngineError } from '../engine/error-classifier';
import { DnsManager } from './types';

/** Hosted zone of every CloudFront distribution, for alias targets */
export const CLOUDFRONT_HOSTED_ZONE_ID = 'Z2FDTNDATAQYW2';

function aliasChange(type: RRType, domainName: string, distributionDomain: string): Change {
  return {
    Action: ChangeAction.UPSERT,
    ResourceRecordSet: {
      Name: domainName,
      Type: type,
      AliasTarget: {
        HostedZoneId: CLOUDFRONT_HOSTED_ZONE_ID,
        DNSName: distributionDomain,
        EvaluateTargetHealth: false
      }
    }
  };
}

export class Route53Manager implements DnsManager {
  private readonly client: Route53Client;
  private readonly log: Logger;

  constructor(session: AwsSession, log: Logger = rootLogger) {
    this.client = new Route53Client(clientConfig(session, 'us-east-1'));
    this.log = log.child({ component: 'route53' });
  }

  /**
   * Point A and AAAA records for the domain at a distribution
   */
  async upsertAliasRecords(hostedZoneId: string, domainName: string, distributionDomain: string): Promise<string> {
    try {
      const result = await this.client.send(new ChangeResourceRecordSetsCommand({
        HostedZoneId: hostedZoneId,
        ChangeBatch: {
          Comment: `Alias ${domainName} to ${distributionDomain}`,
          Changes: [
            aliasChange(RRType.A, domainName, distributionDomain),
            aliasChange(RRType.AAAA, domainName, distributionDomain)
          ]
        }
      }));

      const changeId = result.ChangeInfo?.Id;
      if (!changeId) {
        throw new Error('ChangeResourceRecordSets returned no change id');
      }
      this.log.info({ hostedZoneId, domainName, changeId }, 'Upserted alias records');
      return changeId;
    } catch (error) {
      throw toEngineError(error, { operation: 'ChangeResourceRecordSets', stage: 'DNS_UPDATE' });
    }
  }
}
