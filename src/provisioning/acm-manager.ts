import { ACMClient, DescribeCertificateCommand } from '@aws-sdk/client-acm';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { logger as rootLogger, Logger } from '../lib/logger';
import { toEngineError } from '../engine/error-classifier';
import { InvalidSpecError } from '../errors';
import { CertificateDetails, CertificateInspector } from './types';

/** Region segment of arn:aws:acm:<region>:<account>:certificate/<id> */
export function certificateRegion(certificateArn: string): string {
  const region = certificateArn.split(':')[3];
  if (!certificateArn.startsWith('arn:aws:acm:') || !region) {
    throw new InvalidSpecError(`${certificateArn} is not an ACM certificate ARN`);
  }
  return region;
}

/**
 * Whether a certificate name covers the domain, either exactly or through a
 * wildcard for one label (*.example.com covers www.example.com, not example.com)
 */
export function certificateCoversDomain(domainName: string, certificateNames: string[]): boolean {
  const domain = domainName.toLowerCase();
  return certificateNames.some(name => {
    const candidate = name.toLowerCase();
    if (candidate === domain) {
      return true;
    }
    if (candidate.startsWith('*.')) {
      const dot = domain.indexOf('.');
      return dot > 0 && domain.slice(dot + 1) === candidate.slice(2);
    }
    return false;
  });
}

export class AcmManager implements CertificateInspector {
  private readonly clients = new Map<string, ACMClient>();
  private readonly log: Logger;

  constructor(private readonly session: AwsSession, log: Logger = rootLogger) {
    this.log = log.child({ component: 'acm' });
  }

  /**
   * Describe a certificate in the region its ARN names
   */
  async describeCertificate(certificateArn: string): Promise<CertificateDetails> {
    const region = certificateRegion(certificateArn);

    try {
      const { Certificate } = await this.client(region).send(
        new DescribeCertificateCommand({ CertificateArn: certificateArn })
      );
      if (!Certificate) {
        throw new Error(`Certificate ${certificateArn} returned no details`);
      }

      const details: CertificateDetails = {
        arn: certificateArn,
        status: Certificate.Status ?? 'UNKNOWN',
        domainName: Certificate.DomainName,
        subjectAlternativeNames: Certificate.SubjectAlternativeNames ?? [],
        region
      };
      this.log.debug({ certificateArn, status: details.status }, 'Described certificate');
      return details;
    } catch (error) {
      throw toEngineError(error, { operation: 'DescribeCertificate', stage: 'CERTIFICATE_CHECK' });
    }
  }

  private client(region: string): ACMClient {
    let client = this.clients.get(region);
    if (!client) {
      client = new ACMClient(clientConfig(this.session, region));
      this.clients.set(region, client);
    }
    return client;
  }
}
