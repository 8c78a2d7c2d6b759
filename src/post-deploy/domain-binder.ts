import { DeploymentRecord, FailureStage } from '../types';
import { CertificateNotReadyError, InvalidSpecError, NotFoundError } from '../errors';
import { ConfigureDomainParams } from '../config/validator';
import { certificateCoversDomain, certificateRegion } from '../provisioning/acm-manager';
import { CdnManager, CertificateInspector, DnsManager } from '../provisioning/types';
import { RecordStore } from '../store/record-store';
import { assertTransition } from '../store/status-transitions';
import { failureFrom, markFailed } from '../orchestration/record-helpers';
import { logger as rootLogger, Logger } from '../lib/logger';

const CLOUDFRONT_CERTIFICATE_REGION = 'us-east-1';

export interface DomainBinderDependencies {
  store: RecordStore;
  certificates: CertificateInspector;
  cdn: CdnManager;
  dns: DnsManager;
  log?: Logger;
}

/**
 * Attaches a custom domain to the distribution of a live deployment
 */
export class DomainBinder {
  private readonly store: RecordStore;
  private readonly certificates: CertificateInspector;
  private readonly cdn: CdnManager;
  private readonly dns: DnsManager;
  private readonly log: Logger;

  constructor(deps: DomainBinderDependencies) {
    this.store = deps.store;
    this.certificates = deps.certificates;
    this.cdn = deps.cdn;
    this.dns = deps.dns;
    this.log = (deps.log ?? rootLogger).child({ component: 'domain-binder' });
  }

  /**
   * @throws CertificateNotReadyError when the certificate is not ISSUED; the
   * distribution is left alone
   */
  async configureDomain(params: ConfigureDomainParams): Promise<DeploymentRecord> {
    const projectName = params.project_name;
    const existing = await this.store.get(projectName);
    const distributionId = existing?.resources.distributionId;
    if (!existing || existing.status !== 'DEPLOYED' || !distributionId) {
      throw new NotFoundError(`No deployed distribution found for ${projectName}`, { projectName });
    }

    if (params.create_route53_record && !params.hosted_zone_id) {
      throw new InvalidSpecError('hosted_zone_id is required when create_route53_record is set', [], { projectName });
    }

    const region = certificateRegion(params.certificate_arn);
    if (region !== CLOUDFRONT_CERTIFICATE_REGION) {
      throw new InvalidSpecError(
        `Certificate ${params.certificate_arn} is in ${region}; CloudFront only accepts certificates from ${CLOUDFRONT_CERTIFICATE_REGION}`,
        [],
        { projectName, stage: 'CERTIFICATE_CHECK' }
      );
    }

    const certificate = await this.certificates.describeCertificate(params.certificate_arn);
    if (certificate.status !== 'ISSUED') {
      throw new CertificateNotReadyError(params.certificate_arn, certificate.status, { projectName });
    }
    const names = [certificate.domainName, ...certificate.subjectAlternativeNames].filter(
      (name): name is string => name !== undefined
    );
    if (!certificateCoversDomain(params.domain_name, names)) {
      throw new InvalidSpecError(
        `Certificate ${params.certificate_arn} does not cover ${params.domain_name}`,
        [`Certificate names: ${names.join(', ')}`],
        { projectName, stage: 'CERTIFICATE_CHECK' }
      );
    }

    const log = this.log.child({ projectName, distributionId, domainName: params.domain_name });
    await this.store.update(projectName, current => {
      if (!current) {
        throw new NotFoundError(`No deployed distribution found for ${projectName}`, { projectName });
      }
      assertTransition(projectName, current.status, 'UPDATING');
      return { ...current, status: 'UPDATING', updatedAt: new Date().toISOString() };
    });

    let stage: FailureStage = 'DISTRIBUTION_UPDATE';
    try {
      const binding = await this.cdn.bindAlias(distributionId, params.domain_name, params.certificate_arn);
      log.info({ aliases: binding.aliases }, 'Bound domain to distribution');

      let dnsChangeId: string | undefined;
      if (params.create_route53_record && params.hosted_zone_id) {
        stage = 'DNS_UPDATE';
        dnsChangeId = await this.dns.upsertAliasRecords(
          params.hosted_zone_id,
          params.domain_name,
          binding.distributionDomain
        );
      }

      stage = 'STORAGE';
      return await this.store.update(projectName, current => {
        if (!current) {
          throw new NotFoundError(`Deployment record ${projectName} disappeared during the update`, { projectName });
        }
        assertTransition(projectName, current.status, 'DEPLOYED');
        return {
          ...current,
          status: 'DEPLOYED',
          resources: {
            ...current.resources,
            customDomain: params.domain_name,
            certificateArn: params.certificate_arn,
            distributionDomain: binding.distributionDomain,
            websiteUrl: `https://${params.domain_name}`,
            dnsChangeId: dnsChangeId ?? current.resources.dnsChangeId
          },
          updatedAt: new Date().toISOString()
        };
      });
    } catch (error) {
      log.error({ err: error }, 'Domain configuration failed');
      await markFailed(this.store, projectName, failureFrom(error, stage), log);
      throw error;
    }
  }
}
