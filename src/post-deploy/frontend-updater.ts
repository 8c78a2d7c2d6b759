import { resolve } from 'path';
import { DeploymentRecord, FailureStage } from '../types';
import { InvalidSpecError, NotFoundError } from '../errors';
import { UpdateFrontendParams } from '../config/validator';
import { toEngineError } from '../engine/error-classifier';
import { AssetPublisher, CdnManager } from '../provisioning/types';
import { RecordStore } from '../store/record-store';
import { assertTransition } from '../store/status-transitions';
import { failureFrom, markFailed } from '../orchestration/record-helpers';
import { isDirectory } from '../lib/digest';
import { logger as rootLogger, Logger } from '../lib/logger';

export interface FrontendUpdaterDependencies {
  store: RecordStore;
  assets: AssetPublisher;
  cdn: CdnManager;
  log?: Logger;
}

/**
 * Re-publishes static assets of a live deployment without touching its stack
 */
export class FrontendUpdater {
  private readonly store: RecordStore;
  private readonly assets: AssetPublisher;
  private readonly cdn: CdnManager;
  private readonly log: Logger;

  constructor(deps: FrontendUpdaterDependencies) {
    this.store = deps.store;
    this.assets = deps.assets;
    this.cdn = deps.cdn;
    this.log = (deps.log ?? rootLogger).child({ component: 'frontend-updater' });
  }

  async updateFrontend(params: UpdateFrontendParams): Promise<DeploymentRecord> {
    const projectName = params.project_name;
    const existing = await this.store.get(projectName);
    const bucketName = existing?.resources.bucketName;
    if (!existing || existing.status !== 'DEPLOYED' || !bucketName) {
      throw new NotFoundError(`No deployed frontend found for ${projectName}`, { projectName });
    }

    const assetsPath = resolve(params.project_root, params.built_assets_path);
    if (!isDirectory(assetsPath)) {
      throw new InvalidSpecError(`Built assets path ${assetsPath} does not exist or is not a directory`, [], {
        projectName
      });
    }

    const log = this.log.child({ projectName, bucketName });
    await this.store.update(projectName, current => {
      if (!current) {
        throw new NotFoundError(`No deployed frontend found for ${projectName}`, { projectName });
      }
      assertTransition(projectName, current.status, 'UPDATING');
      return { ...current, status: 'UPDATING', updatedAt: new Date().toISOString() };
    });

    let stage: FailureStage = 'PUBLISHING';
    try {
      // Old hashed assets stay in place for pages that still reference them
      const published = await this.assets.publishDirectory(bucketName, assetsPath).catch((error: unknown) => {
        throw toEngineError(error, { operation: 'PublishAssets', stage: 'PUBLISHING', projectName });
      });
      log.info({ uploaded: published.uploaded }, 'Published assets');

      let invalidationId: string | undefined;
      const distributionId = existing.resources.distributionId;
      if (params.invalidate_cache && distributionId) {
        stage = 'INVALIDATING';
        invalidationId = await this.cdn.invalidate(distributionId, ['/*']);
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
            assetDigest: published.digest,
            lastInvalidationId: invalidationId ?? current.resources.lastInvalidationId
          },
          updatedAt: new Date().toISOString()
        };
      });
    } catch (error) {
      log.error({ err: error }, 'Frontend update failed');
      await markFailed(this.store, projectName, failureFrom(error, stage), log);
      throw error;
    }
  }
}
