import { execFile } from 'child_process';
import { promisify } from 'util';
import { chmod, mkdtemp, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { AwsSession, clientConfig } from '../lib/aws-session';
import { directoryDigest } from '../lib/digest';
import { logger as rootLogger, Logger } from '../lib/logger';
import { ResourceNamingService } from '../config/naming';
import { S3Manager } from '../provisioning/s3-manager';
import { PackagedArtifact, PackageRequest } from './types';
import { toEngineError } from './error-classifier';

const execFileAsync = promisify(execFile);

export type ZipDirectory = (sourceDir: string, outputFile: string) => Promise<void>;

/**
 * Zip with the system zip tool, keeping symlinks and file modes
 */
export const zipWithSystemTool: ZipDirectory = async (sourceDir, outputFile) => {
  await execFileAsync('zip', ['-q', '-r', '-y', outputFile, '.'], { cwd: sourceDir, maxBuffer: 16 * 1024 * 1024 });
};

export interface ArtifactPackagerOptions {
  /** Fixed artifact bucket; derived from account and region when absent */
  bucket?: string;
  bucketPrefix: string;
  zip?: ZipDirectory;
}

export class ArtifactPackager {
  private readonly sts: STSClient;
  private readonly zip: ZipDirectory;
  private readonly log: Logger;
  private resolvedBucket?: string;

  constructor(
    private readonly session: AwsSession,
    private readonly s3: S3Manager,
    private readonly options: ArtifactPackagerOptions,
    private readonly naming: ResourceNamingService = new ResourceNamingService(),
    log: Logger = rootLogger
  ) {
    this.sts = new STSClient(clientConfig(session));
    this.zip = options.zip ?? zipWithSystemTool;
    this.log = log.child({ component: 'artifact-packager' });
  }

  /**
   * Upload the artifacts directory as <project>/<digest>.zip. An object that
   * already exists under that key is reused.
   */
  async package(request: PackageRequest): Promise<PackagedArtifact> {
    if (request.startupScript) {
      await this.ensureExecutable(join(request.artifactsPath, request.startupScript));
    }

    const digest = directoryDigest(request.artifactsPath);
    const bucket = await this.artifactBucket();
    const key = `${request.projectName}/${digest}.zip`;

    try {
      if (await this.s3.objectExists(bucket, key)) {
        this.log.debug({ bucket, key }, 'Artifact already uploaded');
        return { bucket, key, digest, uploaded: false };
      }

      const workDir = await mkdtemp(join(tmpdir(), 'webapp-deployer-package-'));
      try {
        const zipFile = join(workDir, 'artifact.zip');
        await this.zip(request.artifactsPath, zipFile);
        await this.s3.uploadFile(bucket, key, zipFile, { contentType: 'application/zip' });
      } finally {
        await rm(workDir, { recursive: true, force: true });
      }
    } catch (error) {
      throw toEngineError(error, { operation: 'PackageArtifact', projectName: request.projectName, stage: 'SUBMITTING' });
    }

    this.log.info({ bucket, key }, 'Uploaded artifact');
    return { bucket, key, digest, uploaded: true };
  }

  async artifactBucket(): Promise<string> {
    if (this.resolvedBucket) {
      return this.resolvedBucket;
    }

    try {
      let bucket = this.options.bucket;
      if (!bucket) {
        const identity = await this.sts.send(new GetCallerIdentityCommand({}));
        if (!identity.Account) {
          throw new Error('GetCallerIdentity returned no account id');
        }
        bucket = this.naming.generateArtifactBucketName(this.options.bucketPrefix, identity.Account, this.session.region);
      }
      await this.s3.ensureBucket(bucket);
      this.resolvedBucket = bucket;
      return bucket;
    } catch (error) {
      throw toEngineError(error, { operation: 'EnsureArtifactBucket', stage: 'SUBMITTING' });
    }
  }

  private async ensureExecutable(scriptPath: string): Promise<void> {
    const info = await stat(scriptPath);
    if ((info.mode & 0o111) === 0) {
      this.log.warn({ scriptPath }, 'Startup script is not executable, setting mode 755');
      await chmod(scriptPath, 0o755);
    }
  }
}
