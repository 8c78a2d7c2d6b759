import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { HeadBucketCommand, HeadObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { ArtifactPackager } from '../artifact-packager';
import { S3Manager } from '../../provisioning/s3-manager';
import { directoryDigest } from '../../lib/digest';
import { EngineError } from '../../errors';
import { awsError, sentInputs } from '../../__tests__/helpers/aws-sdk';

const mocks = vi.hoisted(() => ({ s3Send: vi.fn(), stsSend: vi.fn() }));

vi.mock('@aws-sdk/client-s3', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-s3')>()),
  S3Client: class {
    send = mocks.s3Send;
  }
}));

vi.mock('@aws-sdk/client-sts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-sts')>()),
  STSClient: class {
    send = mocks.stsSend;
  }
}));

const session = { region: 'us-east-1' };
const BUCKET = 'webapp-deployer-artifacts-123456789012-us-east-1';

describe('ArtifactPackager', () => {
  let artifactsPath: string;
  const zip = vi.fn(async (_sourceDir: string, outputFile: string) => {
    await writeFile(outputFile, 'zip-bytes');
  });

  beforeEach(() => {
    mocks.s3Send.mockReset();
    mocks.stsSend.mockReset();
    zip.mockClear();
    artifactsPath = mkdtempSync(join(tmpdir(), 'webapp-deployer-artifacts-'));
    writeFileSync(join(artifactsPath, 'index.js'), 'console.log("hi")');
    writeFileSync(join(artifactsPath, 'run.sh'), '#!/bin/sh\nexec node index.js\n', { mode: 0o644 });
    mocks.stsSend.mockResolvedValue({ Account: '123456789012' });
  });

  afterEach(() => {
    rmSync(artifactsPath, { recursive: true, force: true });
  });

  function packager(bucket?: string): ArtifactPackager {
    return new ArtifactPackager(session, new S3Manager(session), {
      bucket,
      bucketPrefix: 'webapp-deployer-artifacts',
      zip
    });
  }

  it('should zip and upload new artifacts under the project and digest', async () => {
    mocks.s3Send
      .mockResolvedValueOnce({})
      .mockRejectedValueOnce(awsError('NotFound', 'Not Found', 404))
      .mockResolvedValueOnce({ ETag: '"etag"' });

    const result = await packager().package({ projectName: 'api1', artifactsPath, startupScript: 'run.sh' });
    const digest = directoryDigest(artifactsPath);

    expect(result).toEqual({ bucket: BUCKET, key: `api1/${digest}.zip`, digest, uploaded: true });
    expect(sentInputs(mocks.s3Send, HeadBucketCommand)).toEqual([{ Bucket: BUCKET }]);
    expect(zip).toHaveBeenCalledTimes(1);
    expect(zip.mock.calls[0][0]).toBe(artifactsPath);

    const [put] = sentInputs(mocks.s3Send, PutObjectCommand);
    expect(put.Bucket).toBe(BUCKET);
    expect(put.Key).toBe(`api1/${digest}.zip`);
    expect(put.ContentType).toBe('application/zip');
    expect(String(put.Body)).toBe('zip-bytes');
  });

  it('should make the startup script executable', async () => {
    mocks.s3Send
      .mockResolvedValueOnce({})
      .mockResolvedValueOnce({});

    await packager().package({ projectName: 'api1', artifactsPath, startupScript: 'run.sh' });

    expect(statSync(join(artifactsPath, 'run.sh')).mode & 0o777).toBe(0o755);
  });

  it('should reuse an artifact that was already uploaded', async () => {
    mocks.s3Send
      .mockResolvedValueOnce({})
      .mockResolvedValueOnce({});

    const result = await packager().package({ projectName: 'api1', artifactsPath });

    expect(result.uploaded).toBe(false);
    expect(zip).not.toHaveBeenCalled();
    expect(sentInputs(mocks.s3Send, HeadObjectCommand)).toEqual([{ Bucket: BUCKET, Key: result.key }]);
    expect(sentInputs(mocks.s3Send, PutObjectCommand)).toHaveLength(0);
  });

  it('should use a configured bucket without asking for the account', async () => {
    mocks.s3Send
      .mockResolvedValueOnce({})
      .mockResolvedValueOnce({});

    const result = await packager('my-artifacts').package({ projectName: 'api1', artifactsPath });

    expect(result.bucket).toBe('my-artifacts');
    expect(mocks.stsSend).not.toHaveBeenCalled();
  });

  it('should wrap upload failures as engine errors', async () => {
    mocks.s3Send
      .mockResolvedValueOnce({})
      .mockRejectedValueOnce(awsError('AccessDenied', 'Access Denied', 403));

    const error = await packager().package({ projectName: 'api1', artifactsPath }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      kind: 'permanent',
      operation: 'PackageArtifact',
      message: 'PackageArtifact failed: AccessDenied: Access Denied'
    });
  });
});
