import { createHash } from 'crypto';
import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, relative, sep } from 'path';

export function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Files under a directory, depth first, as absolute paths in sorted order
 */
export function listFilesRecursively(dir: string): string[] {
  const files: string[] = [];
  const items = readdirSync(dir).sort();

  for (const item of items) {
    const fullPath = join(dir, item);
    const stat = statSync(fullPath);

    if (stat.isDirectory()) {
      files.push(...listFilesRecursively(fullPath));
    } else if (stat.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/** Path relative to root with forward slashes, as used for object keys */
export function toPosixRelative(root: string, file: string): string {
  return relative(root, file).split(sep).join('/');
}

/**
 * SHA-256 over every file's relative path, executable bit and content.
 * Identical trees give identical digests regardless of timestamps.
 */
export function directoryDigest(dir: string): string {
  const hash = createHash('sha256');

  for (const file of listFilesRecursively(dir)) {
    const executable = (statSync(file).mode & 0o111) !== 0;
    hash.update(toPosixRelative(dir, file));
    hash.update('\0');
    hash.update(executable ? 'x' : '-');
    hash.update('\0');
    hash.update(readFileSync(file));
    hash.update('\0');
  }

  return hash.digest('hex');
}
