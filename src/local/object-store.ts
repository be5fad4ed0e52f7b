/**
 * Local Object Store
 *
 * Versioned blob storage under <stateDir>/buckets. Each bucket keeps a
 * manifest of object keys and their versions; contents live in one file
 * per version.
 */

import { mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { CloudClientError } from '../cloud/errors.js';
import type { BlobFormat, ObjectStore } from '../cloud/types.js';
import { computeContentHash } from '../lib/hash.js';
import { errnoCode, readJson, readTextIfExists, removeFile, writeAtomic, writeJson } from './files.js';
import { bucketManifestSchema, recordCheck, type BucketManifest } from './schemas.js';

const SERVICE = 'object-store';
const URL_SCHEME = 'local://';

const checkManifest = recordCheck(bucketManifestSchema, SERVICE);

/**
 * Parts of an object URL produced by urlFor.
 */
export interface ObjectLocation {
  bucket: string;
  key: string;
  versionId?: string;
}

/**
 * Parse a URL produced by LocalObjectStore.urlFor.
 *
 * @throws CloudClientError (FAILED) for any other URL
 */
export function parseObjectUrl(url: string): ObjectLocation {
  if (!url.startsWith(URL_SCHEME)) {
    throw new CloudClientError(`Unsupported object URL: ${url}`, 'FAILED', SERVICE);
  }
  const parsed = new URL(url);
  const key = decodeURIComponent(parsed.pathname.replace(/^\//, ''));
  const versionId = parsed.searchParams.get('versionId') ?? undefined;
  if (!parsed.hostname || !key) {
    throw new CloudClientError(`Unsupported object URL: ${url}`, 'FAILED', SERVICE);
  }
  return { bucket: parsed.hostname, key, versionId };
}

export class LocalObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(stateDir: string) {
    this.root = join(stateDir, 'buckets');
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await stat(this.bucketDir(bucket));
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async createBucket(bucket: string): Promise<void> {
    if (await this.bucketExists(bucket)) {
      throw new CloudClientError(`Bucket ${bucket} already exists`, 'ALREADY_EXISTS', SERVICE);
    }
    await mkdir(join(this.bucketDir(bucket), 'data'), { recursive: true });
    await this.saveManifest({ bucket, sequence: 0, objects: {} });
  }

  async putBlob(bucket: string, key: string, content: string, format: BlobFormat): Promise<string> {
    const manifest = await this.loadManifest(bucket);
    manifest.sequence += 1;
    const versionId = `${computeContentHash(content)}-${manifest.sequence}`;

    await writeAtomic(this.dataPath(bucket, versionId), content);
    const versions = manifest.objects[key] ?? [];
    versions.push({ versionId, format, createdAt: new Date().toISOString() });
    manifest.objects[key] = versions;
    await this.saveManifest(manifest);
    return versionId;
  }

  async getBlob(bucket: string, key: string, versionId?: string): Promise<string> {
    const manifest = await this.loadManifest(bucket);
    const versions = manifest.objects[key] ?? [];
    const version =
      versionId === undefined ? versions[versions.length - 1] : versions.find((v) => v.versionId === versionId);
    if (!version) {
      const which = versionId === undefined ? '' : ` (version ${versionId})`;
      throw new CloudClientError(`Object ${bucket}/${key}${which} not found`, 'NOT_FOUND', SERVICE);
    }
    const content = await readTextIfExists(this.dataPath(bucket, version.versionId));
    if (content === null) {
      throw new CloudClientError(`Content of ${bucket}/${key} is missing`, 'FAILED', SERVICE);
    }
    return content;
  }

  async deletePrefix(bucket: string, prefix: string): Promise<number> {
    const manifest = await this.loadManifest(bucket);
    const keys = Object.keys(manifest.objects).filter((key) => key.startsWith(prefix));
    for (const key of keys) {
      for (const version of manifest.objects[key] ?? []) {
        await removeFile(this.dataPath(bucket, version.versionId));
      }
      delete manifest.objects[key];
    }
    await this.saveManifest(manifest);
    return keys.length;
  }

  urlFor(bucket: string, key: string, versionId?: string): string {
    const path = key.split('/').map(encodeURIComponent).join('/');
    const query = versionId === undefined ? '' : `?versionId=${encodeURIComponent(versionId)}`;
    return `${URL_SCHEME}${bucket}/${path}${query}`;
  }

  /**
   * Object keys of a bucket, sorted.
   */
  async listKeys(bucket: string, prefix: string = ''): Promise<string[]> {
    const manifest = await this.loadManifest(bucket);
    return Object.keys(manifest.objects)
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  private bucketDir(bucket: string): string {
    return join(this.root, bucket);
  }

  private dataPath(bucket: string, versionId: string): string {
    return join(this.bucketDir(bucket), 'data', versionId);
  }

  private manifestPath(bucket: string): string {
    return join(this.bucketDir(bucket), 'manifest.json');
  }

  private async loadManifest(bucket: string): Promise<BucketManifest> {
    const manifest = await readJson(this.manifestPath(bucket), checkManifest, SERVICE);
    if (!manifest) {
      throw new CloudClientError(`Bucket ${bucket} does not exist`, 'NOT_FOUND', SERVICE);
    }
    return manifest;
  }

  private async saveManifest(manifest: BucketManifest): Promise<void> {
    await writeJson(this.manifestPath(manifest.bucket), manifest);
  }
}
