/**
 * Cluster Naming Utilities
 *
 * Deterministic names for the stack, bucket, artifact locations and
 * compute environment that belong to a cluster.
 */

import { computeContentHash, randomSuffix } from '../lib/hash.js';

/**
 * Cluster name pattern: letter first, then letters, digits and hyphens.
 */
export const CLUSTER_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]{0,59}$/;

/**
 * Tag keys written on every managed stack.
 */
export const VERSION_TAG = 'hpcstack:version';
export const CLUSTER_NAME_TAG = 'hpcstack:cluster-name';

/**
 * Prefix of every artifact directory and generated bucket.
 */
export const NAME_PREFIX = 'hpcstack';

/**
 * Check a cluster name.
 *
 * @param name - Candidate cluster name
 * @returns Whether the name can be used for a cluster
 */
export function isValidClusterName(name: string): boolean {
  return CLUSTER_NAME_PATTERN.test(name);
}

/**
 * Name of the bucket generated for clusters without a custom bucket.
 *
 * Format: hpcstack-{region}-{hash8(cluster name)}
 *
 * @param region - Cluster region
 * @param clusterName - Cluster name
 */
export function generateBucketName(region: string, clusterName: string): string {
  return `${NAME_PREFIX}-${region}-${computeContentHash(clusterName)}`;
}

/**
 * Fresh artifact directory for a new cluster.
 *
 * Format: hpcstack/{cluster name}-{8 random characters}
 */
export function generateArtifactDirectory(clusterName: string): string {
  return `${NAME_PREFIX}/${clusterName}-${randomSuffix(8)}`;
}

/**
 * Version token of a resolved configuration.
 *
 * Format: {base36 timestamp}-{hash8(resolved document)}
 *
 * @param resolvedDocument - Serialized resolved configuration
 * @param now - Clock reading, in milliseconds
 */
export function generateConfigVersion(resolvedDocument: string, now: number = Date.now()): string {
  return `${now.toString(36)}-${computeContentHash(resolvedDocument)}`;
}

/**
 * Object keys of one persisted configuration version.
 */
export interface ArtifactKeys {
  originalConfig: string;
  resolvedConfig: string;
  storageBlob: string;
  template: string;
}

/**
 * Object keys of a configuration version under an artifact directory.
 */
export function artifactKeys(artifactDirectory: string, configVersion: string): ArtifactKeys {
  const configs = `${artifactDirectory}/configs/${configVersion}`;
  return {
    originalConfig: `${configs}/original-config.yaml`,
    resolvedConfig: `${configs}/cluster-config.yaml`,
    storageBlob: `${configs}/cluster-config-storage.json`,
    template: `${artifactDirectory}/templates/${configVersion}/stack-template.json`,
  };
}

/**
 * Name of the managed compute environment of a batch cluster.
 */
export function computeEnvironmentName(clusterName: string): string {
  return `${clusterName}-ce`;
}

/**
 * Tags identifying a managed stack.
 */
export function clusterTags(clusterName: string, version: string): Record<string, string> {
  return {
    [VERSION_TAG]: version,
    [CLUSTER_NAME_TAG]: clusterName,
  };
}

/**
 * Check whether stack tags mark a managed cluster.
 */
export function isManagedStack(tags: Readonly<Record<string, string>>): boolean {
  return tags[VERSION_TAG] !== undefined;
}
