/**
 * Cluster-wide sections: the root, the image and monitoring.
 */

import {
  COMPUTE_FLEET_STOP,
  IGNORED,
  READ_ONLY_RESOURCE_BUCKET,
  SHARED_STORAGE_UPDATE,
  SUPPORTED,
  UNSUPPORTED,
} from '../../update/policy.js';
import {
  customBucketValidator,
  duplicateMountDirValidator,
  tagsValidator,
} from '../../validation/validators.js';
import { asString } from '../params.js';
import type { SectionDefinition } from '../registry.js';

export const ROOT_SECTION = 'cluster';

export const SUPPORTED_OSES = ['alinux2', 'alinux2023', 'ubuntu2004', 'ubuntu2204', 'rhel8', 'rhel9'];

export const LOG_RETENTION_DAYS = [
  1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731, 1827, 3653,
];

export const clusterSection: SectionDefinition = {
  key: ROOT_SECTION,
  maxInstances: 1,
  storage: 'params',
  validators: [duplicateMountDirValidator, customBucketValidator],
  params: [
    {
      key: 'Region',
      type: 'string',
      allowedValues: /[a-z]{2}(-gov)?-[a-z]+-\d/,
      defaultValue: 'us-east-1',
      updatePolicy: UNSUPPORTED,
    },
    {
      key: 'CustomS3Bucket',
      type: 'string',
      allowedValues: /[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]/,
      updatePolicy: READ_ONLY_RESOURCE_BUCKET,
    },
    { key: 'Tags', type: 'json', updatePolicy: UNSUPPORTED, validators: [tagsValidator] },
    { key: 'Image', storageKey: 'ImageSettings', type: 'settings', section: 'image', required: true, updatePolicy: UNSUPPORTED },
    {
      key: 'HeadNode',
      storageKey: 'HeadNodeSettings',
      type: 'settings',
      section: 'head_node',
      required: true,
      updatePolicy: UNSUPPORTED,
    },
    {
      key: 'Scheduling',
      storageKey: 'SchedulingSettings',
      type: 'settings',
      section: 'scheduling',
      required: true,
      updatePolicy: UNSUPPORTED,
    },
    {
      key: 'SharedStorage',
      storageKey: 'SharedStorageSettings',
      type: 'settings',
      section: 'shared_storage',
      updatePolicy: SHARED_STORAGE_UPDATE,
    },
    {
      key: 'Monitoring',
      storageKey: 'MonitoringSettings',
      type: 'settings',
      section: 'monitoring',
      updatePolicy: SUPPORTED,
    },
    { key: 'Version', type: 'string', visibility: 'PRIVATE', updatePolicy: IGNORED },
    { key: 'ConfigVersion', type: 'string', visibility: 'PRIVATE', updatePolicy: IGNORED },
    { key: 'ArtifactDirectory', type: 'string', visibility: 'PRIVATE', updatePolicy: IGNORED },
    {
      key: 'ResourcesS3Bucket',
      type: 'string',
      visibility: 'PRIVATE',
      derivedDefault: {
        dependsOn: ['CustomS3Bucket'],
        resolve: (values) => asString(values.value('CustomS3Bucket')),
      },
      updatePolicy: IGNORED,
    },
    { key: 'ClusterConfigMetadata', type: 'json', visibility: 'PRIVATE', updatePolicy: IGNORED },
  ],
};

export const imageSection: SectionDefinition = {
  key: 'image',
  maxInstances: 1,
  storage: 'params',
  params: [
    { key: 'Os', type: 'string', required: true, allowedValues: SUPPORTED_OSES, updatePolicy: UNSUPPORTED },
    { key: 'CustomAmi', type: 'string', allowedValues: /ami-[0-9a-z]{8,17}/, updatePolicy: UNSUPPORTED },
  ],
};

export const monitoringSection: SectionDefinition = {
  key: 'monitoring',
  maxInstances: 1,
  autocreate: true,
  storage: 'params',
  params: [
    { key: 'DetailedMonitoring', type: 'bool', defaultValue: false, updatePolicy: SUPPORTED },
    { key: 'Logs', storageKey: 'LogsSettings', type: 'settings', section: 'monitoring_logs', updatePolicy: SUPPORTED },
  ],
};

export const monitoringLogsSection: SectionDefinition = {
  key: 'monitoring_logs',
  maxInstances: 1,
  autocreate: true,
  storage: 'params',
  params: [
    { key: 'Enabled', storageKey: 'LogsEnabled', type: 'bool', defaultValue: true, updatePolicy: COMPUTE_FLEET_STOP },
    {
      key: 'RetentionInDays',
      storageKey: 'LogsRetentionInDays',
      type: 'int',
      allowedValues: LOG_RETENTION_DAYS,
      defaultValue: 180,
      updatePolicy: SUPPORTED,
    },
    {
      key: 'DeletionPolicy',
      storageKey: 'LogsDeletionPolicy',
      type: 'string',
      allowedValues: ['Delete', 'Retain'],
      defaultValue: 'Delete',
      updatePolicy: SUPPORTED,
    },
  ],
};
