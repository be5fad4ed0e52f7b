/**
 * Shared storage sections
 */

import { INCREASE_ONLY, SUPPORTED, UNSUPPORTED } from '../../update/policy.js';
import {
  ebsSettingsValidator,
  mountDirValidator,
  sharedStorageTypeValidator,
} from '../../validation/validators.js';
import { asString } from '../params.js';
import type { SectionDefinition } from '../registry.js';
import type { Section } from '../section.js';

export const MAX_SHARED_STORAGE = 20;

const FILE_SYSTEM_ID = /fs-[0-9a-z]{8,17}/;

function ofStorageType(storageType: string): (storage: Section) => boolean {
  return (storage) => storage.getString('StorageType') === storageType;
}

export const sharedStorageSection: SectionDefinition = {
  key: 'shared_storage',
  labelKey: 'Name',
  maxInstances: MAX_SHARED_STORAGE,
  storage: 'json',
  validators: [sharedStorageTypeValidator],
  params: [
    {
      key: 'MountDir',
      type: 'string',
      required: true,
      updatePolicy: UNSUPPORTED,
      validators: [mountDirValidator],
    },
    {
      key: 'StorageType',
      type: 'string',
      required: true,
      allowedValues: ['Ebs', 'Efs', 'FsxLustre'],
      updatePolicy: UNSUPPORTED,
    },
    { key: 'EbsSettings', type: 'settings', section: 'ebs_settings', updatePolicy: UNSUPPORTED },
    { key: 'EfsSettings', type: 'settings', section: 'efs_settings', updatePolicy: UNSUPPORTED },
    { key: 'FsxLustreSettings', type: 'settings', section: 'fsx_lustre_settings', updatePolicy: UNSUPPORTED },
  ],
};

export const ebsSettingsSection: SectionDefinition = {
  key: 'ebs_settings',
  maxInstances: 1,
  autocreate: ofStorageType('Ebs'),
  storage: 'json',
  validators: [ebsSettingsValidator],
  params: [
    {
      key: 'VolumeType',
      type: 'string',
      allowedValues: ['gp2', 'gp3', 'io1', 'io2', 'sc1', 'st1', 'standard'],
      defaultValue: 'gp3',
      updatePolicy: UNSUPPORTED,
    },
    { key: 'Size', type: 'int', defaultValue: 35, updatePolicy: UNSUPPORTED },
    {
      key: 'Iops',
      type: 'int',
      derivedDefault: {
        dependsOn: ['VolumeType'],
        resolve: (values) => (asString(values.value('VolumeType')) === 'gp3' ? 3000 : null),
      },
      updatePolicy: SUPPORTED,
    },
    {
      key: 'Throughput',
      type: 'int',
      derivedDefault: {
        dependsOn: ['VolumeType'],
        resolve: (values) => (asString(values.value('VolumeType')) === 'gp3' ? 125 : null),
      },
      updatePolicy: SUPPORTED,
    },
    { key: 'Encrypted', type: 'bool', defaultValue: true, updatePolicy: UNSUPPORTED },
    { key: 'SnapshotId', type: 'string', allowedValues: /snap-[0-9a-z]{8,17}/, updatePolicy: UNSUPPORTED },
    {
      key: 'DeletionPolicy',
      type: 'string',
      allowedValues: ['Delete', 'Retain', 'Snapshot'],
      defaultValue: 'Delete',
      updatePolicy: SUPPORTED,
    },
  ],
};

export const efsSettingsSection: SectionDefinition = {
  key: 'efs_settings',
  maxInstances: 1,
  autocreate: ofStorageType('Efs'),
  storage: 'json',
  params: [
    { key: 'FileSystemId', type: 'string', allowedValues: FILE_SYSTEM_ID, updatePolicy: UNSUPPORTED },
    {
      key: 'PerformanceMode',
      type: 'string',
      allowedValues: ['generalPurpose', 'maxIO'],
      defaultValue: 'generalPurpose',
      updatePolicy: UNSUPPORTED,
    },
    {
      key: 'ThroughputMode',
      type: 'string',
      allowedValues: ['bursting', 'provisioned', 'elastic'],
      defaultValue: 'bursting',
      updatePolicy: SUPPORTED,
    },
    { key: 'Encrypted', type: 'bool', defaultValue: false, updatePolicy: UNSUPPORTED },
  ],
};

export const fsxLustreSettingsSection: SectionDefinition = {
  key: 'fsx_lustre_settings',
  maxInstances: 1,
  autocreate: ofStorageType('FsxLustre'),
  storage: 'json',
  params: [
    { key: 'FileSystemId', type: 'string', allowedValues: FILE_SYSTEM_ID, updatePolicy: UNSUPPORTED },
    { key: 'StorageCapacity', type: 'int', updatePolicy: INCREASE_ONLY },
    {
      key: 'DeploymentType',
      type: 'string',
      allowedValues: ['SCRATCH_1', 'SCRATCH_2', 'PERSISTENT_1', 'PERSISTENT_2'],
      defaultValue: 'SCRATCH_2',
      updatePolicy: UNSUPPORTED,
    },
  ],
};

