/**
 * Scheduling sections
 *
 * Slurm queues, the managed batch queue and plugin scheduler queues.
 * Queue shapes shared by the variants are produced by factories so each
 * variant gets its own section keys and update policies.
 */

import {
  AWSBATCH_CE_MAX_RESIZE,
  COMPUTE_FLEET_STOP,
  DEFAULT_QUEUE_UPDATE_STRATEGY,
  MANAGED_PLACEMENT_GROUP,
  MAX_COUNT,
  QUEUE_UPDATE_STRATEGIES,
  QUEUE_UPDATE_STRATEGY,
  QUEUE_UPDATE_STRATEGY_ON_REMOVE,
  RESIZE_UPDATE_STRATEGY_ON_REMOVE,
  SUPPORTED,
  UNSUPPORTED,
} from '../../update/policy.js';
import type { UpdatePolicy } from '../../update/types.js';
import {
  computeResourceSizeValidator,
  disableSmtValidator,
  efaValidator,
  instanceTypeValidator,
  queueSubnetsVpcValidator,
  schedulerQueuesValidator,
  securityGroupsValidator,
  subnetValidator,
} from '../../validation/validators.js';
import { asString } from '../params.js';
import type { SectionDefinition } from '../registry.js';

export const SCHEDULERS = ['slurm', 'awsbatch', 'plugin'] as const;
export type Scheduler = (typeof SCHEDULERS)[number];

const SUBNET_ID = /subnet-[0-9a-z]+/;
const SECURITY_GROUP_ID = /sg-[0-9a-z]+/;
const AMI_ID = /ami-[0-9a-z]{8,17}/;

export const MAX_SLURM_QUEUES = 10;
export const MAX_SLURM_COMPUTE_RESOURCES = 5;
export const MAX_PLUGIN_QUEUES = 10;
export const MAX_PLUGIN_COMPUTE_RESOURCES = 5;

const ALLOCATION_STRATEGIES: Record<string, string> = {
  ONDEMAND: 'lowest-price',
  SPOT: 'price-capacity-optimized',
};

export const schedulingSection: SectionDefinition = {
  key: 'scheduling',
  maxInstances: 1,
  storage: 'params',
  validators: [schedulerQueuesValidator, queueSubnetsVpcValidator],
  params: [
    {
      key: 'Scheduler',
      type: 'string',
      required: true,
      allowedValues: SCHEDULERS,
      updatePolicy: UNSUPPORTED,
    },
    {
      key: 'SlurmSettings',
      storageKey: 'SlurmSettings',
      type: 'settings',
      section: 'slurm_settings',
      updatePolicy: COMPUTE_FLEET_STOP,
    },
    {
      key: 'SlurmQueues',
      storageKey: 'SlurmQueueSettings',
      type: 'settings',
      section: 'slurm_queue',
      updatePolicy: RESIZE_UPDATE_STRATEGY_ON_REMOVE,
    },
    {
      key: 'AwsBatchQueues',
      storageKey: 'AwsBatchQueueSettings',
      type: 'settings',
      section: 'awsbatch_queue',
      updatePolicy: COMPUTE_FLEET_STOP,
    },
    {
      key: 'SchedulerQueues',
      storageKey: 'SchedulerQueueSettings',
      type: 'settings',
      section: 'plugin_queue',
      updatePolicy: COMPUTE_FLEET_STOP,
    },
  ],
};

/**
 * Slurm options, persisted as one combined entry in declared order.
 */
export const slurmSettingsSection: SectionDefinition = {
  key: 'slurm_settings',
  maxInstances: 1,
  autocreate: (scheduling) => scheduling.getString('Scheduler') === 'slurm',
  storage: 'combined',
  storageKey: 'SlurmOptions',
  params: [
    { key: 'ScaledownIdletime', type: 'int', defaultValue: 10, updatePolicy: COMPUTE_FLEET_STOP },
    {
      key: 'QueueUpdateStrategy',
      type: 'string',
      allowedValues: QUEUE_UPDATE_STRATEGIES,
      defaultValue: DEFAULT_QUEUE_UPDATE_STRATEGY,
      updatePolicy: SUPPORTED,
    },
    { key: 'EnableMemoryBasedScheduling', type: 'bool', defaultValue: false, updatePolicy: COMPUTE_FLEET_STOP },
  ],
};

// =============================================================================
// Slurm Queues
// =============================================================================

export const slurmQueueSection: SectionDefinition = {
  key: 'slurm_queue',
  labelKey: 'Name',
  maxInstances: MAX_SLURM_QUEUES,
  storage: 'json',
  params: [
    {
      key: 'CapacityType',
      type: 'string',
      allowedValues: ['ONDEMAND', 'SPOT', 'CAPACITY_BLOCK'],
      defaultValue: 'ONDEMAND',
      updatePolicy: QUEUE_UPDATE_STRATEGY,
    },
    {
      key: 'AllocationStrategy',
      type: 'string',
      allowedValues: ['lowest-price', 'capacity-optimized', 'price-capacity-optimized'],
      derivedDefault: {
        dependsOn: ['CapacityType'],
        resolve: (values) => {
          const capacityType = asString(values.value('CapacityType'));
          return capacityType === null ? null : (ALLOCATION_STRATEGIES[capacityType] ?? null);
        },
      },
      updatePolicy: QUEUE_UPDATE_STRATEGY,
    },
    { key: 'Image', type: 'settings', section: 'queue_image', updatePolicy: QUEUE_UPDATE_STRATEGY },
    {
      key: 'Networking',
      type: 'settings',
      section: 'queue_networking',
      required: true,
      updatePolicy: QUEUE_UPDATE_STRATEGY,
    },
    {
      key: 'ComputeResources',
      type: 'settings',
      section: 'slurm_compute_resource',
      required: true,
      updatePolicy: RESIZE_UPDATE_STRATEGY_ON_REMOVE,
    },
  ],
};

export const queueImageSection: SectionDefinition = {
  key: 'queue_image',
  maxInstances: 1,
  storage: 'json',
  params: [{ key: 'CustomAmi', type: 'string', allowedValues: AMI_ID, updatePolicy: QUEUE_UPDATE_STRATEGY }],
};

export const queueNetworkingSection: SectionDefinition = {
  key: 'queue_networking',
  maxInstances: 1,
  storage: 'json',
  params: [
    {
      key: 'SubnetIds',
      type: 'string-list',
      required: true,
      allowedValues: SUBNET_ID,
      updatePolicy: QUEUE_UPDATE_STRATEGY_ON_REMOVE,
      validators: [subnetValidator],
    },
    { key: 'AssignPublicIp', type: 'bool', updatePolicy: QUEUE_UPDATE_STRATEGY },
    {
      key: 'SecurityGroups',
      type: 'string-list',
      allowedValues: SECURITY_GROUP_ID,
      updatePolicy: QUEUE_UPDATE_STRATEGY,
      validators: [securityGroupsValidator],
    },
    {
      key: 'PlacementGroup',
      type: 'settings',
      section: 'placement_group',
      updatePolicy: MANAGED_PLACEMENT_GROUP,
    },
  ],
};

export const placementGroupSection: SectionDefinition = {
  key: 'placement_group',
  maxInstances: 1,
  autocreate: true,
  storage: 'json',
  params: [
    { key: 'Enabled', type: 'bool', defaultValue: false, updatePolicy: MANAGED_PLACEMENT_GROUP },
    { key: 'Id', type: 'string', updatePolicy: MANAGED_PLACEMENT_GROUP },
  ],
};

export const slurmComputeResourceSection: SectionDefinition = {
  key: 'slurm_compute_resource',
  labelKey: 'Name',
  maxInstances: MAX_SLURM_COMPUTE_RESOURCES,
  storage: 'json',
  validators: [computeResourceSizeValidator, disableSmtValidator],
  params: [
    {
      key: 'InstanceType',
      type: 'string',
      required: true,
      updatePolicy: COMPUTE_FLEET_STOP,
      validators: [instanceTypeValidator],
    },
    { key: 'MinCount', type: 'int', defaultValue: 0, updatePolicy: RESIZE_UPDATE_STRATEGY_ON_REMOVE },
    { key: 'MaxCount', type: 'int', defaultValue: 10, updatePolicy: RESIZE_UPDATE_STRATEGY_ON_REMOVE },
    {
      key: 'DisableSimultaneousMultithreading',
      type: 'bool',
      defaultValue: false,
      updatePolicy: COMPUTE_FLEET_STOP,
    },
    { key: 'SpotPrice', type: 'float', updatePolicy: QUEUE_UPDATE_STRATEGY },
    { key: 'Efa', type: 'settings', section: 'efa', updatePolicy: COMPUTE_FLEET_STOP },
  ],
};

/**
 * Elastic fabric adapter; changes always need the fleet stopped.
 */
export const efaSection: SectionDefinition = {
  key: 'efa',
  maxInstances: 1,
  autocreate: true,
  storage: 'json',
  updatePolicyFloor: COMPUTE_FLEET_STOP,
  validators: [efaValidator],
  params: [
    { key: 'Enabled', type: 'bool', defaultValue: false, updatePolicy: SUPPORTED },
    { key: 'GdrSupport', type: 'bool', defaultValue: false, updatePolicy: SUPPORTED },
  ],
};

// =============================================================================
// Queue Factories
// =============================================================================

function queueSection(
  key: string,
  maxInstances: number,
  resources: { section: string; policy: UpdatePolicy },
  networking: string,
  policy: UpdatePolicy
): SectionDefinition {
  return {
    key,
    labelKey: 'Name',
    maxInstances,
    storage: 'json',
    params: [
      {
        key: 'CapacityType',
        type: 'string',
        allowedValues: ['ONDEMAND', 'SPOT'],
        defaultValue: 'ONDEMAND',
        updatePolicy: policy,
      },
      { key: 'Networking', type: 'settings', section: networking, required: true, updatePolicy: policy },
      {
        key: 'ComputeResources',
        type: 'settings',
        section: resources.section,
        required: true,
        updatePolicy: resources.policy,
      },
    ],
  };
}

function subnetsSection(key: string, policy: UpdatePolicy): SectionDefinition {
  return {
    key,
    maxInstances: 1,
    storage: 'json',
    params: [
      {
        key: 'SubnetIds',
        type: 'string-list',
        required: true,
        allowedValues: SUBNET_ID,
        updatePolicy: policy,
        validators: [subnetValidator],
      },
    ],
  };
}

// =============================================================================
// Managed Batch Queue
// =============================================================================

export const awsBatchQueueSection = queueSection(
  'awsbatch_queue',
  1,
  { section: 'awsbatch_compute_resource', policy: COMPUTE_FLEET_STOP },
  'awsbatch_queue_networking',
  UNSUPPORTED
);

export const awsBatchQueueNetworkingSection = subnetsSection('awsbatch_queue_networking', UNSUPPORTED);

export const awsBatchComputeResourceSection: SectionDefinition = {
  key: 'awsbatch_compute_resource',
  labelKey: 'Name',
  maxInstances: 1,
  storage: 'json',
  validators: [computeResourceSizeValidator],
  params: [
    {
      key: 'InstanceTypes',
      type: 'string-list',
      required: true,
      updatePolicy: COMPUTE_FLEET_STOP,
      validators: [instanceTypeValidator],
    },
    { key: 'MinvCpus', type: 'int', defaultValue: 0, updatePolicy: SUPPORTED },
    {
      key: 'DesiredvCpus',
      type: 'int',
      derivedDefault: { dependsOn: ['MinvCpus'], resolve: (values) => values.value('MinvCpus')?.value ?? null },
      updatePolicy: SUPPORTED,
    },
    { key: 'MaxvCpus', type: 'int', defaultValue: 10, updatePolicy: AWSBATCH_CE_MAX_RESIZE },
    {
      key: 'SpotBidPercentage',
      type: 'int',
      allowedValues: /[1-9]\d?|100/,
      updatePolicy: SUPPORTED,
    },
  ],
};

// =============================================================================
// Plugin Scheduler Queues
// =============================================================================

export const pluginQueueSection = queueSection(
  'plugin_queue',
  MAX_PLUGIN_QUEUES,
  { section: 'plugin_compute_resource', policy: COMPUTE_FLEET_STOP },
  'plugin_queue_networking',
  COMPUTE_FLEET_STOP
);

export const pluginQueueNetworkingSection = subnetsSection('plugin_queue_networking', COMPUTE_FLEET_STOP);

export const pluginComputeResourceSection: SectionDefinition = {
  key: 'plugin_compute_resource',
  labelKey: 'Name',
  maxInstances: MAX_PLUGIN_COMPUTE_RESOURCES,
  storage: 'json',
  validators: [computeResourceSizeValidator],
  params: [
    {
      key: 'InstanceType',
      type: 'string',
      required: true,
      updatePolicy: COMPUTE_FLEET_STOP,
      validators: [instanceTypeValidator],
    },
    { key: 'MinCount', type: 'int', defaultValue: 0, updatePolicy: COMPUTE_FLEET_STOP },
    { key: 'MaxCount', type: 'int', defaultValue: 10, updatePolicy: MAX_COUNT },
  ],
};
