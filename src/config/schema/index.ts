/**
 * Cluster Schema
 *
 * Assembles every section definition into the registry the rest of the
 * system builds configurations against.
 */

import { SchemaRegistry } from '../registry.js';
import {
  clusterSection,
  imageSection,
  monitoringLogsSection,
  monitoringSection,
  ROOT_SECTION,
} from './cluster.js';
import {
  headNodeDcvSection,
  headNodeNetworkingSection,
  headNodeSection,
  headNodeSshSection,
} from './head-node.js';
import {
  awsBatchComputeResourceSection,
  awsBatchQueueNetworkingSection,
  awsBatchQueueSection,
  efaSection,
  placementGroupSection,
  pluginComputeResourceSection,
  pluginQueueNetworkingSection,
  pluginQueueSection,
  queueImageSection,
  queueNetworkingSection,
  schedulingSection,
  slurmComputeResourceSection,
  slurmQueueSection,
  slurmSettingsSection,
} from './scheduling.js';
import {
  ebsSettingsSection,
  efsSettingsSection,
  fsxLustreSettingsSection,
  sharedStorageSection,
} from './storage.js';

export { ROOT_SECTION, SUPPORTED_OSES } from './cluster.js';
export { SCHEDULERS, type Scheduler } from './scheduling.js';

/**
 * Build the cluster schema registry.
 *
 * @throws SchemaDefinitionError if the definitions are inconsistent
 */
export function createClusterRegistry(): SchemaRegistry {
  return new SchemaRegistry(ROOT_SECTION, [
    clusterSection,
    imageSection,
    headNodeSection,
    headNodeNetworkingSection,
    headNodeSshSection,
    headNodeDcvSection,
    schedulingSection,
    slurmSettingsSection,
    slurmQueueSection,
    queueImageSection,
    queueNetworkingSection,
    placementGroupSection,
    slurmComputeResourceSection,
    efaSection,
    awsBatchQueueSection,
    awsBatchQueueNetworkingSection,
    awsBatchComputeResourceSection,
    pluginQueueSection,
    pluginQueueNetworkingSection,
    pluginComputeResourceSection,
    sharedStorageSection,
    ebsSettingsSection,
    efsSettingsSection,
    fsxLustreSettingsSection,
    monitoringSection,
    monitoringLogsSection,
  ]);
}
