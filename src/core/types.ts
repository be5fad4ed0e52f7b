/**
 * Core Types for hpcstack
 *
 * Cluster states and the results returned by the lifecycle controller.
 */

import type { StackStatus } from '../cloud/types.js';
import type { ChangeVerdict, FleetStatus } from '../update/types.js';
import type { ValidationFinding } from '../validation/types.js';

/**
 * Lifecycle state of a cluster, derived from its stack status.
 */
export type ClusterState = 'ABSENT' | 'CREATING' | 'ACTIVE' | 'UPDATING' | 'DELETING' | 'FAILED';

/**
 * Map a stack status to the cluster state.
 *
 * @param status - Stack status, or null when there is no stack
 */
export function clusterStateOf(status: StackStatus | null): ClusterState {
  if (status === null) {
    return 'ABSENT';
  }
  if (status === 'CREATE_IN_PROGRESS') {
    return 'CREATING';
  }
  if (status === 'DELETE_IN_PROGRESS') {
    return 'DELETING';
  }
  if (status.startsWith('ROLLBACK_') || status.startsWith('UPDATE_ROLLBACK_') || status.endsWith('_FAILED')) {
    return 'FAILED';
  }
  if (status.endsWith('_IN_PROGRESS')) {
    return 'UPDATING';
  }
  return 'ACTIVE';
}

/**
 * Whether a stack status will change without further requests.
 */
export function isTransitional(status: StackStatus): boolean {
  return status.endsWith('_IN_PROGRESS');
}

/**
 * Summary of one cluster.
 */
export interface ClusterSummary {
  name: string;
  state: ClusterState;
  stackStatus: StackStatus | null;
  version: string | null;
  configVersion: string | null;
  scheduler: string | null;
  fleetStatus: FleetStatus | null;
  createdAt: string | null;
  updatedAt: string | null;
}

/**
 * Result of create.
 */
export interface CreateResult {
  cluster: ClusterSummary;
  configVersion: string;
  findings: ValidationFinding[];
}

/**
 * Result of update.
 */
export interface UpdateResult {
  cluster: ClusterSummary;
  configVersion: string;
  findings: ValidationFinding[];
  changeSet: ChangeVerdict[];
  /** True when denied changes were applied because the update was forced */
  forced: boolean;
}

/**
 * Result of delete.
 */
export interface DeleteResult {
  name: string;
  /** False when there was no stack to delete */
  deleted: boolean;
  keptLogs: boolean;
  artifactsRemoved: number;
}

/**
 * Result of start and stop.
 */
export interface FleetResult {
  name: string;
  previous: FleetStatus;
  current: FleetStatus;
  /** False when the fleet was already in the requested state */
  changed: boolean;
}
