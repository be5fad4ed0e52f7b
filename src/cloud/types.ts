/**
 * Collaborator Contracts
 *
 * The narrow interfaces the lifecycle controller and validators use to
 * reach the cloud account: stacks, an object store, the fleet status
 * store, compute/network facts and managed compute environments.
 */

import type { JsonObject } from '../lib/json.js';
import type { FleetStatus, HeadNodeState } from '../update/types.js';

// =============================================================================
// Stacks
// =============================================================================

export type StackStatus =
  | 'CREATE_IN_PROGRESS'
  | 'CREATE_COMPLETE'
  | 'CREATE_FAILED'
  | 'ROLLBACK_IN_PROGRESS'
  | 'ROLLBACK_COMPLETE'
  | 'ROLLBACK_FAILED'
  | 'UPDATE_IN_PROGRESS'
  | 'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS'
  | 'UPDATE_COMPLETE'
  | 'UPDATE_FAILED'
  | 'UPDATE_ROLLBACK_IN_PROGRESS'
  | 'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS'
  | 'UPDATE_ROLLBACK_COMPLETE'
  | 'UPDATE_ROLLBACK_FAILED'
  | 'DELETE_IN_PROGRESS'
  | 'DELETE_FAILED';

export const STACK_STATUSES: readonly StackStatus[] = [
  'CREATE_IN_PROGRESS',
  'CREATE_COMPLETE',
  'CREATE_FAILED',
  'ROLLBACK_IN_PROGRESS',
  'ROLLBACK_COMPLETE',
  'ROLLBACK_FAILED',
  'UPDATE_IN_PROGRESS',
  'UPDATE_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_COMPLETE',
  'UPDATE_FAILED',
  'UPDATE_ROLLBACK_IN_PROGRESS',
  'UPDATE_ROLLBACK_COMPLETE_CLEANUP_IN_PROGRESS',
  'UPDATE_ROLLBACK_COMPLETE',
  'UPDATE_ROLLBACK_FAILED',
  'DELETE_IN_PROGRESS',
  'DELETE_FAILED',
];

export interface StackDescription {
  name: string;
  status: StackStatus;
  statusReason?: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
  outputs: Record<string, string>;
  createdAt: string;
  updatedAt?: string;
}

export interface CreateStackRequest {
  name: string;
  templateUrl: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
  disableRollback: boolean;
}

export interface UpdateStackRequest {
  name: string;
  templateUrl: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
}

/**
 * Stack lifecycle operations.
 *
 * `describeStack`, `deleteStack` and the template calls reject with a
 * NOT_FOUND CloudClientError for a missing stack.
 */
export interface StackClient {
  stackExists(name: string): Promise<boolean>;
  createStack(request: CreateStackRequest): Promise<void>;
  updateStack(request: UpdateStackRequest): Promise<void>;
  deleteStack(name: string): Promise<void>;
  describeStack(name: string): Promise<StackDescription>;
  listStacks(): Promise<StackDescription[]>;
  getStackTemplate(name: string): Promise<JsonObject>;
  updateStackTemplate(name: string, template: JsonObject): Promise<void>;
}

// =============================================================================
// Object Store
// =============================================================================

export type BlobFormat = 'text' | 'json';

/**
 * Versioned blob storage.
 */
export interface ObjectStore {
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<void>;
  /** Store content and return the new version id */
  putBlob(bucket: string, key: string, content: string, format: BlobFormat): Promise<string>;
  getBlob(bucket: string, key: string, versionId?: string): Promise<string>;
  /** Delete every object under a prefix and return how many were removed */
  deletePrefix(bucket: string, prefix: string): Promise<number>;
  urlFor(bucket: string, key: string, versionId?: string): string;
}

// =============================================================================
// Fleet Status
// =============================================================================

/**
 * Recorded compute fleet status with conditional updates.
 */
export interface FleetStatusStore {
  getStatus(cluster: string): Promise<FleetStatus>;
  /**
   * Move from `expectedFrom` to `final`, passing through `transitional`.
   *
   * Rejects with StatusConflictError when the current status is not
   * `expectedFrom` or another writer holds the record.
   */
  compareAndSwap(
    cluster: string,
    expectedFrom: FleetStatus,
    transitional: FleetStatus,
    final: FleetStatus
  ): Promise<void>;
  initialize(cluster: string, status: FleetStatus): Promise<void>;
  remove(cluster: string): Promise<void>;
}

// =============================================================================
// Compute and Network Facts
// =============================================================================

export interface InstanceTypeInfo {
  name: string;
  vcpus: number;
  threadsPerCore: number;
  memoryMiB: number;
  gpus: number;
  efaSupported: boolean;
  architecture: 'x86_64' | 'arm64';
}

export interface SubnetInfo {
  id: string;
  vpcId: string;
  availabilityZone: string;
}

export interface SecurityGroupRule {
  protocol: string;
  fromPort?: number;
  toPort?: number;
  sourceGroupId?: string;
  cidr?: string;
}

export interface SecurityGroupInfo {
  id: string;
  vpcId: string;
  ingress: SecurityGroupRule[];
  egress: SecurityGroupRule[];
}

export interface LaunchRequest {
  instanceType: string;
  subnetId: string;
  imageId?: string;
}

export interface DryRunResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Read-only account facts used by validators and update checks.
 *
 * Describe calls return only the items that exist.
 */
export interface ComputeFactsProvider {
  describeInstanceTypes(names: string[]): Promise<InstanceTypeInfo[]>;
  describeSubnets(ids: string[]): Promise<SubnetInfo[]>;
  describeSecurityGroups(ids: string[]): Promise<SecurityGroupInfo[]>;
  getHeadNodeState(cluster: string): Promise<HeadNodeState | null>;
  dryRunLaunch(request: LaunchRequest): Promise<DryRunResult>;
}

// =============================================================================
// Managed Compute Environments
// =============================================================================

export interface ComputeEnvironmentCapacity {
  enabled: boolean;
  minvCpus: number;
  desiredvCpus: number;
  maxvCpus: number;
}

/**
 * Capacity control of a managed elastic fleet.
 */
export interface ComputeEnvironmentClient {
  describe(name: string): Promise<ComputeEnvironmentCapacity | null>;
  update(name: string, capacity: ComputeEnvironmentCapacity): Promise<void>;
  remove(name: string): Promise<void>;
}

/**
 * Every collaborator the lifecycle controller needs.
 */
export interface CloudProvider {
  stacks: StackClient;
  objects: ObjectStore;
  fleetStatus: FleetStatusStore;
  facts: ComputeFactsProvider;
  computeEnvironments: ComputeEnvironmentClient;
}
