/**
 * Local Backend Record Schemas
 *
 * Typed JSON Schemas for every record the local backend keeps on disk.
 * Records are validated with Ajv before use.
 */

import Ajv, { type ErrorObject, type JSONSchemaType, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

import { CloudClientError } from '../cloud/errors.js';
import {
  STACK_STATUSES,
  type InstanceTypeInfo,
  type SecurityGroupInfo,
  type SecurityGroupRule,
  type StackStatus,
  type SubnetInfo,
} from '../cloud/types.js';
import type { FleetStatus, HeadNodeState } from '../update/types.js';

// =============================================================================
// Record Types
// =============================================================================

export interface StackRecord {
  name: string;
  status: StackStatus;
  statusReason?: string;
  templateUrl: string;
  parameters: Record<string, string>;
  tags: Record<string, string>;
  outputs: Record<string, string>;
  disableRollback: boolean;
  createdAt: string;
  updatedAt?: string;
}

export interface FleetStatusRecord {
  cluster: string;
  status: FleetStatus;
  updatedAt: string;
}

export interface ObjectVersionRecord {
  versionId: string;
  format: 'text' | 'json';
  createdAt: string;
}

export interface BucketManifest {
  bucket: string;
  /** Next version sequence number */
  sequence: number;
  objects: Record<string, ObjectVersionRecord[]>;
}

export interface ComputeEnvironmentRecord {
  name: string;
  enabled: boolean;
  minvCpus: number;
  desiredvCpus: number;
  maxvCpus: number;
}

export interface LaunchDenial {
  instanceType: string;
  reason: string;
}

/**
 * Account facts served by the local facts provider.
 */
export interface FactsCatalog {
  instanceTypes: InstanceTypeInfo[];
  subnets: SubnetInfo[];
  securityGroups: SecurityGroupInfo[];
  headNodes: Record<string, HeadNodeState>;
  launchDenials: LaunchDenial[];
}

// =============================================================================
// Schemas
// =============================================================================

const FLEET_STATUSES: readonly FleetStatus[] = ['STOPPED', 'STOPPING', 'STARTING', 'RUNNING', 'UNKNOWN'];
const HEAD_NODE_STATES: readonly HeadNodeState[] = [
  'pending',
  'running',
  'stopping',
  'stopped',
  'shutting-down',
  'terminated',
];

const stringMap: JSONSchemaType<Record<string, string>> = {
  type: 'object',
  additionalProperties: { type: 'string' },
  required: [],
};

export const stackRecordSchema: JSONSchemaType<StackRecord> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    status: { type: 'string', enum: STACK_STATUSES },
    statusReason: { type: 'string', nullable: true },
    templateUrl: { type: 'string' },
    parameters: stringMap,
    tags: stringMap,
    outputs: stringMap,
    disableRollback: { type: 'boolean' },
    createdAt: { type: 'string', format: 'date-time' },
    updatedAt: { type: 'string', format: 'date-time', nullable: true },
  },
  required: ['name', 'status', 'templateUrl', 'parameters', 'tags', 'outputs', 'disableRollback', 'createdAt'],
  additionalProperties: false,
};

export const fleetStatusRecordSchema: JSONSchemaType<FleetStatusRecord> = {
  type: 'object',
  properties: {
    cluster: { type: 'string', minLength: 1 },
    status: { type: 'string', enum: FLEET_STATUSES },
    updatedAt: { type: 'string', format: 'date-time' },
  },
  required: ['cluster', 'status', 'updatedAt'],
  additionalProperties: false,
};

export const bucketManifestSchema: JSONSchemaType<BucketManifest> = {
  type: 'object',
  properties: {
    bucket: { type: 'string', minLength: 1 },
    sequence: { type: 'integer', minimum: 0 },
    objects: {
      type: 'object',
      required: [],
      additionalProperties: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            versionId: { type: 'string', minLength: 1 },
            format: { type: 'string', enum: ['text', 'json'] },
            createdAt: { type: 'string', format: 'date-time' },
          },
          required: ['versionId', 'format', 'createdAt'],
          additionalProperties: false,
        },
      },
    },
  },
  required: ['bucket', 'sequence', 'objects'],
  additionalProperties: false,
};

export const computeEnvironmentRecordSchema: JSONSchemaType<ComputeEnvironmentRecord> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    enabled: { type: 'boolean' },
    minvCpus: { type: 'integer', minimum: 0 },
    desiredvCpus: { type: 'integer', minimum: 0 },
    maxvCpus: { type: 'integer', minimum: 0 },
  },
  required: ['name', 'enabled', 'minvCpus', 'desiredvCpus', 'maxvCpus'],
  additionalProperties: false,
};

const instanceTypeSchema: JSONSchemaType<InstanceTypeInfo> = {
  type: 'object',
  properties: {
    name: { type: 'string', minLength: 1 },
    vcpus: { type: 'integer', minimum: 1 },
    threadsPerCore: { type: 'integer', minimum: 1 },
    memoryMiB: { type: 'integer', minimum: 0 },
    gpus: { type: 'integer', minimum: 0 },
    efaSupported: { type: 'boolean' },
    architecture: { type: 'string', enum: ['x86_64', 'arm64'] },
  },
  required: ['name', 'vcpus', 'threadsPerCore', 'memoryMiB', 'gpus', 'efaSupported', 'architecture'],
  additionalProperties: false,
};

export const instanceTypeListSchema: JSONSchemaType<InstanceTypeInfo[]> = {
  type: 'array',
  items: instanceTypeSchema,
};

const ruleSchema: JSONSchemaType<SecurityGroupRule> = {
  type: 'object',
  properties: {
    protocol: { type: 'string' },
    fromPort: { type: 'integer', nullable: true },
    toPort: { type: 'integer', nullable: true },
    sourceGroupId: { type: 'string', nullable: true },
    cidr: { type: 'string', nullable: true },
  },
  required: ['protocol'],
  additionalProperties: false,
};

export const factsCatalogSchema: JSONSchemaType<FactsCatalog> = {
  type: 'object',
  properties: {
    instanceTypes: { type: 'array', items: instanceTypeSchema },
    subnets: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          vpcId: { type: 'string', minLength: 1 },
          availabilityZone: { type: 'string' },
        },
        required: ['id', 'vpcId', 'availabilityZone'],
        additionalProperties: false,
      },
    },
    securityGroups: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          vpcId: { type: 'string', minLength: 1 },
          ingress: { type: 'array', items: ruleSchema },
          egress: { type: 'array', items: ruleSchema },
        },
        required: ['id', 'vpcId', 'ingress', 'egress'],
        additionalProperties: false,
      },
    },
    headNodes: {
      type: 'object',
      required: [],
      additionalProperties: { type: 'string', enum: HEAD_NODE_STATES },
    },
    launchDenials: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          instanceType: { type: 'string' },
          reason: { type: 'string' },
        },
        required: ['instanceType', 'reason'],
        additionalProperties: false,
      },
    },
  },
  required: ['instanceTypes', 'subnets', 'securityGroups', 'headNodes', 'launchDenials'],
  additionalProperties: false,
};

// =============================================================================
// Validation
// =============================================================================

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

/**
 * Compiled record check that throws a FAILED CloudClientError on mismatch.
 */
export type RecordCheck<T> = (data: unknown, source: string) => T;

/**
 * Compile a record schema.
 *
 * @param schema - Typed JSON Schema of the record
 * @param service - Collaborator reported in errors
 */
export function recordCheck<T>(schema: JSONSchemaType<T>, service: string): RecordCheck<T> {
  const validate: ValidateFunction<T> = ajv.compile(schema);
  return (data, source) => {
    if (validate(data)) {
      return data;
    }
    throw new CloudClientError(
      `Invalid record ${source}: ${formatErrors(validate.errors ?? [])}`,
      'FAILED',
      service
    );
  };
}

function formatErrors(errors: ErrorObject[]): string {
  return errors
    .map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}
