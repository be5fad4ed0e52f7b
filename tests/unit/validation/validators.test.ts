/**
 * Unit tests for the Validator Catalog
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ClusterConfig } from '../../../src/config/root.js';
import { createClusterRegistry } from '../../../src/config/schema/index.js';
import type { JsonObject } from '../../../src/lib/json.js';
import type { ValidationFinding } from '../../../src/validation/types.js';
import { awsBatchDocument, slurmDocument } from '../../helpers/documents.js';
import { instanceType, matchingFacts, type FakeFactsOptions } from '../../helpers/fakes.js';

const registry = createClusterRegistry();

const QUEUE_PATH = 'Scheduling.SlurmQueues[q1]';
const COMPUTE_PATH = `${QUEUE_PATH}.ComputeResources[cr1]`;

/**
 * Validate against matching facts and keep the findings of one validator.
 */
async function findingsOf(
  validator: string,
  document: JsonObject,
  facts: FakeFactsOptions = {}
): Promise<ValidationFinding[]> {
  const config = ClusterConfig.fromDocument(registry, document);
  const report = await config.validate({ provider: matchingFacts(facts) });
  return report.findings.filter((finding) => finding.validator === validator);
}

function error(validator: string, message: string, path: string): ValidationFinding {
  return { validator, level: 'ERROR', message, path };
}

function warning(validator: string, message: string, path: string): ValidationFinding {
  return { validator, level: 'WARNING', message, path };
}

// =============================================================================
// Parameter Validators
// =============================================================================

describe('instance_type', () => {
  it('should check every type of a list', async () => {
    const document = awsBatchDocument();

    const findings = await findingsOf('instance_type', document, {
      instanceTypes: [instanceType('t3.medium')],
    });

    assert.deepStrictEqual(findings, [
      error(
        'instance_type',
        "The instance type 'c5.xlarge' is not supported in this region",
        'Scheduling.AwsBatchQueues[batch].ComputeResources[ce].InstanceTypes'
      ),
    ]);
  });
});

describe('subnet', () => {
  it('should report subnets that do not exist', async () => {
    const findings = await findingsOf('subnet', slurmDocument(), {
      subnets: [{ id: 'subnet-0head', vpcId: 'vpc-0test', availabilityZone: 'us-east-1a' }],
    });

    assert.deepStrictEqual(findings, [
      error('subnet', "The subnet 'subnet-0compute' does not exist", `${QUEUE_PATH}.Networking.SubnetIds`),
    ]);
  });
});

describe('security_groups', () => {
  it('should report security groups that do not exist', async () => {
    const document = slurmDocument({
      root: {
        HeadNode: {
          InstanceType: 't3.medium',
          Networking: { SubnetId: 'subnet-0head', SecurityGroups: ['sg-0known', 'sg-0missing'] },
        },
      },
    });

    const findings = await findingsOf('security_groups', document, {
      securityGroups: [{ id: 'sg-0known', vpcId: 'vpc-0test', ingress: [], egress: [] }],
    });

    assert.deepStrictEqual(findings, [
      error(
        'security_groups',
        "The security group 'sg-0missing' does not exist",
        'HeadNode.Networking.SecurityGroups'
      ),
    ]);
  });
});

describe('mount_dir', () => {
  it('should require absolute paths outside system directories', async () => {
    const document = slurmDocument({
      sharedStorage: [
        { Name: 'a', MountDir: 'relative', StorageType: 'Efs' },
        { Name: 'b', MountDir: '/usr/', StorageType: 'Efs' },
        { Name: 'c', MountDir: '/usr/local/data', StorageType: 'Efs' },
      ],
    });

    const findings = await findingsOf('mount_dir', document);

    assert.deepStrictEqual(findings, [
      error('mount_dir', "Mount directory 'relative' must be an absolute path", 'SharedStorage[a].MountDir'),
      error('mount_dir', "Mount directory '/usr/' is reserved for system use", 'SharedStorage[b].MountDir'),
    ]);
  });
});

describe('tags', () => {
  it('should reject reserved prefixes and duplicate keys', async () => {
    const document = slurmDocument({
      tags: [
        { Key: 'hpcstack:owner', Value: 'me' },
        { Key: 'team', Value: 'a' },
        { Key: 'team', Value: 'b' },
      ],
    });

    const findings = await findingsOf('tags', document);

    assert.deepStrictEqual(
      findings.map((finding) => finding.message),
      [
        "The tag key prefix 'hpcstack:' is reserved and cannot be used ('hpcstack:owner')",
        "Duplicate tag key 'team'",
      ]
    );
  });

  it('should require a list of key-value entries', async () => {
    const findings = await findingsOf('tags', slurmDocument({ tags: { team: 'a' } }));

    assert.deepStrictEqual(findings, [error('tags', 'Tags must be a list of {Key, Value} entries', 'Tags')]);
  });
});

// =============================================================================
// Section Validators
// =============================================================================

describe('compute_resource_size', () => {
  it('should require MinCount to be at most MaxCount', async () => {
    const findings = await findingsOf('compute_resource_size', slurmDocument({ minCount: 5, maxCount: 2 }));

    assert.deepStrictEqual(findings, [
      error('compute_resource_size', 'MaxCount (2) must be greater than or equal to MinCount (5)', COMPUTE_PATH),
    ]);
  });

  it('should check the vCPU bounds of batch compute resources', async () => {
    const document = awsBatchDocument();
    const findings = await findingsOf('compute_resource_size', {
      ...document,
      Scheduling: {
        Scheduler: 'awsbatch',
        AwsBatchQueues: [
          {
            Name: 'batch',
            Networking: { SubnetIds: ['subnet-0compute'] },
            ComputeResources: [{ Name: 'ce', InstanceTypes: ['c5.xlarge'], MinvCpus: 8, MaxvCpus: 4 }],
          },
        ],
      },
    });

    assert.deepStrictEqual(
      findings.map((finding) => finding.message),
      ['The vCPU settings must satisfy MinvCpus (8) <= DesiredvCpus (8) <= MaxvCpus (4)']
    );
  });
});

describe('scheduler_queues', () => {
  it('should match queues to the scheduler', async () => {
    const findings = await findingsOf('scheduler_queues', slurmDocument({ scheduling: { Scheduler: 'awsbatch' } }));

    assert.deepStrictEqual(
      findings.map((finding) => finding.message),
      [
        "SlurmQueues cannot be used with scheduler 'awsbatch'",
        "Scheduler 'awsbatch' requires at least one entry in AwsBatchQueues",
      ]
    );
  });

  it('should reject Slurm settings for other schedulers', async () => {
    const document = awsBatchDocument();
    const findings = await findingsOf('scheduler_queues', {
      ...document,
      Scheduling: {
        Scheduler: 'plugin',
        SlurmSettings: { QueueUpdateStrategy: 'DRAIN' },
        SchedulerQueues: [
          {
            Name: 'p1',
            Networking: { SubnetIds: ['subnet-0compute'] },
            ComputeResources: [{ Name: 'n1', InstanceType: 'c5.large' }],
          },
        ],
      },
    });

    assert.deepStrictEqual(
      findings.map((finding) => finding.message),
      ["SlurmSettings cannot be used with scheduler 'plugin'"]
    );
  });
});

describe('efa', () => {
  it('should check instance support and recommend a placement group', async () => {
    const findings = await findingsOf('efa', slurmDocument({ efa: { Enabled: true } }));

    assert.deepStrictEqual(findings, [
      error('efa', "Instance type 'c5.xlarge' does not support EFA", `${COMPUTE_PATH}.Efa`),
      warning('efa', "A placement group is recommended for EFA-enabled compute resource 'cr1'", `${COMPUTE_PATH}.Efa`),
    ]);
  });

  it('should accept a supported instance type in a placement group', async () => {
    const findings = await findingsOf(
      'efa',
      slurmDocument({ efa: { Enabled: true }, placementGroup: { Enabled: true } }),
      { instanceTypes: [instanceType('t3.medium'), instanceType('c5.xlarge', { efaSupported: true })] }
    );

    assert.deepStrictEqual(findings, []);
  });

  it('should require a self-referencing security group when groups are known', async () => {
    const document = slurmDocument({
      efa: { Enabled: true },
      scheduling: {
        SlurmQueues: [
          {
            Name: 'q1',
            Networking: {
              SubnetIds: ['subnet-0compute'],
              SecurityGroups: ['sg-0open'],
              PlacementGroup: { Id: 'pg-existing' },
            },
            ComputeResources: [{ Name: 'cr1', InstanceType: 'c5n.18xlarge', Efa: { Enabled: true } }],
          },
        ],
      },
    });

    const findings = await findingsOf('efa', document, {
      instanceTypes: [instanceType('t3.medium'), instanceType('c5n.18xlarge', { efaSupported: true })],
      securityGroups: [
        {
          id: 'sg-0open',
          vpcId: 'vpc-0test',
          ingress: [{ protocol: 'tcp', fromPort: 22, toPort: 22, cidr: '0.0.0.0/0' }],
          egress: [{ protocol: '-1', cidr: '0.0.0.0/0' }],
        },
      ],
    });

    assert.deepStrictEqual(
      findings.map((finding) => finding.message),
      ["EFA requires a security group of queue 'q1' that allows all traffic to and from itself"]
    );
  });

  it('should warn about GPUDirect without EFA', async () => {
    const findings = await findingsOf('efa', slurmDocument({ efa: { GdrSupport: true } }));

    assert.deepStrictEqual(findings, [
      warning('efa', 'GdrSupport has no effect when EFA is not enabled', `${COMPUTE_PATH}.Efa`),
    ]);
  });
});

describe('disable_smt', () => {
  it('should reject single-threaded instance types', async () => {
    const document = slurmDocument({
      computeResource: { Name: 'cr1', InstanceType: 'c6g.large', DisableSimultaneousMultithreading: true },
    });

    const findings = await findingsOf('disable_smt', document, {
      instanceTypes: [instanceType('t3.medium'), instanceType('c6g.large', { threadsPerCore: 1 })],
    });

    assert.deepStrictEqual(findings, [
      error(
        'disable_smt',
        "Disabling simultaneous multithreading is not supported on instance type 'c6g.large'",
        COMPUTE_PATH
      ),
    ]);
  });
});

describe('ebs_settings', () => {
  it('should check size, IOPS and throughput per volume type', async () => {
    const document = slurmDocument({
      sharedStorage: [
        { Name: 'fast', MountDir: '/fast', StorageType: 'Ebs', EbsSettings: { VolumeType: 'io1' } },
        { Name: 'cold', MountDir: '/cold', StorageType: 'Ebs', EbsSettings: { VolumeType: 'sc1' } },
        {
          Name: 'bulk',
          MountDir: '/bulk',
          StorageType: 'Ebs',
          EbsSettings: { VolumeType: 'st1', Size: 500, Throughput: 200 },
        },
      ],
    });

    const findings = await findingsOf('ebs_settings', document);

    assert.deepStrictEqual(findings, [
      error('ebs_settings', "Iops must be set for volume type 'io1'", 'SharedStorage[fast].EbsSettings'),
      error(
        'ebs_settings',
        "Size of a 'sc1' volume must be between 125 and 16384 GiB",
        'SharedStorage[cold].EbsSettings'
      ),
      warning('ebs_settings', "Throughput is ignored for volume type 'st1'", 'SharedStorage[bulk].EbsSettings'),
    ]);
  });
});

describe('shared_storage_type', () => {
  it('should reject settings of another storage type', async () => {
    const document = slurmDocument({
      sharedStorage: [{ Name: 'data', MountDir: '/data', StorageType: 'Efs', EbsSettings: {} }],
    });

    const findings = await findingsOf('shared_storage_type', document);

    assert.deepStrictEqual(findings, [
      error('shared_storage_type', "EbsSettings cannot be used with StorageType 'Efs'", 'SharedStorage[data]'),
    ]);
  });
});

describe('duplicate_mount_dir', () => {
  it('should compare mount directories without trailing slashes', async () => {
    const document = slurmDocument({
      sharedStorage: [
        { Name: 'a', MountDir: '/shared', StorageType: 'Efs' },
        { Name: 'b', MountDir: '/shared/', StorageType: 'Efs' },
      ],
    });

    const findings = await findingsOf('duplicate_mount_dir', document);

    assert.deepStrictEqual(findings, [
      error('duplicate_mount_dir', "Mount directory '/shared' is used by more than one shared storage: a, b", 'cluster'),
    ]);
  });
});

describe('queue_subnets_vpc', () => {
  it('should keep queue subnets in the head node VPC', async () => {
    const findings = await findingsOf('queue_subnets_vpc', slurmDocument(), {
      subnets: [
        { id: 'subnet-0head', vpcId: 'vpc-0test', availabilityZone: 'us-east-1a' },
        { id: 'subnet-0compute', vpcId: 'vpc-0other', availabilityZone: 'us-east-1b' },
      ],
    });

    assert.deepStrictEqual(findings, [
      error(
        'queue_subnets_vpc',
        `Subnet 'subnet-0compute' of ${QUEUE_PATH}.Networking is in VPC 'vpc-0other', not in the head node VPC 'vpc-0test'`,
        'Scheduling'
      ),
    ]);
  });
});

describe('dcv_os', () => {
  it('should reject DCV on unsupported operating systems', async () => {
    const findings = await findingsOf('dcv_os', slurmDocument({ os: 'rhel9', dcv: { Enabled: true } }));

    assert.deepStrictEqual(findings, [
      error(
        'dcv_os',
        "DCV is not supported on OS 'rhel9'; supported: alinux2, ubuntu2004, ubuntu2204, rhel8",
        'HeadNode.Dcv'
      ),
    ]);
  });

  it('should ignore disabled DCV', async () => {
    const findings = await findingsOf('dcv_os', slurmDocument({ os: 'rhel9', dcv: { Enabled: false } }));

    assert.deepStrictEqual(findings, []);
  });
});
