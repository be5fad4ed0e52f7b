/**
 * Validator Catalog
 *
 * Parameter- and section-level rules. Each is a named record; schema
 * definitions attach them to the parameters and sections they check.
 */

import { asList, asString, type ParamValue } from '../config/params.js';
import { isJsonObject } from '../lib/json.js';
import type { SecurityGroupInfo } from '../cloud/types.js';
import {
  noFindings,
  type ParamValidator,
  type SectionValidator,
  type ValidationContext,
  type ValidatorOutput,
} from './types.js';

/** Tag key prefix used by the controller */
export const RESERVED_TAG_PREFIX = 'hpcstack:';
export const MAX_TAGS = 50;

const RESERVED_MOUNT_DIRS = [
  '/',
  '/bin',
  '/boot',
  '/dev',
  '/etc',
  '/lib',
  '/lib64',
  '/opt/slurm',
  '/proc',
  '/root',
  '/sbin',
  '/sys',
  '/usr',
  '/var',
];

const DCV_SUPPORTED_OSES = ['alinux2', 'ubuntu2004', 'ubuntu2204', 'rhel8'];

/**
 * Volume size bounds in GiB per EBS volume type.
 */
const EBS_SIZE_LIMITS: Record<string, [number, number]> = {
  gp2: [1, 16384],
  gp3: [1, 16384],
  io1: [4, 16384],
  io2: [4, 65536],
  sc1: [125, 16384],
  st1: [125, 16384],
  standard: [1, 1024],
};

const STORAGE_SETTINGS: Record<string, string> = {
  Ebs: 'EbsSettings',
  Efs: 'EfsSettings',
  FsxLustre: 'FsxLustreSettings',
};

function itemsOf(value: ParamValue): readonly string[] {
  return value.type === 'string' ? [value.value] : asList(value);
}

function output(errors: string[] = [], warnings: string[] = [], infos: string[] = []): ValidatorOutput {
  return { errors, warnings, infos };
}

// =============================================================================
// Parameter Validators
// =============================================================================

export const instanceTypeValidator: ParamValidator = {
  name: 'instance_type',
  run(_key, value, _section, context) {
    const errors = itemsOf(value)
      .filter((name) => context.facts.instanceType(name).status === 'missing')
      .map((name) => `The instance type '${name}' is not supported in this region`);
    return output(errors);
  },
};

export const subnetValidator: ParamValidator = {
  name: 'subnet',
  run(_key, value, _section, context) {
    const errors = itemsOf(value)
      .filter((id) => context.facts.subnet(id).status === 'missing')
      .map((id) => `The subnet '${id}' does not exist`);
    return output(errors);
  },
};

export const securityGroupsValidator: ParamValidator = {
  name: 'security_groups',
  run(_key, value, _section, context) {
    const errors = itemsOf(value)
      .filter((id) => context.facts.securityGroup(id).status === 'missing')
      .map((id) => `The security group '${id}' does not exist`);
    return output(errors);
  },
};

export const mountDirValidator: ParamValidator = {
  name: 'mount_dir',
  run(_key, value) {
    const dir = asString(value);
    if (dir === null) return noFindings();
    if (!dir.startsWith('/')) {
      return output([`Mount directory '${dir}' must be an absolute path`]);
    }
    const normalized = dir.length > 1 ? dir.replace(/\/+$/, '') : dir;
    if (RESERVED_MOUNT_DIRS.includes(normalized)) {
      return output([`Mount directory '${dir}' is reserved for system use`]);
    }
    return noFindings();
  },
};

export const tagsValidator: ParamValidator = {
  name: 'tags',
  run(_key, value) {
    if (value.type !== 'json') return noFindings();
    const tags = value.value;
    if (!Array.isArray(tags)) {
      return output(['Tags must be a list of {Key, Value} entries']);
    }
    const errors: string[] = [];
    const seen = new Set<string>();
    for (const tag of tags) {
      const key = isJsonObject(tag) ? tag['Key'] : undefined;
      if (!isJsonObject(tag) || typeof key !== 'string' || typeof tag['Value'] !== 'string') {
        errors.push('Tags must be a list of {Key, Value} entries');
        continue;
      }
      if (key.startsWith(RESERVED_TAG_PREFIX)) {
        errors.push(`The tag key prefix '${RESERVED_TAG_PREFIX}' is reserved and cannot be used ('${key}')`);
      }
      if (seen.has(key)) {
        errors.push(`Duplicate tag key '${key}'`);
      }
      seen.add(key);
    }
    if (tags.length > MAX_TAGS) {
      errors.push(`There can be at most ${MAX_TAGS} tags, found ${tags.length}`);
    }
    return output(errors);
  },
};

// =============================================================================
// Section Validators
// =============================================================================

export const computeResourceSizeValidator: SectionValidator = {
  name: 'compute_resource_size',
  run(section) {
    const params = new Set(section.parameters().map((param) => param.key));
    if (params.has('MinCount') && params.has('MaxCount')) {
      const min = section.getNumber('MinCount') ?? 0;
      const max = section.getNumber('MaxCount') ?? 0;
      if (min > max) {
        return output([`MaxCount (${max}) must be greater than or equal to MinCount (${min})`]);
      }
    }
    if (params.has('MinvCpus') && params.has('MaxvCpus')) {
      const min = section.getNumber('MinvCpus') ?? 0;
      const desired = section.getNumber('DesiredvCpus') ?? min;
      const max = section.getNumber('MaxvCpus') ?? 0;
      if (min > desired || desired > max) {
        return output([
          `The vCPU settings must satisfy MinvCpus (${min}) <= DesiredvCpus (${desired}) <= MaxvCpus (${max})`,
        ]);
      }
    }
    return noFindings();
  },
};

const QUEUE_SETTINGS: Record<string, string> = {
  slurm: 'SlurmQueues',
  awsbatch: 'AwsBatchQueues',
  plugin: 'SchedulerQueues',
};

export const schedulerQueuesValidator: SectionValidator = {
  name: 'scheduler_queues',
  run(section) {
    const scheduler = section.getString('Scheduler');
    if (scheduler === null) return noFindings();
    const errors: string[] = [];
    for (const [name, settingsKey] of Object.entries(QUEUE_SETTINGS)) {
      const count = section.getList(settingsKey).length;
      if (name === scheduler && count === 0) {
        errors.push(`Scheduler '${scheduler}' requires at least one entry in ${settingsKey}`);
      } else if (name !== scheduler && count > 0) {
        errors.push(`${settingsKey} cannot be used with scheduler '${scheduler}'`);
      }
    }
    if (scheduler !== 'slurm' && section.getList('SlurmSettings').length > 0) {
      errors.push(`SlurmSettings cannot be used with scheduler '${scheduler}'`);
    }
    return output(errors);
  },
};

function securityGroupsOf(ids: readonly string[], context: ValidationContext): SecurityGroupInfo[] {
  return ids.flatMap((id) => {
    const found = context.facts.securityGroup(id);
    return found.status === 'found' ? [found.value] : [];
  });
}

function allowsSelf(group: SecurityGroupInfo): boolean {
  const selfRule = (rules: SecurityGroupInfo['ingress']): boolean =>
    rules.some((rule) => rule.protocol === '-1' && rule.sourceGroupId === group.id);
  return selfRule(group.ingress) && selfRule(group.egress);
}

export const efaValidator: SectionValidator = {
  name: 'efa',
  run(section, context) {
    if (section.getBool('Enabled') !== true) {
      if (section.getBool('GdrSupport') === true) {
        return output([], ['GdrSupport has no effect when EFA is not enabled']);
      }
      return noFindings();
    }
    const { config, facts } = context;
    const computeResource = config.parentOf(section);
    const queue = computeResource ? config.parentOf(computeResource) : undefined;
    if (!computeResource || !queue) return noFindings();

    const errors: string[] = [];
    const warnings: string[] = [];
    const instanceType = computeResource.getString('InstanceType');
    if (instanceType !== null) {
      const info = facts.instanceType(instanceType);
      if (info.status === 'found' && !info.value.efaSupported) {
        errors.push(`Instance type '${instanceType}' does not support EFA`);
      }
    }

    const networking = config.childOf(queue, 'queue_networking');
    const placementGroup = networking ? config.childOf(networking, 'placement_group') : undefined;
    if (placementGroup?.getBool('Enabled') !== true && (placementGroup?.getString('Id') ?? null) === null) {
      warnings.push(
        `A placement group is recommended for EFA-enabled compute resource '${computeResource.label}'`
      );
    }

    const groupIds = networking?.getList('SecurityGroups') ?? [];
    const groups = securityGroupsOf(groupIds, context);
    if (groups.length > 0 && groups.length === groupIds.length && !groups.some(allowsSelf)) {
      errors.push(
        `EFA requires a security group of queue '${queue.label}' that allows all traffic to and from itself`
      );
    }
    return output(errors, warnings);
  },
};

export const disableSmtValidator: SectionValidator = {
  name: 'disable_smt',
  run(section, context) {
    if (section.getBool('DisableSimultaneousMultithreading') !== true) return noFindings();
    const instanceType = section.getString('InstanceType');
    if (instanceType === null) return noFindings();
    const info = context.facts.instanceType(instanceType);
    if (info.status === 'found' && info.value.threadsPerCore <= 1) {
      return output([
        `Disabling simultaneous multithreading is not supported on instance type '${instanceType}'`,
      ]);
    }
    return noFindings();
  },
};

export const ebsSettingsValidator: SectionValidator = {
  name: 'ebs_settings',
  run(section) {
    const volumeType = section.getString('VolumeType');
    if (volumeType === null) return noFindings();
    const errors: string[] = [];
    const warnings: string[] = [];

    const size = section.getNumber('Size');
    const limits = EBS_SIZE_LIMITS[volumeType];
    if (size !== null && limits && (size < limits[0] || size > limits[1])) {
      errors.push(`Size of a '${volumeType}' volume must be between ${limits[0]} and ${limits[1]} GiB`);
    }
    if ((volumeType === 'io1' || volumeType === 'io2') && section.getNumber('Iops') === null) {
      errors.push(`Iops must be set for volume type '${volumeType}'`);
    }
    if (volumeType !== 'gp3' && section.getNumber('Throughput') !== null) {
      warnings.push(`Throughput is ignored for volume type '${volumeType}'`);
    }
    return output(errors, warnings);
  },
};

export const sharedStorageTypeValidator: SectionValidator = {
  name: 'shared_storage_type',
  run(section) {
    const storageType = section.getString('StorageType');
    if (storageType === null) return noFindings();
    const errors = Object.values(STORAGE_SETTINGS)
      .filter((settingsKey) => settingsKey !== STORAGE_SETTINGS[storageType])
      .filter((settingsKey) => section.getList(settingsKey).length > 0)
      .map((settingsKey) => `${settingsKey} cannot be used with StorageType '${storageType}'`);
    return output(errors);
  },
};

export const duplicateMountDirValidator: SectionValidator = {
  name: 'duplicate_mount_dir',
  run(section, context) {
    const owners = new Map<string, string[]>();
    for (const storage of context.config.childrenOf(section, 'shared_storage')) {
      const dir = storage.getString('MountDir');
      if (dir === null) continue;
      const normalized = dir.length > 1 ? dir.replace(/\/+$/, '') : dir;
      owners.set(normalized, [...(owners.get(normalized) ?? []), storage.label]);
    }
    const errors = [...owners.entries()]
      .filter(([, labels]) => labels.length > 1)
      .map(([dir, labels]) => `Mount directory '${dir}' is used by more than one shared storage: ${labels.join(', ')}`);
    return output(errors);
  },
};

export const queueSubnetsVpcValidator: SectionValidator = {
  name: 'queue_subnets_vpc',
  run(_section, context) {
    const { config, facts } = context;
    const headSubnet = config.find('head_node', 'head_node_networking')?.getString('SubnetId') ?? null;
    if (headSubnet === null) return noFindings();
    const head = facts.subnet(headSubnet);
    if (head.status !== 'found') return noFindings();

    const errors: string[] = [];
    for (const key of ['queue_networking', 'awsbatch_queue_networking', 'plugin_queue_networking']) {
      for (const networking of config.getSections(key)) {
        for (const id of networking.getList('SubnetIds')) {
          const subnet = facts.subnet(id);
          if (subnet.status === 'found' && subnet.value.vpcId !== head.value.vpcId) {
            errors.push(
              `Subnet '${id}' of ${networking.displayName} is in VPC '${subnet.value.vpcId}', ` +
                `not in the head node VPC '${head.value.vpcId}'`
            );
          }
        }
      }
    }
    return output(errors);
  },
};

export const dcvOsValidator: SectionValidator = {
  name: 'dcv_os',
  run(section, context) {
    if (section.getBool('Enabled') !== true) return noFindings();
    const os = context.config.find('image')?.getString('Os') ?? null;
    if (os !== null && !DCV_SUPPORTED_OSES.includes(os)) {
      return output([`DCV is not supported on OS '${os}'; supported: ${DCV_SUPPORTED_OSES.join(', ')}`]);
    }
    return noFindings();
  },
};

export const customBucketValidator: SectionValidator = {
  name: 'custom_bucket',
  run(section) {
    const bucket = section.getString('CustomS3Bucket');
    if (bucket === null) return noFindings();
    return output(
      [],
      [],
      [`The cluster stores its artifacts in the custom bucket '${bucket}', which is kept when the cluster is deleted`]
    );
  },
};
