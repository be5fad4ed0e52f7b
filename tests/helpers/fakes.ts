/**
 * In-Process Collaborator Fakes
 */

import type {
  ComputeFactsProvider,
  DryRunResult,
  InstanceTypeInfo,
  LaunchRequest,
  SecurityGroupInfo,
  SubnetInfo,
} from '../../src/cloud/types.js';
import type { HeadNodeState } from '../../src/update/types.js';

export function instanceType(name: string, overrides: Partial<InstanceTypeInfo> = {}): InstanceTypeInfo {
  return {
    name,
    vcpus: 4,
    threadsPerCore: 2,
    memoryMiB: 8192,
    gpus: 0,
    efaSupported: false,
    architecture: 'x86_64',
    ...overrides,
  };
}

export interface FakeFactsOptions {
  instanceTypes?: InstanceTypeInfo[];
  subnets?: SubnetInfo[];
  securityGroups?: SecurityGroupInfo[];
  headNodeState?: HeadNodeState | null;
  /** Reason per instance type for denied launches */
  denials?: Record<string, string>;
  /** Error thrown by every describe call */
  describeError?: Error;
  /** Error thrown by every dry-run launch */
  launchError?: Error;
}

/**
 * Facts provider answering from fixed tables and recording launches.
 */
export class FakeFactsProvider implements ComputeFactsProvider {
  readonly launches: LaunchRequest[] = [];

  constructor(private readonly options: FakeFactsOptions = {}) {}

  async describeInstanceTypes(names: string[]): Promise<InstanceTypeInfo[]> {
    this.failDescribe();
    return (this.options.instanceTypes ?? []).filter((info) => names.includes(info.name));
  }

  async describeSubnets(ids: string[]): Promise<SubnetInfo[]> {
    this.failDescribe();
    return (this.options.subnets ?? []).filter((info) => ids.includes(info.id));
  }

  async describeSecurityGroups(ids: string[]): Promise<SecurityGroupInfo[]> {
    this.failDescribe();
    return (this.options.securityGroups ?? []).filter((info) => ids.includes(info.id));
  }

  async getHeadNodeState(): Promise<HeadNodeState | null> {
    return this.options.headNodeState ?? null;
  }

  async dryRunLaunch(request: LaunchRequest): Promise<DryRunResult> {
    this.launches.push(request);
    if (this.options.launchError) {
      throw this.options.launchError;
    }
    const reason = this.options.denials?.[request.instanceType];
    return reason === undefined ? { allowed: true } : { allowed: false, reason };
  }

  private failDescribe(): void {
    if (this.options.describeError) {
      throw this.options.describeError;
    }
  }
}

/**
 * Facts matching the documents built by slurmDocument().
 */
export function matchingFacts(overrides: FakeFactsOptions = {}): FakeFactsProvider {
  return new FakeFactsProvider({
    instanceTypes: [instanceType('t3.medium', { vcpus: 2 }), instanceType('c5.xlarge'), instanceType('c5.large')],
    subnets: [
      { id: 'subnet-0head', vpcId: 'vpc-0test', availabilityZone: 'us-east-1a' },
      { id: 'subnet-0compute', vpcId: 'vpc-0test', availabilityZone: 'us-east-1b' },
    ],
    securityGroups: [],
    ...overrides,
  });
}
