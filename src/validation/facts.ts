/**
 * Facts Snapshot
 *
 * Compute and network facts fetched once per validation pass, so that
 * synchronous validators can look them up without talking to the account.
 */

import type { ClusterConfig } from '../config/root.js';
import type {
  ComputeFactsProvider,
  InstanceTypeInfo,
  SecurityGroupInfo,
  SubnetInfo,
} from '../cloud/types.js';
import type { ValidationFinding } from './types.js';

/**
 * Result of a fact lookup.
 *
 * `unknown` means no facts were fetched; validators stay silent then.
 */
export type Lookup<T> =
  | { status: 'found'; value: T }
  | { status: 'missing' }
  | { status: 'unknown' };

const UNKNOWN: { status: 'unknown' } = { status: 'unknown' };

export class FactsSnapshot {
  private constructor(
    private readonly instanceTypes: ReadonlyMap<string, InstanceTypeInfo> | null,
    private readonly subnets: ReadonlyMap<string, SubnetInfo> | null,
    private readonly securityGroups: ReadonlyMap<string, SecurityGroupInfo> | null
  ) {}

  /**
   * Snapshot with no facts; every lookup is unknown.
   */
  static empty(): FactsSnapshot {
    return new FactsSnapshot(null, null, null);
  }

  static of(
    instanceTypes: readonly InstanceTypeInfo[],
    subnets: readonly SubnetInfo[],
    securityGroups: readonly SecurityGroupInfo[]
  ): FactsSnapshot {
    return new FactsSnapshot(
      new Map(instanceTypes.map((info) => [info.name, info])),
      new Map(subnets.map((info) => [info.id, info])),
      new Map(securityGroups.map((info) => [info.id, info]))
    );
  }

  get available(): boolean {
    return this.instanceTypes !== null;
  }

  instanceType(name: string): Lookup<InstanceTypeInfo> {
    return lookup(this.instanceTypes, name);
  }

  subnet(id: string): Lookup<SubnetInfo> {
    return lookup(this.subnets, id);
  }

  securityGroup(id: string): Lookup<SecurityGroupInfo> {
    return lookup(this.securityGroups, id);
  }
}

function lookup<T>(table: ReadonlyMap<string, T> | null, key: string): Lookup<T> {
  if (table === null) {
    return UNKNOWN;
  }
  const value = table.get(key);
  return value === undefined ? { status: 'missing' } : { status: 'found', value };
}

// =============================================================================
// Collection
// =============================================================================

/**
 * Identifiers referenced anywhere in a configuration.
 */
export interface ReferencedIds {
  instanceTypes: string[];
  subnets: string[];
  securityGroups: string[];
}

/**
 * Scan every section for instance types, subnets and security groups.
 */
export function referencedIds(config: ClusterConfig): ReferencedIds {
  const instanceTypes = new Set<string>();
  const subnets = new Set<string>();
  const securityGroups = new Set<string>();

  const targets: Record<string, Set<string>> = {
    InstanceType: instanceTypes,
    InstanceTypes: instanceTypes,
    SubnetId: subnets,
    SubnetIds: subnets,
    SecurityGroups: securityGroups,
  };

  for (const section of config.allSections()) {
    for (const param of section.parameters()) {
      const target = targets[param.key];
      const value = param.value;
      if (!target || value === null) continue;
      if (value.type === 'string') {
        target.add(value.value);
      } else if (value.type === 'string-list') {
        value.value.forEach((item) => target.add(item));
      }
    }
  }

  return {
    instanceTypes: [...instanceTypes],
    subnets: [...subnets],
    securityGroups: [...securityGroups],
  };
}

/**
 * Fetch the facts a configuration refers to.
 *
 * A provider failure does not abort validation: it yields an empty
 * snapshot and a single warning.
 */
export async function collectFacts(
  config: ClusterConfig,
  provider: ComputeFactsProvider
): Promise<{ facts: FactsSnapshot; findings: ValidationFinding[] }> {
  const ids = referencedIds(config);
  try {
    const instanceTypes = await provider.describeInstanceTypes(ids.instanceTypes);
    const subnets = await provider.describeSubnets(ids.subnets);
    const securityGroups = await provider.describeSecurityGroups(ids.securityGroups);
    return { facts: FactsSnapshot.of(instanceTypes, subnets, securityGroups), findings: [] };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      facts: FactsSnapshot.empty(),
      findings: [
        {
          validator: 'facts',
          level: 'WARNING',
          message: `Unable to fetch account facts, related checks were skipped: ${message}`,
        },
      ],
    };
  }
}
