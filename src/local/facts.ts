/**
 * Local Facts Provider
 *
 * Serves account facts from <stateDir>/facts.json merged over the bundled
 * instance-type catalog. The file is optional; every list in it is too.
 */

import { join } from 'node:path';

import { CloudClientError } from '../cloud/errors.js';
import type {
  ComputeFactsProvider,
  DryRunResult,
  InstanceTypeInfo,
  LaunchRequest,
  SecurityGroupInfo,
  SubnetInfo,
} from '../cloud/types.js';
import { isJsonObject } from '../lib/json.js';
import type { HeadNodeState } from '../update/types.js';
import { readTextIfExists } from './files.js';
import instanceTypeCatalog from './instance-types.json' with { type: 'json' };
import {
  factsCatalogSchema,
  instanceTypeListSchema,
  recordCheck,
  type FactsCatalog,
} from './schemas.js';

const SERVICE = 'facts';

const checkCatalog = recordCheck(factsCatalogSchema, SERVICE);
const checkInstanceTypes = recordCheck(instanceTypeListSchema, SERVICE);

/**
 * File name of the facts catalog inside the state directory.
 */
export const FACTS_FILE = 'facts.json';

/**
 * Instance types bundled with the package.
 */
export function bundledInstanceTypes(): InstanceTypeInfo[] {
  return checkInstanceTypes(instanceTypeCatalog, 'instance-types.json');
}

export class LocalFactsProvider implements ComputeFactsProvider {
  private readonly factsPath: string;

  constructor(stateDir: string) {
    this.factsPath = join(stateDir, FACTS_FILE);
  }

  async describeInstanceTypes(names: string[]): Promise<InstanceTypeInfo[]> {
    const catalog = await this.load();
    return catalog.instanceTypes.filter((type) => names.includes(type.name));
  }

  async describeSubnets(ids: string[]): Promise<SubnetInfo[]> {
    const catalog = await this.load();
    return catalog.subnets.filter((subnet) => ids.includes(subnet.id));
  }

  async describeSecurityGroups(ids: string[]): Promise<SecurityGroupInfo[]> {
    const catalog = await this.load();
    return catalog.securityGroups.filter((group) => ids.includes(group.id));
  }

  async getHeadNodeState(cluster: string): Promise<HeadNodeState | null> {
    const catalog = await this.load();
    return catalog.headNodes[cluster] ?? null;
  }

  async dryRunLaunch(request: LaunchRequest): Promise<DryRunResult> {
    const catalog = await this.load();
    const denial = catalog.launchDenials.find((entry) => entry.instanceType === request.instanceType);
    if (denial) {
      return { allowed: false, reason: denial.reason };
    }
    if (!catalog.instanceTypes.some((type) => type.name === request.instanceType)) {
      return { allowed: false, reason: `Instance type ${request.instanceType} is not offered` };
    }
    if (catalog.subnets.length > 0 && !catalog.subnets.some((subnet) => subnet.id === request.subnetId)) {
      return { allowed: false, reason: `Subnet ${request.subnetId} does not exist` };
    }
    return { allowed: true };
  }

  /**
   * Read the catalog. Entries of facts.json replace bundled instance
   * types with the same name.
   */
  private async load(): Promise<FactsCatalog> {
    const content = await readTextIfExists(this.factsPath);
    let data: unknown = {};
    if (content !== null) {
      try {
        data = JSON.parse(content);
      } catch (error) {
        throw new CloudClientError(`Invalid JSON in ${this.factsPath}`, 'FAILED', SERVICE, { cause: error });
      }
    }
    const partial = isJsonObject(data) ? data : {};
    const catalog = checkCatalog(
      { instanceTypes: [], subnets: [], securityGroups: [], headNodes: {}, launchDenials: [], ...partial },
      this.factsPath
    );

    const overridden = new Set(catalog.instanceTypes.map((type) => type.name));
    return {
      ...catalog,
      instanceTypes: [
        ...bundledInstanceTypes().filter((type) => !overridden.has(type.name)),
        ...catalog.instanceTypes,
      ],
    };
  }
}
