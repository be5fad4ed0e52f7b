/**
 * Live Dry-Run Validators
 *
 * Whole-tree checks that ask the target account whether the configured
 * instances could be launched. One attempt each; when the account cannot
 * be asked, the check reports a warning instead of failing.
 */

import type { ClusterConfig } from '../config/root.js';
import type { ComputeFactsProvider, LaunchRequest } from '../cloud/types.js';
import type { LiveValidator, ValidationFinding } from './types.js';

interface LaunchCheck {
  /** What is being launched, used in messages */
  subject: string;
  path: string;
  request: LaunchRequest;
}

async function dryRunLaunches(
  validator: string,
  provider: ComputeFactsProvider,
  checks: readonly LaunchCheck[]
): Promise<ValidationFinding[]> {
  const findings: ValidationFinding[] = [];
  for (const { subject, path, request } of checks) {
    try {
      const result = await provider.dryRunLaunch(request);
      if (!result.allowed) {
        findings.push({
          validator,
          level: 'ERROR',
          message: `Unable to launch ${subject} with instance type '${request.instanceType}': ${result.reason ?? 'request denied'}`,
          path,
        });
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      findings.push({
        validator,
        level: 'WARNING',
        message: `Unable to verify that ${subject} can be launched: ${message}`,
        path,
      });
    }
  }
  return findings;
}

function clusterImage(config: ClusterConfig): string | undefined {
  return config.find('image')?.getString('CustomAmi') ?? undefined;
}

/**
 * Launch check for the head node.
 */
export function headNodeLaunchChecks(config: ClusterConfig): LaunchCheck[] {
  const headNode = config.find('head_node');
  const networking = config.find('head_node', 'head_node_networking');
  const instanceType = headNode?.getString('InstanceType') ?? null;
  const subnetId = networking?.getString('SubnetId') ?? null;
  if (!headNode || instanceType === null || subnetId === null) {
    return [];
  }
  const imageId = clusterImage(config);
  return [
    {
      subject: 'the head node',
      path: headNode.displayName,
      request: imageId === undefined ? { instanceType, subnetId } : { instanceType, subnetId, imageId },
    },
  ];
}

/**
 * Launch checks for every compute resource with a single instance type.
 */
export function computeLaunchChecks(config: ClusterConfig): LaunchCheck[] {
  const checks: LaunchCheck[] = [];
  const queues = [
    ...config.getSections('slurm_queue').map((queue) => ({ queue, networkingKey: 'queue_networking' })),
    ...config.getSections('plugin_queue').map((queue) => ({ queue, networkingKey: 'plugin_queue_networking' })),
  ];
  for (const { queue, networkingKey } of queues) {
    const subnetId = config.childOf(queue, networkingKey)?.getList('SubnetIds')[0];
    if (subnetId === undefined) continue;
    const queueImage = config.childOf(queue, 'queue_image')?.getString('CustomAmi') ?? undefined;
    const imageId = queueImage ?? clusterImage(config);
    const resourceKey = queue.key === 'slurm_queue' ? 'slurm_compute_resource' : 'plugin_compute_resource';

    for (const resource of config.childrenOf(queue, resourceKey)) {
      const instanceType = resource.getString('InstanceType');
      if (instanceType === null) continue;
      checks.push({
        subject: `compute resource '${resource.label}' of queue '${queue.label}'`,
        path: resource.displayName,
        request: imageId === undefined ? { instanceType, subnetId } : { instanceType, subnetId, imageId },
      });
    }
  }
  return checks;
}

export const headNodeLaunchDryRun: LiveValidator = {
  name: 'head_node_launch_dry_run',
  run: (config, provider) => dryRunLaunches('head_node_launch_dry_run', provider, headNodeLaunchChecks(config)),
};

export const computeLaunchDryRun: LiveValidator = {
  name: 'compute_launch_dry_run',
  run: (config, provider) => dryRunLaunches('compute_launch_dry_run', provider, computeLaunchChecks(config)),
};

export const LIVE_VALIDATORS: readonly LiveValidator[] = [headNodeLaunchDryRun, computeLaunchDryRun];
