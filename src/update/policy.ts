/**
 * Update Policy Catalog
 *
 * Every policy is a plain record built from pure functions of
 * (change, patch). The policy with the highest level among a change's
 * candidates decides its verdict.
 */

import { isJsonObject, type JsonObject, type JsonValue } from '../lib/json.js';
import type {
  Change,
  ChangeVerdict,
  PatchContext,
  PolicyText,
  UpdatePolicy,
} from './types.js';

// =============================================================================
// Queue Update Strategy
// =============================================================================

export type QueueUpdateStrategy = 'COMPUTE_FLEET_STOP' | 'DRAIN' | 'TERMINATE';

export const QUEUE_UPDATE_STRATEGIES: readonly QueueUpdateStrategy[] = [
  'COMPUTE_FLEET_STOP',
  'DRAIN',
  'TERMINATE',
];

export const DEFAULT_QUEUE_UPDATE_STRATEGY: QueueUpdateStrategy = 'COMPUTE_FLEET_STOP';

const STOP_COMMAND = "Stop the compute fleet with the 'hpcstack stop' command";
const COMPUTE_FLEET_STOP_REASON = 'All compute nodes must be stopped';

// =============================================================================
// Document Navigation
// =============================================================================

const LIST_SEGMENT = /^(.+)\[(.+)\]$/;

/**
 * Resolve a change path against a resolved document.
 *
 * Segments of the form `Key[name]` select the list element whose Name is
 * `name`. Returns undefined when any segment is missing.
 */
export function locate(document: JsonObject, path: readonly string[]): JsonObject | undefined {
  let current: JsonObject = document;
  for (const segment of path) {
    const match = LIST_SEGMENT.exec(segment);
    let next: JsonValue | undefined;
    if (match) {
      const [, listKey = '', name] = match;
      const list = current[listKey];
      next = Array.isArray(list)
        ? list.find((item) => isJsonObject(item) && item['Name'] === name)
        : undefined;
    } else {
      next = current[segment];
    }
    if (!isJsonObject(next)) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/**
 * Dotted parameter path of a change.
 */
export function parameterPath(change: Pick<Change, 'path' | 'key'>): string {
  return [...change.path, change.key].join('.');
}

/**
 * Queue update strategy requested by the target configuration.
 */
export function queueUpdateStrategy(patch: PatchContext): QueueUpdateStrategy {
  const settings = locate(patch.targetConfig, ['Scheduling', 'SlurmSettings']);
  const value = settings?.['QueueUpdateStrategy'];
  return QUEUE_UPDATE_STRATEGIES.find((strategy) => strategy === value) ?? DEFAULT_QUEUE_UPDATE_STRATEGY;
}

/**
 * Whether the change touches Slurm queues, directly or below them.
 */
export function isSlurmQueuesChange(change: Change): boolean {
  return change.key === 'SlurmQueues' || change.path.some((segment) => segment.startsWith('SlurmQueues['));
}

function strategyRelaxes(change: Change, patch: PatchContext): boolean {
  return isSlurmQueuesChange(change) && queueUpdateStrategy(patch) !== DEFAULT_QUEUE_UPDATE_STRATEGY;
}

function fleetStopped(patch: PatchContext): boolean {
  return !patch.cluster.hasRunningCapacity();
}

function isAddition(change: Change): boolean {
  return change.isList && change.oldValue === null;
}

function numberOf(value: JsonValue | null | undefined): number | null {
  return typeof value === 'number' ? value : null;
}

function describe(value: JsonValue | null): string {
  if (value === null) return '-';
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// =============================================================================
// Condition Checkers
// =============================================================================

/**
 * Fleet stopped, or a queue change with DRAIN/TERMINATE requested.
 */
export function checkQueueUpdateStrategy(change: Change, patch: PatchContext): boolean {
  return fleetStopped(patch) || strategyRelaxes(change, patch);
}

/**
 * Like the queue strategy check, but a strategy only helps when every
 * element of the old list is still present in the new one.
 */
export function checkQueueUpdateStrategyOnRemove(change: Change, patch: PatchContext): boolean {
  if (fleetStopped(patch)) {
    return true;
  }
  if (!strategyRelaxes(change, patch)) {
    return false;
  }
  const oldItems = Array.isArray(change.oldValue) ? change.oldValue : [];
  const newItems = Array.isArray(change.newValue) ? change.newValue : [];
  return oldItems.every((item) => newItems.includes(item));
}

/**
 * Resizing rule for queues, compute resources and their counts.
 *
 * Additions and capacity growth are always fine; anything that can take
 * nodes away needs a stopped fleet or the TERMINATE strategy. MinCount may
 * only grow, and only while keeping the max-min gap.
 */
export function checkResizeUpdateStrategyOnRemove(change: Change, patch: PatchContext): boolean {
  if (fleetStopped(patch) || isAddition(change)) {
    return true;
  }
  if (isSlurmQueuesChange(change) && queueUpdateStrategy(patch) === 'TERMINATE') {
    return true;
  }
  if (change.key === 'MaxCount') {
    const oldMax = numberOf(change.oldValue);
    const newMax = numberOf(change.newValue);
    return oldMax === null || (newMax !== null && newMax >= oldMax);
  }
  if (change.key === 'MinCount') {
    const oldMin = numberOf(change.oldValue) ?? 0;
    const newMin = numberOf(change.newValue) ?? 0;
    const base = locate(patch.baseConfig, change.path);
    const target = locate(patch.targetConfig, change.path);
    const oldGap = (numberOf(base?.['MaxCount']) ?? 0) - oldMin;
    const newGap = (numberOf(target?.['MaxCount']) ?? 0) - newMin;
    return newMin >= oldMin && newGap >= oldGap;
  }
  return false;
}

/**
 * Whether the change tears down a placement group the cluster manages.
 *
 * A group is managed when it is enabled without an explicit Id.
 */
export function isManagedPlacementGroupDeletion(change: Change, patch: PatchContext): boolean {
  const queueIndex = change.path.findIndex((segment) => segment.startsWith('SlurmQueues['));
  if (queueIndex === -1) {
    return false;
  }
  const queuePath = change.path.slice(0, queueIndex + 1);
  const isManaged = (document: JsonObject): boolean => {
    const group = locate(document, [...queuePath, 'Networking', 'PlacementGroup']);
    return group?.['Enabled'] === true && typeof group['Id'] !== 'string';
  };
  return isManaged(patch.baseConfig) && !isManaged(patch.targetConfig);
}

function checkManagedPlacementGroup(change: Change, patch: PatchContext): boolean {
  if (isManagedPlacementGroupDeletion(change, patch)) {
    return fleetStopped(patch);
  }
  return checkQueueUpdateStrategy(change, patch);
}

// =============================================================================
// Messages
// =============================================================================

function queueStrategyReason(change: Change): string {
  if (isSlurmQueuesChange(change)) {
    return 'All compute nodes must be stopped or QueueUpdateStrategy must be set';
  }
  return COMPUTE_FLEET_STOP_REASON;
}

function queueStrategyAction(change: Change): string {
  if (isSlurmQueuesChange(change)) {
    return "Set QueueUpdateStrategy to DRAIN or TERMINATE in the configuration used for the 'hpcstack update' operation";
  }
  return STOP_COMMAND;
}

function resizeReason(change: Change): string {
  if (isSlurmQueuesChange(change)) {
    return 'All compute nodes must be stopped or QueueUpdateStrategy must be set to TERMINATE';
  }
  return COMPUTE_FLEET_STOP_REASON;
}

function resizeAction(change: Change): string {
  if (isSlurmQueuesChange(change)) {
    return "Set QueueUpdateStrategy to TERMINATE in the configuration used for the 'hpcstack update' operation";
  }
  return STOP_COMMAND;
}

// =============================================================================
// Policies
// =============================================================================

export const IGNORED: UpdatePolicy = {
  name: 'IGNORED',
  level: -10,
  conditionChecker: () => true,
  failReason: '-',
  actionNeeded: null,
  printSucceeded: false,
  failureResult: 'FAILED',
};

export const SUPPORTED: UpdatePolicy = {
  name: 'SUPPORTED',
  level: 0,
  conditionChecker: () => true,
  failReason: '-',
  actionNeeded: null,
  printSucceeded: true,
  failureResult: 'FAILED',
};

export const MAX_COUNT: UpdatePolicy = {
  name: 'MAX_COUNT',
  level: 1,
  conditionChecker: (change, patch) => {
    const oldMax = numberOf(change.oldValue);
    const newMax = numberOf(change.newValue);
    return fleetStopped(patch) || oldMax === null || (newMax !== null && newMax >= oldMax);
  },
  failReason: 'Shrinking a queue requires the compute fleet to be stopped first',
  actionNeeded: STOP_COMMAND,
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const INCREASE_ONLY: UpdatePolicy = {
  name: 'INCREASE_ONLY',
  level: 2,
  conditionChecker: (change) => {
    const oldValue = numberOf(change.oldValue);
    const newValue = numberOf(change.newValue);
    return oldValue === null || (newValue !== null && newValue >= oldValue);
  },
  failReason: (change) => `Value of parameter '${change.key}' cannot be decreased`,
  actionNeeded: (change) =>
    `Set '${change.key}' to a value greater than or equal to ${describe(change.oldValue)}`,
  printSucceeded: true,
  failureResult: 'FAILED',
};

export const AWSBATCH_CE_MAX_RESIZE: UpdatePolicy = {
  name: 'AWSBATCH_CE_MAX_RESIZE',
  level: 3,
  conditionChecker: (change, patch) => {
    const desired = patch.cluster.batchDesiredVcpus ?? 0;
    const newMax = numberOf(change.newValue);
    return newMax !== null && newMax >= desired;
  },
  failReason: (change, patch) =>
    `MaxvCpus cannot be lower than the current DesiredvCpus (${patch.cluster.batchDesiredVcpus ?? 0})`,
  actionNeeded: 'Wait for the queued jobs to complete, or set MaxvCpus to at least the current DesiredvCpus',
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const QUEUE_UPDATE_STRATEGY: UpdatePolicy = {
  name: 'QUEUE_UPDATE_STRATEGY',
  level: 5,
  conditionChecker: checkQueueUpdateStrategy,
  failReason: queueStrategyReason,
  actionNeeded: queueStrategyAction,
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const QUEUE_UPDATE_STRATEGY_ON_REMOVE: UpdatePolicy = {
  name: 'QUEUE_UPDATE_STRATEGY_ON_REMOVE',
  level: 5,
  conditionChecker: checkQueueUpdateStrategyOnRemove,
  failReason: (change, patch) => {
    if (strategyRelaxes(change, patch)) {
      return `Removing values from ${change.key} requires all compute nodes to be stopped`;
    }
    return queueStrategyReason(change);
  },
  actionNeeded: (change, patch) => {
    if (strategyRelaxes(change, patch)) {
      return STOP_COMMAND;
    }
    return queueStrategyAction(change);
  },
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const RESIZE_UPDATE_STRATEGY_ON_REMOVE: UpdatePolicy = {
  name: 'RESIZE_UPDATE_STRATEGY_ON_REMOVE',
  level: 5,
  conditionChecker: checkResizeUpdateStrategyOnRemove,
  failReason: resizeReason,
  actionNeeded: resizeAction,
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const MANAGED_PLACEMENT_GROUP: UpdatePolicy = {
  name: 'MANAGED_PLACEMENT_GROUP',
  level: 5,
  conditionChecker: checkManagedPlacementGroup,
  failReason: (change, patch) => {
    if (isManagedPlacementGroupDeletion(change, patch)) {
      return `${COMPUTE_FLEET_STOP_REASON} to delete a managed placement group`;
    }
    return queueStrategyReason(change);
  },
  actionNeeded: (change, patch) => {
    if (isManagedPlacementGroupDeletion(change, patch)) {
      return STOP_COMMAND;
    }
    return queueStrategyAction(change);
  },
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const SHARED_STORAGE_UPDATE: UpdatePolicy = {
  name: 'SHARED_STORAGE_UPDATE',
  level: 6,
  conditionChecker: (change, patch) =>
    fleetStopped(patch) || queueUpdateStrategy(patch) !== DEFAULT_QUEUE_UPDATE_STRATEGY,
  failReason: 'All compute nodes must be stopped or QueueUpdateStrategy must be set',
  actionNeeded:
    "Set QueueUpdateStrategy to DRAIN or TERMINATE in the configuration used for the 'hpcstack update' operation",
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const COMPUTE_FLEET_STOP: UpdatePolicy = {
  name: 'COMPUTE_FLEET_STOP',
  level: 10,
  conditionChecker: (change, patch) => fleetStopped(patch) || isAddition(change),
  failReason: COMPUTE_FLEET_STOP_REASON,
  actionNeeded: STOP_COMMAND,
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const HEAD_NODE_STOP: UpdatePolicy = {
  name: 'HEAD_NODE_STOP',
  level: 20,
  conditionChecker: (change, patch) => patch.cluster.headNodeState === 'stopped',
  failReason: 'To perform this update action, the head node must be in a stopped state',
  actionNeeded: 'Stop the compute fleet, then stop the head node instance before updating',
  printSucceeded: true,
  failureResult: 'ACTION_NEEDED',
};

export const READ_ONLY_RESOURCE_BUCKET: UpdatePolicy = {
  name: 'READ_ONLY_RESOURCE_BUCKET',
  level: 30,
  conditionChecker: (change) => !change.oldValue && !change.newValue,
  failReason: (change) =>
    `'${change.key}' is a read only parameter that cannot be updated. ` +
    `New value '${describe(change.newValue)}' will be ignored and old value ` +
    `'${describe(change.oldValue)}' will be used if you force the update.`,
  actionNeeded: (change) => `Restore the original value '${describe(change.oldValue)}' for '${change.key}'`,
  printSucceeded: false,
  failureResult: 'FAILED',
};

export const UNKNOWN: UpdatePolicy = {
  name: 'UNKNOWN',
  level: 100,
  failReason: 'Update currently not supported',
  actionNeeded: 'Restore the previous parameter value',
  printSucceeded: true,
  failureResult: 'FAILED',
};

export const UNSUPPORTED: UpdatePolicy = {
  name: 'UNSUPPORTED',
  level: 1000,
  failReason: (change) =>
    change.isList
      ? `Update of list section '${change.key}' is not supported`
      : `Update of parameter '${change.key}' is not supported`,
  actionNeeded: (change) =>
    `Restore the previous value of '${change.key}', or delete the cluster and create a new one`,
  printSucceeded: true,
  failureResult: 'FAILED',
};

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Pick the strictest policy; the first one wins a tie.
 */
export function selectPolicy(candidates: readonly UpdatePolicy[]): UpdatePolicy {
  return candidates.reduce<UpdatePolicy>(
    (selected, candidate) => (candidate.level > selected.level ? candidate : selected),
    candidates[0] ?? UNKNOWN
  );
}

function render(text: PolicyText, change: Change, patch: PatchContext): string {
  return typeof text === 'function' ? text(change, patch) : text;
}

/**
 * Evaluate a change against its selected policy.
 */
export function checkChange(change: Change, patch: PatchContext): ChangeVerdict {
  const policy = change.updatePolicy;
  const base = {
    parameter: parameterPath(change),
    oldValue: change.oldValue,
    newValue: change.newValue,
    updatePolicy: policy.name,
  };

  if (policy.conditionChecker?.(change, patch)) {
    return {
      ...base,
      result: 'SUCCEEDED',
      failReason: '-',
      actionNeeded: null,
      display: policy.printSucceeded,
    };
  }

  const result = policy.conditionChecker ? policy.failureResult : 'FAILED';
  return {
    ...base,
    result,
    failReason: render(policy.failReason, change, patch),
    actionNeeded: policy.actionNeeded === null ? null : render(policy.actionNeeded, change, patch),
    display: true,
  };
}
