/**
 * Update Policy Types
 *
 * Shapes shared by the diff engine, the policy catalog and the
 * lifecycle controller.
 */

import type { JsonObject, JsonValue } from '../lib/json.js';

// =============================================================================
// Live Cluster Context
// =============================================================================

/**
 * Fleet status as recorded by the fleet status store.
 */
export type FleetStatus = 'STOPPED' | 'STOPPING' | 'STARTING' | 'RUNNING' | 'UNKNOWN';

/**
 * Instance state of the head node.
 */
export type HeadNodeState =
  | 'pending'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'shutting-down'
  | 'terminated';

/**
 * Read-only view of the running cluster consulted by condition checkers.
 */
export interface ClusterContext {
  readonly name: string;
  readonly scheduler: string;
  readonly fleetStatus: FleetStatus;
  readonly headNodeState: HeadNodeState | null;
  /** Desired vCPUs of the managed compute environment, when there is one */
  readonly batchDesiredVcpus: number | null;
  hasRunningCapacity(): boolean;
}

// =============================================================================
// Changes and Policies
// =============================================================================

/**
 * One differing field or list element between two resolved documents.
 */
export interface Change {
  /** Locators leading to the field, e.g. ['Scheduling', 'SlurmQueues[q1]'] */
  readonly path: readonly string[];
  readonly key: string;
  readonly oldValue: JsonValue | null;
  readonly newValue: JsonValue | null;
  /** Addition or removal of a list element */
  readonly isList: boolean;
  /** Strictest of the candidate policies */
  readonly updatePolicy: UpdatePolicy;
  readonly candidatePolicies: readonly UpdatePolicy[];
}

/**
 * Everything a condition checker may look at besides the change itself.
 */
export interface PatchContext {
  readonly baseConfig: JsonObject;
  readonly targetConfig: JsonObject;
  readonly cluster: ClusterContext;
  readonly changes: readonly Change[];
}

export type CheckResult = 'SUCCEEDED' | 'ACTION_NEEDED' | 'FAILED';

export type ConditionChecker = (change: Change, patch: PatchContext) => boolean;

export type PolicyText = string | ((change: Change, patch: PatchContext) => string);

/**
 * A named rule deciding whether a change can be applied live.
 */
export interface UpdatePolicy {
  readonly name: string;
  /** Higher is more disruptive; the highest candidate wins */
  readonly level: number;
  /** Missing checker means the change can never be applied */
  readonly conditionChecker?: ConditionChecker;
  readonly failReason: PolicyText;
  readonly actionNeeded: PolicyText | null;
  /** Show the change even when it is allowed */
  readonly printSucceeded: boolean;
  /** Result reported when the checker denies the change */
  readonly failureResult: Exclude<CheckResult, 'SUCCEEDED'>;
}

/**
 * Outcome of evaluating one change against its policy.
 */
export interface ChangeVerdict {
  /** Dotted parameter path, e.g. Scheduling.SlurmQueues[q1].ComputeResources[cr1].MaxCount */
  readonly parameter: string;
  readonly oldValue: JsonValue | null;
  readonly newValue: JsonValue | null;
  readonly updatePolicy: string;
  readonly result: CheckResult;
  readonly failReason: string;
  readonly actionNeeded: string | null;
  readonly display: boolean;
}

/**
 * Overall result of checking a patch.
 */
export interface PatchCheckResult {
  readonly allowed: boolean;
  readonly verdicts: ChangeVerdict[];
  /** Verdicts that should be shown to the user */
  readonly changeSet: ChangeVerdict[];
}
