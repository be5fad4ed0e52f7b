/**
 * Cluster Snapshot
 *
 * Point-in-time view of a running cluster, read before an update is
 * checked and never refreshed afterwards.
 */

import type { CloudProvider } from '../cloud/types.js';
import { computeEnvironmentName } from '../core/naming.js';
import type { ClusterContext, FleetStatus, HeadNodeState } from './types.js';

export interface ClusterSnapshotState {
  name: string;
  scheduler: string;
  fleetStatus: FleetStatus;
  headNodeState: HeadNodeState | null;
  batchDesiredVcpus: number | null;
}

export class ClusterSnapshot implements ClusterContext {
  readonly name: string;
  readonly scheduler: string;
  readonly fleetStatus: FleetStatus;
  readonly headNodeState: HeadNodeState | null;
  readonly batchDesiredVcpus: number | null;

  constructor(state: ClusterSnapshotState) {
    this.name = state.name;
    this.scheduler = state.scheduler;
    this.fleetStatus = state.fleetStatus;
    this.headNodeState = state.headNodeState;
    this.batchDesiredVcpus = state.batchDesiredVcpus;
  }

  /**
   * Read the live state of a cluster from its collaborators.
   */
  static async capture(
    name: string,
    scheduler: string,
    provider: Pick<CloudProvider, 'fleetStatus' | 'facts' | 'computeEnvironments'>
  ): Promise<ClusterSnapshot> {
    const fleetStatus = await provider.fleetStatus.getStatus(name);
    const headNodeState = await provider.facts.getHeadNodeState(name);
    let batchDesiredVcpus: number | null = null;
    if (scheduler === 'awsbatch') {
      const capacity = await provider.computeEnvironments.describe(computeEnvironmentName(name));
      batchDesiredVcpus = capacity?.desiredvCpus ?? null;
    }
    return new ClusterSnapshot({ name, scheduler, fleetStatus, headNodeState, batchDesiredVcpus });
  }

  /**
   * Whether compute capacity may currently be running.
   *
   * A managed batch fleet is judged by its desired vCPUs when known.
   */
  hasRunningCapacity(): boolean {
    if (this.scheduler === 'awsbatch' && this.batchDesiredVcpus !== null) {
      return this.batchDesiredVcpus > 0;
    }
    return this.fleetStatus !== 'STOPPED';
  }
}
