/**
 * Local Fleet Status Store
 *
 * One record per cluster under <stateDir>/fleet. A compare-and-swap holds
 * an exclusive lock file for the whole compare and both writes.
 */

import { mkdir, open, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';

import { StatusConflictError } from '../cloud/errors.js';
import type { FleetStatusStore } from '../cloud/types.js';
import type { FleetStatus } from '../update/types.js';
import { errnoCode, readJson, removeFile, writeJson } from './files.js';
import { fleetStatusRecordSchema, recordCheck } from './schemas.js';

const SERVICE = 'fleet-status';

const checkRecord = recordCheck(fleetStatusRecordSchema, SERVICE);

export class LocalFleetStatusStore implements FleetStatusStore {
  private readonly root: string;

  constructor(stateDir: string) {
    this.root = join(stateDir, 'fleet');
  }

  /**
   * Recorded status; UNKNOWN when there is no record.
   */
  async getStatus(cluster: string): Promise<FleetStatus> {
    const record = await readJson(this.recordPath(cluster), checkRecord, SERVICE);
    return record?.status ?? 'UNKNOWN';
  }

  async compareAndSwap(
    cluster: string,
    expectedFrom: FleetStatus,
    transitional: FleetStatus,
    final: FleetStatus
  ): Promise<void> {
    await mkdir(this.root, { recursive: true });
    const lockPath = this.lockPath(cluster);

    let lock: FileHandle;
    try {
      lock = await open(lockPath, 'wx');
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new StatusConflictError(cluster, expectedFrom, null);
      }
      throw error;
    }

    try {
      const current = await this.getStatus(cluster);
      if (current !== expectedFrom) {
        throw new StatusConflictError(cluster, expectedFrom, current);
      }
      await this.save(cluster, transitional);
      await this.save(cluster, final);
    } finally {
      await lock.close();
      await removeFile(lockPath);
    }
  }

  async initialize(cluster: string, status: FleetStatus): Promise<void> {
    await this.save(cluster, status);
  }

  async remove(cluster: string): Promise<void> {
    await removeFile(this.recordPath(cluster));
    await removeFile(this.lockPath(cluster));
  }

  private recordPath(cluster: string): string {
    return join(this.root, `${cluster}.json`);
  }

  private lockPath(cluster: string): string {
    return join(this.root, `${cluster}.lock`);
  }

  private async save(cluster: string, status: FleetStatus): Promise<void> {
    await writeJson(this.recordPath(cluster), { cluster, status, updatedAt: new Date().toISOString() });
  }
}
